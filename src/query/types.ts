import type { Binary, ObjectId } from 'mongodb';

export type BsonValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | Date
  | RegExp
  | Uint8Array
  | ObjectId
  | Binary;

/** Anything the compiler emits: a value, a list, or an operator document. */
export type Fragment = BsonValue | FilterDocument | readonly Fragment[];

export interface FilterDocument {
  [key: string]: Fragment;
}

/**
 * Compilation mode. In pipeline context field references are emitted as
 * `$name` variables instead of plain keys.
 */
export interface CompileContext {
  readonly aggregate: boolean;
}

export const FILTER_CONTEXT: CompileContext = { aggregate: false };
export const PIPELINE_CONTEXT: CompileContext = { aggregate: true };

export type SortSpec = Array<[string, 1 | -1]>;

export function isFilterDocument(value: Fragment): value is FilterDocument {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
