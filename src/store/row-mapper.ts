import type { Document } from 'mongodb';
import type { FieldRef, FieldType } from '../algebra/types.js';
import { parse } from '../codec/represent.js';
import { ID_KEY } from '../query/compiler.js';

export interface Column {
  /** Name reported to the caller. */
  label: string;
  /** Key read from the result document. */
  key: string;
  type: FieldType | undefined;
}

/** The stored identifier is reported as `id`, not `_id`. */
export function fieldColumn(table: string, field: FieldRef): Column {
  if (field.type === 'id' || field.name === ID_KEY) {
    return { label: `${table}.id`, key: ID_KEY, type: 'id' };
  }
  return { label: `${table}.${field.name}`, key: field.name, type: field.type };
}

export function mapDocument(document: Document, columns: readonly Column[]): unknown[] {
  return columns.map((column) => parse(document[column.key], column.type));
}
