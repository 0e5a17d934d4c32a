import type { Expression, FieldRef, Node, Operand, Query, Scalar } from './algebra/types.js';
import type { Table } from './schema/table.js';

export interface WriteOptions {
  /** Overrides the adapter's default write acknowledgment for this call. */
  safe?: boolean;
}

export interface CountOptions {
  distinct?: boolean;
}

export interface SelectAttributes {
  orderby?: Node | readonly Node[];
  /** `[from, to)`: skip `from` rows and return at most `to - from`. */
  limitby?: readonly [number, number];
  forUpdate?: boolean;
  [attribute: string]: unknown;
}

export type Selectable = FieldRef | Expression | Table;

export interface SelectResult {
  /** `table.field` for stored fields, a readable label for computed ones. */
  columns: string[];
  rows: unknown[][];
}

export interface RecordReference {
  table: string;
  id: bigint;
}

export type InsertValues = Record<string, Scalar | readonly Scalar[]>;
export type UpdateValues = Record<string, Operand>;

export interface CreateTableOptions {
  capped?: boolean;
}

export interface DocumentAdapter {
  count(query: Node, options?: CountOptions): Promise<number>;
  select(query: Query | null, fields: readonly Selectable[], attributes?: SelectAttributes): Promise<SelectResult>;
  insert(table: string, values: InsertValues, options?: WriteOptions): Promise<RecordReference | null>;
  bulkInsert(table: string, items: readonly InsertValues[]): Promise<Array<RecordReference | null>>;
  update(table: string, query: Node, values: UpdateValues, options?: WriteOptions): Promise<number>;
  delete(table: string, query: Node, options?: WriteOptions): Promise<number>;
  createTable(table: Table, options?: CreateTableOptions): Promise<void>;
  truncate(table: string, options?: WriteOptions): Promise<void>;
  drop(table: string): Promise<void>;
  initialize(): Promise<void>;
  close(): Promise<void>;
}
