import type { Binary, ObjectId } from 'mongodb';

export type ScalarFieldType =
  | 'boolean'
  | 'string'
  | 'text'
  | 'json'
  | 'password'
  | 'blob'
  | 'upload'
  | 'integer'
  | 'bigint'
  | 'float'
  | 'double'
  | 'date'
  | 'time'
  | 'datetime'
  | 'id';

export type ReferenceType = `reference ${string}`;
export type ListReferenceType = `list:reference ${string}`;

export type FieldType =
  | ScalarFieldType
  | ReferenceType
  | 'list:string'
  | 'list:integer'
  | ListReferenceType;

export type Scalar =
  | string
  | number
  | bigint
  | boolean
  | null
  | Date
  | Uint8Array
  | ArrayBuffer
  | ObjectId
  | Binary;

export type QueryOperator =
  | 'AND'
  | 'OR'
  | 'NOT'
  | 'EQ'
  | 'NE'
  | 'LT'
  | 'LE'
  | 'GT'
  | 'GE'
  | 'BELONGS'
  | 'LIKE'
  | 'ILIKE'
  | 'STARTSWITH'
  | 'ENDSWITH'
  | 'CONTAINS';

export type ExpressionOperator =
  | 'INVERT'
  | 'COMMA'
  | 'ADD'
  | 'SUB'
  | 'MUL'
  | 'DIV'
  | 'MOD'
  | 'SUM'
  | 'MAX'
  | 'MIN'
  | 'AVG'
  | 'COUNT'
  | 'AS'
  | 'ON';

export type Operator = QueryOperator | ExpressionOperator;

/** Keyword arguments some operators accept. */
export interface OperatorOptions {
  caseSensitive?: boolean;
  distinct?: boolean;
  escape?: string;
  alias?: string;
}

export interface FieldRef {
  readonly kind: 'field';
  readonly table: string;
  readonly name: string;
  readonly type: FieldType;
}

export interface Literal {
  readonly kind: 'literal';
  readonly value: Scalar | readonly Scalar[];
}

/** Operator text emitted verbatim by the compiler. */
export interface Raw {
  readonly kind: 'raw';
  readonly text: string;
}

export interface Query {
  readonly kind: 'query';
  readonly op: QueryOperator;
  readonly first: Node;
  readonly second?: Node;
  readonly options?: OperatorOptions;
}

export interface Expression {
  readonly kind: 'expression';
  readonly op: ExpressionOperator;
  readonly first?: Node;
  readonly second?: Node;
  readonly options?: OperatorOptions;
  readonly type?: FieldType;
}

export type Node = FieldRef | Literal | Raw | Query | Expression;

export type Operand = Node | Scalar | readonly Scalar[];

export function isNode(value: unknown): value is Node {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (Object.getPrototypeOf(value) !== Object.prototype) return false;
  if (!('kind' in value)) return false;
  const kind = value.kind;
  return kind === 'field' || kind === 'literal' || kind === 'raw' || kind === 'query' || kind === 'expression';
}

export function isScalarList(value: Scalar | readonly Scalar[]): value is readonly Scalar[] {
  return Array.isArray(value);
}

export function isReferenceType(type: FieldType): type is ReferenceType {
  return type.startsWith('reference ');
}

export function isListReferenceType(type: FieldType): type is ListReferenceType {
  return type.startsWith('list:reference ');
}

/** Table named by a `reference <t>` or `list:reference <t>` type, if any. */
export function referencedTable(type: FieldType): string | undefined {
  if (isReferenceType(type)) return type.slice('reference '.length);
  if (isListReferenceType(type)) return type.slice('list:reference '.length);
  return undefined;
}

export const TEXT_TYPES: readonly FieldType[] = ['string', 'text', 'password'];
