import type {
  Expression,
  ExpressionOperator,
  FieldType,
  Node,
  Operand,
  OperatorOptions,
  Query,
  QueryOperator,
} from './types.js';
import { isNode } from './types.js';
import { typeOf } from './inspect.js';

/** Wraps plain values as literals; nodes are returned as given. */
export function toNode(operand: Operand): Node {
  if (isNode(operand)) return operand;
  return { kind: 'literal', value: operand };
}

function query(op: QueryOperator, first: Operand, second?: Operand, options?: OperatorOptions): Query {
  return {
    kind: 'query',
    op,
    first: toNode(first),
    ...(second !== undefined ? { second: toNode(second) } : {}),
    ...(options !== undefined ? { options } : {}),
  };
}

function expression(
  op: ExpressionOperator,
  first: Operand | undefined,
  second: Operand | undefined,
  type: FieldType | undefined,
  options?: OperatorOptions,
): Expression {
  return {
    kind: 'expression',
    op,
    ...(first !== undefined ? { first: toNode(first) } : {}),
    ...(second !== undefined ? { second: toNode(second) } : {}),
    ...(options !== undefined ? { options } : {}),
    ...(type !== undefined ? { type } : {}),
  };
}

function arithmetic(op: ExpressionOperator, first: Operand, second: Operand): Expression {
  return expression(op, first, second, typeOf(toNode(first)));
}

/**
 * Entry point for the query algebra DSL.
 *
 * @example
 * const person = defineTable('person', [{ name: 'name', type: 'string' }, { name: 'age', type: 'integer' }]);
 * q.and(q.like(person.field('name'), 'J%'), q.ge(person.field('age'), 18))
 */
export const q = {
  and: (first: Query, second: Query): Query => query('AND', first, second),
  or: (first: Query, second: Query): Query => query('OR', first, second),
  not: (first: Query): Query => query('NOT', first),

  eq: (first: Operand, second: Operand): Query => query('EQ', first, second),
  ne: (first: Operand, second: Operand): Query => query('NE', first, second),
  lt: (first: Operand, second: Operand): Query => query('LT', first, second),
  le: (first: Operand, second: Operand): Query => query('LE', first, second),
  gt: (first: Operand, second: Operand): Query => query('GT', first, second),
  ge: (first: Operand, second: Operand): Query => query('GE', first, second),
  belongs: (first: Operand, second: Operand): Query => query('BELONGS', first, second),

  like: (first: Operand, pattern: Operand, options?: { caseSensitive?: boolean; escape?: string }): Query =>
    query('LIKE', first, pattern, options),
  ilike: (first: Operand, pattern: Operand, options?: { escape?: string }): Query =>
    query('ILIKE', first, pattern, options),
  startsWith: (first: Operand, prefix: Operand): Query => query('STARTSWITH', first, prefix),
  endsWith: (first: Operand, suffix: Operand): Query => query('ENDSWITH', first, suffix),
  contains: (first: Operand, value: Operand, options?: { caseSensitive?: boolean }): Query =>
    query('CONTAINS', first, value, options),

  add: (first: Operand, second: Operand): Expression => arithmetic('ADD', first, second),
  sub: (first: Operand, second: Operand): Expression => arithmetic('SUB', first, second),
  mul: (first: Operand, second: Operand): Expression => arithmetic('MUL', first, second),
  div: (first: Operand, second: Operand): Expression => arithmetic('DIV', first, second),
  mod: (first: Operand, second: Operand): Expression => arithmetic('MOD', first, second),

  sum: (first: Operand): Expression => expression('SUM', first, undefined, typeOf(toNode(first))),
  max: (first: Operand): Expression => expression('MAX', first, undefined, typeOf(toNode(first))),
  min: (first: Operand): Expression => expression('MIN', first, undefined, typeOf(toNode(first))),
  avg: (first: Operand): Expression => expression('AVG', first, undefined, 'double'),
  count: (first?: Operand, options?: { distinct?: boolean }): Expression =>
    expression('COUNT', first, undefined, 'integer', options),

  /** Descending sort marker for orderby. */
  desc: (first: Operand): Expression => expression('INVERT', first, undefined, typeOf(toNode(first))),
  comma: (first: Operand, second: Operand): Expression => expression('COMMA', first, second, undefined),
  as: (first: Operand, alias: string): Expression =>
    expression('AS', first, undefined, typeOf(toNode(first)), { alias }),
  on: (first: Operand, second: Query): Expression => expression('ON', first, second, undefined),

  raw: (text: string): Node => ({ kind: 'raw', text }),
};
