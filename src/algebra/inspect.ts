import type { FieldType, Node, Operator, Scalar } from './types.js';
import { isScalarList } from './types.js';
import { UnsupportedFeatureError } from '../errors.js';

export function typeOf(node: Node | undefined): FieldType | undefined {
  if (node === undefined) return undefined;
  if (node.kind === 'field' || node.kind === 'expression') return node.type;
  return undefined;
}

function collectTables(node: Node | undefined, into: Set<string>): void {
  if (node === undefined) return;
  switch (node.kind) {
    case 'field':
      into.add(node.table);
      return;
    case 'query':
    case 'expression':
      collectTables(node.first, into);
      collectTables(node.second, into);
      return;
    case 'literal':
    case 'raw':
      return;
  }
}

/**
 * Resolves the one table every field leaf of the tree belongs to.
 * Returns undefined for trees without fields; cross-table trees are joins
 * and cannot be expressed against a single collection.
 */
export function tableOf(node: Node): string | undefined {
  const tables = new Set<string>();
  collectTables(node, tables);
  if (tables.size > 1) {
    throw new UnsupportedFeatureError(
      'joins',
      `Query spans several tables (${[...tables].join(', ')}); joins are not supported by the MongoDB adapter`,
    );
  }
  const [table] = tables;
  return table;
}

const SYMBOLS: Partial<Record<Operator, string>> = {
  EQ: '=',
  NE: '<>',
  LT: '<',
  LE: '<=',
  GT: '>',
  GE: '>=',
  ADD: '+',
  SUB: '-',
  MUL: '*',
  DIV: '/',
  MOD: '%',
  AND: 'AND',
  OR: 'OR',
};

function describeScalar(value: Scalar): string {
  if (value === null) return 'NULL';
  if (typeof value === 'string') return `'${value}'`;
  if (value instanceof Date) return value.toISOString();
  if (value instanceof Uint8Array || value instanceof ArrayBuffer) return `<${value.byteLength} bytes>`;
  return String(value);
}

/** Human readable label, used as the column name of computed select fields. */
export function describeNode(node: Node): string {
  switch (node.kind) {
    case 'field':
      return `${node.table}.${node.name}`;
    case 'raw':
      return node.text;
    case 'literal':
      return isScalarList(node.value)
        ? `(${node.value.map(describeScalar).join(', ')})`
        : describeScalar(node.value);
    case 'query':
    case 'expression': {
      const symbol = SYMBOLS[node.op];
      if (symbol !== undefined && node.second !== undefined && node.first !== undefined) {
        return `(${describeNode(node.first)} ${symbol} ${describeNode(node.second)})`;
      }
      const args = [node.first, node.second].filter((n): n is Node => n !== undefined).map(describeNode);
      return `${node.op}(${args.join(', ')})`;
    }
  }
}
