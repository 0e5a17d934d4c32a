import { ObjectId } from 'mongodb';
import type { FieldType, Node, Operator, OperatorOptions, Query, Scalar } from '../algebra/types.js';
import { TEXT_TYPES, isListReferenceType, isNode, isReferenceType, isScalarList } from '../algebra/types.js';
import { describeNode, typeOf } from '../algebra/inspect.js';
import { represent } from '../codec/represent.js';
import { toNativeId } from '../codec/object-id.js';
import { MalformedInputError, UnsupportedFeatureError } from '../errors.js';
import { buildPatternFragment, escapeRegex } from './pattern.js';
import type { PatternFlags } from './pattern.js';
import type { CompileContext, FilterDocument, Fragment, SortSpec } from './types.js';
import { FILTER_CONTEXT, PIPELINE_CONTEXT, isFilterDocument } from './types.js';

export const ID_KEY = '_id';

type OperatorCompiler = (
  first: Node | undefined,
  second: Node | undefined,
  options: OperatorOptions,
  ctx: CompileContext,
) => Fragment;

function isIdentifierType(type: FieldType): boolean {
  return type === 'id' || isReferenceType(type) || isListReferenceType(type);
}

/**
 * Queries on identifier and reference fields compare against ObjectIds,
 * so literal right-hand sides go through the identifier codec first.
 * Null stays null: ordering comparisons must still be able to reject it.
 */
function rewriteIdentifierQuery(node: Query): Query {
  const { first, second } = node;
  if (first.kind !== 'field' || !isIdentifierType(first.type)) return node;
  if (second === undefined || second.kind !== 'literal' || second.value === null) return node;
  const value: Scalar | readonly Scalar[] = isScalarList(second.value)
    ? second.value.map((v) => toNativeId(v))
    : toNativeId(second.value);
  return { ...node, second: { kind: 'literal', value } };
}

/**
 * Compiles an algebra node into a MongoDB fragment. `impliedType` is the
 * declared type of the field a literal is compared against.
 */
export function compile(node: Node | undefined, ctx: CompileContext, impliedType?: FieldType): Fragment {
  if (node === undefined) return null;

  switch (node.kind) {
    case 'field': {
      const name = node.type === 'id' ? ID_KEY : node.name;
      return ctx.aggregate ? `$${name}` : name;
    }
    case 'literal':
      return represent(node.value, impliedType);
    case 'raw':
      return node.text;
    case 'query': {
      const rewritten = rewriteIdentifierQuery(node);
      return OPERATORS[rewritten.op](rewritten.first, rewritten.second, rewritten.options ?? {}, ctx);
    }
    case 'expression':
      return OPERATORS[node.op](node.first, node.second, node.options ?? {}, ctx);
  }
}

function fieldKey(node: Node | undefined, ctx: CompileContext): string {
  const key = compile(node, ctx);
  if (typeof key !== 'string') {
    throw new UnsupportedFeatureError(
      'expression comparisons',
      `Left operand of a comparison must be a field, got ${node === undefined ? 'nothing' : describeNode(node)}`,
    );
  }
  return key;
}

function requireOperand(op: Operator, first: Node | undefined, second: Node | undefined): Node {
  if (second === undefined || (second.kind === 'literal' && second.value === null)) {
    const left = first === undefined ? 'nothing' : describeNode(first);
    throw new MalformedInputError(`${op}: cannot compare ${left} with null`);
  }
  return second;
}

function patternText(node: Node | undefined, ctx: CompileContext): string {
  const text = compile(node, ctx, 'string');
  if (typeof text !== 'string') {
    throw new MalformedInputError('Pattern operand must compile to text');
  }
  return text;
}

function comparison(op: Operator, mongoOp: string, ordered: boolean): OperatorCompiler {
  return (first, second, _options, ctx) => {
    const right = ordered ? requireOperand(op, first, second) : second;
    return { [fieldKey(first, ctx)]: { [mongoOp]: compile(right, ctx, typeOf(first)) } };
  };
}

function arithmetic(mongoOp: string): OperatorCompiler {
  return (first, second, _options, ctx) => ({
    [mongoOp]: [compile(first, ctx), compile(second, ctx, typeOf(first))],
  });
}

function aggregate(mongoOp: string): OperatorCompiler {
  return (first) => ({ [mongoOp]: compile(first, PIPELINE_CONTEXT) });
}

function pattern(flags: PatternFlags): OperatorCompiler {
  return (first, second, options, ctx) => ({
    [fieldKey(first, ctx)]: buildPatternFragment(patternText(second, ctx), {
      ...flags,
      caseSensitive: flags.caseSensitive ?? options.caseSensitive ?? true,
      ...(options.escape !== undefined ? { escape: options.escape } : {}),
    }),
  });
}

function orderText(node: Node | undefined, ctx: CompileContext): string {
  const text = compile(node, ctx);
  if (typeof text !== 'string') {
    throw new MalformedInputError('orderby accepts fields, descending fields and comma lists only');
  }
  return text;
}

function not(first: Node | undefined, ctx: CompileContext): Fragment {
  const inner = compile(first, ctx);
  const [key, ...rest] = isFilterDocument(inner) ? Object.keys(inner) : [];
  if (!isFilterDocument(inner) || key === undefined || rest.length > 0) {
    const operand = first === undefined ? 'nothing' : describeNode(first);
    throw new MalformedInputError(`NOT expects a single-condition query, got ${operand}`);
  }
  const body = inner[key];
  if (body === undefined) return inner;

  // De Morgan: not(A and B) -> not(A) or not(B), not(A or B) -> not(A) and not(B)
  if ((key === '$and' || key === '$or') && first?.kind === 'query' && first.second !== undefined) {
    const flipped = key === '$and' ? '$or' : '$and';
    return { [flipped]: [not(first.first, ctx), not(first.second, ctx)] };
  }
  if (key === '$where' && typeof body === 'string') {
    return { $where: `!(${body})` };
  }
  if (isFilterDocument(body)) {
    const [op, ...others] = Object.keys(body);
    if (others.length === 0 && (op === '$ne' || op === '$not')) {
      return { [key]: body[op] ?? null };
    }
    return { [key]: { $not: body } };
  }
  return { [key]: { $ne: body } };
}

function contains(
  first: Node | undefined,
  second: Node | undefined,
  options: OperatorOptions,
  ctx: CompileContext,
): Fragment {
  const key = fieldKey(first, ctx);
  const caseSensitive = options.caseSensitive ?? true;

  if (second?.kind === 'literal' && second.value instanceof ObjectId) {
    return { [key]: second.value };
  }
  const type = typeOf(first);
  if (type === 'list:string') {
    if (first?.kind === 'field' && second?.kind === 'field' && second.type === 'string') {
      return { $where: `this.${first.name}.indexOf(this.${second.name}) > -1` };
    }
    return { [key]: buildPatternFragment(patternText(second, ctx), { caseSensitive, wholeString: true }) };
  }
  if (type === 'list:integer') {
    return { [key]: compile(second, ctx, 'integer') };
  }
  const fragment = buildPatternFragment(patternText(second, ctx), { caseSensitive, wholeString: false });
  return { [key]: typeof fragment === 'string' ? { $regex: escapeRegex(fragment) } : fragment };
}

const OPERATORS: Record<Operator, OperatorCompiler> = {
  AND: (first, second, _options, ctx) => ({ $and: [compile(first, ctx), compile(second, ctx)] }),
  OR: (first, second, _options, ctx) => ({ $or: [compile(first, ctx), compile(second, ctx)] }),
  NOT: (first, _second, _options, ctx) => not(first, ctx),

  EQ: (first, second, _options, ctx) => ({ [fieldKey(first, ctx)]: compile(second, ctx, typeOf(first)) }),
  NE: comparison('NE', '$ne', false),
  LT: comparison('LT', '$lt', true),
  LE: comparison('LE', '$lte', true),
  GT: comparison('GT', '$gt', true),
  GE: comparison('GE', '$gte', true),

  BELONGS: (first, second, _options, ctx) => {
    if (second === undefined || second.kind !== 'literal') {
      throw new UnsupportedFeatureError(
        'nested queries',
        'BELONGS accepts a list of values; nested queries are not supported by the MongoDB adapter',
      );
    }
    const type = typeOf(first);
    const items: readonly Scalar[] = isScalarList(second.value) ? second.value : [second.value];
    return { [fieldKey(first, ctx)]: { $in: items.map((item) => represent(item, type)) } };
  },

  LIKE: pattern({ likeWildcards: true }),
  ILIKE: pattern({ likeWildcards: true, caseSensitive: false }),
  STARTSWITH: pattern({ startsWith: true }),
  ENDSWITH: pattern({ endsWith: true }),
  CONTAINS: contains,

  INVERT: (first, _second, _options, ctx) => `-${orderText(first, ctx)}`,
  COMMA: (first, second, _options, ctx) => `${orderText(first, ctx)},${orderText(second, ctx)}`,

  ADD: (first, second, _options, ctx) => {
    const concat = [typeOf(first), typeOf(second)].some((t) => t !== undefined && TEXT_TYPES.includes(t));
    return { [concat ? '$concat' : '$add']: [compile(first, ctx), compile(second, ctx, typeOf(first))] };
  },
  SUB: arithmetic('$subtract'),
  MUL: arithmetic('$multiply'),
  DIV: arithmetic('$divide'),
  MOD: arithmetic('$mod'),

  SUM: aggregate('$sum'),
  MAX: aggregate('$max'),
  MIN: aggregate('$min'),
  AVG: aggregate('$avg'),
  COUNT: (_first, _second, options) => {
    if (options.distinct === true) {
      throw new UnsupportedFeatureError('COUNT DISTINCT');
    }
    return { $sum: 1 };
  },

  AS: () => {
    throw new UnsupportedFeatureError('AS', 'Aliasing (AS) is not supported by the MongoDB adapter');
  },
  ON: () => {
    throw new UnsupportedFeatureError(
      'ON',
      'Explicit joins (ON) are not possible in MongoDB; simulate them in application code',
    );
  },
};

/** Compiles a query into a filter document for find/count/update/delete. */
export function compileFilter(query: Query | null | undefined): FilterDocument | undefined {
  if (query === null || query === undefined) return undefined;
  const filter = compile(query, FILTER_CONTEXT);
  if (!isFilterDocument(filter)) {
    throw new MalformedInputError(`Query did not compile to a filter document: ${describeNode(query)}`);
  }
  return filter;
}

/** `[field, -1]` for descending (`q.desc`) entries, `[field, 1]` otherwise. */
export function compileOrderBy(orderby: Node | readonly Node[]): SortSpec {
  const nodes: readonly Node[] = isNode(orderby) ? [orderby] : orderby;
  const spec: SortSpec = [];
  for (const node of nodes) {
    for (const part of orderText(node, FILTER_CONTEXT).split(',')) {
      const name = part.trim();
      if (name === '') continue;
      spec.push(name.startsWith('-') ? [name.slice(1), -1] : [name, 1]);
    }
  }
  return spec;
}
