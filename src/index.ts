export { q, toNode } from './algebra/builder.js';
export { describeNode, tableOf, typeOf } from './algebra/inspect.js';
export type {
  Expression,
  ExpressionOperator,
  FieldRef,
  FieldType,
  Literal,
  Node,
  Operand,
  Operator,
  OperatorOptions,
  Query,
  QueryOperator,
  Raw,
  Scalar,
} from './algebra/types.js';
export { Schema, Table, defineTable } from './schema/table.js';
export type { BoundField, FieldDescriptor, InboundReferences, OnDeletePolicy } from './schema/table.js';
export { randomHexDigits, toAlgebraInt, toNativeId } from './codec/object-id.js';
export { BLOB_ARRAY_BUFFER, BLOB_BYTES, BLOB_NON_UTF8_TEXT, decodeBlob, encodeBlob } from './codec/blob.js';
export { parse, represent } from './codec/represent.js';
export { compile, compileFilter, compileOrderBy } from './query/compiler.js';
export { buildPatternFragment } from './query/pattern.js';
export type { PatternFlags } from './query/pattern.js';
export { FILTER_CONTEXT, PIPELINE_CONTEXT } from './query/types.js';
export type { CompileContext, FilterDocument, Fragment, SortSpec } from './query/types.js';
export { MongoAdapter } from './store/adapter.js';
export type { MongoAdapterConfig, MongoConnectOptions } from './store/adapter.js';
export type {
  CountOptions,
  CreateTableOptions,
  DocumentAdapter,
  InsertValues,
  RecordReference,
  SelectAttributes,
  SelectResult,
  Selectable,
  UpdateValues,
  WriteOptions,
} from './types.js';
export {
  ConfigurationError,
  IdentifierTypeError,
  InvalidIdentifierError,
  MalformedInputError,
  UnsupportedFeatureError,
  UpdateError,
} from './errors.js';
