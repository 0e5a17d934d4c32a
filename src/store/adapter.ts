import { MongoClient } from 'mongodb';
import type { Collection, Db, Document, MongoClientOptions, ObjectId } from 'mongodb';
import type { Expression, FieldRef, Node, Query } from '../algebra/types.js';
import { q, toNode } from '../algebra/builder.js';
import { describeNode, tableOf } from '../algebra/inspect.js';
import { represent } from '../codec/represent.js';
import { toAlgebraInt, toNativeId } from '../codec/object-id.js';
import { compile, compileFilter, compileOrderBy, ID_KEY } from '../query/compiler.js';
import { FILTER_CONTEXT, PIPELINE_CONTEXT } from '../query/types.js';
import type { Fragment } from '../query/types.js';
import { Table } from '../schema/table.js';
import type { BoundField, Schema } from '../schema/table.js';
import { ConfigurationError, MalformedInputError, UnsupportedFeatureError, UpdateError } from '../errors.js';
import type {
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
} from '../types.js';
import { fieldColumn, mapDocument } from './row-mapper.js';
import type { Column } from './row-mapper.js';

export interface MongoAdapterConfig {
  db: Db;
  schema: Schema;
  /** Default write acknowledgment (`w: 1` when true, `w: 0` when false). Defaults to true. */
  safe?: boolean;
  /** Server version such as `'7.0.2'`; read with `buildInfo` by initialize() when absent. */
  serverVersion?: string;
  onWarning?: (message: string) => void;
  /** Documents recomputed per round trip by expression updates. Defaults to 1000. */
  updateBatchSize?: number;
}

export interface MongoConnectOptions extends Omit<MongoAdapterConfig, 'db'> {
  uri: string;
  /** Database name; taken from the URI path when omitted. */
  database?: string;
  clientOptions?: MongoClientOptions;
}

const HANDLED_ATTRIBUTES = new Set(['orderby', 'limitby', 'forUpdate']);
const LITERAL_MIN_VERSION = [2, 6] as const;

export function parseServerVersion(version: string): [number, number] {
  const [major = 0, minor = 0] = version.split('.').map((part) => Number.parseInt(part, 10) || 0);
  return [major, minor];
}

export function databaseFromUri(uri: string): string | undefined {
  const m = /^mongodb(?:\+srv)?:\/\/[^/]+\/([^?]*)/.exec(uri);
  const name = m?.[1];
  return name === undefined || name === '' ? undefined : decodeURIComponent(name);
}

export class MongoAdapter implements DocumentAdapter {
  private readonly db: Db;
  private readonly schema: Schema;
  private readonly safe: boolean;
  private readonly onWarning: (message: string) => void;
  private readonly updateBatchSize: number;
  private serverVersion: [number, number] | null;
  private client: MongoClient | null = null;

  constructor(config: MongoAdapterConfig) {
    this.db = config.db;
    this.schema = config.schema;
    this.safe = config.safe ?? true;
    this.serverVersion = config.serverVersion !== undefined ? parseServerVersion(config.serverVersion) : null;
    this.updateBatchSize = config.updateBatchSize ?? 1000;
    if (!Number.isInteger(this.updateBatchSize) || this.updateBatchSize < 1) {
      throw new ConfigurationError(`updateBatchSize must be a positive integer, got ${this.updateBatchSize}`);
    }
    this.onWarning = config.onWarning ?? ((message) => {
      console.warn(`[docstore-dal] ${message}`);
    });
  }

  /** Opens a client for `uri` and returns an initialized adapter that owns it. */
  static async connect(options: MongoConnectOptions): Promise<MongoAdapter> {
    const { uri, database, clientOptions, ...config } = options;
    const name = database ?? databaseFromUri(uri);
    if (name === undefined) {
      throw new ConfigurationError(`Database is required: none given and none in "${uri}"`);
    }
    const client = new MongoClient(uri, {
      ...clientOptions,
      writeConcern: { w: (config.safe ?? true) ? 1 : 0 },
    });
    await client.connect();
    const adapter = new MongoAdapter({ ...config, db: client.db(name) });
    adapter.client = client;
    try {
      await adapter.initialize();
    } catch (err) {
      await client.close();
      throw err;
    }
    return adapter;
  }

  async initialize(): Promise<void> {
    if (this.serverVersion !== null) return;
    const info = await this.db.command({ buildInfo: 1 });
    const version: unknown = info['version'];
    if (typeof version === 'string') {
      this.serverVersion = parseServerVersion(version);
    }
  }

  async close(): Promise<void> {
    if (this.client !== null) {
      await this.client.close();
      this.client = null;
    }
  }

  async createTable(table: Table, options: CreateTableOptions = {}): Promise<void> {
    if (options.capped === true) {
      throw new UnsupportedFeatureError('capped collections', `Cannot create "${table.name}" as a capped collection`);
    }
    // collections come into existence on first insert
  }

  async truncate(table: string, options: WriteOptions = {}): Promise<void> {
    await this.writer(table, options.safe).deleteMany({});
  }

  async drop(table: string): Promise<void> {
    await this.db.collection(table).drop();
  }

  async count(query: Node, options: CountOptions = {}): Promise<number> {
    if (options.distinct === true) {
      throw new UnsupportedFeatureError('COUNT DISTINCT');
    }
    const filter = this.requireFilter('count', query);
    return this.reader(this.requireTable(query)).countDocuments(filter);
  }

  async select(
    query: Query | null,
    fields: readonly Selectable[],
    attributes: SelectAttributes = {},
  ): Promise<SelectResult> {
    this.warnUnsupportedAttributes(attributes);

    let selected = fields.flatMap<FieldRef | Expression>((f) => (f instanceof Table ? f.all() : [f]));
    const tableName = (query !== null ? tableOf(query) : undefined) ?? firstTable(selected);
    if (tableName === undefined) {
      throw new MalformedInputError('The table name could not be found in the query nor from the select statement');
    }
    if (selected.length === 0) {
      selected = this.schema.table(tableName).all();
    }

    const filter = compileFilter(query);
    const collection = this.reader(tableName);

    const plainFields = selected.filter((f): f is FieldRef => f.kind === 'field');
    if (plainFields.length !== selected.length) {
      // computed columns: run a $match/$group pipeline
      const group: Document = { _id: null };
      const columns: Column[] = selected.map((f, i) => {
        if (f.kind === 'field') return fieldColumn(tableName, f);
        const key = `c${i}`;
        group[key] = compile(f, PIPELINE_CONTEXT);
        return { label: describeNode(f), key, type: f.type };
      });
      const pipeline: Document[] = filter !== undefined ? [{ $match: filter }] : [];
      pipeline.push({ $group: group });
      const documents = await collection.aggregate(pipeline).toArray();
      const rows = documents.map((doc) => mapDocument(doc, columns));
      // aggregates over no rows still produce one row
      return {
        columns: columns.map((c) => c.label),
        rows: rows.length > 0 ? rows : [columns.map(() => null)],
      };
    }

    const columns = plainFields.map((f) => fieldColumn(tableName, f));
    const projection: Document = {};
    for (const column of columns) projection[column.key] = 1;

    const sort = attributes.orderby !== undefined ? compileOrderBy(attributes.orderby) : [];
    const [from, to] = attributes.limitby ?? [0, 0];
    const documents = await collection
      .find(filter ?? {}, {
        projection,
        ...(sort.length > 0 ? { sort } : {}),
        ...(from > 0 ? { skip: from } : {}),
        ...(to > from ? { limit: to - from } : {}),
      })
      .toArray();
    return {
      columns: columns.map((c) => c.label),
      rows: documents.map((doc) => mapDocument(doc, columns)),
    };
  }

  async insert(table: string, values: InsertValues, options: WriteOptions = {}): Promise<RecordReference | null> {
    const definition = this.schema.table(table);
    const document: Document = {};
    for (const [name, value] of Object.entries(values)) {
      if (name === 'id' || name === ID_KEY) continue;
      document[name] = represent(value, definition.descriptor(name).type);
    }

    const result = await this.writer(table, options.safe).insertOne(document);
    if (!result.acknowledged) return null;
    return { table, id: toAlgebraInt(toNativeId(result.insertedId)) };
  }

  async bulkInsert(table: string, items: readonly InsertValues[]): Promise<Array<RecordReference | null>> {
    const references: Array<RecordReference | null> = [];
    for (const item of items) {
      references.push(await this.insert(table, item));
    }
    return references;
  }

  /**
   * Sets fields on every matching document. Plain values become a `$set`;
   * when a value is an expression the documents are recomputed through a
   * `$project` pipeline and replaced one by one.
   */
  async update(table: string, query: Node, values: UpdateValues, options: WriteOptions = {}): Promise<number> {
    const filter = this.requireFilter('update', query);
    const definition = this.schema.table(table);
    const safe = options.safe ?? this.safe;
    const collection = this.writer(table, safe);

    const assignments = Object.entries(values)
      .filter(([name]) => name !== 'id' && name !== ID_KEY)
      .map(([name, value]) => ({ field: definition.descriptor(name), node: toNode(value) }));

    const matching = await this.wrapUpdate(() => collection.countDocuments(filter));
    if (matching === 0) return 0;

    if (assignments.some(({ node }) => node.kind !== 'literal')) {
      const projection: Document = {};
      for (const field of definition.fields) {
        if (field.type !== 'id') projection[field.name] = 1;
      }
      for (const { field, node } of assignments) {
        const expanded = compile(node, PIPELINE_CONTEXT, field.type);
        projection[field.name] = node.kind === 'literal' ? this.wrapLiteral(expanded, field) : expanded;
      }

      // ids are fixed up front so a replaced document is never recomputed twice
      return this.wrapUpdate(async () => {
        const snapshot = await collection.find(filter, { projection: { [ID_KEY]: 1 } }).toArray();
        const ids: unknown[] = snapshot.map((doc) => doc[ID_KEY]);
        let replaced = 0;
        for (let start = 0; start < ids.length; start += this.updateBatchSize) {
          const batch = ids.slice(start, start + this.updateBatchSize);
          const pipeline: Document[] = [
            { $match: { $and: [filter, { [ID_KEY]: { $in: batch } }] } },
            { $project: projection },
          ];
          const documents = await collection.aggregate(pipeline).toArray();
          for (const doc of documents) {
            const result = await collection.replaceOne({ [ID_KEY]: doc[ID_KEY] }, doc);
            if (result.acknowledged) replaced += result.matchedCount;
          }
        }
        return safe ? replaced : matching;
      });
    }

    const $set: Document = {};
    for (const { field, node } of assignments) {
      $set[field.name] = compile(node, FILTER_CONTEXT, field.type);
    }
    return this.wrapUpdate(async () => {
      const result = await collection.updateMany(filter, { $set });
      return safe && result.acknowledged ? result.matchedCount : matching;
    });
  }

  /**
   * Deletes matching documents, then applies each inbound reference's
   * ondelete policy. The follow-up writes are not transactional with the
   * primary delete.
   */
  async delete(table: string, query: Node, options: WriteOptions = {}): Promise<number> {
    const filter = this.requireFilter('delete', query);
    const collection = this.writer(table, options.safe);

    const snapshot = await collection.find(filter, { projection: { [ID_KEY]: 1 } }).toArray();
    const deleted = snapshot.map((doc) => toNativeId(doc[ID_KEY]));

    const result = await collection.deleteMany(filter);
    const amount = result.acknowledged ? result.deletedCount : deleted.length;

    if (amount > 0 && deleted.length > 0) {
      await this.applyOnDelete(table, deleted, options.safe);
    }
    return amount;
  }

  private async applyOnDelete(table: string, deleted: ObjectId[], safe: boolean | undefined): Promise<void> {
    const { single, list } = this.schema.referencedBy(table);

    // a list that held only the deleted record goes with it; otherwise the id is pulled
    for (const field of list.filter((f) => f.ondelete === 'CASCADE')) {
      const referencing = this.writer(field.table, safe);
      for (const id of deleted) {
        await referencing.deleteMany({ [field.name]: [id] });
      }
      await this.pullFromList(field, deleted, safe);
    }
    for (const field of list.filter((f) => f.ondelete === 'SET NULL')) {
      await this.pullFromList(field, deleted, safe);
    }
    for (const field of single.filter((f) => f.ondelete === 'CASCADE')) {
      await this.delete(field.table, q.belongs(this.fieldRef(field), deleted), { safe });
    }
    for (const field of single.filter((f) => f.ondelete === 'SET NULL')) {
      await this.update(field.table, q.belongs(this.fieldRef(field), deleted), { [field.name]: null }, { safe });
    }
  }

  private async pullFromList(field: BoundField, deleted: ObjectId[], safe: boolean | undefined): Promise<void> {
    const referencing = this.writer(field.table, safe);
    for (const id of deleted) {
      const pull: Document = { [field.name]: id };
      await referencing.updateMany({ [field.name]: id }, { $pull: pull });
    }
  }

  private fieldRef(field: BoundField): FieldRef {
    return this.schema.table(field.table).field(field.name);
  }

  /** Literal values in a `$project` stage must not be read as field paths or operators. */
  private wrapLiteral(expanded: Fragment, field: BoundField): Fragment {
    if (this.supportsLiteral()) return { $literal: expanded };
    switch (field.type) {
      case 'string':
      case 'text':
      case 'password':
        return { $concat: [expanded] };
      case 'integer':
      case 'bigint':
      case 'float':
      case 'double':
      case 'date':
      case 'time':
      case 'datetime':
        return { $add: [expanded] };
      case 'boolean':
        return { $and: [expanded] };
      default:
        throw new UnsupportedFeatureError(
          'legacy expression updates',
          `Updating with expressions is not supported for field type '${field.type}' in MongoDB versions before 2.6`,
        );
    }
  }

  private supportsLiteral(): boolean {
    if (this.serverVersion === null) return true;
    const [major, minor] = this.serverVersion;
    const [minMajor, minMinor] = LITERAL_MIN_VERSION;
    return major > minMajor || (major === minMajor && minor >= minMinor);
  }

  private async wrapUpdate<T>(run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      throw new UpdateError(`Uncaught exception when updating rows: ${String(err)}`, err);
    }
  }

  private requireFilter(operation: string, query: Node): Document {
    if (query.kind !== 'query') {
      throw new UnsupportedFeatureError(
        `${operation} without a query`,
        `${operation} requires a query filter, got ${query.kind} ${describeNode(query)}`,
      );
    }
    return compileFilter(query) ?? {};
  }

  private requireTable(query: Node): string {
    const table = tableOf(query);
    if (table === undefined) {
      throw new MalformedInputError(`Cannot resolve a table from ${describeNode(query)}`);
    }
    return table;
  }

  private reader(name: string): Collection {
    return this.db.collection(name);
  }

  /** Writes always carry the resolved concern; an injected `Db` may default to something else. */
  private writer(name: string, safe?: boolean): Collection {
    return this.db.collection(name, { writeConcern: { w: (safe ?? this.safe) ? 1 : 0 } });
  }

  private warnUnsupportedAttributes(attributes: SelectAttributes): void {
    if (attributes.forUpdate !== undefined) {
      this.onWarning('MongoDB does not support forUpdate');
    }
    for (const [key, value] of Object.entries(attributes)) {
      if (HANDLED_ATTRIBUTES.has(key) || value === undefined || value === null) continue;
      this.onWarning(`select attribute not implemented: ${key}`);
    }
  }
}

function firstTable(fields: ReadonlyArray<FieldRef | Expression>): string | undefined {
  const [first] = fields;
  if (first === undefined) return undefined;
  return first.kind === 'field' ? first.table : tableOf(first);
}
