import { Binary, ObjectId } from 'mongodb';

type StoredDocument = Record<string, unknown>;

interface WriteConcernOptions {
  writeConcern?: { w?: number | string };
}

interface FindOptions {
  projection?: Record<string, unknown>;
  sort?: Array<[string, 1 | -1]>;
  skip?: number;
  limit?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function sameValue(a: unknown, b: unknown): boolean {
  if (a instanceof ObjectId && b instanceof ObjectId) return a.equals(b);
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (a instanceof Binary && b instanceof Binary) return a.toString('hex') === b.toString('hex');
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => sameValue(item, b[i]));
  }
  if ((a === undefined || a === null) && (b === undefined || b === null)) return true;
  return a === b;
}

function compareValues(a: unknown, b: unknown): number {
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (a instanceof ObjectId && b instanceof ObjectId) return a.toHexString().localeCompare(b.toHexString());
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (a === undefined || a === null) return b === undefined || b === null ? 0 : -1;
  if (b === undefined || b === null) return 1;
  return String(a).localeCompare(String(b));
}

/** Equality the way a query matches: array fields match any element or the whole array. */
function valueMatches(stored: unknown, expected: unknown): boolean {
  if (sameValue(stored, expected)) return true;
  return Array.isArray(stored) && stored.some((item) => sameValue(item, expected));
}

function candidates(stored: unknown): unknown[] {
  return Array.isArray(stored) ? stored : [stored];
}

function operatorMatches(stored: unknown, op: string, operand: unknown): boolean {
  switch (op) {
    case '$ne':
      return !valueMatches(stored, operand);
    case '$in':
      return Array.isArray(operand) && operand.some((item) => valueMatches(stored, item));
    case '$lt':
      return candidates(stored).some((v) => v !== undefined && v !== null && compareValues(v, operand) < 0);
    case '$lte':
      return candidates(stored).some((v) => v !== undefined && v !== null && compareValues(v, operand) <= 0);
    case '$gt':
      return candidates(stored).some((v) => v !== undefined && v !== null && compareValues(v, operand) > 0);
    case '$gte':
      return candidates(stored).some((v) => v !== undefined && v !== null && compareValues(v, operand) >= 0);
    case '$not':
      return !fieldMatches(stored, operand);
    default:
      throw new Error(`FakeDb does not understand ${op}`);
  }
}

function regexMatches(stored: unknown, spec: Record<string, unknown>): boolean {
  const source = spec['$regex'];
  const options = spec['$options'];
  if (typeof source !== 'string') return false;
  const regex = new RegExp(source, typeof options === 'string' ? options : '');
  return candidates(stored).some((v) => typeof v === 'string' && regex.test(v));
}

function fieldMatches(stored: unknown, condition: unknown): boolean {
  if (!isRecord(condition)) return valueMatches(stored, condition);
  const keys = Object.keys(condition);
  if (keys.length === 0 || !keys.every((k) => k.startsWith('$'))) return valueMatches(stored, condition);
  if ('$regex' in condition) return regexMatches(stored, condition);
  return keys.every((k) => operatorMatches(stored, k, condition[k]));
}

export function matches(document: StoredDocument, filter: Record<string, unknown>): boolean {
  return Object.entries(filter).every(([key, condition]) => {
    if (key === '$and') return Array.isArray(condition) && condition.every((c) => isRecord(c) && matches(document, c));
    if (key === '$or') return Array.isArray(condition) && condition.some((c) => isRecord(c) && matches(document, c));
    if (key.startsWith('$')) throw new Error(`FakeDb does not understand ${key}`);
    return fieldMatches(document[key], condition);
  });
}

function evaluate(document: StoredDocument, expression: unknown): unknown {
  if (typeof expression === 'string' && expression.startsWith('$')) return document[expression.slice(1)] ?? null;
  if (!isRecord(expression)) return expression;
  const [op] = Object.keys(expression);
  const args = expression[op ?? ''];
  if (op === '$literal') return args;
  const values = (Array.isArray(args) ? args : [args]).map((a) => evaluate(document, a));
  const numbers = values.map(Number);
  switch (op) {
    case '$add':
      return numbers.reduce((a, b) => a + b, 0);
    case '$subtract':
      return (numbers[0] ?? 0) - (numbers[1] ?? 0);
    case '$multiply':
      return numbers.reduce((a, b) => a * b, 1);
    case '$divide':
      return (numbers[0] ?? 0) / (numbers[1] ?? 1);
    case '$mod':
      return (numbers[0] ?? 0) % (numbers[1] ?? 1);
    case '$concat':
      return values.map(String).join('');
    case '$and':
      return values.every(Boolean);
    default:
      throw new Error(`FakeDb cannot evaluate ${String(op)}`);
  }
}

function accumulate(documents: StoredDocument[], accumulator: unknown): unknown {
  if (!isRecord(accumulator)) throw new Error('FakeDb expects accumulator documents');
  const [op] = Object.keys(accumulator);
  const argument = accumulator[op ?? ''];
  const values = documents
    .map((doc) => evaluate(doc, argument))
    .filter((v): v is number => typeof v === 'number');
  switch (op) {
    case '$sum':
      return values.reduce((a, b) => a + b, 0);
    case '$max':
      return values.length > 0 ? Math.max(...values) : null;
    case '$min':
      return values.length > 0 ? Math.min(...values) : null;
    case '$avg':
      return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : null;
    default:
      throw new Error(`FakeDb cannot accumulate ${String(op)}`);
  }
}

function project(document: StoredDocument, projection: Record<string, unknown>): StoredDocument {
  const out: StoredDocument = {};
  if (projection['_id'] !== 0) out['_id'] = document['_id'];
  for (const [key, spec] of Object.entries(projection)) {
    if (key === '_id' || spec === 0) continue;
    if (spec === 1) {
      if (key in document) out[key] = document[key];
    } else {
      out[key] = evaluate(document, spec);
    }
  }
  return out;
}

function toArrayCursor(documents: StoredDocument[]): { toArray(): Promise<StoredDocument[]> } {
  return { toArray: async () => documents };
}

export class FakeCollection {
  documents: StoredDocument[] = [];

  constructor(readonly name: string) {}

  view(acknowledged: boolean): FakeCollectionView {
    return new FakeCollectionView(this, acknowledged);
  }
}

/** A collection handle as returned by `db.collection()`, carrying its write concern. */
export class FakeCollectionView {
  constructor(
    private readonly store: FakeCollection,
    private readonly acknowledged: boolean,
  ) {}

  async countDocuments(filter: Record<string, unknown> = {}): Promise<number> {
    return this.store.documents.filter((d) => matches(d, filter)).length;
  }

  find(filter: Record<string, unknown> = {}, options: FindOptions = {}): { toArray(): Promise<StoredDocument[]> } {
    let found = this.store.documents.filter((d) => matches(d, filter));
    const { sort } = options;
    if (sort !== undefined) {
      found = [...found].sort((a, b) => {
        for (const [key, direction] of sort) {
          const order = compareValues(a[key], b[key]);
          if (order !== 0) return order * direction;
        }
        return 0;
      });
    }
    const skip = options.skip ?? 0;
    found = found.slice(skip, options.limit !== undefined ? skip + options.limit : undefined);
    const { projection } = options;
    return toArrayCursor(found.map((d) => (projection !== undefined ? project(d, projection) : { ...d })));
  }

  aggregate(pipeline: Array<Record<string, unknown>>): { toArray(): Promise<StoredDocument[]> } {
    let current = this.store.documents.map((d) => ({ ...d }));
    for (const stage of pipeline) {
      const match = stage['$match'];
      const group = stage['$group'];
      const projection = stage['$project'];
      if (isRecord(match)) {
        current = current.filter((d) => matches(d, match));
      } else if (isRecord(group)) {
        if (current.length === 0) continue;
        const row: StoredDocument = { _id: null };
        for (const [key, accumulator] of Object.entries(group)) {
          if (key !== '_id') row[key] = accumulate(current, accumulator);
        }
        current = [row];
      } else if (isRecord(projection)) {
        current = current.map((d) => project(d, projection));
      } else {
        throw new Error(`FakeDb cannot run stage ${Object.keys(stage).join(', ')}`);
      }
    }
    return toArrayCursor(current);
  }

  async insertOne(document: StoredDocument): Promise<{ acknowledged: boolean; insertedId: ObjectId }> {
    const existing = document['_id'];
    const insertedId = existing instanceof ObjectId ? existing : new ObjectId();
    this.store.documents.push({ ...document, _id: insertedId });
    return { acknowledged: this.acknowledged, insertedId };
  }

  async updateMany(
    filter: Record<string, unknown>,
    update: Record<string, unknown>,
  ): Promise<{ acknowledged: boolean; matchedCount: number; modifiedCount: number }> {
    const targets = this.store.documents.filter((d) => matches(d, filter));
    const set = update['$set'];
    const pull = update['$pull'];
    for (const doc of targets) {
      if (isRecord(set)) Object.assign(doc, set);
      if (isRecord(pull)) {
        for (const [key, value] of Object.entries(pull)) {
          const list = doc[key];
          if (Array.isArray(list)) doc[key] = list.filter((item) => !sameValue(item, value));
        }
      }
    }
    return { acknowledged: this.acknowledged, matchedCount: targets.length, modifiedCount: targets.length };
  }

  async replaceOne(
    filter: Record<string, unknown>,
    replacement: StoredDocument,
  ): Promise<{ acknowledged: boolean; matchedCount: number; modifiedCount: number }> {
    const index = this.store.documents.findIndex((d) => matches(d, filter));
    if (index < 0) return { acknowledged: this.acknowledged, matchedCount: 0, modifiedCount: 0 };
    this.store.documents[index] = { ...replacement };
    return { acknowledged: this.acknowledged, matchedCount: 1, modifiedCount: 1 };
  }

  async deleteMany(filter: Record<string, unknown> = {}): Promise<{ acknowledged: boolean; deletedCount: number }> {
    const before = this.store.documents.length;
    this.store.documents = this.store.documents.filter((d) => !matches(d, filter));
    return { acknowledged: this.acknowledged, deletedCount: before - this.store.documents.length };
  }

  async drop(): Promise<boolean> {
    this.store.documents = [];
    return true;
  }
}

/**
 * In-process stand-in for a MongoDB `Db`, covering the subset of the
 * driver the adapter uses.
 */
export class FakeDb {
  private readonly collections = new Map<string, FakeCollection>();

  constructor(private readonly version = '7.0.2') {}

  collection(name: string, options: WriteConcernOptions = {}): FakeCollectionView {
    return this.store(name).view(options.writeConcern?.w !== 0);
  }

  /** Raw documents of a collection, for assertions. */
  store(name: string): FakeCollection {
    let found = this.collections.get(name);
    if (found === undefined) {
      found = new FakeCollection(name);
      this.collections.set(name, found);
    }
    return found;
  }

  async command(command: Record<string, unknown>): Promise<Record<string, unknown>> {
    if (command['buildInfo'] === 1) return { version: this.version, ok: 1 };
    throw new Error(`FakeDb cannot run command ${Object.keys(command).join(', ')}`);
  }
}
