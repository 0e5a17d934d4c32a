import type { FieldRef, FieldType } from '../algebra/types.js';
import { isListReferenceType, isReferenceType, referencedTable } from '../algebra/types.js';
import { MalformedInputError } from '../errors.js';

export type OnDeletePolicy = 'CASCADE' | 'SET NULL' | 'NO ACTION';

export interface FieldDescriptor {
  readonly name: string;
  readonly type: FieldType;
  /** Only meaningful on reference fields. Defaults to CASCADE there. */
  readonly ondelete?: OnDeletePolicy;
}

/** A field descriptor together with the table that declares it. */
export interface BoundField extends FieldDescriptor {
  readonly table: string;
  readonly ondelete: OnDeletePolicy;
}

const NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]{0,127}$/;

export class Table {
  private readonly byName: ReadonlyMap<string, BoundField>;

  constructor(
    readonly name: string,
    readonly fields: readonly BoundField[],
  ) {
    this.byName = new Map(fields.map((f) => [f.name, f]));
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  descriptor(name: string): BoundField {
    const found = this.byName.get(name);
    if (found === undefined) {
      throw new MalformedInputError(`Table "${this.name}" has no field "${name}"`);
    }
    return found;
  }

  field(name: string): FieldRef {
    const { type } = this.descriptor(name);
    return { kind: 'field', table: this.name, name, type };
  }

  /** Every field of the table, identifier first. */
  all(): FieldRef[] {
    return this.fields.map((f) => this.field(f.name));
  }
}

/**
 * Validates field definitions and returns the table.
 * An `id` field of type `id` is always present as the first field.
 */
export function defineTable(name: string, fields: readonly FieldDescriptor[]): Table {
  if (!NAME_PATTERN.test(name)) {
    throw new MalformedInputError(`defineTable: table name "${name}" must match ${NAME_PATTERN}`);
  }
  const seen = new Set<string>(['id']);
  const bound: BoundField[] = [{ table: name, name: 'id', type: 'id', ondelete: 'NO ACTION' }];
  for (const field of fields) {
    if (!NAME_PATTERN.test(field.name)) {
      throw new MalformedInputError(`defineTable: field name "${field.name}" must match ${NAME_PATTERN}`);
    }
    if (seen.has(field.name)) {
      throw new MalformedInputError(`defineTable: duplicate or reserved field "${name}.${field.name}"`);
    }
    seen.add(field.name);
    const isRef = isReferenceType(field.type) || isListReferenceType(field.type);
    bound.push({
      table: name,
      name: field.name,
      type: field.type,
      ondelete: field.ondelete ?? (isRef ? 'CASCADE' : 'NO ACTION'),
    });
  }
  return new Table(name, bound);
}

export interface InboundReferences {
  /** `reference <table>` fields pointing at the table. */
  single: BoundField[];
  /** `list:reference <table>` fields pointing at the table. */
  list: BoundField[];
}

export class Schema {
  private readonly tables: ReadonlyMap<string, Table>;

  constructor(tables: readonly Table[]) {
    const map = new Map<string, Table>();
    for (const table of tables) {
      if (map.has(table.name)) {
        throw new MalformedInputError(`Schema: table "${table.name}" is defined twice`);
      }
      map.set(table.name, table);
    }
    this.tables = map;
  }

  table(name: string): Table {
    const found = this.tables.get(name);
    if (found === undefined) {
      throw new MalformedInputError(`Schema has no table "${name}"`);
    }
    return found;
  }

  referencedBy(tableName: string): InboundReferences {
    const single: BoundField[] = [];
    const list: BoundField[] = [];
    for (const table of this.tables.values()) {
      for (const field of table.fields) {
        if (referencedTable(field.type) !== tableName) continue;
        if (isListReferenceType(field.type)) list.push(field);
        else single.push(field);
      }
    }
    return { single, list };
  }
}
