import { describe, it, expect } from 'vitest';
import { Schema, defineTable } from '../../src/schema/table.js';
import { MalformedInputError } from '../../src/errors.js';
import { person, pet, schema } from './helpers/fixtures.js';

describe('defineTable', () => {
  it('prepends the id field', () => {
    const table = defineTable('thing', [{ name: 'label', type: 'string' }]);
    expect(table.fields.map((f) => f.name)).toEqual(['id', 'label']);
    expect(table.descriptor('id').type).toBe('id');
  });

  it('defaults ondelete to CASCADE on references only', () => {
    const table = defineTable('thing', [
      { name: 'owner', type: 'reference person' },
      { name: 'label', type: 'string' },
    ]);
    expect(table.descriptor('owner').ondelete).toBe('CASCADE');
    expect(table.descriptor('label').ondelete).toBe('NO ACTION');
  });

  it('rejects invalid and duplicate names', () => {
    expect(() => defineTable('bad name', [])).toThrow(MalformedInputError);
    expect(() => defineTable('t', [{ name: '1x', type: 'string' }])).toThrow(MalformedInputError);
    expect(() =>
      defineTable('t', [
        { name: 'a', type: 'string' },
        { name: 'a', type: 'integer' },
      ]),
    ).toThrow('defineTable: duplicate or reserved field "t.a"');
    expect(() => defineTable('t', [{ name: 'id', type: 'integer' }])).toThrow(MalformedInputError);
  });
});

describe('Table', () => {
  it('returns field references', () => {
    expect(person.field('age')).toEqual({ kind: 'field', table: 'person', name: 'age', type: 'integer' });
  });

  it('reports unknown fields', () => {
    expect(person.has('nope')).toBe(false);
    expect(() => person.field('nope')).toThrow('Table "person" has no field "nope"');
  });

  it('lists every field, id first', () => {
    expect(pet.all().map((f) => f.name)).toEqual(['id', 'name', 'owner']);
  });
});

describe('Schema', () => {
  it('looks tables up by name', () => {
    expect(schema.table('pet')).toBe(pet);
    expect(() => schema.table('nope')).toThrow('Schema has no table "nope"');
  });

  it('rejects duplicate tables', () => {
    expect(() => new Schema([person, person])).toThrow(MalformedInputError);
  });

  it('finds inbound references split by kind', () => {
    const inbound = schema.referencedBy('person');
    expect(inbound.single.map((f) => `${f.table}.${f.name}`)).toEqual(['pet.owner', 'sponsor.patron']);
    expect(inbound.list.map((f) => `${f.table}.${f.name}`)).toEqual(['club.members', 'newsletter.readers']);
    expect(schema.referencedBy('pet')).toEqual({ single: [], list: [] });
  });
});
