import { Schema, defineTable } from '../../../src/schema/table.js';

export const person = defineTable('person', [
  { name: 'name', type: 'string' },
  { name: 'age', type: 'integer' },
  { name: 'bio', type: 'text' },
  { name: 'score', type: 'double' },
  { name: 'active', type: 'boolean' },
  { name: 'photo', type: 'blob' },
  { name: 'born', type: 'date' },
  { name: 'wakes', type: 'time' },
  { name: 'seen', type: 'datetime' },
  { name: 'tags', type: 'list:string' },
  { name: 'lucky', type: 'list:integer' },
  { name: 'settings', type: 'json' },
]);

export const pet = defineTable('pet', [
  { name: 'name', type: 'string' },
  { name: 'owner', type: 'reference person', ondelete: 'CASCADE' },
]);

export const club = defineTable('club', [
  { name: 'title', type: 'string' },
  { name: 'members', type: 'list:reference person', ondelete: 'CASCADE' },
]);

export const sponsor = defineTable('sponsor', [
  { name: 'title', type: 'string' },
  { name: 'patron', type: 'reference person', ondelete: 'SET NULL' },
]);

export const newsletter = defineTable('newsletter', [
  { name: 'title', type: 'string' },
  { name: 'readers', type: 'list:reference person', ondelete: 'SET NULL' },
]);

export const schema = new Schema([person, pet, club, sponsor, newsletter]);
