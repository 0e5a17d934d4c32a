import { Binary, ObjectId } from 'mongodb';
import type { FieldType, Scalar } from '../algebra/types.js';
import { isListReferenceType, isReferenceType, isScalarList } from '../algebra/types.js';
import type { BsonValue, Fragment } from '../query/types.js';
import { decodeBlob, encodeBlob } from './blob.js';
import { toAlgebraInt, toNativeId } from './object-id.js';

// The store has no date-only or time-only type; both become full datetimes.
const TIME_REFERENCE_DATE = { year: 2000, month: 0, day: 1 };
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_OF_DAY = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?$/;
const TRUE_STRINGS = new Set(['true', 't', '1', 'on', 'yes']);

function toBson(value: Scalar): BsonValue {
  return value instanceof ArrayBuffer ? new Uint8Array(value) : value;
}

function representDate(value: Scalar): BsonValue {
  if (value instanceof Date) {
    return new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), value.getUTCDate()));
  }
  if (typeof value === 'string') {
    const m = ISO_DATE.exec(value);
    if (m !== null) return new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
  }
  return toBson(value);
}

function representTime(value: Scalar): BsonValue {
  const { year, month, day } = TIME_REFERENCE_DATE;
  if (value instanceof Date) {
    return new Date(
      Date.UTC(year, month, day, value.getUTCHours(), value.getUTCMinutes(), value.getUTCSeconds(), value.getUTCMilliseconds()),
    );
  }
  if (typeof value === 'string') {
    const m = TIME_OF_DAY.exec(value);
    if (m !== null) {
      const ms = m[4] === undefined ? 0 : Number(m[4].padEnd(3, '0'));
      return new Date(Date.UTC(year, month, day, Number(m[1]), Number(m[2]), Number(m[3] ?? 0), ms));
    }
  }
  return toBson(value);
}

function representInteger(value: Scalar): BsonValue {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value;
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return representInteger(BigInt(value.trim()));
  }
  return toBson(value);
}

function representFloat(value: Scalar): BsonValue {
  if (typeof value === 'bigint') return Number(value);
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) return Number(value);
  return toBson(value);
}

function representText(value: Scalar): BsonValue {
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') return String(value);
  if (value instanceof Date) return value.toISOString();
  return toBson(value);
}

function representBoolean(value: Scalar): BsonValue {
  if (typeof value === 'string') return TRUE_STRINGS.has(value.trim().toLowerCase());
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'bigint') return value !== 0n;
  return toBson(value);
}

function representDatetime(value: Scalar): BsonValue {
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? value : parsed;
  }
  return toBson(value);
}

/** Generic coercion for the declared types that need no store-specific handling. */
function representBase(value: Scalar, type: FieldType): BsonValue {
  switch (type) {
    case 'boolean':
      return representBoolean(value);
    case 'integer':
    case 'bigint':
      return representInteger(value);
    case 'float':
    case 'double':
      return representFloat(value);
    case 'string':
    case 'text':
    case 'password':
    case 'upload':
    case 'json':
      return representText(value);
    case 'datetime':
      return representDatetime(value);
    default:
      return toBson(value);
  }
}

function representList(value: Scalar | readonly Scalar[], element: (v: Scalar) => BsonValue): Fragment {
  const items = isScalarList(value) ? value : [value];
  return items.map(element);
}

/**
 * Converts an algebra value into the store's representation for the
 * declared field type. Unknown types pass the value through.
 */
export function represent(value: Scalar | readonly Scalar[], type: FieldType | undefined): Fragment {
  if (value === null || value instanceof ObjectId) return value;
  if (isScalarList(value) && type !== undefined && !type.startsWith('list:')) {
    return value.map((v) => representScalar(v, type));
  }
  if (type === 'list:string') return representList(value, representText);
  if (type === 'list:integer') return representList(value, representInteger);
  if (type !== undefined && isListReferenceType(type)) {
    return representList(value, (v) => toNativeId(v));
  }
  if (isScalarList(value)) return value.map(toBson);
  return representScalar(value, type);
}

function representScalar(value: Scalar, type: FieldType | undefined): BsonValue {
  if (value === null || type === undefined) return toBson(value);
  if (value instanceof ObjectId) return value;
  if (type === 'date') return representDate(value);
  if (type === 'time') return representTime(value);
  if (type === 'blob') return encodeBlob(value);
  if (type === 'id' || isReferenceType(type)) return toNativeId(value);
  return representBase(value, type);
}

function parseScalar(value: unknown, type: FieldType): unknown {
  if (value instanceof ObjectId && (type === 'id' || isReferenceType(type) || isListReferenceType(type))) {
    return toAlgebraInt(value);
  }
  if (type === 'blob') return decodeBlob(value);
  if (value instanceof Date && type === 'date') return value.toISOString().slice(0, 10);
  if (value instanceof Date && type === 'time') {
    const time = value.toISOString().slice(11, 23);
    return time.endsWith('.000') ? time.slice(0, 8) : time;
  }
  return value;
}

/** Reads a stored value back into its algebra form. */
export function parse(value: unknown, type: FieldType | undefined): unknown {
  if (value === undefined) return null;
  if (type === undefined) return value instanceof Binary ? decodeBlob(value) : value;
  if (Array.isArray(value)) {
    return value.map((v: unknown) => parseScalar(v, type));
  }
  return parseScalar(value, type);
}
