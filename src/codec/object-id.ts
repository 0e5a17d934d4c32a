import { randomInt } from 'node:crypto';
import { ObjectId } from 'mongodb';
import { IdentifierTypeError, InvalidIdentifierError } from '../errors.js';

export const OBJECT_ID_HEX_LENGTH = 24;

const RANDOM_SENTINELS = new Set(['<random>', 'random']);
const HEX_DIGITS = '0123456789abcdef';
const DECIMAL = /^[0-9]+$/;
const ALPHANUMERIC = /^[a-zA-Z0-9]+$/;

export function randomHexDigits(count: number): string {
  let out = '';
  for (let i = 0; i < count; i++) {
    out += HEX_DIGITS.charAt(randomInt(HEX_DIGITS.length));
  }
  return out;
}

function parseIdentifierString(input: string): bigint {
  const unprefixed = input.startsWith('0x') ? input.slice(2) : input;
  // 24 characters is a raw ObjectId hex string even when it happens to be all digits
  const rawHex = unprefixed.length === OBJECT_ID_HEX_LENGTH;

  if (DECIMAL.test(input) && !rawHex) {
    return BigInt(input);
  }
  if (RANDOM_SENTINELS.has(input)) {
    return BigInt(`0x${randomHexDigits(OBJECT_ID_HEX_LENGTH)}`);
  }
  if (ALPHANUMERIC.test(input)) {
    try {
      return BigInt(`0x${unprefixed}`);
    } catch (err) {
      throw new InvalidIdentifierError(input, `Invalid identifier string "${input}": ${String(err)}`, err);
    }
  }
  throw new InvalidIdentifierError(
    input,
    `Invalid identifier format "${input}": requires an integer or base 16 value`,
  );
}

/**
 * Converts an algebra-side identifier into a native ObjectId.
 *
 * Integers are written as 24 hex digits (left padded, high digits dropped
 * beyond 96 bits). Strings are decimal, hexadecimal, or the `<random>`
 * sentinel. Empty input maps to the zero identifier.
 */
export function toNativeId(input: unknown): ObjectId {
  if (input instanceof ObjectId) return input;

  let value: bigint;
  if (input === undefined || input === null || input === '') {
    value = 0n;
  } else if (typeof input === 'string') {
    value = parseIdentifierString(input);
  } else if (typeof input === 'bigint') {
    value = input;
  } else if (typeof input === 'number') {
    if (!Number.isSafeInteger(input)) {
      throw new InvalidIdentifierError(input, `Identifier must be an integer, got ${input}`);
    }
    value = BigInt(input);
  } else {
    throw new IdentifierTypeError(describeType(input));
  }

  if (value < 0n) {
    throw new InvalidIdentifierError(value, `Identifier must be non-negative, got ${value}`);
  }
  const hex = value.toString(16).padStart(OBJECT_ID_HEX_LENGTH, '0').slice(-OBJECT_ID_HEX_LENGTH);
  return ObjectId.createFromHexString(hex);
}

/** Reads an ObjectId back as the unbounded integer the algebra works with. */
export function toAlgebraInt(id: ObjectId): bigint {
  return BigInt(`0x${id.toHexString()}`);
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
