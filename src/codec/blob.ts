import { Binary } from 'mongodb';
import type { Scalar } from '../algebra/types.js';

/** Raw byte payloads. */
export const BLOB_BYTES = Binary.SUBTYPE_USER_DEFINED;
/** Text that has no UTF-8 form; stored as UTF-16 code units. */
export const BLOB_NON_UTF8_TEXT = Binary.SUBTYPE_USER_DEFINED + 1;
/** Raw bytes handed in as an ArrayBuffer. */
export const BLOB_ARRAY_BUFFER = Binary.SUBTYPE_USER_DEFINED + 2;

function encodesAsUtf8(value: string): boolean {
  return Buffer.from(value, 'utf8').toString('utf8') === value;
}

function bytesOf(value: Binary): Uint8Array {
  return Uint8Array.from(value.read(0, value.length()));
}

/**
 * Encodes a blob value for storage. The subtype tag records whether the
 * caller handed in bytes or text so that decodeBlob() can hand back the same kind.
 */
export function encodeBlob(value: Scalar | undefined): string | Binary | null {
  if (value === undefined) return null;
  if (value === null || value instanceof Binary) return value;

  if (value instanceof Uint8Array) {
    return new Binary(value, BLOB_BYTES);
  }
  if (value instanceof ArrayBuffer) {
    return new Binary(new Uint8Array(value), BLOB_ARRAY_BUFFER);
  }
  if (typeof value !== 'string') {
    return new Binary(Buffer.from(String(value), 'utf8'));
  }
  if (encodesAsUtf8(value)) {
    return value;
  }
  // lone surrogates: keep the UTF-16 code units as they are
  return new Binary(Buffer.from(value, 'utf16le'), BLOB_NON_UTF8_TEXT);
}

export function decodeBlob(value: unknown): unknown {
  if (!(value instanceof Binary)) return value;
  if (value.sub_type === BLOB_BYTES) {
    return bytesOf(value);
  }
  if (value.sub_type === BLOB_ARRAY_BUFFER) {
    const bytes = bytesOf(value);
    const buffer = new ArrayBuffer(bytes.length);
    new Uint8Array(buffer).set(bytes);
    return buffer;
  }
  if (value.sub_type === BLOB_NON_UTF8_TEXT) {
    return Buffer.from(bytesOf(value)).toString('utf16le');
  }
  return value;
}
