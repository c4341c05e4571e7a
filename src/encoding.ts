/**
 * Text encodings used on the wire.
 * Binary fields travel as URL-safe base64 without padding.
 */

import { ErrorCode, ValidationError } from './errors';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

// Base58 alphabet (Bitcoin-style)
const BASE58_ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';

const utf8Decoder = new TextDecoder('utf-8', { fatal: true });
const utf8Encoder = new TextEncoder();

/**
 * Encode bytes as unpadded URL-safe base64.
 */
export function toBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}

/**
 * Decode unpadded URL-safe base64.
 * Rejects foreign characters, padding and non-canonical trailing bits.
 */
export function fromBase64Url(text: string, field = 'value'): Uint8Array {
  if (!BASE64URL_PATTERN.test(text) || text.length % 4 === 1) {
    throw new ValidationError(`Malformed base64url in ${field}`, ErrorCode.ENCODING_ERROR, { field });
  }

  const decoded = Buffer.from(text, 'base64url');
  if (decoded.toString('base64url') !== text) {
    throw new ValidationError(`Non-canonical base64url in ${field}`, ErrorCode.ENCODING_ERROR, { field });
  }

  return new Uint8Array(decoded);
}

/**
 * Decode a base64url field and check its byte length.
 */
export function decodeKeyField(
  text: string,
  field: string,
  expectedLength: number,
  code: ErrorCode = ErrorCode.INVALID_KEY_MATERIAL
): Uint8Array {
  const bytes = fromBase64Url(text, field);
  if (bytes.length !== expectedLength) {
    throw new ValidationError(`${field} must be ${expectedLength} bytes, got ${bytes.length}`, code, { field });
  }
  return bytes;
}

export function utf8Encode(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/**
 * Strict UTF-8 decode; invalid sequences are an encoding error.
 */
export function utf8Decode(bytes: Uint8Array): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch {
    throw new ValidationError('Plaintext is not valid UTF-8', ErrorCode.ENCODING_ERROR);
  }
}

/**
 * Concatenate byte arrays in order.
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/**
 * Encode bytes to a Base58 string.
 */
export function encodeBase58(bytes: Uint8Array): string {
  // Convert bytes to big integer
  let num = 0n;
  for (const byte of bytes) {
    num = num * 256n + BigInt(byte);
  }

  const result: string[] = [];
  while (num > 0n) {
    const remainder = Number(num % 58n);
    result.push(BASE58_ALPHABET.charAt(remainder));
    num = num / 58n;
  }

  // Leading zero bytes map to the first alphabet symbol
  for (const byte of bytes) {
    if (byte !== 0) {
      break;
    }
    result.push(BASE58_ALPHABET.charAt(0));
  }

  return result.reverse().join('');
}

/**
 * Parse JSON text into a plain object, or fail with an input format error.
 */
export function parseJsonObject(text: string, what: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ValidationError(`${what} is not valid JSON`, ErrorCode.INPUT_FORMAT_ERROR);
  }

  return asRecord(parsed, what);
}

/**
 * Narrow a parsed JSON value to a plain object.
 */
export function asRecord(value: unknown, what: string): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError(`${what} must be a JSON object`, ErrorCode.INPUT_FORMAT_ERROR);
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Read a required string property from a parsed wire object.
 */
export function requireString(obj: Record<string, unknown>, key: string, what: string): string {
  const value = obj[key];
  if (typeof value !== 'string') {
    throw new ValidationError(`${what} is missing string field '${key}'`, ErrorCode.INPUT_FORMAT_ERROR, {
      field: key,
    });
  }
  return value;
}

/**
 * Read a required integer property from a parsed wire object.
 */
export function requireInteger(obj: Record<string, unknown>, key: string, what: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError(`${what} is missing integer field '${key}'`, ErrorCode.INPUT_FORMAT_ERROR, {
      field: key,
    });
  }
  return value;
}
