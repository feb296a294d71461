/**
 * Big-endian unsigned integer codec.
 *
 * Every integer on the wire (commitments, challenge, response) is a big-endian
 * unsigned byte string. Decoding is strict: empty input and values outside the
 * accepted range are rejected, never clamped.
 */

import { CpAuthValidationError } from './errors';

const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})+$/;

/** Number of bytes in the minimal big-endian encoding of a non-negative integer. */
export function byteLength(value: bigint): number {
  if (value < 0n) {
    throw new CpAuthValidationError('value must be non-negative');
  }
  if (value === 0n) {
    return 1;
  }
  return Math.ceil(value.toString(16).length / 2);
}

export function bytesToBigInt(bytes: Uint8Array): bigint {
  if (bytes.length === 0) {
    return 0n;
  }
  return BigInt('0x' + Buffer.from(bytes).toString('hex'));
}

/**
 * Encode a non-negative integer as big-endian bytes.
 * Without `length` the encoding is minimal, with zero encoded as a single 0x00 byte.
 */
export function bigIntToBytes(value: bigint, length?: number): Uint8Array {
  if (value < 0n) {
    throw new CpAuthValidationError('value must be non-negative');
  }
  let hex = value.toString(16);
  if (hex.length % 2 === 1) {
    hex = '0' + hex;
  }
  if (length !== undefined) {
    if (!Number.isInteger(length) || length < 1) {
      throw new CpAuthValidationError('length must be a positive integer', 'length');
    }
    if (hex.length > length * 2) {
      throw new CpAuthValidationError(`value does not fit in ${length} bytes`, 'length');
    }
    hex = hex.padStart(length * 2, '0');
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

/**
 * Decode a big-endian integer and require it to lie in [0, bound).
 * Leading zero bytes are accepted.
 */
export function decodeBoundedInteger(bytes: Uint8Array, bound: bigint, field: string): bigint {
  if (bytes.length === 0) {
    throw new CpAuthValidationError(`${field} must not be empty`, field);
  }
  let offset = 0;
  while (offset < bytes.length - 1 && bytes[offset] === 0) {
    offset++;
  }
  if (bytes.length - offset > byteLength(bound)) {
    throw new CpAuthValidationError(`${field} is out of range`, field);
  }
  const value = bytesToBigInt(bytes.subarray(offset));
  if (value >= bound) {
    throw new CpAuthValidationError(`${field} is out of range`, field);
  }
  return value;
}

export function hexToBytes(hex: string, field = 'value'): Uint8Array {
  if (typeof hex !== 'string' || !HEX_PATTERN.test(hex)) {
    throw new CpAuthValidationError(`${field} must be a non-empty, even-length hex string`, field);
  }
  return new Uint8Array(Buffer.from(hex, 'hex'));
}

export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex');
}

/** Minimal big-endian hex encoding of a non-negative integer. */
export function bigIntToHex(value: bigint): string {
  return bytesToHex(bigIntToBytes(value));
}

/** Parse a hex string field and require the integer to lie in [0, bound). */
export function hexToBoundedInteger(hex: string, bound: bigint, field: string): bigint {
  return decodeBoundedInteger(hexToBytes(hex, field), bound, field);
}
