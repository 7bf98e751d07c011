// src/messages/data-point-value.ts

import { DataPointEncodingError } from '../errors.js';
import type { DataPointEncoding, DecodedValue } from '../types/aquaclean-types.js';
import { readIntLE, readUintLE, toBytesLE } from '../utils/utils.js';

const MAX_INTEGER_BYTES = 6;
const COUNTER_SIZE = 4;
const SIGNED_SIZE = 4;
const TIMESTAMP_SIZE = 4;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8');

function requireIntegerBytes(encoding: DataPointEncoding, bytes: Uint8Array): void {
  if (bytes.length === 0 || bytes.length > MAX_INTEGER_BYTES) {
    throw new DataPointEncodingError(
      encoding,
      `expected 1-${MAX_INTEGER_BYTES} bytes, got ${bytes.length}`
    );
  }
}

function requireInteger(encoding: DataPointEncoding, value: DecodedValue, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new DataPointEncodingError(encoding, `expected an integer ${min}-${max}, got ${String(value)}`);
  }
  return value;
}

/**
 * Converts the value bytes of a data point to a JS value according to its encoding.
 * @throws DataPointEncodingError when the byte count does not fit the encoding
 */
export function decodeDataPointValue(encoding: DataPointEncoding, bytes: Uint8Array): DecodedValue {
  switch (encoding) {
    case 'Binary':
      return bytes.slice();
    case 'Boolean':
      if (bytes.length === 0) throw new DataPointEncodingError(encoding, 'no value bytes');
      return bytes[0] !== 0;
    case 'Enumerated':
    case 'Percent':
    case 'Counter':
      requireIntegerBytes(encoding, bytes);
      return readUintLE(bytes);
    case 'Signed':
      requireIntegerBytes(encoding, bytes);
      return readIntLE(bytes);
    case 'Text':
      return textDecoder.decode(bytes).replace(/\0+$/, '');
    case 'TimestampUtc':
      requireIntegerBytes(encoding, bytes);
      return new Date(readUintLE(bytes) * 1000);
  }
}

/**
 * Converts a JS value to the byte form written for a data point.
 * Enumerated values use the narrowest of 1, 2 or 4 bytes; counters, signed
 * values and timestamps always use 4.
 * @throws DataPointEncodingError when the value does not fit the encoding
 */
export function encodeDataPointValue(encoding: DataPointEncoding, value: DecodedValue): Uint8Array {
  switch (encoding) {
    case 'Binary':
      if (!(value instanceof Uint8Array) || value.length === 0) {
        throw new DataPointEncodingError(encoding, 'expected a non-empty Uint8Array');
      }
      return value.slice();
    case 'Boolean':
      if (typeof value !== 'boolean') {
        throw new DataPointEncodingError(encoding, `expected a boolean, got ${String(value)}`);
      }
      return Uint8Array.of(value ? 1 : 0);
    case 'Percent':
      return Uint8Array.of(requireInteger(encoding, value, 0, 100));
    case 'Enumerated': {
      const n = requireInteger(encoding, value, 0, 0xffffffff);
      return toBytesLE(n, n <= 0xff ? 1 : n <= 0xffff ? 2 : 4);
    }
    case 'Counter':
      return toBytesLE(requireInteger(encoding, value, 0, 0xffffffff), COUNTER_SIZE);
    case 'Signed': {
      const n = requireInteger(encoding, value, -0x80000000, 0x7fffffff);
      return toBytesLE(n < 0 ? n + 0x100000000 : n, SIGNED_SIZE);
    }
    case 'Text':
      if (typeof value !== 'string' || value.length === 0) {
        throw new DataPointEncodingError(encoding, 'expected a non-empty string');
      }
      return textEncoder.encode(value);
    case 'TimestampUtc': {
      if (!(value instanceof Date) || Number.isNaN(value.getTime())) {
        throw new DataPointEncodingError(encoding, 'expected a valid Date');
      }
      const seconds = Math.floor(value.getTime() / 1000);
      if (seconds < 0 || seconds > 0xffffffff) {
        throw new DataPointEncodingError(encoding, 'date outside the 32-bit epoch range');
      }
      return toBytesLE(seconds, TIMESTAMP_SIZE);
    }
  }
}
