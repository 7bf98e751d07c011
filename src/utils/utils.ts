// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';

/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Converts a Uint8Array to a hex string (lookup table).
 * @param uint8arr - The Uint8Array to convert.
 * @param separator - Placed between bytes.
 */
export function toHex(uint8arr: Uint8Array, separator: string = ''): string {
  const parts: string[] = [];
  for (let i = 0; i < uint8arr.length; i++) {
    const b = uint8arr[i];
    parts.push(HEX_TABLE.charAt((b >> 4) & 0xf) + HEX_TABLE.charAt(b & 0xf));
  }
  return parts.join(separator);
}

/**
 * Converts a non-negative integer to a Uint8Array in Little Endian format.
 * @param value - The number to convert.
 * @param byteLength - The length of the output Uint8Array.
 */
export function toBytesLE(value: number, byteLength: number = 2): Uint8Array {
  const arr: Uint8Array = new Uint8Array(byteLength);
  let remaining = value;
  for (let i: number = 0; i < byteLength; i++) {
    arr[i] = remaining & 0xff;
    remaining = Math.floor(remaining / 256);
  }
  return arr;
}

/**
 * Converts a Little Endian byte pair to a number.
 * @param lo - The low byte.
 * @param hi - The high byte.
 */
export function fromBytesLE(lo: number, hi: number): number {
  return (hi << 8) | lo;
}

/**
 * Reads an unsigned Little Endian integer of up to six bytes.
 * @param bytes - Source buffer.
 * @param offset - First byte to read.
 * @param byteLength - Number of bytes, defaults to the rest of the buffer.
 */
export function readUintLE(
  bytes: Uint8Array,
  offset: number = 0,
  byteLength: number = bytes.length - offset
): number {
  let value = 0;
  for (let i = byteLength - 1; i >= 0; i--) {
    value = value * 256 + bytes[offset + i];
  }
  return value;
}

/**
 * Reads a two's-complement Little Endian integer of up to six bytes.
 */
export function readIntLE(
  bytes: Uint8Array,
  offset: number = 0,
  byteLength: number = bytes.length - offset
): number {
  const unsigned = readUintLE(bytes, offset, byteLength);
  const limit = 2 ** (8 * byteLength);
  return unsigned >= limit / 2 ? unsigned - limit : unsigned;
}

/**
 * Checks that a value is an integer inside [min, max].
 * @throws RangeError
 */
export function assertIntegerInRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new RangeError(`${name} must be ${min}-${max}, got ${value}`);
  }
}
