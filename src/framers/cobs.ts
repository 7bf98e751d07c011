// src/framers/cobs.ts

import { COBS_DELIMITER, COBS_MAX_CODE } from '../constants/constants.js';
import { CobsDecodeError } from '../errors.js';

/**
 * Consistent Overhead Byte Stuffing.
 *
 * Each run of non-zero bytes is prefixed with `run length + 1`; a zero byte
 * closes the run. A run of 254 bytes is written with code 0xff and the next
 * run starts without an implied zero. The result ends with a single 0x00.
 *
 * @example
 * encodeCobs(Uint8Array.of(0x11, 0x00, 0x22)) // 02 11 02 22 00
 */
export function encodeCobs(data: Uint8Array): Uint8Array {
  // Worst case: one code byte per 254 data bytes, one leading code, one delimiter
  const out = new Uint8Array(data.length + Math.ceil(data.length / 254) + 2);
  let codeIndex = 0;
  let writeIndex = 1;
  let code = 1;

  for (let i = 0; i < data.length; i++) {
    const byte = data[i];
    if (byte === 0) {
      out[codeIndex] = code;
      codeIndex = writeIndex++;
      code = 1;
      continue;
    }
    out[writeIndex++] = byte;
    code++;
    if (code === COBS_MAX_CODE) {
      out[codeIndex] = code;
      codeIndex = writeIndex++;
      code = 1;
    }
  }

  out[codeIndex] = code;
  out[writeIndex++] = COBS_DELIMITER;
  return out.slice(0, writeIndex);
}

/**
 * Reverses {@link encodeCobs}. The input must be exactly one stuffed packet
 * including its trailing delimiter.
 *
 * @throws CobsDecodeError on empty input, a missing delimiter, a zero inside
 * the packet or a code byte that runs past the end
 */
export function decodeCobs(framed: Uint8Array): Uint8Array {
  if (framed.length === 0) {
    throw new CobsDecodeError('empty input', framed);
  }
  const end = framed.length - 1;
  if (framed[end] !== COBS_DELIMITER) {
    throw new CobsDecodeError('missing trailing delimiter', framed);
  }

  const out = new Uint8Array(end);
  let readIndex = 0;
  let writeIndex = 0;

  while (readIndex < end) {
    const code = framed[readIndex];
    if (code === COBS_DELIMITER) {
      throw new CobsDecodeError(`unexpected zero at offset ${readIndex}`, framed);
    }
    const runEnd = readIndex + code;
    if (runEnd > end) {
      throw new CobsDecodeError(
        `code 0x${code.toString(16)} at offset ${readIndex} overruns packet`,
        framed
      );
    }
    readIndex++;
    while (readIndex < runEnd) {
      const byte = framed[readIndex++];
      if (byte === COBS_DELIMITER) {
        throw new CobsDecodeError(`unexpected zero at offset ${readIndex - 1}`, framed);
      }
      out[writeIndex++] = byte;
    }
    if (code < COBS_MAX_CODE && readIndex < end) {
      out[writeIndex++] = 0;
    }
  }

  return out.slice(0, writeIndex);
}
