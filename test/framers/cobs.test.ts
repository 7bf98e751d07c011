// test/framers/cobs.test.ts

import { describe, expect, it } from 'vitest';
import { decodeCobs, encodeCobs } from '../../src/framers/cobs.js';
import { CobsDecodeError } from '../../src/errors.js';

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

describe('encodeCobs', () => {
  it('encodes empty input as a single code byte and delimiter', () => {
    expect(encodeCobs(bytes())).toEqual(bytes(0x01, 0x00));
  });

  it('replaces embedded zeros with run lengths', () => {
    expect(encodeCobs(bytes(0x11, 0x00, 0x22))).toEqual(bytes(0x02, 0x11, 0x02, 0x22, 0x00));
    expect(encodeCobs(bytes(0x11, 0x22, 0x00, 0x33))).toEqual(
      bytes(0x03, 0x11, 0x22, 0x02, 0x33, 0x00)
    );
  });

  it('encodes lone and repeated zeros', () => {
    expect(encodeCobs(bytes(0x00))).toEqual(bytes(0x01, 0x01, 0x00));
    expect(encodeCobs(bytes(0x00, 0x00))).toEqual(bytes(0x01, 0x01, 0x01, 0x00));
  });

  it('closes a 254-byte run with code 0xff and no implied zero', () => {
    const run = Uint8Array.from({ length: 254 }, (_, i) => i + 1);
    const encoded = encodeCobs(run);

    expect(encoded.length).toBe(257);
    expect(encoded[0]).toBe(0xff);
    expect(encoded.subarray(1, 255)).toEqual(run);
    expect(encoded[255]).toBe(0x01);
    expect(encoded[256]).toBe(0x00);
  });

  it('starts a new run after 254 bytes', () => {
    const run = Uint8Array.from({ length: 255 }, (_, i) => i + 1);
    const encoded = encodeCobs(run);

    expect(encoded.length).toBe(258);
    expect(encoded[255]).toBe(0x02);
    expect(encoded[256]).toBe(0xff);
    expect(encoded[257]).toBe(0x00);
  });

  it('never emits a zero before the delimiter', () => {
    const data = bytes(0x00, 0x10, 0x00, 0x00, 0x20, 0x30, 0x00);
    const encoded = encodeCobs(data);
    expect(encoded.subarray(0, -1).includes(0)).toBe(false);
    expect(encoded[encoded.length - 1]).toBe(0);
  });
});

describe('decodeCobs', () => {
  it('reverses encodeCobs', () => {
    const samples = [
      bytes(),
      bytes(0x00),
      bytes(0x11, 0x00, 0x22),
      bytes(0x16, 0x54, 0x01, 0x01, 0x4b),
      Uint8Array.from({ length: 300 }, (_, i) => i % 7),
      Uint8Array.from({ length: 254 }, (_, i) => i + 1),
    ];
    for (const sample of samples) {
      expect(decodeCobs(encodeCobs(sample))).toEqual(sample);
    }
  });

  it('decodes a known packet', () => {
    expect(decodeCobs(bytes(0x03, 0x11, 0x22, 0x02, 0x33, 0x00))).toEqual(
      bytes(0x11, 0x22, 0x00, 0x33)
    );
  });

  it('rejects empty input', () => {
    expect(() => decodeCobs(bytes())).toThrow(CobsDecodeError);
  });

  it('rejects a packet without the trailing delimiter', () => {
    expect(() => decodeCobs(bytes(0x01, 0x02))).toThrow('missing trailing delimiter');
  });

  it('rejects a zero inside the packet', () => {
    expect(() => decodeCobs(bytes(0x01, 0x00, 0x01, 0x00))).toThrow('unexpected zero at offset 1');
  });

  it('rejects a code byte that runs past the end', () => {
    expect(() => decodeCobs(bytes(0x05, 0x11, 0x00))).toThrow(CobsDecodeError);
  });

  it('includes the raw bytes in the error', () => {
    try {
      decodeCobs(bytes(0x05, 0x11, 0x00));
      expect.unreachable();
    } catch (err: unknown) {
      expect(err).toBeInstanceOf(CobsDecodeError);
      if (err instanceof CobsDecodeError) {
        expect(err.rawData).toEqual(bytes(0x05, 0x11, 0x00));
        expect(err.message).toBe('COBS decode failed: code 0x5 at offset 0 overruns packet (051100)');
      }
    }
  });
});
