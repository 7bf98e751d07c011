// test/framers/link-frame.test.ts

import { describe, expect, it } from 'vitest';
import { FrameKind } from '../../src/constants/constants.js';
import { FragmentationError, FrameParseError } from '../../src/errors.js';
import {
  encodeHeader,
  fragmentMessage,
  frameFromBytes,
  frameToBytes,
} from '../../src/framers/link-frame.js';

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

describe('encodeHeader', () => {
  it('packs kind, tag, transaction and flag', () => {
    expect(encodeHeader({ kind: FrameKind.SINGLE, hasTag: true, transaction: 3, flag: 0 })).toBe(0x16);
    expect(encodeHeader({ kind: FrameKind.CONSECUTIVE, hasTag: false, transaction: 7, flag: 1 })).toBe(0x4f);
    expect(encodeHeader({ kind: FrameKind.FLOW_CONTROL, hasTag: true, transaction: 0, flag: 0 })).toBe(0x70);
  });

  it('rejects transactions outside 0..7', () => {
    expect(() =>
      encodeHeader({ kind: FrameKind.SINGLE, hasTag: true, transaction: 8, flag: 0 })
    ).toThrow(RangeError);
  });
});

describe('frameToBytes', () => {
  it('writes a Single frame as header plus payload', () => {
    const frame = {
      kind: FrameKind.SINGLE,
      hasTag: true,
      transaction: 2,
      flag: 0,
      payload: bytes(0x54, 0x01, 0x01, 0x4b),
    } as const;
    expect(frameToBytes(frame)).toEqual(bytes(0x14, 0x54, 0x01, 0x01, 0x4b));
  });

  it('writes a length byte for Consecutive frames', () => {
    const frame = {
      kind: FrameKind.CONSECUTIVE,
      hasTag: true,
      transaction: 1,
      flag: 1,
      payload: bytes(0xaa, 0xbb),
    } as const;
    expect(frameToBytes(frame)).toEqual(bytes(0x53, 0x02, 0xaa, 0xbb));
  });

  it('rejects Consecutive payloads over 255 bytes', () => {
    const frame = {
      kind: FrameKind.CONSECUTIVE,
      hasTag: false,
      transaction: 0,
      flag: 0,
      payload: new Uint8Array(256),
    } as const;
    expect(() => frameToBytes(frame)).toThrow(RangeError);
  });
});

describe('frameFromBytes', () => {
  it('parses a Single frame', () => {
    expect(frameFromBytes(bytes(0x16, 0xaa))).toEqual({
      kind: FrameKind.SINGLE,
      hasTag: true,
      transaction: 3,
      flag: 0,
      payload: bytes(0xaa),
    });
  });

  it('parses a Consecutive frame and ignores bytes past its length', () => {
    const frame = frameFromBytes(bytes(0x43, 0x02, 0x01, 0x02, 0x99));
    expect(frame.kind).toBe(FrameKind.CONSECUTIVE);
    expect(frame.transaction).toBe(1);
    expect(frame.flag).toBe(1);
    expect(frame.hasTag).toBe(false);
    expect(frame.payload).toEqual(bytes(0x01, 0x02));
  });

  it('parses a FlowControl frame', () => {
    const frame = frameFromBytes(bytes(0x60));
    expect(frame.kind).toBe(FrameKind.FLOW_CONTROL);
    expect(frame.payload).toEqual(bytes());
  });

  it('round-trips frames of every kind', () => {
    const frames = [
      { kind: FrameKind.SINGLE, hasTag: false, transaction: 4, flag: 1, payload: bytes(1, 2, 3) },
      { kind: FrameKind.CONSECUTIVE, hasTag: true, transaction: 6, flag: 0, payload: bytes(9) },
      { kind: FrameKind.FLOW_CONTROL, hasTag: false, transaction: 0, flag: 0, payload: bytes() },
    ] as const;
    for (const frame of frames) {
      expect(frameFromBytes(frameToBytes(frame))).toEqual(frame);
    }
  });

  it('rejects an empty buffer', () => {
    expect(() => frameFromBytes(bytes())).toThrow(FrameParseError);
  });

  it('rejects unknown kinds', () => {
    expect(() => frameFromBytes(bytes(0x20))).toThrow('unknown frame kind 1');
    expect(() => frameFromBytes(bytes(0xe0))).toThrow('unknown frame kind 7');
  });

  it('rejects a Consecutive frame without its length byte', () => {
    expect(() => frameFromBytes(bytes(0x40))).toThrow('consecutive frame without length byte');
  });

  it('rejects a Consecutive frame shorter than its length byte', () => {
    expect(() => frameFromBytes(bytes(0x40, 0x03, 0x01, 0x02))).toThrow(
      'declared 3 payload bytes, only 2 present'
    );
  });
});

describe('fragmentMessage', () => {
  it('uses one Single frame when the payload fits', () => {
    const payload = new Uint8Array(17).fill(1);
    const frames = fragmentMessage(payload, { maxFrameSize: 18, transaction: 2 });
    expect(frames).toHaveLength(1);
    expect(frames[0]).toEqual({
      kind: FrameKind.SINGLE,
      hasTag: true,
      transaction: 2,
      flag: 0,
      payload,
    });
  });

  it('splits a long payload into numbered Consecutive frames', () => {
    const payload = Uint8Array.from({ length: 20 }, (_, i) => i + 1);
    const frames = fragmentMessage(payload, { maxFrameSize: 18, transaction: 2, hasTag: false });

    expect(frames).toHaveLength(2);
    expect(frames.map(f => f.kind)).toEqual([FrameKind.CONSECUTIVE, FrameKind.CONSECUTIVE]);
    expect(frames.map(f => f.transaction)).toEqual([0, 1]);
    expect(frames.map(f => f.flag)).toEqual([0, 1]);
    expect(frames[0].payload).toEqual(payload.slice(0, 16));
    expect(frames[1].payload).toEqual(payload.slice(16));
    for (const frame of frames) {
      expect(frameToBytes(frame).length).toBeLessThanOrEqual(18);
    }
  });

  it('allows up to eight fragments', () => {
    expect(fragmentMessage(new Uint8Array(128), { maxFrameSize: 18, transaction: 0 })).toHaveLength(8);
  });

  it('refuses messages needing more than eight fragments', () => {
    expect(() => fragmentMessage(new Uint8Array(129), { maxFrameSize: 18, transaction: 0 })).toThrow(
      FragmentationError
    );
  });

  it('validates the frame size', () => {
    expect(() => fragmentMessage(bytes(1), { maxFrameSize: 2, transaction: 0 })).toThrow(RangeError);
  });
});
