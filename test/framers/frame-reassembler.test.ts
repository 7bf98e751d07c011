// test/framers/frame-reassembler.test.ts

import { describe, expect, it } from 'vitest';
import { FrameKind } from '../../src/constants/constants.js';
import { FrameReassembler } from '../../src/framers/frame-reassembler.js';
import type { LinkFrame } from '../../src/types/aquaclean-types.js';

const single = (...payload: number[]): LinkFrame => ({
  kind: FrameKind.SINGLE,
  hasTag: false,
  transaction: 0,
  flag: 0,
  payload: Uint8Array.from(payload),
});

const fragment = (transaction: number, flag: 0 | 1, ...payload: number[]): LinkFrame => ({
  kind: FrameKind.CONSECUTIVE,
  hasTag: false,
  transaction,
  flag,
  payload: Uint8Array.from(payload),
});

describe('FrameReassembler', () => {
  it('completes Single frames immediately', () => {
    const reassembler = new FrameReassembler();
    expect(reassembler.addFrame(single(1, 2))).toBe(true);
    expect(reassembler.completedCount).toBe(1);
    expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(1, 2));
    expect(reassembler.getCompleteMessage()).toBeUndefined();
  });

  it('returns completed messages in arrival order', () => {
    const reassembler = new FrameReassembler();
    reassembler.addFrame(single(1));
    reassembler.addFrame(single(2));
    expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(1));
    expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(2));
  });

  it('drops FlowControl frames', () => {
    const reassembler = new FrameReassembler();
    const flowControl: LinkFrame = { ...single(), kind: FrameKind.FLOW_CONTROL };
    expect(reassembler.addFrame(flowControl)).toBe(false);
    expect(reassembler.completedCount).toBe(0);
    expect(reassembler.pendingFragmentCount).toBe(0);
  });

  it('keeps completion order with FlowControl frames interleaved', () => {
    const reassembler = new FrameReassembler();
    const flowControl: LinkFrame = { ...single(), kind: FrameKind.FLOW_CONTROL };
    reassembler.addFrame(single(1));
    reassembler.addFrame(flowControl);
    reassembler.addFrame(fragment(0, 0, 2));
    reassembler.addFrame(flowControl);
    expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(1));
    expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(2));
    expect(reassembler.getCompleteMessage()).toBeUndefined();
  });

  describe('eager policy', () => {
    it('emits a separate message for each fragment', () => {
      const reassembler = new FrameReassembler('eager');
      expect(reassembler.addFrame(fragment(0, 0, 0x10, 0x11))).toBe(true);
      expect(reassembler.addFrame(fragment(1, 1, 0x12))).toBe(true);
      expect(reassembler.completedCount).toBe(2);
      expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(0x10, 0x11));
      expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(0x12));
      expect(reassembler.pendingFragmentCount).toBe(0);
    });

    it('assembles on every Consecutive frame', () => {
      const reassembler = new FrameReassembler('eager');
      expect(reassembler.addFrame(fragment(0, 0, 0xaa, 0xbb))).toBe(true);
      expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(0xaa, 0xbb));
      expect(reassembler.pendingFragmentCount).toBe(0);
    });
  });

  describe('final-flag policy', () => {
    it('waits for the final fragment and orders by transaction', () => {
      const reassembler = new FrameReassembler('final-flag');
      expect(reassembler.addFrame(fragment(1, 0, 3, 4))).toBe(false);
      expect(reassembler.addFrame(fragment(0, 0, 1, 2))).toBe(false);
      expect(reassembler.pendingFragmentCount).toBe(2);

      expect(reassembler.addFrame(fragment(2, 1, 5))).toBe(true);
      expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(1, 2, 3, 4, 5));
      expect(reassembler.pendingFragmentCount).toBe(0);
    });

    it('drops unfinished fragments when a transaction repeats', () => {
      const reassembler = new FrameReassembler('final-flag');
      reassembler.addFrame(fragment(0, 0, 1));
      reassembler.addFrame(fragment(1, 0, 2));
      expect(reassembler.pendingFragmentCount).toBe(2);

      expect(reassembler.addFrame(fragment(0, 0, 7))).toBe(false);
      expect(reassembler.pendingFragmentCount).toBe(1);

      expect(reassembler.addFrame(fragment(1, 1, 8))).toBe(true);
      expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(7, 8));
    });

    it('holds up to eight fragments before the final one', () => {
      const reassembler = new FrameReassembler('final-flag');
      for (let i = 0; i < 7; i++) {
        expect(reassembler.addFrame(fragment(i, 0, i))).toBe(false);
      }
      expect(reassembler.pendingFragmentCount).toBe(7);
      expect(reassembler.addFrame(fragment(7, 1, 7))).toBe(true);
      expect(reassembler.getCompleteMessage()).toEqual(Uint8Array.of(0, 1, 2, 3, 4, 5, 6, 7));
    });
  });

  it('reset clears pending and completed messages', () => {
    const reassembler = new FrameReassembler('final-flag');
    reassembler.addFrame(single(1));
    reassembler.addFrame(fragment(0, 0, 2));
    reassembler.reset();
    expect(reassembler.completedCount).toBe(0);
    expect(reassembler.pendingFragmentCount).toBe(0);
  });
});
