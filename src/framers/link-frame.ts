// src/framers/link-frame.ts

import {
  FrameKind,
  HEADER_FLAG_MASK,
  HEADER_KIND_MASK,
  HEADER_KIND_SHIFT,
  HEADER_TAG_SHIFT,
  HEADER_TRANSACTION_MASK,
  HEADER_TRANSACTION_SHIFT,
  MAX_CONSECUTIVE_PAYLOAD,
  MAX_FRAGMENTS,
  MAX_TRANSACTION,
} from '../constants/constants.js';
import { FragmentationError, FrameParseError } from '../errors.js';
import type { FragmentOptions, LinkFrame } from '../types/aquaclean-types.js';
import { assertIntegerInRange } from '../utils/utils.js';

const KNOWN_KINDS: ReadonlySet<number> = new Set([
  FrameKind.SINGLE,
  FrameKind.CONSECUTIVE,
  FrameKind.FLOW_CONTROL,
]);

function isFrameKind(value: number): value is FrameKind {
  return KNOWN_KINDS.has(value);
}

/**
 * Header byte: `[kind:3][tag:1][transaction:3][flag:1]`.
 */
export function encodeHeader(frame: Pick<LinkFrame, 'kind' | 'hasTag' | 'transaction' | 'flag'>): number {
  assertIntegerInRange('Transaction', frame.transaction, 0, MAX_TRANSACTION);
  return (
    (frame.kind << HEADER_KIND_SHIFT) |
    ((frame.hasTag ? 1 : 0) << HEADER_TAG_SHIFT) |
    (frame.transaction << HEADER_TRANSACTION_SHIFT) |
    frame.flag
  );
}

/**
 * Serializes a frame. Consecutive frames get a length byte after the header.
 * @throws RangeError if the transaction is outside 0..7 or a Consecutive payload exceeds 255 bytes
 */
export function frameToBytes(frame: LinkFrame): Uint8Array {
  const header = encodeHeader(frame);

  if (frame.kind === FrameKind.CONSECUTIVE) {
    if (frame.payload.length > MAX_CONSECUTIVE_PAYLOAD) {
      throw new RangeError(
        `Consecutive payload must be at most ${MAX_CONSECUTIVE_PAYLOAD} bytes, got ${frame.payload.length}`
      );
    }
    const out = new Uint8Array(2 + frame.payload.length);
    out[0] = header;
    out[1] = frame.payload.length;
    out.set(frame.payload, 2);
    return out;
  }

  const out = new Uint8Array(1 + frame.payload.length);
  out[0] = header;
  out.set(frame.payload, 1);
  return out;
}

/**
 * Parses an unstuffed frame. Bytes past a Consecutive frame's declared
 * length are ignored.
 * @throws FrameParseError for an empty buffer, an unknown kind or a length byte the buffer cannot satisfy
 */
export function frameFromBytes(data: Uint8Array): LinkFrame {
  if (data.length < 1) {
    throw new FrameParseError('empty frame', data);
  }

  const header = data[0];
  const kind = (header >> HEADER_KIND_SHIFT) & HEADER_KIND_MASK;
  if (!isFrameKind(kind)) {
    throw new FrameParseError(`unknown frame kind ${kind}`, data);
  }

  const frame = {
    kind,
    hasTag: ((header >> HEADER_TAG_SHIFT) & 0x01) === 1,
    transaction: (header >> HEADER_TRANSACTION_SHIFT) & HEADER_TRANSACTION_MASK,
    flag: (header & HEADER_FLAG_MASK) === 1 ? 1 : 0,
  } as const;

  if (kind === FrameKind.CONSECUTIVE) {
    if (data.length < 2) {
      throw new FrameParseError('consecutive frame without length byte', data);
    }
    const count = data[1];
    if (data.length < 2 + count) {
      throw new FrameParseError(
        `declared ${count} payload bytes, only ${data.length - 2} present`,
        data
      );
    }
    return { ...frame, payload: data.slice(2, 2 + count) };
  }

  return { ...frame, payload: data.slice(1) };
}

/**
 * Splits an outbound message into link frames no larger than `maxFrameSize`.
 * A message that fits goes out as one Single frame; otherwise Consecutive
 * frames numbered 0..n-1 with `flag = 1` on the last.
 * @throws FragmentationError if more than eight fragments would be needed
 */
export function fragmentMessage(payload: Uint8Array, options: FragmentOptions): LinkFrame[] {
  const { maxFrameSize, transaction, hasTag = true } = options;
  assertIntegerInRange('Max frame size', maxFrameSize, 3, 256);

  if (payload.length + 1 <= maxFrameSize) {
    return [{ kind: FrameKind.SINGLE, hasTag, transaction, flag: 0, payload }];
  }

  const chunkSize = maxFrameSize - 2;
  const fragmentCount = Math.ceil(payload.length / chunkSize);
  if (fragmentCount > MAX_FRAGMENTS) {
    throw new FragmentationError(payload.length, chunkSize * MAX_FRAGMENTS);
  }

  const frames: LinkFrame[] = [];
  for (let index = 0; index < fragmentCount; index++) {
    frames.push({
      kind: FrameKind.CONSECUTIVE,
      hasTag,
      transaction: index,
      flag: index === fragmentCount - 1 ? 1 : 0,
      payload: payload.slice(index * chunkSize, (index + 1) * chunkSize),
    });
  }
  return frames;
}
