// src/packet-builder.ts

import { COBS_OVERHEAD } from './constants/constants.js';
import { decodeCobs, encodeCobs } from './framers/cobs.js';
import { fragmentMessage, frameFromBytes, frameToBytes } from './framers/link-frame.js';
import type { LinkFrame } from './types/aquaclean-types.js';

/**
 * Largest frame, before byte-stuffing, that fits one link packet.
 */
export function maxFrameSizeForMtu(mtu: number): number {
  return mtu - COBS_OVERHEAD;
}

/**
 * Stuffs one frame into a link packet (delimiter included).
 */
export function buildPacket(frame: LinkFrame): Uint8Array {
  return encodeCobs(frameToBytes(frame));
}

/**
 * Turns a request payload into the link packets that carry it.
 * @param payload - message built by one of the request builders
 * @param transaction - fixed transaction number of the request kind
 * @param mtu - link packet size
 */
export function buildRequestPackets(payload: Uint8Array, transaction: number, mtu: number): Uint8Array[] {
  return fragmentMessage(payload, {
    maxFrameSize: maxFrameSizeForMtu(mtu),
    transaction,
    hasTag: true,
  }).map(buildPacket);
}

/**
 * Unstuffs a received packet and parses its frame.
 * @throws CobsDecodeError | FrameParseError
 */
export function parsePacket(packet: Uint8Array): LinkFrame {
  return frameFromBytes(decodeCobs(packet));
}
