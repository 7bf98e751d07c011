// src/transport/delimiter-splitter.ts

import { COBS_DELIMITER } from '../constants/constants.js';
import { concatUint8Arrays } from '../utils/utils.js';

/**
 * Cuts a byte stream into packets at each 0x00 delimiter. The delimiter is
 * kept at the end of every packet so that it can go straight to the
 * byte-stuffing decoder.
 */
export class DelimiterSplitter {
  private buffer: Uint8Array = new Uint8Array(0);
  private readonly maxPacketSize: number;

  /**
   * @param maxPacketSize - undelimited bytes kept before the buffer is dropped
   */
  constructor(maxPacketSize: number = 256) {
    this.maxPacketSize = maxPacketSize;
  }

  /**
   * Appends a chunk and returns every packet it completed.
   * @returns packets and the number of bytes dropped for overflow
   */
  push(chunk: Uint8Array): { packets: Uint8Array[]; dropped: number } {
    let data = this.buffer.length > 0 ? concatUint8Arrays([this.buffer, chunk]) : chunk;
    const packets: Uint8Array[] = [];

    let start = 0;
    for (let i = 0; i < data.length; i++) {
      if (data[i] !== COBS_DELIMITER) continue;
      // A bare delimiter between packets carries nothing
      if (i > start) packets.push(data.slice(start, i + 1));
      start = i + 1;
    }
    data = data.slice(start);

    let dropped = 0;
    if (data.length > this.maxPacketSize) {
      dropped = data.length;
      data = new Uint8Array(0);
    }
    this.buffer = data;
    return { packets, dropped };
  }

  get bufferedBytes(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = new Uint8Array(0);
  }
}
