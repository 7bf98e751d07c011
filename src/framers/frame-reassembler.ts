// src/framers/frame-reassembler.ts

import { FrameKind } from '../constants/constants.js';
import Logger from '../logger.js';
import type { LinkFrame, LoggerInstance, ReassemblyPolicy } from '../types/aquaclean-types.js';
import { concatUint8Arrays } from '../utils/utils.js';

const loggerInstance = new Logger();
loggerInstance.setLevel('error');

/**
 * Collects link frames into application messages.
 *
 * Single frames complete at once. Consecutive frames are kept per kind until
 * the policy says the message is complete: `eager` assembles whatever has
 * arrived on every fragment, `final-flag` waits for the fragment carrying
 * `flag = 1` and drops unfinished fragments when a transaction number
 * repeats. FlowControl frames are accepted and dropped.
 */
export class FrameReassembler {
  private readonly policy: ReassemblyPolicy;
  private readonly logger: LoggerInstance;
  private pending: Map<FrameKind, LinkFrame[]> = new Map();
  private completed: Uint8Array[] = [];

  constructor(policy: ReassemblyPolicy = 'eager', logger?: LoggerInstance) {
    this.policy = policy;
    this.logger = logger ?? loggerInstance.createLogger('Reassembler');
  }

  /**
   * @returns true when the frame completed a message
   */
  addFrame(frame: LinkFrame): boolean {
    switch (frame.kind) {
      case FrameKind.SINGLE:
        this.completed.push(frame.payload);
        return true;

      case FrameKind.FLOW_CONTROL:
        this.logger.trace('Flow control frame ignored', {
          transaction: frame.transaction,
          frameKind: frame.kind,
        });
        return false;

      case FrameKind.CONSECUTIVE:
        return this.addFragment(frame);
    }
  }

  private addFragment(frame: LinkFrame): boolean {
    let fragments = this.pending.get(frame.kind) ?? [];

    // Transactions are 3 bits, so a repeat means the earlier message was never finished
    if (this.policy === 'final-flag' && fragments.some(f => f.transaction === frame.transaction)) {
      this.logger.warn(`Discarding ${fragments.length} stale fragment(s) without a final marker`, {
        transaction: frame.transaction,
        frameKind: frame.kind,
      });
      fragments = [];
    }

    fragments.push(frame);

    if (this.policy === 'final-flag' && frame.flag !== 1) {
      this.pending.set(frame.kind, fragments);
      return false;
    }

    const ordered = [...fragments].sort((a, b) => a.transaction - b.transaction);
    this.pending.delete(frame.kind);
    this.completed.push(concatUint8Arrays(ordered.map(f => f.payload)));
    this.logger.debug(`Assembled message from ${ordered.length} fragment(s)`, {
      frameKind: frame.kind,
    });
    return true;
  }

  /**
   * Removes and returns the oldest completed message.
   */
  getCompleteMessage(): Uint8Array | undefined {
    return this.completed.shift();
  }

  get completedCount(): number {
    return this.completed.length;
  }

  get pendingFragmentCount(): number {
    let count = 0;
    for (const fragments of this.pending.values()) count += fragments.length;
    return count;
  }

  reset(): void {
    this.pending.clear();
    this.completed = [];
  }
}
