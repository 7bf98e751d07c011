// src/correlator.ts

import { LinkWriteError } from './errors.js';
import Logger from './logger.js';
import type { LoggerInstance } from './types/aquaclean-types.js';
import type { LinkDiagnostics } from './utils/diagnostics.js';

const loggerInstance = new Logger();
loggerInstance.setLevel('error');

export type PacketWriter = (packet: Uint8Array) => Promise<void>;

interface PendingTransaction {
  sequence: number;
  sentAt: number;
  settled: boolean;
  timer: ReturnType<typeof setTimeout> | null;
  writeError: LinkWriteError | null;
  resolve: (response: Uint8Array | undefined) => void;
}

export interface TransactionCorrelatorOptions {
  logger?: LoggerInstance;
  diagnostics?: LinkDiagnostics;
}

/**
 * Pairs each outbound request with the next completed inbound message.
 *
 * Only one transaction is outstanding. Starting a new one settles the
 * previous waiter with `undefined`, so the latest request owns the slot.
 * A timeout is an ordinary `undefined` result.
 */
export class TransactionCorrelator {
  private readonly write: PacketWriter;
  private readonly logger: LoggerInstance;
  private readonly diagnostics?: LinkDiagnostics;
  private pending: PendingTransaction | null = null;
  private sequence: number = 0;

  constructor(write: PacketWriter, options: TransactionCorrelatorOptions = {}) {
    this.write = write;
    this.logger = options.logger ?? loggerInstance.createLogger('Correlator');
    this.diagnostics = options.diagnostics;
  }

  get hasPending(): boolean {
    return this.pending !== null;
  }

  /**
   * Writes the packets in order and waits for {@link deliver} or the timeout.
   * The timeout runs from the start of the first write.
   * @returns the response message, or `undefined` on timeout or supersession
   * @throws LinkWriteError when a packet cannot be written
   */
  async sendAndWait(packets: Uint8Array[], timeout: number): Promise<Uint8Array | undefined> {
    if (this.pending) {
      this.logger.warn('Request superseded by a newer one', {
        transaction: this.pending.sequence,
      });
      this.diagnostics?.recordSuperseded();
      this.settle(this.pending, undefined);
    }

    const pending: PendingTransaction = {
      sequence: ++this.sequence,
      sentAt: Date.now(),
      settled: false,
      timer: null,
      writeError: null,
      resolve: () => undefined,
    };
    const completion = new Promise<Uint8Array | undefined>(resolve => {
      pending.resolve = resolve;
    });
    this.pending = pending;

    // Armed before writing, so a write that never settles still times out
    pending.timer = setTimeout(() => {
      if (pending.settled) return;
      this.logger.debug(`No response within ${timeout}ms`, { transaction: pending.sequence });
      this.diagnostics?.recordTimeout();
      this.settle(pending, undefined);
    }, timeout);

    void this.writePackets(packets).catch((err: unknown) => {
      const error =
        err instanceof LinkWriteError
          ? err
          : new LinkWriteError(err instanceof Error ? err.message : String(err), { cause: err });
      this.diagnostics?.recordError(error);
      if (pending.settled) {
        this.logger.warn(`Write failed after the request settled: ${error.message}`, {
          transaction: pending.sequence,
        });
        return;
      }
      pending.writeError = error;
      this.settle(pending, undefined);
    });

    const response = await completion;
    if (pending.writeError) throw pending.writeError;
    return response;
  }

  private async writePackets(packets: Uint8Array[]): Promise<void> {
    for (const packet of packets) {
      await this.write(packet);
      this.diagnostics?.recordBytesSent(packet.length);
    }
  }

  /**
   * Hands a completed inbound message to the waiting request.
   * @returns false when nothing was waiting and the message was dropped
   */
  deliver(message: Uint8Array): boolean {
    const pending = this.pending;
    if (!pending) {
      this.logger.debug('Dropping message with no pending request', { bytes: message.length });
      this.diagnostics?.recordUnsolicited();
      return false;
    }

    const responseTime = Date.now() - pending.sentAt;
    this.diagnostics?.recordResponse(responseTime);
    this.logger.debug('Response delivered', {
      transaction: pending.sequence,
      bytes: message.length,
      responseTime,
    });
    this.settle(pending, message);
    return true;
  }

  /**
   * Settles the outstanding request with `undefined`.
   */
  cancel(): void {
    if (this.pending) this.settle(this.pending, undefined);
  }

  private settle(pending: PendingTransaction, response: Uint8Array | undefined): void {
    if (pending.settled) return;
    pending.settled = true;
    if (pending.timer) {
      clearTimeout(pending.timer);
      pending.timer = null;
    }
    if (this.pending === pending) this.pending = null;
    pending.resolve(response);
  }
}
