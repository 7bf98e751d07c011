// src/device-emulator/device-emulator.ts

import {
  DATA_POINT_READ_MARKER,
  DATA_POINT_WRITE_MARKER,
  FrameKind,
  HighLevelCommand,
  RequestTransaction,
} from '../constants/constants.js';
import { FramingError, LinkWriteError, NotConnectedError } from '../errors.js';
import { FrameReassembler } from '../framers/frame-reassembler.js';
import { fragmentMessage } from '../framers/link-frame.js';
import Logger from '../logger.js';
import { buildPacket, parsePacket } from '../packet-builder.js';
import type {
  DeviceEmulatorOptions,
  LinkFrame,
  LinkTransport,
  LoggerInstance,
  NotificationHandler,
} from '../types/aquaclean-types.js';
import { concatUint8Arrays, fromBytesLE, toBytesLE, toHex } from '../utils/utils.js';

export interface EmulatedRequest {
  transaction: number;
  payload: Uint8Array;
}

const DEFAULT_IDENTIFICATION = Uint8Array.of(
  0x39, 0x30, // SAP 12345
  0x40, 0xe2, // serial 57920
  1, 2, 3, 4, // firmware
  0x45, 0x6d, 0x75, 0x6c, 0x61, 0x74, 0x6f, 0x72, 0x00, 0x00 // "Emulator"
);

/** Status byte flipped by each toggle command */
const TOGGLE_STATUS_INDEX: Partial<Record<number, number>> = {
  [HighLevelCommand.TOGGLE_ANAL_SHOWER]: 0,
  [HighLevelCommand.TOGGLE_LADY_SHOWER]: 1,
  [HighLevelCommand.TOGGLE_DRYER]: 2,
};

/**
 * In-process appliance. Implements the link transport, so a client can run
 * against it without a radio: written packets are decoded and answered
 * through the subscribed notification handlers.
 *
 * Unknown data points and unsupported commands are left unanswered, the
 * way firmware variants without a feature behave.
 */
class DeviceEmulator implements LinkTransport {
  private readonly responseDelay: number;
  private readonly maxFrameSize: number;
  private readonly markFinalFragment: boolean;
  private readonly supportedCommands?: ReadonlySet<number>;
  private readonly handlers: Set<NotificationHandler> = new Set();
  private readonly timers: Set<ReturnType<typeof setTimeout>> = new Set();
  private readonly reassembler: FrameReassembler;
  private identification: Uint8Array;
  private statusBytes: Uint8Array;
  private dataPoints: Map<number, Uint8Array> = new Map();
  private loggerEnabled: boolean;
  private logger: LoggerInstance;
  private silent: boolean = false;
  private writeFailure: Error | null = null;
  private _isOpen: boolean = false;

  readonly receivedRequests: EmulatedRequest[] = [];

  constructor(options: DeviceEmulatorOptions = {}) {
    this.responseDelay = options.responseDelay ?? 0;
    this.maxFrameSize = options.maxFrameSize ?? 18;
    this.markFinalFragment = options.markFinalFragment ?? true;
    this.supportedCommands = options.supportedCommands
      ? new Set(options.supportedCommands)
      : undefined;
    this.identification = (options.identification ?? DEFAULT_IDENTIFICATION).slice();
    this.statusBytes = (options.statusBytes ?? new Uint8Array(6)).slice();
    for (const [id, value] of Object.entries(options.dataPoints ?? {})) {
      this.dataPoints.set(Number(id), value.slice());
    }

    this.loggerEnabled = !!options.loggerEnabled;
    const loggerInstance = new Logger();
    this.logger = loggerInstance.createLogger('DeviceEmulator');
    this.logger.setLevel(this.loggerEnabled ? 'info' : 'error');
    this.reassembler = new FrameReassembler(
      'final-flag',
      loggerInstance.createLogger('EmulatorReassembler')
    );
  }

  enableLogger(): void {
    if (!this.loggerEnabled) {
      this.loggerEnabled = true;
      this.logger.setLevel('info');
    }
  }

  disableLogger(): void {
    if (this.loggerEnabled) {
      this.loggerEnabled = false;
      this.logger.setLevel('error');
    }
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    this._isOpen = true;
    this.logger.info('Emulator connected');
  }

  async disconnect(): Promise<void> {
    this._isOpen = false;
    for (const timer of this.timers) clearTimeout(timer);
    this.timers.clear();
    this.reassembler.reset();
    this.logger.info('Emulator disconnected');
  }

  subscribe(handler: NotificationHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async write(packet: Uint8Array): Promise<void> {
    if (!this._isOpen) throw new NotConnectedError('Emulator is not connected');
    if (this.writeFailure) {
      throw new LinkWriteError(this.writeFailure.message, { cause: this.writeFailure });
    }

    let frame: LinkFrame;
    try {
      frame = parsePacket(packet);
    } catch (err: unknown) {
      if (err instanceof FramingError) {
        this.logger.warn(`Ignoring malformed packet: ${err.message}`);
        return;
      }
      throw err;
    }

    this.reassembler.addFrame(frame);
    let payload = this.reassembler.getCompleteMessage();
    // Consecutive frames number fragments, so only writes are long enough to arrive that way
    const transaction =
      frame.kind === FrameKind.SINGLE ? frame.transaction : RequestTransaction.WRITE_DATA_POINT;
    while (payload !== undefined) {
      this.handleRequest(transaction, payload);
      payload = this.reassembler.getCompleteMessage();
    }
  }

  // ===========================================================================
  // State
  // ===========================================================================

  setDataPoint(id: number, value: Uint8Array): void {
    this.dataPoints.set(id, value.slice());
  }

  getDataPoint(id: number): Uint8Array | undefined {
    const value = this.dataPoints.get(id);
    return value ? value.slice() : undefined;
  }

  deleteDataPoint(id: number): void {
    this.dataPoints.delete(id);
  }

  setStatusBytes(bytes: Uint8Array): void {
    this.statusBytes = bytes.slice();
  }

  getStatusBytes(): Uint8Array {
    return this.statusBytes.slice();
  }

  setIdentification(bytes: Uint8Array): void {
    this.identification = bytes.slice();
  }

  /**
   * Stops answering requests while still accepting writes.
   */
  setSilent(silent: boolean): void {
    this.silent = silent;
  }

  /**
   * Makes every write reject until cleared with `null`.
   */
  setWriteFailure(error: Error | null): void {
    this.writeFailure = error;
  }

  /**
   * Pushes a raw packet to subscribers, e.g. an unsolicited notification.
   */
  emitPacket(packet: Uint8Array): void {
    for (const handler of this.handlers) handler(packet);
  }

  // ===========================================================================
  // Request handling
  // ===========================================================================

  private handleRequest(transaction: number, payload: Uint8Array): void {
    this.receivedRequests.push({ transaction, payload: payload.slice() });
    this.logger.info(`Request received: ${toHex(payload, ' ')}`, { transaction });

    if (this.silent) return;

    const reply = this.buildReply(transaction, payload);
    if (reply === undefined) {
      this.logger.info('Request left unanswered', { transaction });
      return;
    }
    this.scheduleReply(transaction, reply);
  }

  private buildReply(transaction: number, payload: Uint8Array): Uint8Array | undefined {
    switch (transaction) {
      case RequestTransaction.COMMAND:
        return this.handleCommand(payload);
      case RequestTransaction.READ_DATA_POINT:
        return this.handleRead(payload);
      case RequestTransaction.WRITE_DATA_POINT:
        return this.handleWrite(payload);
      case RequestTransaction.DEVICE_IDENTIFICATION:
        return this.identification.slice();
      case RequestTransaction.SYSTEM_STATUS:
        return this.statusBytes.slice();
      default:
        return undefined;
    }
  }

  private handleCommand(payload: Uint8Array): Uint8Array | undefined {
    if (payload.length < 2) return undefined;
    const command = fromBytesLE(payload[0], payload[1]);
    if (this.supportedCommands && !this.supportedCommands.has(command)) return undefined;

    const index = TOGGLE_STATUS_INDEX[command];
    if (index !== undefined && index < this.statusBytes.length) {
      this.statusBytes[index] = this.statusBytes[index] > 0 ? 0 : 1;
    }
    return payload.slice(0, 2);
  }

  private handleRead(payload: Uint8Array): Uint8Array | undefined {
    if (payload.length < 3 || payload[2] !== DATA_POINT_READ_MARKER) return undefined;
    const id = fromBytesLE(payload[0], payload[1]);
    const value = this.dataPoints.get(id);
    if (value === undefined) return undefined;
    return concatUint8Arrays([toBytesLE(id), Uint8Array.of(DATA_POINT_READ_MARKER), value]);
  }

  private handleWrite(payload: Uint8Array): Uint8Array | undefined {
    if (payload.length < 4 || payload[2] !== DATA_POINT_WRITE_MARKER) return undefined;
    const id = fromBytesLE(payload[0], payload[1]);
    this.dataPoints.set(id, payload.slice(3));
    return payload.slice(0, 3);
  }

  private scheduleReply(transaction: number, reply: Uint8Array): void {
    const frames = fragmentMessage(reply, {
      maxFrameSize: this.maxFrameSize,
      transaction,
      hasTag: false,
    }).map(frame =>
      this.markFinalFragment ? frame : { ...frame, flag: 0 as const }
    );

    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (!this._isOpen) return;
      for (const frame of frames) this.emitPacket(buildPacket(frame));
    }, this.responseDelay);
    this.timers.add(timer);
  }
}

export default DeviceEmulator;
