// src/transport/node-transports/node-serial-link.ts

import { Mutex } from 'async-mutex';
import { SerialPort } from 'serialport';
import { ConfigError, LinkConnectionError, LinkWriteError, NotConnectedError } from '../../errors.js';
import Logger from '../../logger.js';
import type {
  LinkTransport,
  NodeSerialLinkOptions,
  NotificationHandler,
  SerialPortFactory,
  SerialPortLike,
} from '../../types/aquaclean-types.js';
import { DelimiterSplitter } from '../delimiter-splitter.js';

const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 921600,
  DEFAULT_BAUD_RATE: 115200,
  DEFAULT_MAX_PACKET_SIZE: 256,
} as const;

const loggerInstance = new Logger();
loggerInstance.setLogFormat(['timestamp', 'level', 'logger']);
const logger = loggerInstance.createLogger('NodeSerialLink');
logger.setLevel('info');

const defaultPortFactory: SerialPortFactory = (path, baudRate) =>
  new SerialPort({ path, baudRate, autoOpen: false });

/**
 * Carries byte-stuffed packets over a serial port, e.g. a wired bridge to
 * the appliance radio. The inbound stream is split at 0x00 delimiters and
 * each packet is pushed to subscribers.
 */
export class NodeSerialLinkTransport implements LinkTransport {
  private readonly path: string;
  private readonly baudRate: number;
  private readonly portFactory: SerialPortFactory;
  private readonly splitter: DelimiterSplitter;
  private readonly handlers: Set<NotificationHandler> = new Set();
  private readonly _operationMutex: Mutex = new Mutex();
  private port: SerialPortLike | null = null;
  private _isOpen: boolean = false;

  constructor(path: string, options: NodeSerialLinkOptions = {}) {
    this.path = path;
    this.baudRate = options.baudRate ?? NODE_SERIAL_CONSTANTS.DEFAULT_BAUD_RATE;
    this.portFactory = options.portFactory ?? defaultPortFactory;
    this.splitter = new DelimiterSplitter(
      options.maxPacketSize ?? NODE_SERIAL_CONSTANTS.DEFAULT_MAX_PACKET_SIZE
    );
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  async connect(): Promise<void> {
    if (this._isOpen) {
      logger.debug(`Serial port ${this.path} already open`);
      return;
    }
    if (
      !Number.isInteger(this.baudRate) ||
      this.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new ConfigError(`Invalid baud rate: ${this.baudRate}`);
    }

    const port = this.portFactory(this.path, this.baudRate);
    await new Promise<void>((resolve, reject) => {
      port.open((err: Error | null) => {
        if (err) {
          reject(new LinkConnectionError(`Cannot open ${this.path}: ${err.message}`, { cause: err }));
          return;
        }
        resolve();
      });
    });

    this.port = port;
    this._isOpen = true;
    this.splitter.reset();
    port.on('data', (chunk: Buffer) => this._onData(chunk));
    port.on('error', (err: Error) => this._onError(err));
    port.on('close', () => this._onClose());
    logger.info(`Serial port ${this.path} opened`);
  }

  async disconnect(): Promise<void> {
    const port = this.port;
    if (!port) return;
    this._removeAllListeners(port);
    this.port = null;
    this._isOpen = false;
    this.splitter.reset();

    if (port.isOpen) {
      await new Promise<void>((resolve, reject) => {
        port.close((err: Error | null) => {
          if (err) reject(new LinkConnectionError(`Cannot close ${this.path}: ${err.message}`, { cause: err }));
          else resolve();
        });
      });
    }
    logger.info(`Serial port ${this.path} closed`);
  }

  /**
   * Writes one packet and waits for the port to drain.
   * @throws NotConnectedError | LinkWriteError
   */
  async write(packet: Uint8Array): Promise<void> {
    const port = this.port;
    if (!this._isOpen || !port) throw new NotConnectedError(`Serial port ${this.path} is not open`);
    if (packet.length === 0) throw new LinkWriteError('Refusing to write an empty packet');

    const release = await this._operationMutex.acquire();
    try {
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(packet));
        port.drain((err: Error | null) => {
          if (err) {
            reject(new LinkWriteError(`Write to ${this.path} failed: ${err.message}`, { cause: err }));
            return;
          }
          resolve();
        });
      });
    } finally {
      release();
    }
  }

  subscribe(handler: NotificationHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  private _onData(chunk: Buffer): void {
    if (!this._isOpen) return;
    const { packets, dropped } = this.splitter.push(
      new Uint8Array(chunk.buffer, chunk.byteOffset, chunk.byteLength)
    );
    if (dropped > 0) {
      logger.warn(`Dropped ${dropped} bytes without a packet delimiter`);
    }
    for (const packet of packets) {
      for (const handler of this.handlers) {
        try {
          handler(packet);
        } catch (err: unknown) {
          logger.error('Notification handler threw', err instanceof Error ? err : String(err));
        }
      }
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
  }

  private _onClose(): void {
    if (!this._isOpen) return;
    logger.warn(`Serial port ${this.path} closed unexpectedly`);
    this._isOpen = false;
    if (this.port) this._removeAllListeners(this.port);
    this.port = null;
    this.splitter.reset();
  }

  private _removeAllListeners(port: SerialPortLike): void {
    port.removeAllListeners('data');
    port.removeAllListeners('error');
    port.removeAllListeners('close');
  }
}
