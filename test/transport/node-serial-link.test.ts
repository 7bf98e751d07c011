// test/transport/node-serial-link.test.ts

import { EventEmitter } from 'node:events';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError, LinkConnectionError, LinkWriteError, NotConnectedError } from '../../src/errors.js';
import { NodeSerialLinkTransport } from '../../src/transport/node-transports/node-serial-link.js';
import type { SerialPortLike } from '../../src/types/aquaclean-types.js';

class FakePort extends EventEmitter implements SerialPortLike {
  isOpen = false;
  written: Buffer[] = [];
  openError: Error | null = null;
  drainError: Error | null = null;

  open(callback: (err: Error | null) => void): void {
    if (!this.openError) this.isOpen = true;
    callback(this.openError);
  }

  close(callback: (err: Error | null) => void): void {
    this.isOpen = false;
    callback(null);
  }

  write(data: Buffer): boolean {
    this.written.push(data);
    return true;
  }

  drain(callback: (err: Error | null) => void): void {
    callback(this.drainError);
  }
}

describe('NodeSerialLinkTransport', () => {
  let port: FakePort;
  let opened: { path: string; baudRate: number }[];

  const createTransport = (baudRate?: number): NodeSerialLinkTransport =>
    new NodeSerialLinkTransport('/dev/ttyTEST', {
      baudRate,
      maxPacketSize: 32,
      portFactory: (path, rate) => {
        opened.push({ path, baudRate: rate });
        return port;
      },
    });

  beforeEach(() => {
    port = new FakePort();
    opened = [];
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('opens the port with the configured baud rate', async () => {
    const transport = createTransport();
    await transport.connect();
    expect(transport.isOpen).toBe(true);
    expect(opened).toEqual([{ path: '/dev/ttyTEST', baudRate: 115200 }]);
  });

  it('rejects an invalid baud rate before opening', async () => {
    const transport = createTransport(42);
    await expect(transport.connect()).rejects.toThrow(ConfigError);
    expect(opened).toEqual([]);
  });

  it('wraps open failures', async () => {
    port.openError = new Error('busy');
    const transport = createTransport();
    await expect(transport.connect()).rejects.toThrow('Cannot open /dev/ttyTEST: busy');
    await expect(transport.connect()).rejects.toBeInstanceOf(LinkConnectionError);
    expect(transport.isOpen).toBe(false);
  });

  it('writes packets and waits for drain', async () => {
    const transport = createTransport();
    await transport.connect();
    await transport.write(Uint8Array.of(0x01, 0x00));
    expect(port.written).toEqual([Buffer.from([0x01, 0x00])]);
  });

  it('refuses to write when closed', async () => {
    const transport = createTransport();
    await expect(transport.write(Uint8Array.of(0x01, 0x00))).rejects.toThrow(NotConnectedError);
  });

  it('reports drain errors as LinkWriteError', async () => {
    const transport = createTransport();
    await transport.connect();
    port.drainError = new Error('unplugged');
    await expect(transport.write(Uint8Array.of(0x01, 0x00))).rejects.toThrow(LinkWriteError);
  });

  it('delivers delimited packets to subscribers', async () => {
    const transport = createTransport();
    const received: Uint8Array[] = [];
    const unsubscribe = transport.subscribe(packet => received.push(packet));
    await transport.connect();

    port.emit('data', Buffer.from([0x02, 0x16]));
    port.emit('data', Buffer.from([0x00, 0x01, 0x00]));
    expect(received).toEqual([Uint8Array.of(0x02, 0x16, 0x00), Uint8Array.of(0x01, 0x00)]);

    unsubscribe();
    port.emit('data', Buffer.from([0x01, 0x00]));
    expect(received).toHaveLength(2);
  });

  it('keeps delivering when a subscriber throws', async () => {
    const transport = createTransport();
    const received: Uint8Array[] = [];
    transport.subscribe(() => {
      throw new Error('bad handler');
    });
    transport.subscribe(packet => received.push(packet));
    await transport.connect();

    port.emit('data', Buffer.from([0x01, 0x00]));
    expect(received).toHaveLength(1);
  });

  it('marks the link closed when the port closes', async () => {
    const transport = createTransport();
    await transport.connect();
    port.emit('close');
    expect(transport.isOpen).toBe(false);
    expect(port.listenerCount('data')).toBe(0);
  });

  it('disconnect closes the port and removes listeners', async () => {
    const transport = createTransport();
    await transport.connect();
    await transport.disconnect();
    expect(port.isOpen).toBe(false);
    expect(transport.isOpen).toBe(false);
    expect(port.listenerCount('data')).toBe(0);
  });
});
