// test/messages/requests.test.ts

import { describe, expect, it } from 'vitest';
import { HighLevelCommand } from '../../src/constants/constants.js';
import {
  buildCommandRequest,
  parseCommandAcknowledgement,
} from '../../src/messages/high-level-command.js';
import {
  buildReadDataPointRequest,
  parseReadDataPointResponse,
} from '../../src/messages/read-data-point.js';
import { buildWriteDataPointRequest } from '../../src/messages/write-data-point.js';
import { buildDeviceIdentificationRequest } from '../../src/messages/device-identification.js';
import { buildSystemStatusRequest } from '../../src/messages/system-parameters.js';
import { buildPacket, buildRequestPackets, parsePacket } from '../../src/packet-builder.js';
import { FrameKind } from '../../src/constants/constants.js';

const bytes = (...values: number[]): Uint8Array => Uint8Array.from(values);

describe('high-level commands', () => {
  it('encodes the command id as 16-bit little-endian', () => {
    expect(buildCommandRequest(HighLevelCommand.TOGGLE_LID_POSITION)).toEqual(bytes(0x0a, 0x00));
    expect(buildCommandRequest(HighLevelCommand.TRIGGER_FLUSH_MANUALLY)).toEqual(bytes(0x25, 0x00));
    expect(buildCommandRequest(0x1234)).toEqual(bytes(0x34, 0x12));
  });

  it('rejects ids that do not fit 16 bits', () => {
    expect(() => buildCommandRequest(0x10000)).toThrow(RangeError);
    expect(() => buildCommandRequest(-1)).toThrow(RangeError);
  });

  it('reads the echoed command id from an acknowledgement', () => {
    expect(parseCommandAcknowledgement(bytes(0x0a, 0x00, 0x05))).toBe(10);
    expect(parseCommandAcknowledgement(bytes(0x0a))).toBeUndefined();
  });
});

describe('data-point requests', () => {
  it('builds a read request as id plus 0x00', () => {
    expect(buildReadDataPointRequest(340)).toEqual(bytes(0x54, 0x01, 0x00));
  });

  it('builds a write request as id plus 0x01 plus value', () => {
    expect(buildWriteDataPointRequest(340, bytes(0x4b))).toEqual(bytes(0x54, 0x01, 0x01, 0x4b));
    expect(buildWriteDataPointRequest(0x0134, bytes(0x4b))).toEqual(bytes(0x34, 0x01, 0x01, 0x4b));
  });

  it('rejects an empty write value', () => {
    expect(() => buildWriteDataPointRequest(340, bytes())).toThrow(RangeError);
  });

  it('rejects ids outside 16 bits', () => {
    expect(() => buildReadDataPointRequest(70000)).toThrow('Data point id must be 0-65535, got 70000');
  });

  it('strips an echoed read request from the response', () => {
    expect(parseReadDataPointResponse(340, bytes(0x54, 0x01, 0x00, 0x2a))).toEqual(bytes(0x2a));
    expect(parseReadDataPointResponse(340, bytes(0x2a, 0x00))).toEqual(bytes(0x2a, 0x00));
    expect(parseReadDataPointResponse(341, bytes(0x54, 0x01, 0x00, 0x2a))).toEqual(
      bytes(0x54, 0x01, 0x00, 0x2a)
    );
  });
});

describe('bulk requests', () => {
  it('lists the identification data points', () => {
    expect(buildDeviceIdentificationRequest()).toEqual(
      bytes(0x00, 0x00, 0x01, 0x00, 0x02, 0x00, 0x05, 0x00, 0x08, 0x00, 0x0b, 0x00)
    );
  });

  it('lists the status data points', () => {
    expect(buildSystemStatusRequest()).toEqual(
      bytes(0x34, 0x02, 0x68, 0x03, 0x6b, 0x03, 0x8e, 0x00, 0x49, 0x02, 0xdb, 0x01)
    );
  });
});

describe('packet builder', () => {
  it('wraps a request in a tagged Single frame and stuffs it', () => {
    const packets = buildRequestPackets(bytes(0x54, 0x01, 0x01, 0x4b), 2, 20);
    expect(packets).toEqual([bytes(0x06, 0x14, 0x54, 0x01, 0x01, 0x4b, 0x00)]);
  });

  it('stuffs zeros inside the frame', () => {
    const packets = buildRequestPackets(bytes(0x0a, 0x00), 0, 20);
    expect(packets).toEqual([bytes(0x03, 0x10, 0x0a, 0x01, 0x00)]);
  });

  it('splits requests that exceed the MTU', () => {
    const packets = buildRequestPackets(new Uint8Array(30).fill(7), 2, 20);
    expect(packets).toHaveLength(2);
    for (const packet of packets) {
      expect(packet.length).toBeLessThanOrEqual(20);
    }
    expect(parsePacket(packets[0]).kind).toBe(FrameKind.CONSECUTIVE);
    expect(parsePacket(packets[1]).flag).toBe(1);
  });

  it('parses what it builds', () => {
    const frame = {
      kind: FrameKind.SINGLE,
      hasTag: true,
      transaction: 4,
      flag: 0,
      payload: bytes(1, 0, 2),
    } as const;
    expect(parsePacket(buildPacket(frame))).toEqual(frame);
  });
});
