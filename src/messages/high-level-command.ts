// src/messages/high-level-command.ts

import { HighLevelCommand } from '../constants/constants.js';
import { assertIntegerInRange, fromBytesLE } from '../utils/utils.js';

const PAYLOAD_SIZE = 2;
const MAX_COMMAND_ID = 0xffff;

/**
 * Строит запрос высокоуровневой команды: 2-байтовый id, little-endian.
 * @param command - id команды
 * @throws RangeError Если id вне 0..65535
 */
export function buildCommandRequest(command: HighLevelCommand | number): Uint8Array {
  assertIntegerInRange('Command id', command, 0, MAX_COMMAND_ID);

  const buffer = new ArrayBuffer(PAYLOAD_SIZE);
  const view = new DataView(buffer);
  view.setUint16(0, command, true);

  return new Uint8Array(buffer);
}

/**
 * Reads the command id echoed at the start of an acknowledgement, if any.
 */
export function parseCommandAcknowledgement(payload: Uint8Array): number | undefined {
  if (payload.length < PAYLOAD_SIZE) return undefined;
  return fromBytesLE(payload[0], payload[1]);
}
