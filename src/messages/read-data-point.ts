// src/messages/read-data-point.ts

import { DATA_POINT_READ_MARKER } from '../constants/constants.js';
import { assertIntegerInRange, fromBytesLE } from '../utils/utils.js';

const PAYLOAD_SIZE = 3;
const ECHO_SIZE = 3;
const MAX_DATA_POINT_ID = 0xffff;

/**
 * Строит запрос чтения точки данных: id (LE) + 0x00.
 * @param id - id точки данных
 * @throws RangeError Если id вне 0..65535
 */
export function buildReadDataPointRequest(id: number): Uint8Array {
  assertIntegerInRange('Data point id', id, 0, MAX_DATA_POINT_ID);

  const buffer = new ArrayBuffer(PAYLOAD_SIZE);
  const view = new DataView(buffer);
  view.setUint16(0, id, true);
  view.setUint8(2, DATA_POINT_READ_MARKER);

  return new Uint8Array(buffer);
}

/**
 * Extracts the value bytes of a read response. A leading echo of the
 * request (`id` + 0x00) is removed when present.
 */
export function parseReadDataPointResponse(id: number, payload: Uint8Array): Uint8Array {
  if (
    payload.length >= ECHO_SIZE &&
    fromBytesLE(payload[0], payload[1]) === id &&
    payload[2] === DATA_POINT_READ_MARKER
  ) {
    return payload.slice(ECHO_SIZE);
  }
  return payload.slice();
}
