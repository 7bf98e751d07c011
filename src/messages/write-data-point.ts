// src/messages/write-data-point.ts

import { DATA_POINT_WRITE_MARKER } from '../constants/constants.js';
import { assertIntegerInRange } from '../utils/utils.js';

const HEADER_SIZE = 3;
const MAX_DATA_POINT_ID = 0xffff;

/**
 * Строит запрос записи точки данных: id (LE) + 0x01 + байты значения.
 * @param id - id точки данных
 * @param value - закодированное значение, обычно 1-4 байта
 * @throws RangeError Если id вне 0..65535 или значение пустое
 */
export function buildWriteDataPointRequest(id: number, value: Uint8Array): Uint8Array {
  assertIntegerInRange('Data point id', id, 0, MAX_DATA_POINT_ID);
  if (value.length === 0) {
    throw new RangeError('Data point value must contain at least one byte');
  }

  const out = new Uint8Array(HEADER_SIZE + value.length);
  const view = new DataView(out.buffer);
  view.setUint16(0, id, true);
  view.setUint8(2, DATA_POINT_WRITE_MARKER);
  out.set(value, HEADER_SIZE);

  return out;
}
