// src/messages/device-identification.ts

import { DEVICE_IDENTIFICATION_IDS } from '../constants/constants.js';
import type { DeviceIdentification } from '../types/aquaclean-types.js';

const SAP_OFFSET = 0;
const SERIAL_OFFSET = 2;
const FIRMWARE_OFFSET = 4;
const FIRMWARE_SIZE = 4;
const DESCRIPTION_OFFSET = 8;

const textDecoder = new TextDecoder('utf-8', { fatal: false });

export function emptyDeviceIdentification(): DeviceIdentification {
  return {
    sapNumber: '',
    serialNumber: '',
    productionDate: '',
    description: '',
    firmwareVersion: '',
    initialOperationDate: '',
  };
}

const REPLACEMENT_CHAR_BYTES = [0xef, 0xbf, 0xbd] as const;

/**
 * Decodes UTF-8 with invalid sequences dropped rather than replaced. An
 * encoded U+FFFD in the input is kept: EF is never a continuation byte, so
 * each EF BF BD run is a whole character and the input is split around it.
 */
function decodeUtf8DroppingInvalid(bytes: Uint8Array): string {
  const parts: string[] = [];
  let start = 0;
  for (let i = 0; i + 2 < bytes.length; i++) {
    if (
      bytes[i] === REPLACEMENT_CHAR_BYTES[0] &&
      bytes[i + 1] === REPLACEMENT_CHAR_BYTES[1] &&
      bytes[i + 2] === REPLACEMENT_CHAR_BYTES[2]
    ) {
      parts.push(textDecoder.decode(bytes.subarray(start, i)).replace(/\uFFFD/g, ''));
      start = i + 3;
      i += 2;
    }
  }
  parts.push(textDecoder.decode(bytes.subarray(start)).replace(/\uFFFD/g, ''));
  return parts.join('\uFFFD');
}

/**
 * Builds the identification request: six data-point ids, 16-bit little-endian.
 */
export function buildDeviceIdentificationRequest(): Uint8Array {
  const buffer = new ArrayBuffer(DEVICE_IDENTIFICATION_IDS.length * 2);
  const view = new DataView(buffer);
  DEVICE_IDENTIFICATION_IDS.forEach((id, index) => view.setUint16(index * 2, id, true));
  return new Uint8Array(buffer);
}

/**
 * Parses an identification response.
 *
 * Layout: u16 SAP number, u16 serial number, four firmware version bytes,
 * then a UTF-8 description padded with NULs. Short responses fill only the
 * fields they cover; the rest stay empty.
 */
export function parseDeviceIdentification(payload: Uint8Array): DeviceIdentification {
  const result = emptyDeviceIdentification();
  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);

  if (payload.length >= SAP_OFFSET + 2) {
    result.sapNumber = `SAP-${view.getUint16(SAP_OFFSET, true)}`;
  }
  if (payload.length >= SERIAL_OFFSET + 2) {
    result.serialNumber = `SN-${String(view.getUint16(SERIAL_OFFSET, true)).padStart(8, '0')}`;
  }
  if (payload.length >= FIRMWARE_OFFSET + FIRMWARE_SIZE) {
    const parts = Array.from(payload.subarray(FIRMWARE_OFFSET, FIRMWARE_OFFSET + FIRMWARE_SIZE));
    result.firmwareVersion = `FW-${parts.join('.')}`;
  }
  if (payload.length > DESCRIPTION_OFFSET) {
    result.description = decodeUtf8DroppingInvalid(payload.subarray(DESCRIPTION_OFFSET)).replace(
      /\0+$/,
      ''
    );
  }

  return result;
}
