// src/messages/system-parameters.ts

import { SYSTEM_STATUS_IDS } from '../constants/constants.js';
import { MAX_STATUS_BYTES, STATUS_BYTE_MAPPINGS } from '../mappings/status-byte-mapping.js';
import type { StatusByteMapping, SystemParameters } from '../types/aquaclean-types.js';

export function defaultSystemParameters(): SystemParameters {
  return {
    userIsSitting: false,
    analShowerRunning: false,
    ladyShowerRunning: false,
    dryerRunning: false,
    lidPosition: false,
    orientationLightState: 0,
    waterTemperature: 37,
    seatHeating: false,
    nightLight: false,
    sprayIntensity: 3,
    sprayPosition: 3,
    oscillatingSpray: false,
    descalingNeeded: false,
    filterReplacementNeeded: false,
    powerConsumption: 0,
    waterPressure: 0,
    autoFlush: true,
    barrierFreeMode: false,
    activeUserProfile: 1,
  };
}

/**
 * Builds the system-status request: six status data-point ids, 16-bit little-endian.
 */
export function buildSystemStatusRequest(): Uint8Array {
  const buffer = new ArrayBuffer(SYSTEM_STATUS_IDS.length * 2);
  const view = new DataView(buffer);
  SYSTEM_STATUS_IDS.forEach((id, index) => view.setUint16(index * 2, id, true));
  return new Uint8Array(buffer);
}

/**
 * Parses a status response positionally. Each mapped byte is a flag
 * (non-zero means set); unmapped and trailing bytes are ignored, missing
 * bytes leave the default.
 */
export function parseSystemParameters(
  payload: Uint8Array,
  mapping: StatusByteMapping = STATUS_BYTE_MAPPINGS.v1
): SystemParameters {
  const result = defaultSystemParameters();
  const count = Math.min(payload.length, mapping.length, MAX_STATUS_BYTES);

  for (let index = 0; index < count; index++) {
    const field = mapping[index];
    if (field !== null) {
      result[field] = payload[index] > 0;
    }
  }

  return result;
}
