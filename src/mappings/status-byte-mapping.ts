// src/mappings/status-byte-mapping.ts

import type { StatusByteMapping, StatusMappingVersion } from '../types/aquaclean-types.js';

/**
 * Positional meaning of the status bytes returned for the system-status
 * request. Only the first six bytes are in contract.
 */
export const STATUS_BYTE_MAPPINGS: Readonly<Record<StatusMappingVersion, StatusByteMapping>> = {
  v1: [
    'analShowerRunning',
    'ladyShowerRunning',
    'dryerRunning',
    'userIsSitting',
    'descalingNeeded',
    null,
  ],
};

export const MAX_STATUS_BYTES = 6;

export function isStatusMappingVersion(value: unknown): value is StatusMappingVersion {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(STATUS_BYTE_MAPPINGS, value);
}
