// src/config/client-options.ts

import {
  DEFAULT_MTU,
  DEFAULT_PROBE_TIMEOUT,
  DEFAULT_RESPONSE_TIMEOUT,
} from '../constants/constants.js';
import { ConfigError } from '../errors.js';
import {
  isStatusMappingVersion,
  MAX_STATUS_BYTES,
  STATUS_BYTE_MAPPINGS,
} from '../mappings/status-byte-mapping.js';
import type {
  AquaCleanClientOptions,
  BooleanParameterKey,
  LogLevel,
  ReassemblyPolicy,
  ResolvedClientOptions,
  StatusByteMapping,
} from '../types/aquaclean-types.js';
import { defaultSystemParameters } from '../messages/system-parameters.js';

// Smallest MTU at which the 12-byte identification and status requests fit in eight fragments
const MIN_MTU = 6;
const MAX_MTU = 255;
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];
const POLICIES: readonly ReassemblyPolicy[] = ['eager', 'final-flag'];

function positiveInteger(name: string, value: number | undefined, fallback: number): number {
  const resolved = value ?? fallback;
  if (!Number.isInteger(resolved) || resolved <= 0) {
    throw new ConfigError(`${name} must be a positive integer, got ${resolved}`);
  }
  return resolved;
}

function isBooleanParameter(key: string): key is BooleanParameterKey {
  const defaults = defaultSystemParameters();
  return Object.entries(defaults).some(([name, value]) => name === key && typeof value === 'boolean');
}

function resolveStatusMapping(
  mapping: AquaCleanClientOptions['statusMapping']
): StatusByteMapping {
  if (mapping === undefined) return STATUS_BYTE_MAPPINGS.v1;
  if (typeof mapping === 'string') {
    if (!isStatusMappingVersion(mapping)) {
      throw new ConfigError(`Unknown status mapping version: ${String(mapping)}`);
    }
    return STATUS_BYTE_MAPPINGS[mapping];
  }
  if (mapping.length > MAX_STATUS_BYTES) {
    throw new ConfigError(`Status mapping covers at most ${MAX_STATUS_BYTES} bytes`);
  }
  for (const field of mapping) {
    if (field !== null && !isBooleanParameter(field)) {
      throw new ConfigError(`Status mapping field ${String(field)} is not a boolean parameter`);
    }
  }
  return [...mapping];
}

/**
 * Fills in defaults and validates client options.
 * @throws ConfigError
 */
export function resolveClientOptions(options: AquaCleanClientOptions = {}): ResolvedClientOptions {
  const mtu = options.mtu ?? DEFAULT_MTU;
  if (!Number.isInteger(mtu) || mtu < MIN_MTU || mtu > MAX_MTU) {
    throw new ConfigError(`MTU must be an integer ${MIN_MTU}-${MAX_MTU}, got ${mtu}`);
  }

  const reassembly = options.reassembly ?? 'eager';
  if (!POLICIES.includes(reassembly)) {
    throw new ConfigError(`Unknown reassembly policy: ${String(reassembly)}`);
  }

  const logLevel = options.logLevel ?? 'error';
  if (!LOG_LEVELS.includes(logLevel)) {
    throw new ConfigError(`Unknown log level: ${String(logLevel)}`);
  }

  return {
    responseTimeout: positiveInteger('responseTimeout', options.responseTimeout, DEFAULT_RESPONSE_TIMEOUT),
    probeTimeout: positiveInteger('probeTimeout', options.probeTimeout, DEFAULT_PROBE_TIMEOUT),
    mtu,
    reassembly,
    statusMapping: resolveStatusMapping(options.statusMapping),
    logLevel,
    diagnostics: options.diagnostics ?? false,
  };
}
