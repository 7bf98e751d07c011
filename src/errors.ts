// src/errors.ts

import { toHex } from './utils/utils.js';

/**
 * Base class for all errors raised by the library
 */
export class AquaCleanError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AquaCleanError';
  }
}

// --- Errors for Link Framing ---

/**
 * Base class for packets that cannot be turned into a frame.
 * The notification pipeline discards such packets.
 */
export class FramingError extends AquaCleanError {
  constructor(message: string = 'Invalid link packet') {
    super(message);
    this.name = 'FramingError';
  }
}

/**
 * Error class for byte-stuffed input that does not decode
 */
export class CobsDecodeError extends FramingError {
  rawData: Uint8Array;

  constructor(reason: string, rawData: Uint8Array) {
    super(`COBS decode failed: ${reason} (${toHex(rawData)})`);
    this.name = 'CobsDecodeError';
    this.rawData = rawData;
  }
}

/**
 * Error class for frames whose header or length byte does not fit the buffer
 */
export class FrameParseError extends FramingError {
  rawData: Uint8Array;

  constructor(reason: string, rawData: Uint8Array) {
    super(`Malformed link frame: ${reason} (${toHex(rawData)})`);
    this.name = 'FrameParseError';
    this.rawData = rawData;
  }
}

/**
 * Error class for a message too large to fragment
 */
export class FragmentationError extends FramingError {
  constructor(length: number, maxLength: number) {
    super(`Message of ${length} bytes exceeds fragmentation limit of ${maxLength} bytes`);
    this.name = 'FragmentationError';
  }
}

// --- Errors for Transport ---

/**
 * Error class for a failed link write
 */
export class LinkWriteError extends AquaCleanError {
  constructor(message: string = 'Link write failed', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkWriteError';
  }
}

/**
 * Error class for a link that cannot be opened
 */
export class LinkConnectionError extends AquaCleanError {
  constructor(message: string = 'Link connection failed', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LinkConnectionError';
  }
}

/**
 * Error class for operations on a link that is not open
 */
export class NotConnectedError extends AquaCleanError {
  constructor(message: string = 'Link is not connected') {
    super(message);
    this.name = 'NotConnectedError';
  }
}

// --- Errors for Configuration and Catalogue ---

/**
 * Error class for invalid client or transport options
 */
export class ConfigError extends AquaCleanError {
  constructor(message: string = 'Invalid configuration') {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Error class for a data-point catalogue that fails validation
 */
export class CatalogueError extends AquaCleanError {
  constructor(message: string) {
    super(message);
    this.name = 'CatalogueError';
  }
}

/**
 * Error class for a read or write the catalogue forbids
 */
export class DataPointAccessError extends AquaCleanError {
  dataPointId: number;
  operation: 'read' | 'write';

  constructor(dataPointId: number, operation: 'read' | 'write', access: string) {
    super(`Data point ${dataPointId} does not allow ${operation} (access: ${access})`);
    this.name = 'DataPointAccessError';
    this.dataPointId = dataPointId;
    this.operation = operation;
  }
}

/**
 * Error class for values that do not fit a data-point encoding
 */
export class DataPointEncodingError extends AquaCleanError {
  constructor(encoding: string, reason: string) {
    super(`Cannot convert value for ${encoding} data point: ${reason}`);
    this.name = 'DataPointEncodingError';
  }
}

// --- Errors for Polling ---

/**
 * Error class for status poller misuse
 */
export class PollingError extends AquaCleanError {
  constructor(message: string) {
    super(message);
    this.name = 'PollingError';
  }
}
