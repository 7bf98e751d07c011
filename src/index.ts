// src/index.ts

export { default as AquaCleanClient } from './client.js';
export { default as Logger } from './logger.js';
export { default as DeviceEmulator } from './device-emulator/device-emulator.js';
export type { EmulatedRequest } from './device-emulator/device-emulator.js';

export * from './constants/constants.js';
export * from './errors.js';
export * from './framers/cobs.js';
export * from './framers/link-frame.js';
export * from './framers/frame-reassembler.js';
export * from './packet-builder.js';
export * from './correlator.js';
export * from './device-state.js';
export * from './status-poller.js';
export * from './catalogue/data-point-catalogue.js';
export * from './config/client-options.js';
export * from './mappings/status-byte-mapping.js';
export * from './messages/high-level-command.js';
export * from './messages/read-data-point.js';
export * from './messages/write-data-point.js';
export * from './messages/device-identification.js';
export * from './messages/system-parameters.js';
export * from './messages/data-point-value.js';
export * from './transport/delimiter-splitter.js';
export * from './transport/node-transports/node-serial-link.js';
export * from './utils/diagnostics.js';
export * from './types/aquaclean-types.js';
