// src/constants/constants.ts

/**
 * Frame kinds carried in the upper three bits of the link frame header.
 */
export enum FrameKind {
  /** Whole message in one frame */
  SINGLE = 0,
  /** One fragment of a multi-frame message, carries an explicit length byte */
  CONSECUTIVE = 2,
  /** Link-level acknowledgement, never carries application data */
  FLOW_CONTROL = 3,
}

export const FRAME_KIND_NAMES: Record<FrameKind, string> = {
  [FrameKind.SINGLE]: 'Single',
  [FrameKind.CONSECUTIVE]: 'Consecutive',
  [FrameKind.FLOW_CONTROL]: 'FlowControl',
};

// Header layout: [kind:3][tag:1][transaction:3][flag:1]
export const HEADER_KIND_SHIFT = 5;
export const HEADER_TAG_SHIFT = 4;
export const HEADER_TRANSACTION_SHIFT = 1;
export const HEADER_KIND_MASK = 0x07;
export const HEADER_TRANSACTION_MASK = 0x07;
export const HEADER_FLAG_MASK = 0x01;

export const MAX_TRANSACTION = 7;
export const MAX_CONSECUTIVE_PAYLOAD = 0xff;
/** Transaction field of a Consecutive frame numbers its fragment, so eight is the ceiling */
export const MAX_FRAGMENTS = 8;

// COBS
export const COBS_DELIMITER = 0x00;
export const COBS_MAX_CODE = 0xff;
/** Code byte plus trailing delimiter for any frame up to 254 bytes */
export const COBS_OVERHEAD = 2;

export const DEFAULT_MTU = 20;
export const DEFAULT_RESPONSE_TIMEOUT = 10_000;
export const DEFAULT_PROBE_TIMEOUT = 3_000;
export const DEFAULT_POLL_INTERVAL = 15_000;

/**
 * Fixed transaction number per outbound request kind.
 */
export enum RequestTransaction {
  COMMAND = 0,
  READ_DATA_POINT = 1,
  WRITE_DATA_POINT = 2,
  DEVICE_IDENTIFICATION = 3,
  SYSTEM_STATUS = 4,
}

/** Marker byte after the data-point id: 0x00 read, 0x01 write */
export const DATA_POINT_READ_MARKER = 0x00;
export const DATA_POINT_WRITE_MARKER = 0x01;

/**
 * Symbolic actions the appliance executes without a payload.
 */
export enum HighLevelCommand {
  TOGGLE_ANAL_SHOWER = 0,
  TOGGLE_LADY_SHOWER = 1,
  TOGGLE_DRYER = 2,
  START_CLEANING_DEVICE = 4,
  EXECUTE_NEXT_CLEANING_STEP = 5,
  PREPARE_DESCALING = 6,
  CONFIRM_DESCALING = 7,
  CANCEL_DESCALING = 8,
  POSTPONE_DESCALING = 9,
  TOGGLE_LID_POSITION = 10,
  TOGGLE_ORIENTATION_LIGHT = 20,
  START_LID_POSITION_CALIBRATION = 33,
  LID_POSITION_OFFSET_SAVE = 34,
  LID_POSITION_OFFSET_INCREMENT = 35,
  LID_POSITION_OFFSET_DECREMENT = 36,
  TRIGGER_FLUSH_MANUALLY = 37,
  RESET_FILTER_COUNTER = 47,
}

/**
 * Data-point ids the library addresses directly. The full catalogue
 * lives in data/data-points.json.
 */
export const DataPointId = {
  DEVICE_SERIES: 0,
  DEVICE_VARIANT: 1,
  DEVICE_NUMBER: 2,
  PCB_SERIAL_NUMBER: 5,
  FW_RS_VERSION: 8,
  BLUETOOTH_ID: 11,
  ODOUR_EXTRACTION_FAN: 20,
  ORIENTATION_LIGHT_MODE: 44,
  FLUSH_STATUS: 142,
  LIGHTING_SET_BRIGHTNESS: 340,
  LED_COLOR: 382,
  MAINTENANCE_STATUS: 475,
  ANAL_SHOWER_STATUS: 564,
  SET_ACTIVE_ANAL_SPRAY_INTENSITY: 570,
  SET_ACTIVE_ANAL_SPRAY_ARM_POSITION: 572,
  SET_ACTIVE_SHOWER_WATER_TEMPERATURE: 574,
  DESCALING_STATUS: 585,
  LADY_SHOWER_STATUS: 872,
  DRYING_STATUS: 875,
} as const;

export type KnownDataPointName = keyof typeof DataPointId;

/** Ids requested by the device-identification request, in wire order */
export const DEVICE_IDENTIFICATION_IDS: readonly number[] = [
  DataPointId.DEVICE_SERIES,
  DataPointId.DEVICE_VARIANT,
  DataPointId.DEVICE_NUMBER,
  DataPointId.PCB_SERIAL_NUMBER,
  DataPointId.FW_RS_VERSION,
  DataPointId.BLUETOOTH_ID,
];

/** Ids requested by the system-status request, in wire order */
export const SYSTEM_STATUS_IDS: readonly number[] = [
  DataPointId.ANAL_SHOWER_STATUS,
  DataPointId.LADY_SHOWER_STATUS,
  DataPointId.DRYING_STATUS,
  DataPointId.FLUSH_STATUS,
  DataPointId.DESCALING_STATUS,
  DataPointId.MAINTENANCE_STATUS,
];

export type FeatureName =
  | 'ladyShower'
  | 'dryer'
  | 'orientationLight'
  | 'odourExtraction'
  | 'descaling'
  | 'ambientLight';

/** Data point read to decide whether a feature is present on this variant */
export const FEATURE_PROBES: Readonly<Record<FeatureName, number>> = {
  ladyShower: DataPointId.LADY_SHOWER_STATUS,
  dryer: DataPointId.DRYING_STATUS,
  orientationLight: DataPointId.ORIENTATION_LIGHT_MODE,
  odourExtraction: DataPointId.ODOUR_EXTRACTION_FAN,
  descaling: DataPointId.DESCALING_STATUS,
  ambientLight: DataPointId.LED_COLOR,
};

// Convenience setter ranges
export const WATER_TEMPERATURE_RANGE = { min: 34, max: 40 } as const;
export const SPRAY_INTENSITY_RANGE = { min: 1, max: 5 } as const;
export const SPRAY_POSITION_RANGE = { min: 1, max: 5 } as const;
export const BRIGHTNESS_RANGE = { min: 0, max: 100 } as const;
