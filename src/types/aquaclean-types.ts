// src/types/aquaclean-types.ts

import type { FeatureName, FrameKind } from '../constants/constants.js';

// !=============================================================================
// ! Link frames
// !=============================================================================

/** One physical packet after byte-stuffing has been removed */
export interface LinkFrame {
  kind: FrameKind;
  /** Message-type byte present */
  hasTag: boolean;
  /** 0..7; fragment index for Consecutive frames */
  transaction: number;
  flag: 0 | 1;
  payload: Uint8Array;
}

/**
 * `eager` assembles on every Consecutive frame, `final-flag` waits for a
 * fragment with `flag = 1`.
 */
export type ReassemblyPolicy = 'eager' | 'final-flag';

export interface FragmentOptions {
  /** Largest frame in bytes before byte-stuffing */
  maxFrameSize: number;
  /** Transaction number of a Single frame */
  transaction: number;
  hasTag?: boolean;
}

// !=============================================================================
// ! Transport boundary
// !=============================================================================

export type NotificationHandler = (data: Uint8Array) => void;

/**
 * Byte-oriented link below the protocol layer. Inbound packets are pushed to
 * subscribers in receipt order; each one is a complete byte-stuffed frame.
 */
export interface LinkTransport {
  readonly isOpen: boolean;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /** Rejects when the packet cannot be written */
  write(packet: Uint8Array): Promise<void>;
  /** Returns an unsubscribe function */
  subscribe(handler: NotificationHandler): () => void;
}

// !=============================================================================
// ! Data points
// !=============================================================================

export type DataPointAccess = 'Read' | 'Write' | 'ReadWrite';

export type DataPointEncoding =
  | 'Binary'
  | 'Boolean'
  | 'Enumerated'
  | 'Percent'
  | 'Counter'
  | 'Text'
  | 'TimestampUtc'
  | 'Signed';

export interface DataPointDefinition {
  name: string;
  id: number;
  access: DataPointAccess;
  encoding: DataPointEncoding;
  /** Mapping observed on some variants only */
  provisional: boolean;
}

export type DecodedValue = boolean | number | string | Date | Uint8Array;

/** Result of a data-point read */
export interface DataPointValue {
  id: number;
  raw: Uint8Array;
  /** Present when the id is in the catalogue */
  definition?: DataPointDefinition;
  /** Present when the id is in the catalogue and the bytes fit its encoding */
  value?: DecodedValue;
}

// !=============================================================================
// ! Application records
// !=============================================================================

export interface DeviceIdentification {
  sapNumber: string;
  serialNumber: string;
  productionDate: string;
  description: string;
  firmwareVersion: string;
  initialOperationDate: string;
}

export interface SystemParameters {
  userIsSitting: boolean;
  analShowerRunning: boolean;
  ladyShowerRunning: boolean;
  dryerRunning: boolean;
  lidPosition: boolean;
  orientationLightState: number;
  waterTemperature: number;
  seatHeating: boolean;
  nightLight: boolean;
  sprayIntensity: number;
  sprayPosition: number;
  oscillatingSpray: boolean;
  descalingNeeded: boolean;
  filterReplacementNeeded: boolean;
  powerConsumption: number;
  waterPressure: number;
  autoFlush: boolean;
  barrierFreeMode: boolean;
  activeUserProfile: number;
}

export type BooleanParameterKey = {
  [K in keyof SystemParameters]: SystemParameters[K] extends boolean ? K : never;
}[keyof SystemParameters];

/** Positional interpretation of status bytes; `null` marks an unmapped byte */
export type StatusByteMapping = readonly (BooleanParameterKey | null)[];

export type StatusMappingVersion = 'v1';

/** Confirmed snapshot merged with tentative overrides */
export interface DeviceStateView {
  parameters: SystemParameters;
  /** Fields currently overridden by an unconfirmed local assumption */
  tentative: Partial<SystemParameters>;
  identification?: DeviceIdentification;
  lastConfirmedAt: number | null;
}

export type FeatureMap = Record<FeatureName, boolean>;

// !=============================================================================
// ! Options
// !=============================================================================

export interface AquaCleanClientOptions {
  responseTimeout?: number;
  probeTimeout?: number;
  mtu?: number;
  reassembly?: ReassemblyPolicy;
  statusMapping?: StatusMappingVersion | StatusByteMapping;
  logLevel?: LogLevel;
  diagnostics?: boolean;
}

export interface ResolvedClientOptions {
  responseTimeout: number;
  probeTimeout: number;
  mtu: number;
  reassembly: ReassemblyPolicy;
  statusMapping: StatusByteMapping;
  logLevel: LogLevel;
  diagnostics: boolean;
}

export interface StatusPollerOptions {
  interval?: number;
  /** Run the first poll on start instead of after one interval */
  immediate?: boolean;
  onData?: (parameters: SystemParameters) => void;
  onNoResponse?: () => void;
  onError?: (error: Error) => void;
}

export interface StatusPollerStats {
  totalRuns: number;
  successes: number;
  noResponses: number;
  failures: number;
  lastRunTime: number | null;
  lastError: Error | null;
}

/** Subset of the serialport API used by the serial link */
export interface SerialPortLike {
  readonly isOpen: boolean;
  open(callback: (err: Error | null) => void): void;
  close(callback: (err: Error | null) => void): void;
  write(data: Buffer): boolean;
  drain(callback: (err: Error | null) => void): void;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  removeAllListeners(event?: string): unknown;
}

export type SerialPortFactory = (path: string, baudRate: number) => SerialPortLike;

export interface NodeSerialLinkOptions {
  baudRate?: number;
  /** Bytes buffered without a delimiter before the buffer is dropped */
  maxPacketSize?: number;
  portFactory?: SerialPortFactory;
}

export interface DeviceEmulatorOptions {
  /** Delay before a reply is pushed to subscribers */
  responseDelay?: number;
  /** Split replies longer than this into Consecutive frames */
  maxFrameSize?: number;
  /** Mark the last reply fragment with flag = 1 */
  markFinalFragment?: boolean;
  identification?: Uint8Array;
  statusBytes?: Uint8Array;
  dataPoints?: Record<number, Uint8Array>;
  /** Command ids acknowledged; every command when omitted */
  supportedCommands?: number[];
  loggerEnabled?: boolean;
}

export interface LinkDiagnosticsStats {
  uptimeSeconds: number;
  totalRequests: number;
  responses: number;
  timeouts: number;
  superseded: number;
  framingErrors: number;
  unsolicitedMessages: number;
  bytesSent: number;
  bytesReceived: number;
  averageResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  lastResponseTime: number | null;
  requestsByKind: Record<string, number>;
  lastErrors: string[];
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Контекст для логирования */
export interface LogContext {
  transaction?: number;
  frameKind?: number;
  dataPointId?: number;
  commandId?: number;
  bytes?: number;
  responseTime?: number;
  logger?: string;
  [key: string]: string | number | boolean | undefined;
}

export type LogFormatField =
  | 'timestamp'
  | 'level'
  | 'logger'
  | 'transaction'
  | 'frameKind'
  | 'dataPointId'
  | 'commandId'
  | 'responseTime';

export interface LogRecord {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** Интерфейс для экземпляра логгера */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
  resume(): void;
}
