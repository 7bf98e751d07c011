// src/client.ts

import { Mutex } from 'async-mutex';
import { DataPointCatalogue, getDefaultCatalogue } from './catalogue/data-point-catalogue.js';
import { resolveClientOptions } from './config/client-options.js';
import {
  BRIGHTNESS_RANGE,
  DataPointId,
  FEATURE_PROBES,
  HighLevelCommand,
  RequestTransaction,
  SPRAY_INTENSITY_RANGE,
  SPRAY_POSITION_RANGE,
  WATER_TEMPERATURE_RANGE,
  type FeatureName,
} from './constants/constants.js';
import { TransactionCorrelator } from './correlator.js';
import { DeviceStateStore } from './device-state.js';
import {
  DataPointAccessError,
  DataPointEncodingError,
  FramingError,
  NotConnectedError,
} from './errors.js';
import { FrameReassembler } from './framers/frame-reassembler.js';
import Logger from './logger.js';
import { decodeDataPointValue, encodeDataPointValue } from './messages/data-point-value.js';
import {
  buildDeviceIdentificationRequest,
  parseDeviceIdentification,
} from './messages/device-identification.js';
import { buildCommandRequest } from './messages/high-level-command.js';
import {
  buildReadDataPointRequest,
  parseReadDataPointResponse,
} from './messages/read-data-point.js';
import { buildSystemStatusRequest, parseSystemParameters } from './messages/system-parameters.js';
import { buildWriteDataPointRequest } from './messages/write-data-point.js';
import { buildRequestPackets, parsePacket } from './packet-builder.js';
import type {
  AquaCleanClientOptions,
  DataPointValue,
  DecodedValue,
  DeviceIdentification,
  DeviceStateView,
  FeatureMap,
  LinkDiagnosticsStats,
  LinkTransport,
  LogContext,
  LoggerInstance,
  LogLevel,
  ResolvedClientOptions,
  SystemParameters,
} from './types/aquaclean-types.js';
import { LinkDiagnostics } from './utils/diagnostics.js';
import { assertIntegerInRange } from './utils/utils.js';

type RequestKind = 'command' | 'read' | 'write' | 'identification' | 'status';

const CATEGORIES = ['AquaCleanClient', 'Correlator', 'Reassembler'] as const;

/**
 * Request/response client for one appliance.
 *
 * Every public request goes through a mutex, so concurrent callers queue
 * instead of superseding each other in the correlator. Each request resolves
 * to a typed result or `undefined` when the appliance did not answer in time.
 */
class AquaCleanClient {
  private readonly transport: LinkTransport;
  private readonly options: ResolvedClientOptions;
  private readonly catalogue: DataPointCatalogue;
  private readonly loggerInstance: Logger;
  private readonly logger: LoggerInstance;
  private readonly diagnostics?: LinkDiagnostics;
  private readonly reassembler: FrameReassembler;
  private readonly correlator: TransactionCorrelator;
  private readonly store: DeviceStateStore = new DeviceStateStore();
  private readonly _mutex: Mutex = new Mutex();
  private unsubscribe: (() => void) | null = null;
  private features: FeatureMap | null = null;

  /**
   * @param transport - link that carries byte-stuffed packets
   * @param options - validated by {@link resolveClientOptions}
   * @param catalogue - data-point table used for access checks and value decoding
   * @throws ConfigError
   */
  constructor(
    transport: LinkTransport,
    options: AquaCleanClientOptions = {},
    catalogue?: DataPointCatalogue
  ) {
    this.transport = transport;
    this.options = resolveClientOptions(options);
    this.catalogue = catalogue ?? getDefaultCatalogue();

    this.loggerInstance = new Logger();
    this.loggerInstance.setLevel(this.options.logLevel);
    this.logger = this.loggerInstance.createLogger('AquaCleanClient');

    this.diagnostics = this.options.diagnostics
      ? new LinkDiagnostics({ loggerName: 'AquaCleanClient' })
      : undefined;
    this.reassembler = new FrameReassembler(
      this.options.reassembly,
      this.loggerInstance.createLogger('Reassembler')
    );
    this.correlator = new TransactionCorrelator(packet => this.transport.write(packet), {
      logger: this.loggerInstance.createLogger('Correlator'),
      diagnostics: this.diagnostics,
    });
  }

  /**
   * Enables the client loggers
   * @param level - Logging level
   */
  enableLogger(level: LogLevel = 'info'): void {
    this.loggerInstance.setLevel(level);
    for (const category of CATEGORIES) this.loggerInstance.resumeCategory(category);
  }

  /**
   * Mutes the client loggers except for errors
   */
  disableLogger(): void {
    this.loggerInstance.setLevel('error');
  }

  /**
   * Sets context added to every log record (e.g. a device label)
   */
  setLoggerContext(context: LogContext): void {
    this.loggerInstance.addGlobalContext(context);
  }

  get isConnected(): boolean {
    return this.unsubscribe !== null && this.transport.isOpen;
  }

  /**
   * Opens the transport if needed and starts listening for notifications.
   */
  async connect(): Promise<void> {
    const release = await this._mutex.acquire();
    try {
      if (!this.transport.isOpen) {
        await this.transport.connect();
      }
      if (!this.unsubscribe) {
        this.unsubscribe = this.transport.subscribe(data => this.handleNotification(data));
      }
      this.logger.info('Client is ready, listening for notifications');
    } finally {
      release();
    }
  }

  /**
   * Stops listening, abandons any outstanding request and closes the transport.
   */
  async disconnect(): Promise<void> {
    this.correlator.cancel();
    const release = await this._mutex.acquire();
    try {
      if (this.unsubscribe) {
        this.unsubscribe();
        this.unsubscribe = null;
      }
      this.reassembler.reset();
      if (this.transport.isOpen) {
        await this.transport.disconnect();
      }
      this.logger.info('Client disconnected');
    } finally {
      release();
    }
  }

  /**
   * Inbound path: unstuff, parse, reassemble, hand completed messages to the
   * correlator. Malformed packets are logged and discarded.
   */
  private handleNotification(data: Uint8Array): void {
    this.diagnostics?.recordBytesReceived(data.length);
    try {
      const frame = parsePacket(data);
      this.logger.trace('Frame received', {
        frameKind: frame.kind,
        transaction: frame.transaction,
        bytes: frame.payload.length,
      });
      this.reassembler.addFrame(frame);

      let message = this.reassembler.getCompleteMessage();
      while (message !== undefined) {
        this.correlator.deliver(message);
        message = this.reassembler.getCompleteMessage();
      }
    } catch (err: unknown) {
      if (err instanceof FramingError) {
        this.diagnostics?.recordFramingError(err);
        this.logger.warn(`Discarding packet: ${err.message}`);
        return;
      }
      const error = err instanceof Error ? err : new Error(String(err));
      this.diagnostics?.recordError(error);
      this.logger.error('Notification handling failed', error);
    }
  }

  /**
   * Sends one request and waits for its response under the client mutex.
   */
  private async _exchange(
    kind: RequestKind,
    payload: Uint8Array,
    transaction: RequestTransaction,
    timeout: number = this.options.responseTimeout,
    context: LogContext = {}
  ): Promise<Uint8Array | undefined> {
    const release = await this._mutex.acquire();
    try {
      if (!this.isConnected) {
        throw new NotConnectedError();
      }

      this.diagnostics?.recordRequest(kind);
      const packets = buildRequestPackets(payload, transaction, this.options.mtu);
      this.logger.debug(`Sending ${kind} request in ${packets.length} packet(s)`, {
        ...context,
        transaction,
        bytes: payload.length,
      });

      const startTime = Date.now();
      const response = await this.correlator.sendAndWait(packets, timeout);
      const responseTime = Date.now() - startTime;

      if (response === undefined) {
        this.logger.warn(`No response to ${kind} request`, { ...context, transaction, responseTime });
        return undefined;
      }

      this.logger.info('Response received', {
        ...context,
        transaction,
        bytes: response.length,
        responseTime,
      });
      return response;
    } finally {
      release();
    }
  }

  // ===========================================================================
  // Requests
  // ===========================================================================

  /**
   * Reads SAP number, serial number, firmware version and description.
   */
  async readDeviceIdentification(): Promise<DeviceIdentification | undefined> {
    const response = await this._exchange(
      'identification',
      buildDeviceIdentificationRequest(),
      RequestTransaction.DEVICE_IDENTIFICATION
    );
    if (response === undefined) return undefined;
    const identification = parseDeviceIdentification(response);
    this.store.setIdentification(identification);
    return identification;
  }

  /**
   * Reads the status flags and replaces the confirmed state snapshot.
   * Tentative values set by toggles are discarded.
   */
  async readSystemParameters(): Promise<SystemParameters | undefined> {
    const response = await this._exchange(
      'status',
      buildSystemStatusRequest(),
      RequestTransaction.SYSTEM_STATUS
    );
    if (response === undefined) return undefined;
    const parameters = parseSystemParameters(response, this.options.statusMapping);
    this.store.reconcile(parameters);
    return parameters;
  }

  /**
   * Sends a high-level command.
   * @returns the acknowledgement payload, or `undefined` if none arrived
   * @throws RangeError if the id does not fit 16 bits
   */
  async sendCommand(command: HighLevelCommand | number): Promise<Uint8Array | undefined> {
    return this._exchange(
      'command',
      buildCommandRequest(command),
      RequestTransaction.COMMAND,
      this.options.responseTimeout,
      { commandId: command }
    );
  }

  /**
   * Reads a data point. The value is decoded when the id is catalogued.
   * @throws DataPointAccessError for write-only data points
   */
  async readDataPoint(id: number): Promise<DataPointValue | undefined> {
    return this._readDataPoint(id, this.options.responseTimeout);
  }

  private async _readDataPoint(id: number, timeout: number): Promise<DataPointValue | undefined> {
    const definition = this.catalogue.get(id);
    if (definition && !this.catalogue.isReadable(id)) {
      throw new DataPointAccessError(id, 'read', definition.access);
    }

    const response = await this._exchange(
      'read',
      buildReadDataPointRequest(id),
      RequestTransaction.READ_DATA_POINT,
      timeout,
      { dataPointId: id }
    );
    if (response === undefined) return undefined;

    const raw = parseReadDataPointResponse(id, response);
    const result: DataPointValue = { id, raw, definition };
    if (definition) {
      try {
        result.value = decodeDataPointValue(definition.encoding, raw);
      } catch (err: unknown) {
        if (!(err instanceof DataPointEncodingError)) throw err;
        this.logger.warn(`Undecodable value for ${definition.name}: ${err.message}`, {
          dataPointId: id,
        });
      }
    }
    return result;
  }

  /**
   * Writes raw value bytes to a data point.
   * @returns the acknowledgement payload, or `undefined` if none arrived
   * @throws DataPointAccessError for read-only data points
   */
  async writeDataPoint(id: number, value: Uint8Array): Promise<Uint8Array | undefined> {
    const definition = this.catalogue.get(id);
    if (definition && !this.catalogue.isWritable(id)) {
      throw new DataPointAccessError(id, 'write', definition.access);
    }
    if (!definition) {
      this.logger.debug('Writing uncatalogued data point', { dataPointId: id });
    }
    return this._exchange(
      'write',
      buildWriteDataPointRequest(id, value),
      RequestTransaction.WRITE_DATA_POINT,
      this.options.responseTimeout,
      { dataPointId: id }
    );
  }

  /**
   * Encodes a value by the catalogue entry of `id` and writes it.
   * @throws DataPointEncodingError if the id is not catalogued or the value does not fit
   */
  async writeDataPointValue(id: number, value: DecodedValue): Promise<Uint8Array | undefined> {
    const definition = this.catalogue.get(id);
    if (!definition) {
      throw new DataPointEncodingError('unknown', `data point ${id} is not in the catalogue`);
    }
    return this.writeDataPoint(id, encodeDataPointValue(definition.encoding, value));
  }

  // ===========================================================================
  // Convenience operations
  // ===========================================================================

  private async _toggle(
    command: HighLevelCommand,
    field?: 'analShowerRunning' | 'ladyShowerRunning' | 'dryerRunning' | 'lidPosition'
  ): Promise<boolean> {
    const ack = await this.sendCommand(command);
    if (ack === undefined) return false;
    if (field) {
      const assumed = this.store.toggleTentative(field);
      this.logger.debug(`Assuming ${field}=${String(assumed)} until next status read`, {
        commandId: command,
      });
    }
    return true;
  }

  toggleRearShower(): Promise<boolean> {
    return this._toggle(HighLevelCommand.TOGGLE_ANAL_SHOWER, 'analShowerRunning');
  }

  toggleLadyShower(): Promise<boolean> {
    return this._toggle(HighLevelCommand.TOGGLE_LADY_SHOWER, 'ladyShowerRunning');
  }

  toggleDryer(): Promise<boolean> {
    return this._toggle(HighLevelCommand.TOGGLE_DRYER, 'dryerRunning');
  }

  toggleLidPosition(): Promise<boolean> {
    return this._toggle(HighLevelCommand.TOGGLE_LID_POSITION, 'lidPosition');
  }

  async toggleOrientationLight(): Promise<boolean> {
    const acknowledged = await this._toggle(HighLevelCommand.TOGGLE_ORIENTATION_LIGHT);
    if (acknowledged) {
      const current = this.store.get('orientationLightState');
      this.store.setTentative('orientationLightState', current === 0 ? 1 : 0);
    }
    return acknowledged;
  }

  triggerFlush(): Promise<boolean> {
    return this._toggle(HighLevelCommand.TRIGGER_FLUSH_MANUALLY);
  }

  private async _writeSetting(
    id: number,
    value: number,
    range: { min: number; max: number },
    label: string,
    field?: 'waterTemperature' | 'sprayIntensity' | 'sprayPosition'
  ): Promise<boolean> {
    assertIntegerInRange(label, value, range.min, range.max);
    const ack = await this.writeDataPoint(id, Uint8Array.of(value));
    if (ack === undefined) return false;
    if (field) this.store.setTentative(field, value);
    return true;
  }

  /**
   * @param celsius - 34..40
   * @throws RangeError
   */
  setWaterTemperature(celsius: number): Promise<boolean> {
    return this._writeSetting(
      DataPointId.SET_ACTIVE_SHOWER_WATER_TEMPERATURE,
      celsius,
      WATER_TEMPERATURE_RANGE,
      'Water temperature',
      'waterTemperature'
    );
  }

  /**
   * @param level - 1..5
   * @throws RangeError
   */
  setSprayIntensity(level: number): Promise<boolean> {
    return this._writeSetting(
      DataPointId.SET_ACTIVE_ANAL_SPRAY_INTENSITY,
      level,
      SPRAY_INTENSITY_RANGE,
      'Spray intensity',
      'sprayIntensity'
    );
  }

  /**
   * @param position - 1..5
   * @throws RangeError
   */
  setSprayPosition(position: number): Promise<boolean> {
    return this._writeSetting(
      DataPointId.SET_ACTIVE_ANAL_SPRAY_ARM_POSITION,
      position,
      SPRAY_POSITION_RANGE,
      'Spray position',
      'sprayPosition'
    );
  }

  /**
   * @param percent - 0..100
   * @throws RangeError
   */
  setLightingBrightness(percent: number): Promise<boolean> {
    return this._writeSetting(
      DataPointId.LIGHTING_SET_BRIGHTNESS,
      percent,
      BRIGHTNESS_RANGE,
      'Brightness'
    );
  }

  // ===========================================================================
  // Feature discovery
  // ===========================================================================

  /**
   * Reads a data point with the short probe timeout.
   * @returns true when the appliance answered
   */
  async probeDataPoint(id: number): Promise<boolean> {
    const result = await this._readDataPoint(id, this.options.probeTimeout);
    return result !== undefined;
  }

  /**
   * Probes one data point per optional feature. Firmware variants leave
   * unsupported ids unanswered.
   */
  async discoverFeatures(): Promise<FeatureMap> {
    const features: FeatureMap = {
      ladyShower: false,
      dryer: false,
      orientationLight: false,
      odourExtraction: false,
      descaling: false,
      ambientLight: false,
    };
    for (const [name, id] of Object.entries(FEATURE_PROBES)) {
      if (!isFeatureName(name)) continue;
      features[name] = await this.probeDataPoint(id);
    }
    this.features = features;
    this.logger.info('Feature discovery finished', JSON.stringify(features));
    return { ...features };
  }

  /**
   * @returns `undefined` until {@link discoverFeatures} has run
   */
  hasFeature(name: FeatureName): boolean | undefined {
    return this.features ? this.features[name] : undefined;
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get state(): DeviceStateView {
    return this.store.view();
  }

  getDiagnostics(): LinkDiagnosticsStats | undefined {
    return this.diagnostics?.getStats();
  }
}

function isFeatureName(name: string): name is FeatureName {
  return Object.prototype.hasOwnProperty.call(FEATURE_PROBES, name);
}

export default AquaCleanClient;
