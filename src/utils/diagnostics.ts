// src/utils/diagnostics.ts

import Logger from '../logger.js';
import type { LinkDiagnosticsStats, LoggerInstance } from '../types/aquaclean-types.js';

const loggerInstance = new Logger();
loggerInstance.setLevel('info');
loggerInstance.setLogFormat(['timestamp', 'level', 'logger']);

const MAX_LAST_ERRORS = 10;

export interface LinkDiagnosticsOptions {
  loggerName?: string;
  /** Warn once timeouts exceed this share of requests, in percent */
  timeoutRateThreshold?: number;
}

/**
 * Collects counters about link traffic: requests, responses, timeouts,
 * superseded requests, framing errors and unsolicited messages.
 */
export class LinkDiagnostics {
  private readonly logger: LoggerInstance;
  private readonly timeoutRateThreshold: number;
  private startTime: number = Date.now();
  private totalRequests: number = 0;
  private responses: number = 0;
  private timeouts: number = 0;
  private superseded: number = 0;
  private framingErrors: number = 0;
  private unsolicitedMessages: number = 0;
  private bytesSent: number = 0;
  private bytesReceived: number = 0;
  private lastResponseTime: number | null = null;
  private minResponseTime: number | null = null;
  private maxResponseTime: number | null = null;
  private totalResponseTime: number = 0;
  private requestsByKind: Record<string, number> = {};
  private lastErrors: string[] = [];

  constructor(options: LinkDiagnosticsOptions = {}) {
    this.timeoutRateThreshold = options.timeoutRateThreshold ?? 50;
    this.logger = loggerInstance.createLogger(options.loggerName ?? 'Diagnostics');
    this.logger.setLevel('error');
  }

  /**
   * Resets all statistics and counters to their initial state.
   */
  reset(): void {
    this.startTime = Date.now();
    this.totalRequests = 0;
    this.responses = 0;
    this.timeouts = 0;
    this.superseded = 0;
    this.framingErrors = 0;
    this.unsolicitedMessages = 0;
    this.bytesSent = 0;
    this.bytesReceived = 0;
    this.lastResponseTime = null;
    this.minResponseTime = null;
    this.maxResponseTime = null;
    this.totalResponseTime = 0;
    this.requestsByKind = {};
    this.lastErrors = [];
  }

  recordRequest(kind: string): void {
    this.totalRequests++;
    this.requestsByKind[kind] = (this.requestsByKind[kind] ?? 0) + 1;
  }

  recordResponse(responseTimeMs: number): void {
    this.responses++;
    this.lastResponseTime = responseTimeMs;
    this.totalResponseTime += responseTimeMs;
    this.minResponseTime =
      this.minResponseTime === null ? responseTimeMs : Math.min(this.minResponseTime, responseTimeMs);
    this.maxResponseTime =
      this.maxResponseTime === null ? responseTimeMs : Math.max(this.maxResponseTime, responseTimeMs);
  }

  recordTimeout(): void {
    this.timeouts++;
    const rate = (this.timeouts / Math.max(this.totalRequests, 1)) * 100;
    if (this.totalRequests >= 4 && rate >= this.timeoutRateThreshold) {
      this.logger.warn(`Timeout rate ${rate.toFixed(1)}% over ${this.totalRequests} requests`);
    }
  }

  recordSuperseded(): void {
    this.superseded++;
  }

  recordFramingError(error: Error): void {
    this.framingErrors++;
    this.pushError(error.message);
  }

  recordUnsolicited(): void {
    this.unsolicitedMessages++;
  }

  recordBytesSent(count: number): void {
    this.bytesSent += count;
  }

  recordBytesReceived(count: number): void {
    this.bytesReceived += count;
  }

  recordError(error: Error): void {
    this.pushError(error.message);
  }

  private pushError(message: string): void {
    this.lastErrors.push(message);
    if (this.lastErrors.length > MAX_LAST_ERRORS) this.lastErrors.shift();
  }

  get averageResponseTime(): number | null {
    return this.responses === 0 ? null : this.totalResponseTime / this.responses;
  }

  getStats(): LinkDiagnosticsStats {
    return {
      uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
      totalRequests: this.totalRequests,
      responses: this.responses,
      timeouts: this.timeouts,
      superseded: this.superseded,
      framingErrors: this.framingErrors,
      unsolicitedMessages: this.unsolicitedMessages,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      averageResponseTime: this.averageResponseTime,
      minResponseTime: this.minResponseTime,
      maxResponseTime: this.maxResponseTime,
      lastResponseTime: this.lastResponseTime,
      requestsByKind: { ...this.requestsByKind },
      lastErrors: [...this.lastErrors],
    };
  }

  /**
   * Prints the statistics through the diagnostics logger.
   */
  printStats(): void {
    this.logger.setLevel('info');
    this.logger.info('Link diagnostics', JSON.stringify(this.getStats(), null, 2));
    this.logger.setLevel('error');
  }
}
