// src/status-poller.ts

import { DEFAULT_POLL_INTERVAL } from './constants/constants.js';
import { PollingError } from './errors.js';
import Logger from './logger.js';
import type {
  LoggerInstance,
  StatusPollerOptions,
  StatusPollerStats,
  SystemParameters,
} from './types/aquaclean-types.js';

/** Anything that can read a status snapshot; the client implements it */
export interface StatusSource {
  readSystemParameters(): Promise<SystemParameters | undefined>;
}

const loggerInstance = new Logger();
loggerInstance.setLevel('error');

/**
 * Reads the system status on a fixed interval. The next run is scheduled
 * only after the previous one has finished, so runs never overlap.
 */
export class StatusPoller {
  private readonly source: StatusSource;
  private interval: number;
  private readonly immediate: boolean;
  private readonly onData?: (parameters: SystemParameters) => void;
  private readonly onNoResponse?: () => void;
  private readonly onError?: (error: Error) => void;
  private readonly logger: LoggerInstance;

  private stopped: boolean = true;
  private paused: boolean = false;
  private executionInProgress: boolean = false;
  private timerId: ReturnType<typeof setTimeout> | null = null;
  private stats: StatusPollerStats = {
    totalRuns: 0,
    successes: 0,
    noResponses: 0,
    failures: 0,
    lastRunTime: null,
    lastError: null,
  };

  constructor(source: StatusSource, options: StatusPollerOptions = {}) {
    this.source = source;
    this.interval = StatusPoller.validateInterval(options.interval ?? DEFAULT_POLL_INTERVAL);
    this.immediate = options.immediate ?? true;
    this.onData = options.onData;
    this.onNoResponse = options.onNoResponse;
    this.onError = options.onError;
    this.logger = loggerInstance.createLogger('StatusPoller');
  }

  private static validateInterval(ms: number): number {
    if (!Number.isInteger(ms) || ms <= 0) {
      throw new PollingError(`Polling interval must be a positive integer, got ${ms}`);
    }
    return ms;
  }

  start(): void {
    if (!this.stopped) {
      this.logger.debug('Poller already running');
      return;
    }
    this.stopped = false;
    this.paused = false;
    this.logger.info('Poller started', { interval: this.interval });
    this._scheduleNextRun(this.immediate);
  }

  stop(): void {
    if (this.stopped) return;
    this.stopped = true;
    if (this.timerId) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
    this.logger.info('Poller stopped');
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    if (this.stopped || !this.paused) return;
    this.paused = false;
    if (!this.timerId && !this.executionInProgress) {
      this._scheduleNextRun(true);
    }
  }

  setInterval(ms: number): void {
    this.interval = StatusPoller.validateInterval(ms);
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  getStats(): StatusPollerStats {
    return { ...this.stats };
  }

  private _scheduleNextRun(immediate: boolean = false): void {
    if (this.stopped) return;
    if (this.timerId) clearTimeout(this.timerId);

    this.timerId = setTimeout(
      () => {
        this.timerId = null;
        this.execute().catch((err: unknown) => {
          this.logger.error('Poll cycle failed', err instanceof Error ? err : String(err));
        });
      },
      immediate ? 0 : this.interval
    );
  }

  /**
   * Runs one poll. Callback errors are reported to `onError` and do not
   * stop the poller.
   */
  async execute(): Promise<void> {
    if (this.stopped || this.paused || this.executionInProgress) return;

    this.executionInProgress = true;
    this.stats.totalRuns++;
    try {
      const parameters = await this.source.readSystemParameters();
      if (parameters === undefined) {
        this.stats.noResponses++;
        this.logger.debug('Status poll got no response');
        this.onNoResponse?.();
      } else {
        this.stats.successes++;
        this.onData?.(parameters);
      }
      this.stats.lastError = null;
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new PollingError(String(err));
      this.stats.failures++;
      this.stats.lastError = error;
      this.logger.warn(`Status poll failed: ${error.message}`);
      this.onError?.(error);
    } finally {
      this.stats.lastRunTime = Date.now();
      this.executionInProgress = false;
      if (!this.paused) this._scheduleNextRun();
    }
  }
}
