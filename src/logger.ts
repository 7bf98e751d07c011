// src/logger.ts

import { FRAME_KIND_NAMES, FrameKind, HighLevelCommand } from './constants/constants.js';
import type {
  LogContext,
  LogFormatField,
  LoggerInstance,
  LogLevel,
  LogRecord,
} from './types/aquaclean-types.js';

type Formatter = (value: unknown) => string;
type MuteRule = Pick<LogContext, 'dataPointId' | 'commandId' | 'frameKind'>;

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

const FORMAT_FIELDS: readonly LogFormatField[] = [
  'timestamp',
  'level',
  'logger',
  'transaction',
  'frameKind',
  'dataPointId',
  'commandId',
  'responseTime',
];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some(level => level === value);
}

function isFrameKind(value: number): value is FrameKind {
  return value in FRAME_KIND_NAMES;
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null) return false;
  if (Array.isArray(value) || value instanceof Error || ArrayBuffer.isView(value)) return false;
  return Object.values(value).every(
    v =>
      v === undefined || typeof v === 'string' || typeof v === 'number' || typeof v === 'boolean'
  );
}

class Logger {
  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'highlight' | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    highlight: '\x1b[1;41m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logStats: {
    byDataPoint: Record<number, number>;
    byCommand: Record<number, number>;
  } = { byDataPoint: {}, byCommand: {} };
  private logFormat: LogFormatField[] = [
    'timestamp',
    'level',
    'logger',
    'transaction',
    'frameKind',
    'dataPointId',
    'commandId',
    'responseTime',
  ];
  private customFormatters: Partial<Record<LogFormatField, Formatter>> = {};
  private filters: {
    dataPointId: Set<number>;
    commandId: Set<number>;
    frameKind: Set<number>;
  } = { dataPointId: new Set(), commandId: new Set(), frameKind: new Set() };
  private highlightRules: MuteRule[] = [];
  private watchCallback: ((record: LogRecord) => void) | null = null;
  private logRateLimit: number = 0;
  private lastLogTime: number = 0;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  private formatterFor(field: LogFormatField, fallback: Formatter): Formatter {
    return this.customFormatters[field] ?? fallback;
  }

  /**
   * Formats a log message according to the specified level and context.
   * @returns Header followed by the printable arguments
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };
    const isHighlighted: boolean = this.highlightRules.some(
      rule =>
        (rule.dataPointId == null || rule.dataPointId === merged.dataPointId) &&
        (rule.commandId == null || rule.commandId === merged.commandId) &&
        (rule.frameKind == null || rule.frameKind === merged.frameKind)
    );

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);

    // Имя логгера без префикса
    if (this.logFormat.includes('logger') && merged.logger) {
      headerParts.push(this.formatterFor('logger', v => `[${String(v)}]`)(merged.logger));
    }
    if (this.logFormat.includes('transaction') && merged.transaction != null) {
      headerParts.push(this.formatterFor('transaction', v => `[T:${String(v)}]`)(merged.transaction));
    }
    if (this.logFormat.includes('frameKind') && merged.frameKind != null) {
      const kind = merged.frameKind;
      const name = isFrameKind(kind) ? FRAME_KIND_NAMES[kind] : `Unknown(${kind})`;
      headerParts.push(this.formatterFor('frameKind', v => `[K:${String(v)}]`)(name));
    }
    if (this.logFormat.includes('dataPointId') && merged.dataPointId != null) {
      headerParts.push(this.formatterFor('dataPointId', v => `[DP:${String(v)}]`)(merged.dataPointId));
    }
    if (this.logFormat.includes('commandId') && merged.commandId != null) {
      const name = HighLevelCommand[merged.commandId] ?? 'Unknown';
      headerParts.push(
        this.formatterFor('commandId', v => `[C:${String(v)}/${name}]`)(merged.commandId)
      );
    }
    if (this.logFormat.includes('responseTime') && merged.responseTime != null) {
      headerParts.push(
        this.formatterFor('responseTime', v => `[RT:${String(v)}ms]`)(merged.responseTime)
      );
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.message}\n${arg.stack || ''}`.trim();
      }
      return String(arg);
    });

    // Остаток контекста печатаем как JSON, кроме полей заголовка
    const rest: LogContext = { ...context };
    for (const field of FORMAT_FIELDS) delete rest[field];
    if (Object.keys(rest).length > 0) {
      formattedArgs.push(JSON.stringify(rest));
    }

    return [
      `${color}${isHighlighted && this.useColors ? this.COLORS.highlight : ''}${headerParts.join('')}${reset}`,
      ...formattedArgs,
    ];
  }

  /**
   * Decides whether a record passes the global switch, the mute filters and the level.
   */
  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    if (context.dataPointId != null && this.filters.dataPointId.has(context.dataPointId))
      return false;
    if (context.commandId != null && this.filters.commandId.has(context.commandId)) return false;
    if (context.frameKind != null && this.filters.frameKind.has(context.frameKind)) return false;

    const categoryLevel = context.logger ? this.categoryLevels[context.logger] : undefined;
    if (categoryLevel === 'none') return false;
    const threshold = categoryLevel ?? this.currentLevel;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(threshold);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;
    if (context.dataPointId != null)
      this.logStats.byDataPoint[context.dataPointId] =
        (this.logStats.byDataPoint[context.dataPointId] ?? 0) + 1;
    if (context.commandId != null)
      this.logStats.byCommand[context.commandId] =
        (this.logStats.byCommand[context.commandId] ?? 0) + 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    const now: number = Date.now();
    if (
      this.logRateLimit > 0 &&
      now - this.lastLogTime < this.logRateLimit &&
      level !== 'error' &&
      level !== 'warn'
    )
      return;
    this.lastLogTime = now;

    console[level](...this.format(level, args, context));
  }

  /**
   * Splits off a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  private log(level: LogLevel, args: unknown[], category?: string): void {
    const split = this.splitArgsAndContext(args);
    const context = category ? { ...split.context, logger: category } : split.context;
    this.output(level, split.args, context);
  }

  trace(...args: unknown[]): void {
    this.log('trace', args);
  }

  debug(...args: unknown[]): void {
    this.log('debug', args);
  }

  info(...args: unknown[]): void {
    this.log('info', args);
  }

  warn(...args: unknown[]): void {
    this.log('warn', args);
  }

  error(...args: unknown[]): void {
    this.log('error', args);
  }

  setLevel(level: LogLevel): void {
    if (!isLogLevel(level)) throw new Error(`Unknown log level: ${String(level)}`);
    this.currentLevel = level;
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !isLogLevel(level)) throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  addGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...this.globalContext, ...ctx };
  }

  setRateLimit(ms: number): void {
    if (ms < 0) throw new Error('Rate limit must be a non-negative number');
    this.logRateLimit = ms;
  }

  setLogFormat(fields: LogFormatField[]): void {
    if (!fields.every(f => FORMAT_FIELDS.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${FORMAT_FIELDS.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  setCustomFormatter(field: LogFormatField, formatter: Formatter): void {
    if (field === 'timestamp' || field === 'level') {
      throw new Error(`Invalid formatter field: ${field}`);
    }
    this.customFormatters[field] = formatter;
  }

  mute({ dataPointId, commandId, frameKind }: MuteRule = {}): void {
    if (dataPointId != null) this.filters.dataPointId.add(dataPointId);
    if (commandId != null) this.filters.commandId.add(commandId);
    if (frameKind != null) this.filters.frameKind.add(frameKind);
  }

  unmute({ dataPointId, commandId, frameKind }: MuteRule = {}): void {
    if (dataPointId != null) this.filters.dataPointId.delete(dataPointId);
    if (commandId != null) this.filters.commandId.delete(commandId);
    if (frameKind != null) this.filters.frameKind.delete(frameKind);
  }

  highlight(rule: MuteRule): void {
    this.highlightRules.push({ ...rule });
  }

  clearHighlights(): void {
    this.highlightRules = [];
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  summary(): void {
    console.log('\x1b[1;36m=== Logger Summary ===\x1b[0m');
    for (const level of LEVELS) {
      console.log(`${level}: ${this.logCounts[level]}`);
    }
    console.log(
      `Total Messages: ${Object.values(this.logCounts).reduce((sum, count) => sum + count, 0)}`
    );
    console.log(`By Data Point: ${JSON.stringify(this.logStats.byDataPoint, null, 2)}`);
    console.log(
      `By Command: ${JSON.stringify(
        Object.fromEntries(
          Object.entries(this.logStats.byCommand).map(([code, count]) => [
            `${code}/${HighLevelCommand[Number(code)] ?? 'Unknown'}`,
            count,
          ])
        ),
        null,
        2
      )}`
    );
    console.log(`Rate Limit: ${this.logRateLimit}ms`);
    console.log(`Current Level: ${this.currentLevel}`);
    console.log(
      `Categories: ${Object.keys(this.categoryLevels).length ? JSON.stringify(this.categoryLevels, null, 2) : 'None'}`
    );
    console.log('\x1b[1;36m=====================\x1b[0m');
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    return {
      trace: (...args: unknown[]) => this.log('trace', args, name),
      debug: (...args: unknown[]) => this.log('debug', args, name),
      info: (...args: unknown[]) => this.log('info', args, name),
      warn: (...args: unknown[]) => this.log('warn', args, name),
      error: (...args: unknown[]) => this.log('error', args, name),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

export default Logger;
