export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 99
}

/**
 * Log categories for filtering logs
 */
export enum LogCategory {
  GENERAL = 'general',
  CONTROL = 'control',
  LEARNING = 'learning',
  BLOCKING = 'blocking',
  PERSISTENCE = 'persistence',
  SYSTEM = 'system'
}

export type LogContext = Record<string, unknown>;

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level?: LogLevel;
  prefix?: string;
  enabledCategories?: LogCategory[];
  includeTimestamps?: boolean;
  includeSourceModule?: boolean;
  verboseMode?: boolean;
}

/**
 * Where formatted lines end up. Defaults to the process console.
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

/**
 * Logger interface for standardized logging across the controller
 */
export interface Logger {
  log(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  error(message: string, error?: Error | unknown, context?: LogContext): void;
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, context?: LogContext): void;
  control(message: string, context?: LogContext): void;
  learning(message: string, context?: LogContext): void;
  blocking(message: string, context?: LogContext): void;
  marker(message: string): void;
  setLogLevel(level: LogLevel): void;
  getLogLevel(): LogLevel;
  enableCategory(category: LogCategory): void;
  disableCategory(category: LogCategory): void;
  isCategoryEnabled(category: LogCategory): boolean;
  formatValue(value: unknown): string;
}

/**
 * Detect if running in development mode
 */
export function isRunningInDevMode(): boolean {
  return process.env.NODE_ENV === 'development' || process.env.HEATPUMP_VERBOSE === 'true';
}

/**
 * Parse a level name such as "debug" or "WARN"; unknown names give the fallback.
 */
export function parseLogLevel(name: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!name) return fallback;
  switch (name.trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'NONE': return LogLevel.NONE;
    default: return fallback;
  }
}

function getFormattedTimestamp(): string {
  const now = new Date();
  return now.toISOString().replace('T', ' ').substring(0, 23);
}

/**
 * Format a value for logging based on its type
 */
export function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';

  if (typeof value === 'number') {
    return Number.isInteger(value) ? String(value) : value.toFixed(3);
  }

  if (typeof value === 'object') {
    if (value instanceof Error) {
      return `Error: ${value.message}${value.stack ? `\n${value.stack}` : ''}`;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      if (value.length > 10) {
        return `Array(${value.length}) [${value.slice(0, 3).map(formatValue).join(', ')}, ... ${value.length - 6} more ..., ${value.slice(-3).map(formatValue).join(', ')}]`;
      }
      return `[${value.map(formatValue).join(', ')}]`;
    }
    try {
      return JSON.stringify(value);
    } catch {
      return '[Object: circular or too complex to stringify]';
    }
  }

  return String(value);
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line)
};

export class ConsoleLogger implements Logger {
  private logLevel: LogLevel;
  private readonly logPrefix: string;
  private readonly enabledCategories: Set<LogCategory>;
  private readonly includeTimestamps: boolean;
  private readonly includeSourceModule: boolean;
  private readonly verboseMode: boolean;
  private readonly sourceModule: string;

  constructor(options: LoggerConfig = {}, private readonly sink: LogSink = consoleSink) {
    this.logLevel = options.level ?? LogLevel.INFO;
    this.logPrefix = options.prefix ? `[${options.prefix}] ` : '';
    this.sourceModule = options.prefix || 'Controller';
    this.includeTimestamps = options.includeTimestamps ?? true;
    this.includeSourceModule = options.includeSourceModule ?? false;
    this.verboseMode = options.verboseMode ?? isRunningInDevMode();
    this.enabledCategories = new Set<LogCategory>(
      options.enabledCategories || Object.values(LogCategory)
    );
  }

  /**
   * Child logger sharing level and categories, tagged with a module name.
   */
  child(module: string): ConsoleLogger {
    return new ConsoleLogger({
      level: this.logLevel,
      prefix: module,
      enabledCategories: [...this.enabledCategories],
      includeTimestamps: this.includeTimestamps,
      includeSourceModule: this.includeSourceModule,
      verboseMode: this.verboseMode
    }, this.sink);
  }

  private getLogPrefix(): string {
    let prefix = '';
    if (this.includeTimestamps) {
      prefix += `[${getFormattedTimestamp()}] `;
    }
    if (this.includeSourceModule && this.sourceModule) {
      prefix += `[${this.sourceModule}] `;
    }
    return prefix + this.logPrefix;
  }

  private line(tag: string, message: string, extra: unknown[]): string {
    const rendered = extra.filter(v => v !== undefined).map(v => this.formatValue(v));
    const suffix = rendered.length > 0 ? ' ' + rendered.join(' ') : '';
    return `${tag}${this.getLogPrefix()}${message}${suffix}`;
  }

  private categorized(category: LogCategory, tag: string, message: string, context?: LogContext): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(category)) {
      this.sink.out(this.line(tag, message, [context]));
    }
  }

  public formatValue(value: unknown): string {
    return formatValue(value);
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public enableCategory(category: LogCategory): void {
    this.enabledCategories.add(category);
  }

  public disableCategory(category: LogCategory): void {
    this.enabledCategories.delete(category);
  }

  public isCategoryEnabled(category: LogCategory): boolean {
    return this.enabledCategories.has(category);
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG && this.verboseMode && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.out(this.line('DEBUG: ', message, args));
    }
  }

  public log(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.out(this.line('', message, args));
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.out(this.line('INFO: ', message, args));
    }
  }

  public control(message: string, context?: LogContext): void {
    this.categorized(LogCategory.CONTROL, 'CONTROL: ', message, context);
  }

  public learning(message: string, context?: LogContext): void {
    this.categorized(LogCategory.LEARNING, 'LEARNING: ', message, context);
  }

  public blocking(message: string, context?: LogContext): void {
    this.categorized(LogCategory.BLOCKING, 'BLOCKING: ', message, context);
  }

  public warn(message: string, context?: LogContext): void {
    if (this.logLevel <= LogLevel.WARN && this.isCategoryEnabled(LogCategory.GENERAL)) {
      this.sink.err(this.line('WARN: ', message, [context]));
    }
  }

  public error(message: string, error?: Error | unknown, context?: LogContext): void {
    if (this.logLevel <= LogLevel.ERROR && this.isCategoryEnabled(LogCategory.GENERAL)) {
      const detail = error instanceof Error ? error.message : error;
      this.sink.err(this.line('ERROR: ', message, [detail, context]));
    }
  }

  public marker(message: string): void {
    this.sink.out(`${this.getLogPrefix()}===== ${message} =====`);
  }
}
