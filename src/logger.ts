/**
 * Levelled diagnostic logger
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerConfig {
  readonly level: LogLevel;
  readonly prefix?: string;
  /** Where formatted lines go; stderr when omitted */
  readonly sink?: (line: string) => void;
}

export class Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly sink: (line: string) => void;

  constructor(config: LoggerConfig = { level: 'warn' }) {
    this.level = config.level;
    this.prefix = config.prefix ?? 'rate-limited-channel';
    this.sink = config.sink ?? (line => process.stderr.write(line));
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) <= LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const suffix = meta ? ` ${JSON.stringify(meta)}` : '';
    this.sink(`[${this.prefix}] ${level.toUpperCase()}: ${message}${suffix}\n`);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LEVELS as readonly string[]).includes(value);
}

const envLevel = process.env.RATE_LIMITED_CHANNEL_LOG_LEVEL;

// Shared default instance
export const logger = new Logger({ level: isLogLevel(envLevel) ? envLevel : 'warn' });

export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
