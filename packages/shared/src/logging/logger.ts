/**
 * Structured logger for the provider and its CLI.
 *
 * Entries are JSON lines by default; `pretty` renders one readable line per
 * entry with the component and pod identity inline.
 * @module @vnode/shared/logging/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * All log levels, lowest first
 */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

/**
 * Context attached to an entry
 */
export interface LogMeta {
  service?: string;
  component?: string;
  /** Virtual node the entry belongs to */
  nodeName?: string;
  /** Pod namespace, set together with `name` */
  namespace?: string;
  /** Pod name */
  name?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

export interface LoggerConfig {
  /** Minimum level written */
  level: LogLevel;
  service?: string;
  component?: string;
  /** One readable line per entry instead of JSON */
  pretty?: boolean;
  /** Receives entries instead of the console */
  output?: (entry: LogEntry) => void;
}

const ANSI_RESET = '\x1b[0m';

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

/**
 * Error fields kept on an entry; a string or numeric `code` is carried over
 */
function describeError(error: Error): NonNullable<LogEntry['error']> {
  const described: NonNullable<LogEntry['error']> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
  if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
    described.code = error.code;
  }
  return described;
}

/**
 * Render an entry as a single line, e.g.
 * `2024-05-01T12:00:00.000Z INFO  CreatePod (provider) [default/web]`
 */
export function formatPretty(entry: LogEntry): string {
  const color = LEVEL_COLORS[entry.level];
  let line = `${entry.timestamp} ${color}${entry.level.toUpperCase().padEnd(5)}${ANSI_RESET} ${entry.message}`;

  const meta = entry.meta ?? {};
  if (meta.component) {
    line += ` ${color}(${meta.component})${ANSI_RESET}`;
  }
  if (meta.namespace !== undefined && meta.name !== undefined) {
    line += ` [${meta.namespace}/${meta.name}]`;
  }

  if (entry.error) {
    line += `\n  ${entry.error.name}: ${entry.error.message}`;
    if (entry.error.stack) {
      line += `\n${entry.error.stack}`;
    }
  }

  return line;
}

function writeToConsole(entry: LogEntry, pretty: boolean): void {
  const line = pretty ? formatPretty(entry) : JSON.stringify(entry);

  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
    case 'fatal':
      console.error(line);
      break;
  }
}

export class Logger {
  private readonly config: LoggerConfig;
  private readonly meta: LogMeta;

  constructor(config: Partial<LoggerConfig> = {}, meta: LogMeta = {}) {
    this.config = { level: 'info', pretty: false, ...config };
    this.meta = {};
    if (config.service) this.meta.service = config.service;
    if (config.component) this.meta.component = config.component;
    Object.assign(this.meta, meta);
  }

  private isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_RANK[level] >= LOG_LEVEL_RANK[this.config.level];
  }

  private write(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const merged = { ...this.meta, ...meta };
    if (Object.keys(merged).length > 0) {
      entry.meta = merged;
    }
    if (error) {
      entry.error = describeError(error);
    }

    if (this.config.output) {
      this.config.output(entry);
    } else {
      writeToConsole(entry, this.config.pretty ?? false);
    }
  }

  /**
   * Child logger carrying extra metadata on every entry
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  forComponent(component: string): Logger {
    return this.child({ component });
  }

  /**
   * Child logger for one pod's operations
   */
  forPod(namespace: string, name: string): Logger {
    return this.child({ namespace, name });
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  /**
   * Log an error. The second argument is metadata when it is not an Error.
   */
  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.write('error', message, meta, error);
    } else {
      this.write('error', message, error);
    }
  }

  fatal(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.write('fatal', message, meta, error);
    } else {
      this.write('fatal', message, error);
    }
  }
}

export function isTestEnvironment(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

/**
 * Tests stay quiet unless LOG_LEVEL asks for output
 */
function shouldSilence(): boolean {
  return isTestEnvironment() && !process.env.LOG_LEVEL;
}

function discard(): void {}

/**
 * Create a logger as configured, with no environment detection
 */
export function createLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  return new Logger(config, meta);
}

/**
 * Create a logger for a long-lived service object. Under test it discards
 * every entry unless LOG_LEVEL is set.
 */
export function createServiceLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  if (shouldSilence()) {
    return new Logger({ ...config, level: 'fatal', output: discard }, meta);
  }
  return new Logger(config, meta);
}

const envLevel = process.env.LOG_LEVEL;

/**
 * Default CLI logger: pretty outside production, level from LOG_LEVEL
 */
export const logger = createLogger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
  pretty: process.env.NODE_ENV !== 'production',
  service: 'vnode-provider',
  output: shouldSilence() ? discard : undefined,
});
