/**
 * Logging utilities for media-relay plugins
 *
 * Pretty, colorized lines on a TTY; one JSON object per line when
 * LOG_FORMAT=json (what the workers ship to log collectors).
 */

import { LOG_LEVEL_NAMES, type LogFormat, type LogLevel, type LogMeta } from './types.js';
import { validateEnum } from './validation.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

type Color = keyof typeof COLORS;

type LineLevel = LogLevel | 'success';

const LEVEL_STYLE: Record<LineLevel, { label: string; color: Color }> = {
  debug: { label: 'DEBUG', color: 'gray' },
  info: { label: 'INFO ', color: 'blue' },
  warn: { label: 'WARN ', color: 'yellow' },
  error: { label: 'ERROR', color: 'red' },
  success: { label: 'OK   ', color: 'green' },
};

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  useColors?: boolean;
  /** Fields merged into every line written by this logger and its children. */
  bindings?: LogMeta;
}

export class Logger {
  private readonly name: string;
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly useColors: boolean;
  private readonly bindings: LogMeta;

  constructor(name: string, options: LoggerOptions = {}) {
    this.name = name;
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'pretty';
    this.useColors = (options.useColors ?? true) && this.format === 'pretty' && Boolean(process.stdout.isTTY);
    this.bindings = options.bindings ?? {};
  }

  get component(): string {
    return this.name;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private colorize(text: string, color: Color): string {
    if (!this.useColors) return text;
    return `${COLORS[color]}${text}${COLORS.reset}`;
  }

  /** Renders one line; exposed so tests can assert output without patching console. */
  formatLine(level: LineLevel, message: string, meta?: LogMeta): string {
    const timestamp = new Date().toISOString();
    const fields = { ...this.bindings, ...meta };

    if (this.format === 'json') {
      return JSON.stringify({ time: timestamp, level, logger: this.name, msg: message, ...fields });
    }

    const style = LEVEL_STYLE[level];
    let output = `${this.colorize(timestamp, 'gray')} ${this.colorize(style.label, style.color)} ${this.colorize(`[${this.name}]`, 'cyan')} ${message}`;
    if (Object.keys(fields).length > 0) {
      output += ` ${this.colorize(JSON.stringify(fields), 'gray')}`;
    }
    return output;
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled('debug')) {
      console.log(this.formatLine('debug', message, meta));
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled('info')) {
      console.log(this.formatLine('info', message, meta));
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled('warn')) {
      console.warn(this.formatLine('warn', message, meta));
    }
  }

  error(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled('error')) {
      console.error(this.formatLine('error', message, meta));
    }
  }

  success(message: string, meta?: LogMeta): void {
    if (this.isLevelEnabled('info')) {
      console.log(this.formatLine('success', message, meta));
    }
  }

  child(name: string, bindings?: LogMeta): Logger {
    return new Logger(`${this.name}:${name}`, {
      level: this.level,
      format: this.format,
      useColors: this.useColors,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  /** Same component, extra fields on every line (e.g. a request fingerprint). */
  with(bindings: LogMeta): Logger {
    return new Logger(this.name, {
      level: this.level,
      format: this.format,
      useColors: this.useColors,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

// Loggers created without an explicit level follow configureLogging()
const managedLoggers = new Set<Logger>();
let configuredLevel: LogLevel | undefined;

export function createLogger(name: string, level?: LogLevel): Logger {
  const logger = new Logger(name, {
    level: level ?? configuredLevel ?? validateEnum(process.env.LOG_LEVEL, LOG_LEVEL_NAMES, 'info'),
    format: validateEnum(process.env.LOG_FORMAT, ['pretty', 'json'] as const, 'pretty'),
  });
  if (level === undefined) {
    managedLoggers.add(logger);
  }
  return logger;
}

/**
 * Applies a level from loaded configuration to every logger made by
 * createLogger, including module-level ones created before the config was
 * read, and to those created afterwards.
 */
export function configureLogging(options: { level: LogLevel }): void {
  configuredLevel = options.level;
  for (const logger of managedLoggers) {
    logger.setLevel(options.level);
  }
}

/**
 * Normalizes a caught value for a log meta field.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
