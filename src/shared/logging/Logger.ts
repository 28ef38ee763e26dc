/**
 * Structured metadata attached to a log line
 */
export type LogMeta = Record<string, unknown>;

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: unknown, meta?: LogMeta): void;
  fatal(message: string, error?: unknown, meta?: LogMeta): void;
  setLevel?(level: LogLevel | string): void;
  child?(name: string): ILogger;
}

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4,
  SILENT = 5
}

/**
 * Stream the lines are written to. Saved paths go to stdout, so the CLI
 * keeps its logs on stderr.
 */
export type LogDestination = 'stdout' | 'stderr';

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  name?: string;
  timestamp?: boolean;
  colorize?: boolean;
  json?: boolean;
  prettyPrint?: boolean;
  destination?: LogDestination;
}

/**
 * Log entry
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  logger: string;
  message: string;
  meta?: LogMeta;
  error?: Error;
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements ILogger {
  private config: LoggerConfig;
  private readonly name: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: LogLevel.INFO,
      timestamp: true,
      colorize: true,
      json: false,
      prettyPrint: true,
      destination: 'stderr',
      ...config
    };
    this.name = config.name || 'App';
  }

  getName(): string {
    return this.name;
  }

  debug(message: string, meta?: LogMeta): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.ERROR, message, meta, toError(error));
  }

  fatal(message: string, error?: unknown, meta?: LogMeta): void {
    this.log(LogLevel.FATAL, message, meta, toError(error));
  }

  setLevel(level: LogLevel | string): void {
    if (typeof level === 'string') {
      const levelValue = parseLogLevel(level);
      if (levelValue !== undefined) {
        this.config.level = levelValue;
      }
    } else {
      this.config.level = level;
    }
  }

  /**
   * Apply a partial configuration, e.g. after the CLI flags are parsed
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  child(name: string): ILogger {
    return LoggerFactory.getLogger(`${this.name}.${name}`);
  }

  /**
   * Core logging method
   */
  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (level < this.config.level) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      logger: this.name,
      message,
      meta,
      error
    };

    if (this.config.json) {
      this.logJson(entry);
    } else {
      this.logPretty(entry);
    }
  }

  /**
   * Log in JSON format
   */
  private logJson(entry: LogEntry): void {
    const output = {
      timestamp: entry.timestamp.toISOString(),
      level: LogLevel[entry.level],
      logger: entry.logger,
      message: entry.message,
      ...(entry.meta && { meta: entry.meta }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack
        }
      })
    };

    this.write(JSON.stringify(output));
  }

  /**
   * Log in pretty format
   */
  private logPretty(entry: LogEntry): void {
    const parts: string[] = [];

    if (this.config.timestamp) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }

    parts.push(this.getLevelString(entry.level));
    parts.push(`[${entry.logger}]`);
    parts.push(entry.message);

    this.write(parts.join(' '));

    if (entry.meta && this.config.prettyPrint) {
      this.write(`  Meta: ${JSON.stringify(entry.meta)}`);
    }

    if (entry.error) {
      this.write(`  Error: ${entry.error.message}`);
      if (entry.error.stack && entry.level >= LogLevel.ERROR && this.config.level === LogLevel.DEBUG) {
        this.write(`  Stack: ${entry.error.stack}`);
      }
    }
  }

  /**
   * Get level string with color
   */
  private getLevelString(level: LogLevel): string {
    const levelName = LogLevel[level];

    if (!this.config.colorize) {
      return `[${levelName}]`;
    }

    // ANSI color codes
    const colors: Record<number, string> = {
      [LogLevel.DEBUG]: '\x1b[36m', // Cyan
      [LogLevel.INFO]: '\x1b[32m',  // Green
      [LogLevel.WARN]: '\x1b[33m',  // Yellow
      [LogLevel.ERROR]: '\x1b[31m', // Red
      [LogLevel.FATAL]: '\x1b[35m'  // Magenta
    };

    const reset = '\x1b[0m';
    return `${colors[level]}[${levelName}]${reset}`;
  }

  private write(line: string): void {
    const stream = this.config.destination === 'stdout' ? process.stdout : process.stderr;
    stream.write(`${line}\n`);
  }
}

/**
 * Logger factory
 */
export class LoggerFactory {
  private static loggers: Map<string, ConsoleLogger> = new Map();
  private static defaultConfig: Partial<LoggerConfig> = {
    level: LogLevel.INFO,
    timestamp: true,
    colorize: true
  };

  /**
   * Create or get logger
   */
  static getLogger(name: string, config?: Partial<LoggerConfig>): ConsoleLogger {
    const key = name || 'default';

    let logger = this.loggers.get(key);
    if (!logger) {
      logger = new ConsoleLogger({
        ...this.defaultConfig,
        ...config,
        name: key
      });
      this.loggers.set(key, logger);
    }

    return logger;
  }

  /**
   * Set default configuration and apply it to the loggers created so far
   */
  static setDefaultConfig(config: Partial<LoggerConfig>): void {
    this.defaultConfig = { ...this.defaultConfig, ...config };
    this.loggers.forEach(logger => logger.configure(config));
  }

  /**
   * Clear all loggers
   */
  static clear(): void {
    this.loggers.clear();
  }
}

/**
 * Create child logger
 */
export function createChildLogger(parent: ILogger, name: string): ILogger {
  return parent.child ? parent.child(name) : parent;
}

/**
 * Logger that drops everything, for library callers that bring no logger
 */
export class NullLogger implements ILogger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  fatal(): void {}
}

export function parseLogLevel(value: string): LogLevel | undefined {
  switch (value.trim().toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'INFO': return LogLevel.INFO;
    case 'WARN': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    case 'FATAL': return LogLevel.FATAL;
    case 'SILENT': return LogLevel.SILENT;
    default: return undefined;
  }
}

function toError(error: unknown): Error | undefined {
  if (error === undefined || error === null) {
    return undefined;
  }
  return error instanceof Error ? error : new Error(String(error));
}

export type Logger = ILogger;
