import { closeSync, fstatSync, mkdirSync, openSync, readFileSync, writeSync } from 'fs';
import { dirname } from 'path';
import { inspect } from 'node:util';

export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3
}

interface LoggerConfig {
  level: LogLevel;
}

interface FileSink {
  path: string;
  fd: number;
  // Byte length of the file when attached; earlier runs end here
  start: number;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.QUIET]: 'INFO ',
  [LogLevel.NORMAL]: 'INFO ',
  [LogLevel.VERBOSE]: 'VERB ',
  [LogLevel.DEBUG]: 'DEBUG'
};

class Logger {
  private static instance: Logger;
  private config: LoggerConfig = {
    level: LogLevel.NORMAL
  };
  private sink: FileSink | null = null;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  // Create a contextual logger
  createContext(context: string): ContextualLogger {
    return new ContextualLogger(context, this);
  }

  /**
   * Start appending every emitted line to `path`. Creates the parent
   * directory and the file when missing; throws if either cannot be opened.
   */
  attachFile(path: string): void {
    this.detachFile();
    mkdirSync(dirname(path), { recursive: true });
    const fd = openSync(path, 'a');
    this.sink = { path, fd, start: fstatSync(fd).size };
  }

  detachFile(): void {
    if (!this.sink) return;
    closeSync(this.sink.fd);
    this.sink = null;
  }

  getFilePath(): string | undefined {
    return this.sink?.path;
  }

  /** Lines written since the file was attached; empty when none is attached. */
  readFile(): string {
    if (!this.sink) return '';
    return readFileSync(this.sink.path).subarray(this.sink.start).toString('utf-8');
  }

  // Core logging methods
  log(level: LogLevel, message: string, context?: string, data?: unknown): void {
    if (level > this.config.level) return;

    const prefix = context ? `[${context}] ` : '';
    const formattedMessage = `${prefix}${message}`;
    this.writeToSink(LEVEL_LABELS[level], formattedMessage, data);

    // In quiet mode, only show essential completion messages
    if (this.config.level === LogLevel.QUIET) {
      if (level === LogLevel.QUIET) {
        console.log(formattedMessage);
      }
      return;
    }

    console.log(formattedMessage);
    if (data !== undefined) {
      console.log(data);
    }
  }

  // Convenience methods
  quiet(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.QUIET, message, context, data);
  }

  normal(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.NORMAL, message, context, data);
  }

  verbose(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.VERBOSE, message, context, data);
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  error(message: string, context?: string, data?: unknown): void {
    const prefix = context ? `[${context}] ` : '';
    // The log file always records errors, even in quiet mode
    this.writeToSink('ERROR', `${prefix}${message}`, data);

    if (this.config.level > LogLevel.QUIET) {
      console.error(`${prefix}${message}`);
      if (data !== undefined) {
        console.error(data);
      }
    }
  }

  private writeToSink(label: string, message: string, data?: unknown): void {
    if (!this.sink) return;
    const suffix = data === undefined ? '' : ` ${formatData(data)}`;
    writeSync(this.sink.fd, `${new Date().toISOString()} ${label} ${message}${suffix}\n`);
  }
}

// Contextual logger for component-specific logging
export class ContextualLogger {
  constructor(
    private context: string,
    private logger: Logger
  ) {}

  quiet(message: string, data?: unknown): void {
    this.logger.quiet(message, this.context, data);
  }

  normal(message: string, data?: unknown): void {
    this.logger.normal(message, this.context, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.verbose(message, this.context, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.context, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.context, data);
  }
}

// Export singleton instance
export const logger = Logger.getInstance();

function formatData(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data instanceof Error) return data.stack ?? data.message;
  return inspect(data, { depth: 4, breakLength: Infinity });
}

// Helper to parse log level from string
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.NORMAL;

  switch (level.toLowerCase()) {
    case 'quiet':
    case 'q':
      return LogLevel.QUIET;
    case 'verbose':
    case 'v':
      return LogLevel.VERBOSE;
    case 'debug':
    case 'd':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

// Format helpers
export const formatTime = (ms: number): string => {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};
