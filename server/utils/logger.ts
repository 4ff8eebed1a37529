/**
 * Standardized logging system for the chart telemetry reconciler
 *
 * Console output is colored and compact, file output is one JSON entry per line
 * in a daily log file.
 */

import fs from 'fs';
import path from 'path';
import { AppError, ErrorSeverity } from './errors';

// Log levels and colors for console output
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical'
}

export interface LogOptions {
  level?: LogLevel;
  module?: string;
  context?: Record<string, unknown>;
  error?: Error;
  timestamp?: Date;
}

export interface LogEntry {
  message: string;
  level: LogLevel;
  module: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    name?: string;
  };
  timestamp: string;
}

export interface LoggerOptions {
  logDir?: string;
  enableConsole?: boolean;
  enableFile?: boolean;
  minLevel?: LogLevel;
}

// Map from ErrorSeverity to LogLevel
const severityToLevel = {
  [ErrorSeverity.INFO]: LogLevel.INFO,
  [ErrorSeverity.WARNING]: LogLevel.WARNING,
  [ErrorSeverity.ERROR]: LogLevel.ERROR,
  [ErrorSeverity.CRITICAL]: LogLevel.CRITICAL
} as const;

const levelOrder: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARNING]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.CRITICAL]: 4
};

// Terminal colors
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  bold: '\x1b[1m'
};

// Map log levels to colors
const levelColors: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: colors.cyan,
  [LogLevel.INFO]: colors.green,
  [LogLevel.WARNING]: colors.yellow,
  [LogLevel.ERROR]: colors.red,
  [LogLevel.CRITICAL]: `${colors.red}${colors.bold}`
};

function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * Main logger class
 */
export class Logger {
  private logDir: string;
  private enableConsole: boolean;
  private enableFile: boolean;
  private minLevel: LogLevel;
  private currentLogFile: string | null = null;
  private currentLogStream: fs.WriteStream | null = null;

  constructor(options: LoggerOptions = {}) {
    this.logDir = options.logDir ?? './logs';
    this.enableConsole = options.enableConsole ?? true;
    this.enableFile = options.enableFile ?? true;
    this.minLevel = options.minLevel ?? LogLevel.DEBUG;

    // Create log directory if it doesn't exist
    if (this.enableFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  /**
   * Log a message
   */
  log(message: string, options: LogOptions = {}): void {
    const {
      level = LogLevel.INFO,
      module = 'app',
      context = {},
      error,
      timestamp = new Date()
    } = options;

    if (levelOrder[level] < levelOrder[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      message,
      level,
      module,
      context,
      timestamp: timestamp.toISOString()
    };

    if (error) {
      entry.error = {
        message: error.message,
        stack: error.stack,
        name: error.name
      };
    }

    if (this.enableFile) {
      this.writeToFile(entry);
    }

    if (this.enableConsole) {
      this.writeToConsole(entry);
    }
  }

  debug(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.DEBUG });
  }

  info(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.INFO });
  }

  warning(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.WARNING });
  }

  error(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.ERROR });
  }

  critical(message: string, options: Omit<LogOptions, 'level'> = {}): void {
    this.log(message, { ...options, level: LogLevel.CRITICAL });
  }

  /**
   * Log an error object, using its severity and context when it is an AppError
   */
  logError(error: Error, options: Omit<LogOptions, 'error'> = {}): void {
    let level = LogLevel.ERROR;
    let errorContext: Record<string, unknown> = {};

    if (error instanceof AppError) {
      level = severityToLevel[error.severity] || LogLevel.ERROR;
      errorContext = { category: error.category, ...error.context };
    }

    this.log(
      error.message,
      {
        ...options,
        level,
        error,
        context: {
          ...options.context,
          ...errorContext
        }
      }
    );
  }

  /**
   * Flush and close the current log file
   */
  close(): Promise<void> {
    const stream = this.currentLogStream;
    this.currentLogStream = null;
    this.currentLogFile = null;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise(resolve => stream.end(resolve));
  }

  /**
   * Get the current log file name based on date
   */
  private getLogFileName(): string {
    const date = new Date();
    const formattedDate = `${date.getFullYear()}-${String(date.getMonth() + 1).padStart(2, '0')}-${String(date.getDate()).padStart(2, '0')}`;
    return path.join(this.logDir, `reconciler_${formattedDate}.log`);
  }

  private writeToFile(entry: LogEntry): void {
    try {
      const logFileName = this.getLogFileName();

      // If log file has changed, close current stream and open new one
      if (this.currentLogFile !== logFileName || !this.currentLogStream) {
        if (this.currentLogStream) {
          this.currentLogStream.end();
        }

        this.currentLogFile = logFileName;
        this.currentLogStream = fs.createWriteStream(logFileName, { flags: 'a' });
      }

      this.currentLogStream.write(JSON.stringify(entry) + '\n');
    } catch (err) {
      console.error(`Failed to write to log file: ${err}`);
    }
  }

  private writeToConsole(entry: LogEntry): void {
    const levelColor = levelColors[entry.level] || colors.reset;
    const timestamp = entry.timestamp.split('T')[1].replace('Z', '');

    // Format: [TIMESTAMP] [LEVEL] [MODULE] MESSAGE
    const prefix = `${colors.cyan}[${timestamp}]${colors.reset} ${levelColor}[${entry.level.toUpperCase()}]${colors.reset} ${colors.blue}[${entry.module}]${colors.reset}`;

    console.log(`${prefix} ${entry.message}`);

    // Context only in debug/error modes
    if (entry.level === LogLevel.DEBUG || entry.level === LogLevel.ERROR || entry.level === LogLevel.CRITICAL) {
      if (Object.keys(entry.context || {}).length > 0) {
        console.log(`${colors.cyan}Context:${colors.reset}`, entry.context);
      }
    }

    if (entry.error?.stack && (entry.level === LogLevel.ERROR || entry.level === LogLevel.CRITICAL)) {
      console.log(`${colors.red}Stack:${colors.reset} ${entry.error.stack}`);
    }
  }
}

const isTest = process.env.NODE_ENV === 'test';
const envLevel = process.env.LOG_LEVEL ?? '';

// Shared logger instance; console is muted and files are off under Jest
export const logger = new Logger({
  logDir: process.env.LOG_DIR || './logs',
  enableConsole: !isTest,
  enableFile: !isTest && process.env.LOG_TO_FILE !== 'false',
  minLevel: isLogLevel(envLevel) ? envLevel : LogLevel.INFO
});
