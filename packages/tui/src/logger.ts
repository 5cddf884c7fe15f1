/**
 * Structured Logger
 *
 * Appends JSONL entries to a log file once `init` is called. Console output
 * is off by default: while a program runs, the terminal belongs to the
 * renderer, so console lines go to stderr only when explicitly enabled.
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_PRIORITY, value);
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: unknown;
}

let currentLevel: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';
let logFileStream: fs.WriteStream | null = null;
let logFilePath: string | null = null;
let consoleEnabled = false;

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatConsoleMessage(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `${timestamp} [${level.toUpperCase()}]: ${message}`;
}

function serializeData(data: unknown): unknown {
  if (data instanceof Error) {
    return { name: data.name, message: data.message, stack: data.stack };
  }
  return data;
}

function log(level: LogLevel, message: string, data?: unknown): void {
  if (!shouldLog(level)) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    data: serializeData(data)
  };

  if (logFileStream) {
    logFileStream.write(JSON.stringify(entry) + '\n');
  }

  if (consoleEnabled) {
    process.stderr.write(formatConsoleMessage(level, message) + '\n');
  }
}

function detachStream(): fs.WriteStream | null {
  const stream = logFileStream;
  logFileStream = null;
  logFilePath = null;
  return stream;
}

export const logger = {
  /**
   * Open (or switch to) a JSONL log file
   */
  init(file: string): void {
    const resolved = path.resolve(file);
    if (logFilePath === resolved) return;

    detachStream()?.end();
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
    const stream = fs.createWriteStream(resolved, { flags: 'a' });
    // An unopenable or unwritable file turns file logging off
    stream.on('error', (error) => {
      if (logFileStream === stream) {
        detachStream();
      }
      if (consoleEnabled) {
        process.stderr.write(formatConsoleMessage('error', `Log file disabled: ${error.message}`) + '\n');
      }
    });
    logFileStream = stream;
    logFilePath = resolved;
    this.debug('Logger initialized', { logFile: resolved });
  },

  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /**
   * Path of the open log file, or null when file logging is off
   */
  getFile(): string | null {
    return logFilePath;
  },

  debug(message: string, data?: unknown): void {
    log('debug', message, data);
  },

  info(message: string, data?: unknown): void {
    log('info', message, data);
  },

  warn(message: string, data?: unknown): void {
    log('warn', message, data);
  },

  error(message: string, data?: unknown): void {
    log('error', message, data);
  },

  /**
   * Close the log file. Resolves once buffered entries are flushed.
   */
  close(): Promise<void> {
    const stream = detachStream();
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
  }
};

export function setConsoleLoggingEnabled(enabled: boolean): void {
  consoleEnabled = enabled;
}
