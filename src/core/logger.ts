import { Logger, LogLevel, LogMeta } from '../types';
import * as fs from 'fs';
import * as path from 'path';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
  sessionId?: string;
  component?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableFileLogging: boolean;
  logFilePath: string;
  maxFileSize: number; // in bytes
  maxFiles: number;
  enableConsole: boolean;
  sessionId?: string;
  component?: string;
}

export const LOG_LEVEL_ORDER: readonly LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVEL_ORDER as readonly string[]).includes(value);
}

function shouldLog(configured: LogLevel, level: LogLevel): boolean {
  return LOG_LEVEL_ORDER.indexOf(level) <= LOG_LEVEL_ORDER.indexOf(configured);
}

/**
 * Logger writing an append-only operational log (one JSON entry per line) and,
 * optionally, formatted lines to the console.
 *
 * The log file is opened in append mode so entries from earlier processes are
 * kept. Once it grows past `maxFileSize` it is rotated to `<file>.1`, `<file>.2`,
 * and so on, keeping at most `maxFiles` files.
 */
export class EnhancedLogger implements Logger {
  private readonly config: LoggerConfig;
  private logFileSize: number = 0;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: 'INFO',
      enableFileLogging: true,
      logFilePath: './file_organizer.log',
      maxFileSize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
      enableConsole: true,
      ...config
    };

    if (this.config.enableFileLogging) {
      this.initializeFileLogging();
    }
  }

  error(message: string, meta?: LogMeta): void {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('DEBUG', message, meta);
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!shouldLog(this.config.level, level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta,
      sessionId: this.config.sessionId,
      component: this.config.component
    };

    if (this.config.enableConsole) {
      this.logToConsole(entry);
    }

    if (this.config.enableFileLogging) {
      this.logToFile(entry);
    }
  }

  private logToConsole(entry: LogEntry): void {
    const prefix = `[${entry.level}] ${entry.timestamp}`;
    const suffix = entry.component ? ` [${entry.component}]` : '';
    const metaStr = entry.meta ? ` ${JSON.stringify(entry.meta)}` : '';

    const fullMessage = `${prefix}${suffix} ${entry.message}${metaStr}`;

    switch (entry.level) {
      case 'ERROR':
        console.error(fullMessage);
        break;
      case 'WARN':
        console.warn(fullMessage);
        break;
      case 'INFO':
        console.info(fullMessage);
        break;
      case 'DEBUG':
        console.debug(fullMessage);
        break;
    }
  }

  private logToFile(entry: LogEntry): void {
    const logLine = JSON.stringify(entry) + '\n';

    try {
      fs.appendFileSync(this.config.logFilePath, logLine);
      this.logFileSize += Buffer.byteLength(logLine);

      if (this.logFileSize > this.config.maxFileSize) {
        this.rotateLogFile();
      }
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private initializeFileLogging(): void {
    try {
      const directory = path.dirname(this.config.logFilePath);
      if (!fs.existsSync(directory)) {
        fs.mkdirSync(directory, { recursive: true });
      }

      this.logFileSize = fs.existsSync(this.config.logFilePath)
        ? fs.statSync(this.config.logFilePath).size
        : 0;
    } catch (error) {
      console.error('Failed to initialize file logging:', error);
      this.config.enableFileLogging = false;
    }
  }

  private rotateLogFile(): void {
    const base = this.config.logFilePath;

    try {
      // Shift <file>.N-1 -> <file>.N, dropping whatever falls off the end
      for (let index = this.config.maxFiles - 1; index >= 1; index--) {
        const from = index === 1 ? base : `${base}.${index - 1}`;
        const to = `${base}.${index}`;
        if (fs.existsSync(from)) {
          fs.renameSync(from, to);
        }
      }

      if (this.config.maxFiles <= 1) {
        fs.truncateSync(base, 0);
      }

      this.logFileSize = 0;
    } catch (error) {
      console.error('Failed to rotate log file:', error);
    }
  }

  public getLogFilePath(): string | undefined {
    return this.config.enableFileLogging ? this.config.logFilePath : undefined;
  }
}

/**
 * Simple console logger, used by tests and when no log file is wanted
 */
export class ConsoleLogger implements Logger {
  private readonly logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'INFO') {
    this.logLevel = logLevel;
  }

  error(message: string, meta?: LogMeta): void {
    if (shouldLog(this.logLevel, 'ERROR')) {
      console.error(`[ERROR] ${message}`, meta ? JSON.stringify(meta, null, 2) : '');
    }
  }

  warn(message: string, meta?: LogMeta): void {
    if (shouldLog(this.logLevel, 'WARN')) {
      console.warn(`[WARN] ${message}`, meta ? JSON.stringify(meta, null, 2) : '');
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (shouldLog(this.logLevel, 'INFO')) {
      console.info(`[INFO] ${message}`, meta ? JSON.stringify(meta, null, 2) : '');
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (shouldLog(this.logLevel, 'DEBUG')) {
      console.debug(`[DEBUG] ${message}`, meta ? JSON.stringify(meta, null, 2) : '');
    }
  }
}
