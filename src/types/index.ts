// Core interfaces and types for the file organizer

export * from './utils';

export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  error(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

export type TransferMode = 'move' | 'copy';

export interface RunOptions {
  organizeByDate: boolean;
  copyInsteadOfMove: boolean;
}

// Configuration validation
export interface ConfigValidationResult {
  isValid: boolean;
  errors: string[];
}
