// Error categorisation and recovery decisions for organizer runs

import { Logger } from '../types';
import { OrganizerError, describeError } from './errors';

export enum ErrorCategory {
  PERMISSION = 'permission',
  NOT_FOUND = 'not_found',
  DISK_FULL = 'disk_full',
  FILE_SYSTEM = 'file_system',
  VALIDATION = 'validation',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown',
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

export enum RecoveryStrategy {
  SKIP = 'skip',
  ABORT = 'abort',
}

export interface ErrorContext {
  operation: string;
  fileName?: string;
  filePath?: string;
  directory?: string;
  timestamp: Date;
}

export interface CategorizedError {
  originalError: Error;
  category: ErrorCategory;
  severity: ErrorSeverity;
  recoveryStrategy: RecoveryStrategy;
  context: ErrorContext;
  code?: string;
  message: string;
  userMessage: string;
}

export interface ErrorStatistics {
  totalErrors: number;
  errorsByCategory: Record<ErrorCategory, number>;
  errorsBySeverity: Record<ErrorSeverity, number>;
  skippedErrors: number;
  abortedOperations: number;
}

/**
 * Extract the Node system error code (EACCES, ENOENT, ...) from an error,
 * following `cause` links set by the organizer's own error classes.
 */
export function getSystemErrorCode(error: unknown): string | undefined {
  let current: unknown = error;

  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    const code: unknown = Reflect.get(current, 'code');
    if (typeof code === 'string' && /^E[A-Z]+$/.test(code)) {
      return code;
    }
    current = current.cause;
  }

  return undefined;
}

function createCounters<T extends string>(values: T[]): Record<T, number> {
  return values.reduce(
    (acc, value) => {
      acc[value] = 0;
      return acc;
    },
    {} as Record<T, number>
  );
}

/**
 * Categorises errors raised during a run, records statistics and a bounded
 * history, and decides whether the run may continue.
 */
export class ErrorHandler {
  private readonly logger: Logger;
  private statistics: ErrorStatistics;
  private readonly errorHistory: CategorizedError[] = [];
  private readonly maxHistorySize: number;

  constructor(logger: Logger, maxHistorySize = 1000) {
    this.logger = logger;
    this.maxHistorySize = maxHistorySize;
    this.statistics = this.createEmptyStatistics();
  }

  /**
   * Categorize and log an error
   */
  handleError(error: unknown, context: ErrorContext): CategorizedError {
    const originalError = error instanceof Error ? error : new Error(String(error));
    const categorizedError = this.categorizeError(originalError, context);

    this.updateStatistics(categorizedError);
    this.addToHistory(categorizedError);
    this.logError(categorizedError);

    return categorizedError;
  }

  getStatistics(): ErrorStatistics {
    return {
      ...this.statistics,
      errorsByCategory: { ...this.statistics.errorsByCategory },
      errorsBySeverity: { ...this.statistics.errorsBySeverity },
    };
  }

  getErrorsByCategory(category: ErrorCategory): CategorizedError[] {
    return this.errorHistory.filter((error) => error.category === category);
  }

  getHistory(): CategorizedError[] {
    return [...this.errorHistory];
  }

  clearHistory(): void {
    this.errorHistory.length = 0;
    this.statistics = this.createEmptyStatistics();
  }

  private categorizeError(error: Error, context: ErrorContext): CategorizedError {
    const code = getSystemErrorCode(error);

    let category = ErrorCategory.UNKNOWN;
    let severity = ErrorSeverity.MEDIUM;
    let recoveryStrategy = RecoveryStrategy.SKIP;

    // Organizer errors other than transfer failures are categorised by their
    // own code; everything else by the underlying system error code.
    if (error instanceof OrganizerError && error.code !== 'TRANSFER_FAILED') {
      switch (error.code) {
        case 'INVALID_PATTERN':
        case 'INDEX_OUT_OF_RANGE':
        case 'INVALID_CATEGORY':
        case 'DUPLICATE_CATEGORY':
          category = ErrorCategory.VALIDATION;
          severity = ErrorSeverity.LOW;
          break;
        case 'CONFIG_LOAD_FAILED':
        case 'CONFIG_SAVE_FAILED':
          category = ErrorCategory.CONFIGURATION;
          break;
        case 'DIRECTORY_NOT_ACCESSIBLE':
          category = ErrorCategory.NOT_FOUND;
          severity = ErrorSeverity.HIGH;
          recoveryStrategy = RecoveryStrategy.ABORT;
          break;
      }
    } else if (code === 'EACCES' || code === 'EPERM' || code === 'EROFS') {
      category = ErrorCategory.PERMISSION;
      severity = ErrorSeverity.HIGH;
    } else if (code === 'ENOENT' || code === 'ENOTDIR') {
      category = ErrorCategory.NOT_FOUND;
    } else if (code === 'ENOSPC' || code === 'EDQUOT') {
      category = ErrorCategory.DISK_FULL;
      severity = ErrorSeverity.CRITICAL;
    } else if (code !== undefined || error instanceof OrganizerError) {
      category = ErrorCategory.FILE_SYSTEM;
    }

    return {
      originalError: error,
      category,
      severity,
      recoveryStrategy,
      context,
      code,
      message: describeError(error),
      userMessage: this.generateUserMessage(category, context),
    };
  }

  private generateUserMessage(category: ErrorCategory, context: ErrorContext): string {
    const target = context.fileName ?? context.filePath ?? context.directory ?? 'the file';

    switch (category) {
      case ErrorCategory.PERMISSION:
        return `Permission denied for ${target}. Check file and folder permissions.`;
      case ErrorCategory.NOT_FOUND:
        return `${target} no longer exists.`;
      case ErrorCategory.DISK_FULL:
        return 'Not enough disk space. Free up space and try again.';
      case ErrorCategory.VALIDATION:
        return 'The value entered is not valid.';
      case ErrorCategory.CONFIGURATION:
        return 'The configuration file could not be used; defaults apply.';
      case ErrorCategory.FILE_SYSTEM:
        return `A filesystem error occurred while handling ${target}.`;
      default:
        return `An unexpected error occurred while handling ${target}.`;
    }
  }

  private updateStatistics(categorizedError: CategorizedError): void {
    this.statistics.totalErrors++;
    this.statistics.errorsByCategory[categorizedError.category]++;
    this.statistics.errorsBySeverity[categorizedError.severity]++;

    if (categorizedError.recoveryStrategy === RecoveryStrategy.ABORT) {
      this.statistics.abortedOperations++;
    } else {
      this.statistics.skippedErrors++;
    }
  }

  private addToHistory(categorizedError: CategorizedError): void {
    this.errorHistory.push(categorizedError);

    if (this.errorHistory.length > this.maxHistorySize) {
      this.errorHistory.splice(0, this.errorHistory.length - this.maxHistorySize);
    }
  }

  private logError(categorizedError: CategorizedError): void {
    const meta = {
      category: categorizedError.category,
      severity: categorizedError.severity,
      operation: categorizedError.context.operation,
      fileName: categorizedError.context.fileName,
      code: categorizedError.code,
    };

    switch (categorizedError.severity) {
      case ErrorSeverity.CRITICAL:
      case ErrorSeverity.HIGH:
      case ErrorSeverity.MEDIUM:
        this.logger.error(categorizedError.message, meta);
        break;
      case ErrorSeverity.LOW:
        this.logger.warn(categorizedError.message, meta);
        break;
    }
  }

  private createEmptyStatistics(): ErrorStatistics {
    return {
      totalErrors: 0,
      errorsByCategory: createCounters(Object.values(ErrorCategory)),
      errorsBySeverity: createCounters(Object.values(ErrorSeverity)),
      skippedErrors: 0,
      abortedOperations: 0,
    };
  }
}
