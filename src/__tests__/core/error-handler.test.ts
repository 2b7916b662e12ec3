import {
  ErrorCategory,
  ErrorHandler,
  ErrorSeverity,
  RecoveryStrategy,
  getSystemErrorCode,
} from '../../core/error-handler';
import {
  ConfigSaveError,
  DirectoryNotAccessibleError,
  IndexOutOfRangeError,
  InvalidPatternError,
  TransferFailedError,
} from '../../core/errors';
import { ConsoleLogger } from '../../core/logger';

function systemError(code: string, message = `${code}: operation failed`): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(message);
  error.code = code;
  return error;
}

describe('ErrorHandler', () => {
  let errorHandler: ErrorHandler;
  let logger: ConsoleLogger;

  beforeEach(() => {
    logger = new ConsoleLogger('ERROR');
    errorHandler = new ErrorHandler(logger, 3); // Small history size for testing
  });

  describe('getSystemErrorCode', () => {
    it('should read the code of a system error', () => {
      expect(getSystemErrorCode(systemError('EACCES'))).toBe('EACCES');
    });

    it('should follow cause links', () => {
      expect(getSystemErrorCode(new TransferFailedError('a.txt', systemError('ENOSPC')))).toBe('ENOSPC');
    });

    it('should ignore the organizer error codes and non-errors', () => {
      expect(getSystemErrorCode(new IndexOutOfRangeError(2, 1))).toBeUndefined();
      expect(getSystemErrorCode('EACCES')).toBeUndefined();
    });
  });

  describe('Error Categorization', () => {
    const context = { operation: 'move', fileName: 'a.txt', timestamp: new Date() };

    it('should categorize permission errors', () => {
      const categorizedError = errorHandler.handleError(new TransferFailedError('a.txt', systemError('EACCES')), context);

      expect(categorizedError.category).toBe(ErrorCategory.PERMISSION);
      expect(categorizedError.severity).toBe(ErrorSeverity.HIGH);
      expect(categorizedError.recoveryStrategy).toBe(RecoveryStrategy.SKIP);
      expect(categorizedError.code).toBe('EACCES');
      expect(categorizedError.userMessage).toBe('Permission denied for a.txt. Check file and folder permissions.');
    });

    it('should categorize missing files', () => {
      const categorizedError = errorHandler.handleError(new TransferFailedError('a.txt', systemError('ENOENT')), context);

      expect(categorizedError.category).toBe(ErrorCategory.NOT_FOUND);
      expect(categorizedError.severity).toBe(ErrorSeverity.MEDIUM);
      expect(categorizedError.recoveryStrategy).toBe(RecoveryStrategy.SKIP);
    });

    it('should categorize a full disk as critical', () => {
      const categorizedError = errorHandler.handleError(systemError('ENOSPC'), context);

      expect(categorizedError.category).toBe(ErrorCategory.DISK_FULL);
      expect(categorizedError.severity).toBe(ErrorSeverity.CRITICAL);
    });

    it('should categorize other system errors as filesystem errors', () => {
      const categorizedError = errorHandler.handleError(systemError('EBUSY'), context);

      expect(categorizedError.category).toBe(ErrorCategory.FILE_SYSTEM);
    });

    it('should abort on an inaccessible directory even when caused by ENOENT', () => {
      const error = new DirectoryNotAccessibleError('/missing', systemError('ENOENT'));
      const categorizedError = errorHandler.handleError(error, {
        operation: 'organize',
        directory: '/missing',
        timestamp: new Date(),
      });

      expect(categorizedError.category).toBe(ErrorCategory.NOT_FOUND);
      expect(categorizedError.severity).toBe(ErrorSeverity.HIGH);
      expect(categorizedError.recoveryStrategy).toBe(RecoveryStrategy.ABORT);
      expect(categorizedError.userMessage).toBe('/missing no longer exists.');
    });

    it('should categorize validation and configuration errors', () => {
      const validation = errorHandler.handleError(new InvalidPatternError('('), context);
      const configuration = errorHandler.handleError(
        new ConfigSaveError('/tmp/organizer-config.json', systemError('EROFS')),
        context
      );

      expect(validation.category).toBe(ErrorCategory.VALIDATION);
      expect(validation.severity).toBe(ErrorSeverity.LOW);
      expect(configuration.category).toBe(ErrorCategory.CONFIGURATION);
      expect(configuration.severity).toBe(ErrorSeverity.MEDIUM);
    });

    it('should wrap values that are not errors', () => {
      const categorizedError = errorHandler.handleError('something odd', context);

      expect(categorizedError.category).toBe(ErrorCategory.UNKNOWN);
      expect(categorizedError.originalError).toBeInstanceOf(Error);
      expect(categorizedError.message).toBe('something odd');
    });
  });

  describe('Logging', () => {
    it('should log low severity errors as warnings and others as errors', () => {
      const warnSpy = jest.spyOn(logger, 'warn');
      const errorSpy = jest.spyOn(logger, 'error');
      const context = { operation: 'add_exclude_pattern', timestamp: new Date() };

      errorHandler.handleError(new InvalidPatternError('('), context);
      errorHandler.handleError(systemError('EACCES'), context);

      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith('EACCES: operation failed', {
        category: ErrorCategory.PERMISSION,
        severity: ErrorSeverity.HIGH,
        operation: 'add_exclude_pattern',
        fileName: undefined,
        code: 'EACCES',
      });
    });
  });

  describe('Statistics and history', () => {
    it('should count errors by category, severity and strategy', () => {
      const context = { operation: 'move', timestamp: new Date() };
      errorHandler.handleError(systemError('EACCES'), context);
      errorHandler.handleError(systemError('EPERM'), context);
      errorHandler.handleError(new DirectoryNotAccessibleError('/x'), context);

      const stats = errorHandler.getStatistics();
      expect(stats.totalErrors).toBe(3);
      expect(stats.errorsByCategory[ErrorCategory.PERMISSION]).toBe(2);
      expect(stats.errorsByCategory[ErrorCategory.NOT_FOUND]).toBe(1);
      expect(stats.errorsBySeverity[ErrorSeverity.HIGH]).toBe(3);
      expect(stats.skippedErrors).toBe(2);
      expect(stats.abortedOperations).toBe(1);
      expect(errorHandler.getErrorsByCategory(ErrorCategory.PERMISSION)).toHaveLength(2);
    });

    it('should keep only the most recent errors', () => {
      const context = { operation: 'move', timestamp: new Date() };
      for (const code of ['EACCES', 'ENOENT', 'ENOSPC', 'EBUSY']) {
        errorHandler.handleError(systemError(code), context);
      }

      expect(errorHandler.getHistory().map((error) => error.code)).toEqual(['ENOENT', 'ENOSPC', 'EBUSY']);
      expect(errorHandler.getStatistics().totalErrors).toBe(4);
    });

    it('should reset history and statistics', () => {
      errorHandler.handleError(systemError('EACCES'), { operation: 'move', timestamp: new Date() });
      errorHandler.clearHistory();

      expect(errorHandler.getHistory()).toEqual([]);
      expect(errorHandler.getStatistics().totalErrors).toBe(0);
    });
  });
});
