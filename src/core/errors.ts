// Error types raised or returned by the organizer

export type OrganizerErrorCode =
  | 'DIRECTORY_NOT_ACCESSIBLE'
  | 'TRANSFER_FAILED'
  | 'INVALID_PATTERN'
  | 'INDEX_OUT_OF_RANGE'
  | 'INVALID_CATEGORY'
  | 'DUPLICATE_CATEGORY'
  | 'CONFIG_LOAD_FAILED'
  | 'CONFIG_SAVE_FAILED';

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export abstract class OrganizerError extends Error {
  abstract readonly code: OrganizerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The target of a run is missing, not a directory or not readable.
 * Raised before anything in the directory is touched.
 */
export class DirectoryNotAccessibleError extends OrganizerError {
  readonly code = 'DIRECTORY_NOT_ACCESSIBLE';

  constructor(
    public readonly directory: string,
    cause?: unknown
  ) {
    super(`Directory is not accessible: ${directory}${cause ? ` (${describeError(cause)})` : ''}`, {
      cause,
    });
  }
}

/**
 * A single file could not be moved or copied. Returned, not thrown, by the
 * transfer layer; the run counts it as skipped.
 */
export class TransferFailedError extends OrganizerError {
  readonly code = 'TRANSFER_FAILED';

  constructor(
    public readonly fileName: string,
    cause: unknown
  ) {
    super(`Failed to organize ${fileName}: ${describeError(cause)}`, { cause });
  }
}

export class InvalidPatternError extends OrganizerError {
  readonly code = 'INVALID_PATTERN';

  constructor(
    public readonly pattern: string,
    cause?: unknown
  ) {
    super(`Invalid regular expression pattern: ${pattern}${cause ? ` (${describeError(cause)})` : ''}`, {
      cause,
    });
  }
}

export class IndexOutOfRangeError extends OrganizerError {
  readonly code = 'INDEX_OUT_OF_RANGE';

  constructor(
    public readonly index: number,
    public readonly length: number
  ) {
    super(`Index ${index} is out of range (${length} item${length === 1 ? '' : 's'})`);
  }
}

export class InvalidCategoryError extends OrganizerError {
  readonly code = 'INVALID_CATEGORY';
}

export class DuplicateCategoryError extends OrganizerError {
  readonly code = 'DUPLICATE_CATEGORY';

  constructor(public readonly category: string) {
    super(`Category '${category}' already exists`);
  }
}

export class ConfigLoadError extends OrganizerError {
  readonly code = 'CONFIG_LOAD_FAILED';

  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(`Failed to load configuration from ${filePath}: ${describeError(cause)}`, { cause });
  }
}

export class ConfigSaveError extends OrganizerError {
  readonly code = 'CONFIG_SAVE_FAILED';

  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(`Failed to save configuration to ${filePath}: ${describeError(cause)}`, { cause });
  }
}
