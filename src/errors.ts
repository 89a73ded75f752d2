/**
 * Error types
 *
 * Every failure raised by the library is a {@link SurveyError} carrying a
 * stable `code`, so the CLI (or any other front end) can map it to a message
 * that names the offending field or file.
 */

export type SurveyErrorCode =
  | 'INVALID_INPUT'
  | 'EMPTY_DATASET'
  | 'MALFORMED_FILE'
  | 'FILE_NOT_FOUND'
  | 'WRITE_FAILED';

export class SurveyError extends Error {
  public readonly code: SurveyErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: SurveyErrorCode, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A record field is absent or a coordinate is not a usable number.
 */
export class InvalidInputError extends SurveyError {
  public readonly field: string;
  public readonly row?: number;

  constructor(message: string, field: string, row?: number) {
    super(message, 'INVALID_INPUT', { field, row });
    this.field = field;
    this.row = row;
  }
}

/**
 * An aggregate was requested over zero points.
 */
export class EmptyDatasetError extends SurveyError {
  constructor(operation: string) {
    super(`Cannot ${operation} an empty dataset`, 'EMPTY_DATASET', { operation });
  }
}

export class MalformedFileError extends SurveyError {
  public readonly filePath: string;

  constructor(message: string, filePath: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, 'MALFORMED_FILE', { filePath, ...details }, options);
    this.filePath = filePath;
  }
}

export class SurveyFileNotFoundError extends SurveyError {
  public readonly filePath: string;

  constructor(filePath: string, options?: ErrorOptions) {
    super(`File not found: ${filePath}`, 'FILE_NOT_FOUND', { filePath }, options);
    this.filePath = filePath;
  }
}

export class SurveyFileWriteError extends SurveyError {
  public readonly filePath: string;

  constructor(filePath: string, options?: ErrorOptions) {
    super(`An error occurred while writing to the file: ${filePath}`, 'WRITE_FAILED', { filePath }, options);
    this.filePath = filePath;
  }
}
