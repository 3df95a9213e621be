/**
 * Error taxonomy for translation parsing.
 *
 * Malformed input and duplicate keys abort the whole parse. Invalid tree paths
 * are reported as `null` results, and template classification never throws.
 */

export class TranslationError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'TranslationError';
  }
}

export interface TextPosition {
  lineNumber: number;
  columnNumber: number;
  startPosition: number;
  endPosition: number;
}

/**
 * Raised for content that cannot be tokenized: unterminated quotes, rows with
 * missing cells, empty keys, JSON syntax errors.
 */
export class MalformedInputError extends TranslationError {
  public readonly lineNumber: number;
  public readonly columnNumber: number;
  public readonly startPosition: number;
  public readonly endPosition: number;

  constructor(message: string, position: TextPosition, cause?: unknown) {
    super(message, cause);
    this.name = 'MalformedInputError';
    this.lineNumber = position.lineNumber;
    this.columnNumber = position.columnNumber;
    this.startPosition = position.startPosition;
    this.endPosition = position.endPosition;
  }
}

export class DuplicateKeyError extends TranslationError {
  constructor(public readonly key: string, public readonly lineNumber?: number) {
    super(
      lineNumber === undefined
        ? `Duplicate key '${key}' specified`
        : `Duplicate key '${key}' detected on line ${lineNumber}`
    );
    this.name = 'DuplicateKeyError';
  }
}

/**
 * Raised when a decoded document cannot be turned into entries, e.g. a JSON
 * root that is not an object or a field with an empty name.
 */
export class InvalidDocumentError extends TranslationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'InvalidDocumentError';
  }
}

export class UnsupportedFormatError extends TranslationError {
  constructor(public readonly extension: string, message?: string) {
    super(message ?? `No parser registered for the '${extension}' file extension`);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Wraps a parse failure with the identity of the file it came from.
 */
export class TranslationFileError extends TranslationError {
  public readonly lineNumber?: number;
  public readonly key?: string;
  /** Message without the file and line prefix */
  public readonly detail: string;

  constructor(public readonly fileName: string, message: string, cause?: unknown) {
    const lineNumber =
      cause instanceof MalformedInputError || cause instanceof DuplicateKeyError
        ? cause.lineNumber
        : undefined;
    super(lineNumber === undefined ? `${fileName}: ${message}` : `${fileName}:${lineNumber}: ${message}`, cause);
    this.name = 'TranslationFileError';
    this.lineNumber = lineNumber;
    this.key = cause instanceof DuplicateKeyError ? cause.key : undefined;
    this.detail = message;
  }

  static wrap(fileName: string, error: unknown): TranslationFileError {
    if (error instanceof TranslationFileError) {
      return error;
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TranslationFileError(fileName, message, error);
  }
}

/**
 * Raised for configuration files that are missing, unreadable or invalid.
 */
export class ConfigError extends TranslationError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigError';
  }
}
