/**
 * Location Audit Error Types
 *
 * Custom error classes for the acquisition pipeline. Their messages are
 * human-readable and surface verbatim in the error column of the status
 * report, so they name the resource or file that failed.
 *
 * A column that fails the mismatch tolerance is NOT an error; it is a normal
 * `false` classification.
 */

/**
 * Base class for every failure the pipeline reports as a status message
 */
export class LocationAuditError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LocationAuditError';

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * The resource could not be fetched to the scratch directory
 */
export class DownloadError extends LocationAuditError {
  constructor(
    public readonly resourceName: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not download file ${resourceName}`, options);
    this.name = 'DownloadError';
  }
}

/**
 * The downloaded archive could not be unpacked into candidate files
 */
export class ExtractionError extends LocationAuditError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

/**
 * A candidate file could not be parsed by its format reader
 */
export class ReadError extends LocationAuditError {
  constructor(
    public readonly fileName: string,
    options?: { cause?: unknown }
  ) {
    super(`Unable to read resource ${fileName}`, options);
    this.name = 'ReadError';
  }
}

/**
 * The file type is outside what this runtime can read
 */
export class UnsupportedFormatError extends LocationAuditError {
  constructor(
    public readonly format: string,
    message?: string
  ) {
    super(message ?? `Unsupported format: ${format}`);
    this.name = 'UnsupportedFormatError';
  }
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
