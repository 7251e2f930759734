/**
 * ReportProcessingError
 *
 * Base error class for report post-processing failures.
 */
export class ReportProcessingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ReportProcessingError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create ReportProcessingError from unknown error with context
   */
  static fromError(context: string, error: unknown): ReportProcessingError {
    return new ReportProcessingError(
      `${context}: ${ReportProcessingError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * DocumentLoadError
 *
 * Error thrown when a document file cannot be read or does not match the
 * content model.
 */
export class DocumentLoadError extends ReportProcessingError {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to load document ${path}: ${message}`, options);
    this.name = 'DocumentLoadError';
  }
}

/**
 * DocumentSaveError
 *
 * Error thrown when the processed document cannot be persisted.
 * The previous file content is left in place.
 */
export class DocumentSaveError extends ReportProcessingError {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to save document ${path}: ${message}`, options);
    this.name = 'DocumentSaveError';
  }
}

/**
 * InvalidPageGeometryError
 *
 * Error thrown when page width minus side margins leaves no room for content.
 */
export class InvalidPageGeometryError extends ReportProcessingError {
  constructor(readonly usableWidth: number) {
    super(
      `Usable content width must be positive, got ${usableWidth} EMU`,
    );
    this.name = 'InvalidPageGeometryError';
  }
}

/**
 * StageError
 *
 * Error raised inside a pipeline stage, carrying the stage name and the item
 * being processed (e.g. "table 3", "paragraph 12", "image 2").
 */
export class StageError extends ReportProcessingError {
  constructor(
    readonly stage: string,
    readonly target: string | undefined,
    message: string,
    options?: ErrorOptions,
  ) {
    super(
      target ? `[${stage}] ${target}: ${message}` : `[${stage}] ${message}`,
      options,
    );
    this.name = 'StageError';
  }

  /**
   * Wrap an error thrown while processing `target` in `stage`
   */
  static wrap(stage: string, target: string, error: unknown): StageError {
    if (error instanceof StageError) {
      return error;
    }
    return new StageError(
      stage,
      target,
      ReportProcessingError.getErrorMessage(error),
      { cause: error },
    );
  }
}
