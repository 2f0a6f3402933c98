/**
 * Error taxonomy for JSON-LD writing.
 *
 * Every failure aborts the whole `write` call; nothing here is retried.
 */

export type JsonLdWriterErrorCode = 'CONFIGURATION' | 'TRANSFORM' | 'IO';

export class JsonLdWriterError extends Error {
  constructor(
    message: string,
    public readonly code: JsonLdWriterErrorCode,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'JsonLdWriterError';
  }
}

/**
 * The writer was asked for something it cannot do with the settings given,
 * such as framing without a frame.
 */
export class ConfigurationError extends JsonLdWriterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION', options);
    this.name = 'ConfigurationError';
  }
}

/**
 * The JSON-LD engine rejected its input.
 */
export class TransformError extends JsonLdWriterError {
  /** Error code reported by the engine, e.g. `invalid local context` */
  public readonly transformCode: string | undefined;

  constructor(message: string, options?: { cause?: unknown; transformCode?: string }) {
    super(message, 'TRANSFORM', options);
    this.name = 'TransformError';
    this.transformCode = options?.transformCode;
  }

  /**
   * Wrap whatever the engine threw.
   */
  static wrap(operation: string, err: unknown): TransformError {
    if (err instanceof TransformError) {
      return err;
    }
    const message = err instanceof Error ? err.message : String(err);
    return new TransformError(`JSON-LD ${operation} failed: ${message}`, {
      cause: err,
      transformCode: extractTransformCode(err),
    });
  }
}

/**
 * The output sink refused the serialized text.
 */
export class IOError extends JsonLdWriterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'IO', options);
    this.name = 'IOError';
  }
}

// jsonld.js reports `{ details: { code } }` on its errors
function extractTransformCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('details' in err)) {
    return undefined;
  }
  const details = err.details;
  if (typeof details !== 'object' || details === null || !('code' in details)) {
    return undefined;
  }
  return typeof details.code === 'string' ? details.code : undefined;
}
