/**
 * Base error class for photo-batcher errors
 */
export class PhotoBatcherError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PhotoBatcherError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when attempting to read or write beyond buffer bounds
 */
export class BufferOverflowError extends PhotoBatcherError {
  public readonly requested: number;
  public readonly available: number;

  constructor(requested: number, available: number) {
    super(`Buffer overflow: requested ${requested} bytes but only ${available} available`);
    this.name = 'BufferOverflowError';
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Thrown when a container (JPEG segment stream) is corrupted or malformed
 */
export class CorruptedFileError extends PhotoBatcherError {
  public readonly offset: number | undefined;

  constructor(message: string, offset?: number) {
    super(offset !== undefined ? `${message} at offset ${offset}` : message);
    this.name = 'CorruptedFileError';
    this.offset = offset;
  }
}

/**
 * The embedded EXIF block is malformed, truncated or absent.
 * Never reaches callers of the batch API: decoding falls back to an empty document.
 */
export class MetadataDecodeError extends PhotoBatcherError {
  public readonly offset: number | undefined;

  constructor(message: string, offset?: number) {
    super(offset !== undefined ? `${message} at offset ${offset}` : message);
    this.name = 'MetadataDecodeError';
    this.offset = offset;
  }
}

/**
 * A metadata document cannot be serialized into an EXIF block.
 * The batch continues without embedding metadata for that image.
 */
export class MetadataEncodeError extends PhotoBatcherError {
  constructor(message: string) {
    super(message);
    this.name = 'MetadataEncodeError';
  }
}

/**
 * A timestamp matches neither `YYYY:MM:DD HH:MM:SS` nor `YYYY-MM-DD HH:MM:SS`
 */
export class DateParseError extends PhotoBatcherError {
  public readonly input: string;

  constructor(input: string) {
    super(`Unrecognized date: "${input}"`);
    this.name = 'DateParseError';
    this.input = input;
  }
}

/**
 * Base class for naming-pattern problems
 */
export class FilenameTemplateError extends PhotoBatcherError {
  public readonly pattern: string;

  constructor(message: string, pattern: string) {
    super(message);
    this.name = 'FilenameTemplateError';
    this.pattern = pattern;
  }
}

/**
 * The naming pattern references a placeholder other than {index}, {name} or {date}
 */
export class UnsupportedTokenError extends FilenameTemplateError {
  public readonly token: string;

  constructor(token: string, pattern: string) {
    super(`Unsupported token {${token}} in pattern "${pattern}"`, pattern);
    this.name = 'UnsupportedTokenError';
    this.token = token;
  }
}

/**
 * The naming pattern has an unmatched brace
 */
export class TemplateSyntaxError extends FilenameTemplateError {
  public readonly position: number;

  constructor(pattern: string, position: number) {
    super(`Unmatched '${pattern.charAt(position)}' at position ${position} in pattern "${pattern}"`, pattern);
    this.name = 'TemplateSyntaxError';
    this.position = position;
  }
}

/**
 * Input bytes are not an image sharp can decode
 */
export class ImageDecodeError extends PhotoBatcherError {
  public readonly fileName: string;

  constructor(fileName: string, reason: string) {
    super(`Cannot decode ${fileName}: ${reason}`);
    this.name = 'ImageDecodeError';
    this.fileName = fileName;
  }
}

/**
 * sharp could not produce the output image, e.g. a target too large for the format
 */
export class ImageEncodeError extends PhotoBatcherError {
  public readonly fileName: string;

  constructor(fileName: string, reason: string) {
    super(`Cannot encode ${fileName}: ${reason}`);
    this.name = 'ImageEncodeError';
    this.fileName = fileName;
  }
}

/**
 * Resize spec or output policy failed validation
 */
export class InvalidOptionsError extends PhotoBatcherError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join('; ')}`);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }
}

/**
 * Raised by the fail-fast policy: the batch stopped at `index` and produced no archive
 */
export class BatchProcessingError extends PhotoBatcherError {
  public readonly index: number;
  public readonly fileName: string;
  public override readonly cause: unknown;

  constructor(index: number, fileName: string, cause: unknown) {
    super(`Batch aborted at item ${index} (${fileName}): ${describeError(cause)}`);
    this.name = 'BatchProcessingError';
    this.index = index;
    this.fileName = fileName;
    this.cause = cause;
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
