/**
 * Page-level extraction failure. Returned as a value by the page adapter,
 * never thrown, so the caller decides whether to retry, skip or abort.
 */

export type ExtractionErrorKind =
  /** The model answered with non-JSON or schema-violating output */
  | 'SchemaViolation'
  /** Timeout, rate limit or server error; the caller may retry */
  | 'Transient'
  /** Non-retryable provider failure such as rejected credentials */
  | 'Provider'
  /** The page image could not be read or is not an allowed format */
  | 'InvalidInput';

export class ExtractionError extends Error {
  readonly kind: ExtractionErrorKind;
  readonly pageIndex: number;
  readonly raw?: string;
  readonly statusCode?: number;

  constructor(
    kind: ExtractionErrorKind,
    pageIndex: number,
    message: string,
    details: { raw?: string; statusCode?: number } = {}
  ) {
    super(message);
    this.name = 'ExtractionError';
    this.kind = kind;
    this.pageIndex = pageIndex;
    this.raw = details.raw;
    this.statusCode = details.statusCode;
  }

  get retryable(): boolean {
    return this.kind === 'Transient';
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      pageIndex: this.pageIndex,
      message: this.message,
      ...(this.statusCode !== undefined ? { statusCode: this.statusCode } : {}),
      ...(this.raw !== undefined ? { raw: this.raw } : {}),
    };
  }
}

export function isExtractionError(value: unknown): value is ExtractionError {
  return value instanceof ExtractionError;
}
