/**
 * Error types raised by the MAR decoder and the signable-bytes encoder.
 */

/** Stable decode failure codes. */
export type MarDecodeErrorCode =
  | 'TooShort'
  | 'TruncatedSignature'
  | 'InvalidBlockSize'
  | 'IndexOutOfBounds'
  | 'MissingNameTerminator'
  | 'DuplicateName'
  | 'IndexSizeMismatch'
  | 'BoundsViolation';

/** Stable signable-bytes encode failure codes. */
export type MarEncodeErrorCode = 'IndexSizeMismatch' | 'MissingContent' | 'BoundsViolation';

export type MarErrorCode = MarDecodeErrorCode | MarEncodeErrorCode;

export interface MarErrorOptions {
  /** Byte position the failure was detected at, when known. */
  readonly offset?: number | undefined;
  /** Index entry the failure relates to, when known. */
  readonly fileName?: string | undefined;
  readonly cause?: unknown;
}

/**
 * Base class for every MAR codec failure. Any instance means the archive must be rejected.
 */
export class MarError extends Error {
  readonly code: MarErrorCode;
  readonly offset?: number | undefined;
  readonly fileName?: string | undefined;

  constructor(code: MarErrorCode, message: string, options?: MarErrorOptions) {
    super(options?.offset !== undefined ? `${message} (at byte ${options.offset})` : message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'MarError';
    this.code = code;
    this.offset = options?.offset;
    this.fileName = options?.fileName;
  }

  toJSON(): { name: string; code: MarErrorCode; message: string; offset?: number; fileName?: string } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.offset !== undefined ? { offset: this.offset } : {}),
      ...(this.fileName !== undefined ? { fileName: this.fileName } : {})
    };
  }
}

export class MarDecodeError extends MarError {
  override readonly code: MarDecodeErrorCode;

  constructor(code: MarDecodeErrorCode, message: string, options?: MarErrorOptions) {
    super(code, message, options);
    this.name = 'MarDecodeError';
    this.code = code;
  }
}

export class MarEncodeError extends MarError {
  override readonly code: MarEncodeErrorCode;

  constructor(code: MarEncodeErrorCode, message: string, options?: MarErrorOptions) {
    super(code, message, options);
    this.name = 'MarEncodeError';
    this.code = code;
  }
}
