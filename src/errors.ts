export type ImageBudgetErrorCode =
  | "TRANSPORT_DECODE"
  | "HEADER_PROBE"
  | "DIMENSION_READ"
  | "UNSUPPORTED_FORMAT"
  | "FULL_DECODE"
  | "ENCODE";

/**
 * Base class of every failure raised by the processing pipeline.
 * `code` tags the stage that failed; the underlying codec error, if any,
 * is kept as `cause`.
 */
export class ImageBudgetError extends Error {
  readonly code: ImageBudgetErrorCode;

  constructor(code: ImageBudgetErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class TransportDecodeError extends ImageBudgetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TRANSPORT_DECODE", message, options);
  }
}

export class HeaderProbeError extends ImageBudgetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("HEADER_PROBE", message, options);
  }
}

export class DimensionReadError extends ImageBudgetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DIMENSION_READ", message, options);
  }
}

export class UnsupportedFormatError extends ImageBudgetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("UNSUPPORTED_FORMAT", message, options);
  }
}

export class FullDecodeError extends ImageBudgetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("FULL_DECODE", message, options);
  }
}

export class EncodeError extends ImageBudgetError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ENCODE", message, options);
  }
}

export function isImageBudgetError(value: unknown): value is ImageBudgetError {
  return value instanceof ImageBudgetError;
}
