export type ErrorCode =
  | "PROVIDER_UNAVAILABLE"
  | "PROVIDER_ERROR"
  | "INVALID_POSITION"
  | "CONFIG_ERROR";

/**
 * Base class for every error raised by codetype.
 * Carries a machine-readable code alongside the message.
 */
export class CodeTypeError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** No code provider is configured or reachable. */
export class ProviderUnavailableError extends CodeTypeError {
  constructor(message = "No code generation provider is available") {
    super(message, "PROVIDER_UNAVAILABLE");
  }
}

/** The code provider failed while generating a snippet. */
export class ProviderError extends CodeTypeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "PROVIDER_ERROR", options);
  }
}

/**
 * Read or advance outside the target text. Always a programming error:
 * the matcher checks completion before touching the buffer.
 */
export class InvalidPositionError extends CodeTypeError {
  readonly position: number;
  readonly length: number;

  constructor(position: number, length: number) {
    super(`Position ${position} is outside target of length ${length}`, "INVALID_POSITION");
    this.position = position;
    this.length = length;
  }
}

export class ConfigError extends CodeTypeError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}

export function ensureError(err: unknown): Error {
  if (err instanceof Error) {
    return err;
  }
  return new Error(typeof err === "string" ? err : JSON.stringify(err));
}
