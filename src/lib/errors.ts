export type PipelineErrorCode =
  | "INVALID_CONFIG"
  | "INVALID_REQUEST"
  | "AUTH_EXHAUSTED"
  | "CREDENTIAL_EXPIRED"
  | "TRANSPORT"
  | "DECODE"
  | "BACKEND_STATUS"
  | "IO";

/** Base class for every failure the audio pipeline reports. */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed chunk length or another configuration precondition. */
export class InvalidConfigError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_CONFIG", message, options);
  }
}

/** A single request cannot be processed as given (empty text, unknown voice). */
export class InvalidRequestError extends PipelineError {
  constructor(message: string) {
    super("INVALID_REQUEST", message);
  }
}

export class AuthExhaustedError extends PipelineError {
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    super("AUTH_EXHAUSTED", `Unable to authenticate after ${attempts} attempt(s)`, options);
    this.attempts = attempts;
  }
}

/** The backend rejected the session's credentials as expired or unknown. */
export class CredentialExpiredError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CREDENTIAL_EXPIRED", message, options);
  }
}

export class TransportError extends PipelineError {
  readonly httpStatus?: number;

  constructor(message: string, options?: { cause?: unknown; httpStatus?: number }) {
    super("TRANSPORT", message, options);
    this.httpStatus = options?.httpStatus;
  }
}

export class DecodeError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DECODE", message, options);
  }
}

/** The backend answered, but reported a failure through its own status code. */
export class BackendStatusError extends PipelineError {
  readonly statusCode: number;
  readonly statusMessage: string;

  constructor(statusCode: number, statusMessage: string) {
    super("BACKEND_STATUS", `Backend returned status ${statusCode}: ${statusMessage}`);
    this.statusCode = statusCode;
    this.statusMessage = statusMessage;
  }
}

export class IOError extends PipelineError {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super("IO", `${message}: ${path}`, options);
    this.path = path;
  }
}

/** Errors in shared setup abort the whole run instead of a single request. */
export function isRunFatal(error: unknown): boolean {
  return error instanceof InvalidConfigError || error instanceof AuthExhaustedError;
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/** Reduces any thrown value to the fields worth returning to a caller. */
export function describeError(error: unknown): { code: string; message: string } {
  if (error instanceof PipelineError) {
    return { code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { code: "UNKNOWN", message: error.message };
  }
  return { code: "UNKNOWN", message: String(error) };
}
