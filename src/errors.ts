/**
 * Standardized error codes for emitter failures.
 */
export enum ErrorCode {
  IO_ERROR = 'IO_ERROR',
  LOCKED = 'LOCKED',
  NOT_FOUND = 'NOT_FOUND',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
}

export interface ErrorDetail {
  path: (string | number)[];
  message: string;
}

/**
 * Base class for all custom application errors.
 */
export class AppError extends Error {
  public readonly exitCode: number;
  public readonly code: ErrorCode;

  public constructor(message: string, exitCode: number, code: ErrorCode) {
    super(message);
    this.exitCode = exitCode;
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype); // restore prototype chain
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised when a file cannot be written or read.
 * `errno` is the underlying system code, e.g. ENOENT or EACCES.
 */
export class EmitIoError extends AppError {
  public readonly path: string;
  public readonly errno?: string;

  public constructor(message: string, path: string, errno?: string) {
    super(message, 1, ErrorCode.IO_ERROR);
    this.path = path;
    this.errno = errno;
  }
}

/**
 * Represents a file lock error.
 */
export class LockError extends AppError {
  public readonly details: { file: string };

  public constructor(message: string, file: string) {
    super(message, 1, ErrorCode.LOCKED);
    this.details = { file };
  }
}

/**
 * Represents a validation error (bad input, config or manifest).
 */
export class ValidationError extends AppError {
  public readonly details?: ErrorDetail[];

  public constructor(message: string, details?: ErrorDetail[]) {
    super(message, 2, ErrorCode.VALIDATION_ERROR);
    this.details = details;
  }
}

/**
 * Represents a "not found" error.
 */
export class NotFoundError extends AppError {
  public constructor(message = 'Template not found') {
    super(message, 3, ErrorCode.NOT_FOUND);
  }
}

/**
 * Reads the errno code off a thrown value, if it has one.
 */
export function errnoOf(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
