/**
 * Error classes for the KiCad file library.
 *
 * Malformed documents never throw; they produce diagnostics. These errors are
 * for caller bugs (contract violations) and for the file-system boundary.
 */

export interface ErrorContext {
  operation: string;
  timestamp: Date;
  [key: string]: unknown;
}

export class KicadError extends Error {
  public readonly code: string;
  public readonly context: ErrorContext;

  constructor(message: string, code: string, context?: Partial<ErrorContext>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.context = {
      ...(context || {}),
      operation: context?.operation || 'unknown',
      timestamp: context?.timestamp ?? new Date(),
    };
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/** An invalid argument was passed to a typed engine operation. */
export class ContractViolationError extends KicadError {
  constructor(message: string, context?: Partial<ErrorContext>) {
    super(message, 'CONTRACT_VIOLATION', context);
  }
}

/** Reading or writing a file failed at the file-system level. */
export class KicadFileError extends KicadError {
  public readonly filePath: string | undefined;

  constructor(message: string, filePath: string | undefined, cause?: unknown, context?: Partial<ErrorContext>) {
    super(message, 'FILE_ERROR', { ...context, filePath }, { cause });
    this.filePath = filePath;
  }
}

export class OperationAbortedError extends KicadError {
  constructor(operation: string) {
    super(`Operation aborted: ${operation}`, 'ABORTED', { operation });
  }
}

export function isKicadError(error: unknown): error is KicadError {
  return error instanceof KicadError;
}
