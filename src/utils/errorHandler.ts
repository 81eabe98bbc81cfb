import { logger } from './logger';

export interface ErrorContext {
  operation: string;
  identifier?: string | undefined;
  requestId?: string | undefined;
  additionalData?: Record<string, unknown> | undefined;
}

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export class AppError extends Error {
  public readonly code: string;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: string,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    context: ErrorContext,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = new Date();

    Error.captureStackTrace(this, new.target);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      identifier: this.context.identifier,
      timestamp: this.timestamp.toISOString()
    };
  }
}

export interface SerializedError {
  code: string;
  message: string;
  identifier?: string | undefined;
  timestamp: string;
}

/** The data source could not be reached, answered with an error, or sent an unusable body. */
export class FetchError extends AppError {
  public readonly status: number | undefined;

  constructor(message: string, context: ErrorContext, status?: number, cause?: unknown) {
    super(message, 'FETCH_ERROR', ErrorSeverity.MEDIUM, context, cause);
    this.name = 'FetchError';
    this.status = status;
  }
}

/** One alert could not be delivered. The pair stays out of the ledger. */
export class NotifyError extends AppError {
  public readonly identifier: string;

  constructor(message: string, identifier: string, cause?: unknown) {
    super(message, 'NOTIFY_ERROR', ErrorSeverity.MEDIUM, { operation: 'notify', identifier }, cause);
    this.name = 'NotifyError';
    this.identifier = identifier;
  }
}

export class LedgerReadError extends AppError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, 'LEDGER_READ_ERROR', ErrorSeverity.HIGH, {
      operation: 'ledger_load',
      additionalData: { filePath }
    }, cause);
    this.name = 'LedgerReadError';
  }
}

export class LedgerWriteError extends AppError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, 'LEDGER_WRITE_ERROR', ErrorSeverity.HIGH, {
      operation: 'ledger_save',
      additionalData: { filePath }
    }, cause);
    this.name = 'LedgerWriteError';
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', ErrorSeverity.CRITICAL, { operation: 'load_config' });
    this.name = 'ConfigError';
  }
}

// Errors raised by Node internals can come from another realm (Jest's vm sandbox), where
// `instanceof Error` is false. Read their fields structurally instead.
function readField(error: unknown, field: 'message' | 'name' | 'code'): string | undefined {
  if (typeof error !== 'object' || error === null || !(field in error)) {
    return undefined;
  }
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return readField(error, 'code') === code;
}

export function describeError(error: unknown): string {
  return readField(error, 'message') ?? String(error);
}

export function normalizeError(error: unknown, context: ErrorContext): AppError {
  if (error instanceof AppError) {
    return error;
  }

  const message = describeError(error);
  let code = 'UNKNOWN_ERROR';
  let severity = ErrorSeverity.MEDIUM;

  const name = readField(error, 'name');
  if (name === 'TypeError' || name === 'ReferenceError') {
    code = 'PROGRAMMING_ERROR';
    severity = ErrorSeverity.HIGH;
  } else if (message.includes('ECONNREFUSED') || message.includes('ETIMEDOUT')) {
    code = 'CONNECTION_ERROR';
  }

  return new AppError(message, code, severity, context, error);
}

export function logAppError(error: AppError): void {
  const logData = {
    code: error.code,
    severity: error.severity,
    context: error.context,
    cause: error.cause === undefined ? undefined : describeError(error.cause)
  };

  switch (error.severity) {
    case ErrorSeverity.CRITICAL:
      logger.error(`CRITICAL: ${error.message}`, logData);
      break;
    case ErrorSeverity.HIGH:
      logger.error(error.message, logData);
      break;
    case ErrorSeverity.MEDIUM:
      logger.warn(error.message, logData);
      break;
    case ErrorSeverity.LOW:
      logger.info(error.message, logData);
      break;
  }
}

export function createErrorContext(
  operation: string,
  additionalData?: Record<string, unknown>
): ErrorContext {
  return {
    operation,
    requestId: `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`,
    additionalData
  };
}
