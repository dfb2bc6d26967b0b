export const ErrorCode = {
  StorageUnavailable: 'storage_unavailable',
  StorageQueryFailed: 'storage_query_failed',
  NotificationFailed: 'notification_failed',
  NotificationTimeout: 'notification_timeout',
  InvalidConfiguration: 'invalid_configuration',
  UnknownProtocol: 'unknown_protocol',
  InvalidQuery: 'invalid_query',
  NotFound: 'not_found',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class MonitorError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

// Store unreachable or a query failed
export class StorageError extends MonitorError {
  constructor(message: string, code: ErrorCode = ErrorCode.StorageQueryFailed, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

// Sink delivery failed or timed out; never escapes AlertManager.save
export class NotificationError extends MonitorError {
  constructor(message: string, code: ErrorCode = ErrorCode.NotificationFailed, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class ConfigurationError extends MonitorError {
  constructor(message: string, code: ErrorCode = ErrorCode.InvalidConfiguration, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
