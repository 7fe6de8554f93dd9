export type ConfigurationErrorCode =
  | 'RESERVED_PAYLOAD_KEY'
  | 'MISSING_SECRET_KEY'
  | 'INVALID_CONFIGURATION';

export type DecodeErrorCode = 'INVALID_BASE64' | 'INVALID_UTF8' | 'INVALID_JSON' | 'MALFORMED_TOKEN';

export class SessionTokenError extends Error {
  constructor(
    public code: string,
    message: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SessionTokenError';

    // Maintain proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Caller misuse. Aborts the operation; never patched over.
 */
export class ConfigurationError extends SessionTokenError {
  constructor(
    public code: ConfigurationErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Malformed text handed to the codec. Verification paths turn this into `false`.
 */
export class DecodeError extends SessionTokenError {
  constructor(
    public code: DecodeErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, details);
    this.name = 'DecodeError';
  }
}

export class SecureRandomUnavailableError extends SessionTokenError {
  constructor(cause?: unknown) {
    super(
      'SECURE_RANDOM_UNAVAILABLE',
      'Secure random source is not available',
      cause instanceof Error ? { cause: cause.message } : undefined
    );
    this.name = 'SecureRandomUnavailableError';
  }
}

// Predefined error types
export const SessionErrors = {
  RESERVED_PAYLOAD_KEY: (key: string) =>
    new ConfigurationError(
      'RESERVED_PAYLOAD_KEY',
      `extra payload for session tokens may not contain '${key}'`,
      { key }
    ),

  MISSING_SECRET_KEY: (operation: string) =>
    new ConfigurationError(
      'MISSING_SECRET_KEY',
      `A secret key is required to ${operation}`,
      { operation }
    ),

  INVALID_CONFIGURATION: (message: string, details?: Record<string, unknown>) =>
    new ConfigurationError('INVALID_CONFIGURATION', `Configuration error: ${message}`, details),

  INVALID_BASE64: (details?: Record<string, unknown>) =>
    new DecodeError('INVALID_BASE64', 'Input is not valid URL-safe base64', details),

  INVALID_UTF8: () => new DecodeError('INVALID_UTF8', 'Decoded bytes are not valid UTF-8'),

  INVALID_JSON: (reason: string) =>
    new DecodeError('INVALID_JSON', `Token payload is not a valid session payload: ${reason}`),

  MALFORMED_TOKEN: (details?: Record<string, unknown>) =>
    new DecodeError('MALFORMED_TOKEN', 'Malformed session token', details),
} as const;

// Error sanitization for logging
export function sanitizeError(error: unknown): Record<string, unknown> {
  if (error instanceof SessionTokenError) {
    return {
      type: error.name,
      code: error.code,
      message: error.message,
      // Don't include details in production to prevent information leakage
      ...(process.env.NODE_ENV !== 'production' && { details: error.details }),
    };
  }

  if (error instanceof Error) {
    return {
      type: 'Error',
      message: error.message,
      name: error.name,
      // Only include stack trace in development
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    };
  }

  return {
    type: 'Unknown',
    message: 'An unknown error occurred',
  };
}
