// src/utils/errors.ts

export class RelayError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

// Token store errors
export class StoreUnavailableError extends RelayError {
  constructor(message: string = 'Token store unavailable', details?: Record<string, unknown>) {
    super(message, 'STORE_UNAVAILABLE', details, 503);
  }
}

// Token errors
export class TokenError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>, statusCode = 400) {
    super(message, 'TOKEN_ERROR', details, statusCode);
  }
}

export class MissingAccessTokenError extends TokenError {
  constructor(
    message: string = 'No access token stored. Call /init or complete login first',
    details?: Record<string, unknown>
  ) {
    super(message, details, 400);
    this.code = 'MISSING_ACCESS_TOKEN';
  }
}

export class MissingRefreshTokenError extends TokenError {
  constructor(message: string = 'No refresh token stored', details?: Record<string, unknown>) {
    super(message, details, 400);
    this.code = 'MISSING_REFRESH_TOKEN';
  }
}

export class RenewalFailedError extends TokenError {
  constructor(message: string = 'Failed to renew token', details?: Record<string, unknown>) {
    super(message, details, 500);
    this.code = 'RENEWAL_FAILED';
  }
}

// Upstream errors
export class UpstreamError extends RelayError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'UPSTREAM_ERROR', { ...details, status }, status);
  }
}

// Network errors
export class NetworkError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details, 502);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
    this.statusCode = 504;
  }
}

// Caller-facing errors
export class ValidationError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details, 400);
  }
}

export class NoTrackPlayingError extends RelayError {
  constructor(message: string = 'No track playing', details?: Record<string, unknown>) {
    super(message, 'NO_TRACK_PLAYING', details, 400);
  }
}

export class AuthenticationError extends RelayError {
  constructor(message: string = 'Valid API key required', details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_REQUIRED', details, 401);
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_INCOMPLETE', details, 400);
  }
}

export function isRelayError(error: unknown): error is RelayError {
  return error instanceof RelayError;
}
