import type { Failure, Result } from './result.js';

export class SwitchyardError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SwitchyardError';
  }
}

export class ConfigError extends SwitchyardError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class TransportError extends SwitchyardError {
  constructor(message: string, public readonly url?: string, cause?: Error) {
    super(message, 'TRANSPORT_ERROR', 'connect', cause);
    this.name = 'TransportError';
  }
}

export class RegistrationError extends SwitchyardError {
  constructor(message: string, public readonly appName?: string, cause?: Error) {
    super(message, 'REGISTRATION_ERROR', 'register', cause);
    this.name = 'RegistrationError';
  }
}

export class AuthenticationError extends SwitchyardError {
  constructor(message: string, public readonly userId?: string) {
    super(message, 'AUTHENTICATION_ERROR', 'authenticate');
    this.name = 'AuthenticationError';
  }
}

export class ValidationError extends SwitchyardError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION_ERROR', 'route');
    this.name = 'ValidationError';
  }
}

export class HandlerError extends SwitchyardError {
  constructor(message: string, public readonly appName?: string, cause?: Error) {
    super(message, 'HANDLER_ERROR', 'handle', cause);
    this.name = 'HandlerError';
  }
}

export class CacheError extends SwitchyardError {
  constructor(message: string, cause?: Error) {
    super(message, 'CACHE_ERROR', 'cache', cause);
    this.name = 'CacheError';
  }
}

export class SyncError extends SwitchyardError {
  constructor(message: string, public readonly itemId?: string, cause?: Error) {
    super(message, 'SYNC_ERROR', 'sync', cause);
    this.name = 'SyncError';
  }
}

/** The exception matching a failed result's error kind. */
export function toSwitchyardError(failure: Failure): SwitchyardError {
  switch (failure.errorKind) {
    case 'transport':
      return new TransportError(failure.detail);
    case 'registration':
      return new RegistrationError(failure.detail);
    case 'authentication':
      return new AuthenticationError(failure.detail);
    case 'validation':
      return new ValidationError(failure.detail);
    case 'handler':
      return new HandlerError(failure.detail);
    case 'timeout':
      return new SwitchyardError(failure.detail, 'TIMEOUT');
    case 'cache':
      return new CacheError(failure.detail);
    case 'sync':
      return new SyncError(failure.detail);
  }
}

/** Value of a successful result; throws the matching error otherwise. */
export function unwrap<T>(result: Result<T>): T {
  if (result.ok) return result.value;
  throw toSwitchyardError(result);
}
