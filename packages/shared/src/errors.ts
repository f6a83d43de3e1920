export class AppError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message)
    this.name = 'AppError'
  }
}

// Malformed or unknown frame. Recovered per frame.
export class ProtocolError extends AppError {
  constructor(message: string, details?: unknown) {
    super('PROTOCOL_ERROR', message, details)
    this.name = 'ProtocolError'
  }
}

export class AuthError extends AppError {
  constructor(message = 'Authentication failed') {
    super('AUTH_FAILED', message)
    this.name = 'AuthError'
  }
}

export class SpawnError extends AppError {
  constructor(message: string, details?: unknown) {
    super('SPAWN_FAILED', message, details)
    this.name = 'SpawnError'
  }
}

export class PtyIoError extends AppError {
  constructor(
    public readonly operation: 'read' | 'write' | 'resize' | 'kill',
    message: string,
    details?: unknown,
  ) {
    super('PTY_IO', message, details)
    this.name = 'PtyIoError'
  }
}

export class InputOverflowError extends AppError {
  constructor(pendingBytes: number, limit: number) {
    super('INPUT_OVERFLOW', `Input queue full (${pendingBytes}/${limit} bytes pending)`, { pendingBytes, limit })
    this.name = 'InputOverflowError'
  }
}

export class TransportError extends AppError {
  constructor(message: string, details?: unknown) {
    super('TRANSPORT', message, details)
    this.name = 'TransportError'
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super('CONFIG_INVALID', message, details)
    this.name = 'ConfigError'
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
