export type ErrorCode =
  | 'invalid_input'
  | 'invalid_range'
  | 'validation_failed'
  | 'conflict'
  | 'not_found'
  | 'already_cancelled'
  | 'storage_error'
  | 'config_error'
  | 'system_error'

export class DomainError extends Error {
  code: ErrorCode
  http?: number
  details?: string[]
  constructor(code: ErrorCode, message: string, options: { http?: number; details?: string[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'DomainError'
    this.code = code
    this.http = options.http
    this.details = options.details
  }
}

export class StorageError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super('storage_error', message, { http: 500, cause })
    this.name = 'StorageError'
  }
}

export class ConfigError extends DomainError {
  constructor(message: string, details?: string[]) {
    super('config_error', message, { details })
    this.name = 'ConfigError'
  }
}

export class NotFoundError extends DomainError {
  constructor(entity: string, id: string) {
    super('not_found', `${entity} ${id} not found`, { http: 404 })
  }
}

export class ConflictError extends DomainError {
  constructor(roomName: string) {
    super('conflict', `Room ${roomName} is not available for the requested time slot`, { http: 409 })
  }
}

export type ServiceResult<T> = { ok: true; value: T } | { ok: false; error: DomainError }

export function ok<T>(value: T): ServiceResult<T> {
  return { ok: true, value }
}

export function fail<T>(error: DomainError): ServiceResult<T> {
  return { ok: false, error }
}
