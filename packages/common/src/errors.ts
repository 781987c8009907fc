// --- Base Error ---

export class InvokerError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'InvokerError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Config Error ---

export type ConfigErrorCode = 'INVALID_CONFIG' | 'UNKNOWN_TYPE' | 'ALREADY_REGISTERED' | 'MISSING_KEY' | 'INVALID_VALUE'

export interface ConfigErrorDetails {
  readonly type?: string | undefined
  readonly key?: string | undefined
  readonly envVar?: string | undefined
  readonly issues?: readonly string[] | undefined
}

export class ConfigError extends InvokerError {
  declare readonly code: ConfigErrorCode
  readonly details: ConfigErrorDetails

  constructor(code: ConfigErrorCode, message: string, details: ConfigErrorDetails = {}) {
    super(code, message)
    this.name = 'ConfigError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Pool Error ---

export type PoolErrorCode = 'INVALID_POOL_SIZE' | 'FOREIGN_INVOKER' | 'DOUBLE_RELEASE'

export class PoolError extends InvokerError {
  declare readonly code: PoolErrorCode

  constructor(code: PoolErrorCode, message: string) {
    super(code, message)
    this.name = 'PoolError'
  }
}

// --- Connection Error ---

export interface ConnectionErrorDetails {
  readonly type: string
  readonly endpoint: string
}

export class ConnectionError extends InvokerError {
  declare readonly code: 'CONNECTION_FAILED'
  readonly details: ConnectionErrorDetails

  constructor(details: ConnectionErrorDetails, cause?: Error | undefined) {
    super('CONNECTION_FAILED', `${details.type}: cannot connect to ${details.endpoint}`, cause ? { cause } : undefined)
    this.name = 'ConnectionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Input Error ---

export type InputErrorCode =
  | 'UNPARSABLE_INPUT'
  | 'MISSING_ROLE'
  | 'UNKNOWN_ROLE'
  | 'MISSING_CONTENT'
  | 'MISSING_JSON_INSTRUCTION'

export class InputError extends InvokerError {
  declare readonly code: InputErrorCode

  constructor(code: InputErrorCode, message: string, cause?: Error | undefined) {
    super(code, message, cause ? { cause } : undefined)
    this.name = 'InputError'
  }
}

// --- Invocation Error ---

export class InvocationError extends InvokerError {
  declare readonly code: 'EMPTY_RESPONSE'
  readonly type: string

  constructor(code: 'EMPTY_RESPONSE', type: string, message: string) {
    super(code, message)
    this.name = 'InvocationError'
    this.type = type
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      type: this.type,
    }
  }
}

// --- Helpers ---

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof InvokerError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}
