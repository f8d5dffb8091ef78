export type ErrorKind =
  | 'configuration'
  | 'transient'
  | 'quota'
  | 'malformed-response'
  | 'persistence'
  | 'empty-batch'

export abstract class ConfidantError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Missing or placeholder credentials. Never retried. */
export class ConfigurationError extends ConfidantError {
  readonly kind = 'configuration' as const
}

export class TransientProviderError extends ConfidantError {
  readonly kind = 'transient' as const
  readonly retryable = true
  readonly statusCode: number | null

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options)
    this.statusCode = options?.statusCode ?? null
  }
}

export class QuotaExceededError extends ConfidantError {
  readonly kind = 'quota' as const
  readonly statusCode: number

  constructor(statusCode: number, options?: { cause?: unknown }) {
    super('Hourly usage limit reached', options)
    this.statusCode = statusCode
  }
}

export class MalformedResponseError extends ConfidantError {
  readonly kind = 'malformed-response' as const
}

export class PersistenceError extends ConfidantError {
  readonly kind = 'persistence' as const
}

export class EmptyBatchError extends ConfidantError {
  readonly kind = 'empty-batch' as const
}

export function isConfidantError(e: unknown): e is ConfidantError {
  return e instanceof ConfidantError
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message
  if (typeof e === 'string') return e
  return 'Unknown error'
}
