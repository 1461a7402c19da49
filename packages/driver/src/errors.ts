/* -------------------------------------------------------------------------- */
/*  Driver error taxonomy                                                      */
/* -------------------------------------------------------------------------- */

export type DgtErrorCode =
  /** No matching port, or the port could not be opened. */
  | 'unavailable'
  /** Codec desync; fatal to the session. */
  | 'malformed'
  /** Physical disconnect or port I/O failure; fatal to the session. */
  | 'io-lost'
  /** A command's reply did not arrive in time; the session stays up. */
  | 'timeout'
  /** A command was in flight when its session died. */
  | 'connection-lost'
  /** Command issued after an explicit close. */
  | 'closed'
  | 'session-dead'
  | 'duplicate-request'
  | 'cancelled'

const RETRYABLE: ReadonlySet<DgtErrorCode> = new Set<DgtErrorCode>([
  'unavailable',
  'malformed',
  'io-lost',
  'timeout',
  'connection-lost',
])

export class DgtError extends Error {
  public readonly name = 'DgtError'
  public readonly retryable: boolean

  constructor(
    public readonly code: DgtErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.retryable = RETRYABLE.has(code)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DgtError)
    }
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      context: this.context,
    }
  }
}

export function isDgtError(err: unknown, code?: DgtErrorCode): err is DgtError {
  return err instanceof DgtError && (code === undefined || err.code === code)
}

/** Normalize anything thrown into a DgtError, keeping existing codes. */
export function toDgtError(err: unknown, fallback: DgtErrorCode): DgtError {
  if (err instanceof DgtError) return err
  if (err instanceof Error) return new DgtError(fallback, err.message, undefined, { cause: err })
  return new DgtError(fallback, typeof err === 'string' ? err : 'unknown error')
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
