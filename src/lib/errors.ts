export type LedgerErrorCode = 'validation' | 'not_found' | 'storage'

export abstract class LedgerError extends Error {
  abstract readonly code: LedgerErrorCode
}

/** Bad user input. Recoverable: the conversation stays where it was and asks again. */
export class ValidationError extends LedgerError {
  readonly code = 'validation' as const
  constructor(message: string, readonly field?: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/** Nothing to act on, e.g. undo with an empty history. */
export class NotFoundError extends LedgerError {
  readonly code = 'not_found' as const
  constructor(message: string) {
    super(message)
    this.name = 'NotFoundError'
  }
}

/** Persistence failed. Never retried by the ledger; the caller decides. */
export class StorageError extends LedgerError {
  readonly code = 'storage' as const
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StorageError'
  }
}

/** A remote HTTP API answered with an error status (Telegram, Google). */
export class HttpError extends Error {
  constructor(message: string, readonly status: number) {
    super(message)
    this.name = 'HttpError'
  }
}
