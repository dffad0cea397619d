import { HttpError } from '../errors'

const DEFAULT_MAX_ATTEMPTS = 3
const DEFAULT_INITIAL_MS = 500

export interface RetryOptions {
  maxAttempts?: number
  /** first backoff delay; doubles after each failed attempt */
  initialMs?: number
  /** false stops retrying and rethrows at once */
  shouldRetry?: (e: unknown) => boolean
}

/**
 * Client errors (blocked bot, unknown chat, bad request) fail the same way every time.
 * 429 is rate limiting and worth another try, as are 5xx and network failures.
 */
export function isTransient(e: unknown): boolean {
  if (!(e instanceof HttpError)) return true
  return e.status === 429 || e.status < 400 || e.status >= 500
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  const initialMs = options.initialMs ?? DEFAULT_INITIAL_MS
  const shouldRetry = options.shouldRetry ?? (() => true)
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (e) {
      if (attempt >= maxAttempts || !shouldRetry(e)) throw e
      await sleep(initialMs * 2 ** (attempt - 1))
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
