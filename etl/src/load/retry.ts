import { setTimeout as sleep } from 'node:timers/promises'

// Connection drops, server restarts and lock contention
const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  '57P01',
  '57P03',
  '53300',
  '08001',
  '08004',
  '08006',
  'SQLITE_BUSY',
])

const errorCode = (error: unknown): string | undefined =>
  typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined

/**
 * True when the error, or any error in its cause chain or inside an
 * AggregateError, is worth another attempt.
 */
export function isTransientError(error: unknown): boolean {
  const seen = new Set<unknown>()
  const pending: unknown[] = [error]
  while (pending.length) {
    const current = pending.pop()
    if (current === undefined || current === null || seen.has(current)) continue
    seen.add(current)
    const code = errorCode(current)
    if (code !== undefined && TRANSIENT_CODES.has(code)) return true
    if (current instanceof AggregateError) pending.push(...current.errors)
    if (current instanceof Error) pending.push(current.cause)
  }
  return false
}

export interface RetryOptions {
  retries: number
  delayMs: number
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void
}

/** Runs `fn`, retrying transient failures with exponential backoff. */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      if (attempt > options.retries || !isTransientError(error)) throw error
      const waitMs = options.delayMs * 2 ** (attempt - 1)
      options.onRetry?.(error, attempt, waitMs)
      await sleep(waitMs)
    }
  }
}
