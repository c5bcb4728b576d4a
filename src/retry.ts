export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; lastError: unknown }

export interface RetryOptions {
  attempts: number
  delayMs: number
  sleep?: Sleep
  /** Called after each failed attempt; `error` is null when the attempt produced nothing. */
  onFailure?: (attempt: number, error: unknown) => void
}

/**
 * Runs `operation` up to `attempts` times. An attempt fails when it throws or
 * resolves to null; `delayMs` is waited between attempts, never after the last.
 * Never throws; exhaustion is reported as `{ ok: false }`.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T | null>,
  { attempts, delayMs, sleep: wait = sleep, onFailure }: RetryOptions,
): Promise<RetryOutcome<T>> {
  let lastError: unknown = null

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const value = await operation(attempt)
      if (value !== null) return { ok: true, value, attempts: attempt }
      lastError = null
    } catch (err) {
      lastError = err
    }
    onFailure?.(attempt, lastError)

    if (attempt < attempts) await wait(delayMs)
  }

  return { ok: false, attempts, lastError }
}
