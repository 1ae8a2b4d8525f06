/**
 * Exponential Backoff
 *
 * Delay schedule for retrying the upstream project list within one cycle.
 */

export interface BackoffPolicy {
  initialMs: number
  maxMs: number
  factor: number
  /** Fraction of the delay applied as ± random jitter */
  jitter: number
  /** Retries allowed after the first failure */
  maxAttempts: number
}

export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialMs: 2000,
  maxMs: 60000,
  factor: 2,
  jitter: 0.25,
  maxAttempts: 5,
}

/**
 * Compute backoff delay for a given attempt number.
 *
 * @param attempt - Zero-based retry number
 * @param random - Source of randomness in [0, 1)
 * @returns Delay in milliseconds, or null once maxAttempts is reached
 */
export function computeBackoff(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random,
): number | null {
  if (attempt >= policy.maxAttempts) return null

  const base = policy.initialMs * Math.pow(policy.factor, attempt)
  const capped = Math.min(base, policy.maxMs)

  // Apply jitter: ±jitter% of the computed delay
  const jitterRange = capped * policy.jitter
  const jitterOffset = (random() * 2 - 1) * jitterRange

  return Math.max(0, Math.round(capped + jitterOffset))
}

/**
 * Resolve after `ms`, or reject with the signal's reason when it aborts
 * first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason)
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      reject(signal?.reason)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
