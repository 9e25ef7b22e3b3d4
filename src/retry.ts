export interface BackoffConfig {
  retriesBeforeBackoff: number
  interval: number      // ms
  maxInterval: number   // ms
}

/**
 * Timeout to wait after the `attempt`-th send (0-based): `retriesBeforeBackoff`
 * sends at `interval`, then doubling until capped at `maxInterval`.
 */
export function backoffTimeout(attempt: number, config: BackoffConfig): number {
  const flat = Math.max(1, config.retriesBeforeBackoff)
  if (attempt < flat) return Math.min(config.interval, config.maxInterval)
  const doublings = attempt - flat + 1
  return Math.min(config.interval * Math.pow(2, doublings), config.maxInterval)
}

/**
 * Per-message resend timer. `shouldSend()` is true on the first check and
 * then once every backoff interval since the previous true.
 */
export class ExpirationState {
  private nextSendAt: number | null = null
  private attempts = 0

  constructor(
    private readonly config: BackoffConfig,
    private readonly now: () => number = Date.now
  ) {}

  get sendCount(): number {
    return this.attempts
  }

  get nextAllowedSendAt(): number | null {
    return this.nextSendAt
  }

  shouldSend(): boolean {
    const now = this.now()
    if (this.nextSendAt !== null && now < this.nextSendAt) return false

    this.nextSendAt = now + backoffTimeout(this.attempts, this.config)
    this.attempts++
    return true
  }
}

export interface RetryOptions {
  attempts: number
  interval: number       // ms before the second attempt
  multiplier?: number    // default: 2
  isRetryable?: (err: unknown) => boolean
  /** Waits `ms`; resolves `true` to abandon further attempts. */
  sleep?: (ms: number) => Promise<boolean>
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number }

function defaultSleep(ms: number): Promise<boolean> {
  return new Promise(resolve => setTimeout(() => resolve(false), ms))
}

/**
 * Runs `fn` up to `options.attempts` times with exponentially growing pauses.
 * Errors rejected by `isRetryable` propagate immediately; exhaustion is
 * reported in the result, not thrown.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<RetryResult<T>> {
  const multiplier = options.multiplier ?? 2
  const sleep = options.sleep ?? defaultSleep
  let interval = options.interval
  let lastError: unknown = new Error('No attempts made')
  let attempt = 0

  while (attempt < options.attempts) {
    try {
      const value = await fn(attempt)
      return { ok: true, value, attempts: attempt + 1 }
    } catch (err) {
      if (options.isRetryable && !options.isRetryable(err)) throw err
      lastError = err
    }
    attempt++
    if (attempt >= options.attempts) break
    if (await sleep(interval)) break
    interval *= multiplier
  }

  return { ok: false, error: lastError, attempts: attempt }
}
