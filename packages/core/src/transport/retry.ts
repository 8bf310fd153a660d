import { setTimeout as delay } from 'node:timers/promises'

import { ModelError } from '../errors'

/** Floor for every computed wait. */
export const MIN_BACKOFF_MS = 250

export const DEFAULT_MAX_RETRIES = 4
export const DEFAULT_BASE_DELAY_MS = 1_000
export const DEFAULT_MAX_DELAY_MS = 30_000

export interface BackoffOptions {
    baseDelayMs: number
    maxDelayMs: number
}

/** What the failed attempt told us about when to come back. */
export interface BackoffHint {
    /** From `retry-after-ms` / `retry-after` response headers */
    retryAfterMs?: number | undefined
    /** Error message, scanned for "try again in N s" */
    message?: string | undefined
}

export interface RetryState {
    attempt: number
    lastError?: string | undefined
    waitMs?: number | undefined
}

export interface RetryOptions {
    /**
     * Retries after the first attempt, for rate-limit errors only.
     * @default 4
     */
    maxRetries?: number | undefined
    /** @default 1000 */
    baseDelayMs?: number | undefined
    /** @default 30000 */
    maxDelayMs?: number | undefined
    /**
     * Fixed delay before every attempt, including the first.
     * @default 0
     */
    paceMs?: number | undefined
    sleep?: ((ms: number) => Promise<void>) | undefined
    /** Jitter source in [0, 1) */
    random?: (() => number) | undefined
    /** Called before each backoff sleep */
    onRetry?: ((state: Readonly<RetryState>) => void) | undefined
}

export function clampWait(ms: number, maxDelayMs: number): number {
    const ceiling = Math.max(MIN_BACKOFF_MS, maxDelayMs)
    if (!Number.isFinite(ms)) return ceiling
    return Math.min(Math.max(Math.round(ms), MIN_BACKOFF_MS), ceiling)
}

const TRY_AGAIN = /try again in\s+((?:\d+(?:\.\d+)?\s*[a-z]*\s*)+)/i
const SEGMENT = /(\d+(?:\.\d+)?)\s*([a-z]*)/gi

const UNIT_MS: Readonly<Record<string, number>> = {
    '': 1000,
    ms: 1,
    millisecond: 1,
    milliseconds: 1,
    s: 1000,
    sec: 1000,
    secs: 1000,
    second: 1000,
    seconds: 1000,
    m: 60_000,
    min: 60_000,
    mins: 60_000,
    minute: 60_000,
    minutes: 60_000,
    h: 3_600_000,
    hr: 3_600_000,
    hrs: 3_600_000,
    hour: 3_600_000,
    hours: 3_600_000,
}

/**
 * Extract the wait from messages like "Please try again in 1.5s",
 * "try again in 20ms" or "try again in 1m30s". Bare numbers are seconds;
 * reading stops at the first word that is not a unit.
 */
export function parseRetryHint(message: string): number | undefined {
    const match = TRY_AGAIN.exec(message)
    if (!match?.[1]) return undefined

    let total: number | undefined
    for (const [, amount = '', unit = ''] of match[1].matchAll(SEGMENT)) {
        const scale = UNIT_MS[unit.toLowerCase()]
        if (scale === undefined) break
        total = (total ?? 0) + Number.parseFloat(amount) * scale
    }
    return total !== undefined && Number.isFinite(total) ? total : undefined
}

/**
 * Read `retry-after-ms`, then `retry-after` (delta seconds or an HTTP date)
 * from response headers. Header names are matched case-insensitively.
 */
export function retryAfterFromHeaders(
    headers: Readonly<Record<string, string | null | undefined>> | undefined,
    now: number = Date.now(),
): number | undefined {
    if (!headers) return undefined

    const lookup = (name: string): string | undefined => {
        for (const [key, value] of Object.entries(headers)) {
            if (key.toLowerCase() === name && typeof value === 'string' && value.trim() !== '') return value.trim()
        }
        return undefined
    }

    const ms = lookup('retry-after-ms')
    if (ms !== undefined) {
        const value = Number(ms)
        if (Number.isFinite(value) && value >= 0) return value
    }

    const after = lookup('retry-after')
    if (after === undefined) return undefined

    const seconds = Number(after)
    if (Number.isFinite(seconds)) return seconds >= 0 ? seconds * 1000 : undefined

    const date = Date.parse(after)
    if (Number.isNaN(date)) return undefined
    return Math.max(0, date - now)
}

/**
 * Wait before retry number `attempt` (1-based).
 *
 * Priority: header hint, then message hint, then
 * `base * 2^(attempt - 1)` plus jitter in `[0, base]`.
 * The result always lies in `[MIN_BACKOFF_MS, maxDelayMs]`.
 */
export function computeBackoff(
    attempt: number,
    hint: BackoffHint,
    options: BackoffOptions,
    random: () => number = Math.random,
): number {
    if (hint.retryAfterMs !== undefined && Number.isFinite(hint.retryAfterMs)) {
        return clampWait(hint.retryAfterMs, options.maxDelayMs)
    }

    const fromMessage = hint.message ? parseRetryHint(hint.message) : undefined
    if (fromMessage !== undefined) return clampWait(fromMessage, options.maxDelayMs)

    const exponent = Math.max(0, attempt - 1)
    const jitter = Math.min(Math.max(random(), 0), 1) * options.baseDelayMs
    return clampWait(options.baseDelayMs * 2 ** exponent + jitter, options.maxDelayMs)
}

/**
 * Run `attempt` until it succeeds, retrying only rate-limited
 * {@link ModelError}s. Any other error, or a rate-limit error once retries
 * are spent, is rethrown as is.
 */
export async function withRetry<T>(
    attempt: (state: Readonly<RetryState>) => Promise<T>,
    options: RetryOptions = {},
): Promise<T> {
    const maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES)
    const backoff: BackoffOptions = {
        baseDelayMs: options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
        maxDelayMs: options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS,
    }
    const sleep = options.sleep ?? ((ms: number) => delay(ms))
    const random = options.random ?? Math.random
    const paceMs = options.paceMs ?? 0

    const state: RetryState = { attempt: 0 }

    for (;;) {
        state.attempt++
        if (paceMs > 0) await sleep(paceMs)

        try {
            return await attempt({ ...state })
        } catch (err) {
            if (!(err instanceof ModelError) || !err.rateLimited || state.attempt > maxRetries) throw err

            state.lastError = err.message
            state.waitMs = computeBackoff(
                state.attempt,
                { retryAfterMs: err.retryAfterMs, message: err.message },
                backoff,
                random,
            )
            options.onRetry?.({ ...state })
            await sleep(state.waitMs)
        }
    }
}
