/**
 * LLM / Provider Retry Utility
 *
 * Wraps provider calls with exponential backoff retry.
 * Retries on transient failures: rate limits (429), server errors (500/502/503),
 * and network-level errors (ECONNRESET, ETIMEDOUT, fetch failed).
 *
 * Config:
 *   maxRetries: 2  (3 total attempts)
 *   baseDelayMs: 500
 *   maxDelayMs: 5000
 *
 * Usage:
 *   const result = await withRetry(
 *     () => groq.chat.completions.create({...}),
 *     'groq-generate'
 *   )
 */

const RETRYABLE_STATUS = new Set([429, 500, 502, 503])
const BASE_DELAY_MS = 500
const MAX_DELAY_MS = 5000
const MAX_RETRIES = 2

export interface RetryOptions {
    maxRetries?: number
    baseDelayMs?: number
    maxDelayMs?: number
    /** No further attempts once this aborts */
    signal?: AbortSignal
}

function readField(value: unknown, key: string): unknown {
    if (value && typeof value === 'object' && key in value) {
        return Reflect.get(value, key)
    }
    return undefined
}

export function statusOf(err: unknown): number | undefined {
    const status = readField(err, 'status') ?? readField(err, 'statusCode')
    return typeof status === 'number' ? status : undefined
}

export function isRetryable(err: unknown): boolean {
    const status = statusOf(err)
    if (status !== undefined) return RETRYABLE_STATUS.has(status)

    // Groq SDK wraps 429 in error.error.type
    const errType = readField(readField(err, 'error'), 'type')
    if (errType === 'tokens' || errType === 'requests') return true

    if (err instanceof Error) {
        const msg = err.message
        return (
            msg.includes('ECONNRESET') ||
            msg.includes('ETIMEDOUT') ||
            msg.includes('ENOTFOUND') ||
            msg.includes('fetch failed') ||
            msg.includes('socket hang up') ||
            msg.includes('rate_limit') ||
            msg.includes('overloaded')
        )
    }
    return false
}

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Retry an async provider call with exponential backoff.
 *
 * @param fn    Zero-argument async function wrapping the call
 * @param label Short label for log lines (e.g. 'groq-generate', 'jina-embed')
 */
export async function withRetry<T>(fn: () => Promise<T>, label: string, opts: RetryOptions = {}): Promise<T> {
    const maxRetries = opts.maxRetries ?? MAX_RETRIES
    const baseDelayMs = opts.baseDelayMs ?? BASE_DELAY_MS
    const maxDelayMs = opts.maxDelayMs ?? MAX_DELAY_MS
    let lastErr: unknown

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
        try {
            return await fn()
        } catch (err) {
            lastErr = err

            if (attempt === maxRetries || !isRetryable(err) || opts.signal?.aborted) {
                throw err
            }

            const waitMs = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs)
            console.warn(
                `[retry] ${label} attempt ${attempt + 1}/${maxRetries} failed` +
                ` (status: ${statusOf(err) ?? '?'}), retrying in ${waitMs}ms`
            )
            await delay(waitMs)
            if (opts.signal?.aborted) throw err
        }
    }

    throw lastErr
}
