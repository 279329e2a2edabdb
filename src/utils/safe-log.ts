/**
 * Safe error logging utility.
 * In production, strips stack traces and internal details to avoid
 * leaking message content or user state into logs that may be forwarded.
 */

export function safeError(error: unknown): unknown {
  if (process.env.NODE_ENV !== 'production') {
    return error
  }

  if (error instanceof Error) {
    return { message: error.message, name: error.name }
  }

  if (typeof error === 'string') {
    return error
  }

  return '[non-Error thrown]'
}

/** Short, single-line description of a thrown value */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
