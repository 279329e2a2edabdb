export class TimeoutError extends Error {
    constructor(readonly label: string, readonly timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`)
        this.name = 'TimeoutError'
    }
}

export type AbortableTask<T> = (signal: AbortSignal) => Promise<T>

/**
 * Race a task against a timer. A task given as a function receives a signal
 * that aborts when the timer fires or when `parent` aborts, so the call
 * behind it stops instead of running on unobserved. The timer is always
 * cleared.
 */
export async function withTimeout<T>(
    task: Promise<T> | AbortableTask<T>,
    timeoutMs: number,
    label: string,
    parent?: AbortSignal,
): Promise<T> {
    const controller = new AbortController()
    const onParentAbort = () => controller.abort(parent?.reason)
    if (parent?.aborted) {
        controller.abort(parent.reason)
    } else {
        parent?.addEventListener('abort', onParentAbort, { once: true })
    }

    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            const error = new TimeoutError(label, timeoutMs)
            controller.abort(error)
            reject(error)
        }, timeoutMs)
    })
    try {
        const promise = typeof task === 'function' ? task(controller.signal) : task
        return await Promise.race([promise, timeout])
    } finally {
        if (timer) clearTimeout(timer)
        parent?.removeEventListener('abort', onParentAbort)
    }
}
