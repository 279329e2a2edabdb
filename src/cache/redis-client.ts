/**
 * Redis client singleton.
 *
 * Redis is optional: getRedis() returns null when REDIS_URL is unset or the
 * client failed to start, and every caller must cope with that.
 */

import { Redis } from 'ioredis'
import { errorMessage } from '../utils/safe-log.js'

let redisClient: Redis | null = null
let initialized = false

/** Connect once at startup. Later calls are no-ops. */
export function initRedis(redisUrl: string | undefined): void {
    if (initialized) return
    initialized = true

    if (!redisUrl) {
        console.log('[redis] REDIS_URL not set, embedding cache is in-process only')
        return
    }

    try {
        const client = new Redis(redisUrl, {
            maxRetriesPerRequest: 3,
            enableOfflineQueue: false, // fail fast while disconnected
            lazyConnect: false,
        })
        client.on('error', (err: Error) => {
            console.error('[redis] Connection error:', err.message)
        })
        client.on('connect', () => {
            console.log('[redis] Connected')
        })
        client.on('reconnecting', () => {
            console.warn('[redis] Reconnecting...')
        })
        redisClient = client
    } catch (err) {
        console.error('[redis] Failed to initialize:', errorMessage(err))
        redisClient = null
    }
}

export function getRedis(): Redis | null {
    return redisClient
}

export async function closeRedis(): Promise<void> {
    if (!redisClient) return
    try {
        await redisClient.quit()
    } catch {
        redisClient.disconnect()
    }
    redisClient = null
    initialized = false
}
