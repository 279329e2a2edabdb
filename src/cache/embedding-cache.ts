/**
 * Redis L2 cache for embedding vectors, shared across instances.
 *
 * Every function is a no-op (or a miss) when Redis is unavailable, and
 * Redis errors are logged, never thrown.
 */

import { createHash } from 'node:crypto'
import { z } from 'zod'
import { getRedis } from './redis-client.js'
import { errorMessage } from '../utils/safe-log.js'

const DEFAULT_TTL_S = 3600
const VectorSchema = z.array(z.number())

export function embeddingKey(text: string, model: string): string {
    const digest = createHash('sha256').update(text).digest('hex').slice(0, 32)
    return `companion:emb:${model}:${digest}`
}

export async function cacheEmbedding(key: string, vector: number[], ttlSeconds = DEFAULT_TTL_S): Promise<void> {
    const redis = getRedis()
    if (!redis) return
    try {
        await redis.setex(key, ttlSeconds, JSON.stringify(vector))
    } catch (err) {
        console.error('[cache] cacheEmbedding error:', errorMessage(err))
    }
}

export async function getCachedEmbedding(key: string): Promise<number[] | null> {
    const redis = getRedis()
    if (!redis) return null
    try {
        const raw = await redis.get(key)
        if (!raw) return null
        const parsed = VectorSchema.safeParse(JSON.parse(raw))
        return parsed.success ? parsed.data : null
    } catch (err) {
        console.error('[cache] getCachedEmbedding error:', errorMessage(err))
        return null
    }
}
