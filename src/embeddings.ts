/**
 * Embedding client
 *
 * Primary:  Jina AI Embedding API (jina-embeddings-v3)
 * Fallback: HuggingFace Inference API (sentence-transformers)
 *
 * Lookup order per text: in-process LRU → Redis (optional) → providers.
 * Every vector is padded or truncated to the configured dimension so stored
 * vectors stay comparable across providers. When every provider fails,
 * embed() throws CollaboratorUnavailable; callers decide how to degrade.
 */

import { z } from 'zod'
import { cacheEmbedding, embeddingKey, getCachedEmbedding } from './cache/embedding-cache.js'
import { CollaboratorUnavailable } from './errors.js'
import { errorMessage } from './utils/safe-log.js'
import { withRetry } from './utils/retry.js'

const JINA_API_URL = 'https://api.jina.ai/v1/embeddings'
const HF_API_BASE = 'https://api-inference.huggingface.co/pipeline/feature-extraction'
const CACHE_MAX_SIZE = 500
const DEFAULT_REQUEST_TIMEOUT_MS = 8000

export type EmbeddingTask = 'retrieval.passage' | 'retrieval.query'

export interface EmbeddingClientOptions {
    jinaApiKey?: string
    jinaModel?: string
    hfApiKey?: string
    hfModel?: string
    dimensions: number
    /** Skip the Redis L2 lookups (tests, single-instance runs) */
    disableSharedCache?: boolean
    /** Per provider request */
    requestTimeoutMs?: number
    fetchImpl?: typeof fetch
}

const JinaResponseSchema = z.object({
    data: z.array(z.object({ embedding: z.array(z.number()), index: z.number() })),
})

const HfResponseSchema = z.array(z.array(z.number()))

/** Pad with zeros or truncate to exactly `dims` entries. */
export function fitDimensions(vector: number[], dims: number): number[] {
    if (vector.length === dims) return vector
    if (vector.length > dims) return vector.slice(0, dims)
    return [...vector, ...new Array<number>(dims - vector.length).fill(0)]
}

class HttpStatusError extends Error {
    constructor(readonly provider: string, readonly status: number, body: string) {
        super(`${provider} API error ${status}: ${body.slice(0, 200)}`)
        this.name = 'HttpStatusError'
    }
}

export class EmbeddingClient {
    private readonly lru = new Map<string, number[]>()
    private readonly fetchImpl: typeof fetch
    private readonly jinaModel: string
    private readonly hfModel: string
    private readonly requestTimeoutMs: number

    constructor(private readonly opts: EmbeddingClientOptions) {
        this.fetchImpl = opts.fetchImpl ?? fetch
        this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS
        this.jinaModel = opts.jinaModel ?? 'jina-embeddings-v3'
        this.hfModel = opts.hfModel ?? 'sentence-transformers/all-MiniLM-L6-v2'
    }

    get dimensions(): number {
        return this.opts.dimensions
    }

    get configured(): boolean {
        return Boolean(this.opts.jinaApiKey || this.opts.hfApiKey)
    }

    async embed(text: string, task: EmbeddingTask = 'retrieval.passage'): Promise<number[]> {
        const [vector] = await this.embedBatch([text], task)
        return vector
    }

    async embedBatch(texts: string[], task: EmbeddingTask = 'retrieval.passage'): Promise<number[][]> {
        if (texts.length === 0) return []

        const results: Array<number[] | null> = texts.map(text => this.lruGet(text))
        const missing: number[] = []

        for (let i = 0; i < texts.length; i++) {
            if (results[i]) continue
            const shared = this.opts.disableSharedCache ? null : await getCachedEmbedding(this.key(texts[i]))
            if (shared && shared.length === this.opts.dimensions) {
                results[i] = shared
                this.lruSet(texts[i], shared)
            } else {
                missing.push(i)
            }
        }

        if (missing.length > 0) {
            const fetched = await this.fetchEmbeddings(missing.map(i => texts[i]), task)
            missing.forEach((index, n) => {
                const vector = fitDimensions(fetched[n], this.opts.dimensions)
                results[index] = vector
                this.lruSet(texts[index], vector)
                if (!this.opts.disableSharedCache) {
                    // never rejects
                    void cacheEmbedding(this.key(texts[index]), vector)
                }
            })
        }

        return results.map(vector => vector ?? new Array<number>(this.opts.dimensions).fill(0))
    }

    // ─── Providers ──────────────────────────────────────────────────────────

    private async fetchEmbeddings(texts: string[], task: EmbeddingTask): Promise<number[][]> {
        const failures: string[] = []

        if (this.opts.jinaApiKey) {
            try {
                return await withRetry(() => this.embedWithJina(texts, task), 'jina-embed')
            } catch (err) {
                failures.push(errorMessage(err))
                console.warn('[embeddings] Jina failed, trying HuggingFace fallback...')
            }
        }

        if (this.opts.hfApiKey) {
            try {
                return await withRetry(() => this.embedWithHuggingFace(texts), 'hf-embed')
            } catch (err) {
                failures.push(errorMessage(err))
            }
        }

        const reason = failures.length > 0 ? failures.join('; ') : 'no embedding provider configured'
        console.error(`[embeddings] All embedding providers failed: ${reason}`)
        throw new CollaboratorUnavailable('embedding', reason)
    }

    private async embedWithJina(texts: string[], task: EmbeddingTask): Promise<number[][]> {
        const response = await this.fetchImpl(JINA_API_URL, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'Authorization': `Bearer ${this.opts.jinaApiKey}`,
            },
            body: JSON.stringify({
                model: this.jinaModel,
                input: texts,
                task,
                dimensions: this.opts.dimensions,
            }),
            signal: AbortSignal.timeout(this.requestTimeoutMs),
        })
        if (!response.ok) {
            throw new HttpStatusError('Jina', response.status, await response.text())
        }
        const data = JinaResponseSchema.parse(await response.json())
        if (data.data.length !== texts.length) {
            throw new Error(`Jina returned ${data.data.length} vectors for ${texts.length} inputs`)
        }
        return [...data.data].sort((a, b) => a.index - b.index).map(d => d.embedding)
    }

    private async embedWithHuggingFace(texts: string[]): Promise<number[][]> {
        const response = await this.fetchImpl(`${HF_API_BASE}/${this.hfModel}`, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'Authorization': `Bearer ${this.opts.hfApiKey}`,
            },
            body: JSON.stringify({
                inputs: texts,
                options: { wait_for_model: true },
            }),
            signal: AbortSignal.timeout(this.requestTimeoutMs),
        })
        if (!response.ok) {
            throw new HttpStatusError('HuggingFace', response.status, await response.text())
        }
        const vectors = HfResponseSchema.parse(await response.json())
        if (vectors.length !== texts.length) {
            throw new Error(`HuggingFace returned ${vectors.length} vectors for ${texts.length} inputs`)
        }
        return vectors
    }

    // ─── LRU ────────────────────────────────────────────────────────────────

    private key(text: string): string {
        return embeddingKey(text, `${this.jinaModel}:${this.opts.dimensions}`)
    }

    private lruGet(text: string): number[] | null {
        const value = this.lru.get(text)
        if (!value) return null
        // move to most-recently-used
        this.lru.delete(text)
        this.lru.set(text, value)
        return value
    }

    private lruSet(text: string, vector: number[]): void {
        if (this.lru.size >= CACHE_MAX_SIZE) {
            const oldest = this.lru.keys().next().value
            if (oldest !== undefined) this.lru.delete(oldest)
        }
        this.lru.set(text, vector)
    }
}
