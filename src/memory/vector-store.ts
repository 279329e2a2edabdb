/**
 * Vector store on Postgres `float8[]` columns.
 *
 * Similarity is computed in process: load a user's vectors of one kind,
 * score them against the query, sort descending. Per-user volumes are
 * small enough that an index extension is not needed.
 */

import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import { getPool } from '../db.js'

export type VectorKind = 'conversation' | 'personality'

export interface VectorMatch {
    id: string
    similarity: number
    content: string
    metadata: Record<string, unknown>
}

interface VectorRow {
    id: string
    content: string
    embedding: number[]
    metadata: unknown
}

const MetadataSchema = z.record(z.unknown()).catch({})

/** Cosine similarity; 0 when either vector has no magnitude or lengths differ. */
export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length === 0 || a.length !== b.length) return 0
    let dot = 0
    let normA = 0
    let normB = 0
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i]
        normA += a[i] * a[i]
        normB += b[i] * b[i]
    }
    if (normA === 0 || normB === 0) return 0
    return dot / (Math.sqrt(normA) * Math.sqrt(normB))
}

export class PgVectorStore {
    constructor(private readonly scanLimit = 500) {}

    async insert(
        userId: string,
        kind: VectorKind,
        content: string,
        embedding: number[],
        metadata: Record<string, unknown>,
    ): Promise<string> {
        const id = randomUUID()
        await getPool().query(
            `INSERT INTO memory_vectors (id, user_id, kind, content, embedding, metadata)
             VALUES ($1, $2, $3, $4, $5::float8[], $6::jsonb)`,
            [id, userId, kind, content, embedding, JSON.stringify(metadata)]
        )
        return id
    }

    /** One row per user and kind, replaced in place (personality vectors). */
    async upsertSingleton(
        userId: string,
        kind: VectorKind,
        content: string,
        embedding: number[],
        metadata: Record<string, unknown>,
    ): Promise<string> {
        const id = `${kind}:${userId}`
        await getPool().query(
            `INSERT INTO memory_vectors (id, user_id, kind, content, embedding, metadata)
             VALUES ($1, $2, $3, $4, $5::float8[], $6::jsonb)
             ON CONFLICT (id) DO UPDATE SET
               content = EXCLUDED.content,
               embedding = EXCLUDED.embedding,
               metadata = EXCLUDED.metadata,
               created_at = NOW()`,
            [id, userId, kind, content, embedding, JSON.stringify(metadata)]
        )
        return id
    }

    async nearest(userId: string, kind: VectorKind, query: number[], topK: number): Promise<VectorMatch[]> {
        if (topK <= 0) return []
        const { rows } = await getPool().query<VectorRow>(
            `SELECT id, content, embedding, metadata
             FROM memory_vectors
             WHERE user_id = $1 AND kind = $2
             ORDER BY created_at DESC
             LIMIT $3`,
            [userId, kind, this.scanLimit]
        )

        return rows
            .map(row => ({
                id: row.id,
                similarity: cosineSimilarity(query, row.embedding.map(Number)),
                content: row.content,
                metadata: MetadataSchema.parse(row.metadata),
            }))
            .sort((a, b) => b.similarity - a.similarity)
            .slice(0, topK)
    }
}
