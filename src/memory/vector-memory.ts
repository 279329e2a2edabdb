/**
 * Vector memory: the EmbeddingService backed by the embedding client and
 * the pg vector store.
 */

import { fitDimensions, type EmbeddingClient } from '../embeddings.js'
import type { EmbeddingService } from '../collaborators.js'
import { COMMUNICATION_STYLES, PERSONALITY_TRAITS, type PersonalityProfile, type SimilarConversation } from '../types/companion.js'
import type { PgVectorStore } from './vector-store.js'

/**
 * Fixed-layout numeric fingerprint of a profile: 8 traits, 4 styles,
 * confidence, zero-padded to the embedding dimension.
 */
export function personalityVector(profile: PersonalityProfile, dims: number): number[] {
    const values = [
        ...PERSONALITY_TRAITS.map(trait => profile.traits[trait] ?? 0),
        ...COMMUNICATION_STYLES.map(style => profile.communicationStyle[style] ?? 0),
        profile.confidenceScore,
    ]
    return fitDimensions(values, dims)
}

export class VectorMemory implements EmbeddingService {
    constructor(
        private readonly client: EmbeddingClient,
        private readonly store: PgVectorStore,
    ) {}

    async encode(text: string): Promise<number[]> {
        return this.client.embed(text, 'retrieval.query')
    }

    async searchSimilar(query: string, userId: string, topK: number): Promise<SimilarConversation[]> {
        const vector = await this.client.embed(query, 'retrieval.query')
        const matches = await this.store.nearest(userId, 'conversation', vector, topK)
        return matches.map(match => ({
            id: match.id,
            similarity: match.similarity,
            metadata: match.metadata,
        }))
    }

    async storeConversation(userId: string, text: string, metadata: Record<string, unknown>): Promise<void> {
        const vector = await this.client.embed(text, 'retrieval.passage')
        await this.store.insert(userId, 'conversation', text, vector, { ...metadata, userId })
    }

    async storePersonality(userId: string, profile: PersonalityProfile): Promise<void> {
        await this.store.upsertSingleton(
            userId,
            'personality',
            JSON.stringify(profile.traits),
            personalityVector(profile, this.client.dimensions),
            { confidence: profile.confidenceScore, lastUpdated: profile.lastUpdated },
        )
    }
}
