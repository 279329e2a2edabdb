/**
 * Conversation memory on Postgres.
 *
 * History lives in conversation_messages; cross-session patterns are read
 * from every session the user owns. Reads never throw: a failed query logs
 * and yields the empty value, so a database hiccup costs context, not the
 * turn. Writes do throw, and the orchestrator logs them.
 */

import { z } from 'zod'
import { getPool } from '../db.js'
import { safeError } from '../utils/safe-log.js'
import { emptyEnhancedContext, type EmbeddingService, type MemoryContextService } from '../collaborators.js'
import type {
    EnhancedContext,
    HistoryMessage,
    RelationshipContext,
    SemanticContext,
    UserPatterns,
} from '../types/companion.js'

const EMOTION_KEYWORDS: Readonly<Record<string, readonly string[]>> = Object.freeze({
    joy: ['happy', 'excited', 'wonderful', 'great', 'amazing'],
    sadness: ['sad', 'down', 'depressed', 'blue', 'unhappy'],
    anxiety: ['anxious', 'worried', 'nervous', 'scared', 'stressed'],
    anger: ['angry', 'frustrated', 'mad', 'annoyed', 'irritated'],
    calm: ['calm', 'peaceful', 'relaxed', 'serene', 'tranquil'],
})

const RELATIONSHIP_SATURATION = 10
const SEMANTIC_TOP_K = 3

const MetadataSchema = z.record(z.unknown()).catch({})

interface MessageRow {
    role: string
    content: string
    metadata: unknown
}

/** Emotion labels present in the text, in lexicon order. */
export function extractEmotionalIndicators(text: string): string[] {
    const lower = text.toLowerCase()
    return Object.entries(EMOTION_KEYWORDS)
        .filter(([, keywords]) => keywords.some(keyword => lower.includes(keyword)))
        .map(([emotion]) => emotion)
}

export function relationshipStrength(totalSessions: number): number {
    return Math.min(totalSessions / RELATIONSHIP_SATURATION, 1)
}

function toHistoryMessage(row: MessageRow): HistoryMessage {
    return {
        role: row.role === 'user' ? 'user' : 'assistant',
        content: row.content,
        metadata: MetadataSchema.parse(row.metadata),
    }
}

export interface PgMemoryOptions {
    historyLimit?: number
    /** User messages scanned across sessions for emotional progression */
    patternWindow?: number
    /** Semantic neighbours; omitted means no semantic context */
    embeddings?: EmbeddingService
}

export class PgMemoryContextService implements MemoryContextService {
    private readonly historyLimit: number
    private readonly patternWindow: number
    private readonly embeddings: EmbeddingService | null

    constructor(opts: PgMemoryOptions = {}) {
        this.historyLimit = opts.historyLimit ?? 10
        this.patternWindow = opts.patternWindow ?? 50
        this.embeddings = opts.embeddings ?? null
    }

    async getConversationHistory(sessionId: string, limit: number = this.historyLimit): Promise<HistoryMessage[]> {
        try {
            const { rows } = await getPool().query<MessageRow>(
                `SELECT role, content, metadata
                 FROM conversation_messages
                 WHERE session_id = $1
                 ORDER BY id DESC
                 LIMIT $2`,
                [sessionId, limit]
            )
            return rows.reverse().map(toHistoryMessage)
        } catch (err) {
            console.error('[memory] History read failed:', safeError(err))
            return []
        }
    }

    async getEnhancedContext(sessionId: string, userId: string, query: string): Promise<EnhancedContext> {
        const fallback = emptyEnhancedContext()
        const [recentHistory, userPatterns, semanticContext] = await Promise.all([
            this.getConversationHistory(sessionId, this.historyLimit),
            this.analyzeCrossSessionPatterns(userId).catch(err => {
                console.error('[memory] Pattern analysis failed:', safeError(err))
                return fallback.userPatterns
            }),
            this.semanticContext(userId, query).catch(err => {
                console.warn('[memory] Semantic context unavailable:', safeError(err))
                return fallback.semanticContext
            }),
        ])
        return {
            recentHistory,
            userPatterns,
            semanticContext,
            relationshipContext: this.relationshipContext(userPatterns),
        }
    }

    async addConversation(
        sessionId: string,
        userMessage: string,
        response: string,
        metadata: Record<string, unknown>,
    ): Promise<void> {
        const assistantMetadata = {
            ...metadata,
            timestamp: new Date().toISOString(),
            confidence: typeof metadata.confidence === 'number' ? metadata.confidence : 0,
        }
        await getPool().query(
            `INSERT INTO conversation_messages (session_id, role, content, metadata)
             VALUES ($1, 'user', $2, $4::jsonb), ($1, 'assistant', $3, $5::jsonb)`,
            [sessionId, userMessage, response, JSON.stringify(metadata), JSON.stringify(assistantMetadata)]
        )
    }

    async analyzeCrossSessionPatterns(userId: string): Promise<UserPatterns> {
        const pool = getPool()
        const [sessions, messages, modes] = await Promise.all([
            pool.query<{ total: number }>(
                `SELECT COUNT(*)::int AS total FROM companion_sessions WHERE user_id = $1`,
                [userId]
            ),
            pool.query<{ content: string }>(
                `SELECT m.content
                 FROM conversation_messages m
                 JOIN companion_sessions s ON s.session_id = m.session_id
                 WHERE s.user_id = $1 AND m.role = 'user'
                 ORDER BY m.id DESC
                 LIMIT $2`,
                [userId, this.patternWindow]
            ),
            pool.query<{ mode: string }>(
                `SELECT m.metadata->>'conversationMode' AS mode, COUNT(*) AS uses
                 FROM conversation_messages m
                 JOIN companion_sessions s ON s.session_id = m.session_id
                 WHERE s.user_id = $1 AND m.role = 'assistant' AND m.metadata ? 'conversationMode'
                 GROUP BY 1
                 ORDER BY uses DESC`,
                [userId]
            ),
        ])

        return {
            totalSessions: Number(sessions.rows[0]?.total) || 0,
            emotionalProgression: [...messages.rows].reverse().flatMap(row => extractEmotionalIndicators(row.content)),
            conversationTopics: modes.rows.map(row => row.mode.toLowerCase()),
        }
    }

    private async semanticContext(userId: string, query: string): Promise<SemanticContext> {
        if (!this.embeddings) return { similarConversations: [], contextStrength: 0 }
        const similarConversations = await this.embeddings.searchSimilar(query, userId, SEMANTIC_TOP_K)
        return { similarConversations, contextStrength: similarConversations.length }
    }

    private relationshipContext(patterns: UserPatterns): RelationshipContext {
        return {
            connections: patterns.totalSessions,
            relationshipStrength: relationshipStrength(patterns.totalSessions),
        }
    }
}
