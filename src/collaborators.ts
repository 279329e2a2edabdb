/**
 * Collaborator interfaces: the seams between the turn pipeline and the
 * outside world (memory, embeddings, generation, persistence).
 *
 * The pg / Groq / Jina adapters implement these in production. Default
 * implementations are no-ops so the pipeline runs with nothing configured.
 */

import type {
    AdaptationRecord,
    CompanionSession,
    ConversationStage,
    EnhancedContext,
    HistoryMessage,
    PersonalityProfile,
    SimilarConversation,
    TherapeuticAssessment,
} from './types/companion.js'

// ─── Memory ──────────────────────────────────────────────────────────────────

export interface MemoryContextService {
    /** Most recent messages of a session, oldest first */
    getConversationHistory(sessionId: string, limit: number): Promise<HistoryMessage[]>
    /** History plus cross-session patterns and semantic neighbours */
    getEnhancedContext(sessionId: string, userId: string, query: string): Promise<EnhancedContext>
    addConversation(
        sessionId: string,
        userMessage: string,
        response: string,
        metadata: Record<string, unknown>,
    ): Promise<void>
}

// ─── Embeddings ──────────────────────────────────────────────────────────────

export interface EmbeddingService {
    /** Fixed-length vector for `text` */
    encode(text: string): Promise<number[]>
    /** Nearest stored conversations for a user, sorted by similarity descending */
    searchSimilar(query: string, userId: string, topK: number): Promise<SimilarConversation[]>
    storeConversation(userId: string, text: string, metadata: Record<string, unknown>): Promise<void>
    storePersonality(userId: string, profile: PersonalityProfile): Promise<void>
}

// ─── Generation ──────────────────────────────────────────────────────────────

export interface GenerationService {
    /** Completion text for a system prompt and prior turns. May throw. */
    generate(systemPrompt: string, history: HistoryMessage[], signal?: AbortSignal): Promise<string>
}

// ─── Persistence ─────────────────────────────────────────────────────────────

export interface StoredProfile {
    profile: PersonalityProfile
    assessment: TherapeuticAssessment
    /** Monotonic per user; a save with a lower version than stored is ignored */
    version: number
}

export interface ProfileRepository {
    load(userId: string): Promise<StoredProfile | null>
    save(userId: string, record: StoredProfile): Promise<void>
}

export interface SessionProgress {
    stage: ConversationStage
    turnCount: number
    adaptations: AdaptationRecord[]
    lastConfidence: number
}

export interface SessionStore {
    create(userId: string): Promise<CompanionSession>
    get(sessionId: string): Promise<CompanionSession | null>
    /** Marks the session inactive. Returns false when it did not exist. */
    close(sessionId: string): Promise<boolean>
    saveProgress(sessionId: string, progress: SessionProgress): Promise<void>
}

// ─── Defaults ────────────────────────────────────────────────────────────────

export function emptyEnhancedContext(): EnhancedContext {
    return {
        recentHistory: [],
        userPatterns: { totalSessions: 0, emotionalProgression: [], conversationTopics: [] },
        semanticContext: { similarConversations: [], contextStrength: 0 },
        relationshipContext: { connections: 0, relationshipStrength: 0 },
    }
}

/** No memory: every read is empty, writes are dropped. */
export const nullMemory: MemoryContextService = {
    async getConversationHistory(): Promise<HistoryMessage[]> {
        return []
    },
    async getEnhancedContext(): Promise<EnhancedContext> {
        return emptyEnhancedContext()
    },
    async addConversation(): Promise<void> {},
}

/** No embeddings: empty vectors, no neighbours. */
export const nullEmbeddings: EmbeddingService = {
    async encode(): Promise<number[]> {
        return []
    },
    async searchSimilar(): Promise<SimilarConversation[]> {
        return []
    },
    async storeConversation(): Promise<void> {},
    async storePersonality(): Promise<void> {},
}
