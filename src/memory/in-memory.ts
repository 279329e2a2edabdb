/**
 * In-process stores, used when DATABASE_URL is not set and in tests.
 * State lives for the lifetime of the process.
 */

import { randomUUID } from 'node:crypto'
import { INITIAL_STAGE } from '../flow/stages.js'
import { emptyEnhancedContext, type MemoryContextService, type SessionProgress, type SessionStore } from '../collaborators.js'
import { extractEmotionalIndicators, relationshipStrength } from './conversation-memory.js'
import type { CompanionSession, EnhancedContext, HistoryMessage } from '../types/companion.js'

function copySession(session: CompanionSession): CompanionSession {
    return { ...session, adaptations: [...session.adaptations] }
}

export class InMemorySessionStore implements SessionStore {
    private readonly sessions = new Map<string, CompanionSession>()

    constructor(private readonly clock: () => Date = () => new Date()) {}

    async create(userId: string): Promise<CompanionSession> {
        const now = this.clock().toISOString()
        const session: CompanionSession = {
            sessionId: randomUUID(),
            userId,
            stage: INITIAL_STAGE,
            turnCount: 0,
            adaptations: [],
            lastConfidence: 0,
            active: true,
            createdAt: now,
            updatedAt: now,
        }
        this.sessions.set(session.sessionId, session)
        return copySession(session)
    }

    async get(sessionId: string): Promise<CompanionSession | null> {
        const session = this.sessions.get(sessionId)
        return session ? copySession(session) : null
    }

    async close(sessionId: string): Promise<boolean> {
        const session = this.sessions.get(sessionId)
        if (!session) return false
        this.sessions.set(sessionId, { ...session, active: false, updatedAt: this.clock().toISOString() })
        return true
    }

    async saveProgress(sessionId: string, progress: SessionProgress): Promise<void> {
        const session = this.sessions.get(sessionId)
        if (!session?.active) return
        this.sessions.set(sessionId, {
            ...session,
            stage: progress.stage,
            turnCount: progress.turnCount,
            adaptations: [...progress.adaptations],
            lastConfidence: progress.lastConfidence,
            updatedAt: this.clock().toISOString(),
        })
    }

    sessionsOf(userId: string): CompanionSession[] {
        return [...this.sessions.values()].filter(session => session.userId === userId).map(copySession)
    }
}

export class InMemoryConversationMemory implements MemoryContextService {
    private readonly messages = new Map<string, HistoryMessage[]>()

    constructor(
        private readonly sessions: InMemorySessionStore,
        private readonly historyLimit = 10,
    ) {}

    async getConversationHistory(sessionId: string, limit: number = this.historyLimit): Promise<HistoryMessage[]> {
        return (this.messages.get(sessionId) ?? []).slice(-limit).map(message => ({ ...message }))
    }

    async getEnhancedContext(sessionId: string, userId: string, _query: string): Promise<EnhancedContext> {
        const context = emptyEnhancedContext()
        const owned = this.sessions.sessionsOf(userId)
        const emotionalProgression = owned.flatMap(session =>
            (this.messages.get(session.sessionId) ?? [])
                .filter(message => message.role === 'user')
                .flatMap(message => extractEmotionalIndicators(message.content))
        )
        return {
            ...context,
            recentHistory: await this.getConversationHistory(sessionId, this.historyLimit),
            userPatterns: { ...context.userPatterns, totalSessions: owned.length, emotionalProgression },
            relationshipContext: {
                connections: owned.length,
                relationshipStrength: relationshipStrength(owned.length),
            },
        }
    }

    async addConversation(
        sessionId: string,
        userMessage: string,
        response: string,
        metadata: Record<string, unknown>,
    ): Promise<void> {
        const log = this.messages.get(sessionId) ?? []
        log.push(
            { role: 'user', content: userMessage, metadata: { ...metadata } },
            { role: 'assistant', content: response, metadata: { ...metadata } },
        )
        this.messages.set(sessionId, log)
    }
}
