import { describe, it, expect } from 'vitest'
import { InMemoryConversationMemory, InMemorySessionStore } from './in-memory.js'

const NOW = new Date('2026-06-01T12:00:00.000Z')

describe('InMemorySessionStore', () => {
    it('creates active sessions in the initial stage', async () => {
        const store = new InMemorySessionStore(() => NOW)
        const session = await store.create('user-1')

        expect(session).toMatchObject({
            userId: 'user-1',
            stage: 'initial',
            turnCount: 0,
            adaptations: [],
            lastConfidence: 0,
            active: true,
            createdAt: NOW.toISOString(),
        })
    })

    it('hands out copies', async () => {
        const store = new InMemorySessionStore(() => NOW)
        const session = await store.create('user-1')
        session.turnCount = 99

        expect((await store.get(session.sessionId))?.turnCount).toBe(0)
    })

    it('ignores progress on closed sessions', async () => {
        const store = new InMemorySessionStore(() => NOW)
        const session = await store.create('user-1')
        await store.close(session.sessionId)

        await store.saveProgress(session.sessionId, { stage: 'closure', turnCount: 5, adaptations: [], lastConfidence: 1 })

        expect(await store.get(session.sessionId)).toMatchObject({ active: false, turnCount: 0, stage: 'initial' })
        expect(await store.close('missing')).toBe(false)
    })
})

describe('InMemoryConversationMemory', () => {
    it('keeps the most recent messages, oldest first', async () => {
        const sessions = new InMemorySessionStore(() => NOW)
        const memory = new InMemoryConversationMemory(sessions)
        const session = await sessions.create('user-1')

        await memory.addConversation(session.sessionId, 'one', 'reply one', {})
        await memory.addConversation(session.sessionId, 'two', 'reply two', {})

        const history = await memory.getConversationHistory(session.sessionId, 3)
        expect(history.map(m => m.content)).toEqual(['reply one', 'two', 'reply two'])
    })

    it('builds cross-session context for the user', async () => {
        const sessions = new InMemorySessionStore(() => NOW)
        const memory = new InMemoryConversationMemory(sessions)
        const first = await sessions.create('user-1')
        const second = await sessions.create('user-1')
        await sessions.create('someone-else')

        await memory.addConversation(first.sessionId, 'I am so worried', 'ok', {})
        await memory.addConversation(second.sessionId, 'Feeling happy today', 'great', {})

        const context = await memory.getEnhancedContext(second.sessionId, 'user-1', 'hi')

        expect(context.userPatterns.totalSessions).toBe(2)
        expect(context.userPatterns.emotionalProgression).toEqual(['anxiety', 'joy'])
        expect(context.relationshipContext).toEqual({ connections: 2, relationshipStrength: 0.2 })
        expect(context.recentHistory.map(m => m.content)).toEqual(['Feeling happy today', 'great'])
    })
})
