/**
 * Tests: Conversation Memory
 *
 * Uses a mocked pg Pool, no real database required.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

const mocks = vi.hoisted(() => ({
    query: vi.fn(),
}))

vi.mock('../db.js', () => ({
    getPool: () => ({ query: mocks.query }),
}))

import { PgMemoryContextService, extractEmotionalIndicators, relationshipStrength } from './conversation-memory.js'
import { nullEmbeddings, type EmbeddingService } from '../collaborators.js'

const SESSION_ID = 'cccccccc-cccc-cccc-cccc-cccccccccccc'

/** Routes each query to canned rows by a fragment of its SQL */
function routeQueries(routes: Array<[string, unknown[]]>): void {
    mocks.query.mockImplementation(async (sql: string) => {
        const match = routes.find(([fragment]) => sql.includes(fragment))
        return { rows: match ? match[1] : [] }
    })
}

describe('extractEmotionalIndicators', () => {
    it('returns emotion labels in lexicon order', () => {
        expect(extractEmotionalIndicators('I was so ANGRY but now I feel calm and happy')).toEqual(['joy', 'anger', 'calm'])
        expect(extractEmotionalIndicators('just a regular day')).toEqual([])
    })
})

describe('relationshipStrength', () => {
    it('saturates at ten sessions', () => {
        expect(relationshipStrength(0)).toBe(0)
        expect(relationshipStrength(4)).toBeCloseTo(0.4, 10)
        expect(relationshipStrength(25)).toBe(1)
    })
})

describe('PgMemoryContextService', () => {
    beforeEach(() => {
        mocks.query.mockReset()
        vi.spyOn(console, 'error').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation(() => {})
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    it('returns history oldest first', async () => {
        mocks.query.mockResolvedValueOnce({
            rows: [
                { role: 'assistant', content: 'second', metadata: { conversationMode: 'COMPANION' } },
                { role: 'user', content: 'first', metadata: 'not-an-object' },
            ],
        })
        const memory = new PgMemoryContextService()

        const history = await memory.getConversationHistory(SESSION_ID, 2)

        expect(history).toEqual([
            { role: 'user', content: 'first', metadata: {} },
            { role: 'assistant', content: 'second', metadata: { conversationMode: 'COMPANION' } },
        ])
        expect(mocks.query.mock.calls[0][1]).toEqual([SESSION_ID, 2])
    })

    it('yields empty history when the query fails', async () => {
        mocks.query.mockRejectedValueOnce(new Error('connection reset'))
        expect(await new PgMemoryContextService().getConversationHistory(SESSION_ID, 10)).toEqual([])
    })

    it('writes both sides of the exchange in one statement', async () => {
        mocks.query.mockResolvedValueOnce({ rowCount: 2 })
        const memory = new PgMemoryContextService()

        await memory.addConversation(SESSION_ID, 'hi', 'hello!', { conversationMode: 'COMPANION', confidence: 0.8 })

        expect(mocks.query).toHaveBeenCalledTimes(1)
        const params = mocks.query.mock.calls[0][1]
        expect(params.slice(0, 3)).toEqual([SESSION_ID, 'hi', 'hello!'])
        expect(JSON.parse(params[3])).toEqual({ conversationMode: 'COMPANION', confidence: 0.8 })
        expect(JSON.parse(params[4])).toMatchObject({ conversationMode: 'COMPANION', confidence: 0.8 })
        expect(typeof JSON.parse(params[4]).timestamp).toBe('string')
    })

    it('propagates write failures', async () => {
        mocks.query.mockRejectedValueOnce(new Error('disk full'))
        await expect(new PgMemoryContextService().addConversation(SESSION_ID, 'a', 'b', {})).rejects.toThrow('disk full')
    })

    it('analyzes patterns across every session of the user', async () => {
        routeQueries([
            ['COUNT(*)::int AS total', [{ total: 4 }]],
            ['SELECT m.content', [{ content: 'feeling calm now' }, { content: 'I was so worried' }]],
            ["metadata->>'conversationMode'", [{ mode: 'THERAPEUTIC' }, { mode: 'COMPANION' }]],
        ])

        const patterns = await new PgMemoryContextService().analyzeCrossSessionPatterns('user-1')

        expect(patterns).toEqual({
            totalSessions: 4,
            emotionalProgression: ['anxiety', 'calm'],
            conversationTopics: ['therapeutic', 'companion'],
        })
    })

    it('assembles enhanced context with semantic neighbours', async () => {
        routeQueries([
            ['COUNT(*)::int AS total', [{ total: 2 }]],
        ])
        const searchSimilar = vi.fn(async () => [{ id: 'v1', similarity: 0.9, metadata: {} }])
        const embeddings: EmbeddingService = { ...nullEmbeddings, searchSimilar }
        const memory = new PgMemoryContextService({ embeddings })

        const context = await memory.getEnhancedContext(SESSION_ID, 'user-1', 'how was my week')

        expect(searchSimilar).toHaveBeenCalledWith('how was my week', 'user-1', 3)
        expect(context.semanticContext).toEqual({
            similarConversations: [{ id: 'v1', similarity: 0.9, metadata: {} }],
            contextStrength: 1,
        })
        expect(context.relationshipContext).toEqual({ connections: 2, relationshipStrength: 0.2 })
        expect(context.recentHistory).toEqual([])
    })

    it('degrades each part of the context independently', async () => {
        mocks.query.mockRejectedValue(new Error('pg down'))
        const embeddings: EmbeddingService = {
            ...nullEmbeddings,
            searchSimilar: async () => Promise.reject(new Error('embedding down')),
        }

        const context = await new PgMemoryContextService({ embeddings }).getEnhancedContext(SESSION_ID, 'user-1', 'q')

        expect(context).toEqual({
            recentHistory: [],
            userPatterns: { totalSessions: 0, emotionalProgression: [], conversationTopics: [] },
            semanticContext: { similarConversations: [], contextStrength: 0 },
            relationshipContext: { connections: 0, relationshipStrength: 0 },
        })
    })
})
