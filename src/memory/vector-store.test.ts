import { describe, it, expect, vi, beforeEach } from 'vitest'

const mocks = vi.hoisted(() => ({
    query: vi.fn(),
}))

vi.mock('../db.js', () => ({
    getPool: () => ({ query: mocks.query }),
}))

import { PgVectorStore, cosineSimilarity } from './vector-store.js'

describe('cosineSimilarity', () => {
    it('is 1 for parallel and 0 for orthogonal vectors', () => {
        expect(cosineSimilarity([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 10)
        expect(cosineSimilarity([1, 0], [0, 1])).toBe(0)
        expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1, 10)
    })

    it('is 0 for empty, mismatched or zero vectors', () => {
        expect(cosineSimilarity([], [])).toBe(0)
        expect(cosineSimilarity([1, 2], [1, 2, 3])).toBe(0)
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
    })
})

describe('PgVectorStore', () => {
    beforeEach(() => {
        mocks.query.mockReset()
    })

    it('returns the top matches by similarity', async () => {
        mocks.query.mockResolvedValueOnce({
            rows: [
                { id: 'far', content: 'a', embedding: [0, 1], metadata: {} },
                { id: 'near', content: 'b', embedding: [1, 0.1], metadata: { sessionId: 's1' } },
                { id: 'mid', content: 'c', embedding: [1, 1], metadata: null },
            ],
        })
        const store = new PgVectorStore(100)

        const matches = await store.nearest('user-1', 'conversation', [1, 0], 2)

        expect(matches.map(m => m.id)).toEqual(['near', 'mid'])
        expect(matches[0].metadata).toEqual({ sessionId: 's1' })
        expect(matches[1].metadata).toEqual({})
        expect(mocks.query.mock.calls[0][1]).toEqual(['user-1', 'conversation', 100])
    })

    it('skips the query when topK is not positive', async () => {
        expect(await new PgVectorStore().nearest('user-1', 'conversation', [1], 0)).toEqual([])
        expect(mocks.query).not.toHaveBeenCalled()
    })

    it('inserts conversation vectors under fresh ids', async () => {
        mocks.query.mockResolvedValue({ rowCount: 1 })
        const store = new PgVectorStore()

        const first = await store.insert('user-1', 'conversation', 'text', [0.5], { a: 1 })
        const second = await store.insert('user-1', 'conversation', 'text', [0.5], { a: 1 })

        expect(first).not.toBe(second)
        expect(mocks.query.mock.calls[0][1]).toEqual([first, 'user-1', 'conversation', 'text', [0.5], '{"a":1}'])
    })

    it('keeps one personality vector per user', async () => {
        mocks.query.mockResolvedValue({ rowCount: 1 })

        const id = await new PgVectorStore().upsertSingleton('user-1', 'personality', '{}', [0.1, 0.2], {})

        expect(id).toBe('personality:user-1')
        expect(mocks.query.mock.calls[0][0]).toContain('ON CONFLICT (id) DO UPDATE')
    })
})
