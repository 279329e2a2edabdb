import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'

const mocks = vi.hoisted(() => ({
    query: vi.fn(),
}))

vi.mock('../db.js', () => ({
    getPool: () => ({ query: mocks.query }),
}))

import { PgProfileRepository } from './profile-repository.js'
import { createEmptyAssessment } from '../analyzers/assessment-estimator.js'
import { createEmptyProfile } from '../analyzers/trait-estimator.js'

const repo = new PgProfileRepository()
const profile = { ...createEmptyProfile(new Date('2026-05-02T00:00:00.000Z')), confidenceScore: 0.4 }

describe('PgProfileRepository', () => {
    beforeEach(() => {
        mocks.query.mockReset()
        vi.spyOn(console, 'warn').mockImplementation(() => {})
    })

    afterEach(() => {
        vi.restoreAllMocks()
    })

    it('returns null when nothing is stored', async () => {
        mocks.query.mockResolvedValueOnce({ rows: [] })
        expect(await repo.load('user-1')).toBeNull()
    })

    it('validates and fills defaults on load', async () => {
        mocks.query.mockResolvedValueOnce({
            rows: [{ profile, assessment: { moodScore: 7 }, version: '3' }],
        })

        const loaded = await repo.load('user-1')

        expect(loaded).toEqual({
            profile,
            assessment: { ...createEmptyAssessment(), moodScore: 7 },
            version: 3,
        })
    })

    it('ignores a corrupt row', async () => {
        mocks.query.mockResolvedValueOnce({
            rows: [{ profile: { confidenceScore: 4 }, assessment: {}, version: 1 }],
        })
        expect(await repo.load('user-1')).toBeNull()
        expect(console.warn).toHaveBeenCalledTimes(1)
    })

    it('upserts only newer versions', async () => {
        mocks.query.mockResolvedValueOnce({ rowCount: 1 })

        await repo.save('user-1', { profile, assessment: createEmptyAssessment(), version: 5 })

        const [sql, params] = mocks.query.mock.calls[0]
        expect(sql).toContain('WHERE user_profiles.version < EXCLUDED.version')
        expect(params[0]).toBe('user-1')
        expect(JSON.parse(params[1])).toEqual(profile)
        expect(params[3]).toBe(5)
        expect(console.warn).not.toHaveBeenCalled()
    })

    it('logs a skipped stale write', async () => {
        mocks.query.mockResolvedValueOnce({ rowCount: 0 })
        await repo.save('user-1', { profile, assessment: createEmptyAssessment(), version: 2 })
        expect(console.warn).toHaveBeenCalledWith('[profiles] Skipped stale write for user-1 (version 2)')
    })
})
