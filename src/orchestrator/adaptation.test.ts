import { describe, it, expect } from 'vitest'
import {
    MAX_STORED_ADAPTATIONS,
    adaptationKind,
    appendAdaptation,
    boostConfidence,
    createAdaptation,
} from './adaptation.js'
import { createEmptyProfile } from '../analyzers/trait-estimator.js'
import type { PersonalityProfile } from '../types/companion.js'

const NOW = new Date('2026-02-10T12:00:00.000Z')

function profile(confidenceScore: number, extra: Partial<PersonalityProfile> = {}): PersonalityProfile {
    return { ...createEmptyProfile(NOW), confidenceScore, ...extra }
}

describe('adaptationKind', () => {
    it('maps support modes to support_intensity and coaching to goal_focus', () => {
        expect(adaptationKind('CRISIS', profile(0.9))).toBe('support_intensity')
        expect(adaptationKind('THERAPEUTIC', profile(0.1))).toBe('support_intensity')
        expect(adaptationKind('COACHING', profile(0.1))).toBe('goal_focus')
    })

    it('builds rapport until the profile is trusted, then aligns style', () => {
        expect(adaptationKind('COMPANION', profile(0.2))).toBe('rapport_building')
        expect(adaptationKind('COMPANION', profile(0.3))).toBe('style_alignment')
    })
})

describe('createAdaptation', () => {
    it('records the dominant style and trait with the profile confidence', () => {
        const record = createAdaptation(
            {
                mode: 'COMPANION',
                stage: 'companion_mode',
                profile: profile(0.6, { traits: { optimism: 0.8, empathy: 0.2 }, communicationStyle: { analytical: 0.4 } }),
            },
            NOW,
        )
        expect(record).toMatchObject({
            kind: 'style_alignment',
            targetComponent: 'response_style',
            hyperparameters: {
                mode: 'COMPANION',
                stage: 'companion_mode',
                dominantStyle: 'analytical',
                dominantTrait: 'optimism',
            },
            effectivenessScore: 0.6,
            createdAt: NOW.toISOString(),
        })
        expect(record.id).toMatch(/^[0-9a-f-]{36}$/)
    })

    it('uses unknown when nothing has been observed', () => {
        const record = createAdaptation({ mode: 'ASSESSMENT', stage: 'greeting', profile: profile(0) }, NOW)
        expect(record.hyperparameters.dominantStyle).toBe('unknown')
        expect(record.hyperparameters.dominantTrait).toBe('unknown')
    })
})

describe('boostConfidence', () => {
    it('adds a tenth of the effectiveness, capped at 1', () => {
        const record = createAdaptation({ mode: 'COACHING', stage: 'coaching_mode', profile: profile(0.5) }, NOW)
        expect(boostConfidence(0.8, record)).toBeCloseTo(0.85, 10)
        expect(boostConfidence(0.98, record)).toBe(1)
    })
})

describe('appendAdaptation', () => {
    it('keeps only the most recent records', () => {
        let list = appendAdaptation([], createAdaptation({ mode: 'COMPANION', stage: 'initial', profile: profile(0) }, NOW))
        const first = list[0]
        for (let i = 0; i < MAX_STORED_ADAPTATIONS; i++) {
            list = appendAdaptation(list, createAdaptation({ mode: 'COMPANION', stage: 'initial', profile: profile(0) }, NOW))
        }
        expect(list).toHaveLength(MAX_STORED_ADAPTATIONS)
        expect(list).not.toContain(first)
    })

    it('does not mutate the existing list', () => {
        const existing = [createAdaptation({ mode: 'CRISIS', stage: 'crisis_intervention', profile: profile(0) }, NOW)]
        const next = appendAdaptation(existing, createAdaptation({ mode: 'CRISIS', stage: 'crisis_intervention', profile: profile(0) }, NOW))
        expect(existing).toHaveLength(1)
        expect(next).toHaveLength(2)
    })
})
