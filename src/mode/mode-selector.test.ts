import { describe, it, expect, vi, afterEach } from 'vitest'
import { selectMode, type ModeInput } from './mode-selector.js'
import { AssessmentEstimator } from '../analyzers/assessment-estimator.js'

const estimator = new AssessmentEstimator()
const detect = (text: string) => estimator.detectCrisis(text)

function input(message: string, overrides: { mood?: number; anxiety?: number; confidence?: number } = {}): ModeInput {
    return {
        message,
        profile: { confidenceScore: overrides.confidence ?? 0.5 },
        assessment: { moodScore: overrides.mood ?? 6, anxietyLevel: overrides.anxiety ?? 3 },
    }
}

describe('selectMode', () => {
    afterEach(() => {
        vi.restoreAllMocks()
    })

    it('puts crisis above everything else', () => {
        const decision = selectMode(input('I want to achieve something but I feel hopeless', { mood: 2, confidence: 0 }), detect)
        expect(decision).toEqual({ mode: 'CRISIS', rule: 'crisis', crisis: { isCrisis: true, riskLevel: 2 } })
    })

    it('routes low mood or high anxiety to THERAPEUTIC', () => {
        expect(selectMode(input('my goal is rest', { mood: 3.9 }), detect).mode).toBe('THERAPEUTIC')
        expect(selectMode(input('my goal is rest', { anxiety: 7.1 }), detect).mode).toBe('THERAPEUTIC')
    })

    it('treats the thresholds themselves as not distressed', () => {
        expect(selectMode(input('hello', { mood: 4, anxiety: 7 }), detect).mode).toBe('COMPANION')
    })

    it('falls back to ASSESSMENT while the profile is still uncertain', () => {
        expect(selectMode(input('I want to improve', { confidence: 0.29 }), detect)).toMatchObject({
            mode: 'ASSESSMENT',
            rule: 'low_confidence',
        })
    })

    it('picks COACHING on goal language', () => {
        expect(selectMode(input('I want to achieve my goal'), detect)).toMatchObject({
            mode: 'COACHING',
            rule: 'coaching_keyword',
        })
        expect(selectMode(input('How do I IMPROVE at chess?'), detect).mode).toBe('COACHING')
    })

    it('defaults to COMPANION', () => {
        expect(selectMode(input('Just had lunch with a friend'), detect)).toEqual({
            mode: 'COMPANION',
            rule: 'default',
            crisis: { isCrisis: false, riskLevel: 0 },
        })
    })

    it('fails closed to CRISIS when the detector throws', () => {
        vi.spyOn(console, 'error').mockImplementation(() => {})
        const decision = selectMode(input('anything'), () => {
            throw new Error('detector offline')
        })
        expect(decision.mode).toBe('CRISIS')
        expect(decision.rule).toBe('crisis_detector_failed')
        expect(console.error).toHaveBeenCalledTimes(1)
    })
})
