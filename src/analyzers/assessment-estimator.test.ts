import { describe, it, expect, vi, afterEach } from 'vitest'
import {
    AssessmentEstimator,
    DEFAULT_ASSESSMENT_VOCABULARY,
    cloneAssessment,
    createEmptyAssessment,
} from './assessment-estimator.js'
import { TherapeuticAssessmentSchema } from '../types/schemas.js'
import type { CrisisSignal } from '../types/companion.js'

const estimator = new AssessmentEstimator()

describe('mood and anxiety', () => {
    it('scores mood from positive and negative words around 5', () => {
        expect(estimator.assessMood('nothing to report')).toBe(5)
        expect(estimator.assessMood('Today was great, really wonderful')).toBe(6)
        expect(estimator.assessMood('I feel sad and down')).toBe(4)
    })

    it('clamps mood to [1,10]', () => {
        const gloomy = new AssessmentEstimator({
            ...DEFAULT_ASSESSMENT_VOCABULARY,
            negativeMood: ['bleak', 'grim', 'gloomy', 'miserable', 'numb', 'empty', 'lost', 'tired', 'drained', 'hollow'],
        })
        expect(gloomy.assessMood('bleak grim gloomy miserable numb empty lost tired drained hollow')).toBe(1)
    })

    it('scores anxiety as 3 + 1.5 per word, capped at 10', () => {
        expect(estimator.assessAnxiety('all fine')).toBe(3)
        expect(estimator.assessAnxiety('I am nervous')).toBe(4.5)
        expect(estimator.assessAnxiety('anxious, worried, nervous, scared and frightened')).toBe(10)
    })
})

describe('detectCrisis', () => {
    it('flags any single phrase', () => {
        expect(estimator.detectCrisis('I feel hopeless')).toEqual({ isCrisis: true, riskLevel: 2 })
    })

    it('scales risk by hit count, capped at 10', () => {
        expect(estimator.detectCrisis('I want to die, there is no point')).toEqual({ isCrisis: true, riskLevel: 4 })
        expect(estimator.detectCrisis(
            'suicide, kill myself, end it all, hopeless, want to die, better off dead'
        )).toEqual({ isCrisis: true, riskLevel: 10 })
    })

    it('is monotone in the number of phrases', () => {
        const one = estimator.detectCrisis('hopeless').riskLevel
        const two = estimator.detectCrisis('hopeless, give up').riskLevel
        expect(two).toBeGreaterThan(one)
    })

    it('returns no risk for ordinary text', () => {
        expect(estimator.detectCrisis('Had a lovely walk today')).toEqual({ isCrisis: false, riskLevel: 0 })
    })
})

describe('signal tags', () => {
    it('lists coping strategies in taxonomy order', () => {
        expect(estimator.identifyCopingStrategies('I like to walk and talk with friends')).toEqual([
            'behavioral: walk',
            'social: talk',
            'social: friends',
        ])
    })

    it('tags stress words, goals and protective factors', () => {
        expect(estimator.identifyStressIndicators("I'm so stressed and worried")).toEqual([
            'stress: worried',
            'stress: stressed',
        ])
        expect(estimator.identifyGoals('I want to run a marathon')).toEqual(['goal: i want to'])
        expect(estimator.identifyProtectiveFactors('I talked to my therapist')).toEqual([
            'professional_help: therapist',
        ])
    })
})

describe('apply', () => {
    it('smooths mood and anxiety with alpha 0.3', () => {
        const next = estimator.update(createEmptyAssessment(), 'Today was great, really wonderful')
        // observed mood 6, anxiety 3
        expect(next.moodScore).toBeCloseTo(0.7 * 5 + 0.3 * 6, 10)
        expect(next.anxietyLevel).toBeCloseTo(0.7 * 5 + 0.3 * 3, 10)
        expect(next.progressMetrics.turns_observed).toBe(1)
        expect(next.progressMetrics.mood_trend).toBeCloseTo(0.3, 10)
    })

    it('records one risk factor per crisis turn', () => {
        const once = estimator.update(createEmptyAssessment(), 'I feel hopeless')
        const twice = estimator.update(once, 'I want to die, there is no point')
        expect(twice.riskFactors).toEqual([
            'Crisis indicators detected: 2.0',
            'Crisis indicators detected: 4.0',
        ])
        expect(twice.progressMetrics.last_risk_level).toBe(4)
    })

    it('deduplicates coping strategies but keeps repeated stress tags', () => {
        const text = 'I walk when I am worried'
        const next = estimator.update(estimator.update(createEmptyAssessment(), text), text)
        expect(next.copingStrategies).toEqual(['behavioral: walk'])
        expect(next.stressIndicators).toEqual(['stress: worried', 'stress: worried'])
    })

    it('does not mutate its input', () => {
        const start = createEmptyAssessment()
        const before = cloneAssessment(start)
        estimator.update(start, 'hopeless and worried')
        expect(start).toEqual(before)
    })

    it('keeps mood and anxiety inside the scale', () => {
        let assessment = createEmptyAssessment()
        for (let i = 0; i < 30; i++) {
            assessment = estimator.update(assessment, 'anxious worried nervous scared panic overwhelmed')
        }
        expect(assessment.anxietyLevel).toBeLessThanOrEqual(10)
        expect(assessment.anxietyLevel).toBeGreaterThan(9.9)
        expect(TherapeuticAssessmentSchema.safeParse(assessment).success).toBe(true)
    })
})

describe('observe', () => {
    afterEach(() => {
        vi.restoreAllMocks()
    })

    it('records a throwing crisis detector as a crisis', () => {
        vi.spyOn(console, 'error').mockImplementation(() => {})
        class Broken extends AssessmentEstimator {
            override detectCrisis(): CrisisSignal {
                throw new Error('lexicon failed to load')
            }
        }

        const observation = new Broken().observe('Had a great walk today')

        expect(observation.crisis).toEqual({ isCrisis: true, riskLevel: 0 })
        expect(observation.crisisDetectorFailed).toBe(true)
        expect(observation.mood).toBe(5.5)
    })

    it('flags no failure on the normal path', () => {
        const observation = estimator.observe('I feel hopeless')
        expect(observation.crisis).toEqual({ isCrisis: true, riskLevel: 2 })
        expect(observation.crisisDetectorFailed).toBe(false)
    })
})
