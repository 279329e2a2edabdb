/**
 * Assessment Estimator: mood, anxiety, crisis and coping signals.
 *
 * Crisis detection is a plain phrase match against the lower-cased text with
 * no smoothing and no history: one listed phrase is enough.
 * Mood and anxiety are smoothed with α = 0.3, so they move faster than the
 * personality traits.
 */

import {
    ANXIETY_BASE,
    ANXIETY_STEP,
    ANXIETY_WORDS,
    ASSESSMENT_SMOOTHING_ALPHA,
    COPING_TAXONOMY,
    CRISIS_PHRASES,
    CRISIS_RISK_MAX,
    CRISIS_RISK_STEP,
    DEFAULT_ANXIETY,
    DEFAULT_MOOD,
    GOAL_PHRASES,
    MOOD_BASE,
    MOOD_STEP,
    NEGATIVE_MOOD_WORDS,
    POSITIVE_MOOD_WORDS,
    PROTECTIVE_FACTORS,
    SCALE_MAX,
    SCALE_MIN,
    type CopingCategory,
} from './constants.js'
import { clamp, countMatches, smooth } from '../utils/clamp.js'
import { safeError } from '../utils/safe-log.js'
import type {
    AssessmentObservation,
    CrisisSignal,
    TherapeuticAssessment,
} from '../types/companion.js'

export interface AssessmentVocabulary {
    positiveMood: readonly string[]
    negativeMood: readonly string[]
    anxiety: readonly string[]
    crisis: readonly string[]
    coping: Readonly<Record<CopingCategory, readonly string[]>>
    goals: readonly string[]
    protective: Readonly<Record<string, readonly string[]>>
}

export const DEFAULT_ASSESSMENT_VOCABULARY: AssessmentVocabulary = Object.freeze({
    positiveMood: POSITIVE_MOOD_WORDS,
    negativeMood: NEGATIVE_MOOD_WORDS,
    anxiety: ANXIETY_WORDS,
    crisis: CRISIS_PHRASES,
    coping: COPING_TAXONOMY,
    goals: GOAL_PHRASES,
    protective: PROTECTIVE_FACTORS,
})

export function createEmptyAssessment(): TherapeuticAssessment {
    return {
        moodScore: DEFAULT_MOOD,
        anxietyLevel: DEFAULT_ANXIETY,
        riskFactors: [],
        copingStrategies: [],
        stressIndicators: [],
        therapeuticGoals: [],
        protectiveFactors: [],
        progressMetrics: {},
    }
}

export function cloneAssessment(assessment: TherapeuticAssessment): TherapeuticAssessment {
    return {
        moodScore: assessment.moodScore,
        anxietyLevel: assessment.anxietyLevel,
        riskFactors: [...assessment.riskFactors],
        copingStrategies: [...assessment.copingStrategies],
        stressIndicators: [...assessment.stressIndicators],
        therapeuticGoals: [...assessment.therapeuticGoals],
        protectiveFactors: [...assessment.protectiveFactors],
        progressMetrics: { ...assessment.progressMetrics },
    }
}

function appendUnique(existing: string[], incoming: string[]): string[] {
    const next = [...existing]
    for (const item of incoming) {
        if (!next.includes(item)) next.push(item)
    }
    return next
}

export class AssessmentEstimator {
    constructor(
        private readonly vocabulary: AssessmentVocabulary = DEFAULT_ASSESSMENT_VOCABULARY,
        private readonly alpha: number = ASSESSMENT_SMOOTHING_ALPHA,
    ) {}

    assessMood(text: string): number {
        const lower = text.toLowerCase()
        const positive = countMatches(lower, this.vocabulary.positiveMood)
        const negative = countMatches(lower, this.vocabulary.negativeMood)
        return clamp(MOOD_BASE + (positive - negative) * MOOD_STEP, SCALE_MIN, SCALE_MAX)
    }

    assessAnxiety(text: string): number {
        const hits = countMatches(text.toLowerCase(), this.vocabulary.anxiety)
        return clamp(ANXIETY_BASE + hits * ANXIETY_STEP, SCALE_MIN, SCALE_MAX)
    }

    detectCrisis(text: string): CrisisSignal {
        const hits = countMatches(text.toLowerCase(), this.vocabulary.crisis)
        return {
            isCrisis: hits > 0,
            riskLevel: Math.min(hits * CRISIS_RISK_STEP, CRISIS_RISK_MAX),
        }
    }

    /** Ordered "category: phrase" tags, taxonomy order then phrase order */
    identifyCopingStrategies(text: string): string[] {
        const lower = text.toLowerCase()
        const found: string[] = []
        for (const [category, phrases] of Object.entries(this.vocabulary.coping)) {
            for (const phrase of phrases) {
                if (lower.includes(phrase)) found.push(`${category}: ${phrase}`)
            }
        }
        return found
    }

    identifyStressIndicators(text: string): string[] {
        const lower = text.toLowerCase()
        return this.vocabulary.anxiety
            .filter(word => lower.includes(word))
            .map(word => `stress: ${word}`)
    }

    identifyGoals(text: string): string[] {
        const lower = text.toLowerCase()
        return this.vocabulary.goals
            .filter(phrase => lower.includes(phrase))
            .map(phrase => `goal: ${phrase}`)
    }

    identifyProtectiveFactors(text: string): string[] {
        const lower = text.toLowerCase()
        const found: string[] = []
        for (const [factor, phrases] of Object.entries(this.vocabulary.protective)) {
            const hit = phrases.find(phrase => lower.includes(phrase))
            if (hit) found.push(`${factor}: ${hit}`)
        }
        return found
    }

    /** A throwing crisis detector is recorded as a crisis, never as calm. */
    observe(text: string): AssessmentObservation {
        let crisis: CrisisSignal
        let crisisDetectorFailed = false
        try {
            crisis = this.detectCrisis(text)
        } catch (err) {
            console.error('[assessment] Crisis detector threw, treating the message as a crisis:', safeError(err))
            crisis = { isCrisis: true, riskLevel: 0 }
            crisisDetectorFailed = true
        }
        return {
            mood: this.assessMood(text),
            anxiety: this.assessAnxiety(text),
            crisis,
            crisisDetectorFailed,
            copingStrategies: this.identifyCopingStrategies(text),
            stressIndicators: this.identifyStressIndicators(text),
            therapeuticGoals: this.identifyGoals(text),
            protectiveFactors: this.identifyProtectiveFactors(text),
        }
    }

    apply(assessment: TherapeuticAssessment, observation: AssessmentObservation): TherapeuticAssessment {
        const moodScore = smooth(assessment.moodScore, observation.mood, this.alpha)
        const anxietyLevel = smooth(assessment.anxietyLevel, observation.anxiety, this.alpha)

        const riskFactors = [...assessment.riskFactors]
        if (observation.crisis.isCrisis) {
            riskFactors.push(`Crisis indicators detected: ${observation.crisis.riskLevel.toFixed(1)}`)
        }

        const turnsObserved = (assessment.progressMetrics.turns_observed ?? 0) + 1

        return {
            moodScore,
            anxietyLevel,
            riskFactors,
            copingStrategies: appendUnique(assessment.copingStrategies, observation.copingStrategies),
            stressIndicators: [...assessment.stressIndicators, ...observation.stressIndicators],
            therapeuticGoals: [...assessment.therapeuticGoals, ...observation.therapeuticGoals],
            protectiveFactors: appendUnique(assessment.protectiveFactors, observation.protectiveFactors),
            progressMetrics: {
                ...assessment.progressMetrics,
                turns_observed: turnsObserved,
                mood_trend: moodScore - assessment.moodScore,
                anxiety_trend: anxietyLevel - assessment.anxietyLevel,
                last_risk_level: observation.crisis.riskLevel,
            },
        }
    }

    update(assessment: TherapeuticAssessment, text: string): TherapeuticAssessment {
        return this.apply(assessment, this.observe(text))
    }
}
