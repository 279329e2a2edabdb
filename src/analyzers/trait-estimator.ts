/**
 * Trait Estimator: lexical personality and communication-style scoring.
 *
 * Pure apart from the injected noise source. Each observed turn produces a
 * TraitObservation; applying it to a profile blends every score with
 * exponential smoothing (α = 0.1) and bumps the profile confidence.
 *
 * Observation and application are split so the turn pipeline can score the
 * message once, use the result for mode selection, and later re-apply the very
 * same observation to whatever profile snapshot is current at commit time.
 */

import {
    CONFIDENCE_INCREMENT,
    DEFAULT_JITTER_STDDEV,
    STYLE_VOCABULARY,
    TRAIT_COVERAGE_RATIO,
    TRAIT_SMOOTHING_ALPHA,
    TRAIT_VOCABULARY,
} from './constants.js'
import { gaussianNoise, type NoiseSource } from './noise.js'
import { clamp01, countMatches, smooth } from '../utils/clamp.js'
import {
    COMMUNICATION_STYLES,
    PERSONALITY_TRAITS,
    type CommunicationStyle,
    type PersonalityProfile,
    type PersonalityTrait,
    type TraitObservation,
} from '../types/companion.js'

export interface TraitEstimatorOptions {
    noise?: NoiseSource
    traitVocabulary?: Readonly<Record<PersonalityTrait, readonly string[]>>
    styleVocabulary?: Readonly<Record<CommunicationStyle, readonly string[]>>
    alpha?: number
    confidenceIncrement?: number
    clock?: () => Date
}

export function createEmptyProfile(now: Date = new Date()): PersonalityProfile {
    return {
        traits: {},
        communicationStyle: {},
        confidenceScore: 0,
        lastUpdated: now.toISOString(),
    }
}

export function cloneProfile(profile: PersonalityProfile): PersonalityProfile {
    return {
        traits: { ...profile.traits },
        communicationStyle: { ...profile.communicationStyle },
        confidenceScore: profile.confidenceScore,
        lastUpdated: profile.lastUpdated,
    }
}

function blend<K extends string>(
    keys: readonly K[],
    current: Partial<Record<K, number>>,
    observed: Record<K, number>,
    alpha: number,
): Partial<Record<K, number>> {
    const next: Partial<Record<K, number>> = { ...current }
    for (const key of keys) {
        const previous = current[key]
        next[key] = typeof previous === 'number'
            ? clamp01(smooth(previous, observed[key], alpha))
            : observed[key]
    }
    return next
}

function highest<K extends string>(keys: readonly K[], scores: Partial<Record<K, number>>): K | null {
    let best: K | null = null
    let bestScore = -Infinity
    for (const key of keys) {
        const value = scores[key]
        if (typeof value === 'number' && value > bestScore) {
            best = key
            bestScore = value
        }
    }
    return best
}

export class TraitEstimator {
    private readonly noise: NoiseSource
    private readonly traitVocabulary: Readonly<Record<PersonalityTrait, readonly string[]>>
    private readonly styleVocabulary: Readonly<Record<CommunicationStyle, readonly string[]>>
    private readonly alpha: number
    private readonly confidenceIncrement: number
    private readonly clock: () => Date

    constructor(opts: TraitEstimatorOptions = {}) {
        this.noise = opts.noise ?? gaussianNoise(DEFAULT_JITTER_STDDEV)
        this.traitVocabulary = opts.traitVocabulary ?? TRAIT_VOCABULARY
        this.styleVocabulary = opts.styleVocabulary ?? STYLE_VOCABULARY
        this.alpha = opts.alpha ?? TRAIT_SMOOTHING_ALPHA
        this.confidenceIncrement = opts.confidenceIncrement ?? CONFIDENCE_INCREMENT
        this.clock = opts.clock ?? (() => new Date())
    }

    /**
     * Keyword coverage per trait, plus one noise sample per trait, clamped to [0,1].
     */
    score(text: string): Record<PersonalityTrait, number> {
        const lower = text.toLowerCase()
        const traitScore = (trait: PersonalityTrait): number => {
            const vocabulary = this.traitVocabulary[trait]
            const matches = countMatches(lower, vocabulary)
            const coverage = Math.min(matches / Math.max(vocabulary.length * TRAIT_COVERAGE_RATIO, 1), 1)
            return clamp01(coverage + this.noise())
        }
        return {
            openness: traitScore('openness'),
            conscientiousness: traitScore('conscientiousness'),
            extraversion: traitScore('extraversion'),
            agreeableness: traitScore('agreeableness'),
            neuroticism: traitScore('neuroticism'),
            empathy: traitScore('empathy'),
            optimism: traitScore('optimism'),
            emotional_stability: traitScore('emotional_stability'),
        }
    }

    /** Fraction of each style vocabulary present in the text. No jitter. */
    detectStyle(text: string): Record<CommunicationStyle, number> {
        const lower = text.toLowerCase()
        const styleScore = (style: CommunicationStyle): number => {
            const vocabulary = this.styleVocabulary[style]
            return vocabulary.length === 0 ? 0 : countMatches(lower, vocabulary) / vocabulary.length
        }
        return {
            formal: styleScore('formal'),
            casual: styleScore('casual'),
            emotional: styleScore('emotional'),
            analytical: styleScore('analytical'),
        }
    }

    observe(text: string): TraitObservation {
        return { traits: this.score(text), styles: this.detectStyle(text) }
    }

    apply(profile: PersonalityProfile, observation: TraitObservation, now: Date = this.clock()): PersonalityProfile {
        return {
            traits: blend(PERSONALITY_TRAITS, profile.traits, observation.traits, this.alpha),
            communicationStyle: blend(COMMUNICATION_STYLES, profile.communicationStyle, observation.styles, this.alpha),
            confidenceScore: Math.min(profile.confidenceScore + this.confidenceIncrement, 1),
            lastUpdated: now.toISOString(),
        }
    }

    update(profile: PersonalityProfile, text: string): PersonalityProfile {
        return this.apply(profile, this.observe(text))
    }
}

export function dominantTrait(profile: PersonalityProfile): PersonalityTrait | null {
    return highest(PERSONALITY_TRAITS, profile.traits)
}

export function dominantStyle(profile: PersonalityProfile): CommunicationStyle | null {
    return highest(COMMUNICATION_STYLES, profile.communicationStyle)
}
