import type { CommunicationStyle, PersonalityTrait } from '../types/companion.js'

// ─── Smoothing ──────────────────────────────────────────────────────────────

export const TRAIT_SMOOTHING_ALPHA = 0.1
export const ASSESSMENT_SMOOTHING_ALPHA = 0.3
export const CONFIDENCE_INCREMENT = 0.05

/** Trait coverage is normalized by 30% of the vocabulary, floored at 1 */
export const TRAIT_COVERAGE_RATIO = 0.3
export const DEFAULT_JITTER_STDDEV = 0.1

// ─── Mood / Anxiety ─────────────────────────────────────────────────────────

export const MOOD_BASE = 5.0
export const MOOD_STEP = 0.5
export const ANXIETY_BASE = 3.0
export const ANXIETY_STEP = 1.5
export const SCALE_MIN = 1.0
export const SCALE_MAX = 10.0

export const CRISIS_RISK_STEP = 2.0
export const CRISIS_RISK_MAX = 10.0

export const DEFAULT_MOOD = 5.0
export const DEFAULT_ANXIETY = 5.0

// ─── Vocabularies ───────────────────────────────────────────────────────────

export const TRAIT_VOCABULARY: Readonly<Record<PersonalityTrait, readonly string[]>> = Object.freeze({
    openness: ['creative', 'curious', 'open-minded', 'imaginative', 'artistic'],
    conscientiousness: ['organized', 'responsible', 'reliable', 'disciplined', 'thorough'],
    extraversion: ['outgoing', 'social', 'talkative', 'energetic', 'assertive'],
    agreeableness: ['kind', 'cooperative', 'trusting', 'helpful', 'sympathetic'],
    neuroticism: ['anxious', 'worried', 'stressed', 'emotional', 'sensitive'],
    empathy: ['understanding', 'compassionate', 'caring', 'supportive'],
    optimism: ['positive', 'hopeful', 'confident', 'enthusiastic'],
    emotional_stability: ['calm', 'steady', 'balanced', 'composed', 'resilient'],
})

export const STYLE_VOCABULARY: Readonly<Record<CommunicationStyle, readonly string[]>> = Object.freeze({
    formal: ['please', 'thank you', 'would you', 'could you', 'appreciate'],
    casual: ['hey', 'yeah', 'cool', 'awesome', 'no problem'],
    emotional: ['feel', 'emotion', 'heart', 'soul', 'deeply'],
    analytical: ['think', 'analyze', 'consider', 'evaluate', 'logical'],
})

export const POSITIVE_MOOD_WORDS: readonly string[] = Object.freeze(
    ['happy', 'great', 'wonderful', 'excellent', 'fantastic', 'amazing'],
)

export const NEGATIVE_MOOD_WORDS: readonly string[] = Object.freeze(
    ['sad', 'down', 'terrible', 'awful', 'horrible', 'depressed'],
)

export const ANXIETY_WORDS: readonly string[] = Object.freeze([
    'anxious', 'worried', 'panic', 'nervous', 'scared', 'frightened',
    'overwhelmed', 'stressed', 'tense', 'restless',
])

export const CRISIS_PHRASES: readonly string[] = Object.freeze([
    'suicide', 'kill myself', 'end it all', "can't go on", 'hopeless',
    'want to die', 'better off dead', 'no point', 'give up',
])

export type CopingCategory = 'cognitive' | 'behavioral' | 'social' | 'mindfulness'

export const COPING_TAXONOMY: Readonly<Record<CopingCategory, readonly string[]>> = Object.freeze({
    cognitive: ['reframe', 'perspective', 'think differently', 'challenge thoughts'],
    behavioral: ['exercise', 'walk', 'breathe', 'relax', 'activity'],
    social: ['talk', 'friends', 'family', 'support', 'help'],
    mindfulness: ['meditate', 'mindful', 'present', 'aware', 'focus'],
})

export const GOAL_PHRASES: readonly string[] = Object.freeze([
    'my goal', 'i want to', "i'd like to", 'i hope to', 'i plan to', 'working on',
])

export const PROTECTIVE_FACTORS: Readonly<Record<string, readonly string[]>> = Object.freeze({
    social_support: ['my friend', 'my family', 'my partner', 'someone to talk to'],
    professional_help: ['therapist', 'counselor', 'counsellor', 'doctor'],
    routine: ['routine', 'schedule', 'sleep well', 'eating well'],
})

// ─── Mode selection ─────────────────────────────────────────────────────────

export const COACHING_KEYWORDS: readonly string[] = Object.freeze(['goal', 'improve', 'achieve'])
export const DISTRESS_MOOD_THRESHOLD = 4.0
export const DISTRESS_ANXIETY_THRESHOLD = 7.0
export const ASSESSMENT_CONFIDENCE_THRESHOLD = 0.3
