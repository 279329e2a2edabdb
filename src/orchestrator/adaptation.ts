/**
 * Adaptation records: one per turn once the session has history.
 *
 * A record captures what the turn adapted to (mode, stage, the user's
 * dominant style and trait) and how much the profile backing it can be
 * trusted. Its effectiveness nudges the turn's reported confidence.
 */

import { randomUUID } from 'node:crypto'
import { ASSESSMENT_CONFIDENCE_THRESHOLD } from '../analyzers/constants.js'
import { dominantStyle, dominantTrait } from '../analyzers/trait-estimator.js'
import type {
    AdaptationKind,
    AdaptationRecord,
    ConversationMode,
    ConversationStage,
    PersonalityProfile,
} from '../types/companion.js'

export const MAX_STORED_ADAPTATIONS = 20
const CONFIDENCE_GAIN = 0.1

const TARGET_COMPONENT: Readonly<Record<AdaptationKind, string>> = Object.freeze({
    style_alignment: 'response_style',
    support_intensity: 'support_protocol',
    goal_focus: 'goal_tracking',
    rapport_building: 'rapport',
})

export interface AdaptationInput {
    mode: ConversationMode
    stage: ConversationStage
    profile: PersonalityProfile
}

export function adaptationKind(mode: ConversationMode, profile: PersonalityProfile): AdaptationKind {
    if (mode === 'CRISIS' || mode === 'THERAPEUTIC') return 'support_intensity'
    if (mode === 'COACHING') return 'goal_focus'
    if (profile.confidenceScore < ASSESSMENT_CONFIDENCE_THRESHOLD) return 'rapport_building'
    return 'style_alignment'
}

export function createAdaptation(input: AdaptationInput, now: Date = new Date()): AdaptationRecord {
    const kind = adaptationKind(input.mode, input.profile)
    return {
        id: randomUUID(),
        kind,
        targetComponent: TARGET_COMPONENT[kind],
        hyperparameters: {
            mode: input.mode,
            stage: input.stage,
            dominantStyle: dominantStyle(input.profile) ?? 'unknown',
            dominantTrait: dominantTrait(input.profile) ?? 'unknown',
        },
        effectivenessScore: input.profile.confidenceScore,
        createdAt: now.toISOString(),
    }
}

/** confidence + effectiveness·0.1, capped at 1 */
export function boostConfidence(confidence: number, record: AdaptationRecord): number {
    return Math.min(confidence + record.effectivenessScore * CONFIDENCE_GAIN, 1)
}

export function appendAdaptation(existing: AdaptationRecord[], record: AdaptationRecord): AdaptationRecord[] {
    return [...existing, record].slice(-MAX_STORED_ADAPTATIONS)
}
