/**
 * Mode Selector: pure priority chain, recomputed every turn.
 *
 *   1. crisis phrase in the message   → CRISIS
 *   2. mood < 4.0 or anxiety > 7.0     → THERAPEUTIC
 *   3. profile confidence < 0.3        → ASSESSMENT
 *   4. goal / improve / achieve        → COACHING
 *   5. otherwise                       → COMPANION
 *
 * The order is behavior, not style. If the crisis detector throws, the
 * selector returns CRISIS.
 */

import {
    ASSESSMENT_CONFIDENCE_THRESHOLD,
    COACHING_KEYWORDS,
} from '../analyzers/constants.js'
import { isDistressed } from '../flow/guards.js'
import { safeError } from '../utils/safe-log.js'
import type {
    ConversationMode,
    CrisisSignal,
    PersonalityProfile,
    TherapeuticAssessment,
} from '../types/companion.js'

export type ModeRule = 'crisis' | 'crisis_detector_failed' | 'distress' | 'low_confidence' | 'coaching_keyword' | 'default'

export interface ModeDecision {
    mode: ConversationMode
    rule: ModeRule
    crisis: CrisisSignal
}

export interface ModeInput {
    message: string
    profile: Pick<PersonalityProfile, 'confidenceScore'>
    assessment: Pick<TherapeuticAssessment, 'moodScore' | 'anxietyLevel'>
}

export type CrisisDetector = (text: string) => CrisisSignal

/** The decision when crisis detection could not run. */
export function failClosed(): ModeDecision {
    return { mode: 'CRISIS', rule: 'crisis_detector_failed', crisis: { isCrisis: true, riskLevel: 0 } }
}

export function selectMode(input: ModeInput, detectCrisis: CrisisDetector): ModeDecision {
    let crisis: CrisisSignal
    try {
        crisis = detectCrisis(input.message)
    } catch (err) {
        console.error('[mode] Crisis detector threw, failing closed to CRISIS:', safeError(err))
        return failClosed()
    }

    if (crisis.isCrisis) {
        return { mode: 'CRISIS', rule: 'crisis', crisis }
    }
    if (isDistressed({ therapeuticAssessment: input.assessment })) {
        return { mode: 'THERAPEUTIC', rule: 'distress', crisis }
    }
    if (input.profile.confidenceScore < ASSESSMENT_CONFIDENCE_THRESHOLD) {
        return { mode: 'ASSESSMENT', rule: 'low_confidence', crisis }
    }
    const lower = input.message.toLowerCase()
    if (COACHING_KEYWORDS.some(word => lower.includes(word))) {
        return { mode: 'COACHING', rule: 'coaching_keyword', crisis }
    }
    return { mode: 'COMPANION', rule: 'default', crisis }
}
