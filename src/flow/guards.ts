/**
 * Transition guards for the conversation stage graph.
 *
 * Each guard is a pure predicate over the TurnState, registered once under a
 * stable identifier. Edges refer to guards by identifier only.
 */

import {
    ASSESSMENT_CONFIDENCE_THRESHOLD,
    DISTRESS_ANXIETY_THRESHOLD,
    DISTRESS_MOOD_THRESHOLD,
} from '../analyzers/constants.js'
import type { TherapeuticAssessment, TurnState } from '../types/companion.js'

export type GuardId =
    | 'first_message'
    | 'new_user'
    | 'returning_user'
    | 'assessment_complete'
    | 'distress_detected'
    | 'neutral_mood'
    | 'crisis_detected'
    | 'progress_made'
    | 'crisis_escalation'
    | 'support_needed'
    | 'crisis_resolved'
    | 'goal_achieved'
    | 'issues_identified'
    | 'session_end'
    | 'conversation_end'
    | 'coaching_complete'

export type GuardView = Pick<
    TurnState,
    | 'conversationHistory'
    | 'personalityProfile'
    | 'therapeuticAssessment'
    | 'conversationMode'
    | 'currentMessage'
    | 'turnCount'
    | 'confidence'
    | 'signals'
>

export type Guard = (state: GuardView) => boolean

const SUPPORT_WORDS = ['help', 'support', 'struggling', 'difficult']
const SESSION_END_TURNS = 20

function crisisThisTurn(state: GuardView): boolean {
    return state.signals.assessment?.crisis.isCrisis ?? false
}

export function isDistressed(state: {
    therapeuticAssessment: Pick<TherapeuticAssessment, 'moodScore' | 'anxietyLevel'>
}): boolean {
    const { moodScore, anxietyLevel } = state.therapeuticAssessment
    return moodScore < DISTRESS_MOOD_THRESHOLD || anxietyLevel > DISTRESS_ANXIETY_THRESHOLD
}

const guardTable: Record<GuardId, Guard> = {
    first_message: state => state.conversationHistory.length === 0,
    new_user: state => state.personalityProfile.confidenceScore < ASSESSMENT_CONFIDENCE_THRESHOLD,
    returning_user: state => state.personalityProfile.confidenceScore >= ASSESSMENT_CONFIDENCE_THRESHOLD,
    assessment_complete: state => state.personalityProfile.confidenceScore >= 0.7,
    distress_detected: state => isDistressed(state),
    neutral_mood: state =>
        state.therapeuticAssessment.moodScore >= DISTRESS_MOOD_THRESHOLD
        && state.therapeuticAssessment.anxietyLevel <= DISTRESS_ANXIETY_THRESHOLD,
    crisis_detected: state => state.conversationMode === 'CRISIS',
    progress_made: state => state.therapeuticAssessment.moodScore > 6.0,
    crisis_escalation: state => crisisThisTurn(state),
    support_needed: state => {
        const lower = state.currentMessage.toLowerCase()
        return SUPPORT_WORDS.some(word => lower.includes(word))
    },
    crisis_resolved: state => state.therapeuticAssessment.moodScore > 5.0 && !crisisThisTurn(state),
    goal_achieved: state => state.therapeuticAssessment.therapeuticGoals.length > 0,
    issues_identified: state => state.therapeuticAssessment.stressIndicators.length > 0,
    session_end: state => state.turnCount > SESSION_END_TURNS,
    conversation_end: state => state.currentMessage.toLowerCase().includes('goodbye'),
    coaching_complete: state => state.confidence > 0.8,
}

export const GUARDS: Readonly<Record<GuardId, Guard>> = Object.freeze(guardTable)

export function isGuardId(value: string): value is GuardId {
    return Object.prototype.hasOwnProperty.call(GUARDS, value)
}
