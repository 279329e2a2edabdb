import type { ConversationStage } from '../types/companion.js'
import type { GuardId } from './guards.js'

export interface StageEdge {
    from: ConversationStage
    to: ConversationStage
    guard: GuardId
}

export const INITIAL_STAGE: ConversationStage = 'initial'

/**
 * Stage graph edges. Declaration order is evaluation order for edges that
 * leave the same stage: the first guard that holds wins.
 */
export const STAGE_EDGES: readonly StageEdge[] = Object.freeze([
    { from: 'initial', to: 'greeting', guard: 'first_message' },
    { from: 'greeting', to: 'personality_assessment', guard: 'new_user' },
    { from: 'greeting', to: 'mood_check', guard: 'returning_user' },
    { from: 'personality_assessment', to: 'mood_check', guard: 'assessment_complete' },
    { from: 'mood_check', to: 'therapeutic_mode', guard: 'distress_detected' },
    { from: 'mood_check', to: 'companion_mode', guard: 'neutral_mood' },
    { from: 'mood_check', to: 'crisis_intervention', guard: 'crisis_detected' },
    { from: 'therapeutic_mode', to: 'coaching_mode', guard: 'progress_made' },
    { from: 'therapeutic_mode', to: 'crisis_intervention', guard: 'crisis_escalation' },
    { from: 'companion_mode', to: 'therapeutic_mode', guard: 'support_needed' },
    { from: 'crisis_intervention', to: 'therapeutic_mode', guard: 'crisis_resolved' },
    { from: 'coaching_mode', to: 'companion_mode', guard: 'goal_achieved' },
    { from: 'assessment_mode', to: 'therapeutic_mode', guard: 'issues_identified' },
    { from: 'therapeutic_mode', to: 'follow_up', guard: 'session_end' },
    { from: 'companion_mode', to: 'closure', guard: 'conversation_end' },
    { from: 'coaching_mode', to: 'closure', guard: 'coaching_complete' },
] satisfies StageEdge[])
