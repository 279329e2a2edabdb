/**
 * Companion Core Types
 *
 * Shared vocabulary for the estimators, the stage graph, the mode selector
 * and the turn pipeline. Everything here is plain data so it can be cloned,
 * serialized and compared without surprises.
 */

// ─── Personality ────────────────────────────────────────────────────────────

export const PERSONALITY_TRAITS = [
    'openness',
    'conscientiousness',
    'extraversion',
    'agreeableness',
    'neuroticism',
    'empathy',
    'optimism',
    'emotional_stability',
] as const
export type PersonalityTrait = typeof PERSONALITY_TRAITS[number]

export const COMMUNICATION_STYLES = ['formal', 'casual', 'emotional', 'analytical'] as const
export type CommunicationStyle = typeof COMMUNICATION_STYLES[number]

export type TraitScores = Partial<Record<PersonalityTrait, number>>
export type StyleScores = Partial<Record<CommunicationStyle, number>>

export interface PersonalityProfile {
    /** Running trait estimates, each in [0,1] */
    traits: TraitScores
    /** Running communication-style estimates, each in [0,1] */
    communicationStyle: StyleScores
    /** Saturating confidence in the profile, bumped once per observed turn */
    confidenceScore: number
    /** ISO timestamp of the last applied observation */
    lastUpdated: string
}

// ─── Therapeutic Assessment ─────────────────────────────────────────────────

export interface TherapeuticAssessment {
    moodScore: number            // 1–10, smoothed
    anxietyLevel: number         // 1–10, smoothed
    riskFactors: string[]        // append-only, one entry per crisis turn
    copingStrategies: string[]   // append-only, deduplicated
    stressIndicators: string[]   // append-only
    therapeuticGoals: string[]   // append-only
    protectiveFactors: string[]  // append-only, deduplicated
    progressMetrics: Record<string, number>
}

// ─── Modes & Stages ─────────────────────────────────────────────────────────

export const CONVERSATION_MODES = ['COMPANION', 'THERAPEUTIC', 'CRISIS', 'ASSESSMENT', 'COACHING'] as const
export type ConversationMode = typeof CONVERSATION_MODES[number]

export const CONVERSATION_STAGES = [
    'initial',
    'greeting',
    'personality_assessment',
    'mood_check',
    'therapeutic_mode',
    'crisis_intervention',
    'companion_mode',
    'coaching_mode',
    'assessment_mode',
    'closure',
    'follow_up',
] as const
export type ConversationStage = typeof CONVERSATION_STAGES[number]

export interface GraphContext {
    stage: ConversationStage
    previousStage: ConversationStage
    /** Guard that fired, or null when the stage stayed put */
    guard: string | null
    promptHint: string
}

// ─── Collaborator payloads ──────────────────────────────────────────────────

export interface HistoryMessage {
    role: 'user' | 'assistant'
    content: string
    metadata: Record<string, unknown>
}

export interface UserPatterns {
    totalSessions: number
    emotionalProgression: string[]
    conversationTopics: string[]
}

export interface RelationshipContext {
    connections: number
    relationshipStrength: number
}

export interface SimilarConversation {
    id: string
    similarity: number
    metadata: Record<string, unknown>
}

export interface SemanticContext {
    similarConversations: SimilarConversation[]
    contextStrength: number
}

export interface EnhancedContext {
    recentHistory: HistoryMessage[]
    userPatterns: UserPatterns
    semanticContext: SemanticContext
    relationshipContext: RelationshipContext
}

// ─── Adaptation ─────────────────────────────────────────────────────────────

export type AdaptationKind = 'style_alignment' | 'support_intensity' | 'goal_focus' | 'rapport_building'

export interface AdaptationRecord {
    id: string
    kind: AdaptationKind
    targetComponent: string
    hyperparameters: Record<string, string | number>
    effectivenessScore: number
    createdAt: string
}

// ─── Sessions ───────────────────────────────────────────────────────────────

export interface CompanionSession {
    sessionId: string
    userId: string
    stage: ConversationStage
    turnCount: number
    adaptations: AdaptationRecord[]
    /** Final confidence of the last committed turn */
    lastConfidence: number
    active: boolean
    createdAt: string
    updatedAt: string
}

// ─── Turn ───────────────────────────────────────────────────────────────────

export type PipelineStage =
    | 'analyze_input'
    | 'update_personality'
    | 'update_therapeutic'
    | 'determine_mode'
    | 'get_context'
    | 'generate_response'
    | 'apply_adaptation'
    | 'update_memory'

export interface TraitObservation {
    traits: Record<PersonalityTrait, number>
    styles: Record<CommunicationStyle, number>
}

export interface CrisisSignal {
    isCrisis: boolean
    riskLevel: number
}

export interface AssessmentObservation {
    mood: number
    anxiety: number
    crisis: CrisisSignal
    /** The crisis detector threw; `crisis` then reads as a crisis with risk 0 */
    crisisDetectorFailed: boolean
    copingStrategies: string[]
    stressIndicators: string[]
    therapeuticGoals: string[]
    protectiveFactors: string[]
}

export interface TurnSignals {
    traits: TraitObservation | null
    assessment: AssessmentObservation | null
    /** Which mode rule fired, for logging */
    modeRule: string | null
}

export interface TurnState {
    userId: string
    sessionId: string
    currentMessage: string
    conversationHistory: HistoryMessage[]
    personalityProfile: PersonalityProfile
    therapeuticAssessment: TherapeuticAssessment
    conversationMode: ConversationMode
    contextVectors: number[]
    memoryContext: EnhancedContext
    adaptations: AdaptationRecord[]
    graphContext: GraphContext | null
    response: string
    confidence: number

    /** Session stage before this turn */
    stage: ConversationStage
    /** Completed turns in the session before this one */
    turnCount: number
    signals: TurnSignals
    visited: PipelineStage[]
}

export interface TurnResult {
    ok: boolean
    response: string
    mode: ConversationMode
    stage: ConversationStage
    confidence: number
    riskLevel: number
    visited: PipelineStage[]
    /** False when the turn failed, was cancelled, or the session closed mid-turn */
    committed: boolean
}
