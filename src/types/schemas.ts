/**
 * Zod Validation Schemas
 *
 * Runtime validation for everything that crosses a process boundary:
 * HTTP request bodies, and profile / assessment / session state reloaded
 * from Postgres JSONB columns. Rows written by older builds may miss keys,
 * so collections default to empty rather than failing the turn.
 *
 * Usage:
 *   const result = PersonalityProfileSchema.safeParse(row.profile)
 *   if (!result.success) return createEmptyProfile()
 *   return result.data
 */

import { z } from 'zod'
import { COMMUNICATION_STYLES, CONVERSATION_STAGES, PERSONALITY_TRAITS } from './companion.js'

// ═══════════════════════════════════════════════════════════════════════════
// 1. PERSONALITY PROFILE
// ═══════════════════════════════════════════════════════════════════════════

const UnitScore = z.number().min(0).max(1)

export const PersonalityTraitSchema = z.enum(PERSONALITY_TRAITS)

export const CommunicationStyleSchema = z.enum(COMMUNICATION_STYLES)

export const PersonalityProfileSchema = z.object({
    traits: z.object({
        openness: UnitScore.optional(),
        conscientiousness: UnitScore.optional(),
        extraversion: UnitScore.optional(),
        agreeableness: UnitScore.optional(),
        neuroticism: UnitScore.optional(),
        empathy: UnitScore.optional(),
        optimism: UnitScore.optional(),
        emotional_stability: UnitScore.optional(),
    }).default({}),
    communicationStyle: z.object({
        formal: UnitScore.optional(),
        casual: UnitScore.optional(),
        emotional: UnitScore.optional(),
        analytical: UnitScore.optional(),
    }).default({}),
    confidenceScore: UnitScore.default(0),
    lastUpdated: z.string().datetime(),
})

// ═══════════════════════════════════════════════════════════════════════════
// 2. THERAPEUTIC ASSESSMENT
// ═══════════════════════════════════════════════════════════════════════════

const Scale = z.number().min(1).max(10)

export const TherapeuticAssessmentSchema = z.object({
    moodScore: Scale.default(5),
    anxietyLevel: Scale.default(5),
    riskFactors: z.array(z.string()).default([]),
    copingStrategies: z.array(z.string()).default([]),
    stressIndicators: z.array(z.string()).default([]),
    therapeuticGoals: z.array(z.string()).default([]),
    protectiveFactors: z.array(z.string()).default([]),
    progressMetrics: z.record(z.number()).default({}),
})

// ═══════════════════════════════════════════════════════════════════════════
// 3. SESSION STATE
// ═══════════════════════════════════════════════════════════════════════════

export const ConversationStageSchema = z.enum(CONVERSATION_STAGES)

export const AdaptationRecordSchema = z.object({
    id: z.string(),
    kind: z.enum(['style_alignment', 'support_intensity', 'goal_focus', 'rapport_building']),
    targetComponent: z.string(),
    hyperparameters: z.record(z.union([z.string(), z.number()])),
    effectivenessScore: UnitScore,
    createdAt: z.string(),
})

export const AdaptationListSchema = z.array(AdaptationRecordSchema).catch([])

// ═══════════════════════════════════════════════════════════════════════════
// 4. HTTP BODIES
// ═══════════════════════════════════════════════════════════════════════════

export const CreateSessionBodySchema = z.object({
    user_id: z.string().trim().min(1, 'user_id is required').max(128),
})

export const SendMessageBodySchema = z.object({
    message: z.string().trim().min(1, 'message is required').max(4000),
})

export type CreateSessionBody = z.infer<typeof CreateSessionBodySchema>
export type SendMessageBody = z.infer<typeof SendMessageBodySchema>

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Flatten zod issues into "path: message" strings for error payloads.
 */
export function describeIssues(error: z.ZodError): string[] {
    return error.issues.map(issue => {
        const path = issue.path.join('.')
        return path ? `${path}: ${issue.message}` : issue.message
    })
}
