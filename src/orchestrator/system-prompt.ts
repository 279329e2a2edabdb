/**
 * System Prompt Composition
 *
 * Rebuilt every turn from the working state:
 *   Layer 1 - Core identity
 *   Layer 2 - Adaptation parameters (session length, confidence, adaptations)
 *   Layer 3 - Stage guidance (prompt hint from the stage graph, if computed)
 *   Layer 4 - Memory context (cross-session patterns, relationship strength)
 *   Layer 5 - Mode block (crisis / therapeutic / companion / assessment / coaching)
 *   Layer 6 - Response guidelines
 *
 * Synchronous: all data is fetched before this is called.
 */

import { dominantStyle, dominantTrait } from '../analyzers/trait-estimator.js'
import type { ConversationMode, TurnState } from '../types/companion.js'

export type PromptState = Pick<
    TurnState,
    | 'conversationMode'
    | 'conversationHistory'
    | 'personalityProfile'
    | 'therapeuticAssessment'
    | 'contextVectors'
    | 'memoryContext'
    | 'adaptations'
    | 'graphContext'
>

const FLOW_FALLBACK = 'Continue the natural flow of conversation.'

const CORE_IDENTITY = `You are a self-adapting conversational companion focused on emotional support.
CORE IDENTITY:
- Warm, attentive and continuously learning about the person you talk to
- Trained in supportive listening; never a replacement for professional care
- Committed to the user's wellbeing and growth`

const RESPONSE_GUIDELINES = `RESPONSE GUIDELINES:
- Always put the user's safety and wellbeing first
- Match the user's communication style
- Use the conversation history to keep continuity
- Be honest, warm and concrete
- If unsure what the user needs, ask a clarifying question`

function formatScore(value: number): string {
    return value.toFixed(1)
}

function formatList(items: string[]): string {
    return items.length > 0 ? items.join('; ') : 'none noted'
}

function formatScores(scores: Partial<Record<string, number>>): string {
    const entries = Object.entries(scores)
        .filter((entry): entry is [string, number] => typeof entry[1] === 'number')
        .map(([key, value]) => `${key} ${value.toFixed(2)}`)
    return entries.length > 0 ? entries.join(', ') : 'not yet observed'
}

function modeBlock(mode: ConversationMode, state: PromptState): string {
    const { therapeuticAssessment: assessment, personalityProfile: profile } = state
    switch (mode) {
        case 'CRISIS':
            return `CRISIS MODE - PRIORITY: USER SAFETY
The user may be in severe distress or thinking about self-harm.
- Express immediate concern and care
- Validate their pain and offer hope
- Encourage reaching out to a crisis line, emergency services or someone they trust
- Stay calm, grounding and present
- Ask about their immediate safety and who is around them
- Keep the conversation going; do not end it abruptly`
        case 'THERAPEUTIC':
            return `THERAPEUTIC MODE - EMOTIONAL SUPPORT
USER ASSESSMENT:
- Mood: ${formatScore(assessment.moodScore)}/10
- Anxiety: ${formatScore(assessment.anxietyLevel)}/10
- Risk factors: ${formatList(assessment.riskFactors)}
- Coping strategies: ${formatList(assessment.copingStrategies)}
APPROACH:
- Draw on CBT, DBT and mindfulness techniques
- Validate feelings, then offer one practical coping step
- Ask thoughtful follow-up questions
- Build on the user's strengths`
        case 'ASSESSMENT':
            return `ASSESSMENT MODE - GETTING TO KNOW THE USER
- Learn how the user likes to communicate
- Notice what support they might need
- Build rapport before giving advice
- Be curious without being intrusive`
        case 'COACHING':
            return `COACHING MODE - GOAL-ORIENTED SUPPORT
- Help the user name and clarify the goal
- Break it into small, concrete steps
- Encourage and hold them accountable
- Celebrate progress and treat setbacks as learning`
        case 'COMPANION':
            return `COMPANION MODE - SUPPORTIVE FRIENDSHIP
USER PROFILE:
- Traits: ${formatScores(profile.traits)}
- Communication style: ${formatScores(profile.communicationStyle)}
- Profile confidence: ${profile.confidenceScore.toFixed(2)}
APPROACH:
- Be warm, engaged and genuinely interested
- Refer back to earlier conversations when it helps
- Offer encouragement and a positive perspective`
    }
}

function adaptationLayer(state: PromptState): string {
    const profile = state.personalityProfile
    const style = dominantStyle(profile)
    const trait = dominantTrait(profile)
    const lines = [
        'CURRENT ADAPTATION PARAMETERS:',
        `- Session length: ${state.conversationHistory.length} messages`,
        `- Profile confidence: ${profile.confidenceScore.toFixed(2)}`,
        `- Semantic context available: ${state.contextVectors.length > 0 ? 'yes' : 'no'}`,
        `- Previous adaptations: ${state.adaptations.length}`,
    ]
    if (style) lines.push(`- Preferred style: ${style}`)
    if (trait) lines.push(`- Most expressed trait: ${trait}`)
    return lines.join('\n')
}

function memoryLayer(state: PromptState): string {
    const { userPatterns, relationshipContext, semanticContext } = state.memoryContext
    const lines = [
        'MEMORY CONTEXT:',
        `- Sessions together: ${userPatterns.totalSessions}`,
        `- Relationship strength: ${relationshipContext.relationshipStrength.toFixed(2)}`,
    ]
    if (userPatterns.emotionalProgression.length > 0) {
        lines.push(`- Recent emotional trend: ${userPatterns.emotionalProgression.slice(-5).join(' → ')}`)
    }
    if (userPatterns.conversationTopics.length > 0) {
        lines.push(`- Recurring topics: ${userPatterns.conversationTopics.slice(0, 5).join(', ')}`)
    }
    if (semanticContext.similarConversations.length > 0) {
        lines.push(`- Related past conversations: ${semanticContext.similarConversations.length}`)
    }
    return lines.join('\n')
}

export function composeSystemPrompt(state: PromptState): string {
    const sections: string[] = []

    sections.push(CORE_IDENTITY)
    sections.push(adaptationLayer(state))
    sections.push(`CONVERSATION FLOW GUIDANCE:\n${state.graphContext?.promptHint ?? FLOW_FALLBACK}`)
    sections.push(memoryLayer(state))
    sections.push(modeBlock(state.conversationMode, state))
    sections.push(RESPONSE_GUIDELINES)

    return sections.join('\n\n')
}
