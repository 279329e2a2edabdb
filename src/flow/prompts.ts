/**
 * Stage prompt hints: the conversational nudge handed to the system prompt
 * for the stage the session is in.
 */

import type { ConversationStage, TherapeuticAssessment } from '../types/companion.js'

export const DEFAULT_PROMPT_HINT = 'How can I help you today?'

const STAGE_PROMPTS: Readonly<Record<Exclude<ConversationStage, 'therapeutic_mode'>, string>> = Object.freeze({
    initial: "Welcome! I'm your companion. How are you feeling today?",
    greeting: "Hello! It's nice to meet you. I'm here to provide support and companionship.",
    personality_assessment: "I'd like to get to know you better. What kind of things do you enjoy talking about?",
    mood_check: "How has your day been so far? I'm here to listen.",
    crisis_intervention: "I can hear that you're going through a really difficult time right now. Your safety and wellbeing are important to me. Can you tell me more about how you're feeling?",
    companion_mode: "I'm glad we can chat together. What's on your mind today?",
    coaching_mode: "Let's work together on your goals. What would you like to focus on?",
    assessment_mode: "I'd like to understand better how you've been feeling lately. Can you share more about your experiences?",
    closure: "Thank you for sharing with me today. Remember, I'm always here when you need support.",
    follow_up: 'How are you feeling after our conversation? Is there anything else I can help you with?',
})

export const THERAPEUTIC_PROMPTS = Object.freeze({
    depression: "I can sense you're going through a really tough time. Depression can feel overwhelming, but you don't have to face this alone. What's been weighing on you most heavily?",
    anxiety: "It sounds like you're experiencing a lot of anxiety right now. Let's try to work through this together. Can you tell me what's making you feel most anxious?",
    lowMood: "I notice you might be feeling down today. It's okay to have difficult days. What's been on your mind?",
    supportive: "I'm here to support you. What would be most helpful for you right now?",
})

/**
 * Therapeutic hint tree: mood < 3 → depression, anxiety > 8 → anxiety,
 * mood < 5 → low mood, otherwise supportive.
 */
export function therapeuticPrompt(assessment: Pick<TherapeuticAssessment, 'moodScore' | 'anxietyLevel'>): string {
    if (assessment.moodScore < 3.0) return THERAPEUTIC_PROMPTS.depression
    if (assessment.anxietyLevel > 8.0) return THERAPEUTIC_PROMPTS.anxiety
    if (assessment.moodScore < 5.0) return THERAPEUTIC_PROMPTS.lowMood
    return THERAPEUTIC_PROMPTS.supportive
}

export function stagePrompt(
    stage: ConversationStage,
    assessment: Pick<TherapeuticAssessment, 'moodScore' | 'anxietyLevel'>,
): string {
    if (stage === 'therapeutic_mode') return therapeuticPrompt(assessment)
    return STAGE_PROMPTS[stage] ?? DEFAULT_PROMPT_HINT
}
