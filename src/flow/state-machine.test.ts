import { describe, it, expect } from 'vitest'
import { ConversationStateMachine } from './state-machine.js'
import { GUARDS, isGuardId, type GuardView } from './guards.js'
import { THERAPEUTIC_PROMPTS, stagePrompt } from './prompts.js'
import { STAGE_EDGES, type StageEdge } from './stages.js'
import { createEmptyAssessment } from '../analyzers/assessment-estimator.js'
import { createEmptyProfile } from '../analyzers/trait-estimator.js'
import { CONVERSATION_STAGES, type AssessmentObservation, type TherapeuticAssessment } from '../types/companion.js'

function crisisObservation(isCrisis: boolean): AssessmentObservation {
    return {
        mood: 5,
        anxiety: 3,
        crisis: { isCrisis, riskLevel: isCrisis ? 2 : 0 },
        crisisDetectorFailed: false,
        copingStrategies: [],
        stressIndicators: [],
        therapeuticGoals: [],
        protectiveFactors: [],
    }
}

function view(overrides: {
    assessment?: Partial<TherapeuticAssessment>
    confidenceScore?: number
    crisisThisTurn?: boolean
} & Partial<Omit<GuardView, 'therapeuticAssessment' | 'personalityProfile'>> = {}): GuardView {
    const { assessment, confidenceScore, crisisThisTurn, ...rest } = overrides
    return {
        conversationHistory: [{ role: 'user', content: 'earlier', metadata: {} }],
        personalityProfile: { ...createEmptyProfile(), confidenceScore: confidenceScore ?? 0 },
        therapeuticAssessment: { ...createEmptyAssessment(), ...assessment },
        conversationMode: 'COMPANION',
        currentMessage: 'hello there',
        turnCount: 1,
        confidence: 0,
        signals: {
            traits: null,
            assessment: crisisThisTurn === undefined ? null : crisisObservation(crisisThisTurn),
            modeRule: null,
        },
        ...rest,
    }
}

const machine = new ConversationStateMachine()

describe('ConversationStateMachine.transition', () => {
    it('leaves initial on the first message only', () => {
        expect(machine.transition('initial', view({ conversationHistory: [] })))
            .toEqual({ stage: 'greeting', guard: 'first_message' })
        expect(machine.transition('initial', view())).toEqual({ stage: 'initial', guard: null })
    })

    it('routes greeting by profile confidence', () => {
        expect(machine.nextStage('greeting', view({ confidenceScore: 0.1 }))).toBe('personality_assessment')
        expect(machine.nextStage('greeting', view({ confidenceScore: 0.3 }))).toBe('mood_check')
    })

    it('moves a calm user from mood_check to companion_mode', () => {
        expect(machine.transition('mood_check', view({ assessment: { moodScore: 8, anxietyLevel: 2 } })))
            .toEqual({ stage: 'companion_mode', guard: 'neutral_mood' })
    })

    it('moves a distressed user from mood_check to therapeutic_mode', () => {
        expect(machine.nextStage('mood_check', view({ assessment: { moodScore: 3, anxietyLevel: 2 } })))
            .toBe('therapeutic_mode')
        expect(machine.nextStage('mood_check', view({ assessment: { moodScore: 6, anxietyLevel: 8 } })))
            .toBe('therapeutic_mode')
    })

    it('takes the first matching edge in declaration order', () => {
        // neutral_mood is declared before crisis_detected
        const state = view({ conversationMode: 'CRISIS', assessment: { moodScore: 5, anxietyLevel: 5 } })
        expect(machine.transition('mood_check', state)).toEqual({ stage: 'companion_mode', guard: 'neutral_mood' })

        // progress_made is declared before crisis_escalation
        const recovering = view({ crisisThisTurn: true, assessment: { moodScore: 7 } })
        expect(machine.nextStage('therapeutic_mode', recovering)).toBe('coaching_mode')
    })

    it('escalates therapeutic_mode on a crisis phrase this turn', () => {
        const state = view({ crisisThisTurn: true, assessment: { moodScore: 4 } })
        expect(machine.transition('therapeutic_mode', state))
            .toEqual({ stage: 'crisis_intervention', guard: 'crisis_escalation' })
    })

    it('resolves a crisis once mood recovers without a new crisis phrase', () => {
        expect(machine.nextStage('crisis_intervention', view({ crisisThisTurn: false, assessment: { moodScore: 5.5 } })))
            .toBe('therapeutic_mode')
        expect(machine.nextStage('crisis_intervention', view({ crisisThisTurn: true, assessment: { moodScore: 5.5 } })))
            .toBe('crisis_intervention')
    })

    it('ends long therapeutic sessions in follow_up', () => {
        expect(machine.nextStage('therapeutic_mode', view({ turnCount: 21, assessment: { moodScore: 5 } })))
            .toBe('follow_up')
        expect(machine.nextStage('therapeutic_mode', view({ turnCount: 20, assessment: { moodScore: 5 } })))
            .toBe('therapeutic_mode')
    })

    it('closes companion_mode on goodbye and coaching_mode on high confidence', () => {
        expect(machine.nextStage('companion_mode', view({ currentMessage: 'OK, Goodbye!' }))).toBe('closure')
        expect(machine.nextStage('coaching_mode', view({ confidence: 0.85 }))).toBe('closure')
        expect(machine.nextStage('coaching_mode', view({ confidence: 0.8 }))).toBe('coaching_mode')
    })

    it('self-loops on terminal stages', () => {
        expect(machine.transition('closure', view())).toEqual({ stage: 'closure', guard: null })
        expect(machine.transition('follow_up', view())).toEqual({ stage: 'follow_up', guard: null })
        expect(machine.successors('closure')).toEqual([])
    })
})

describe('ConversationStateMachine.advance', () => {
    it('returns the landed stage with its hint', () => {
        const context = machine.advance('mood_check', view({ assessment: { moodScore: 2, anxietyLevel: 4 } }))
        expect(context).toEqual({
            stage: 'therapeutic_mode',
            previousStage: 'mood_check',
            guard: 'distress_detected',
            promptHint: THERAPEUTIC_PROMPTS.depression,
        })
    })
})

describe('therapeutic hint tree', () => {
    it('picks depression, anxiety, low mood, then supportive', () => {
        expect(stagePrompt('therapeutic_mode', { moodScore: 2.5, anxietyLevel: 9 })).toBe(THERAPEUTIC_PROMPTS.depression)
        expect(stagePrompt('therapeutic_mode', { moodScore: 4, anxietyLevel: 9 })).toBe(THERAPEUTIC_PROMPTS.anxiety)
        expect(stagePrompt('therapeutic_mode', { moodScore: 4, anxietyLevel: 5 })).toBe(THERAPEUTIC_PROMPTS.lowMood)
        expect(stagePrompt('therapeutic_mode', { moodScore: 6, anxietyLevel: 5 })).toBe(THERAPEUTIC_PROMPTS.supportive)
    })

    it('has a hint for every stage', () => {
        for (const stage of CONVERSATION_STAGES) {
            expect(stagePrompt(stage, createEmptyAssessment()).length).toBeGreaterThan(0)
        }
    })
})

describe('graph validation', () => {
    it('only references registered guards', () => {
        for (const edge of STAGE_EDGES) expect(isGuardId(edge.guard)).toBe(true)
        expect(Object.keys(GUARDS)).toHaveLength(16)
    })

    it('rejects edges with an unknown guard or stage', () => {
        const badGuard: StageEdge[] = JSON.parse('[{"from":"initial","to":"greeting","guard":"never_defined"}]')
        const badStage: StageEdge[] = JSON.parse('[{"from":"limbo","to":"greeting","guard":"first_message"}]')
        expect(() => new ConversationStateMachine(badGuard)).toThrow('Unknown guard "never_defined"')
        expect(() => new ConversationStateMachine(badStage)).toThrow('Unknown stage in edge limbo -> greeting')
    })
})
