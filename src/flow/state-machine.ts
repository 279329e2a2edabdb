/**
 * Conversation Stage Machine
 *
 * Directed graph over the eleven conversation stages. Every edge carries one
 * guard; outgoing edges are tried in declaration order and the first guard
 * that holds decides the next stage. No match means the stage stays put, so
 * closure and follow_up simply self-loop.
 *
 * The graph is validated once at construction and is immutable afterwards.
 */

import { CONVERSATION_STAGES, type ConversationStage, type GraphContext } from '../types/companion.js'
import { GUARDS, isGuardId, type Guard, type GuardId, type GuardView } from './guards.js'
import { stagePrompt } from './prompts.js'
import { INITIAL_STAGE, STAGE_EDGES, type StageEdge } from './stages.js'

interface CompiledEdge {
    to: ConversationStage
    guardId: GuardId
    guard: Guard
}

export interface Transition {
    stage: ConversationStage
    guard: GuardId | null
}

export class ConversationStateMachine {
    readonly initialStage: ConversationStage = INITIAL_STAGE
    private readonly outgoing = new Map<ConversationStage, CompiledEdge[]>()

    constructor(
        edges: readonly StageEdge[] = STAGE_EDGES,
        guards: Readonly<Record<GuardId, Guard>> = GUARDS,
    ) {
        const known = new Set<string>(CONVERSATION_STAGES)
        for (const stage of CONVERSATION_STAGES) this.outgoing.set(stage, [])

        for (const edge of edges) {
            if (!known.has(edge.from) || !known.has(edge.to)) {
                throw new Error(`Unknown stage in edge ${edge.from} -> ${edge.to}`)
            }
            if (!isGuardId(edge.guard)) {
                throw new Error(`Unknown guard "${edge.guard}" on edge ${edge.from} -> ${edge.to}`)
            }
            this.outgoing.get(edge.from)?.push({ to: edge.to, guardId: edge.guard, guard: guards[edge.guard] })
        }
    }

    successors(stage: ConversationStage): ConversationStage[] {
        return (this.outgoing.get(stage) ?? []).map(edge => edge.to)
    }

    transition(current: ConversationStage, state: GuardView): Transition {
        for (const edge of this.outgoing.get(current) ?? []) {
            if (edge.guard(state)) return { stage: edge.to, guard: edge.guardId }
        }
        return { stage: current, guard: null }
    }

    nextStage(current: ConversationStage, state: GuardView): ConversationStage {
        return this.transition(current, state).stage
    }

    promptHint(stage: ConversationStage, state: Pick<GuardView, 'therapeuticAssessment'>): string {
        return stagePrompt(stage, state.therapeuticAssessment)
    }

    /** Transition plus the hint for the stage landed on */
    advance(current: ConversationStage, state: GuardView): GraphContext {
        const { stage, guard } = this.transition(current, state)
        return {
            stage,
            previousStage: current,
            guard,
            promptHint: this.promptHint(stage, state),
        }
    }
}
