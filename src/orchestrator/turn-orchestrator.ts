/**
 * Turn Orchestrator: runs one user message through the companion pipeline.
 *
 *   analyze_input → update_personality → update_therapeutic → determine_mode
 *     → (CRISIS ? generate_response : get_context → generate_response)
 *     → apply_adaptation → update_memory
 *
 * Every stage works on a per-turn working copy of the user's profile and
 * assessment. Nothing shared changes until update_memory, which re-applies
 * this turn's observations to the latest snapshot under the user's lock.
 * A cancelled turn, or one whose session was closed meanwhile, commits
 * nothing.
 *
 * Collaborator failures degrade (empty context, fallback reply). Context
 * reads and generation run under time limits; a timed-out generation call is
 * aborted. A crisis detector that throws routes the turn to CRISIS. Any other
 * stage that throws ends the turn with the fixed apology.
 */

import { AssessmentEstimator } from '../analyzers/assessment-estimator.js'
import { TraitEstimator } from '../analyzers/trait-estimator.js'
import {
    emptyEnhancedContext,
    nullEmbeddings,
    nullMemory,
    type EmbeddingService,
    type GenerationService,
    type MemoryContextService,
    type SessionStore,
} from '../collaborators.js'
import { CollaboratorUnavailable, PipelineFailure, SessionUnavailable, ValidationError } from '../errors.js'
import { ConversationStateMachine } from '../flow/index.js'
import { failClosed, selectMode } from '../mode/mode-selector.js'
import { errorMessage, safeError } from '../utils/safe-log.js'
import { withTimeout } from '../utils/timeout.js'
import { appendAdaptation, boostConfidence, createAdaptation } from './adaptation.js'
import { KeyedMutex } from './keyed-mutex.js'
import { ProfileStore } from './profile-store.js'
import { composeSystemPrompt } from './system-prompt.js'
import type {
    AdaptationRecord,
    HistoryMessage,
    PipelineStage,
    TurnResult,
    TurnState,
} from '../types/companion.js'

export const FALLBACK_RESPONSE = "I'm here to help you. Could you tell me more about what's on your mind?"
export const APOLOGY_RESPONSE = 'I apologize, but I encountered an issue processing your message. Please try again.'

export const GENERATED_CONFIDENCE = 0.8
export const FALLBACK_CONFIDENCE = 0.3

const DEFAULT_GENERATION_TIMEOUT_MS = 20_000
const DEFAULT_CONTEXT_TIMEOUT_MS = 3000
const DEFAULT_HISTORY_LIMIT = 10
const PROMPT_HISTORY_WINDOW = 6

export interface TurnOrchestratorDeps {
    sessions: SessionStore
    profiles?: ProfileStore
    memory?: MemoryContextService
    embeddings?: EmbeddingService
    /** null runs every turn on the fallback reply */
    generator?: GenerationService | null
    traits?: TraitEstimator
    assessments?: AssessmentEstimator
    stateMachine?: ConversationStateMachine
    generationTimeoutMs?: number
    /** Limit on each history / embedding / memory read in analyze_input */
    contextTimeoutMs?: number
    historyLimit?: number
    clock?: () => Date
}

export interface TurnRequest {
    sessionId: string
    message: string
    signal?: AbortSignal
}

interface TurnRun {
    state: TurnState
    signal: AbortSignal | undefined
    adaptation: AdaptationRecord | null
    riskLevel: number
}

export class TurnOrchestrator {
    private readonly sessions: SessionStore
    private readonly profiles: ProfileStore
    private readonly memory: MemoryContextService
    private readonly embeddings: EmbeddingService
    private readonly generator: GenerationService | null
    private readonly traits: TraitEstimator
    private readonly assessments: AssessmentEstimator
    private readonly stateMachine: ConversationStateMachine
    private readonly generationTimeoutMs: number
    private readonly contextTimeoutMs: number
    private readonly historyLimit: number
    private readonly clock: () => Date
    private readonly sessionLocks = new KeyedMutex()

    constructor(deps: TurnOrchestratorDeps) {
        this.sessions = deps.sessions
        this.clock = deps.clock ?? (() => new Date())
        this.profiles = deps.profiles ?? new ProfileStore(null, this.clock)
        this.memory = deps.memory ?? nullMemory
        this.embeddings = deps.embeddings ?? nullEmbeddings
        this.generator = deps.generator ?? null
        this.traits = deps.traits ?? new TraitEstimator({ clock: this.clock })
        this.assessments = deps.assessments ?? new AssessmentEstimator()
        this.stateMachine = deps.stateMachine ?? new ConversationStateMachine()
        this.generationTimeoutMs = deps.generationTimeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS
        this.contextTimeoutMs = deps.contextTimeoutMs ?? DEFAULT_CONTEXT_TIMEOUT_MS
        this.historyLimit = deps.historyLimit ?? DEFAULT_HISTORY_LIMIT
    }

    /**
     * Process one message. Throws only for bad input or an unusable session;
     * pipeline failures come back as `ok: false` with the apology text.
     */
    async handleTurn(request: TurnRequest): Promise<TurnResult> {
        const message = request.message.trim()
        if (!request.sessionId.trim()) throw new ValidationError('sessionId is required')
        if (!message) throw new ValidationError('message must not be empty')

        const session = await this.sessions.get(request.sessionId)
        if (!session) throw new SessionUnavailable(request.sessionId, 'not_found')
        if (!session.active) throw new SessionUnavailable(request.sessionId, 'closed')

        const snapshot = await this.profiles.snapshot(session.userId)
        const run: TurnRun = {
            state: {
                userId: session.userId,
                sessionId: session.sessionId,
                currentMessage: message,
                conversationHistory: [],
                personalityProfile: snapshot.profile,
                therapeuticAssessment: snapshot.assessment,
                conversationMode: 'COMPANION',
                contextVectors: [],
                memoryContext: emptyEnhancedContext(),
                adaptations: [...session.adaptations],
                graphContext: null,
                response: '',
                confidence: session.lastConfidence,
                stage: session.stage,
                turnCount: session.turnCount,
                signals: { traits: null, assessment: null, modeRule: null },
                visited: [],
            },
            signal: request.signal,
            adaptation: null,
            riskLevel: 0,
        }

        try {
            await this.step(run, 'analyze_input', () => this.analyzeInput(run))
            await this.step(run, 'update_personality', () => this.updatePersonality(run))
            await this.step(run, 'update_therapeutic', () => this.updateTherapeutic(run))
            await this.step(run, 'determine_mode', () => this.determineMode(run))
            if (run.state.conversationMode !== 'CRISIS') {
                await this.step(run, 'get_context', () => this.getContext(run))
            }
            await this.step(run, 'generate_response', () => this.generateResponse(run))
            await this.step(run, 'apply_adaptation', () => this.applyAdaptation(run))
            const committed = await this.step(run, 'update_memory', () => this.updateMemory(run))
            return this.result(run, true, committed)
        } catch (err) {
            const failure = err instanceof PipelineFailure ? err : new PipelineFailure('unknown', { cause: err })
            console.error(
                `[orchestrator] session=${session.sessionId} stage=${failure.stage} failed:`,
                safeError(failure.cause ?? failure)
            )
            run.state.response = APOLOGY_RESPONSE
            run.state.confidence = 0
            return this.result(run, false, false)
        }
    }

    // ─── Stages ─────────────────────────────────────────────────────────────

    private async step<T>(run: TurnRun, stage: PipelineStage, fn: () => Promise<T> | T): Promise<T> {
        run.state.visited.push(stage)
        try {
            return await fn()
        } catch (err) {
            throw new PipelineFailure(stage, { cause: err })
        }
    }

    private async analyzeInput(run: TurnRun): Promise<void> {
        const { state } = run
        const [history, vectors, context] = await Promise.all([
            this.read(
                'history',
                this.memory.getConversationHistory(state.sessionId, this.historyLimit),
                (): HistoryMessage[] => [],
            ),
            this.read('embedding', this.embeddings.encode(state.currentMessage), (): number[] => []),
            this.read(
                'memory context',
                this.memory.getEnhancedContext(state.sessionId, state.userId, state.currentMessage),
                emptyEnhancedContext,
            ),
        ])
        state.conversationHistory = history
        state.contextVectors = vectors
        state.memoryContext = context
    }

    /** A failed or slow context read yields its empty value; the turn goes on. */
    private async read<T>(label: string, pending: Promise<T>, empty: () => T): Promise<T> {
        try {
            return await withTimeout(pending, this.contextTimeoutMs, label)
        } catch (err) {
            console.warn(`[orchestrator] ${label} unavailable:`, errorMessage(err))
            return empty()
        }
    }

    private updatePersonality(run: TurnRun): void {
        const { state } = run
        const observation = this.traits.observe(state.currentMessage)
        state.signals.traits = observation
        state.personalityProfile = this.traits.apply(state.personalityProfile, observation, this.clock())
    }

    private updateTherapeutic(run: TurnRun): void {
        const { state } = run
        const observation = this.assessments.observe(state.currentMessage)
        state.signals.assessment = observation
        state.therapeuticAssessment = this.assessments.apply(state.therapeuticAssessment, observation)
    }

    private determineMode(run: TurnRun): void {
        const { state } = run
        const observed = state.signals.assessment
        const decision = observed?.crisisDetectorFailed
            ? failClosed()
            : selectMode(
                {
                    message: state.currentMessage,
                    profile: state.personalityProfile,
                    assessment: state.therapeuticAssessment,
                },
                observed ? () => observed.crisis : text => this.assessments.detectCrisis(text),
            )
        state.conversationMode = decision.mode
        state.signals.modeRule = decision.rule
        run.riskLevel = decision.crisis.riskLevel
    }

    private getContext(run: TurnRun): void {
        const { state } = run
        state.graphContext = this.stateMachine.advance(state.stage, state)
    }

    private async generateResponse(run: TurnRun): Promise<void> {
        const { state } = run
        const systemPrompt = composeSystemPrompt(state)
        const history: HistoryMessage[] = [
            ...state.conversationHistory.slice(-PROMPT_HISTORY_WINDOW),
            { role: 'user', content: state.currentMessage, metadata: {} },
        ]

        try {
            if (!this.generator) {
                throw new CollaboratorUnavailable('generation', 'no provider configured')
            }
            const generator = this.generator
            const text = await withTimeout(
                signal => generator.generate(systemPrompt, history, signal),
                this.generationTimeoutMs,
                'generation',
                run.signal,
            )
            if (!text.trim()) {
                throw new CollaboratorUnavailable('generation', 'empty completion')
            }
            state.response = text.trim()
            state.confidence = GENERATED_CONFIDENCE
        } catch (err) {
            console.warn('[orchestrator] Generation failed, using fallback reply:', errorMessage(err))
            state.response = FALLBACK_RESPONSE
            state.confidence = FALLBACK_CONFIDENCE
        }
    }

    private applyAdaptation(run: TurnRun): void {
        const { state } = run
        if (state.conversationHistory.length === 0) return

        const record = createAdaptation(
            {
                mode: state.conversationMode,
                stage: state.graphContext?.stage ?? state.stage,
                profile: state.personalityProfile,
            },
            this.clock(),
        )
        run.adaptation = record
        state.adaptations = appendAdaptation(state.adaptations, record)
        state.confidence = boostConfidence(state.confidence, record)
    }

    /** Returns whether anything was committed. */
    private async updateMemory(run: TurnRun): Promise<boolean> {
        const { state } = run
        if (run.signal?.aborted) {
            console.log(`[orchestrator] session=${state.sessionId} turn cancelled, discarding`)
            return false
        }

        const stage = state.graphContext?.stage ?? state.stage
        const progressed = await this.sessionLocks.runExclusive(state.sessionId, async () => {
            const latest = await this.sessions.get(state.sessionId)
            if (!latest?.active || run.signal?.aborted) return false
            await this.sessions.saveProgress(state.sessionId, {
                stage,
                turnCount: latest.turnCount + 1,
                adaptations: run.adaptation
                    ? appendAdaptation(latest.adaptations, run.adaptation)
                    : latest.adaptations,
                lastConfidence: state.confidence,
            })
            return true
        })
        if (!progressed) {
            console.log(`[orchestrator] session=${state.sessionId} closed or cancelled mid-turn, discarding`)
            return false
        }

        const traitObservation = state.signals.traits
        const assessmentObservation = state.signals.assessment
        const now = this.clock()
        const committed = await this.profiles.commit(state.userId, current => ({
            profile: traitObservation
                ? this.traits.apply(current.profile, traitObservation, now)
                : current.profile,
            assessment: assessmentObservation
                ? this.assessments.apply(current.assessment, assessmentObservation)
                : current.assessment,
        }))
        state.personalityProfile = committed.profile
        state.therapeuticAssessment = committed.assessment

        await Promise.all([
            this.memory
                .addConversation(state.sessionId, state.currentMessage, state.response, {
                    conversationMode: state.conversationMode,
                    confidence: state.confidence,
                    personalityConfidence: committed.profile.confidenceScore,
                    moodScore: committed.assessment.moodScore,
                    anxietyLevel: committed.assessment.anxietyLevel,
                    stage,
                })
                .catch(err => console.warn('[orchestrator] addConversation failed:', errorMessage(err))),
            this.embeddings
                .storeConversation(state.userId, `User: ${state.currentMessage}\nCompanion: ${state.response}`, {
                    conversationMode: state.conversationMode,
                    sessionId: state.sessionId,
                    timestamp: now.toISOString(),
                })
                .catch(err => console.warn('[orchestrator] storeConversation failed:', errorMessage(err))),
            this.embeddings
                .storePersonality(state.userId, committed.profile)
                .catch(err => console.warn('[orchestrator] storePersonality failed:', errorMessage(err))),
        ])
        return true
    }

    // ─── Result ─────────────────────────────────────────────────────────────

    private result(run: TurnRun, ok: boolean, committed: boolean): TurnResult {
        const { state } = run
        const stage = ok ? state.graphContext?.stage ?? state.stage : state.stage
        console.log(
            `[orchestrator] session=${state.sessionId} user=${state.userId} ok=${ok} mode=${state.conversationMode}` +
            ` rule=${state.signals.modeRule ?? '-'} stage=${state.stage}->${stage}` +
            ` confidence=${state.confidence.toFixed(2)} risk=${run.riskLevel} committed=${committed}`
        )
        return {
            ok,
            response: state.response,
            mode: state.conversationMode,
            stage,
            confidence: state.confidence,
            riskLevel: run.riskLevel,
            visited: [...state.visited],
            committed,
        }
    }
}
