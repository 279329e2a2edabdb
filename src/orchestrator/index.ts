export {
    APOLOGY_RESPONSE,
    FALLBACK_CONFIDENCE,
    FALLBACK_RESPONSE,
    GENERATED_CONFIDENCE,
    TurnOrchestrator,
    type TurnOrchestratorDeps,
    type TurnRequest,
} from './turn-orchestrator.js'
export { ProfileStore, type ProfileSnapshot, type ProfileMutation } from './profile-store.js'
export { KeyedMutex } from './keyed-mutex.js'
export { composeSystemPrompt, type PromptState } from './system-prompt.js'
export { MAX_STORED_ADAPTATIONS, adaptationKind, appendAdaptation, boostConfidence, createAdaptation } from './adaptation.js'
