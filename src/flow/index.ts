export { ConversationStateMachine, type Transition } from './state-machine.js'
export { GUARDS, isDistressed, isGuardId, type Guard, type GuardId, type GuardView } from './guards.js'
export { INITIAL_STAGE, STAGE_EDGES, type StageEdge } from './stages.js'
export { DEFAULT_PROMPT_HINT, THERAPEUTIC_PROMPTS, stagePrompt, therapeuticPrompt } from './prompts.js'
