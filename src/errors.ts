/**
 * Error kinds for the companion core.
 *
 *   ValidationError          bad input, rejected before a turn starts
 *   CollaboratorUnavailable  memory / embedding / generation call failed or timed out
 *   SessionUnavailable       unknown or closed session
 *   PipelineFailure          a pipeline stage threw; the caller gets the fixed apology
 */

export type CompanionErrorCode =
    | 'VALIDATION_ERROR'
    | 'COLLABORATOR_UNAVAILABLE'
    | 'SESSION_UNAVAILABLE'
    | 'PIPELINE_FAILURE'

export abstract class CompanionError extends Error {
    abstract readonly code: CompanionErrorCode

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = new.target.name
    }
}

export class ValidationError extends CompanionError {
    readonly code = 'VALIDATION_ERROR' as const

    constructor(message: string, readonly issues: string[] = []) {
        super(message)
    }
}

export type CollaboratorName = 'memory' | 'embedding' | 'generation' | 'profiles' | 'sessions'

export class CollaboratorUnavailable extends CompanionError {
    readonly code = 'COLLABORATOR_UNAVAILABLE' as const

    constructor(readonly collaborator: CollaboratorName, message: string, options?: { cause?: unknown }) {
        super(`${collaborator}: ${message}`, options)
    }
}

export class SessionUnavailable extends CompanionError {
    readonly code = 'SESSION_UNAVAILABLE' as const

    constructor(readonly sessionId: string, readonly reason: 'not_found' | 'closed') {
        super(reason === 'closed' ? `Session ${sessionId} is closed` : `Session ${sessionId} not found`)
    }
}

export class PipelineFailure extends CompanionError {
    readonly code = 'PIPELINE_FAILURE' as const

    constructor(readonly stage: string, options?: { cause?: unknown }) {
        super(`Pipeline stage "${stage}" failed`, options)
    }
}

export function isCompanionError(err: unknown): err is CompanionError {
    return err instanceof CompanionError
}
