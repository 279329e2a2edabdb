/**
 * HTTP boundary
 *
 *   POST   /sessions               { user_id }   → 201 { session_id, created_at }
 *   POST   /sessions/:id/messages  { message }   → 200 { message, timestamp, ... }
 *   DELETE /sessions/:id                         → 204
 *   GET    /health
 *
 * Session routes need `Authorization: Bearer <token>`. With no tokens
 * configured any non-empty bearer token is accepted.
 */

import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify'
import cors from '@fastify/cors'
import { createHash, timingSafeEqual } from 'node:crypto'
import {
    CollaboratorUnavailable,
    SessionUnavailable,
    ValidationError,
    isCompanionError,
} from './errors.js'
import { CreateSessionBodySchema, SendMessageBodySchema, describeIssues } from './types/schemas.js'
import { safeError } from './utils/safe-log.js'
import type { SessionStore } from './collaborators.js'
import type { TurnOrchestrator } from './orchestrator/turn-orchestrator.js'

export interface ServerDeps {
    orchestrator: TurnOrchestrator
    sessions: SessionStore
    apiTokens: string[]
    logger?: boolean
    /** Extra fields for GET /health */
    health?: () => Record<string, unknown>
}

interface SessionParams {
    id: string
}

function digest(value: string): Buffer {
    return createHash('sha256').update(value).digest()
}

function bearerToken(request: FastifyRequest): string | null {
    const header = request.headers.authorization
    if (!header) return null
    const match = /^Bearer\s+(.+)$/i.exec(header.trim())
    return match ? match[1].trim() : null
}

export function isAuthorized(token: string | null, allowed: string[]): boolean {
    if (!token) return false
    if (allowed.length === 0) return true
    const actual = digest(token)
    return allowed.some(candidate => timingSafeEqual(digest(candidate), actual))
}

function statusFor(error: unknown): number {
    if (error instanceof ValidationError) return 400
    if (error instanceof SessionUnavailable) return error.reason === 'closed' ? 409 : 404
    if (error instanceof CollaboratorUnavailable) return 503
    return 500
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
    const server = Fastify({ logger: deps.logger ?? true })
    await server.register(cors)

    server.setErrorHandler((error, request, reply) => {
        if (isCompanionError(error)) {
            const status = statusFor(error)
            if (status >= 500) request.log.error({ err: safeError(error) }, 'request failed')
            const issues = error instanceof ValidationError && error.issues.length > 0 ? { issues: error.issues } : {}
            return reply.code(status).send({ error: error.code, message: error.message, ...issues })
        }
        // fastify's own errors (malformed JSON, oversized body) carry a 4xx status
        const status = typeof error.statusCode === 'number' && error.statusCode < 500 ? error.statusCode : 500
        if (status >= 500) request.log.error({ err: safeError(error) }, 'unhandled error')
        return reply.code(status).send({
            error: status === 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST',
            message: status === 500 ? 'Internal server error' : error.message,
        })
    })

    const requireAuth = async (request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> => {
        if (!isAuthorized(bearerToken(request), deps.apiTokens)) {
            return reply.code(401).send({ error: 'UNAUTHORIZED', message: 'Missing or invalid bearer token' })
        }
        return undefined
    }

    server.get('/health', async () => ({
        status: 'ok',
        ...(deps.health ? deps.health() : {}),
    }))

    server.post('/sessions', { preHandler: requireAuth }, async (request, reply) => {
        const parsed = CreateSessionBodySchema.safeParse(request.body ?? {})
        if (!parsed.success) {
            throw new ValidationError('Invalid request body', describeIssues(parsed.error))
        }
        const session = await deps.sessions.create(parsed.data.user_id)
        return reply.code(201).send({ session_id: session.sessionId, created_at: session.createdAt })
    })

    server.post<{ Params: SessionParams }>(
        '/sessions/:id/messages',
        { preHandler: requireAuth },
        async (request, reply) => {
            const parsed = SendMessageBodySchema.safeParse(request.body ?? {})
            if (!parsed.success) {
                throw new ValidationError('Invalid request body', describeIssues(parsed.error))
            }

            // client went away before we answered → the turn must not commit
            const controller = new AbortController()
            reply.raw.on('close', () => {
                if (!reply.raw.writableFinished) controller.abort()
            })

            const result = await deps.orchestrator.handleTurn({
                sessionId: request.params.id,
                message: parsed.data.message,
                signal: controller.signal,
            })

            const body = {
                message: result.response,
                timestamp: new Date().toISOString(),
                mode: result.mode,
                stage: result.stage,
                confidence: result.confidence,
            }
            if (!result.ok) {
                return reply.code(500).send({ error: 'PIPELINE_FAILURE', ...body })
            }
            return reply.code(200).send(body)
        },
    )

    server.delete<{ Params: SessionParams }>(
        '/sessions/:id',
        { preHandler: requireAuth },
        async (request, reply) => {
            const closed = await deps.sessions.close(request.params.id)
            if (!closed) throw new SessionUnavailable(request.params.id, 'not_found')
            return reply.code(204).send()
        },
    )

    return server
}
