/**
 * Session store backed by the companion_sessions table.
 */

import { randomUUID } from 'node:crypto'
import { getPool } from '../db.js'
import { AdaptationListSchema, ConversationStageSchema } from '../types/schemas.js'
import { INITIAL_STAGE } from '../flow/stages.js'
import type { SessionProgress, SessionStore } from '../collaborators.js'
import type { CompanionSession } from '../types/companion.js'

interface SessionRow {
    session_id: string
    user_id: string
    stage: string
    turn_count: number
    adaptations: unknown
    last_confidence: number
    active: boolean
    created_at: Date | string
    updated_at: Date | string
}

const SESSION_COLUMNS = `session_id, user_id, stage, turn_count, adaptations, last_confidence, active, created_at, updated_at`

function toIso(value: Date | string): string {
    const parsed = value instanceof Date ? value : new Date(value)
    return Number.isNaN(parsed.getTime()) ? new Date(0).toISOString() : parsed.toISOString()
}

export function rowToSession(row: SessionRow): CompanionSession {
    const stage = ConversationStageSchema.safeParse(row.stage)
    if (!stage.success) {
        console.warn(`[sessions] Unknown stage "${row.stage}" on ${row.session_id}, resetting to ${INITIAL_STAGE}`)
    }
    return {
        sessionId: row.session_id,
        userId: row.user_id,
        stage: stage.success ? stage.data : INITIAL_STAGE,
        turnCount: Number(row.turn_count) || 0,
        adaptations: AdaptationListSchema.parse(row.adaptations),
        lastConfidence: Number(row.last_confidence) || 0,
        active: row.active,
        createdAt: toIso(row.created_at),
        updatedAt: toIso(row.updated_at),
    }
}

export class PgSessionStore implements SessionStore {
    async create(userId: string): Promise<CompanionSession> {
        const { rows } = await getPool().query<SessionRow>(
            `INSERT INTO companion_sessions (session_id, user_id, stage)
             VALUES ($1, $2, $3)
             RETURNING ${SESSION_COLUMNS}`,
            [randomUUID(), userId, INITIAL_STAGE]
        )
        return rowToSession(rows[0])
    }

    async get(sessionId: string): Promise<CompanionSession | null> {
        const { rows } = await getPool().query<SessionRow>(
            `SELECT ${SESSION_COLUMNS} FROM companion_sessions WHERE session_id = $1`,
            [sessionId]
        )
        return rows.length > 0 ? rowToSession(rows[0]) : null
    }

    async close(sessionId: string): Promise<boolean> {
        const result = await getPool().query(
            `UPDATE companion_sessions SET active = FALSE, updated_at = NOW() WHERE session_id = $1`,
            [sessionId]
        )
        return (result.rowCount ?? 0) > 0
    }

    async saveProgress(sessionId: string, progress: SessionProgress): Promise<void> {
        await getPool().query(
            `UPDATE companion_sessions
             SET stage = $2, turn_count = $3, adaptations = $4::jsonb, last_confidence = $5, updated_at = NOW()
             WHERE session_id = $1 AND active = TRUE`,
            [sessionId, progress.stage, progress.turnCount, JSON.stringify(progress.adaptations), progress.lastConfidence]
        )
    }
}
