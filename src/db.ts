/**
 * Postgres connection pool + schema migrations.
 *
 * One shared pool per process. initDatabase() once at startup; every
 * adapter calls getPool() per query so tests can mock this module.
 */

import { Pool } from 'pg'

let pool: Pool | null = null

export function initDatabase(databaseUrl: string, production = process.env.NODE_ENV === 'production'): Pool {
    // sslmode in the URL confuses pg; SSL is set explicitly below
    const cleanUrl = databaseUrl.replace(/[?&]sslmode=[^&]*/g, '').replace(/\?$/, '')

    pool = new Pool({
        connectionString: cleanUrl,
        max: 10,
        idleTimeoutMillis: 30000,
        ssl: production ? { rejectUnauthorized: true } : false,
    })
    pool.on('error', err => {
        console.error('[db] Idle client error:', err.message)
    })
    return pool
}

export function getPool(): Pool {
    if (!pool) {
        throw new Error('Database not initialized. Call initDatabase() first.')
    }
    return pool
}

/**
 * Create missing tables. Idempotent: safe on every startup.
 */
export async function runMigrations(): Promise<void> {
    const p = getPool()
    await p.query(`
        CREATE TABLE IF NOT EXISTS companion_sessions (
            session_id      TEXT PRIMARY KEY,
            user_id         TEXT NOT NULL,
            stage           TEXT NOT NULL DEFAULT 'initial',
            turn_count      INTEGER NOT NULL DEFAULT 0,
            adaptations     JSONB NOT NULL DEFAULT '[]'::jsonb,
            last_confidence DOUBLE PRECISION NOT NULL DEFAULT 0,
            active          BOOLEAN NOT NULL DEFAULT TRUE,
            created_at      TIMESTAMPTZ NOT NULL DEFAULT NOW(),
            updated_at      TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
    `)
    await p.query(`CREATE INDEX IF NOT EXISTS idx_companion_sessions_user ON companion_sessions(user_id, created_at)`)

    await p.query(`
        CREATE TABLE IF NOT EXISTS conversation_messages (
            id          BIGSERIAL PRIMARY KEY,
            session_id  TEXT NOT NULL REFERENCES companion_sessions(session_id) ON DELETE CASCADE,
            role        TEXT NOT NULL,
            content     TEXT NOT NULL,
            metadata    JSONB NOT NULL DEFAULT '{}'::jsonb,
            created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
    `)
    await p.query(`CREATE INDEX IF NOT EXISTS idx_conversation_messages_session ON conversation_messages(session_id, id)`)

    await p.query(`
        CREATE TABLE IF NOT EXISTS user_profiles (
            user_id     TEXT PRIMARY KEY,
            profile     JSONB NOT NULL,
            assessment  JSONB NOT NULL,
            version     INTEGER NOT NULL,
            updated_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
    `)

    await p.query(`
        CREATE TABLE IF NOT EXISTS memory_vectors (
            id          TEXT PRIMARY KEY,
            user_id     TEXT NOT NULL,
            kind        TEXT NOT NULL,
            content     TEXT NOT NULL,
            embedding   DOUBLE PRECISION[] NOT NULL,
            metadata    JSONB NOT NULL DEFAULT '{}'::jsonb,
            created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
        )
    `)
    await p.query(`CREATE INDEX IF NOT EXISTS idx_memory_vectors_user_kind ON memory_vectors(user_id, kind)`)
    console.log('[db] Migrations complete')
}

export async function closeDatabase(): Promise<void> {
    if (pool) {
        await pool.end()
        pool = null
    }
}
