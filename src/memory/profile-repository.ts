/**
 * Durable per-user profile + assessment, stored as JSONB.
 *
 * Saves are versioned: the upsert only lands when its version is newer than
 * the stored one. Reloaded JSON is validated; a corrupt row is treated as
 * missing rather than failing the turn.
 */

import { getPool } from '../db.js'
import { PersonalityProfileSchema, TherapeuticAssessmentSchema } from '../types/schemas.js'
import type { ProfileRepository, StoredProfile } from '../collaborators.js'

interface ProfileRow {
    profile: unknown
    assessment: unknown
    version: number
}

export class PgProfileRepository implements ProfileRepository {
    async load(userId: string): Promise<StoredProfile | null> {
        const { rows } = await getPool().query<ProfileRow>(
            `SELECT profile, assessment, version FROM user_profiles WHERE user_id = $1`,
            [userId]
        )
        if (rows.length === 0) return null

        const row = rows[0]
        const profile = PersonalityProfileSchema.safeParse(row.profile)
        const assessment = TherapeuticAssessmentSchema.safeParse(row.assessment)
        if (!profile.success || !assessment.success) {
            console.warn(`[profiles] Stored profile for ${userId} failed validation, ignoring it`)
            return null
        }
        return {
            profile: profile.data,
            assessment: assessment.data,
            version: Number(row.version) || 0,
        }
    }

    async save(userId: string, record: StoredProfile): Promise<void> {
        const result = await getPool().query(
            `INSERT INTO user_profiles (user_id, profile, assessment, version, updated_at)
             VALUES ($1, $2::jsonb, $3::jsonb, $4, NOW())
             ON CONFLICT (user_id) DO UPDATE SET
               profile = EXCLUDED.profile,
               assessment = EXCLUDED.assessment,
               version = EXCLUDED.version,
               updated_at = NOW()
             WHERE user_profiles.version < EXCLUDED.version`,
            [userId, JSON.stringify(record.profile), JSON.stringify(record.assessment), record.version]
        )
        if ((result.rowCount ?? 0) === 0) {
            console.warn(`[profiles] Skipped stale write for ${userId} (version ${record.version})`)
        }
    }
}
