/**
 * Profile Store: the one owner of per-user profile + assessment state.
 *
 * Reads hand out deep copies, so a turn can mutate its working copy freely.
 * Commits run a read-modify-write of the cached snapshot under a per-user
 * lock, bump the version, and only then write through to the repository.
 * The repository refuses versions older than what it holds, so two commits
 * racing on the durable write cannot regress the stored record.
 */

import { cloneAssessment, createEmptyAssessment } from '../analyzers/assessment-estimator.js'
import { cloneProfile, createEmptyProfile } from '../analyzers/trait-estimator.js'
import { safeError } from '../utils/safe-log.js'
import { KeyedMutex } from './keyed-mutex.js'
import type { ProfileRepository, StoredProfile } from '../collaborators.js'
import type { PersonalityProfile, TherapeuticAssessment } from '../types/companion.js'

export interface ProfileSnapshot {
    profile: PersonalityProfile
    assessment: TherapeuticAssessment
}

export type ProfileMutation = (current: ProfileSnapshot) => ProfileSnapshot

function copyRecord(record: StoredProfile): StoredProfile {
    return {
        profile: cloneProfile(record.profile),
        assessment: cloneAssessment(record.assessment),
        version: record.version,
    }
}

export class ProfileStore {
    private readonly cache = new Map<string, StoredProfile>()
    private readonly locks = new KeyedMutex()

    constructor(
        private readonly repository: ProfileRepository | null = null,
        private readonly clock: () => Date = () => new Date(),
    ) {}

    /** Deep copy of the latest snapshot; a fresh profile for unknown users. */
    async snapshot(userId: string): Promise<StoredProfile> {
        await this.ensureLoaded(userId)
        return copyRecord(this.cache.get(userId) ?? this.fresh())
    }

    /**
     * Apply `mutate` to the latest snapshot under the user's lock and persist
     * the result. Returns a copy of what was committed.
     */
    async commit(userId: string, mutate: ProfileMutation): Promise<StoredProfile> {
        await this.ensureLoaded(userId)

        const committed = await this.locks.runExclusive(userId, () => {
            const current = this.cache.get(userId) ?? this.fresh()
            const next = mutate({
                profile: cloneProfile(current.profile),
                assessment: cloneAssessment(current.assessment),
            })
            const record: StoredProfile = { ...next, version: current.version + 1 }
            this.cache.set(userId, record)
            return copyRecord(record)
        })

        if (this.repository) {
            try {
                await this.repository.save(userId, committed)
            } catch (err) {
                // cache stays authoritative; the next commit carries a higher version
                console.error(`[profiles] Failed to persist profile for ${userId}:`, safeError(err))
            }
        }
        return committed
    }

    /** Drop the cached copy so the next read goes back to the repository. */
    evict(userId: string): void {
        this.cache.delete(userId)
    }

    private fresh(): StoredProfile {
        return {
            profile: createEmptyProfile(this.clock()),
            assessment: createEmptyAssessment(),
            version: 0,
        }
    }

    private async ensureLoaded(userId: string): Promise<void> {
        if (this.cache.has(userId) || !this.repository) return

        let loaded: StoredProfile | null = null
        try {
            loaded = await this.repository.load(userId)
        } catch (err) {
            console.warn(`[profiles] Load failed for ${userId}, starting from defaults:`, safeError(err))
            return
        }
        // a commit may have landed while we were reading
        if (loaded && !this.cache.has(userId)) {
            this.cache.set(userId, loaded)
        }
    }
}
