/**
 * Companion server entry point.
 *
 * Postgres and Redis are optional: without DATABASE_URL sessions, history
 * and profiles live in process memory; without provider keys replies use
 * the fallback text.
 */

import 'dotenv/config'
import { createNoiseSource } from './analyzers/noise.js'
import { TraitEstimator } from './analyzers/trait-estimator.js'
import { closeRedis, initRedis } from './cache/redis-client.js'
import { loadConfig } from './config.js'
import { closeDatabase, initDatabase, runMigrations } from './db.js'
import { EmbeddingClient } from './embeddings.js'
import { createGenerator } from './llm/generator.js'
import { PgMemoryContextService } from './memory/conversation-memory.js'
import { InMemoryConversationMemory, InMemorySessionStore } from './memory/in-memory.js'
import { PgProfileRepository } from './memory/profile-repository.js'
import { PgSessionStore } from './memory/session-store.js'
import { VectorMemory } from './memory/vector-memory.js'
import { PgVectorStore } from './memory/vector-store.js'
import { ProfileStore, TurnOrchestrator } from './orchestrator/index.js'
import { buildServer } from './server.js'
import type { EmbeddingService, MemoryContextService, SessionStore } from './collaborators.js'

const config = loadConfig()
const persistent = Boolean(config.DATABASE_URL)

if (config.DATABASE_URL) {
    initDatabase(config.DATABASE_URL, config.NODE_ENV === 'production')
    await runMigrations()
} else {
    console.warn('[boot] DATABASE_URL not set, using in-process stores')
}
initRedis(config.REDIS_URL)

const embeddingClient = new EmbeddingClient({
    jinaApiKey: config.JINA_API_KEY,
    jinaModel: config.EMBEDDING_MODEL,
    hfApiKey: config.HF_API_KEY,
    hfModel: config.HF_EMBEDDING_MODEL,
    dimensions: config.EMBEDDING_DIMS,
    requestTimeoutMs: config.EMBEDDING_TIMEOUT_MS,
    disableSharedCache: !config.REDIS_URL,
})

let sessions: SessionStore
let memory: MemoryContextService
let embeddings: EmbeddingService | undefined
let profiles: ProfileStore

if (persistent) {
    sessions = new PgSessionStore()
    embeddings = embeddingClient.configured ? new VectorMemory(embeddingClient, new PgVectorStore()) : undefined
    memory = new PgMemoryContextService({ historyLimit: config.HISTORY_LIMIT, embeddings })
    profiles = new ProfileStore(new PgProfileRepository())
} else {
    const inMemorySessions = new InMemorySessionStore()
    sessions = inMemorySessions
    memory = new InMemoryConversationMemory(inMemorySessions, config.HISTORY_LIMIT)
    profiles = new ProfileStore()
}

const generator = createGenerator({
    groqApiKey: config.GROQ_API_KEY,
    groqModel: config.GENERATION_MODEL,
    geminiApiKey: config.GEMINI_API_KEY,
    geminiModel: config.GEMINI_MODEL,
    maxTokens: config.GENERATION_MAX_TOKENS,
})

const orchestrator = new TurnOrchestrator({
    sessions,
    profiles,
    memory,
    embeddings,
    generator,
    traits: new TraitEstimator({
        noise: createNoiseSource({ stddev: config.TRAIT_JITTER_STDDEV, seed: config.TRAIT_JITTER_SEED }),
    }),
    generationTimeoutMs: config.GENERATION_TIMEOUT_MS,
    contextTimeoutMs: config.CONTEXT_TIMEOUT_MS,
    historyLimit: config.HISTORY_LIMIT,
})

const server = await buildServer({
    orchestrator,
    sessions,
    apiTokens: config.API_TOKENS,
    health: () => ({
        persistence: persistent ? 'postgres' : 'memory',
        generation: generator ? generator.providerNames : [],
        embeddings: embeddings ? 'enabled' : 'disabled',
    }),
})

if (config.API_TOKENS.length === 0) {
    server.log.warn('API_TOKENS not set, any bearer token is accepted')
}

const shutdown = async (signal: string): Promise<void> => {
    server.log.info(`${signal} received, shutting down`)
    await server.close()
    await closeRedis()
    await closeDatabase()
    process.exit(0)
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))

try {
    await server.listen({ port: config.PORT, host: config.HOST })
    server.log.info(`Companion ready on ${config.HOST}:${config.PORT}`)
} catch (err) {
    server.log.error(err)
    process.exit(1)
}
