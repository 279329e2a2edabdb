/**
 * Runtime configuration: parsed once from the environment with zod.
 *
 * Every knob has a default so tests and local runs need no .env file.
 * Invalid values fail fast at startup with the offending keys listed.
 */

import { z } from 'zod'

const optionalString = z
    .string()
    .trim()
    .transform(value => (value.length > 0 ? value : undefined))
    .optional()

export const ConfigSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),

    DATABASE_URL: optionalString,
    REDIS_URL: optionalString,

    GROQ_API_KEY: optionalString,
    GEMINI_API_KEY: optionalString,
    GENERATION_MODEL: z.string().default('llama-3.3-70b-versatile'),
    GEMINI_MODEL: z.string().default('gemini-2.0-flash'),
    GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
    GENERATION_MAX_TOKENS: z.coerce.number().int().positive().default(500),

    JINA_API_KEY: optionalString,
    HF_API_KEY: optionalString,
    EMBEDDING_MODEL: z.string().default('jina-embeddings-v3'),
    HF_EMBEDDING_MODEL: z.string().default('sentence-transformers/all-MiniLM-L6-v2'),
    EMBEDDING_DIMS: z.coerce.number().int().positive().default(384),
    EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),

    /** Limit on each memory / embedding read before a turn carries on without it */
    CONTEXT_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),

    HISTORY_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
    TRAIT_JITTER_STDDEV: z.coerce.number().min(0).max(1).default(0.1),
    TRAIT_JITTER_SEED: z.coerce.number().int().optional(),

    API_TOKENS: z
        .string()
        .default('')
        .transform(raw => raw.split(',').map(token => token.trim()).filter(Boolean)),
})

export type CompanionConfig = z.infer<typeof ConfigSchema>

/** Blank assignments in a .env file (`KEY=`) mean "use the default". */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
    const cleaned: Record<string, string> = {}
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') cleaned[key] = value
    }
    return cleaned
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CompanionConfig {
    const result = ConfigSchema.safeParse(withoutBlanks(env))
    if (!result.success) {
        const problems = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ')
        throw new Error(`Invalid configuration: ${problems}`)
    }
    return result.data
}
