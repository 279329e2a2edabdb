/**
 * Response generator: GenerationService with a provider fallback chain.
 *
 *   Groq (llama-3.3-70b-versatile) → Gemini Flash (REST)
 *
 * Each provider gets exponential-backoff retries on transient failures
 * before the chain moves on. Empty completions count as failures. When the
 * whole chain fails the generator throws CollaboratorUnavailable and the
 * orchestrator answers with its fallback reply.
 */

import Groq from 'groq-sdk'
import { z } from 'zod'
import { CollaboratorUnavailable } from '../errors.js'
import { withRetry, type RetryOptions } from '../utils/retry.js'
import { errorMessage } from '../utils/safe-log.js'
import type { GenerationService } from '../collaborators.js'
import type { HistoryMessage } from '../types/companion.js'

// ─── Types ──────────────────────────────────────────────────────────────────

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant'
    content: string
}

export interface LLMProvider {
    name: string
    call: (messages: ChatMessage[], signal?: AbortSignal) => Promise<string>
}

export interface GeneratorOptions {
    groqApiKey?: string
    groqModel?: string
    geminiApiKey?: string
    geminiModel?: string
    maxTokens?: number
    temperature?: number
    retry?: RetryOptions
    fetchImpl?: typeof fetch
}

class ProviderHttpError extends Error {
    constructor(provider: string, readonly status: number, body: string) {
        super(`${provider} ${status}: ${body.slice(0, 200)}`)
        this.name = 'ProviderHttpError'
    }
}

// ─── Providers ──────────────────────────────────────────────────────────────

export function makeGroqProvider(client: Groq, model: string, maxTokens: number, temperature: number): LLMProvider {
    return {
        name: `groq:${model}`,
        call: async (messages, signal) => {
            const completion = await client.chat.completions.create(
                {
                    model,
                    messages: messages.map(m => {
                        if (m.role === 'system') return { role: 'system' as const, content: m.content }
                        if (m.role === 'user') return { role: 'user' as const, content: m.content }
                        return { role: 'assistant' as const, content: m.content }
                    }),
                    max_tokens: maxTokens,
                    temperature,
                },
                { signal },
            )
            return completion.choices[0]?.message?.content ?? ''
        },
    }
}

const GeminiResponseSchema = z.object({
    candidates: z
        .array(
            z.object({
                content: z
                    .object({ parts: z.array(z.object({ text: z.string().optional() })).default([]) })
                    .optional(),
            }),
        )
        .default([]),
})

export function makeGeminiProvider(
    apiKey: string,
    model: string,
    maxTokens: number,
    temperature: number,
    fetchImpl: typeof fetch = fetch,
): LLMProvider {
    return {
        name: `gemini:${model}`,
        call: async (messages, signal) => {
            const systemMsg = messages.find(m => m.role === 'system')
            const contents = messages
                .filter(m => m.role !== 'system')
                .map(m => ({
                    role: m.role === 'assistant' ? 'model' : 'user',
                    parts: [{ text: m.content }],
                }))

            const body = {
                contents,
                generationConfig: { maxOutputTokens: maxTokens, temperature },
                ...(systemMsg ? { systemInstruction: { parts: [{ text: systemMsg.content }] } } : {}),
            }

            const url = `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent?key=${apiKey}`
            const resp = await fetchImpl(url, {
                method: 'POST',
                headers: { 'Content-Type': 'application/json' },
                body: JSON.stringify(body),
                signal,
            })
            if (!resp.ok) {
                const text = await resp.text().catch(() => '')
                throw new ProviderHttpError('Gemini', resp.status, text)
            }

            const data = GeminiResponseSchema.parse(await resp.json())
            return data.candidates[0]?.content?.parts[0]?.text ?? ''
        },
    }
}

// ─── Generator ──────────────────────────────────────────────────────────────

export function toChatMessages(systemPrompt: string, history: HistoryMessage[]): ChatMessage[] {
    return [
        { role: 'system', content: systemPrompt },
        ...history.map(m => ({ role: m.role, content: m.content })),
    ]
}

export class ResponseGenerator implements GenerationService {
    constructor(
        private readonly providers: LLMProvider[],
        private readonly retry: RetryOptions = {},
    ) {}

    get providerNames(): string[] {
        return this.providers.map(p => p.name)
    }

    async generate(systemPrompt: string, history: HistoryMessage[], signal?: AbortSignal): Promise<string> {
        const messages = toChatMessages(systemPrompt, history)
        const failures: string[] = []

        for (const provider of this.providers) {
            if (signal?.aborted) break
            try {
                const text = await withRetry(() => provider.call(messages, signal), provider.name, { ...this.retry, signal })
                if (text.trim()) {
                    console.log(`[llm] Response from ${provider.name}`)
                    return text.trim()
                }
                failures.push(`${provider.name}: empty completion`)
            } catch (err) {
                failures.push(`${provider.name}: ${errorMessage(err)}`)
                console.warn(`[llm] ${provider.name} failed, falling back to next provider`)
            }
        }

        const reason = signal?.aborted
            ? 'aborted'
            : failures.length > 0 ? failures.join('; ') : 'no provider configured'
        throw new CollaboratorUnavailable('generation', reason)
    }
}

export function createGenerator(opts: GeneratorOptions): ResponseGenerator | null {
    const maxTokens = opts.maxTokens ?? 500
    const temperature = opts.temperature ?? 0.8
    const providers: LLMProvider[] = []

    if (opts.groqApiKey) {
        const client = new Groq({ apiKey: opts.groqApiKey })
        providers.push(makeGroqProvider(client, opts.groqModel ?? 'llama-3.3-70b-versatile', maxTokens, temperature))
    }
    if (opts.geminiApiKey) {
        providers.push(makeGeminiProvider(
            opts.geminiApiKey,
            opts.geminiModel ?? 'gemini-2.0-flash',
            maxTokens,
            temperature,
            opts.fetchImpl,
        ))
    }

    if (providers.length === 0) {
        console.warn('[llm] No GROQ_API_KEY or GEMINI_API_KEY set, replies will use the fallback text')
        return null
    }
    return new ResponseGenerator(providers, opts.retry)
}
