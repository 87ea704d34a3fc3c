// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Configuration
// Environment variables are validated once with zod; anything
// malformed fails loudly at startup instead of mid-session.
// ─────────────────────────────────────────────────────────────

import { z } from 'zod';
import { isLogLevel, type LogLevel } from './log';

export const ProviderSchema = z.enum(['openai', 'anthropic', 'github', 'gemini']);
export type LLMProvider = z.infer<typeof ProviderSchema>;

const intFromEnv = (fallback: number, min: number, max: number) =>
    z.coerce.number().int().min(min).max(max).default(fallback);

const flagFromEnv = z
    .enum(['true', 'false', 'TRUE', 'FALSE', '1', '0'])
    .optional()
    .transform((v) => v === 'true' || v === 'TRUE' || v === '1');

const EnvSchema = z
    .object({
        LLM_PROVIDER: ProviderSchema.optional(),
        LLM_MODEL: z.string().min(1).optional(),
        LLM_API_KEY: z.string().min(1).optional(),
        LLM_RATE_LIMIT_PER_MINUTE: intFromEnv(15, 1, 10_000),
        LLM_FALLBACK_PROVIDER: ProviderSchema.optional(),
        LLM_FALLBACK_MODEL: z.string().min(1).optional(),
        LLM_FALLBACK_API_KEY: z.string().min(1).optional(),

        LEAN_PATH_BIN: z.string().min(1).optional(),
        LEAN_PROJECT_DIR: z.string().min(1).optional(),
        LEAN_TIMEOUT_MS: intFromEnv(15_000, 10_000, 30_000),
        // `lake env` loads the project's packages first
        LAKE_TIMEOUT_MS: intFromEnv(30_000, 30_000, 120_000),

        LEMMALOOP_MAX_ATTEMPTS: intFromEnv(3, 1, 3),
        LEMMALOOP_LEARNING_FILE: z.string().min(1).default('lemmaloop-learning.json'),
        LEMMALOOP_KNOWLEDGE_FILE: z.string().min(1).optional(),
        LEMMALOOP_STRICT_VERIFICATION: flagFromEnv,

        LOG_LEVEL: z
            .string()
            .optional()
            .refine((v) => v === undefined || isLogLevel(v.toLowerCase()), {
                message: 'LOG_LEVEL must be one of debug, info, warn, error, silent',
            }),
    })
    .passthrough();

export interface LemmaloopConfig {
    llm: {
        provider: LLMProvider;
        model?: string;
        apiKey?: string;
        rateLimitPerMinute: number;
        /** Second backend, tried when the first is unreachable or rejects its key. */
        fallback?: {
            provider: LLMProvider;
            model?: string;
            apiKey: string;
        };
    };
    lean: {
        binary?: string;
        projectDir?: string;
        timeoutMs: number;
        lakeTimeoutMs: number;
        strict: boolean;
    };
    maxAttempts: number;
    learningFile: string;
    knowledgeFile?: string;
    logLevel: LogLevel;
}

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
        this.name = 'ConfigError';
    }
}

export function detectProvider(apiKey: string): LLMProvider {
    if (apiKey.startsWith('ghp_') || apiKey.startsWith('github_pat_')) return 'github';
    if (apiKey.startsWith('sk-ant-')) return 'anthropic';
    if (apiKey.startsWith('AIza')) return 'gemini';
    return 'openai';
}

export function loadConfig(env: Record<string, string | undefined> = process.env): LemmaloopConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`));
    }
    const e = parsed.data;
    const provider = e.LLM_PROVIDER ?? (e.LLM_API_KEY ? detectProvider(e.LLM_API_KEY) : 'openai');
    const level = e.LOG_LEVEL?.toLowerCase();

    return {
        llm: {
            provider,
            model: e.LLM_MODEL,
            apiKey: e.LLM_API_KEY,
            rateLimitPerMinute: e.LLM_RATE_LIMIT_PER_MINUTE,
            fallback: e.LLM_FALLBACK_API_KEY
                ? {
                    provider: e.LLM_FALLBACK_PROVIDER ?? detectProvider(e.LLM_FALLBACK_API_KEY),
                    model: e.LLM_FALLBACK_MODEL,
                    apiKey: e.LLM_FALLBACK_API_KEY,
                }
                : undefined,
        },
        lean: {
            binary: e.LEAN_PATH_BIN,
            projectDir: e.LEAN_PROJECT_DIR,
            timeoutMs: e.LEAN_TIMEOUT_MS,
            lakeTimeoutMs: e.LAKE_TIMEOUT_MS,
            strict: e.LEMMALOOP_STRICT_VERIFICATION,
        },
        maxAttempts: e.LEMMALOOP_MAX_ATTEMPTS,
        learningFile: e.LEMMALOOP_LEARNING_FILE,
        knowledgeFile: e.LEMMALOOP_KNOWLEDGE_FILE,
        logLevel: level !== undefined && isLogLevel(level) ? level : 'info',
    };
}
