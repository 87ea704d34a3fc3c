// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Text-generation collaborators
// One `generate` operation behind a single interface; the
// concrete provider is picked once, at construction time.
// ─────────────────────────────────────────────────────────────

import type { LLMProvider, LemmaloopConfig } from '../core/config';
import { createLogger } from '../core/log';
import { err, ok, type Result } from '../core/result';
import { classifyCollaboratorError, type CollaboratorError, type CollaboratorErrorKind } from './model-errors';

const log = createLogger('llm');

export type GenerationResult = Result<string | null, CollaboratorError>;

export interface TextGenerator {
    readonly name: string;
    generate(prompt: string, maxTokens: number): Promise<GenerationResult>;
    /** Token and cost totals, for strategies that track them. */
    getUsage?(): LLMUsage;
}

export interface LLMUsage {
    promptTokens: number;
    completionTokens: number;
    estimatedCostUsd: number;
}

const MODEL_COSTS: Record<string, { input: number; output: number }> = {
    // $/1M tokens
    'gpt-4o': { input: 2.5, output: 10 },
    'gpt-4o-mini': { input: 0.15, output: 0.6 },
    'claude-sonnet-4-20250514': { input: 3, output: 15 },
    'claude-haiku-3-5': { input: 0.8, output: 4 },
    'gemini-1.5-flash': { input: 0.075, output: 0.3 },
};

const SYSTEM_PROMPT = 'You are a Lean 4 theorem prover assistant. Output only valid Lean 4 code when asked.';

export function defaultModelForProvider(provider: LLMProvider): string {
    switch (provider) {
        case 'github': return 'gpt-4o';
        case 'anthropic': return 'claude-sonnet-4-20250514';
        case 'gemini': return 'gemini-1.5-flash';
        case 'openai': return 'gpt-4o-mini';
    }
}

// ── Rate limiting ───────────────────────────────────────────

export interface RateLimiterClock {
    now(): number;
    sleep(ms: number): Promise<void>;
}

const systemClock: RateLimiterClock = {
    now: () => Date.now(),
    sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
};

/** Sliding-window limiter: at most `maxRequests` per `windowMs`. */
export class RateLimiter {
    private readonly stamps: number[] = [];

    constructor(
        readonly maxRequests: number,
        readonly windowMs: number = 60_000,
        private readonly clock: RateLimiterClock = systemClock,
    ) { }

    canMakeRequest(): boolean {
        this.evict();
        return this.stamps.length < this.maxRequests;
    }

    /** Waits until a slot is free, then records the request. */
    async acquire(): Promise<void> {
        if (!this.canMakeRequest()) {
            const wait = this.stamps[0] + this.windowMs - this.clock.now();
            if (wait > 0) {
                log.info(`Rate limit reached. Waiting ${(wait / 1000).toFixed(1)}s...`);
                await this.clock.sleep(wait + 100);
            }
            this.evict();
        }
        this.stamps.push(this.clock.now());
    }

    private evict(): void {
        const cutoff = this.clock.now() - this.windowMs;
        while (this.stamps.length > 0 && this.stamps[0] < cutoff) this.stamps.shift();
    }
}

// ── Shared HTTP plumbing ────────────────────────────────────

export interface GeneratorOptions {
    apiKey: string;
    model?: string;
    rateLimiter?: RateLimiter;
    fetchImpl?: typeof fetch;
    timeoutMs?: number;
}

interface Completion {
    text: string;
    promptTokens: number;
    completionTokens: number;
}

abstract class HttpGenerator implements TextGenerator {
    abstract readonly name: string;
    readonly model: string;
    protected readonly apiKey: string;
    private readonly limiter?: RateLimiter;
    private readonly fetchImpl?: typeof fetch;
    private readonly timeoutMs: number;
    private usage: LLMUsage = { promptTokens: 0, completionTokens: 0, estimatedCostUsd: 0 };

    constructor(provider: LLMProvider, options: GeneratorOptions) {
        this.apiKey = options.apiKey;
        this.model = options.model ?? defaultModelForProvider(provider);
        this.limiter = options.rateLimiter;
        this.fetchImpl = options.fetchImpl;
        this.timeoutMs = options.timeoutMs ?? 60_000;
    }

    getUsage(): LLMUsage { return { ...this.usage }; }

    async generate(prompt: string, maxTokens: number): Promise<GenerationResult> {
        if (this.limiter) await this.limiter.acquire();
        try {
            const completion = await this.complete(prompt, maxTokens);
            this.track(completion);
            const text = completion.text.trim();
            return ok(text.length > 0 ? text : null);
        } catch (error: unknown) {
            const classified = classifyCollaboratorError(error);
            log.error(`${this.name} API error:`, classified.message);
            return err(classified);
        }
    }

    protected abstract complete(prompt: string, maxTokens: number): Promise<Completion>;

    protected async post(url: string, headers: Record<string, string>, body: unknown): Promise<unknown> {
        const doFetch = this.fetchImpl ?? globalThis.fetch;
        const resp = await doFetch(url, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', ...headers },
            body: JSON.stringify(body),
            signal: AbortSignal.timeout(this.timeoutMs),
        });
        if (!resp.ok) {
            const data: unknown = await resp.json().catch(() => null);
            throw new ProviderHttpError(resp.status, providerMessage(data) ?? `${this.name} API error (${resp.status})`);
        }
        return await resp.json();
    }

    private track(c: Completion): void {
        const costs = MODEL_COSTS[this.model] ?? { input: 1, output: 3 };
        this.usage.promptTokens += c.promptTokens;
        this.usage.completionTokens += c.completionTokens;
        this.usage.estimatedCostUsd += (c.promptTokens * costs.input + c.completionTokens * costs.output) / 1_000_000;
    }
}

export class ProviderHttpError extends Error {
    constructor(readonly status: number, message: string) {
        super(message);
        this.name = 'ProviderHttpError';
    }
}

// ── Response shapes ─────────────────────────────────────────

function isRecord(v: unknown): v is Record<string, unknown> {
    return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function num(v: unknown): number {
    return typeof v === 'number' && Number.isFinite(v) ? v : 0;
}

function providerMessage(data: unknown): string | undefined {
    if (!isRecord(data)) return undefined;
    const e = data.error;
    if (typeof e === 'string') return e;
    if (isRecord(e) && typeof e.message === 'string') return e.message;
    return undefined;
}

function recordAt(data: unknown, key: string): Record<string, unknown> {
    if (!isRecord(data)) return {};
    const v = data[key];
    return isRecord(v) ? v : {};
}

function firstArrayItem(v: unknown): Record<string, unknown> | undefined {
    if (!Array.isArray(v)) return undefined;
    const first: unknown = v[0];
    return isRecord(first) ? first : undefined;
}

// ── Providers ───────────────────────────────────────────────

export class OpenAIGenerator extends HttpGenerator {
    readonly name: string = 'openai';
    protected endpoint = 'https://api.openai.com/v1/chat/completions';

    constructor(options: GeneratorOptions, provider: LLMProvider = 'openai') {
        super(provider, options);
    }

    protected async complete(prompt: string, maxTokens: number): Promise<Completion> {
        const data = await this.post(this.endpoint, { Authorization: `Bearer ${this.apiKey}` }, {
            model: this.model,
            messages: [
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: prompt },
            ],
            temperature: 0.2,
            max_tokens: maxTokens,
        });
        const choice = isRecord(data) ? firstArrayItem(data.choices) : undefined;
        const message = recordAt(choice, 'message');
        const usage = recordAt(data, 'usage');
        return {
            text: typeof message.content === 'string' ? message.content : '',
            promptTokens: num(usage.prompt_tokens),
            completionTokens: num(usage.completion_tokens),
        };
    }
}

/** GitHub Models speaks the OpenAI chat-completions dialect. */
export class GitHubModelsGenerator extends OpenAIGenerator {
    readonly name: string = 'github';

    constructor(options: GeneratorOptions) {
        super(options, 'github');
        this.endpoint = 'https://models.inference.ai.azure.com/chat/completions';
    }
}

export class AnthropicGenerator extends HttpGenerator {
    readonly name = 'anthropic';

    constructor(options: GeneratorOptions) {
        super('anthropic', options);
    }

    protected async complete(prompt: string, maxTokens: number): Promise<Completion> {
        const data = await this.post('https://api.anthropic.com/v1/messages', {
            'x-api-key': this.apiKey,
            'anthropic-version': '2023-06-01',
        }, {
            model: this.model,
            max_tokens: maxTokens,
            temperature: 0.7,
            system: SYSTEM_PROMPT,
            messages: [{ role: 'user', content: prompt }],
        });
        const parts = isRecord(data) && Array.isArray(data.content) ? data.content : [];
        const text = parts
            .map((p: unknown) => (isRecord(p) && typeof p.text === 'string' ? p.text : ''))
            .filter(Boolean)
            .join('\n');
        const usage = recordAt(data, 'usage');
        return { text, promptTokens: num(usage.input_tokens), completionTokens: num(usage.output_tokens) };
    }
}

export class GeminiGenerator extends HttpGenerator {
    readonly name = 'gemini';

    constructor(options: GeneratorOptions) {
        super('gemini', options);
    }

    protected async complete(prompt: string, maxTokens: number): Promise<Completion> {
        const url = `https://generativelanguage.googleapis.com/v1beta/models/${this.model}:generateContent`;
        const data = await this.post(url, { 'x-goog-api-key': this.apiKey }, {
            systemInstruction: { parts: [{ text: SYSTEM_PROMPT }] },
            contents: [{ role: 'user', parts: [{ text: prompt }] }],
            generationConfig: { maxOutputTokens: maxTokens, temperature: 0.7 },
        });
        const candidate = isRecord(data) ? firstArrayItem(data.candidates) : undefined;
        const content = recordAt(candidate, 'content');
        const parts = Array.isArray(content.parts) ? content.parts : [];
        const text = parts
            .map((p: unknown) => (isRecord(p) && typeof p.text === 'string' ? p.text : ''))
            .join('');
        const usage = recordAt(data, 'usageMetadata');
        return { text, promptTokens: num(usage.promptTokenCount), completionTokens: num(usage.candidatesTokenCount) };
    }
}

// ── Fallback chain ──────────────────────────────────────────

/** Error kinds after which the next strategy is tried. Quota ends the chain. */
const HAND_OVER: ReadonlySet<CollaboratorErrorKind> = new Set<CollaboratorErrorKind>(['unavailable', 'timeout', 'auth']);

export class FallbackGenerator implements TextGenerator {
    readonly name: string;
    private readonly strategies: readonly TextGenerator[];

    constructor(primary: TextGenerator, ...fallbacks: TextGenerator[]) {
        this.strategies = [primary, ...fallbacks];
        this.name = this.strategies.map(s => s.name).join('|');
    }

    async generate(prompt: string, maxTokens: number): Promise<GenerationResult> {
        let result: GenerationResult = ok(null);
        for (const [i, strategy] of this.strategies.entries()) {
            result = await strategy.generate(prompt, maxTokens);
            if (result.ok || !HAND_OVER.has(result.error.kind)) return result;
            const next = this.strategies[i + 1];
            if (next) log.warn(`${strategy.name} failed (${result.error.kind}); handing over to ${next.name}`);
        }
        return result;
    }

    getUsage(): LLMUsage {
        const total: LLMUsage = { promptTokens: 0, completionTokens: 0, estimatedCostUsd: 0 };
        for (const strategy of this.strategies) {
            const usage = strategy.getUsage?.();
            if (!usage) continue;
            total.promptTokens += usage.promptTokens;
            total.completionTokens += usage.completionTokens;
            total.estimatedCostUsd += usage.estimatedCostUsd;
        }
        return total;
    }
}

// ── Factory ─────────────────────────────────────────────────

function buildStrategy(provider: LLMProvider, options: GeneratorOptions): TextGenerator {
    switch (provider) {
        case 'anthropic': return new AnthropicGenerator(options);
        case 'github': return new GitHubModelsGenerator(options);
        case 'gemini': return new GeminiGenerator(options);
        case 'openai': return new OpenAIGenerator(options);
    }
}

/**
 * The configured generator, chained to the fallback backend when one is
 * set, or `null` when no API key is set; callers then run the
 * deterministic template path.
 */
export function createTextGenerator(
    config: LemmaloopConfig['llm'],
    fetchImpl?: typeof fetch,
): TextGenerator | null {
    const strategies: TextGenerator[] = [];
    if (config.apiKey) {
        strategies.push(buildStrategy(config.provider, {
            apiKey: config.apiKey,
            model: config.model,
            rateLimiter: new RateLimiter(config.rateLimitPerMinute),
            fetchImpl,
        }));
    }
    if (config.fallback) {
        strategies.push(buildStrategy(config.fallback.provider, {
            apiKey: config.fallback.apiKey,
            model: config.fallback.model,
            rateLimiter: new RateLimiter(config.rateLimitPerMinute),
            fetchImpl,
        }));
    }

    const [primary, ...rest] = strategies;
    if (primary === undefined) return null;
    return rest.length > 0 ? new FallbackGenerator(primary, ...rest) : primary;
}
