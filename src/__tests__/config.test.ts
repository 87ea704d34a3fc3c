import { describe, it, expect } from 'vitest';
import { ConfigError, detectProvider, loadConfig } from '../core/config';

function issuesOf(env: Record<string, string>): string[] {
    try {
        loadConfig(env);
    } catch (e: unknown) {
        if (e instanceof ConfigError) return e.issues;
        throw e;
    }
    return [];
}

describe('loadConfig', () => {
    it('applies defaults to an empty environment', () => {
        expect(loadConfig({})).toEqual({
            llm: { provider: 'openai', model: undefined, apiKey: undefined, rateLimitPerMinute: 15, fallback: undefined },
            lean: { binary: undefined, projectDir: undefined, timeoutMs: 15_000, lakeTimeoutMs: 30_000, strict: false },
            maxAttempts: 3,
            learningFile: 'lemmaloop-learning.json',
            knowledgeFile: undefined,
            logLevel: 'info',
        });
    });

    it('coerces numeric and boolean variables', () => {
        const config = loadConfig({
            LLM_RATE_LIMIT_PER_MINUTE: '30',
            LEAN_TIMEOUT_MS: '20000',
            LEMMALOOP_MAX_ATTEMPTS: '2',
            LEMMALOOP_STRICT_VERIFICATION: '1',
            LOG_LEVEL: 'DEBUG',
        });
        expect(config.llm.rateLimitPerMinute).toBe(30);
        expect(config.lean.timeoutMs).toBe(20_000);
        expect(config.maxAttempts).toBe(2);
        expect(config.lean.strict).toBe(true);
        expect(config.logLevel).toBe('debug');
    });

    it('infers the provider from the key unless one is named', () => {
        expect(loadConfig({ LLM_API_KEY: 'sk-ant-test-secret' }).llm.provider).toBe('anthropic');
        expect(loadConfig({ LLM_API_KEY: 'sk-ant-test-secret', LLM_PROVIDER: 'gemini' }).llm.provider).toBe('gemini');
    });

    it('keeps the Lean timeout between ten and thirty seconds', () => {
        expect(issuesOf({ LEAN_TIMEOUT_MS: '5000' })[0]).toMatch(/^LEAN_TIMEOUT_MS: /);
        expect(issuesOf({ LEAN_TIMEOUT_MS: '60000' })[0]).toMatch(/^LEAN_TIMEOUT_MS: /);
        expect(loadConfig({ LEAN_TIMEOUT_MS: '30000' }).lean.timeoutMs).toBe(30_000);
        expect(issuesOf({ LAKE_TIMEOUT_MS: '15000' })[0]).toMatch(/^LAKE_TIMEOUT_MS: /);
        expect(loadConfig({ LAKE_TIMEOUT_MS: '90000' }).lean.lakeTimeoutMs).toBe(90_000);
    });

    it('reads a fallback backend only when its key is set', () => {
        expect(loadConfig({ LLM_FALLBACK_PROVIDER: 'gemini' }).llm.fallback).toBeUndefined();
        expect(loadConfig({ LLM_API_KEY: 'test-secret', LLM_FALLBACK_API_KEY: 'sk-ant-test-secret' }).llm.fallback).toEqual({
            provider: 'anthropic',
            model: undefined,
            apiKey: 'sk-ant-test-secret',
        });
        expect(loadConfig({
            LLM_FALLBACK_API_KEY: 'test-secret',
            LLM_FALLBACK_PROVIDER: 'github',
            LLM_FALLBACK_MODEL: 'gpt-4o',
        }).llm.fallback).toEqual({ provider: 'github', model: 'gpt-4o', apiKey: 'test-secret' });
        expect(issuesOf({ LLM_FALLBACK_PROVIDER: 'mistral' })[0]).toMatch(/^LLM_FALLBACK_PROVIDER: /);
    });

    it('rejects an attempt budget above three', () => {
        expect(() => loadConfig({ LEMMALOOP_MAX_ATTEMPTS: '5' })).toThrow(ConfigError);
        expect(issuesOf({ LEMMALOOP_MAX_ATTEMPTS: '5' })[0]).toMatch(/^LEMMALOOP_MAX_ATTEMPTS: /);
    });

    it('rejects unknown log levels and flags', () => {
        expect(issuesOf({ LOG_LEVEL: 'loud' })).toEqual([
            'LOG_LEVEL: LOG_LEVEL must be one of debug, info, warn, error, silent',
        ]);
        expect(issuesOf({ LEMMALOOP_STRICT_VERIFICATION: 'yes' })).toHaveLength(1);
    });
});

describe('detectProvider', () => {
    it('recognizes key prefixes', () => {
        expect(detectProvider('ghp_test')).toBe('github');
        expect(detectProvider('github_pat_test')).toBe('github');
        expect(detectProvider('AIzaTest')).toBe('gemini');
        expect(detectProvider('test-secret')).toBe('openai');
    });
});
