// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Public API
// ─────────────────────────────────────────────────────────────

export * from './core/types';
export { ok, err, errorMessage, type Result } from './core/result';
export { loadConfig, detectProvider, ConfigError, type LemmaloopConfig, type LLMProvider } from './core/config';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './core/log';
export {
    SORRY, KNOWN_TACTICS, containsSorry, theoremName, goalOf, isWellFormedStatement, tacticsUsed,
} from './core/lean-syntax';

export { getRequiredImports, lookupIdentifier, BASELINE_IMPORT, type MathlibEntry } from './bridge/mathlib-db';
export {
    LeanRunner, basicProofValidation, buildLeanSource, combineStatementAndProof, findLakeProject,
    makeValidation, parseLeanOutput,
    type ExecFn, type LeanHealth, type LeanRunnerOptions, type VerifyRequest,
} from './bridge/lean-runner';
export {
    LearningStore, LearningStoreError, classifyTheorem, extractKeywords,
    type LearningDocument, type LearningEvent, type ProofStatistics,
} from './bridge/learning-store';
export { KnowledgeStore, type DomainKnowledge } from './bridge/knowledge-store';

export {
    createTextGenerator, FallbackGenerator, RateLimiter, OpenAIGenerator, AnthropicGenerator, GitHubModelsGenerator, GeminiGenerator,
    ProviderHttpError, type TextGenerator, type GenerationResult, type GeneratorOptions, type LLMUsage,
} from './engine/llm';
export { classifyCollaboratorError, isQuotaMessage, type CollaboratorError } from './engine/model-errors';
export {
    StatementTranslator, templateTranslation, postprocessTheorem, postprocessProof, formatForMemory,
    type Translation, type TranslatorError, type ProofRecord,
} from './engine/translator';
export { sanitizeProof, inferImports, type SanitizedProof } from './engine/sanitizer';
export { parseFeedback, classifyRejection, NO_ACTIONABLE_FEEDBACK } from './engine/feedback';
export { assessProofQuality, generateQualityReport, type QualityReport, type AssessedResult } from './engine/quality';
export {
    RefinementOrchestrator, FeedbackSet, QuotaExceededError, MAX_ATTEMPTS, FALLBACK_TACTICS,
    type RefinementSession, type SessionOutcome, type OrchestratorDeps, type ProofVerifier,
} from './engine/orchestrator';
