// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Refinement Orchestrator
// Drives one informal statement through
//   Translating → Verifying → (Feedback → Translating)*
// to Succeeded, ExhaustedAttempts or Aborted.
// ─────────────────────────────────────────────────────────────

import { KnowledgeStore } from '../bridge/knowledge-store';
import { classifyTheorem, LearningStore } from '../bridge/learning-store';
import { LeanRunner, makeValidation, type ExecFn, type VerifyRequest } from '../bridge/lean-runner';
import type { LemmaloopConfig } from '../core/config';
import { containsSorry, escapeRegExp, hasGoalSeparator, isTrivialOnly, theoremName } from '../core/lean-syntax';
import { createLogger } from '../core/log';
import { err, errorMessage, ok, type Result } from '../core/result';
import type {
    CollaboratorQuotaExceeded, FeedbackItem, FormalStatement, InformalStatement,
    ProofAttempt, QualityScore, SessionState, TerminalState, ValidationResult,
} from '../core/types';
import { classifyRejection, parseFeedback } from './feedback';
import { createTextGenerator } from './llm';
import { INDUCTION_SCAFFOLD, isInductionShaped } from './prompts';
import { assessProofQuality } from './quality';
import { inferImports, sanitizeProof } from './sanitizer';
import { StatementTranslator } from './translator';

const log = createLogger('orchestrator');

/** Hard ceiling; configuration may lower it but never raise it. */
export const MAX_ATTEMPTS = 3;

/** Tried as one `first | …` block when neither translation nor completion yields a proof. */
export const FALLBACK_TACTICS = ['simp', 'norm_num', 'omega', 'linarith', 'ring', 'decide', 'trivial', 'rfl'];

const TIMEOUT_FEEDBACK = 'Lean timed out; use a more direct proof or fewer automation tactics';
const UNTRANSLATABLE_FEEDBACK = 'Write a Lean theorem declaration with a name and a goal clause, e.g. theorem name (x : ℕ) : goal';

// ── Session ─────────────────────────────────────────────────

/** Insertion-ordered, duplicate-free feedback. */
export class FeedbackSet {
    private readonly items: FeedbackItem[] = [];

    /** Returns how many of `items` were new. */
    add(items: readonly FeedbackItem[]): number {
        let added = 0;
        for (const item of items) {
            if (!this.items.includes(item)) {
                this.items.push(item);
                added++;
            }
        }
        return added;
    }

    has(item: FeedbackItem): boolean {
        return this.items.includes(item);
    }

    get size(): number {
        return this.items.length;
    }

    toArray(): FeedbackItem[] {
        return [...this.items];
    }
}

export interface RefinementSession {
    readonly statement: InformalStatement;
    readonly attempts: ProofAttempt[];
    readonly feedback: FeedbackSet;
    readonly history: SessionState[];
    state: SessionState;
    validation?: ValidationResult;
}

export interface SessionOutcome {
    state: Exclude<TerminalState, 'Aborted'>;
    session: RefinementSession;
    attempt?: ProofAttempt;
    validation: ValidationResult;
    quality?: QualityScore;
}

/** Thrown by `runBatch` so a whole batch stops on quota exhaustion. */
export class QuotaExceededError extends Error {
    constructor(
        readonly detail: CollaboratorQuotaExceeded,
        readonly completed: SessionOutcome[],
    ) {
        super(`Collaborator quota exceeded on attempt ${detail.attemptNumber}: ${detail.message}`);
        this.name = 'QuotaExceededError';
    }
}

// ── Orchestrator ────────────────────────────────────────────

export interface ProofVerifier {
    verify(req: VerifyRequest): Promise<ValidationResult>;
}

export interface OrchestratorDeps {
    translator: StatementTranslator;
    verifier: ProofVerifier;
    learning: LearningStore;
    knowledge?: KnowledgeStore;
    maxAttempts?: number;
}

export interface CreateOptions {
    fetchImpl?: typeof fetch;
    exec?: ExecFn;
}

export class RefinementOrchestrator {
    readonly maxAttempts: number;
    private readonly translator: StatementTranslator;
    private readonly verifier: ProofVerifier;
    private readonly learning: LearningStore;
    private readonly knowledge: KnowledgeStore;

    constructor(deps: OrchestratorDeps) {
        this.translator = deps.translator;
        this.verifier = deps.verifier;
        this.learning = deps.learning;
        this.knowledge = deps.knowledge ?? KnowledgeStore.empty();
        this.maxAttempts = Math.min(MAX_ATTEMPTS, Math.max(1, deps.maxAttempts ?? MAX_ATTEMPTS));
    }

    /** Wires every collaborator from configuration. */
    static async create(config: LemmaloopConfig, options: CreateOptions = {}): Promise<RefinementOrchestrator> {
        const generator = createTextGenerator(config.llm, options.fetchImpl);
        if (!generator) log.info('No LLM API key configured; using template translations');
        return new RefinementOrchestrator({
            translator: new StatementTranslator(generator),
            verifier: new LeanRunner({
                binary: config.lean.binary,
                projectDir: config.lean.projectDir,
                timeoutMs: config.lean.timeoutMs,
                lakeTimeoutMs: config.lean.lakeTimeoutMs,
                strict: config.lean.strict,
                exec: options.exec,
            }),
            learning: await LearningStore.load(config.learningFile),
            knowledge: await KnowledgeStore.load(config.knowledgeFile),
            maxAttempts: config.maxAttempts,
        });
    }

    async run(statement: InformalStatement): Promise<Result<SessionOutcome, CollaboratorQuotaExceeded>> {
        const session: RefinementSession = {
            statement,
            attempts: [],
            feedback: new FeedbackSet(),
            history: [],
            state: 'Translating',
        };
        const usedNames = new Map<string, string>();
        let last: ValidationResult | undefined;

        for (let n = 1; n <= this.maxAttempts; n++) {
            transition(session, 'Translating');
            const snapshot = session.feedback.toArray();

            const translated = await this.translator.translate(statement, snapshot);
            if (!translated.ok) {
                if (translated.error.kind === 'CollaboratorQuotaExceeded') {
                    return this.abort(session, n, translated.error.message);
                }
                log.warn(`attempt ${n}: ${translated.error.message}`);
                last = makeValidation({
                    success: false, mode: 'structural', rawError: translated.error.message, errorKind: 'UntranslatableStatement',
                });
                session.validation = last;
                session.feedback.add(feedbackFor(last));
                if (n < this.maxAttempts) transition(session, 'Feedback');
                continue;
            }

            const formal = uniqueStatement(translated.value.formal, usedNames);
            let proof = sanitizeProof(translated.value.draftProof, formal.declaration).proof;

            // Guard 1: empty, sentinel or trivial-only drafts get one completion pass
            if (!proof.trim() || containsSorry(proof) || isTrivialOnly(proof)) {
                const completed = await this.translator.complete({
                    informal: statement.text,
                    statement: formal,
                    draftProof: proof,
                    priorAttempts: session.attempts.map(a => ({
                        proof: a.proof,
                        error: a.validation.rawError || a.validation.rawOutput,
                    })),
                    feedback: snapshot,
                    hints: this.knowledge.hintsFor(statement.domain ?? classifyTheorem(formal.declaration)),
                    scaffold: isInductionShaped(statement.text, formal.declaration) ? INDUCTION_SCAFFOLD : undefined,
                });
                if (!completed.ok) return this.abort(session, n, completed.error.message);
                if (completed.value) proof = sanitizeProof(completed.value, formal.declaration).proof;
            }
            if (!proof.trim()) proof = this.fallbackProof();

            const imports = inferImports(formal.declaration, proof);
            transition(session, 'Verifying');

            // Guard 2: skip Lean for obviously malformed attempts
            const problem = structuralProblem(formal, proof);
            const validation = problem
                ? makeValidation({ success: false, mode: 'structural', rawError: problem })
                : await this.verifier.verify({ statement: formal, proof, imports });

            const attempt: ProofAttempt = Object.freeze({
                attemptNumber: n,
                statement: formal,
                proof,
                imports: Object.freeze([...imports]),
                feedback: Object.freeze(snapshot),
                validation,
            });
            session.attempts.push(attempt);
            session.validation = validation;
            last = validation;
            log.info(`attempt ${n}/${this.maxAttempts} ${formal.name}: ${validation.success ? 'verified' : 'rejected'} (${validation.mode})`);

            if (!problem) await this.learn(statement, formal, proof, validation, snapshot);

            if (validation.success) {
                transition(session, 'Succeeded');
                return ok({
                    state: 'Succeeded',
                    session,
                    attempt,
                    validation,
                    quality: assessProofQuality(proof, formal.declaration, statement.domain),
                });
            }

            session.feedback.add(feedbackFor(validation));
            if (n < this.maxAttempts) transition(session, 'Feedback');
        }

        transition(session, 'ExhaustedAttempts');
        const attempt = session.attempts.at(-1);
        return ok({
            state: 'ExhaustedAttempts',
            session,
            attempt,
            validation: last ?? makeValidation({
                success: false, mode: 'structural', rawError: 'no attempts made', errorKind: 'UntranslatableStatement',
            }),
        });
    }

    /** Runs statements in order; a quota error stops the batch. */
    async runBatch(statements: readonly InformalStatement[]): Promise<SessionOutcome[]> {
        const outcomes: SessionOutcome[] = [];
        for (const statement of statements) {
            const result = await this.run(statement);
            if (!result.ok) throw new QuotaExceededError(result.error, outcomes);
            outcomes.push(result.value);
        }
        return outcomes;
    }

    private fallbackProof(): string {
        return `by\n  first | ${this.learning.rankTactics(FALLBACK_TACTICS).join(' | ')}`;
    }

    private abort(
        session: RefinementSession,
        attemptNumber: number,
        message: string,
    ): Result<never, CollaboratorQuotaExceeded> {
        transition(session, 'Aborted');
        log.error(`collaborator quota exceeded on attempt ${attemptNumber}; aborting session`);
        return err({ kind: 'CollaboratorQuotaExceeded', message, attemptNumber });
    }

    private async learn(
        statement: InformalStatement,
        formal: FormalStatement,
        proof: string,
        validation: ValidationResult,
        feedback: readonly FeedbackItem[],
    ): Promise<void> {
        const diagnostics = `${validation.rawError}\n${validation.rawOutput}`;
        try {
            await this.learning.record({
                success: validation.success,
                statement: formal.declaration,
                proof,
                context: [statement.text, ...feedback],
                rejection: validation.success ? undefined : classifyRejection(diagnostics),
                message: validation.success ? undefined : diagnostics.trim().slice(0, 500),
            });
        } catch (e: unknown) {
            log.warn(`could not save learning store: ${errorMessage(e)}`);
        }
    }
}

// ── Helpers ─────────────────────────────────────────────────

function transition(session: RefinementSession, state: SessionState): void {
    session.state = state;
    session.history.push(state);
    log.debug(`→ ${state}`);
}

function feedbackFor(validation: ValidationResult): FeedbackItem[] {
    switch (validation.errorKind) {
        case null:
            return [];
        case 'VerificationTimeout':
            return [TIMEOUT_FEEDBACK];
        case 'UntranslatableStatement':
            return [UNTRANSLATABLE_FEEDBACK];
        case 'ToolUnavailable':
        case 'VerificationRejected':
            // structural verdicts already carry the instruction
            if (validation.mode === 'structural') return [validation.rawError];
            return parseFeedback(`${validation.rawError}\n${validation.rawOutput}`);
    }
}

/** Null when the attempt is worth sending to Lean. */
export function structuralProblem(formal: FormalStatement, proof: string): string | null {
    if (theoremName(formal.declaration) === null) {
        return 'Statement has no theorem name; start it with `theorem <name>`';
    }
    if (!hasGoalSeparator(formal.declaration)) {
        return 'Statement has no goal separator; add `: <goal>` before `:=`';
    }
    if (containsSorry(proof)) {
        return "Proof still uses 'sorry'; replace every sorry with a complete proof step";
    }
    return null;
}

/**
 * Appends `_v2`, `_v3`, … when a name was already used in this session
 * for a different declaration.
 */
export function uniqueStatement(formal: FormalStatement, used: Map<string, string>): FormalStatement {
    const prior = used.get(formal.name);
    if (prior === undefined || prior === formal.declaration) {
        used.set(formal.name, formal.declaration);
        return formal;
    }

    let k = 2;
    while (used.has(`${formal.name}_v${k}`)) k++;
    const name = `${formal.name}_v${k}`;
    const declaration = formal.declaration.replace(
        new RegExp(`\\b(theorem|lemma)(\\s+)${escapeRegExp(formal.name)}(?![\\w.'])`),
        `$1$2${name}`,
    );
    used.set(name, declaration);
    return { name, declaration };
}
