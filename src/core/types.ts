// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Core data model
// Statements, attempts, verdicts and scores shared by every
// stage of the refinement loop.
// ─────────────────────────────────────────────────────────────

// ── Statements ──────────────────────────────────────────────

export interface InformalStatement {
    readonly text: string;
    /** Problem-domain tag, e.g. "parity" or "complexity_theory". */
    readonly domain?: string;
}

export interface FormalStatement {
    readonly name: string;
    /** Signature, hypotheses and goal, e.g. `theorem foo (n : ℕ) : n + 0 = n := by sorry`. */
    readonly declaration: string;
}

// ── Verification ────────────────────────────────────────────

export type ValidationMode = 'lean' | 'lake' | 'heuristic' | 'structural';

export interface LeanDiagnostic {
    line: number;
    column: number;
    message: string;
    severity: 'error' | 'warning' | 'information';
}

export interface ValidationResult {
    readonly success: boolean;
    readonly rawOutput: string;
    readonly rawError: string;
    readonly mode: ValidationMode;
    /** False when no real Lean run backs the verdict. */
    readonly authoritative: boolean;
    readonly timedOut: boolean;
    readonly diagnostics: readonly LeanDiagnostic[];
    readonly elapsedMs: number;
    /** Why the attempt failed; null on success. */
    readonly errorKind: VerificationErrorKind | null;
}

export type RejectionKind =
    | 'unknownIdentifier'
    | 'typeMismatch'
    | 'tacticFailed'
    | 'assumptionFailed'
    | 'applyFailed'
    | 'other';

// ── Errors ──────────────────────────────────────────────────

export type ErrorKind =
    | 'UntranslatableStatement'
    | 'VerificationTimeout'
    | 'ToolUnavailable'
    | 'VerificationRejected'
    | 'CollaboratorQuotaExceeded';

/** The kinds a verdict can carry; quota exhaustion never reaches the verifier. */
export type VerificationErrorKind = Exclude<ErrorKind, 'CollaboratorQuotaExceeded'>;

export interface CollaboratorQuotaExceeded {
    readonly kind: 'CollaboratorQuotaExceeded';
    readonly message: string;
    readonly attemptNumber: number;
}

// ── Refinement ──────────────────────────────────────────────

export type FeedbackItem = string;

export interface ProofAttempt {
    readonly attemptNumber: number;
    readonly statement: FormalStatement;
    readonly proof: string;
    readonly imports: readonly string[];
    /** Feedback that was in the prompt when this attempt was produced. */
    readonly feedback: readonly FeedbackItem[];
    readonly validation: ValidationResult;
}

export type SessionState =
    | 'Translating'
    | 'Verifying'
    | 'Feedback'
    | 'Succeeded'
    | 'ExhaustedAttempts'
    | 'Aborted';

export type TerminalState = 'Succeeded' | 'ExhaustedAttempts' | 'Aborted';

// ── Learning ────────────────────────────────────────────────

export interface TacticStatistic {
    name: string;
    successCount: number;
    failureCount: number;
}

// ── Quality ─────────────────────────────────────────────────

export type SubstanceCategory =
    | 'placeholder'
    | 'logical_reasoning'
    | 'proof_construction'
    | 'algebraic_manipulation'
    | 'computational_verification'
    | 'trivial_proof'
    | 'minimal_reasoning';

export interface QualitySignals {
    hasSentinel: boolean;
    isTrivialOnly: boolean;
    /** Part of the proof was a `first | …` block and earned no credit. */
    usesAlternatives: boolean;
    meaningfulPatterns: string[];
    lineCount: number;
    isAlgebraic: boolean;
    isArithmetic: boolean;
    hasCaseSplit: boolean;
    hasExistentialWitness: boolean;
}

export interface QualityScore {
    score: number;
    isMeaningful: boolean;
    isPlaceholder: boolean;
    substanceCategory: SubstanceCategory;
    explanation: string;
    signals: QualitySignals;
}
