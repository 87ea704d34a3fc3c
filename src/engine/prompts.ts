// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Collaborator prompts
// ─────────────────────────────────────────────────────────────

import type { FeedbackItem, FormalStatement } from '../core/types';

export function buildExtractPrompt(statement: string): string {
    return `Given the following mathematical statement in English:
${statement}

List the key mathematical concepts, variables, and hypotheses needed. Be concise and use Mathlib terminology.

Example response format:
- Variables: integers a, b
- Hypotheses: Even a, Even b
- Goal: Even (a + b)
- Required imports: Mathlib.Algebra.Ring.Parity`;
}

export function buildTheoremPrompt(statement: string): string {
    return `Convert this English mathematical statement to a valid Lean 4 theorem declaration:

English: "${statement}"

Requirements:
- Output ONLY the theorem line (no imports, no explanations)
- Use Lean 4 syntax with Mathlib types (ℕ, ℤ, ℝ, Even, Odd, Nat.Prime)
- Include every variable and hypothesis as a binder
- End the line with ":= by sorry"
- Use a short snake_case theorem name

Example:
theorem even_sum (a b : ℤ) (ha : Even a) (hb : Even b) : Even (a + b) := by sorry

Your theorem:`;
}

export function buildProofPrompt(declaration: string, feedback: readonly FeedbackItem[]): string {
    let prompt = `Write a complete Lean 4 proof for this theorem:

${declaration}

Requirements:
- Start with "by"
- Use Lean 4 tactics: obtain, use, rw, ring, simp, intro, apply, exact, omega, norm_num
- Even n unfolds to ∃ r, n = r + r; Odd n unfolds to ∃ k, n = 2 * k + 1
- Output ONLY the proof (no explanations, no markdown)

Example proof:
by
  obtain ⟨k, rfl⟩ := ha
  obtain ⟨l, rfl⟩ := hb
  use k + l
  ring

Your proof:`;
    if (feedback.length > 0) {
        prompt += `\n\nPrevious Lean errors to fix:\n${feedback.map(f => `- ${f}`).join('\n')}`;
    }
    return prompt;
}

// ── "Complete the proof" re-prompt ──────────────────────────

export interface PriorAttempt {
    proof: string;
    error: string;
}

export interface CompletionRequest {
    informal: string;
    statement: FormalStatement;
    draftProof: string;
    priorAttempts: readonly PriorAttempt[];
    feedback: readonly FeedbackItem[];
    /** Axioms and strategy notes for the problem domain. */
    hints: readonly string[];
    scaffold?: string;
}

export function buildCompletionPrompt(req: CompletionRequest): string {
    const sections: string[] = [
        `The draft proof below is empty or a placeholder (sorry, or only trivial). Replace it with a complete Lean 4 proof.

Statement: ${req.informal}

Theorem:
${req.statement.declaration}

Draft proof:
${req.draftProof || '(empty)'}`,
    ];

    if (req.priorAttempts.length > 0) {
        const attempts = req.priorAttempts
            .map((a, i) => `Attempt ${i + 1}:\n${a.proof}\nLean said: ${a.error.trim() || '(no output)'}`)
            .join('\n\n');
        sections.push(`Previous attempts:\n${attempts}`);
    }
    if (req.feedback.length > 0) {
        sections.push(`Errors to fix:\n${req.feedback.map(f => `- ${f}`).join('\n')}`);
    }
    if (req.hints.length > 0) {
        sections.push(`Useful facts and strategies:\n${req.hints.map(h => `- ${h}`).join('\n')}`);
    }
    if (req.scaffold) {
        sections.push(`Follow this worked example:\n${req.scaffold}`);
    }
    sections.push('Requirements:\n- Start with "by"\n- Do NOT use sorry\n- Output ONLY the proof\n\nYour proof:');
    return sections.join('\n\n');
}

// ── Induction scaffold ──────────────────────────────────────

const INDUCTION_SHAPES: RegExp[] = [
    /∀\s*n\b/,
    /\bsucc\b/,
    /\bn\s*\+\s*1\b/,
    /\binduction\b/i,
    /\bfor (?:all|every) natural\b/i,
    /\bfor (?:all|every) n\b/i,
];

export function isInductionShaped(...texts: string[]): boolean {
    const joined = texts.join('\n');
    return INDUCTION_SHAPES.some(re => re.test(joined));
}

export const INDUCTION_SCAFFOLD = `theorem add_zero_left (n : ℕ) : 0 + n = n := by
  induction n with
  | zero => rfl
  | succ k ih =>
    rw [Nat.add_succ, ih]

Prove the base case (zero) first, then the successor case using the induction hypothesis ih.`;
