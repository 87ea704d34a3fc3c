// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Mathlib4 Import Dictionary
// Maps domain vocabulary found in statements and proofs to the
// Mathlib modules they need, and missing identifiers to the
// lemma and import that usually provide them.
// ─────────────────────────────────────────────────────────────

import IDENTIFIER_HINTS from './data/identifier-hints.json';

export interface MathlibEntry {
    lean4Name: string;
    import: string;
    description: string;
}

/** Parses even when nothing in the text matches the dictionary. */
export const BASELINE_IMPORT = 'Mathlib.Tactic.Basic';

const HINTS: Record<string, MathlibEntry> = IDENTIFIER_HINTS;

// ── Keyword → module table ──────────────────────────────────

interface ImportRule {
    pattern: RegExp;
    module: string;
}

const IMPORT_RULES: ImportRule[] = [
    // naturals / integers / reals
    { pattern: /ℕ|\bNat\b|\bsucc\b/, module: 'Mathlib.Data.Nat.Basic' },
    { pattern: /ℤ|\bInt\b/, module: 'Mathlib.Data.Int.Basic' },
    { pattern: /ℝ|\bReal\b/, module: 'Mathlib.Data.Real.Basic' },
    { pattern: /\bZMod\b/, module: 'Mathlib.Data.ZMod.Basic' },
    // parity / divisibility / primes
    { pattern: /\b(?:Even|Odd)\b|\bparity\b/i, module: 'Mathlib.Algebra.Ring.Parity' },
    { pattern: /∣|\bdvd\b/, module: 'Mathlib.Algebra.Ring.Basic' },
    { pattern: /\bNat\.Prime\b|\bPrime\b/, module: 'Mathlib.Data.Nat.Prime.Basic' },
    { pattern: /\bFinset\b|∑|∏/, module: 'Mathlib.Algebra.BigOperators.Basic' },
    // ring arithmetic tactics
    { pattern: /\bring(?:_nf)?\b/, module: 'Mathlib.Tactic.Ring' },
    { pattern: /\bn?linarith\b/, module: 'Mathlib.Tactic.Linarith' },
    { pattern: /\bnorm_num\b/, module: 'Mathlib.Tactic.NormNum' },
    { pattern: /\bfield_simp\b/, module: 'Mathlib.Tactic.FieldSimp' },
    { pattern: /\bpositivity\b/, module: 'Mathlib.Tactic.Positivity' },
    // logic
    { pattern: /[∀∃↔¬]|\bby_contra\b|\bby_cases\b/, module: 'Mathlib.Logic.Basic' },
    // computability / complexity vocabulary
    { pattern: /\bTuring\b|\bTM[012]\b|\bComputable\b/, module: 'Mathlib.Computability.TuringMachine' },
    { pattern: /\bPrimrec\b|\bPartrec\b/, module: 'Mathlib.Computability.Partrec' },
    { pattern: /\bLanguage\b/, module: 'Mathlib.Computability.Language' },
    { pattern: /\bPolynomial\b|\bpolynomial_time\b/, module: 'Mathlib.Algebra.Polynomial.Basic' },
];

const EXPLICIT_MODULE_RE = /\bMathlib(?:\.[A-Z][\w']*)+/g;

/**
 * Minimal ordered set of `import` lines for the given texts.
 *
 * Modules named explicitly in the text come first, then dictionary
 * matches in order of first appearance, then the baseline import.
 */
export function getRequiredImports(...texts: string[]): string[] {
    const combined = texts.join('\n');
    const modules: string[] = [];
    const seen = new Set<string>();
    const add = (m: string) => {
        if (!seen.has(m)) {
            seen.add(m);
            modules.push(m);
        }
    };

    for (const match of combined.matchAll(EXPLICIT_MODULE_RE)) add(match[0]);

    const hits: Array<{ index: number; module: string }> = [];
    for (const rule of IMPORT_RULES) {
        const m = rule.pattern.exec(combined);
        if (m) hits.push({ index: m.index, module: rule.module });
    }
    hits.sort((a, b) => a.index - b.index);
    for (const h of hits) add(h.module);

    add(BASELINE_IMPORT);
    return modules.map(m => `import ${m}`);
}

// ── Identifier lookup ───────────────────────────────────────

export function lookupIdentifier(identifier: string): MathlibEntry | undefined {
    const name = identifier.trim().replace(/^[`'"‘’]+|[`'"‘’]+$/g, '');
    if (HINTS[name]) return HINTS[name];

    // `Nat.add_succ` → `add_succ`
    const last = name.split('.').pop() ?? name;
    if (HINTS[last]) return HINTS[last];

    for (const entry of Object.values(HINTS)) {
        if (entry.lean4Name === name) return entry;
    }
    return undefined;
}

export function knownIdentifiers(): string[] {
    return Object.keys(HINTS);
}
