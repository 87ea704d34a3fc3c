// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Lean 4 text helpers
// Small lexical utilities over declaration and tactic text.
// None of this parses Lean; it only finds the landmarks the
// refinement loop needs (name, goal, sentinel, tactics).
// ─────────────────────────────────────────────────────────────

/** Lean's "proof omitted" token. */
export const SORRY = 'sorry';

const SORRY_RE = /\bsorry\b/g;

/** Tactic names the checker-less heuristic and the tactic extractor recognize. */
export const KNOWN_TACTICS = [
    'intro', 'intros', 'apply', 'exact', 'refine', 'use', 'exists', 'obtain',
    'rcases', 'cases', 'induction', 'by_cases', 'constructor', 'left', 'right',
    'rw', 'rewrite', 'simp', 'simp_all', 'norm_num', 'ring', 'ring_nf',
    'field_simp', 'linarith', 'nlinarith', 'omega', 'decide', 'trivial', 'rfl',
    'assumption', 'contradiction', 'exfalso', 'calc', 'have', 'show', 'unfold',
    'split', 'split_ifs', 'positivity', 'aesop', 'tauto', 'first',
] as const;

const TACTIC_SET: ReadonlySet<string> = new Set(KNOWN_TACTICS);

export function containsSorry(text: string): boolean {
    return countSorry(text) > 0;
}

export function countSorry(text: string): number {
    return (text.match(SORRY_RE) ?? []).length;
}

// ── Declarations ────────────────────────────────────────────

const NAME_RE = /\b(?:theorem|lemma)\s+([A-Za-z_][\w.'₀-₉]*)/;

export function theoremName(declaration: string): string | null {
    return NAME_RE.exec(declaration)?.[1] ?? null;
}

/**
 * Index of the `:` that separates binders from the goal, i.e. the
 * first colon at bracket depth 0 that is not part of `:=`.
 */
export function goalSeparatorIndex(declaration: string): number {
    const head = declarationHead(declaration);
    let depth = 0;
    for (let i = 0; i < head.length; i++) {
        const c = head[i];
        if (c === '(' || c === '[' || c === '{' || c === '⦃' || c === '⟨') depth++;
        else if (c === ')' || c === ']' || c === '}' || c === '⦄' || c === '⟩') depth = Math.max(0, depth - 1);
        else if (c === ':' && depth === 0 && head[i + 1] !== '=') return i;
    }
    return -1;
}

export function hasGoalSeparator(declaration: string): boolean {
    return goalSeparatorIndex(declaration) >= 0;
}

/** Declaration text before its `:=`, or the whole text when there is none. */
export function declarationHead(declaration: string): string {
    const idx = declaration.indexOf(':=');
    return idx === -1 ? declaration : declaration.slice(0, idx);
}

/** The goal clause, e.g. `Even (a + b)`; empty when there is no separator. */
export function goalOf(declaration: string): string {
    const idx = goalSeparatorIndex(declaration);
    if (idx === -1) return '';
    return declarationHead(declaration).slice(idx + 1).trim();
}

/** True when the statement has a name and a goal separator. */
export function isWellFormedStatement(declaration: string): boolean {
    return theoremName(declaration) !== null && hasGoalSeparator(declaration);
}

// ── Tactic scripts ──────────────────────────────────────────

/** Proof lines with the leading `by` removed; blank and comment lines dropped. */
export function tacticLines(proof: string): string[] {
    const lines: string[] = [];
    for (const raw of proof.split('\n')) {
        let line = raw.trim();
        if (line.startsWith('by ')) line = line.slice(3).trim();
        else if (line === 'by') continue;
        if (!line || line.startsWith('--')) continue;
        for (const part of line.split(/\s*(?:;|<;>)\s*/)) {
            if (part) lines.push(part);
        }
    }
    return lines;
}

/** Head tactic names in order of appearance, e.g. `['obtain', 'use', 'ring']`. */
export function tacticsUsed(proof: string): string[] {
    const names: string[] = [];
    for (const line of tacticLines(proof)) {
        const head = line.replace(/^[|·•]\s*/, '').split(/[\s[(⟨]/)[0].replace(/[?!]$/, '');
        if (TACTIC_SET.has(head)) names.push(head);
    }
    return names;
}

export function startsWithTactic(text: string): boolean {
    const head = text.trim().split(/[\s[(⟨]/)[0].replace(/[?!]$/, '');
    return TACTIC_SET.has(head);
}

export function mentionsKnownTactic(proof: string): boolean {
    return KNOWN_TACTICS.some(t => new RegExp(`(^|[^\\w])${escapeRegExp(t)}($|[^\\w])`).test(proof));
}

/** A proof whose only step is `trivial`. */
export function isTrivialOnly(proof: string): boolean {
    const lines = tacticLines(proof);
    return lines.length === 1 && lines[0] === 'trivial';
}

export function escapeRegExp(s: string): string {
    return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
