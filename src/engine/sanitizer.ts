// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Proof Sanitizer
// Mechanical clean-up of generated tactic text before it is
// handed to Lean. Rewrites notation and Lean 3 leftovers; never
// adds or removes proof steps.
// ─────────────────────────────────────────────────────────────

import { getRequiredImports } from '../bridge/mathlib-db';
import { countSorry, declarationHead, startsWithTactic } from '../core/lean-syntax';

export interface SanitizedProof {
    proof: string;
    changed: boolean;
    /** A rewrite would have dropped a `sorry`; the input was kept. */
    refused: boolean;
}

interface Rule {
    name: string;
    apply(text: string, statement?: string): string;
}

// ── Rules (applied in order) ────────────────────────────────

const RULES: Rule[] = [
    {
        name: 'whitespace',
        apply: text => dedent(text
            .replace(/\r\n?/g, '\n')
            .replace(/\t/g, '  ')
            .split('\n')
            .map(l => l.replace(/\s+$/, ''))
            .join('\n')),
    },
    {
        // `theorem foo ... := by ...` echoed back in place of a proof
        name: 'echoed-declaration',
        apply: (text, statement) => {
            if (!/^(?:theorem|lemma)\s/.test(text)) return text;
            const idx = text.indexOf(':=');
            if (idx === -1) return text;
            if (statement && !sameDeclaration(text, statement)) return text;
            return dedent(text.slice(idx + 2).replace(/^[ ]*\n?/, ''));
        },
    },
    {
        name: 'angle-brackets',
        apply: text => text
            .replace(/[\u2329\u3008]/g, '⟨')
            .replace(/[\u232A\u3009]/g, '⟩')
            .replace(/(\bobtain\s+)<([^<>\n]*)>/g, '$1⟨$2⟩')
            .replace(/(\brcases\b[^\n]*?\bwith\s+)<([^<>\n]*)>/g, '$1⟨$2⟩'),
    },
    {
        name: 'lean3-cases',
        apply: text => text.replace(
            /^([ ]*)cases[ ]+([\w'.]+)[ ]+with[ ]+([\w'][\w' ]*?)[ ]*,?$/gm,
            (_m, indent: string, hyp: string, names: string) =>
                `${indent}obtain ⟨${names.trim().split(/ +/).join(', ')}⟩ := ${hyp}`,
        ),
    },
    {
        name: 'lean3-namespaces',
        apply: text => text.replace(
            /(^|[^\w.])(nat|int|real)\./g,
            (_m, pre: string, ns: string) => `${pre}${ns[0].toUpperCase()}${ns.slice(1)}.`,
        ),
    },
    {
        name: 'begin-end',
        apply: text => {
            const m = /^begin\b[ ]*\n?([\s\S]*?)\n?[ ]*end$/.exec(text);
            if (!m) return text;
            const body = m[1]
                .split('\n')
                .map(l => l.replace(/,\s*$/, ''))
                .join('\n');
            return indentBlock(`by`, dedent(body));
        },
    },
    {
        name: 'by-prefix',
        apply: text => {
            if (!text || /^by\b/.test(text)) return text;
            const firstLine = text.split('\n')[0];
            if (!startsWithTactic(firstLine)) return text;
            return indentBlock('by', dedent(text));
        },
    },
];

function sameDeclaration(text: string, statement: string): boolean {
    const squash = (s: string) => declarationHead(s).replace(/\s+/g, ' ').trim();
    return squash(text) === squash(statement);
}

function dedent(text: string): string {
    const lines = text.split('\n');
    const indents = lines.filter(l => l.trim()).map(l => /^[ ]*/.exec(l)?.[0].length ?? 0);
    const min = indents.length > 0 ? Math.min(...indents) : 0;
    return lines.map(l => l.slice(Math.min(min, /^[ ]*/.exec(l)?.[0].length ?? 0))).join('\n').trim();
}

function indentBlock(head: string, body: string): string {
    if (!body) return head;
    return `${head}\n${body.split('\n').map(l => (l ? `  ${l}` : l)).join('\n')}`;
}

// ── Public API ──────────────────────────────────────────────

/**
 * Idempotent: `sanitizeProof(sanitizeProof(p).proof).proof === sanitizeProof(p).proof`.
 * When `statement` is given, an echoed copy of that declaration is
 * stripped from the front of the proof.
 */
export function sanitizeProof(proof: string, statement?: string): SanitizedProof {
    let out = proof;
    for (const rule of RULES) out = rule.apply(out, statement);

    if (countSorry(out) < countSorry(proof)) {
        return { proof, changed: false, refused: true };
    }
    return { proof: out, changed: out !== proof, refused: false };
}

/** `import` lines for a statement + proof pair. */
export function inferImports(statement: string, proof: string): string[] {
    return getRequiredImports(statement, proof);
}
