// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Feedback Parser
// Turns Lean diagnostics into short, actionable instructions for
// the next translation attempt.
// ─────────────────────────────────────────────────────────────

import { lookupIdentifier } from '../bridge/mathlib-db';
import type { FeedbackItem, RejectionKind } from '../core/types';

export const NO_ACTIONABLE_FEEDBACK = 'No actionable feedback detected.';

interface FeedbackPattern {
    id: 'unknown-identifier' | 'type-mismatch' | 'argument' | 'assumption' | 'syntax'
        | 'unexpected-token' | 'function-expected' | 'sorry' | 'instance' | 'missing-module';
    test: RegExp;
    recommend(message: string, identifier: string | null): string;
}

// First matching pattern wins for a given line.
const PATTERNS: FeedbackPattern[] = [
    {
        id: 'unknown-identifier',
        test: /unknown (?:identifier|constant)/i,
        recommend: (m, id) => (id ? `Import or define missing identifier: ${id}` : `Import or define the missing identifier in: ${m}`),
    },
    {
        id: 'type-mismatch',
        test: /type mismatch/i,
        recommend: m => `Check and correct type mismatch: ${m}`,
    },
    {
        id: 'argument',
        test: /invalid argument|missing argument|too many arguments|explicit argument/i,
        recommend: m => `Review arguments for function/application: ${m}`,
    },
    {
        id: 'assumption',
        test: /missing (?:assumption|hypothesis)|no such (?:assumption|hypothesis)|assumption failed/i,
        recommend: m => `Add missing hypothesis or assumption: ${m}`,
    },
    {
        id: 'syntax',
        test: /syntax error/i,
        recommend: m => `Fix syntax error: ${m}`,
    },
    {
        id: 'unexpected-token',
        test: /unexpected token/i,
        recommend: m => `Fix unexpected token: ${m}`,
    },
    {
        id: 'function-expected',
        test: /function expected/i,
        recommend: m => `Term is applied but is not a function: ${m}`,
    },
    {
        id: 'sorry',
        test: /declaration uses 'sorry'/i,
        recommend: () => 'Replace every sorry with a complete proof step',
    },
    {
        id: 'instance',
        test: /failed to synthesize/i,
        recommend: m => `Add a type annotation or the missing instance: ${m}`,
    },
    {
        id: 'missing-module',
        test: /unknown (?:module|package)|module .* does not exist|object file .* does not exist|bad import/i,
        recommend: m => `Add or correct the missing import: ${m}`,
    },
];

const LOCATION_RE = /^[^:\n]+:\d+:\d+:\s*(?:error|warning|information):\s*/;

const QUOTED_RE = /['`"‘]([^'`"‘’\s]+)['`"’]/;
const BARE_IDENT_RE = /unknown (?:identifier|constant):?\s+([^\s'`"‘’]+)/i;

/** The quoted (or bare) identifier an error line names, if any. */
export function extractIdentifier(line: string): string | null {
    return QUOTED_RE.exec(line)?.[1] ?? BARE_IDENT_RE.exec(line)?.[1] ?? null;
}

function identifierHint(identifier: string): string {
    const entry = lookupIdentifier(identifier);
    if (!entry) {
        return `Hint: provide a minimal import or an alternative lemma for ${identifier}`;
    }
    return `Hint: ${identifier} is ${entry.lean4Name} (import ${entry.import}); ${entry.description}`;
}

/**
 * One recommendation per recognized line, plus at most one hint for the
 * first missing identifier or module. Never empty.
 */
export function parseFeedback(diagnostics: string): FeedbackItem[] {
    const items: FeedbackItem[] = [];
    let missingIdentifier: string | null = null;
    let missingModule: string | null = null;

    for (const rawLine of diagnostics.split('\n')) {
        const line = rawLine.trim();
        if (!line) continue;
        const message = line.replace(LOCATION_RE, '');
        const pattern = PATTERNS.find(p => p.test.test(message));
        if (!pattern) continue;

        const identifier = extractIdentifier(message);
        items.push(pattern.recommend(message, identifier));

        if (pattern.id === 'unknown-identifier' && identifier && missingIdentifier === null) {
            missingIdentifier = identifier;
        }
        if (pattern.id === 'missing-module' && missingModule === null) {
            missingModule = identifier ?? message;
        }
    }

    if (missingIdentifier !== null) {
        items.push(identifierHint(missingIdentifier));
    } else if (missingModule !== null) {
        items.push(`Hint: missing import ${missingModule}; check the module path against Mathlib`);
    }

    const unique = [...new Set(items)];
    return unique.length > 0 ? unique : [NO_ACTIONABLE_FEEDBACK];
}

// ── Rejection classes (for learning) ────────────────────────

const REJECTIONS: Array<[RegExp, RejectionKind]> = [
    [/unknown (?:identifier|constant)/i, 'unknownIdentifier'],
    [/type mismatch/i, 'typeMismatch'],
    [/failed to apply|apply failed|could not unify/i, 'applyFailed'],
    [/assumption|hypothesis/i, 'assumptionFailed'],
    [/tactic .* failed|unsolved goals|failed/i, 'tacticFailed'],
];

export function classifyRejection(text: string): RejectionKind {
    for (const [re, kind] of REJECTIONS) {
        if (re.test(text)) return kind;
    }
    return 'other';
}
