// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Feedback Parser Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { classifyRejection, extractIdentifier, NO_ACTIONABLE_FEEDBACK, parseFeedback } from '../engine/feedback';

describe('parseFeedback', () => {
    it('returns exactly one generic item for empty output', () => {
        expect(parseFeedback('')).toEqual([NO_ACTIONABLE_FEEDBACK]);
    });

    it('returns exactly one generic item for unrecognized output', () => {
        expect(parseFeedback('random text\nnothing to see here')).toEqual(['No actionable feedback detected.']);
    });

    it('names the missing identifier and adds a targeted import hint', () => {
        expect(parseFeedback('unknown identifier: add_succ')).toEqual([
            'Import or define missing identifier: add_succ',
            'Hint: add_succ is Nat.add_succ (import Mathlib.Init.Data.Nat.Basic); n + succ m = succ (n + m)',
        ]);
    });

    it('reads Lean 4 file:line:col diagnostics', () => {
        const output = "/tmp/lemmaloop-x/Attempt.lean:4:8: error: unknown identifier 'foo_bar'";
        expect(parseFeedback(output)).toEqual([
            'Import or define missing identifier: foo_bar',
            'Hint: provide a minimal import or an alternative lemma for foo_bar',
        ]);
    });

    it('recommends a fix for type mismatches', () => {
        expect(parseFeedback('Attempt.lean:3:2: error: type mismatch')).toEqual([
            'Check and correct type mismatch: type mismatch',
        ]);
    });

    it('turns a missing module into a missing-import hint', () => {
        const items = parseFeedback("module 'Mathlib.Foo' does not exist - missing import");
        expect(items).toEqual([
            "Add or correct the missing import: module 'Mathlib.Foo' does not exist - missing import",
            'Hint: missing import Mathlib.Foo; check the module path against Mathlib',
        ]);
    });

    it('asks for the sentinel to be replaced', () => {
        expect(parseFeedback("Attempt.lean:2:8: warning: declaration uses 'sorry'")).toEqual([
            'Replace every sorry with a complete proof step',
        ]);
    });

    it('deduplicates repeated lines', () => {
        const output = 'Attempt.lean:3:2: error: syntax error\nAttempt.lean:3:2: error: syntax error';
        expect(parseFeedback(output)).toEqual(['Fix syntax error: syntax error']);
    });

    it('hints only for the first missing identifier', () => {
        const items = parseFeedback("unknown identifier 'add_zero'\nunknown identifier 'zzz_nope'");
        expect(items).toHaveLength(3);
        expect(items[2]).toBe('Hint: add_zero is Nat.add_zero (import Mathlib.Init.Data.Nat.Basic); n + 0 = n');
    });
});

describe('extractIdentifier', () => {
    it('handles quoted and bare forms', () => {
        expect(extractIdentifier("unknown constant 'Nat.foo'")).toBe('Nat.foo');
        expect(extractIdentifier('unknown identifier `bar`')).toBe('bar');
        expect(extractIdentifier('unknown identifier: baz')).toBe('baz');
        expect(extractIdentifier('type mismatch')).toBeNull();
    });
});

describe('classifyRejection', () => {
    it('maps diagnostics to rejection kinds', () => {
        expect(classifyRejection("unknown identifier 'x'")).toBe('unknownIdentifier');
        expect(classifyRejection('type mismatch\n  h\nhas type')).toBe('typeMismatch');
        expect(classifyRejection('could not unify the conclusion')).toBe('applyFailed');
        expect(classifyRejection('assumption tactic failed')).toBe('assumptionFailed');
        expect(classifyRejection('linarith failed to find a contradiction')).toBe('tacticFailed');
        expect(classifyRejection('unsolved goals')).toBe('tacticFailed');
        expect(classifyRejection('something odd')).toBe('other');
    });
});
