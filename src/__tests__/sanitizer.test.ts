// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Proof Sanitizer Tests
// ─────────────────────────────────────────────────────────────

import { describe, it, expect } from 'vitest';
import { inferImports, sanitizeProof } from '../engine/sanitizer';

describe('sanitizeProof', () => {
    it('adds a missing `by` and indents the tactics', () => {
        const result = sanitizeProof('intro x\nsimp');
        expect(result).toEqual({ proof: 'by\n  intro x\n  simp', changed: true, refused: false });
    });

    it('normalizes line endings, tabs and trailing spaces', () => {
        expect(sanitizeProof('by\r\n\tsimp   \r\n').proof).toBe('by\n  simp');
    });

    it('turns ASCII angle brackets after obtain into anonymous constructors', () => {
        expect(sanitizeProof('obtain <k, hk> := h\nexact hk').proof).toBe('by\n  obtain ⟨k, hk⟩ := h\n  exact hk');
    });

    it('turns ASCII angle brackets after rcases … with', () => {
        expect(sanitizeProof('by\n  rcases h with <x, hx>\n  exact hx').proof).toBe('by\n  rcases h with ⟨x, hx⟩\n  exact hx');
    });

    it('unifies CJK angle brackets', () => {
        expect(sanitizeProof('by\n  obtain 〈k, rfl〉 := ha\n  ring').proof).toBe('by\n  obtain ⟨k, rfl⟩ := ha\n  ring');
    });

    it('rewrites a Lean 3 begin/end block', () => {
        const lean3 = 'begin\n  cases h with k hk,\n  rw nat.succ_eq_add_one,\n  exact hk\nend';
        expect(sanitizeProof(lean3).proof).toBe('by\n  obtain ⟨k, hk⟩ := h\n  rw Nat.succ_eq_add_one\n  exact hk');
    });

    it('strips an echoed copy of the statement', () => {
        const result = sanitizeProof('theorem t : True := by\n  trivial', 'theorem t : True := by sorry');
        expect(result.proof).toBe('by\n  trivial');
    });

    it('keeps an echoed declaration that differs from the statement', () => {
        const text = 'theorem u : 1 = 1 := by rfl';
        expect(sanitizeProof(text, 'theorem t : True := by sorry')).toEqual({ proof: text, changed: false, refused: false });
    });

    it('refuses a rewrite that would drop a sorry', () => {
        const text = 'theorem t (h : sorry = 1) : True := by trivial';
        expect(sanitizeProof(text)).toEqual({ proof: text, changed: false, refused: true });
    });

    it('leaves a clean proof untouched', () => {
        const proof = 'by\n  obtain ⟨k, rfl⟩ := ha\n  ring';
        expect(sanitizeProof(proof)).toEqual({ proof, changed: false, refused: false });
    });

    it('is idempotent', () => {
        const samples = [
            'intro x\nsimp',
            '    intro x\n    simp',
            'by\r\n\tsimp   \r\n',
            'obtain <k, hk> := h\nexact hk',
            'begin\n  cases h with k hk,\n  exact hk\nend',
            'theorem t (h : sorry = 1) : True := by trivial',
            'sorry',
            '',
        ];
        for (const x of samples) {
            const once = sanitizeProof(x).proof;
            expect(sanitizeProof(once).proof).toBe(once);
        }
    });
});

describe('inferImports', () => {
    it('scans statement and proof together', () => {
        expect(inferImports('theorem t (n : ℕ) : n + 0 = n', 'by\n  simp')).toEqual([
            'import Mathlib.Data.Nat.Basic',
            'import Mathlib.Tactic.Basic',
        ]);
    });
});
