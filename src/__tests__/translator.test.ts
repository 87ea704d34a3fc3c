// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Statement Translator Tests
// Collaborator responses are scripted; no model is called.
// ─────────────────────────────────────────────────────────────

import { describe, it, expect, vi } from 'vitest';
import { err, ok } from '../core/result';
import type { GenerationResult, TextGenerator } from '../engine/llm';
import type { CollaboratorError } from '../engine/model-errors';
import { INDUCTION_SCAFFOLD } from '../engine/prompts';
import {
    formatForMemory, postprocessProof, postprocessTheorem, slugify, StatementTranslator, templateTranslation,
} from '../engine/translator';

function scripted(...replies: GenerationResult[]) {
    const generate = vi.fn(async (_prompt: string, _maxTokens: number): Promise<GenerationResult> => ok(null));
    for (const r of replies) generate.mockResolvedValueOnce(r);
    const generator: TextGenerator = { name: 'scripted', generate };
    return { generator, generate };
}

const QUOTA: CollaboratorError = { kind: 'quota', message: '429 rate limit exceeded', status: 429 };
const DOWN: CollaboratorError = { kind: 'unavailable', message: 'socket hang up' };

// ── Template mode ───────────────────────────────────────────

describe('StatementTranslator without a collaborator', () => {
    const translator = new StatementTranslator(null);

    it('maps the parity-sum statement to its canonical theorem', async () => {
        const result = await translator.translate({ text: 'The sum of two even numbers is even' });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value).toEqual({
            formal: {
                name: 'even_sum',
                declaration: 'theorem even_sum (a b : ℤ) (ha : Even a) (hb : Even b) : Even (a + b) := by sorry',
            },
            draftProof: 'by\n  obtain ⟨k, rfl⟩ := ha\n  obtain ⟨l, rfl⟩ := hb\n  use k + l\n  ring',
            definitions: null,
            source: 'template',
        });
    });

    it('distinguishes even+odd sums and odd·even products', () => {
        expect(templateTranslation('The sum of an even and an odd number is odd').declaration)
            .toBe('theorem sum_even_odd_is_odd (n m : ℤ) (hn : Even n) (hm : Odd m) : Odd (n + m) := by sorry');
        expect(templateTranslation('The product of an odd and an even integer is even').proof)
            .toBe('by\n  obtain ⟨k, rfl⟩ := hn\n  obtain ⟨l, rfl⟩ := hm\n  use (2 * k + 1) * l\n  ring');
        expect(templateTranslation('P is not equal to NP').declaration).toBe('theorem p_vs_np : True := by sorry');
    });

    it('falls back to a True placeholder', async () => {
        const result = await translator.translate({ text: 'Every dragon breathes fire' });
        expect(result.ok && result.value.formal).toEqual({
            name: 'every_dragon_breathes_fire',
            declaration: 'theorem every_dragon_breathes_fire : True := by sorry',
        });
        expect(result.ok && result.value.draftProof).toBe('by trivial');
    });

    it('builds identifiers that start with a letter', () => {
        expect(slugify('2 + 2 = 4?')).toBe('stmt_2_2_4');
        expect(slugify('')).toBe('statement');
    });
});

// ── Collaborator mode ───────────────────────────────────────

describe('StatementTranslator with a collaborator', () => {
    it('isolates declaration and proof from fenced, chatty replies', async () => {
        const { generator } = scripted(
            ok('- Variables: n : ℕ\n- Goal: n + 0 = n'),
            ok('```lean\ntheorem add_zero_right (n : ℕ) : n + 0 = n := by sorry\n```'),
            ok('Here is the proof:\n```lean\nby\n  simp\n```'),
        );
        const result = await new StatementTranslator(generator).translate({ text: 'Adding zero changes nothing' });
        expect(result.ok).toBe(true);
        if (!result.ok) return;
        expect(result.value.formal.declaration).toBe('theorem add_zero_right (n : ℕ) : n + 0 = n := by sorry');
        expect(result.value.draftProof).toBe('by\n  simp');
        expect(result.value.definitions).toBe('- Variables: n : ℕ\n- Goal: n + 0 = n');
        expect(result.value.source).toBe('model');
    });

    it('appends feedback to the proof prompt', async () => {
        const { generator, generate } = scripted(
            ok('notes'),
            ok('theorem t (n : ℕ) : n = n := by sorry'),
            ok('by rfl'),
        );
        await new StatementTranslator(generator).translate({ text: 'n equals n' }, ['Fix syntax error: x']);
        expect(generate).toHaveBeenCalledTimes(3);
        expect(generate.mock.calls[2][0]).toContain('Previous Lean errors to fix:\n- Fix syntax error: x');
        expect(generate.mock.calls[1][1]).toBe(150);
    });

    it('aborts on the first quota error', async () => {
        const { generator, generate } = scripted(err(QUOTA));
        const result = await new StatementTranslator(generator).translate({ text: 'The sum of two even numbers is even' });
        expect(result).toEqual(err({ kind: 'CollaboratorQuotaExceeded', message: '429 rate limit exceeded' }));
        expect(generate).toHaveBeenCalledTimes(1);
    });

    it('falls back to the template when the collaborator is down', async () => {
        const { generator } = scripted(err(DOWN), err(DOWN), err(DOWN));
        const result = await new StatementTranslator(generator).translate({ text: 'The sum of two even numbers is even' });
        expect(result.ok && result.value.source).toBe('template');
        expect(result.ok && result.value.formal.name).toBe('even_sum');
        expect(result.ok && result.value.draftProof).toContain('use k + l');
    });

    it('replaces a declaration without a goal by the canonical signature', async () => {
        const { generator } = scripted(
            ok(null),
            ok('theorem even_sum (a b : ℤ) := by sorry'),
            ok('by\n  omega'),
        );
        const result = await new StatementTranslator(generator).translate({ text: 'The sum of two even numbers is even' });
        expect(result.ok && result.value.formal.declaration)
            .toBe('theorem even_sum (a b : ℤ) (ha : Even a) (hb : Even b) : Even (a + b) := by sorry');
        expect(result.ok && result.value.draftProof).toBe('by\n  omega');
    });

    it('reports a nameless declaration as untranslatable', async () => {
        const { generator } = scripted(ok(null), ok('theorem (x : ℕ) : x = x := by sorry'), ok('by rfl'));
        const result = await new StatementTranslator(generator).translate({ text: 'x equals x' });
        expect(result.ok).toBe(false);
        expect(!result.ok && result.error.kind).toBe('UntranslatableStatement');
    });

    it('requests a completed proof with the scaffold', async () => {
        const { generator, generate } = scripted(ok('by\n  induction n with\n  | zero => rfl\n  | succ k ih => simp [ih]'));
        const result = await new StatementTranslator(generator).complete({
            informal: 'For all natural numbers n, 0 + n = n',
            statement: { name: 'zero_add_left', declaration: 'theorem zero_add_left (n : ℕ) : 0 + n = n := by sorry' },
            draftProof: 'by sorry',
            priorAttempts: [],
            feedback: [],
            hints: ['Strategy: induct on n'],
            scaffold: INDUCTION_SCAFFOLD,
        });
        expect(result).toEqual(ok('by\n  induction n with\n  | zero => rfl\n  | succ k ih => simp [ih]'));
        const prompt = generate.mock.calls[0][0];
        expect(prompt).toContain('Follow this worked example:');
        expect(prompt).toContain('- Strategy: induct on n');
    });

    it('completes nothing without a collaborator', async () => {
        const result = await new StatementTranslator(null).complete({
            informal: 'x',
            statement: { name: 't', declaration: 'theorem t : True := by sorry' },
            draftProof: 'by trivial',
            priorAttempts: [],
            feedback: [],
            hints: [],
        });
        expect(result).toEqual(ok(null));
    });
});

// ── Post-processing ─────────────────────────────────────────

describe('postprocessTheorem', () => {
    it('joins a declaration split across lines', () => {
        const raw = 'Sure!\ntheorem t (a b : ℕ)\n    (h : a = b) : b = a := by\n  sorry';
        expect(postprocessTheorem(raw, 'symmetry')).toBe('theorem t (a b : ℕ) (h : a = b) : b = a := by sorry');
    });

    it('returns null without a declaration', () => {
        expect(postprocessTheorem('I cannot do that.', 'anything')).toBeNull();
    });
});

describe('postprocessProof', () => {
    it('keeps the body of an echoed theorem', () => {
        expect(postprocessProof('theorem t : True := by trivial')).toBe('by trivial');
    });

    it('collects tactic lines when there is no `by`', () => {
        expect(postprocessProof('Your proof:\nintro x\nsimp\nThat closes it.')).toBe('intro x\nsimp');
    });
});

describe('formatForMemory', () => {
    it('builds a proof record', () => {
        const record = formatForMemory(
            'theorem t : True := by sorry',
            'a trivial truth',
            'by\n  -- note\n  trivial',
            'verified',
            new Date('2026-01-02T03:04:05.000Z'),
        );
        expect(record).toEqual({
            theoremName: 't',
            leanStatement: 'theorem t : True := by sorry',
            informalStatement: 'a trivial truth',
            proofAttempt: 'by\n  -- note\n  trivial',
            proofSteps: ['trivial'],
            verificationStatus: 'verified',
            timestamp: '2026-01-02T03:04:05.000Z',
        });
    });
});
