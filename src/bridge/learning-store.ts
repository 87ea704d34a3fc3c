// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Learning Store
// Persisted tactic statistics and proof patterns. One JSON
// document, loaded once and rewritten after every learning event.
// ─────────────────────────────────────────────────────────────

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { tacticsUsed } from '../core/lean-syntax';
import { createLogger } from '../core/log';
import { errorMessage } from '../core/result';
import type { RejectionKind, TacticStatistic } from '../core/types';

const log = createLogger('learning');

// ── Document schema ─────────────────────────────────────────

const RejectionSchema = z.enum(['unknownIdentifier', 'typeMismatch', 'tacticFailed', 'assumptionFailed', 'applyFailed', 'other']);

const LearnedTacticSchema = z.object({
    name: z.string(),
    successCount: z.number().int().nonnegative().default(0),
    failureCount: z.number().int().nonnegative().default(0),
});

const SuccessPatternSchema = z.object({
    theoremType: z.string(),
    tactics: z.array(z.string()),
    contextKeywords: z.array(z.string()).default([]),
    timestamp: z.string(),
});

const FailurePatternSchema = z.object({
    theoremType: z.string(),
    tactics: z.array(z.string()),
    rejection: RejectionSchema,
    message: z.string().default(''),
    timestamp: z.string(),
});

export const LearningDocumentSchema = z.object({
    learnedTactics: z.array(LearnedTacticSchema).default([]),
    successfulPatterns: z.array(SuccessPatternSchema).default([]),
    failurePatterns: z.array(FailurePatternSchema).default([]),
});

export type LearningDocument = z.infer<typeof LearningDocumentSchema>;
export type SuccessPattern = z.infer<typeof SuccessPatternSchema>;
export type FailurePattern = z.infer<typeof FailurePatternSchema>;

export class LearningStoreError extends Error {
    constructor(readonly path: string, message: string) {
        super(`Learning store ${path}: ${message}`);
        this.name = 'LearningStoreError';
    }
}

// ── Classification ──────────────────────────────────────────

export function classifyTheorem(theorem: string): string {
    if (/\bP\s*(?:=|≠|!=)\s*NP\b/.test(theorem)) return 'complexity_equality';
    if (/polynomial/i.test(theorem)) return 'polynomial_time';
    if (/\bNP\b/.test(theorem)) return 'complexity_class';
    if (/\bSAT\b/.test(theorem)) return 'satisfiability';
    if (/\b(?:Even|Odd)\b/.test(theorem)) return 'parity';
    if (/\bPrime\b|∣|\bdvd\b/.test(theorem)) return 'divisibility';
    if (/\bsucc\b|∀\s*n\b/.test(theorem)) return 'induction';
    return 'general';
}

const CONTEXT_TERMS = [
    'polynomial', 'exponential', 'reduction', 'complete', 'diagonalization',
    'oracle', 'circuit', 'turing machine', 'complexity', 'algorithm',
    'even', 'odd', 'prime', 'sum', 'product', 'induction', 'natural', 'integer',
];

export function extractKeywords(context: readonly string[]): string[] {
    const text = context.join(' ').toLowerCase();
    return CONTEXT_TERMS.filter(term => new RegExp(`\\b${term}`).test(text));
}

// ── Store ───────────────────────────────────────────────────

export interface LearningEvent {
    success: boolean;
    statement: string;
    proof: string;
    /** Informal statement, feedback and anything else that framed the attempt. */
    context: readonly string[];
    rejection?: RejectionKind;
    message?: string;
}

export interface ProofStatistics {
    totalPatternsLearned: number;
    totalFailuresRecorded: number;
    learnedTactics: number;
    mostSuccessfulTactics: TacticStatistic[];
    theoremTypesProven: string[];
    rejectionsByKind: Partial<Record<RejectionKind, number>>;
}

export class LearningStore {
    private constructor(
        /** `null` keeps the store in memory only. */
        readonly path: string | null,
        private doc: LearningDocument,
        private readonly clock: () => Date = () => new Date(),
    ) { }

    static inMemory(doc?: Partial<LearningDocument>, clock?: () => Date): LearningStore {
        return new LearningStore(null, LearningDocumentSchema.parse(doc ?? {}), clock);
    }

    /** Absent file → empty store. Unreadable or malformed content throws. */
    static async load(path: string, clock?: () => Date): Promise<LearningStore> {
        let text: string;
        try {
            text = await readFile(path, 'utf-8');
        } catch (e: unknown) {
            if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
                log.debug(`no learning store at ${path}; starting empty`);
                return new LearningStore(path, LearningDocumentSchema.parse({}), clock);
            }
            throw new LearningStoreError(path, errorMessage(e));
        }

        let json: unknown;
        try {
            json = JSON.parse(text);
        } catch (e: unknown) {
            throw new LearningStoreError(path, `invalid JSON (${errorMessage(e)})`);
        }
        const parsed = LearningDocumentSchema.safeParse(json);
        if (!parsed.success) {
            throw new LearningStoreError(path, parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '));
        }
        return new LearningStore(path, parsed.data, clock);
    }

    snapshot(): LearningDocument {
        return structuredClone(this.doc);
    }

    tacticStatistics(): TacticStatistic[] {
        return this.doc.learnedTactics.map(t => ({ ...t }));
    }

    /**
     * `candidates` reordered by learned success ratio, best first.
     * Tactics without history keep their relative order at a neutral prior.
     */
    rankTactics(candidates: readonly string[]): string[] {
        const ratio = (name: string) => {
            const t = this.doc.learnedTactics.find(x => x.name === name);
            if (!t) return 0.5;
            return (t.successCount + 1) / (t.successCount + t.failureCount + 2);
        };
        return candidates
            .map((name, index) => ({ name, index, score: ratio(name) }))
            .sort((a, b) => b.score - a.score || a.index - b.index)
            .map(x => x.name);
    }

    async record(event: LearningEvent): Promise<void> {
        const tactics = [...new Set(tacticsUsed(event.proof))];
        const theoremType = classifyTheorem(event.statement);
        const timestamp = this.clock().toISOString();

        for (const name of tactics) {
            let entry = this.doc.learnedTactics.find(t => t.name === name);
            if (!entry) {
                entry = { name, successCount: 0, failureCount: 0 };
                this.doc.learnedTactics.push(entry);
            }
            if (event.success) entry.successCount++;
            else entry.failureCount++;
        }

        if (event.success) {
            this.doc.successfulPatterns.push({
                theoremType, tactics, contextKeywords: extractKeywords(event.context), timestamp,
            });
        } else {
            this.doc.failurePatterns.push({
                theoremType, tactics, rejection: event.rejection ?? 'other', message: event.message ?? '', timestamp,
            });
        }

        await this.save();
    }

    async save(): Promise<void> {
        if (this.path === null) return;
        await mkdir(dirname(this.path), { recursive: true });
        await writeFile(this.path, `${JSON.stringify(this.doc, null, 2)}\n`, 'utf-8');
    }

    getProofStatistics(): ProofStatistics {
        const rejectionsByKind: Partial<Record<RejectionKind, number>> = {};
        for (const f of this.doc.failurePatterns) {
            rejectionsByKind[f.rejection] = (rejectionsByKind[f.rejection] ?? 0) + 1;
        }
        return {
            totalPatternsLearned: this.doc.successfulPatterns.length,
            totalFailuresRecorded: this.doc.failurePatterns.length,
            learnedTactics: this.doc.learnedTactics.length,
            mostSuccessfulTactics: [...this.doc.learnedTactics]
                .sort((a, b) => b.successCount - a.successCount)
                .slice(0, 5)
                .map(t => ({ ...t })),
            theoremTypesProven: [...new Set(this.doc.successfulPatterns.map(p => p.theoremType))],
            rejectionsByKind,
        };
    }
}
