// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Knowledge Store (read side)
// Curated axioms and proof strategies per problem domain, used
// to enrich the "complete the proof" re-prompt.
// ─────────────────────────────────────────────────────────────

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { createLogger } from '../core/log';
import { errorMessage } from '../core/result';

const log = createLogger('knowledge');

const DomainKnowledgeSchema = z.object({
    axioms: z.array(z.string()).default([]),
    strategies: z.array(z.string()).default([]),
});

export const KnowledgeDocumentSchema = z.record(DomainKnowledgeSchema);

export type DomainKnowledge = z.infer<typeof DomainKnowledgeSchema>;

export class KnowledgeStore {
    private constructor(private readonly domains: Record<string, DomainKnowledge>) { }

    static empty(): KnowledgeStore {
        return new KnowledgeStore({});
    }

    static fromDocument(doc: unknown): KnowledgeStore {
        const parsed = KnowledgeDocumentSchema.safeParse(doc);
        if (!parsed.success) {
            log.warn(`ignoring malformed knowledge document: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
            return KnowledgeStore.empty();
        }
        return new KnowledgeStore(parsed.data);
    }

    /** Missing or unreadable files yield an empty store. */
    static async load(path?: string): Promise<KnowledgeStore> {
        if (!path) return KnowledgeStore.empty();
        try {
            return KnowledgeStore.fromDocument(JSON.parse(await readFile(path, 'utf-8')));
        } catch (e: unknown) {
            log.warn(`knowledge store unavailable (${path}): ${errorMessage(e)}`);
            return KnowledgeStore.empty();
        }
    }

    domainsKnown(): string[] {
        return Object.keys(this.domains);
    }

    /** Axioms first, then strategies, for the closest matching domain. */
    hintsFor(domain: string | undefined, limit = 6): string[] {
        if (!domain) return [];
        const entry = this.lookup(domain);
        if (!entry) return [];
        return [
            ...entry.axioms.map(a => `Axiom: ${a}`),
            ...entry.strategies.map(s => `Strategy: ${s}`),
        ].slice(0, limit);
    }

    private lookup(domain: string): DomainKnowledge | undefined {
        if (this.domains[domain]) return this.domains[domain];
        const d = domain.toLowerCase();
        const key = Object.keys(this.domains).find(k => k.toLowerCase() === d)
            ?? Object.keys(this.domains).find(k => d.includes(k.toLowerCase()) || k.toLowerCase().includes(d));
        return key === undefined ? undefined : this.domains[key];
    }
}
