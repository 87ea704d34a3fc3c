// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Proof Quality Assessor
// Scores the mathematical substance of a verified proof so that
// a `trivial` or sentinel "success" is not read as a result.
// ─────────────────────────────────────────────────────────────

import { containsSorry, goalOf, tacticLines } from '../core/lean-syntax';
import type { QualityScore, QualitySignals, SubstanceCategory } from '../core/types';

// ── Tactic patterns ─────────────────────────────────────────

const CASE_SPLIT_RE = /\b(?:by_cases|cases|split_ifs)\b/;
const ALGEBRAIC_RE = /\b(?:ring_nf|ring|field_simp)\b/;
const ARITHMETIC_RE = /\b(?:norm_num|omega|n?linarith|positivity|decide)\b/;
const EXISTENTIAL_RE = /\b(?:use|exists|obtain|rcases)\b|\brefine\s*⟨/;

const MEANINGFUL: ReadonlyArray<[string, RegExp]> = [
    ['induction', /\binduction\b/],
    ['case-split', CASE_SPLIT_RE],
    ['algebraic-normalization', ALGEBRAIC_RE],
    ['rewrite', /\brw\s*\[/],
    ['intermediate-goal', /\b(?:have|show)\b[^\n]*:/],
    ['calc', /\bcalc\b/],
    ['named-theorem', /\b(?:apply|exact)\s+(?:[A-Z][\w']*\.[\w.']+|[a-z][\w']*_[\w.']+)/],
    ['existential-witness', EXISTENTIAL_RE],
    ['hypothesis-application', /\b(?:exact|apply)\s+h[\w']*(?![\w.])/],
];

const PATTERN_WEIGHT = 0.15;
const PATTERN_CAP = 0.45;

// ── Signals ─────────────────────────────────────────────────

const FIRST_RE = /(^\s*|=>\s*|;\s*|·\s*)first\b.*$/;

/**
 * The proof without its `first | … | …` combinators. Which alternative
 * closed the goal is unknown, so none of them counts as reasoning.
 */
export function creditedProof(proof: string): string {
    const kept: string[] = [];
    let blockIndent = -1;
    for (const line of proof.split('\n')) {
        const indent = line.length - line.trimStart().length;
        // continuation lines of a multi-line `first`
        if (blockIndent >= 0 && line.trim().startsWith('|') && indent > blockIndent) continue;
        blockIndent = -1;

        const m = FIRST_RE.exec(line);
        if (!m) {
            kept.push(line);
            continue;
        }
        blockIndent = indent;
        const before = line.slice(0, m.index + m[1].length).trimEnd();
        if (before.trim()) kept.push(before);
    }
    return kept.join('\n');
}

export function proofSignals(proof: string): QualitySignals {
    const credited = creditedProof(proof);
    const lines = tacticLines(credited);
    return {
        hasSentinel: containsSorry(proof),
        isTrivialOnly: lines.length === 0 || (lines.length === 1 && lines[0] === 'trivial'),
        usesAlternatives: credited !== proof,
        meaningfulPatterns: MEANINGFUL.filter(([, re]) => re.test(credited)).map(([id]) => id),
        lineCount: credited.split('\n').filter(l => l.trim()).length,
        isAlgebraic: ALGEBRAIC_RE.test(credited),
        isArithmetic: ARITHMETIC_RE.test(credited),
        hasCaseSplit: CASE_SPLIT_RE.test(credited),
        hasExistentialWitness: EXISTENTIAL_RE.test(credited),
    };
}

const CLOSED_NUMERAL_EQ_RE = /^[\d\s+*^()-]+=[\d\s+*^()-]+$/;

/** `trivial` is a fair proof when the goal is `True`, `x = x`, or a closed numeral equation. */
export function isTrivialPlausible(statement: string): boolean {
    const goal = (goalOf(statement) || statement).trim();
    if (goal === 'True') return true;
    const sides = goal.split(/(?<![:<>!≠])=(?!=)/);
    if (sides.length === 2 && sides[0].trim() !== '' && sides[0].trim() === sides[1].trim()) return true;
    return CLOSED_NUMERAL_EQ_RE.test(goal);
}

type DomainKind = 'complexity' | 'arithmetic' | 'general';

function domainKind(domain: string, statement: string): DomainKind {
    const d = domain.toLowerCase();
    if (/complexity/.test(d) || /\bp\s*vs\.?\s*np\b/i.test(statement)) return 'complexity';
    if (/parit|arith|number|even|odd/.test(d)) return 'arithmetic';
    return 'general';
}

// ── Scoring ─────────────────────────────────────────────────

export function assessProofQuality(proof: string, statement: string, domain = ''): QualityScore {
    const signals = proofSignals(proof);

    if (signals.hasSentinel) {
        return {
            score: 0,
            isMeaningful: false,
            isPlaceholder: true,
            substanceCategory: 'placeholder',
            explanation: "Contains 'sorry': a placeholder, not a proof",
            signals,
        };
    }

    let score: number;
    if (signals.isTrivialOnly) score = isTrivialPlausible(statement) ? 0.4 : 0.2;
    else score = 0.3;

    score += Math.min(PATTERN_WEIGHT * signals.meaningfulPatterns.length, PATTERN_CAP);

    if (signals.isAlgebraic) score += 0.2;
    if (signals.isArithmetic) score += 0.2;
    if (signals.hasCaseSplit) score += 0.3;
    if (signals.hasExistentialWitness) score += 0.25;
    if (signals.lineCount > 3) score += 0.1;
    if (signals.lineCount > 6) score += 0.1;

    switch (domainKind(domain, statement)) {
        case 'complexity':
            if (signals.isTrivialOnly) score -= 0.3;
            if (signals.hasCaseSplit) score += 0.2;
            break;
        case 'arithmetic':
            if (signals.isArithmetic) score += 0.1;
            break;
        case 'general':
            break;
    }

    score = Math.round(Math.min(1, Math.max(0, score)) * 1000) / 1000;

    return {
        score,
        isMeaningful: score > 0.5,
        isPlaceholder: score < 0.3,
        substanceCategory: substanceCategory(signals),
        explanation: explain(signals, score),
        signals,
    };
}

function substanceCategory(s: QualitySignals): SubstanceCategory {
    if (s.hasSentinel) return 'placeholder';
    if (s.hasCaseSplit) return 'logical_reasoning';
    if (s.hasExistentialWitness) return 'proof_construction';
    if (s.isAlgebraic) return 'algebraic_manipulation';
    if (s.isArithmetic) return 'computational_verification';
    if (s.isTrivialOnly) return 'trivial_proof';
    return 'minimal_reasoning';
}

function explain(s: QualitySignals, score: number): string {
    if (score >= 0.8) return 'High-quality proof with substantial mathematical reasoning';
    if (score >= 0.6) return 'Good proof with meaningful mathematical content';
    if (score >= 0.4) return 'Valid proof using relatively simple techniques';
    if (s.usesAlternatives && s.isTrivialOnly) return 'Closed by a `first | …` block; the closing tactic is unknown';
    if (s.isTrivialOnly) return "Uses only 'trivial'; likely too simple for this statement";
    if (s.isArithmetic) return 'Computational verification, valid for arithmetic';
    return 'Low mathematical substance';
}

// ── Session reports ─────────────────────────────────────────

export interface AssessedResult {
    success: boolean;
    quality?: QualityScore;
}

export type QualityReport =
    | { status: 'no_proofs'; summary: string }
    | { status: 'no_quality_data'; summary: string }
    | {
        status: 'complete';
        totalAttempts: number;
        successfulAttempts: number;
        averageQuality: number;
        maxQuality: number;
        meaningfulProofs: number;
        substanceDistribution: Partial<Record<SubstanceCategory, number>>;
        summary: string;
    };

export function generateQualityReport(results: readonly AssessedResult[]): QualityReport {
    if (results.length === 0) return { status: 'no_proofs', summary: 'No proof attempts found' };

    const successful = results.filter(r => r.success);
    const scored: QualityScore[] = [];
    for (const r of successful) {
        if (r.quality) scored.push(r.quality);
    }
    if (scored.length === 0) {
        return {
            status: 'no_quality_data',
            summary: `${successful.length}/${results.length} proofs succeeded but none were assessed`,
        };
    }

    const scores = scored.map(q => q.score);
    const average = scores.reduce((a, b) => a + b, 0) / scores.length;
    const meaningful = scored.filter(q => q.isMeaningful).length;
    const distribution: Partial<Record<SubstanceCategory, number>> = {};
    for (const q of scored) {
        distribution[q.substanceCategory] = (distribution[q.substanceCategory] ?? 0) + 1;
    }

    return {
        status: 'complete',
        totalAttempts: results.length,
        successfulAttempts: successful.length,
        averageQuality: average,
        maxQuality: Math.max(...scores),
        meaningfulProofs: meaningful,
        substanceDistribution: distribution,
        summary: summarize(average, meaningful, results.length),
    };
}

function summarize(average: number, meaningful: number, total: number): string {
    const quality = average >= 0.7 ? 'high-quality'
        : average >= 0.5 ? 'moderate-quality'
            : average >= 0.3 ? 'basic-quality'
                : 'low-quality';
    const ratio = meaningful / total;
    const substance = ratio >= 0.5 ? 'Most proofs show meaningful mathematical reasoning'
        : ratio >= 0.3 ? 'Some proofs demonstrate mathematical substance'
            : 'Few proofs achieve meaningful mathematical content';
    return `Generated ${quality} proofs (avg: ${average.toFixed(1)}). ${substance}.`;
}
