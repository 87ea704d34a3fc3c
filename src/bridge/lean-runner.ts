// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Lean 4 Verification Runner
// Writes one attempt to a scratch `.lean` file and compiles it
// with `lean` (or `lake env lean` inside a Lake project).
// Falls back to a keyword heuristic when no Lean is installed.
// ─────────────────────────────────────────────────────────────

import { execFile } from 'child_process';
import { access, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join, resolve } from 'path';
import { promisify } from 'util';
import { containsSorry, mentionsKnownTactic, theoremName } from '../core/lean-syntax';
import { createLogger } from '../core/log';
import { err, errorMessage, ok, type Result } from '../core/result';
import type {
    FormalStatement, LeanDiagnostic, ValidationMode, ValidationResult, VerificationErrorKind,
} from '../core/types';

const log = createLogger('lean');

export interface ExecOutput {
    stdout: string;
    stderr: string;
}

export type ExecFn = (
    file: string,
    args: string[],
    options: { timeout: number; cwd?: string },
) => Promise<ExecOutput>;

/** Shape of the error a rejected `execFile` carries. */
interface ExecError extends Error {
    code?: string | number;
    killed?: boolean;
    signal?: string | null;
    stdout?: string;
    stderr?: string;
}

const isExecError = (v: unknown): v is ExecError => v instanceof Error;

const execFileAsync = promisify(execFile);

const defaultExec: ExecFn = async (file, args, options) => {
    const { stdout, stderr } = await execFileAsync(file, args, {
        timeout: options.timeout,
        cwd: options.cwd,
        encoding: 'utf8',
        maxBuffer: 16 * 1024 * 1024,
    });
    return { stdout, stderr };
};

export interface LeanRunnerOptions {
    /** Explicit `lean` executable; tried before the usual install locations. */
    binary?: string;
    /** Directory searched (with its ancestors) for a lakefile. */
    projectDir?: string;
    timeoutMs?: number;
    lakeTimeoutMs?: number;
    /** Never let the heuristic fallback pass a proof. */
    strict?: boolean;
    exec?: ExecFn;
    /** Parent directory for scratch files; defaults to the OS temp dir. */
    tmpRoot?: string;
}

export interface VerifyRequest {
    statement: FormalStatement;
    proof: string;
    imports: readonly string[];
}

export interface LeanHealth {
    available: boolean;
    binary?: string;
    version?: string;
    /** Lake project root, when one was found. */
    project?: string;
}

// ── Results ─────────────────────────────────────────────────

export function makeValidation(
    fields: Pick<ValidationResult, 'success' | 'mode'> & Partial<ValidationResult>,
): ValidationResult {
    const mode: ValidationMode = fields.mode;
    return Object.freeze({
        errorKind: fields.errorKind !== undefined ? fields.errorKind : defaultErrorKind(fields.success, mode, fields.timedOut),
        success: fields.success,
        rawOutput: fields.rawOutput ?? '',
        rawError: fields.rawError ?? '',
        mode,
        authoritative: fields.authoritative ?? (mode === 'lean' || mode === 'lake'),
        timedOut: fields.timedOut ?? false,
        diagnostics: Object.freeze([...(fields.diagnostics ?? [])]),
        elapsedMs: fields.elapsedMs ?? 0,
    });
}

function defaultErrorKind(success: boolean, mode: ValidationMode, timedOut = false): VerificationErrorKind | null {
    if (success) return null;
    if (timedOut) return 'VerificationTimeout';
    if (mode === 'heuristic') return 'ToolUnavailable';
    return 'VerificationRejected';
}

/**
 * Keyword check used when Lean cannot be run. A sentinel always
 * fails; otherwise any recognized tactic passes unless `strict`.
 */
export function basicProofValidation(proof: string, strict = false, elapsedMs = 0): ValidationResult {
    if (containsSorry(proof)) {
        return makeValidation({
            success: false, mode: 'heuristic', elapsedMs,
            rawError: "declaration uses 'sorry' (Lean unavailable, heuristic check)",
        });
    }
    if (!mentionsKnownTactic(proof)) {
        return makeValidation({
            success: false, mode: 'heuristic', elapsedMs,
            rawError: 'no recognizable tactic in proof (Lean unavailable, heuristic check)',
        });
    }
    if (strict) {
        return makeValidation({
            success: false, mode: 'heuristic', elapsedMs,
            rawError: 'Lean unavailable and strict verification is enabled',
        });
    }
    log.warn('Lean unavailable; accepting proof on a non-authoritative heuristic check');
    return makeValidation({ success: true, mode: 'heuristic', elapsedMs, rawOutput: 'heuristic pass' });
}

// ── Parse Lean output ───────────────────────────────────────

export function parseLeanOutput(text: string): LeanDiagnostic[] {
    const diagnostics: LeanDiagnostic[] = [];
    // file:line:col: severity: message
    const regex = /^[^:\n]+:(\d+):(\d+):\s*(error|warning|information):\s*(.+)/gm;
    let match;
    while ((match = regex.exec(text)) !== null) {
        const severity = match[3];
        diagnostics.push({
            line: parseInt(match[1], 10),
            column: parseInt(match[2], 10),
            message: match[4].trim(),
            severity: severity === 'error' || severity === 'warning' ? severity : 'information',
        });
    }
    return diagnostics;
}

// ── Source assembly ─────────────────────────────────────────

const TRAILING_ASSIGN_RE = /\s*:=\s*(?:by\s+sorry|sorry)?\s*$/;

/** Declaration with its placeholder body replaced by `proof`. */
export function combineStatementAndProof(declaration: string, proof: string): string {
    const head = declaration.trim().replace(TRAILING_ASSIGN_RE, '');
    const body = proof
        .split('\n')
        .map(l => (l.trim() ? `  ${l}` : ''))
        .join('\n');
    return `${head} :=\n${body}`;
}

export function buildLeanSource(statement: FormalStatement, proof: string, imports: readonly string[]): string {
    const name = theoremName(statement.declaration) ?? statement.name;
    const header = imports.length > 0 ? `${imports.join('\n')}\n\n` : '';
    return `${header}-- lemmaloop: ${name}\n${combineStatementAndProof(statement.declaration, proof)}\n`;
}

// ── Runner ──────────────────────────────────────────────────

const LAKEFILES = ['lakefile.lean', 'lakefile.toml'];

async function exists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

/** Nearest directory at or above `start` holding a lakefile. */
export async function findLakeProject(start: string): Promise<string | undefined> {
    let dir = resolve(start);
    for (;;) {
        for (const f of LAKEFILES) {
            if (await exists(join(dir, f))) return dir;
        }
        const parent = dirname(dir);
        if (parent === dir) return undefined;
        dir = parent;
    }
}

export class LeanRunner {
    private readonly exec: ExecFn;
    private readonly timeoutMs: number;
    private readonly lakeTimeoutMs: number;
    private readonly strict: boolean;
    private leanBin?: Promise<string | null>;

    constructor(private readonly options: LeanRunnerOptions = {}) {
        this.exec = options.exec ?? defaultExec;
        this.timeoutMs = options.timeoutMs ?? 15_000;
        this.lakeTimeoutMs = options.lakeTimeoutMs ?? 30_000;
        this.strict = options.strict ?? false;
    }

    /** First candidate answering `--version`, or null. Resolved once per runner. */
    findLean(): Promise<string | null> {
        this.leanBin ??= this.searchCandidates();
        return this.leanBin;
    }

    async checkLeanHealth(): Promise<LeanHealth> {
        const binary = await this.findLean();
        if (!binary) return { available: false };
        const project = this.options.projectDir ? await findLakeProject(this.options.projectDir) : undefined;
        try {
            const { stdout } = await this.exec(binary, ['--version'], { timeout: 5000 });
            return { available: true, binary, version: stdout.trim(), project };
        } catch (e: unknown) {
            log.warn(`lean --version failed: ${errorMessage(e)}`);
            return { available: false, binary, project };
        }
    }

    async verify(req: VerifyRequest): Promise<ValidationResult> {
        const start = performance.now();
        const elapsed = () => Math.round(performance.now() - start);

        const leanBin = await this.findLean();
        if (!leanBin) {
            log.warn('Lean 4 not found; using heuristic validation');
            return basicProofValidation(req.proof, this.strict, elapsed());
        }

        const project = this.options.projectDir ? await findLakeProject(this.options.projectDir) : undefined;
        const mode: ValidationMode = project ? 'lake' : 'lean';
        const timeout = project ? this.lakeTimeoutMs : this.timeoutMs;

        const scratch = await this.writeScratch(buildLeanSource(req.statement, req.proof, req.imports));
        if (!scratch.ok) {
            log.error(`could not write scratch file: ${scratch.error}`);
            return makeValidation({
                success: false, mode, elapsedMs: elapsed(),
                rawError: `could not write scratch file: ${scratch.error}`,
                errorKind: 'ToolUnavailable',
            });
        }
        const { dir, file } = scratch.value;

        try {
            const [cmd, args]: [string, string[]] = project
                ? [lakeBinaryFor(leanBin), ['env', 'lean', file]]
                : [leanBin, [file]];
            log.debug(`running ${cmd} ${args.join(' ')}`);

            const { stdout, stderr } = await this.exec(cmd, args, { timeout, cwd: project });
            const diagnostics = parseLeanOutput(`${stderr}\n${stdout}`);
            return makeValidation({
                success: !diagnostics.some(d => d.severity === 'error'),
                rawOutput: stdout,
                rawError: stderr,
                mode,
                diagnostics,
                elapsedMs: elapsed(),
            });
        } catch (error: unknown) {
            if (!isExecError(error)) {
                return makeValidation({ success: false, mode, rawError: errorMessage(error), elapsedMs: elapsed() });
            }
            if (error.code === 'ENOENT') {
                log.warn(`${mode} executable disappeared; using heuristic validation`);
                return basicProofValidation(req.proof, this.strict, elapsed());
            }
            if (error.killed || error.signal === 'SIGTERM') {
                log.warn(`Lean timed out after ${timeout}ms`);
                return makeValidation({ success: false, mode, rawError: 'timeout', timedOut: true, elapsedMs: elapsed() });
            }

            const stdout = error.stdout ?? '';
            const stderr = error.stderr ?? error.message;
            return makeValidation({
                success: false,
                rawOutput: stdout,
                rawError: stderr,
                mode,
                diagnostics: parseLeanOutput(`${stderr}\n${stdout}`),
                elapsedMs: elapsed(),
            });
        } finally {
            await removeScratch(dir);
        }
    }

    /** Fresh directory holding `Attempt.lean`; removed again if the write fails. */
    private async writeScratch(source: string): Promise<Result<{ dir: string; file: string }, string>> {
        let dir: string | undefined;
        try {
            dir = await mkdtemp(join(this.options.tmpRoot ?? tmpdir(), 'lemmaloop-'));
            const file = join(dir, 'Attempt.lean');
            await writeFile(file, source, 'utf-8');
            return ok({ dir, file });
        } catch (e: unknown) {
            if (dir !== undefined) await removeScratch(dir);
            return err(errorMessage(e));
        }
    }

    private async searchCandidates(): Promise<string | null> {
        const candidates = [
            ...(this.options.binary ? [this.options.binary] : []),
            'lean',
            join(process.env.HOME || '~', '.elan/bin/lean'),
            '/usr/local/bin/lean',
            '/opt/homebrew/bin/lean',
        ];

        for (const candidate of candidates) {
            try {
                await this.exec(candidate, ['--version'], { timeout: 5000 });
                return candidate;
            } catch {
                continue;
            }
        }
        return null;
    }
}

async function removeScratch(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true }).catch((e: unknown) => {
        log.warn(`could not remove ${dir}: ${errorMessage(e)}`);
    });
}

/** `lake` lives next to `lean` in an elan toolchain. */
function lakeBinaryFor(leanBin: string): string {
    return leanBin.includes('/') ? join(dirname(leanBin), 'lake') : 'lake';
}
