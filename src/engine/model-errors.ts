// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Collaborator error classification
// Maps raw provider / network messages to a small set of kinds.
// Quota exhaustion is the one kind the refinement loop must
// never retry.
// ─────────────────────────────────────────────────────────────

export type CollaboratorErrorKind = 'quota' | 'auth' | 'timeout' | 'unavailable';

export interface CollaboratorError {
    kind: CollaboratorErrorKind;
    message: string;
    status?: number;
}

const QUOTA_RE = /quota|rate[ _-]?limit|too many requests|resource[ _-]?exhausted|insufficient_quota|exceeded your current|billing|credit balance/;
const AUTH_RE = /api key not valid|invalid api key|incorrect api key|no api key provided|api_key_invalid|unauthorized|forbidden/;
const TIMEOUT_RE = /timeout|timed out|aborterror|aborted|deadline exceeded/;

export function isQuotaMessage(message: string): boolean {
    return QUOTA_RE.test(message.toLowerCase());
}

interface ErrorLike {
    message?: unknown;
    error?: unknown;
    status?: unknown;
    statusCode?: unknown;
    code?: unknown;
    name?: unknown;
}

/**
 * Accepts Error objects, HTTP-like error bodies, or plain strings.
 * `status` wins over message text when both are present.
 */
export function classifyCollaboratorError(errLike: unknown, status?: number): CollaboratorError {
    let message = '';
    let code: unknown;

    if (typeof errLike === 'string') {
        message = errLike;
    } else if (errLike !== null && typeof errLike === 'object') {
        const e: ErrorLike = errLike;
        code = e.code;
        if (status === undefined) {
            if (typeof e.status === 'number') status = e.status;
            else if (typeof e.statusCode === 'number') status = e.statusCode;
        }
        if (typeof e.message === 'string') message = e.message;
        else if (typeof e.error === 'string') message = e.error;
        else message = String(errLike);
        if (typeof e.name === 'string' && e.name === 'TimeoutError') message = `timeout: ${message}`;
    } else {
        message = String(errLike);
    }

    const text = message.toLowerCase();

    if (status === 429 || QUOTA_RE.test(text)) return { kind: 'quota', message, status };
    if (status === 401 || status === 403 || AUTH_RE.test(text)) return { kind: 'auth', message, status };
    if (status === 408 || code === 'ETIMEDOUT' || code === 'ECONNABORTED' || TIMEOUT_RE.test(text)) {
        return { kind: 'timeout', message, status };
    }
    return { kind: 'unavailable', message, status };
}
