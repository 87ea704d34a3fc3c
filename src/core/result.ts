// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Result type
// Every stage boundary returns one of these instead of throwing.
// ─────────────────────────────────────────────────────────────

export type Result<T, E> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/** Message of a thrown value, whatever it was. */
export function errorMessage(e: unknown): string {
    if (e instanceof Error) return e.message;
    if (typeof e === 'string') return e;
    try {
        return JSON.stringify(e) ?? String(e);
    } catch {
        return String(e);
    }
}
