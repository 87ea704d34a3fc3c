// ─────────────────────────────────────────────────────────────
// Lemmaloop  ·  Logging
// Component-tagged console logging with a global threshold.
// ─────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

export function isLogLevel(v: string): v is LogLevel {
    return v in LEVEL_RANK;
}

const fromEnv = (process.env.LOG_LEVEL ?? '').toLowerCase();
let threshold: LogLevel = isLogLevel(fromEnv) ? fromEnv : 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold] && threshold !== 'silent';
}

export function createLogger(component: string): Logger {
    const tag = `[${component}]`;
    return {
        debug: (message, ...details) => { if (enabled('debug')) console.debug(tag, message, ...details); },
        info: (message, ...details) => { if (enabled('info')) console.info(tag, message, ...details); },
        warn: (message, ...details) => { if (enabled('warn')) console.warn(tag, message, ...details); },
        error: (message, ...details) => { if (enabled('error')) console.error(tag, message, ...details); },
    };
}
