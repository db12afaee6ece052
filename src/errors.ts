// src/errors.ts
// Error types reported through `onError` hooks. None of them is ever thrown to a caller.

export type LogSinkErrorCode = 'open' | 'rotate' | 'write' | 'read' | 'close';

/** An I/O failure inside a file sink. The write that hit it was dropped. */
export class LogSinkError extends Error {
    readonly code: LogSinkErrorCode;
    readonly path: string;

    constructor(code: LogSinkErrorCode, path: string, cause: unknown) {
        super(`${code} failed for ${path}: ${describeCause(cause)}`, { cause });
        this.name = 'LogSinkError';
        this.code = code;
        this.path = path;
    }
}

/** The live-scope counter was asked to go below zero. */
export class ScopeDepthError extends Error {
    readonly label: string;

    constructor(label: string) {
        super(`scope depth underflow while ending "${label}"`);
        this.name = 'ScopeDepthError';
        this.label = label;
    }
}

function describeCause(cause: unknown): string {
    if (cause instanceof Error) return cause.message;
    return typeof cause === 'string' ? cause : String(cause);
}

/**
 * Wrap a user hook so that it can never throw back into the logging path.
 * A missing hook becomes a no-op.
 */
export function guardHandler<E = LogSinkError | ScopeDepthError>(onError?: (err: E) => void): (err: E) => void {
    if (!onError) return () => {};
    return (err) => {
        try {
            onError(err);
        } catch {
            // A failing error hook has nowhere left to report to.
        }
    };
}
