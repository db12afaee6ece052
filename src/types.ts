// src/types.ts
// Shared types for the message log and the scope tracer.

import type { LogSinkError, ScopeDepthError } from './errors';

/** Clock source in epoch milliseconds. Injected in tests. */
export type Clock = () => number;

/**
 * Console output target.
 * Receives a display-ready line without a trailing newline.
 */
export interface ConsoleSink {
    write(line: string): void;
}

/** Anything a finished line can be appended to. */
export interface LineSink {
    writeLine(text: string): void;
    close(): void;
}

/** Receives failures the logging layer absorbed instead of throwing. */
export type SinkErrorHandler = (err: LogSinkError | ScopeDepthError) => void;

/**
 * What the console echo of a committed message contains.
 * - 'message' (default): the bare accumulated message.
 * - 'line': the full `[timestamp] tid=... "message"` line.
 */
export type ConsoleFormat = 'message' | 'line';

/** Phase text of a scope event. `mark()` supplies free text instead. */
export type ScopePhase = 'start...' | 'end!';

/** Where a traced scope lives in the caller's source. */
export interface ScopeSite {
    /** Function name; becomes the label, or its prefix when `name` is set. */
    func: string;
    /** Optional custom region name, printed as `func:name`. */
    name?: string;
    file: string;
    /** Kept on the tracer; not printed. */
    line?: number;
}
