// src/message.ts
// Message log: a builder that collects fields into one line and commits it once,
// to the rotating message file and/or the console.

import { getConfig } from './config';
import { LogSinkError, guardHandler } from './errors';
import { RotatingFileSink } from './file';
import { formatMessageLine, formatTimestamp, formatValue, threadTag } from './format';
import { runScoped } from './scoped';
import { selectConsoleSink } from './sinks';
import type { Clock, ConsoleFormat, ConsoleSink, SinkErrorHandler } from './types';

/* --------------------------------- Tokens ---------------------------------- */

/** Stop inserting the separating space before later fields, until `SPACE`. */
export const NO_SPACE: unique symbol = Symbol('message-log.no-space');

/** Insert the separating space again. */
export const SPACE: unique symbol = Symbol('message-log.space');

export type SpacingToken = typeof NO_SPACE | typeof SPACE;

/* ---------------------------------- Types ---------------------------------- */

export type MessageLogOptions = {
    /** Default: `getConfig().logToFile` at construction. */
    toFile?: boolean;
    /** Default: `getConfig().logToConsole` at construction. */
    toConsole?: boolean;
};

export type MessageLoggerOptions = {
    /**
     * File sink for committed lines.
     * Default: a RotatingFileSink on `outputFilePath` / `outputMaxBytes` of the process config.
     */
    sink?: RotatingFileSink;

    /** Console backend. Default: `selectConsoleSink()`. */
    console?: ConsoleSink;

    /** Default: `getConfig().consoleFormat` at commit. */
    consoleFormat?: ConsoleFormat;

    /** Clock source for testing. Default: () => Date.now() */
    now?: Clock;

    /** Thread tag source. Default: hash of the worker thread id. */
    threadTag?: () => string;

    /** Receives absorbed failures of the default sink and of the console. */
    onError?: SinkErrorHandler;
};

type Emit = (message: string, toFile: boolean, toConsole: boolean) => void;

/* --------------------------------- Builder --------------------------------- */

/**
 * Accumulates fields into one message.
 *
 * Fields are separated by one space. `noSpace()` (or the `NO_SPACE` token)
 * switches the separator off for every following field until `space()`
 * (or `SPACE`) switches it back on; the mode survives `commit()`.
 *
 * `commit()` writes the message at most once: it is a no-op when nothing was
 * appended since the last commit. Use `MessageLogger.withLog()` to have it
 * called on every exit path.
 */
export class MessageLog {
    readonly toFile: boolean;
    readonly toConsole: boolean;
    private readonly emit: Emit;
    private buf = '';
    private pending = false;
    private noSpaceMode = false;

    constructor(emit: Emit, opts: MessageLogOptions = {}) {
        const cfg = getConfig();
        this.emit = emit;
        this.toFile = opts.toFile ?? cfg.logToFile;
        this.toConsole = opts.toConsole ?? cfg.logToConsole;
    }

    /** True when fields were appended since the last commit. */
    get hasContent(): boolean { return this.pending; }

    /** The message collected so far. */
    get message(): string { return this.buf; }

    get spacing(): boolean { return !this.noSpaceMode; }

    /** Append fields; spacing tokens among them switch the separator mode. */
    append(...values: unknown[]): this {
        for (const v of values) {
            if (v === NO_SPACE) this.noSpaceMode = true;
            else if (v === SPACE) this.noSpaceMode = false;
            else {
                if (this.pending && !this.noSpaceMode) this.buf += ' ';
                this.buf += formatValue(v);
                this.pending = true;
            }
        }
        return this;
    }

    noSpace(): this {
        this.noSpaceMode = true;
        return this;
    }

    space(): this {
        this.noSpaceMode = false;
        return this;
    }

    /** Write the collected message and clear it. Returns false when there was nothing to write. */
    commit(): boolean {
        if (!this.pending) return false;
        const message = this.buf;
        this.buf = '';
        this.pending = false;
        this.emit(message, this.toFile, this.toConsole);
        return true;
    }

    /** Alias of `commit()`. */
    flush(): boolean {
        return this.commit();
    }
}

/* --------------------------------- Logger ---------------------------------- */

/**
 * Hands out MessageLog builders bound to one file sink and one console sink.
 * File and console output of a commit happen inside the file sink's lock, so
 * lines from concurrent commits never interleave.
 */
export class MessageLogger {
    readonly sink: RotatingFileSink;
    readonly console: ConsoleSink;
    private readonly now: Clock;
    private readonly tid: () => string;
    private readonly consoleFormat: ConsoleFormat | undefined;
    private readonly report: SinkErrorHandler;
    private readonly emit: Emit;

    constructor(opts: MessageLoggerOptions = {}) {
        this.report = guardHandler(opts.onError);
        this.sink = opts.sink ?? new RotatingFileSink({
            path: () => getConfig().outputFilePath,
            maxBytes: () => getConfig().outputMaxBytes,
            onError: this.report,
        });
        this.console = opts.console ?? selectConsoleSink();
        this.now = opts.now ?? (() => Date.now());
        this.tid = opts.threadTag ?? threadTag;
        this.consoleFormat = opts.consoleFormat;
        this.emit = (message, toFile, toConsole) => this.commitLine(message, toFile, toConsole);
    }

    /** A new builder; flags default from the process config. */
    log(opts?: MessageLogOptions): MessageLog {
        return new MessageLog(this.emit, opts);
    }

    /** Run `fn` with a builder and commit it when `fn` returns, throws or settles. */
    withLog<T>(fn: (log: MessageLog) => Promise<T>, opts?: MessageLogOptions): Promise<T>;
    withLog<T>(fn: (log: MessageLog) => T, opts?: MessageLogOptions): T;
    withLog<T>(fn: (log: MessageLog) => T | Promise<T>, opts?: MessageLogOptions): T | Promise<T> {
        const log = this.log(opts);
        return runScoped(() => fn(log), () => { log.commit(); });
    }

    /** Append `values` to a fresh builder and commit it. */
    write(...values: unknown[]): void {
        this.log().append(...values).commit();
    }

    /** Close the file sink; the next file write reopens it. */
    close(): void {
        this.sink.close();
    }

    private commitLine(message: string, toFile: boolean, toConsole: boolean): void {
        if (!toFile && !toConsole) return;
        const line = formatMessageLine(formatTimestamp(this.now()), this.tid(), message);
        const format = this.consoleFormat ?? getConfig().consoleFormat;
        this.sink.lock.run(() => {
            if (toFile) this.sink.writeLine(line);
            if (toConsole) this.echo(format === 'line' ? line : message);
        });
    }

    private echo(text: string): void {
        try {
            this.console.write(text);
        } catch (e) {
            this.report(new LogSinkError('write', '<console>', e));
        }
    }
}

/** Create a message logger. */
export function createMessageLogger(opts?: MessageLoggerOptions): MessageLogger {
    return new MessageLogger(opts);
}
