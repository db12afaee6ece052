// src/file.ts
// Append-only file sink with open-time size rotation to a single `.old` backup.

import { closeSync, openSync, renameSync, rmSync, statSync, writeSync } from 'node:fs';
import { LogSinkError, guardHandler } from './errors';
import { SharedMutex } from './mutex';
import type { LineSink, SinkErrorHandler } from './types';

/* ---------------------------------- Types ---------------------------------- */

export type RotatingFileSinkOptions = {
    /**
     * Target file. A function is resolved at every (re)open, so a changed
     * process-wide path takes effect on the next open.
     */
    path: string | (() => string);

    /** Rotate when the existing file is larger than this at open time. */
    maxBytes: number | (() => number);

    /** Lock guarding open, rotation and writes. Default: a private SharedMutex. */
    lock?: SharedMutex;

    /** Receives absorbed failures. Default: none. */
    onError?: SinkErrorHandler;
};

/* -------------------------------- Rotation --------------------------------- */

export const BACKUP_SUFFIX = '.old';

/**
 * If `path` exists and is larger than `maxBytes`, move it to `path + '.old'`,
 * deleting any earlier backup first. Returns true when a rotation happened.
 * Failures go to `onError` and leave the file where it was.
 */
export function rotateIfTooLarge(path: string, maxBytes: number, onError?: (err: LogSinkError) => void): boolean {
    const report = guardHandler(onError);
    try {
        const st = statSync(path, { throwIfNoEntry: false });
        if (!st || st.size <= maxBytes) return false;
        const backup = path + BACKUP_SUFFIX;
        rmSync(backup, { force: true });
        renameSync(path, backup);
        return true;
    } catch (e) {
        report(new LogSinkError('rotate', path, e));
        return false;
    }
}

/* ---------------------------------- Sink ----------------------------------- */

/**
 * One file, opened lazily in append mode and kept open until `close()`.
 *
 * Meant to be created once per file per process and injected where needed;
 * every method runs inside the sink's lock. Nothing here throws: a failed
 * open or write drops the line, records `lastError` and calls `onError`.
 * Size is only checked when the file is (re)opened, so a long-running
 * process may grow the file past `maxBytes`.
 */
export class RotatingFileSink implements LineSink {
    readonly lock: SharedMutex;
    protected readonly report: SinkErrorHandler;
    private readonly path: () => string;
    private readonly maxBytes: () => number;
    private fd: number | undefined;
    private openedPath: string | undefined;
    private failure: LogSinkError | undefined;

    constructor(opts: RotatingFileSinkOptions) {
        const { path, maxBytes } = opts;
        this.path = typeof path === 'function' ? path : () => path;
        this.maxBytes = typeof maxBytes === 'function' ? maxBytes : () => maxBytes;
        this.lock = opts.lock ?? new SharedMutex();
        this.report = guardHandler(opts.onError);
    }

    get isOpen(): boolean { return this.fd !== undefined; }

    /** Path of the open file, or the path the next open would use. */
    get currentPath(): string { return this.openedPath ?? this.path(); }

    /** False after a failed open/rotate/write until the next successful write. */
    get healthy(): boolean { return this.failure === undefined; }

    get lastError(): LogSinkError | undefined { return this.failure; }

    /** Open the file if it is not open. Returns whether a handle is available. */
    ensureOpen(): boolean {
        return this.lock.run(() => this.openLocked());
    }

    /** Append `text` and a newline. Returns false when the line was dropped. */
    writeLine(text: string): boolean {
        return this.lock.run(() => this.openLocked() && this.appendLocked(text + '\n'));
    }

    /** Close the handle. Repeatable; a later write reopens. */
    close(): void {
        this.lock.run(() => this.closeLocked());
    }

    /** Alias of `close()`. */
    terminate(): void {
        this.close();
    }

    /* ------------------------- Hooks for subclasses ------------------------ */

    /** Runs under the lock after the rotation check of every fresh open, before the file is opened. */
    protected beforeOpen(_path: string): void {}

    /** Runs under the lock right after a fresh open, before the pending write. */
    protected afterOpen(): void {}

    /* ------------------------------ Internals ------------------------------ */

    protected openLocked(): boolean {
        if (this.fd !== undefined) return true;
        const path = this.path();
        rotateIfTooLarge(path, this.maxBytes(), (err) => this.fail(err));
        this.beforeOpen(path);
        try {
            this.fd = openSync(path, 'a');
        } catch (e) {
            this.fail(new LogSinkError('open', path, e));
            return false;
        }
        this.openedPath = path;
        this.afterOpen();
        return this.fd !== undefined;
    }

    /** Write `data` to the open handle. A failed write closes the handle. */
    protected appendLocked(data: string): boolean {
        const fd = this.fd;
        if (fd === undefined) return false;
        try {
            const buf = Buffer.from(data, 'utf8');
            let off = 0;
            while (off < buf.length) off += writeSync(fd, buf, off);
        } catch (e) {
            this.fail(new LogSinkError('write', this.currentPath, e));
            this.closeLocked();
            return false;
        }
        this.failure = undefined;
        return true;
    }

    protected closeLocked(): void {
        const fd = this.fd;
        if (fd === undefined) return;
        const path = this.currentPath;
        this.fd = undefined;
        this.openedPath = undefined;
        try {
            closeSync(fd);
        } catch (e) {
            this.fail(new LogSinkError('close', path, e));
        }
    }

    protected fail(err: LogSinkError): void {
        this.failure = err;
        this.report(err);
    }
}
