// src/diagnostics.ts
// Diagnostics file sink: a rotating sink that, on its first open in a process,
// checks whether the previous run ended with scopes still open.

import { closeSync, fstatSync, openSync, readSync, statSync } from 'node:fs';
import { LogSinkError, guardHandler } from './errors';
import { RotatingFileSink, type RotatingFileSinkOptions } from './file';
import { parseDepthSuffix } from './format';

/** Written ahead of a run's first event when the previous run crashed mid-scope. */
export const CRASH_SENTINEL = '## CRASH POINT ##';

/* -------------------------------- Tail read -------------------------------- */

function lastCompleteLine(buf: Buffer, atFileStart: boolean): string | undefined {
    const lines = buf.toString('utf8').split(/\r?\n/);
    for (let i = lines.length - 1; i >= 0; i--) {
        if (lines[i].trim() === '') continue;
        // The first piece may be the cut-off end of a longer line.
        return i > 0 || atFileStart ? lines[i] : undefined;
    }
    return undefined;
}

/**
 * Last non-empty line of a file, read backwards in blocks so that a large
 * file is not loaded whole. `undefined` when the file is missing or blank.
 */
export function readLastLine(path: string, blockSize = 4096): string | undefined {
    if (!statSync(path, { throwIfNoEntry: false })) return undefined;
    const fd = openSync(path, 'r');
    try {
        let pos = fstatSync(fd).size;
        let tail = Buffer.alloc(0);
        while (pos > 0) {
            const len = Math.min(blockSize, pos);
            pos -= len;
            const chunk = Buffer.alloc(len);
            readSync(fd, chunk, 0, len, pos);
            tail = Buffer.concat([chunk, tail]);
            const line = lastCompleteLine(tail, pos === 0);
            if (line !== undefined) return line;
        }
        return undefined;
    } finally {
        closeSync(fd);
    }
}

/**
 * True when the file's last non-empty line ends in `|<n>` with `n > 0`:
 * the run that wrote it never unwound back to depth 0.
 * A missing file, a line without a depth, or depth 0 all read as "no crash".
 */
export function detectPreviousCrash(path: string, onError?: (err: LogSinkError) => void): boolean {
    let line: string | undefined;
    try {
        line = readLastLine(path);
    } catch (e) {
        guardHandler(onError)(new LogSinkError('read', path, e));
        return false;
    }
    const depth = line === undefined ? undefined : parseDepthSuffix(line);
    return depth !== undefined && depth > 0;
}

/* ---------------------------------- Sink ----------------------------------- */

export type DiagnosticsSinkOptions = RotatingFileSinkOptions;

/**
 * Rotating sink for scope events. Create one per process.
 *
 * The crash check runs once, on the first open, after the rotation check: a
 * previous file that was rotated to `.old` leaves nothing to check. When it
 * finds a crash, `CRASH_SENTINEL` is the first line this run writes.
 */
export class DiagnosticsSink extends RotatingFileSink {
    private checked = false;
    private crashed: boolean | undefined;
    private sentinelPending = false;

    /** Result of the crash check; `undefined` until the sink has been opened once. */
    get crashedLastRun(): boolean | undefined { return this.crashed; }

    get checkedForCrash(): boolean { return this.checked; }

    protected override beforeOpen(path: string): void {
        if (this.checked) return;
        this.checked = true;
        this.crashed = detectPreviousCrash(path, (err) => this.fail(err));
        this.sentinelPending = this.crashed;
    }

    protected override afterOpen(): void {
        if (!this.sentinelPending) return;
        if (this.appendLocked(CRASH_SENTINEL + '\n')) this.sentinelPending = false;
    }
}
