import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CRASH_SENTINEL, DiagnosticsSink, detectPreviousCrash, readLastLine } from './diagnostics';

describe('readLastLine', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'scope-log-tail-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    const fileWith = (content: string) => {
        const path = join(dir, 'd.log');
        writeFileSync(path, content);
        return path;
    };

    it('skips trailing blank lines', () => {
        expect(readLastLine(fileWith('a\nb\n\n  \n'))).toBe('b');
    });

    it('reads a file without a final newline', () => {
        expect(readLastLine(fileWith('only'))).toBe('only');
    });

    it('strips carriage returns', () => {
        expect(readLastLine(fileWith('x\r\ny\r\n'))).toBe('y');
    });

    it('assembles a line longer than one block', () => {
        expect(readLastLine(fileWith('first\nsecond-line-long\n'), 4)).toBe('second-line-long');
        expect(readLastLine(fileWith('a-single-long-line\n'), 3)).toBe('a-single-long-line');
    });

    it('returns undefined for missing or blank files', () => {
        expect(readLastLine(join(dir, 'missing.log'))).toBeUndefined();
        expect(readLastLine(fileWith(''))).toBeUndefined();
        expect(readLastLine(fileWith('\n\n'))).toBeUndefined();
    });
});

describe('detectPreviousCrash', () => {
    let dir: string;
    let path: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'scope-log-crash-'));
        path = join(dir, 'diagnostics.log');
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('sees a crash when the last line ends above zero', () => {
        writeFileSync(path, '[2024-01-02 03:04:05] f:start... a.cpp |1\n[2024-01-02 03:04:05] g:start... a.cpp |3\n');
        expect(detectPreviousCrash(path)).toBe(true);
    });

    it('sees a clean exit at depth zero', () => {
        writeFileSync(path, '[2024-01-02 03:04:05] f:start... a.cpp |1\n[2024-01-02 03:04:05] f:end! a.cpp |0\n');
        expect(detectPreviousCrash(path)).toBe(false);
    });

    it('ignores missing files and unparsable lines', () => {
        expect(detectPreviousCrash(path)).toBe(false);
        writeFileSync(path, `${CRASH_SENTINEL}\n`);
        expect(detectPreviousCrash(path)).toBe(false);
        writeFileSync(path, 'f:start... a.cpp |x\n');
        expect(detectPreviousCrash(path)).toBe(false);
    });
});

describe('DiagnosticsSink', () => {
    let dir: string;
    let path: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'scope-log-diag-'));
        path = join(dir, 'diagnostics.log');
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('writes the sentinel before the first line after a crash', () => {
        const previous = '[2024-01-02 03:04:05] f:start... a.cpp |3\n';
        writeFileSync(path, previous);
        const sink = new DiagnosticsSink({ path, maxBytes: 1024 });
        expect(sink.crashedLastRun).toBeUndefined();
        expect(sink.checkedForCrash).toBe(false);

        sink.writeLine('first event');
        sink.writeLine('second event');
        sink.close();

        expect(sink.checkedForCrash).toBe(true);
        expect(sink.crashedLastRun).toBe(true);
        expect(readFileSync(path, 'utf8')).toBe(`${previous}${CRASH_SENTINEL}\nfirst event\nsecond event\n`);
    });

    it('writes no sentinel after a clean run', () => {
        const previous = '[2024-01-02 03:04:05] f:end! a.cpp |0\n';
        writeFileSync(path, previous);
        const sink = new DiagnosticsSink({ path, maxBytes: 1024 });
        sink.writeLine('event');
        sink.close();
        expect(sink.crashedLastRun).toBe(false);
        expect(readFileSync(path, 'utf8')).toBe(`${previous}event\n`);
    });

    it('writes no sentinel for a new file', () => {
        const sink = new DiagnosticsSink({ path, maxBytes: 1024 });
        sink.writeLine('event');
        sink.close();
        expect(sink.crashedLastRun).toBe(false);
        expect(readFileSync(path, 'utf8')).toBe('event\n');
    });

    it('checks only once per sink', () => {
        writeFileSync(path, 'x |2\n');
        const sink = new DiagnosticsSink({ path, maxBytes: 1024 });
        sink.writeLine('a |5');
        sink.close();
        sink.writeLine('b');
        sink.close();
        expect(readFileSync(path, 'utf8')).toBe(`x |2\n${CRASH_SENTINEL}\na |5\nb\n`);
    });

    it('checks the fresh file after rotating the previous run away', () => {
        const previous = 'padding padding padding\n[2024-01-02 03:04:05] g:start... b.cpp |2\n';
        writeFileSync(path, previous);
        const sink = new DiagnosticsSink({ path, maxBytes: 16 });
        sink.writeLine('event');
        sink.close();

        expect(sink.crashedLastRun).toBe(false);
        expect(readFileSync(path + '.old', 'utf8')).toBe(previous);
        expect(readFileSync(path, 'utf8')).toBe('event\n');
    });

    it('checks on ensureOpen alone', () => {
        writeFileSync(path, 'x |1\n');
        const sink = new DiagnosticsSink({ path, maxBytes: 1024 });
        expect(sink.ensureOpen()).toBe(true);
        sink.close();
        expect(sink.crashedLastRun).toBe(true);
        expect(readFileSync(path, 'utf8')).toBe(`x |1\n${CRASH_SENTINEL}\n`);
        expect(existsSync(path + '.old')).toBe(false);
    });
});
