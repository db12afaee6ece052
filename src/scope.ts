// src/scope.ts
// Scope tracer: start/end events of functions and named regions, stamped with
// the live-scope depth so that a later run can tell whether this one crashed.

import { getConfig } from './config';
import { ScopeDepthError, guardHandler } from './errors';
import { DiagnosticsSink } from './diagnostics';
import { ScopeDepth } from './depth';
import { formatScopeLine, formatTimestamp, scopeLabel } from './format';
import { runScoped } from './scoped';
import type { Clock, ScopePhase, ScopeSite, SinkErrorHandler } from './types';

export type TracerOptions = {
    /**
     * Diagnostics file sink.
     * Default: a DiagnosticsSink on `diagnosticsFilePath` / `diagnosticsMaxBytes` of the process config.
     */
    sink?: DiagnosticsSink;

    /** Live-scope counter. Default: a new ScopeDepth. Share its buffer with workers. */
    depth?: ScopeDepth;

    /** Clock source for testing. Default: () => Date.now() */
    now?: Clock;

    /** Receives depth underflows and the default sink's I/O failures. */
    onError?: SinkErrorHandler;
};

export type ScopeStep = { kind: 'start' } | { kind: 'end' } | { kind: 'mark'; text: string };

const PHASE_TEXT: Readonly<Record<'start' | 'end', ScopePhase>> = { start: 'start...', end: 'end!' };

/**
 * Writes scope events to one diagnostics sink and keeps the live-scope depth.
 *
 * The depth change and the depth written with the event are taken inside the
 * sink's lock, so each line carries the value its own transition produced.
 */
export class Tracer {
    readonly sink: DiagnosticsSink;
    readonly depth: ScopeDepth;
    private readonly now: Clock;
    private readonly report: SinkErrorHandler;

    constructor(opts: TracerOptions = {}) {
        this.report = guardHandler(opts.onError);
        this.sink = opts.sink ?? new DiagnosticsSink({
            path: () => getConfig().diagnosticsFilePath,
            maxBytes: () => getConfig().diagnosticsMaxBytes,
            onError: this.report,
        });
        this.depth = opts.depth ?? new ScopeDepth();
        this.now = opts.now ?? (() => Date.now());
    }

    /** See `DiagnosticsSink.crashedLastRun`. */
    get crashedLastRun(): boolean | undefined { return this.sink.crashedLastRun; }

    /** Open a scope: writes its start event. Call `end()` on the result when leaving. */
    enter(site: ScopeSite): ScopeTracer {
        return new ScopeTracer(this, site);
    }

    /** Run `fn` inside a scope that ends when `fn` returns, throws or settles. */
    withScope<T>(site: ScopeSite, fn: (scope: ScopeTracer) => Promise<T>): Promise<T>;
    withScope<T>(site: ScopeSite, fn: (scope: ScopeTracer) => T): T;
    withScope<T>(site: ScopeSite, fn: (scope: ScopeTracer) => T | Promise<T>): T | Promise<T> {
        const scope = this.enter(site);
        return runScoped(() => fn(scope), () => scope.end());
    }

    /** Close the sink; the next event reopens it (without a second crash check). */
    close(): void {
        this.sink.close();
    }

    /** @internal Write one event for `scope`. */
    record(scope: ScopeTracer, step: ScopeStep): void {
        this.sink.lock.run(() => {
            this.sink.ensureOpen();
            const { depth, phase } = this.advance(scope, step);
            this.sink.writeLine(formatScopeLine(formatTimestamp(this.now()), scope.label, phase, scope.file, depth));
        });
    }

    private advance(scope: ScopeTracer, step: ScopeStep): { depth: number; phase: string } {
        switch (step.kind) {
            case 'start':
                return { depth: this.depth.increment(), phase: PHASE_TEXT.start };
            case 'end': {
                const next = this.depth.decrement();
                if (next === undefined) this.report(new ScopeDepthError(scope.label));
                return { depth: next ?? 0, phase: PHASE_TEXT.end };
            }
            case 'mark':
                return { depth: this.depth.value, phase: step.text };
        }
    }
}

/**
 * One open scope. Writes `start...` on construction and `end!` on `end()`.
 * Prefer `Tracer.withScope()`, which ends the scope on every exit path.
 */
export class ScopeTracer {
    readonly label: string;
    readonly file: string;
    readonly line: number | undefined;
    private readonly tracer: Tracer;
    private done = false;

    constructor(tracer: Tracer, site: ScopeSite) {
        this.tracer = tracer;
        this.label = scopeLabel(site.func, site.name);
        this.file = site.file;
        this.line = site.line;
        tracer.record(this, { kind: 'start' });
    }

    get ended(): boolean { return this.done; }

    /** Intermediate event with free text at the current depth. */
    mark(message: string): void {
        this.tracer.record(this, { kind: 'mark', text: message });
    }

    /** Write the end event. Only the first call has an effect. */
    end(): void {
        if (this.done) return;
        this.done = true;
        this.tracer.record(this, { kind: 'end' });
    }
}

/** Create a tracer. */
export function createTracer(opts?: TracerOptions): Tracer {
    return new Tracer(opts);
}
