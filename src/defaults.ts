// src/defaults.ts
// Process-wide instances for hosts that do not wire their own.
// Each is created on first use and follows the process config (see config.ts).

import type { DiagnosticsSink } from './diagnostics';
import type { RotatingFileSink } from './file';
import { MessageLogger, type MessageLog, type MessageLogOptions } from './message';
import { Tracer, type ScopeTracer } from './scope';
import type { ScopeSite } from './types';

let messages: MessageLogger | undefined;
let tracing: Tracer | undefined;

/** The process-wide message logger (`output.log` unless configured otherwise). */
export function messageLogger(): MessageLogger {
    messages ??= new MessageLogger();
    return messages;
}

/** The process-wide tracer (`diagnostics.log` unless configured otherwise). */
export function tracer(): Tracer {
    tracing ??= new Tracer();
    return tracing;
}

export function messageSink(): RotatingFileSink {
    return messageLogger().sink;
}

export function diagnosticsSink(): DiagnosticsSink {
    return tracer().sink;
}

/** A builder on the process-wide logger. Commit it, or use `messageLogger().withLog()`. */
export function logMessage(opts?: MessageLogOptions): MessageLog {
    return messageLogger().log(opts);
}

/** Log `values` as one committed message. */
export function log(...values: unknown[]): void {
    messageLogger().write(...values);
}

/** Enter a scope on the process-wide tracer. */
export function traceScope(site: ScopeSite): ScopeTracer {
    return tracer().enter(site);
}

/**
 * Close both process-wide sinks, e.g. during orderly shutdown.
 * Safe to call repeatedly; later writes reopen the files.
 */
export function terminate(): void {
    messages?.close();
    tracing?.close();
}
