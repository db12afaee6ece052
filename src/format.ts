// src/format.ts
// Line formatting: local timestamps, thread tags, value text and the two line layouts.

import { createHash } from 'node:crypto';
import { threadId } from 'node:worker_threads';

/* -------------------------------- Timestamp -------------------------------- */

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** Local time as `YYYY-MM-DD HH:MM:SS` (second resolution). */
export function formatTimestamp(ms: number): string {
    const d = new Date(ms);
    return `${pad(d.getFullYear(), 4)}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} `
        + `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/* -------------------------------- Thread tag ------------------------------- */

/**
 * Unsigned 64-bit number (decimal text) derived by hashing the string form of a thread id.
 * Stable per thread; distinct threads practically never collide.
 */
export function hashThreadId(id: number | string): string {
    const digest = createHash('sha1').update(String(id)).digest();
    return digest.readBigUInt64BE(0).toString();
}

let ownTag: string | undefined;

/** Tag of the calling thread (`worker_threads.threadId`, 0 on the main thread). */
export function threadTag(): string {
    if (ownTag === undefined) ownTag = hashThreadId(threadId);
    return ownTag;
}

/* ------------------------------- Value text -------------------------------- */

/** Text form of one appended field. */
export function formatValue(value: unknown): string {
    switch (typeof value) {
        case 'string': return value;
        case 'number':
        case 'boolean':
        case 'bigint':
        case 'undefined': return String(value);
        case 'symbol': return value.toString();
        case 'function': return `[Function ${value.name || 'anonymous'}]`;
    }
    if (value === null) return 'null';
    if (value instanceof Error) return `${value.name}: ${value.message}`;
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
    return safeJson(value);
}

function safeJson(data: unknown): string {
    const seen = new WeakSet<object>();
    try {
        const out = JSON.stringify(data, (_k, v: unknown) => {
            if (typeof v === 'bigint') return v.toString();
            if (v && typeof v === 'object') {
                if (seen.has(v)) return '[Circular]';
                seen.add(v);
            }
            return v;
        });
        return out ?? String(data);
    } catch {
        try { return String(data); } catch { return '[Unserializable]'; }
    }
}

/* ---------------------------------- Lines ---------------------------------- */

/** `[<timestamp>] tid=<tag> "<message>"` */
export function formatMessageLine(timestamp: string, tid: string, message: string): string {
    return `[${timestamp}] tid=${tid} "${message}"`;
}

/** `[<timestamp>] <label>:<phase> <file> |<depth>` */
export function formatScopeLine(timestamp: string, label: string, phase: string, file: string, depth: number): string {
    return `[${timestamp}] ${label}:${phase} ${file} |${depth}`;
}

const INT32_MIN = -0x80000000;
const INT32_MAX = 0x7fffffff;

/** Label of a scope: `func`, or `func:name` when a custom name is given. */
export function scopeLabel(func: string, name?: string): string {
    return name ? `${func}:${name}` : func;
}

/**
 * Depth recorded at the end of a scope line: the integer after the rightmost `|`.
 * Leading whitespace and an optional sign are accepted and trailing text is ignored.
 * Returns `undefined` when there is no `|`, no integer after it, or one outside the int32 range.
 */
export function parseDepthSuffix(line: string): number | undefined {
    const at = line.lastIndexOf('|');
    if (at < 0) return undefined;
    const m = /^\s*([+-]?\d+)/.exec(line.slice(at + 1));
    if (!m) return undefined;
    const n = Number(m[1]);
    return n >= INT32_MIN && n <= INT32_MAX ? n : undefined;
}
