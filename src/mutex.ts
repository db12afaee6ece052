// src/mutex.ts
// Re-entrant lock over a SharedArrayBuffer, shareable with worker threads.

import { threadId } from 'node:worker_threads';

const UNLOCKED = 0;

export type SharedMutexOptions = {
    /** Existing lock state to join (e.g. received through `workerData`). */
    buffer?: SharedArrayBuffer;
    /**
     * Give up waiting after this many milliseconds and run unlocked. The bound
     * covers a whole `run`, nested calls included.
     * A holder that never releases (a dead worker) must not stall the host.
     * Default: 2000
     */
    maxWaitMs?: number;
};

/**
 * Mutual exclusion between threads of one process.
 * The owner slot holds `threadId + 1` of the holder; the same thread may re-enter.
 * Each thread keeps its own `SharedMutex` object over the shared buffer.
 */
export class SharedMutex {
    readonly buffer: SharedArrayBuffer;
    private readonly state: Int32Array;
    private readonly maxWaitMs: number;
    private readonly self = threadId + 1;
    /** Nesting of `run` calls on this thread. */
    private depth = 0;
    private owned = false;

    constructor(opts: SharedMutexOptions = {}) {
        this.buffer = opts.buffer ?? new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
        this.state = new Int32Array(this.buffer, 0, 1);
        this.maxWaitMs = opts.maxWaitMs ?? 2000;
    }

    /** True while the calling thread holds the lock. */
    get isHeld(): boolean {
        return this.owned && Atomics.load(this.state, 0) === this.self;
    }

    /**
     * Run `fn` under the lock and release it on every exit path.
     * Nested calls join the outermost one: they neither wait again nor release,
     * also when the outermost call gave up waiting and runs unlocked.
     */
    run<T>(fn: () => T): T {
        if (this.depth === 0) this.owned = this.acquire();
        this.depth++;
        try {
            return fn();
        } finally {
            this.depth--;
            if (this.depth === 0 && this.owned) {
                this.owned = false;
                this.release();
            }
        }
    }

    private acquire(): boolean {
        const deadline = Date.now() + this.maxWaitMs;
        for (;;) {
            const owner = Atomics.compareExchange(this.state, 0, UNLOCKED, this.self);
            if (owner === UNLOCKED) return true;
            const left = deadline - Date.now();
            if (left <= 0) return false;
            Atomics.wait(this.state, 0, owner, Math.min(left, 50));
        }
    }

    private release(): void {
        Atomics.store(this.state, 0, UNLOCKED);
        Atomics.notify(this.state, 0, 1);
    }
}
