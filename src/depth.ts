// src/depth.ts
// Process-wide count of open traced scopes.

/**
 * Atomic counter over a SharedArrayBuffer. Pass `buffer` to worker threads
 * (e.g. in `workerData`) and wrap it with `ScopeDepth.from()` there so every
 * thread counts into the same slot.
 */
export class ScopeDepth {
    readonly buffer: SharedArrayBuffer;
    private readonly cell: Int32Array;

    constructor(buffer: SharedArrayBuffer = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT)) {
        this.buffer = buffer;
        this.cell = new Int32Array(buffer, 0, 1);
    }

    static from(buffer: SharedArrayBuffer): ScopeDepth {
        return new ScopeDepth(buffer);
    }

    get value(): number {
        return Atomics.load(this.cell, 0);
    }

    /** Add one; returns the new value. */
    increment(): number {
        return Atomics.add(this.cell, 0, 1) + 1;
    }

    /**
     * Subtract one; returns the new value, or `undefined` when the counter was
     * already at zero (an unbalanced end). The counter stays at zero then.
     */
    decrement(): number | undefined {
        for (;;) {
            const cur = Atomics.load(this.cell, 0);
            if (cur <= 0) return undefined;
            if (Atomics.compareExchange(this.cell, 0, cur, cur - 1) === cur) return cur - 1;
        }
    }

    /** Back to zero. For tests and for a host that restarts tracing. */
    reset(): void {
        Atomics.store(this.cell, 0, 0);
    }
}
