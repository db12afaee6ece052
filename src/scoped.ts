// src/scoped.ts
// Run a callback and a cleanup step on every exit path, sync or async.

/**
 * Call `fn`, then `done` once it has settled:
 * - sync return or throw → `done()` before returning/rethrowing.
 * - returned Promise → `done()` in `Promise.finally`.
 */
export function runScoped<T>(fn: () => Promise<T>, done: () => void): Promise<T>;
export function runScoped<T>(fn: () => T, done: () => void): T;
export function runScoped<T>(fn: () => T | Promise<T>, done: () => void): T | Promise<T> {
    let r: T | Promise<T>;
    try {
        r = fn();
    } catch (e) {
        done();
        throw e;
    }
    if (r instanceof Promise) return r.finally(done);
    done();
    return r;
}
