import { CancelledError } from './errors';

export interface PoolOptions {
    concurrency: number;
    signal?: AbortSignal;
    /** Called after each item settles, in completion order. */
    onSettled?: (done: number, total: number) => void;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Results keep
 * the order of `items`, whatever order the workers finish in. Once the signal
 * aborts no further item starts (those settle as CancelledError), and the call
 * still waits for every in-flight worker before returning.
 */
export async function runPool<T, R>(
    items: readonly T[],
    worker: (item: T, index: number) => Promise<R>,
    opts: PoolOptions
): Promise<PromiseSettledResult<R>[]> {
    const concurrency = Math.max(1, Math.floor(opts.concurrency) || 1);
    const results: PromiseSettledResult<R>[] = new Array(items.length);
    const active: Promise<void>[] = [];
    let settled = 0;

    async function runOne(idx: number) {
        try {
            results[idx] = { status: 'fulfilled', value: await worker(items[idx], idx) };
        } catch (reason) {
            results[idx] = { status: 'rejected', reason };
        }
        settled += 1;
        opts.onSettled?.(settled, items.length);
    }

    let idx = 0;
    while (idx < items.length) {
        if (opts.signal?.aborted) break;
        while (active.length < concurrency && idx < items.length) {
            const p = runOne(idx).finally(() => {
                const pos = active.indexOf(p);
                if (pos >= 0) active.splice(pos, 1);
            });
            active.push(p);
            idx++;
        }
        if (active.length) await Promise.race(active);
    }
    await Promise.all(active);

    for (; idx < items.length; idx++) {
        results[idx] = { status: 'rejected', reason: new CancelledError() };
    }
    return results;
}
