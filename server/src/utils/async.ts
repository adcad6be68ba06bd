/**
 * Async helpers shared by the pipeline stages: backoff delays, abortable
 * sleeps, deadlines and a small concurrency limiter.
 */

import { DeadlineExceededError } from './errors.js';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Exponential backoff: base, 2×base, 4×base, ... for attempts 1, 2, 3, ...
 */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
    return baseDelayMs * Math.pow(2, Math.max(0, attempt - 1));
}

/**
 * setTimeout as a promise. Rejects with the signal's reason when aborted.
 */
export const sleep: Sleep = (ms, signal) =>
    new Promise<void>((resolve, reject) => {
        if (signal?.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal?.reason);
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });

/**
 * Race `promise` against a deadline.
 *
 * The underlying work is not cancelled when the deadline wins; it keeps
 * running and its eventual rejection is consumed by the race.
 */
export async function withDeadline<T>(promise: Promise<T>, deadlineMs: number, label: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(
            () => reject(new DeadlineExceededError(`${label} exceeded ${deadlineMs}ms`, deadlineMs)),
            deadlineMs
        );
    });

    try {
        return await Promise.race([promise, deadline]);
    } finally {
        if (timer) clearTimeout(timer);
    }
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 * Results keep input order; one rejection does not stop the others.
 */
export async function mapSettled<T, R>(
    items: readonly T[],
    concurrency: number,
    worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
    const results: PromiseSettledResult<R>[] = new Array(items.length);
    // One iterator shared by every lane
    const pending = items.entries();

    async function lane(): Promise<void> {
        for (const [index, item] of pending) {
            try {
                results[index] = { status: 'fulfilled', value: await worker(item, index) };
            } catch (reason) {
                results[index] = { status: 'rejected', reason };
            }
        }
    }

    const lanes = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, () => lane());
    await Promise.all(lanes);
    return results;
}
