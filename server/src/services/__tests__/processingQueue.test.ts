/**
 * Tests for the in-process processing queue
 */

import { ProcessingQueue, type QueueItem } from '../processingQueue.js';
import { QueueUnavailableError } from '../../utils/errors.js';

function item(sourceOrderId: string): QueueItem {
    return {
        channel: 'uber_eats',
        sourceOrderId,
        resourceHref: `https://api.marketplace.test/v1/orders/${sourceOrderId}`,
        source: 'webhook',
    };
}

function deferred() {
    let resolve: () => void = () => {};
    const promise = new Promise<void>(r => {
        resolve = r;
    });
    return { promise, resolve };
}

describe('ProcessingQueue', () => {
    it('ignores a key that is already waiting', () => {
        const queue = new ProcessingQueue({ concurrency: 1, maxDepth: 10 });

        expect(queue.push(item('ord-1'))).toBe(true);
        expect(queue.push(item('ord-1'))).toBe(false);
        expect(queue.getStats()).toMatchObject({ pushed: 1, deduplicated: 1, waiting: 1 });
    });

    it('ignores a key that is in flight', async () => {
        const queue = new ProcessingQueue({ concurrency: 2, maxDepth: 10 });
        const gate = deferred();
        const seen: string[] = [];
        queue.start(async work => {
            seen.push(work.sourceOrderId);
            await gate.promise;
        });

        queue.push(item('ord-1'));
        expect(queue.getStats().inFlight).toBe(1);
        expect(queue.push(item('ord-1'))).toBe(false);

        gate.resolve();
        await queue.drain();
        expect(seen).toEqual(['ord-1']);
        expect(queue.push(item('ord-1'))).toBe(true);
        await queue.drain();
        expect(seen).toEqual(['ord-1', 'ord-1']);
    });

    it('never runs more than `concurrency` handlers at once', async () => {
        const queue = new ProcessingQueue({ concurrency: 2, maxDepth: 10 });
        let running = 0;
        let peak = 0;
        queue.start(async () => {
            running++;
            peak = Math.max(peak, running);
            await new Promise(resolve => setTimeout(resolve, 5));
            running--;
        });

        for (let i = 0; i < 6; i++) queue.push(item(`ord-${i}`));
        await queue.drain();

        expect(peak).toBe(2);
        expect(queue.getStats()).toMatchObject({ completed: 6, failed: 0, waiting: 0, inFlight: 0 });
    });

    it('throws when full', () => {
        const queue = new ProcessingQueue({ concurrency: 1, maxDepth: 2 });
        queue.push(item('ord-1'));
        queue.push(item('ord-2'));

        expect(() => queue.push(item('ord-3'))).toThrow(QueueUnavailableError);
    });

    it('counts a throwing handler as failed and keeps going', async () => {
        const queue = new ProcessingQueue({ concurrency: 1, maxDepth: 10 });
        queue.start(async work => {
            if (work.sourceOrderId === 'ord-1') throw new Error('boom');
        });

        queue.push(item('ord-1'));
        queue.push(item('ord-2'));
        await queue.drain();

        expect(queue.getStats()).toMatchObject({ completed: 1, failed: 1 });
    });

    it('aborts in-flight work on stop and refuses new pushes', async () => {
        const queue = new ProcessingQueue({ concurrency: 1, maxDepth: 10 });
        let aborted = false;
        queue.start(
            (_work, signal) =>
                new Promise<void>(resolve => {
                    signal.addEventListener('abort', () => {
                        aborted = true;
                        resolve();
                    });
                })
        );

        queue.push(item('ord-1'));
        queue.push(item('ord-2'));
        await queue.stop();

        expect(aborted).toBe(true);
        expect(queue.getStats()).toMatchObject({ completed: 1, waiting: 0, inFlight: 0, stopped: true });
        expect(() => queue.push(item('ord-3'))).toThrow(QueueUnavailableError);
    });

    it('pushes a delayed item once its timer fires', async () => {
        vi.useFakeTimers();
        try {
            const queue = new ProcessingQueue({ concurrency: 1, maxDepth: 10 });
            queue.pushDelayed(item('ord-1'), 30_000);
            expect(queue.getStats()).toMatchObject({ delayed: 1, waiting: 0 });

            vi.advanceTimersByTime(30_000);
            expect(queue.getStats()).toMatchObject({ delayed: 0, waiting: 1 });
        } finally {
            vi.useRealTimers();
        }
    });
});
