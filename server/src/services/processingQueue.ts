/**
 * Processing Queue
 *
 * In-process competing-consumer queue between intake and the order pipeline.
 *
 * GUARANTEES:
 * - At most `concurrency` items run at once
 * - An order key is never processed by two workers at the same time
 * - Pushing a key that is already waiting or in flight is a no-op
 * - push() throws QueueUnavailableError when stopped or at `maxDepth`,
 *   so intake can release its ledger claim
 *
 * Every in-flight item gets its own AbortController; stop() aborts them all
 * and waits for the handlers to return.
 *
 * Items live in process memory only. Work lost on a crash is found again by
 * the reconciler's stranded-claim recovery.
 */

import {
    orderKeyToString,
    type NormalizedOrderBundle,
    type OrderKey,
} from '@order-bridge/shared/domain';
import type { IntakeSource } from './dedupLedger/types.js';
import { QueueUnavailableError } from '../utils/errors.js';
import { queueLogger } from '../utils/logger.js';

// ============================================
// TYPES
// ============================================

export interface QueueItem extends OrderKey {
    resourceHref: string;
    source: IntakeSource | 'recovery' | 'replay';
    /** Transformed bundle carried over from a failed persistence attempt */
    bundle?: NormalizedOrderBundle;
    /** Number of earlier persistence rounds for this item */
    persistRounds?: number;
}

export type QueueHandler = (item: QueueItem, signal: AbortSignal) => Promise<void>;

export interface ProcessingQueueOptions {
    concurrency: number;
    maxDepth: number;
}

export interface QueueStats {
    pushed: number;
    deduplicated: number;
    completed: number;
    failed: number;
    waiting: number;
    inFlight: number;
    delayed: number;
    stopped: boolean;
}

// ============================================
// QUEUE
// ============================================

export class ProcessingQueue {
    private readonly waiting: QueueItem[] = [];
    /** Keys waiting or in flight */
    private readonly keys = new Set<string>();
    private readonly inFlight = new Map<string, AbortController>();
    private readonly delayed = new Set<NodeJS.Timeout>();
    private idleWaiters: Array<() => void> = [];
    private handler: QueueHandler | null = null;
    private stopped = false;
    private stats = { pushed: 0, deduplicated: 0, completed: 0, failed: 0 };

    constructor(private readonly options: ProcessingQueueOptions) {}

    /**
     * Attach the consumer and begin processing anything already waiting
     */
    start(handler: QueueHandler): void {
        if (this.stopped) {
            throw new QueueUnavailableError('Processing queue has been stopped');
        }
        this.handler = handler;
        queueLogger.info(this.options, 'Processing queue started');
        this.pump();
    }

    /**
     * @returns false when the key was already waiting or in flight
     * @throws QueueUnavailableError when stopped or full
     */
    push(item: QueueItem): boolean {
        if (this.stopped) {
            throw new QueueUnavailableError('Processing queue has been stopped');
        }

        const key = orderKeyToString(item);
        if (this.keys.has(key)) {
            this.stats.deduplicated++;
            queueLogger.debug({ key }, 'Key already queued, ignoring push');
            return false;
        }

        if (this.waiting.length >= this.options.maxDepth) {
            throw new QueueUnavailableError(`Processing queue is full (${this.options.maxDepth} waiting)`);
        }

        this.waiting.push(item);
        this.keys.add(key);
        this.stats.pushed++;
        this.pump();
        return true;
    }

    /**
     * Push after `delayMs`. A push that fails when the timer fires is logged;
     * the order's ledger claim stays open for stranded-claim recovery.
     */
    pushDelayed(item: QueueItem, delayMs: number): void {
        if (this.stopped) {
            throw new QueueUnavailableError('Processing queue has been stopped');
        }

        const timer = setTimeout(() => {
            this.delayed.delete(timer);
            try {
                this.push(item);
            } catch (error) {
                queueLogger.warn(
                    { key: orderKeyToString(item), error: error instanceof Error ? error.message : String(error) },
                    'Delayed push rejected'
                );
            }
        }, delayMs);
        timer.unref();
        this.delayed.add(timer);
    }

    private pump(): void {
        const handler = this.handler;

        while (handler && !this.stopped && this.inFlight.size < this.options.concurrency) {
            const item = this.waiting.shift();
            if (!item) break;

            const key = orderKeyToString(item);
            const controller = new AbortController();
            this.inFlight.set(key, controller);
            void this.run(handler, item, key, controller);
        }

        this.notifyIfIdle();
    }

    private async run(handler: QueueHandler, item: QueueItem, key: string, controller: AbortController): Promise<void> {
        try {
            await handler(item, controller.signal);
            this.stats.completed++;
        } catch (error) {
            this.stats.failed++;
            queueLogger.error(
                { key, error: error instanceof Error ? error.message : String(error) },
                'Queue handler threw'
            );
        } finally {
            this.inFlight.delete(key);
            this.keys.delete(key);
            this.pump();
        }
    }

    private notifyIfIdle(): void {
        if (this.waiting.length > 0 || this.inFlight.size > 0) return;
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
    }

    /**
     * Resolves once nothing is waiting or in flight. Delayed pushes are not awaited.
     */
    drain(): Promise<void> {
        if (this.inFlight.size === 0 && (this.waiting.length === 0 || !this.handler || this.stopped)) {
            return Promise.resolve();
        }
        return new Promise(resolve => this.idleWaiters.push(resolve));
    }

    /**
     * Stop accepting work, drop waiting and delayed items, abort in-flight
     * items and wait for their handlers to return.
     */
    async stop(): Promise<void> {
        if (this.stopped) return;
        this.stopped = true;

        for (const timer of this.delayed) clearTimeout(timer);
        const dropped = this.waiting.length + this.delayed.size;
        this.delayed.clear();
        for (const item of this.waiting.splice(0)) {
            this.keys.delete(orderKeyToString(item));
        }

        queueLogger.info({ dropped, aborting: this.inFlight.size }, 'Stopping processing queue');
        for (const controller of this.inFlight.values()) {
            controller.abort(new Error('Processing queue stopped'));
        }

        if (this.inFlight.size > 0) {
            await new Promise<void>(resolve => this.idleWaiters.push(resolve));
        }
        this.notifyIfIdle();
    }

    isKeyQueued(key: OrderKey): boolean {
        return this.keys.has(orderKeyToString(key));
    }

    getStats(): QueueStats {
        return {
            ...this.stats,
            waiting: this.waiting.length,
            inFlight: this.inFlight.size,
            delayed: this.delayed.size,
            stopped: this.stopped,
        };
    }
}
