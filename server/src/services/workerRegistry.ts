/**
 * Worker Registry: the single place background workers are started and stopped.
 *
 * index.ts calls startAllWorkers() after the HTTP server is listening.
 * Every worker registered here is also registered for graceful shutdown
 * in the 'timers' phase, so no scheduled run starts once shutdown begins.
 */

import { systemLogger as log } from '../utils/logger.js';
import type { ShutdownCoordinator } from '../utils/shutdownCoordinator.js';

export interface WorkerEntry {
    name: string;
    start: () => void;
    stop: () => void | Promise<void>;
    shutdownTimeout?: number;
}

interface Schedulable {
    start(): void;
    stop(): void;
}

export function scheduledWorker(name: string, worker: Schedulable): WorkerEntry {
    return { name, start: () => worker.start(), stop: () => worker.stop(), shutdownTimeout: 1000 };
}

/**
 * @returns names of the workers started (empty when disabled)
 */
export function startAllWorkers(
    workers: readonly WorkerEntry[],
    coordinator: Pick<ShutdownCoordinator, 'register'>,
    options: { disabled: boolean }
): string[] {
    if (options.disabled) {
        log.warn('Background workers disabled (DISABLE_BACKGROUND_WORKERS=true)');
        return [];
    }

    for (const w of workers) {
        w.start();
        coordinator.register(w.name, 'timers', w.stop, w.shutdownTimeout ?? 5000);
    }
    log.info({ workers: workers.map(w => w.name) }, 'Background workers started');
    return workers.map(w => w.name);
}
