/**
 * Shutdown Coordinator
 *
 * Stops the pipeline in one place on SIGTERM/SIGINT. Handlers run in
 * phases: every handler of a phase runs in parallel (each under its own
 * timeout) and the next phase starts once they have all settled.
 *
 * Phase order:
 * 1. timers    - reconcile and export schedulers stop firing
 * 2. intake    - HTTP server stops accepting webhooks
 * 3. queue     - processing queue stops, in-flight work is aborted
 * 4. resources - database pool closes
 */

import { systemLogger } from './logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

export type ShutdownPhase = 'timers' | 'intake' | 'queue' | 'resources';

const PHASE_ORDER: readonly ShutdownPhase[] = ['timers', 'intake', 'queue', 'resources'];

interface ShutdownHandler {
    name: string;
    phase: ShutdownPhase;
    handler: () => Promise<void> | void;
    timeout: number;
}

interface HandlerResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private handlers = new Map<string, ShutdownHandler>();
    private isShuttingDown = false;

    /**
     * Register a shutdown handler
     * @param timeout - Max time to wait for the handler (ms)
     */
    register(name: string, phase: ShutdownPhase, handler: () => Promise<void> | void, timeout = 10000): void {
        if (this.handlers.has(name)) {
            systemLogger.warn({ name }, 'Shutdown handler already registered, replacing');
        }
        this.handlers.set(name, { name, phase, handler, timeout });
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    /**
     * Run every handler phase by phase. Safe to call more than once.
     */
    async shutdown(): Promise<HandlerResult[]> {
        if (this.isShuttingDown) {
            systemLogger.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        systemLogger.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const results: HandlerResult[] = [];
        for (const phase of PHASE_ORDER) {
            const phaseHandlers = Array.from(this.handlers.values()).filter(h => h.phase === phase);
            results.push(...await Promise.all(phaseHandlers.map(h => this.runHandler(h))));
        }

        const failed = results.filter(r => !r.success).length;
        systemLogger.info({ successful: results.length - failed, failed, total: results.length }, 'Shutdown complete');
        return results;
    }

    private async runHandler({ name, handler, timeout }: ShutdownHandler): Promise<HandlerResult> {
        const start = Date.now();
        let timer: NodeJS.Timeout | undefined;

        try {
            const timedOut = await Promise.race([
                Promise.resolve(handler()).then(() => false),
                new Promise<boolean>(resolve => {
                    timer = setTimeout(() => resolve(true), timeout);
                }),
            ]);
            const duration = Date.now() - start;

            if (timedOut) {
                systemLogger.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                return { name, success: false, error: 'Timeout', duration };
            }
            systemLogger.debug({ name, duration }, 'Shutdown handler completed');
            return { name, success: true, duration };
        } catch (error: unknown) {
            const duration = Date.now() - start;
            const errorMsg = error instanceof Error ? error.message : 'Unknown error';
            systemLogger.error({ name, error: errorMsg, duration }, 'Shutdown handler failed');
            return { name, success: false, error: errorMsg, duration };
        } finally {
            if (timer) clearTimeout(timer);
        }
    }
}

// ============================================
// EXPORTS
// ============================================

export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
