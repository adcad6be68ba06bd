/**
 * Batch Exporter
 *
 * Runs on an interval and on demand. One run:
 * 1. Take the export lock (held → skipped)
 * 2. Select up to `batchSize` Persisted orders, oldest first
 * 3. Build rows and write them to {rootDir}/.staging/{batchId}
 * 4. Re-read and validate the staged package
 *    - violation → staging removed, batch rejected, orders stay Persisted
 * 5. Promote: rename staging → {rootDir}/{batchId}
 * 6. Mark every order in the batch Exported with the batch id
 *
 * An order is only marked Exported after its package was validated and promoted.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, rename, rm } from 'node:fs/promises';
import path from 'node:path';
import type { ChannelAttributionRule } from '@order-bridge/shared/domain';
import type { PipelineConfig } from '../../config/pipeline.js';
import { PackageIntegrityError, toError } from '../../utils/errors.js';
import { exportLogger as log } from '../../utils/logger.js';
import type { OrderStore } from '../orderStore/types.js';
import type { ExportLock } from './exportLock.js';
import { validateStagedPackage } from './integrityValidator.js';
import { buildPackage } from './packageBuilder.js';
import { writeStagedPackage, type PackageWriter } from './packageWriter.js';
import type { ExportEntity, ExportResult } from './types.js';

// ============================================
// TYPES
// ============================================

export type ExportTrigger = 'scheduled' | 'manual';

export interface BatchExporterDeps {
    store: OrderStore;
    lock: ExportLock;
    attributionRules: readonly ChannelAttributionRule[];
    config: PipelineConfig['export'];
    now?: () => Date;
    createBatchId?: (now: Date) => string;
    writer?: PackageWriter;
}

export interface ExporterStatus {
    isRunning: boolean;
    schedulerActive: boolean;
    intervalMinutes: number;
    batchSize: number;
    lastRunAt: string | null;
    lastResult: ExportResult | null;
    lastError: string | null;
}

export const STAGING_DIR_NAME = '.staging';

/**
 * batch-20260314T120000Z-a1b2c3: sortable by time, unique per run
 */
export function defaultBatchId(now: Date): string {
    const stamp = now.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
    return `batch-${stamp}-${randomBytes(3).toString('hex')}`;
}

// ============================================
// EXPORTER
// ============================================

export class BatchExporter {
    private interval: NodeJS.Timeout | null = null;
    private isRunning = false;
    private lastRunAt: string | null = null;
    private lastResult: ExportResult | null = null;
    private lastError: string | null = null;
    private readonly now: () => Date;
    private readonly createBatchId: (now: Date) => string;
    private readonly writer: PackageWriter;

    constructor(private readonly deps: BatchExporterDeps) {
        this.now = deps.now ?? (() => new Date());
        this.createBatchId = deps.createBatchId ?? defaultBatchId;
        this.writer = deps.writer ?? writeStagedPackage;
    }

    /**
     * @throws PersistenceError when the store or the lock is unavailable
     */
    async runOnce(trigger: ExportTrigger): Promise<ExportResult> {
        try {
            const locked = await this.deps.lock.withLock(() => this.runLocked(trigger));
            const result: ExportResult = locked.acquired ? locked.value : { outcome: 'skipped', skipped: 'locked' };
            if (!locked.acquired) {
                log.info({ trigger }, 'Export lock held elsewhere, skipping run');
            }

            this.lastResult = result;
            this.lastError = null;
            return result;
        } catch (error) {
            this.lastError = toError(error).message;
            log.error({ trigger, error: this.lastError }, 'Export run failed');
            throw error;
        } finally {
            this.lastRunAt = this.now().toISOString();
        }
    }

    /** Only the run holding the lock owns the running flag */
    private async runLocked(trigger: ExportTrigger): Promise<ExportResult> {
        this.isRunning = true;
        try {
            return await this.exportBatch(trigger);
        } finally {
            this.isRunning = false;
        }
    }

    private async exportBatch(trigger: ExportTrigger): Promise<ExportResult> {
        const { rootDir, batchSize } = this.deps.config;
        const orders = await this.deps.store.listOrdersByStatus('Persisted', batchSize);
        const pkg = buildPackage(orders, this.deps.attributionRules);

        for (const excluded of pkg.excluded) {
            log.warn({ ...excluded }, 'Order left out of export batch');
        }
        if (pkg.keys.length === 0) {
            log.debug({ trigger, selected: orders.length }, 'Nothing to export');
            return { outcome: 'skipped', skipped: 'empty' };
        }

        const createdAt = this.now();
        const batchId = this.createBatchId(createdAt);
        const stagingDir = path.join(rootDir, STAGING_DIR_NAME, batchId);
        const finalDir = path.join(rootDir, batchId);
        const rowCounts: Record<ExportEntity, number> = {
            TransactionHeaders: pkg.rows.TransactionHeaders.length,
            SalesLines: pkg.rows.SalesLines.length,
            PaymentLines: pkg.rows.PaymentLines.length,
            TaxLines: pkg.rows.TaxLines.length,
        };

        log.info({ trigger, batchId, orderCount: pkg.keys.length, rowCounts }, 'Staging export batch');

        try {
            await this.writer(stagingDir, pkg, { batchId, createdAt: createdAt.toISOString() });

            const violations = await validateStagedPackage(stagingDir, batchId);
            if (violations.length > 0) {
                throw new PackageIntegrityError(`Batch ${batchId} failed integrity validation`, violations);
            }

            await mkdir(rootDir, { recursive: true });
            await rename(stagingDir, finalDir);
        } catch (error) {
            await this.discard(stagingDir, batchId);
            if (error instanceof PackageIntegrityError) {
                log.error({ batchId, violations: error.violations.slice(0, 10) }, 'Export batch rejected');
                return { outcome: 'rejected', batchId, orderCount: pkg.keys.length, violations: error.violations };
            }
            throw error;
        }

        let marked: number;
        try {
            marked = await this.deps.store.markExported(pkg.keys, batchId);
        } catch (error) {
            // Unpublish so no package exists for orders still Persisted
            log.error({ batchId, error: toError(error).message }, 'Marking orders exported failed, withdrawing package');
            await this.discard(finalDir, batchId);
            throw error;
        }

        if (marked !== pkg.keys.length) {
            log.warn({ batchId, expected: pkg.keys.length, marked }, 'Some batch orders were no longer Persisted');
        }

        log.info({ batchId, orderCount: pkg.keys.length, path: finalDir }, 'Export batch promoted');
        return {
            outcome: 'exported',
            batchId,
            orderCount: pkg.keys.length,
            rowCounts,
            path: finalDir,
            excluded: pkg.excluded.length,
        };
    }

    private async discard(dir: string, batchId: string): Promise<void> {
        try {
            await rm(dir, { recursive: true, force: true });
        } catch (error) {
            log.error({ batchId, dir, error: toError(error).message }, 'Failed to remove batch directory');
        }
    }

    // ============================================
    // SCHEDULER CONTROL
    // ============================================

    start(): void {
        if (this.interval) {
            log.debug('Exporter already scheduled');
            return;
        }

        const { intervalMinutes } = this.deps.config;
        log.info({ intervalMinutes }, 'Starting export scheduler');
        this.interval = setInterval(() => {
            this.runOnce('scheduled').catch((error: unknown) => {
                log.error({ error: toError(error).message }, 'Scheduled export failed');
            });
        }, intervalMinutes * 60_000);
        this.interval.unref();
    }

    stop(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
            log.info('Export scheduler stopped');
        }
    }

    triggerRun(): Promise<ExportResult> {
        return this.runOnce('manual');
    }

    getStatus(): ExporterStatus {
        return {
            isRunning: this.isRunning,
            schedulerActive: this.interval !== null,
            intervalMinutes: this.deps.config.intervalMinutes,
            batchSize: this.deps.config.batchSize,
            lastRunAt: this.lastRunAt,
            lastResult: this.lastResult,
            lastError: this.lastError,
        };
    }
}
