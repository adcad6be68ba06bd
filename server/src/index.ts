/**
 * Order Bridge server entry point
 *
 * Wires the pipeline together and owns process lifecycle:
 * 1. Validate environment, load kit and attribution reference data
 * 2. Build the ledger, order store and export lock for STORE_BACKEND
 * 3. Start the processing queue with the pipeline as its consumer
 * 4. Listen for webhooks and admin calls
 * 5. Start the reconcile and export schedulers
 *
 * SIGTERM/SIGINT run the shutdown coordinator phase by phase.
 */

import { env } from './config/env.js';
import {
    CHANNEL_ATTRIBUTION_RULES,
    DEFAULT_KIT_DEFINITIONS_PATH,
    buildPipelineConfig,
    loadKitDefinitions,
} from './config/index.js';
import { buildKitLookup } from '@order-bridge/shared/domain';
import { createApp } from './app.js';
import { closeKysely, createKysely } from './db/index.js';
import { BatchExporter, InMemoryExportLock, PostgresAdvisoryLock, type ExportLock } from './services/batchExporter/index.js';
import { InMemoryDedupLedger, KyselyDedupLedger, type DedupLedger } from './services/dedupLedger/index.js';
import { MarketplaceClient, StaticTokenProvider } from './services/marketplace/index.js';
import { OrderFetcher } from './services/orderFetcher.js';
import { OrderIntake } from './services/orderIntake.js';
import { OrderPipeline } from './services/orderPipeline.js';
import { InMemoryOrderStore, KyselyOrderStore, type OrderStore } from './services/orderStore/index.js';
import { ProcessingQueue } from './services/processingQueue.js';
import { SafetyNetReconciler } from './services/safetyNetReconciler.js';
import { scheduledWorker, startAllWorkers } from './services/workerRegistry.js';
import { toError } from './utils/errors.js';
import { systemLogger as log } from './utils/logger.js';
import shutdownCoordinator from './utils/shutdownCoordinator.js';

interface Backends {
    ledger: DedupLedger;
    store: OrderStore;
    exportLock: ExportLock;
}

function createBackends(): Backends {
    if (env.STORE_BACKEND === 'memory') {
        log.warn('STORE_BACKEND=memory: ledger and orders are lost on restart');
        return { ledger: new InMemoryDedupLedger(), store: new InMemoryOrderStore(), exportLock: new InMemoryExportLock() };
    }

    if (!env.DATABASE_URL) {
        throw new Error('DATABASE_URL is required when STORE_BACKEND=postgres');
    }
    const db = createKysely(env.DATABASE_URL);
    shutdownCoordinator.register('database', 'resources', () => closeKysely(), 10_000);
    return { ledger: new KyselyDedupLedger(db), store: new KyselyOrderStore(db), exportLock: new PostgresAdvisoryLock(db) };
}

async function main(): Promise<void> {
    const config = buildPipelineConfig(env);
    const kits = buildKitLookup(loadKitDefinitions(env.KIT_DEFINITIONS_PATH ?? DEFAULT_KIT_DEFINITIONS_PATH));
    const { ledger, store, exportLock } = createBackends();

    const marketplace = new MarketplaceClient({
        baseUrl: env.MARKETPLACE_API_BASE_URL,
        tokenProvider: new StaticTokenProvider(env.MARKETPLACE_ACCESS_TOKEN),
        timeoutMs: config.fetch.timeoutMs,
        maxAttempts: config.fetch.maxAttempts,
        baseDelayMs: config.fetch.baseDelayMs,
    });

    const queue = new ProcessingQueue(config.queue);
    const intake = new OrderIntake(ledger, queue);
    const pipeline = new OrderPipeline({
        store,
        ledger,
        fetcher: new OrderFetcher(marketplace),
        queue,
        transformContext: { channel: config.channel, attributionRules: CHANNEL_ATTRIBUTION_RULES, kits },
        persist: config.persist,
    });

    const reconciler = new SafetyNetReconciler({
        client: marketplace,
        intake,
        ledger,
        queue,
        channel: config.channel,
        storeIds: config.storeIds,
        config: config.reconcile,
    });
    const exporter = new BatchExporter({
        store,
        lock: exportLock,
        attributionRules: CHANNEL_ATTRIBUTION_RULES,
        config: config.export,
    });

    queue.start(pipeline.handler);
    shutdownCoordinator.register('processingQueue', 'queue', () => queue.stop(), 30_000);

    const app = createApp({
        webhook: {
            intake,
            secret: env.MARKETPLACE_WEBHOOK_SECRET,
            channel: config.channel,
            ackDeadlineMs: config.webhookAckDeadlineMs,
        },
        pipeline: { adminToken: env.ADMIN_API_TOKEN, store, queue, reconciler, exporter, marketplace },
        isShuttingDown: () => shutdownCoordinator.isInProgress(),
    });

    const server = app.listen(env.PORT, () => {
        log.info({ port: env.PORT, channel: config.channel, stores: config.storeIds.length, backend: env.STORE_BACKEND }, 'Order Bridge listening');
    });
    shutdownCoordinator.register('httpServer', 'intake', () =>
        new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())))
    );

    if (config.storeIds.length === 0) {
        log.warn('MARKETPLACE_STORE_IDS is empty: the reconciler will only recover stranded claims');
    }
    startAllWorkers(
        [scheduledWorker('safetyNetReconciler', reconciler), scheduledWorker('batchExporter', exporter)],
        shutdownCoordinator,
        { disabled: env.DISABLE_BACKGROUND_WORKERS === 'true' }
    );
}

function onSignal(signal: NodeJS.Signals): void {
    log.info({ signal }, 'Shutdown signal received');
    shutdownCoordinator
        .shutdown()
        .then(results => process.exit(results.every(r => r.success) ? 0 : 1))
        .catch((error: unknown) => {
            log.error({ error: toError(error).message }, 'Shutdown failed');
            process.exit(1);
        });
}

process.once('SIGTERM', onSignal);
process.once('SIGINT', onSignal);

main().catch((error: unknown) => {
    log.fatal({ error: toError(error).message, stack: toError(error).stack }, 'Startup failed');
    process.exit(1);
});
