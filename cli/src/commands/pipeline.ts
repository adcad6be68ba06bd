import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import {
  exportRunSchema,
  listOrdersResponseSchema,
  pipelineStatusSchema,
  processingStatusSchema,
  reconcileTriggerResponseSchema,
  replayResponseSchema,
  type ExportRunView,
  type ReconcileRunView,
} from '@order-bridge/shared/schemas';
import { api, type ApiResponse } from '../api.js';
import { error, field, heading, json, statusColor, success, table, warn, yesNo } from '../format.js';

interface OutputOptions {
  json?: boolean;
}

function orExit<T>(res: ApiResponse<T>, action: string): T {
  if (!res.ok) {
    error(`${action} failed: ${res.error}`);
    process.exit(1);
  }
  return res.data;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1 || limit > 500) {
    throw new InvalidArgumentError('Limit must be an integer between 1 and 500.');
  }
  return limit;
}

function showReconcileRun(run: ReconcileRunView): void {
  field('Started', run.startedAt);
  field('Trigger', run.trigger);
  field('Listed', run.listed);
  field('Queued', run.queued);
  field('Duplicate', run.duplicate);
  field('Recovered', run.recovered);
  field('Failed stores', run.failedStores > 0 ? chalk.red(run.failedStores) : 0);
  field('Duration', `${run.durationMs}ms`);
  if (run.error) field('Error', chalk.red(run.error));
}

function showExportRun(run: ExportRunView): void {
  field('Outcome', statusColor(run.outcome));
  switch (run.outcome) {
    case 'exported':
      field('Batch', run.batchId);
      field('Orders', run.orderCount);
      field('Excluded', run.excluded);
      field('Path', run.path);
      for (const [entity, rows] of Object.entries(run.rowCounts)) {
        field(`  ${entity}`, rows);
      }
      break;
    case 'rejected':
      field('Batch', run.batchId);
      field('Orders', run.orderCount);
      for (const violation of run.violations.slice(0, 20)) {
        console.log(`    ${chalk.red('•')} ${violation}`);
      }
      if (run.violations.length > 20) {
        console.log(chalk.dim(`    … ${run.violations.length - 20} more`));
      }
      break;
    case 'skipped':
      field('Reason', run.skipped === 'locked' ? 'Another export holds the lock' : 'No persisted orders');
      break;
  }
}

export function registerPipelineCommands(program: Command): void {
  program
    .command('status')
    .description('Queue, order counts, scheduler runs and circuit state')
    .option('--json', 'Print the raw response')
    .action(async (opts: OutputOptions) => {
      const status = orExit(await api('/api/pipeline/status', pipelineStatusSchema), 'Status');
      if (opts.json) return json(status);

      heading('Queue');
      field('Waiting', status.queue.waiting);
      field('In flight', status.queue.inFlight);
      field('Delayed', status.queue.delayed);
      field('Completed', status.queue.completed);
      field('Failed', status.queue.failed);
      field('Deduplicated', status.queue.deduplicated);
      field('Stopped', yesNo(status.queue.stopped));

      heading('Orders');
      for (const [processingStatus, count] of Object.entries(status.orders)) {
        field(processingStatus, count > 0 && processingStatus === 'Failed' ? chalk.red(count) : count);
      }

      heading('Reconciler');
      field('Running', yesNo(status.reconciler.isRunning));
      field('Scheduled', yesNo(status.reconciler.schedulerActive));
      if (status.reconciler.lastRunResult) showReconcileRun(status.reconciler.lastRunResult);

      heading('Exporter');
      field('Running', yesNo(status.exporter.isRunning));
      field('Scheduled', yesNo(status.exporter.schedulerActive));
      field('Last run', status.exporter.lastRunAt);
      if (status.exporter.lastError) field('Last error', chalk.red(status.exporter.lastError));
      if (status.exporter.lastResult) showExportRun(status.exporter.lastResult);

      heading('Marketplace API');
      field('Circuit', statusColor(status.circuit.state));
      field('Failures', status.circuit.failures);
      field('Next reset', status.circuit.nextResetAt);
      console.log();
    });

  program
    .command('reconcile')
    .description('Run the safety-net reconciler now and wait for the result')
    .option('--json', 'Print the raw response')
    .action(async (opts: OutputOptions) => {
      const res = await api('/api/pipeline/reconcile', reconcileTriggerResponseSchema, { method: 'POST' });
      if (!res.ok && res.status === 409) {
        warn('A reconcile run is already in progress');
        return;
      }
      const body = orExit(res, 'Reconcile');
      if (opts.json) return json(body);

      heading('Reconcile Run');
      if (body.result) showReconcileRun(body.result);
      console.log();
    });

  program
    .command('export')
    .description('Run the batch exporter now and wait for the result')
    .option('--json', 'Print the raw response')
    .action(async (opts: OutputOptions) => {
      const run = orExit(await api('/api/pipeline/export', exportRunSchema, { method: 'POST' }), 'Export');
      if (opts.json) return json(run);

      heading('Export Run');
      showExportRun(run);
      console.log();
    });

  program
    .command('orders')
    .description('List stored orders by processing status')
    .addOption(
      new Option('-s, --status <status>', 'Processing status').choices(processingStatusSchema.options).default('Failed')
    )
    .option('-l, --limit <n>', 'Maximum orders to list', parseLimit, 50)
    .option('--json', 'Print the raw response')
    .action(async (opts: OutputOptions & { status: string; limit: number }) => {
      const query = new URLSearchParams({ status: opts.status, limit: String(opts.limit) });
      const body = orExit(await api(`/api/pipeline/orders?${query.toString()}`, listOrdersResponseSchema), 'Listing orders');
      if (opts.json) return json(body);

      heading(`${opts.status} orders (${body.count})`);
      table(
        body.orders.map((o) => ({
          Channel: o.channel,
          Order: o.sourceOrderId,
          Status: statusColor(o.processingStatus),
          Updated: o.updatedAt,
          Batch: o.exportBatchId ?? '',
          Failure: o.failure ? `${o.failure.kind}: ${o.failure.message}` : '',
        }))
      );
      console.log();
    });

  program
    .command('replay <channel> <sourceOrderId>')
    .description('Send a Failed order back through the pipeline')
    .action(async (channel: string, sourceOrderId: string) => {
      const path = `/api/pipeline/orders/${encodeURIComponent(channel)}/${encodeURIComponent(sourceOrderId)}/replay`;
      const body = orExit(await api(path, replayResponseSchema, { method: 'POST' }), 'Replay');

      if (body.queued) {
        success(`${body.channel}/${body.sourceOrderId} is ${body.processingStatus} and queued`);
      } else {
        warn(`${body.channel}/${body.sourceOrderId} is ${body.processingStatus}; it was already queued`);
      }
    });
}
