import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { getBaseUrl } from '../api.js';
import { error, field, heading } from '../format.js';

const healthSchema = z.object({ status: z.string() });

export function registerInfraCommands(program: Command): void {
  program
    .command('health')
    .description('Check server health (no token needed)')
    .action(async () => {
      const start = Date.now();
      try {
        const res = await fetch(`${getBaseUrl()}/api/health`);
        const elapsed = Date.now() - start;
        const body = healthSchema.safeParse(await res.json());

        heading('Server Health');
        field('Status', res.ok ? chalk.green('Healthy') : chalk.red('Unhealthy'));
        field('Reported', body.success ? body.data.status : null);
        field('Response Time', `${elapsed}ms`);
      } catch (err) {
        error(`Server unreachable at ${getBaseUrl()}: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
      console.log();
    });
}
