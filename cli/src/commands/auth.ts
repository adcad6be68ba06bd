import { Command } from 'commander';
import { pipelineStatusSchema } from '@order-bridge/shared/schemas';
import { api, clearToken, getBaseUrl, saveToken } from '../api.js';
import { error, success } from '../format.js';

export function registerAuthCommands(program: Command): void {
  program
    .command('login <token>')
    .description('Verify an admin API token and save it for later commands')
    .action(async (token: string) => {
      const res = await api('/api/pipeline/status', pipelineStatusSchema, { token });
      if (!res.ok) {
        error(`Token rejected by ${getBaseUrl()}: ${res.error}`);
        process.exit(1);
      }
      saveToken(token);
      success(`Token saved for ${getBaseUrl()}`);
    });

  program
    .command('logout')
    .description('Forget the saved admin token')
    .action(() => {
      clearToken();
      success('Token removed');
    });
}
