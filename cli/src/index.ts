#!/usr/bin/env node

import { Command } from 'commander';
import { registerAuthCommands } from './commands/auth.js';
import { registerPipelineCommands } from './commands/pipeline.js';
import { registerInfraCommands } from './commands/infra.js';

const program = new Command();

program
  .name('bridge')
  .description('Order Bridge CLI: pipeline status and operator actions')
  .version('1.0.0');

// Auth (top-level)
registerAuthCommands(program);

// Pipeline commands
registerPipelineCommands(program);

// System commands
registerInfraCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
program.parseAsync(args).catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
