#!/usr/bin/env tsx

import { Command } from 'commander';
import { registerConnectionCommands } from './commands/connection.js';
import { registerSyncCommands } from './commands/sync.js';

const program = new Command();

program
  .name('care-erp')
  .description('ERP sync CLI: bulk sync and connection checks')
  .version('1.0.0');

registerSyncCommands(program);
registerConnectionCommands(program);

// Filter out bare '--' that npm injects when forwarding args
const args = process.argv.filter((a) => a !== '--');
program.parseAsync(args).catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
