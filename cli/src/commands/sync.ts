import { Command, InvalidArgumentError } from 'commander';
import { buildPluginConfig, createContainer, destroyKysely, parseEnv } from '@care-erp/server';
import type { BulkSyncKind } from '@care-erp/server';
import {
  BULK_KINDS,
  BulkSyncError,
  DEFAULT_BATCH_SIZE,
  DRY_RUN_PREVIEW,
  errorMessage,
  isBulkKind,
  parseFilters,
  runBulkSync,
} from '../bulkSync.js';
import type { BulkSyncDeps, BulkSyncProgress, BulkSyncStats } from '../bulkSync.js';
import { dim, error, heading, line, success, table, warn } from '../format.js';

interface SyncCommandOptions {
  filter: string[];
  dryRun?: boolean;
  batchSize: number;
  continueOnError?: boolean;
  progress?: boolean;
  includeDeleted?: boolean;
}

const KIND_ORDER: BulkSyncKind[] = ['users', 'products', 'categories', 'suppliers'];

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

// ============================================
// SUMMARIES
// ============================================

export function summaryLines(kind: string, stats: BulkSyncStats): string[] {
  const lines = [
    `${kind.toUpperCase()} SYNC SUMMARY`,
    `Total:      ${stats.total}`,
    `Success:    ${stats.success}`,
  ];
  if (stats.failed > 0) lines.push(`Failed:     ${stats.failed}`);
  if (stats.elapsedMs !== null) lines.push(`Time:       ${(stats.elapsedMs / 1000).toFixed(2)}s`);
  if (stats.errors.length > 0) {
    lines.push('Errors (first 5):', ...stats.errors.slice(0, 5).map((message) => `  - ${message}`));
  }
  return lines;
}

export function overallLines(all: Partial<Record<BulkSyncKind, BulkSyncStats>>): string[] {
  const stats = KIND_ORDER.flatMap((kind) => {
    const entry = all[kind];
    return entry ? [entry] : [];
  });
  const total = stats.reduce((sum, s) => sum + s.total, 0);
  const succeeded = stats.reduce((sum, s) => sum + s.success, 0);
  const failed = stats.reduce((sum, s) => sum + s.failed, 0);

  const lines = ['OVERALL SYNC SUMMARY', `Total records:  ${total}`, `Total success:  ${succeeded}`];
  if (failed > 0) lines.push(`Total failed:   ${failed}`);
  lines.push(failed === 0 ? 'All syncs completed successfully!' : `Completed with ${failed} failure(s)`);
  return lines;
}

function printProgress(show: boolean): (event: BulkSyncProgress) => void {
  return (event) => {
    switch (event.type) {
      case 'record':
        if (show) line(`[${event.processed}/${event.total}] Syncing: ${event.label}...`);
        break;
      case 'synced':
        if (show) success('  Synced');
        break;
      case 'failed':
        if (show) error(`  Failed: ${event.message}`);
        break;
      case 'batch': {
        if (show) break;
        const seconds = event.elapsedMs / 1000;
        const rate = seconds > 0 ? event.processed / seconds : 0;
        dim(`Progress: ${event.processed}/${event.total} (${rate.toFixed(1)}/sec)`);
        break;
      }
    }
  };
}

function printStats(kind: BulkSyncKind, stats: BulkSyncStats, dryRun: boolean): void {
  if (stats.total === 0) {
    warn('No records found matching criteria');
    return;
  }
  if (dryRun) {
    line(`Found ${stats.total} record(s) to sync`);
    line('Records that would be synced:');
    for (const label of stats.preview) line(`  - ${label}`);
    const remaining = stats.total - DRY_RUN_PREVIEW;
    if (remaining > 0) dim(`  ... and ${remaining} more records`);
    return;
  }
  const [title, ...rest] = summaryLines(kind, stats);
  heading(title ?? kind);
  for (const text of rest) line(text);
}

// ============================================
// COMMAND
// ============================================

export function registerSyncCommands(program: Command): void {
  program
    .command('sync')
    .description('Sync host records to the ERP')
    .argument('[resource]', `${KIND_ORDER.join(' | ')} | all | list`, 'list')
    .option('-f, --filter <key=value>', 'filter records; repeatable', collect, [])
    .option('--dry-run', 'show what would be synced without calling the ERP')
    .option('--batch-size <n>', 'records per batch', positiveInt, DEFAULT_BATCH_SIZE)
    .option('--continue-on-error', 'keep going when a record fails')
    .option('--progress', 'print every record')
    .option('--include-deleted', 'include soft-deleted users')
    .action(async (resource: string, opts: SyncCommandOptions) => {
      if (resource === 'list') {
        heading('Available resource types');
        table(KIND_ORDER.map((kind) => ({ type: kind, description: BULK_KINDS[kind].description })));
        line('\nUsage: care-erp sync <resource_type>');
        line('       care-erp sync all  (sync everything)');
        return;
      }

      const kinds = resource === 'all' ? KIND_ORDER : isBulkKind(resource) ? [resource] : null;
      if (!kinds) {
        error(`Unknown resource type '${resource}'. Run 'care-erp sync list'.`);
        process.exitCode = 1;
        return;
      }

      const dryRun = opts.dryRun ?? false;
      const continueOnError = opts.continueOnError ?? false;
      if (dryRun) warn('DRY RUN MODE - No changes will be made');

      const env = parseEnv();
      const container = createContainer(buildPluginConfig(env), env.DATABASE_URL);
      const deps: BulkSyncDeps = {
        repository: container.repository,
        sync: container.sync,
        onProgress: printProgress(opts.progress ?? false),
      };
      const results: Partial<Record<BulkSyncKind, BulkSyncStats>> = {};

      try {
        for (const kind of kinds) {
          heading(`Syncing ${kind}`);
          try {
            const stats = await runBulkSync(kind, deps, {
              filters: parseFilters(opts.filter),
              dryRun,
              batchSize: opts.batchSize,
              continueOnError,
              includeDeleted: opts.includeDeleted ?? false,
            });
            results[kind] = stats;
            printStats(kind, stats, dryRun);
          } catch (err: unknown) {
            if (err instanceof BulkSyncError) {
              results[kind] = err.stats;
              printStats(kind, err.stats, false);
            }
            error(`Failed to sync ${kind}: ${errorMessage(err)}`);
            process.exitCode = 1;
            if (!continueOnError) break;
          }
        }

        if (resource === 'all' && !dryRun) {
          const [title, ...rest] = overallLines(results);
          heading(title ?? 'Summary');
          for (const text of rest) line(text);
        }
      } finally {
        await destroyKysely();
      }
    });
}
