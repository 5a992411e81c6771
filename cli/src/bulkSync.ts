/**
 * Bulk sync of catalog and user records
 *
 * Walks one host record set in batches and pushes every record through its
 * sync resource. Printing is left to the caller through `onProgress`.
 */

import type { BulkSyncKind, ErpId, HostRepository, ListOptions, SyncResources, SyncTargetRef } from '@care-erp/server';

export const DRY_RUN_PREVIEW = 15;
export const DEFAULT_BATCH_SIZE = 50;

export interface BulkKindInfo {
  description: string;
  sync: (sync: SyncResources, externalId: string) => Promise<ErpId>;
}

export const BULK_KINDS: Record<BulkSyncKind, BulkKindInfo> = {
  users: {
    description: 'Sync host users to the ERP',
    sync: (sync, id) => sync.syncUser(id),
  },
  products: {
    description: 'Sync charge item definitions as ERP products',
    sync: (sync, id) => sync.syncChargeItemDefinition(id),
  },
  categories: {
    description: 'Sync charge item categories to the ERP',
    sync: (sync, id) => sync.syncCategory(id),
  },
  suppliers: {
    description: 'Sync supplier organizations as ERP partners',
    sync: (sync, id) => sync.syncSupplier(id),
  },
};

export function isBulkKind(value: string): value is BulkSyncKind {
  return Object.hasOwn(BULK_KINDS, value);
}

/** `key=value` pairs; entries without `=` are ignored, the value may contain `=` */
export function parseFilters(args: readonly string[]): Record<string, string> {
  const filters: Record<string, string> = {};
  for (const arg of args) {
    const at = arg.indexOf('=');
    if (at <= 0) continue;
    filters[arg.slice(0, at)] = arg.slice(at + 1);
  }
  return filters;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ============================================
// RUN
// ============================================

export interface BulkSyncOptions {
  filters: Record<string, string>;
  dryRun: boolean;
  batchSize: number;
  continueOnError: boolean;
  includeDeleted: boolean;
}

export type BulkSyncProgress =
  | { type: 'record'; processed: number; total: number; label: string }
  | { type: 'synced'; label: string }
  | { type: 'failed'; label: string; message: string }
  | { type: 'batch'; processed: number; total: number; elapsedMs: number };

export interface BulkSyncStats {
  total: number;
  success: number;
  failed: number;
  /** `label: message`, in order */
  errors: string[];
  /** Dry run only: the first records that would be synced */
  preview: string[];
  elapsedMs: number | null;
}

export interface BulkSyncDeps {
  repository: Pick<HostRepository, 'listSyncTargets' | 'countSyncTargets'>;
  sync: SyncResources;
  onProgress?: (event: BulkSyncProgress) => void;
  now?: () => number;
}

/** Stops a run that is not continuing on error; carries the stats so far */
export class BulkSyncError extends Error {
  readonly name = 'BulkSyncError' as const;

  constructor(message: string, readonly stats: BulkSyncStats) {
    super(message);
    Object.setPrototypeOf(this, BulkSyncError.prototype);
  }
}

export async function runBulkSync(kind: BulkSyncKind, deps: BulkSyncDeps, options: BulkSyncOptions): Promise<BulkSyncStats> {
  const now = deps.now ?? Date.now;
  const emit = deps.onProgress ?? (() => undefined);
  const scope: ListOptions = { filters: options.filters, includeDeleted: options.includeDeleted };

  const stats: BulkSyncStats = {
    total: await deps.repository.countSyncTargets(kind, scope),
    success: 0,
    failed: 0,
    errors: [],
    preview: [],
    elapsedMs: null,
  };
  if (stats.total === 0) return stats;

  if (options.dryRun) {
    const preview = await deps.repository.listSyncTargets(kind, { ...scope, limit: DRY_RUN_PREVIEW });
    stats.preview = preview.map((target) => target.label);
    return stats;
  }

  const batchSize = Math.max(1, options.batchSize);
  const start = now();
  let processed = 0;

  for (let offset = 0; offset < stats.total; offset += batchSize) {
    const batch: SyncTargetRef[] = await deps.repository.listSyncTargets(kind, { ...scope, limit: batchSize, offset });
    if (batch.length === 0) break;

    for (const target of batch) {
      processed += 1;
      emit({ type: 'record', processed, total: stats.total, label: target.label });
      try {
        await BULK_KINDS[kind].sync(deps.sync, target.externalId);
        stats.success += 1;
        emit({ type: 'synced', label: target.label });
      } catch (err: unknown) {
        const message = errorMessage(err);
        stats.failed += 1;
        stats.errors.push(`${target.label}: ${message}`);
        emit({ type: 'failed', label: target.label, message });

        if (!options.continueOnError) {
          stats.elapsedMs = now() - start;
          throw new BulkSyncError(
            `Sync failed for ${target.label}: ${message}. Use --continue-on-error to skip failures.`,
            stats,
          );
        }
      }
    }

    emit({ type: 'batch', processed, total: stats.total, elapsedMs: now() - start });
  }

  stats.elapsedMs = now() - start;
  return stats;
}
