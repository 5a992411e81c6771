import { makeUser } from '@care-erp/shared/testing';
import { createSyncResources } from '@care-erp/server';
import { FakeErp, InMemoryHostRepository, testConfig } from '@care-erp/server/testing';
import { BulkSyncError, parseFilters, runBulkSync } from '../bulkSync.js';
import type { BulkSyncOptions, BulkSyncProgress } from '../bulkSync.js';

const OPTIONS: BulkSyncOptions = {
  filters: {},
  dryRun: false,
  batchSize: 50,
  continueOnError: false,
  includeDeleted: false,
};

function setup(userCount: number) {
  const erp = new FakeErp();
  const repository = new InMemoryHostRepository();
  for (let i = 1; i <= userCount; i++) {
    const n = String(i).padStart(2, '0');
    repository.users.set(`user-${n}`, makeUser({ externalId: `user-${n}`, username: `u${n}` }));
  }
  const sync = createSyncResources({ erp, repository, config: testConfig() });
  const events: BulkSyncProgress[] = [];
  let clock = 0;
  const deps = {
    repository,
    sync,
    onProgress: (event: BulkSyncProgress) => events.push(event),
    now: () => (clock += 100),
  };
  return { erp, repository, deps, events };
}

describe('parseFilters', () => {
  it('keeps key=value pairs and splits on the first =', () => {
    expect(parseFilters(['username=u01', 'junk', 'email=a=b', '=x'])).toEqual({ username: 'u01', email: 'a=b' });
  });
});

describe('runBulkSync', () => {
  it('syncs every record in batches', async () => {
    const { erp, deps, events } = setup(5);

    const stats = await runBulkSync('users', deps, { ...OPTIONS, batchSize: 2 });

    expect(stats).toEqual({ total: 5, success: 5, failed: 0, errors: [], preview: [], elapsedMs: 400 });
    expect(erp.callsTo('api/add/user')).toHaveLength(5);
    expect(events.filter((e) => e.type === 'batch')).toEqual([
      { type: 'batch', processed: 2, total: 5, elapsedMs: 100 },
      { type: 'batch', processed: 4, total: 5, elapsedMs: 200 },
      { type: 'batch', processed: 5, total: 5, elapsedMs: 300 },
    ]);
    expect(events[0]).toEqual({ type: 'record', processed: 1, total: 5, label: 'u01' });
  });

  it('lists at most fifteen records on a dry run and calls nothing', async () => {
    const { erp, deps } = setup(20);

    const stats = await runBulkSync('users', deps, { ...OPTIONS, dryRun: true });

    expect(stats.total).toBe(20);
    expect(stats.preview).toHaveLength(15);
    expect(stats.preview[0]).toBe('u01');
    expect(stats.preview[14]).toBe('u15');
    expect(erp.calls).toHaveLength(0);
  });

  it('records failures and keeps going with continueOnError', async () => {
    const { erp, deps } = setup(3);
    erp.failOnce('api/add/user', new Error('ERP unavailable'));

    const stats = await runBulkSync('users', deps, { ...OPTIONS, continueOnError: true });

    expect(stats.success).toBe(2);
    expect(stats.failed).toBe(1);
    expect(stats.errors).toEqual(['u01: ERP unavailable']);
  });

  it('stops at the first failure otherwise', async () => {
    const { erp, deps } = setup(3);
    erp.failOnce('api/add/user', new Error('ERP unavailable'));

    const run = runBulkSync('users', deps, OPTIONS);

    await expect(run).rejects.toThrow('Sync failed for u01: ERP unavailable. Use --continue-on-error to skip failures.');
    await expect(run).rejects.toBeInstanceOf(BulkSyncError);
    expect(erp.calls).toHaveLength(1);
  });

  it('applies filters', async () => {
    const { erp, deps } = setup(4);

    const stats = await runBulkSync('users', deps, { ...OPTIONS, filters: { username: 'u03' } });

    expect(stats.total).toBe(1);
    expect(erp.calls.map((call) => call.payload)).toEqual([expect.objectContaining({ login: 'u03' })]);
  });

  it('rejects an unknown filter key', async () => {
    const { deps } = setup(1);

    await expect(runBulkSync('users', deps, { ...OPTIONS, filters: { nickname: 'x' } })).rejects.toThrow(
      "Unknown filter 'nickname' for users. Allowed: external_id, username, email"
    );
  });

  it('skips deleted users unless asked', async () => {
    const { repository, deps } = setup(2);
    repository.users.set('user-02', makeUser({ externalId: 'user-02', username: 'u02', deleted: true }));

    expect((await runBulkSync('users', deps, OPTIONS)).total).toBe(1);
    expect((await runBulkSync('users', deps, { ...OPTIONS, includeDeleted: true })).total).toBe(2);
  });

  it('does nothing when no record matches', async () => {
    const { erp, deps } = setup(0);

    const stats = await runBulkSync('users', deps, OPTIONS);

    expect(stats).toEqual({ total: 0, success: 0, failed: 0, errors: [], preview: [], elapsedMs: null });
    expect(erp.calls).toHaveLength(0);
  });
});
