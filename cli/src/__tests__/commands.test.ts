import { describeConnection } from '../commands/connection.js';
import { overallLines, summaryLines } from '../commands/sync.js';

describe('describeConnection', () => {
  it('masks the password and names missing settings', () => {
    const report = describeConnection({ ERP_HOST: 'erp.test', ERP_USERNAME: 'admin', ERP_PASSWORD: 'test-secret' });

    expect(report.fields).toEqual([
      ['Host', 'erp.test'],
      ['Port', 'Not set'],
      ['Protocol', 'https'],
      ['Database', 'Not set'],
      ['Username', 'admin'],
      ['Password', '********'],
    ]);
    expect(report.missing).toEqual(['ERP_DATABASE']);
  });

  it('treats blank values as missing', () => {
    expect(describeConnection({ ERP_HOST: '  ' }).missing).toEqual([
      'ERP_HOST',
      'ERP_DATABASE',
      'ERP_USERNAME',
      'ERP_PASSWORD',
    ]);
  });
});

describe('sync summaries', () => {
  it('prints totals, time and the first errors', () => {
    const lines = summaryLines('users', {
      total: 3,
      success: 2,
      failed: 1,
      errors: ['u01: ERP unavailable'],
      preview: [],
      elapsedMs: 1234,
    });

    expect(lines).toEqual([
      'USERS SYNC SUMMARY',
      'Total:      3',
      'Success:    2',
      'Failed:     1',
      'Time:       1.23s',
      'Errors (first 5):',
      '  - u01: ERP unavailable',
    ]);
  });

  it('caps the error list at five', () => {
    const errors = ['a', 'b', 'c', 'd', 'e', 'f', 'g'].map((label) => `${label}: failed`);
    const lines = summaryLines('products', { total: 7, success: 0, failed: 7, errors, preview: [], elapsedMs: null });

    expect(lines.filter((text) => text.startsWith('  - '))).toHaveLength(5);
    expect(lines).not.toContain('  - f: failed');
  });

  it('adds up every resource type', () => {
    const lines = overallLines({
      users: { total: 3, success: 2, failed: 1, errors: ['u01: ERP unavailable'], preview: [], elapsedMs: 10 },
      products: { total: 2, success: 2, failed: 0, errors: [], preview: [], elapsedMs: 10 },
    });

    expect(lines).toEqual([
      'OVERALL SYNC SUMMARY',
      'Total records:  5',
      'Total success:  4',
      'Total failed:   1',
      'Completed with 1 failure(s)',
    ]);
  });
});
