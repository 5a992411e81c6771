import { Command } from 'commander';
import { ERP_ENDPOINTS, formatIssues } from '@care-erp/shared';
import { buildErpConfig, ErpClient, ERP_REQUIRED_SETTINGS, erpEnvSchema } from '@care-erp/server';
import { errorMessage } from '../bulkSync.js';
import { dim, error, field, heading, line, success, warn } from '../format.js';

export interface ConnectionReport {
  fields: Array<[label: string, value: string]>;
  missing: string[];
}

/**
 * What the ERP connection settings look like, password masked.
 */
export function describeConnection(env: NodeJS.ProcessEnv): ConnectionReport {
  const value = (key: string): string => env[key]?.trim() ?? '';
  const orNotSet = (key: string): string => value(key) || 'Not set';

  return {
    fields: [
      ['Host', orNotSet('ERP_HOST')],
      ['Port', orNotSet('ERP_PORT')],
      ['Protocol', value('ERP_PROTOCOL') || 'https'],
      ['Database', orNotSet('ERP_DATABASE')],
      ['Username', orNotSet('ERP_USERNAME')],
      ['Password', value('ERP_PASSWORD') ? '********' : 'Not set'],
    ],
    missing: ERP_REQUIRED_SETTINGS.filter((key) => !value(key)),
  };
}

export function registerConnectionCommands(program: Command): void {
  program
    .command('check-connection')
    .description('Show the ERP settings and test the connection')
    .action(async () => {
      const report = describeConnection(process.env);

      heading('Configuration');
      for (const [label, text] of report.fields) field(label, text);

      if (report.missing.length > 0) {
        error(`Missing required settings: ${report.missing.join(', ')}`);
        process.exitCode = 1;
        return;
      }
      success('All required settings are configured');

      const parsed = erpEnvSchema.safeParse(process.env);
      if (!parsed.success) {
        error(`Invalid settings: ${formatIssues(parsed.error.issues)}`);
        process.exitCode = 1;
        return;
      }

      const client = new ErpClient(buildErpConfig(parsed.data));
      field('ERP URL', client.urlFor(''));
      line('\nTesting connection...');

      try {
        const response = await client.call(ERP_ENDPOINTS.health, {}, 'GET');
        success(`Connection successful! Response: ${JSON.stringify(response)}`);
      } catch (err: unknown) {
        warn(`Connection test result: ${errorMessage(err)}`);
        dim('The health endpoint may not be available. Try a sync command to verify full functionality.');
      }
    });
}
