import { Command, Option } from 'commander';
import { GRAPH_AUTH_MODES } from '../modules/config/provisioning.config';

export const CLI_NAME = 'bulk-provision';
export const CLI_VERSION = '1.0.0';

export interface BulkProvisionOptions {
  logFile?: string;
  logLevel?: string;
  logFormat?: string;
  authMode?: string;
  tenant?: string;
}

export type BulkProvisionAction = (input: string, options: BulkProvisionOptions) => Promise<void>;

export function buildCli(action: BulkProvisionAction): Command {
  const program = new Command();
  program
    .name(CLI_NAME)
    .description('Create Microsoft Entra ID users from a CSV file through Microsoft Graph')
    .version(CLI_VERSION)
    .argument('<input>', 'CSV file with one user per row')
    .option('--log-file <path>', 'append-only log file (default: logs/bulk-user-provisioning.log)')
    .option('--log-level <level>', 'minimum level: TRACE, DEBUG, INFO, WARN, ERROR, FATAL or OFF')
    .addOption(new Option('--log-format <format>', 'console log format').choices(['pretty', 'json']))
    .addOption(new Option('--auth-mode <mode>', 'how to sign in to Microsoft Graph').choices([...GRAPH_AUTH_MODES]))
    .option('--tenant <id>', 'tenant id or domain to sign in to')
    .action(async (input: string, options: BulkProvisionOptions) => {
      await action(input, options);
    });
  return program;
}

const OPTION_ENV: ReadonlyArray<[keyof BulkProvisionOptions, string]> = [
  ['logFile', 'PROVISION_LOG_FILE'],
  ['logLevel', 'LOG_LEVEL'],
  ['logFormat', 'LOG_FORMAT'],
  ['authMode', 'GRAPH_AUTH_MODE'],
  ['tenant', 'GRAPH_TENANT_ID'],
];

/** Command-line options win over the environment that ConfigModule reads. */
export function applyCliOverrides(options: BulkProvisionOptions, env: NodeJS.ProcessEnv = process.env): void {
  for (const [option, key] of OPTION_ENV) {
    const value = options[option];
    if (value !== undefined) env[key] = value;
  }
}
