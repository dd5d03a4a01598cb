#!/usr/bin/env node
/**
 * version-sync CLI - Mirror deployed service versions onto Uptime Kuma monitors
 *
 * Commands:
 * - run: Fetch each service's version and reconcile its monitor's version tag
 * - validate: Check the service list and connection settings offline
 *
 * Every flag falls back to an environment variable, so the tool runs
 * unchanged as a Kubernetes CronJob.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { CommandContext, GlobalOptions } from './types.js';
import { runCommand, validateCommand } from './commands/index.js';
import { parseBooleanSetting, parseTimeoutMs } from './config/index.js';
import { errorMessage } from './api/errors.js';
import { logger } from './api/logger.js';
import { printResult, error } from './utils/output.js';

const VERSION = '0.1.0';

type GlobalFlags = {
  json: boolean;
  verbose: boolean;
};

type ConnectionFlags = {
  url?: string;
  username?: string;
  password?: string;
  apiToken?: string;
  verifyTls?: boolean;
  apiTimeout?: number;
  services?: string;
  servicesFile?: string;
};

type RunFlags = ConnectionFlags & {
  tagColor?: string;
  fetchTimeout?: number;
  dryRun: boolean;
};

/**
 * Create the command context from parsed options
 */
function createContext(flags: GlobalFlags): CommandContext {
  const options: GlobalOptions = { json: flags.json, verbose: flags.verbose };
  if (options.verbose) {
    logger.setConfig({ level: 'debug', stacks: true });
  }
  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
  };
}

function timeoutArg(value: string): number {
  try {
    return parseTimeoutMs(value);
  } catch (err) {
    throw new InvalidArgumentError(errorMessage(err));
  }
}

/**
 * Connection and service-list options shared by every command
 */
function addConnectionOptions(command: Command): Command {
  return command
    .addOption(new Option('--url <url>', 'Uptime Kuma base URL').env('UPTIME_KUMA_URL'))
    .addOption(new Option('--username <name>', 'Uptime Kuma username').env('UPTIME_KUMA_USERNAME'))
    .addOption(
      new Option('--password <password>', 'Uptime Kuma password').env('UPTIME_KUMA_PASSWORD')
    )
    .addOption(
      new Option('--api-token <token>', 'Uptime Kuma session token (takes precedence over password)')
        .env('UPTIME_KUMA_API_TOKEN')
    )
    .addOption(
      new Option('--verify-tls <boolean>', 'Verify TLS certificates ("true" to enable)')
        .env('VERIFY_SSL')
        .argParser(parseBooleanSetting)
    )
    .addOption(
      new Option('--api-timeout <ms>', 'Uptime Kuma connect/request timeout')
        .env('UPTIME_KUMA_TIMEOUT_MS')
        .argParser(timeoutArg)
    )
    .addOption(
      new Option('--services <json>', 'Service list as a JSON array').env('SERVICES_CONFIG')
    )
    .addOption(
      new Option('--services-file <path>', 'Service list file (YAML or JSON)').env('SERVICES_FILE')
    );
}

/**
 * Main CLI program
 */
const program = new Command()
  .name('version-sync')
  .description('Mirror deployed service versions onto Uptime Kuma monitor tags')
  .version(VERSION)
  .addOption(
    new Option('--json', 'Output JSON for CI/automation')
      .default(false)
  )
  .addOption(
    new Option('-v, --verbose', 'Enable verbose logging')
      .default(false)
  );

/**
 * run command - Reconcile every configured service once
 */
addConnectionOptions(
  program
    .command('run', { isDefault: true })
    .description('Fetch service versions and update monitor version tags')
)
  .addOption(
    new Option('--tag-color <color>', 'Color for newly created tags')
      .env('VERSION_TAG_COLOR')
  )
  .addOption(
    new Option('--fetch-timeout <ms>', 'Timeout for each version endpoint')
      .env('VERSION_FETCH_TIMEOUT_MS')
      .argParser(timeoutArg)
  )
  .addOption(
    new Option('--dry-run', 'Show what would change without touching any monitor')
      .default(false)
  )
  .action(async (_options: unknown, command: Command) => {
    const ctx = createContext(program.opts<GlobalFlags>());
    const flags = command.opts<RunFlags>();

    try {
      const result = await runCommand(ctx, {
        url: flags.url,
        username: flags.username,
        password: flags.password,
        apiToken: flags.apiToken,
        verifyTls: flags.verifyTls,
        timeoutMs: flags.apiTimeout,
        servicesJson: flags.services,
        servicesFile: flags.servicesFile,
        tagColor: flags.tagColor,
        fetchTimeoutMs: flags.fetchTimeout,
        dryRun: flags.dryRun,
      });

      if (ctx.outputFormat === 'json') {
        printResult(result, ctx.outputFormat);
      }

      process.exit(result.success ? 0 : 1);
    } catch (err) {
      error(`Run failed: ${errorMessage(err)}`);
      process.exit(1);
    }
  });

/**
 * validate command - Check configuration without connecting
 */
addConnectionOptions(
  program
    .command('validate')
    .description('Validate the service list and connection settings without connecting')
).action(async (_options: unknown, command: Command) => {
  const ctx = createContext(program.opts<GlobalFlags>());
  const flags = command.opts<ConnectionFlags>();

  try {
    const result = await validateCommand(ctx, {
      url: flags.url,
      username: flags.username,
      password: flags.password,
      apiToken: flags.apiToken,
      verifyTls: flags.verifyTls,
      timeoutMs: flags.apiTimeout,
      servicesJson: flags.services,
      servicesFile: flags.servicesFile,
    });

    if (ctx.outputFormat === 'json') {
      printResult(result, ctx.outputFormat);
    }

    process.exit(result.success ? 0 : 1);
  } catch (err) {
    error(`Validate failed: ${errorMessage(err)}`);
    process.exit(1);
  }
});

// Parse and execute
await program.parseAsync();
