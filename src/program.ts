/**
 * cfmigrate command definition and top-level error handling
 */

import { Command, CommanderError } from 'commander';
import { compareZones } from './core/compare.js';
import type { CompareDeps } from './core/compare.js';
import { loadConfig } from './core/config.js';
import { errorMessage } from './errors.js';
import { formatRecords, formatRecordsJson } from './output.js';
import { createLogger } from './utils/logger.js';

export interface CliOptions {
  config?: string;
  cfemail?: string;
  cfkey?: string;
  awskey?: string;
  awssecret?: string;
  domain?: string;
  json?: boolean;
  verbose?: boolean;
}

export interface CliDeps extends Omit<CompareDeps, 'logger'> {
  version?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

export function createProgram(version: string, deps: Pick<CliDeps, 'stdout' | 'stderr'> = {}): Command {
  const program = new Command();

  program
    .name('cfmigrate')
    .description('Compare DNS record sets between AWS Route53 and Cloudflare for a domain')
    .version(version)
    .option('--config <path>', 'config file (default is $HOME/.cfmigrate.yaml)')
    .option('-e, --cfemail <email>', 'Cloudflare Email Address')
    .option('-k, --cfkey <key>', 'Cloudflare API Key')
    .option('-a, --awskey <key>', 'AWS Key')
    .option('-s, --awssecret <secret>', 'AWS Secret Key')
    .option('-d, --domain <domain>', 'Domain name to compare')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show progress details')
    .exitOverride();

  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const { stderr } = deps;
  program.configureOutput({
    writeOut: str => stdout(str.replace(/\n$/, '')),
    ...(stderr && { writeErr: (str: string) => stderr(str.replace(/\n$/, '')) }),
    // Usage errors are reported on stdout like every other failure
    outputError: str => stdout(str.replace(/\n$/, '')),
  });

  return program;
}

/**
 * Run the tool with user arguments (no node/script prefix).
 * Resolves to the process exit code; never exits by itself.
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((line: string) => console.log(line));
  const program = createProgram(deps.version ?? '0.0.0', deps);

  try {
    program.parse(args, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const options = program.opts<CliOptions>();
  const logger = createLogger({ verbose: options.verbose, write: deps.stderr });

  try {
    const credentials = await loadConfig({
      flags: {
        cfemail: options.cfemail,
        cfkey: options.cfkey,
        awskey: options.awskey,
        awssecret: options.awssecret,
        domain: options.domain,
      },
      configFile: options.config,
      env: deps.env,
      cwd: deps.cwd,
      homeDir: deps.homeDir,
      logger,
    });

    const result = await compareZones(credentials, {
      createRoute53Api: deps.createRoute53Api,
      createCloudflareApi: deps.createCloudflareApi,
      logger,
    });

    // Route53 records are collected but only the Cloudflare side is reported
    if (options.json) {
      stdout(formatRecordsJson(result.cloudflare.records));
    } else {
      stdout(formatRecords(result.domain, result.cloudflare.records));
    }

    return 0;
  } catch (err) {
    stdout(errorMessage(err));
    return 1;
  }
}
