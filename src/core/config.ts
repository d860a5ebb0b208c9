/**
 * Configuration loader
 *
 * Merges command flags, environment variables and an optional YAML/JSON
 * config file into a CredentialBundle. Per field: flag > env > file.
 */

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigFileError, MissingFieldError } from '../errors.js';
import type { ConfigField } from '../errors.js';
import type { CredentialBundle, Logger } from '../types.js';
import { normalizeDomain } from '../types.js';

export const CONFIG_FILE_NAMES = [
  '.cfmigrate.yaml',
  '.cfmigrate.yml',
  'cfmigrate.yaml',
  'cfmigrate.yml',
  'cfmigrate.json',
] as const;

export const ENV_VARS: Readonly<Record<ConfigField, string>> = {
  cfemail: 'CFEMAIL',
  cfkey: 'CFKEY',
  awskey: 'AWSKEY',
  awssecret: 'AWSSECRET',
  domain: 'DOMAIN',
};

/** Checked in this order; the first missing one is reported */
const REQUIRED_FIELDS: ReadonlyArray<readonly [ConfigField, string]> = [
  ['cfemail', 'No cloudflare email supplied'],
  ['cfkey', 'No cloudflare api key supplied'],
  ['awskey', 'No AWS key supplied'],
  ['awssecret', 'No AWS Secret Key supplied'],
  ['domain', 'No domain name supplied'],
];

export type ConfigValues = Partial<Record<ConfigField, string>>;

export interface LoadConfigOptions {
  /** Values given on the command line; undefined means not given */
  flags?: ConfigValues;
  /** Explicit config file path (--config) */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  homeDir?: string;
  logger?: Logger;
}

// A key left blank in YAML loads as null and counts as unset
const configValue = z
  .union([z.string(), z.number()])
  .nullish()
  .transform(value => (value == null ? undefined : String(value)));

const ConfigFileSchema = z
  .object({
    cfemail: configValue,
    cfkey: configValue,
    awskey: configValue,
    awssecret: configValue,
    domain: configValue,
  })
  .nullish()
  .transform(value => value ?? {});

/**
 * Parse config file contents (YAML, which also covers JSON)
 */
export function parseConfigFile(content: string): ConfigValues {
  const parsed = ConfigFileSchema.safeParse(yaml.load(content));
  if (!parsed.success) {
    throw new Error(formatIssues(parsed.error));
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

/**
 * Locate the config file: the explicit path if given, otherwise the first
 * well-known file name in the home directory, then the working directory.
 */
export async function findConfigFile(options: {
  configFile?: string;
  cwd: string;
  homeDir: string;
}): Promise<string | undefined> {
  if (options.configFile) {
    return path.resolve(options.cwd, options.configFile);
  }

  for (const dir of [options.homeDir, options.cwd]) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(dir, name);
      if (await fileExists(candidate)) {
        return candidate;
      }
    }
  }

  return undefined;
}

async function readConfigFile(filePath: string): Promise<ConfigValues> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    return parseConfigFile(content);
  } catch (err) {
    throw new ConfigFileError(filePath, err);
  }
}

/**
 * Pick one field's value by precedence. A flag given with an empty value
 * still wins; an empty environment variable counts as unset.
 */
export function resolveField(
  flag: string | undefined,
  envValue: string | undefined,
  fileValue: string | undefined
): string {
  if (flag !== undefined) {
    return flag;
  }
  if (envValue) {
    return envValue;
  }
  return fileValue ?? '';
}

/**
 * Merge already-gathered sources and check required fields in order
 */
export function mergeConfig(
  flags: ConfigValues,
  env: NodeJS.ProcessEnv,
  file: ConfigValues
): CredentialBundle {
  const pick = (field: ConfigField) => resolveField(flags[field], env[ENV_VARS[field]], file[field]);
  const values: Record<ConfigField, string> = {
    cfemail: pick('cfemail'),
    cfkey: pick('cfkey'),
    awskey: pick('awskey'),
    awssecret: pick('awssecret'),
    domain: normalizeDomain(pick('domain')),
  };

  for (const [field, message] of REQUIRED_FIELDS) {
    if (values[field].trim() === '') {
      throw new MissingFieldError(field, message);
    }
  }

  return Object.freeze({
    cfEmail: values.cfemail,
    cfKey: values.cfkey,
    awsKey: values.awskey,
    awsSecret: values.awssecret,
    domain: values.domain,
  });
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<CredentialBundle> {
  const cwd = options.cwd ?? process.cwd();
  const homeDir = options.homeDir ?? os.homedir();

  const configPath = await findConfigFile({ configFile: options.configFile, cwd, homeDir });
  let file: ConfigValues = {};
  if (configPath) {
    file = await readConfigFile(configPath);
    options.logger?.info(`Using config file: ${configPath}`);
  }

  return mergeConfig(options.flags ?? {}, options.env ?? process.env, file);
}
