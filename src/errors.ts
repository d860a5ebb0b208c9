/**
 * Error taxonomy. Every error is fatal; the CLI handler turns any of them
 * into a printed message and exit code 1.
 */

import type { ProviderName, ZoneId } from './types.js';

export type ErrorCode =
  | 'MISSING_FIELD'
  | 'CONFIG_FILE'
  | 'CLIENT_INIT'
  | 'ZONE_NOT_FOUND'
  | 'FETCH';

export class CfMigrateError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type ConfigField = 'cfemail' | 'cfkey' | 'awskey' | 'awssecret' | 'domain';

export class MissingFieldError extends CfMigrateError {
  readonly field: ConfigField;

  constructor(field: ConfigField, message: string) {
    super('MISSING_FIELD', message);
    this.field = field;
  }
}

export class ConfigFileError extends CfMigrateError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super('CONFIG_FILE', `Failed to load config file ${path}: ${errorMessage(cause)}`, { cause });
    this.path = path;
  }
}

export class ClientInitError extends CfMigrateError {
  readonly provider: ProviderName;

  constructor(provider: ProviderName, cause: unknown) {
    super('CLIENT_INIT', `Failed to create ${provider} client: ${errorMessage(cause)}`, { cause });
    this.provider = provider;
  }
}

export class ZoneNotFoundError extends CfMigrateError {
  readonly provider: ProviderName;
  readonly domain: string;

  constructor(provider: ProviderName, domain: string, message: string, cause?: unknown) {
    super('ZONE_NOT_FOUND', message, cause === undefined ? undefined : { cause });
    this.provider = provider;
    this.domain = domain;
  }
}

export class FetchError extends CfMigrateError {
  readonly provider: ProviderName;
  readonly zoneId: ZoneId;

  constructor(provider: ProviderName, zoneId: ZoneId, cause: unknown) {
    super('FETCH', `Failed to fetch ${provider} records for zone ${zoneId}: ${errorMessage(cause)}`, { cause });
    this.provider = provider;
    this.zoneId = zoneId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
