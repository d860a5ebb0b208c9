/**
 * Report formatting
 */

import { inspect } from 'node:util';
import type { NormalizedRecord } from './types.js';

/**
 * Verbose structural dump for eyeballing, not for parsing
 */
export function formatRecords(domain: string, records: NormalizedRecord[]): string {
  const dump = inspect(records, {
    depth: null,
    compact: false,
    colors: false,
    maxArrayLength: null,
    maxStringLength: null,
  });

  return `Cloudflare records for ${domain} (${records.length}):\n${dump}`;
}

export function formatRecordsJson(records: NormalizedRecord[]): string {
  return JSON.stringify(records, null, 2);
}
