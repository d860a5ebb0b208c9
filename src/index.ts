/**
 * cfmigrate - Route53 / Cloudflare record set comparison
 */

export { compareZones } from './core/compare.js';
export type { CompareDeps } from './core/compare.js';
export { loadConfig, mergeConfig, findConfigFile, parseConfigFile } from './core/config.js';
export {
  Route53Source,
  CloudflareSource,
  createRoute53Api,
  createCloudflareApi,
  resolveRoute53Zone,
  resolveCloudflareZone,
  getRoute53Records,
  getCloudflareRecords,
} from './sources/index.js';
export type { Route53Api, CloudflareApi } from './sources/index.js';
export { formatRecords, formatRecordsJson } from './output.js';
export { runCli, createProgram } from './program.js';
export * from './errors.js';
export * from './types.js';
