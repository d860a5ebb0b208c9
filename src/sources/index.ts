export {
  Route53Source,
  createRoute53Api,
  resolveRoute53Zone,
  getRoute53Records,
  normalizeRoute53Record,
} from './aws.js';
export type { Route53Api, HostedZoneSummary, RecordSetSummary, RecordSetPage } from './aws.js';
export {
  CloudflareSource,
  createCloudflareApi,
  resolveCloudflareZone,
  getCloudflareRecords,
  normalizeCloudflareRecord,
} from './cloudflare.js';
export type { CloudflareApi, CloudflareZoneSummary, CloudflareRecordSummary } from './cloudflare.js';
