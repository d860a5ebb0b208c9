/**
 * Cloudflare DNS record source
 *
 * Authenticates with the Global API Key + account email.
 * API tokens are deliberately not read: an ambient CLOUDFLARE_API_TOKEN
 * would otherwise take precedence over the supplied key.
 */

import Cloudflare from 'cloudflare';
import { ClientInitError, FetchError, ZoneNotFoundError, errorMessage } from '../errors.js';
import type { CredentialBundle, DnsSource, NormalizedRecord, ZoneId } from '../types.js';

export interface CloudflareZoneSummary {
  id: string;
  name: string;
}

export interface CloudflareRecordSummary {
  name?: string;
  type?: string;
  ttl?: number;
  content?: string;
}

/**
 * The slice of the Cloudflare SDK client this tool calls. Both list calls
 * auto-paginate when iterated. The SDK's `Cloudflare` class satisfies it.
 */
export interface CloudflareApi {
  zones: {
    list(query: { name: string }): AsyncIterable<CloudflareZoneSummary>;
  };
  dns: {
    records: {
      list(params: { zone_id: string }): AsyncIterable<CloudflareRecordSummary>;
    };
  };
}

export function createCloudflareApi(credentials: CredentialBundle): CloudflareApi {
  if (!credentials.cfKey || !credentials.cfEmail) {
    throw new ClientInitError(
      'cloudflare',
      new Error('invalid credentials: key & email must not be empty')
    );
  }

  try {
    return new Cloudflare({
      apiEmail: credentials.cfEmail,
      apiKey: credentials.cfKey,
      apiToken: null,
    });
  } catch (err) {
    throw new ClientInitError('cloudflare', err);
  }
}

export class CloudflareSource implements DnsSource {
  name = 'Cloudflare';
  private api: CloudflareApi;

  constructor(api: CloudflareApi) {
    this.api = api;
  }

  async resolveZone(domain: string): Promise<ZoneId> {
    return resolveCloudflareZone(this.api, domain);
  }

  async fetchRecords(zoneId: ZoneId): Promise<NormalizedRecord[]> {
    return getCloudflareRecords(this.api, zoneId);
  }
}

/**
 * Map a domain name to its Cloudflare zone id
 */
export async function resolveCloudflareZone(api: CloudflareApi, domain: string): Promise<ZoneId> {
  try {
    for await (const zone of api.zones.list({ name: domain })) {
      if (zone.name === domain) {
        return zone.id;
      }
    }
  } catch (err) {
    throw new ZoneNotFoundError('cloudflare', domain, errorMessage(err), err);
  }

  throw new ZoneNotFoundError('cloudflare', domain, 'Zone could not be found');
}

/**
 * Fetch every DNS record of a zone
 */
export async function getCloudflareRecords(api: CloudflareApi, zoneId: ZoneId): Promise<NormalizedRecord[]> {
  const records: NormalizedRecord[] = [];

  try {
    for await (const record of api.dns.records.list({ zone_id: zoneId })) {
      records.push(normalizeCloudflareRecord(record));
    }
  } catch (err) {
    throw new FetchError('cloudflare', zoneId, err);
  }

  return records;
}

export function normalizeCloudflareRecord(record: CloudflareRecordSummary): NormalizedRecord {
  return {
    name: record.name ?? '',
    type: record.type ?? '',
    ttl: record.ttl ?? 0,
    values: [record.content ?? ''],
  };
}
