/**
 * AWS Route53 record source
 *
 * Authenticates with a static access key / secret pair. Route53 is a global
 * service, so the client is always pinned to us-east-1.
 */

import { Route53 } from '@aws-sdk/client-route-53';
import type {
  ListHostedZonesByNameCommandInput,
  ListResourceRecordSetsCommandInput,
  RRType,
} from '@aws-sdk/client-route-53';
import { ClientInitError, FetchError, ZoneNotFoundError, errorMessage } from '../errors.js';
import type { CredentialBundle, DnsSource, NormalizedRecord, ZoneId } from '../types.js';

const ROUTE53_REGION = 'us-east-1';

export interface HostedZoneSummary {
  Id?: string;
  Name?: string;
  Config?: { PrivateZone?: boolean };
}

export interface RecordSetSummary {
  Name?: string;
  Type?: string;
  TTL?: number;
  ResourceRecords?: Array<{ Value?: string }>;
}

export interface RecordSetPage {
  ResourceRecordSets?: RecordSetSummary[];
  IsTruncated?: boolean;
  NextRecordName?: string;
  NextRecordType?: RRType;
  NextRecordIdentifier?: string;
}

/**
 * The slice of the Route53 SDK client this tool calls.
 * The SDK's `Route53` class satisfies it as-is.
 */
export interface Route53Api {
  listHostedZonesByName(
    input: ListHostedZonesByNameCommandInput
  ): Promise<{ HostedZones?: HostedZoneSummary[] }>;
  listResourceRecordSets(input: ListResourceRecordSetsCommandInput): Promise<RecordSetPage>;
}

export function createRoute53Api(credentials: CredentialBundle): Route53Api {
  try {
    return new Route53({
      region: ROUTE53_REGION,
      credentials: {
        accessKeyId: credentials.awsKey,
        secretAccessKey: credentials.awsSecret,
      },
    });
  } catch (err) {
    throw new ClientInitError('route53', err);
  }
}

export class Route53Source implements DnsSource {
  name = 'AWS Route53';
  private api: Route53Api;

  constructor(api: Route53Api) {
    this.api = api;
  }

  async resolveZone(domain: string): Promise<ZoneId> {
    return resolveRoute53Zone(this.api, domain);
  }

  async fetchRecords(zoneId: ZoneId): Promise<NormalizedRecord[]> {
    return getRoute53Records(this.api, zoneId);
  }
}

/**
 * Find the public hosted zone whose name matches the domain exactly.
 * Only the first page of ListHostedZonesByName is consulted; it starts at
 * the queried name, so an exact match is always on it.
 */
export async function resolveRoute53Zone(api: Route53Api, domain: string): Promise<ZoneId> {
  const query = `${domain}.`;

  let zones: HostedZoneSummary[];
  try {
    const out = await api.listHostedZonesByName({ DNSName: query });
    zones = out.HostedZones ?? [];
  } catch (err) {
    throw new ZoneNotFoundError(
      'route53',
      domain,
      `Failed to look up domain '${domain}' in route53: ${errorMessage(err)}`,
      err
    );
  }

  const zone = zones.find(hz => hz.Config?.PrivateZone !== true && hz.Name === query);
  if (!zone?.Id) {
    throw new ZoneNotFoundError('route53', domain, `Unable to find domain '${domain}' in route53`);
  }

  return zone.Id;
}

/**
 * Walk every ListResourceRecordSets page of a hosted zone
 */
export async function getRoute53Records(api: Route53Api, zoneId: ZoneId): Promise<NormalizedRecord[]> {
  const records: NormalizedRecord[] = [];
  let next: Omit<ListResourceRecordSetsCommandInput, 'HostedZoneId'> = {};

  try {
    while (true) {
      const page = await api.listResourceRecordSets({ HostedZoneId: zoneId, ...next });

      // TODO: tell alias records apart from plain A/AAAA records (AliasTarget)
      for (const set of page.ResourceRecordSets ?? []) {
        records.push(normalizeRoute53Record(set));
      }

      if (!page.IsTruncated || !page.NextRecordName) {
        break;
      }
      next = {
        StartRecordName: page.NextRecordName,
        StartRecordType: page.NextRecordType,
        StartRecordIdentifier: page.NextRecordIdentifier,
      };
    }
  } catch (err) {
    throw new FetchError('route53', zoneId, err);
  }

  return records;
}

/**
 * Only name and type are taken from a Route53 record set;
 * TTL and values are left empty.
 */
export function normalizeRoute53Record(set: RecordSetSummary): NormalizedRecord {
  return {
    name: set.Name ?? '',
    type: set.Type ?? '',
    ttl: 0,
    values: [],
  };
}
