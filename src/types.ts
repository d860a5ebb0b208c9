/**
 * cfmigrate - Route53 / Cloudflare record set comparison
 * Type definitions
 */

export type ProviderName = 'route53' | 'cloudflare';

/**
 * Credentials and target domain, merged from flags, environment and config file.
 * Built once at startup and never mutated.
 */
export interface CredentialBundle {
  readonly cfEmail: string;
  readonly cfKey: string;
  readonly awsKey: string;
  readonly awsSecret: string;
  readonly domain: string;
}

/**
 * A DNS resource record abstracted away from the provider's native shape.
 * ttl is 0 when the provider path does not capture it.
 */
export interface NormalizedRecord {
  name: string;
  type: string;
  ttl: number;
  values: string[];
}

export type ZoneId = string;

export interface ZoneRecords {
  zoneId: ZoneId;
  records: NormalizedRecord[];
}

export interface ComparisonResult {
  domain: string;
  route53: ZoneRecords;
  cloudflare: ZoneRecords;
}

export interface DnsSource {
  name: string;
  resolveZone(domain: string): Promise<ZoneId>;
  fetchRecords(zoneId: ZoneId): Promise<NormalizedRecord[]>;
}

export interface Logger {
  info(message: string): void;
  debug(message: string): void;
}

/**
 * Normalize a domain name: trim, lowercase, drop one trailing dot
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/\.$/, '');
}
