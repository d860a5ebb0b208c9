/**
 * Record set comparison run
 *
 * Strictly linear: build clients, resolve both zones, then fetch both
 * record sets. The first failure rejects and nothing after it runs.
 */

import { createRoute53Api, Route53Source } from '../sources/aws.js';
import type { Route53Api } from '../sources/aws.js';
import { createCloudflareApi, CloudflareSource } from '../sources/cloudflare.js';
import type { CloudflareApi } from '../sources/cloudflare.js';
import type { ComparisonResult, CredentialBundle, Logger } from '../types.js';
import { silentLogger } from '../utils/logger.js';

export interface CompareDeps {
  createRoute53Api?: (credentials: CredentialBundle) => Route53Api;
  createCloudflareApi?: (credentials: CredentialBundle) => CloudflareApi;
  logger?: Logger;
}

export async function compareZones(
  credentials: CredentialBundle,
  deps: CompareDeps = {}
): Promise<ComparisonResult> {
  const logger = deps.logger ?? silentLogger;
  const { domain } = credentials;

  const route53 = new Route53Source((deps.createRoute53Api ?? createRoute53Api)(credentials));
  const cloudflare = new CloudflareSource((deps.createCloudflareApi ?? createCloudflareApi)(credentials));

  const route53ZoneId = await route53.resolveZone(domain);
  logger.debug(`${route53.name} hosted zone for ${domain}: ${route53ZoneId}`);

  const cloudflareZoneId = await cloudflare.resolveZone(domain);
  logger.debug(`${cloudflare.name} zone for ${domain}: ${cloudflareZoneId}`);

  const route53Records = await route53.fetchRecords(route53ZoneId);
  logger.debug(`Fetched ${route53Records.length} ${route53.name} record sets`);

  const cloudflareRecords = await cloudflare.fetchRecords(cloudflareZoneId);
  logger.debug(`Fetched ${cloudflareRecords.length} ${cloudflare.name} records`);

  return {
    domain,
    route53: { zoneId: route53ZoneId, records: route53Records },
    cloudflare: { zoneId: cloudflareZoneId, records: cloudflareRecords },
  };
}
