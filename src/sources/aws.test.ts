import { describe, it, expect, vi } from 'vitest';
import {
  createRoute53Api,
  getRoute53Records,
  normalizeRoute53Record,
  resolveRoute53Zone,
  Route53Source,
} from './aws.js';
import type { HostedZoneSummary, Route53Api } from './aws.js';
import { FetchError, ZoneNotFoundError } from '../errors.js';
import type { CredentialBundle } from '../types.js';

const credentials: CredentialBundle = {
  cfEmail: 'test@example.com',
  cfKey: 'test-key',
  awsKey: 'test-access-key',
  awsSecret: 'test-secret',
  domain: 'example.com',
};

function createFakeApi(zones: HostedZoneSummary[] = []) {
  const listHostedZonesByName = vi.fn<Route53Api['listHostedZonesByName']>()
    .mockResolvedValue({ HostedZones: zones });
  const listResourceRecordSets = vi.fn<Route53Api['listResourceRecordSets']>();
  const api: Route53Api = { listHostedZonesByName, listResourceRecordSets };
  return { api, listHostedZonesByName, listResourceRecordSets };
}

describe('AWS Route53 source', () => {
  describe('resolveRoute53Zone', () => {
    it('should query by domain with a trailing dot', async () => {
      const { api, listHostedZonesByName } = createFakeApi([
        { Id: '/hostedzone/Z123', Name: 'example.com.', Config: { PrivateZone: false } },
      ]);

      await resolveRoute53Zone(api, 'example.com');

      expect(listHostedZonesByName).toHaveBeenCalledWith({ DNSName: 'example.com.' });
    });

    it('should skip private zones with the same name', async () => {
      const { api } = createFakeApi([
        { Id: '/hostedzone/ZPRIVATE', Name: 'example.com.', Config: { PrivateZone: true } },
        { Id: '/hostedzone/ZPUBLIC', Name: 'example.com.', Config: { PrivateZone: false } },
      ]);

      await expect(resolveRoute53Zone(api, 'example.com')).resolves.toBe('/hostedzone/ZPUBLIC');
    });

    it('should reject when only a private zone matches', async () => {
      const { api } = createFakeApi([
        { Id: '/hostedzone/ZPRIVATE', Name: 'example.com.', Config: { PrivateZone: true } },
      ]);

      const err = await resolveRoute53Zone(api, 'example.com').catch(e => e);
      expect(err).toBeInstanceOf(ZoneNotFoundError);
      expect(err.message).toBe("Unable to find domain 'example.com' in route53");
      expect(err.provider).toBe('route53');
    });

    it('should require an exact name match', async () => {
      const { api } = createFakeApi([
        { Id: '/hostedzone/Z456', Name: 'example.com.au.', Config: { PrivateZone: false } },
        { Id: '/hostedzone/Z789', Name: 'sub.example.com.', Config: { PrivateZone: false } },
      ]);

      await expect(resolveRoute53Zone(api, 'example.com')).rejects.toThrow(ZoneNotFoundError);
    });

    it('should reject when no zones are returned', async () => {
      const { api } = createFakeApi([]);

      await expect(resolveRoute53Zone(api, 'example.com')).rejects.toThrow(ZoneNotFoundError);
    });

    it('should wrap API failures as ZoneNotFoundError', async () => {
      const { api, listHostedZonesByName } = createFakeApi();
      const cause = new Error('The security token included in the request is invalid');
      listHostedZonesByName.mockRejectedValue(cause);

      const err = await resolveRoute53Zone(api, 'example.com').catch(e => e);
      expect(err).toBeInstanceOf(ZoneNotFoundError);
      expect(err.cause).toBe(cause);
      expect(err.message).toBe(
        "Failed to look up domain 'example.com' in route53: The security token included in the request is invalid"
      );
    });
  });

  describe('getRoute53Records', () => {
    it('should follow pagination until the last page', async () => {
      const { api, listResourceRecordSets } = createFakeApi();
      listResourceRecordSets
        .mockResolvedValueOnce({
          ResourceRecordSets: [
            { Name: 'example.com.', Type: 'A', TTL: 300, ResourceRecords: [{ Value: '192.0.2.1' }] },
            { Name: 'example.com.', Type: 'NS', TTL: 172800, ResourceRecords: [{ Value: 'ns-1.awsdns-01.org.' }] },
          ],
          IsTruncated: true,
          NextRecordName: 'www.example.com.',
          NextRecordType: 'CNAME',
        })
        .mockResolvedValueOnce({
          ResourceRecordSets: [
            { Name: 'www.example.com.', Type: 'CNAME', TTL: 60, ResourceRecords: [{ Value: 'example.com' }] },
          ],
          IsTruncated: false,
        });

      const records = await getRoute53Records(api, '/hostedzone/Z123');

      expect(listResourceRecordSets).toHaveBeenCalledTimes(2);
      expect(listResourceRecordSets).toHaveBeenNthCalledWith(1, { HostedZoneId: '/hostedzone/Z123' });
      expect(listResourceRecordSets).toHaveBeenNthCalledWith(2, {
        HostedZoneId: '/hostedzone/Z123',
        StartRecordName: 'www.example.com.',
        StartRecordType: 'CNAME',
        StartRecordIdentifier: undefined,
      });
      expect(records.map(r => `${r.name} ${r.type}`)).toEqual([
        'example.com. A',
        'example.com. NS',
        'www.example.com. CNAME',
      ]);
    });

    it('should stop when a truncated page has no next record name', async () => {
      const { api, listResourceRecordSets } = createFakeApi();
      listResourceRecordSets.mockResolvedValue({
        ResourceRecordSets: [{ Name: 'example.com.', Type: 'A' }],
        IsTruncated: true,
      });

      const records = await getRoute53Records(api, '/hostedzone/Z123');

      expect(listResourceRecordSets).toHaveBeenCalledTimes(1);
      expect(records).toEqual([{ name: 'example.com.', type: 'A', ttl: 0, values: [] }]);
    });

    it('should drop TTL and values from every record', async () => {
      const { api, listResourceRecordSets } = createFakeApi();
      listResourceRecordSets.mockResolvedValueOnce({
        ResourceRecordSets: [
          { Name: 'mail.example.com.', Type: 'MX', TTL: 3600, ResourceRecords: [{ Value: '10 mx.example.com.' }] },
        ],
      });

      const records = await getRoute53Records(api, '/hostedzone/Z123');

      expect(records).toEqual([{ name: 'mail.example.com.', type: 'MX', ttl: 0, values: [] }]);
    });

    it('should keep duplicate name and type entries', async () => {
      const { api, listResourceRecordSets } = createFakeApi();
      listResourceRecordSets.mockResolvedValueOnce({
        ResourceRecordSets: [
          { Name: 'api.example.com.', Type: 'A' },
          { Name: 'api.example.com.', Type: 'A' },
        ],
      });

      const records = await getRoute53Records(api, '/hostedzone/Z123');

      expect(records).toHaveLength(2);
    });

    it('should wrap failures as FetchError without partial results', async () => {
      const { api, listResourceRecordSets } = createFakeApi();
      listResourceRecordSets
        .mockResolvedValueOnce({
          ResourceRecordSets: [{ Name: 'example.com.', Type: 'A' }],
          IsTruncated: true,
          NextRecordName: 'b.example.com.',
          NextRecordType: 'A',
        })
        .mockRejectedValueOnce(new Error('Throttling: Rate exceeded'));

      const err = await getRoute53Records(api, '/hostedzone/Z123').catch(e => e);

      expect(err).toBeInstanceOf(FetchError);
      expect(err.zoneId).toBe('/hostedzone/Z123');
      expect(err.message).toBe(
        'Failed to fetch route53 records for zone /hostedzone/Z123: Throttling: Rate exceeded'
      );
    });
  });

  describe('normalizeRoute53Record', () => {
    it('should fall back to empty strings for missing fields', () => {
      expect(normalizeRoute53Record({})).toEqual({ name: '', type: '', ttl: 0, values: [] });
    });
  });

  describe('Route53Source', () => {
    it('should implement DnsSource', async () => {
      const { api, listResourceRecordSets } = createFakeApi([
        { Id: '/hostedzone/Z123', Name: 'example.com.', Config: { PrivateZone: false } },
      ]);
      listResourceRecordSets.mockResolvedValueOnce({
        ResourceRecordSets: [{ Name: 'example.com.', Type: 'SOA' }],
      });

      const source = new Route53Source(api);
      expect(source.name).toBe('AWS Route53');

      const zoneId = await source.resolveZone('example.com');
      const records = await source.fetchRecords(zoneId);
      expect(records).toEqual([{ name: 'example.com.', type: 'SOA', ttl: 0, values: [] }]);
    });
  });

  describe('createRoute53Api', () => {
    it('should build an SDK client from static credentials', () => {
      const api = createRoute53Api(credentials);

      expect(typeof api.listHostedZonesByName).toBe('function');
      expect(typeof api.listResourceRecordSets).toBe('function');
    });
  });
});
