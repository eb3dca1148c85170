import type {DnsRecord} from 'cloudflare';
import Cloudflare from 'cloudflare';
import ms from 'ms';
import * as x from 'x-value';

import {CLOUDFLARE_ZONE_RESOLVED, Logs} from '../../@log/index.js';
import {
  getErrorMessage,
  isSameDomainName,
  trimTrailingDot,
  withTimeout,
} from '../../@utils/index.js';
import type {DDNSType} from '../../address.js';
import {getAddressFamily, normalizeAddress} from '../../address.js';
import {DDNSError, ProviderError, RecordAbsentError} from '../../errors.js';
import type {IDDNSProvider, RecordSnapshot} from '../ddns-provider.js';

const CLOUDFLARE_TIMEOUT_DEFAULT = x.Integer.nominalize(ms('10s'));

/**
 * 1 stands for automatic.
 */
const CLOUDFLARE_TTL_AUTOMATIC = 1;

const CLOUDFLARE_ZONES_PER_PAGE = 50;
const CLOUDFLARE_RECORDS_PER_PAGE = 100;

export const CloudflareDDNSOptions = x.object({
  /**
   * API token with Zone:Read and DNS:Edit permissions.
   */
  token: x.string,
  /**
   * Milliseconds per API call.
   */
  timeout: x.integerRange({min: 1}).optional(),
});

export type CloudflareDDNSOptions = x.TypeOf<typeof CloudflareDDNSOptions>;

const ResultInfo = x.object({
  page: x.number,
  total_pages: x.number,
});

const ZonesBrowseResponse = x.object({
  result: x.array(
    x.object({
      id: x.string,
      name: x.string,
    }),
  ),
  result_info: ResultInfo.optional(),
});

const CloudflareDNSRecord = x.object({
  id: x.string,
  type: x.string,
  name: x.string,
  content: x.string,
  ttl: x.number.optional(),
  proxied: x.boolean.optional(),
});

type CloudflareDNSRecord = x.TypeOf<typeof CloudflareDNSRecord>;

const DNSRecordsBrowseResponse = x.object({
  result: x.array(CloudflareDNSRecord),
  result_info: ResultInfo.optional(),
});

type BrowsePage<T> = {
  result: T[];
  result_info?: x.TypeOf<typeof ResultInfo>;
};

/**
 * @types/cloudflare leaves out the query `zones.browse` sends along.
 */
type CloudflareClient = Pick<Cloudflare, 'dnsRecords'> & {
  zones: {
    browse(query: {
      name: string;
      page: number;
      per_page: number;
    }): Promise<object>;
  };
};

export class CloudflareDDNSProvider implements IDDNSProvider {
  readonly name = 'cloudflare';

  private cloudflare: CloudflareClient;

  private timeout: number;

  private zoneIdPromise: Promise<string> | undefined;

  /**
   * @param zone Zone name, e.g. "example.com", resolved to its ID once.
   */
  constructor(
    readonly zone: string,
    {token, timeout = CLOUDFLARE_TIMEOUT_DEFAULT}: CloudflareDDNSOptions,
  ) {
    this.cloudflare = new Cloudflare({
      token,
    });

    this.timeout = timeout;
  }

  async initialize(): Promise<void> {
    await this.getZoneId();
  }

  async fetch(domain: string, type: DDNSType): Promise<RecordSnapshot> {
    const record = await this.findRecord(domain, type);

    if (!record) {
      return {type: 'absent'};
    }

    return {
      type: 'present',
      address:
        normalizeAddress(getAddressFamily(type), record.content) ??
        record.content,
    };
  }

  async apply(
    domain: string,
    type: DDNSType,
    address: string,
    _previous: string,
  ): Promise<void> {
    const zoneId = await this.getZoneId();

    const existingRecord = await this.findRecord(domain, type);

    if (!existingRecord) {
      throw new RecordAbsentError(domain, type);
    }

    const record: DnsRecord = {
      type,
      name: existingRecord.name,
      content: address,
      ttl: existingRecord.ttl ?? CLOUDFLARE_TTL_AUTOMATIC,
      proxied: existingRecord.proxied ?? false,
    };

    await this.call(`edit ${type} record ${domain}`, () =>
      this.cloudflare.dnsRecords.edit(zoneId, existingRecord.id, record),
    );
  }

  private async findRecord(
    domain: string,
    type: DDNSType,
  ): Promise<CloudflareDNSRecord | undefined> {
    const zoneId = await this.getZoneId();

    const name = trimTrailingDot(domain).toLowerCase();

    return this.find(
      `browse records of ${this.zone}`,
      page =>
        this.cloudflare.dnsRecords.browse(zoneId, {
          name,
          type,
          page,
          per_page: CLOUDFLARE_RECORDS_PER_PAGE,
        }),
      response => DNSRecordsBrowseResponse.satisfies(response),
      record => record.type === type && isSameDomainName(record.name, domain),
    );
  }

  private getZoneId(): Promise<string> {
    if (!this.zoneIdPromise) {
      this.zoneIdPromise = this.lookupZoneId().catch(error => {
        this.zoneIdPromise = undefined;
        throw error;
      });
    }

    return this.zoneIdPromise;
  }

  private async lookupZoneId(): Promise<string> {
    const name = trimTrailingDot(this.zone).toLowerCase();

    const zone = await this.find(
      'browse zones',
      page =>
        this.cloudflare.zones.browse({
          name,
          page,
          per_page: CLOUDFLARE_ZONES_PER_PAGE,
        }),
      response => ZonesBrowseResponse.satisfies(response),
      zone => isSameDomainName(zone.name, this.zone),
    );

    if (!zone) {
      throw new ProviderError(
        `Zone "${this.zone}" not found or not accessible with this token.`,
        'permanent',
      );
    }

    Logs.info('cloudflare', CLOUDFLARE_ZONE_RESOLVED(this.zone, zone.id));

    return zone.id;
  }

  /**
   * Walks the pages of a browse call until `predicate` matches an item or the
   * last page has been read.
   */
  private async find<T>(
    action: string,
    browse: (page: number) => Promise<unknown>,
    parse: (response: unknown) => BrowsePage<T>,
    predicate: (item: T) => boolean,
  ): Promise<T | undefined> {
    for (let page = 1; ; page++) {
      const response = await this.call(action, () => browse(page));

      const {result, result_info: info} = parseResponse(() => parse(response));

      const item = result.find(predicate);

      if (item) {
        return item;
      }

      if (!info || result.length === 0 || page >= info.total_pages) {
        return undefined;
      }
    }
  }

  private async call<T>(action: string, request: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(
        request(),
        this.timeout,
        `Cloudflare did not answer within ${this.timeout}ms.`,
      );
    } catch (error) {
      throw toProviderError(action, error);
    }
  }
}

function parseResponse<T>(parse: () => T): T {
  try {
    return parse();
  } catch (error) {
    throw new ProviderError(
      `Unexpected Cloudflare API response: ${getErrorMessage(error)}`,
      'transient',
      {cause: error},
    );
  }
}

/**
 * 5xx, 408, 429 and network errors (no status code) are transient, other
 * HTTP statuses (401, 403, 404...) are permanent.
 */
export function toProviderError(action: string, error: unknown): DDNSError {
  if (error instanceof DDNSError) {
    return error;
  }

  const status = getStatusCode(error);

  const severity =
    status === undefined || status >= 500 || status === 408 || status === 429
      ? 'transient'
      : 'permanent';

  return new ProviderError(
    `Cloudflare failed to ${action}${status === undefined ? '' : ` (HTTP ${status})`}: ${getErrorMessage(error)}`,
    severity,
    {cause: error},
  );
}

function getStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'statusCode' in error.response &&
    typeof error.response.statusCode === 'number'
  ) {
    return error.response.statusCode;
  }

  return undefined;
}
