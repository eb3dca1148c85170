import {randomInt} from 'crypto';

import ms from 'ms';
import * as x from 'x-value';

import {Logs, RFC2136_EXCHANGE} from '../../@log/index.js';
import {getErrorMessage, isSameDomainName} from '../../@utils/index.js';
import type {DDNSType} from '../../address.js';
import {getAddressFamily, normalizeAddress} from '../../address.js';
import type {
  DNSMessage,
  DNSRecord,
  DNSTransport,
  TSIGKey,
} from '../../dns/index.js';
import {
  DNSServerURLString,
  Opcode,
  ResponseCode,
  TSIGAlgorithm,
  createDNSTransport,
  createMessage,
  decodeMessage,
  encodeMessage,
  formatDNSServerURL,
  getResponseCodeName,
  parseDNSServerURL,
  signMessage,
  verifyMessage,
} from '../../dns/index.js';
import {ConfigError, ProviderError} from '../../errors.js';
import type {IDDNSProvider, RecordSnapshot} from '../ddns-provider.js';

const RFC2136_TTL_DEFAULT = x.Integer.nominalize(60);
const RFC2136_TIMEOUT_DEFAULT = x.Integer.nominalize(ms('5s'));
const RFC2136_ALGORITHM_DEFAULT = 'hmac-sha256';

/**
 * Response codes worth retrying on the next pass. NXRRSET answers a failed
 * prerequisite, meaning the record changed since it was fetched.
 */
const TRANSIENT_RESPONSE_CODES = new Set<number>([
  ResponseCode.SERVFAIL,
  ResponseCode.NXRRSET,
]);

export const RFC2136DDNSOptions = x.object({
  /**
   * E.g. "udp://192.0.2.53", "tcp://[2001:db8::53]:5353", port defaults to
   * 53 and scheme to udp.
   */
  server: DNSServerURLString,
  /**
   * TSIG key name, e.g. "ddns-key.example.com".
   */
  keyName: x.string,
  /**
   * Base64 encoded TSIG secret.
   */
  key: x.string,
  algorithm: TSIGAlgorithm.optional(),
  /**
   * TTL of the record written by updates, in seconds.
   */
  ttl: x.integerRange({min: 0}).optional(),
  /**
   * Milliseconds per exchange.
   */
  timeout: x.integerRange({min: 1}).optional(),
  /**
   * Make updates conditional on the record still holding the previously
   * fetched value.
   */
  prerequisite: x.boolean.optional(),
});

export type RFC2136DDNSOptions = x.TypeOf<typeof RFC2136DDNSOptions>;

export class RFC2136DDNSProvider implements IDDNSProvider {
  readonly name = 'rfc2136';

  private key: TSIGKey;

  private server: string;

  private transport: DNSTransport;

  private ttl: number;

  private prerequisite: boolean;

  /**
   * @param zone Zone the updates are sent to, e.g. "example.com".
   * @param transport Overrides the UDP/TCP transport derived from `server`.
   */
  constructor(
    readonly zone: string,
    {
      server,
      keyName,
      key,
      algorithm = RFC2136_ALGORITHM_DEFAULT,
      ttl = RFC2136_TTL_DEFAULT,
      timeout = RFC2136_TIMEOUT_DEFAULT,
      prerequisite = false,
    }: RFC2136DDNSOptions,
    transport?: DNSTransport,
  ) {
    const secret = Buffer.from(key, 'base64');

    if (secret.length === 0) {
      throw new ConfigError('TSIG key must be a non-empty base64 string.');
    }

    this.key = {name: keyName, secret, algorithm};

    const serverURL = parseDNSServerURL(server);

    this.server = formatDNSServerURL(serverURL);
    this.transport = transport ?? createDNSTransport(serverURL, {timeout});
    this.ttl = ttl;
    this.prerequisite = prerequisite;
  }

  /**
   * Queries the zone SOA, so that a wrong key or a server refusing the zone
   * shows up at startup.
   */
  async initialize(): Promise<void> {
    const response = await this.exchange(
      createMessage({
        id: randomInt(0x10000),
        opcode: Opcode.QUERY,
        questions: [{name: this.zone, type: 'SOA', class: 'IN'}],
      }),
    );

    if (response.rcode !== ResponseCode.NOERROR) {
      throw createResponseCodeError(
        `query SOA of ${this.zone}`,
        response.rcode,
      );
    }
  }

  async fetch(domain: string, type: DDNSType): Promise<RecordSnapshot> {
    const response = await this.exchange(
      createMessage({
        id: randomInt(0x10000),
        opcode: Opcode.QUERY,
        questions: [{name: domain, type, class: 'IN'}],
      }),
    );

    if (response.rcode === ResponseCode.NXDOMAIN) {
      return {type: 'absent'};
    }

    if (response.rcode !== ResponseCode.NOERROR) {
      throw createResponseCodeError(`query ${type} ${domain}`, response.rcode);
    }

    for (const record of response.answers) {
      if (
        (record.type === 'A' || record.type === 'AAAA') &&
        record.type === type &&
        (record.class ?? 'IN') === 'IN' &&
        isSameDomainName(record.name, domain)
      ) {
        const address = normalizeAddress(getAddressFamily(type), record.data);

        if (address !== undefined) {
          return {type: 'present', address};
        }
      }
    }

    return {type: 'absent'};
  }

  async apply(
    domain: string,
    type: DDNSType,
    address: string,
    previous: string,
  ): Promise<void> {
    const family = getAddressFamily(type);

    const data = normalizeAddress(family, address);

    if (data === undefined) {
      throw new ProviderError(
        `Invalid ${type} address "${address}".`,
        'permanent',
      );
    }

    const previousData = this.prerequisite
      ? normalizeAddress(family, previous)
      : undefined;

    const prerequisites: DNSRecord[] =
      previousData === undefined
        ? []
        : [
            // RRset exists (value dependent), RFC 2136 section 2.4.2.
            {type, name: domain, class: 'IN', ttl: 0, data: previousData},
          ];

    const updates: DNSMessage['authorities'] = [
      // Delete an RRset, RFC 2136 section 2.5.2.
      {type: 'rrset-deletion', name: domain, recordType: type},
      // Add to an RRset, RFC 2136 section 2.5.1.
      {type, name: domain, class: 'IN', ttl: this.ttl, data},
    ];

    const response = await this.exchange(
      createMessage({
        id: randomInt(0x10000),
        opcode: Opcode.UPDATE,
        questions: [{name: this.zone, type: 'SOA', class: 'IN'}],
        answers: prerequisites,
        authorities: updates,
      }),
    );

    if (response.rcode !== ResponseCode.NOERROR) {
      throw createResponseCodeError(`update ${type} ${domain}`, response.rcode);
    }
  }

  /**
   * Signs `message`, sends it and returns the verified response.
   */
  private async exchange(message: DNSMessage): Promise<DNSMessage> {
    const {data, mac} = signMessage(encodeMessage(message), this.key);

    Logs.debug(
      'rfc2136',
      RFC2136_EXCHANGE(
        message.opcode === Opcode.UPDATE ? 'UPDATE' : 'QUERY',
        this.server,
      ),
    );

    let responseData: Buffer;

    try {
      responseData = await this.transport(data);
    } catch (error) {
      throw new ProviderError(
        `Exchange with ${this.server} failed: ${getErrorMessage(error)}`,
        'transient',
        {cause: error},
      );
    }

    verifyMessage(responseData, this.key, {requestMAC: mac});

    let response: DNSMessage;

    try {
      response = decodeMessage(responseData);
    } catch (error) {
      throw new ProviderError(
        `Malformed response from ${this.server}: ${getErrorMessage(error)}`,
        'transient',
        {cause: error},
      );
    }

    if (
      response.id !== message.id ||
      !response.response ||
      response.opcode !== message.opcode
    ) {
      throw new ProviderError(
        `Response from ${this.server} does not match the request.`,
        'transient',
      );
    }

    return response;
  }
}

function createResponseCodeError(action: string, rcode: number): ProviderError {
  return new ProviderError(
    `Server failed to ${action}: ${getResponseCodeName(rcode)}.`,
    TRANSIENT_RESPONSE_CODES.has(rcode) ? 'transient' : 'permanent',
  );
}
