import ms from 'ms';
import * as x from 'x-value';

import {getErrorMessage, isWithinZone} from './@utils/index.js';
import type {AddressFamily} from './address.js';
import type {ProviderConfig} from './ddns/index.js';
import {CloudflareDDNSOptions, RFC2136DDNSOptions} from './ddns/index.js';
import {ConfigError} from './errors.js';
import {IPResolverOptions} from './ip/index.js';

const IPV4_DEFAULT = true;
const IPV6_DEFAULT = false;

const INTERVAL_DEFAULT = x.Integer.nominalize(60);

export const Config = x.object({
  /**
   * Zone name, e.g. "example.com".
   */
  zone: x.string,
  /**
   * Name of the record to keep up to date, e.g. "home.example.com".
   */
  domain: x.string,
  ipv4: x.boolean.optional(),
  ipv6: x.boolean.optional(),
  /**
   * Seconds between two passes.
   */
  interval: x.integerRange({min: 1}).optional(),
  resolver: IPResolverOptions.optional(),
  cloudflare: CloudflareDDNSOptions.optional(),
  rfc2136: RFC2136DDNSOptions.optional(),
});

export type Config = x.TypeOf<typeof Config>;

export type ResolvedConfig = {
  zone: string;
  domain: string;
  families: AddressFamily[];
  /**
   * Milliseconds between two passes.
   */
  interval: number;
  resolver: IPResolverOptions;
  provider: ProviderConfig;
};

/**
 * Validates raw configuration (e.g. parsed from a config file) and resolves
 * it, throwing `ConfigError` on any problem.
 */
export function parseConfig(value: unknown): ResolvedConfig {
  let config: Config;

  try {
    config = Config.exact().satisfies(value);
  } catch (error) {
    throw new ConfigError(`Invalid configuration: ${getErrorMessage(error)}`, {
      cause: error,
    });
  }

  return resolveConfig(config);
}

export function resolveConfig({
  zone,
  domain,
  ipv4 = IPV4_DEFAULT,
  ipv6 = IPV6_DEFAULT,
  interval = INTERVAL_DEFAULT,
  resolver = {},
  cloudflare,
  rfc2136,
}: Config): ResolvedConfig {
  if (zone.trim() === '') {
    throw new ConfigError('Option "zone" must not be empty.');
  }

  if (domain.trim() === '') {
    throw new ConfigError('Option "domain" must not be empty.');
  }

  if (!isWithinZone(domain, zone)) {
    throw new ConfigError(`Domain "${domain}" is not within zone "${zone}".`);
  }

  const families: AddressFamily[] = [
    ...(ipv4 ? (['ipv4'] as const) : []),
    ...(ipv6 ? (['ipv6'] as const) : []),
  ];

  if (families.length === 0) {
    throw new ConfigError('At least one of "ipv4" and "ipv6" must be enabled.');
  }

  let provider: ProviderConfig;

  if (cloudflare && rfc2136) {
    throw new ConfigError(
      'Both "cloudflare" and "rfc2136" are configured, keep exactly one.',
    );
  } else if (cloudflare) {
    provider = {provider: 'cloudflare', options: cloudflare};
  } else if (rfc2136) {
    provider = {provider: 'rfc2136', options: rfc2136};
  } else {
    throw new ConfigError(
      'No provider configured, add a "cloudflare" or "rfc2136" section.',
    );
  }

  return {
    zone,
    domain,
    families,
    interval: ms(`${interval}s`),
    resolver,
    provider,
  };
}
