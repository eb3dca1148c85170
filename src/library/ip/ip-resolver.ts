import ms from 'ms';
import * as x from 'x-value';

import {
  Logs,
  RESOLVER_RESOLVED,
  RESOLVER_SOURCE_FAILED,
} from '../@log/index.js';
import {getErrorMessage} from '../@utils/index.js';
import type {AddressFamily} from '../address.js';
import {ResolutionError} from '../errors.js';

import type {IIPSource} from './ip-source.js';
import {EchoIPSource, PublicIPSource} from './ip-source.js';

export const IP_SOURCE_TIMEOUT_DEFAULT = x.Integer.nominalize(ms('5s'));

export const IP_ECHO_URLS_DEFAULT: Record<AddressFamily, string[]> = {
  ipv4: ['https://ipv4.icanhazip.com'],
  ipv6: ['https://ipv6.icanhazip.com'],
};

export const IPResolverOptions = x.object({
  urls: x
    .object({
      ipv4: x.array(x.string).optional(),
      ipv6: x.array(x.string).optional(),
    })
    .optional(),
  /**
   * Fall back to the `public-ip` package after the echo URLs, defaults to
   * true.
   */
  publicIP: x.boolean.optional(),
  /**
   * Milliseconds per source.
   */
  timeout: x.integerRange({min: 1}).optional(),
});

export type IPResolverOptions = x.TypeOf<typeof IPResolverOptions>;

export interface IIPResolver {
  resolve(family: AddressFamily): Promise<string>;
}

export class IPResolver implements IIPResolver {
  constructor(private sourcesMap: Record<AddressFamily, IIPSource[]>) {}

  /**
   * Asks each source of the family in turn, returning the first address.
   */
  async resolve(family: AddressFamily): Promise<string> {
    const sources = this.sourcesMap[family];

    const failures: string[] = [];

    for (const source of sources) {
      try {
        const address = await source.resolve(family);

        Logs.debug('resolver', RESOLVER_RESOLVED(address, source.name));

        return address;
      } catch (error) {
        Logs.debug('resolver', RESOLVER_SOURCE_FAILED(source.name, error));
        failures.push(`${source.name}: ${getErrorMessage(error)}`);
      }
    }

    throw new ResolutionError(
      sources.length === 0
        ? `No ${family} source configured.`
        : `Every ${family} source failed (${failures.join('; ')}).`,
    );
  }
}

export function createIPResolver({
  urls = {},
  publicIP = true,
  timeout = IP_SOURCE_TIMEOUT_DEFAULT,
}: IPResolverOptions = {}): IPResolver {
  const createSources = (family: AddressFamily): IIPSource[] => [
    ...(urls[family] ?? IP_ECHO_URLS_DEFAULT[family]).map(
      url => new EchoIPSource(family, url, timeout),
    ),
    ...(publicIP ? [new PublicIPSource(timeout)] : []),
  ];

  return new IPResolver({
    ipv4: createSources('ipv4'),
    ipv6: createSources('ipv6'),
  });
}
