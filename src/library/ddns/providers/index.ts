import type {IDDNSProvider} from '../ddns-provider.js';

import type {CloudflareDDNSOptions} from './cloudflare-ddns-provider.js';
import {CloudflareDDNSProvider} from './cloudflare-ddns-provider.js';
import type {RFC2136DDNSOptions} from './rfc2136-ddns-provider.js';
import {RFC2136DDNSProvider} from './rfc2136-ddns-provider.js';

export type ProviderConfig =
  | {
      provider: 'cloudflare';
      options: CloudflareDDNSOptions;
    }
  | {
      provider: 'rfc2136';
      options: RFC2136DDNSOptions;
    };

export function createDDNSProvider(
  zone: string,
  config: ProviderConfig,
): IDDNSProvider {
  switch (config.provider) {
    case 'cloudflare':
      return new CloudflareDDNSProvider(zone, config.options);
    case 'rfc2136':
      return new RFC2136DDNSProvider(zone, config.options);
  }
}

export * from './cloudflare-ddns-provider.js';
export * from './rfc2136-ddns-provider.js';
