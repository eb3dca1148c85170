import {publicIpv4, publicIpv6} from 'public-ip';

import {withTimeout} from '../@utils/index.js';
import type {AddressFamily} from '../address.js';
import {normalizeAddress} from '../address.js';

export interface IIPSource {
  readonly name: string;

  /**
   * Resolves the canonical public address of the given family, or rejects.
   */
  resolve(family: AddressFamily): Promise<string>;
}

/**
 * Plain-text echo endpoint such as icanhazip, one URL per family.
 */
export class EchoIPSource implements IIPSource {
  readonly name: string;

  constructor(
    readonly family: AddressFamily,
    readonly url: string,
    private timeout: number,
  ) {
    this.name = url;
  }

  async resolve(family: AddressFamily): Promise<string> {
    if (family !== this.family) {
      throw new Error(`Source ${this.url} only serves ${this.family}.`);
    }

    const response = await fetch(this.url, {
      signal: AbortSignal.timeout(this.timeout),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${this.url}.`);
    }

    const text = (await response.text()).trim();

    const address = normalizeAddress(family, text);

    if (address === undefined) {
      throw new Error(
        `Unexpected ${family} response from ${this.url}: ${JSON.stringify(text.slice(0, 64))}.`,
      );
    }

    return address;
  }
}

/**
 * Backed by the `public-ip` package, which itself falls back across
 * several HTTPS services.
 */
export class PublicIPSource implements IIPSource {
  readonly name = 'public-ip';

  constructor(private timeout: number) {}

  async resolve(family: AddressFamily): Promise<string> {
    const query = family === 'ipv4' ? publicIpv4 : publicIpv6;

    const queryPromise = query({onlyHttps: true, timeout: this.timeout});

    let text: string;

    try {
      // public-ip applies the timeout per service, bound the whole chain.
      text = await withTimeout(
        queryPromise,
        this.timeout * 3,
        `public-ip did not answer within ${this.timeout * 3}ms.`,
      );
    } finally {
      queryPromise.cancel();
    }

    const address = normalizeAddress(family, text);

    if (address === undefined) {
      throw new Error(`Unexpected ${family} address from public-ip: ${text}.`);
    }

    return address;
  }
}
