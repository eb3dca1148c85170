import * as x from 'x-value';

const DNS_PORT_DEFAULT = 53;

export type DNSServerScheme = 'udp' | 'tcp';

export type DNSServerURL = {
  scheme: DNSServerScheme;
  /**
   * Hostname or IP address, IPv6 without brackets.
   */
  host: string;
  port: number;
};

/**
 * Parses `udp://host[:port]`, `tcp://host[:port]` or a bare `host[:port]`
 * (UDP). IPv6 literals go in brackets, e.g. `udp://[2001:db8::53]:5353`.
 */
export function parseDNSServerURL(text: string): DNSServerURL {
  const withScheme = /^[a-z][a-z\d+.-]*:\/\//i.test(text)
    ? text
    : `udp://${text}`;

  let url: URL;

  try {
    url = new URL(withScheme);
  } catch {
    throw new TypeError(`Invalid DNS server URL "${text}".`);
  }

  const scheme = url.protocol.slice(0, -1);

  if (scheme !== 'udp' && scheme !== 'tcp') {
    throw new TypeError(
      `Unsupported DNS server scheme "${scheme}", expected "udp" or "tcp".`,
    );
  }

  if (url.pathname !== '' && url.pathname !== '/') {
    throw new TypeError(`Unexpected path in DNS server URL "${text}".`);
  }

  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');

  if (host === '') {
    throw new TypeError(`Missing host in DNS server URL "${text}".`);
  }

  return {
    scheme,
    host,
    port: getURLPort(url),
  };
}

export function formatDNSServerURL({scheme, host, port}: DNSServerURL): string {
  return `${scheme}://${host.includes(':') ? `[${host}]` : host}:${port}`;
}

export const DNSServerURLString = x.string.refined<'dns server url'>(value => {
  parseDNSServerURL(value);
  return value;
});

function getURLPort(url: URL): number {
  return url.port ? parseInt(url.port) : DNS_PORT_DEFAULT;
}
