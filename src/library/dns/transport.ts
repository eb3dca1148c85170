import * as DGram from 'dgram';
import * as Net from 'net';

import {Logs, RFC2136_TRUNCATED_RETRY_TCP} from '../@log/index.js';
import {withTimeout} from '../@utils/index.js';

import {HEADER_LENGTH} from './message.js';
import type {DNSServerURL} from './server-url.js';
import {formatDNSServerURL} from './server-url.js';

const TRUNCATED_FLAG = 0x0200;

/**
 * Sends an encoded DNS message and resolves with the encoded response whose
 * ID matches the query.
 */
export type DNSTransport = (query: Buffer) => Promise<Buffer>;

export type DNSTransportOptions = {
  /**
   * Milliseconds for each exchange (UDP and, on truncation, TCP).
   */
  timeout: number;
};

export function createDNSTransport(
  server: DNSServerURL,
  {timeout}: DNSTransportOptions,
): DNSTransport {
  return async query => {
    if (server.scheme === 'tcp') {
      return exchangeTCP(query, server, timeout);
    }

    const response = await exchangeUDP(query, server, timeout);

    if (response.readUInt16BE(2) & TRUNCATED_FLAG) {
      Logs.debug('rfc2136', RFC2136_TRUNCATED_RETRY_TCP);
      return exchangeTCP(query, server, timeout);
    }

    return response;
  };
}

export function exchangeUDP(
  query: Buffer,
  {host, port}: DNSServerURL,
  timeout: number,
): Promise<Buffer> {
  const id = query.readUInt16BE(0);

  const socket = DGram.createSocket(Net.isIPv6(host) ? 'udp6' : 'udp4');

  const responsePromise = new Promise<Buffer>((resolve, reject) => {
    socket.on('message', message => {
      // Late or spoofed datagrams for other queries are dropped.
      if (message.length >= HEADER_LENGTH && message.readUInt16BE(0) === id) {
        resolve(message);
      }
    });

    socket.on('error', reject);

    socket.send(query, port, host, error => {
      if (error) {
        reject(error);
      }
    });
  });

  return withTimeout(
    responsePromise,
    timeout,
    `No response from ${formatDNSServerURL({scheme: 'udp', host, port})} within ${timeout}ms.`,
  ).finally(() => socket.close());
}

export function exchangeTCP(
  query: Buffer,
  {host, port}: DNSServerURL,
  timeout: number,
): Promise<Buffer> {
  const id = query.readUInt16BE(0);

  const socket = Net.connect({host, port});

  const responsePromise = new Promise<Buffer>((resolve, reject) => {
    let received = Buffer.alloc(0);

    socket.on('connect', () => {
      const length = Buffer.alloc(2);

      length.writeUInt16BE(query.length, 0);

      socket.write(Buffer.concat([length, query]));
    });

    socket.on('data', chunk => {
      received = Buffer.concat([received, chunk]);

      if (received.length < 2) {
        return;
      }

      const length = received.readUInt16BE(0);

      if (received.length < 2 + length) {
        return;
      }

      const response = received.subarray(2, 2 + length);

      if (response.length < HEADER_LENGTH || response.readUInt16BE(0) !== id) {
        reject(new Error('Unexpected DNS response over TCP.'));
      } else {
        resolve(response);
      }
    });

    socket.on('error', reject);

    socket.on('close', () =>
      reject(new Error('Connection closed before a full DNS response.')),
    );
  });

  return withTimeout(
    responsePromise,
    timeout,
    `No response from ${formatDNSServerURL({scheme: 'tcp', host, port})} within ${timeout}ms.`,
  ).finally(() => socket.destroy());
}
