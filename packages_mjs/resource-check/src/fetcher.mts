/**
 * Socket-level fetch capability
 *
 * Writes a literal HTTP/1.1 request and keeps every byte of the response, so
 * the parser sees exactly what the server sent.
 */
import { Buffer } from 'node:buffer';
import type { Socket } from 'node:net';
import { buildConnector } from 'undici';
import { TransportError, toTransportError } from './errors.mjs';
import type { ExchangeFetcher, ExchangeRequest, RawExchange, RequestHeader } from './types.mjs';

export interface SocketFetcherOptions {
  /** TCP/TLS connect timeout in milliseconds. Default: 10000 */
  connectTimeout?: number;
  /** Verify server certificates. Default: true */
  rejectUnauthorized?: boolean;
}

const DEFAULT_PORTS: Record<string, string> = {
  'http:': '80',
  'https:': '443',
};

/**
 * Serialize the request line and header section
 */
export function buildRequestBytes(url: URL, method: string, headers: readonly RequestHeader[]): Buffer {
  const lines = [`${method} ${url.pathname}${url.search} HTTP/1.1`, `Host: ${url.host}`];
  for (const { name, value } of headers) {
    const key = name.toLowerCase();
    if (key === 'host' || key === 'connection') continue;
    lines.push(`${name}: ${value}`);
  }
  lines.push('Connection: close');
  return Buffer.from(`${lines.join('\r\n')}\r\n\r\n`, 'latin1');
}

function parseTarget(uri: string): URL {
  if (!URL.canParse(uri)) {
    throw new TransportError('protocol', `"${uri}" is not an absolute URI`);
  }
  const url = new URL(uri);
  if (!(url.protocol in DEFAULT_PORTS)) {
    throw new TransportError('protocol', `Unsupported scheme "${url.protocol}"`);
  }
  return url;
}

type Connector = ReturnType<typeof buildConnector>;

/**
 * Connector options for a target; IPv6 literals lose their brackets
 */
export function connectOptions(url: URL): Parameters<Connector>[0] {
  const { hostname } = url;
  return {
    hostname: hostname.startsWith('[') && hostname.endsWith(']') ? hostname.slice(1, -1) : hostname,
    host: url.host,
    protocol: url.protocol,
    port: url.port || DEFAULT_PORTS[url.protocol],
  };
}

function connect(connector: Connector, url: URL): Promise<Socket> {
  return new Promise((resolve, reject) => {
    connector(
      connectOptions(url),
      (error, socket) => {
        if (error === null) {
          resolve(socket);
        } else {
          reject(toTransportError(error));
        }
      }
    );
  });
}

function readResponse(socket: Socket, request: ExchangeRequest, requestBytes: Buffer): Promise<RawExchange> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    let settled = false;

    const finish = (truncated: boolean) => {
      if (settled) return;
      settled = true;
      request.signal.removeEventListener('abort', onAbort);
      resolve({ request: requestBytes, response: Buffer.concat(chunks, received), truncated });
    };

    const fail = (error: TransportError) => {
      if (settled) return;
      settled = true;
      request.signal.removeEventListener('abort', onAbort);
      socket.destroy();
      reject(error);
    };

    function onAbort() {
      const reason: unknown = request.signal.reason;
      fail(
        reason instanceof TransportError
          ? reason
          : new TransportError('aborted', 'Fetch aborted', { cause: reason })
      );
    }

    request.signal.addEventListener('abort', onAbort, { once: true });
    if (request.signal.aborted) {
      onAbort();
      return;
    }

    socket.on('data', (chunk: Buffer) => {
      const room = request.maxResponseBytes - received;
      // a response of exactly maxResponseBytes is only truncated if more arrives
      if (chunk.length > room) {
        chunks.push(chunk.subarray(0, room));
        received += room;
        socket.destroy();
        finish(true);
        return;
      }
      chunks.push(chunk);
      received += chunk.length;
    });
    socket.on('end', () => finish(false));
    socket.on('close', () => finish(false));
    socket.on('error', (error) => fail(toTransportError(error)));

    socket.write(requestBytes);
  });
}

/**
 * Create a fetcher that opens a fresh connection per request with undici's
 * connector and reads until the server closes it.
 *
 * @example
 * const checker = createResourceChecker(createSocketFetcher(), {});
 * const diagnosis = await checker.check('https://example.com/');
 */
export function createSocketFetcher(options: SocketFetcherOptions = {}): ExchangeFetcher {
  const connector = buildConnector({
    timeout: options.connectTimeout ?? 10_000,
    rejectUnauthorized: options.rejectUnauthorized ?? true,
  });

  return async (request) => {
    const url = parseTarget(request.uri);
    if (request.signal.aborted) {
      throw new TransportError('aborted', 'Fetch aborted before connecting');
    }
    const socket = await connect(connector, url);
    return readResponse(socket, request, buildRequestBytes(url, request.method, request.headers));
  };
}
