/**
 * Tests for the socket fetcher against an in-process server
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Buffer } from 'node:buffer';
import { createServer } from 'node:net';
import type { AddressInfo, Server, Socket } from 'node:net';
import {
  TransportError,
  buildRequestBytes,
  connectOptions,
  createResourceChecker,
  createSocketFetcher,
} from '../src/index.mjs';
import type { ExchangeRequest } from '../src/index.mjs';
import { silentLogger } from './helpers.mjs';

const RESPONSE = 'HTTP/1.1 200 OK\r\nContent-Length: 5\r\nX-Odd:  spaced \r\n\r\nhello';

let server: Server;
let sockets: Socket[];
let received: Buffer[];
let reply: (socket: Socket) => void;

function listen(): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      resolve(typeof address === 'object' && address !== null ? address.port : 0);
    });
  });
}

function request(port: number, overrides: Partial<ExchangeRequest> = {}): ExchangeRequest {
  return {
    uri: `http://127.0.0.1:${port}/path?x=1`,
    method: 'GET',
    headers: [{ name: 'User-Agent', value: 'test-agent/1' }],
    signal: new AbortController().signal,
    maxResponseBytes: 1024,
    ...overrides,
  };
}

beforeEach(() => {
  sockets = [];
  received = [];
  reply = (socket) => socket.end(RESPONSE);
  server = createServer((socket) => {
    sockets.push(socket);
    socket.on('error', () => undefined);
    let head = Buffer.alloc(0);
    socket.on('data', (chunk: Buffer) => {
      head = Buffer.concat([head, chunk]);
      if (head.includes('\r\n\r\n')) {
        received.push(head);
        reply(socket);
      }
    });
  });
});

afterEach(async () => {
  for (const socket of sockets) {
    socket.destroy();
  }
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe('buildRequestBytes', () => {
  it('should write Host first and Connection: close last', () => {
    const bytes = buildRequestBytes(new URL('http://example.test:8080/a?b=c'), 'HEAD', [
      { name: 'Accept', value: '*/*' },
      { name: 'Connection', value: 'keep-alive' },
    ]);
    expect(bytes.toString('latin1')).toBe(
      'HEAD /a?b=c HTTP/1.1\r\nHost: example.test:8080\r\nAccept: */*\r\nConnection: close\r\n\r\n'
    );
  });
});

describe('connectOptions', () => {
  it('should strip the brackets from IPv6 literals', () => {
    expect(connectOptions(new URL('http://[::1]:8080/'))).toEqual({
      hostname: '::1',
      host: '[::1]:8080',
      protocol: 'http:',
      port: '8080',
    });
  });

  it('should fill in the default port', () => {
    expect(connectOptions(new URL('https://example.test/'))).toMatchObject({ hostname: 'example.test', port: '443' });
  });
});

describe('createSocketFetcher', () => {
  it('should return both sides of the exchange verbatim', async () => {
    const port = await listen();
    const exchange = await createSocketFetcher()(request(port));

    const sent =
      `GET /path?x=1 HTTP/1.1\r\nHost: 127.0.0.1:${port}\r\n` +
      'User-Agent: test-agent/1\r\nConnection: close\r\n\r\n';
    expect(exchange.request.toString('latin1')).toBe(sent);
    expect(received[0].toString('latin1')).toBe(sent);
    expect(exchange.response.toString('latin1')).toBe(RESPONSE);
    expect(exchange.truncated).toBe(false);
  });

  it('should stop reading at maxResponseBytes', async () => {
    reply = (socket) => socket.end(`HTTP/1.1 200 OK\r\n\r\n${'x'.repeat(500)}`);
    const port = await listen();
    const exchange = await createSocketFetcher()(request(port, { maxResponseBytes: 40 }));

    expect(exchange.response.length).toBe(40);
    expect(exchange.truncated).toBe(true);
  });

  it('should not mark a response of exactly maxResponseBytes as truncated', async () => {
    const port = await listen();
    const size = Buffer.byteLength(RESPONSE, 'latin1');
    const exchange = await createSocketFetcher()(request(port, { maxResponseBytes: size }));

    expect(exchange.response.toString('latin1')).toBe(RESPONSE);
    expect(exchange.truncated).toBe(false);
  });

  it('should reject with the abort reason', async () => {
    reply = () => undefined;
    const port = await listen();
    const controller = new AbortController();
    const pending = createSocketFetcher()(request(port, { signal: controller.signal }));
    const reason = new TransportError('timeout', 'test timeout');
    setTimeout(() => controller.abort(reason), 20);

    await expect(pending).rejects.toBe(reason);
  });

  it('should report refused connections', async () => {
    const port = await listen();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    server = createServer();

    await expect(createSocketFetcher()(request(port))).rejects.toMatchObject({
      name: 'TransportError',
      code: 'connect',
    });
  });

  it('should reject schemes other than http and https', async () => {
    await expect(createSocketFetcher()(request(0, { uri: 'ftp://127.0.0.1/file' }))).rejects.toMatchObject({
      code: 'protocol',
    });
  });
});

describe('checking a live server', () => {
  it('should produce a Diagnosis from the socket exchange', async () => {
    const port = await listen();
    const checker = createResourceChecker(
      createSocketFetcher(),
      { followRelatedFetches: false },
      { logger: silentLogger }
    );
    const diagnosis = await checker.check(`http://127.0.0.1:${port}/`);

    expect(diagnosis.state).toBe('done');
    expect(diagnosis.response?.body.toString()).toBe('hello');
    expect(diagnosis.headers['x-odd'].values).toEqual(['spaced']);
  });
});
