/**
 * Test helpers: an in-process fetcher serving canned responses
 */

import { Buffer } from 'node:buffer';
import pino from 'pino';
import { buildRequestBytes } from '../src/index.mjs';
import type { Diagnosis, ExchangeFetcher, ExchangeRequest, RawExchange } from '../src/index.mjs';

export const silentLogger = pino({ level: 'silent' });

export function raw(head: string[], body: Buffer | string = ''): Buffer {
  return Buffer.concat([
    Buffer.from(`${head.join('\r\n')}\r\n\r\n`, 'latin1'),
    typeof body === 'string' ? Buffer.from(body, 'latin1') : body,
  ]);
}

export function exchange(request: ExchangeRequest, response: Buffer): RawExchange {
  return {
    request: buildRequestBytes(new URL(request.uri), request.method, request.headers),
    response,
    truncated: false,
  };
}

export function header(request: ExchangeRequest, name: string): string | undefined {
  return request.headers.find((h) => h.name.toLowerCase() === name.toLowerCase())?.value;
}

/**
 * Fetcher answering every request with respond(); calls are recorded in order
 */
export function fakeFetcher(respond: (request: ExchangeRequest) => Buffer | Promise<Buffer>): {
  fetcher: ExchangeFetcher;
  calls: ExchangeRequest[];
} {
  const calls: ExchangeRequest[] = [];
  const fetcher: ExchangeFetcher = async (request) => {
    calls.push(request);
    return exchange(request, await respond(request));
  };
  return { fetcher, calls };
}

/**
 * Every note id in a Diagnosis tree, depth first
 */
export function allNoteIds(diagnosis: Diagnosis): string[] {
  return [...diagnosis.notes.map((n) => n.id), ...diagnosis.related.flatMap((r) => allNoteIds(r.diagnosis))];
}

export const ids = (notes: readonly { id: string }[]) => notes.map((n) => n.id);
