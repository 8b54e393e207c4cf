/**
 * Test helpers: build analyzed responses from raw text
 */

import { Buffer } from 'node:buffer';
import { analyzeHeaders } from '@conformance/header-analyzers';
import { parseResponse } from '@conformance/http-wire-parser';
import { statusOf } from '../src/index.mjs';
import type { AnalyzedResponse } from '../src/index.mjs';

/** Sun, 06 Nov 1994 08:49:37 GMT */
export const NOW = 784111777;
export const NOW_DATE = 'Sun, 06 Nov 1994 08:49:37 GMT';

export function response(head: string[], body: Buffer | string = ''): AnalyzedResponse {
  const raw = Buffer.concat([
    Buffer.from(`${head.join('\r\n')}\r\n\r\n`, 'latin1'),
    typeof body === 'string' ? Buffer.from(body, 'latin1') : body,
  ]);
  const { message, error } = parseResponse(raw);
  if (!message) {
    throw error ?? new Error('no message');
  }
  return { message, headers: analyzeHeaders(message.headers, { statusCode: statusOf(message) }) };
}
