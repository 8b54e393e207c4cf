/**
 * Cross-header analysis of a response
 */

import { MESSAGE, NoteList } from '@conformance/notes';
import type { HeaderIndex } from '@conformance/header-analyzers';
import type { HttpMessage } from '@conformance/http-wire-parser';
import { determineCacheability } from './cacheability.mjs';
import { computeFreshness } from './freshness.mjs';
import { checkContentLength, checkDate, checkRedirect } from './message-checks.mjs';
import { statusOf } from './util.mjs';
import { determineValidators } from './validators.mjs';
import type { CrossHeaderResult, ResponseContext } from './types.mjs';

/**
 * Derive facts that depend on several headers of a response.
 *
 * Header results are read, never modified; every finding is returned as a
 * note on the message.
 *
 * @example
 * const headers = analyzeHeaders(message.headers, { statusCode: 200 });
 * const { facts, notes } = analyzeResponse(message, headers, { receivedAt: Date.now() / 1000 });
 * facts.remainingFreshness; // 60
 */
export function analyzeResponse(
  message: HttpMessage,
  headers: HeaderIndex,
  context: ResponseContext
): CrossHeaderResult {
  const notes = new NoteList();
  const statusCode = statusOf(message) ?? 0;
  const { receivedAt } = context;
  const requestMethod = (context.requestMethod ?? 'GET').toUpperCase();
  const authorized = (context.requestHeaders ?? []).some((h) => h.name.toLowerCase() === 'authorization');

  checkDate(statusCode, headers, receivedAt, notes, MESSAGE);

  const cacheableBy = determineCacheability({ statusCode, requestMethod, authorized, headers }, notes, MESSAGE);
  const freshness = computeFreshness({ statusCode, headers, cacheableBy, receivedAt }, notes, MESSAGE);
  const validators = determineValidators(headers, receivedAt, notes, MESSAGE);

  checkContentLength(message, headers, notes, MESSAGE);
  checkRedirect(statusCode, headers, notes, MESSAGE);

  return Object.freeze({
    facts: Object.freeze({
      freshnessLifetime: freshness.lifetime,
      freshnessSource: freshness.source,
      currentAge: freshness.currentAge,
      remainingFreshness: freshness.remaining,
      cacheableBy,
      validators,
    }),
    notes: notes.toArray(),
  });
}
