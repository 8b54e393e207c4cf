/**
 * Analysis of one captured exchange
 */

import { analyzeResponse, statusOf } from '@conformance/cache-analysis';
import type { AnalyzedResponse, ResponseFacts } from '@conformance/cache-analysis';
import { analyzeHeaders } from '@conformance/header-analyzers';
import type { HeaderResult } from '@conformance/header-analyzers';
import { DEFAULT_BODY_CAPTURE_CAP, parseRequest, parseResponse } from '@conformance/http-wire-parser';
import { NoteList } from '@conformance/notes';
import { finishDiagnosis } from './aggregate.mjs';
import { emitParseError, emitParseIssues } from './parser-notes.mjs';
import type { Diagnosis, RawExchange, RequestHeader, SentRequest } from './types.mjs';

export interface AnalyzeExchangeOptions {
  /** URI the exchange was made with; relative references resolve against it */
  uri: string;
  /** Body bytes to keep. Default: 8 MiB */
  bodyCaptureCap?: number;
  /** Epoch seconds the response arrived. Default: now */
  receivedAt?: number;
  /** Called once the response has been parsed, before its headers are analyzed */
  onParsed?: () => void;
}

/**
 * Everything learned from one exchange, before related fetches are added
 */
export interface ExchangeAnalysis {
  request: SentRequest;
  /** Absent when the response could not be parsed at all */
  response?: AnalyzedResponse;
  headers: Record<string, HeaderResult>;
  /** Parser notes, then header notes, then cross-header notes */
  notes: NoteList;
  facts?: ResponseFacts;
}

function headerRecord(response: AnalyzedResponse): Record<string, HeaderResult> {
  const record: Record<string, HeaderResult> = {};
  for (const result of response.headers) {
    record[result.key] = result;
  }
  return record;
}

function sentRequest(exchange: RawExchange, method: string, headers: readonly RequestHeader[]): SentRequest {
  const { message } = parseRequest(exchange.request);
  return { method, headers, message };
}

/**
 * Parse and analyze a captured exchange: the parser, every header analyzer
 * and the cross-header engine, in that order.
 */
export function analyzeCapture(
  exchange: RawExchange,
  request: { method: string; headers: readonly RequestHeader[] },
  options: AnalyzeExchangeOptions
): ExchangeAnalysis {
  const notes = new NoteList();
  const sent = sentRequest(exchange, request.method, request.headers);

  const { message, issues, error } = parseResponse(exchange.response, {
    bodyCaptureCap: options.bodyCaptureCap ?? DEFAULT_BODY_CAPTURE_CAP,
    requestMethod: request.method,
    inputTruncated: exchange.truncated,
  });
  emitParseIssues(issues, notes);
  if (error) {
    emitParseError(error, notes);
  }
  if (!message) {
    return { request: sent, headers: {}, notes };
  }
  options.onParsed?.();

  const headers = analyzeHeaders(message.headers, {
    statusCode: statusOf(message),
    requestMethod: request.method,
    baseUri: options.uri,
  });
  notes.extend(headers.notes());

  const response: AnalyzedResponse = { message, headers };
  const crossHeader = analyzeResponse(message, headers, {
    requestMethod: request.method,
    requestHeaders: request.headers,
    receivedAt: options.receivedAt ?? Date.now() / 1000,
  });
  notes.extend(crossHeader.notes);

  return { request: sent, response, headers: headerRecord(response), notes, facts: crossHeader.facts };
}

/**
 * Analyze a captured exchange without fetching anything.
 * The result has no related Diagnoses.
 *
 * @example
 * const diagnosis = analyzeExchange(
 *   { request, response, truncated: false },
 *   { method: 'GET', headers: [] },
 *   { uri: 'https://example.com/' }
 * );
 */
export function analyzeExchange(
  exchange: RawExchange,
  request: { method: string; headers: readonly RequestHeader[] },
  options: AnalyzeExchangeOptions
): Diagnosis {
  const receivedAt = options.receivedAt ?? Date.now() / 1000;
  const analysis = analyzeCapture(exchange, request, { ...options, receivedAt });
  return finishDiagnosis({
    uri: options.uri,
    analysis,
    related: [],
    timing: { startedAt: receivedAt * 1000, elapsed: 0 },
  });
}
