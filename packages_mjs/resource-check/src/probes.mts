/**
 * Follow-up requests issued after a successful response
 */

import { evaluateConditional, evaluateRange, evaluateVaryAgainst, statusOf } from '@conformance/cache-analysis';
import type { AnalyzedResponse, NegotiationFacts, ValidatorKind } from '@conformance/cache-analysis';
import type { Note } from '@conformance/notes';
import type { DiagnosisState, RelationKind, RequestHeader } from './types.mjs';

export interface ProbeEvaluation {
  notes: readonly Note[];
  negotiation?: NegotiationFacts;
}

/**
 * One follow-up request and how to judge its response
 */
export interface Probe {
  relation: RelationKind;
  state: DiagnosisState;
  /** Added to the primary request's headers */
  headers: RequestHeader[];
  evaluate(primary: AnalyzedResponse, retry: AnalyzedResponse): ProbeEvaluation;
}

const VALIDATOR_HEADER: Record<ValidatorKind, string> = {
  etag: 'If-None-Match',
  'last-modified': 'If-Modified-Since',
};

function lastValue(response: AnalyzedResponse, name: string): string | undefined {
  const values = response.headers.get(name)?.values;
  return values?.[values.length - 1];
}

function conditionalProbe(response: AnalyzedResponse, kind: ValidatorKind): Probe | undefined {
  const present = kind === 'etag' ? response.headers.value('etag') : response.headers.value('last-modified');
  const raw = lastValue(response, kind);
  if (present === undefined || raw === undefined) {
    return undefined;
  }
  return {
    relation: 'conditional-retry',
    state: 'retrying-conditional',
    headers: [{ name: VALIDATOR_HEADER[kind], value: raw }],
    evaluate: (primary, retry) => ({ notes: evaluateConditional(primary, retry, kind) }),
  };
}

function rangeProbe(response: AnalyzedResponse, probeBytes: number): Probe | undefined {
  const { message } = response;
  const units = response.headers.value('accept-ranges') ?? [];
  if (!units.includes('bytes') || !message.complete || message.truncated || message.bodyLength === 0) {
    return undefined;
  }
  const range = { first: 0, last: Math.min(probeBytes, message.bodyLength) - 1 };
  return {
    relation: 'range-retry',
    state: 'retrying-range',
    headers: [{ name: 'Range', value: `bytes=${range.first}-${range.last}` }],
    evaluate: (primary, retry) => ({ notes: evaluateRange(primary, retry, range) }),
  };
}

function negotiationProbe(
  response: AnalyzedResponse,
  method: string,
  requestHeaders: readonly RequestHeader[]
): Probe | undefined {
  const asked = requestHeaders.some((h) => h.name.toLowerCase() === 'accept-encoding');
  if (method !== 'GET' || asked || statusOf(response.message) === 206) {
    return undefined;
  }
  return {
    relation: 'negotiation-retry',
    state: 'retrying-negotiation',
    headers: [{ name: 'Accept-Encoding', value: 'gzip' }],
    evaluate: (primary, retry) => {
      const { facts, notes } = evaluateVaryAgainst(primary, retry, ['Accept-Encoding']);
      return { notes, negotiation: facts };
    },
  };
}

/**
 * Decide which follow-ups a complete 2xx response calls for, in the order
 * their evaluation notes are reported.
 */
export function planProbes(
  response: AnalyzedResponse,
  request: { method: string; headers: readonly RequestHeader[] },
  probeBytes: number
): Probe[] {
  const probes = [
    conditionalProbe(response, 'etag'),
    conditionalProbe(response, 'last-modified'),
    rangeProbe(response, probeBytes),
    negotiationProbe(response, request.method, request.headers),
  ];
  return probes.filter((probe): probe is Probe => probe !== undefined);
}
