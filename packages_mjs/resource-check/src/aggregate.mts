/**
 * Diagnosis aggregation
 */

import type { NegotiationFacts } from '@conformance/cache-analysis';
import type { ExchangeAnalysis } from './analysis.mjs';
import type { TransportError } from './errors.mjs';
import type { Diagnosis, DiagnosisFacts, RelatedDiagnosis, Timing } from './types.mjs';

/**
 * Freeze a value and everything reachable from it.
 * Byte buffers are left as they are; typed arrays cannot be frozen.
 */
export function deepFreeze<T>(value: T, seen: WeakSet<object> = new WeakSet()): T {
  if (typeof value !== 'object' || value === null || ArrayBuffer.isView(value) || seen.has(value)) {
    return value;
  }
  seen.add(value);
  for (const child of Object.values(value)) {
    deepFreeze(child, seen);
  }
  return Object.freeze(value);
}

export interface DiagnosisParts {
  uri: string;
  analysis: ExchangeAnalysis;
  related: readonly RelatedDiagnosis[];
  timing: Timing;
  error?: TransportError;
  negotiation?: NegotiationFacts;
}

/**
 * Assemble the finished, deep-frozen Diagnosis.
 * Notes already on the analysis keep their order.
 */
export function finishDiagnosis(parts: DiagnosisParts): Diagnosis {
  const { uri, analysis, related, timing, error, negotiation } = parts;
  const message = analysis.response?.message;

  let facts: DiagnosisFacts | undefined;
  if (analysis.facts) {
    facts = negotiation ? { ...analysis.facts, negotiation } : analysis.facts;
  }

  const diagnosis: Diagnosis = {
    uri,
    request: analysis.request,
    state: error || !message ? 'failed' : 'done',
    response: message,
    headers: analysis.headers,
    notes: analysis.notes.toArray(),
    facts,
    error: error ? { code: error.code, message: error.message } : undefined,
    timing,
    related: [...related],
  };
  return deepFreeze(diagnosis);
}
