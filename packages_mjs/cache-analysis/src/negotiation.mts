/**
 * Content negotiation: compare a response with its gzip-negotiated variant
 */

import type { Buffer } from 'node:buffer';
import { gunzipSync } from 'node:zlib';
import { MESSAGE, NoteList, defineNotes, headerSubject, rfc } from '@conformance/notes';
import { strongMatch } from '@conformance/header-analyzers';
import { statusOf } from './util.mjs';
import type { AnalyzedResponse, NegotiationFacts, NegotiationResult } from './types.mjs';

export const NEGOTIATION_NOTES = defineNotes({
  CONNEG_SUBREQ_PROBLEM: {
    level: 'info',
    category: 'conneg',
    summary: 'There was a problem checking for content negotiation support.',
    detail: 'The response to the request with {header} was not complete: {problem}. Trying again might fix it.',
    reference: rfc(9110, '12.5.3'),
  },
  CONNEG_NO_GZIP: {
    level: 'info',
    category: 'conneg',
    summary: 'Content negotiation for gzip compression isn\'t supported.',
    detail: 'A gzip-encoded response was asked for, but the resource did not send one.',
    reference: rfc(9110, '12.5.3'),
  },
  CONNEG_GZIP_WITHOUT_ASKING: {
    level: 'warning',
    category: 'conneg',
    summary: 'A gzip-compressed response was sent when it wasn\'t asked for.',
    detail:
      'The request did not include Accept-Encoding, but the response was gzip-encoded. Clients ' +
      'that cannot decode gzip will not be able to use it.',
    reference: rfc(9110, '12.5.3'),
  },
  CONNEG_NO_VARY: {
    level: 'bad',
    category: 'conneg',
    summary: '{header} is negotiated, but Vary does not list it.',
    detail:
      'The response changes depending on {header}, so Vary has to include it; otherwise caches ' +
      'may serve the encoded variant to clients that cannot use it.',
    reference: rfc(9110, '12.5.5'),
  },
  VARY_INCONSISTENT: {
    level: 'bad',
    category: 'conneg',
    summary: 'The resource doesn\'t send Vary consistently.',
    detail:
      'The negotiated response has "Vary: {negotiated}" while the plain response has "Vary: {plain}". ' +
      'Every variant of a resource has to carry the same Vary value.',
    reference: rfc(9110, '12.5.5'),
  },
  VARY_STATUS_MISMATCH: {
    level: 'warning',
    category: 'conneg',
    summary: 'The response status is different when content negotiation happens.',
    detail: 'The plain response was {plain}, but the negotiated response was {negotiated}.',
    reference: rfc(9110, '12.5.3'),
  },
  VARY_HEADER_MISMATCH: {
    level: 'bad',
    category: 'conneg',
    summary: 'The {header} header is different when content negotiation happens.',
    detail:
      'Variants that differ only in content-coding should have the same {header}; the plain ' +
      'response has "{plain}" and the negotiated one "{negotiated}".',
    reference: rfc(9110, '8.4'),
  },
  VARY_ETAG_DOESNT_CHANGE: {
    level: 'bad',
    category: 'conneg',
    summary: 'The ETag doesn\'t change between negotiated representations.',
    detail:
      'Both variants have the strong entity-tag "{etag}", but their bodies differ. Strong ' +
      'validators have to identify a single representation.',
    reference: rfc(9110, '8.8.3'),
  },
  VARY_BODY_MISMATCH: {
    level: 'info',
    category: 'conneg',
    summary: 'The response body is different when content negotiation happens.',
    detail: 'After decoding, the negotiated body does not match the plain one.',
    reference: rfc(9110, '8.4'),
  },
  CONNEG_GZIP_BAD_ENCODING: {
    level: 'bad',
    category: 'conneg',
    summary: 'The gzip-encoded body could not be decoded.',
    detail: 'Decoding failed: {problem}.',
    reference: rfc(9110, '8.4.1.3'),
  },
  CONNEG_GZIP_GOOD: {
    level: 'good',
    category: 'conneg',
    summary: 'Content negotiation for gzip compression is supported, saving {savings}%.',
    detail: 'Compressing the body reduced it from {original} to {encoded} bytes.',
    reference: rfc(9110, '8.4.1.3'),
  },
  CONNEG_GZIP_BAD: {
    level: 'warning',
    category: 'conneg',
    summary: 'Content negotiation for gzip compression makes the response {savings}% larger.',
    detail:
      'The gzip-encoded body is {encoded} bytes, compared to {original} bytes unencoded. ' +
      'Consider not compressing this type of content.',
    reference: rfc(9110, '8.4.1.3'),
  },
});

/**
 * Headers that should not change between content-coding variants
 */
const INVARIANT_HEADERS = ['content-type', 'content-language'];

function isGzipped({ headers }: AnalyzedResponse): boolean {
  return (headers.value('content-encoding') ?? []).some((c) => c === 'gzip' || c === 'x-gzip');
}

function joined({ headers }: AnalyzedResponse, name: string): string {
  return headers.get(name)?.values.join(', ') ?? '';
}

/**
 * Compare a plain response with one negotiated by changing the given
 * request headers (e.g. sending Accept-Encoding: gzip).
 *
 * Pure: both responses have already been fetched and analyzed.
 */
export function evaluateVaryAgainst(
  primary: AnalyzedResponse,
  negotiated: AnalyzedResponse,
  variedRequestHeaders: readonly string[]
): NegotiationResult {
  const notes = new NoteList();
  const vary = headerSubject('vary');

  if (!negotiated.message.complete) {
    const { framing, bodyLength } = negotiated.message;
    notes.emit(MESSAGE, NEGOTIATION_NOTES.CONNEG_SUBREQ_PROBLEM, {
      header: variedRequestHeaders.join(', '),
      problem:
        framing.kind === 'content-length'
          ? `${bodyLength} of ${framing.length} body bytes arrived`
          : 'the body ended early',
    });
    return { facts: { supported: false }, notes: notes.toArray() };
  }

  if (isGzipped(primary)) {
    notes.emit(MESSAGE, NEGOTIATION_NOTES.CONNEG_GZIP_WITHOUT_ASKING);
  }
  if (!isGzipped(negotiated)) {
    notes.emit(headerSubject('content-encoding'), NEGOTIATION_NOTES.CONNEG_NO_GZIP);
    return { facts: { supported: false }, notes: notes.toArray() };
  }

  const plainStatus = statusOf(primary.message);
  const negotiatedStatus = statusOf(negotiated.message);
  if (plainStatus !== negotiatedStatus) {
    notes.emit(MESSAGE, NEGOTIATION_NOTES.VARY_STATUS_MISMATCH, {
      plain: plainStatus ?? '',
      negotiated: negotiatedStatus ?? '',
    });
    return { facts: { supported: true }, notes: notes.toArray() };
  }

  const negotiatedVary = negotiated.headers.value('vary') ?? [];
  if (!negotiatedVary.includes('*')) {
    for (const header of variedRequestHeaders) {
      if (!negotiatedVary.includes(header.toLowerCase())) {
        notes.emit(vary, NEGOTIATION_NOTES.CONNEG_NO_VARY, { header });
      }
    }
  }

  const plainVary = [...(primary.headers.value('vary') ?? [])].sort();
  if (plainVary.join(',') !== [...negotiatedVary].sort().join(',')) {
    notes.emit(vary, NEGOTIATION_NOTES.VARY_INCONSISTENT, {
      plain: joined(primary, 'vary'),
      negotiated: joined(negotiated, 'vary'),
    });
  }

  for (const header of INVARIANT_HEADERS) {
    const plain = joined(primary, header);
    const other = joined(negotiated, header);
    if (plain !== other) {
      notes.emit(headerSubject(header), NEGOTIATION_NOTES.VARY_HEADER_MISMATCH, {
        header: primary.headers.get(header)?.name ?? negotiated.headers.get(header)?.name ?? header,
        plain,
        negotiated: other,
      });
    }
  }

  const plainTag = primary.headers.value('etag');
  const negotiatedTag = negotiated.headers.value('etag');
  if (plainTag && negotiatedTag && strongMatch(plainTag, negotiatedTag)) {
    notes.emit(headerSubject('etag'), NEGOTIATION_NOTES.VARY_ETAG_DOESNT_CHANGE, { etag: plainTag.tag });
  }

  const facts: NegotiationFacts = { supported: true };
  const comparable =
    primary.message.complete &&
    negotiated.message.complete &&
    !primary.message.truncated &&
    !negotiated.message.truncated;
  if (!comparable) {
    return { facts, notes: notes.toArray() };
  }

  let decoded: Buffer;
  try {
    decoded = gunzipSync(negotiated.message.body);
  } catch (error) {
    notes.emit(MESSAGE, NEGOTIATION_NOTES.CONNEG_GZIP_BAD_ENCODING, {
      problem: error instanceof Error ? error.message : String(error),
    });
    return { facts, notes: notes.toArray() };
  }

  if (!decoded.equals(primary.message.body)) {
    notes.emit(MESSAGE, NEGOTIATION_NOTES.VARY_BODY_MISMATCH);
  }

  const original = primary.message.bodyLength;
  const encoded = negotiated.message.bodyLength;
  if (original === 0 && encoded > 0) {
    return { facts, notes: notes.toArray() };
  }
  // whole percent, truncated toward zero; 0 when either body is empty
  const savings = original > 0 && encoded > 0 ? Math.trunc((100 * (original - encoded)) / original) : 0;
  facts.savings = savings;
  facts.originalLength = original;
  facts.encodedLength = encoded;
  if (savings >= 0) {
    notes.emit(MESSAGE, NEGOTIATION_NOTES.CONNEG_GZIP_GOOD, { savings, original, encoded });
  } else {
    notes.emit(MESSAGE, NEGOTIATION_NOTES.CONNEG_GZIP_BAD, { savings: -savings, original, encoded });
  }

  return { facts, notes: notes.toArray() };
}
