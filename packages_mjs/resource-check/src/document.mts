/**
 * Structured, JSON-compatible form of a Diagnosis tree
 */

import type { BodyFraming, HttpMessage } from '@conformance/http-wire-parser';
import type { NoteLevel, NoteSubject, SpecReference } from '@conformance/notes';
import type { Diagnosis, DiagnosisFacts, FinalState, RelationKind, RequestHeader, Timing } from './types.mjs';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface MessageDocument {
  startLine: string;
  headers: RequestHeader[];
  framing: BodyFraming;
  bodyLength: number;
  /** Captured body bytes, base64-encoded */
  body: string;
  truncated: boolean;
  complete: boolean;
  trailers: RequestHeader[];
}

export interface HeaderDocument {
  name: string;
  values: string[];
  value: JsonValue;
  dedicated: boolean;
}

export interface NoteDocument {
  id: string;
  level: NoteLevel;
  category: string;
  subject: NoteSubject;
  summary: string;
  detail: string;
  vars: Record<string, string | number>;
  reference: SpecReference;
}

export interface DiagnosisDocument {
  uri: string;
  state: FinalState;
  request: { method: string; headers: RequestHeader[]; startLine?: string };
  response?: MessageDocument;
  headers: Record<string, HeaderDocument>;
  notes: NoteDocument[];
  facts?: JsonValue;
  error?: { code: string; message: string };
  timing: Timing;
  related: Array<{ relation: RelationKind; diagnosis: DiagnosisDocument }>;
}

/**
 * Convert a typed header value into plain JSON. Undefined members are
 * dropped; anything else without a JSON form becomes its string.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map(toJsonValue);
  }
  if (typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, member] of Object.entries(value)) {
      if (member !== undefined) {
        result[key] = toJsonValue(member);
      }
    }
    return result;
  }
  return String(value);
}

function startLineText(message: HttpMessage): string {
  const { startLine } = message;
  return startLine.kind === 'status'
    ? `${startLine.version} ${startLine.statusCode} ${startLine.reason}`.trimEnd()
    : `${startLine.method} ${startLine.target} ${startLine.version}`;
}

function fields(list: ReadonlyArray<{ name: string; value: string }>): RequestHeader[] {
  return list.map(({ name, value }) => ({ name, value }));
}

function messageDocument(message: HttpMessage): MessageDocument {
  return {
    startLine: startLineText(message),
    headers: fields(message.headers),
    framing: { ...message.framing },
    bodyLength: message.bodyLength,
    body: message.body.toString('base64'),
    truncated: message.truncated,
    complete: message.complete,
    trailers: fields(message.trailers),
  };
}

function factsDocument(facts: DiagnosisFacts | undefined): JsonValue | undefined {
  return facts === undefined ? undefined : toJsonValue(facts);
}

/**
 * Serialize a Diagnosis and its related Diagnoses
 *
 * @example
 * JSON.stringify(toDocument(await checker.check('https://example.com/')), null, 2);
 */
export function toDocument(diagnosis: Diagnosis): DiagnosisDocument {
  const headers: Record<string, HeaderDocument> = {};
  for (const [key, result] of Object.entries(diagnosis.headers)) {
    headers[key] = {
      name: result.name,
      values: [...result.values],
      value: toJsonValue(result.value),
      dedicated: result.dedicated,
    };
  }

  const { request } = diagnosis;
  return {
    uri: diagnosis.uri,
    state: diagnosis.state,
    request: {
      method: request.method,
      headers: fields(request.headers),
      startLine: request.message ? startLineText(request.message) : undefined,
    },
    response: diagnosis.response ? messageDocument(diagnosis.response) : undefined,
    headers,
    notes: diagnosis.notes.map((note) => ({
      id: note.id,
      level: note.level,
      category: note.category,
      subject: note.subject,
      summary: note.summary,
      detail: note.detail,
      vars: { ...note.vars },
      reference: note.reference,
    })),
    facts: factsDocument(diagnosis.facts),
    error: diagnosis.error ? { ...diagnosis.error } : undefined,
    timing: { ...diagnosis.timing },
    related: diagnosis.related.map(({ relation, diagnosis: child }) => ({
      relation,
      diagnosis: toDocument(child),
    })),
  };
}
