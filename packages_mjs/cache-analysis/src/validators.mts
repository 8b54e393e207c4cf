import { defineNotes, rfc } from '@conformance/notes';
import type { NoteList, NoteSubject } from '@conformance/notes';
import type { HeaderIndex } from '@conformance/header-analyzers';
import type { Validators } from './types.mjs';

export const VALIDATOR_NOTES = defineNotes({
  VALIDATOR_NONE: {
    level: 'info',
    category: 'validation',
    summary: 'This response has no validators.',
    detail:
      'Without ETag or Last-Modified, caches cannot revalidate this response with a conditional ' +
      'request; they have to fetch it in full once it is stale.',
    reference: rfc(9110, '8.8'),
  },
  LM_FUTURE: {
    level: 'bad',
    category: 'validation',
    summary: 'The Last-Modified time is in the future.',
    detail:
      'Last-Modified is {delta} seconds after the Date of the response; servers must not send future ' +
      'modification times.',
    reference: rfc(9110, '8.8.2.1'),
  },
});

/**
 * Classify the response's validators.
 *
 * A weak ETag or Last-Modified on its own gives weak validation.
 */
export function determineValidators(
  headers: HeaderIndex,
  receivedAt: number,
  notes: NoteList,
  subject: NoteSubject
): Validators {
  const etag = headers.value('etag');
  const lastModified = headers.value('last-modified');
  const date = headers.value('date');

  if (lastModified) {
    const reference = date ? date.time : receivedAt;
    if (lastModified.time > reference) {
      notes.emit(subject, VALIDATOR_NOTES.LM_FUTURE, { delta: lastModified.time - reference });
    }
  }

  if (!etag && !lastModified) {
    notes.emit(subject, VALIDATOR_NOTES.VALIDATOR_NONE);
    return { strength: 'none' };
  }

  return {
    strength: etag && !etag.weak ? 'strong' : 'weak',
    etag,
    lastModified: lastModified?.time,
  };
}
