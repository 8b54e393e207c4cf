/**
 * Notes raised while orchestrating fetches
 */

import { defineNotes, rfc } from '@conformance/notes';

export const FETCH_NOTES = defineNotes({
  TRANSPORT_FAILED: {
    level: 'bad',
    category: 'general',
    summary: 'The resource could not be fetched ({code}).',
    detail: 'The request failed before a complete response was received: {message}.',
    reference: rfc(9110, '3.7'),
  },
  REDIRECT_LOOP: {
    level: 'bad',
    category: 'redirection',
    summary: 'The redirect to {location} loops back to an earlier response.',
    detail:
      '{location} was already fetched in this chain of redirects, so following it would never ' +
      'end. Clients will stop and report an error.',
    reference: rfc(9110, '15.4'),
  },
  REDIRECT_LIMIT: {
    level: 'bad',
    category: 'redirection',
    summary: 'The redirect to {location} was not followed; the chain is longer than {limit} redirects.',
    detail: 'Long chains of redirects slow clients down, and many clients give up after a handful of them.',
    reference: rfc(9110, '15.4'),
  },
  RELATED_FETCH_FAILED: {
    level: 'info',
    category: 'general',
    summary: 'The {relation} request could not be completed ({code}).',
    detail: '{message}. Checks that depend on this request were skipped.',
    reference: rfc(9110, '3.7'),
  },
});
