/**
 * Vary (RFC 9110 §12.5.5)
 */

import { defineNotes, rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { isToken } from '../syntax.mjs';

export const VARY_NOTES = defineNotes({
  VARY_ASTERISK: {
    level: 'warning',
    category: 'caching',
    summary: 'Vary: * effectively makes this response uncacheable.',
    detail:
      '"Vary: *" says the response varies on something outside the request headers, so a cache ' +
      'can never reuse it without revalidating.',
    reference: rfc(9110, '12.5.5'),
  },
  VARY_ASTERISK_WITH_FIELDS: {
    level: 'bad',
    category: 'caching',
    summary: 'Vary contains "*" alongside field names.',
    detail: 'When "*" is present the other listed fields have no effect; "*" has to be sent on its own.',
    reference: rfc(9110, '12.5.5'),
  },
  VARY_USER_AGENT: {
    level: 'info',
    category: 'caching',
    summary: 'Vary: User-Agent can cause cache inefficiency.',
    detail:
      'User-Agent strings vary widely, so caches will store many copies of this response and ' +
      'rarely reuse any of them.',
    reference: rfc(9110, '12.5.5'),
  },
  VARY_HOST: {
    level: 'warning',
    category: 'caching',
    summary: 'Vary: Host is not necessary.',
    detail:
      'Host is already part of the cache key, so listing it in Vary has no effect beyond confusing some caches.',
    reference: rfc(9110, '12.5.5'),
  },
  VARY_COMPLEX: {
    level: 'warning',
    category: 'caching',
    summary: 'This resource varies in {count} ways.',
    detail:
      'Responses that vary on many request headers are hard for caches to store and reuse ' +
      'efficiently. Consider whether all of them are needed.',
    reference: rfc(9110, '12.5.5'),
  },
});

const VARY_COMPLEX_THRESHOLD = 3;

export const vary = defineHeader<string[]>({
  name: 'Vary',
  category: 'caching',
  reference: rfc(9110, '12.5.5'),
  combine: 'list',
  parse({ elements }, context) {
    const fields = elements.map((e) => e.toLowerCase());
    for (const field of fields) {
      if (field !== '*' && !isToken(field)) {
        throw new HeaderSyntaxError(`"${field}" is not a field name`, field);
      }
    }

    if (fields.includes('*')) {
      context.note(fields.length > 1 ? VARY_NOTES.VARY_ASTERISK_WITH_FIELDS : VARY_NOTES.VARY_ASTERISK);
    } else if (fields.length > VARY_COMPLEX_THRESHOLD) {
      context.note(VARY_NOTES.VARY_COMPLEX, { count: fields.length });
    }
    if (fields.includes('user-agent')) {
      context.note(VARY_NOTES.VARY_USER_AGENT);
    }
    if (fields.includes('host')) {
      context.note(VARY_NOTES.VARY_HOST);
    }

    return fields;
  },
});
