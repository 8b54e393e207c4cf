/**
 * Accept-Ranges and Content-Range (RFC 9110 §14)
 */

import { defineNotes, rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import { isToken } from '../syntax.mjs';
import type { ContentRange } from '../types.mjs';

export const RANGE_NOTES = defineNotes({
  UNKNOWN_RANGE_UNIT: {
    level: 'warning',
    category: 'range',
    summary: 'The {unit} range unit is not recognized.',
    detail: 'Only the "bytes" range unit is widely supported; clients are unlikely to use "{unit}".',
    reference: rfc(9110, '14.1'),
  },
  ACCEPT_RANGES_NONE_WITH_OTHERS: {
    level: 'bad',
    category: 'range',
    summary: 'Accept-Ranges lists "none" together with other range units.',
    detail: '"none" means no range requests are supported and has to be sent on its own.',
    reference: rfc(9110, '14.3'),
  },
  CONTENT_RANGE_MEANINGLESS: {
    level: 'warning',
    category: 'range',
    summary: 'Content-Range has no meaning on a {status} response.',
    detail: 'Content-Range is only defined for 206 (Partial Content) and 416 (Range Not Satisfiable) responses.',
    reference: rfc(9110, '14.4'),
  },
});

const CONTENT_RANGE_RE = /^([!#$%&'*+\-.^_`|~0-9A-Za-z]+) (?:(\d+)-(\d+)|(\*))\/(\d+|\*)$/;

export const acceptRanges = defineHeader<string[]>({
  name: 'Accept-Ranges',
  category: 'range',
  reference: rfc(9110, '14.3'),
  combine: 'list',
  parse({ elements }, context) {
    const units = elements.map((e) => e.toLowerCase());
    for (const unit of units) {
      if (!isToken(unit)) {
        throw new HeaderSyntaxError(`"${unit}" is not a range unit`, unit);
      }
      if (unit !== 'bytes' && unit !== 'none') {
        context.note(RANGE_NOTES.UNKNOWN_RANGE_UNIT, { unit });
      }
    }
    if (units.includes('none') && units.length > 1) {
      context.note(RANGE_NOTES.ACCEPT_RANGES_NONE_WITH_OTHERS);
    }
    return units;
  },
});

/**
 * Parse a Content-Range value; undefined when it does not match the grammar
 * or describes an impossible range
 */
export function parseContentRange(value: string): ContentRange | undefined {
  const match = CONTENT_RANGE_RE.exec(value.trim());
  if (!match) return undefined;

  const unit = match[1].toLowerCase();
  const complete = match[5] === '*' ? '*' : Number(match[5]);
  if (match[4] === '*') {
    return complete === '*' ? undefined : { unit, complete };
  }

  const first = Number(match[2]);
  const last = Number(match[3]);
  if (first > last || (complete !== '*' && last >= complete)) return undefined;
  return { unit, first, last, complete };
}

export const contentRange = defineHeader<ContentRange>({
  name: 'Content-Range',
  category: 'range',
  reference: rfc(9110, '14.4'),
  combine: 'singleton',
  parse({ value }, context) {
    const range = parseContentRange(value);
    if (!range) {
      throw new HeaderSyntaxError(`"${value}" is not a valid range`, value);
    }
    if (range.unit !== 'bytes') {
      context.note(RANGE_NOTES.UNKNOWN_RANGE_UNIT, { unit: range.unit });
    }
    const status = context.field.statusCode;
    if (status !== undefined && status !== 206 && status !== 416) {
      context.note(RANGE_NOTES.CONTENT_RANGE_MEANINGLESS, { status });
    }
    return range;
  },
});
