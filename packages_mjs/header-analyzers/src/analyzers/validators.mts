import { rfc } from '@conformance/notes';
import { defineHeader } from '../analyzer.mjs';
import { HeaderSyntaxError } from '../errors.mjs';
import type { EntityTag } from '../types.mjs';

const ENTITY_TAG_RE = /^(W\/)?"([\x21\x23-\x7e\x80-\xff]*)"$/;

/**
 * Parse an entity-tag (RFC 9110 §8.8.3)
 */
export function parseEntityTag(value: string): EntityTag | undefined {
  const match = ENTITY_TAG_RE.exec(value.trim());
  if (!match) return undefined;
  return { weak: match[1] !== undefined, tag: match[2] };
}

/**
 * Strong comparison: both strong and identical (RFC 9110 §8.8.3.2)
 */
export function strongMatch(a: EntityTag, b: EntityTag): boolean {
  return !a.weak && !b.weak && a.tag === b.tag;
}

/**
 * Weak comparison: identical opaque tags, either may be weak
 */
export function weakMatch(a: EntityTag, b: EntityTag): boolean {
  return a.tag === b.tag;
}

export const etag = defineHeader<EntityTag>({
  name: 'ETag',
  category: 'validation',
  reference: rfc(9110, '8.8.3'),
  combine: 'singleton',
  parse({ value }) {
    const tag = parseEntityTag(value);
    if (!tag) {
      throw new HeaderSyntaxError('an entity-tag is a quoted string, optionally prefixed with W/', value);
    }
    return tag;
  },
});
