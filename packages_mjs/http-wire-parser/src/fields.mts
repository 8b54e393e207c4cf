/**
 * Field section parsing (RFC 9112 §5)
 */
import type { Buffer } from 'node:buffer';
import { readLine } from './lines.mjs';
import type { HeaderField, ParseIssue } from './types.mjs';

const TOKEN_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export interface FieldSection {
  fields: HeaderField[];
  /** Offset just past the empty line, or the end of input when unterminated */
  end: number;
  /** An empty line closed the section */
  terminated: boolean;
}

/**
 * Parse field lines from `start` until an empty line.
 *
 * Lines starting with SP or HTAB continue the previous field (obs-fold);
 * they are reported and joined with a single space.
 */
export function parseFieldSection(
  data: Buffer,
  start: number,
  issues: ParseIssue[]
): FieldSection {
  const fields: HeaderField[] = [];
  let offset = start;
  let reportedBareLf = false;

  for (;;) {
    const line = readLine(data, offset);
    if (line === null) {
      return { fields, end: data.length, terminated: false };
    }
    offset = line.next;

    if (line.bareLf && !reportedBareLf) {
      issues.push({ kind: 'bare-lf', offset: line.start });
      reportedBareLf = true;
    }

    if (line.text.length === 0) {
      return { fields, end: offset, terminated: true };
    }

    const first = line.text.charCodeAt(0);
    if (first === 0x20 || first === 0x09) {
      const previous = fields[fields.length - 1];
      if (previous === undefined) {
        issues.push({ kind: 'header-no-colon', offset: line.start, detail: line.text.trim() });
        continue;
      }
      issues.push({ kind: 'obs-fold', offset: line.start, field: previous.name });
      const continuation = line.text.trim();
      fields[fields.length - 1] = {
        ...previous,
        value: continuation.length > 0 ? `${previous.value} ${continuation}` : previous.value,
        folded: true,
      };
      continue;
    }

    const colon = line.text.indexOf(':');
    if (colon === -1) {
      issues.push({ kind: 'header-no-colon', offset: line.start, detail: line.text });
      continue;
    }

    const rawName = line.text.substring(0, colon);
    const name = rawName.trimEnd();
    if (name.length !== rawName.length) {
      issues.push({ kind: 'whitespace-before-colon', offset: line.start, field: name });
    }
    if (!TOKEN_RE.test(name)) {
      issues.push({ kind: 'invalid-field-name', offset: line.start, field: name });
    }

    fields.push({
      name,
      value: line.text.substring(colon + 1).trim(),
      offset: line.start,
      folded: false,
    });
  }
}

/**
 * Values of every field named `name` (case-insensitive), in order
 */
export function fieldValues(fields: readonly HeaderField[], name: string): string[] {
  const lower = name.toLowerCase();
  return fields.filter((f) => f.name.toLowerCase() === lower).map((f) => f.value);
}
