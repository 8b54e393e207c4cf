/**
 * Fallback analysis for headers without a dedicated analyzer
 */

import { readFileSync } from 'node:fs';
import { NoteList, headerSubject } from '@conformance/notes';
import type { NoteDefinition, NoteVars } from '@conformance/notes';
import { checkFieldCharacters, combineFields } from './analyzer.mjs';
import { COMMON_NOTES } from './notes.mjs';
import { isToken } from './syntax.mjs';
import type { AnalyzerContext, FieldContext, HeaderResult } from './types.mjs';

const REGISTERED_FIELDS_FILE = new URL('../data/registered-fields.json', import.meta.url);

function loadRegisteredFields(): ReadonlySet<string> {
  const parsed: unknown = JSON.parse(readFileSync(REGISTERED_FIELDS_FILE, 'utf8'));
  if (!Array.isArray(parsed) || !parsed.every((n): n is string => typeof n === 'string')) {
    throw new Error(`${REGISTERED_FIELDS_FILE.pathname} must be an array of field names`);
  }
  return new Set(parsed.map((n) => n.toLowerCase()));
}

/**
 * Registered field names the fallback accepts without a dedicated analyzer
 */
export const REGISTERED_FIELDS: ReadonlySet<string> = loadRegisteredFields();

/**
 * Whether the fallback accepts this field name as registered
 */
export function isRegisteredField(name: string): boolean {
  return REGISTERED_FIELDS.has(name.toLowerCase());
}

/**
 * Analyze a header no dedicated analyzer handles.
 *
 * Repeats are comma-joined. Registered fields get the joined string as their
 * value; anything else gets a single HEADER_NOT_RECOGNIZED note and no value.
 */
export function analyzeGeneric(
  name: string,
  values: readonly string[],
  field: FieldContext = {}
): HeaderResult<string> {
  const key = name.toLowerCase();
  const notes = new NoteList();
  const subject = headerSubject(key);
  const context: AnalyzerContext = {
    field,
    note(definition: NoteDefinition, vars: NoteVars = {}) {
      notes.emit(subject, definition, { field: name, ...vars });
    },
  };

  if (!isToken(name)) {
    context.note(COMMON_NOTES.HEADER_NAME_INVALID);
  }
  checkFieldCharacters(values, context);

  const registered = REGISTERED_FIELDS.has(key);
  if (!registered) {
    context.note(COMMON_NOTES.HEADER_NOT_RECOGNIZED);
  }

  return Object.freeze({
    name,
    key,
    values: Object.freeze([...values]),
    value: registered ? combineFields(values, 'list').value : undefined,
    notes: notes.toArray(),
    dedicated: false,
  });
}
