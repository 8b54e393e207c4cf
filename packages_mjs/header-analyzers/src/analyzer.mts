/**
 * Shared analysis pipeline: combine field lines, check characters, parse, collect notes
 */

import { NoteList, headerSubject } from '@conformance/notes';
import type { NoteDefinition, NoteVars } from '@conformance/notes';
import { HeaderSyntaxError } from './errors.mjs';
import { COMMON_NOTES } from './notes.mjs';
import { hasControlChars, hasObsText, splitList } from './syntax.mjs';
import type {
  AnalyzerContext,
  AnalyzerInput,
  FieldContext,
  HeaderAnalyzer,
  HeaderResult,
  HeaderSpec,
} from './types.mjs';

/**
 * Combine field lines according to a policy
 */
export function combineFields(
  values: readonly string[],
  policy: HeaderSpec<unknown>['combine']
): AnalyzerInput {
  switch (policy) {
    case 'singleton': {
      const value = values.length > 0 ? values[values.length - 1] : '';
      return { fields: values, value, elements: [value] };
    }
    case 'separate':
      return { fields: values, value: values.join(', '), elements: [...values] };
    case 'list':
    default: {
      const value = values.join(', ');
      return { fields: values, value, elements: splitList(value) };
    }
  }
}

/**
 * Report control characters and non-ASCII bytes in any of the values
 */
export function checkFieldCharacters(values: readonly string[], context: AnalyzerContext): void {
  if (values.some(hasControlChars)) {
    context.note(COMMON_NOTES.HEADER_CONTROL_CHARS);
  } else if (values.some(hasObsText)) {
    context.note(COMMON_NOTES.HEADER_NON_ASCII);
  }
}

/**
 * Build an analyzer from a declarative spec
 *
 * @example
 * export const age = defineHeader<number>({
 *   name: 'Age',
 *   category: 'caching',
 *   reference: rfc(9111, '5.1'),
 *   combine: 'singleton',
 *   parse: ({ value }) => parseDeltaSeconds(value),
 * });
 */
export function defineHeader<T>(spec: HeaderSpec<T>): HeaderAnalyzer<T> {
  const key = spec.name.toLowerCase();

  function analyze(
    values: readonly string[],
    field: FieldContext = {},
    displayName: string = spec.name
  ): HeaderResult<T> {
    const notes = new NoteList();
    const subject = headerSubject(key);
    const context: AnalyzerContext = {
      field,
      note(definition: NoteDefinition, vars: NoteVars = {}) {
        notes.emit(subject, definition, { field: displayName, ...vars });
      },
    };

    checkFieldCharacters(values, context);

    const input = combineFields(values, spec.combine);
    if (spec.combine === 'singleton' && values.length > 1) {
      const identical = values.every((v) => v === values[0]);
      if (!(identical && spec.allowIdenticalRepeats)) {
        context.note(COMMON_NOTES.SINGLE_HEADER_REPEAT, { value: input.value });
      }
    }

    let value: T | undefined;
    try {
      value = spec.parse(input, context);
    } catch (error) {
      if (!(error instanceof HeaderSyntaxError)) {
        throw error;
      }
      context.note(COMMON_NOTES.BAD_SYNTAX, { problem: error.message });
      value = undefined;
    }

    return Object.freeze({
      name: displayName,
      key,
      values: Object.freeze([...values]),
      value,
      notes: notes.toArray(),
      dedicated: true,
    });
  }

  return Object.freeze({
    name: spec.name,
    key,
    category: spec.category,
    reference: spec.reference,
    combine: spec.combine,
    combineDocumented: spec.combineDocumented ?? true,
    analyze,
  });
}
