/**
 * Note creation, rendering and collection
 */

import type {
  Note,
  NoteDefinition,
  NoteLevel,
  NoteSubject,
  NoteVars,
  SpecReference,
} from './types.mjs';

const PLACEHOLDER_RE = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

const LEVEL_ORDER: Record<NoteLevel, number> = {
  good: 0,
  info: 1,
  warning: 2,
  bad: 3,
};

/**
 * Subject for notes about the message as a whole
 */
export const MESSAGE: NoteSubject = Object.freeze({ type: 'message' });

/**
 * Subject for notes about one header field
 */
export function headerSubject(field: string): NoteSubject {
  return Object.freeze({ type: 'header', field: field.toLowerCase() });
}

/**
 * Substitute {name} placeholders; unknown names render as an empty string
 */
export function renderTemplate(template: string, vars: NoteVars = {}): string {
  return template.replace(PLACEHOLDER_RE, (_, name: string) => {
    const value = vars[name];
    return value === undefined ? '' : String(value);
  });
}

/**
 * Reference to a section of an RFC
 *
 * @example
 * rfc(9111, '5.2.2.1') // { document: 'RFC 9111', section: '5.2.2.1', url: '...#section-5.2.2.1' }
 */
export function rfc(number: number, section?: string): SpecReference {
  const base = `https://www.rfc-editor.org/rfc/rfc${number}.html`;
  return {
    document: `RFC ${number}`,
    section,
    url: section ? `${base}#section-${section}` : base,
  };
}

/**
 * Declare a group of note definitions, keyed by id
 *
 * The key of each entry becomes the definition's id.
 */
export function defineNotes<K extends string>(
  definitions: Record<K, Omit<NoteDefinition, 'id'>>
): Readonly<Record<K, NoteDefinition>> {
  const result = {} as Record<K, NoteDefinition>;
  for (const id in definitions) {
    result[id] = Object.freeze({ id, ...definitions[id] });
  }
  return Object.freeze(result);
}

/**
 * Render a definition into an immutable note
 */
export function createNote(
  definition: NoteDefinition,
  subject: NoteSubject,
  vars: NoteVars = {}
): Note {
  return Object.freeze({
    id: definition.id,
    level: definition.level,
    category: definition.category,
    subject,
    summary: renderTemplate(definition.summary, vars),
    detail: renderTemplate(definition.detail, vars),
    vars: Object.freeze({ ...vars }),
    reference: definition.reference,
  });
}

/**
 * Append-only, ordered collection of notes
 */
export class NoteList {
  private readonly notes: Note[] = [];

  /**
   * Render and append a note; returns the note
   */
  emit(subject: NoteSubject, definition: NoteDefinition, vars: NoteVars = {}): Note {
    const note = createNote(definition, subject, vars);
    this.notes.push(note);
    return note;
  }

  /**
   * Append notes that were emitted elsewhere, keeping their order
   */
  extend(notes: Iterable<Note>): void {
    for (const note of notes) {
      this.notes.push(note);
    }
  }

  get length(): number {
    return this.notes.length;
  }

  /**
   * Whether a note with this id has been emitted
   */
  has(id: string): boolean {
    return this.notes.some((n) => n.id === id);
  }

  /**
   * Frozen snapshot in emission order
   */
  toArray(): readonly Note[] {
    return Object.freeze([...this.notes]);
  }
}

/**
 * Compare severities; negative when `a` is better than `b`
 */
export function compareLevels(a: NoteLevel, b: NoteLevel): number {
  return LEVEL_ORDER[a] - LEVEL_ORDER[b];
}

/**
 * Worst severity among the notes, or undefined when there are none
 */
export function worstLevel(notes: Iterable<Pick<Note, 'level'>>): NoteLevel | undefined {
  let worst: NoteLevel | undefined;
  for (const note of notes) {
    if (worst === undefined || compareLevels(note.level, worst) > 0) {
      worst = note.level;
    }
  }
  return worst;
}
