/**
 * Types for diagnostic notes
 */

/**
 * Severity of a finding, from best to worst
 */
export type NoteLevel = 'good' | 'info' | 'warning' | 'bad';

/**
 * Area of HTTP a note is about
 */
export type NoteCategory =
  | 'general'
  | 'caching'
  | 'validation'
  | 'connection'
  | 'conneg'
  | 'range'
  | 'security'
  | 'cookies'
  | 'redirection';

/**
 * What part of the message a note is attached to
 */
export type NoteSubject = { type: 'message' } | { type: 'header'; field: string };

/**
 * Pointer into the specification that explains a note
 */
export interface SpecReference {
  /** Document title, e.g. "RFC 9111" */
  document: string;
  /** Section number, e.g. "5.2.2.1" */
  section?: string;
  url: string;
}

/**
 * Values substituted into note templates
 */
export type NoteVars = Readonly<Record<string, string | number>>;

/**
 * Static description of a kind of note
 */
export interface NoteDefinition {
  id: string;
  level: NoteLevel;
  category: NoteCategory;
  /** One-line summary; may contain {placeholders} */
  summary: string;
  /** Longer explanation; may contain {placeholders} */
  detail: string;
  reference: SpecReference;
}

/**
 * An emitted, immutable finding
 */
export interface Note {
  readonly id: string;
  readonly level: NoteLevel;
  readonly category: NoteCategory;
  readonly subject: NoteSubject;
  /** Rendered summary */
  readonly summary: string;
  /** Rendered detail */
  readonly detail: string;
  readonly vars: NoteVars;
  readonly reference: SpecReference;
}
