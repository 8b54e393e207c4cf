/**
 * @conformance/notes
 * Diagnostic note model: severities, templated messages, specification references
 * Pure ESM module
 */

// Type exports
export * from './types.mjs';

export {
  MESSAGE,
  headerSubject,
  renderTemplate,
  rfc,
  defineNotes,
  createNote,
  NoteList,
  compareLevels,
  worstLevel,
} from './note.mjs';
