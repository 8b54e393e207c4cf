/**
 * Tests for the note model
 */

import { describe, it, expect } from 'vitest';
import {
  MESSAGE,
  NoteList,
  compareLevels,
  createNote,
  defineNotes,
  headerSubject,
  renderTemplate,
  rfc,
  worstLevel,
} from '../src/index.mjs';

const NOTES = defineNotes({
  MAX_AGE_NEGATIVE: {
    level: 'bad',
    category: 'caching',
    summary: 'The {directive} directive has a negative value.',
    detail: 'Got "{value}" for {directive}.',
    reference: rfc(9111, '1.2.2'),
  },
  HEADER_NOT_RECOGNIZED: {
    level: 'info',
    category: 'general',
    summary: 'The {field} header is not recognized.',
    detail: '',
    reference: rfc(9110),
  },
});

describe('rfc', () => {
  it('should link to a section', () => {
    expect(rfc(9111, '5.2.2.1')).toEqual({
      document: 'RFC 9111',
      section: '5.2.2.1',
      url: 'https://www.rfc-editor.org/rfc/rfc9111.html#section-5.2.2.1',
    });
  });

  it('should link to the whole document without a section', () => {
    expect(rfc(9110).url).toBe('https://www.rfc-editor.org/rfc/rfc9110.html');
  });
});

describe('renderTemplate', () => {
  it('should substitute placeholders', () => {
    expect(renderTemplate('{a} and {b}', { a: 'x', b: 2 })).toBe('x and 2');
  });

  it('should render missing values as empty', () => {
    expect(renderTemplate('[{missing}]', {})).toBe('[]');
  });

  it('should leave text without placeholders untouched', () => {
    expect(renderTemplate('no {braces here', {})).toBe('no {braces here');
  });
});

describe('defineNotes', () => {
  it('should use the key as the id', () => {
    expect(NOTES.MAX_AGE_NEGATIVE.id).toBe('MAX_AGE_NEGATIVE');
    expect(Object.isFrozen(NOTES.MAX_AGE_NEGATIVE)).toBe(true);
  });
});

describe('createNote', () => {
  it('should render summary and detail and freeze the note', () => {
    const note = createNote(NOTES.MAX_AGE_NEGATIVE, headerSubject('Cache-Control'), {
      directive: 'max-age',
      value: '-1',
    });

    expect(note).toEqual({
      id: 'MAX_AGE_NEGATIVE',
      level: 'bad',
      category: 'caching',
      subject: { type: 'header', field: 'cache-control' },
      summary: 'The max-age directive has a negative value.',
      detail: 'Got "-1" for max-age.',
      vars: { directive: 'max-age', value: '-1' },
      reference: rfc(9111, '1.2.2'),
    });
    expect(Object.isFrozen(note)).toBe(true);
    expect(Object.isFrozen(note.vars)).toBe(true);
  });
});

describe('NoteList', () => {
  it('should keep notes in emission order', () => {
    const list = new NoteList();
    list.emit(headerSubject('X-One'), NOTES.HEADER_NOT_RECOGNIZED, { field: 'X-One' });
    list.emit(MESSAGE, NOTES.MAX_AGE_NEGATIVE, { directive: 's-maxage', value: '-5' });

    const notes = list.toArray();
    expect(notes.map((n) => n.id)).toEqual(['HEADER_NOT_RECOGNIZED', 'MAX_AGE_NEGATIVE']);
    expect(notes[0].summary).toBe('The X-One header is not recognized.');
    expect(list.has('MAX_AGE_NEGATIVE')).toBe(true);
    expect(list.length).toBe(2);
  });

  it('should return snapshots that later emits do not change', () => {
    const list = new NoteList();
    list.emit(MESSAGE, NOTES.HEADER_NOT_RECOGNIZED, { field: 'a' });
    const snapshot = list.toArray();
    list.emit(MESSAGE, NOTES.HEADER_NOT_RECOGNIZED, { field: 'b' });

    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('should append notes from another list', () => {
    const first = new NoteList();
    first.emit(MESSAGE, NOTES.HEADER_NOT_RECOGNIZED, { field: 'a' });
    const second = new NoteList();
    second.extend(first.toArray());

    expect(second.toArray()[0]).toBe(first.toArray()[0]);
  });
});

describe('levels', () => {
  it('should order good < info < warning < bad', () => {
    expect(compareLevels('good', 'info')).toBeLessThan(0);
    expect(compareLevels('bad', 'warning')).toBeGreaterThan(0);
    expect(compareLevels('info', 'info')).toBe(0);
  });

  it('should find the worst level', () => {
    expect(worstLevel([{ level: 'info' }, { level: 'bad' }, { level: 'good' }])).toBe('bad');
    expect(worstLevel([])).toBeUndefined();
  });
});
