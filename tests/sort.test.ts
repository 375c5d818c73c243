import { describe, expect, test } from 'vitest';
import { EditorDocument, DocumentOptions } from '../core/document/document';
import {
  SortPreference,
  compareBuffers,
  describeSortOrder,
  nextSortOrder,
  isDescending,
  SORT_FILENAME,
  SORT_MODIFIED,
  SORT_NAME,
  SORT_SIZE,
  SORT_TIME,
  UNSORTED,
} from '../core/buffer-list/sort';

function doc(name: string, options: DocumentOptions = {}): EditorDocument {
  return new EditorDocument(name, options);
}

function sortNames(docs: EditorDocument[], order: number): string[] {
  return [...docs].sort((a, b) => compareBuffers(a, b, order)).map(d => d.name);
}

describe('nextSortOrder', () => {
  test('ascending, descending, ascending again', () => {
    let order = UNSORTED;
    order = nextSortOrder(order, SORT_NAME);
    expect(order).toBe(0x10);
    order = nextSortOrder(order, SORT_NAME);
    expect(order).toBe(0x30);
    expect(isDescending(order)).toBe(true);
    order = nextSortOrder(order, SORT_NAME);
    expect(order).toBe(0x10);
    expect(isDescending(order)).toBe(false);
  });

  test('switching field starts ascending', () => {
    expect(nextSortOrder(SORT_NAME * 3, SORT_SIZE)).toBe(SORT_SIZE);
    expect(nextSortOrder(SORT_SIZE, UNSORTED)).toBe(UNSORTED);
  });

  test('SortPreference applies and resets', () => {
    const pref = new SortPreference();
    expect(pref.select(SORT_TIME)).toBe(SORT_TIME);
    expect(pref.select(SORT_TIME)).toBe(SORT_TIME * 3);
    pref.reset();
    expect(pref.order).toBe(UNSORTED);
  });
});

describe('compareBuffers', () => {
  test('same document compares equal', () => {
    const a = doc('a');
    expect(compareBuffers(a, a, SORT_NAME)).toBe(0);
  });

  test('name order is numeric-aware', () => {
    const docs = [doc('file10'), doc('file9'), doc('file1')];
    expect(sortNames(docs, SORT_NAME)).toEqual(['file1', 'file9', 'file10']);
  });

  test('star names sort after plain names', () => {
    const docs = [doc('zeta'), doc('*scratch*'), doc('alpha')];
    expect(sortNames(docs, SORT_NAME)).toEqual(['alpha', 'zeta', '*scratch*']);
  });

  test('system documents stay last in both directions', () => {
    const docs = [doc('*log*', { system: true }), doc('b'), doc('a')];
    expect(sortNames(docs, SORT_NAME)).toEqual(['a', 'b', '*log*']);
    expect(sortNames(docs, SORT_NAME * 3)).toEqual(['b', 'a', '*log*']);
  });

  test('size order and its reverse', () => {
    const docs = [doc('big', { content: 'xxxxxxxx' }), doc('small', { content: 'x' }), doc('mid', { content: 'xxxx' })];
    expect(sortNames(docs, SORT_SIZE)).toEqual(['small', 'mid', 'big']);
    expect(sortNames(docs, SORT_SIZE * 3)).toEqual(['big', 'mid', 'small']);
  });

  test('time order', () => {
    const docs = [doc('new', { mtime: 300 }), doc('old', { mtime: 100 }), doc('mid', { mtime: 200 })];
    expect(sortNames(docs, SORT_TIME)).toEqual(['old', 'mid', 'new']);
  });

  test('modified documents first', () => {
    const clean = doc('a');
    const dirty = doc('b');
    dirty.edit(buf => buf.append('x'));
    expect(sortNames([clean, dirty], SORT_MODIFIED)).toEqual(['b', 'a']);
  });

  test('descending keeps modified documents first', () => {
    const docs = [doc('a'), doc('b'), doc('c')];
    docs[0].edit(buf => buf.append('x'));
    expect(sortNames(docs, SORT_MODIFIED * 3)).toEqual(['a', 'c', 'b']);
  });

  test('file name order puts documents without a file last', () => {
    const docs = [doc('none'), doc('y', { filename: '/src/b.ts' }), doc('x', { filename: '/src/a.ts' })];
    expect(sortNames(docs, SORT_FILENAME)).toEqual(['x', 'y', 'none']);
  });

  test('ties fall back to name', () => {
    const docs = [doc('b', { content: 'xy' }), doc('a', { content: 'xy' })];
    expect(sortNames(docs, SORT_SIZE)).toEqual(['a', 'b']);
  });
});

describe('describeSortOrder', () => {
  test('names the field and direction', () => {
    expect(describeSortOrder(UNSORTED)).toBe('unsorted');
    expect(describeSortOrder(SORT_SIZE)).toBe('size');
    expect(describeSortOrder(SORT_SIZE * 3)).toBe('size descending');
    expect(describeSortOrder(SORT_MODIFIED * 3)).toBe('modified first descending');
    expect(describeSortOrder(SORT_FILENAME)).toBe('file name');
  });
});

describe('compareBuffers total order', () => {
  const FIELDS = [SORT_MODIFIED, SORT_TIME, SORT_NAME, SORT_FILENAME, SORT_SIZE] as const;
  const ORDERS = [
    UNSORTED,
    ...FIELDS,
    ...FIELDS.map(field => nextSortOrder(field, field)),
  ];

  function mixedDocs(): EditorDocument[] {
    const docs = [
      doc('alpha', { filename: '/tmp/alpha', content: 'abc', mtime: 10 }),
      doc('Beta', { filename: '/tmp/beta', content: 'abc', mtime: 10 }),
      doc('file2', { filename: '', content: 'abcdef', mtime: 20 }),
      doc('file10', { filename: '', content: 'abcdef', mtime: 20 }),
      doc('*scratch*', { content: 'x', mtime: 5 }),
      doc('*log*', { system: true, content: 'abc', mtime: 10 }),
      doc('sys', { system: true, filename: '/tmp/sys', mtime: 30 }),
      doc('same', { filename: '/tmp/same', content: 'abc', mtime: 10 }),
      doc('same-too', { filename: '/tmp/same', content: 'abc', mtime: 10 }),
    ];
    docs[1].modified = true;
    docs[3].modified = true;
    docs[5].modified = true;
    return docs;
  }

  test.each(ORDERS)('order %i is antisymmetric, strict and transitive', (order) => {
    const docs = mixedDocs();
    const cmp = (a: EditorDocument, b: EditorDocument) => Math.sign(compareBuffers(a, b, order));

    for (const a of docs) {
      expect(cmp(a, a)).toBe(0);
      for (const b of docs) {
        if (a === b) continue;
        expect(cmp(a, b)).not.toBe(0);
        expect(cmp(a, b)).toBe(-cmp(b, a));
        for (const c of docs) {
          if (cmp(a, b) < 0 && cmp(b, c) < 0) expect(cmp(a, c)).toBe(-1);
        }
      }
    }
  });

  test.each(ORDERS)('order %i never puts a system document first', (order) => {
    const docs = mixedDocs();
    for (const a of docs) {
      for (const b of docs) {
        if (a.system && !b.system) expect(compareBuffers(a, b, order)).toBeGreaterThan(0);
      }
    }
  });
});
