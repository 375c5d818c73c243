import { describe, expect, test } from 'vitest';
import { detectCharset, decodeBytes, charsetDisplayName } from '../core/document/encoding';
import { EditorDocument } from '../core/document/document';

describe('detectCharset', () => {
  test('UTF-8 BOM', () => {
    const bytes = new Uint8Array([0xEF, 0xBB, 0xBF, 0x61]);
    expect(detectCharset(bytes)).toEqual({ charset: 'utf-8', hasBOM: true });
    expect(decodeBytes(bytes, 'utf-8', true)).toBe('a');
  });

  test('UTF-16 LE BOM', () => {
    const bytes = new Uint8Array([0xFF, 0xFE, 0x61, 0x00]);
    expect(detectCharset(bytes)).toEqual({ charset: 'utf-16le', hasBOM: true });
    expect(decodeBytes(bytes, 'utf-16le', true)).toBe('a');
  });

  test('UTF-16 LE without BOM from zero bytes', () => {
    const bytes = new Uint8Array([0x61, 0x00, 0x62, 0x00]);
    expect(detectCharset(bytes)).toEqual({ charset: 'utf-16le', hasBOM: false });
  });

  test('plain ASCII is UTF-8', () => {
    const bytes = new TextEncoder().encode('hello');
    expect(detectCharset(bytes)).toEqual({ charset: 'utf-8', hasBOM: false });
  });

  test('invalid UTF-8 falls back to Latin-1', () => {
    const bytes = new Uint8Array([0xE9, 0x74, 0xE9]);
    expect(detectCharset(bytes)).toEqual({ charset: 'iso-8859-1', hasBOM: false });
    expect(decodeBytes(bytes, 'iso-8859-1', false)).toBe('été');
  });
});

describe('charset names', () => {
  test('short names for the buffer list', () => {
    expect(charsetDisplayName('utf-8')).toBe('utf8');
    expect(charsetDisplayName('utf-16be')).toBe('ucs2be');
    expect(charsetDisplayName('iso-8859-1')).toBe('8859-1');
  });

  test('documents from bytes record their charset', () => {
    const doc = EditorDocument.fromBytes('a.txt', new Uint8Array([0xEF, 0xBB, 0xBF, 0x68, 0x69]));
    expect(doc.charset).toBe('utf-8');
    expect(doc.buffer.getText()).toBe('hi');
    expect(doc.modified).toBe(false);
  });
});
