/**
 * EditorDocument: a named buffer with its flags, charset and mode chain.
 *
 * Documents are owned by the BufferRegistry. Everything else in the
 * editor (windows excepted) holds a BufferHandle and re-resolves it on
 * every use, since any command may kill a document.
 */

import type { Tag } from '@lezer/highlight';
import { TextBuffer } from '../buffer/text-buffer';
import { Charset, decodeBytes, detectCharset } from './encoding';
import type { ModeDef } from '../modes/mode';

/** A styled span of one line, in columns. */
export interface StyleRun {
  startColumn: number;
  endColumn: number;
  tag: Tag;
}

export interface DocumentOptions {
  filename?: string;
  content?: string;
  charset?: Charset;
  /** Last modification time of the backing file, epoch milliseconds. */
  mtime?: number;
  system?: boolean;
  readOnly?: boolean;
  isDirectory?: boolean;
  isLog?: boolean;
  isStyleTable?: boolean;
  /** Bytes of style information stored per character (0-7). */
  styleBytes?: number;
  dataTypeName?: string | null;
  languageId?: string;
}

let documentSerial = 0;

export class EditorDocument {
  readonly name: string;
  /** Creation order, unique per process. */
  readonly serial: number;
  readonly buffer: TextBuffer;
  filename: string;
  languageId: string;
  charset: Charset;
  mtime: number;
  styleBytes: number;
  dataTypeName: string | null;

  system: boolean;
  readOnly: boolean;
  isDirectory: boolean;
  isLog: boolean;
  isStyleTable: boolean;
  modified = false;

  /** Mode remembered from the last window that displayed this buffer. */
  savedMode: ModeDef | null = null;
  /** Mode forced at creation time. */
  defaultMode: ModeDef | null = null;
  /** Mode picked from the file name by the syntax engine. */
  syntaxMode: ModeDef | null = null;

  private _modes: ModeDef[] = [];
  private _lineStyles = new Map<number, StyleRun[]>();

  constructor(name: string, options: DocumentOptions = {}) {
    this.name = name;
    this.serial = ++documentSerial;
    this.filename = options.filename ?? '';
    this.buffer = new TextBuffer(options.content ?? '');
    this.charset = options.charset ?? 'utf-8';
    this.mtime = options.mtime ?? 0;
    this.styleBytes = options.styleBytes ?? 0;
    this.dataTypeName = options.dataTypeName ?? null;
    this.system = options.system ?? false;
    this.readOnly = options.readOnly ?? false;
    this.isDirectory = options.isDirectory ?? false;
    this.isLog = options.isLog ?? false;
    this.isStyleTable = options.isStyleTable ?? false;
    this.languageId = options.languageId ?? detectLanguage(this.filename);
  }

  /** Build a document from raw file bytes, detecting the charset. */
  static fromBytes(name: string, bytes: Uint8Array, options: DocumentOptions = {}): EditorDocument {
    const { charset, hasBOM } = detectCharset(bytes);
    return new EditorDocument(name, {
      ...options,
      charset,
      content: decodeBytes(bytes, charset, hasBOM),
    });
  }

  get size(): number {
    return this.buffer.getLength();
  }

  /** Attached modes, in attachment order. */
  get modes(): readonly ModeDef[] {
    return this._modes;
  }

  attachMode(mode: ModeDef): void {
    if (!this._modes.includes(mode)) this._modes.push(mode);
  }

  detachMode(mode: ModeDef): void {
    const idx = this._modes.indexOf(mode);
    if (idx !== -1) this._modes.splice(idx, 1);
  }

  /**
   * Edit the content. Refused (returns false) on a read-only document;
   * a successful edit marks the document modified.
   */
  edit(callback: (buffer: TextBuffer) => void): boolean {
    if (this.readOnly) return false;
    callback(this.buffer);
    this.modified = true;
    return true;
  }

  /**
   * Privileged write used by generated buffers: runs even when the
   * document is read-only, and restores the flag afterwards.
   */
  withWriteAccess(callback: (buffer: TextBuffer) => void): void {
    const readOnly = this.readOnly;
    this.readOnly = false;
    try {
      this.edit(callback);
    } finally {
      this.readOnly = readOnly;
    }
  }

  /** Remove all text and style runs. */
  clear(): void {
    this.withWriteAccess(buffer => buffer.clear());
    this._lineStyles.clear();
  }

  markSaved(): void {
    this.modified = false;
  }

  setLineStyles(lineNumber: number, runs: StyleRun[]): void {
    this._lineStyles.set(lineNumber, runs);
  }

  getLineStyles(lineNumber: number): readonly StyleRun[] {
    return this._lineStyles.get(lineNumber) ?? [];
  }
}

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  ts: 'typescript', tsx: 'typescript', mts: 'typescript', cts: 'typescript',
  js: 'javascript', jsx: 'javascript', mjs: 'javascript', cjs: 'javascript',
  py: 'python',
  rs: 'rust',
  c: 'c', h: 'c',
  cpp: 'cpp', cc: 'cpp', hpp: 'cpp',
  html: 'html', htm: 'html',
  css: 'css',
  json: 'json',
  md: 'markdown', markdown: 'markdown',
  txt: 'plaintext',
};

/** Language id from a file name's extension; 'plaintext' when unknown. */
export function detectLanguage(filename: string): string {
  const base = filename.split('/').pop() ?? '';
  const dot = base.lastIndexOf('.');
  if (dot <= 0) return 'plaintext';
  return LANGUAGE_BY_EXTENSION[base.slice(dot + 1).toLowerCase()] ?? 'plaintext';
}
