/**
 * TextBuffer: flat-string text storage with a line index.
 *
 * This is the storage primitive behind every EditorDocument. It knows
 * nothing about read-only flags or modification state; those live on the
 * document, which decides who may write.
 */

import { LineIndex } from './line-index';

export interface TextEdit {
  /** Zero-based character offset where the edit starts. */
  offset: number;
  /** Number of characters to delete starting at offset. 0 for pure insert. */
  deleteCount: number;
  /** Text to insert at offset (after deletion). Empty string for pure delete. */
  insertText: string;
}

function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

export class TextBuffer {
  private text: string;
  private lineIndex: LineIndex;

  constructor(initialContent: string = '') {
    this.text = normalizeLineEndings(initialContent);
    this.lineIndex = new LineIndex();
    this.lineIndex.rebuild(this.text);
  }

  /**
   * Insert text at the given character offset (clamped to the buffer).
   * @returns The number of characters inserted.
   */
  insert(offset: number, text: string): number {
    if (text.length === 0) return 0;
    const normalized = normalizeLineEndings(text);
    const at = Math.max(0, Math.min(offset, this.text.length));
    this.text = this.text.slice(0, at) + normalized + this.text.slice(at);
    this.lineIndex.update(at, '', normalized);
    return normalized.length;
  }

  /** Append at the end of the buffer. */
  append(text: string): number {
    return this.insert(this.text.length, text);
  }

  /**
   * Delete a range of characters.
   * @returns The deleted text.
   */
  delete(offset: number, length: number): string {
    if (length <= 0) return '';
    const start = Math.max(0, Math.min(offset, this.text.length));
    const end = Math.min(start + length, this.text.length);
    const deleted = this.text.slice(start, end);
    this.text = this.text.slice(0, start) + this.text.slice(end);
    this.lineIndex.update(start, deleted, '');
    return deleted;
  }

  /** Remove all content. */
  clear(): void {
    this.text = '';
    this.lineIndex.rebuild('');
  }

  /** Apply several edits whose offsets refer to the pre-edit state. */
  applyEdits(edits: TextEdit[]): void {
    // Highest offset first so earlier offsets stay valid
    const sorted = [...edits].sort((a, b) => b.offset - a.offset);
    for (const edit of sorted) {
      if (edit.deleteCount > 0) this.delete(edit.offset, edit.deleteCount);
      if (edit.insertText.length > 0) this.insert(edit.offset, edit.insertText);
    }
  }

  getText(): string {
    return this.text;
  }

  /** Content of one line without its newline; '' when out of range. */
  getLine(lineNumber: number): string {
    if (lineNumber < 0 || lineNumber >= this.getLineCount()) return '';
    const start = this.lineIndex.getLineStart(lineNumber);
    return this.text.slice(start, start + this.getLineLength(lineNumber));
  }

  getLineCount(): number {
    return this.lineIndex.lineCount;
  }

  getLineLength(lineNumber: number): number {
    if (lineNumber < 0 || lineNumber >= this.getLineCount()) return 0;
    const start = this.lineIndex.getLineStart(lineNumber);
    const end = lineNumber + 1 < this.getLineCount()
      ? this.lineIndex.getLineStart(lineNumber + 1) - 1
      : this.text.length;
    return end - start;
  }

  getLineOffset(lineNumber: number): number {
    return this.lineIndex.getLineStart(lineNumber);
  }

  getOffsetLine(offset: number): number {
    return this.lineIndex.getLineForOffset(offset);
  }

  /** Convert an offset to a (line, column) pair. */
  getPosition(offset: number): { line: number; column: number } {
    const clamped = Math.max(0, Math.min(offset, this.text.length));
    const line = this.getOffsetLine(clamped);
    return { line, column: clamped - this.getLineOffset(line) };
  }

  /** Convert (line, column) to an offset, clamping both. */
  getOffset(line: number, column: number): number {
    const l = Math.max(0, Math.min(line, this.getLineCount() - 1));
    const c = Math.max(0, Math.min(column, this.getLineLength(l)));
    return this.getLineOffset(l) + c;
  }

  getLength(): number {
    return this.text.length;
  }
}
