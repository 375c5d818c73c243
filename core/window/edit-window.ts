/**
 * EditWindow: a view of one document with a cursor and a scroll position.
 *
 * Positions are character offsets into the document (`offset` is the
 * cursor, `offsetTop` the first displayed character); line-based views
 * are derived from them.
 */

import type { EditorDocument } from '../document/document';
import type { BufferHandle } from '../document/buffer-registry';
import type { ModeDef } from '../modes/mode';

export interface WindowOptions {
  /** Transient overlay over another window. */
  popup?: boolean;
  minibuffer?: boolean;
  /** Left-hand side pane (file tree and similar). */
  popLeft?: boolean;
  height?: number;
  /** Horizontal slot, left to right. */
  column?: number;
  title?: string | null;
}

export class EditWindow {
  readonly id: number;
  doc: EditorDocument;
  mode: ModeDef | null = null;
  /** Buffer shown before the current one, restored by abort commands. */
  lastBuffer: BufferHandle | null = null;
  offset = 0;
  offsetTop = 0;
  height: number;
  column: number;
  title: string | null;
  highlightCurrentLine = false;
  readonly popup: boolean;
  readonly minibuffer: boolean;
  readonly popLeft: boolean;

  constructor(id: number, doc: EditorDocument, options: WindowOptions = {}) {
    this.id = id;
    this.doc = doc;
    this.popup = options.popup ?? false;
    this.minibuffer = options.minibuffer ?? false;
    this.popLeft = options.popLeft ?? false;
    this.height = Math.max(1, options.height ?? 40);
    this.column = options.column ?? 0;
    this.title = options.title ?? null;
  }

  get cursorLine(): number {
    return this.doc.buffer.getOffsetLine(this.clampOffset(this.offset));
  }

  get topLine(): number {
    return this.doc.buffer.getOffsetLine(this.clampOffset(this.offsetTop));
  }

  /** Move the cursor to the start of a line (clamped). */
  gotoLine(line: number): void {
    this.offset = this.doc.buffer.getOffset(line, 0);
    this.ensureCursorVisible();
  }

  /** Scroll so that `line` is the first displayed line. */
  setTopLine(line: number): void {
    this.offsetTop = this.doc.buffer.getOffset(line, 0);
  }

  /** Move the cursor by whole lines, keeping the column where possible. */
  moveLines(delta: number): void {
    const buffer = this.doc.buffer;
    const { line, column } = buffer.getPosition(this.offset);
    this.offset = buffer.getOffset(line + delta, column);
    this.ensureCursorVisible();
  }

  /** Scroll minimally so the cursor line is inside the window. */
  ensureCursorVisible(): void {
    const line = this.cursorLine;
    const top = this.topLine;
    if (line < top) {
      this.setTopLine(line);
    } else if (line >= top + this.height) {
      this.setTopLine(line - this.height + 1);
    }
  }

  /** Re-clamp positions after the document shrank. */
  clampPositions(): void {
    this.offset = this.clampOffset(this.offset);
    this.offsetTop = this.clampOffset(this.offsetTop);
  }

  private clampOffset(offset: number): number {
    return Math.max(0, Math.min(offset, this.doc.size));
  }
}
