/**
 * Line-start-offset index over a flat string.
 *
 * lineStarts[i] is the character offset where line i begins; lineStarts[0]
 * is always 0. The index is rebuilt on bulk changes and patched in place
 * by the TextBuffer after small edits.
 */

export class LineIndex {
  private lineStarts: number[] = [0];

  /** Total number of lines (a trailing newline opens an empty last line). */
  get lineCount(): number {
    return this.lineStarts.length;
  }

  /** Offset of the first character of a line, clamped to the known lines. */
  getLineStart(lineNumber: number): number {
    if (lineNumber <= 0) return 0;
    const last = this.lineStarts.length - 1;
    return this.lineStarts[Math.min(lineNumber, last)];
  }

  /** Line containing the given offset (binary search). */
  getLineForOffset(offset: number): number {
    if (offset <= 0) return 0;

    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo;
  }

  /** Rescan the whole text. */
  rebuild(text: string): void {
    this.lineStarts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) this.lineStarts.push(i + 1);
    }
  }

  /**
   * Patch the index after `deletedText` at `offset` was replaced by
   * `insertedText`.
   */
  update(offset: number, deletedText: string, insertedText: string): void {
    const delta = insertedText.length - deletedText.length;
    const editLine = this.getLineForOffset(offset);

    let removed = 0;
    for (let i = 0; i < deletedText.length; i++) {
      if (deletedText.charCodeAt(i) === 10) removed++;
    }

    const added: number[] = [];
    for (let i = 0; i < insertedText.length; i++) {
      if (insertedText.charCodeAt(i) === 10) added.push(offset + i + 1);
    }

    this.lineStarts.splice(editLine + 1, removed, ...added);

    if (delta !== 0) {
      for (let i = editLine + 1 + added.length; i < this.lineStarts.length; i++) {
        this.lineStarts[i] += delta;
      }
    }
  }
}
