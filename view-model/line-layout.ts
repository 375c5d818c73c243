/**
 * Compute rendered lines: apply style runs and decorations to document lines.
 */

import type { EditorDocument } from '../core/document/document';
import { resolveTagColor, resolveTagStyle } from '../core/tokenizer/token-theme';
import type { EditorTheme } from './theme';

export interface LineToken {
  startColumn: number;
  endColumn: number;
  color: string;
  fontStyle: 'normal' | 'italic' | 'bold' | 'bold-italic';
}

export interface LineDecoration {
  startColumn: number;
  endColumn: number;
  type: 'highlight' | 'background';
  color: string;
}

export interface RenderedLine {
  lineNumber: number;
  content: string;
  tokens: LineToken[];
  decorations: LineDecoration[];
}

/**
 * Tokens from the document's style runs. Columns no run covers, between
 * runs and after the last one, get foreground tokens.
 */
export function styleTokens(doc: EditorDocument, lineNumber: number, theme: EditorTheme): LineToken[] {
  const content = doc.buffer.getLine(lineNumber);
  const runs = doc.getLineStyles(lineNumber);
  if (runs.length === 0) return defaultTokens(content, theme);

  const tokens: LineToken[] = [];
  let column = 0;
  const sorted = [...runs].sort((a, b) => a.startColumn - b.startColumn);
  for (const run of sorted) {
    const start = Math.min(run.startColumn, content.length);
    const end = Math.min(run.endColumn, content.length);
    if (start > column) tokens.push(foregroundToken(column, start, theme));
    if (end > start) {
      tokens.push({
        startColumn: start,
        endColumn: end,
        color: resolveTagColor(run.tag, theme.tokens),
        fontStyle: resolveTagStyle(run.tag),
      });
    }
    column = Math.max(column, end);
  }
  if (column < content.length) tokens.push(foregroundToken(column, content.length, theme));
  return tokens;
}

/**
 * Compute rendered lines for a set of visible line numbers.
 */
export function computeRenderedLines(
  doc: EditorDocument,
  lineNumbers: number[],
  getTokens: (lineNumber: number) => LineToken[],
  getDecorations?: (lineNumber: number) => LineDecoration[],
): RenderedLine[] {
  return lineNumbers.map(lineNumber => ({
    lineNumber,
    content: doc.buffer.getLine(lineNumber),
    tokens: getTokens(lineNumber),
    decorations: getDecorations ? getDecorations(lineNumber) : [],
  }));
}

function foregroundToken(startColumn: number, endColumn: number, theme: EditorTheme): LineToken {
  return { startColumn, endColumn, color: theme.foreground, fontStyle: 'normal' };
}

function defaultTokens(content: string, theme: EditorTheme): LineToken[] {
  if (content.length === 0) return [];
  return [foregroundToken(0, content.length, theme)];
}
