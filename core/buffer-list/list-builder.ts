/**
 * Renders the buffer list into its display document.
 *
 * Row layout, left to right:
 *   flags(2) ' ' name(20) ' ' size(10, right) ' ' style(1) ' ' charset(8) ' ' mode(11) ' ' path
 * Everything after the name is omitted when the buffer no longer exists.
 */

import { tags } from '@lezer/highlight';
import type { EditorDocument, StyleRun } from '../document/document';
import type { BufferRegistry } from '../document/buffer-registry';
import { charsetDisplayName } from '../document/encoding';
import type { EditWindow } from '../window/edit-window';
import type { EditorConfig } from '../config';
import type { SortPreference } from './sort';
import { BufferListState, NO_INDEX, rebuildEntries, resolveEntry } from './entries';

export const BUFFER_LIST_STYLES = {
  bufferName: tags.keyword,
  fileName: tags.function(tags.variableName),
  directory: tags.comment,
  system: tags.invalid,
} as const;

const SIZE_WIDTH = 10;
const CHARSET_WIDTH = 8;
const MODE_WIDTH = 11;
const ELLIPSIS = '...';
/** Characters kept from the end of a truncated name. */
const NAME_TAIL = 5;

export interface ListBuilderContext {
  readonly buffers: BufferRegistry;
  readonly sortPreference: SortPreference;
  readonly config: Pick<EditorConfig, 'homeDir' | 'nameColumnWidth'>;
}

export interface FormattedRow {
  text: string;
  runs: StyleRun[];
}

/** One-character status flag: system, modified, read-only, first match wins. */
export function formatFlags(doc: EditorDocument | null): string {
  if (!doc) return '';
  if (doc.system) return 'S';
  if (doc.modified) return '*';
  if (doc.readOnly) return '%';
  return '';
}

/**
 * Fit a name into `width` characters, cutting long names in the middle.
 * Counts code points, so a surrogate pair is never split.
 */
export function formatLabel(name: string, width: number): string {
  const chars = Array.from(name);
  if (chars.length > width) {
    const head = chars.slice(0, width - NAME_TAIL - ELLIPSIS.length);
    const tail = chars.slice(chars.length - NAME_TAIL);
    return head.join('') + ELLIPSIS + tail.join('');
  }
  return name + ' '.repeat(width - chars.length);
}

/**
 * Mode column: optional "<data type>+", the effective mode
 * (log > style > saved > default > syntax > none), then ",<name>" for
 * every other mode attached to the document.
 */
export function composeModeName(doc: EditorDocument): string {
  let modeName: string;
  if (doc.isLog) {
    modeName = 'log';
  } else if (doc.isStyleTable) {
    modeName = 'style';
  } else if (doc.savedMode) {
    modeName = doc.savedMode.name;
  } else if (doc.defaultMode) {
    modeName = doc.defaultMode.name;
  } else if (doc.syntaxMode) {
    modeName = doc.syntaxMode.name;
  } else {
    modeName = 'none';
  }

  let out = doc.dataTypeName ? `${doc.dataTypeName}+${modeName}` : modeName;
  for (const mode of doc.modes) {
    if (mode !== doc.savedMode) out += `,${mode.name}`;
  }
  return out;
}

/** Abbreviate the home directory to "~". */
export function makeUserPath(filename: string, homeDir: string): string {
  const home = homeDir.length > 1 ? homeDir.replace(/\/+$/, '') : '';
  if (home && (filename === home || filename.startsWith(home + '/'))) {
    return '~' + filename.slice(home.length);
  }
  return filename;
}

function styleDigit(styleBytes: number): string {
  const bytes = styleBytes & 7;
  return bytes === 0 ? ' ' : String(bytes);
}

export function formatRow(
  label: string,
  doc: EditorDocument | null,
  config: Pick<EditorConfig, 'homeDir' | 'nameColumnWidth'>,
): FormattedRow {
  const width = config.nameColumnWidth;
  const system = doc?.system ?? false;
  const runs: StyleRun[] = [];

  let text = formatFlags(doc).padEnd(2) + ' ';
  if (system) runs.push({ startColumn: 0, endColumn: text.length, tag: BUFFER_LIST_STYLES.system });

  const nameStart = text.length;
  text += formatLabel(label, width);
  runs.push({ startColumn: nameStart, endColumn: text.length, tag: BUFFER_LIST_STYLES.bufferName });

  if (!doc) return { text, runs };

  const attrStart = text.length;
  text += ' ' + String(doc.size).padStart(SIZE_WIDTH)
    + ' ' + styleDigit(doc.styleBytes)
    + ' ' + charsetDisplayName(doc.charset).slice(0, CHARSET_WIDTH).padEnd(CHARSET_WIDTH)
    + ' ' + composeModeName(doc).padEnd(MODE_WIDTH)
    + ' ';
  if (system) runs.push({ startColumn: attrStart, endColumn: text.length, tag: BUFFER_LIST_STYLES.system });

  const path = makeUserPath(doc.filename, config.homeDir);
  if (path.length > 0) {
    runs.push({
      startColumn: text.length,
      endColumn: text.length + path.length,
      tag: doc.isDirectory ? BUFFER_LIST_STYLES.directory : BUFFER_LIST_STYLES.fileName,
    });
    text += path;
  }
  return { text, runs };
}

/**
 * Regenerate the entries and redraw the listing in `window`, keeping the
 * cursor row's distance from the top of the window.
 */
export function buildBufferList(ctx: ListBuilderContext, state: BufferListState, window: EditWindow): void {
  const doc = window.doc;
  rebuildEntries(state, ctx.buffers, ctx.sortPreference.order);

  let vpos = -1;
  if (doc.size > 0) {
    vpos = window.cursorLine - window.topLine;
  }
  doc.clear();
  window.offset = 0;
  window.offsetTop = 0;

  const current = ctx.buffers.resolve(state.curBuffer);
  let line = 0;
  if (state.lastIndex !== NO_INDEX && state.entries.length > 0) {
    line = Math.min(state.lastIndex, state.entries.length - 1);
  }

  doc.withWriteAccess(buffer => {
    state.entries.forEach((entry, i) => {
      const target = resolveEntry(ctx.buffers, entry);
      if (state.lastIndex === NO_INDEX && target !== null && target === current) {
        line = i;
      }
      const row = formatRow(entry.label, target, ctx.config);
      buffer.append(row.text + '\n');
      doc.setLineStyles(i, row.runs);
    });
  });

  state.lastIndex = NO_INDEX;
  doc.markSaved();
  doc.readOnly = true;

  window.offset = doc.buffer.getOffset(line, 0);
  if (vpos >= 0 && line > vpos) {
    window.setTopLine(line - vpos);
  }
  window.ensureCursorVisible();
}
