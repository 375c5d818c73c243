/**
 * Buffer list commands: selection, kill, flag toggles, visibility, sort.
 *
 * Every action re-resolves the buffers it touches; rows whose buffer has
 * disappeared are ignored, never reported.
 */

import type { EditorDocument } from '../document/document';
import type { BufferHandle } from '../document/buffer-registry';
import type { EditWindow } from '../window/edit-window';
import type { EditorEnvironment } from '../editor-environment';
import {
  BufferListState,
  NO_INDEX,
  entryAt,
  iterateSelection,
  resolveEntry,
  toggleSelection,
} from './entries';
import { buildBufferList } from './list-builder';
import { SortField, UNSORTED, describeSortOrder } from './sort';

/**
 * commit: show the row's buffer in the invoking window and close the list.
 * preview: show it without closing.
 * abort: restore the buffer the list was opened from and close.
 */
export type SelectMode = 'commit' | 'preview' | 'abort';

/** Row under the cursor, as the list base reports it. */
export function currentIndex(state: BufferListState, window: EditWindow): number {
  return state.list.getPos(window);
}

/** Live buffer on the cursor row, or null. */
export function bufferAtCursor(env: EditorEnvironment, state: BufferListState, window: EditWindow): EditorDocument | null {
  const entry = entryAt(state, currentIndex(state, window));
  return entry ? resolveEntry(env.buffers, entry) : null;
}

function liveHandle(env: EditorEnvironment, handle: BufferHandle | null): BufferHandle | null {
  return env.buffers.resolve(handle) ? handle : null;
}

export function selectEntry(env: EditorEnvironment, state: BufferListState, window: EditWindow, mode: SelectMode): void {
  let target: EditorDocument | null;
  let previous: BufferHandle | null;
  let index = NO_INDEX;

  if (mode === 'abort') {
    target = env.buffers.resolve(state.curBuffer);
    previous = liveHandle(env, state.lastBuffer);
  } else {
    index = currentIndex(state, window);
    const entry = entryAt(state, index);
    if (!entry) return;
    // Moving onto the row already previewed does nothing
    if (mode === 'preview' && index === state.lastIndex) return;
    target = resolveEntry(env.buffers, entry);
    previous = liveHandle(env, state.curBuffer);
  }

  // The listing is never shown in the window it was opened from
  if (target === window.doc) target = null;

  const invoker = env.windows.resolve(state.curWindow);
  if (invoker && target) {
    env.switchToBuffer(invoker, target);
    invoker.lastBuffer = previous;
  }

  if (mode === 'preview') {
    state.lastIndex = index;
    return;
  }
  env.deleteWindow(window, true);
  if (invoker) env.windows.setActive(invoker);
}

/**
 * Kill the selected rows' buffers (or the cursor row's). The listing's
 * own buffer is never killed. The list is rebuilt afterwards, whatever
 * the prompts answered.
 */
export function killEntries(env: EditorEnvironment, state: BufferListState, window: EditWindow): void {
  const listing = window.doc;
  iterateSelection(state.entries, currentIndex(state, window), (entry) => {
    const doc = resolveEntry(env.buffers, entry);
    if (!doc || doc === listing) {
      env.logger.debug(`buffer list: skipped kill of ${entry.label}`);
      return;
    }
    if (env.killBuffer(doc.name)) {
      env.logger.debug(`buffer list: killed ${entry.label}`);
    }
    entry.ref = null;
  });

  selectEntry(env, state, window, 'preview');
  buildBufferList(env, state, window);
}

export function clearModified(env: EditorEnvironment, state: BufferListState, window: EditWindow): void {
  const doc = bufferAtCursor(env, state, window);
  if (!doc) return;
  doc.markSaved();
  buildBufferList(env, state, window);
}

export function toggleReadOnly(env: EditorEnvironment, state: BufferListState, window: EditWindow): void {
  const doc = bufferAtCursor(env, state, window);
  if (!doc) return;
  doc.readOnly = !doc.readOnly;
  buildBufferList(env, state, window);
}

/** Rebuild, optionally flipping whether system buffers are listed. */
export function refresh(env: EditorEnvironment, state: BufferListState, window: EditWindow, toggle: boolean): void {
  if (toggle) state.showAll = !state.showAll;
  buildBufferList(env, state, window);
}

export function setSort(env: EditorEnvironment, state: BufferListState, window: EditWindow, field: SortField): void {
  const order = env.sortPreference.select(field);
  env.logger.debug(`buffer list: sort order 0x${order.toString(16)}`);
  state.lastIndex = NO_INDEX;
  buildBufferList(env, state, window);
  env.message(order === UNSORTED ? 'Buffer list unsorted' : `Buffer list sorted by ${describeSortOrder(order)}`);
}

/** Flip the selection marker of a row. Markers last until the next rebuild. */
export function toggleMark(state: BufferListState, index: number): boolean {
  return toggleSelection(state, index);
}
