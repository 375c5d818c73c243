/**
 * Per-listing state and the entry list it projects from the registry.
 */

import type { BufferHandle, BufferRegistry } from '../document/buffer-registry';
import type { EditorDocument } from '../document/document';
import type { WindowHandle } from '../window/window-manager';
import type { ListPosition } from '../modes/list-mode';
import { compareBuffers, UNSORTED } from './sort';

/** lastIndex value meaning "place the cursor on the current buffer". */
export const NO_INDEX = -1;

export interface BufferListEntry {
  /** Buffer name when the entry was made. */
  readonly label: string;
  /** Null once the buffer is known to be gone. */
  ref: BufferHandle | null;
  selected: boolean;
}

export interface BufferListState {
  /** Resolves the cursor row. */
  readonly list: ListPosition;
  /** Include system buffers. */
  showAll: boolean;
  /** Sort order used by the last rebuild. */
  sortOrder: number;
  /** Row chosen by the last preview, or NO_INDEX. */
  lastIndex: number;
  /** Window the listing was opened from. */
  curWindow: WindowHandle | null;
  /** Buffer shown in curWindow when the listing opened. */
  curBuffer: BufferHandle | null;
  /** curWindow's previous buffer at that time. */
  lastBuffer: BufferHandle | null;
  entries: readonly BufferListEntry[];
}

export function createBufferListState(list: ListPosition): BufferListState {
  return {
    list,
    showAll: false,
    sortOrder: UNSORTED,
    lastIndex: NO_INDEX,
    curWindow: null,
    curBuffer: null,
    lastBuffer: null,
    entries: [],
  };
}

/**
 * Regenerate the entries from the live registry. The new list replaces
 * the old one in a single assignment.
 */
export function rebuildEntries(state: BufferListState, registry: BufferRegistry, order: number): void {
  const docs = registry.list().filter(doc => state.showAll || !doc.system);
  if (order !== UNSORTED) {
    docs.sort((a, b) => compareBuffers(a, b, order));
  }
  state.entries = docs.map(doc => ({
    label: doc.name,
    ref: registry.handleOf(doc),
    selected: false,
  }));
  state.sortOrder = order;
}

/** Dereference an entry; a dead handle is dropped so the entry stays inert. */
export function resolveEntry(registry: BufferRegistry, entry: BufferListEntry): EditorDocument | null {
  const doc = registry.resolve(entry.ref);
  if (!doc) entry.ref = null;
  return doc;
}

export function entryAt(state: BufferListState, index: number): BufferListEntry | null {
  if (index < 0 || index >= state.entries.length) return null;
  return state.entries[index];
}

/**
 * Apply `action` to every selected entry, or to the entry at
 * `currentIndex` when nothing is selected. Returns how many entries were
 * visited.
 */
export function iterateSelection(
  entries: readonly BufferListEntry[],
  currentIndex: number,
  action: (entry: BufferListEntry, index: number) => void,
): number {
  let count = 0;
  entries.forEach((entry, index) => {
    if (!entry.selected) return;
    action(entry, index);
    count++;
  });
  if (count === 0 && currentIndex >= 0 && currentIndex < entries.length) {
    action(entries[currentIndex], currentIndex);
    return 1;
  }
  return count;
}

/** Flip the selection marker of one row. Returns false if out of range. */
export function toggleSelection(state: BufferListState, index: number): boolean {
  const entry = entryAt(state, index);
  if (!entry) return false;
  entry.selected = !entry.selected;
  return true;
}
