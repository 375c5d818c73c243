/**
 * Buffer list mode ("bufed"): the listing's mode, its commands and the
 * global `buffer-list` entry point.
 *
 * The mode composes the generic list mode. It keeps one BufferListState
 * per listing document; having that state is what makes a document a
 * buffer list.
 */

import type { EditorDocument } from '../document/document';
import type { EditWindow } from '../window/edit-window';
import type { EditorEnvironment } from '../editor-environment';
import type { CommandContext } from '../commands/registry';
import type { ModeDef } from '../modes/mode';
import type { ListHost, ListMode } from '../modes/list-mode';
import { BufferListState, NO_INDEX, createBufferListState, entryAt } from './entries';
import { buildBufferList } from './list-builder';
import {
  clearModified,
  killEntries,
  refresh,
  selectEntry,
  setSort,
  toggleMark,
  toggleReadOnly,
} from './actions';
import {
  SORT_FILENAME,
  SORT_MODIFIED,
  SORT_NAME,
  SORT_SIZE,
  SORT_TIME,
  SortField,
  UNSORTED,
} from './sort';

/** High enough to win over syntax modes, below a forced mode. */
const BUFFER_LIST_PROBE_SCORE = 95;

export class BufferListMode implements ModeDef, ListHost {
  readonly name = 'bufed';
  readonly parent: ListMode;
  private states = new WeakMap<EditorDocument, BufferListState>();

  constructor(base: ListMode) {
    this.parent = base;
  }

  probe(doc: EditorDocument): number {
    return this.states.has(doc) ? BUFFER_LIST_PROBE_SCORE : 0;
  }

  attach(doc: EditorDocument): void {
    if (!this.states.has(doc)) this.states.set(doc, createBufferListState(this.parent));
  }

  init(window: EditWindow): boolean {
    if (!this.states.has(window.doc)) return false;
    return this.parent.init(window);
  }

  free(doc: EditorDocument): void {
    const state = this.states.get(doc);
    if (!state) return;
    state.entries = [];
    this.states.delete(doc);
  }

  displayHook(window: EditWindow, env: EditorEnvironment): void {
    // Keep the cursor off the empty line after the last row
    if (window.offset > 0 && window.offset === window.doc.size) {
      window.moveLines(-1);
    }
    if (window.popup) {
      const state = this.states.get(window.doc);
      if (state) selectEntry(env, state, window, 'preview');
    }
  }

  getState(doc: EditorDocument): BufferListState | null {
    return this.states.get(doc) ?? null;
  }

  toggleItem(window: EditWindow, index: number): boolean {
    const state = this.states.get(window.doc);
    return state ? toggleMark(state, index) : false;
  }

  isItemSelected(window: EditWindow, index: number): boolean {
    const state = this.states.get(window.doc);
    if (!state) return false;
    return entryAt(state, index)?.selected ?? false;
  }

  /**
   * Open the buffer list in a popup over `window`. With an argument,
   * system buffers are listed too.
   */
  open(env: EditorEnvironment, window: EditWindow, argval: number | null): EditWindow | null {
    if (window.popup || window.minibuffer) return null;

    let origin = window;
    if (origin.popLeft) {
      origin = env.windows.findRight(origin);
      env.windows.setActive(origin);
    }

    const doc = env.scratchBuffer(env.config.listingBufferName, {
      readOnly: true,
      system: true,
      charset: 'utf-8',
      styleBytes: 1,
    });
    const popup = env.showPopup(origin, doc, 'Buffer list');
    if (!env.setMode(popup, this)) return null;

    const state = this.getState(doc);
    if (!state) return null;
    state.lastIndex = NO_INDEX;
    state.curWindow = env.windows.handleOf(origin);
    state.curBuffer = env.buffers.handleOf(origin.doc);
    state.lastBuffer = origin.lastBuffer;
    state.showAll = argval !== null;
    buildBufferList(env, state, popup);

    const row = state.entries.findIndex(entry => entry.label === origin.doc.name);
    if (row >= 0) popup.gotoLine(row);
    return popup;
  }
}

interface BufferListCommand {
  name: string;
  keys: string[];
  run(env: EditorEnvironment, state: BufferListState, window: EditWindow): void;
}

const sortCommand = (
  name: string,
  keys: string[],
  field: SortField,
): BufferListCommand => ({
  name,
  keys,
  run: (env, state, window) => setSort(env, state, window, field),
});

const BUFFER_LIST_COMMANDS: BufferListCommand[] = [
  {
    name: 'bufed-select',
    keys: ['RET', 'SPC', 'e', 'q'],
    run: (env, state, window) => selectEntry(env, state, window, 'commit'),
  },
  {
    name: 'bufed-abort',
    keys: ['C-g', 'C-x C-g'],
    run: (env, state, window) => selectEntry(env, state, window, 'abort'),
  },
  {
    name: 'bufed-clear-modified',
    keys: ['~'],
    run: clearModified,
  },
  {
    name: 'bufed-toggle-read-only',
    keys: ['%'],
    run: toggleReadOnly,
  },
  {
    name: 'bufed-toggle-all-visible',
    keys: ['a', '.'],
    run: (env, state, window) => refresh(env, state, window, true),
  },
  {
    name: 'bufed-refresh',
    keys: ['r', 'g'],
    run: (env, state, window) => refresh(env, state, window, false),
  },
  {
    name: 'bufed-kill-buffer',
    keys: ['k', 'd', 'delete', 'backspace'],
    run: killEntries,
  },
  sortCommand('bufed-unsorted', ['u'], UNSORTED),
  sortCommand('bufed-sort-name', ['b', 'B'], SORT_NAME),
  sortCommand('bufed-sort-filename', ['f', 'F'], SORT_FILENAME),
  sortCommand('bufed-sort-size', ['z', 'Z'], SORT_SIZE),
  sortCommand('bufed-sort-time', ['t', 'T'], SORT_TIME),
  sortCommand('bufed-sort-modified', ['m', 'M'], SORT_MODIFIED),
];

/** Register the buffer list mode, its commands and bindings. */
export function registerBufferList(env: EditorEnvironment, base: ListMode): BufferListMode {
  const mode = new BufferListMode(base);
  env.modes.register(mode);

  const withState = (command: BufferListCommand) => (ctx: CommandContext): void => {
    const state = ctx.window.mode === mode ? mode.getState(ctx.window.doc) : null;
    if (!state) {
      env.message('Not in buffer list mode');
      return;
    }
    command.run(env, state, ctx.window);
  };

  for (const command of BUFFER_LIST_COMMANDS) {
    env.commands.register(command.name, withState(command));
    env.keymap.bindAll(command.keys, command.name, mode);
  }
  env.keymap.bind('n', 'next-line', mode);
  env.keymap.bind('p', 'previous-line', mode);

  env.commands.register('buffer-list', (ctx) => {
    mode.open(env, ctx.window, ctx.argval);
  });
  env.keymap.bind('C-x C-b', 'buffer-list');

  return mode;
}
