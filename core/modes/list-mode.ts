/**
 * Generic list mode: one item per line, the cursor line is the current
 * item. Concrete lists compose it (as their `parent`) and implement
 * ListHost to expose per-item selection markers.
 */

import type { ModeDef } from './mode';
import type { EditWindow } from '../window/edit-window';
import type { EditorEnvironment } from '../editor-environment';

export interface ListHost {
  /** Flip the selection marker of an item. false when out of range. */
  toggleItem(window: EditWindow, index: number): boolean;
  isItemSelected(window: EditWindow, index: number): boolean;
}

/** Maps a window's cursor to an item index. */
export interface ListPosition {
  getPos(window: EditWindow): number;
}

export function isListHost(mode: ModeDef | null): mode is ModeDef & ListHost {
  return mode !== null
    && 'toggleItem' in mode && typeof mode.toggleItem === 'function'
    && 'isItemSelected' in mode && typeof mode.isItemSelected === 'function';
}

export class ListMode implements ModeDef, ListPosition {
  readonly name = 'list';

  init(window: EditWindow): boolean {
    window.highlightCurrentLine = true;
    return true;
  }

  /** Index of the item under the cursor. */
  getPos(window: EditWindow): number {
    return window.cursorLine;
  }
}

export function registerListMode(env: EditorEnvironment): ListMode {
  const mode = new ListMode();
  env.modes.register(mode);

  env.commands.register('list-toggle-selection', (ctx) => {
    const host = ctx.window.mode;
    if (!isListHost(host)) {
      env.message('Not in a list');
      return;
    }
    if (host.toggleItem(ctx.window, mode.getPos(ctx.window))) {
      ctx.window.moveLines(1);
    }
  });

  env.keymap.bind('insert', 'list-toggle-selection', mode);
  env.keymap.bindAll(['C-n', 'down'], 'next-line', mode);
  env.keymap.bindAll(['C-p', 'up'], 'previous-line', mode);
  return mode;
}
