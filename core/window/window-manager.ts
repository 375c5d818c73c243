/**
 * Window layout bookkeeping: window creation, popups, deletion, focus.
 *
 * Geometry is reduced to what commands need: a height in rows and a
 * left-to-right column slot.
 */

import { Arena, Handle } from '../registry/arena';
import type { EditorDocument } from '../document/document';
import { EditWindow, WindowOptions } from './edit-window';

export type WindowHandle = Handle<EditWindow>;

export class WindowManager {
  private arena = new Arena<EditWindow>();
  private nextId = 1;
  private _active: EditWindow | null = null;

  get active(): EditWindow | null {
    return this._active;
  }

  setActive(window: EditWindow): void {
    if (this.arena.handleOf(window)) this._active = window;
  }

  create(doc: EditorDocument, options: WindowOptions = {}): EditWindow {
    const window = new EditWindow(this.nextId++, doc, options);
    this.arena.insert(window);
    if (!this._active) this._active = window;
    return window;
  }

  /** Open a popup over `parent` and focus it. */
  showPopup(parent: EditWindow, doc: EditorDocument, title: string, height: number): EditWindow {
    const popup = this.create(doc, {
      popup: true,
      title,
      height,
      column: parent.column,
    });
    this._active = popup;
    return popup;
  }

  /**
   * Close a window. The last regular window cannot be closed unless
   * `force` is set; popups can always go.
   */
  delete(window: EditWindow, force = false): boolean {
    const handle = this.arena.handleOf(window);
    if (!handle) return false;
    if (!window.popup && !force && this.regularWindows().length <= 1) return false;
    this.arena.remove(handle);
    if (this._active === window) {
      this._active = this.regularWindows()[0] ?? null;
    }
    return true;
  }

  handleOf(window: EditWindow): WindowHandle | null {
    return this.arena.handleOf(window);
  }

  resolve(handle: WindowHandle | null): EditWindow | null {
    return this.arena.get(handle);
  }

  isLive(window: EditWindow): boolean {
    return this.arena.handleOf(window) !== null;
  }

  list(): EditWindow[] {
    return this.arena.values();
  }

  /** Windows currently displaying `doc`. */
  showing(doc: EditorDocument): EditWindow[] {
    return this.list().filter(w => w.doc === doc);
  }

  /** Nearest regular window to the right of `window`, or `window` itself. */
  findRight(window: EditWindow): EditWindow {
    let best: EditWindow | null = null;
    for (const w of this.regularWindows()) {
      if (w.column <= window.column) continue;
      if (!best || w.column < best.column) best = w;
    }
    return best ?? window;
  }

  private regularWindows(): EditWindow[] {
    return this.list().filter(w => !w.popup && !w.minibuffer);
  }
}
