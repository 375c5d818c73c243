/**
 * WindowViewModel: bridges one EditWindow to rendering state.
 *
 * Key events are translated to key names ("C-x", "M-<", "RET") and fed to
 * the environment's dispatcher; visible lines carry theme tokens from the
 * document's style runs plus line decorations for the cursor row and for
 * rows marked in a list.
 */

import type { EditorEnvironment } from '../core/editor-environment';
import type { EditWindow } from '../core/window/edit-window';
import { isListHost } from '../core/modes/list-mode';
import { RenderedLine, LineDecoration, computeRenderedLines, styleTokens } from './line-layout';
import { EditorTheme, DARK_THEME } from './theme';

export interface KeyEvent {
  key: string;
  code: string;
  ctrlKey: boolean;
  shiftKey: boolean;
  altKey: boolean;
  metaKey: boolean;
}

type ChangeListener = () => void;

const NAMED_KEYS: Record<string, string> = {
  Enter: 'RET',
  ' ': 'SPC',
  Tab: 'TAB',
  Escape: 'ESC',
  Backspace: 'backspace',
  Delete: 'delete',
  Insert: 'insert',
  ArrowUp: 'up',
  ArrowDown: 'down',
  ArrowLeft: 'left',
  ArrowRight: 'right',
  Home: 'home',
  End: 'end',
  PageUp: 'prior',
  PageDown: 'next',
};

/** Key name for an event, or null for a lone modifier key. */
export function keyName(event: KeyEvent): string | null {
  if (['Control', 'Shift', 'Alt', 'Meta'].includes(event.key)) return null;
  let name = NAMED_KEYS[event.key] ?? event.key;
  if (event.altKey || event.metaKey) name = `M-${name}`;
  if (event.ctrlKey) name = `C-${name}`;
  return name;
}

export class WindowViewModel {
  readonly env: EditorEnvironment;
  readonly window: EditWindow;
  private _theme: EditorTheme;
  private _listeners: ChangeListener[] = [];

  constructor(env: EditorEnvironment, window: EditWindow, theme?: EditorTheme) {
    this.env = env;
    this.window = window;
    this._theme = theme ?? DARK_THEME;
  }

  get theme(): EditorTheme {
    return this._theme;
  }

  setTheme(theme: EditorTheme): void {
    this._theme = theme;
    this.notifyChange();
  }

  /** Subscribe to state changes. */
  onChange(listener: ChangeListener): () => void {
    this._listeners.push(listener);
    return () => {
      const idx = this._listeners.indexOf(listener);
      if (idx !== -1) this._listeners.splice(idx, 1);
    };
  }

  private notifyChange(): void {
    for (const listener of this._listeners) listener();
  }

  // === Computed State ===

  /** Lines in the window, after running the mode's display hook. */
  get visibleLines(): RenderedLine[] {
    this.env.display(this.window);
    const doc = this.window.doc;
    const top = this.window.topLine;
    const last = Math.min(doc.buffer.getLineCount(), top + this.window.height);
    const lineNumbers: number[] = [];
    for (let line = top; line < last; line++) lineNumbers.push(line);

    return computeRenderedLines(
      doc,
      lineNumbers,
      line => styleTokens(doc, line, this._theme),
      line => this.lineDecorations(line),
    );
  }

  get title(): string {
    return this.window.title ?? this.window.doc.name;
  }

  get statusMessage(): string {
    return this.env.lastMessage;
  }

  // === Event Handlers ===

  /** Handle keyboard input. Returns false when the key is unbound. */
  onKeyDown(event: KeyEvent): boolean {
    const name = keyName(event);
    if (name === null) return false;
    const handled = this.env.handleKey(name, this.window);
    this.notifyChange();
    return handled;
  }

  // === Private ===

  private lineDecorations(line: number): LineDecoration[] {
    const decorations: LineDecoration[] = [];
    const length = this.window.doc.buffer.getLineLength(line);
    const mode = this.window.mode;

    if (isListHost(mode) && mode.isItemSelected(this.window, line)) {
      decorations.push({
        startColumn: 0,
        endColumn: length,
        type: 'background',
        color: this._theme.markedLineBackground,
      });
    }
    if (this.window.highlightCurrentLine && line === this.window.cursorLine) {
      decorations.push({
        startColumn: 0,
        endColumn: length,
        type: 'highlight',
        color: this._theme.lineHighlight,
      });
    }
    return decorations;
  }
}
