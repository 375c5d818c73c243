/**
 * EditorEnvironment: owns the buffer table, windows, modes, commands and
 * key bindings, and implements the operations that touch several of them
 * (killing a buffer, switching a window's buffer, running a command).
 *
 * Dispatch is single-threaded: one command runs to completion before the
 * next key is handled.
 */

import { EditorConfig, resolveConfig } from './config';
import { EditorError } from './errors';
import { Logger } from './logger';
import { BufferRegistry } from './document/buffer-registry';
import type { DocumentOptions, EditorDocument } from './document/document';
import { WindowManager } from './window/window-manager';
import type { EditWindow, WindowOptions } from './window/edit-window';
import { ModeDef, ModeRegistry } from './modes/mode';
import { CommandRegistry } from './commands/registry';
import { Keymap } from './commands/keymap';
import { registerNavigationCommands } from './commands/navigation';
import { SyntaxEngine } from './tokenizer/syntax-engine';
import { ConfirmationPrompt, declineAll } from './prompt/confirm';
import { SortPreference } from './buffer-list/sort';

export interface EnvironmentOptions {
  config?: Partial<EditorConfig>;
  prompt?: ConfirmationPrompt;
  logger?: Logger;
  sortPreference?: SortPreference;
}

const SCRATCH_BUFFER_NAME = '*scratch*';
const UNIVERSAL_ARGUMENT_KEY = 'C-u';

export class EditorEnvironment {
  readonly config: EditorConfig;
  readonly logger: Logger;
  readonly buffers = new BufferRegistry();
  readonly windows = new WindowManager();
  readonly commands = new CommandRegistry();
  readonly keymap = new Keymap();
  readonly modes = new ModeRegistry();
  readonly syntax = new SyntaxEngine();
  /** Buffer list sort order, shared by every listing. */
  readonly sortPreference: SortPreference;
  prompt: ConfirmationPrompt;

  private _message = '';
  private pendingKeys: string[] = [];
  private pendingArg: number | null = null;

  constructor(options: EnvironmentOptions = {}) {
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? new Logger({ verbose: this.config.verbose });
    this.prompt = options.prompt ?? declineAll;
    this.sortPreference = options.sortPreference ?? new SortPreference();

    registerNavigationCommands(this.commands);
    this.keymap.bindAll(['C-n', 'down'], 'next-line');
    this.keymap.bindAll(['C-p', 'up'], 'previous-line');
    this.keymap.bind('M-<', 'beginning-of-buffer');
    this.keymap.bind('M->', 'end-of-buffer');
    this.keymap.bind('M-g g', 'goto-line');

    for (const languageId of this.syntax.getSupportedLanguages()) {
      const mode = this.syntax.getMode(languageId);
      if (mode) this.modes.register(mode);
    }
  }

  /** Text of the last status-line message. */
  get lastMessage(): string {
    return this._message;
  }

  /** Show a message in the status line. */
  message(text: string): void {
    this._message = text;
    this.logger.debug(`message: ${text}`);
  }

  // === Buffers ===

  createBuffer(name: string, options: DocumentOptions = {}): EditorDocument {
    const doc = this.buffers.create(name, options);
    doc.syntaxMode = this.syntax.detect(doc);
    this.logger.debug(`created buffer ${name}`);
    return doc;
  }

  findBuffer(name: string): EditorDocument | null {
    return this.buffers.findByName(name);
  }

  /** Existing buffer of that name, or a new one created with `options`. */
  scratchBuffer(name: string, options: DocumentOptions = {}): EditorDocument {
    return this.findBuffer(name) ?? this.createBuffer(name, options);
  }

  /**
   * Kill a buffer by name. A modified buffer is only killed if `force` is
   * set or the user confirms. Windows showing the buffer switch to another
   * one. Returns whether the buffer was killed.
   */
  killBuffer(name: string, force = false): boolean {
    const doc = this.findBuffer(name);
    if (!doc) {
      this.message(`No buffer named ${name}`);
      return false;
    }
    if (doc.modified && !force && !this.prompt.confirm(`Buffer ${name} modified; kill anyway?`)) {
      this.logger.debug(`kill of ${name} declined`);
      return false;
    }

    for (const mode of [...doc.modes]) {
      mode.free?.(doc, this);
      doc.detachMode(mode);
    }
    this.buffers.remove(doc);

    for (const window of this.windows.showing(doc)) {
      if (window.popup) {
        this.windows.delete(window);
      } else {
        this.switchToBuffer(window, this.otherBuffer(window));
      }
    }
    this.logger.debug(`killed buffer ${name}`);
    return true;
  }

  /** Buffer to show in `window` when its current one goes away. */
  private otherBuffer(window: EditWindow): EditorDocument {
    const previous = this.buffers.resolve(window.lastBuffer);
    if (previous) return previous;
    const candidate = this.buffers.list().find(doc => !doc.system);
    return candidate ?? this.scratchBuffer(SCRATCH_BUFFER_NAME);
  }

  // === Windows ===

  openWindow(doc: EditorDocument, options: WindowOptions = {}): EditWindow {
    const window = this.windows.create(doc, { height: this.config.windowHeight, ...options });
    this.applyMode(window);
    return window;
  }

  showPopup(parent: EditWindow, doc: EditorDocument, title: string): EditWindow {
    return this.windows.showPopup(parent, doc, title, this.config.popupHeight);
  }

  deleteWindow(window: EditWindow, force = false): boolean {
    return this.windows.delete(window, force);
  }

  /** Display `doc` in `window`, remembering the previous buffer. */
  switchToBuffer(window: EditWindow, doc: EditorDocument): void {
    if (window.doc === doc) return;
    const old = window.doc;
    old.savedMode = window.mode;
    window.lastBuffer = this.buffers.handleOf(old);
    window.doc = doc;
    window.offset = 0;
    window.offsetTop = 0;
    this.applyMode(window);
  }

  /**
   * Put a window in `mode`. Modes with per-document state get it
   * allocated here; a failing init leaves the window's mode unchanged.
   */
  setMode(window: EditWindow, mode: ModeDef): boolean {
    if (!this.modes.has(mode)) throw new EditorError(`Mode ${mode.name} is not registered`);
    if (mode.attach) {
      mode.attach(window.doc, this);
      window.doc.attachMode(mode);
    }
    if (mode.init && !mode.init(window, this)) {
      this.logger.warn(`mode ${mode.name} refused buffer ${window.doc.name}`);
      return false;
    }
    window.mode = mode;
    return true;
  }

  private applyMode(window: EditWindow): void {
    const mode = window.doc.savedMode ?? this.modes.probe(window.doc);
    if (!mode || !this.setMode(window, mode)) window.mode = null;
  }

  /** Run the window's display hook; called before each render. */
  display(window: EditWindow): void {
    window.mode?.displayHook?.(window, this);
  }

  // === Commands and keys ===

  /**
   * Run a command. Returns false for unknown commands. A handler that
   * throws is reported in the status line and the log.
   */
  executeCommand(name: string, window: EditWindow, argval: number | null = null): boolean {
    if (!this.commands.has(name)) {
      this.message(`No command ${name}`);
      return false;
    }
    try {
      this.commands.execute(name, { env: this, window, argval });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.error(`command ${name} failed: ${reason}`);
      this.message(`${name}: ${reason}`);
    }
    return true;
  }

  /**
   * Feed one key (e.g. "k", "C-x", "RET") to the active window.
   * Returns false when the key (sequence) is unbound.
   */
  handleKey(key: string, window: EditWindow | null = this.windows.active): boolean {
    if (!window) return false;

    if (key === UNIVERSAL_ARGUMENT_KEY && this.pendingKeys.length === 0) {
      this.pendingArg = (this.pendingArg ?? 1) * 4;
      return true;
    }

    const sequence = [...this.pendingKeys, key].join(' ');
    const found = this.keymap.lookup(sequence, window.mode);
    if (found.kind === 'prefix') {
      this.pendingKeys.push(key);
      return true;
    }

    const argval = this.pendingArg;
    this.pendingKeys = [];
    this.pendingArg = null;
    if (found.kind === 'unbound') {
      this.message(`${sequence} is undefined`);
      return false;
    }
    this.executeCommand(found.command, window, argval);
    return true;
  }
}
