/**
 * Modes: behavior attached to a window/document pair.
 *
 * A mode supplies hooks the environment calls at fixed points. Modes
 * extend one another by composition: `parent` names the mode whose key
 * bindings apply when the mode's own keymap has no entry.
 */

import type { EditorDocument } from '../document/document';
import type { EditWindow } from '../window/edit-window';
import type { EditorEnvironment } from '../editor-environment';

export interface ModeDef {
  readonly name: string;
  /** Mode consulted for key bindings this mode does not define. */
  readonly parent?: ModeDef;
  /** Score (0-100) saying how well this mode fits a document. 0 = never. */
  probe?(doc: EditorDocument): number;
  /** Allocate per-document state before init runs. */
  attach?(doc: EditorDocument, env: EditorEnvironment): void;
  /** Set up a window showing the document. false aborts the mode switch. */
  init?(window: EditWindow, env: EditorEnvironment): boolean;
  /** Release per-document state; called when the document is killed. */
  free?(doc: EditorDocument, env: EditorEnvironment): void;
  /** Runs before each render of a window in this mode. */
  displayHook?(window: EditWindow, env: EditorEnvironment): void;
}

export class ModeRegistry {
  private modes = new Map<string, ModeDef>();

  register(mode: ModeDef): void {
    this.modes.set(mode.name, mode);
  }

  get(name: string): ModeDef | null {
    return this.modes.get(name) ?? null;
  }

  has(mode: ModeDef): boolean {
    return this.modes.get(mode.name) === mode;
  }

  /** Highest-scoring mode for a document, or null if none claims it. */
  probe(doc: EditorDocument): ModeDef | null {
    let best: ModeDef | null = null;
    let bestScore = 0;
    for (const mode of this.modes.values()) {
      const score = mode.probe ? mode.probe(doc) : 0;
      if (score > bestScore) {
        best = mode;
        bestScore = score;
      }
    }
    return best;
  }
}
