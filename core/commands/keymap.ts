/**
 * Key bindings: key sequences to command names, per mode plus a global map.
 *
 * A sequence is a space-separated list of key names: "C-x C-b", "RET",
 * "k". Lookup walks the window's mode, then its parents, then the global
 * map.
 */

import type { ModeDef } from '../modes/mode';

export type KeyLookup =
  | { kind: 'command'; command: string }
  | { kind: 'prefix' }
  | { kind: 'unbound' };

export class Keymap {
  private global = new Map<string, string>();
  private perMode = new Map<ModeDef, Map<string, string>>();

  /** Bind a sequence; `mode` null binds globally. */
  bind(sequence: string, command: string, mode: ModeDef | null = null): void {
    const map = mode ? this.modeMap(mode) : this.global;
    map.set(normalizeSequence(sequence), command);
  }

  /** Bind several sequences to one command. */
  bindAll(sequences: readonly string[], command: string, mode: ModeDef | null = null): void {
    for (const seq of sequences) this.bind(seq, command, mode);
  }

  lookup(sequence: string, mode: ModeDef | null): KeyLookup {
    const seq = normalizeSequence(sequence);
    let prefix = false;
    for (const map of this.chain(mode)) {
      const command = map.get(seq);
      if (command) return { kind: 'command', command };
      if (!prefix) prefix = hasPrefix(map, seq);
    }
    return prefix ? { kind: 'prefix' } : { kind: 'unbound' };
  }

  /** Sequences bound to a command in a mode's own map (or the global map). */
  bindingsFor(command: string, mode: ModeDef | null = null): string[] {
    const map = mode ? this.perMode.get(mode) : this.global;
    if (!map) return [];
    return [...map.entries()].filter(([, cmd]) => cmd === command).map(([seq]) => seq);
  }

  private *chain(mode: ModeDef | null): Generator<Map<string, string>> {
    for (let m = mode; m; m = m.parent ?? null) {
      const map = this.perMode.get(m);
      if (map) yield map;
    }
    yield this.global;
  }

  private modeMap(mode: ModeDef): Map<string, string> {
    let map = this.perMode.get(mode);
    if (!map) {
      map = new Map();
      this.perMode.set(mode, map);
    }
    return map;
  }
}

function normalizeSequence(sequence: string): string {
  return sequence.trim().split(/\s+/).join(' ');
}

function hasPrefix(map: Map<string, string>, seq: string): boolean {
  const head = seq + ' ';
  for (const key of map.keys()) {
    if (key.startsWith(head)) return true;
  }
  return false;
}
