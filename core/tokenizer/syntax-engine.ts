/**
 * Syntax modes: one mode per language with a registered Lezer grammar.
 *
 * A document's syntax mode is chosen from its language id (derived from
 * the file name). The grammar itself is exposed so a highlighter can
 * parse the document on demand.
 */

import type { Parser, Tree } from '@lezer/common';
import type { EditorDocument } from '../document/document';
import type { ModeDef } from '../modes/mode';
import { typescriptParser, javascriptParser } from './grammars/typescript';

/** Probe score of a syntax mode for a document in its language. */
const SYNTAX_PROBE_SCORE = 60;

export interface SyntaxMode extends ModeDef {
  readonly languageId: string;
  readonly parser: Parser;
}

export class SyntaxEngine {
  private modes: Map<string, SyntaxMode> = new Map();

  constructor() {
    this.registerGrammar('typescript', typescriptParser);
    this.registerGrammar('javascript', javascriptParser);
  }

  registerGrammar(languageId: string, parser: Parser): SyntaxMode {
    const mode: SyntaxMode = {
      name: languageId,
      languageId,
      parser,
      probe: (doc) => (doc.languageId === languageId ? SYNTAX_PROBE_SCORE : 0),
    };
    this.modes.set(languageId, mode);
    return mode;
  }

  hasGrammar(languageId: string): boolean {
    return this.modes.has(languageId);
  }

  getSupportedLanguages(): string[] {
    return [...this.modes.keys()];
  }

  getMode(languageId: string): SyntaxMode | null {
    return this.modes.get(languageId) ?? null;
  }

  /** Syntax mode for a document, or null for languages without a grammar. */
  detect(doc: EditorDocument): SyntaxMode | null {
    return this.getMode(doc.languageId);
  }

  /** Full parse of a document with its language's grammar. */
  parse(doc: EditorDocument): Tree | null {
    const mode = this.detect(doc);
    if (!mode) return null;
    return mode.parser.parse(doc.buffer.getText());
  }
}
