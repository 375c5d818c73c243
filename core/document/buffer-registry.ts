/**
 * BufferRegistry: the authoritative table of live documents.
 *
 * Iteration order is creation order. Consumers keep BufferHandles and
 * call resolve() each time; a killed document resolves to null forever.
 */

import { Arena, Handle } from '../registry/arena';
import { DuplicateBufferError } from '../errors';
import { EditorDocument, DocumentOptions } from './document';

export type BufferHandle = Handle<EditorDocument>;

export class BufferRegistry {
  private arena = new Arena<EditorDocument>();
  private byName = new Map<string, BufferHandle>();

  /** Create and register a document. Names are unique. */
  create(name: string, options: DocumentOptions = {}): EditorDocument {
    return this.add(new EditorDocument(name, options));
  }

  /** Register an already constructed document. */
  add(doc: EditorDocument): EditorDocument {
    if (this.byName.has(doc.name)) throw new DuplicateBufferError(doc.name);
    this.byName.set(doc.name, this.arena.insert(doc));
    return doc;
  }

  resolve(handle: BufferHandle | null): EditorDocument | null {
    return this.arena.get(handle);
  }

  handleOf(doc: EditorDocument): BufferHandle | null {
    const handle = this.byName.get(doc.name);
    if (!handle || this.arena.get(handle) !== doc) return null;
    return handle;
  }

  findByName(name: string): EditorDocument | null {
    return this.arena.get(this.byName.get(name) ?? null);
  }

  /** Unregister a document. Returns false if it was not live. */
  remove(doc: EditorDocument): boolean {
    const handle = this.handleOf(doc);
    if (!handle) return false;
    this.arena.remove(handle);
    this.byName.delete(doc.name);
    return true;
  }

  isLive(doc: EditorDocument): boolean {
    return this.handleOf(doc) !== null;
  }

  /** Live documents in creation order. */
  list(): EditorDocument[] {
    return this.arena.values();
  }

  get count(): number {
    return this.arena.size;
  }
}
