/**
 * In-process persistence provider.
 *
 * Keeps each collection as serialized JSON text so loads go through the same
 * decoding path as the file provider. Used by tests and by embedders that
 * want a throwaway store.
 */

import { PersistenceProvider, ShapeGuard, decodeDocument, encodeDocument } from './persistence';

export class MemoryPersistence implements PersistenceProvider {
  readonly kind = 'memory';

  private documents = new Map<string, string>();

  /** Number of completed saves, per collection. */
  readonly saveCounts = new Map<string, number>();

  async load<T>(name: string, fallback: T, accept: ShapeGuard<T>): Promise<T> {
    const text = this.documents.get(name);
    if (text === undefined) return fallback;
    const decoded = decodeDocument(text, accept);
    return decoded.ok ? decoded.value : fallback;
  }

  async save(name: string, value: unknown): Promise<void> {
    this.documents.set(name, encodeDocument(value));
    this.saveCounts.set(name, (this.saveCounts.get(name) ?? 0) + 1);
  }

  /** Store raw text for a collection, bypassing encoding. */
  putRaw(name: string, text: string): void {
    this.documents.set(name, text);
  }

  /** Parsed stored document for a collection, if any. */
  read(name: string): unknown {
    const text = this.documents.get(name);
    return text === undefined ? undefined : JSON.parse(text);
  }
}
