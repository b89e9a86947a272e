/**
 * Persistence provider contract.
 *
 * Maps a collection name to one JSON document. `load` never fails: a missing
 * record, unparseable text, or a document that does not pass the caller's
 * shape guard all yield the fallback. `save` replaces the whole document and
 * rejects when the write cannot be completed.
 */

export type ShapeGuard<T> = (value: unknown) => value is T;

export interface PersistenceProvider {
  /** Human-readable backend name (reported by the health check). */
  readonly kind: string;
  load<T>(name: string, fallback: T, accept: ShapeGuard<T>): Promise<T>;
  save(name: string, value: unknown): Promise<void>;
}

/** Result of decoding stored text for one collection. */
export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: 'unparseable' | 'unexpected-shape' };

/** Shared decoding step for providers that store JSON text. */
export function decodeDocument<T>(text: string, accept: ShapeGuard<T>): DecodeResult<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { ok: false, reason: 'unparseable' };
  }
  return accept(parsed) ? { ok: true, value: parsed } : { ok: false, reason: 'unexpected-shape' };
}

export function encodeDocument(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
