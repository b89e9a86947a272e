/**
 * Resource store.
 *
 * Owns every collection the API serves. State lives in memory and is written
 * back to the persistence provider in full after each mutation. Mutations are
 * queued on a promise chain, so "read, mutate, flush" never interleaves with
 * another mutation and callers only see success once the flush has landed.
 */

import { Attachment, readAttachment } from '../domain/attachment';
import { Server, readServer } from '../domain/compute-server';
import { ServiceError, persistenceError } from '../domain/errors';
import { isList, isRecord, readId } from '../domain/guards';
import { TokenTable, UserDirectory, readUserRecord } from '../domain/identity';
import { Image, readImage } from '../domain/image';
import { Volume, readVolume } from '../domain/volume';
import { Logger, logger } from '../logger';
import { PersistenceProvider } from './persistence';
import { createSeedState } from './seed';

export interface StoreState {
  users: UserDirectory;
  tokens: TokenTable;
  images: Image[];
  volumes: Volume[];
  servers: Server[];
  attachments: Attachment[];
}

export type CollectionName = keyof StoreState;

/** Flush order. Every flush writes all of them. */
export const COLLECTIONS: readonly CollectionName[] = [
  'users',
  'tokens',
  'images',
  'volumes',
  'servers',
  'attachments',
];

export interface ResourceStoreOptions {
  /** Seed used for collections with no readable stored document. Defaults to createSeedState(). */
  seed?: StoreState;
  logger?: Logger;
}

/** Reads one stored row; undefined when the row cannot be served. */
type RowReader<T> = (row: unknown) => T | undefined;

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function keepRows<T>(name: CollectionName, rows: unknown[], read: RowReader<T>, log: Logger): T[] {
  const kept: T[] = [];
  for (const row of rows) {
    const item = read(row);
    if (item !== undefined) kept.push(item);
  }
  if (kept.length < rows.length) {
    log.warn('Skipped unreadable rows', { collection: name, skipped: rows.length - kept.length });
  }
  return kept;
}

function keepEntries<T>(
  name: CollectionName,
  table: Record<string, unknown>,
  read: RowReader<T>,
  log: Logger,
): Record<string, T> {
  const kept: Array<[string, T]> = [];
  const entries = Object.entries(table);
  for (const [key, value] of entries) {
    const item = read(value);
    if (item !== undefined) kept.push([key, item]);
  }
  if (kept.length < entries.length) {
    log.warn('Skipped unreadable rows', { collection: name, skipped: entries.length - kept.length });
  }
  return Object.fromEntries(kept);
}

export class ResourceStore {
  private queue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly persistence: PersistenceProvider,
    private readonly state: StoreState,
    private readonly log: Logger,
  ) {}

  /**
   * Load every collection. A collection with no stored document, or one that
   * does not parse as the right container, starts from the seed, and only
   * those are written back right away so generated seed ids stay the same
   * across restarts. A stored document that parses is never replaced here:
   * rows missing optional fields are filled in, and only rows with no usable
   * id are skipped.
   */
  static async open(persistence: PersistenceProvider, options: ResourceStoreOptions = {}): Promise<ResourceStore> {
    const seed = options.seed ?? createSeedState();
    const log = options.logger ?? logger.child({ module: 'resource-store' });
    const loadedAt = new Date().toISOString();
    const seeded: CollectionName[] = [];

    const loadList = async <T>(name: CollectionName, fallback: T[], read: RowReader<T>): Promise<T[]> => {
      const stored = await persistence.load<unknown[]>(name, fallback, isList);
      if (stored === fallback) {
        seeded.push(name);
        return fallback;
      }
      return keepRows(name, stored, read, log);
    };

    const loadTable = async <T>(
      name: CollectionName,
      fallback: Record<string, T>,
      read: RowReader<T>,
    ): Promise<Record<string, T>> => {
      const stored = await persistence.load<Record<string, unknown>>(name, fallback, isRecord);
      if (stored === fallback) {
        seeded.push(name);
        return fallback;
      }
      return keepEntries(name, stored, read, log);
    };

    const state: StoreState = {
      users: await loadTable('users', seed.users, readUserRecord),
      tokens: await loadTable('tokens', seed.tokens, readId),
      images: await loadList('images', seed.images, (row) => readImage(row, loadedAt)),
      volumes: await loadList('volumes', seed.volumes, readVolume),
      servers: await loadList('servers', seed.servers, readServer),
      attachments: await loadList('attachments', seed.attachments, (row) => readAttachment(row, loadedAt)),
    };

    const store = new ResourceStore(persistence, state, log);
    if (seeded.length > 0) {
      log.info('Seeding default collections', { collections: seeded });
      for (const name of seeded) {
        await store.save(name);
      }
    }
    log.info('Resource store opened', {
      backend: persistence.kind,
      images: state.images.length,
      volumes: state.volumes.length,
      servers: state.servers.length,
      attachments: state.attachments.length,
    });
    return store;
  }

  /** Name of the persistence backend. */
  get backend(): string {
    return this.persistence.kind;
  }

  /** Read a deep copy of part of the state. Does not wait for pending mutations. */
  read<T>(selector: (state: Readonly<StoreState>) => T): T {
    return deepCopy(selector(this.state));
  }

  /**
   * Apply `operation` and flush, exclusively. If the operation throws, nothing
   * is flushed and the error propagates. The result is deep-copied out.
   */
  mutate<T>(operation: (state: StoreState) => T): Promise<T> {
    const run = this.queue.then(async () => {
      const result = operation(this.state);
      await this.flush();
      return deepCopy(result);
    });
    // Keep the chain alive after a failure; the caller still sees the rejection via `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Write every collection to the persistence provider. */
  async flush(): Promise<void> {
    for (const name of COLLECTIONS) {
      await this.save(name);
    }
    this.log.debug('Flushed collections', { backend: this.persistence.kind });
  }

  private async save(name: CollectionName): Promise<void> {
    try {
      await this.persistence.save(name, this.state[name]);
    } catch (err) {
      const cause = err instanceof Error ? err.message : String(err);
      this.log.error('Flush failed', { collection: name, error: cause });
      throw new ServiceError(persistenceError(name, cause));
    }
  }
}
