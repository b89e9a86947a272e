/**
 * JSON file persistence.
 *
 * One `<name>.json` document per collection under the data directory,
 * indented for humans. Writes go to a uniquely named temp file that is
 * fsynced and renamed over the target, so a reader sees either the old
 * document or the new one.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuid } from 'uuid';
import { logger } from '../logger';
import { PersistenceProvider, ShapeGuard, decodeDocument, encodeDocument } from './persistence';

const log = logger.child({ module: 'json-file-persistence' });

const COLLECTION_NAME = /^[a-z][a-z0-9_-]*$/;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class JsonFilePersistence implements PersistenceProvider {
  readonly kind = 'json-file';

  constructor(private readonly dataDir: string) {}

  /** Create the data directory if it does not exist yet. */
  async initialize(): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
  }

  async load<T>(name: string, fallback: T, accept: ShapeGuard<T>): Promise<T> {
    const filePath = this.pathFor(name);
    let text: string;
    try {
      text = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (!isMissingFile(err)) {
        log.warn('Unreadable collection, using default', {
          collection: name,
          error: err instanceof Error ? err.message : String(err),
        });
      }
      return fallback;
    }

    const decoded = decodeDocument(text, accept);
    if (!decoded.ok) {
      log.warn('Corrupt collection, using default', { collection: name, reason: decoded.reason });
      return fallback;
    }
    return decoded.value;
  }

  async save(name: string, value: unknown): Promise<void> {
    const filePath = this.pathFor(name);
    const tempPath = `${filePath}.${uuid()}.tmp`;
    try {
      await fs.writeFile(tempPath, encodeDocument(value), 'utf-8');
      const handle = await fs.open(tempPath, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, filePath);
    } catch (err) {
      await fs.rm(tempPath, { force: true });
      throw err;
    }
  }

  private pathFor(name: string): string {
    if (!COLLECTION_NAME.test(name)) {
      throw new Error(`Invalid collection name: ${name}`);
    }
    return path.join(this.dataDir, `${name}.json`);
  }
}
