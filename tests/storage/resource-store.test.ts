import { ServiceError } from '../../src/domain/errors';
import { LogEntry, setLogHandler } from '../../src/logger';
import { MemoryPersistence } from '../../src/storage/memory-persistence';
import { COLLECTIONS, ResourceStore } from '../../src/storage/resource-store';
import { createSeedState } from '../../src/storage/seed';

const NOW = '2024-01-01T00:00:00.000Z';

/** Yields to the event loop inside every save, and records how many saves overlap. */
class SlowPersistence extends MemoryPersistence {
  active = 0;
  maxActive = 0;

  async save(name: string, value: unknown): Promise<void> {
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    await new Promise((resolve) => setImmediate(resolve));
    await super.save(name, value);
    this.active -= 1;
  }
}

class FlakyPersistence extends MemoryPersistence {
  failOn: string | undefined;

  async save(name: string, value: unknown): Promise<void> {
    if (name === this.failOn) throw new Error('disk full');
    return super.save(name, value);
  }
}

describe('ResourceStore', () => {
  afterEach(() => {
    setLogHandler(() => undefined);
  });

  test('a fresh provider is seeded and flushed once', async () => {
    const persistence = new MemoryPersistence();
    const seed = createSeedState(NOW);

    const store = await ResourceStore.open(persistence, { seed });

    expect(store.read((s) => s)).toEqual(seed);
    for (const name of COLLECTIONS) {
      expect(persistence.saveCounts.get(name)).toBe(1);
    }
    expect(persistence.read('users')).toEqual({
      admin: { password: 'secret', id: 'user-1', role: 'admin', domain: 'default' },
      demo: { password: 'test', id: 'user-2', role: 'user', domain: 'default' },
    });
  });

  test('reopening without mutations reproduces the same state and writes nothing', async () => {
    const persistence = new MemoryPersistence();
    const first = await ResourceStore.open(persistence);

    const second = await ResourceStore.open(persistence);

    expect(second.read((s) => s)).toEqual(first.read((s) => s));
    for (const name of COLLECTIONS) {
      expect(persistence.saveCounts.get(name)).toBe(1);
    }
  });

  test('a corrupt collection falls back to its seed and is rewritten', async () => {
    const persistence = new MemoryPersistence();
    persistence.putRaw('images', '{not json');
    persistence.putRaw('volumes', '[]');
    const seed = createSeedState(NOW);

    const store = await ResourceStore.open(persistence, { seed });

    expect(store.read((s) => s.images)).toEqual(seed.images);
    expect(store.read((s) => s.volumes)).toEqual([]);
    expect(persistence.read('images')).toEqual(seed.images);
  });

  test('stored rows with missing fields or unfamiliar statuses are kept as they are', async () => {
    const persistence = new MemoryPersistence();
    persistence.putRaw(
      'servers',
      JSON.stringify([
        { id: 'keep-me', name: 'server-1', status: 'ACTIVE' },
        { id: 'paused', name: 'paused-1', status: 'PAUSED', image_id: 'img-9', flavor_id: 'm1.small', host: 'node-3' },
      ]),
    );
    persistence.putRaw('volumes', JSON.stringify([{ id: 'v-1', name: 'old', size: 5, status: 'in-use' }]));
    const seed = createSeedState(NOW);

    const store = await ResourceStore.open(persistence, { seed });

    expect(store.read((s) => s.servers)).toEqual([
      { id: 'keep-me', name: 'server-1', status: 'ACTIVE', image_id: null, flavor_id: null },
      { id: 'paused', name: 'paused-1', status: 'PAUSED', image_id: 'img-9', flavor_id: 'm1.small', host: 'node-3' },
    ]);
    expect(store.read((s) => s.volumes)).toEqual([{ id: 'v-1', name: 'old', size: 5, status: 'in-use' }]);
    expect(persistence.saveCounts.get('servers')).toBeUndefined();
    expect(persistence.saveCounts.get('volumes')).toBeUndefined();
    expect(persistence.saveCounts.get('images')).toBe(1);
  });

  test('rows without a usable id are skipped and reported, the stored document is left alone', async () => {
    const entries: LogEntry[] = [];
    setLogHandler((entry) => entries.push(entry));
    const persistence = new MemoryPersistence();
    const stored = [{ id: 'img-1', name: 'kept' }, { name: 'no id' }, 'junk'];
    persistence.putRaw('images', JSON.stringify(stored));

    const store = await ResourceStore.open(persistence, { seed: createSeedState(NOW) });

    expect(store.read((s) => s.images)).toEqual([
      {
        id: 'img-1',
        name: 'kept',
        status: 'UNKNOWN',
        size: 0,
        visibility: 'public',
        container_format: 'bare',
        disk_format: 'qcow2',
        created_at: expect.any(String),
      },
    ]);
    const warning = entries.find((e) => e.message === 'Skipped unreadable rows');
    expect(warning?.context).toEqual({
      component: 'mock-cloud-api',
      module: 'resource-store',
      collection: 'images',
      skipped: 2,
    });
    expect(persistence.read('images')).toEqual(stored);
  });

  test('user and token tables keep readable entries and fill in defaults', async () => {
    const persistence = new MemoryPersistence();
    persistence.putRaw(
      'users',
      JSON.stringify({ legacy: { password: 'pw', id: 9 }, locked: { id: 'user-3' } }),
    );
    persistence.putRaw('tokens', JSON.stringify({ 'tok-a': 'user-1', 'tok-b': 9, 'tok-c': null }));

    const store = await ResourceStore.open(persistence, { seed: createSeedState(NOW) });

    expect(store.read((s) => s.users)).toEqual({
      legacy: { password: 'pw', id: '9', role: 'user', domain: 'default' },
    });
    expect(store.read((s) => s.tokens)).toEqual({ 'tok-a': 'user-1', 'tok-b': '9' });
  });

  test('mutate flushes every collection before resolving', async () => {
    const persistence = new MemoryPersistence();
    const store = await ResourceStore.open(persistence);

    await store.mutate((s) => {
      s.tokens['tok-1'] = 'user-1';
    });

    for (const name of COLLECTIONS) {
      expect(persistence.saveCounts.get(name)).toBe(2);
    }
    expect(persistence.read('tokens')).toEqual({ 'tok-1': 'user-1' });
  });

  test('a throwing operation flushes nothing and does not block later mutations', async () => {
    const persistence = new MemoryPersistence();
    const store = await ResourceStore.open(persistence);

    await expect(
      store.mutate(() => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(persistence.saveCounts.get('tokens')).toBe(1);

    await store.mutate((s) => {
      s.tokens['tok-2'] = 'user-2';
    });
    expect(persistence.saveCounts.get('tokens')).toBe(2);
  });

  test('concurrent mutations are serialized and none is lost', async () => {
    const persistence = new SlowPersistence();
    const store = await ResourceStore.open(persistence);
    persistence.maxActive = 0;

    await Promise.all(
      Array.from({ length: 10 }, (_, i) =>
        store.mutate((s) => {
          s.tokens[`tok-${i}`] = 'user-1';
        }),
      ),
    );

    expect(persistence.maxActive).toBe(1);
    expect(Object.keys(store.read((s) => s.tokens))).toHaveLength(10);
    expect(persistence.read('tokens')).toEqual(store.read((s) => s.tokens));
  });

  test('values handed out are deep copies', async () => {
    const store = await ResourceStore.open(new MemoryPersistence());

    const images = store.read((s) => s.images);
    images[0].name = 'MUTATED';
    const returned = await store.mutate((s) => s.volumes);
    returned.push({ id: 'x', name: 'x', size: 1, status: 'available' });

    expect(store.read((s) => s.images[0].name)).toBe('Cirros');
    expect(store.read((s) => s.volumes)).toHaveLength(1);
  });

  test('a failed save rejects with a storage error', async () => {
    const persistence = new FlakyPersistence();
    const store = await ResourceStore.open(persistence);
    persistence.failOn = 'volumes';

    const result = store.mutate((s) => s.volumes.length);

    await expect(result).rejects.toBeInstanceOf(ServiceError);
    await expect(result).rejects.toMatchObject({
      typedError: { code: 'STORAGE.WRITE_FAILED', details: { collection: 'volumes' } },
    });
  });

  test('reports its backend', async () => {
    const store = await ResourceStore.open(new MemoryPersistence());
    expect(store.backend).toBe('memory');
  });
});
