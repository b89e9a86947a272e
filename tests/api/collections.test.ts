import { MemoryPersistence } from '../../src/storage/memory-persistence';
import { arrayField, createTestApp, field, login, request, stringField, TestApp } from '../helpers/request';

interface CollectionCase {
  path: string;
  listKey: string;
  kind: string;
  createdStatus: number;
  input: Record<string, unknown>;
  expected: Record<string, unknown>;
}

const cases: CollectionCase[] = [
  {
    path: '/v2/images',
    listKey: 'images',
    kind: 'Image',
    createdStatus: 201,
    input: { name: 'ubuntu-22.04' },
    expected: {
      name: 'ubuntu-22.04',
      status: 'queued',
      size: 0,
      visibility: 'private',
      container_format: 'bare',
      disk_format: 'qcow2',
    },
  },
  {
    path: '/v3/volumes',
    listKey: 'volumes',
    kind: 'Volume',
    createdStatus: 201,
    input: { name: 'data-1', size: 10 },
    expected: { name: 'data-1', size: 10, status: 'available' },
  },
  {
    path: '/v2.1/servers',
    listKey: 'servers',
    kind: 'Server',
    createdStatus: 202,
    input: { name: 'web-1', image_id: 'img-1' },
    expected: { name: 'web-1', status: 'BUILD', image_id: 'img-1', flavor_id: null },
  },
];

describe.each(cases)('$kind API ($path)', ({ path, listKey, kind, createdStatus, input, expected }) => {
  let t: TestApp;
  let headers: Record<string, string>;

  beforeEach(async () => {
    t = await createTestApp(new MemoryPersistence());
    headers = { 'X-Auth-Token': await login(t.app, 'admin', 'secret') };
  });

  test('every operation requires a token', async () => {
    expect((await request(t.app, 'GET', path)).status).toBe(401);
    expect((await request(t.app, 'POST', path, { body: input })).status).toBe(401);
    expect((await request(t.app, 'GET', `${path}/anything`)).status).toBe(401);
    expect((await request(t.app, 'DELETE', `${path}/anything`)).status).toBe(401);
  });

  test('unknown token is rejected before the body is looked at', async () => {
    const res = await request(t.app, 'POST', path, { body: {}, headers: { 'X-Auth-Token': 'not-a-token' } });
    expect(res.status).toBe(401);
    expect(field(res.body, 'detail')).toBe('Invalid or missing token');
  });

  test('malformed JSON without a token is still unauthorized', async () => {
    const missing = await request(t.app, 'POST', path, { rawBody: '{"name":' });
    expect(missing.status).toBe(401);
    expect(field(missing.body, 'detail')).toBe('Invalid or missing token');

    const unknown = await request(t.app, 'POST', path, {
      rawBody: '{"name":',
      headers: { 'X-Auth-Token': 'not-a-token' },
    });
    expect(unknown.status).toBe(401);
  });

  test('malformed JSON with a valid token is a bad request', async () => {
    const res = await request(t.app, 'POST', path, { rawBody: '{"name":', headers });
    expect(res.status).toBe(400);
    expect(field(res.body, 'detail')).toBe('Malformed JSON body');
  });

  test('lists the seeded entity wrapped in its collection key', async () => {
    const res = await request(t.app, 'GET', path, { headers });
    expect(res.status).toBe(200);
    expect(arrayField(res.body, listKey)).toHaveLength(1);
  });

  test('create then get returns the same entity', async () => {
    const created = await request(t.app, 'POST', path, { body: input, headers });
    expect(created.status).toBe(createdStatus);
    expect(created.body).toMatchObject(expected);
    const id = stringField(created.body, 'id');

    const fetched = await request(t.app, 'GET', `${path}/${id}`, { headers });
    expect(fetched.status).toBe(200);
    expect(fetched.body).toEqual(created.body);
  });

  test('created entity is appended to the list', async () => {
    const created = await request(t.app, 'POST', path, { body: input, headers });
    const id = stringField(created.body, 'id');

    const items = arrayField((await request(t.app, 'GET', path, { headers })).body, listKey);
    expect(items).toHaveLength(2);
    expect(stringField(items[1], 'id')).toBe(id);
  });

  test('delete removes the entity; a second delete is not found', async () => {
    const id = stringField((await request(t.app, 'POST', path, { body: input, headers })).body, 'id');

    const deleted = await request(t.app, 'DELETE', `${path}/${id}`, { headers });
    expect(deleted.status).toBe(200);
    expect(deleted.body).toEqual({ detail: 'Deleted' });

    const fetched = await request(t.app, 'GET', `${path}/${id}`, { headers });
    expect(fetched.status).toBe(404);
    expect(field(fetched.body, 'detail')).toBe(`${kind} not found`);

    const again = await request(t.app, 'DELETE', `${path}/${id}`, { headers });
    expect(again.status).toBe(404);
  });

  test('missing name is a bad request', async () => {
    const res = await request(t.app, 'POST', path, { body: {}, headers });
    expect(res.status).toBe(400);
    expect(field(field(res.body, 'error'), 'code')).toBe('VALIDATION.SCHEMA');
  });
});

describe('Image create options', () => {
  test('explicit fields override the defaults', async () => {
    const t = await createTestApp(new MemoryPersistence());
    const headers = { 'X-Auth-Token': await login(t.app, 'admin', 'secret') };

    const res = await request(t.app, 'POST', '/v2/images', {
      body: { name: 'fedora', size: 2048, visibility: 'public', container_format: 'ovf', disk_format: 'raw' },
      headers,
    });

    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      name: 'fedora',
      status: 'queued',
      size: 2048,
      visibility: 'public',
      container_format: 'ovf',
      disk_format: 'raw',
    });
  });
});

describe('Persistence write failures', () => {
  class FlakyPersistence extends MemoryPersistence {
    failOn: string | undefined;

    async save(name: string, value: unknown): Promise<void> {
      if (name === this.failOn) throw new Error('disk full');
      return super.save(name, value);
    }
  }

  test('a failed flush surfaces as a 500', async () => {
    const persistence = new FlakyPersistence();
    const t = await createTestApp(persistence);
    const headers = { 'X-Auth-Token': await login(t.app, 'admin', 'secret') };
    persistence.failOn = 'images';

    const res = await request(t.app, 'POST', '/v2/images', { body: { name: 'x' }, headers });

    expect(res.status).toBe(500);
    expect(field(res.body, 'detail')).toBe('Failed to persist collection "images": disk full');
    expect(field(field(res.body, 'error'), 'code')).toBe('STORAGE.WRITE_FAILED');
  });
});
