import assert from 'node:assert/strict';
import test from 'node:test';
import request from 'supertest';
import { createApp } from './app.js';
import { StoreError } from './httpError.js';
import { configureLogging } from './logger.js';
import { createMemoryPersistence, type WorldStore } from './persistence/index.js';
import { chestObject, decodeJsonItems, rawItem, snapshot, worldMeta } from './testing/snapshots.js';

configureLogging({ level: 'silent' });

const createTestApp = (store: WorldStore = createMemoryPersistence()) =>
  createApp({ store, decodeItems: decodeJsonItems });

const upload = (netTime: number) => ({
  save: snapshot(netTime, [
    chestObject([rawItem('Wood', 10), rawItem('Stone', 4)]),
    chestObject([rawItem('Resin', 6), rawItem('Wood', 2)], 'piece_chest'),
    chestObject([rawItem('Flint', 1)], 'piece_chest_iron')
  ]),
  meta: worldMeta()
});

const createSeededApp = async () => {
  const app = createTestApp();
  const response = await request(app).post('/api/worlds/upload').send(upload(100));
  assert.equal(response.status, 201);
  return app;
};

test('GET /health responds with ok status', async () => {
  const response = await request(createTestApp()).get('/health');

  assert.equal(response.status, 200);
  assert.deepEqual(response.body, { status: 'ok' });
});

test('GET /health reports an unavailable store', async () => {
  const store: WorldStore = {
    ...createMemoryPersistence(),
    ping: async () => {
      throw new StoreError('ping', new Error('connection refused'));
    }
  };

  const response = await request(createTestApp(store)).get('/health');

  assert.equal(response.status, 503);
  assert.deepEqual(response.body, { status: 'unavailable' });
});

test('responses carry a request id and reuse a well-formed incoming one', async () => {
  const app = createTestApp();

  const generated = await request(app).get('/health');
  assert.match(String(generated.headers['x-request-id']), /^[0-9a-f-]{36}$/);

  const echoed = await request(app).get('/health').set('X-Request-ID', 'trace-123');
  assert.equal(echoed.headers['x-request-id'], 'trace-123');
});

test('POST /api/worlds/upload creates and then updates a world', async () => {
  const app = createTestApp();

  const created = await request(app).post('/api/worlds/upload').send(upload(100));
  assert.equal(created.status, 201);
  assert.deepEqual(created.body, {
    worldId: 1,
    worldName: 'Midgard',
    totalChests: 3,
    totalItems: 5,
    outcome: 'created'
  });

  const updated = await request(app).post('/api/worlds/upload').send(upload(250));
  assert.equal(updated.status, 200);
  assert.equal(updated.body.outcome, 'updated');
  assert.equal(updated.body.worldId, 1);
});

test('POST /api/worlds/upload rejects a save that is not newer', async () => {
  const app = await createSeededApp();

  const response = await request(app).post('/api/worlds/upload').send(upload(100));

  assert.equal(response.status, 400);
  assert.deepEqual(response.body, {
    message: 'Uploaded save is not newer than the stored world (upload netTime 100, stored netTime 100)',
    uploadNetTime: 100,
    existingNetTime: 100
  });
});

test('POST /api/worlds/upload rejects missing documents and malformed bodies', async () => {
  const app = createTestApp();

  const missing = await request(app).post('/api/worlds/upload').send({ meta: worldMeta() });
  assert.equal(missing.status, 422);
  assert.deepEqual(missing.body, { message: 'Failed to parse world save: document is missing' });

  const malformed = await request(app)
    .post('/api/worlds/upload')
    .set('Content-Type', 'application/json')
    .send('{"save":');
  assert.equal(malformed.status, 400);
});

test('POST /api/worlds/upload rejects a numeric uid that JSON parsing rounded', async () => {
  const app = createTestApp();

  const response = await request(app)
    .post('/api/worlds/upload')
    .set('Content-Type', 'application/json')
    .send(`{"save":${JSON.stringify(upload(100).save)},"meta":{"name":"Midgard","uid":9007199254740993}}`);

  assert.equal(response.status, 422);
  assert.deepEqual(response.body, {
    message: 'Failed to parse world metadata: uid must be a signed 64-bit integer'
  });
  assert.deepEqual((await request(app).get('/api/worlds')).body, { worlds: [] });
});

test('GET /api/worlds lists stored worlds', async () => {
  const app = await createSeededApp();

  const response = await request(app).get('/api/worlds');

  assert.equal(response.status, 200);
  assert.equal(response.body.worlds.length, 1);
  assert.equal(response.body.worlds[0].uid, '9007199254740993');
});

test('GET /api/worlds/:worldId returns the world or a 404', async () => {
  const app = await createSeededApp();

  const found = await request(app).get('/api/worlds/1');
  assert.equal(found.status, 200);
  assert.equal(found.body.world.name, 'Midgard');
  assert.equal(found.body.world.netTime, 100);

  const missing = await request(app).get('/api/worlds/99');
  assert.equal(missing.status, 404);
  assert.deepEqual(missing.body, { message: 'World 99 not found' });
});

test('route ids must be positive integers', async () => {
  const app = createTestApp();

  for (const path of ['/api/worlds/abc', '/api/worlds/0', '/api/chests/-3', '/api/items/1.5']) {
    const response = await request(app).get(path);
    assert.equal(response.status, 400, path);
  }

  const response = await request(app).get('/api/worlds/abc');
  assert.deepEqual(response.body, { message: 'worldId must be a positive integer' });
});

test('GET /api/worlds/:worldId/chests lists chests of an existing world', async () => {
  const app = await createSeededApp();

  const response = await request(app).get('/api/worlds/1/chests');
  assert.equal(response.status, 200);
  assert.deepEqual(
    response.body.chests.map((chest: { id: number; prefabName: string }) => [chest.id, chest.prefabName]),
    [
      [1, 'piece_chest_wood'],
      [2, 'piece_chest'],
      [3, 'piece_chest_iron']
    ]
  );

  const missing = await request(app).get('/api/worlds/5/chests');
  assert.equal(missing.status, 404);
});

test('GET /api/worlds/:worldId/items/summary totals items by name', async () => {
  const app = await createSeededApp();

  const response = await request(app).get('/api/worlds/1/items/summary');
  assert.equal(response.status, 200);
  assert.deepEqual(response.body, { summary: { Wood: 12, Stone: 4, Resin: 6, Flint: 1 } });

  const missing = await request(app).get('/api/worlds/5/items/summary');
  assert.equal(missing.status, 404);
});

test('GET /api/chests/:chestId and /api/items/:itemId return single entities', async () => {
  const app = await createSeededApp();

  const chest = await request(app).get('/api/chests/2');
  assert.equal(chest.status, 200);
  assert.equal(chest.body.chest.worldId, 1);

  const item = await request(app).get('/api/items/3');
  assert.equal(item.status, 200);
  assert.equal(item.body.item.name, 'Resin');
  assert.equal(item.body.item.chestId, 2);

  assert.equal((await request(app).get('/api/chests/9')).status, 404);
  assert.equal((await request(app).get('/api/items/9')).status, 404);
});

test('GET /api/chests/:chestId/items paginates with defaults', async () => {
  const app = await createSeededApp();

  const firstPage = await request(app).get('/api/chests/1/items?skip=0&limit=1');
  assert.equal(firstPage.status, 200);
  assert.equal(firstPage.body.items.length, 1);
  assert.equal(firstPage.body.items[0].name, 'Wood');
  assert.equal(firstPage.body.total, 2);
  assert.equal(firstPage.body.hasMore, true);

  const defaults = await request(app).get('/api/chests/1/items');
  assert.equal(defaults.body.skip, 0);
  assert.equal(defaults.body.limit, 100);
  assert.equal(defaults.body.items.length, 2);
  assert.equal(defaults.body.hasMore, false);
});

test('GET /api/chests/:chestId/items validates pagination and the chest', async () => {
  const app = await createSeededApp();

  for (const query of ['limit=0', 'limit=1001', 'skip=-1', 'skip=abc']) {
    const response = await request(app).get(`/api/chests/1/items?${query}`);
    assert.equal(response.status, 400, query);
  }

  const tooLarge = await request(app).get('/api/chests/1/items?limit=1001');
  assert.deepEqual(tooLarge.body, { message: 'limit must be between 1 and 1000' });

  const missing = await request(app).get('/api/chests/42/items');
  assert.equal(missing.status, 404);
  assert.deepEqual(missing.body, { message: 'Chest 42 not found' });
});

test('store failures surface as an opaque 500', async () => {
  const store: WorldStore = {
    ...createMemoryPersistence(),
    listWorlds: async () => {
      throw new StoreError('listWorlds', new Error('relation "worlds" does not exist'));
    }
  };

  const response = await request(createTestApp(store)).get('/api/worlds');

  assert.equal(response.status, 500);
  assert.deepEqual(response.body, { message: 'Internal Server Error' });
});

test('unknown api routes respond with 404', async () => {
  const response = await request(createTestApp()).get('/api/unknown');

  assert.equal(response.status, 404);
  assert.deepEqual(response.body, { message: 'Route GET /api/unknown not found' });
});
