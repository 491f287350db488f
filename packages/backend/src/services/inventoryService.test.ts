import assert from 'node:assert/strict';
import test from 'node:test';
import type { ChestDraft, ItemDraft, World } from '@hoardsync/domain';
import { StoreError } from '../httpError.js';
import { configureLogging } from '../logger.js';
import type { StoreTransaction } from '../persistence/index.js';
import { chestObject, decodeJsonItems, rawItem, snapshot } from '../testing/snapshots.js';
import { replaceInventory } from './inventoryService.js';

configureLogging({ level: 'silent' });

const world: World = {
  id: 3,
  uid: '42',
  version: 34,
  netTime: 100,
  modifiedTime: 0,
  name: 'Midgard',
  seed: 1,
  seedName: 'abc',
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z'
};

const createTransaction = (overrides: Partial<StoreTransaction> = {}): StoreTransaction => ({
  lockWorldByUid: async () => null,
  insertWorld: async () => null,
  updateWorld: async () => world,
  deleteChestsByWorld: async () => 0,
  insertChests: async (drafts) => drafts.map((draft, index) => ({ ...draft, id: 11 + index })),
  insertItems: async (drafts) => drafts.length,
  ...overrides
});

test('replaceInventory clears the world and links items to the inserted chests', async (t) => {
  const deleteChestsByWorld = t.mock.fn(async (_worldId: number) => 4);
  const insertChests = t.mock.fn(async (drafts: ChestDraft[]) =>
    drafts.map((draft, index) => ({ ...draft, id: 11 + index }))
  );
  const insertItems = t.mock.fn(async (drafts: ItemDraft[]) => drafts.length);
  const tx = createTransaction({ deleteChestsByWorld, insertChests, insertItems });
  const save = snapshot(100, [
    chestObject([rawItem('Wood', 10)]),
    chestObject([rawItem('Stone', 2), rawItem('Flint', 1)], 'piece_chest')
  ]);

  const counts = await replaceInventory(tx, world, save, decodeJsonItems);

  assert.deepEqual(counts, { totalChests: 2, totalItems: 3 });
  assert.deepEqual(deleteChestsByWorld.mock.calls[0]?.arguments, [3]);

  const chestDrafts = insertChests.mock.calls[0]?.arguments[0] ?? [];
  assert.deepEqual(
    chestDrafts.map((draft) => [draft.worldId, draft.prefabName]),
    [
      [3, 'piece_chest_wood'],
      [3, 'piece_chest']
    ]
  );

  const itemDrafts = insertItems.mock.calls[0]?.arguments[0] ?? [];
  assert.deepEqual(
    itemDrafts.map((draft) => [draft.chestId, draft.name, draft.quantity]),
    [
      [11, 'Wood', 10],
      [12, 'Stone', 2],
      [12, 'Flint', 1]
    ]
  );
});

test('replaceInventory skips the item insert when no chest holds items', async (t) => {
  const insertItems = t.mock.fn(async (drafts: ItemDraft[]) => drafts.length);
  const tx = createTransaction({ insertItems });

  const counts = await replaceInventory(tx, world, snapshot(100, [chestObject([])]), decodeJsonItems);

  assert.deepEqual(counts, { totalChests: 1, totalItems: 0 });
  assert.equal(insertItems.mock.callCount(), 0);
});

test('replaceInventory still clears the world when the save holds no chests', async (t) => {
  const deleteChestsByWorld = t.mock.fn(async (_worldId: number) => 2);
  const tx = createTransaction({ deleteChestsByWorld });

  const counts = await replaceInventory(tx, world, { meta: {} }, decodeJsonItems);

  assert.deepEqual(counts, { totalChests: 0, totalItems: 0 });
  assert.equal(deleteChestsByWorld.mock.callCount(), 1);
});

test('replaceInventory keeps a chest without items when its decoder rejects', async () => {
  const tx = createTransaction();
  const save = snapshot(100, [chestObject([rawItem('Wood', 1)]), chestObject('broken')]);
  const decodeItems = async (blob: string) => {
    if (blob === 'broken') {
      throw new Error('unreadable');
    }
    return decodeJsonItems(blob);
  };

  const counts = await replaceInventory(tx, world, save, decodeItems);

  assert.deepEqual(counts, { totalChests: 2, totalItems: 1 });
});

test('replaceInventory fails when the store returns a different number of chests', async () => {
  const tx = createTransaction({ insertChests: async () => [] });

  await assert.rejects(
    () => replaceInventory(tx, world, snapshot(100, [chestObject([])]), decodeJsonItems),
    StoreError
  );
});
