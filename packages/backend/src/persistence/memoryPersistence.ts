import { tallyItems, type Chest, type Item, type World } from '@hoardsync/domain';
import { StoreError } from '../httpError.js';
import { bindAbortSignal, ensureNotAborted } from './guards.js';
import type { StoreTransaction, WorldStore } from './index.js';

export type MemorySeed = {
  worlds?: World[];
  chests?: Chest[];
  items?: Item[];
};

type Tables = {
  worlds: Map<number, World>;
  chests: Map<number, Chest>;
  items: Map<number, Item>;
};

const byId = <T extends { id: number }>(a: T, b: T) => a.id - b.id;

const nextIdAfter = (rows: Iterable<{ id: number }>) => {
  let max = 0;
  for (const row of rows) {
    max = Math.max(max, row.id);
  }
  return max + 1;
};

const integrityError = (operation: string, message: string) => new StoreError(operation, new Error(message));

export const createMemoryPersistence = (seed: MemorySeed = {}): WorldStore => {
  const tables: Tables = {
    worlds: new Map((seed.worlds ?? []).map((world) => [world.id, { ...world }])),
    chests: new Map((seed.chests ?? []).map((chest) => [chest.id, { ...chest }])),
    items: new Map((seed.items ?? []).map((item) => [item.id, { ...item }]))
  };

  const sequences = {
    world: nextIdAfter(tables.worlds.values()),
    chest: nextIdAfter(tables.chests.values()),
    item: nextIdAfter(tables.items.values())
  };

  const uidLocks = new Map<string, Promise<void>>();

  const acquireUidLock = async (uid: string): Promise<() => void> => {
    const previous = uidLocks.get(uid) ?? Promise.resolve();
    let release = () => {};
    const held = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const tail = previous.then(() => held);
    uidLocks.set(uid, tail);
    await previous;

    return () => {
      release();
      if (uidLocks.get(uid) === tail) {
        uidLocks.delete(uid);
      }
    };
  };

  const findCommittedWorldByUid = (uid: string) => [...tables.worlds.values()].find((world) => world.uid === uid);

  const transaction: WorldStore['transaction'] = async (work, { signal } = {}) => {
    const heldLocks = new Map<string, () => void>();
    const stagedWorlds = new Map<number, World>();
    const clearedWorldIds = new Set<number>();
    let stagedChests: Chest[] = [];
    let stagedItems: Item[] = [];

    const findWorldByUid = (uid: string) =>
      [...stagedWorlds.values()].find((world) => world.uid === uid) ?? findCommittedWorldByUid(uid);

    const chestExists = (chestId: number) => {
      if (stagedChests.some((chest) => chest.id === chestId)) {
        return true;
      }

      const committed = tables.chests.get(chestId);
      return Boolean(committed && !clearedWorldIds.has(committed.worldId));
    };

    const tx: StoreTransaction = {
      async lockWorldByUid(uid) {
        if (!heldLocks.has(uid)) {
          heldLocks.set(uid, await acquireUidLock(uid));
        }

        const world = findWorldByUid(uid);
        return world ? { ...world } : null;
      },
      async insertWorld(draft) {
        if (findWorldByUid(draft.uid)) {
          return null;
        }

        const now = new Date().toISOString();
        const world: World = { ...draft, id: sequences.world++, createdAt: now, updatedAt: now };
        stagedWorlds.set(world.id, world);
        return { ...world };
      },
      async updateWorld(id, draft) {
        const current = stagedWorlds.get(id) ?? tables.worlds.get(id);

        if (!current) {
          throw integrityError('updateWorld', `World ${id} does not exist`);
        }

        const world: World = {
          ...current,
          ...draft,
          uid: current.uid,
          updatedAt: new Date().toISOString()
        };
        stagedWorlds.set(id, world);
        return { ...world };
      },
      async deleteChestsByWorld(worldId) {
        const committed = clearedWorldIds.has(worldId)
          ? 0
          : [...tables.chests.values()].filter((chest) => chest.worldId === worldId).length;
        const staged = stagedChests.filter((chest) => chest.worldId === worldId);
        const stagedIds = new Set(staged.map((chest) => chest.id));

        stagedChests = stagedChests.filter((chest) => chest.worldId !== worldId);
        stagedItems = stagedItems.filter((item) => !stagedIds.has(item.chestId));
        clearedWorldIds.add(worldId);

        return committed + staged.length;
      },
      async insertChests(drafts) {
        const inserted = drafts.map((draft): Chest => {
          if (!stagedWorlds.has(draft.worldId) && !tables.worlds.has(draft.worldId)) {
            throw integrityError('insertChests', `World ${draft.worldId} does not exist`);
          }

          return { ...draft, id: sequences.chest++ };
        });

        stagedChests = [...stagedChests, ...inserted];
        return inserted.map((chest) => ({ ...chest }));
      },
      async insertItems(drafts) {
        const inserted = drafts.map((draft): Item => {
          if (!chestExists(draft.chestId)) {
            throw integrityError('insertItems', `Chest ${draft.chestId} does not exist`);
          }

          return { ...draft, id: sequences.item++ };
        });

        stagedItems = [...stagedItems, ...inserted];
        return inserted.length;
      }
    };

    const commit = () => {
      for (const worldId of clearedWorldIds) {
        for (const chest of [...tables.chests.values()]) {
          if (chest.worldId !== worldId) {
            continue;
          }

          tables.chests.delete(chest.id);
          for (const item of [...tables.items.values()]) {
            if (item.chestId === chest.id) {
              tables.items.delete(item.id);
            }
          }
        }
      }

      for (const world of stagedWorlds.values()) {
        tables.worlds.set(world.id, world);
      }
      for (const chest of stagedChests) {
        tables.chests.set(chest.id, chest);
      }
      for (const item of stagedItems) {
        tables.items.set(item.id, item);
      }
    };

    try {
      const result = await work(bindAbortSignal(tx, signal));
      ensureNotAborted(signal);
      commit();
      return result;
    } finally {
      for (const release of heldLocks.values()) {
        release();
      }
    }
  };

  return {
    transaction,
    async getWorld(id) {
      const world = tables.worlds.get(id);
      return world ? { ...world } : null;
    },
    async listWorlds() {
      return [...tables.worlds.values()].sort(byId).map((world) => ({ ...world }));
    },
    async getChest(id) {
      const chest = tables.chests.get(id);
      return chest ? { ...chest } : null;
    },
    async listChestsInWorld(worldId) {
      return [...tables.chests.values()]
        .filter((chest) => chest.worldId === worldId)
        .sort(byId)
        .map((chest) => ({ ...chest }));
    },
    async getItem(id) {
      const item = tables.items.get(id);
      return item ? { ...item } : null;
    },
    async listItemsInChest(chestId, { skip, limit }) {
      const items = [...tables.items.values()].filter((item) => item.chestId === chestId).sort(byId);

      return {
        items: items.slice(skip, skip + limit).map((item) => ({ ...item })),
        total: items.length
      };
    },
    async summarizeItemsInWorld(worldId) {
      const chestIds = new Set(
        [...tables.chests.values()].filter((chest) => chest.worldId === worldId).map((chest) => chest.id)
      );

      return tallyItems([...tables.items.values()].filter((item) => chestIds.has(item.chestId)));
    },
    async ping() {},
    async close() {}
  };
};
