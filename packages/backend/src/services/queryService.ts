import { createPage, tallyItems, type Item, type ItemSummary, type PageRequest } from '@hoardsync/domain';
import { NotFoundError } from '../httpError.js';
import type { WorldStore } from '../persistence/index.js';

export const listWorlds = async (store: WorldStore) => store.listWorlds();

export const getWorld = async (store: WorldStore, worldId: number) => {
  const world = await store.getWorld(worldId);

  if (!world) {
    throw new NotFoundError(`World ${worldId} not found`);
  }

  return world;
};

export const getChest = async (store: WorldStore, chestId: number) => {
  const chest = await store.getChest(chestId);

  if (!chest) {
    throw new NotFoundError(`Chest ${chestId} not found`);
  }

  return chest;
};

export const getItem = async (store: WorldStore, itemId: number) => {
  const item = await store.getItem(itemId);

  if (!item) {
    throw new NotFoundError(`Item ${itemId} not found`);
  }

  return item;
};

export const listChestsInWorld = async (store: WorldStore, worldId: number) => store.listChestsInWorld(worldId);

export const listItemsInChest = async (store: WorldStore, chestId: number, page: PageRequest) => {
  const { items, total } = await store.listItemsInChest(chestId, page);
  return createPage(items, total, page);
};

/** Total quantity per item name across every chest of the world, computed by the store. */
export const summarizeItemsInWorld = async (store: WorldStore, worldId: number): Promise<ItemSummary> =>
  store.summarizeItemsInWorld(worldId);

/** Same result as {@link summarizeItemsInWorld}, built by paging through every chest. */
export const summarizeItemsByTraversal = async (
  store: WorldStore,
  worldId: number,
  pageSize = 1000
): Promise<ItemSummary> => {
  const chests = await store.listChestsInWorld(worldId);
  const items: Item[] = [];

  for (const chest of chests) {
    let skip = 0;
    let hasMore = true;

    while (hasMore) {
      const page = await listItemsInChest(store, chest.id, { skip, limit: pageSize });
      items.push(...page.items);
      skip += page.items.length;
      hasMore = page.hasMore && page.items.length > 0;
    }
  }

  return tallyItems(items);
};
