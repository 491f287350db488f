import {
  extractChestDraft,
  extractItemDraft,
  listChestObjects,
  readItemBlob,
  type ItemDraft,
  type RawItem,
  type RawObject,
  type RawSnapshot,
  type World
} from '@hoardsync/domain';
import type { ItemBlobDecoder } from '../adapters/itemBlob.js';
import { StoreError } from '../httpError.js';
import { createLogger } from '../logger.js';
import type { StoreTransaction } from '../persistence/index.js';

export type InventoryCounts = {
  totalChests: number;
  totalItems: number;
};

const log = createLogger('inventory');

const decodeChestItems = async (
  rawObject: RawObject,
  chestId: number,
  decodeItems: ItemBlobDecoder
): Promise<RawItem[]> => {
  try {
    return await decodeItems(readItemBlob(rawObject));
  } catch (error) {
    log.warn('Skipping chest with undecodable inventory', { chestId, error });
    return [];
  }
};

/**
 * Replaces every chest and item of `world` with the chests found in `rawSave`.
 * A chest whose inventory cannot be decoded is kept without items.
 */
export const replaceInventory = async (
  tx: StoreTransaction,
  world: World,
  rawSave: RawSnapshot,
  decodeItems: ItemBlobDecoder
): Promise<InventoryCounts> => {
  const chestObjects = listChestObjects(rawSave);
  const removed = await tx.deleteChestsByWorld(world.id);
  const chests = await tx.insertChests(chestObjects.map((rawObject) => extractChestDraft(rawObject, world.id)));

  if (chests.length !== chestObjects.length) {
    throw new StoreError(
      'insertChests',
      new Error(`Expected ${chestObjects.length} chests, store returned ${chests.length}`)
    );
  }

  const itemDrafts: ItemDraft[] = [];

  for (const [index, chest] of chests.entries()) {
    const rawObject = chestObjects[index] ?? {};
    const rawItems = await decodeChestItems(rawObject, chest.id, decodeItems);
    itemDrafts.push(...rawItems.map((rawItem) => extractItemDraft(rawItem, chest.id)));
  }

  const totalItems = itemDrafts.length > 0 ? await tx.insertItems(itemDrafts) : 0;

  log.debug('Replaced inventory', {
    worldId: world.id,
    removedChests: removed,
    totalChests: chests.length,
    totalItems
  });

  return { totalChests: chests.length, totalItems };
};
