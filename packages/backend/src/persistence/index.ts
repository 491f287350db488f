import type {
  Chest,
  ChestDraft,
  Item,
  ItemDraft,
  ItemSummary,
  PageRequest,
  World,
  WorldDraft
} from '@hoardsync/domain';
import { createMemoryPersistence, type MemorySeed } from './memoryPersistence.js';
import { createMongoPersistence } from './mongoPersistence.js';
import { createPostgresPersistence } from './postgresPersistence.js';

/**
 * Writes available inside {@link WorldStore.transaction}. Everything staged through one
 * transaction commits together or not at all.
 */
export type StoreTransaction = {
  /** Reads the world with this uid and holds it against concurrent ingestions until the transaction ends. */
  lockWorldByUid: (uid: string) => Promise<World | null>;
  /** Resolves to `null` when a world with the same uid already exists. */
  insertWorld: (draft: WorldDraft) => Promise<World | null>;
  updateWorld: (id: number, draft: WorldDraft) => Promise<World>;
  /** Removes every chest of the world together with their items; resolves to the number of chests removed. */
  deleteChestsByWorld: (worldId: number) => Promise<number>;
  /** Resolves to the inserted chests in the order of `drafts`. */
  insertChests: (drafts: ChestDraft[]) => Promise<Chest[]>;
  insertItems: (drafts: ItemDraft[]) => Promise<number>;
};

export type TransactionOptions = {
  signal?: AbortSignal;
};

export type ItemSlice = {
  items: Item[];
  total: number;
};

export type WorldStore = {
  transaction: <T>(work: (tx: StoreTransaction) => Promise<T>, options?: TransactionOptions) => Promise<T>;
  getWorld: (id: number) => Promise<World | null>;
  listWorlds: () => Promise<World[]>;
  getChest: (id: number) => Promise<Chest | null>;
  listChestsInWorld: (worldId: number) => Promise<Chest[]>;
  getItem: (id: number) => Promise<Item | null>;
  listItemsInChest: (chestId: number, page: PageRequest) => Promise<ItemSlice>;
  summarizeItemsInWorld: (worldId: number) => Promise<ItemSummary>;
  ping: () => Promise<void>;
  close: () => Promise<void>;
};

export type MemoryPersistenceConfig = {
  driver: 'memory';
  seed?: MemorySeed;
};

export type PostgresPersistenceConfig = {
  driver: 'postgres';
  connectionString?: string;
  poolSize: number;
};

export type MongoPersistenceConfig = {
  driver: 'mongo';
  uri: string;
  database: string;
};

export type PersistenceConfig = MemoryPersistenceConfig | PostgresPersistenceConfig | MongoPersistenceConfig;

export const createPersistence = async (config: PersistenceConfig): Promise<WorldStore> => {
  switch (config.driver) {
    case 'memory':
      return createMemoryPersistence(config.seed);
    case 'postgres':
      return createPostgresPersistence({
        connectionString: config.connectionString,
        poolSize: config.poolSize
      });
    case 'mongo':
      return createMongoPersistence({
        uri: config.uri,
        database: config.database
      });
    default: {
      const exhaustive: never = config;
      throw new Error(`Unsupported persistence driver ${(exhaustive as { driver: string }).driver}`);
    }
  }
};

export { createMemoryPersistence, createMongoPersistence, createPostgresPersistence };
export { bindAbortSignal, ensureNotAborted, runStoreOperation, wrapStoreError } from './guards.js';
export type { MemorySeed };
