import type { Chest, Item, World, WorldDraft } from '@hoardsync/domain';
import type { ClientSession, Collection, Db, MongoClient } from 'mongodb';
import { StoreError } from '../httpError.js';
import { createLogger } from '../logger.js';
import { bindAbortSignal, ensureNotAborted, runStoreOperation } from './guards.js';
import type { StoreTransaction, WorldStore } from './index.js';

type MongoPersistenceOptions = {
  uri: string;
  database: string;
};

type WorldDocument = WorldDraft & {
  _id: number;
  createdAt: Date;
  updatedAt: Date;
  // Bumped by every ingestion so concurrent transactions on one world conflict.
  revision: number;
};

type ChestDocument = Omit<Chest, 'id'> & { _id: number };

type ItemDocument = Omit<Item, 'id'> & { _id: number };

type CounterDocument = {
  _id: string;
  seq: number;
};

type Collections = {
  client: MongoClient;
  db: Db;
  worlds: Collection<WorldDocument>;
  chests: Collection<ChestDocument>;
  items: Collection<ItemDocument>;
  counters: Collection<CounterDocument>;
};

const log = createLogger('mongo');

const DUPLICATE_KEY = 11000;

export const fromWorldDocument = ({ _id, createdAt, updatedAt, revision: _revision, ...rest }: WorldDocument): World => ({
  ...rest,
  id: _id,
  createdAt: createdAt.toISOString(),
  updatedAt: updatedAt.toISOString()
});

export const fromChestDocument = ({ _id, ...rest }: ChestDocument): Chest => ({ ...rest, id: _id });

export const fromItemDocument = ({ _id, ...rest }: ItemDocument): Item => ({ ...rest, id: _id });

const isDuplicateKeyError = (error: unknown) =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY;

const loadMongoModule = async () =>
  import('mongodb').catch((error: unknown) => {
    if (
      typeof error === 'object' &&
      error !== null &&
      'code' in error &&
      error.code === 'ERR_MODULE_NOT_FOUND'
    ) {
      throw new Error(
        "MongoDB persistence requires the 'mongodb' dependency. Install it with `npm install mongodb` to enable this driver."
      );
    }

    throw error;
  });

export const createMongoPersistence = ({ uri, database }: MongoPersistenceOptions): WorldStore => {
  let collectionsPromise: Promise<Collections> | null = null;

  const connect = async (): Promise<Collections> => {
    const { MongoClient: Mongo } = await loadMongoModule();
    const client = await Mongo.connect(uri, { serverSelectionTimeoutMS: 5_000 });
    const db = client.db(database);
    const collections: Collections = {
      client,
      db,
      worlds: db.collection<WorldDocument>('worlds'),
      chests: db.collection<ChestDocument>('chests'),
      items: db.collection<ItemDocument>('items'),
      counters: db.collection<CounterDocument>('counters')
    };

    await collections.worlds.createIndex({ uid: 1 }, { unique: true });
    await collections.chests.createIndex({ worldId: 1 });
    await collections.items.createIndex({ chestId: 1 });
    await collections.items.createIndex({ name: 1 });
    log.debug('Indexes ready', { database });

    return collections;
  };

  const getCollections = (): Promise<Collections> => {
    if (!collectionsPromise) {
      collectionsPromise = runStoreOperation('connect', connect).catch((error: unknown) => {
        collectionsPromise = null;
        throw error;
      });
    }

    return collectionsPromise;
  };

  // Allocated outside the session; ids of a rolled-back transaction leave gaps.
  const allocateIds = async ({ counters }: Collections, name: string, count: number): Promise<number[]> => {
    if (count === 0) {
      return [];
    }

    const counter = await counters.findOneAndUpdate(
      { _id: name },
      { $inc: { seq: count } },
      { upsert: true, returnDocument: 'after' }
    );

    if (!counter) {
      throw new StoreError('allocateIds', new Error(`Counter ${name} was not returned`));
    }

    const first = counter.seq - count + 1;
    return Array.from({ length: count }, (_, index) => first + index);
  };

  const createTransaction = (collections: Collections, session: ClientSession): StoreTransaction => ({
    lockWorldByUid: (uid) =>
      runStoreOperation('lockWorldByUid', async () => {
        const document = await collections.worlds.findOneAndUpdate(
          { uid },
          { $inc: { revision: 1 } },
          { session, returnDocument: 'after' }
        );
        return document ? fromWorldDocument(document) : null;
      }),
    insertWorld: (draft) =>
      runStoreOperation('insertWorld', async () => {
        const [id] = await allocateIds(collections, 'worlds', 1);

        if (id === undefined) {
          throw new StoreError('insertWorld', new Error('No world id allocated'));
        }

        const now = new Date();
        const document: WorldDocument = { ...draft, _id: id, createdAt: now, updatedAt: now, revision: 0 };

        try {
          await collections.worlds.insertOne(document, { session });
        } catch (error) {
          // A duplicate key aborts the server-side transaction, so the race cannot be resolved here.
          if (isDuplicateKeyError(error)) {
            throw new StoreError('insertWorld', new Error(`World ${draft.uid} was created concurrently`));
          }
          throw error;
        }

        return fromWorldDocument(document);
      }),
    updateWorld: (id, { uid: _uid, ...fields }) =>
      runStoreOperation('updateWorld', async () => {
        const document = await collections.worlds.findOneAndUpdate(
          { _id: id },
          { $set: { ...fields, updatedAt: new Date() } },
          { session, returnDocument: 'after' }
        );

        if (!document) {
          throw new StoreError('updateWorld', new Error(`World ${id} does not exist`));
        }

        return fromWorldDocument(document);
      }),
    deleteChestsByWorld: (worldId) =>
      runStoreOperation('deleteChestsByWorld', async () => {
        const chests = await collections.chests
          .find({ worldId }, { session, projection: { _id: 1 } })
          .toArray();
        const chestIds = chests.map((chest) => chest._id);

        if (chestIds.length > 0) {
          await collections.items.deleteMany({ chestId: { $in: chestIds } }, { session });
        }

        const result = await collections.chests.deleteMany({ worldId }, { session });
        return result.deletedCount;
      }),
    insertChests: (drafts) =>
      runStoreOperation('insertChests', async () => {
        const ids = await allocateIds(collections, 'chests', drafts.length);
        const documents = drafts.map((draft, index): ChestDocument => ({ ...draft, _id: ids[index] ?? 0 }));

        if (documents.length > 0) {
          await collections.chests.insertMany(documents, { session, ordered: true });
        }

        return documents.map(fromChestDocument);
      }),
    insertItems: (drafts) =>
      runStoreOperation('insertItems', async () => {
        if (drafts.length === 0) {
          return 0;
        }

        const ids = await allocateIds(collections, 'items', drafts.length);
        const documents = drafts.map((draft, index): ItemDocument => ({ ...draft, _id: ids[index] ?? 0 }));
        const result = await collections.items.insertMany(documents, { session, ordered: true });
        return result.insertedCount;
      })
  });

  return {
    async transaction(work, { signal } = {}) {
      const collections = await getCollections();
      const session = collections.client.startSession();

      try {
        // Started and committed by hand: the driver's withTransaction helper would retry the work.
        session.startTransaction({ readConcern: { level: 'snapshot' } });
        const result = await work(bindAbortSignal(createTransaction(collections, session), signal));
        ensureNotAborted(signal);
        await runStoreOperation('commit', () => session.commitTransaction());
        return result;
      } catch (error) {
        if (session.inTransaction()) {
          try {
            await session.abortTransaction();
          } catch (abortError) {
            log.error('Abort transaction failed', { error: abortError });
          }
        }
        throw error;
      } finally {
        await session.endSession();
      }
    },
    async getWorld(id) {
      const { worlds } = await getCollections();
      const document = await runStoreOperation('getWorld', () => worlds.findOne({ _id: id }));
      return document ? fromWorldDocument(document) : null;
    },
    async listWorlds() {
      const { worlds } = await getCollections();
      const documents = await runStoreOperation('listWorlds', () => worlds.find({}).sort({ _id: 1 }).toArray());
      return documents.map(fromWorldDocument);
    },
    async getChest(id) {
      const { chests } = await getCollections();
      const document = await runStoreOperation('getChest', () => chests.findOne({ _id: id }));
      return document ? fromChestDocument(document) : null;
    },
    async listChestsInWorld(worldId) {
      const { chests } = await getCollections();
      const documents = await runStoreOperation('listChestsInWorld', () =>
        chests.find({ worldId }).sort({ _id: 1 }).toArray()
      );
      return documents.map(fromChestDocument);
    },
    async getItem(id) {
      const { items } = await getCollections();
      const document = await runStoreOperation('getItem', () => items.findOne({ _id: id }));
      return document ? fromItemDocument(document) : null;
    },
    async listItemsInChest(chestId, { skip, limit }) {
      const { client, items } = await getCollections();
      // Snapshot session so the page and its total come from the same point in time.
      const session = client.startSession({ snapshot: true });

      try {
        return await runStoreOperation('listItemsInChest', async () => {
          const page = await items
            .find({ chestId }, { session })
            .sort({ _id: 1 })
            .skip(skip)
            .limit(limit)
            .toArray();
          const total = await items.countDocuments({ chestId }, { session });
          return { items: page.map(fromItemDocument), total };
        });
      } finally {
        await session.endSession();
      }
    },
    async summarizeItemsInWorld(worldId) {
      const { chests } = await getCollections();
      const rows = await runStoreOperation('summarizeItemsInWorld', () =>
        chests
          .aggregate<{ _id: string; total: number }>([
            { $match: { worldId } },
            { $lookup: { from: 'items', localField: '_id', foreignField: 'chestId', as: 'items' } },
            { $unwind: '$items' },
            { $group: { _id: '$items.name', total: { $sum: '$items.quantity' } } },
            { $sort: { _id: 1 } }
          ])
          .toArray()
      );
      return Object.fromEntries(rows.map((row) => [row._id, row.total]));
    },
    async ping() {
      const { db } = await getCollections();
      await runStoreOperation('ping', () => db.command({ ping: 1 }));
    },
    async close() {
      if (!collectionsPromise) {
        return;
      }

      const { client } = await collectionsPromise;
      collectionsPromise = null;
      await client.close();
    }
  };
};
