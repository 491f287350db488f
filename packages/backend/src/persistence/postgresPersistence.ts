import { Pool, type PoolClient, type QueryResultRow } from 'pg';
import type { Chest, ChestDraft, Item, ItemDraft, World, WorldDraft } from '@hoardsync/domain';
import { StoreError } from '../httpError.js';
import { createLogger } from '../logger.js';
import { bindAbortSignal, ensureNotAborted, runStoreOperation } from './guards.js';
import type { StoreTransaction, WorldStore } from './index.js';
import { SCHEMA_SQL } from './postgresSchema.js';

type PostgresPersistenceOptions = {
  connectionString?: string;
  poolSize?: number;
  pool?: Pool;
};

// BIGINT columns arrive as strings, TIMESTAMPTZ as Date.
type WorldRow = {
  id: string;
  uid: string;
  version: number;
  net_time: number;
  modified_time: string;
  name: string;
  seed: string;
  seed_name: string;
  created_at: Date;
  updated_at: Date;
};

type ChestRow = {
  id: string;
  world_id: string;
  prefab_name: string;
  creator_id: string;
  position_x: number;
  position_y: number;
  position_z: number;
  sector_x: number;
  sector_y: number;
  rotation_x: number;
  rotation_y: number;
  rotation_z: number;
};

type ItemRow = {
  id: string;
  chest_id: string;
  name: string;
  quantity: number;
  durability: number;
  quality: number;
  variant: number;
  position_x: number;
  position_y: number;
  equipped: boolean;
  crafter_id: string;
  crafter_name: string | null;
};

type SummaryRow = {
  name: string;
  total: string;
};

const log = createLogger('postgres');

export const toWorld = (row: WorldRow): World => ({
  id: Number(row.id),
  uid: row.uid,
  version: row.version,
  netTime: row.net_time,
  modifiedTime: Number(row.modified_time),
  name: row.name,
  seed: Number(row.seed),
  seedName: row.seed_name,
  createdAt: row.created_at.toISOString(),
  updatedAt: row.updated_at.toISOString()
});

export const toChest = (row: ChestRow): Chest => ({
  id: Number(row.id),
  worldId: Number(row.world_id),
  prefabName: row.prefab_name,
  creatorId: row.creator_id,
  positionX: row.position_x,
  positionY: row.position_y,
  positionZ: row.position_z,
  sectorX: row.sector_x,
  sectorY: row.sector_y,
  rotationX: row.rotation_x,
  rotationY: row.rotation_y,
  rotationZ: row.rotation_z
});

export const toItem = (row: ItemRow): Item => ({
  id: Number(row.id),
  chestId: Number(row.chest_id),
  name: row.name,
  quantity: row.quantity,
  durability: row.durability,
  quality: row.quality,
  variant: row.variant,
  positionX: row.position_x,
  positionY: row.position_y,
  equipped: row.equipped,
  crafterId: row.crafter_id,
  crafterName: row.crafter_name
});

const worldValues = (draft: WorldDraft) => [
  draft.uid,
  draft.version,
  draft.netTime,
  draft.modifiedTime,
  draft.name,
  draft.seed,
  draft.seedName
];

const INSERT_WORLD_SQL = `
  INSERT INTO worlds (uid, version, net_time, modified_time, name, seed, seed_name)
  VALUES ($1, $2, $3, $4, $5, $6, $7)
  ON CONFLICT (uid) DO NOTHING
  RETURNING *`;

const UPDATE_WORLD_SQL = `
  UPDATE worlds
     SET version = $2, net_time = $3, modified_time = $4, name = $5, seed = $6, seed_name = $7, updated_at = now()
   WHERE id = $1
  RETURNING *`;

// One array parameter per column.
const INSERT_CHESTS_SQL = `
  INSERT INTO chests (world_id, prefab_name, creator_id, position_x, position_y, position_z,
                      sector_x, sector_y, rotation_x, rotation_y, rotation_z)
  SELECT * FROM unnest($1::bigint[], $2::text[], $3::bigint[], $4::float8[], $5::float8[], $6::float8[],
                       $7::int[], $8::int[], $9::float8[], $10::float8[], $11::float8[])
  RETURNING *`;

const INSERT_ITEMS_SQL = `
  INSERT INTO items (chest_id, name, quantity, durability, quality, variant,
                     position_x, position_y, equipped, crafter_id, crafter_name)
  SELECT * FROM unnest($1::bigint[], $2::text[], $3::int[], $4::float8[], $5::int[], $6::int[],
                       $7::int[], $8::int[], $9::bool[], $10::bigint[], $11::text[])`;

const SUMMARY_SQL = `
  SELECT i.name, SUM(i.quantity)::bigint AS total
    FROM items i
    JOIN chests c ON c.id = i.chest_id
   WHERE c.world_id = $1
   GROUP BY i.name
   ORDER BY i.name`;

const chestColumns = (drafts: ChestDraft[]) => [
  drafts.map((draft) => draft.worldId),
  drafts.map((draft) => draft.prefabName),
  drafts.map((draft) => draft.creatorId),
  drafts.map((draft) => draft.positionX),
  drafts.map((draft) => draft.positionY),
  drafts.map((draft) => draft.positionZ),
  drafts.map((draft) => draft.sectorX),
  drafts.map((draft) => draft.sectorY),
  drafts.map((draft) => draft.rotationX),
  drafts.map((draft) => draft.rotationY),
  drafts.map((draft) => draft.rotationZ)
];

const itemColumns = (drafts: ItemDraft[]) => [
  drafts.map((draft) => draft.chestId),
  drafts.map((draft) => draft.name),
  drafts.map((draft) => draft.quantity),
  drafts.map((draft) => draft.durability),
  drafts.map((draft) => draft.quality),
  drafts.map((draft) => draft.variant),
  drafts.map((draft) => draft.positionX),
  drafts.map((draft) => draft.positionY),
  drafts.map((draft) => draft.equipped),
  drafts.map((draft) => draft.crafterId),
  drafts.map((draft) => draft.crafterName)
];

const createTransaction = (client: PoolClient): StoreTransaction => ({
  lockWorldByUid: (uid) =>
    runStoreOperation('lockWorldByUid', async () => {
      const result = await client.query<WorldRow>('SELECT * FROM worlds WHERE uid = $1 FOR UPDATE', [uid]);
      const row = result.rows[0];
      return row ? toWorld(row) : null;
    }),
  insertWorld: (draft) =>
    runStoreOperation('insertWorld', async () => {
      const result = await client.query<WorldRow>(INSERT_WORLD_SQL, worldValues(draft));
      const row = result.rows[0];
      return row ? toWorld(row) : null;
    }),
  updateWorld: (id, draft) =>
    runStoreOperation('updateWorld', async () => {
      const [, ...values] = worldValues(draft);
      const result = await client.query<WorldRow>(UPDATE_WORLD_SQL, [id, ...values]);
      const row = result.rows[0];

      if (!row) {
        throw new StoreError('updateWorld', new Error(`World ${id} does not exist`));
      }

      return toWorld(row);
    }),
  deleteChestsByWorld: (worldId) =>
    runStoreOperation('deleteChestsByWorld', async () => {
      await client.query('DELETE FROM items WHERE chest_id IN (SELECT id FROM chests WHERE world_id = $1)', [worldId]);
      const result = await client.query('DELETE FROM chests WHERE world_id = $1', [worldId]);
      return result.rowCount ?? 0;
    }),
  insertChests: (drafts) =>
    runStoreOperation('insertChests', async () => {
      if (drafts.length === 0) {
        return [];
      }

      const result = await client.query<ChestRow>(INSERT_CHESTS_SQL, chestColumns(drafts));

      if (result.rows.length !== drafts.length) {
        throw new StoreError(
          'insertChests',
          new Error(`Inserted ${result.rows.length} chests for ${drafts.length} drafts`)
        );
      }

      // Identity values are handed out in insertion order.
      return result.rows.map(toChest).sort((a, b) => a.id - b.id);
    }),
  insertItems: (drafts) =>
    runStoreOperation('insertItems', async () => {
      if (drafts.length === 0) {
        return 0;
      }

      const result = await client.query(INSERT_ITEMS_SQL, itemColumns(drafts));
      return result.rowCount ?? 0;
    })
});

export const createPostgresPersistence = ({
  connectionString,
  poolSize = 10,
  pool: providedPool
}: PostgresPersistenceOptions): WorldStore => {
  const pool =
    providedPool ??
    new Pool({
      connectionString,
      max: poolSize,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000
    });

  pool.on('error', (error) => {
    log.error('Idle client error', { error });
  });

  let schemaPromise: Promise<void> | null = null;

  const ensureSchema = (): Promise<void> => {
    if (!schemaPromise) {
      schemaPromise = runStoreOperation('ensureSchema', async () => {
        await pool.query(SCHEMA_SQL);
        log.debug('Schema ready');
      }).catch((error: unknown) => {
        schemaPromise = null;
        throw error;
      });
    }

    return schemaPromise;
  };

  const query = async <R extends QueryResultRow>(operation: string, text: string, values: unknown[] = []) => {
    await ensureSchema();
    return runStoreOperation(operation, async () => (await pool.query<R>(text, values)).rows);
  };

  const inTransaction = async <T>(
    begin: string,
    work: (client: PoolClient) => Promise<T>,
    signal?: AbortSignal
  ): Promise<T> => {
    await ensureSchema();
    const client = await runStoreOperation('connect', () => pool.connect());
    let broken = false;

    try {
      await runStoreOperation('begin', () => client.query(begin));
      const result = await work(client);
      ensureNotAborted(signal);
      await runStoreOperation('commit', () => client.query('COMMIT'));
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        broken = true;
        log.error('Rollback failed', { error: rollbackError });
      }
      throw error;
    } finally {
      client.release(broken);
    }
  };

  return {
    transaction: (work, { signal } = {}) =>
      inTransaction('BEGIN', (client) => work(bindAbortSignal(createTransaction(client), signal)), signal),
    async getWorld(id) {
      const [row] = await query<WorldRow>('getWorld', 'SELECT * FROM worlds WHERE id = $1', [id]);
      return row ? toWorld(row) : null;
    },
    async listWorlds() {
      const rows = await query<WorldRow>('listWorlds', 'SELECT * FROM worlds ORDER BY id');
      return rows.map(toWorld);
    },
    async getChest(id) {
      const [row] = await query<ChestRow>('getChest', 'SELECT * FROM chests WHERE id = $1', [id]);
      return row ? toChest(row) : null;
    },
    async listChestsInWorld(worldId) {
      const rows = await query<ChestRow>(
        'listChestsInWorld',
        'SELECT * FROM chests WHERE world_id = $1 ORDER BY id',
        [worldId]
      );
      return rows.map(toChest);
    },
    async getItem(id) {
      const [row] = await query<ItemRow>('getItem', 'SELECT * FROM items WHERE id = $1', [id]);
      return row ? toItem(row) : null;
    },
    listItemsInChest: (chestId, { skip, limit }) =>
      // One snapshot for both statements so the page and its total agree.
      inTransaction('BEGIN TRANSACTION ISOLATION LEVEL REPEATABLE READ READ ONLY', (client) =>
        runStoreOperation('listItemsInChest', async () => {
          const page = await client.query<ItemRow>(
            'SELECT * FROM items WHERE chest_id = $1 ORDER BY id LIMIT $2 OFFSET $3',
            [chestId, limit, skip]
          );
          const count = await client.query<{ total: number }>(
            'SELECT COUNT(*)::int AS total FROM items WHERE chest_id = $1',
            [chestId]
          );

          return { items: page.rows.map(toItem), total: count.rows[0]?.total ?? 0 };
        })
      ),
    async summarizeItemsInWorld(worldId) {
      const rows = await query<SummaryRow>('summarizeItemsInWorld', SUMMARY_SQL, [worldId]);
      return Object.fromEntries(rows.map((row) => [row.name, Number(row.total)]));
    },
    async ping() {
      await runStoreOperation('ping', () => pool.query('SELECT 1'));
    },
    async close() {
      await pool.end();
    }
  };
};
