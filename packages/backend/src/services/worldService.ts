import type { World, WorldDraft } from '@hoardsync/domain';
import { StoreError, WorldNotNewerError } from '../httpError.js';
import { createLogger } from '../logger.js';
import type { StoreTransaction } from '../persistence/index.js';

export type SyncOutcome = 'created' | 'updated';

export type SyncResult = {
  world: World;
  outcome: SyncOutcome;
};

const log = createLogger('world');

const updateIfNewer = async (tx: StoreTransaction, existing: World, draft: WorldDraft): Promise<SyncResult> => {
  // Equal netTime means the same snapshot again, which is rejected too.
  if (draft.netTime <= existing.netTime) {
    log.info('Rejected stale snapshot', {
      uid: draft.uid,
      uploadNetTime: draft.netTime,
      existingNetTime: existing.netTime
    });
    throw new WorldNotNewerError(draft.netTime, existing.netTime);
  }

  const world = await tx.updateWorld(existing.id, draft);
  log.debug('Updated world', { worldId: world.id, netTime: world.netTime });
  return { world, outcome: 'updated' };
};

/**
 * Creates the world for `draft.uid` or overwrites it when the draft carries a newer `netTime`.
 * Must run inside the ingestion transaction: the world stays locked until it ends.
 */
export const synchronizeWorld = async (tx: StoreTransaction, draft: WorldDraft): Promise<SyncResult> => {
  const existing = await tx.lockWorldByUid(draft.uid);

  if (existing) {
    return updateIfNewer(tx, existing, draft);
  }

  const created = await tx.insertWorld(draft);

  if (created) {
    log.debug('Created world', { worldId: created.id, uid: created.uid });
    return { world: created, outcome: 'created' };
  }

  // Another ingestion created the world first; continue against its row.
  const winner = await tx.lockWorldByUid(draft.uid);

  if (!winner) {
    throw new StoreError('synchronizeWorld', new Error(`World ${draft.uid} conflicted on insert but cannot be read`));
  }

  return updateIfNewer(tx, winner, draft);
};
