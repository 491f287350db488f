import { extractWorldDraft, isRecord, parseInt64, type RawMeta, type RawSnapshot } from '@hoardsync/domain';
import { decodeItemBlob, type ItemBlobDecoder } from '../adapters/itemBlob.js';
import { ParsingError } from '../httpError.js';
import { createLogger } from '../logger.js';
import { ensureNotAborted, type WorldStore } from '../persistence/index.js';
import { replaceInventory } from './inventoryService.js';
import { synchronizeWorld, type SyncOutcome } from './worldService.js';

export type UploadDocuments = {
  save?: unknown;
  meta?: unknown;
};

export type IngestOptions = {
  decodeItems?: ItemBlobDecoder;
  signal?: AbortSignal;
};

export type IngestResult = {
  worldId: number;
  worldName: string;
  totalChests: number;
  totalItems: number;
  outcome: SyncOutcome;
};

const log = createLogger('ingest');

const parseDocument = (source: string, value: unknown): Record<string, unknown> => {
  if (value === undefined || value === null) {
    throw new ParsingError(source, 'document is missing');
  }

  let document = value;

  if (typeof value === 'string') {
    if (value.trim().length === 0) {
      throw new ParsingError(source, 'document is empty');
    }

    try {
      document = JSON.parse(value);
    } catch (error) {
      throw new ParsingError(source, error instanceof Error ? error.message : 'invalid JSON');
    }
  }

  if (!isRecord(document)) {
    throw new ParsingError(source, 'document must be an object');
  }

  if (Object.keys(document).length === 0) {
    throw new ParsingError(source, 'document is empty');
  }

  return document;
};

export const parseSnapshotDocument = (value: unknown): RawSnapshot => parseDocument('world save', value);

export const parseMetaDocument = (value: unknown): RawMeta => {
  const document = parseDocument('world metadata', value);

  // The uid is the world's identity; an unrepresentable one must not collapse onto the default.
  if (document.uid !== undefined && document.uid !== null && parseInt64(document.uid) === null) {
    throw new ParsingError('world metadata', 'uid must be a signed 64-bit integer');
  }

  return document;
};

/**
 * Merges one decoded save into the store. World synchronization and inventory replacement
 * share a transaction, so the upload is applied entirely or not at all.
 */
export const ingestSnapshot = async (
  store: WorldStore,
  { save, meta }: UploadDocuments,
  { decodeItems = decodeItemBlob, signal }: IngestOptions = {}
): Promise<IngestResult> => {
  const rawSave = parseSnapshotDocument(save);
  const rawMeta = parseMetaDocument(meta);
  const draft = extractWorldDraft(rawSave, rawMeta);
  const startedAt = Date.now();

  ensureNotAborted(signal);

  const result = await store.transaction(
    async (tx): Promise<IngestResult> => {
      const { world, outcome } = await synchronizeWorld(tx, draft);
      const counts = await replaceInventory(tx, world, rawSave, decodeItems);

      return { worldId: world.id, worldName: world.name, ...counts, outcome };
    },
    { signal }
  );

  log.info('Ingested snapshot', { ...result, uid: draft.uid, durationMs: Date.now() - startedAt });
  return result;
};
