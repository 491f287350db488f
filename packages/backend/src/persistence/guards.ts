import { HttpError, RequestAbortedError, StoreError } from '../httpError.js';
import type { StoreTransaction } from './index.js';

export const wrapStoreError = (operation: string, error: unknown): Error =>
  error instanceof HttpError ? error : new StoreError(operation, error);

export const runStoreOperation = async <T>(operation: string, run: () => Promise<T>): Promise<T> => {
  try {
    return await run();
  } catch (error) {
    throw wrapStoreError(operation, error);
  }
};

export const ensureNotAborted = (signal?: AbortSignal) => {
  if (signal?.aborted) {
    throw new RequestAbortedError();
  }
};

export const bindAbortSignal = (tx: StoreTransaction, signal?: AbortSignal): StoreTransaction => {
  if (!signal) {
    return tx;
  }

  return {
    async lockWorldByUid(uid) {
      ensureNotAborted(signal);
      return tx.lockWorldByUid(uid);
    },
    async insertWorld(draft) {
      ensureNotAborted(signal);
      return tx.insertWorld(draft);
    },
    async updateWorld(id, draft) {
      ensureNotAborted(signal);
      return tx.updateWorld(id, draft);
    },
    async deleteChestsByWorld(worldId) {
      ensureNotAborted(signal);
      return tx.deleteChestsByWorld(worldId);
    },
    async insertChests(drafts) {
      ensureNotAborted(signal);
      return tx.insertChests(drafts);
    },
    async insertItems(drafts) {
      ensureNotAborted(signal);
      return tx.insertItems(drafts);
    }
  };
};
