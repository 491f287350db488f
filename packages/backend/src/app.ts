import express, { type NextFunction, type Request, type Response } from 'express';
import { isRecord, type PageRequest } from '@hoardsync/domain';
import type { ItemBlobDecoder } from './adapters/itemBlob.js';
import { BadRequestError, HttpError, NotFoundError, RequestAbortedError, StoreError } from './httpError.js';
import { createLogger } from './logger.js';
import type { WorldStore } from './persistence/index.js';
import { getRequestId, requestLogger } from './requestLogger.js';
import { ingestSnapshot } from './services/ingestService.js';
import {
  getChest,
  getItem,
  getWorld,
  listChestsInWorld,
  listItemsInChest,
  listWorlds,
  summarizeItemsInWorld
} from './services/queryService.js';

type AppOptions = {
  store: WorldStore;
  bodyLimit?: string;
  decodeItems?: ItemBlobDecoder;
};

const DEFAULT_PAGE_LIMIT = 100;
const MAX_PAGE_LIMIT = 1000;

const log = createLogger('app');

const asyncHandler = (
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void> | void
) =>
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      next(error);
    }
  };

const parseId = (value: string | undefined, name: string): number => {
  const id = value && /^\d+$/.test(value) ? Number(value) : Number.NaN;

  if (!Number.isSafeInteger(id) || id < 1) {
    throw new BadRequestError(`${name} must be a positive integer`);
  }

  return id;
};

const parseQueryInteger = (value: unknown, name: string, fallback: number): number => {
  if (value === undefined) {
    return fallback;
  }

  const text = typeof value === 'string' ? value.trim() : '';
  const parsed = /^-?\d+$/.test(text) ? Number(text) : Number.NaN;

  if (!Number.isSafeInteger(parsed)) {
    throw new BadRequestError(`${name} must be an integer`);
  }

  return parsed;
};

const parsePageRequest = (query: Request['query']): PageRequest => {
  const skip = parseQueryInteger(query.skip, 'skip', 0);
  const limit = parseQueryInteger(query.limit, 'limit', DEFAULT_PAGE_LIMIT);

  if (skip < 0) {
    throw new BadRequestError('skip must be greater than or equal to 0');
  }

  if (limit < 1 || limit > MAX_PAGE_LIMIT) {
    throw new BadRequestError(`limit must be between 1 and ${MAX_PAGE_LIMIT}`);
  }

  return { skip, limit };
};

// body-parser reports malformed or oversized bodies as errors carrying a 4xx status.
const clientErrorStatus = (error: unknown): number | null => {
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  ) {
    return error.status;
  }

  return null;
};

export const createApp = ({ store, bodyLimit = '50mb', decodeItems }: AppOptions) => {
  const app = express();
  app.use(requestLogger());
  app.use(express.json({ limit: bodyLimit }));

  app.get(
    '/health',
    asyncHandler(async (_req, res) => {
      try {
        await store.ping();
      } catch (error) {
        log.warn('Store ping failed', { error });
        res.status(503).json({ status: 'unavailable' });
        return;
      }

      res.json({ status: 'ok' });
    })
  );

  const apiRouter = express.Router();

  apiRouter.post(
    '/worlds/upload',
    asyncHandler(async (req, res) => {
      const body: unknown = req.body;
      const documents = isRecord(body) ? { save: body.save, meta: body.meta } : {};
      const controller = new AbortController();
      // A client that disconnects before the response is written rolls its upload back.
      const abortOnDisconnect = () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      };

      res.on('close', abortOnDisconnect);

      try {
        const result = await ingestSnapshot(store, documents, { decodeItems, signal: controller.signal });
        res.status(result.outcome === 'created' ? 201 : 200).json(result);
      } finally {
        res.off('close', abortOnDisconnect);
      }
    })
  );

  apiRouter.get(
    '/worlds',
    asyncHandler(async (_req, res) => {
      const worlds = await listWorlds(store);
      res.json({ worlds });
    })
  );

  apiRouter.get(
    '/worlds/:worldId',
    asyncHandler(async (req, res) => {
      const world = await getWorld(store, parseId(req.params.worldId, 'worldId'));
      res.json({ world });
    })
  );

  apiRouter.get(
    '/worlds/:worldId/chests',
    asyncHandler(async (req, res) => {
      const world = await getWorld(store, parseId(req.params.worldId, 'worldId'));
      const chests = await listChestsInWorld(store, world.id);
      res.json({ chests });
    })
  );

  apiRouter.get(
    '/worlds/:worldId/items/summary',
    asyncHandler(async (req, res) => {
      const world = await getWorld(store, parseId(req.params.worldId, 'worldId'));
      const summary = await summarizeItemsInWorld(store, world.id);
      res.json({ summary });
    })
  );

  apiRouter.get(
    '/chests/:chestId',
    asyncHandler(async (req, res) => {
      const chest = await getChest(store, parseId(req.params.chestId, 'chestId'));
      res.json({ chest });
    })
  );

  apiRouter.get(
    '/chests/:chestId/items',
    asyncHandler(async (req, res) => {
      const chestId = parseId(req.params.chestId, 'chestId');
      const page = parsePageRequest(req.query);
      const chest = await getChest(store, chestId);
      res.json(await listItemsInChest(store, chest.id, page));
    })
  );

  apiRouter.get(
    '/items/:itemId',
    asyncHandler(async (req, res) => {
      const item = await getItem(store, parseId(req.params.itemId, 'itemId'));
      res.json({ item });
    })
  );

  apiRouter.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.baseUrl}${req.path} not found`));
  });

  app.use('/api', apiRouter);

  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = getRequestId(res);

    if (error instanceof HttpError) {
      if (error instanceof StoreError) {
        log.error('Store operation failed', { requestId, operation: error.operation, error: error.cause });
      } else if (error instanceof RequestAbortedError) {
        log.info('Request aborted by client', { requestId });
      }

      res.status(error.status).json(error.toJSON());
      return;
    }

    const status = clientErrorStatus(error);

    if (status !== null) {
      res.status(status).json({ message: error instanceof Error ? error.message : 'Bad Request' });
      return;
    }

    log.error('Unexpected error', { requestId, error });
    res.status(500).json({ message: 'Internal Server Error' });
  });

  return app;
};
