import { randomUUID } from 'node:crypto';
import type { NextFunction, Request, Response } from 'express';
import { createLogger } from './logger.js';

const log = createLogger('http');

const REQUEST_ID_PATTERN = /^[\w.-]{1,128}$/;

export const REQUEST_ID_HEADER = 'X-Request-ID';

export const getRequestId = (res: Response): string | undefined => {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : undefined;
};

export const requestLogger = () => (req: Request, res: Response, next: NextFunction) => {
  const incoming = req.get(REQUEST_ID_HEADER);
  const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
  const startedAt = process.hrtime.bigint();

  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
    log.info(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
      requestId,
      durationMs: Math.round(durationMs * 100) / 100
    });
  });

  next();
};
