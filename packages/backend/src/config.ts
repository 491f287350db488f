import { isLogLevel, type LogLevel } from './logger.js';
import type { PersistenceConfig } from './persistence/index.js';

export type BackendConfig = {
  port: number;
  bodyLimit: string;
  logLevel: LogLevel;
  persistence: PersistenceConfig;
};

const parseNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? `${fallback}`, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseLogLevel = (): LogLevel => {
  const level = (process.env.LOG_LEVEL ?? 'info').trim().toLowerCase();

  if (!isLogLevel(level)) {
    throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, silent (received ${level})`);
  }

  return level;
};

const hasDiscretePostgresSettings = () =>
  Boolean(
    process.env.PGHOST ||
      process.env.PGUSER ||
      process.env.PGDATABASE ||
      process.env.PGPASSWORD ||
      process.env.PGPORT
  );

const parsePersistenceConfig = (): PersistenceConfig => {
  const driver = (process.env.PERSISTENCE_DRIVER ?? 'memory').toLowerCase();

  if (driver === 'postgres') {
    const connectionString = process.env.DATABASE_URL?.trim() || undefined;

    if (!connectionString && !hasDiscretePostgresSettings()) {
      throw new Error(
        'DATABASE_URL (or PGHOST/PGUSER/PGDATABASE/PGPASSWORD/PGPORT) must be defined when using postgres persistence'
      );
    }

    return {
      driver: 'postgres',
      connectionString,
      poolSize: Math.max(1, parseNumber(process.env.PG_POOL_SIZE, 10))
    };
  }

  if (driver === 'mongo') {
    const uri = process.env.MONGO_URI;

    if (!uri) {
      throw new Error('MONGO_URI must be defined when using mongo persistence');
    }

    return {
      driver: 'mongo',
      uri,
      database: process.env.MONGO_DATABASE ?? 'hoardsync'
    };
  }

  if (driver === 'memory') {
    return { driver: 'memory' };
  }

  throw new Error(`Unsupported PERSISTENCE_DRIVER ${driver}`);
};

export const loadConfig = (): BackendConfig => ({
  port: parseNumber(process.env.PORT, 4000),
  bodyLimit: process.env.BODY_LIMIT?.trim() || '50mb',
  logLevel: parseLogLevel(),
  persistence: parsePersistenceConfig()
});
