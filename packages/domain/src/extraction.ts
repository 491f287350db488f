import {
  isRecord,
  type ChestDraft,
  type ItemDraft,
  type RawItem,
  type RawMeta,
  type RawObject,
  type RawSnapshot,
  type WorldDraft
} from './models.js';

export const CHEST_PREFABS: ReadonlySet<string> = new Set([
  'piece_chest',
  'piece_chest_wood',
  'piece_chest_iron',
  'piece_chest_blackmetal'
]);

export const DEFAULT_DURABILITY = 100;

const INT64_PATTERN = /^-?\d+$/;

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

const ensureString = (value: unknown, fallback = ''): string =>
  typeof value === 'string' ? value : fallback;

const ensureNumber = (value: unknown, fallback = 0): number => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }

  return fallback;
};

const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

const ensureInteger = (value: unknown, fallback = 0): number =>
  clamp(Math.trunc(ensureNumber(value, fallback)), Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER);

// Counts, versions and grid coordinates are stored as 32-bit integers.
const ensureInt32 = (value: unknown, fallback = 0): number => clamp(ensureInteger(value, fallback), INT32_MIN, INT32_MAX);

const ensureBoolean = (value: unknown, fallback = false): boolean =>
  typeof value === 'boolean' ? value : fallback;

const toBigInt = (value: unknown): bigint | null => {
  if (typeof value === 'bigint') {
    return value;
  }

  // A number past 2^53 was already rounded when the document was parsed.
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }

  if (typeof value === 'string' && INT64_PATTERN.test(value.trim())) {
    return BigInt(value.trim());
  }

  return null;
};

/** Canonical decimal form of a signed 64-bit integer, or `null` when the value is not one. */
export const parseInt64 = (value: unknown): string | null => {
  const parsed = toBigInt(value);
  return parsed !== null && parsed >= INT64_MIN && parsed <= INT64_MAX ? parsed.toString() : null;
};

export const ensureInt64 = (value: unknown, fallback = '0'): string => parseInt64(value) ?? fallback;

const ensureRecord = (value: unknown): Record<string, unknown> => (isRecord(value) ? value : {});

export const extractWorldDraft = (rawSave: RawSnapshot, rawMeta: RawMeta): WorldDraft => {
  const meta = ensureRecord(rawSave.meta);

  return {
    uid: ensureInt64(rawMeta.uid),
    version: ensureInt32(meta.worldVersion),
    netTime: ensureNumber(meta.netTime),
    modifiedTime: ensureInteger(meta.modified),
    name: ensureString(rawMeta.name),
    seed: ensureInteger(rawMeta.seed),
    seedName: ensureString(rawMeta.seedName)
  };
};

export const extractChestDraft = (rawObject: RawObject, worldId: number): ChestDraft => {
  const position = ensureRecord(rawObject.position);
  const sector = ensureRecord(rawObject.sector);
  const rotation = ensureRecord(rawObject.rotation);
  const longs = ensureRecord(rawObject.longsByName);

  return {
    worldId,
    prefabName: ensureString(rawObject.prefabName),
    creatorId: ensureInt64(longs.creator),
    positionX: ensureNumber(position.x),
    positionY: ensureNumber(position.y),
    positionZ: ensureNumber(position.z),
    sectorX: ensureInt32(sector.x),
    sectorY: ensureInt32(sector.y),
    rotationX: ensureNumber(rotation.x),
    rotationY: ensureNumber(rotation.y),
    rotationZ: ensureNumber(rotation.z)
  };
};

export const extractItemDraft = (rawItem: RawItem, chestId: number): ItemDraft => {
  const crafterName = ensureString(rawItem.crafter_name);

  return {
    chestId,
    name: ensureString(rawItem.name),
    quantity: Math.max(0, ensureInt32(rawItem.stack)),
    durability: ensureNumber(rawItem.durability, DEFAULT_DURABILITY),
    quality: ensureInt32(rawItem.quality),
    variant: ensureInt32(rawItem.variant),
    positionX: ensureInt32(rawItem.pos_x),
    positionY: ensureInt32(rawItem.pos_y),
    equipped: ensureBoolean(rawItem.equipped),
    crafterId: ensureInt64(rawItem.crafter_id),
    crafterName: crafterName.length > 0 ? crafterName : null
  };
};

export const isChestObject = (rawObject: RawObject): boolean =>
  CHEST_PREFABS.has(ensureString(rawObject.prefabName));

export const listChestObjects = (rawSave: RawSnapshot): RawObject[] => {
  if (!Array.isArray(rawSave.zdoList)) {
    return [];
  }

  return rawSave.zdoList.filter((entry): entry is RawObject => isRecord(entry) && isChestObject(entry));
};

export const readItemBlob = (rawObject: RawObject): string => ensureString(ensureRecord(rawObject.stringsByName).items);
