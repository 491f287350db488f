export type World = {
  id: number;
  uid: string;
  version: number;
  netTime: number;
  modifiedTime: number;
  name: string;
  seed: number;
  seedName: string;
  createdAt: string;
  updatedAt: string;
};

export type Chest = {
  id: number;
  worldId: number;
  prefabName: string;
  creatorId: string;
  positionX: number;
  positionY: number;
  positionZ: number;
  sectorX: number;
  sectorY: number;
  rotationX: number;
  rotationY: number;
  rotationZ: number;
};

export type Item = {
  id: number;
  chestId: number;
  name: string;
  quantity: number;
  durability: number;
  quality: number;
  variant: number;
  positionX: number;
  positionY: number;
  equipped: boolean;
  crafterId: string;
  crafterName: string | null;
};

export type WorldDraft = Omit<World, 'id' | 'createdAt' | 'updatedAt'>;

export type ChestDraft = Omit<Chest, 'id'>;

export type ItemDraft = Omit<Item, 'id'>;

type UnknownRecord = Record<string, unknown>;

// Documents produced by the save decoder; every field is optional and loosely typed.

/** One in-world object: `prefabName`, `position`, `sector`, `rotation`, `longsByName`, `stringsByName`. */
export type RawObject = UnknownRecord;

/** Decoded world database: `meta.worldVersion|netTime|modified` and the `zdoList` of objects. */
export type RawSnapshot = UnknownRecord;

/** Decoded world metadata: `name`, `uid`, `seed`, `seedName`. */
export type RawMeta = UnknownRecord;

/** One inventory entry: `name`, `stack`, `durability`, `pos_x`, `pos_y`, `equipped`, `quality`, `variant`, `crafter_id`, `crafter_name`. */
export type RawItem = UnknownRecord;

export type PageRequest = {
  skip: number;
  limit: number;
};

export type Page<T> = PageRequest & {
  items: T[];
  total: number;
  hasMore: boolean;
};

export type ItemSummary = Record<string, number>;

export const createPage = <T>(items: T[], total: number, { skip, limit }: PageRequest): Page<T> => ({
  items,
  total,
  skip,
  limit,
  hasMore: skip + items.length < total
});

export const tallyItems = (items: Iterable<Pick<Item, 'name' | 'quantity'>>): ItemSummary => {
  // Item names are free-form, so `constructor` or `__proto__` must not hit Object.prototype.
  const totals = new Map<string, number>();

  for (const { name, quantity } of items) {
    totals.set(name, (totals.get(name) ?? 0) + quantity);
  }

  return Object.fromEntries(totals);
};

export const isRecord = (value: unknown): value is UnknownRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
