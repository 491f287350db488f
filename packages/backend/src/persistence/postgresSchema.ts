export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS worlds (
  id BIGINT GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
  uid BIGINT NOT NULL,
  version INTEGER NOT NULL,
  net_time DOUBLE PRECISION NOT NULL,
  modified_time BIGINT NOT NULL,
  name TEXT NOT NULL,
  seed BIGINT NOT NULL,
  seed_name TEXT NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
);

CREATE UNIQUE INDEX IF NOT EXISTS worlds_uid_key ON worlds (uid);

CREATE TABLE IF NOT EXISTS chests (
  id BIGINT GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
  world_id BIGINT NOT NULL REFERENCES worlds (id) ON DELETE CASCADE,
  prefab_name TEXT NOT NULL,
  creator_id BIGINT NOT NULL,
  position_x DOUBLE PRECISION NOT NULL,
  position_y DOUBLE PRECISION NOT NULL,
  position_z DOUBLE PRECISION NOT NULL,
  sector_x INTEGER NOT NULL,
  sector_y INTEGER NOT NULL,
  rotation_x DOUBLE PRECISION NOT NULL,
  rotation_y DOUBLE PRECISION NOT NULL,
  rotation_z DOUBLE PRECISION NOT NULL
);

CREATE INDEX IF NOT EXISTS chests_world_id_idx ON chests (world_id);

CREATE TABLE IF NOT EXISTS items (
  id BIGINT GENERATED ALWAYS AS IDENTITY PRIMARY KEY,
  chest_id BIGINT NOT NULL REFERENCES chests (id) ON DELETE CASCADE,
  name TEXT NOT NULL,
  quantity INTEGER NOT NULL CHECK (quantity >= 0),
  durability DOUBLE PRECISION NOT NULL,
  quality INTEGER NOT NULL,
  variant INTEGER NOT NULL,
  position_x INTEGER NOT NULL,
  position_y INTEGER NOT NULL,
  equipped BOOLEAN NOT NULL,
  crafter_id BIGINT NOT NULL DEFAULT 0,
  crafter_name TEXT
);

CREATE INDEX IF NOT EXISTS items_name_idx ON items (name);
CREATE INDEX IF NOT EXISTS items_chest_id_idx ON items (chest_id);
`;
