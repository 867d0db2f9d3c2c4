import type { Queryable } from './repositories/queryable.js'

const CREATE_TABLE_STATEMENTS = [
  `
  CREATE TABLE IF NOT EXISTS tiers (
    id INTEGER PRIMARY KEY CHECK (id BETWEEN 1 AND 65535),
    status TEXT NOT NULL CHECK (status IN ('NotLive', 'ReadyToStart', 'ReadyToLive', 'Live', 'Paused', 'Ending', 'Finished')),
    duration BIGINT NOT NULL DEFAULT 0 CHECK (duration >= 0),
    start_at BIGINT NOT NULL DEFAULT 0 CHECK (start_at >= 0),
    pause_at BIGINT NOT NULL DEFAULT 0 CHECK (pause_at >= 0),
    end_at BIGINT NOT NULL DEFAULT 0 CHECK (end_at >= 0),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    CONSTRAINT tiers_single_boundary CHECK (pause_at = 0 OR end_at = 0)
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS tier_fees (
    tier_id INTEGER NOT NULL CHECK (tier_id BETWEEN 1 AND 65535),
    variant TEXT NOT NULL CHECK (variant IN ('flat', 'discount')),
    fee NUMERIC(39, 0) NOT NULL CHECK (fee >= 0),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    PRIMARY KEY (tier_id, variant)
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS assets (
    id BIGINT PRIMARY KEY CHECK (id > 0),
    tier_id INTEGER NOT NULL REFERENCES tiers(id),
    owner TEXT NOT NULL,
    creation_timestamp BIGINT NOT NULL CHECK (creation_timestamp >= 0),
    cached_duration BIGINT NOT NULL CHECK (cached_duration >= 0),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
  `,
  `
  CREATE TABLE IF NOT EXISTS lifecycle_events (
    sequence BIGINT PRIMARY KEY,
    type TEXT NOT NULL,
    payload JSONB NOT NULL,
    occurred_at BIGINT NOT NULL,
    recorded_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )
  `,
  `CREATE INDEX IF NOT EXISTS assets_tier_id_idx ON assets (tier_id)`,
  `CREATE INDEX IF NOT EXISTS lifecycle_events_type_idx ON lifecycle_events (type)`,
] as const

export async function createSchema(db: Queryable): Promise<void> {
  for (const statement of CREATE_TABLE_STATEMENTS) {
    await db.query(statement)
  }
}
