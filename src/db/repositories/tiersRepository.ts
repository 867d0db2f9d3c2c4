import type { Queryable } from './queryable.js'
import type { Tier, TierStatus } from '../../types/lifecycle.js'

type TierRow = {
  id: number
  status: TierStatus
  duration: string | number
  start_at: string | number
  pause_at: string | number
  end_at: string | number
}

const mapTier = (row: TierRow): Tier => ({
  id: row.id,
  status: row.status,
  duration: Number(row.duration),
  start: Number(row.start_at),
  pause: Number(row.pause_at),
  end: Number(row.end_at),
})

export class TiersRepository {
  constructor(private readonly db: Queryable) {}

  async upsert(tier: Tier): Promise<Tier> {
    const result = await this.db.query<TierRow>(
      `
      INSERT INTO tiers (id, status, duration, start_at, pause_at, end_at)
      VALUES ($1, $2, $3, $4, $5, $6)
      ON CONFLICT (id)
      DO UPDATE SET
        status = EXCLUDED.status,
        duration = EXCLUDED.duration,
        start_at = EXCLUDED.start_at,
        pause_at = EXCLUDED.pause_at,
        end_at = EXCLUDED.end_at,
        updated_at = NOW()
      RETURNING id, status, duration, start_at, pause_at, end_at
      `,
      [tier.id, tier.status, tier.duration, tier.start, tier.pause, tier.end]
    )

    return mapTier(result.rows[0])
  }

  async list(): Promise<Tier[]> {
    const result = await this.db.query<TierRow>(
      `
      SELECT id, status, duration, start_at, pause_at, end_at
      FROM tiers
      ORDER BY id ASC
      `
    )

    return result.rows.map(mapTier)
  }
}
