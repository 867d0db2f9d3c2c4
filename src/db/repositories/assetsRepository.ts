import type { Queryable } from './queryable.js'
import type { PersistedAsset } from '../../types/lifecycle.js'

export interface RenewAssetInput {
  id: number
  creationTimestamp: number
  cachedDuration: number
}

type AssetRow = {
  id: string | number
  tier_id: number
  owner: string
  creation_timestamp: string | number
  cached_duration: string | number
}

const mapAsset = (row: AssetRow): PersistedAsset => ({
  id: Number(row.id),
  tierId: row.tier_id,
  owner: row.owner,
  creationTimestamp: Number(row.creation_timestamp),
  cachedDuration: Number(row.cached_duration),
})

export class AssetsRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: PersistedAsset): Promise<PersistedAsset> {
    const result = await this.db.query<AssetRow>(
      `
      INSERT INTO assets (id, tier_id, owner, creation_timestamp, cached_duration)
      VALUES ($1, $2, $3, $4, $5)
      RETURNING id, tier_id, owner, creation_timestamp, cached_duration
      `,
      [input.id, input.tierId, input.owner, input.creationTimestamp, input.cachedDuration]
    )

    return mapAsset(result.rows[0])
  }

  async renew(input: RenewAssetInput): Promise<PersistedAsset | null> {
    const result = await this.db.query<AssetRow>(
      `
      UPDATE assets
      SET creation_timestamp = $2, cached_duration = $3, updated_at = NOW()
      WHERE id = $1
      RETURNING id, tier_id, owner, creation_timestamp, cached_duration
      `,
      [input.id, input.creationTimestamp, input.cachedDuration]
    )

    return result.rows[0] ? mapAsset(result.rows[0]) : null
  }

  async list(): Promise<PersistedAsset[]> {
    const result = await this.db.query<AssetRow>(
      `
      SELECT id, tier_id, owner, creation_timestamp, cached_duration
      FROM assets
      ORDER BY id ASC
      `
    )

    return result.rows.map(mapAsset)
  }
}
