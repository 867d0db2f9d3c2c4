import type { Queryable } from './queryable.js'
import type { FeeVariant, TierFee } from '../../types/lifecycle.js'

type TierFeeRow = {
  tier_id: number
  variant: FeeVariant
  fee: string
}

const mapTierFee = (row: TierFeeRow): TierFee => ({
  tierId: row.tier_id,
  variant: row.variant,
  fee: BigInt(row.fee),
})

export class TierFeesRepository {
  constructor(private readonly db: Queryable) {}

  async upsert(input: TierFee): Promise<TierFee> {
    const result = await this.db.query<TierFeeRow>(
      `
      INSERT INTO tier_fees (tier_id, variant, fee)
      VALUES ($1, $2, $3)
      ON CONFLICT (tier_id, variant)
      DO UPDATE SET fee = EXCLUDED.fee, updated_at = NOW()
      RETURNING tier_id, variant, fee
      `,
      [input.tierId, input.variant, input.fee.toString()]
    )

    return mapTierFee(result.rows[0])
  }

  async list(): Promise<TierFee[]> {
    const result = await this.db.query<TierFeeRow>(
      `
      SELECT tier_id, variant, fee
      FROM tier_fees
      ORDER BY tier_id ASC, variant ASC
      `
    )

    return result.rows.map(mapTierFee)
  }
}
