import type { LifecycleSnapshot } from '../types/lifecycle.js'
import {
  AssetsRepository,
  LifecycleEventsRepository,
  TierFeesRepository,
  TiersRepository,
  type Queryable,
} from './repositories/index.js'

/**
 * Reads the mirrored tiers, fees and assets and the last journaled sequence.
 * Meant for boot, before anything can commit new events.
 */
export async function loadLifecycleSnapshot(db: Queryable): Promise<LifecycleSnapshot> {
  const tiers = await new TiersRepository(db).list()
  const fees = await new TierFeesRepository(db).list()
  const assets = await new AssetsRepository(db).list()
  const lastSequence = await new LifecycleEventsRepository(db).lastSequence()

  return { tiers, fees, assets, lastSequence }
}
