import type { LifecycleSnapshot, LifecycleTimings } from './types/lifecycle.js'
import { DEFAULT_MAX_BATCH_SIZE, DEFAULT_TIMINGS } from './config/limits.js'
import { TierRepository } from './repositories/tier.repository.js'
import { FeeRepository } from './repositories/fee.repository.js'
import {
  InMemoryAssetRegistry,
  type AssetRegistry,
  type RestorableAssetRegistry,
} from './repositories/asset.repository.js'
import { ApiKeyAccessControl } from './services/accessControl.js'
import { systemClock, type Clock } from './services/clock.js'
import { LifecycleEventLog } from './services/eventLog.js'
import { Ledger, type Checkpointable } from './services/ledger.js'
import { LifecycleService } from './services/lifecycle.service.js'
import { FeeScheduleService } from './services/feeSchedule.service.js'
import { AssetTemporalStateService } from './services/assetTemporalState.service.js'
import { AssetIssuanceService } from './services/assetIssuance.service.js'

export interface LifecycleContextOptions {
  clock?: Clock
  timings?: LifecycleTimings
  maxBatchSize?: number
  accessControl?: ApiKeyAccessControl
  assets?: RestorableAssetRegistry & Checkpointable
}

export interface LifecycleContext {
  clock: Clock
  timings: LifecycleTimings
  accessControl: ApiKeyAccessControl
  eventLog: LifecycleEventLog
  assets: AssetRegistry
  lifecycle: LifecycleService
  fees: FeeScheduleService
  temporalState: AssetTemporalStateService
  issuance: AssetIssuanceService
  /** Loads persisted state into a context that has not committed anything yet. */
  restore(snapshot: LifecycleSnapshot): void
}

/**
 * Builds one set of stores and the services that share them.
 * Nothing here is global; every app or test gets its own context.
 */
export function createLifecycleContext(options: LifecycleContextOptions = {}): LifecycleContext {
  const clock = options.clock ?? systemClock
  const timings = options.timings ?? DEFAULT_TIMINGS
  const maxBatchSize = options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE
  const accessControl = options.accessControl ?? new ApiKeyAccessControl()
  const assets = options.assets ?? new InMemoryAssetRegistry()

  const tierStore = new TierRepository()
  const feeStore = new FeeRepository()
  const eventLog = new LifecycleEventLog()
  const ledger = new Ledger([tierStore, feeStore, assets], eventLog)

  const lifecycle = new LifecycleService({ tiers: tierStore, assets, ledger, accessControl, clock, timings })
  const fees = new FeeScheduleService({ fees: feeStore, lifecycle, ledger, accessControl, clock })
  const temporalState = new AssetTemporalStateService({
    tiers: tierStore,
    assets,
    fees,
    ledger,
    accessControl,
    clock,
    timings,
    maxBatchSize,
  })
  const issuance = new AssetIssuanceService({ tiers: tierStore, assets, ledger, accessControl, clock, maxBatchSize })

  const restore = (snapshot: LifecycleSnapshot) => {
    eventLog.resumeAfter(snapshot.lastSequence)
    for (const tier of snapshot.tiers) {
      tierStore.save(tier)
    }
    for (const { tierId, variant, fee } of snapshot.fees) {
      feeStore.set(tierId, variant, fee)
    }
    for (const asset of snapshot.assets) {
      assets.restore(asset)
    }
  }

  return { clock, timings, accessControl, eventLog, assets, lifecycle, fees, temporalState, issuance, restore }
}
