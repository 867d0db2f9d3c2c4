export { withTransaction, type ClientSource, type Queryable, type TransactionClient } from './queryable.js'
export { TiersRepository } from './tiersRepository.js'
export { TierFeesRepository } from './tierFeesRepository.js'
export { AssetsRepository, type RenewAssetInput } from './assetsRepository.js'
export { LifecycleEventsRepository } from './lifecycleEventsRepository.js'
