import type { RecordedEvent } from '../types/lifecycle.js';
import type { LifecycleEventLog } from '../services/eventLog.js';
import type { MetadataCacheService } from '../services/metadataCache.service.js';
import {
    AssetsRepository,
    LifecycleEventsRepository,
    TierFeesRepository,
    TiersRepository,
    withTransaction,
    type ClientSource,
    type Queryable,
} from '../db/repositories/index.js';

export interface LifecycleProjectionRepositories {
    tiers: TiersRepository;
    fees: TierFeesRepository;
    assets: AssetsRepository;
    journal: LifecycleEventsRepository;
}

export function createProjectionRepositories(db: Queryable): LifecycleProjectionRepositories {
    return {
        tiers: new TiersRepository(db),
        fees: new TierFeesRepository(db),
        assets: new AssetsRepository(db),
        journal: new LifecycleEventsRepository(db),
    };
}

/**
 * Mirrors committed lifecycle events into PostgreSQL and drops cached
 * asset presentation whenever a metadata refresh is announced.
 * Events are handled one at a time, in commit order; each event is
 * journaled and projected in one transaction.
 */
export class LifecycleEventListener {
    private unsubscribe: (() => void) | null = null;
    private queue: Promise<void> = Promise.resolve();

    constructor(
        private readonly database: ClientSource | null,
        private readonly metadataCache: MetadataCacheService
    ) {}

    /**
     * Handles every event already in the log, then each one committed later.
     */
    public start(eventLog: LifecycleEventLog) {
        if (this.unsubscribe) {
            return;
        }
        const enqueue = (event: RecordedEvent) => {
            this.queue = this.queue.then(() => this.handle(event));
        };
        eventLog.list(0, eventLog.size).forEach(enqueue);
        this.unsubscribe = eventLog.subscribe(enqueue);
        console.log('[LifecycleEventListener] Listening for events...');
    }

    public stop() {
        if (this.unsubscribe) {
            this.unsubscribe();
            this.unsubscribe = null;
            console.log('[LifecycleEventListener] Stopped listening.');
        }
    }

    /**
     * Resolves once every event received so far has been handled.
     */
    public drain(): Promise<void> {
        return this.queue;
    }

    private async handle(event: RecordedEvent): Promise<void> {
        try {
            if (this.database) {
                await withTransaction(this.database, async (client) => {
                    const repositories = createProjectionRepositories(client);
                    // a replayed sequence was projected the first time
                    if (await repositories.journal.append(event)) {
                        await this.project(repositories, event);
                    }
                });
            }

            if (event.type === 'MetadataUpdate') {
                await this.metadataCache.invalidate(event.assetId);
            } else if (event.type === 'BatchMetadataUpdate') {
                await this.metadataCache.invalidateRange(event.fromAssetId, event.toAssetId);
            }
        } catch (err: unknown) {
            const e = err instanceof Error ? err : new Error(String(err));
            console.error(`[LifecycleEventListener] Failed to process ${event.type} event #${event.sequence}: ${e.message}`);
        }
    }

    private async project(repositories: LifecycleProjectionRepositories, event: RecordedEvent): Promise<void> {
        switch (event.type) {
            case 'TierPhaseChanged':
                await repositories.tiers.upsert({
                    id: event.tierId,
                    status: event.to,
                    duration: event.duration,
                    start: event.start,
                    pause: event.pause,
                    end: event.end,
                });
                break;
            case 'FeeChanged':
                await repositories.fees.upsert({ tierId: event.tierId, variant: event.variant, fee: event.fee });
                break;
            case 'AssetMinted':
                await repositories.assets.create({
                    id: event.assetId,
                    tierId: event.tierId,
                    owner: event.owner,
                    creationTimestamp: event.at,
                    cachedDuration: event.cachedDuration,
                });
                break;
            case 'AssetRenewed':
                await repositories.assets.renew({
                    id: event.assetId,
                    creationTimestamp: event.at,
                    cachedDuration: event.cachedDuration,
                });
                break;
            default:
                break;
        }
    }
}
