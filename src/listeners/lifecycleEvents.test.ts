import { describe, it, expect, vi, beforeEach, afterEach, type Mock, type MockInstance } from 'vitest';
import { LifecycleEventListener } from './lifecycleEvents.js';
import { loadLifecycleSnapshot } from '../db/snapshot.js';
import { MetadataCacheService } from '../services/metadataCache.service.js';
import type { LifecycleContext } from '../context.js';
import { OPERATOR, OWNER, PERIOD, T0, createTestContext } from '../__tests__/fixtures.js';

// One row that satisfies every repository's RETURNING mapper
const ANY_ROW = {
    id: 1,
    status: 'ReadyToStart',
    duration: '0',
    start_at: '0',
    pause_at: '0',
    end_at: '0',
    tier_id: 1,
    variant: 'flat',
    fee: '0',
    owner: OWNER,
    creation_timestamp: '0',
    cached_duration: '0',
};

/**
 * In-process stand-in for the mirror tables: keeps the journal and the tier
 * rows, and answers the statements the listener and the boot snapshot send.
 */
function journalingDatabase() {
    const journal = new Set<number>();
    const tierRows = new Map<number, Record<string, unknown>>();
    const tierUpserts: number[] = [];

    const query = vi.fn().mockImplementation(async (text: string, params: readonly unknown[] = []) => {
        const statement = text.trim();
        if (statement.startsWith('INSERT INTO lifecycle_events')) {
            const sequence = Number(params[0]);
            const fresh = !journal.has(sequence);
            journal.add(sequence);
            return { rows: [], rowCount: fresh ? 1 : 0 };
        }
        if (statement.startsWith('INSERT INTO tiers')) {
            const [id, status, duration, start_at, pause_at, end_at] = params;
            const row = { id, status, duration, start_at, pause_at, end_at };
            tierRows.set(Number(id), row);
            tierUpserts.push(Number(id));
            return { rows: [row], rowCount: 1 };
        }
        if (statement.includes('FROM tiers')) {
            return { rows: [...tierRows.values()], rowCount: tierRows.size };
        }
        if (statement.includes('MAX(sequence)')) {
            return { rows: [{ last_sequence: Math.max(0, ...journal) }], rowCount: 1 };
        }
        return { rows: [], rowCount: 0 };
    });
    const client = { query, release: vi.fn() };

    return { journal, tierUpserts, query, connect: vi.fn().mockResolvedValue(client) };
}

describe('LifecycleEventListener', () => {
    let context: LifecycleContext;
    let client: { query: Mock; release: Mock };
    let db: { connect: Mock };
    let redis: { del: Mock };
    let consoleLogSpy: MockInstance<typeof console.log>;
    let consoleErrorSpy: MockInstance<typeof console.error>;

    const statements = () => client.query.mock.calls.map((call) => String(call[0]).trim().split(/\s+/).slice(0, 3).join(' '));

    beforeEach(() => {
        ({ context } = createTestContext());
        client = {
            query: vi.fn().mockResolvedValue({ rows: [ANY_ROW], rowCount: 1 }),
            release: vi.fn(),
        };
        db = { connect: vi.fn().mockResolvedValue(client) };
        redis = { del: vi.fn().mockResolvedValue(1) };
        consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => { });
        consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        consoleLogSpy.mockRestore();
        consoleErrorSpy.mockRestore();
    });

    it('journals and projects each event in one transaction', async () => {
        const listener = new LifecycleEventListener(db, new MetadataCacheService(redis));
        listener.start(context.eventLog);

        context.lifecycle.setDuration(OPERATOR, 1, PERIOD);
        await listener.drain();

        expect(consoleLogSpy).toHaveBeenCalledWith('[LifecycleEventListener] Listening for events...');
        expect(statements()).toEqual(['BEGIN', 'INSERT INTO lifecycle_events', 'INSERT INTO tiers', 'COMMIT']);
        expect(client.query.mock.calls[2][1]).toEqual([1, 'ReadyToStart', PERIOD, 0, 0, 0]);
        expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('skips the projection of a sequence that was already journaled', async () => {
        const listener = new LifecycleEventListener(db, new MetadataCacheService(redis));
        listener.start(context.eventLog);
        client.query
            .mockResolvedValueOnce({ rows: [], rowCount: null })
            .mockResolvedValueOnce({ rows: [], rowCount: 0 });

        context.lifecycle.setDuration(OPERATOR, 1, PERIOD);
        await listener.drain();

        expect(statements()).toEqual(['BEGIN', 'INSERT INTO lifecycle_events', 'COMMIT']);
    });

    it('handles events committed before it started', async () => {
        context.lifecycle.setDuration(OPERATOR, 1, PERIOD);
        const listener = new LifecycleEventListener(db, new MetadataCacheService(redis));

        listener.start(context.eventLog);
        await listener.drain();

        expect(statements()).toEqual(['BEGIN', 'INSERT INTO lifecycle_events', 'INSERT INTO tiers', 'COMMIT']);
    });

    it('keeps mirroring after a restart on the same database', async () => {
        const database = journalingDatabase();
        const cache = new MetadataCacheService(redis);

        const first = createTestContext().context;
        const firstListener = new LifecycleEventListener(database, cache);
        firstListener.start(first.eventLog);
        first.lifecycle.setDuration(OPERATOR, 1, PERIOD);
        await firstListener.drain();
        firstListener.stop();

        const second = createTestContext().context;
        second.restore(await loadLifecycleSnapshot(database));
        const secondListener = new LifecycleEventListener(database, cache);
        secondListener.start(second.eventLog);
        second.lifecycle.setDuration(OPERATOR, 2, PERIOD);
        await secondListener.drain();

        expect(database.tierUpserts).toEqual([1, 2]);
        expect([...database.journal]).toEqual([1, 2]);
        expect(second.lifecycle.getTier(1)).toEqual({ id: 1, status: 'ReadyToStart', duration: PERIOD, start: 0, pause: 0, end: 0 });
    });

    it('projects minted assets and drops their cached metadata', async () => {
        const listener = new LifecycleEventListener(db, new MetadataCacheService(redis));
        context.lifecycle.setDuration(OPERATOR, 1, PERIOD);
        listener.start(context.eventLog);

        context.issuance.mintBatch(OPERATOR, 1, [OWNER]);
        await listener.drain();

        expect(client.query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO assets'), [1, 1, OWNER, T0, PERIOD]);
        expect(redis.del).toHaveBeenCalledWith('asset_metadata:1');
    });

    it('rolls back a failed event, logs it and keeps handling later ones', async () => {
        const listener = new LifecycleEventListener(db, new MetadataCacheService(redis));
        listener.start(context.eventLog);
        client.query
            .mockResolvedValueOnce({ rows: [], rowCount: null })
            .mockRejectedValueOnce(new Error('db down'));

        context.lifecycle.setDuration(OPERATOR, 1, PERIOD);
        context.fees.setFee(OPERATOR, 1, 5n);
        await listener.drain();

        expect(statements().slice(0, 3)).toEqual(['BEGIN', 'INSERT INTO lifecycle_events', 'ROLLBACK']);
        expect(consoleErrorSpy).toHaveBeenCalledWith(
            '[LifecycleEventListener] Failed to process TierPhaseChanged event #1: db down'
        );
        expect(client.query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO tier_fees'), [1, 'flat', '5']);
        expect(client.release).toHaveBeenCalledTimes(2);
    });

    it('only invalidates the cache when no database is configured', async () => {
        const listener = new LifecycleEventListener(null, new MetadataCacheService(redis));
        context.lifecycle.setDuration(OPERATOR, 1, PERIOD);
        listener.start(context.eventLog);

        context.issuance.mintBatch(OPERATOR, 1, [OWNER, OWNER]);
        await listener.drain();

        expect(db.connect).not.toHaveBeenCalled();
        expect(redis.del).toHaveBeenCalledWith('asset_metadata:1', 'asset_metadata:2');
    });

    it('ignores events after it stops', async () => {
        const listener = new LifecycleEventListener(db, new MetadataCacheService(redis));
        listener.start(context.eventLog);
        listener.stop();

        context.lifecycle.setDuration(OPERATOR, 1, PERIOD);
        await listener.drain();

        expect(consoleLogSpy).toHaveBeenCalledWith('[LifecycleEventListener] Stopped listening.');
        expect(db.connect).not.toHaveBeenCalled();
    });
});
