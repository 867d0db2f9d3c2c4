import { describe, it, expect, vi } from 'vitest';
import { LifecycleEventLog } from './eventLog.js';

describe('LifecycleEventLog', () => {
    it('numbers events from 1 in append order', () => {
        const log = new LifecycleEventLog();

        log.append([{ type: 'MetadataUpdate', assetId: 1, at: 10 }]);
        const recorded = log.append([
            { type: 'MetadataUpdate', assetId: 2, at: 11 },
            { type: 'BatchMetadataUpdate', fromAssetId: 1, toAssetId: 2, at: 11 },
        ]);

        expect(recorded.map((event) => event.sequence)).toEqual([2, 3]);
        expect(log.size).toBe(3);
    });

    it('continues numbering after a resumed sequence', () => {
        const log = new LifecycleEventLog();
        log.resumeAfter(41);

        const recorded = log.append([
            { type: 'MetadataUpdate', assetId: 1, at: 10 },
            { type: 'MetadataUpdate', assetId: 2, at: 10 },
        ]);

        expect(recorded.map((event) => event.sequence)).toEqual([42, 43]);
        expect(log.list(42).map((event) => event.sequence)).toEqual([43]);
        expect(log.size).toBe(2);
    });

    it('only resumes an empty log', () => {
        const log = new LifecycleEventLog();
        log.append([{ type: 'MetadataUpdate', assetId: 1, at: 10 }]);

        expect(() => log.resumeAfter(5)).toThrow('Cannot resume after sequence 5: the log already holds 1 events');
        expect(() => new LifecycleEventLog().resumeAfter(-1)).toThrow('Invalid sequence -1');
    });

    it('lists events after a sequence, up to a limit', () => {
        const log = new LifecycleEventLog();
        log.append([1, 2, 3, 4].map((assetId) => ({ type: 'MetadataUpdate' as const, assetId, at: 10 })));

        expect(log.list(1, 2).map((event) => event.sequence)).toEqual([2, 3]);
        expect(log.list(4)).toEqual([]);
    });

    it('stops notifying a subscriber once unsubscribed', () => {
        const log = new LifecycleEventLog();
        const subscriber = vi.fn();
        const unsubscribe = log.subscribe(subscriber);

        log.append([{ type: 'MetadataUpdate', assetId: 1, at: 10 }]);
        unsubscribe();
        log.append([{ type: 'MetadataUpdate', assetId: 2, at: 10 }]);

        expect(subscriber).toHaveBeenCalledTimes(1);
        expect(subscriber).toHaveBeenCalledWith({ type: 'MetadataUpdate', assetId: 1, at: 10, sequence: 1 });
    });
});
