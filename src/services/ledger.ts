import type { LifecycleEvent } from '../types/lifecycle.js';
import type { LifecycleEventLog } from './eventLog.js';

/**
 * A store that can take a checkpoint of its current state.
 * Calling the returned function puts the store back to that checkpoint.
 */
export interface Checkpointable {
    checkpoint(): () => void;
}

export type Emit = (event: LifecycleEvent) => void;

/**
 * Runs state changes as one unit: either every write and every event of
 * a unit commits, or the stores are rolled back and nothing is published.
 * Nested calls join the outermost unit.
 */
export class Ledger {
    private depth = 0;
    private pending: LifecycleEvent[] = [];

    constructor(
        private readonly stores: readonly Checkpointable[],
        private readonly eventLog: LifecycleEventLog
    ) {}

    public run<T>(work: (emit: Emit) => T): T {
        const emit: Emit = (event) => {
            this.pending.push(event);
        };

        if (this.depth > 0) {
            return work(emit);
        }

        const rollbacks = this.stores.map((store) => store.checkpoint());
        this.depth += 1;
        let result: T;
        try {
            result = work(emit);
        } catch (err) {
            for (const rollback of rollbacks) {
                rollback();
            }
            this.pending = [];
            throw err;
        } finally {
            this.depth -= 1;
        }

        const committed = this.pending;
        this.pending = [];
        this.eventLog.append(committed);
        return result;
    }
}
