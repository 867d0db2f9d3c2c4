import type { LifecycleEvent, RecordedEvent } from '../types/lifecycle.js';

export type EventSubscriber = (event: RecordedEvent) => void;

/**
 * Append-only log of committed lifecycle events.
 * Events are numbered in commit order, from 1 or from just after the
 * sequence passed to `resumeAfter`; subscribers see each event once,
 * after the operation that produced it has committed.
 */
export class LifecycleEventLog {
    private events: RecordedEvent[] = [];
    private subscribers = new Set<EventSubscriber>();
    private firstSequence = 1;

    /**
     * Continues numbering after a sequence an earlier process already used.
     * Only an empty log can be resumed.
     */
    public resumeAfter(sequence: number): void {
        if (this.events.length > 0) {
            throw new Error(`Cannot resume after sequence ${sequence}: the log already holds ${this.events.length} events`);
        }
        if (!Number.isSafeInteger(sequence) || sequence < 0) {
            throw new Error(`Invalid sequence ${sequence}`);
        }
        this.firstSequence = sequence + 1;
    }

    public append(batch: readonly LifecycleEvent[]): RecordedEvent[] {
        const base = this.firstSequence + this.events.length - 1;
        const recorded: RecordedEvent[] = batch.map((event, index) => ({ ...event, sequence: base + index + 1 }));
        this.events.push(...recorded);

        for (const event of recorded) {
            for (const subscriber of this.subscribers) {
                subscriber(event);
            }
        }
        return recorded;
    }

    /**
     * Lists events with a sequence strictly greater than `afterSequence`.
     */
    public list(afterSequence = 0, limit = 100): RecordedEvent[] {
        return this.events.filter((event) => event.sequence > afterSequence).slice(0, limit);
    }

    public get size(): number {
        return this.events.length;
    }

    public subscribe(subscriber: EventSubscriber): () => void {
        this.subscribers.add(subscriber);
        return () => {
            this.subscribers.delete(subscriber);
        };
    }
}
