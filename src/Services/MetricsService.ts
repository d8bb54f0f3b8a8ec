/**
 * MetricsService keeps in-memory counters for dispatch activity.
 * Synchronous and process-local; a sharded deployment would export snapshots periodically.
 */

export interface MetricsSnapshot {
    invocations: number; // command invocations received
    completed: number; // invocations that reached Completed
    errored: number; // invocations that ended in Errored
    unhandled: number; // errored invocations no error hook handled
    timeouts: number; // response-window or autocomplete budget expiries
    autocompleteProbes: number; // autocomplete requests received
    eventsPublished: Record<string, number>; // counts per event name
    collectedAt: number; // epoch ms when snapshot taken
}

type Counter = Exclude<keyof MetricsSnapshot, `eventsPublished` | `collectedAt`>;

function __zeroed(): Record<Counter, number> {
    return {
        invocations: 0,
        completed: 0,
        errored: 0,
        unhandled: 0,
        timeouts: 0,
        autocompleteProbes: 0,
    };
}

/**
 * MetricsService – central mutable counter set.
 */
export class MetricsService {
    private _counters: Record<Counter, number> = __zeroed();
    private _events: Record<string, number> = {};

    /** Increment a named counter */
    public Inc(counter: Counter): void {
        this._counters[counter]++;
    }

    /** Increment event publish counter */
    public IncEvent(eventName: string): void {
        this._events[eventName] = (this._events[eventName] ?? 0) + 1;
    }

    /** Obtain a point-in-time immutable snapshot */
    public Snapshot(): MetricsSnapshot {
        return {
            ...this._counters,
            eventsPublished: { ...this._events },
            collectedAt: Date.now(),
        };
    }

    /** Reset all counters (primarily for tests) */
    public Reset(): void {
        this._counters = __zeroed();
        this._events = {};
    }
}

/** Global singleton instance. */
export const metricsService = new MetricsService();
