import { InternalError } from '../Common/Errors.js';

/** Dispatch lifecycle states. */
export type DispatchState =
    | `Received`
    | `Resolved`
    | `Checked`
    | `Active`
    | `Executing`
    | `Deferred`
    | `PostRun`
    | `Completed`
    | `Errored`;

/** Terminal states. */
export type FinalState = Extract<DispatchState, `Completed` | `Errored`>;

/** Allowed successors per state. `Errored` is reachable from every non-terminal state. */
const TRANSITIONS: Readonly<Record<DispatchState, readonly DispatchState[]>> = {
    Received: [`Resolved`, `Errored`],
    Resolved: [`Checked`, `Completed`, `Errored`], // autocomplete probes complete right after resolution
    Checked: [`Active`, `Errored`],
    Active: [`Executing`, `Errored`],
    Executing: [`Deferred`, `PostRun`, `Errored`],
    Deferred: [`PostRun`, `Errored`],
    PostRun: [`Completed`, `Errored`],
    Completed: [],
    Errored: [],
};

/**
 * Tracks one invocation through the dispatch state machine.
 * @example
 * const lifecycle = new InvocationLifecycle();
 * lifecycle.Transition('Resolved');
 */
export class InvocationLifecycle {
    private _state: DispatchState = `Received`;
    private _history: DispatchState[] = [`Received`];

    public get state(): DispatchState {
        return this._state;
    }

    /** Every state visited, in order. */
    public get history(): readonly DispatchState[] {
        return this._history;
    }

    public get terminal(): boolean {
        return TRANSITIONS[this._state].length === 0;
    }

    /**
     * Move to the next state.
     * @throws InternalError when the transition is not in the table
     */
    public Transition(next: DispatchState): void {
        if (!TRANSITIONS[this._state].includes(next)) {
            throw new InternalError(`Illegal dispatch transition ${this._state} -> ${next}`, {
                from: this._state,
                to: next,
            });
        }
        this._state = next;
        this._history.push(next);
    }
}
