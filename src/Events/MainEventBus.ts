/**
 * Central event bus for lifecycle notifications emitted by the dispatch core.
 */
import { EventEmitter } from 'events';
import type { EventName } from '../Domain/Utility.js';
import { metricsService } from '../Services/MetricsService.js';

/**
 * MainEventBus carries registry, module and invocation lifecycle events.
 * @example
 * MAIN_EVENT_BUS.On(EVENT_NAMES.invocationErrored, payload => { ... });
 */
export class MainEventBus extends EventEmitter {
    /** Typed emit helper enforcing known event names. */
    public Emit<T extends EventName>(eventName: T, payload: Record<string, unknown>): boolean {
        metricsService.IncEvent(eventName);
        return super.emit(eventName, payload);
    }

    /** Typed on helper enforcing known event names. */
    public On<T extends EventName>(eventName: T, listener: (payload: Record<string, unknown>) => void): this {
        super.on(eventName, listener);
        return this;
    }

    /** Typed off helper, counterpart of On. */
    public Off<T extends EventName>(eventName: T, listener: (payload: Record<string, unknown>) => void): this {
        super.off(eventName, listener);
        return this;
    }
}

/**
 * Process-wide event bus instance.
 * @example
 * import { MAIN_EVENT_BUS } from './Events/MainEventBus.js';
 * MAIN_EVENT_BUS.On('command.registered', ...);
 */
export const MAIN_EVENT_BUS = new MainEventBus();
