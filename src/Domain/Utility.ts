/**
 * Central enumeration of well-known event names for typed event bus helpers.
 */
export const EVENT_NAMES = {
    configLoaded: 'config.loaded',
    commandRegistered: 'command.registered',
    commandUnregistered: 'command.unregistered',
    moduleLoaded: 'module.loaded',
    moduleUnloaded: 'module.unloaded',
    invocationCompleted: 'invocation.completed',
    invocationErrored: 'invocation.errored',
    autocompleteResolved: 'autocomplete.resolved',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
