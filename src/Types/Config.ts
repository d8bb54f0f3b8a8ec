import type { LogLevelName } from '../Common/Log.js';

/** Order in which error hooks across scopes are invoked. */
export type ErrorHookOrder = `specific-first` | `general-first`;

/** Whether every scope's error hooks run, or only the most specific scope that has any. */
export type ErrorHookStrategy = `all` | `nearest`;

/**
 * Validated dispatcher configuration shared across services.
 */
export interface DispatchConfig {
    responseWindowMs: number; // initial response window
    deferredWindowMs: number; // window after a deferred acknowledgement
    autocompleteBudgetMs: number; // autocomplete callback budget
    maxAutocompleteChoices: number; // upper bound on returned candidates
    errorHookOrder: ErrorHookOrder;
    errorHookStrategy: ErrorHookStrategy;
    requireResponse: boolean; // unanswered invocations surface a timeout fault
    caseInsensitive: boolean; // registry lookup normalization
    logLevel: LogLevelName;
}
