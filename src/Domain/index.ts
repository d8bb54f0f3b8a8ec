/**
 * Domain types for the dispatch core.
 */

// Command tree
export { GLOBAL_SCOPE, RootOf, Lineage, PathOf, FormatPath, ParsePath, Leaves } from './Command.js';
export type {
    Scope,
    NodeKind,
    CommandHandler,
    AutocompleteCall,
    AutocompleteCandidate,
    AutocompleteCallback,
    CommandNode,
    InvocationPath,
} from './Command.js';

// Options
export { CHOICE_OPTION_TYPES, OptionTypeLabel } from './Option.js';
export type {
    LeafOptionType,
    ChoiceValue,
    OptionChoice,
    ResolvedEntity,
    OptionValue,
    OptionValues,
    OptionSchema,
} from './Option.js';

// Checks & hooks
export { EMPTY_HOOKS } from './Hook.js';
export type {
    HookStage,
    HookScope,
    RunOutcome,
    HookSignatures,
    Hook,
    AnyHook,
    HookSet,
    CheckPredicate,
    Check,
    CheckOutcome,
    ScopeOwner,
    ScopeLink,
    AutoDeferPolicy,
} from './Hook.js';

// Invocation
export { ToResponseBody, ReadOption } from './Invocation.js';
export type {
    RawOptions,
    CommandPayload,
    AutocompletePayload,
    InboundPayload,
    ResponseBody,
    ResponseInput,
    Responder,
} from './Invocation.js';
export { InvocationContext } from './InvocationContext.js';
export type { ContextTiming } from './InvocationContext.js';
export { InvocationLifecycle } from './Lifecycle.js';
export type { DispatchState, FinalState } from './Lifecycle.js';

// Limits
export { LIMITS, NAME_PATTERN } from './Limits.js';

// Event names
export { EVENT_NAMES } from './Utility.js';
export type { EventName } from './Utility.js';
