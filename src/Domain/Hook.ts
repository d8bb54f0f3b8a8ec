import type { AppError } from '../Common/Errors.js';
import type { InvocationContext } from './InvocationContext.js';
import type { OptionValues } from './Option.js';

/** Lifecycle stage a hook is bound to. */
export type HookStage = `preRun` | `postRun` | `error`;

/** Scope that owns a check or hook. Listed in precedence order. */
export type HookScope = `global` | `module` | `command`;

/** Handler outcome visible to post-run hooks. */
export interface RunOutcome {
    readonly ok: boolean;
    readonly value?: unknown;
    readonly fault?: AppError;
}

/** Callback signature per stage. */
export interface HookSignatures {
    preRun: (ctx: InvocationContext, options: OptionValues) => void | Promise<void>;
    postRun: (ctx: InvocationContext, options: OptionValues, outcome: RunOutcome) => void | Promise<void>;
    error: (fault: AppError, ctx: InvocationContext) => void | Promise<void>;
}

/** A named callback bound to one stage. */
export interface Hook<S extends HookStage = HookStage> {
    readonly name: string;
    readonly stage: S;
    readonly callback: HookSignatures[S];
}

/** Any hook, discriminated by stage. */
export type AnyHook = { [S in HookStage]: Hook<S> }[HookStage];

/** Hooks of one scope, each list in registration order. */
export type HookSet = { readonly [S in HookStage]: readonly Hook<S>[] };

/** Predicate gating execution. May suspend. */
export type CheckPredicate = (ctx: InvocationContext) => boolean | Promise<boolean>;

/** A named predicate. */
export interface Check {
    readonly name: string;
    readonly predicate: CheckPredicate;
}

/** Result of evaluating the check chain. */
export type CheckOutcome =
    | { readonly allowed: true }
    | {
          readonly allowed: false;
          readonly check: Check;
          readonly scope: HookScope;
          readonly fault?: unknown; // set when the predicate threw
      };

/** Anything that owns checks and hooks at one scope: the global bag, a module, a bundle. */
export interface ScopeOwner {
    readonly name: string;
    readonly checks: readonly Check[];
    readonly hooks: HookSet;
    readonly autoDefer?: AutoDeferPolicy;
}

/** One element of a scope chain: the checks and hooks contributed by one scope. */
export interface ScopeLink {
    readonly scope: HookScope;
    readonly owner: string;
    readonly checks: readonly Check[];
    readonly hooks: HookSet;
}

/** Defer automatically when the handler has not answered after `afterMs`. */
export interface AutoDeferPolicy {
    readonly ephemeral: boolean;
    readonly afterMs: number;
}

/** An empty, frozen hook set. */
export const EMPTY_HOOKS: HookSet = Object.freeze({
    preRun: Object.freeze([]),
    postRun: Object.freeze([]),
    error: Object.freeze([]),
});
