import { HookFaultError, describeCause, type AppError } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import type { CommandNode } from '../Domain/Command.js';
import type { HookScope, HookStage, RunOutcome, ScopeLink, ScopeOwner } from '../Domain/Hook.js';
import type { InvocationContext } from '../Domain/InvocationContext.js';
import type { OptionValues } from '../Domain/Option.js';
import type { DispatchConfig } from '../Types/Config.js';
import { BuildScopeChain } from './ScopeChain.js';

/** What a stage run did. */
export interface HookRunReport {
    ran: number; // hooks invoked, faulting ones included
    faults: AppError[];
}

/** Error stage report; `handled` is false when no error hook applied. */
export interface ErrorRunReport extends HookRunReport {
    handled: boolean;
}

interface PendingCall {
    scope: HookScope;
    owner: string;
    name: string;
    call: () => unknown;
}

type ErrorRouting = Pick<DispatchConfig, `errorHookOrder` | `errorHookStrategy`>;

/**
 * Runs pre-run, post-run and error hooks across a scope chain.
 * Hooks run one at a time, in scope order and registration order within a scope.
 */
export class HookEngine {
    constructor(
        private readonly _global: ScopeOwner,
        private readonly _routing: ErrorRouting,
    ) {}

    /** Scope chain for a node (global only when the node is unknown). */
    public Chain(node?: CommandNode, module?: ScopeOwner): ScopeLink[] {
        return BuildScopeChain(this._global, node, module);
    }

    /** Run pre-run hooks; stops at the first fault. */
    public async RunPreRun(chain: readonly ScopeLink[], ctx: InvocationContext, options: OptionValues): Promise<HookRunReport> {
        const calls = chain.flatMap(link => {
            return link.hooks.preRun.map(hook => {
                return { scope: link.scope, owner: link.owner, name: hook.name, call: () => {
                    return hook.callback(ctx, options);
                } };
            });
        });
        return this.__execute(`preRun`, calls, true, ctx);
    }

    /** Run post-run hooks; every hook runs, faults are collected. */
    public async RunPostRun(
        chain: readonly ScopeLink[],
        ctx: InvocationContext,
        options: OptionValues,
        outcome: RunOutcome,
    ): Promise<HookRunReport> {
        const calls = chain.flatMap(link => {
            return link.hooks.postRun.map(hook => {
                return { scope: link.scope, owner: link.owner, name: hook.name, call: () => {
                    return hook.callback(ctx, options, outcome);
                } };
            });
        });
        return this.__execute(`postRun`, calls, false, ctx);
    }

    /**
     * Route a fault to error hooks, ordered and filtered by the configured routing.
     * Faults raised by error hooks are logged and reported.
     */
    public async RunError(chain: readonly ScopeLink[], fault: AppError, ctx: InvocationContext): Promise<ErrorRunReport> {
        let links = this._routing.errorHookOrder === `specific-first` ? [...chain].reverse() : [...chain];
        if (this._routing.errorHookStrategy === `nearest`) {
            const nearest = [...chain].reverse().find(link => {
                return link.hooks.error.length > 0;
            });
            links = nearest ? [nearest] : [];
        }
        const calls = links.flatMap(link => {
            return link.hooks.error.map(hook => {
                return { scope: link.scope, owner: link.owner, name: hook.name, call: () => {
                    return hook.callback(fault, ctx);
                } };
            });
        });
        const report = await this.__execute(`error`, calls, false, ctx);
        return { ...report, handled: calls.length > 0 };
    }

    private async __execute(stage: HookStage, calls: readonly PendingCall[], stopOnFault: boolean, ctx: InvocationContext): Promise<HookRunReport> {
        const faults: AppError[] = [];
        let ran = 0;
        for (const pending of calls) {
            ran++;
            try {
                await pending.call();
            } catch(err) {
                const fault = new HookFaultError(stage, pending.scope, pending.name, err);
                log.error(`${stage} hook '${pending.name}' of ${pending.scope} '${pending.owner}' failed: ${describeCause(err)}`, `HookEngine`, ctx.interactionId);
                faults.push(fault);
                if (stopOnFault) {
                    break;
                }
            }
        }
        return { ran, faults };
    }
}
