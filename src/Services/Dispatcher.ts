import {
    AppError,
    CheckFailedError,
    HandlerFaultError,
    InternalError,
    TimeoutError,
    describeCause,
} from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { FormatPath, PathOf, type CommandNode } from '../Domain/Command.js';
import type { ScopeOwner } from '../Domain/Hook.js';
import { ReadOption, type AutocompletePayload, type InboundPayload, type Responder } from '../Domain/Invocation.js';
import { InvocationContext } from '../Domain/InvocationContext.js';
import { InvocationLifecycle, type DispatchState, type FinalState } from '../Domain/Lifecycle.js';
import type { OptionChoice, OptionValues } from '../Domain/Option.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import type { DispatchConfig } from '../Types/Config.js';
import type { AutocompleteResolver } from './AutocompleteResolver.js';
import type { CheckEngine } from './CheckEngine.js';
import type { CommandRegistry } from './CommandRegistry.js';
import type { HookEngine } from './HookEngine.js';
import { metricsService } from './MetricsService.js';
import type { OptionCoercer } from './OptionCoercer.js';
import { ResolveAutoDefer } from './ScopeChain.js';

/** Looks up loaded modules by name. */
export interface ModuleDirectory {
    Get(name: string): ScopeOwner | undefined;
}

/** Outcome of one invocation. Per-invocation faults are reported here, never thrown. */
export interface DispatchResult {
    ok: boolean;
    state: FinalState;
    history: readonly DispatchState[];
    value?: unknown; // handler return value
    fault?: AppError; // first fault
    faults: readonly AppError[];
    handled: boolean; // false when faults occurred and no error hook applied
    hookFaults: readonly AppError[]; // faults raised by error hooks
    choices?: readonly OptionChoice[]; // autocomplete probes only
    context: InvocationContext;
}

export interface DispatcherDeps {
    registry: CommandRegistry;
    checks: CheckEngine;
    hooks: HookEngine;
    coercer: OptionCoercer;
    autocomplete: AutocompleteResolver;
    config: DispatchConfig;
    modules?: ModuleDirectory;
    eventBus?: MainEventBus;
    now?: () => number; // clock shared with every context
}

/** Mutable per-invocation bookkeeping. */
interface Trace {
    ctx: InvocationContext;
    lifecycle: InvocationLifecycle;
    node?: CommandNode;
    module?: ScopeOwner;
}

interface Execution {
    value?: unknown;
    fault?: AppError;
    extra: AppError[]; // auto-defer faults
    abandoned?: boolean; // the window elapsed while the handler was still running
}

function __elapsed(ctx: InvocationContext, abandoned: boolean): TimeoutError {
    const path = FormatPath(ctx.path);
    return new TimeoutError(`Response window for '${path}' elapsed without a response`, {
        path,
        reason: `elapsed`,
        deferred: ctx.deferred,
        abandoned,
    });
}

const ABANDONED = Symbol(`abandoned`);

function __toAppError(err: unknown): AppError {
    return err instanceof AppError ? err : new InternalError(describeCause(err), undefined, err);
}

/**
 * Drives one invocation through the lifecycle:
 * resolve → checks → coerce → pre-run → handler → post-run, routing any fault to error hooks.
 * Invocations are independent; nothing here is shared between them except read-only collaborators.
 */
export class Dispatcher {
    private readonly _eventBus: MainEventBus;
    private readonly _now: () => number;

    constructor(private readonly _deps: DispatcherDeps) {
        this._eventBus = _deps.eventBus ?? MAIN_EVENT_BUS;
        this._now = _deps.now ?? Date.now;
    }

    /**
     * Process one inbound payload to completion.
     * @example
     * const result = await dispatcher.Dispatch(payload, responder);
     * if (!result.ok && !result.handled) { ... }
     */
    public async Dispatch(payload: InboundPayload, responder: Responder): Promise<DispatchResult> {
        const { config } = this._deps;
        const ctx = new InvocationContext(payload, responder, {
            responseWindowMs: config.responseWindowMs,
            deferredWindowMs: config.deferredWindowMs,
            now: this._now,
        });
        const trace: Trace = { ctx, lifecycle: new InvocationLifecycle() };
        metricsService.Inc(payload.kind === `autocomplete` ? `autocompleteProbes` : `invocations`);
        log.debug(`Received ${payload.kind} '${FormatPath(payload.path)}'`, `Dispatcher`, ctx.interactionId);

        try {
            return payload.kind === `autocomplete`
                ? await this.__autocomplete(trace, payload, responder)
                : await this.__command(trace);
        } catch(err) {
            if (trace.lifecycle.terminal) {
                throw err;
            }
            return this.__fail(trace, [__toAppError(err)]);
        }
    }

    private __resolve(trace: Trace): CommandNode {
        const node = this._deps.registry.Resolve(trace.ctx.path, trace.ctx.guildId);
        trace.ctx.BindCommand(node);
        trace.node = node;
        trace.module = node.module ? this._deps.modules?.Get(node.module) : undefined;
        trace.lifecycle.Transition(`Resolved`);
        return node;
    }

    private async __command(trace: Trace): Promise<DispatchResult> {
        const { ctx, lifecycle } = trace;
        const { checks, coercer, hooks, config } = this._deps;

        let node: CommandNode;
        try {
            node = this.__resolve(trace);
        } catch(err) {
            return this.__fail(trace, [__toAppError(err)]);
        }

        const verdict = await checks.Evaluate(ctx, node, trace.module);
        if (!verdict.allowed) {
            return this.__fail(trace, [new CheckFailedError(verdict.check.name, verdict.scope, verdict.fault)]);
        }
        lifecycle.Transition(`Checked`);

        let options: OptionValues;
        try {
            options = coercer.Coerce(node, ctx.rawOptions);
        } catch(err) {
            return this.__fail(trace, [__toAppError(err)]);
        }
        lifecycle.Transition(`Active`);

        const chain = hooks.Chain(node, trace.module);
        const pre = await hooks.RunPreRun(chain, ctx, options);
        if (pre.faults.length > 0) {
            return this.__fail(trace, pre.faults);
        }

        lifecycle.Transition(`Executing`);
        const execution = await this.__execute(trace, node, options);

        lifecycle.Transition(`PostRun`);
        const post = await hooks.RunPostRun(
            chain,
            ctx,
            options,
            execution.fault ? { ok: false, fault: execution.fault } : { ok: true, value: execution.value },
        );

        const faults: AppError[] = [...(execution.fault ? [execution.fault] : []), ...execution.extra, ...post.faults];
        if (ctx.timedOut) {
            if (!execution.abandoned) {
                faults.push(__elapsed(ctx, false));
            }
        } else if (config.requireResponse && faults.length === 0 && !ctx.responded && !ctx.deferred) {
            faults.push(new TimeoutError(`Handler for '${FormatPath(ctx.path)}' finished without responding`, {
                path: FormatPath(ctx.path),
                reason: `unanswered`,
            }));
        }
        if (faults.length > 0) {
            return this.__fail(trace, faults, execution.value);
        }
        return this.__complete(trace, { value: execution.value });
    }

    /** Run the handler with the auto-defer timer and the deadline watch armed. */
    private async __execute(trace: Trace, node: CommandNode, options: OptionValues): Promise<Execution> {
        const { ctx, lifecycle } = trace;
        const path = FormatPath(PathOf(node));
        const handler = node.handler;
        if (!handler) {
            return { fault: new InternalError(`Command '${path}' has no handler`, { path }), extra: [] };
        }

        const extra: AppError[] = [];
        let finished = false;
        let watch: ReturnType<typeof setTimeout> | undefined;
        let autoDefer: ReturnType<typeof setTimeout> | undefined;
        let pendingDefer: Promise<void> | undefined;
        let abandon: () => void = () => undefined;
        const elapsed = new Promise<typeof ABANDONED>(resolve => {
            abandon = () => {
                resolve(ABANDONED);
            };
        });

        const armWatch = (): void => {
            clearTimeout(watch);
            watch = setTimeout(() => {
                if (!ctx.responded) {
                    log.warning(`Response window elapsed for '${path}'`, `Dispatcher`, ctx.interactionId);
                    ctx.MarkTimedOut();
                    abandon();
                }
            }, Math.max(0, ctx.deadline - this._now()));
        };

        ctx.OnDeferred(() => {
            if (finished) {
                return;
            }
            if (lifecycle.state === `Executing`) {
                lifecycle.Transition(`Deferred`);
            }
            armWatch();
        });

        const policy = ResolveAutoDefer(node, trace.module);
        if (policy) {
            autoDefer = setTimeout(() => {
                if (ctx.responded || ctx.deferred || ctx.stale) {
                    return;
                }
                log.debug(`Auto-deferring '${path}' after ${policy.afterMs} ms`, `Dispatcher`, ctx.interactionId);
                pendingDefer = ctx.defer({ ephemeral: policy.ephemeral }).catch((err: unknown) => {
                    extra.push(__toAppError(err));
                });
            }, policy.afterMs);
        }
        armWatch();

        const running = Promise.resolve().then(() => {
            return handler(ctx, options);
        });
        try {
            const settled = await Promise.race([
                running.then(value => {
                    return { value };
                }),
                elapsed,
            ]);
            if (settled === ABANDONED) {
                void running.then(
                    () => {
                        log.warning(`Abandoned handler for '${path}' settled after the response window`, `Dispatcher`, ctx.interactionId);
                    },
                    (err: unknown) => {
                        log.warning(`Abandoned handler for '${path}' rejected: ${describeCause(err)}`, `Dispatcher`, ctx.interactionId);
                    },
                );
                return { fault: __elapsed(ctx, true), extra, abandoned: true };
            }
            return { value: settled.value, extra };
        } catch(err) {
            return { fault: new HandlerFaultError(path, err), extra };
        } finally {
            clearTimeout(autoDefer);
            if (pendingDefer) {
                await pendingDefer;
            }
            finished = true;
            clearTimeout(watch);
            if (!ctx.responded && !ctx.timedOut && this._now() > ctx.deadline) {
                ctx.MarkTimedOut();
            }
        }
    }

    private async __autocomplete(trace: Trace, payload: AutocompletePayload, responder: Responder): Promise<DispatchResult> {
        const { ctx } = trace;
        let node: CommandNode;
        try {
            node = this.__resolve(trace);
        } catch(err) {
            return this.__fail(trace, [__toAppError(err)]);
        }

        let choices: OptionChoice[];
        try {
            const partial = ReadOption(ctx.rawOptions, payload.focused);
            choices = await this._deps.autocomplete.ResolveFor(node, {
                path: ctx.path,
                focused: payload.focused,
                value: typeof partial === `number` ? partial : String(partial ?? ``),
                options: ctx.rawOptions,
                userId: ctx.userId,
                guildId: ctx.guildId,
            });
            await responder.autocomplete(choices);
        } catch(err) {
            return this.__fail(trace, [__toAppError(err)]);
        }

        this._eventBus.Emit(EVENT_NAMES.autocompleteResolved, {
            interactionId: ctx.interactionId,
            path: FormatPath(ctx.path),
            option: payload.focused,
            count: choices.length,
        });
        return this.__complete(trace, { choices });
    }

    private __complete(trace: Trace, extra: { value?: unknown; choices?: OptionChoice[] }): DispatchResult {
        const { ctx, lifecycle } = trace;
        lifecycle.Transition(`Completed`);
        metricsService.Inc(`completed`);
        this._eventBus.Emit(EVENT_NAMES.invocationCompleted, {
            interactionId: ctx.interactionId,
            kind: ctx.kind,
            path: FormatPath(ctx.path),
        });
        log.debug(`Completed '${FormatPath(ctx.path)}'`, `Dispatcher`, ctx.interactionId);
        return {
            ok: true,
            state: `Completed`,
            history: [...lifecycle.history],
            ...extra,
            faults: [],
            handled: true,
            hookFaults: [],
            context: ctx,
        };
    }

    /** Enter Errored and route every fault, in order, to the error hooks of the scope chain. */
    private async __fail(trace: Trace, faults: readonly AppError[], value?: unknown): Promise<DispatchResult> {
        const { ctx, lifecycle } = trace;
        const { hooks } = this._deps;
        const path = FormatPath(ctx.path);
        lifecycle.Transition(`Errored`);

        const chain = hooks.Chain(trace.node, trace.module);
        const hookFaults: AppError[] = [];
        let handled = true;
        for (const fault of faults) {
            const report = await hooks.RunError(chain, fault, ctx);
            hookFaults.push(...report.faults);
            handled = handled && report.handled;
        }

        metricsService.Inc(`errored`);
        for (const fault of faults) {
            if (fault instanceof TimeoutError) {
                metricsService.Inc(`timeouts`);
            }
        }
        const [primary] = faults;
        if (!handled) {
            metricsService.Inc(`unhandled`);
            log.error(`Unhandled ${primary?.code ?? `fault`} for '${path}': ${primary?.message ?? `unknown`}`, `Dispatcher`, ctx.interactionId);
        } else {
            log.debug(`Errored '${path}' with ${faults.length} fault(s)`, `Dispatcher`, ctx.interactionId);
        }
        this._eventBus.Emit(EVENT_NAMES.invocationErrored, {
            interactionId: ctx.interactionId,
            kind: ctx.kind,
            path,
            codes: faults.map(fault => {
                return fault.code;
            }),
            handled,
        });
        return {
            ok: false,
            state: `Errored`,
            history: [...lifecycle.history],
            value,
            fault: primary,
            faults: [...faults],
            handled,
            hookFaults,
            context: ctx,
        };
    }
}
