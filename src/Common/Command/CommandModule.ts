import type { CommandNode } from '../../Domain/Command.js';
import type { AnyHook, AutoDeferPolicy, Check, CheckPredicate, HookSet, HookSignatures, ScopeOwner } from '../../Domain/Hook.js';
import { ValidationError } from '../Errors.js';
import type { CommandBuilder } from './CommandBuilder.js';
import { ScopeBag } from './ScopeBag.js';

/**
 * Named, reusable set of checks and hooks. Modules attach bundles instead of sharing a base class.
 * @example
 * const staffOnly = new Bundle('staff-only').check('is-staff', ctx => staff.has(ctx.userId));
 * moderation.attach(staffOnly);
 */
export class Bundle extends ScopeBag {}

/**
 * Logical grouping of commands, checks and hooks loaded and unloaded as a unit.
 */
export class CommandModule implements ScopeOwner {
    private readonly _bag: ScopeBag;
    private _commands: CommandBuilder[] = [];
    private _bundles: string[] = [];
    private _autoDefer?: AutoDeferPolicy;

    constructor(
        public readonly name: string,
        public readonly description: string = ``,
    ) {
        this._bag = new ScopeBag(name);
    }

    public get checks(): readonly Check[] {
        return this._bag.checks;
    }

    public get hooks(): HookSet {
        return this._bag.hooks;
    }

    public get autoDefer(): AutoDeferPolicy | undefined {
        return this._autoDefer;
    }

    /** Names of attached bundles, in attach order. */
    public get bundles(): readonly string[] {
        return [...this._bundles];
    }

    public addCheck(check: Check): this {
        this._bag.addCheck(check);
        return this;
    }

    public check(name: string, predicate: CheckPredicate): this {
        this._bag.check(name, predicate);
        return this;
    }

    public addHook(hook: AnyHook): this {
        this._bag.addHook(hook);
        return this;
    }

    public onPreRun(callback: HookSignatures[`preRun`], name?: string): this {
        this._bag.onPreRun(callback, name);
        return this;
    }

    public onPostRun(callback: HookSignatures[`postRun`], name?: string): this {
        this._bag.onPostRun(callback, name);
        return this;
    }

    public onError(callback: HookSignatures[`error`], name?: string): this {
        this._bag.onError(callback, name);
        return this;
    }

    /**
     * Append a bundle's checks and hooks after the ones already present.
     * Later changes to the bundle are not picked up.
     * @throws ValidationError when the bundle is already attached
     */
    public attach(bundle: Bundle): this {
        if (this._bundles.includes(bundle.name)) {
            throw new ValidationError(`Bundle '${bundle.name}' already attached to module '${this.name}'`, {
                module: this.name,
                bundle: bundle.name,
            });
        }
        this._bag.merge(bundle);
        this._bundles.push(bundle.name);
        return this;
    }

    public addCommand(builder: CommandBuilder): this {
        this._commands.push(builder);
        return this;
    }

    /** Defer every command of this module that has no policy of its own. */
    public setAutoDefer(policy: { ephemeral?: boolean; afterMs?: number }): this {
        this._autoDefer = Object.freeze({ ephemeral: policy.ephemeral ?? false, afterMs: policy.afterMs ?? 0 });
        return this;
    }

    /** Build every command, stamped with this module's name. */
    public buildCommands(): CommandNode[] {
        return this._commands.map(builder => {
            return builder.setModule(this.name).build();
        });
    }
}
