import type { AnyHook, Check, CheckPredicate, Hook, HookSet, HookSignatures } from '../../Domain/Hook.js';

/**
 * Ordered collection of checks and hooks owned by one scope.
 * Modules, bundles and the global scope each hold one.
 */
export class ScopeBag {
    private _checks: Check[] = [];
    private _preRun: Hook<`preRun`>[] = [];
    private _postRun: Hook<`postRun`>[] = [];
    private _error: Hook<`error`>[] = [];

    constructor(public readonly name: string) {}

    /** Checks in registration order. */
    public get checks(): readonly Check[] {
        return [...this._checks];
    }

    /** Hooks per stage, each in registration order. */
    public get hooks(): HookSet {
        return { preRun: [...this._preRun], postRun: [...this._postRun], error: [...this._error] };
    }

    /**
     * Append a check.
     * @example
     * bag.addCheck({ name: 'guild-only', predicate: ctx => ctx.guildId !== null });
     */
    public addCheck(check: Check): this {
        this._checks.push(check);
        return this;
    }

    /** Append a check built from a name and predicate. */
    public check(name: string, predicate: CheckPredicate): this {
        return this.addCheck({ name, predicate });
    }

    /** Append a hook to the list of its stage. */
    public addHook(hook: AnyHook): this {
        switch (hook.stage) {
            case `preRun`:
                this._preRun.push(hook);
                break;
            case `postRun`:
                this._postRun.push(hook);
                break;
            case `error`:
                this._error.push(hook);
                break;
        }
        return this;
    }

    public onPreRun(callback: HookSignatures[`preRun`], name: string = `${this.name}:preRun`): this {
        return this.addHook({ name, stage: `preRun`, callback });
    }

    public onPostRun(callback: HookSignatures[`postRun`], name: string = `${this.name}:postRun`): this {
        return this.addHook({ name, stage: `postRun`, callback });
    }

    public onError(callback: HookSignatures[`error`], name: string = `${this.name}:error`): this {
        return this.addHook({ name, stage: `error`, callback });
    }

    /** Append every check and hook of another bag, preserving its order. */
    public merge(other: { readonly checks: readonly Check[]; readonly hooks: HookSet }): this {
        this._checks.push(...other.checks);
        this._preRun.push(...other.hooks.preRun);
        this._postRun.push(...other.hooks.postRun);
        this._error.push(...other.hooks.error);
        return this;
    }
}
