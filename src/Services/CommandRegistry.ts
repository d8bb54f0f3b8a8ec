import { DuplicateCommandError, UnknownCommandError } from '../Common/Errors.js';
import {
    FormatPath,
    GLOBAL_SCOPE,
    Leaves,
    ParsePath,
    PathOf,
    RootOf,
    type CommandNode,
    type InvocationPath,
    type Scope,
} from '../Domain/Command.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import { MAIN_EVENT_BUS, type MainEventBus } from '../Events/MainEventBus.js';
import { ValidateCommandTree } from './SchemaValidator.js';

/** Options controlling CommandRegistry behavior. */
export interface CommandRegistryOptions {
    caseInsensitive?: boolean;
    eventBus?: MainEventBus;
}

/** Registered root with the time it was stored. */
interface RegistryEntry {
    root: CommandNode;
    registeredAt: number;
    sequence: number; // registration order across scopes
}

/** Registry activity counters. */
export interface RegistryStats {
    roots: number; // root trees currently stored (counted once per scope)
    invokable: number; // resolvable (scope, path) entries
    registrations: number;
    removals: number;
    failures: number;
}

/**
 * CommandRegistry owns every registered command tree and resolves invocation paths to leaves.
 * Registration validates the whole tree first and is synchronous, so a lookup never sees half a tree.
 * Emits command.registered and command.unregistered via the event bus.
 */
export class CommandRegistry {
    private _roots: Map<string, RegistryEntry[]> = new Map(); // scope + root name -> entries
    private _targets: Map<string, CommandNode> = new Map(); // scope + full path -> invokable node
    private _caseInsensitive: boolean; // normalization toggle
    private _eventBus: MainEventBus;
    private _stats = { registrations: 0, removals: 0, failures: 0 }; // metrics counters
    private _sequence = 0;

    constructor(opts: CommandRegistryOptions = {}) {
        this._caseInsensitive = !!opts.caseInsensitive;
        this._eventBus = opts.eventBus ?? MAIN_EVENT_BUS;
    }

    /** Normalize a name segment based on case-insensitivity option. */
    private __norm(segment: string): string {
        return this._caseInsensitive ? segment.toLowerCase() : segment;
    }

    private __rootKey(scope: Scope, name: string): string {
        return `${scope}\u0000${this.__norm(name)}`;
    }

    private __targetKey(scope: Scope, path: InvocationPath): string {
        return [scope, path.name, path.group ?? ``, path.subcommand ?? ``]
            .map(part => {
                return this.__norm(part);
            })
            .join(`\u0000`);
    }

    /**
     * Register a root command or group and every invokable leaf under it, in each of its scopes.
     * @throws InvalidSchemaError when the tree violates a shape or option rule
     * @throws DuplicateCommandError when any (scope, name, group, subcommand) already exists
     * @example
     * registry.Register(new CommandBuilder('ping').setDescription('Pong').setHandler(() => {}).build());
     */
    public Register(root: CommandNode): void {
        try {
            ValidateCommandTree(root);
            this.__assertFree(root);
        } catch(err) {
            this._stats.failures++;
            throw err;
        }

        const now = Date.now();
        const sequence = this._sequence++;
        const leaves = Leaves(root);
        for (const scope of root.scopes) {
            const rootKey = this.__rootKey(scope, root.name);
            this._roots.set(rootKey, [...(this._roots.get(rootKey) ?? []), { root, registeredAt: now, sequence }]);
            for (const leaf of leaves) {
                this._targets.set(this.__targetKey(scope, PathOf(leaf)), leaf);
            }
        }
        this._stats.registrations++;
        this._eventBus.Emit(EVENT_NAMES.commandRegistered, {
            name: root.name,
            kind: root.kind,
            scopes: [...root.scopes],
            paths: leaves.map(leaf => {
                return FormatPath(PathOf(leaf));
            }),
        });
    }

    private __assertFree(root: CommandNode): void {
        for (const scope of root.scopes) {
            if (root.kind === `group`) {
                const clash = (this._roots.get(this.__rootKey(scope, root.name)) ?? []).some(entry => {
                    return entry.root.kind === `group`;
                });
                if (clash) {
                    throw new DuplicateCommandError(root.name, scope);
                }
            }
            for (const leaf of Leaves(root)) {
                const path = PathOf(leaf);
                if (this._targets.has(this.__targetKey(scope, path))) {
                    throw new DuplicateCommandError(FormatPath(path), scope);
                }
            }
        }
    }

    /**
     * Resolve a path to its invokable node. A guild registration wins over a global one;
     * direct messages (null scope) only see global commands. Groups never resolve.
     * @throws UnknownCommandError when nothing matches
     */
    public Resolve(path: InvocationPath, scope: Scope | null = null): CommandNode {
        const scopes = scope === null || scope === GLOBAL_SCOPE ? [GLOBAL_SCOPE] : [scope, GLOBAL_SCOPE];
        for (const candidate of scopes) {
            const node = this._targets.get(this.__targetKey(candidate, path));
            if (node) {
                return node;
            }
        }
        throw new UnknownCommandError(FormatPath(path), scope);
    }

    /**
     * Resolve a space separated path.
     * @example
     * registry.ResolveString('config channel set', guildId);
     */
    public ResolveString(text: string, scope: Scope | null = null): CommandNode {
        return this.Resolve(ParsePath(text), scope);
    }

    /** Whether a path resolves from the given scope. */
    public Has(path: InvocationPath, scope: Scope | null = null): boolean {
        try {
            this.Resolve(path, scope);
            return true;
        } catch(err) {
            if (err instanceof UnknownCommandError) {
                return false;
            }
            throw err;
        }
    }

    /**
     * Remove every root named `name` from one scope, or from all scopes when omitted. Idempotent.
     * @returns number of root trees removed
     */
    public Unregister(name: string, scope?: Scope): number {
        const roots = new Set<CommandNode>();
        for (const [key, entries] of this._roots) {
            const [entryScope] = key.split(`\u0000`);
            if (scope !== undefined && entryScope !== scope) {
                continue;
            }
            for (const entry of entries) {
                if (this.__norm(entry.root.name) === this.__norm(name)) {
                    roots.add(entry.root);
                }
            }
        }
        let removed = 0;
        for (const root of roots) {
            removed += this.__remove(root, scope === undefined ? root.scopes : [scope]);
        }
        return removed;
    }

    /** Remove exactly the tree containing `node` from all of its scopes. Idempotent. */
    public UnregisterNode(node: CommandNode): number {
        const root = RootOf(node);
        return this.__remove(root, root.scopes);
    }

    private __remove(root: CommandNode, scopes: readonly Scope[]): number {
        let removed = 0;
        for (const scope of scopes) {
            const rootKey = this.__rootKey(scope, root.name);
            const entries = this._roots.get(rootKey) ?? [];
            const kept = entries.filter(entry => {
                return entry.root !== root;
            });
            if (kept.length === entries.length) {
                continue;
            }
            if (kept.length > 0) {
                this._roots.set(rootKey, kept);
            } else {
                this._roots.delete(rootKey);
            }
            for (const leaf of Leaves(root)) {
                const key = this.__targetKey(scope, PathOf(leaf));
                if (this._targets.get(key) === leaf) {
                    this._targets.delete(key);
                }
            }
            removed++;
            this._stats.removals++;
            this._eventBus.Emit(EVENT_NAMES.commandUnregistered, { name: root.name, kind: root.kind, scope });
        }
        return removed;
    }

    /** Root trees registered in a scope (all scopes when omitted), in registration order. */
    public List(scope?: Scope): CommandNode[] {
        const out: CommandNode[] = [];
        const entries = [...this._roots.entries()]
            .filter(([key]) => {
                return scope === undefined || key.split(`\u0000`)[0] === scope;
            })
            .flatMap(([, list]) => {
                return list;
            })
            .sort((a, b) => {
                return a.sequence - b.sequence;
            });
        for (const entry of entries) {
            if (!out.includes(entry.root)) {
                out.push(entry.root);
            }
        }
        return out;
    }

    /** Scopes that currently hold at least one root. */
    public Scopes(): Scope[] {
        const scopes = new Set<Scope>();
        for (const key of this._roots.keys()) {
            scopes.add(key.split(`\u0000`)[0] ?? GLOBAL_SCOPE);
        }
        return [...scopes];
    }

    /** Get stats about registry activity. */
    public Stats(): RegistryStats {
        let roots = 0;
        for (const entries of this._roots.values()) {
            roots += entries.length;
        }
        return { ...this._stats, roots, invokable: this._targets.size };
    }
}
