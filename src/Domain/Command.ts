/**
 * Command tree value objects.
 * Nodes are produced by the command builders and frozen; the registry never mutates them.
 */
import type { AutoDeferPolicy, Check, HookSet } from './Hook.js';
import type { InvocationContext } from './InvocationContext.js';
import type { OptionChoice, OptionSchema, OptionValues } from './Option.js';

/** Scope identifier for commands available everywhere. Guild scopes are guild snowflakes. */
export const GLOBAL_SCOPE = `global`;

/** `GLOBAL_SCOPE` or a guild id. */
export type Scope = string;

/** Position of a node in the command tree. */
export type NodeKind = `command` | `group` | `subcommand`;

/** Application handler. Its return value is reported to post-run hooks. */
export type CommandHandler = (ctx: InvocationContext, options: OptionValues) => unknown;

/** Input handed to an autocomplete callback. */
export interface AutocompleteCall {
    readonly command: CommandNode;
    readonly option: string; // focused option name
    readonly value: string | number; // partial value typed so far
    readonly options: Readonly<Record<string, unknown>>; // other raw values already filled in
    readonly userId: string;
    readonly guildId: string | null;
}

/** A candidate: a full choice, or a bare value used as both name and value. */
export type AutocompleteCandidate = OptionChoice | string | number;

/** Produces candidates for a partially typed option. */
export type AutocompleteCallback = (
    call: AutocompleteCall,
) => readonly AutocompleteCandidate[] | Promise<readonly AutocompleteCandidate[]>;

/**
 * A registered command, subcommand group, or subcommand.
 * Root nodes carry scopes and permission metadata; descendants share the root's values.
 */
export interface CommandNode {
    readonly kind: NodeKind;
    readonly name: string;
    readonly description: string;
    readonly scopes: readonly Scope[];
    readonly defaultMemberPermissions: bigint | null; // exported verbatim to command sync
    readonly dmPermission: boolean;
    readonly nsfw: boolean;
    readonly options: readonly OptionSchema[];
    readonly handler?: CommandHandler; // absent on groups
    readonly checks: readonly Check[];
    readonly hooks: HookSet;
    readonly autocomplete: ReadonlyMap<string, AutocompleteCallback>;
    readonly autoDefer?: AutoDeferPolicy;
    readonly module?: string; // owning module name
    readonly parent?: CommandNode;
    readonly children: ReadonlyMap<string, CommandNode>;
}

/** Address of a node: top-level name, optional group, optional subcommand. */
export interface InvocationPath {
    readonly name: string;
    readonly group?: string;
    readonly subcommand?: string;
}

/**
 * Top-most ancestor of a node.
 */
export function RootOf(node: CommandNode): CommandNode {
    let current = node;
    while (current.parent) {
        current = current.parent;
    }
    return current;
}

/**
 * Nodes from the root down to (and including) the given node.
 */
export function Lineage(node: CommandNode): CommandNode[] {
    const chain: CommandNode[] = [];
    for (let current: CommandNode | undefined = node; current; current = current.parent) {
        chain.unshift(current);
    }
    return chain;
}

/**
 * Invocation path of a node.
 * @example
 * PathOf(node); // { name: 'config', group: 'channel', subcommand: 'set' }
 */
export function PathOf(node: CommandNode): InvocationPath {
    const [root, second, third] = Lineage(node).map(n => {
        return n.name;
    });
    if (third !== undefined) {
        return { name: root, group: second, subcommand: third };
    }
    if (second !== undefined) {
        return { name: root, subcommand: second };
    }
    return { name: root };
}

/**
 * Space separated form of a path, as users type it.
 * @example
 * FormatPath({ name: 'config', subcommand: 'show' }); // 'config show'
 */
export function FormatPath(path: InvocationPath): string {
    return [path.name, path.group, path.subcommand]
        .filter(part => {
            return part !== undefined && part !== ``;
        })
        .join(` `);
}

/**
 * Parse a space separated path. Two segments address a subcommand, three a grouped subcommand.
 */
export function ParsePath(text: string): InvocationPath {
    const [name = ``, second, third] = text.trim().split(/\s+/);
    if (third !== undefined) {
        return { name, group: second, subcommand: third };
    }
    if (second !== undefined) {
        return { name, subcommand: second };
    }
    return { name };
}

/** Leaves of a tree (commands and subcommands), depth-first in declaration order. */
export function Leaves(node: CommandNode): CommandNode[] {
    if (node.kind !== `group`) {
        return [node];
    }
    const out: CommandNode[] = [];
    for (const child of node.children.values()) {
        out.push(...Leaves(child));
    }
    return out;
}
