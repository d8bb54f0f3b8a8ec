import { FormatPath, Lineage, PathOf, type CommandNode } from '../Domain/Command.js';
import type { AutoDeferPolicy, HookSet, ScopeLink, ScopeOwner } from '../Domain/Hook.js';

/** Concatenate hook sets stage by stage, preserving order. */
export function ConcatHooks(sets: readonly HookSet[]): HookSet {
    return {
        preRun: sets.flatMap(set => {
            return set.preRun;
        }),
        postRun: sets.flatMap(set => {
            return set.postRun;
        }),
        error: sets.flatMap(set => {
            return set.error;
        }),
    };
}

/**
 * Links in precedence order: global, module (when the node belongs to one), command.
 * The command link gathers the node's lineage from root group to leaf.
 * @example
 * BuildScopeChain(globalBag, node, moderation).map(link => link.scope); // ['global', 'module', 'command']
 */
export function BuildScopeChain(global: ScopeOwner, node?: CommandNode, module?: ScopeOwner): ScopeLink[] {
    const chain: ScopeLink[] = [{ scope: `global`, owner: global.name, checks: global.checks, hooks: global.hooks }];
    if (module) {
        chain.push({ scope: `module`, owner: module.name, checks: module.checks, hooks: module.hooks });
    }
    if (node) {
        const lineage = Lineage(node);
        chain.push({
            scope: `command`,
            owner: FormatPath(PathOf(node)),
            checks: lineage.flatMap(n => {
                return n.checks;
            }),
            hooks: ConcatHooks(
                lineage.map(n => {
                    return n.hooks;
                }),
            ),
        });
    }
    return chain;
}

/** Nearest auto-defer policy: the leaf, then its ancestors, then the module. */
export function ResolveAutoDefer(node: CommandNode, module?: ScopeOwner): AutoDeferPolicy | undefined {
    const lineage = Lineage(node).reverse();
    for (const current of lineage) {
        if (current.autoDefer) {
            return current.autoDefer;
        }
    }
    return module?.autoDefer;
}
