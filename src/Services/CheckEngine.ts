import { log } from '../Common/Log.js';
import { describeCause } from '../Common/Errors.js';
import type { CommandNode } from '../Domain/Command.js';
import type { CheckOutcome, ScopeOwner } from '../Domain/Hook.js';
import type { InvocationContext } from '../Domain/InvocationContext.js';
import { BuildScopeChain } from './ScopeChain.js';

/**
 * Evaluates checks global → module → command, stopping at the first denial.
 */
export class CheckEngine {
    constructor(private readonly _global: ScopeOwner) {}

    /**
     * Evaluate every applicable check sequentially.
     * A throwing predicate counts as a denial and carries the thrown value as `fault`.
     */
    public async Evaluate(ctx: InvocationContext, node: CommandNode, module?: ScopeOwner): Promise<CheckOutcome> {
        for (const link of BuildScopeChain(this._global, node, module)) {
            for (const check of link.checks) {
                let passed: boolean;
                try {
                    passed = await check.predicate(ctx);
                } catch(err) {
                    log.debug(`Check '${check.name}' (${link.scope}) threw: ${describeCause(err)}`, `CheckEngine`, ctx.interactionId);
                    return { allowed: false, check, scope: link.scope, fault: err };
                }
                if (!passed) {
                    log.debug(`Check '${check.name}' (${link.scope}) denied`, `CheckEngine`, ctx.interactionId);
                    return { allowed: false, check, scope: link.scope };
                }
            }
        }
        return { allowed: true };
    }
}
