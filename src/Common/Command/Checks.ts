/**
 * Ready-made checks for common gating rules.
 */
import type { Check } from '../../Domain/Hook.js';

/** Passes only inside a guild. */
export function GuildOnly(): Check {
    return {
        name: `guild-only`,
        predicate: ctx => {
            return ctx.guildId !== null;
        },
    };
}

/** Passes only in direct messages. */
export function DirectMessageOnly(): Check {
    return {
        name: `dm-only`,
        predicate: ctx => {
            return ctx.guildId === null;
        },
    };
}

/**
 * Passes when the invoking user is one of the given ids.
 * @example
 * module.addCheck(UserIn(['111111111111111111'], 'owner-only'));
 */
export function UserIn(userIds: readonly string[], name: string = `user-in`): Check {
    const allowed = new Set(userIds);
    return {
        name,
        predicate: ctx => {
            return allowed.has(ctx.userId);
        },
    };
}

/** Passes when any of the given checks passes; evaluated in order, stopping at the first pass. */
export function AnyOf(name: string, ...checks: Check[]): Check {
    return {
        name,
        predicate: async ctx => {
            for (const check of checks) {
                if (await check.predicate(ctx)) {
                    return true;
                }
            }
            return false;
        },
    };
}
