import { HandlerFaultError, TimeoutError, UnknownOptionError, describeCause } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import { FormatPath, PathOf, type AutocompleteCandidate, type CommandNode, type InvocationPath } from '../Domain/Command.js';
import type { RawOptions } from '../Domain/Invocation.js';
import { LIMITS } from '../Domain/Limits.js';
import type { OptionChoice } from '../Domain/Option.js';
import type { DispatchConfig } from '../Types/Config.js';
import type { CommandRegistry } from './CommandRegistry.js';

/** A keystroke probe for one focused option. */
export interface AutocompleteRequest {
    path: InvocationPath;
    focused: string;
    value: string | number;
    options: RawOptions;
    userId: string;
    guildId: string | null;
}

type ResolverConfig = Pick<DispatchConfig, `autocompleteBudgetMs` | `maxAutocompleteChoices`>;

function __clip(text: string, max: number): string {
    return text.length > max ? text.slice(0, max) : text;
}

function __isCandidateList(value: unknown): value is readonly AutocompleteCandidate[] {
    return Array.isArray(value);
}

function __normalize(candidate: AutocompleteCandidate): OptionChoice {
    if (typeof candidate === `object`) {
        return {
            name: __clip(candidate.name, LIMITS.choiceNameLength),
            value: typeof candidate.value === `string` ? __clip(candidate.value, LIMITS.choiceValueLength) : candidate.value,
        };
    }
    return {
        name: __clip(String(candidate), LIMITS.choiceNameLength),
        value: typeof candidate === `string` ? __clip(candidate, LIMITS.choiceValueLength) : candidate,
    };
}

/**
 * Produces autocomplete suggestions within a time budget.
 * An expired callback is abandoned, never retried; if it rejects later the rejection is logged.
 */
export class AutocompleteResolver {
    constructor(
        private readonly _registry: CommandRegistry,
        private readonly _config: ResolverConfig,
    ) {}

    /**
     * Resolve the command from the registry, then its suggestions.
     * @throws UnknownCommandError when the path does not resolve
     */
    public async Resolve(request: AutocompleteRequest): Promise<OptionChoice[]> {
        return this.ResolveFor(this._registry.Resolve(request.path, request.guildId), request);
    }

    /**
     * Suggestions for an already resolved node.
     * @throws UnknownOptionError when the focused option is missing or not autocomplete-enabled
     * @throws TimeoutError when the callback outlives the budget
     * @throws HandlerFaultError when the callback throws or returns something other than a list
     */
    public async ResolveFor(node: CommandNode, request: AutocompleteRequest): Promise<OptionChoice[]> {
        const path = FormatPath(PathOf(node));
        const option = node.options.find(o => {
            return o.name === request.focused;
        });
        if (!option) {
            throw new UnknownOptionError(path, request.focused, `missing`);
        }
        const callback = node.autocomplete.get(option.name);
        if (!option.autocomplete || !callback) {
            throw new UnknownOptionError(path, request.focused, `not-autocomplete`);
        }

        const pending = Promise.resolve().then(() => {
            return callback({
                command: node,
                option: option.name,
                value: request.value,
                options: request.options,
                userId: request.userId,
                guildId: request.guildId,
            });
        });

        let timer: ReturnType<typeof setTimeout> | undefined;
        let expired = false;
        const budget = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                expired = true;
                reject(new TimeoutError(`Autocomplete for '${path}' exceeded ${this._config.autocompleteBudgetMs} ms`, {
                    path,
                    option: option.name,
                    budgetMs: this._config.autocompleteBudgetMs,
                }));
            }, this._config.autocompleteBudgetMs);
        });

        try {
            const candidates = await Promise.race([
                pending.catch((err: unknown) => {
                    throw new HandlerFaultError(path, err);
                }),
                budget,
            ]);
            if (!__isCandidateList(candidates)) {
                throw new HandlerFaultError(path, new TypeError(`autocomplete callback must return a list`));
            }
            return candidates.slice(0, this._config.maxAutocompleteChoices).map(__normalize);
        } finally {
            clearTimeout(timer);
            if (expired) {
                void pending.catch((err: unknown) => {
                    log.warning(`Abandoned autocomplete for '${path}' rejected: ${describeCause(err)}`, `AutocompleteResolver`);
                });
            }
        }
    }
}
