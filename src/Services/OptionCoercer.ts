import { ApplicationCommandOptionType } from 'discord.js';
import Joi from 'joi';
import { InvalidOptionValueError, MissingOptionError } from '../Common/Errors.js';
import { FormatPath, PathOf, type CommandNode } from '../Domain/Command.js';
import { ReadOption, type RawOptions } from '../Domain/Invocation.js';
import { LIMITS } from '../Domain/Limits.js';
import type { LeafOptionType, OptionSchema, OptionValue, OptionValues } from '../Domain/Option.js';

const SNOWFLAKE = /^\d{17,20}$/;

const __snowflake = Joi.string().pattern(SNOWFLAKE);

const __entity = Joi.object({
    id: __snowflake.required(),
    type: Joi.number().integer(),
    url: Joi.string(),
});

/** Joi schema per option type, before per-option rules. */
const SCHEMA_BY_TYPE: Readonly<Record<LeafOptionType, (option: OptionSchema) => Joi.Schema>> = {
    [ApplicationCommandOptionType.String]: option => {
        let schema = Joi.string()
            .min(option.minLength ?? 0)
            .max(option.maxLength ?? LIMITS.stringOptionLength);
        if ((option.minLength ?? 0) === 0 && option.choices.length === 0) {
            schema = schema.allow(``);
        }
        return schema;
    },
    [ApplicationCommandOptionType.Integer]: option => {
        return __bounded(Joi.number().integer(), option);
    },
    [ApplicationCommandOptionType.Number]: option => {
        return __bounded(Joi.number(), option);
    },
    [ApplicationCommandOptionType.Boolean]: () => {
        return Joi.boolean();
    },
    [ApplicationCommandOptionType.User]: () => {
        return Joi.alternatives().try(__snowflake, __entity);
    },
    [ApplicationCommandOptionType.Role]: () => {
        return Joi.alternatives().try(__snowflake, __entity);
    },
    [ApplicationCommandOptionType.Mentionable]: () => {
        return Joi.alternatives().try(__snowflake, __entity);
    },
    [ApplicationCommandOptionType.Attachment]: () => {
        return Joi.alternatives().try(__snowflake, __entity);
    },
    [ApplicationCommandOptionType.Channel]: option => {
        // a channel filter can only be verified on the resolved form
        if (option.channelTypes.length > 0) {
            return __entity.keys({
                type: Joi.number()
                    .valid(...option.channelTypes)
                    .required(),
            });
        }
        return Joi.alternatives().try(__snowflake, __entity);
    },
};

function __bounded(schema: Joi.NumberSchema, option: OptionSchema): Joi.NumberSchema {
    let bounded = schema;
    if (option.minValue !== undefined) {
        bounded = bounded.min(option.minValue);
    }
    if (option.maxValue !== undefined) {
        bounded = bounded.max(option.maxValue);
    }
    return bounded;
}

function __isMissing(value: unknown): boolean {
    return value === undefined || value === null;
}

function __toOptionValue(value: unknown): OptionValue | undefined {
    if (typeof value === `string` || typeof value === `number` || typeof value === `boolean`) {
        return value;
    }
    if (typeof value === `object` && value !== null && `id` in value && typeof value.id === `string`) {
        const entity: { id: string; type?: number; url?: string } = { id: value.id };
        if (`type` in value && typeof value.type === `number`) {
            entity.type = value.type;
        }
        if (`url` in value && typeof value.url === `string`) {
            entity.url = value.url;
        }
        return Object.freeze(entity);
    }
    return undefined;
}

const __compiled = new WeakMap<OptionSchema, Joi.Schema>();

/**
 * Joi schema accepting the values of one option: its type, bounds, lengths, choices and channel types.
 * Compiled once per option schema object.
 */
export function OptionValueSchema(option: OptionSchema): Joi.Schema {
    const cached = __compiled.get(option);
    if (cached) {
        return cached;
    }
    let schema = SCHEMA_BY_TYPE[option.type](option);
    if (option.choices.length > 0) {
        schema = schema.valid(
            ...option.choices.map(choice => {
                return choice.value;
            }),
        );
    }
    schema = schema.label(option.name);
    __compiled.set(option, schema);
    return schema;
}

/**
 * Converts raw option values to typed values using a joi schema per option.
 */
export class OptionCoercer {
    /**
     * Coerce raw values for a node. Omitted optional options take their default or stay absent.
     * @throws MissingOptionError for an omitted required option
     * @throws InvalidOptionValueError for an unknown option or a value failing type, choice, bound or channel rules
     * @example
     * coercer.Coerce(node, { count: '12' }); // { count: 12 }
     */
    public Coerce(node: CommandNode, raw: RawOptions): OptionValues {
        const path = FormatPath(PathOf(node));

        for (const option of node.options) {
            if (option.required && __isMissing(ReadOption(raw, option.name))) {
                throw new MissingOptionError(option.name, path);
            }
        }
        const declared = new Set(
            node.options.map(option => {
                return option.name;
            }),
        );
        for (const key of Object.keys(raw)) {
            if (!declared.has(key)) {
                throw new InvalidOptionValueError(key, `Unknown option '${key}'`, { path, reason: `unknown` });
            }
        }

        const out: [string, OptionValue][] = [];
        for (const option of node.options) {
            const value = ReadOption(raw, option.name);
            if (__isMissing(value)) {
                if (option.defaultValue !== undefined) {
                    out.push([option.name, option.defaultValue]);
                }
                continue;
            }
            const result = OptionValueSchema(option).validate(value, { convert: true, stripUnknown: true });
            if (result.error) {
                throw new InvalidOptionValueError(option.name, result.error.message, {
                    path,
                    reason: result.error.details[0]?.type ?? `invalid`,
                });
            }
            const coerced = __toOptionValue(result.value);
            if (coerced === undefined) {
                throw new InvalidOptionValueError(option.name, `"${option.name}" has an unsupported value`, {
                    path,
                    reason: `unsupported`,
                });
            }
            out.push([option.name, coerced]);
        }
        return Object.freeze(Object.fromEntries(out));
    }
}
