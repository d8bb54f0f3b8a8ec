import { ApplicationCommandOptionType, type ChannelType } from 'discord.js';

/** Option types that may appear in a command's option list. Subcommands are expressed as nodes instead. */
export type LeafOptionType = Exclude<
    ApplicationCommandOptionType,
    ApplicationCommandOptionType.Subcommand | ApplicationCommandOptionType.SubcommandGroup
>;

/** Option types that accept choices, numeric bounds or autocomplete. */
export const CHOICE_OPTION_TYPES: ReadonlySet<ApplicationCommandOptionType> = new Set([
    ApplicationCommandOptionType.String,
    ApplicationCommandOptionType.Integer,
    ApplicationCommandOptionType.Number,
]);

/** Value carried by a choice. */
export type ChoiceValue = string | number;

/** Name/value pair offered to the user. */
export interface OptionChoice {
    readonly name: string;
    readonly value: ChoiceValue;
}

/** A platform entity already resolved by the transport (user, channel, role, attachment). */
export interface ResolvedEntity {
    readonly id: string;
    readonly type?: number; // channel type for channel options
    readonly url?: string; // attachment url
}

/** Coerced option value handed to handlers. */
export type OptionValue = string | number | boolean | ResolvedEntity;

/** Coerced options keyed by option name. Omitted optional options are absent. */
export type OptionValues = Readonly<Record<string, OptionValue>>;

/**
 * Declarative description of one command parameter.
 */
export interface OptionSchema {
    readonly name: string;
    readonly description: string;
    readonly type: LeafOptionType;
    readonly required: boolean;
    readonly defaultValue?: OptionValue; // used when an optional option is omitted
    readonly choices: readonly OptionChoice[];
    readonly minValue?: number; // Integer / Number
    readonly maxValue?: number; // Integer / Number
    readonly minLength?: number; // String
    readonly maxLength?: number; // String
    readonly channelTypes: readonly ChannelType[]; // Channel
    readonly autocomplete: boolean;
}

/** Human readable label of an option type, used in messages. */
export function OptionTypeLabel(type: ApplicationCommandOptionType): string {
    return ApplicationCommandOptionType[type] ?? `Unknown(${type})`;
}
