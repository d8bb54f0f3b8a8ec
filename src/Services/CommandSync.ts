/**
 * Builds the registration payloads the platform expects for bulk command overwrite.
 */
import { ApplicationCommandOptionType, ApplicationCommandType, type ChannelType } from 'discord.js';
import { GLOBAL_SCOPE, type CommandNode, type Scope } from '../Domain/Command.js';
import type { ChoiceValue, OptionSchema } from '../Domain/Option.js';
import type { CommandRegistry } from './CommandRegistry.js';

export interface ExportedChoice {
    name: string;
    value: ChoiceValue;
}

export interface ExportedOption {
    type: ApplicationCommandOptionType;
    name: string;
    description: string;
    required?: boolean;
    choices?: ExportedChoice[];
    options?: ExportedOption[];
    channel_types?: ChannelType[];
    min_value?: number;
    max_value?: number;
    min_length?: number;
    max_length?: number;
    autocomplete?: boolean;
}

export interface ExportedCommand {
    name: string;
    description: string;
    type: ApplicationCommandType;
    default_member_permissions: string | null;
    dm_permission: boolean;
    nsfw: boolean;
    options: ExportedOption[];
}

function __option(option: OptionSchema): ExportedOption {
    const out: ExportedOption = {
        type: option.type,
        name: option.name,
        description: option.description,
        required: option.required,
    };
    if (option.choices.length > 0) {
        out.choices = option.choices.map(choice => {
            return { name: choice.name, value: choice.value };
        });
    }
    if (option.channelTypes.length > 0) {
        out.channel_types = [...option.channelTypes];
    }
    if (option.minValue !== undefined) {
        out.min_value = option.minValue;
    }
    if (option.maxValue !== undefined) {
        out.max_value = option.maxValue;
    }
    if (option.minLength !== undefined) {
        out.min_length = option.minLength;
    }
    if (option.maxLength !== undefined) {
        out.max_length = option.maxLength;
    }
    if (option.autocomplete) {
        out.autocomplete = true;
    }
    return out;
}

function __child(node: CommandNode): ExportedOption {
    return {
        type: node.kind === `group` ? ApplicationCommandOptionType.SubcommandGroup : ApplicationCommandOptionType.Subcommand,
        name: node.name,
        description: node.description,
        options: __options(node),
    };
}

function __options(node: CommandNode): ExportedOption[] {
    if (node.kind === `group`) {
        return [...node.children.values()].map(__child);
    }
    return node.options.map(__option);
}

/**
 * Export one root tree. Subcommands and groups become options of type Subcommand / SubcommandGroup.
 * @example
 * ExportCommand(node).default_member_permissions; // '32' for ManageGuild
 */
export function ExportCommand(root: CommandNode): ExportedCommand {
    return {
        name: root.name,
        description: root.description,
        type: ApplicationCommandType.ChatInput,
        default_member_permissions: root.defaultMemberPermissions === null ? null : root.defaultMemberPermissions.toString(),
        dm_permission: root.dmPermission,
        nsfw: root.nsfw,
        options: __options(root),
    };
}

/**
 * Export every root registered in a scope, ready for a bulk overwrite.
 */
export function ExportCommands(registry: CommandRegistry, scope: Scope = GLOBAL_SCOPE): ExportedCommand[] {
    return registry.List(scope).map(ExportCommand);
}
