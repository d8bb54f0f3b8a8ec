import {
    ApplicationCommandOptionType,
    MessageFlags,
    type ApplicationCommandOptionChoiceData,
    type CommandInteractionOption,
    type InteractionDeferReplyOptions,
    type InteractionEditReplyOptions,
    type InteractionReplyOptions,
} from 'discord.js';
import { InvalidStateError, describeCause } from '../Common/Errors.js';
import { log } from '../Common/Log.js';
import type { InvocationPath } from '../Domain/Command.js';
import type { InboundPayload, Responder, ResponseBody } from '../Domain/Invocation.js';
import type { DispatchResult } from '../Services/Dispatcher.js';

/** Fields shared by chat-input and autocomplete interactions. */
interface CommandInteractionSource {
    readonly id: string;
    readonly commandName: string;
    readonly user: { readonly id: string };
    readonly guildId: string | null;
    readonly channelId: string | null;
    readonly createdTimestamp: number;
    readonly locale: string;
    readonly options: { readonly data: readonly CommandInteractionOption[] };
}

/** The part of a discord.js ChatInputCommandInteraction the adapter reads and calls. */
export interface ChatInputSource extends CommandInteractionSource {
    reply(options: InteractionReplyOptions): Promise<unknown>;
    deferReply(options: InteractionDeferReplyOptions): Promise<unknown>;
    editReply(options: InteractionEditReplyOptions): Promise<unknown>;
    followUp(options: InteractionReplyOptions): Promise<unknown>;
}

/** The part of a discord.js AutocompleteInteraction the adapter reads and calls. */
export interface AutocompleteSource extends CommandInteractionSource {
    respond(choices: readonly ApplicationCommandOptionChoiceData[]): Promise<unknown>;
}

/** Any interaction delivered by `interactionCreate`. */
export interface InteractionSource {
    readonly id: string;
    isChatInputCommand(): this is ChatInputSource;
    isAutocomplete(): this is AutocompleteSource;
}

export interface InteractionHandlerOptions {
    dispatcher: { Dispatch(payload: InboundPayload, responder: Responder): Promise<DispatchResult> };
    fallbackMessage?: string; // ephemeral reply sent when a command fault goes unhandled
}

interface FlattenedOptions {
    group?: string;
    subcommand?: string;
    values: Map<string, unknown>;
    focused?: string;
}

function __flatten(data: readonly CommandInteractionOption[], into: FlattenedOptions = { values: new Map() }): FlattenedOptions {
    for (const option of data) {
        if (option.type === ApplicationCommandOptionType.SubcommandGroup) {
            into.group = option.name;
            __flatten(option.options ?? [], into);
            continue;
        }
        if (option.type === ApplicationCommandOptionType.Subcommand) {
            into.subcommand = option.name;
            __flatten(option.options ?? [], into);
            continue;
        }
        if (option.channel) {
            into.values.set(option.name, { id: option.channel.id, type: option.channel.type });
        } else if (option.attachment) {
            into.values.set(option.name, { id: option.attachment.id, url: option.attachment.url });
        } else {
            into.values.set(option.name, option.value);
        }
        if (option.focused) {
            into.focused = option.name;
        }
    }
    return into;
}

function __path(interaction: CommandInteractionSource, flat: FlattenedOptions): InvocationPath {
    return { name: interaction.commandName, group: flat.group, subcommand: flat.subcommand };
}

function __replyOptions(body: ResponseBody): InteractionReplyOptions {
    return {
        content: body.content,
        embeds: body.embeds,
        components: body.components,
        ...(body.ephemeral ? { flags: MessageFlags.Ephemeral } : {}),
    };
}

function __editOptions(body: ResponseBody): InteractionEditReplyOptions {
    return { content: body.content, embeds: body.embeds, components: body.components };
}

function __commandResponder(interaction: ChatInputSource): Responder {
    return {
        reply: async body => {
            await interaction.reply(__replyOptions(body));
        },
        defer: async ephemeral => {
            await interaction.deferReply({ ephemeral });
        },
        edit: async body => {
            await interaction.editReply(__editOptions(body));
        },
        followUp: async body => {
            await interaction.followUp(__replyOptions(body));
        },
        autocomplete: async() => {
            throw new InvalidStateError(`Command interactions cannot answer with choices`, { interactionId: interaction.id });
        },
    };
}

function __autocompleteResponder(interaction: AutocompleteSource): Responder {
    const reject = async(): Promise<void> => {
        throw new InvalidStateError(`Autocomplete interactions only answer with choices`, { interactionId: interaction.id });
    };
    return {
        reply: reject,
        defer: reject,
        edit: reject,
        followUp: reject,
        autocomplete: async choices => {
            await interaction.respond(choices);
        },
    };
}

function __base(interaction: CommandInteractionSource, flat: FlattenedOptions) {
    return {
        interactionId: interaction.id,
        userId: interaction.user.id,
        guildId: interaction.guildId,
        channelId: interaction.channelId,
        path: __path(interaction, flat),
        options: Object.fromEntries(flat.values),
        receivedAt: interaction.createdTimestamp,
        locale: interaction.locale,
    };
}

/**
 * Factory for the `interactionCreate` listener feeding chat-input and autocomplete interactions to a dispatcher.
 * Other interaction kinds are ignored.
 * @example
 * client.on(Events.InteractionCreate, CreateInteractionHandler({ dispatcher: framework }));
 */
export function CreateInteractionHandler(options: InteractionHandlerOptions) {
    const { dispatcher, fallbackMessage } = options;

    return async function handleInteraction(interaction: InteractionSource): Promise<DispatchResult | undefined> {
        let payload: InboundPayload;
        let responder: Responder;
        if (interaction.isChatInputCommand()) {
            payload = { kind: `command`, ...__base(interaction, __flatten(interaction.options.data)) };
            responder = __commandResponder(interaction);
        } else if (interaction.isAutocomplete()) {
            const flat = __flatten(interaction.options.data);
            payload = { kind: `autocomplete`, focused: flat.focused ?? ``, ...__base(interaction, flat) };
            responder = __autocompleteResponder(interaction);
        } else {
            return undefined;
        }

        let result: DispatchResult;
        try {
            result = await dispatcher.Dispatch(payload, responder);
        } catch(err) {
            log.error(`Dispatch of interaction ${interaction.id} threw: ${describeCause(err)}`, `InteractionHandler`);
            return undefined;
        }
        if (result.ok || result.handled) {
            return result;
        }

        const label = `/${[payload.path.name, payload.path.group, payload.path.subcommand].filter(Boolean).join(` `)}`;
        log.error(`Unhandled fault for ${label}: ${result.fault?.message ?? `unknown`}`, `InteractionHandler`, interaction.id);
        const { context } = result;
        if (fallbackMessage && context.kind === `command` && !context.responded && !context.stale) {
            try {
                await context.send({ content: fallbackMessage, ephemeral: true });
            } catch(err) {
                log.warning(`Fallback reply failed for ${label}: ${describeCause(err)}`, `InteractionHandler`, interaction.id);
            }
        }
        return result;
    };
}
