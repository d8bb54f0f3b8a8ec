/**
 * Inbound invocation payloads and the outbound responder contract.
 * Both sides are produced and consumed by the transport; the dispatch core never touches the wire.
 */
import type { InteractionReplyOptions } from 'discord.js';
import type { InvocationPath } from './Command.js';
import type { OptionChoice } from './Option.js';

/** Raw option values as received, keyed by option name. */
export type RawOptions = Readonly<Record<string, unknown>>;

/** Own value of a raw option; inherited keys such as `constructor` read as absent. */
export function ReadOption(raw: RawOptions, name: string): unknown {
    return Object.hasOwn(raw, name) ? raw[name] : undefined;
}

interface PayloadBase {
    readonly interactionId: string;
    readonly userId: string;
    readonly guildId: string | null; // null in direct messages
    readonly channelId?: string | null;
    readonly path: InvocationPath;
    readonly options: RawOptions;
    readonly receivedAt: number; // epoch ms; the response window is measured from here
    readonly locale?: string;
}

/** A user executing a command. */
export interface CommandPayload extends PayloadBase {
    readonly kind: `command`;
}

/** A keystroke-driven autocomplete probe. */
export interface AutocompletePayload extends PayloadBase {
    readonly kind: `autocomplete`;
    readonly focused: string; // option being typed
}

export type InboundPayload = CommandPayload | AutocompletePayload;

/** Message body sent back to the user. */
export interface ResponseBody {
    readonly content?: string;
    readonly ephemeral?: boolean;
    readonly embeds?: InteractionReplyOptions[`embeds`];
    readonly components?: InteractionReplyOptions[`components`];
}

/** Shorthand accepted by send helpers: a bare string is the content. */
export type ResponseInput = string | ResponseBody;

/**
 * Transport collaborator delivering responses for one interaction.
 * Implementations perform the platform call; state rules live in InvocationContext.
 */
export interface Responder {
    reply(body: ResponseBody): Promise<void>;
    defer(ephemeral: boolean): Promise<void>;
    edit(body: ResponseBody): Promise<void>;
    followUp(body: ResponseBody): Promise<void>;
    autocomplete(choices: readonly OptionChoice[]): Promise<void>;
}

/** Normalize a response shorthand. */
export function ToResponseBody(input: ResponseInput): ResponseBody {
    return typeof input === `string` ? { content: input } : input;
}
