import type { CommandNode, InvocationPath } from '../../src/Domain/Command.js';
import type { AutocompletePayload, CommandPayload, Responder, ResponseBody } from '../../src/Domain/Invocation.js';
import { InvocationContext, type ContextTiming } from '../../src/Domain/InvocationContext.js';
import type { OptionChoice } from '../../src/Domain/Option.js';
import { CommandBuilder } from '../../src/Common/Command/CommandBuilder.js';

export type ResponderCall =
    | { method: 'reply' | 'edit' | 'followUp'; body: ResponseBody }
    | { method: 'defer'; ephemeral: boolean }
    | { method: 'autocomplete'; choices: readonly OptionChoice[] };

/** Records every transport call; optionally fails them. */
export class FakeResponder implements Responder {
    public calls: ResponderCall[] = [];
    public failWith?: Error;

    public async reply(body: ResponseBody): Promise<void> {
        this.__maybeFail();
        this.calls.push({ method: 'reply', body });
    }

    public async defer(ephemeral: boolean): Promise<void> {
        this.__maybeFail();
        this.calls.push({ method: 'defer', ephemeral });
    }

    public async edit(body: ResponseBody): Promise<void> {
        this.__maybeFail();
        this.calls.push({ method: 'edit', body });
    }

    public async followUp(body: ResponseBody): Promise<void> {
        this.__maybeFail();
        this.calls.push({ method: 'followUp', body });
    }

    public async autocomplete(choices: readonly OptionChoice[]): Promise<void> {
        this.__maybeFail();
        this.calls.push({ method: 'autocomplete', choices });
    }

    public methods(): string[] {
        return this.calls.map(call => call.method);
    }

    private __maybeFail(): void {
        if (this.failWith) {
            throw this.failWith;
        }
    }
}

let __sequence = 0;

export function MakeCommandPayload(path: InvocationPath, overrides: Partial<Omit<CommandPayload, 'kind'>> = {}): CommandPayload {
    __sequence++;
    return {
        kind: 'command',
        interactionId: `interaction-${__sequence}`,
        userId: '100000000000000001',
        guildId: '200000000000000002',
        channelId: '300000000000000003',
        path,
        options: {},
        receivedAt: Date.now(),
        ...overrides,
    };
}

export function MakeAutocompletePayload(
    path: InvocationPath,
    focused: string,
    overrides: Partial<Omit<AutocompletePayload, 'kind' | 'focused'>> = {},
): AutocompletePayload {
    __sequence++;
    return {
        kind: 'autocomplete',
        focused,
        interactionId: `interaction-${__sequence}`,
        userId: '100000000000000001',
        guildId: '200000000000000002',
        channelId: '300000000000000003',
        path,
        options: {},
        receivedAt: Date.now(),
        ...overrides,
    };
}

export function MakeContext(
    overrides: Partial<Omit<CommandPayload, 'kind'>> = {},
    responder: Responder = new FakeResponder(),
    timing: ContextTiming = { responseWindowMs: 3000, deferredWindowMs: 900000 },
): InvocationContext {
    return new InvocationContext(MakeCommandPayload({ name: 'test' }, overrides), responder, timing);
}

/** A valid leaf command that answers 'ok'. */
export function Leaf(name: string): CommandBuilder {
    return new CommandBuilder(name).setDescription(`${name} command`).setHandler(async ctx => {
        await ctx.send('ok');
    });
}

/** Wait for real time to pass. */
export function Sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/** Leaf node under a built tree, by child names. */
export function Child(root: CommandNode, ...names: string[]): CommandNode {
    let current = root;
    for (const name of names) {
        const next = current.children.get(name);
        if (!next) {
            throw new Error(`No child '${name}' under '${current.name}'`);
        }
        current = next;
    }
    return current;
}
