import {
    AlreadyRespondedError,
    InternalError,
    InvalidStateError,
    StaleInteractionError,
} from '../Common/Errors.js';
import type { CommandNode, InvocationPath } from './Command.js';
import { ToResponseBody, type InboundPayload, type RawOptions, type Responder, type ResponseInput } from './Invocation.js';

/** Response windows and clock used by a context. */
export interface ContextTiming {
    responseWindowMs: number;
    deferredWindowMs: number;
    now?: () => number;
}

/**
 * Per-invocation snapshot handed to checks, hooks and handlers.
 * Identity fields never change; only the response state moves forward
 * (unanswered → deferred → responded, or → timed out).
 */
export class InvocationContext {
    public readonly kind: InboundPayload[`kind`];
    public readonly interactionId: string;
    public readonly userId: string;
    public readonly guildId: string | null;
    public readonly channelId: string | null;
    public readonly path: InvocationPath;
    public readonly rawOptions: RawOptions;
    public readonly receivedAt: number;
    public readonly locale?: string;
    /** Scratch space shared by checks, hooks and the handler of this invocation. */
    public readonly shared: Map<string, unknown> = new Map();

    private readonly _responder: Responder;
    private readonly _timing: Required<ContextTiming>;
    private _command?: CommandNode;
    private _responded = false;
    private _deferred = false;
    private _timedOut = false;
    private _deferListeners: Array<() => void> = [];

    constructor(payload: InboundPayload, responder: Responder, timing: ContextTiming) {
        this.kind = payload.kind;
        this.interactionId = payload.interactionId;
        this.userId = payload.userId;
        this.guildId = payload.guildId;
        this.channelId = payload.channelId ?? null;
        this.path = Object.freeze({ ...payload.path });
        this.rawOptions = Object.freeze({ ...payload.options });
        this.receivedAt = payload.receivedAt;
        this.locale = payload.locale;
        this._responder = responder;
        this._timing = {
            responseWindowMs: timing.responseWindowMs,
            deferredWindowMs: timing.deferredWindowMs,
            now: timing.now ?? Date.now,
        };
    }

    /** Resolved command node; undefined until resolution succeeded. */
    public get command(): CommandNode | undefined {
        return this._command;
    }

    public get responded(): boolean {
        return this._responded;
    }

    public get deferred(): boolean {
        return this._deferred;
    }

    public get timedOut(): boolean {
        return this._timedOut;
    }

    /** Epoch ms after which the next send is stale. */
    public get deadline(): number {
        const window = this._responded || this._deferred ? this._timing.deferredWindowMs : this._timing.responseWindowMs;
        return this.receivedAt + window;
    }

    /** Whether a send attempted now would be rejected as stale. */
    public get stale(): boolean {
        return this._timedOut || this._timing.now() > this.deadline;
    }

    /**
     * Send the response: the first reply, or the final answer after a deferral.
     * @throws AlreadyRespondedError when a response was already sent
     * @throws StaleInteractionError after the applicable deadline
     * @example
     * await ctx.send({ content: 'Done', ephemeral: true });
     */
    public async send(input: ResponseInput): Promise<void> {
        if (this._responded) {
            throw new AlreadyRespondedError(this.interactionId);
        }
        this.__assertFresh();
        const body = ToResponseBody(input);
        const viaEdit = this._deferred;
        this._responded = true;
        try {
            if (viaEdit) {
                await this._responder.edit(body);
            } else {
                await this._responder.reply(body);
            }
        } catch(err) {
            this._responded = false;
            throw err;
        }
    }

    /**
     * Acknowledge now and answer later, extending the deadline to the deferred window.
     * @throws AlreadyRespondedError when already responded or deferred
     * @throws StaleInteractionError after the response window
     */
    public async defer(options: { ephemeral?: boolean } = {}): Promise<void> {
        if (this._responded || this._deferred) {
            throw new AlreadyRespondedError(this.interactionId);
        }
        this.__assertFresh();
        this._deferred = true;
        try {
            await this._responder.defer(options.ephemeral ?? false);
        } catch(err) {
            this._deferred = false;
            throw err;
        }
        for (const listener of this._deferListeners) {
            listener();
        }
    }

    /**
     * Edit the original response (or fill a deferred one).
     * @throws InvalidStateError before any response or deferral
     */
    public async edit(input: ResponseInput): Promise<void> {
        if (!this._responded && !this._deferred) {
            throw new InvalidStateError(`Cannot edit before responding`, { interactionId: this.interactionId });
        }
        this.__assertFresh();
        await this._responder.edit(ToResponseBody(input));
        this._responded = true;
    }

    /**
     * Send an additional message after the first response.
     * @throws InvalidStateError before the first response
     */
    public async followUp(input: ResponseInput): Promise<void> {
        if (!this._responded) {
            throw new InvalidStateError(`Cannot follow up before responding`, { interactionId: this.interactionId });
        }
        this.__assertFresh();
        await this._responder.followUp(ToResponseBody(input));
    }

    /** Bind the resolved node. Called once by the dispatcher. */
    public BindCommand(node: CommandNode): void {
        if (this._command && this._command !== node) {
            throw new InternalError(`Invocation '${this.interactionId}' is already bound to a command`);
        }
        this._command = node;
    }

    /** Mark the response window as elapsed; every later send is stale. */
    public MarkTimedOut(): void {
        this._timedOut = true;
    }

    /** Register a listener fired after a successful deferral. */
    public OnDeferred(listener: () => void): void {
        this._deferListeners.push(listener);
    }

    private __assertFresh(): void {
        if (this.stale) {
            throw new StaleInteractionError(this.interactionId);
        }
    }
}
