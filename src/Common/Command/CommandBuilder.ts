import { ApplicationCommandOptionType } from 'discord.js';
import { GLOBAL_SCOPE, RootOf, type AutocompleteCallback, type CommandHandler, type CommandNode, type NodeKind, type Scope } from '../../Domain/Command.js';
import type { AnyHook, AutoDeferPolicy, Check, CheckPredicate, HookSignatures } from '../../Domain/Hook.js';
import type { LeafOptionType, OptionSchema } from '../../Domain/Option.js';
import { InvalidSchemaError } from '../Errors.js';
import { OptionBuilder } from './OptionBuilder.js';
import { ScopeBag } from './ScopeBag.js';

type OptionConfigurer = (option: OptionBuilder) => OptionBuilder;
type NodeConfigurer = (builder: CommandBuilder) => CommandBuilder;

/**
 * Fluent builder producing frozen command nodes, shaped after discord.js' SlashCommandBuilder.
 * A root builder with subcommands becomes a group; otherwise it is a plain command.
 * @example
 * const ping = new CommandBuilder('ping')
 *     .setDescription('Replies with pong')
 *     .setHandler(async ctx => ctx.send('pong'))
 *     .build();
 */
export class CommandBuilder {
    private _kind?: NodeKind;
    private _name: string;
    private _description = ``;
    private _scopes: Scope[] = [];
    private _permissions: bigint | null = null;
    private _dmPermission = true;
    private _nsfw = false;
    private _options: OptionSchema[] = [];
    private _handler?: CommandHandler;
    private _bag = new ScopeBag(`command`);
    private _autocomplete = new Map<string, AutocompleteCallback>();
    private _autoDefer?: AutoDeferPolicy;
    private _module?: string;
    private _children: CommandBuilder[] = [];

    constructor(name: string = ``) {
        this._name = name;
    }

    public setName(name: string): this {
        this._name = name;
        return this;
    }

    public setDescription(description: string): this {
        this._description = description;
        return this;
    }

    /** Restrict the command to the given guild ids (or GLOBAL_SCOPE). Defaults to global. */
    public setScopes(...scopes: Scope[]): this {
        this._scopes = scopes;
        return this;
    }

    /**
     * Default member permission bitmask, exported verbatim to command sync. `null` clears it.
     * @example
     * builder.setDefaultMemberPermissions(PermissionFlagsBits.ManageGuild);
     */
    public setDefaultMemberPermissions(bits: bigint | number | string | null): this {
        if (bits === null) {
            this._permissions = null;
            return this;
        }
        try {
            this._permissions = BigInt(bits);
        } catch(err) {
            throw new InvalidSchemaError(`Invalid permission bitmask '${String(bits)}' on '${this._name}'`, {
                command: this._name,
                reason: err instanceof Error ? err.message : String(err),
            });
        }
        return this;
    }

    public setDMPermission(allowed: boolean): this {
        this._dmPermission = allowed;
        return this;
    }

    public setNSFW(nsfw: boolean): this {
        this._nsfw = nsfw;
        return this;
    }

    /** Append an option of the given type. */
    public addOption(type: LeafOptionType, configure: OptionConfigurer): this {
        this._options.push(configure(new OptionBuilder(type)).build());
        return this;
    }

    public addStringOption(configure: OptionConfigurer): this {
        return this.addOption(ApplicationCommandOptionType.String, configure);
    }

    public addIntegerOption(configure: OptionConfigurer): this {
        return this.addOption(ApplicationCommandOptionType.Integer, configure);
    }

    public addNumberOption(configure: OptionConfigurer): this {
        return this.addOption(ApplicationCommandOptionType.Number, configure);
    }

    public addBooleanOption(configure: OptionConfigurer): this {
        return this.addOption(ApplicationCommandOptionType.Boolean, configure);
    }

    public addUserOption(configure: OptionConfigurer): this {
        return this.addOption(ApplicationCommandOptionType.User, configure);
    }

    public addChannelOption(configure: OptionConfigurer): this {
        return this.addOption(ApplicationCommandOptionType.Channel, configure);
    }

    public addRoleOption(configure: OptionConfigurer): this {
        return this.addOption(ApplicationCommandOptionType.Role, configure);
    }

    public addMentionableOption(configure: OptionConfigurer): this {
        return this.addOption(ApplicationCommandOptionType.Mentionable, configure);
    }

    public addAttachmentOption(configure: OptionConfigurer): this {
        return this.addOption(ApplicationCommandOptionType.Attachment, configure);
    }

    public setHandler(handler: CommandHandler): this {
        this._handler = handler;
        return this;
    }

    public addCheck(check: Check): this {
        this._bag.addCheck(check);
        return this;
    }

    public check(name: string, predicate: CheckPredicate): this {
        this._bag.check(name, predicate);
        return this;
    }

    public addHook(hook: AnyHook): this {
        this._bag.addHook(hook);
        return this;
    }

    public onPreRun(callback: HookSignatures[`preRun`], name: string = `${this._name}:preRun`): this {
        this._bag.onPreRun(callback, name);
        return this;
    }

    public onPostRun(callback: HookSignatures[`postRun`], name: string = `${this._name}:postRun`): this {
        this._bag.onPostRun(callback, name);
        return this;
    }

    public onError(callback: HookSignatures[`error`], name: string = `${this._name}:error`): this {
        this._bag.onError(callback, name);
        return this;
    }

    /** Register the candidate source for an option declared with autocomplete. */
    public autocomplete(option: string, callback: AutocompleteCallback): this {
        this._autocomplete.set(option, callback);
        return this;
    }

    /** Defer automatically when the handler has not answered after `afterMs`. */
    public setAutoDefer(policy: { ephemeral?: boolean; afterMs?: number }): this {
        this._autoDefer = Object.freeze({ ephemeral: policy.ephemeral ?? false, afterMs: policy.afterMs ?? 0 });
        return this;
    }

    /** Owning module name; set by CommandModule. */
    public setModule(name: string | undefined): this {
        this._module = name;
        return this;
    }

    /** Add a subcommand. Turns this builder into a group. */
    public addSubcommand(configure: NodeConfigurer): this {
        this._children.push(configure(new CommandBuilder().__as(`subcommand`)));
        return this;
    }

    /** Add a nested subcommand group. */
    public addSubcommandGroup(configure: NodeConfigurer): this {
        this._children.push(configure(new CommandBuilder().__as(`group`)));
        return this;
    }

    /**
     * Freeze the tree rooted at this builder.
     * @throws InvalidSchemaError when two children share a name
     */
    public build(): CommandNode {
        return this.__build(undefined);
    }

    private __as(kind: NodeKind): this {
        this._kind = kind;
        return this;
    }

    private __build(parent: CommandNode | undefined): CommandNode {
        const root = parent ? RootOf(parent) : undefined;
        const children = new Map<string, CommandNode>();
        const node: CommandNode = Object.freeze({
            kind: this._kind ?? (this._children.length > 0 ? `group` : `command`),
            name: this._name,
            description: this._description,
            scopes: root
                ? root.scopes
                : Object.freeze(this._scopes.length > 0 ? [...new Set(this._scopes)] : [GLOBAL_SCOPE]),
            defaultMemberPermissions: root ? root.defaultMemberPermissions : this._permissions,
            dmPermission: root ? root.dmPermission : this._dmPermission,
            nsfw: root ? root.nsfw : this._nsfw,
            options: Object.freeze([...this._options]),
            handler: this._handler,
            checks: Object.freeze(this._bag.checks),
            hooks: Object.freeze(this._bag.hooks),
            autocomplete: new Map(this._autocomplete),
            autoDefer: this._autoDefer,
            module: root ? root.module : this._module,
            parent,
            children,
        });

        for (const builder of this._children) {
            const child = builder.__build(node);
            if (children.has(child.name)) {
                throw new InvalidSchemaError(`Duplicate subcommand '${child.name}' under '${this._name}'`, {
                    command: this._name,
                    child: child.name,
                });
            }
            children.set(child.name, child);
        }
        return node;
    }
}
