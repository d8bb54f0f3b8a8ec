import { CommandBuilder } from './Common/Command/CommandBuilder.js';
import type { CommandModule } from './Common/Command/CommandModule.js';
import { ScopeBag } from './Common/Command/ScopeBag.js';
import { ValidationError } from './Common/Errors.js';
import { SetLogLevel, log } from './Common/Log.js';
import { GLOBAL_SCOPE, type CommandNode, type Scope } from './Domain/Command.js';
import type { AnyHook, Check, CheckPredicate } from './Domain/Hook.js';
import type { InboundPayload, Responder } from './Domain/Invocation.js';
import { EVENT_NAMES } from './Domain/Utility.js';
import { MAIN_EVENT_BUS, type MainEventBus } from './Events/MainEventBus.js';
import { AutocompleteResolver } from './Services/AutocompleteResolver.js';
import { CheckEngine } from './Services/CheckEngine.js';
import { CommandRegistry } from './Services/CommandRegistry.js';
import { ExportCommands, type ExportedCommand } from './Services/CommandSync.js';
import { ConfigService, DEFAULT_DISPATCH_CONFIG } from './Services/ConfigService.js';
import { Dispatcher, type DispatchResult, type ModuleDirectory } from './Services/Dispatcher.js';
import { HookEngine } from './Services/HookEngine.js';
import { OptionCoercer } from './Services/OptionCoercer.js';
import type { DispatchConfig } from './Types/Config.js';

export interface FrameworkOptions {
    config?: DispatchConfig;
    eventBus?: MainEventBus;
    now?: () => number; // clock for response deadlines
}

interface LoadedModule {
    module: CommandModule;
    nodes: CommandNode[];
    loadedAt: number;
}

/**
 * Entry point wiring the registry, engines and dispatcher together.
 * @example
 * const framework = new Framework();
 * framework.LoadModule(moderation);
 * const result = await framework.Dispatch(payload, responder);
 */
export class Framework implements ModuleDirectory {
    public readonly config: DispatchConfig;
    public readonly registry: CommandRegistry;
    public readonly dispatcher: Dispatcher;
    private readonly _global = new ScopeBag(GLOBAL_SCOPE);
    private readonly _eventBus: MainEventBus;
    private _modules: Map<string, LoadedModule> = new Map();

    constructor(options: FrameworkOptions = {}) {
        this.config = options.config ?? { ...DEFAULT_DISPATCH_CONFIG };
        this._eventBus = options.eventBus ?? MAIN_EVENT_BUS;
        this.registry = new CommandRegistry({ caseInsensitive: this.config.caseInsensitive, eventBus: this._eventBus });
        this.dispatcher = new Dispatcher({
            registry: this.registry,
            checks: new CheckEngine(this._global),
            hooks: new HookEngine(this._global, this.config),
            coercer: new OptionCoercer(),
            autocomplete: new AutocompleteResolver(this.registry, this.config),
            config: this.config,
            modules: this,
            eventBus: this._eventBus,
            now: options.now,
        });
    }

    /**
     * Build a framework from a JSON or YAML file, applying env overrides and the configured log level.
     * @throws ConfigError when the file cannot be read or fails validation
     */
    public static async FromConfigFile(path: string, options: Omit<FrameworkOptions, `config`> = {}, env: NodeJS.ProcessEnv = process.env): Promise<Framework> {
        const config = await new ConfigService(options.eventBus ?? MAIN_EVENT_BUS, env).Load(path);
        SetLogLevel(config.logLevel);
        return new Framework({ ...options, config });
    }

    /** Add a global check, evaluated before module and command checks. */
    public AddCheck(check: Check): this {
        this._global.addCheck(check);
        return this;
    }

    public Check(name: string, predicate: CheckPredicate): this {
        this._global.check(name, predicate);
        return this;
    }

    /** Add a global hook for any stage. */
    public AddHook(hook: AnyHook): this {
        this._global.addHook(hook);
        return this;
    }

    /**
     * Register a standalone command (outside any module).
     * @throws InvalidSchemaError | DuplicateCommandError
     */
    public RegisterCommand(command: CommandNode | CommandBuilder): CommandNode {
        const node = command instanceof CommandBuilder ? command.build() : command;
        this.registry.Register(node);
        return node;
    }

    /** Remove a root command by name; idempotent. */
    public UnregisterCommand(name: string, scope?: Scope): number {
        return this.registry.Unregister(name, scope);
    }

    /**
     * Register every command of a module. Either all commands register or none stay registered.
     * @throws ValidationError when a module with the same name is loaded
     * @throws InvalidSchemaError | DuplicateCommandError from the failing command, after rollback
     */
    public LoadModule(module: CommandModule): CommandNode[] {
        if (this._modules.has(module.name)) {
            throw new ValidationError(`Module '${module.name}' is already loaded`, { module: module.name });
        }
        const nodes = module.buildCommands();
        const registered: CommandNode[] = [];
        try {
            for (const node of nodes) {
                this.registry.Register(node);
                registered.push(node);
            }
        } catch(err) {
            for (const node of registered) {
                this.registry.UnregisterNode(node);
            }
            log.warning(`Module '${module.name}' rolled back: ${err instanceof Error ? err.message : String(err)}`, `Framework`);
            throw err;
        }
        this._modules.set(module.name, { module, nodes, loadedAt: Date.now() });
        this._eventBus.Emit(EVENT_NAMES.moduleLoaded, {
            module: module.name,
            commands: nodes.map(node => {
                return node.name;
            }),
        });
        log.info(`Module '${module.name}' loaded with ${nodes.length} command(s)`, `Framework`);
        return nodes;
    }

    /** Unregister a module's commands and forget it. Returns false when it was not loaded. */
    public UnloadModule(name: string): boolean {
        const loaded = this._modules.get(name);
        if (!loaded) {
            return false;
        }
        for (const node of loaded.nodes) {
            this.registry.UnregisterNode(node);
        }
        this._modules.delete(name);
        this._eventBus.Emit(EVENT_NAMES.moduleUnloaded, { module: name });
        log.info(`Module '${name}' unloaded`, `Framework`);
        return true;
    }

    /** Loaded module by name. */
    public Get(name: string): CommandModule | undefined {
        return this._modules.get(name)?.module;
    }

    /** Names of loaded modules, in load order. */
    public Modules(): string[] {
        return [...this._modules.keys()];
    }

    public async Dispatch(payload: InboundPayload, responder: Responder): Promise<DispatchResult> {
        return this.dispatcher.Dispatch(payload, responder);
    }

    /** Platform payloads for every root in a scope. */
    public ExportCommands(scope: Scope = GLOBAL_SCOPE): ExportedCommand[] {
        return ExportCommands(this.registry, scope);
    }
}
