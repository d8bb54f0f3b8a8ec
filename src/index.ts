/**
 * Public surface of the dispatch core.
 */
export * from './Domain/index.js';
export * from './Common/Errors.js';
export { log, LogLevel, SetLogLevel, GetLogLevel } from './Common/Log.js';
export type { LogLevelName } from './Common/Log.js';

export { CommandBuilder } from './Common/Command/CommandBuilder.js';
export { OptionBuilder } from './Common/Command/OptionBuilder.js';
export { ScopeBag } from './Common/Command/ScopeBag.js';
export { CommandModule, Bundle } from './Common/Command/CommandModule.js';
export { GuildOnly, DirectMessageOnly, UserIn, AnyOf } from './Common/Command/Checks.js';

export { Framework } from './Framework.js';
export type { FrameworkOptions } from './Framework.js';
export { CommandRegistry } from './Services/CommandRegistry.js';
export type { CommandRegistryOptions, RegistryStats } from './Services/CommandRegistry.js';
export { ValidateCommandTree } from './Services/SchemaValidator.js';
export { CheckEngine } from './Services/CheckEngine.js';
export { HookEngine } from './Services/HookEngine.js';
export type { HookRunReport, ErrorRunReport } from './Services/HookEngine.js';
export { OptionCoercer } from './Services/OptionCoercer.js';
export { AutocompleteResolver } from './Services/AutocompleteResolver.js';
export type { AutocompleteRequest } from './Services/AutocompleteResolver.js';
export { Dispatcher } from './Services/Dispatcher.js';
export type { DispatchResult, DispatcherDeps, ModuleDirectory } from './Services/Dispatcher.js';
export { ExportCommand, ExportCommands } from './Services/CommandSync.js';
export type { ExportedCommand, ExportedOption, ExportedChoice } from './Services/CommandSync.js';
export { ConfigService, DEFAULT_DISPATCH_CONFIG, MAX_AUTOCOMPLETE_CHOICES } from './Services/ConfigService.js';
export { metricsService, MetricsService } from './Services/MetricsService.js';
export type { MetricsSnapshot } from './Services/MetricsService.js';
export { MAIN_EVENT_BUS, MainEventBus } from './Events/MainEventBus.js';
export type { DispatchConfig, ErrorHookOrder, ErrorHookStrategy } from './Types/Config.js';

export { CreateInteractionHandler } from './App/InteractionHandler.js';
export type {
    ChatInputSource,
    AutocompleteSource,
    InteractionSource,
    InteractionHandlerOptions,
} from './App/InteractionHandler.js';
