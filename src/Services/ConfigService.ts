import { EventEmitter } from 'events';
import Joi from 'joi';
import { readConfigFile } from '../Common/ConfigReader.js';
import { Configurator } from '../Common/Configurator.js';
import { ConfigError } from '../Common/Errors.js';
import { EVENT_NAMES } from '../Domain/Utility.js';
import type { DispatchConfig } from '../Types/Config.js';

/** Hard protocol limit on autocomplete candidates. */
export const MAX_AUTOCOMPLETE_CHOICES = 25;

/** Defaults mirroring the platform's response deadlines. */
export const DEFAULT_DISPATCH_CONFIG: Readonly<DispatchConfig> = Object.freeze({
    responseWindowMs: 3_000,
    deferredWindowMs: 15 * 60 * 1_000,
    autocompleteBudgetMs: 2_500,
    maxAutocompleteChoices: MAX_AUTOCOMPLETE_CHOICES,
    errorHookOrder: `specific-first`,
    errorHookStrategy: `all`,
    requireResponse: true,
    caseInsensitive: false,
    logLevel: `info`,
});

const __schema = Joi.object<DispatchConfig>({
    responseWindowMs: Joi.number().integer().min(1).default(DEFAULT_DISPATCH_CONFIG.responseWindowMs),
    deferredWindowMs: Joi.number().integer().min(1).default(DEFAULT_DISPATCH_CONFIG.deferredWindowMs),
    autocompleteBudgetMs: Joi.number().integer().min(1).default(DEFAULT_DISPATCH_CONFIG.autocompleteBudgetMs),
    maxAutocompleteChoices: Joi.number()
        .integer()
        .min(1)
        .max(MAX_AUTOCOMPLETE_CHOICES)
        .default(DEFAULT_DISPATCH_CONFIG.maxAutocompleteChoices),
    errorHookOrder: Joi.string().valid(`specific-first`, `general-first`).default(DEFAULT_DISPATCH_CONFIG.errorHookOrder),
    errorHookStrategy: Joi.string().valid(`all`, `nearest`).default(DEFAULT_DISPATCH_CONFIG.errorHookStrategy),
    requireResponse: Joi.boolean().default(DEFAULT_DISPATCH_CONFIG.requireResponse),
    caseInsensitive: Joi.boolean().default(DEFAULT_DISPATCH_CONFIG.caseInsensitive),
    logLevel: Joi.string().valid(`debug`, `info`, `warn`, `error`).default(DEFAULT_DISPATCH_CONFIG.logLevel),
})
    .empty(null)
    .default({});

/** Environment variables that override file values (highest precedence). */
const ENV_OVERRIDES: ReadonlyArray<[string, keyof DispatchConfig]> = [
    [`DISPATCH_RESPONSE_WINDOW_MS`, `responseWindowMs`],
    [`DISPATCH_DEFERRED_WINDOW_MS`, `deferredWindowMs`],
    [`DISPATCH_AUTOCOMPLETE_BUDGET_MS`, `autocompleteBudgetMs`],
    [`DISPATCH_LOG_LEVEL`, `logLevel`],
];

/**
 * Loads and validates dispatcher configuration.
 */
export class ConfigService {
    /** Event bus for emitting config-related events */
    private _eventBus: EventEmitter;
    private _env: NodeJS.ProcessEnv;

    /**
     * @param eventBus EventEmitter - Bus receiving `config.loaded`
     * @param env NodeJS.ProcessEnv - Environment consulted for overrides (defaults to process.env)
     */
    constructor(eventBus: EventEmitter, env: NodeJS.ProcessEnv = process.env) {
        this._eventBus = eventBus;
        this._env = env;
    }

    /**
     * Loads and validates the configuration from a JSON or YAML file.
     * @param path string - Filesystem path. Example: './config/dispatch.yaml'
     * @returns Promise<DispatchConfig> - Validated configuration with defaults applied
     * @throws ConfigError if loading or validation fails
     * @example
     * const config = await new ConfigService(MAIN_EVENT_BUS).Load('./config/dispatch.yaml');
     */
    public async Load(path: string): Promise<DispatchConfig> {
        const raw = await readConfigFile(path);
        return this.Parse(raw, path);
    }

    /**
     * Validates an in-memory configuration object, applying env overrides and defaults.
     * @param raw unknown - Parsed document (or undefined for all defaults)
     * @param source string - Label used in error messages
     */
    public Parse(raw: unknown, source: string = `inline`): DispatchConfig {
        const merged = this.__applyEnv(raw);
        let config: DispatchConfig;
        try {
            config = new Configurator(__schema, merged).getConfig();
        } catch(err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new ConfigError(`Config validation error in '${source}': ${message}`, { source }, err);
        }
        this._eventBus.emit(EVENT_NAMES.configLoaded, { source, config });
        return config;
    }

    private __applyEnv(raw: unknown): unknown {
        if (raw === undefined || raw === null) {
            raw = {};
        }
        const overrides: Record<string, string> = {};
        for (const [variable, key] of ENV_OVERRIDES) {
            const value = this._env[variable];
            if (value !== undefined && value !== ``) {
                overrides[key] = value;
            }
        }
        if (Object.keys(overrides).length === 0) {
            return raw;
        }
        const base = typeof raw === `object` && raw !== null ? raw : {};
        return { ...base, ...overrides };
    }
}
