/**
 * Generic config file reader, not tied to the event bus or any runtime.
 */
import { readFile } from 'fs/promises';
import { ConfigError } from './Errors.js';

/**
 * Loads and parses a config file (JSON or YAML). Does not emit any application events.
 * @param configPath string - Path to config file (e.g. './config/dispatch.yaml')
 * @returns Promise<unknown> - Parsed, unvalidated document
 * @throws ConfigError if the file cannot be read, parsed, or has an unsupported extension
 * @example
 * const raw = await readConfigFile('./config/dispatch.json');
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
    if (!/\.(json|ya?ml)$/.test(configPath)) {
        throw new ConfigError(`Unsupported config file format. Use .json or .yaml`, { configPath });
    }
    let raw: string;
    try {
        raw = await readFile(configPath, 'utf-8');
    } catch(err) {
        throw new ConfigError(`Cannot read config file '${configPath}'`, { configPath }, err);
    }

    try {
        if (configPath.endsWith('.json')) {
            return JSON.parse(raw);
        }
        // Lazy-load yaml parser only if needed
        const yaml = await import('js-yaml');
        return yaml.load(raw);
    } catch(err) {
        throw new ConfigError(`Cannot parse config file '${configPath}'`, { configPath }, err);
    }
}
