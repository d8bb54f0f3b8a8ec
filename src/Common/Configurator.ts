import type { ObjectSchema } from 'joi';

/**
 * Configurator validates and stores configuration using a Joi schema.
 * @template T - The expected shape of the configuration object
 */
export class Configurator<T> {
    /** Joi schema used for validation */
    private readonly _schema: ObjectSchema<T>;
    /** Stored, validated configuration object */
    private readonly _config: T;

    /**
     * @param schema ObjectSchema<T> - Joi schema for validating the configuration
     * @param rawConfig unknown - Raw configuration object to validate
     * @throws Joi.ValidationError if validation fails
     * @example
     * const configurator = new Configurator(Joi.object({ port: Joi.number().required() }), { port: 3000 });
     */
    constructor(schema: ObjectSchema<T>, rawConfig: unknown) {
        this._schema = schema;
        this._config = this.__validate(rawConfig);
    }

    /** Validated configuration. */
    public getConfig(): T {
        return this._config;
    }

    private __validate(rawConfig: unknown): T {
        const { error, value } = this._schema.validate(rawConfig, { abortEarly: true });

        if (error) {
            throw error;
        }
        return value;
    }
}
