import type { ChannelType } from 'discord.js';
import type { ChoiceValue, LeafOptionType, OptionChoice, OptionSchema, OptionValue } from '../../Domain/Option.js';

/**
 * Fluent builder for one option schema.
 * @example
 * new OptionBuilder(ApplicationCommandOptionType.Integer)
 *   .setName('amount')
 *   .setDescription('How many')
 *   .setRequired(true)
 *   .setMinValue(1);
 */
export class OptionBuilder {
    private _name = ``;
    private _description = ``;
    private _required = false;
    private _default?: OptionValue;
    private _choices: OptionChoice[] = [];
    private _minValue?: number;
    private _maxValue?: number;
    private _minLength?: number;
    private _maxLength?: number;
    private _channelTypes: ChannelType[] = [];
    private _autocomplete = false;

    constructor(private readonly type: LeafOptionType) {}

    public setName(name: string): this {
        this._name = name;
        return this;
    }

    public setDescription(description: string): this {
        this._description = description;
        return this;
    }

    public setRequired(required: boolean): this {
        this._required = required;
        return this;
    }

    /** Value used when an optional option is omitted. */
    public setDefault(value: OptionValue): this {
        this._default = value;
        return this;
    }

    public addChoice(name: string, value: ChoiceValue): this {
        this._choices.push({ name, value });
        return this;
    }

    public addChoices(...choices: OptionChoice[]): this {
        this._choices.push(...choices);
        return this;
    }

    public setMinValue(value: number): this {
        this._minValue = value;
        return this;
    }

    public setMaxValue(value: number): this {
        this._maxValue = value;
        return this;
    }

    public setMinLength(length: number): this {
        this._minLength = length;
        return this;
    }

    public setMaxLength(length: number): this {
        this._maxLength = length;
        return this;
    }

    /** Restrict channel options to the given channel types. */
    public addChannelTypes(...types: ChannelType[]): this {
        this._channelTypes.push(...types);
        return this;
    }

    public setAutocomplete(enabled: boolean): this {
        this._autocomplete = enabled;
        return this;
    }

    /** Freeze into an option schema. Invariants are enforced when the owning command registers. */
    public build(): OptionSchema {
        return Object.freeze({
            name: this._name,
            description: this._description,
            type: this.type,
            required: this._required,
            defaultValue: this._default,
            choices: Object.freeze([...this._choices]),
            minValue: this._minValue,
            maxValue: this._maxValue,
            minLength: this._minLength,
            maxLength: this._maxLength,
            channelTypes: Object.freeze([...this._channelTypes]),
            autocomplete: this._autocomplete,
        });
    }
}
