/**
 * Registration-time validation of command trees and option schemas.
 * The first violation found is thrown; nothing is collected.
 */
import { ApplicationCommandOptionType } from 'discord.js';
import { InvalidSchemaError } from '../Common/Errors.js';
import { FormatPath, PathOf, type CommandNode } from '../Domain/Command.js';
import { LIMITS, NAME_PATTERN } from '../Domain/Limits.js';
import { CHOICE_OPTION_TYPES, OptionTypeLabel, type OptionSchema } from '../Domain/Option.js';
import { OptionValueSchema } from './OptionCoercer.js';

const NUMERIC_TYPES: ReadonlySet<ApplicationCommandOptionType> = new Set([
    ApplicationCommandOptionType.Integer,
    ApplicationCommandOptionType.Number,
]);

const STRUCTURAL_TYPES: ReadonlySet<ApplicationCommandOptionType> = new Set([
    ApplicationCommandOptionType.Subcommand,
    ApplicationCommandOptionType.SubcommandGroup,
]);

function __fail(node: CommandNode, rule: string, message: string, option?: string): never {
    const command = FormatPath(PathOf(node));
    throw new InvalidSchemaError(`${command}: ${message}`, option === undefined ? { command, rule } : { command, option, rule });
}

function __isValidName(name: string): boolean {
    return NAME_PATTERN.test(name) && name === name.toLowerCase();
}

function __isValidDescription(description: string): boolean {
    return description.length >= 1 && description.length <= LIMITS.descriptionLength;
}

function __validateChoices(node: CommandNode, option: OptionSchema): void {
    if (option.choices.length === 0) {
        return;
    }
    if (!CHOICE_OPTION_TYPES.has(option.type)) {
        __fail(node, `choices-type`, `choices are not allowed on ${OptionTypeLabel(option.type)} options`, option.name);
    }
    if (option.choices.length > LIMITS.choicesPerOption) {
        __fail(node, `choices-count`, `more than ${LIMITS.choicesPerOption} choices`, option.name);
    }
    for (const choice of option.choices) {
        if (choice.name.length < 1 || choice.name.length > LIMITS.choiceNameLength) {
            __fail(node, `choice-name`, `choice name '${choice.name}' must be 1-${LIMITS.choiceNameLength} characters`, option.name);
        }
        const { value } = choice;
        const matches = option.type === ApplicationCommandOptionType.String
            ? typeof value === `string` && value.length <= LIMITS.choiceValueLength
            : option.type === ApplicationCommandOptionType.Integer
                ? typeof value === `number` && Number.isInteger(value)
                : typeof value === `number` && Number.isFinite(value);
        if (!matches) {
            __fail(node, `choice-value`, `choice '${choice.name}' does not match option type ${OptionTypeLabel(option.type)}`, option.name);
        }
    }
}

function __validateBounds(node: CommandNode, option: OptionSchema): void {
    const hasValueBounds = option.minValue !== undefined || option.maxValue !== undefined;
    if (hasValueBounds && !NUMERIC_TYPES.has(option.type)) {
        __fail(node, `value-bounds-type`, `min/max value only apply to Integer and Number options`, option.name);
    }
    if (option.minValue !== undefined && option.maxValue !== undefined && option.minValue > option.maxValue) {
        __fail(node, `value-bounds-order`, `minValue ${option.minValue} exceeds maxValue ${option.maxValue}`, option.name);
    }

    const hasLengthBounds = option.minLength !== undefined || option.maxLength !== undefined;
    if (hasLengthBounds && option.type !== ApplicationCommandOptionType.String) {
        __fail(node, `length-bounds-type`, `min/max length only apply to String options`, option.name);
    }
    for (const bound of [option.minLength, option.maxLength]) {
        if (bound !== undefined && (!Number.isInteger(bound) || bound < 0 || bound > LIMITS.stringOptionLength)) {
            __fail(node, `length-bounds-range`, `length bounds must be integers within 0-${LIMITS.stringOptionLength}`, option.name);
        }
    }
    if (option.minLength !== undefined && option.maxLength !== undefined && option.minLength > option.maxLength) {
        __fail(node, `length-bounds-order`, `minLength ${option.minLength} exceeds maxLength ${option.maxLength}`, option.name);
    }
}

function __validateOption(node: CommandNode, option: OptionSchema): void {
    if (!__isValidName(option.name)) {
        __fail(node, `option-name`, `invalid option name '${option.name}'`, option.name);
    }
    if (!__isValidDescription(option.description)) {
        __fail(node, `option-description`, `option description must be 1-${LIMITS.descriptionLength} characters`, option.name);
    }
    if (STRUCTURAL_TYPES.has(option.type)) {
        __fail(node, `option-structural`, `subcommands are declared as nodes, not options`, option.name);
    }
    if (option.required && option.defaultValue !== undefined) {
        __fail(node, `default-required`, `a required option cannot have a default`, option.name);
    }
    __validateChoices(node, option);
    __validateBounds(node, option);
    if (option.channelTypes.length > 0 && option.type !== ApplicationCommandOptionType.Channel) {
        __fail(node, `channel-types`, `channel types only apply to Channel options`, option.name);
    }
    if (option.defaultValue !== undefined) {
        const { error } = OptionValueSchema(option).validate(option.defaultValue, { convert: false });
        if (error) {
            __fail(node, `default-value`, `default does not satisfy the option: ${error.message}`, option.name);
        }
    }
    if (option.autocomplete) {
        if (!CHOICE_OPTION_TYPES.has(option.type)) {
            __fail(node, `autocomplete-type`, `autocomplete is not allowed on ${OptionTypeLabel(option.type)} options`, option.name);
        }
        if (option.choices.length > 0) {
            __fail(node, `autocomplete-choices`, `autocomplete and choices are mutually exclusive`, option.name);
        }
        if (!node.autocomplete.has(option.name)) {
            __fail(node, `autocomplete-callback`, `no autocomplete callback for '${option.name}'`, option.name);
        }
    }
}

function __validateOptions(node: CommandNode): void {
    if (node.options.length > LIMITS.optionsPerCommand) {
        __fail(node, `options-count`, `more than ${LIMITS.optionsPerCommand} options`);
    }
    const seen = new Set<string>();
    let optionalSeen = false;
    for (const option of node.options) {
        __validateOption(node, option);
        if (seen.has(option.name)) {
            __fail(node, `option-duplicate`, `duplicate option '${option.name}'`, option.name);
        }
        seen.add(option.name);
        if (option.required && optionalSeen) {
            __fail(node, `option-order`, `required option '${option.name}' follows an optional one`, option.name);
        }
        optionalSeen = optionalSeen || !option.required;
    }
    for (const target of node.autocomplete.keys()) {
        const option = node.options.find(o => {
            return o.name === target;
        });
        if (!option?.autocomplete) {
            __fail(node, `autocomplete-target`, `autocomplete callback bound to '${target}', which is not an autocomplete option`, target);
        }
    }
}

function __validateNode(node: CommandNode, depth: number): void {
    if (!__isValidName(node.name)) {
        __fail(node, `name`, `invalid name '${node.name}'`);
    }
    if (!__isValidDescription(node.description)) {
        __fail(node, `description`, `description must be 1-${LIMITS.descriptionLength} characters`);
    }

    if (node.kind === `group`) {
        if (node.handler) {
            __fail(node, `group-handler`, `a group cannot have a handler`);
        }
        if (node.options.length > 0) {
            __fail(node, `group-options`, `a group cannot declare options`);
        }
        if (node.autocomplete.size > 0) {
            __fail(node, `group-autocomplete`, `a group cannot declare autocomplete callbacks`);
        }
        if (node.children.size === 0) {
            __fail(node, `group-empty`, `a group needs at least one subcommand`);
        }
        if (node.children.size > LIMITS.childrenPerGroup) {
            __fail(node, `group-size`, `more than ${LIMITS.childrenPerGroup} children`);
        }
        for (const child of node.children.values()) {
            if (child.kind === `group` && depth > 0) {
                __fail(child, `depth`, `groups can only be nested one level deep`);
            }
            __validateNode(child, depth + 1);
        }
        return;
    }

    if (node.kind === `subcommand` && depth === 0) {
        __fail(node, `root-kind`, `a subcommand cannot be registered at the root`);
    }
    if (node.kind === `command` && depth > 0) {
        __fail(node, `child-kind`, `children must be subcommands or groups`);
    }
    if (!node.handler) {
        __fail(node, `handler`, `missing handler`);
    }
    if (node.children.size > 0) {
        __fail(node, `leaf-children`, `only groups can have children`);
    }
    __validateOptions(node);
}

/**
 * Validate a whole tree before anything is stored.
 * @throws InvalidSchemaError on the first violated rule; `details.rule` names it
 * @example
 * ValidateCommandTree(new CommandBuilder('ping').setDescription('Pong').setHandler(() => {}).build());
 */
export function ValidateCommandTree(root: CommandNode): void {
    if (root.parent) {
        __fail(root, `root-parent`, `only root nodes can be registered`);
    }
    if (root.scopes.length === 0) {
        __fail(root, `scopes`, `a root command needs at least one scope`);
    }
    __validateNode(root, 0);
}
