/**
 * Platform limits enforced at registration time.
 */
export const LIMITS = {
    nameLength: 32,
    descriptionLength: 100,
    optionsPerCommand: 25,
    choicesPerOption: 25,
    choiceNameLength: 100,
    choiceValueLength: 100,
    childrenPerGroup: 25,
    stringOptionLength: 6000,
    autocompleteChoices: 25,
} as const;

/** Allowed command and option names: lowercase where the script has case, 1-32 chars. */
export const NAME_PATTERN = /^[-_\p{L}\p{N}]{1,32}$/u;
