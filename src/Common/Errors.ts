/**
 * Error taxonomy for the dispatch core.
 * Every error carries a machine-readable code, optional structured details and an optional cause.
 *
 * Conventions:
 * - Class names are PascalCase and end in `Error`.
 * - Error codes are SNAKE_CASE and globally unique.
 * - Registration-time errors are thrown; per-invocation errors are routed through the error hooks.
 */

/** Well-known error codes. */
export const ERROR_CODES = {
    VALIDATION_ERROR: 'VALIDATION_ERROR',
    CONFIG_ERROR: 'CONFIG_ERROR',
    INVALID_SCHEMA: 'INVALID_SCHEMA',
    DUPLICATE_COMMAND: 'DUPLICATE_COMMAND',
    UNKNOWN_COMMAND: 'UNKNOWN_COMMAND',
    UNKNOWN_OPTION: 'UNKNOWN_OPTION',
    CHECK_FAILED: 'CHECK_FAILED',
    MISSING_OPTION: 'MISSING_OPTION',
    INVALID_OPTION_VALUE: 'INVALID_OPTION_VALUE',
    HANDLER_FAULT: 'HANDLER_FAULT',
    HOOK_FAULT: 'HOOK_FAULT',
    TIMEOUT: 'TIMEOUT',
    STALE_INTERACTION: 'STALE_INTERACTION',
    ALREADY_RESPONDED: 'ALREADY_RESPONDED',
    INVALID_STATE: 'INVALID_STATE',
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

/** Union type of all known error code string literals. */
export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/** Structured diagnostic metadata attached to an error. */
export type ErrorDetails = Record<string, unknown>;

/**
 * Base error carrying a machine code and structured details.
 */
export class AppError extends Error {
    /** Machine readable error code (SNAKE_CASE). */
    public readonly code: ErrorCode;
    /** Structured metadata for diagnostics. */
    public readonly details?: ErrorDetails;

    /**
     * @param code Machine error code (see ERROR_CODES)
     * @param message Human readable summary
     * @param details Additional structured context (command path, option name, ...)
     * @param cause Original error object or value
     */
    constructor(code: ErrorCode, message: string, details?: ErrorDetails, cause?: unknown) {
        super(message, { cause });
        this.name = new.target.name;
        this.code = code;
        this.details = details;
        // Maintain proper prototype chain (TS/JS quirk)
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/** Input or configuration failed validation. */
export class ValidationError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.VALIDATION_ERROR, message, details);
    }
}

/** Configuration could not be read or did not match the schema. */
export class ConfigError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.CONFIG_ERROR, message, details, cause);
    }
}

/** A command node or option schema violates a declaration invariant. */
export class InvalidSchemaError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.INVALID_SCHEMA, message, details);
    }
}

/** A (scope, name, group, subcommand) entry is already registered. */
export class DuplicateCommandError extends AppError {
    constructor(path: string, scope: string) {
        super(ERROR_CODES.DUPLICATE_COMMAND, `Command '${path}' already registered in scope '${scope}'`, {
            path,
            scope,
        });
    }
}

/** No invokable command matches the requested path. */
export class UnknownCommandError extends AppError {
    constructor(path: string, scope: string | null) {
        super(ERROR_CODES.UNKNOWN_COMMAND, `Command '${path}' not found`, { path, scope });
    }
}

/** Autocomplete targeted an option that is missing or not autocomplete-eligible. */
export class UnknownOptionError extends AppError {
    constructor(path: string, option: string, reason: 'missing' | 'not-autocomplete') {
        super(
            ERROR_CODES.UNKNOWN_OPTION,
            reason === 'missing'
                ? `Command '${path}' has no option '${option}'`
                : `Option '${option}' of command '${path}' does not support autocomplete`,
            { path, option, reason },
        );
    }
}

/** A check denied the invocation, or its predicate threw. */
export class CheckFailedError extends AppError {
    /** Name of the failing check. */
    public readonly check: string;
    /** Scope that owned the failing check. */
    public readonly scope: string;

    constructor(check: string, scope: string, cause?: unknown) {
        super(
            ERROR_CODES.CHECK_FAILED,
            cause === undefined ? `Check '${check}' failed` : `Check '${check}' raised an error`,
            { check, scope },
            cause,
        );
        this.check = check;
        this.scope = scope;
    }
}

/** A required option was not supplied. */
export class MissingOptionError extends AppError {
    constructor(option: string, path: string) {
        super(ERROR_CODES.MISSING_OPTION, `Missing required option '${option}'`, { option, path });
    }
}

/** An option value failed type, choice, bound or channel-type validation. */
export class InvalidOptionValueError extends AppError {
    constructor(option: string, message: string, details?: ErrorDetails) {
        super(ERROR_CODES.INVALID_OPTION_VALUE, message, { option, ...details });
    }
}

/** Wraps anything thrown by application handler code. */
export class HandlerFaultError extends AppError {
    constructor(path: string, cause: unknown) {
        super(ERROR_CODES.HANDLER_FAULT, `Handler for '${path}' failed: ${describeCause(cause)}`, { path }, cause);
    }
}

/** A pre-run or post-run hook threw. */
export class HookFaultError extends AppError {
    constructor(stage: string, scope: string, hook: string, cause: unknown) {
        super(
            ERROR_CODES.HOOK_FAULT,
            `${stage} hook '${hook}' (${scope}) failed: ${describeCause(cause)}`,
            { stage, scope, hook },
            cause,
        );
    }
}

/** A deadline elapsed (autocomplete budget or response window) or no response was ever sent. */
export class TimeoutError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.TIMEOUT, message, details);
    }
}

/** A send was attempted after the interaction's response window closed. */
export class StaleInteractionError extends AppError {
    constructor(interactionId: string) {
        super(ERROR_CODES.STALE_INTERACTION, `Interaction '${interactionId}' is no longer answerable`, {
            interactionId,
        });
    }
}

/** The interaction was already responded to (or already deferred). */
export class AlreadyRespondedError extends AppError {
    constructor(interactionId: string) {
        super(ERROR_CODES.ALREADY_RESPONDED, `Interaction '${interactionId}' has already been responded to`, {
            interactionId,
        });
    }
}

/** An operation is not valid in the current response state. */
export class InvalidStateError extends AppError {
    constructor(message: string, details?: ErrorDetails) {
        super(ERROR_CODES.INVALID_STATE, message, details);
    }
}

/** Generic internal error wrapper when no more specific category applies. */
export class InternalError extends AppError {
    constructor(message: string, details?: ErrorDetails, cause?: unknown) {
        super(ERROR_CODES.INTERNAL_ERROR, message, details, cause);
    }
}

/**
 * Render an arbitrary thrown value as a short message.
 * @example
 * describeCause(new Error('boom')); // 'boom'
 */
export function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        return cause.message;
    }
    return String(cause);
}
