/**
 * Returns the current timestamp in ISO format.
 * @example
 * const ts = GetTimestamp(); // '2025-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for application logging.
 */
export enum LogLevel {
    Critical = 'CRITICAL',
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

/** Configuration-facing level names. */
export type LogLevelName = `debug` | `info` | `warn` | `error`;

const __severity: Record<LogLevel, number> = {
    [LogLevel.Critical]: 50,
    [LogLevel.Error]: 40,
    [LogLevel.Warning]: 30,
    [LogLevel.Info]: 20,
    [LogLevel.Debug]: 10,
};

const __byName: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.Debug,
    info: LogLevel.Info,
    warn: LogLevel.Warning,
    error: LogLevel.Error,
};

let __minimum: LogLevel = LogLevel.Info;

function __isLevelName(level: string): level is LogLevelName {
    return level in __byName;
}

/**
 * Sets the minimum level that reaches the console.
 * @param level LogLevel | LogLevelName - Lowest level still printed
 * @example
 * SetLogLevel('debug');
 */
export function SetLogLevel(level: LogLevel | LogLevelName): void {
    __minimum = __isLevelName(level) ? __byName[level] : level;
}

/** Current minimum level. */
export function GetLogLevel(): LogLevel {
    return __minimum;
}

/**
 * Logs a message at the specified level, prepending a timestamp and the origin.
 * @param level LogLevel - Level of the log
 * @param message string - Message to log
 * @param from string - Source identifier (class or module)
 * @param context string - Optional additional context
 * @example
 * log(LogLevel.Info, 'Module loaded', 'Framework');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    if (__severity[level] < __severity[__minimum]) {
        return;
    }
    const timestamp = GetTimestamp();
    const body = context ? `[${context}] ${message}` : message;
    const formatted = `[${timestamp}] [${level}] [${from}] ${body}`;
    const logger = console;

    switch (level) {
        case LogLevel.Critical:
        case LogLevel.Error:
            logger.error(formatted);
            break;
        case LogLevel.Warning:
            logger.warn(formatted);
            break;
        case LogLevel.Info:
            logger.info(formatted);
            break;
        case LogLevel.Debug:
            logger.debug(formatted);
            break;
    }
}

/**
 * Shorthand helpers per level.
 */
export namespace log {
    /** Logs a critical level message. */
    export function critical(message: string, from: string, context?: string): void {
        log(LogLevel.Critical, message, from, context);
    }

    /** Logs an error level message. */
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    /** Logs a warning level message. */
    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    /** Logs an informational level message. */
    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    /** Logs a debug level message. */
    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }
}
