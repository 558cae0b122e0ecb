export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const levels: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3
};

let currentLevel: LogLevel = 'info';

export const isLogLevel = (value: string): value is LogLevel => {
    return LOG_LEVELS.some(level => level === value);
};

const formatMessage = (scope: string | undefined, message: string, meta?: Record<string, unknown>): string => {
    const prefix = scope ? `[${scope}] ` : '';
    if (!meta || Object.keys(meta).length === 0) {
        return `${prefix}${message}`;
    }
    return `${prefix}${message} | ${JSON.stringify(meta)}`;
};

export interface Logger {
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
    debug(message: string, meta?: Record<string, unknown>): void;
}

const createScopedLogger = (scope?: string): Logger => ({
    info: (message, meta) => {
        if (levels[currentLevel] >= levels.info) {
            console.log(formatMessage(scope, message, meta));
        }
    },
    warn: (message, meta) => {
        if (levels[currentLevel] >= levels.warn) {
            console.warn(formatMessage(scope, message, meta));
        }
    },
    error: (message, meta) => {
        console.error(formatMessage(scope, message, meta));
    },
    debug: (message, meta) => {
        if (levels[currentLevel] >= levels.debug) {
            console.debug(formatMessage(scope, message, meta));
        }
    }
});

export const logger = {
    ...createScopedLogger(),
    setLevel: (level: LogLevel) => {
        currentLevel = level;
    },
    getLevel: (): LogLevel => currentLevel,
    child: (scope: string): Logger => createScopedLogger(scope)
};
