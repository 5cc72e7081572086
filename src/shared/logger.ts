/**
 * Line-oriented console logger
 *
 * Lines read `<timestamp> - <LEVEL> - [scope] message`; info goes to stdout,
 * warnings and errors to stderr.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export interface Logger {
    info: (message: string) => void;
    warn: (message: string) => void;
    error: (message: string) => void;
}

const levelLabels: Record<LogLevel, string> = {
    info: 'INFO',
    warn: 'WARNING',
    error: 'ERROR',
};

const writers: Record<LogLevel, (line: string) => void> = {
    info: (line) => console.log(line),
    warn: (line) => console.warn(line),
    error: (line) => console.error(line),
};

export const formatLogLine = (
    level: LogLevel,
    scope: string,
    message: string,
    now: Date = new Date()
): string => `${now.toISOString()} - ${levelLabels[level]} - [${scope}] ${message}`;

export const createLogger = (scope: string): Logger => {
    const write = (level: LogLevel) => (message: string) => {
        writers[level](formatLogLine(level, scope, message));
    };

    return {
        info: write('info'),
        warn: write('warn'),
        error: write('error'),
    };
};
