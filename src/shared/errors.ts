/**
 * Error handling utilities using ts-pattern
 */
import { match, P } from 'ts-pattern';

/**
 * Extract error message from unknown error.
 * Bot API errors carry the server's own wording in `description`.
 */
export const getErrorMessage = (error: unknown): string => {
    return match(error)
        .with({ code: 'ECONNREFUSED' }, () => 'connection refused')
        .with({ code: 'ETIMEDOUT' }, () => 'connection timed out')
        // grammy's HttpError keeps the socket error in `error`
        .with({ message: P.string, error: { message: P.string } }, e => `${e.message} ${e.error.message}`)
        .with({ description: P.string }, e => e.description)
        .with({ message: P.string }, e => e.message)
        .with(P.string, str => str)
        .otherwise(() => 'unknown error');
};

/**
 * Create a typed error class
 */
export class AppError extends Error {
    constructor(
        message: string,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'AppError';
    }

    static validation(message: string): AppError {
        return new AppError(message, 'VALIDATION');
    }
}
