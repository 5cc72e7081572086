/**
 * Result utilities for flattened error handling using await-to-js
 */
import to from 'await-to-js';

export { to };

// Success: [null, T]
// Error: [E, undefined]
export type Result<T, E = Error> = [null, T] | [E, undefined];

/**
 * Check if result is an error
 */
export const isErr = <T, E = Error>(result: Result<T, E>): result is [E, undefined] => {
    return result[0] !== null;
};

/**
 * Check if result is successful
 */
export const isOk = <T, E = Error>(result: Result<T, E>): result is [null, T] => {
    return result[0] === null;
};

export const err = <E>(error: E): [E, undefined] => [error, undefined];
