import { GrammyError, HttpError } from 'grammy';
import { describe, expect, it } from 'vitest';
import { AppError, getErrorMessage } from './errors';

describe('getErrorMessage', () => {
    it('prefers the Bot API description', () => {
        const error = new GrammyError(
            "Call to 'sendMessage' failed! (403: Forbidden: bot was blocked by the user)",
            { ok: false, error_code: 403, description: 'Forbidden: bot was blocked by the user' },
            'sendMessage',
            {}
        );

        expect(getErrorMessage(error)).toBe('Forbidden: bot was blocked by the user');
    });

    it('names common socket failures', () => {
        expect(getErrorMessage({ code: 'ECONNREFUSED', message: 'connect ECONNREFUSED 127.0.0.1:443' })).toBe(
            'connection refused'
        );
    });

    it('appends the socket error of a failed request', () => {
        const cause = Object.assign(new Error('connect ECONNREFUSED 149.154.167.220:443'), {
            code: 'ECONNREFUSED',
        });
        const error = new HttpError("Network request for 'sendMessage' failed!", cause);

        expect(getErrorMessage(error)).toBe(
            "Network request for 'sendMessage' failed! connect ECONNREFUSED 149.154.167.220:443"
        );
    });

    it('falls back to the message or the raw string', () => {
        expect(getErrorMessage(new Error('socket hang up'))).toBe('socket hang up');
        expect(getErrorMessage('boom')).toBe('boom');
        expect(getErrorMessage(42)).toBe('unknown error');
    });
});

describe('AppError.validation', () => {
    it('tags the error with the VALIDATION code', () => {
        const error = AppError.validation('bad value');

        expect(error).toBeInstanceOf(Error);
        expect(error.code).toBe('VALIDATION');
        expect(error.message).toBe('bad value');
    });
});
