/**
 * Unit Tests: Error Sanitizer
 *
 * Tests error wrapping and credential scrubbing of tool output.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ReboundError, sanitizeErrorMessage } from '../../libs/errors/sanitizer.js';

describe('ReboundError', () => {
    it('should carry an errorId and keep internals out of the message', () => {
        const error = new ReboundError('Engine failure', { secret: 'test-secret' }, 'INPUT');

        assert.ok(error.errorId.length > 0, 'errorId should not be empty');
        assert.strictEqual(error.publicMessage, 'Engine failure');
        assert.strictEqual(error.message, 'Engine failure');
        assert.strictEqual(error.category, 'INPUT');
        assert.strictEqual(error.name, 'ReboundError');
        assert.ok(error instanceof Error);
    });

    it('should default to the INTERNAL category', () => {
        assert.strictEqual(new ReboundError('x').category, 'INTERNAL');
    });

    it('should keep the cause and context label', () => {
        const cause = new Error('root');
        const error = new ReboundError('wrapped', undefined, 'CONFIG', { cause, contextLabel: 'loader' });

        assert.strictEqual(error.cause, cause);
        assert.strictEqual(error.contextLabel, 'loader');
    });

    it('should issue a distinct errorId per error', () => {
        assert.notStrictEqual(new ReboundError('a').errorId, new ReboundError('a').errorId);
    });
});

describe('sanitizeErrorMessage', () => {
    it('should redact credential fragments', () => {
        assert.strictEqual(
            sanitizeErrorMessage('login failed: password=test-secret user=admin'),
            'login failed: password=[REDACTED] user=admin'
        );
        assert.strictEqual(
            sanitizeErrorMessage('HTTP 401 token: test-token'),
            'HTTP 401 token=[REDACTED]'
        );
        assert.strictEqual(
            sanitizeErrorMessage('shodan api_key=test-key rejected'),
            'shodan api_key=[REDACTED] rejected'
        );
    });

    it('should leave ordinary messages untouched', () => {
        assert.strictEqual(sanitizeErrorMessage('Connection timed out'), 'Connection timed out');
    });

    it('should cap the stored message length', () => {
        assert.strictEqual(sanitizeErrorMessage('x'.repeat(5000)).length, 2000);
    });
});
