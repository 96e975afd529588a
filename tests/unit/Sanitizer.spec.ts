/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests error wrapping and information disclosure prevention.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { PreproError, ErrorSanitizer } from '../../libs/errors/sanitizer.js';

describe('ErrorSanitizer', () => {
    it('should create PreproError with incidentId', () => {
        const error = new PreproError('Test error', { secret: 'hidden' });

        assert.ok(error.incidentId, 'Should have incidentId');
        assert.ok(error.incidentId.length > 0, 'incidentId should not be empty');
        assert.strictEqual(error.publicMessage, 'Test error');
        assert.strictEqual(error.name, 'PreproError');
    });

    it('should sanitize raw errors into PreproError', () => {
        const rawError = new Error('connection refused: password=test-secret');
        const sanitized = ErrorSanitizer.sanitize(rawError, 'Article.save');

        assert.ok(sanitized instanceof PreproError, 'Should be PreproError');
        assert.strictEqual(
            sanitized.publicMessage,
            'An internal error occurred. Please contact support with ID: Article.save'
        );
        assert.strictEqual(sanitized.cause, rawError);
        assert.strictEqual(sanitized.contextLabel, 'Article.save');
    });

    it('should sanitize non-Error throwables', () => {
        const fromString = ErrorSanitizer.sanitize('plain failure', 'ctx');
        const fromObject = ErrorSanitizer.sanitize({ message: 'object failure' }, 'ctx');

        assert.ok(fromString instanceof PreproError);
        assert.deepStrictEqual(fromObject.internalDetails, {
            originalError: 'object failure',
            stack: undefined,
            context: 'ctx'
        });
    });

    it('should pass through existing PreproError unchanged', () => {
        const original = new PreproError('Original', { data: 'test' });
        const result = ErrorSanitizer.sanitize(original, 'test-context');

        assert.strictEqual(result, original, 'Should return same instance');
        assert.strictEqual(result.incidentId, original.incidentId);
    });
});
