/**
 * Unit Tests: ErrorSanitizer
 *
 * Tests error wrapping and information disclosure prevention.
 *
 * @see libs/errors/sanitizer.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ErrorSanitizer, RefillSystemError } from '../../libs/errors/sanitizer.js';

describe('ErrorSanitizer', () => {
    it('should create RefillSystemError with incidentId', () => {
        const error = new RefillSystemError('Test error', { patientRef: 'P-1001' }, 'SAFETY');

        assert.ok(error.incidentId.length > 0, 'incidentId should not be empty');
        assert.strictEqual(error.publicMessage, 'Test error');
        assert.strictEqual(error.category, 'SAFETY');
    });

    it('should sanitize raw errors into RefillSystemError', () => {
        const rawError = new Error('insert into workflow_sessions failed for patient P-1001');
        const sanitized = ErrorSanitizer.sanitize(rawError, 'SessionStore.compareAndPut');

        assert.ok(sanitized instanceof RefillSystemError, 'Should be RefillSystemError');
        assert.strictEqual(
            sanitized.publicMessage,
            'An internal system error occurred. Please retry; reference: SessionStore.compareAndPut'
        );
        assert.strictEqual(sanitized.category, 'OPS');
        assert.strictEqual(sanitized.cause, rawError);
    });

    it('should keep the driver error code as sqlState', () => {
        const pgError = Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
        const sanitized = ErrorSanitizer.sanitize(pgError, 'AuditLog.append');

        assert.strictEqual(sanitized.sqlState, '23505');
        assert.strictEqual(sanitized.contextLabel, 'AuditLog.append');
    });

    it('should wrap thrown non-errors', () => {
        const sanitized = ErrorSanitizer.sanitize('socket hang up', 'RefillRouter');
        assert.strictEqual(sanitized.sqlState, undefined);
        assert.strictEqual(sanitized.cause, 'socket hang up');
    });

    it('should pass through existing RefillSystemError unchanged', () => {
        const original = new RefillSystemError('Original', { data: 'test' }, 'DATA');
        const result = ErrorSanitizer.sanitize(original, 'test-context');

        assert.strictEqual(result, original, 'Should return same instance');
        assert.strictEqual(result.incidentId, original.incidentId);
    });
});
