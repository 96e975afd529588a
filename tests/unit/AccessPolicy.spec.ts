/**
 * Unit Tests: Access policy choke point
 *
 * @see libs/policy/accessPolicy.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { enforcePermissions, requirePermission } from '../../libs/policy/accessPolicy.js';
import { AuthorizationError } from '../../libs/errors/AuthorizationError.js';

describe('enforcePermissions', () => {
    it('should pass when the actor has permission', () => {
        assert.doesNotThrow(() => enforcePermissions(true, { action: 'view', recordType: 'Article', recordId: 1 }));
    });

    it('should throw AuthorizationError carrying the check', () => {
        assert.throws(
            () => enforcePermissions(false, { action: 'update', recordType: 'Article', recordId: 7 }),
            (err: unknown) => {
                assert.ok(err instanceof AuthorizationError);
                assert.strictEqual(err.code, 'NOT_UPDATABLE');
                assert.strictEqual(err.action, 'update');
                assert.strictEqual(err.recordType, 'Article');
                assert.strictEqual(err.recordId, 7);
                assert.strictEqual(err.message, 'Access denied: cannot update Article 7');
                return true;
            }
        );
    });

    it('should omit the id from the message for type-level checks', () => {
        assert.throws(
            () => enforcePermissions(false, { action: 'list', recordType: 'Article' }),
            { message: 'Access denied: cannot list Article', code: 'NOT_LISTABLE' }
        );
    });
});

describe('requirePermission', () => {
    it('should await asynchronous predicates', async () => {
        await assert.doesNotReject(requirePermission(Promise.resolve(true), { action: 'create', recordType: 'Article' }));
        await assert.rejects(
            requirePermission(Promise.resolve(false), { action: 'create', recordType: 'Article' }),
            { code: 'NOT_CREATABLE' }
        );
    });

    it('should propagate predicate failures', async () => {
        await assert.rejects(
            requirePermission(Promise.reject(new Error('policy store offline')), { action: 'destroy', recordType: 'Article' }),
            /policy store offline/
        );
    });
});
