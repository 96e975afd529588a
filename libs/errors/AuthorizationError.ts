import type { RecordId } from '../records/provider.js';

export type PermissionAction = 'view' | 'list' | 'create' | 'update' | 'destroy';

export type AuthorizationErrorCode =
    | 'NOT_VIEWABLE'
    | 'NOT_LISTABLE'
    | 'NOT_CREATABLE'
    | 'NOT_UPDATABLE'
    | 'NOT_DESTROYABLE';

const CODE_BY_ACTION: Record<PermissionAction, AuthorizationErrorCode> = {
    view: 'NOT_VIEWABLE',
    list: 'NOT_LISTABLE',
    create: 'NOT_CREATABLE',
    update: 'NOT_UPDATABLE',
    destroy: 'NOT_DESTROYABLE'
};

/**
 * AuthorizationError
 * Raised when an access policy predicate denies the actor, before any mutation.
 */
export class AuthorizationError extends Error {
    readonly code: AuthorizationErrorCode;
    readonly action: PermissionAction;
    readonly recordType: string;
    readonly recordId: RecordId | undefined;
    readonly statusCode: number = 403;

    constructor(action: PermissionAction, recordType: string, recordId?: RecordId, message?: string) {
        super(message || `Access denied: cannot ${action} ${recordType}${recordId === undefined ? '' : ` ${recordId}`}`);
        this.name = 'AuthorizationError';
        this.code = CODE_BY_ACTION[action];
        this.action = action;
        this.recordType = recordType;
        this.recordId = recordId;
        Object.setPrototypeOf(this, AuthorizationError.prototype);
    }
}
