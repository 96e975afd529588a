import { logger } from '../logging/logger.js';
import { AuthorizationError, type PermissionAction } from '../errors/AuthorizationError.js';
import type { RecordId } from '../records/provider.js';

/**
 * Access Policy capability interfaces.
 * Each record type implements the predicates it supports; mediators depend only
 * on these interfaces, never on concrete record classes.
 */

export type PermissionResult = boolean | Promise<boolean>;

export interface Viewable<TActor> {
    viewableBy(actor: TActor): PermissionResult;
}

/** Implemented by the record type (its provider), not by single records. */
export interface Listable<TActor> {
    listableBy(actor: TActor): PermissionResult;
}

export interface Creatable<TActor> {
    creatableBy(actor: TActor): PermissionResult;
}

export interface Updatable<TActor> {
    updatableBy(actor: TActor): PermissionResult;
}

export interface Destroyable<TActor> {
    destroyableBy(actor: TActor): PermissionResult;
}

export type RecordAccessPolicy<TActor> =
    Viewable<TActor> & Creatable<TActor> & Updatable<TActor> & Destroyable<TActor>;

export interface PermissionCheck {
    readonly action: PermissionAction;
    readonly recordType: string;
    readonly recordId?: RecordId;
}

/**
 * The single choke point for permission decisions.
 * Throws AuthorizationError unless the actor has permission.
 */
export function enforcePermissions(hasPermission: boolean, check: PermissionCheck): void {
    const { action, recordType, recordId } = check;

    if (!hasPermission) {
        logger.warn({
            action,
            recordType,
            recordId,
            decision: 'DENY'
        }, 'Authorization Failed - Access Denied');
        throw new AuthorizationError(action, recordType, recordId);
    }

    logger.debug({
        action,
        recordType,
        recordId,
        decision: 'ALLOW'
    }, 'Authorization Successful');
}

/**
 * Awaits a predicate result and enforces it. Anything but a literal `true` denies.
 */
export async function requirePermission(permission: PermissionResult, check: PermissionCheck): Promise<void> {
    const hasPermission = await permission;
    enforcePermissions(hasPermission === true, check);
}
