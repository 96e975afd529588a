/**
 * Access policy: capability interfaces and the permission choke point.
 */

export type {
    PermissionResult,
    Viewable,
    Listable,
    Creatable,
    Updatable,
    Destroyable,
    RecordAccessPolicy,
    PermissionCheck
} from './accessPolicy.js';
export { enforcePermissions, requirePermission } from './accessPolicy.js';
