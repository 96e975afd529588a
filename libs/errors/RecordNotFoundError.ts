import type { RecordId } from '../records/provider.js';

/**
 * Thrown by record providers when a lookup by id finds nothing.
 * Mediators propagate it unchanged.
 */
export class RecordNotFoundError extends Error {
    readonly code = 'RECORD_NOT_FOUND';
    readonly recordType: string;
    readonly recordId: RecordId;
    readonly statusCode: number = 404;

    constructor(recordType: string, recordId: RecordId) {
        super(`${recordType} ${recordId} not found`);
        this.name = 'RecordNotFoundError';
        this.recordType = recordType;
        this.recordId = recordId;
        Object.setPrototypeOf(this, RecordNotFoundError.prototype);
    }
}
