import { AuthorizationError } from './AuthorizationError.js';
import { RecordNotFoundError } from './RecordNotFoundError.js';
import { PayloadValidationError, type PayloadIssue } from './PayloadValidationError.js';
import { ErrorSanitizer } from './sanitizer.js';

export interface ErrorResponseBody {
    readonly error: string;
    readonly code: string;
    readonly issues?: readonly PayloadIssue[];
    readonly incidentId?: string;
}

export interface ErrorResponse {
    readonly status: number;
    readonly body: ErrorResponseBody;
}

/**
 * Maps a mediator failure to the reply the surrounding application renders.
 * Anything unrecognised is sanitized and reported by incident id only.
 */
export function toErrorResponse(err: unknown, contextLabel = 'prepro'): ErrorResponse {
    if (err instanceof AuthorizationError) {
        return { status: err.statusCode, body: { error: 'Access denied', code: err.code } };
    }
    if (err instanceof RecordNotFoundError) {
        return { status: err.statusCode, body: { error: 'Not found', code: err.code } };
    }
    if (err instanceof PayloadValidationError) {
        return { status: err.statusCode, body: { error: 'Invalid input', code: err.code, issues: err.issues } };
    }

    const sanitized = ErrorSanitizer.sanitize(err, contextLabel);
    return {
        status: 500,
        body: { error: sanitized.publicMessage, code: 'INTERNAL', incidentId: sanitized.incidentId }
    };
}
