import { logger } from '../logging/logger.js';
import crypto from 'crypto';

/**
 * Wraps unexpected errors in a generic message with a unique incidentId
 * for log correlation, so provider internals never reach the caller's response.
 */

export class PreproError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; contextLabel?: string }
    ) {
        super(publicMessage);
        this.name = 'PreproError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.cause = options?.cause;

        // Log the full internal details with the IncidentID
        logger.error({
            incidentId: this.incidentId,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

export const ErrorSanitizer = {
    /**
     * Catches and wraps any error into a sanitized PreproError.
     */
    sanitize: (err: unknown, contextLabel: string): PreproError => {
        if (err instanceof PreproError) return err;

        let originalErrorMessage: string | undefined;
        let originalErrorStack: string | undefined;

        if (err instanceof Error) {
            originalErrorMessage = err.message;
            originalErrorStack = err.stack;
        } else if (typeof err === 'string') {
            originalErrorMessage = err;
        } else if (err && typeof err === 'object' && 'message' in err) {
            const { message } = err;
            if (typeof message === 'string') {
                originalErrorMessage = message;
            }
        } else {
            originalErrorMessage = String(err);
        }

        return new PreproError(
            `An internal error occurred. Please contact support with ID: ${contextLabel}`,
            { originalError: originalErrorMessage, stack: originalErrorStack, context: contextLabel },
            { cause: err, contextLabel }
        );
    }
};
