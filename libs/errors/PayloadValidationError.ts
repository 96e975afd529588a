export interface PayloadIssue {
    readonly path: string;
    readonly message: string;
}

export class PayloadValidationError extends Error {
    readonly code = 'PAYLOAD_INVALID';
    readonly contextLabel: string;
    readonly issues: readonly PayloadIssue[];
    readonly statusCode: number = 422;

    constructor(contextLabel: string, issues: readonly PayloadIssue[]) {
        super(`Validation Violation in ${contextLabel}: ${JSON.stringify(issues)}`);
        this.name = 'PayloadValidationError';
        this.contextLabel = contextLabel;
        this.issues = issues;
        Object.setPrototypeOf(this, PayloadValidationError.prototype);
    }
}
