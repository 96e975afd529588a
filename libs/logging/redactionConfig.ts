/**
 * Centralized Redaction Configuration
 * Processor hooks log attribute payloads at debug level; these keys never reach the log sink.
 */
export const REDACT_KEYS = [
    // Credentials (Root and Nested)
    'password', '*.password',
    'password_confirmation', '*.password_confirmation',
    'passwordConfirmation', '*.passwordConfirmation',
    'token', '*.token',
    'access_token', '*.access_token',
    'refresh_token', '*.refresh_token',
    'secret', '*.secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',
    'authorization', '*.authorization',

    // PII (Root and Nested)
    'ssn', '*.ssn',
    'credit_card', '*.credit_card',
    'creditCard', '*.creditCard'
];

export const REDACT_CENSOR = '[REDACTED]';
