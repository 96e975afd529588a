/**
 * prepro: permission-gated presenters and processors.
 *
 * Presenter  - read side (show / list / new / edit)
 * Processor  - write side (create / update / destroy)
 */

export * from './presenter/index.js';
export * from './processor/index.js';
export * from './policy/index.js';
export * from './records/index.js';

export type {
    RequestContext,
    PresentationContext,
    ProcessingContext
} from './context/requestContext.js';
export { createPresentationContext, createProcessingContext } from './context/requestContext.js';

export type { PermissionAction, AuthorizationErrorCode } from './errors/AuthorizationError.js';
export { AuthorizationError } from './errors/AuthorizationError.js';
export { RecordNotFoundError } from './errors/RecordNotFoundError.js';
export type { PayloadIssue } from './errors/PayloadValidationError.js';
export { PayloadValidationError } from './errors/PayloadValidationError.js';
export { PreproError, ErrorSanitizer } from './errors/sanitizer.js';
export type { ErrorResponse, ErrorResponseBody } from './errors/errorResponse.js';
export { toErrorResponse } from './errors/errorResponse.js';

export type {
    PresentOptions,
    ResolvedPresentOptions,
    ProcessOptions,
    ResolvedProcessOptions
} from './validation/schema.js';
export { validate, createValidator } from './validation/zod-middleware.js';

export type { PreproConfig } from './bootstrap/config/prepro-config.js';
export { loadPreproConfig, getPreproConfig, PREPRO_CONFIG_GUARDS } from './bootstrap/config/prepro-config.js';
export type { GuardRule, Env } from './bootstrap/config-guard.js';
export { ConfigGuard, ConfigurationError } from './bootstrap/config-guard.js';

export { logger, createLogger, getComponentLogger } from './logging/logger.js';
export { LOG_LEVELS, resolveLogLevel } from './logging/logLevel.js';
