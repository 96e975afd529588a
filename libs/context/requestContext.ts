import type { AttributePayload } from '../records/provider.js';
import type { ResolvedPresentOptions, ResolvedProcessOptions } from '../validation/schema.js';

/**
 * Request Context
 * Call-scoped bundle handed to decorators and hooks. Created fresh and frozen
 * for every record a mediator touches; never stored or shared between records.
 */
export interface RequestContext<TActor, TOptions> {
    readonly actor: TActor;
    readonly options: Readonly<TOptions>;
}

export interface PresentationContext<TActor, TView> extends RequestContext<TActor, ResolvedPresentOptions> {
    readonly viewContext: TView;
}

export interface ProcessingContext<TActor> extends RequestContext<TActor, ResolvedProcessOptions> {
    readonly attributes: AttributePayload;
}

export function createPresentationContext<TActor, TView>(
    actor: TActor,
    viewContext: TView,
    options: ResolvedPresentOptions
): PresentationContext<TActor, TView> {
    return Object.freeze({
        actor,
        viewContext,
        options: Object.freeze({ ...options })
    });
}

export function createProcessingContext<TActor>(
    attributes: AttributePayload,
    actor: TActor,
    options: ResolvedProcessOptions
): ProcessingContext<TActor> {
    return Object.freeze({
        attributes: Object.freeze({ ...attributes }),
        actor,
        options: Object.freeze({ ...options })
    });
}
