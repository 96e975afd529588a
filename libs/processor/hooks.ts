import type { ProcessingContext } from '../context/requestContext.js';

export type ProcessorHook<TRecord, TActor> = (
    record: TRecord,
    context: ProcessingContext<TActor>
) => void | Promise<void>;

/**
 * Extension points around mass-assignment and persistence, in call order:
 * create: beforeAssignOnCreate → assign → beforeSaveOnCreate → save
 * update: beforeAssignOnUpdate → assign → beforeSaveOnUpdate → save
 */
export interface ProcessorHooks<TRecord, TActor> {
    readonly beforeAssignOnCreate: ProcessorHook<TRecord, TActor>;
    readonly beforeSaveOnCreate: ProcessorHook<TRecord, TActor>;
    readonly beforeAssignOnUpdate: ProcessorHook<TRecord, TActor>;
    readonly beforeSaveOnUpdate: ProcessorHook<TRecord, TActor>;
}

export type ProcessorHookName = keyof ProcessorHooks<unknown, unknown>;

const noop = (): void => undefined;

export function resolveHooks<TRecord, TActor>(
    hooks: Partial<ProcessorHooks<TRecord, TActor>> = {}
): ProcessorHooks<TRecord, TActor> {
    return Object.freeze({
        beforeAssignOnCreate: hooks.beforeAssignOnCreate ?? noop,
        beforeSaveOnCreate: hooks.beforeSaveOnCreate ?? noop,
        beforeAssignOnUpdate: hooks.beforeAssignOnUpdate ?? noop,
        beforeSaveOnUpdate: hooks.beforeSaveOnUpdate ?? noop
    });
}
