import type { Listable } from '../policy/accessPolicy.js';

export type RecordId = string | number;

export type AttributePayload = Readonly<Record<string, unknown>>;

export type Awaitable<T> = T | Promise<T>;

export interface AssignOptions {
    /** Mass-assignment role, for providers that whitelist attributes per role */
    readonly as?: string;
}

/**
 * Record Provider
 * The persistence boundary for one record type. Implementations own storage,
 * querying and validation; mediators only call into it at fixed points.
 */
export interface RecordProvider<TRecord, TActor> extends Listable<TActor> {
    /** Name used in logs and authorization errors, e.g. 'Article' */
    readonly recordType: string;

    /** Must throw (typically RecordNotFoundError) when no record has this id. */
    findById(id: RecordId): Awaitable<TRecord>;

    /** Builds an unsaved record, optionally pre-filled. Never persists. */
    build(attributes?: AttributePayload): Awaitable<TRecord>;

    assign(record: TRecord, attributes: AttributePayload, options: AssignOptions): Awaitable<void>;

    /** Persists the record; false when the record fails validation. */
    save(record: TRecord): Awaitable<boolean>;

    destroy(record: TRecord): Awaitable<void>;

    isRecord(value: unknown): value is TRecord;

    idOf(record: TRecord): RecordId | undefined;
}

export type ReadableRecordProvider<TRecord, TActor> = Pick<
    RecordProvider<TRecord, TActor>,
    'recordType' | 'findById' | 'build' | 'isRecord' | 'idOf' | 'listableBy'
>;

export type WritableRecordProvider<TRecord, TActor> = Omit<RecordProvider<TRecord, TActor>, 'listableBy'>;
