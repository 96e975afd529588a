import type { Logger } from 'pino';
import { getComponentLogger } from '../logging/logger.js';
import { requirePermission, type Viewable } from '../policy/accessPolicy.js';
import { createPresentationContext } from '../context/requestContext.js';
import { validate } from '../validation/zod-middleware.js';
import {
    AttributePayloadSchema,
    PresentOptionsSchema,
    RecordIdSchema,
    type PresentOptions,
    type ResolvedPresentOptions
} from '../validation/schema.js';
import type { AttributePayload, ReadableRecordProvider, RecordId } from '../records/provider.js';
import { DecoratedRecord } from './decorator.js';
import type { ViewContext } from './viewContext.js';

/**
 * What a presenter accepts: an id to fetch, attributes for an unsaved record,
 * a record already loaded, or a collection of records to list.
 */
export type PresentTarget<TRecord> = RecordId | AttributePayload | TRecord | readonly TRecord[];

export type SingleTarget<TRecord> = RecordId | AttributePayload | TRecord;

export interface PresenterConfig<TRecord, TActor> {
    readonly provider: ReadableRecordProvider<TRecord, TActor>;
    readonly logger?: Logger;
}

function isCollection<TRecord>(target: PresentTarget<TRecord>): target is readonly TRecord[] {
    return Array.isArray(target);
}

/**
 * Presenter (read side)
 * Loads records or collections, checks that the actor may view or list them,
 * and decorates them for display. Never persists anything.
 */
export class Presenter<TRecord extends Viewable<TActor>, TActor, TView extends ViewContext = ViewContext> {
    protected readonly provider: ReadableRecordProvider<TRecord, TActor>;
    protected readonly log: Logger;

    constructor(config: PresenterConfig<TRecord, TActor>) {
        this.provider = config.provider;
        this.log = getComponentLogger('Presenter', config.provider.recordType, config.logger);
    }

    present(
        target: readonly TRecord[],
        actor: TActor,
        viewContext: TView,
        options?: PresentOptions
    ): Promise<DecoratedRecord<TRecord, TActor, TView>[]>;
    present(
        target: SingleTarget<TRecord>,
        actor: TActor,
        viewContext: TView,
        options?: PresentOptions
    ): Promise<DecoratedRecord<TRecord, TActor, TView>>;
    async present(
        target: PresentTarget<TRecord>,
        actor: TActor,
        viewContext: TView,
        options: PresentOptions = {}
    ): Promise<DecoratedRecord<TRecord, TActor, TView> | DecoratedRecord<TRecord, TActor, TView>[]> {
        if (isCollection(target)) {
            return this.presentCollection(target, actor, viewContext, options);
        }
        return this.presentSingle(target, actor, viewContext, options);
    }

    /**
     * Listing: one `listableBy` check against the record type, then every element is decorated.
     */
    async presentCollection(
        records: readonly TRecord[],
        actor: TActor,
        viewContext: TView,
        options: PresentOptions = {}
    ): Promise<DecoratedRecord<TRecord, TActor, TView>[]> {
        const resolved = this.resolveOptions(options, 'presentCollection');

        if (resolved.enforcePermissions) {
            await requirePermission(this.provider.listableBy(actor), {
                action: 'list',
                recordType: this.provider.recordType
            });
        }

        this.log.debug({ count: records.length }, 'Presenting collection');
        return records.map(record => this.decorate(record, actor, viewContext, resolved));
    }

    async presentSingle(
        target: SingleTarget<TRecord>,
        actor: TActor,
        viewContext: TView,
        options: PresentOptions = {}
    ): Promise<DecoratedRecord<TRecord, TActor, TView>> {
        const resolved = this.resolveOptions(options, 'presentSingle');
        const record = await this.loadRecord(target);

        if (resolved.enforcePermissions) {
            await requirePermission(record.viewableBy(actor), {
                action: 'view',
                recordType: this.provider.recordType,
                recordId: this.provider.idOf(record)
            });
        }

        return this.decorate(record, actor, viewContext, resolved);
    }

    /**
     * Resolves a single target to a record without checking permissions.
     * Ids are fetched, records pass through, anything else builds an unsaved record.
     */
    async loadRecord(target: SingleTarget<TRecord>): Promise<TRecord> {
        if (typeof target === 'string' || typeof target === 'number') {
            const id = validate(RecordIdSchema, target, `${this.provider.recordType}.find`);
            return this.provider.findById(id);
        }
        if (this.provider.isRecord(target)) {
            return target;
        }

        const attributes = validate(AttributePayloadSchema, target, `${this.provider.recordType}.build`);
        return this.provider.build(attributes);
    }

    protected decorate(
        record: TRecord,
        actor: TActor,
        viewContext: TView,
        options: ResolvedPresentOptions
    ): DecoratedRecord<TRecord, TActor, TView> {
        return new DecoratedRecord(record, createPresentationContext(actor, viewContext, options));
    }

    private resolveOptions(options: PresentOptions, operation: string): ResolvedPresentOptions {
        return validate(PresentOptionsSchema, options, `${this.provider.recordType}.${operation}`);
    }
}
