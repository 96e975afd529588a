import type { Logger } from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';
import { getComponentLogger } from '../logging/logger.js';
import {
    requirePermission,
    type Creatable,
    type Destroyable,
    type Updatable
} from '../policy/accessPolicy.js';
import { createProcessingContext, type ProcessingContext } from '../context/requestContext.js';
import { validate } from '../validation/zod-middleware.js';
import {
    ProcessOptionsSchema,
    RecordIdSchema,
    UpdatePayloadSchema,
    type ProcessOptions,
    type ResolvedProcessOptions
} from '../validation/schema.js';
import type { AttributePayload, RecordId, WritableRecordProvider } from '../records/provider.js';
import { resolveHooks, type ProcessorHookName, type ProcessorHooks } from './hooks.js';

export type WritableRecord<TActor> = Creatable<TActor> & Updatable<TActor> & Destroyable<TActor>;

export interface ProcessorConfig<TRecord, TActor> {
    readonly provider: WritableRecordProvider<TRecord, TActor>;
    readonly hooks?: Partial<ProcessorHooks<TRecord, TActor>>;
    /** Whitelist/coercion applied to attributes before they are assigned */
    readonly attributesSchema?: ZodType<AttributePayload, ZodTypeDef, unknown>;
    /** Parent for the processor's component logger; the package root logger by default */
    readonly logger?: Logger;
}

/**
 * Outcome of a write. `success` is what the provider's save reported;
 * a false value carries the unsaved record so callers can re-render input errors.
 */
export interface ProcessorResult<TRecord> {
    readonly record: TRecord;
    readonly success: boolean;
}

type WriteAction = 'create' | 'update' | 'destroy';

/**
 * Processor (write side)
 * Mediates create, update and destroy: resolve → authorize → hooks → assign → persist.
 */
export class Processor<TRecord extends WritableRecord<TActor>, TActor> {
    protected readonly provider: WritableRecordProvider<TRecord, TActor>;
    protected readonly hooks: ProcessorHooks<TRecord, TActor>;
    protected readonly log: Logger;
    private readonly attributesSchema?: ZodType<AttributePayload, ZodTypeDef, unknown>;

    constructor(config: ProcessorConfig<TRecord, TActor>) {
        this.provider = config.provider;
        this.hooks = resolveHooks(config.hooks);
        this.attributesSchema = config.attributesSchema;
        this.log = getComponentLogger('Processor', config.provider.recordType, config.logger);
    }

    async create(
        attributes: AttributePayload,
        actor: TActor,
        options: ProcessOptions = {}
    ): Promise<ProcessorResult<TRecord>> {
        const resolved = this.resolveOptions(options, 'create');
        const record = await this.provider.build();

        await requirePermission(record.creatableBy(actor), {
            action: 'create',
            recordType: this.provider.recordType
        });

        const permitted = this.permitAttributes(attributes, 'create');
        const context = createProcessingContext(permitted, actor, resolved);

        await this.runHook('beforeAssignOnCreate', record, context);
        await this.provider.assign(record, permitted, { as: resolved.as });
        await this.runHook('beforeSaveOnCreate', record, context);

        const success = await this.provider.save(record);
        this.reportSave('create', record, success);
        return { record, success };
    }

    /**
     * Updates the record named by `attributes.id`. The id itself is never re-assigned.
     */
    async update(
        attributes: AttributePayload,
        actor: TActor,
        options: ProcessOptions = {}
    ): Promise<ProcessorResult<TRecord>> {
        const resolved = this.resolveOptions(options, 'update');
        const { id, ...changes } = validate(UpdatePayloadSchema, attributes, `${this.provider.recordType}.update`);
        const record = await this.provider.findById(id);

        await requirePermission(record.updatableBy(actor), {
            action: 'update',
            recordType: this.provider.recordType,
            recordId: id
        });

        const permitted = this.permitAttributes(changes, 'update');
        const context = createProcessingContext({ ...permitted, id }, actor, resolved);

        await this.runHook('beforeAssignOnUpdate', record, context);
        await this.provider.assign(record, permitted, { as: resolved.as });
        await this.runHook('beforeSaveOnUpdate', record, context);

        const success = await this.provider.save(record);
        this.reportSave('update', record, success);
        return { record, success };
    }

    async destroy(
        id: RecordId,
        actor: TActor,
        options: ProcessOptions = {}
    ): Promise<ProcessorResult<TRecord>> {
        this.resolveOptions(options, 'destroy');
        const recordId = validate(RecordIdSchema, id, `${this.provider.recordType}.destroy`);
        const record = await this.provider.findById(recordId);

        await requirePermission(record.destroyableBy(actor), {
            action: 'destroy',
            recordType: this.provider.recordType,
            recordId
        });

        await this.provider.destroy(record);
        this.log.info({ recordId }, 'Record destroyed');
        return { record, success: true };
    }

    private async runHook(
        name: ProcessorHookName,
        record: TRecord,
        context: ProcessingContext<TActor>
    ): Promise<void> {
        this.log.debug({ hook: name, attributes: context.attributes }, 'Running processor hook');
        await this.hooks[name](record, context);
    }

    private permitAttributes(attributes: AttributePayload, action: WriteAction): AttributePayload {
        if (!this.attributesSchema) return attributes;
        return validate(this.attributesSchema, attributes, `${this.provider.recordType}.${action}`);
    }

    private reportSave(action: WriteAction, record: TRecord, success: boolean): void {
        const recordId = this.provider.idOf(record);
        if (success) {
            this.log.info({ action, recordId }, 'Record saved');
        } else {
            this.log.warn({ action, recordId }, 'Record save rejected by provider');
        }
    }

    private resolveOptions(options: ProcessOptions, action: WriteAction): ResolvedProcessOptions {
        return validate(ProcessOptionsSchema, options, `${this.provider.recordType}.${action}.options`);
    }
}
