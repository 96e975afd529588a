export type {
    RecordId,
    AttributePayload,
    Awaitable,
    AssignOptions,
    RecordProvider,
    ReadableRecordProvider,
    WritableRecordProvider
} from './provider.js';
