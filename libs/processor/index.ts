export type { WritableRecord, ProcessorConfig, ProcessorResult } from './processor.js';
export { Processor } from './processor.js';
export type { ProcessorHook, ProcessorHooks, ProcessorHookName } from './hooks.js';
export { resolveHooks } from './hooks.js';
