import { z } from 'zod';

// --- Record Schemas ---

export const RecordIdSchema = z.union([
    z.number().int().nonnegative(),
    z.string().min(1).max(128)
]);

export const AttributePayloadSchema = z.record(z.string(), z.unknown());

/**
 * Update payloads name the record they change through `id`.
 */
export const UpdatePayloadSchema = z.object({
    id: RecordIdSchema
}).passthrough();

// --- Option Schemas ---

export const PresentOptionsSchema = z.object({
    enforcePermissions: z.boolean().default(true)
}).passthrough();

export const ProcessOptionsSchema = z.object({
    as: z.string().min(1).optional()
}).passthrough();

export type PresentOptions = z.input<typeof PresentOptionsSchema>;
export type ResolvedPresentOptions = z.output<typeof PresentOptionsSchema>;
export type ProcessOptions = z.input<typeof ProcessOptionsSchema>;
export type ResolvedProcessOptions = z.output<typeof ProcessOptionsSchema>;
