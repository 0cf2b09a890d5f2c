/**
 * Zod schemas for validating records and mapping rows read from files
 */

import { z } from 'zod';
import type { FieldValue } from '../types/index.js';

/** Field value (recursive for nested arrays and objects) */
export const fieldValueSchema: z.ZodType<FieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(fieldValueSchema),
    z.record(fieldValueSchema),
  ])
);

export const fieldMapSchema = z.record(fieldValueSchema);

export const childItemSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1).optional(),
  fields: fieldMapSchema.default({}),
  uuid: z.string().min(1).optional(),
});

export const sourceRecordSchema = z.object({
  key: z.string().trim().min(1),
  type: z.string().min(1).optional(),
  label: z.string().min(1),
  fields: fieldMapSchema.default({}),
  children: z.array(childItemSchema).optional(),
  parentPath: z.string().optional(),
});

export const mappingEntrySchema = z.object({
  key: z.string().min(1),
  assetType: z.string().min(1),
  uuid: z.string().min(1),
  parentPath: z.string().default(''),
});

export const assetStatusSchema = z.enum(['WORKING', 'PUBLISHED', 'FLAGGED']);

export type SourceRecordInput = z.input<typeof sourceRecordSchema>;
export type MappingEntryInput = z.input<typeof mappingEntrySchema>;
