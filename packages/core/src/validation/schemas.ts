/**
 * Zod schemas for validating change events read back from storage
 * and loader options read from configuration
 */

import { z } from 'zod';

/** Change type enum */
export const changeTypeSchema = z.enum([
  'New Incorporation',
  'Deregistration',
  'Field Update',
]);

/** A change event as serialized to a store (dates as ISO strings) */
export const changeEventSchema = z.object({
  identifier: z.string().min(1),
  changeType: changeTypeSchema,
  fieldChanged: z.string().min(1),
  oldValue: z.string(),
  newValue: z.string(),
  date: z.coerce.date(),
  companyName: z.string(),
  state: z.string(),
  status: z.string(),
});

/** A stored change event with its surrogate key and insertion time */
export const storedChangeEventSchema = changeEventSchema.extend({
  id: z.string().min(1),
  createdAt: z.coerce.date(),
});

/** Record fields eligible for field-update detection */
export const trackedFieldSchema = z.enum([
  'status',
  'authorizedCapital',
  'paidupCapital',
  'name',
  'address',
  'industryClassification',
]);

/** Duplicate identifier policy for loaders */
export const duplicatePolicySchema = z.enum(['reject', 'first-wins']);

/** Loader column overrides: record field -> accepted header names */
export const columnOverridesSchema = z
  .object({
    identifier: z.array(z.string().min(1)).min(1),
    name: z.array(z.string().min(1)).min(1),
    state: z.array(z.string().min(1)).min(1),
    status: z.array(z.string().min(1)).min(1),
    authorizedCapital: z.array(z.string().min(1)).min(1),
    paidupCapital: z.array(z.string().min(1)).min(1),
    address: z.array(z.string().min(1)).min(1),
    industryClassification: z.array(z.string().min(1)).min(1),
    snapshotDate: z.array(z.string().min(1)).min(1),
  })
  .partial()
  .strict();

/** Export types from schemas */
export type ChangeEventInput = z.infer<typeof changeEventSchema>;
export type StoredChangeEventInput = z.infer<typeof storedChangeEventSchema>;
export type DuplicatePolicy = z.infer<typeof duplicatePolicySchema>;
export type TrackedFieldInput = z.infer<typeof trackedFieldSchema>;
export type ColumnOverrides = z.infer<typeof columnOverridesSchema>;
