import { z } from 'zod';

/**
 * Catalog file schemas (data/entities.json, data/questions.json)
 */

// Ids become object keys (scores, attribute maps); these would hit the prototype
const RESERVED_KEYS = new Set(['__proto__']);

export const CatalogKeySchema = z
  .string()
  .min(1)
  .refine(key => !RESERVED_KEYS.has(key), { message: 'reserved identifier' });

export const EntityRecordSchema = z.object({
  id: CatalogKeySchema,
  name: z.string().min(1),
  attributes: z.record(CatalogKeySchema, z.number().min(0).max(1)),
}).strict();

export const QuestionRecordSchema = z.object({
  id: CatalogKeySchema,
  attributeKey: CatalogKeySchema,
  text: z.string().min(1),
}).strict();

export const EntityFileSchema = z.object({
  entities: z.array(EntityRecordSchema).min(1),
}).strict();

export const QuestionFileSchema = z.object({
  questions: z.array(QuestionRecordSchema),
}).strict();
