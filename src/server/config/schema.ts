import { z } from 'zod';

/**
 * Engine config schema
 * Source of truth: config/engineConfig.json
 * Unknown keys are a startup error (strict mode)
 */

const GuessSchema = z.object({
  marginThreshold: z.number().positive(),
  maxTurns: z.number().int().positive(),
  topN: z.number().int().positive(),
}).strict();

const SelectionSchema = z.object({
  window: z.object({
    min: z.number().int().positive(),
    ratio: z.number().min(0).max(1),
  }).strict(),
  minVariance: z.number().nonnegative(),
}).strict();

const ScoringSchema = z.object({
  missingAttributeWeight: z.number().min(0).max(1),
}).strict();

export const EngineConfigSchema = z.object({
  version: z.literal('v1'),
  guess: GuessSchema,
  selection: SelectionSchema,
  scoring: ScoringSchema,
}).strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Environment variables
 */
export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  CATALOG_DIR: z.string().min(1).default('data'),
  DATABASE_URL: z.string().optional(),
  SESSION_TTL_MINUTES: z.coerce.number().int().positive().default(60),
  ENGINE_DEBUG: z.enum(['0', '1']).default('0'),
});

export type Env = z.infer<typeof EnvSchema>;
