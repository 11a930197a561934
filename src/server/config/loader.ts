import { readFileSync } from 'fs';
import { join } from 'path';
import type { z } from 'zod';
import { EngineConfigSchema, EnvSchema, type EngineConfig, type Env } from './schema';

/**
 * Config and environment loading
 * Both go through the same strict validation; a bad value fails at startup.
 */

type Source = Record<string, string | undefined>;

function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  label: string
): T {
  const result = schema.safeParse(input);
  if (result.success) {
    return result.data;
  }
  const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  throw new Error(`${label} validation failed:\n${issues.join('\n')}`);
}

function defaultConfigPath(): string {
  return join(process.cwd(), 'config', 'engineConfig.json');
}

/**
 * Read and validate an engine config file. Unknown keys are rejected.
 */
export function loadEngineConfig(configPath: string = defaultConfigPath()): EngineConfig {
  try {
    const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    return validate(EngineConfigSchema, raw, 'Config');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load config from ${configPath}: ${reason}`);
  }
}

export function parseEnv(source: Source = process.env): Env {
  return validate(EnvSchema, source, 'Environment');
}

const cache: { config?: EngineConfig } = {};

/**
 * Process-wide engine config, read once from config/engineConfig.json
 */
export function getEngineConfig(): EngineConfig {
  if (!cache.config) {
    cache.config = loadEngineConfig();
  }
  return cache.config;
}
