/**
 * Config loader tests
 */

import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getEngineConfig, loadEngineConfig, parseEnv } from '../loader';

describe('loadEngineConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'engine-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load the bundled config', () => {
    const config = loadEngineConfig();

    expect(config.version).toBe('v1');
    expect(config.guess).toEqual({ marginThreshold: 3, maxTurns: 20, topN: 5 });
    expect(config.selection.window).toEqual({ min: 10, ratio: 0.2 });
    expect(config.scoring.missingAttributeWeight).toBe(0);
  });

  it('should read the bundled config once per process', () => {
    expect(getEngineConfig()).toBe(getEngineConfig());
    expect(getEngineConfig()).toEqual(loadEngineConfig());
  });

  it('should fail on unknown keys', () => {
    const configPath = join(dir, 'engineConfig.json');
    const base = loadEngineConfig();
    writeFileSync(configPath, JSON.stringify({ ...base, extra: true }));

    expect(() => loadEngineConfig(configPath)).toThrow(
      `Failed to load config from ${configPath}: Config validation failed`
    );
  });

  it('should fail on out-of-range values', () => {
    const configPath = join(dir, 'engineConfig.json');
    const base = loadEngineConfig();
    writeFileSync(
      configPath,
      JSON.stringify({ ...base, scoring: { missingAttributeWeight: 2 } })
    );

    expect(() => loadEngineConfig(configPath)).toThrow('scoring.missingAttributeWeight');
  });

  it('should fail on a missing file', () => {
    const configPath = join(dir, 'missing.json');
    expect(() => loadEngineConfig(configPath)).toThrow(`Failed to load config from ${configPath}`);
  });
});

describe('parseEnv', () => {
  it('should apply defaults', () => {
    expect(parseEnv({})).toEqual({
      NODE_ENV: 'development',
      CATALOG_DIR: 'data',
      SESSION_TTL_MINUTES: 60,
      ENGINE_DEBUG: '0',
    });
  });

  it('should coerce numbers and keep the database url', () => {
    const env = parseEnv({ SESSION_TTL_MINUTES: '15', DATABASE_URL: 'file:./dev.db' });
    expect(env.SESSION_TTL_MINUTES).toBe(15);
    expect(env.DATABASE_URL).toBe('file:./dev.db');
  });

  it('should reject invalid values', () => {
    expect(() => parseEnv({ SESSION_TTL_MINUTES: 'soon' })).toThrow(
      'Environment validation failed'
    );
    expect(() => parseEnv({ ENGINE_DEBUG: 'yes' })).toThrow('Environment validation failed');
  });
});
