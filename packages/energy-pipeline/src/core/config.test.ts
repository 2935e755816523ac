/**
 * Tests for configuration loading
 *
 * Validates precedence: CLI overrides > environment > config file > defaults.
 */

import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createFixtureDir, type FixtureDir } from '../__tests__/fixtures/energy-dataset.js';
import { DEFAULT_CONFIG, findConfigFile, loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  let dir: FixtureDir;

  beforeEach(async () => {
    dir = await createFixtureDir();
  });

  afterEach(async () => {
    await dir.remove();
  });

  it('falls back to defaults with no file and no environment', async () => {
    const config = await loadConfig({ cwd: dir.path, env: {} });

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      dataPath: join(dir.path, 'data', 'prod-region-annuelle-enr.csv'),
      dataset: { ...DEFAULT_CONFIG.dataset, expectedYearRange: undefined },
      configPath: null,
    });
  });

  it('reads a YAML file found in the working directory', async () => {
    const configPath = await dir.write(
      '.energy-pipelinerc.yaml',
      [
        'dataPath: sources/production.csv',
        'dataset:',
        '  requiredEnergyTypes: [solar, wind]',
        '  expectedYearRange: { min: 2013, max: 2022 }',
        'cache:',
        '  maxViews: 8',
        'server:',
        '  port: 9000',
        'logging:',
        '  level: warn',
        '',
      ].join('\n')
    );

    const config = await loadConfig({ cwd: dir.path, env: {} });

    expect(config.configPath).toBe(configPath);
    expect(config.dataPath).toBe(join(dir.path, 'sources', 'production.csv'));
    expect(config.dataset).toEqual({
      expectedRegionCount: 13,
      requiredEnergyTypes: ['solar', 'wind'],
      expectedYearRange: { min: 2013, max: 2022 },
    });
    expect(config.cache.maxViews).toBe(8);
    expect(config.server).toEqual({ host: '127.0.0.1', port: 9000 });
    expect(config.logging).toEqual({ level: 'warn', json: false });
  });

  it('reads JSON through an explicit path', async () => {
    await dir.write('settings.json', JSON.stringify({ server: { host: '0.0.0.0' } }));

    const config = await loadConfig({ cwd: dir.path, env: {}, configPath: 'settings.json' });

    expect(config.server.host).toBe('0.0.0.0');
  });

  it('lets the environment override the file and flags override both', async () => {
    await dir.write('.energy-pipelinerc', 'server:\n  port: 9000\n');
    const env = { ENERGY_PIPELINE_PORT: '7000', ENERGY_PIPELINE_DATA: 'env.csv', LOG_LEVEL: 'DEBUG' };

    const fromEnv = await loadConfig({ cwd: dir.path, env });
    expect(fromEnv.server.port).toBe(7000);
    expect(fromEnv.dataPath).toBe(join(dir.path, 'env.csv'));
    expect(fromEnv.logging.level).toBe('debug');

    const fromFlags = await loadConfig({ cwd: dir.path, env, overrides: { port: 0, dataPath: 'flag.csv' } });
    expect(fromFlags.server.port).toBe(0);
    expect(fromFlags.dataPath).toBe(join(dir.path, 'flag.csv'));
  });

  it('rejects unknown keys and bad values in the file', async () => {
    await dir.write('.energy-pipelinerc.yml', 'cache:\n  maxViews: 0\n');
    await expect(loadConfig({ cwd: dir.path, env: {} })).rejects.toThrow(/cache\.maxViews/);

    await dir.write('.energy-pipelinerc.yml', 'colour: blue\n');
    await expect(loadConfig({ cwd: dir.path, env: {} })).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('rejects a non-integer port variable', async () => {
    await expect(loadConfig({ cwd: dir.path, env: { ENERGY_PIPELINE_PORT: 'eighty' } })).rejects.toThrow(
      'ENERGY_PIPELINE_PORT must be an integer, got "eighty"'
    );
  });

  it('rejects an explicit config path that does not exist', async () => {
    await expect(loadConfig({ cwd: dir.path, env: {}, configPath: 'missing.yaml' })).rejects.toMatchObject({
      name: 'ConfigurationError',
      stage: 'config',
    });
  });
});

describe('findConfigFile', () => {
  it('walks up to a parent directory', async () => {
    const dir = await createFixtureDir();
    try {
      const configPath = await dir.write('.energy-pipelinerc.json', '{}');

      expect(findConfigFile(join(dir.path, 'nested', 'deeper'))).toBe(configPath);
    } finally {
      await dir.remove();
    }
  });
});
