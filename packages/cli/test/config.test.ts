import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, parseEnvFile } from '../src/config.js';
import { createWorkspace, removeWorkspace } from './helpers.js';

describe('parseEnvFile', () => {
  it('reads keys, skipping comments and blank lines', () => {
    expect(parseEnvFile('# comment\n\nCTZ_UNITS=cm\n CTZ_OUT_DIR = "out dir" \nBROKEN\n')).toEqual({
      CTZ_UNITS: 'cm',
      CTZ_OUT_DIR: 'out dir',
    });
  });

  it('strips single quotes and keeps inner equals signs', () => {
    expect(parseEnvFile("CTZ_LOG_FILE='a=b.log'")).toEqual({ CTZ_LOG_FILE: 'a=b.log' });
  });
});

describe('loadConfig', () => {
  let root: string;

  beforeEach(async () => {
    root = await createWorkspace({
      '.env': 'CTZ_UNITS=cm\nCTZ_OUT_DIR=json\n',
      'drawings/nested/.keep': '',
    });
  });

  afterEach(async () => {
    await removeWorkspace(root);
  });

  it('uses defaults when nothing is set', async () => {
    const bare = await createWorkspace({ 'x/.keep': '' });
    try {
      const config = loadConfig(`${bare}/x`, {});
      expect(config.units).toBe('px');
      expect(config.environment).toBe('production');
      expect(config.logLevel).toBeUndefined();
    } finally {
      await removeWorkspace(bare);
    }
  });

  it('finds the .env file in a parent directory', () => {
    const config = loadConfig(`${root}/drawings/nested`, {});
    expect(config).toMatchObject({ units: 'cm', outDir: 'json', environment: 'production' });
  });

  it('lets the process environment override the file', () => {
    const config = loadConfig(root, { CTZ_UNITS: 'px', CTZ_LOG_LEVEL: 'debug', CTZ_ENV: 'test' });
    expect(config).toEqual({ units: 'px', outDir: 'json', logLevel: 'debug', environment: 'test' });
  });

  it('treats empty variables as unset', () => {
    expect(loadConfig(root, { CTZ_UNITS: '' }).units).toBe('cm');
  });

  it('names the variable of an invalid value', () => {
    expect(() => loadConfig(root, { CTZ_UNITS: 'in' })).toThrow(ConfigError);
    expect(() => loadConfig(root, { CTZ_UNITS: 'in' })).toThrow(/^Invalid configuration: CTZ_UNITS: /);
  });
});
