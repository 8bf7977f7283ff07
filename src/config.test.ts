import fs from 'fs/promises';
import os from 'os';
import path from 'path';

import { beforeEach, describe, expect, it } from 'vitest';

import { configFilePath, defaultDbPath, loadConfig } from './config.js';
import { ValidationError } from './errors.js';

async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'hl-config-test-'));
}

describe('paths', () => {
  it('places the database under XDG_STATE_HOME', () => {
    expect(defaultDbPath({ XDG_STATE_HOME: '/state' })).toBe('/state/hl/highlights.db');
  });

  it('prefers HL_CONFIG over XDG_CONFIG_HOME', () => {
    expect(configFilePath({ XDG_CONFIG_HOME: '/cfg' })).toBe('/cfg/hl/config.yaml');
    expect(configFilePath({ HL_CONFIG: '/elsewhere.yaml', XDG_CONFIG_HOME: '/cfg' })).toBe('/elsewhere.yaml');
  });
});

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;

  beforeEach(async () => {
    dir = await createTempDir();
    configPath = path.join(dir, 'config.yaml');
  });

  it('uses defaults when no config file exists', () => {
    expect(loadConfig({ HL_CONFIG: configPath, XDG_STATE_HOME: dir })).toEqual({
      dbPath: path.join(dir, 'hl', 'highlights.db'),
      agentName: 'claude',
      busyTimeoutMs: 5000,
      busyRetries: 3,
      debug: false
    });
  });

  it('treats an empty file as no settings', async () => {
    await fs.writeFile(configPath, '');
    expect(loadConfig({ HL_CONFIG: configPath, XDG_STATE_HOME: dir }).agentName).toBe('claude');
  });

  it('reads settings from the YAML file', async () => {
    await fs.writeFile(
      configPath,
      ['dbPath: /data/notes.db', 'editor: vim', 'agentName: helper', 'busyRetries: 5', 'debug: true'].join('\n')
    );

    expect(loadConfig({ HL_CONFIG: configPath })).toEqual({
      dbPath: '/data/notes.db',
      editor: 'vim',
      agentName: 'helper',
      busyTimeoutMs: 5000,
      busyRetries: 5,
      debug: true
    });
  });

  it('lets environment variables override the file', async () => {
    await fs.writeFile(configPath, ['dbPath: /data/notes.db', 'agentName: helper', 'debug: true'].join('\n'));

    const config = loadConfig({
      HL_CONFIG: configPath,
      HL_DB_PATH: '/override.db',
      HL_AGENT_NAME: 'other',
      HL_DEBUG: '0'
    });

    expect(config.dbPath).toBe('/override.db');
    expect(config.agentName).toBe('other');
    expect(config.debug).toBe(false);
  });

  it('rejects invalid values and unknown keys', async () => {
    await fs.writeFile(configPath, 'busyRetries: many\n');
    expect(() => loadConfig({ HL_CONFIG: configPath })).toThrow(ValidationError);

    await fs.writeFile(configPath, 'colour: red\n');
    expect(() => loadConfig({ HL_CONFIG: configPath })).toThrow(ValidationError);

    await fs.writeFile(configPath, 'agentName: two words\n');
    expect(() => loadConfig({ HL_CONFIG: configPath })).toThrow(/agentName/);
  });
});
