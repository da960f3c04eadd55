/**
 * Tests for configuration loader
 */

import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { createTempTestDir, removeTempTestDir } from '@ghscope/utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { ConfigError } from '../src/errors.js';
import {
  CONFIG_FILE_NAME,
  loadConfigFromFile,
  findConfigFile,
  readDotEnv,
  applyEnvironment,
  loadServerConfig,
  redactConfig,
} from '../src/loader.js';
import { validateServerConfig } from '../src/schema.js';

describe('loader', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir();
  });

  afterEach(async () => {
    await removeTempTestDir(testDir);
  });

  describe('loadConfigFromFile', () => {
    it('should throw error for unsupported config format', async () => {
      const configPath = join(testDir, 'ghscope.config.json');
      await writeFile(configPath, '{}');

      await expect(loadConfigFromFile(configPath)).rejects.toThrow('Unsupported config file format');
    });

    it('should load YAML config file and apply defaults', async () => {
      const configPath = join(testDir, CONFIG_FILE_NAME);
      await writeFile(configPath, `
github:
  timeoutMs: 15000
tls:
  caFile: /etc/ssl/corp-ca.pem
`);

      const loaded = await loadConfigFromFile(configPath);

      expect(loaded.github.timeoutMs).toBe(15000);
      expect(loaded.github.apiBase).toBe('https://api.github.com');
      expect(loaded.github.token).toBeUndefined();
      expect(loaded.tls).toEqual({ verify: true, caFile: '/etc/ssl/corp-ca.pem' });
    });

    it('should treat an empty file as defaults', async () => {
      const configPath = join(testDir, CONFIG_FILE_NAME);
      await writeFile(configPath, '');

      const loaded = await loadConfigFromFile(configPath);

      expect(loaded.github.timeoutMs).toBe(30000);
      expect(loaded.tls.verify).toBe(true);
    });

    it('should ignore $schema property', async () => {
      const configPath = join(testDir, CONFIG_FILE_NAME);
      await writeFile(configPath, `
$schema: ./ghscope.schema.json
github:
  userAgent: test-agent/1.0
`);

      const loaded = await loadConfigFromFile(configPath);

      expect(loaded.github.userAgent).toBe('test-agent/1.0');
    });

    it('should report schema violations with their path', async () => {
      const configPath = join(testDir, CONFIG_FILE_NAME);
      await writeFile(configPath, `
github:
  timeoutMs: -5
`);

      const error = await loadConfigFromFile(configPath).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.errors).toEqual([
        'github.timeoutMs: Number must be greater than 0',
      ]);
    });

    it('should reject unknown keys', async () => {
      const configPath = join(testDir, CONFIG_FILE_NAME);
      await writeFile(configPath, 'extra: true\n');

      const error = await loadConfigFromFile(configPath).catch((err: unknown) => err);

      expect(error instanceof ConfigError && error.errors).toEqual([
        "Unrecognized key(s) in object: 'extra'",
      ]);
    });

    it('should throw ConfigError for a missing file', async () => {
      await expect(loadConfigFromFile(join(testDir, 'missing.yaml'))).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('findConfigFile', () => {
    it('should find ghscope.config.yaml in the directory', async () => {
      await writeFile(join(testDir, CONFIG_FILE_NAME), '');

      expect(findConfigFile(testDir)).toBe(join(testDir, CONFIG_FILE_NAME));
    });

    it('should return null when there is no config file', () => {
      expect(findConfigFile(testDir)).toBeNull();
    });
  });

  describe('readDotEnv', () => {
    it('should parse a .env file without touching process.env', async () => {
      await writeFile(join(testDir, '.env'), 'GITHUB_TOKEN=test-secret\n# comment\nGHSCOPE_HTTP_TIMEOUT_MS=5000\n');

      expect(readDotEnv(testDir)).toEqual({
        GITHUB_TOKEN: 'test-secret',
        GHSCOPE_HTTP_TIMEOUT_MS: '5000',
      });
      expect(process.env.GITHUB_TOKEN).toBeUndefined();
    });

    it('should return an empty map when there is no .env file', () => {
      expect(readDotEnv(testDir)).toEqual({});
    });
  });

  describe('applyEnvironment', () => {
    const defaults = validateServerConfig({});

    it('should read the token, API base, CA file and timeout', () => {
      const config = applyEnvironment(defaults, {
        GITHUB_TOKEN: 'test-secret',
        GITHUB_API_URL: 'https://github.example.com/api/v3',
        SSL_CERT_FILE: '/etc/ssl/corp-ca.pem',
        GHSCOPE_HTTP_TIMEOUT_MS: '5000',
      });

      expect(config.github.token).toBe('test-secret');
      expect(config.github.apiBase).toBe('https://github.example.com/api/v3');
      expect(config.github.timeoutMs).toBe(5000);
      expect(config.tls.caFile).toBe('/etc/ssl/corp-ca.pem');
    });

    it.each([
      ['false', false],
      ['FALSE', false],
      ['0', false],
      ['No', false],
      ['true', true],
      ['off', true],
    ])('should map GITHUB_SSL_VERIFY=%s to verify=%s', (value, expected) => {
      expect(applyEnvironment(defaults, { GITHUB_SSL_VERIFY: value }).tls.verify).toBe(expected);
    });

    it('should ignore blank variables', () => {
      const config = applyEnvironment(defaults, { GITHUB_TOKEN: '   ', GITHUB_API_URL: '' });

      expect(config.github.token).toBeUndefined();
      expect(config.github.apiBase).toBe('https://api.github.com');
    });

    it('should reject a non-numeric timeout', () => {
      expect(() => applyEnvironment(defaults, { GHSCOPE_HTTP_TIMEOUT_MS: 'soon' })).toThrow(
        'github.timeoutMs: Expected number, received nan'
      );
    });
  });

  describe('loadServerConfig', () => {
    it('should layer defaults, file, .env and environment', async () => {
      await writeFile(join(testDir, CONFIG_FILE_NAME), `
github:
  token: file-token
  timeoutMs: 1000
  userAgent: file-agent/1.0
`);
      await writeFile(join(testDir, '.env'), 'GITHUB_TOKEN=dotenv-token\nGHSCOPE_HTTP_TIMEOUT_MS=2000\n');

      const config = await loadServerConfig({
        cwd: testDir,
        env: { GITHUB_TOKEN: 'env-token' },
      });

      expect(config.github).toEqual({
        apiBase: 'https://api.github.com',
        token: 'env-token',
        userAgent: 'file-agent/1.0',
        timeoutMs: 2000,
      });
    });

    it('should return defaults when nothing is configured', async () => {
      const config = await loadServerConfig({ cwd: testDir, env: {} });

      expect(config).toEqual({
        github: {
          apiBase: 'https://api.github.com',
          userAgent: 'ghscope/0.1.0',
          timeoutMs: 30000,
        },
        tls: { verify: true },
      });
    });

    it('should use an explicit config path', async () => {
      const configPath = join(testDir, 'custom.yaml');
      await writeFile(configPath, 'tls:\n  verify: false\n');

      const config = await loadServerConfig({ cwd: testDir, env: {}, configPath });

      expect(config.tls.verify).toBe(false);
    });

    it('should freeze the result', async () => {
      const config = await loadServerConfig({ cwd: testDir, env: {} });

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.github)).toBe(true);
      expect(Object.isFrozen(config.tls)).toBe(true);
    });
  });

  describe('redactConfig', () => {
    it('should replace the token', () => {
      const config = validateServerConfig({ github: { token: 'test-secret' } });

      expect(redactConfig(config).github.token).toBe('***');
      expect(config.github.token).toBe('test-secret');
    });

    it('should leave an absent token absent', () => {
      expect(redactConfig(validateServerConfig({})).github).not.toHaveProperty('token');
    });
  });
});
