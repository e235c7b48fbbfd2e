import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { DEFAULT_CONFIG, getDefaultConfig } from '../../../src/config/defaults.js';
import {
  loadConfig,
  loadEnvConfig,
  mergeConfig,
  resolveConfig,
} from '../../../src/config/loader.js';
import { ConfigError } from '../../../src/errors.js';
import { captureSessionError } from '../../helpers.js';

describe('config loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'scene-mock-config-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function writeFile(name: string, content: string): string {
    const filePath = path.join(tempDir, name);
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  describe('loadConfig', () => {
    it('should return the defaults when nothing is configured', () => {
      expect(loadConfig({ cwd: tempDir, env: {} })).toEqual(DEFAULT_CONFIG);
    });

    it('should read a YAML config file from the working directory', () => {
      writeFile('scene-mock.config.yaml', 'defaultPortType: double\nseedBuiltinPorts: true\n');

      const config = loadConfig({ cwd: tempDir, env: {} });
      expect(config.defaultPortType).toBe('double');
      expect(config.seedBuiltinPorts).toBe(true);
      expect(config.matcherCacheSize).toBe(256);
    });

    it('should read a JSON config file', () => {
      writeFile('scene-mock.config.json', JSON.stringify({ reservedNames: ['root'], warnings: 'silent' }));

      const config = loadConfig({ cwd: tempDir, env: {} });
      expect(config.reservedNames).toEqual(['root']);
      expect(config.warnings).toBe('silent');
    });

    it('should treat an empty file as no settings', () => {
      writeFile('scene-mock.config.yml', '');
      expect(loadConfig({ cwd: tempDir, env: {} })).toEqual(DEFAULT_CONFIG);
    });

    it('should apply environment over file and overrides over environment', () => {
      writeFile('scene-mock.config.yaml', 'defaultPortType: double\nmatcherCacheSize: 8\n');
      const env = { SCENE_MOCK_DEFAULT_PORT_TYPE: 'long', SCENE_MOCK_MATCHER_CACHE_SIZE: '16' };

      const fromEnv = loadConfig({ cwd: tempDir, env });
      expect(fromEnv.defaultPortType).toBe('long');
      expect(fromEnv.matcherCacheSize).toBe(16);

      const overridden = loadConfig({ cwd: tempDir, env, overrides: { defaultPortType: 'bool' } });
      expect(overridden.defaultPortType).toBe('bool');
      expect(overridden.matcherCacheSize).toBe(16);
    });

    it('should load an explicit config path relative to cwd', () => {
      writeFile('custom.yaml', 'warnings: silent\n');
      expect(loadConfig({ cwd: tempDir, env: {}, configPath: 'custom.yaml' }).warnings).toBe('silent');
    });

    it('should fail when an explicit config file is missing', () => {
      const error = captureSessionError(
        () => loadConfig({ cwd: tempDir, env: {}, configPath: 'missing.yaml' }),
        'INVALID_CONFIG',
      );
      expect(error.message).toBe(`Invalid configuration in ${path.join(tempDir, 'missing.yaml')}: file not found`);
    });

    it('should name the invalid key', () => {
      const file = writeFile('scene-mock.config.yaml', 'matcherCacheSize: 0\n');
      const error = captureSessionError(() => loadConfig({ cwd: tempDir, env: {} }), 'INVALID_CONFIG');
      expect(error.message).toBe(`Invalid configuration in ${file}: matcherCacheSize: Number must be greater than 0`);
    });

    it('should reject unknown keys', () => {
      writeFile('scene-mock.config.yaml', 'colour: blue\n');
      expect(() => loadConfig({ cwd: tempDir, env: {} })).toThrow(ConfigError);
    });

    it('should reject files that are not YAML', () => {
      writeFile('scene-mock.config.yaml', 'key: [unclosed\n');
      expect(() => loadConfig({ cwd: tempDir, env: {} })).toThrow(ConfigError);
    });
  });

  describe('loadEnvConfig', () => {
    it('should read every supported variable', () => {
      expect(
        loadEnvConfig({
          SCENE_MOCK_DEFAULT_PORT_TYPE: 'double',
          SCENE_MOCK_SEED_BUILTIN_PORTS: 'yes',
          SCENE_MOCK_MATCHER_CACHE_SIZE: '32',
          SCENE_MOCK_WARNINGS: 'silent',
          SCENE_MOCK_SCHEMA: '/tmp/types.json',
        }),
      ).toEqual({
        defaultPortType: 'double',
        seedBuiltinPorts: true,
        matcherCacheSize: 32,
        warnings: 'silent',
        schemaPath: '/tmp/types.json',
      });
    });

    it('should ignore unrelated and empty variables', () => {
      expect(loadEnvConfig({ HOME: '/root', SCENE_MOCK_SEED_BUILTIN_PORTS: '' })).toEqual({});
    });

    it('should parse booleans loosely', () => {
      expect(loadEnvConfig({ SCENE_MOCK_SEED_BUILTIN_PORTS: 'OFF' })).toEqual({ seedBuiltinPorts: false });
      const error = captureSessionError(
        () => loadEnvConfig({ SCENE_MOCK_SEED_BUILTIN_PORTS: 'maybe' }),
        'INVALID_CONFIG',
      );
      expect(error.message).toBe(
        'Invalid configuration in SCENE_MOCK_SEED_BUILTIN_PORTS: expected a boolean, got "maybe"',
      );
    });

    it('should reject bad numbers and warning modes', () => {
      expect(() => loadEnvConfig({ SCENE_MOCK_MATCHER_CACHE_SIZE: '-3' })).toThrow(ConfigError);
      expect(() => loadEnvConfig({ SCENE_MOCK_WARNINGS: 'loud' })).toThrow(ConfigError);
    });
  });

  describe('mergeConfig', () => {
    it('should ignore undefined keys', () => {
      const merged = mergeConfig(getDefaultConfig(), { defaultPortType: undefined, warnings: 'silent' });
      expect(merged.defaultPortType).toBe('float');
      expect(merged.warnings).toBe('silent');
    });
  });

  describe('resolveConfig', () => {
    it('should apply values on top of the defaults', () => {
      expect(resolveConfig({ seedBuiltinPorts: true })).toEqual({ ...DEFAULT_CONFIG, seedBuiltinPorts: true });
    });

    it('should not share the defaults between callers', () => {
      const config = resolveConfig();
      config.reservedNames.push('extra');
      expect(DEFAULT_CONFIG.reservedNames).not.toContain('extra');
    });

    it('should reject invalid values', () => {
      const error = captureSessionError(() => resolveConfig({ matcherCacheSize: -1 }), 'INVALID_CONFIG');
      expect(error.message).toBe(
        'Invalid configuration in session options: matcherCacheSize: Number must be greater than 0',
      );
    });
  });
});
