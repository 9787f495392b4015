import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConfigService,
  DEFAULT_SELECTION_CONFIG,
  createSelectionConfig,
  isConfigKey,
  parseAppConfig,
} from '../../src/services/config.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

describe('ConfigService', () => {
  let configService: ConfigService;
  let testConfigDir: string;
  let testConfigPath: string;

  beforeEach(() => {
    // 使用暫時目錄及空的環境變數隔離測試
    testConfigDir = fs.mkdtempSync(path.join(os.tmpdir(), 'wx-stations-config-test-'));
    testConfigPath = path.join(testConfigDir, 'nested', 'config.json');
    configService = new ConfigService(testConfigPath, {});
  });

  afterEach(() => {
    if (fs.existsSync(testConfigDir)) {
      fs.rmSync(testConfigDir, { recursive: true });
    }
  });

  describe('get/set', () => {
    it('should return undefined for non-existent key', () => {
      expect(configService.get('endpoint')).toBeUndefined();
    });

    it('should convert numeric values', () => {
      configService.set('maxAge', '3600');
      configService.set('maxThreads', '4');

      expect(configService.get('maxAge')).toBe(3600);
      expect(configService.get('maxThreads')).toBe(4);
    });

    it('should persist values to file', () => {
      configService.set('endpoint', 'https://mirror.example.test/');

      const newService = new ConfigService(testConfigPath, {});
      expect(newService.get('endpoint')).toBe('https://mirror.example.test/');
    });

    it('should reject invalid values', () => {
      expect(() => configService.set('maxThreads', '0')).toThrow('設定值無效：maxThreads=0');
      expect(() => configService.set('maxThreads', '1.5')).toThrow('設定值無效');
      expect(() => configService.set('maxAge', '-1')).toThrow('設定值無效');
      expect(() => configService.set('cacheDir', '')).toThrow('設定值無效');
      expect(fs.existsSync(testConfigPath)).toBe(false);
    });

    it('should delete a value', () => {
      configService.set('maxAge', '60');
      configService.set('endpoint', 'https://mirror.example.test/');
      configService.delete('maxAge');

      expect(configService.getAll()).toEqual({ endpoint: 'https://mirror.example.test/' });
      expect(new ConfigService(testConfigPath, {}).get('maxAge')).toBeUndefined();
    });

    it('should return a copy from getAll', () => {
      configService.set('maxAge', '60');
      const all = configService.getAll();
      all.maxAge = 1;

      expect(configService.get('maxAge')).toBe(60);
    });
  });

  describe('loading', () => {
    it('should ignore a corrupted file', () => {
      fs.mkdirSync(path.dirname(testConfigPath), { recursive: true });
      fs.writeFileSync(testConfigPath, '{broken', 'utf-8');

      expect(new ConfigService(testConfigPath, {}).getAll()).toEqual({});
    });

    it('should drop unknown and invalid fields', () => {
      fs.mkdirSync(path.dirname(testConfigPath), { recursive: true });
      fs.writeFileSync(
        testConfigPath,
        JSON.stringify({ maxAge: 120, maxThreads: -2, color: 'blue' }),
        'utf-8'
      );

      expect(new ConfigService(testConfigPath, {}).getAll()).toEqual({ maxAge: 120 });
    });

    it('should expose the config path', () => {
      expect(configService.getConfigPath()).toBe(testConfigPath);
    });
  });

  describe('getSelectionConfig', () => {
    it('should use defaults without file or environment', () => {
      expect(configService.getSelectionConfig()).toEqual(DEFAULT_SELECTION_CONFIG);
    });

    it('should read values from the file', () => {
      configService.set('maxAge', '600');
      configService.set('cacheDir', '/tmp/wx-cache');

      const config = configService.getSelectionConfig();
      expect(config.maxAgeSeconds).toBe(600);
      expect(config.cacheDir).toBe('/tmp/wx-cache');
      expect(config.maxThreads).toBe(1);
    });

    it('should let environment variables override the file', () => {
      configService.set('maxAge', '600');
      const service = new ConfigService(testConfigPath, {
        WXS_MAX_AGE: '30',
        WXS_MAX_THREADS: '3',
        WXS_ENDPOINT: 'https://env.example.test/',
        WXS_CACHE_DIR: '/tmp/env-cache',
      });

      expect(service.getSelectionConfig()).toEqual({
        cacheDir: '/tmp/env-cache',
        maxAgeSeconds: 30,
        maxThreads: 3,
        endpoint: 'https://env.example.test/',
      });
    });

    it('should ignore invalid environment values', () => {
      const service = new ConfigService(testConfigPath, { WXS_MAX_THREADS: 'many' });
      expect(service.getSelectionConfig().maxThreads).toBe(1);
    });

    it('should return a frozen config', () => {
      expect(Object.isFrozen(configService.getSelectionConfig())).toBe(true);
    });
  });
});

describe('config helpers', () => {
  it('should merge overrides into a frozen config', () => {
    const config = createSelectionConfig({ maxAgeSeconds: 0 });
    expect(config.maxAgeSeconds).toBe(0);
    expect(config.endpoint).toBe(DEFAULT_SELECTION_CONFIG.endpoint);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should default to a one day max age and a single thread', () => {
    expect(DEFAULT_SELECTION_CONFIG.maxAgeSeconds).toBe(86400);
    expect(DEFAULT_SELECTION_CONFIG.maxThreads).toBe(1);
  });

  it('should recognise config keys', () => {
    expect(isConfigKey('maxAge')).toBe(true);
    expect(isConfigKey('clientId')).toBe(false);
  });

  it('should accept zero max age', () => {
    expect(parseAppConfig({ maxAge: 0 })).toEqual({ maxAge: 0 });
  });

  it('should return an empty config for non-objects', () => {
    expect(parseAppConfig(null)).toEqual({});
    expect(parseAppConfig([1, 2])).toEqual({});
  });
});
