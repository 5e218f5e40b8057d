/**
 * Configuration loading tests
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import {
  CONFIG_FILENAME,
  ConfigError,
  DEFAULT_CONFIG,
  configFromEnv,
  loadConfig,
  mergeConfig,
  parseConfigDocument,
  validateConfig,
} from '../config';
import { createLogger } from '../logging';

let testDir: string;

beforeEach(async () => {
  testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fillmark-config-'));
});

afterEach(async () => {
  await fs.rm(testDir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  test('should fall back to defaults without a config file', async () => {
    const config = await loadConfig({ rootDir: testDir, env: {} });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  test('should layer file, environment and overrides', async () => {
    await fs.writeFile(
      path.join(testDir, CONFIG_FILENAME),
      [
        'marker: "@@"',
        'debounceMs: 500',
        'ignoredDirs: [vendor]',
        'ai:',
        '  model: file-model',
        '  temperature: 0.5',
      ].join('\n')
    );

    const config = await loadConfig({
      rootDir: testDir,
      env: { GROQ_API_KEY: 'test-secret', FILLMARK_MODEL: 'env-model' },
      overrides: { debounceMs: 50, ai: { model: undefined } },
    });

    expect(config.marker).toBe('@@');
    expect(config.debounceMs).toBe(50);
    expect(config.ignoredDirs).toEqual(['vendor']);
    expect(config.ai.model).toBe('env-model');
    expect(config.ai.temperature).toBe(0.5);
    expect(config.ai.apiKey).toBe('test-secret');
  });

  test('should require an explicit config file to exist', async () => {
    await expect(
      loadConfig({ rootDir: testDir, configPath: path.join(testDir, 'nope.yml'), env: {} })
    ).rejects.toBeInstanceOf(ConfigError);
  });

  test('should reject a missing API key when one is required', async () => {
    await expect(loadConfig({ rootDir: testDir, env: {}, requireApiKey: true })).rejects.toThrow(
      'an API key is required'
    );
  });

  test('should report YAML syntax errors', async () => {
    await fs.writeFile(path.join(testDir, CONFIG_FILENAME), 'marker: [unclosed');
    await expect(loadConfig({ rootDir: testDir, env: {} })).rejects.toThrow('Cannot parse config file');
  });
});

describe('parseConfigDocument', () => {
  test('should treat an empty document as no overrides', () => {
    expect(parseConfigDocument(null)).toEqual({});
  });

  test('should list every wrongly typed key', () => {
    try {
      parseConfigDocument({ debounceMs: 'soon', ignoredFiles: [1], ai: { model: 3 } });
      throw new Error('expected parse to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.problems).toEqual([
          'debounceMs must be a number',
          'ignoredFiles must be a list of strings',
          'ai.model must be a string',
        ]);
      }
    }
  });

  test('should reject a document that is not a mapping', () => {
    expect(() => parseConfigDocument(['a'], 'x.yml')).toThrow('x.yml must be a mapping');
  });
});

describe('validateConfig', () => {
  test('should accept the defaults', () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual([]);
  });

  test('should reject bad values', () => {
    const config = mergeConfig(DEFAULT_CONFIG, {
      marker: '',
      debounceMs: -1,
      maxDocumentChars: 10,
    });

    expect(validateConfig(config)).toEqual([
      'marker must be a non-empty string',
      'debounceMs must be an integer >= 0',
      'maxDocumentChars must be an integer >= maxContextChars',
    ]);
  });

  test('should reject a marker spanning lines', () => {
    const config = mergeConfig(DEFAULT_CONFIG, { marker: '?\n?' });
    expect(validateConfig(config)).toEqual(['marker must not contain line breaks']);
  });
});

describe('configFromEnv', () => {
  test('should prefer FILLMARK_API_KEY over GROQ_API_KEY', () => {
    const overrides = configFromEnv({ FILLMARK_API_KEY: 'test-secret', GROQ_API_KEY: 'other-secret' });
    expect(overrides.ai?.apiKey).toBe('test-secret');
  });

  test('should ignore unknown log levels', () => {
    expect(configFromEnv({ FILLMARK_LOG_LEVEL: 'loud' }).logLevel).toBeUndefined();
    expect(configFromEnv({ FILLMARK_LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
  });
});

describe('createLogger', () => {
  function sink() {
    return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  }

  test('should drop messages below the level', () => {
    const out = sink();
    const logger = createLogger('warn', out);

    logger.info('hidden');
    logger.warn('shown', 1);

    expect(out.info).not.toHaveBeenCalled();
    expect(out.warn).toHaveBeenCalledWith('[fillmark] shown', 1);
  });

  test('should tag child loggers with their component', () => {
    const out = sink();
    createLogger('debug', out).child('watcher').child('queue').debug('hello');

    expect(out.debug).toHaveBeenCalledWith('[fillmark:watcher:queue] hello');
  });
});
