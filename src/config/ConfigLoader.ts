/**
 * ConfigLoader - Builds the effective configuration.
 *
 * Precedence (lowest to highest): defaults, YAML file, environment, CLI overrides.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'js-yaml';
import {
  AIConfig,
  ConfigError,
  ConfigOverrides,
  DEFAULT_CONFIG,
  FillmarkConfig,
  mergeConfig,
  validateConfig,
} from './Config';
import { isLogLevel } from '../logging/Logger';
import { isFileNotFound } from '../utils/fs';

export const CONFIG_FILENAME = '.fillmark.yml';

export interface LoadConfigOptions {
  /** Directory being watched; the default config file is looked up here */
  rootDir: string;
  /** Explicit config file; must exist when given */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  requireApiKey?: boolean;
}

export async function loadConfig(options: LoadConfigOptions): Promise<FillmarkConfig> {
  const env = options.env ?? process.env;

  const fromFile = await readConfigFile(options.rootDir, options.configPath);
  const fromEnv = configFromEnv(env);

  let config = mergeConfig(DEFAULT_CONFIG, fromFile);
  config = mergeConfig(config, fromEnv);
  config = mergeConfig(config, options.overrides ?? {});

  const problems = validateConfig(config, options.requireApiKey ?? false);
  if (problems.length > 0) {
    throw new ConfigError('Invalid configuration', problems);
  }
  return config;
}

async function readConfigFile(rootDir: string, configPath?: string): Promise<ConfigOverrides> {
  const filePath = configPath
    ? path.resolve(configPath)
    : path.join(path.resolve(rootDir), CONFIG_FILENAME);

  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (!configPath && isFileNotFound(error)) {
      return {};
    }
    throw new ConfigError(`Cannot read config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Cannot parse config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return parseConfigDocument(raw, filePath);
}

/**
 * Pick known keys out of a parsed YAML document, rejecting wrong types.
 */
export function parseConfigDocument(raw: unknown, source = 'config'): ConfigOverrides {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigError(`${source} must be a mapping`);
  }

  const problems: string[] = [];
  const result: ConfigOverrides = {};

  const str = (obj: Record<string, unknown>, key: string, prefix = ''): string | undefined => {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      problems.push(`${prefix}${key} must be a string`);
      return undefined;
    }
    return value;
  };
  const num = (obj: Record<string, unknown>, key: string, prefix = ''): number | undefined => {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || Number.isNaN(value)) {
      problems.push(`${prefix}${key} must be a number`);
      return undefined;
    }
    return value;
  };
  const list = (obj: Record<string, unknown>, key: string): string[] | undefined => {
    const value = obj[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
      problems.push(`${key} must be a list of strings`);
      return undefined;
    }
    return value;
  };

  result.marker = str(raw, 'marker');
  result.debounceMs = num(raw, 'debounceMs');
  result.contextLines = num(raw, 'contextLines');
  result.documentContextLines = num(raw, 'documentContextLines');
  result.maxContextChars = num(raw, 'maxContextChars');
  result.maxDocumentChars = num(raw, 'maxDocumentChars');
  result.maxFileSize = num(raw, 'maxFileSize');
  result.writeGuardTtlMs = num(raw, 'writeGuardTtlMs');
  result.ignoredDirs = list(raw, 'ignoredDirs');
  result.ignoredFiles = list(raw, 'ignoredFiles');

  const logLevel = str(raw, 'logLevel');
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      result.logLevel = logLevel;
    } else {
      problems.push(`logLevel "${logLevel}" is not a known level`);
    }
  }

  const ai = raw['ai'];
  if (ai !== undefined) {
    if (!isRecord(ai)) {
      problems.push('ai must be a mapping');
    } else {
      const aiConfig: Partial<AIConfig> = {
        apiKey: str(ai, 'apiKey', 'ai.'),
        baseUrl: str(ai, 'baseUrl', 'ai.'),
        model: str(ai, 'model', 'ai.'),
        maxTokens: num(ai, 'maxTokens', 'ai.'),
        temperature: num(ai, 'temperature', 'ai.'),
        timeoutMs: num(ai, 'timeoutMs', 'ai.'),
        maxRetries: num(ai, 'maxRetries', 'ai.'),
      };
      result.ai = aiConfig;
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid values in ${source}`, problems);
  }
  return result;
}

/**
 * Read overrides from environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const ai: Partial<AIConfig> = {};

  const apiKey = env['FILLMARK_API_KEY'] || env['GROQ_API_KEY'];
  if (apiKey) ai.apiKey = apiKey;
  if (env['FILLMARK_MODEL']) ai.model = env['FILLMARK_MODEL'];
  if (env['FILLMARK_BASE_URL']) ai.baseUrl = env['FILLMARK_BASE_URL'];
  overrides.ai = ai;

  const logLevel = env['FILLMARK_LOG_LEVEL'];
  if (logLevel && isLogLevel(logLevel)) {
    overrides.logLevel = logLevel;
  }

  return overrides;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
