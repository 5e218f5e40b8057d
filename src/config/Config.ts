/**
 * fillmark configuration: shape, defaults and validation.
 */

import { LogLevel, isLogLevel } from '../logging/Logger';

export interface AIConfig {
  apiKey: string;
  /** OpenAI-compatible endpoint; the Groq default when unset */
  baseUrl?: string;
  model: string;
  maxTokens: number;
  temperature: number;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** Maximum retries on timeout or rate limit */
  maxRetries: number;
}

export interface FillmarkConfig {
  /** Token the user types to request a completion */
  marker: string;
  /** Quiet period before a burst of events becomes one change */
  debounceMs: number;
  /** Lines kept on each side of the marker in the small window */
  contextLines: number;
  /** Lines kept on each side of the marker in the document view */
  documentContextLines: number;
  /** Upper bound on prefix and suffix length, each */
  maxContextChars: number;
  /** Upper bound on the document view's prefix and suffix length, each */
  maxDocumentChars: number;
  /** Files larger than this (bytes) are never read */
  maxFileSize: number;
  /** Path segments that exclude a path from tracking */
  ignoredDirs: string[];
  /** Basenames that exclude a path from tracking */
  ignoredFiles: string[];
  /** How long an own-write stays recognisable to the watcher */
  writeGuardTtlMs: number;
  logLevel: LogLevel;
  ai: AIConfig;
}

export type ConfigOverrides = Partial<Omit<FillmarkConfig, 'ai'>> & {
  ai?: Partial<AIConfig>;
};

export const DEFAULT_IGNORED_DIRS = [
  '.git',
  '.idea',
  '.vscode',
  'node_modules',
  'dist',
  'target',
  '__pycache__',
  '.pytest_cache',
  'build',
  '.venv',
  'venv',
];

export const DEFAULT_IGNORED_FILES = ['.DS_Store', '.gitignore', '.env', 'package-lock.json'];

export const DEFAULT_CONFIG: FillmarkConfig = {
  marker: '??',
  debounceMs: 300,
  contextLines: 3,
  documentContextLines: 1000,
  maxContextChars: 8000,
  maxDocumentChars: 32000,
  maxFileSize: 1024 * 1024, // 1MB
  ignoredDirs: DEFAULT_IGNORED_DIRS,
  ignoredFiles: DEFAULT_IGNORED_FILES,
  writeGuardTtlMs: 2000,
  logLevel: 'info',
  ai: {
    apiKey: '',
    model: 'llama-3.3-70b-versatile',
    maxTokens: 1024,
    temperature: 0.1,
    timeoutMs: 60000,
    maxRetries: 2,
  },
};

/**
 * Configuration that failed validation.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly problems: string[] = []
  ) {
    super(problems.length > 0 ? `${message}: ${problems.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

/** Merge overrides onto a base config; `undefined` values leave the base alone. */
export function mergeConfig(base: FillmarkConfig, overrides: ConfigOverrides): FillmarkConfig {
  const { ai, ...rest } = overrides;
  const merged: FillmarkConfig = { ...base, ai: { ...base.ai } };

  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  if (ai) {
    for (const [key, value] of Object.entries(ai)) {
      if (value !== undefined) {
        Object.assign(merged.ai, { [key]: value });
      }
    }
  }
  return merged;
}

/**
 * Validate a configuration and return any errors.
 *
 * @param requireApiKey - Commands that call the model need a key
 * @returns Array of validation error messages (empty if valid)
 */
export function validateConfig(config: FillmarkConfig, requireApiKey = false): string[] {
  const errors: string[] = [];

  if (!config.marker || config.marker.trim() === '') {
    errors.push('marker must be a non-empty string');
  } else if (/[\r\n]/.test(config.marker)) {
    errors.push('marker must not contain line breaks');
  }
  if (!Number.isInteger(config.debounceMs) || config.debounceMs < 0) {
    errors.push('debounceMs must be an integer >= 0');
  }
  if (!Number.isInteger(config.contextLines) || config.contextLines < 0) {
    errors.push('contextLines must be an integer >= 0');
  }
  if (
    !Number.isInteger(config.documentContextLines) ||
    config.documentContextLines < config.contextLines
  ) {
    errors.push('documentContextLines must be an integer >= contextLines');
  }
  if (!Number.isInteger(config.maxContextChars) || config.maxContextChars < 1) {
    errors.push('maxContextChars must be an integer >= 1');
  }
  if (
    !Number.isInteger(config.maxDocumentChars) ||
    config.maxDocumentChars < config.maxContextChars
  ) {
    errors.push('maxDocumentChars must be an integer >= maxContextChars');
  }
  if (!Number.isInteger(config.maxFileSize) || config.maxFileSize < 1) {
    errors.push('maxFileSize must be an integer >= 1');
  }
  if (!Number.isInteger(config.writeGuardTtlMs) || config.writeGuardTtlMs < 1) {
    errors.push('writeGuardTtlMs must be an integer >= 1');
  }
  if (!isLogLevel(config.logLevel)) {
    errors.push(`logLevel must be one of debug, info, warn, error, silent`);
  }
  if (!config.ai.model) {
    errors.push('ai.model is required');
  }
  if (config.ai.temperature < 0 || config.ai.temperature > 2) {
    errors.push('ai.temperature must be between 0 and 2');
  }
  if (!Number.isInteger(config.ai.maxRetries) || config.ai.maxRetries < 0) {
    errors.push('ai.maxRetries must be an integer >= 0');
  }
  if (!Number.isInteger(config.ai.timeoutMs) || config.ai.timeoutMs < 1) {
    errors.push('ai.timeoutMs must be an integer >= 1');
  }
  if (requireApiKey && !config.ai.apiKey) {
    errors.push('an API key is required (FILLMARK_API_KEY or GROQ_API_KEY)');
  }

  return errors;
}
