/**
 * Options shared by every CLI command, and their mapping onto config overrides.
 */

import { Command, InvalidArgumentError } from 'commander';
import { ConfigOverrides } from '../config/Config';

export interface SharedOptions {
  config?: string;
  marker?: string;
  debounce?: number;
  contextLines?: number;
  model?: string;
  baseUrl?: string;
  verbose?: boolean;
}

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function addSharedOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Config file (default: .fillmark.yml in the root)')
    .option('-m, --marker <token>', 'Marker that requests a completion')
    .option('--debounce <ms>', 'Quiet period before a save is processed', parseInteger)
    .option('--context-lines <n>', 'Lines of context on each side of the marker', parseInteger)
    .option('--model <name>', 'Model to ask for completions')
    .option('--base-url <url>', 'OpenAI-compatible API endpoint')
    .option('-v, --verbose', 'Debug logging');
}

export function toOverrides(options: SharedOptions): ConfigOverrides {
  return {
    marker: options.marker,
    debounceMs: options.debounce,
    contextLines: options.contextLines,
    logLevel: options.verbose ? 'debug' : undefined,
    ai: {
      model: options.model,
      baseUrl: options.baseUrl,
    },
  };
}
