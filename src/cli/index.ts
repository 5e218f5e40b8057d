#!/usr/bin/env node
/**
 * fillmark CLI - Fill `??` markers in source files with model completions.
 *
 * Commands:
 *   watch [dir]       Watch a directory and complete markers on save
 *   complete <file>   Complete the first marker in one file now
 *   scan [dir]        List tracked files that contain a marker
 */

import { Command } from 'commander';
import * as path from 'path';
import { loadConfig } from '../config/ConfigLoader';
import { ConfigError, FillmarkConfig } from '../config/Config';
import { createLogger, Logger } from '../logging/Logger';
import { CompletionClient } from '../ai/CompletionClient';
import { WatcherStartError } from '../watcher/FileWatcher';
import { Pipeline } from '../pipeline/Pipeline';
import { scanProject } from '../core/ProjectScanner';
import { ProcessOutcome } from '../types';
import { SharedOptions, addSharedOptions, toOverrides } from './options';

interface WatchOptions extends SharedOptions {
  poll?: boolean;
}

interface ScanCommandOptions extends SharedOptions {
  json?: boolean;
}

const program = new Command();

program
  .name('fillmark')
  .description('Complete code at ?? markers when files are saved')
  .version('0.1.0');

// Watch command
addSharedOptions(
  program
    .command('watch')
    .description('Watch a directory and complete markers on save')
    .argument('[dir]', 'Directory to watch', '.')
    .option('--poll', 'Use polling instead of native file events')
).action(async (dir: string, options: WatchOptions) => {
  try {
    const rootDir = path.resolve(dir);
    const config = await loadConfig({
      rootDir,
      configPath: options.config,
      overrides: toOverrides(options),
      requireApiKey: true,
    });
    const logger = createLogger(config.logLevel);
    const pipeline = createPipeline(rootDir, config, logger, options.poll);

    await pipeline.start();
    logger.info(`Watching ${rootDir} for "${config.marker}" markers (Ctrl+C to stop)`);

    await waitForShutdownSignal();
    logger.info('Shutting down...');
    await pipeline.stop();

    const stats = pipeline.orchestrator.getStats();
    logger.info(
      `Processed ${stats.processed} changes: ${stats.applied} completed, ${stats.failed} failed, ${stats.stale} stale, ${stats.superseded} superseded`
    );
  } catch (error) {
    fail('Watch failed', error);
  }
});

// Complete command
addSharedOptions(
  program
    .command('complete')
    .description('Complete the first marker in a file now')
    .argument('<file>', 'File to complete')
).action(async (file: string, options: SharedOptions) => {
  try {
    const rootDir = process.cwd();
    const config = await loadConfig({
      rootDir,
      configPath: options.config,
      overrides: toOverrides(options),
      requireApiKey: true,
    });
    const logger = createLogger(config.logLevel);
    const pipeline = createPipeline(rootDir, config, logger);

    const outcome = await pipeline.processFile(file);
    console.log(describeOutcome(outcome));
    if (outcome.status !== 'applied' && outcome.status !== 'skipped') {
      process.exitCode = 1;
    }
  } catch (error) {
    fail('Completion failed', error);
  }
});

// Scan command
addSharedOptions(
  program
    .command('scan')
    .description('List tracked files that contain a marker')
    .argument('[dir]', 'Directory to scan', '.')
    .option('--json', 'Output as JSON')
).action(async (dir: string, options: ScanCommandOptions) => {
  try {
    const rootDir = path.resolve(dir);
    const config = await loadConfig({
      rootDir,
      configPath: options.config,
      overrides: toOverrides(options),
    });

    const hits = await scanProject(rootDir, config);

    if (options.json) {
      console.log(JSON.stringify(hits, null, 2));
    } else if (hits.length === 0) {
      console.log(`No "${config.marker}" markers found in ${rootDir}`);
    } else {
      for (const hit of hits) {
        const more = hit.count > 1 ? ` (+${hit.count - 1} more)` : '';
        console.log(`${hit.file}:${hit.line}:${hit.column}  ${hit.lineText.trim()}${more}`);
      }
      console.log('');
      console.log(`Total: ${hits.length} file${hits.length === 1 ? '' : 's'}`);
    }
  } catch (error) {
    fail('Scan failed', error);
  }
});

function createPipeline(
  rootDir: string,
  config: FillmarkConfig,
  logger: Logger,
  usePolling = false
): Pipeline {
  const provider = new CompletionClient({ ...config.ai, logger: logger.child('ai') });
  return new Pipeline({ rootDir, config, provider, logger, usePolling });
}

function describeOutcome(outcome: ProcessOutcome): string {
  switch (outcome.status) {
    case 'applied':
      return `Completed ${outcome.path}`;
    case 'skipped':
      return `Nothing to do for ${outcome.path} (${outcome.reason})`;
    case 'failed':
      return `Completion failed for ${outcome.path}: ${outcome.error}`;
    case 'stale':
      return `File changed while completing ${outcome.path}: ${outcome.reason}`;
    case 'superseded':
      return `Completion for ${outcome.path} was superseded`;
  }
}

function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

function fail(prefix: string, error: unknown): never {
  if (error instanceof ConfigError || error instanceof WatcherStartError) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error(`${prefix}:`, error);
  }
  process.exit(1);
}

program.parseAsync().catch((error: unknown) => fail('fillmark', error));
