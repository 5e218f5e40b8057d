/**
 * FileWatcher - chokidar-backed source of raw filesystem events.
 *
 * Callbacks never do work themselves: every add/change/unlink is pushed onto
 * the event queue and the pipeline's consumer loop takes it from there.
 */

import * as chokidar from 'chokidar';
import * as fs from 'fs/promises';
import { constants as fsConstants, Stats } from 'fs';
import * as path from 'path';
import { RawEventKind, RawFileEvent } from '../types';
import { EventQueue } from './EventQueue';
import { PathFilter } from './PathFilter';
import { Logger, createSilentLogger } from '../logging/Logger';

/**
 * The watcher could not be started; nothing is being watched.
 */
export class WatcherStartError extends Error {
  constructor(
    message: string,
    public readonly rootDir: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'WatcherStartError';
  }
}

export interface FileWatcherOptions {
  rootDir: string;
  queue: EventQueue<RawFileEvent>;
  filter: PathFilter;
  logger?: Logger;
  /** Use polling (network drives, some containers) */
  usePolling?: boolean;
}

export class FileWatcher {
  private readonly rootDir: string;
  private readonly queue: EventQueue<RawFileEvent>;
  private readonly filter: PathFilter;
  private readonly logger: Logger;
  private readonly usePolling: boolean;
  private watcher: chokidar.FSWatcher | null = null;

  constructor(options: FileWatcherOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.queue = options.queue;
    this.filter = options.filter;
    this.logger = options.logger ?? createSilentLogger();
    this.usePolling = options.usePolling ?? false;
  }

  /**
   * Start watching. Resolves once the initial scan is done.
   *
   * @throws WatcherStartError if the root cannot be watched
   */
  async start(): Promise<void> {
    if (this.watcher) {
      this.logger.warn('watcher already running, ignoring start request');
      return;
    }

    await this.checkRoot();

    const watcher = chokidar.watch(this.rootDir, {
      persistent: true,
      ignoreInitial: true,
      alwaysStat: true,
      followSymlinks: false,
      usePolling: this.usePolling,
      ignored: (candidate: string) =>
        path.resolve(candidate) !== this.rootDir &&
        !this.filter.shouldTrackRelative(this.rootDir, candidate),
    });

    watcher.on('add', (filePath: string, stats?: Stats) => this.forward('add', filePath, stats));
    watcher.on('change', (filePath: string, stats?: Stats) =>
      this.forward('change', filePath, stats)
    );
    watcher.on('unlink', (filePath: string) => this.forward('unlink', filePath));

    try {
      await new Promise<void>((resolve, reject) => {
        watcher.once('ready', () => resolve());
        watcher.once('error', (error: Error) => reject(error));
      });
    } catch (error) {
      await watcher.close();
      throw new WatcherStartError(
        `Failed to start watcher on ${this.rootDir}: ${error instanceof Error ? error.message : String(error)}`,
        this.rootDir,
        error
      );
    }

    watcher.on('error', (error: Error) => {
      this.logger.error('watch error:', error);
    });

    this.watcher = watcher;
    this.logger.info(`watching ${this.rootDir}`);
  }

  async stop(): Promise<void> {
    if (!this.watcher) {
      return;
    }
    const watcher = this.watcher;
    this.watcher = null;
    await watcher.close();
    this.logger.debug('watcher stopped');
  }

  isWatching(): boolean {
    return this.watcher !== null;
  }

  getRootDir(): string {
    return this.rootDir;
  }

  private async checkRoot(): Promise<void> {
    let stat: Stats;
    try {
      stat = await fs.stat(this.rootDir);
    } catch (error) {
      throw new WatcherStartError(`Cannot watch ${this.rootDir}: directory not found`, this.rootDir, error);
    }
    if (!stat.isDirectory()) {
      throw new WatcherStartError(`Cannot watch ${this.rootDir}: not a directory`, this.rootDir);
    }
    try {
      await fs.access(this.rootDir, fsConstants.R_OK | fsConstants.X_OK);
    } catch (error) {
      throw new WatcherStartError(`Cannot watch ${this.rootDir}: permission denied`, this.rootDir, error);
    }
  }

  private forward(kind: RawEventKind, filePath: string, stats?: Stats): void {
    const event: RawFileEvent = {
      kind,
      path: path.resolve(filePath),
      timestamp: Date.now(),
      fingerprint: stats ? { mtimeMs: stats.mtimeMs, size: stats.size } : undefined,
    };
    if (!this.queue.push(event)) {
      this.logger.debug(`queue closed, dropped ${kind} for ${event.path}`);
    }
  }
}
