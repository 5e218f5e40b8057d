/**
 * Pipeline - Owns every component of a watch session and wires them together.
 *
 *   chokidar -> EventQueue -> consumer loop -> Debouncer -> CompletionOrchestrator
 *
 * The consumer loop is the only reader of the queue. It classifies each raw
 * event (untracked, removed, our own write, or an external change), tells the
 * orchestrator about external changes so pending sessions are superseded
 * immediately, and feeds the debouncer. Debounced changes run concurrently
 * across paths.
 */

import * as path from 'path';
import { ChangeEvent, ProcessOutcome, RawFileEvent } from '../types';
import { FillmarkConfig } from '../config/Config';
import { Logger, createSilentLogger } from '../logging/Logger';
import { CompletionProvider } from '../ai/CompletionClient';
import { Debouncer } from '../watcher/Debouncer';
import { EventQueue } from '../watcher/EventQueue';
import { FileWatcher } from '../watcher/FileWatcher';
import { PathFilter } from '../watcher/PathFilter';
import { WriteGuard } from '../watcher/WriteGuard';
import { PatchEngine } from '../patch/PatchEngine';
import { SessionRegistry } from '../orchestrator/SessionRegistry';
import { CompletionOrchestrator } from '../orchestrator/CompletionOrchestrator';

export interface PipelineOptions {
  rootDir: string;
  config: FillmarkConfig;
  provider: CompletionProvider;
  logger?: Logger;
  usePolling?: boolean;
  /** Called with the outcome of every processed change */
  onOutcome?: (outcome: ProcessOutcome) => void;
}

export class Pipeline {
  readonly rootDir: string;
  readonly queue: EventQueue<RawFileEvent> = new EventQueue();
  readonly filter: PathFilter;
  readonly writeGuard: WriteGuard;
  readonly sessions: SessionRegistry = new SessionRegistry();
  readonly orchestrator: CompletionOrchestrator;

  private readonly debouncer: Debouncer;
  private readonly watcher: FileWatcher;
  private readonly logger: Logger;
  private readonly onOutcome?: (outcome: ProcessOutcome) => void;
  private consumer: Promise<void> | null = null;
  private inFlight: Set<Promise<ProcessOutcome>> = new Set();

  constructor(options: PipelineOptions) {
    const { config } = options;
    this.rootDir = path.resolve(options.rootDir);
    this.logger = options.logger ?? createSilentLogger();
    this.onOutcome = options.onOutcome;

    this.filter = new PathFilter({
      ignoredDirs: config.ignoredDirs,
      ignoredFiles: config.ignoredFiles,
    });
    this.writeGuard = new WriteGuard(config.writeGuardTtlMs);
    this.orchestrator = new CompletionOrchestrator({
      settings: config,
      provider: options.provider,
      patchEngine: new PatchEngine(this.writeGuard, this.logger.child('patch')),
      sessions: this.sessions,
      logger: this.logger.child('orchestrator'),
    });
    this.debouncer = new Debouncer(
      config.debounceMs,
      (change) => this.schedule(change),
      this.logger.child('debounce')
    );
    this.watcher = new FileWatcher({
      rootDir: this.rootDir,
      queue: this.queue,
      filter: this.filter,
      logger: this.logger.child('watcher'),
      usePolling: options.usePolling,
    });
  }

  /**
   * Start watching and consuming events.
   *
   * @throws WatcherStartError if the root cannot be watched
   */
  async start(): Promise<void> {
    if (this.consumer) {
      return;
    }
    await this.watcher.start();
    this.consumer = this.consume();
  }

  /**
   * Stop watching, drop pending changes and wait for running ones to settle.
   * Sessions still waiting on the model are superseded and never write.
   */
  async stop(): Promise<void> {
    await this.watcher.stop();
    this.queue.close();
    if (this.consumer) {
      await this.consumer;
      this.consumer = null;
    }
    this.debouncer.dispose();
    const cancelled = this.sessions.cancelAll();
    if (cancelled > 0) {
      this.logger.info(`cancelled ${cancelled} pending completion${cancelled === 1 ? '' : 's'}`);
    }
    await this.idle();
  }

  isRunning(): boolean {
    return this.consumer !== null;
  }

  /**
   * Classify one raw event and route it. Called by the consumer loop.
   */
  dispatch(event: RawFileEvent): void {
    this.writeGuard.prune();
    const filePath = path.resolve(event.path);
    if (!this.filter.shouldTrackRelative(this.rootDir, filePath)) {
      this.logger.debug(`ignoring untracked path ${filePath}`);
      return;
    }

    if (event.kind === 'unlink') {
      this.debouncer.cancel(filePath);
      this.orchestrator.observe(filePath);
      this.orchestrator.forget(filePath);
      return;
    }

    const change: ChangeEvent = {
      path: filePath,
      timestamp: event.timestamp,
      origin: this.writeGuard.isSelfEvent(filePath, event.fingerprint) ? 'self' : 'external',
      fingerprint: event.fingerprint,
    };

    if (change.origin === 'external') {
      this.orchestrator.observe(filePath);
    }
    this.debouncer.push(change);
  }

  /**
   * Run one file through the pipeline right now, bypassing the watcher.
   */
  async processFile(filePath: string): Promise<ProcessOutcome> {
    const resolved = path.resolve(filePath);
    const relative = path.relative(this.rootDir, resolved);
    const insideRoot = !relative.startsWith('..') && !path.isAbsolute(relative);
    const tracked = insideRoot
      ? this.filter.shouldTrackRelative(this.rootDir, resolved)
      : this.filter.shouldTrack(path.basename(resolved));
    if (!tracked) {
      return { status: 'skipped', path: resolved, reason: 'untracked' };
    }
    return this.track(this.orchestrator.process(resolved));
  }

  /**
   * Resolves once every change handed to the orchestrator has finished.
   */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /** Emit debounced changes immediately */
  flush(): void {
    this.debouncer.flush();
  }

  private async consume(): Promise<void> {
    for await (const event of this.queue) {
      try {
        this.dispatch(event);
      } catch (error) {
        this.logger.error(`failed to dispatch ${event.kind} for ${event.path}:`, error);
      }
    }
  }

  private schedule(change: ChangeEvent): void {
    this.track(this.orchestrator.process(change)).catch((error: unknown) => {
      this.logger.error(`processing ${change.path} failed:`, error);
    });
  }

  private track(task: Promise<ProcessOutcome>): Promise<ProcessOutcome> {
    const tracked = task.then((outcome) => {
      this.notify(outcome);
      return outcome;
    });
    this.inFlight.add(tracked);
    return tracked.finally(() => {
      this.inFlight.delete(tracked);
    });
  }

  private notify(outcome: ProcessOutcome): void {
    if (!this.onOutcome) return;
    try {
      this.onOutcome(outcome);
    } catch (error) {
      this.logger.error(`outcome handler failed for ${outcome.path}:`, error);
    }
  }
}
