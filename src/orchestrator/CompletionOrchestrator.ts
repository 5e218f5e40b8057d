/**
 * CompletionOrchestrator - Runs one change through scan, completion and patch.
 *
 * Per path:
 *   read -> scan marker -> extract context -> complete -> parse -> plan -> apply
 *
 * Only the completion request is a long await. A newer change to the same path
 * supersedes the session started here, and a superseded session never writes.
 * Errors are logged and reported as an outcome; nothing is thrown.
 */

import * as fs from 'fs/promises';
import {
  ChangeEvent,
  CompletionContext,
  CompletionResult,
  FileSession,
  MarkerLocation,
  PatchOutcome,
  PatchPlan,
  ProcessOutcome,
  SkipReason,
  SuggestedEdit,
} from '../types';
import { FillmarkConfig } from '../config/Config';
import { Logger, createSilentLogger } from '../logging/Logger';
import { decodeText, scanMarker } from '../core/MarkerScanner';
import { ContextExtractor } from '../core/ContextExtractor';
import { CompletionProvider, errorMessage } from '../ai/CompletionClient';
import { parseCompletionXML } from '../ai/ResponseParser';
import { PatchEngine, createPatchPlan } from '../patch/PatchEngine';
import { SessionRegistry } from './SessionRegistry';
import { isFileNotFound } from '../utils/fs';

export type OrchestratorSettings = Pick<
  FillmarkConfig,
  | 'marker'
  | 'maxFileSize'
  | 'contextLines'
  | 'documentContextLines'
  | 'maxContextChars'
  | 'maxDocumentChars'
>;

export interface CompletionOrchestratorOptions {
  settings: OrchestratorSettings;
  provider: CompletionProvider;
  patchEngine: PatchEngine;
  sessions?: SessionRegistry;
  logger?: Logger;
  /** Called once per completion request, successful or not */
  onResult?: (result: CompletionResult) => void;
}

export interface OrchestratorStats {
  processed: number;
  applied: number;
  failed: number;
  superseded: number;
  stale: number;
  skipped: number;
}

export class CompletionOrchestrator {
  private readonly settings: OrchestratorSettings;
  private readonly provider: CompletionProvider;
  private readonly patchEngine: PatchEngine;
  private readonly sessions: SessionRegistry;
  private readonly extractor: ContextExtractor;
  private readonly logger: Logger;
  private readonly onResult?: (result: CompletionResult) => void;

  /** Content we last finished with, per path */
  private lastSeen: Map<string, string> = new Map();
  private stats: OrchestratorStats = {
    processed: 0,
    applied: 0,
    failed: 0,
    superseded: 0,
    stale: 0,
    skipped: 0,
  };

  constructor(options: CompletionOrchestratorOptions) {
    this.settings = options.settings;
    this.provider = options.provider;
    this.patchEngine = options.patchEngine;
    this.sessions = options.sessions ?? new SessionRegistry();
    this.logger = options.logger ?? createSilentLogger();
    this.onResult = options.onResult;
    this.extractor = new ContextExtractor({
      contextLines: this.settings.contextLines,
      documentContextLines: this.settings.documentContextLines,
      maxContextChars: this.settings.maxContextChars,
      maxDocumentChars: this.settings.maxDocumentChars,
    });
  }

  /**
   * A change to `filePath` was observed; any pending session for it is stale.
   */
  observe(filePath: string): void {
    const superseded = this.sessions.supersede(filePath);
    if (superseded?.state === 'superseded') {
      this.logger.debug(`session ${superseded.id} for ${filePath} superseded by a newer change`);
    }
  }

  async process(change: ChangeEvent | string): Promise<ProcessOutcome> {
    const filePath = typeof change === 'string' ? change : change.path;
    this.stats.processed++;

    let outcome: ProcessOutcome;
    try {
      outcome = await this.run(filePath);
    } catch (error) {
      this.logger.error(`Unexpected error while processing ${filePath}:`, error);
      outcome = { status: 'failed', path: filePath, error: errorMessage(error) };
    }

    this.stats[outcome.status]++;
    return outcome;
  }

  getStats(): OrchestratorStats {
    return { ...this.stats };
  }

  /** Forget remembered content (the file was removed) */
  forget(filePath: string): void {
    this.lastSeen.delete(filePath);
  }

  private async run(filePath: string): Promise<ProcessOutcome> {
    const snapshot = await this.readSnapshot(filePath);
    if (typeof snapshot !== 'string') {
      return this.skip(filePath, snapshot.reason);
    }

    if (this.lastSeen.get(filePath) === snapshot) {
      return this.skip(filePath, 'unchanged');
    }

    const location = scanMarker(snapshot, filePath, this.settings.marker);
    if (!location) {
      this.lastSeen.set(filePath, snapshot);
      return this.skip(filePath, 'no-marker');
    }

    this.logger.info(`Marker found at ${filePath}:${location.line}:${location.column}`);
    const context = this.extractor.extract(snapshot, location);
    const session = this.sessions.begin(filePath);

    const suggestion = await this.requestSuggestion(session, context);
    if (!this.sessions.isCurrent(session)) {
      return this.superseded(session);
    }
    if ('error' in suggestion) {
      return this.fail(session, suggestion.error);
    }

    return this.patch(session, snapshot, location, context, suggestion.edit);
  }

  private async readSnapshot(filePath: string): Promise<string | { reason: SkipReason }> {
    let buffer: Buffer;
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        return { reason: 'missing' };
      }
      if (stats.size > this.settings.maxFileSize) {
        return { reason: 'too-large' };
      }
      buffer = await fs.readFile(filePath);
    } catch (error) {
      if (isFileNotFound(error)) {
        this.forget(filePath);
        return { reason: 'missing' };
      }
      throw error;
    }

    return decodeText(buffer) ?? { reason: 'binary' };
  }

  private async requestSuggestion(
    session: FileSession,
    context: CompletionContext
  ): Promise<{ edit: SuggestedEdit } | { error: string }> {
    const startTime = Date.now();
    const result: CompletionResult = {
      sessionId: session.id,
      context,
      status: 'failure',
      tokensUsed: 0,
      latencyMs: 0,
    };

    try {
      const response = await this.provider.complete(context, session.signal);
      result.tokensUsed = response.tokensUsed;
      result.latencyMs = response.latencyMs;
      result.suggestion = parseCompletionXML(response.text);
      result.status = 'success';
    } catch (error) {
      result.latencyMs = Date.now() - startTime;
      result.error = errorMessage(error);
    }

    this.onResult?.(result);

    if (result.suggestion) {
      return { edit: result.suggestion };
    }
    return { error: result.error ?? 'completion failed' };
  }

  private async patch(
    session: FileSession,
    snapshot: string,
    location: MarkerLocation,
    context: CompletionContext,
    suggestion: SuggestedEdit
  ): Promise<ProcessOutcome> {
    let plan: PatchPlan;
    try {
      plan = createPatchPlan(snapshot, location, suggestion, context);
    } catch (error) {
      return this.fail(session, errorMessage(error));
    }

    let applied: PatchOutcome;
    try {
      applied = await this.patchEngine.apply(plan, session.signal);
    } catch (error) {
      return this.fail(session, `write failed: ${errorMessage(error)}`);
    }

    if (applied.status === 'superseded') {
      return this.superseded(session);
    }
    if (applied.status === 'stale') {
      this.sessions.finish(session, 'failed');
      this.logger.info(`Not patching ${session.path}: ${applied.reason}`);
      return { status: 'stale', path: session.path, sessionId: session.id, reason: applied.reason };
    }

    if (!this.sessions.finish(session, 'completed')) {
      return this.superseded(session);
    }
    this.lastSeen.set(session.path, applied.content);
    this.logger.info(
      `Completed ${session.path}:${location.line} (${applied.edits.length} edit${applied.edits.length === 1 ? '' : 's'})`
    );
    return {
      status: 'applied',
      path: session.path,
      sessionId: session.id,
      content: applied.content,
    };
  }

  private superseded(session: FileSession): ProcessOutcome {
    this.logger.debug(`discarding result of superseded session ${session.id} for ${session.path}`);
    return { status: 'superseded', path: session.path, sessionId: session.id };
  }

  private fail(session: FileSession, error: string): ProcessOutcome {
    this.sessions.finish(session, 'failed');
    this.logger.warn(`Completion for ${session.path} failed: ${error}`);
    return { status: 'failed', path: session.path, sessionId: session.id, error };
  }

  private skip(filePath: string, reason: SkipReason): ProcessOutcome {
    this.logger.debug(`skipping ${filePath}: ${reason}`);
    return { status: 'skipped', path: filePath, reason };
  }
}
