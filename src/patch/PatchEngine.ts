/**
 * PatchEngine - Turns a suggestion into minimal edits and writes them back.
 *
 * Writing is read-verify-write: the file is re-read, the span the suggestion
 * was computed from must still match the snapshot, and only then the edits
 * are applied. The result goes to a temp file; the original is read once more
 * and must be unchanged before the temp file is renamed over it.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  CompletionContext,
  MarkerLocation,
  PatchOutcome,
  PatchPlan,
  SuggestedEdit,
} from '../types';
import { WriteGuard } from '../watcher/WriteGuard';
import { TEMP_FILE_SUFFIX } from '../watcher/PathFilter';
import { decodeText } from '../core/MarkerScanner';
import { Logger, createSilentLogger } from '../logging/Logger';
import { applyTextEdits, computeTextEdits, offsetEdits } from './TextDiff';
import { isFileNotFound } from '../utils/fs';

export type PatchErrorReason = 'marker-mismatch' | 'text-mismatch' | 'no-change';

/**
 * A suggestion that cannot be turned into a patch for this snapshot.
 */
export class PatchError extends Error {
  constructor(
    message: string,
    public readonly reason: PatchErrorReason
  ) {
    super(message);
    this.name = 'PatchError';
  }
}

export function createPatchPlan(
  snapshot: string,
  location: MarkerLocation,
  suggestion: SuggestedEdit,
  context: CompletionContext
): PatchPlan {
  const markerStart = location.offset;
  const markerEnd = markerStart + location.marker.length;

  if (snapshot.slice(markerStart, markerEnd) !== location.marker) {
    throw new PatchError(
      `Marker not found at offset ${markerStart} in ${location.path}`,
      'marker-mismatch'
    );
  }

  let regionStart = markerStart;
  let regionEnd = markerEnd;
  let replacement: string;

  if (suggestion.kind === 'insert') {
    replacement = suggestion.text;
  } else {
    const start = locateBefore(snapshot, markerStart, suggestion.before);
    const end = locateAfter(snapshot, markerEnd, suggestion.after);
    if (start === null || end === null) {
      throw new PatchError(
        `Quoted ${start === null ? 'text before' : 'text after'} the cursor does not match ${location.path}`,
        'text-mismatch'
      );
    }
    regionStart = start;
    regionEnd = end;
    replacement = suggestion.replacement;
  }

  const regionText = snapshot.slice(regionStart, regionEnd);
  const edits = offsetEdits(computeTextEdits(regionText, replacement), regionStart);
  if (edits.length === 0) {
    throw new PatchError(`Suggestion for ${location.path} changes nothing`, 'no-change');
  }

  return {
    path: location.path,
    snapshot,
    markerStart,
    markerEnd,
    regionStart,
    regionEnd,
    verifyStart: Math.min(context.windowStart, regionStart),
    verifyEnd: Math.max(context.windowEnd, regionEnd),
    replacement,
    edits,
  };
}

export class PatchEngine {
  constructor(
    private readonly writeGuard: WriteGuard,
    private readonly logger: Logger = createSilentLogger()
  ) {}

  /**
   * Apply a plan to the file on disk. Returns `stale` and leaves the file alone
   * when the verify span no longer matches the snapshot, or when the file
   * changes while the patched copy is being written. Returns `superseded` when
   * `signal` fires before the patched copy replaces the file.
   */
  async apply(plan: PatchPlan, signal?: AbortSignal): Promise<PatchOutcome> {
    const current = await this.readCurrent(plan.path);
    if (typeof current !== 'string') {
      return current;
    }

    const expected = plan.snapshot.slice(plan.verifyStart, plan.verifyEnd);
    if (current.slice(plan.verifyStart, plan.verifyEnd) !== expected) {
      return {
        status: 'stale',
        path: plan.path,
        reason: `text around the marker changed since line ${lineOf(plan.snapshot, plan.markerStart)} was read`,
      };
    }

    const content = applyTextEdits(current, plan.edits);
    const written = await this.writeAtomic(plan.path, content, async () => {
      const latest = await this.readCurrent(plan.path);
      if (signal?.aborted) {
        return { status: 'superseded', path: plan.path };
      }
      if (typeof latest !== 'string') {
        return latest;
      }
      if (latest !== current) {
        return { status: 'stale', path: plan.path, reason: 'file changed while the patch was written' };
      }
      return null;
    });

    return written ?? { status: 'applied', path: plan.path, content, edits: plan.edits };
  }

  private async readCurrent(filePath: string): Promise<string | PatchOutcome> {
    let current: string | null;
    try {
      current = decodeText(await fs.readFile(filePath));
    } catch (error) {
      if (isFileNotFound(error)) {
        return { status: 'stale', path: filePath, reason: 'file was removed' };
      }
      throw error;
    }
    return current ?? { status: 'stale', path: filePath, reason: 'file is no longer text' };
  }

  /**
   * Write through a temp file in the same directory, keeping the file mode.
   * `precheck` runs once the temp file is in place, right before the rename;
   * an outcome from it cancels the write.
   */
  private async writeAtomic(
    filePath: string,
    content: string,
    precheck: () => Promise<PatchOutcome | null>
  ): Promise<PatchOutcome | null> {
    const { mode } = await fs.stat(filePath);
    const tempPath = path.join(
      path.dirname(filePath),
      `.${path.basename(filePath)}.${uuidv4()}${TEMP_FILE_SUFFIX}`
    );

    let renamed = false;
    try {
      await fs.writeFile(tempPath, content, { encoding: 'utf-8', mode });
      await fs.chmod(tempPath, mode);

      const cancelled = await precheck();
      if (cancelled) {
        return cancelled;
      }

      this.writeGuard.register(filePath);
      try {
        await fs.rename(tempPath, filePath);
      } catch (error) {
        this.writeGuard.release(filePath);
        throw error;
      }
      renamed = true;
    } finally {
      if (!renamed) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          this.logger.warn(`Could not remove temp file ${tempPath}:`, cleanupError);
        });
      }
    }

    const stats = await fs.stat(filePath);
    this.writeGuard.record(filePath, { mtimeMs: stats.mtimeMs, size: stats.size });
    this.logger.debug(`wrote ${filePath} (${stats.size} bytes)`);
    return null;
  }
}

function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r' || ch === '\f' || ch === '\v';
}

/**
 * Where the quoted `before` text starts in `snapshot`, given that it must end
 * at `markerStart`. Exact match first, then a match that ignores whitespace.
 */
export function locateBefore(snapshot: string, markerStart: number, before: string): number | null {
  const exactStart = markerStart - before.length;
  if (exactStart >= 0 && snapshot.slice(exactStart, markerStart) === before) {
    return exactStart;
  }

  const target = before.replace(/\s+/g, '');
  let i = markerStart;
  let j = target.length;
  while (j > 0 && i > 0) {
    i--;
    const ch = snapshot.charAt(i);
    if (isWhitespace(ch)) continue;
    j--;
    if (ch !== target.charAt(j)) return null;
  }
  if (j > 0) {
    return null;
  }

  let leading = before.length - before.trimStart().length;
  while (leading > 0 && i > 0 && isWhitespace(snapshot.charAt(i - 1))) {
    i--;
    leading--;
  }
  return i;
}

/**
 * Where the quoted `after` text ends in `snapshot`, given that it must start
 * at `markerEnd`.
 */
export function locateAfter(snapshot: string, markerEnd: number, after: string): number | null {
  const exactEnd = markerEnd + after.length;
  if (exactEnd <= snapshot.length && snapshot.slice(markerEnd, exactEnd) === after) {
    return exactEnd;
  }

  const target = after.replace(/\s+/g, '');
  let i = markerEnd;
  let j = 0;
  while (j < target.length && i < snapshot.length) {
    const ch = snapshot.charAt(i);
    i++;
    if (isWhitespace(ch)) continue;
    if (ch !== target.charAt(j)) return null;
    j++;
  }
  if (j < target.length) {
    return null;
  }

  let trailing = after.length - after.trimEnd().length;
  while (trailing > 0 && i < snapshot.length && isWhitespace(snapshot.charAt(i))) {
    i++;
    trailing--;
  }
  return i;
}

function lineOf(text: string, offset: number): number {
  return text.slice(0, offset).split('\n').length;
}
