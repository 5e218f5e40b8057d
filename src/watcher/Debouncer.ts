/**
 * Debouncer - Collapses bursts of events per path into one change.
 *
 * Each external event resets its path's timer; the latest event is emitted
 * once the path has been quiet for `delayMs`. Self-origin events are dropped
 * without touching any timer.
 */

import { ChangeEvent } from '../types';
import { Logger, createSilentLogger } from '../logging/Logger';

export type ChangeHandler = (event: ChangeEvent) => void;

interface PendingChange {
  timer: ReturnType<typeof setTimeout>;
  event: ChangeEvent;
  /** Raw events coalesced into this change */
  count: number;
}

export class Debouncer {
  private pendingChanges: Map<string, PendingChange> = new Map();

  constructor(
    private readonly delayMs: number,
    private readonly onChange: ChangeHandler,
    private readonly logger: Logger = createSilentLogger()
  ) {}

  /**
   * Feed one event. Returns false when the event was dropped.
   */
  push(event: ChangeEvent): boolean {
    if (event.origin === 'self') {
      this.logger.debug(`dropped self event for ${event.path}`);
      return false;
    }

    const existing = this.pendingChanges.get(event.path);
    if (existing) {
      clearTimeout(existing.timer);
    }

    const pendingChange: PendingChange = {
      event,
      count: (existing?.count ?? 0) + 1,
      timer: setTimeout(() => this.emit(event.path), this.delayMs),
    };
    this.pendingChanges.set(event.path, pendingChange);
    return true;
  }

  pending(filePath: string): boolean {
    return this.pendingChanges.has(filePath);
  }

  get size(): number {
    return this.pendingChanges.size;
  }

  /**
   * Emit every pending change now.
   */
  flush(): void {
    for (const filePath of [...this.pendingChanges.keys()]) {
      this.emit(filePath);
    }
  }

  /**
   * Drop a pending change without emitting it.
   */
  cancel(filePath: string): boolean {
    const pendingChange = this.pendingChanges.get(filePath);
    if (!pendingChange) {
      return false;
    }
    clearTimeout(pendingChange.timer);
    this.pendingChanges.delete(filePath);
    return true;
  }

  dispose(): void {
    for (const pendingChange of this.pendingChanges.values()) {
      clearTimeout(pendingChange.timer);
    }
    this.pendingChanges.clear();
  }

  private emit(filePath: string): void {
    const pendingChange = this.pendingChanges.get(filePath);
    if (!pendingChange) {
      return;
    }
    clearTimeout(pendingChange.timer);
    this.pendingChanges.delete(filePath);

    if (pendingChange.count > 1) {
      this.logger.debug(`coalesced ${pendingChange.count} events for ${filePath}`);
    }

    try {
      this.onChange(pendingChange.event);
    } catch (error) {
      this.logger.error(`change handler failed for ${filePath}:`, error);
    }
  }
}
