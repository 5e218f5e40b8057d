/**
 * WriteGuard - Remembers our own writes so the watcher can drop their echoes.
 *
 * An entry is registered before the write and given the written file's
 * fingerprint after it. The first event that matches consumes the entry;
 * otherwise it expires after `ttlMs` so a later user save is never swallowed.
 */

import { FileFingerprint } from '../types';

interface GuardEntry {
  expiresAt: number;
  fingerprint?: FileFingerprint;
}

export class WriteGuard {
  private entries: Map<string, GuardEntry> = new Map();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Mark a write to `filePath` as in progress.
   */
  register(filePath: string): void {
    this.entries.set(filePath, { expiresAt: this.now() + this.ttlMs });
  }

  /**
   * Attach the fingerprint of the content we just wrote. Does nothing when the
   * echo already consumed the registration.
   */
  record(filePath: string, fingerprint: FileFingerprint): boolean {
    if (!this.entries.has(filePath)) {
      return false;
    }
    this.entries.set(filePath, {
      expiresAt: this.now() + this.ttlMs,
      fingerprint,
    });
    return true;
  }

  /**
   * Forget a registration (the write failed).
   */
  release(filePath: string): void {
    this.entries.delete(filePath);
  }

  /**
   * Classify an incoming event. Returns true, and consumes the entry, when the
   * event is the echo of one of our writes.
   */
  isSelfEvent(filePath: string, fingerprint?: FileFingerprint): boolean {
    const entry = this.entries.get(filePath);
    if (!entry) {
      return false;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(filePath);
      return false;
    }

    if (entry.fingerprint && fingerprint && !sameFingerprint(entry.fingerprint, fingerprint)) {
      return false;
    }

    this.entries.delete(filePath);
    return true;
  }

  has(filePath: string): boolean {
    const entry = this.entries.get(filePath);
    return entry !== undefined && entry.expiresAt > this.now();
  }

  /**
   * Drop expired entries.
   */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [filePath, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(filePath);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

export function sameFingerprint(a: FileFingerprint, b: FileFingerprint): boolean {
  return a.mtimeMs === b.mtimeMs && a.size === b.size;
}
