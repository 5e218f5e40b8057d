/**
 * WriteGuard Tests
 */

import { WriteGuard } from '../watcher';

describe('WriteGuard', () => {
  let now: number;
  let guard: WriteGuard;

  beforeEach(() => {
    now = 1000;
    guard = new WriteGuard(2000, () => now);
  });

  test('should recognise the echo of a recorded write once', () => {
    guard.register('/p/a.ts');
    guard.record('/p/a.ts', { mtimeMs: 5, size: 10 });

    expect(guard.isSelfEvent('/p/a.ts', { mtimeMs: 5, size: 10 })).toBe(true);
    expect(guard.isSelfEvent('/p/a.ts', { mtimeMs: 5, size: 10 })).toBe(false);
  });

  test('should treat an event during the write as self', () => {
    guard.register('/p/a.ts');
    expect(guard.isSelfEvent('/p/a.ts', { mtimeMs: 7, size: 3 })).toBe(true);
  });

  test('should not re-arm a registration its echo already consumed', () => {
    guard.register('/p/a.ts');
    expect(guard.isSelfEvent('/p/a.ts', { mtimeMs: 5, size: 10 })).toBe(true);

    expect(guard.record('/p/a.ts', { mtimeMs: 5, size: 10 })).toBe(false);
    expect(guard.size).toBe(0);
    expect(guard.isSelfEvent('/p/a.ts', { mtimeMs: 5, size: 10 })).toBe(false);
  });

  test('should not swallow a user save with a different fingerprint', () => {
    guard.register('/p/a.ts');
    guard.record('/p/a.ts', { mtimeMs: 5, size: 10 });

    expect(guard.isSelfEvent('/p/a.ts', { mtimeMs: 9, size: 12 })).toBe(false);
    // the echo itself can still arrive afterwards
    expect(guard.isSelfEvent('/p/a.ts', { mtimeMs: 5, size: 10 })).toBe(true);
  });

  test('should accept an event without fingerprint', () => {
    guard.register('/p/a.ts');
    guard.record('/p/a.ts', { mtimeMs: 5, size: 10 });
    expect(guard.isSelfEvent('/p/a.ts')).toBe(true);
  });

  test('should expire entries after the ttl', () => {
    guard.register('/p/a.ts');
    guard.record('/p/a.ts', { mtimeMs: 5, size: 10 });

    now += 2000;
    expect(guard.has('/p/a.ts')).toBe(false);
    expect(guard.isSelfEvent('/p/a.ts', { mtimeMs: 5, size: 10 })).toBe(false);
    expect(guard.size).toBe(0);
  });

  test('should forget released writes', () => {
    guard.register('/p/a.ts');
    guard.release('/p/a.ts');
    expect(guard.isSelfEvent('/p/a.ts')).toBe(false);
  });

  test('should prune expired entries only', () => {
    guard.register('/p/a.ts');
    now += 1500;
    guard.register('/p/b.ts');
    now += 600;

    expect(guard.prune()).toBe(1);
    expect(guard.has('/p/a.ts')).toBe(false);
    expect(guard.has('/p/b.ts')).toBe(true);
  });

  test('should never classify untouched paths as self', () => {
    expect(guard.isSelfEvent('/p/other.ts', { mtimeMs: 1, size: 1 })).toBe(false);
  });
});
