/**
 * SessionRegistry Tests
 */

import { SessionRegistry } from '../orchestrator';

describe('SessionRegistry', () => {
  let registry: SessionRegistry;

  beforeEach(() => {
    registry = new SessionRegistry(() => 42);
  });

  test('should start a pending session', () => {
    const session = registry.begin('/p/a.ts');

    expect(session.state).toBe('pending');
    expect(session.startedAt).toBe(42);
    expect(session.signal.aborted).toBe(false);
    expect(registry.isCurrent(session)).toBe(true);
    expect(registry.stateOf('/p/a.ts')).toBe('pending');
  });

  test('should supersede the pending session on a new begin', () => {
    const first = registry.begin('/p/a.ts');
    const second = registry.begin('/p/a.ts');

    expect(first.state).toBe('superseded');
    expect(first.signal.aborted).toBe(true);
    expect(registry.isCurrent(first)).toBe(false);
    expect(registry.isCurrent(second)).toBe(true);
    expect(second.id).not.toBe(first.id);
  });

  test('should keep sessions of different paths apart', () => {
    const a = registry.begin('/p/a.ts');
    const b = registry.begin('/p/b.ts');

    expect(registry.isCurrent(a)).toBe(true);
    expect(registry.isCurrent(b)).toBe(true);
    expect(registry.size).toBe(2);
  });

  test('should tear down a finished session', () => {
    const session = registry.begin('/p/a.ts');

    expect(registry.finish(session, 'completed')).toBe(true);
    expect(session.state).toBe('completed');
    expect(registry.stateOf('/p/a.ts')).toBe('idle');
    expect(registry.isCurrent(session)).toBe(false);
  });

  test('should not resurrect a superseded session', () => {
    const first = registry.begin('/p/a.ts');
    const second = registry.begin('/p/a.ts');

    expect(registry.finish(first, 'completed')).toBe(false);
    expect(first.state).toBe('superseded');
    expect(registry.get('/p/a.ts')).toBe(second);
  });

  test('should supersede without starting anything', () => {
    const session = registry.begin('/p/a.ts');

    expect(registry.supersede('/p/a.ts')).toBe(session);
    expect(session.state).toBe('superseded');
    expect(registry.supersede('/p/a.ts')).toBeUndefined();
  });

  test('should cancel every pending session', () => {
    const a = registry.begin('/p/a.ts');
    const b = registry.begin('/p/b.ts');

    expect(registry.cancelAll()).toBe(2);
    expect(a.signal.aborted).toBe(true);
    expect(b.signal.aborted).toBe(true);
    expect(registry.size).toBe(0);
  });
});
