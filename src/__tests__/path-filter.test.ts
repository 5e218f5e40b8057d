/**
 * PathFilter Tests
 */

import * as path from 'path';
import { PathFilter, TEMP_FILE_SUFFIX } from '../watcher';
import { DEFAULT_IGNORED_DIRS, DEFAULT_IGNORED_FILES } from '../config';

describe('PathFilter', () => {
  const filter = new PathFilter({
    ignoredDirs: DEFAULT_IGNORED_DIRS,
    ignoredFiles: DEFAULT_IGNORED_FILES,
  });

  test('should track ordinary source files', () => {
    expect(filter.shouldTrack('src/main.rs')).toBe(true);
    expect(filter.shouldTrack('/home/dev/project/app.ts')).toBe(true);
    expect(filter.shouldTrack('README')).toBe(true);
  });

  test('should reject paths under ignored directories', () => {
    expect(filter.shouldTrack('node_modules/pkg/index.js')).toBe(false);
    expect(filter.shouldTrack('project/.git/HEAD')).toBe(false);
    expect(filter.shouldTrack('target/debug/build.rs')).toBe(false);
    expect(filter.shouldTrack('pkg/__pycache__/mod.pyc')).toBe(false);
  });

  test('should match directories by whole segment', () => {
    expect(filter.shouldTrack('rebuild/app.ts')).toBe(true);
    expect(filter.shouldTrack('src/distance.ts')).toBe(true);
    expect(filter.shouldTrack('src/dist/app.js')).toBe(false);
  });

  test('should reject ignored basenames', () => {
    expect(filter.shouldTrack('.DS_Store')).toBe(false);
    expect(filter.shouldTrack('project/.gitignore')).toBe(false);
    expect(filter.shouldTrack('project/.env')).toBe(false);
    expect(filter.shouldTrack('project/.env.local')).toBe(true);
  });

  test('should reject temp files written during atomic replace', () => {
    expect(filter.shouldTrack(`src/.main.rs.1234${TEMP_FILE_SUFFIX}`)).toBe(false);
  });

  test('should accept Windows separators', () => {
    expect(filter.shouldTrack('C:\\work\\node_modules\\x.js')).toBe(false);
    expect(filter.shouldTrack('C:\\work\\src\\x.js')).toBe(true);
  });

  test('should reject empty and malformed paths', () => {
    expect(filter.shouldTrack('')).toBe(false);
    expect(filter.shouldTrack('   ')).toBe(false);
    expect(filter.shouldTrack('/')).toBe(false);
    expect(filter.shouldTrack('src/a\0b.ts')).toBe(false);
  });

  describe('shouldTrackRelative', () => {
    const root = path.resolve('/work/build/project');

    test('should only judge the part below the root', () => {
      expect(filter.shouldTrackRelative(root, path.join(root, 'src', 'lib.rs'))).toBe(true);
      expect(filter.shouldTrackRelative(root, path.join(root, 'build', 'lib.rs'))).toBe(false);
    });

    test('should reject the root itself and paths outside it', () => {
      expect(filter.shouldTrackRelative(root, root)).toBe(false);
      expect(filter.shouldTrackRelative(root, path.resolve('/work/other.ts'))).toBe(false);
    });

    test('should keep names that merely start with two dots', () => {
      expect(filter.shouldTrackRelative(root, path.join(root, '..notes.md'))).toBe(true);
    });
  });
});
