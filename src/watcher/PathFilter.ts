/**
 * PathFilter - Decides whether a filesystem path is tracked.
 *
 * Matching is per path segment: `build/app.ts` is ignored when `build` is an
 * ignored directory, `rebuild/app.ts` is not.
 */

import * as path from 'path';

/** Suffix of the temporary files written during an atomic replace */
export const TEMP_FILE_SUFFIX = '.fillmark-tmp';

export interface PathFilterRules {
  ignoredDirs: string[];
  ignoredFiles: string[];
}

export class PathFilter {
  private ignoredDirs: Set<string>;
  private ignoredFiles: Set<string>;

  constructor(rules: PathFilterRules) {
    this.ignoredDirs = new Set(rules.ignoredDirs);
    this.ignoredFiles = new Set(rules.ignoredFiles);
  }

  shouldTrack(filePath: string): boolean {
    if (typeof filePath !== 'string' || filePath.trim() === '' || filePath.includes('\0')) {
      return false;
    }

    const segments = filePath.split(/[\\/]+/).filter((segment) => segment !== '');
    const basename = segments[segments.length - 1];
    if (!basename) {
      return false;
    }

    if (this.ignoredFiles.has(basename) || basename.endsWith(TEMP_FILE_SUFFIX)) {
      return false;
    }

    return !segments.some((segment) => this.ignoredDirs.has(segment));
  }

  /**
   * Same check on the part of `filePath` below `rootDir`, so that a watched
   * root which itself sits under e.g. `build/` still works.
   */
  shouldTrackRelative(rootDir: string, filePath: string): boolean {
    const relative = path.relative(rootDir, filePath);
    if (
      relative === '' ||
      relative === '..' ||
      relative.startsWith(`..${path.sep}`) ||
      path.isAbsolute(relative)
    ) {
      return false;
    }
    return this.shouldTrack(relative);
  }
}
