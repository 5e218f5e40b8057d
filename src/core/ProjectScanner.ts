/**
 * ProjectScanner - Finds tracked files under a directory that hold a marker.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { glob } from 'glob';
import { PathFilter, PathFilterRules } from '../watcher/PathFilter';
import { countMarkers, decodeText, scanMarker } from './MarkerScanner';
import { isErrnoException } from '../utils/fs';

/** Per-file read errors that skip the file instead of failing the scan */
const SKIPPED_READ_ERRORS = new Set(['ENOENT', 'EACCES', 'EPERM', 'EISDIR']);

export interface ScanOptions extends PathFilterRules {
  marker: string;
  maxFileSize: number;
}

export interface MarkerHit {
  /** Path relative to the scanned root, with `/` separators */
  file: string;
  line: number;
  column: number;
  lineText: string;
  /** Markers in the file; only the first is completed per save */
  count: number;
}

export async function scanProject(rootDir: string, options: ScanOptions): Promise<MarkerHit[]> {
  const root = path.resolve(rootDir);
  const filter = new PathFilter(options);

  const files = await glob('**/*', {
    cwd: root,
    nodir: true,
    dot: true,
    absolute: true,
    ignore: options.ignoredDirs.map((dir) => `**/${dir}/**`),
  });

  const hits: MarkerHit[] = [];
  for (const file of files.sort()) {
    if (!filter.shouldTrackRelative(root, file)) {
      continue;
    }

    const content = await readTrackedText(file, options.maxFileSize);
    if (content === null) {
      continue;
    }

    const location = scanMarker(content, file, options.marker);
    if (location) {
      hits.push({
        file: path.relative(root, file).split(path.sep).join('/'),
        line: location.line,
        column: location.column,
        lineText: location.lineText,
        count: countMarkers(content, options.marker),
      });
    }
  }

  return hits;
}

/**
 * Read `file` as text. Null when it is too large, binary, gone since the glob
 * ran, or unreadable.
 */
async function readTrackedText(file: string, maxFileSize: number): Promise<string | null> {
  try {
    const stats = await fs.stat(file);
    if (stats.size > maxFileSize) {
      return null;
    }
    return decodeText(await fs.readFile(file));
  } catch (error) {
    if (isErrnoException(error) && SKIPPED_READ_ERRORS.has(error.code ?? '')) {
      return null;
    }
    throw error;
  }
}
