/**
 * MarkerScanner - Finds the completion marker in file content.
 */

import { MarkerLocation } from '../types';

export const DEFAULT_MARKER = '??';

/** How far into a file we look for NUL bytes when sniffing binaries */
const BINARY_SNIFF_BYTES = 8000;

// A byte order mark stays in the decoded text so offsets match the file bytes
const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

const BOM = '\uFEFF';

/**
 * Decode file bytes as UTF-8 text.
 *
 * @returns The text, or null for binary or undecodable content
 */
export function decodeText(buffer: Uint8Array): string | null {
  const sniffLength = Math.min(buffer.length, BINARY_SNIFF_BYTES);
  for (let i = 0; i < sniffLength; i++) {
    if (buffer[i] === 0) {
      return null;
    }
  }

  try {
    return utf8Decoder.decode(buffer);
  } catch {
    return null;
  }
}

/**
 * Locate the first occurrence of `marker` in `content`.
 * Later occurrences are left for a subsequent save.
 */
export function scanMarker(
  content: string,
  filePath: string,
  marker: string = DEFAULT_MARKER
): MarkerLocation | null {
  if (!marker) {
    return null;
  }

  const offset = content.indexOf(marker);
  if (offset < 0) {
    return null;
  }

  let lineStart = content.lastIndexOf('\n', offset - 1) + 1;
  if (lineStart === 0 && content.startsWith(BOM)) {
    lineStart = BOM.length;
  }
  let lineEnd = content.indexOf('\n', offset);
  if (lineEnd < 0) lineEnd = content.length;

  let lineText = content.slice(lineStart, lineEnd);
  if (lineText.endsWith('\r')) {
    lineText = lineText.slice(0, -1);
  }

  return {
    path: filePath,
    offset,
    byteOffset: Buffer.byteLength(content.slice(0, offset), 'utf-8'),
    line: countNewlines(content, offset) + 1,
    column: offset - lineStart + 1,
    lineText,
    marker,
  };
}

/**
 * Count every occurrence of `marker` (for logging and the scan command).
 */
export function countMarkers(content: string, marker: string = DEFAULT_MARKER): number {
  if (!marker) return 0;
  let count = 0;
  let from = content.indexOf(marker);
  while (from >= 0) {
    count++;
    from = content.indexOf(marker, from + marker.length);
  }
  return count;
}

function countNewlines(content: string, end: number): number {
  let count = 0;
  for (let i = 0; i < end; i++) {
    if (content.charCodeAt(i) === 10) count++;
  }
  return count;
}
