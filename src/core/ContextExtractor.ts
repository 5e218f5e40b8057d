/**
 * ContextExtractor - Builds the bounded view of a file that is sent to the
 * completion client.
 *
 * The window is line based: `contextLines` lines on each side of the marker
 * line. Lines that cannot be taken on one side (marker near the start or end
 * of the file) are taken on the other side instead. Prefix and suffix are then
 * clipped to `maxContextChars` each.
 */

import { CompletionContext, MarkerLocation } from '../types';
import { LanguageDetector } from './LanguageDetector';

export interface ContextExtractorOptions {
  /** Lines on each side of the marker in the small window */
  contextLines: number;
  /** Lines on each side of the marker in the document view */
  documentContextLines: number;
  /** Character bound on prefix and suffix of the small window, each */
  maxContextChars: number;
  /** Character bound on prefix and suffix of the document view, each */
  maxDocumentChars: number;
}

export const DEFAULT_CONTEXT_OPTIONS: ContextExtractorOptions = {
  contextLines: 3,
  documentContextLines: 1000,
  maxContextChars: 8000,
  maxDocumentChars: 32000,
};

interface TextWindow {
  start: number;
  end: number;
}

export class ContextExtractor {
  private options: ContextExtractorOptions;

  constructor(
    options: Partial<ContextExtractorOptions> = {},
    private languageDetector: LanguageDetector = new LanguageDetector()
  ) {
    this.options = { ...DEFAULT_CONTEXT_OPTIONS, ...options };
  }

  extract(content: string, location: MarkerLocation): CompletionContext {
    const markerStart = location.offset;
    const markerEnd = markerStart + location.marker.length;
    const lineStarts = computeLineStarts(content);
    const markerLine = location.line - 1;

    const small = clipWindow(
      lineWindow(content, lineStarts, markerLine, this.options.contextLines),
      markerStart,
      markerEnd,
      this.options.maxContextChars
    );
    const document = clipWindow(
      lineWindow(content, lineStarts, markerLine, this.options.documentContextLines),
      markerStart,
      markerEnd,
      this.options.maxDocumentChars
    );

    const context: CompletionContext = {
      path: location.path,
      language: this.languageDetector.detect(location.path),
      prefix: content.slice(small.start, markerStart),
      suffix: content.slice(markerEnd, small.end),
      windowStart: small.start,
      windowEnd: small.end,
      markerOffset: markerStart,
      markerLength: location.marker.length,
      documentPrefix: content.slice(document.start, markerStart),
      documentSuffix: content.slice(markerEnd, document.end),
    };

    return Object.freeze(context);
  }
}

/**
 * String index where each line begins. A trailing newline does not open a
 * new (empty) line.
 */
export function computeLineStarts(content: string): number[] {
  const starts = [0];
  for (let i = 0; i < content.length; i++) {
    if (content.charCodeAt(i) === 10 && i + 1 < content.length) {
      starts.push(i + 1);
    }
  }
  return starts;
}

function lineWindow(
  content: string,
  lineStarts: number[],
  markerLine: number,
  contextLines: number
): TextWindow {
  const maxRow = lineStarts.length - 1;
  let before = contextLines;
  let after = contextLines;

  if (markerLine < contextLines) {
    after += contextLines - markerLine;
  } else if (markerLine + contextLines > maxRow) {
    before += markerLine + contextLines - maxRow;
  }

  const startLine = Math.max(0, markerLine - before);
  const endLine = Math.min(maxRow, markerLine + after);

  return {
    start: lineStarts[startLine] ?? 0,
    end: lineEnd(content, lineStarts, endLine),
  };
}

/** Index just past the last character of `line`, excluding its line break */
function lineEnd(content: string, lineStarts: number[], line: number): number {
  const next = lineStarts[line + 1];
  let end = next === undefined ? content.length : next - 1;
  if (end > 0 && content.charCodeAt(end - 1) === 13 && content.charCodeAt(end) === 10) {
    end--;
  } else if (next === undefined && content.endsWith('\n')) {
    end = content.endsWith('\r\n') ? content.length - 2 : content.length - 1;
  }
  return end;
}

function clipWindow(
  window: TextWindow,
  markerStart: number,
  markerEnd: number,
  maxChars: number
): TextWindow {
  return {
    start: Math.max(window.start, markerStart - maxChars),
    end: Math.min(Math.max(window.end, markerEnd), markerEnd + maxChars),
  };
}
