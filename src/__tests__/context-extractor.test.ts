/**
 * ContextExtractor Tests
 */

import { ContextExtractor, LanguageDetector, computeLineStarts, scanMarker } from '../core';
import { MarkerLocation } from '../types';

function locate(content: string, filePath = '/p/src/main.rs'): MarkerLocation {
  const location = scanMarker(content, filePath);
  if (!location) {
    throw new Error('test content has no marker');
  }
  return location;
}

describe('ContextExtractor', () => {
  test('should build the println window', () => {
    const content = 'println!("{}", ??);';
    const context = new ContextExtractor().extract(content, locate(content));

    expect(context.prefix).toBe('println!("{}", ');
    expect(context.suffix).toBe(');');
    expect(context.language).toBe('rust');
    expect(context.windowStart).toBe(0);
    expect(context.windowEnd).toBe(content.length);
  });

  test('should take contextLines lines on each side', () => {
    const content = 'a\nb\nc\nd ?? x\ne\nf\ng\nh\n';
    const context = new ContextExtractor({ contextLines: 1 }).extract(content, locate(content));

    expect(context.prefix).toBe('c\nd ');
    expect(context.suffix).toBe(' x\ne');
    expect(context.windowStart).toBe(4);
    expect(context.windowEnd).toBe(14);
  });

  test('should move missing lines after the marker when it is near the start', () => {
    const content = '?? a\nb\nc\nd\ne\n';
    const context = new ContextExtractor({ contextLines: 1 }).extract(content, locate(content));

    expect(context.prefix).toBe('');
    expect(context.suffix).toBe(' a\nb\nc');
  });

  test('should move missing lines before the marker when it is near the end', () => {
    const content = 'a\nb\nc\nd\ne ??';
    const context = new ContextExtractor({ contextLines: 2 }).extract(content, locate(content));

    expect(context.prefix).toBe('a\nb\nc\nd\ne ');
    expect(context.suffix).toBe('');
  });

  test('should exclude CRLF line endings at the window edge', () => {
    const content = 'x\r\ny ??\r\nz\r\n';
    const context = new ContextExtractor({ contextLines: 0 }).extract(content, locate(content));

    expect(context.prefix).toBe('y ');
    expect(context.suffix).toBe('');
    expect(context.windowEnd).toBe(7);
  });

  test('should clip prefix and suffix to maxContextChars', () => {
    const content = 'a\nb\nc\nd ?? x\ne\nf\ng\nh\n';
    const context = new ContextExtractor({ contextLines: 1, maxContextChars: 2 }).extract(
      content,
      locate(content)
    );

    expect(context.prefix).toBe('d ');
    expect(context.suffix).toBe(' x');
  });

  test('should give the document view the whole of a small file', () => {
    const content = 'a\nb\nc\nd ?? x\ne\nf\ng\nh\n';
    const context = new ContextExtractor({ contextLines: 1 }).extract(content, locate(content));

    expect(context.documentPrefix).toBe('a\nb\nc\nd ');
    expect(context.documentSuffix).toBe(' x\ne\nf\ng\nh');
  });

  test('should report unknown languages', () => {
    const content = 'value ??';
    const context = new ContextExtractor().extract(content, locate(content, '/p/notes.xyz'));
    expect(context.language).toBe('unknown');
  });

  test('should return a frozen context', () => {
    const content = 'x = ??';
    const context = new ContextExtractor().extract(content, locate(content, '/p/a.py'));
    expect(Object.isFrozen(context)).toBe(true);
  });
});

describe('computeLineStarts', () => {
  test('should not open a line after a trailing newline', () => {
    expect(computeLineStarts('a\nbc\n')).toEqual([0, 2]);
    expect(computeLineStarts('a\nbc')).toEqual([0, 2]);
    expect(computeLineStarts('')).toEqual([0]);
  });
});

describe('LanguageDetector', () => {
  const detector = new LanguageDetector();

  test('should map extensions', () => {
    expect(detector.detect('/p/main.rs')).toBe('rust');
    expect(detector.detect('/p/App.TSX')).toBe('typescript');
    expect(detector.detect('/p/script.py')).toBe('python');
  });

  test('should map well-known filenames', () => {
    expect(detector.detect('/p/Dockerfile')).toBe('dockerfile');
    expect(detector.detect('/p/Makefile')).toBe('makefile');
    expect(detector.detect('/p/Gemfile')).toBe('ruby');
  });

  test('should fall back to unknown', () => {
    expect(detector.detect('/p/data.bin')).toBe('unknown');
    expect(detector.isKnown('unknown')).toBe(false);
  });

  test('should not take object property names for filenames', () => {
    expect(detector.detect('/p/constructor')).toBe('unknown');
    expect(detector.detect('/p/toString')).toBe('unknown');
    expect(detector.detect('/p/__proto__')).toBe('unknown');
  });

  test('should list languages without unknown', () => {
    const languages = detector.getSupportedLanguages();
    expect(languages).toContain('rust');
    expect(languages).not.toContain('unknown');
  });
});
