/**
 * Text edit computation tests
 */

import { applyTextEdits, computeTextEdits, offsetEdits } from '../patch';

describe('computeTextEdits', () => {
  test('should produce one edit per changed run', () => {
    const before = 'let mut foo = 2;\nfoo *= 50;';
    const after = 'let mut foo = 5;\naaaa foo *= 50;';

    expect(computeTextEdits(before, after)).toEqual([
      { start: 14, end: 15, text: '5' },
      { start: 17, end: 17, text: 'aaaa ' },
    ]);
  });

  test('should turn a filled gap into a single insertion', () => {
    const before = 'println!("Current value: {}", );';
    const after = 'println!("Current value: {}", i);';

    expect(computeTextEdits(before, after)).toEqual([{ start: 30, end: 30, text: 'i' }]);
  });

  test('should fold a replaced non-ASCII run into one edit', () => {
    const before = 'println!("Current значение: {}", i);';
    const after = 'println!("Current value: {}", i);';

    expect(computeTextEdits(before, after)).toEqual([{ start: 18, end: 26, text: 'value' }]);
  });

  test('should return nothing for identical text', () => {
    expect(computeTextEdits('same', 'same')).toEqual([]);
  });

  test('should replace the marker with the suggestion', () => {
    expect(computeTextEdits('??', 'i')).toEqual([{ start: 0, end: 2, text: 'i' }]);
  });

  test('should reproduce the new text when applied', () => {
    const pairs: Array<[string, string]> = [
      ['for ?? in items {', 'for item in items {'],
      ['a\nb\nc\n', 'a\nB\nc\nd\n'],
      ['', 'fresh'],
      ['gone', ''],
    ];
    for (const [oldText, newText] of pairs) {
      expect(applyTextEdits(oldText, computeTextEdits(oldText, newText))).toBe(newText);
    }
  });
});

describe('applyTextEdits', () => {
  test('should apply edits given in any order', () => {
    const original = 'The quick brown fox jumps over the lazy dog';
    const edits = [
      { start: 43, end: 43, text: ' and cat' },
      { start: 35, end: 39, text: 'sleepy' },
      { start: 4, end: 9, text: 'slow' },
    ];

    const expected = 'The slow brown fox jumps over the sleepy dog and cat';
    expect(applyTextEdits(original, edits)).toBe(expected);
    expect(applyTextEdits(original, [...edits].reverse())).toBe(expected);
  });

  test('should replace a multi-byte word', () => {
    const original = 'fn main() {\n    let fruits = vec![];\n    итер\n}';
    const start = original.indexOf('итер');

    expect(
      applyTextEdits(original, [
        { start, end: start + 'итер'.length, text: 'for (fruit, quantity) in &fruits {' },
      ])
    ).toBe('fn main() {\n    let fruits = vec![];\n    for (fruit, quantity) in &fruits {\n}');
  });

  test('should reject out-of-bounds edits', () => {
    expect(() => applyTextEdits('abc', [{ start: 1, end: 10, text: '' }])).toThrow(RangeError);
    expect(() => applyTextEdits('abc', [{ start: 2, end: 1, text: '' }])).toThrow(RangeError);
  });

  test('should reject overlapping edits', () => {
    expect(() =>
      applyTextEdits('abcdefgh', [
        { start: 0, end: 5, text: 'x' },
        { start: 3, end: 8, text: 'y' },
      ])
    ).toThrow('overlaps another edit');
  });
});

describe('offsetEdits', () => {
  test('should shift start and end', () => {
    expect(offsetEdits([{ start: 0, end: 2, text: 'i' }], 15)).toEqual([
      { start: 15, end: 17, text: 'i' },
    ]);
  });
});
