/**
 * Character-level edits between two strings.
 */

import * as Diff from 'diff';
import { TextEdit } from '../types';

/**
 * Minimal edits (over `oldText` indices) that turn `oldText` into `newText`.
 *
 * Changes that touch each other are folded into one edit, so a replaced run
 * of characters becomes a single `{start, end, text}`.
 */
export function computeTextEdits(oldText: string, newText: string): TextEdit[] {
  const edits: TextEdit[] = [];
  let oldPos = 0;

  for (const change of Diff.diffChars(oldText, newText)) {
    const value = change.value;

    if (change.removed) {
      const start = oldPos;
      const end = start + value.length;
      const last = edits[edits.length - 1];
      if (last && last.end === start) {
        last.end = end;
      } else {
        edits.push({ start, end, text: '' });
      }
      oldPos = end;
    } else if (change.added) {
      const last = edits[edits.length - 1];
      if (last && last.end === oldPos) {
        last.text += value;
      } else {
        edits.push({ start: oldPos, end: oldPos, text: value });
      }
    } else {
      oldPos += value.length;
    }
  }

  return edits;
}

/**
 * Apply edits to `text`. Edits may come in any order but must not overlap.
 */
export function applyTextEdits(text: string, edits: readonly TextEdit[]): string {
  const sorted = [...edits].sort((a, b) => b.start - a.start || b.end - a.end);

  let result = text;
  let limit = text.length;
  for (const edit of sorted) {
    if (edit.start < 0 || edit.start > edit.end || edit.end > text.length) {
      throw new RangeError(
        `Edit [${edit.start}, ${edit.end}) is out of bounds for text of length ${text.length}`
      );
    }
    if (edit.end > limit) {
      throw new RangeError(`Edit [${edit.start}, ${edit.end}) overlaps another edit`);
    }
    result = result.slice(0, edit.start) + edit.text + result.slice(edit.end);
    limit = edit.start;
  }
  return result;
}

/** Shift every edit by `offset` */
export function offsetEdits(edits: readonly TextEdit[], offset: number): TextEdit[] {
  return edits.map((edit) => ({
    start: edit.start + offset,
    end: edit.end + offset,
    text: edit.text,
  }));
}
