import { describe, expect, test } from 'vitest';
import { FixedAdvanceMetrics } from '../native/font-metrics';
import { wrapLines } from '../core/layout/line-breaker';
import { rowVisibleWidth } from '../core/layout/types';

describe('wrapLines', () => {
  const metrics = new FixedAdvanceMetrics({ advance: 10 });

  describe('basic tables', () => {
    test('empty text is one row holding the sentinel', () => {
      const layout = wrapLines(metrics, '');
      expect(layout.lines).toEqual(['']);
      expect(layout.sections).toEqual([{ first: 0, last: 0 }]);
      expect(layout.chars).toEqual([{ row: 0, col: 0, xStart: 0, xEnd: 0, glyph: '' }]);
    });

    test('cells advance left to right and the sentinel sits after the last', () => {
      const layout = wrapLines(metrics, 'abc');
      expect(layout.chars.map(c => [c.xStart, c.xEnd])).toEqual([[0, 10], [10, 20], [20, 30], [30, 30]]);
      expect(layout.chars[3].glyph).toBe('');
      expect(layout.sections).toEqual([{ first: 0, last: 3 }]);
    });

    test('newline closes the row and keeps its zero-width cell', () => {
      const layout = wrapLines(metrics, 'ab\ncd');
      expect(layout.lines).toEqual(['ab\n', 'cd']);
      expect(layout.sections).toEqual([{ first: 0, last: 2 }, { first: 3, last: 5 }]);
      expect(layout.chars[2]).toEqual({ row: 0, col: 2, xStart: 20, xEnd: 20, glyph: '\n' });
      expect(layout.chars[3]).toEqual({ row: 1, col: 0, xStart: 0, xEnd: 10, glyph: 'c' });
    });

    test('trailing newline puts the sentinel on a new empty row', () => {
      const layout = wrapLines(metrics, 'ab\n');
      expect(layout.lines).toEqual(['ab\n', '']);
      expect(layout.sections).toEqual([{ first: 0, last: 2 }, { first: 3, last: 3 }]);
      expect(layout.chars[3]).toEqual({ row: 1, col: 0, xStart: 0, xEnd: 0, glyph: '' });
    });

    test('letter spacing is added after every character', () => {
      const layout = wrapLines(metrics, 'ab', { letterSpacing: 2 });
      expect(layout.chars[0].xEnd).toBe(12);
      expect(layout.chars[1].xStart).toBe(12);
      expect(layout.chars[1].xEnd).toBe(24);
    });

    test('a surrogate pair is one cell', () => {
      const layout = wrapLines(metrics, 'a\u{1F600}b');
      expect(layout.chars.length).toBe(4);
      expect(layout.chars[1].glyph).toBe('\u{1F600}');
    });
  });

  describe('width wrapping', () => {
    test('hard break before the overflowing character', () => {
      const layout = wrapLines(metrics, 'abcdef', { maxWidth: 30 });
      expect(layout.lines).toEqual(['abc', 'def']);
      expect(layout.sections).toEqual([{ first: 0, last: 2 }, { first: 3, last: 6 }]);
      expect(layout.chars[3]).toEqual({ row: 1, col: 0, xStart: 0, xEnd: 10, glyph: 'd' });
    });

    test('whole words: overflowing space hangs at the end of its row', () => {
      const layout = wrapLines(metrics, 'ab cd ef', { maxWidth: 50, wholeWords: true });
      expect(layout.lines).toEqual(['ab cd', 'ef']);
      expect(layout.sections).toEqual([{ first: 0, last: 5 }, { first: 6, last: 8 }]);
      expect(layout.chars[5]).toEqual({ row: 0, col: 5, xStart: 50, xEnd: 60, glyph: ' ' });
    });

    test('whole words: width that fits "ab cd " but not the next word', () => {
      const layout = wrapLines(metrics, 'ab cd ef', { maxWidth: 60, wholeWords: true });
      expect(layout.lines).toEqual(['ab cd', 'ef']);
      expect(layout.chars[6]).toEqual({ row: 1, col: 0, xStart: 0, xEnd: 10, glyph: 'e' });
    });

    test('whole words: the word fragment is carried to the next row', () => {
      const layout = wrapLines(metrics, 'ab cdef', { maxWidth: 50, wholeWords: true });
      expect(layout.lines).toEqual(['ab', 'cdef']);
      expect(layout.sections).toEqual([{ first: 0, last: 2 }, { first: 3, last: 7 }]);
      expect(layout.chars[3]).toEqual({ row: 1, col: 0, xStart: 0, xEnd: 10, glyph: 'c' });
      expect(layout.chars[6]).toEqual({ row: 1, col: 3, xStart: 30, xEnd: 40, glyph: 'f' });
      expect(layout.chars[7].xStart).toBe(40);
    });

    test('whole words: a word wider than the row is split', () => {
      const layout = wrapLines(metrics, 'abcdefg hi', { maxWidth: 40, wholeWords: true });
      expect(layout.lines).toEqual(['abcd', 'efg', 'hi']);
    });

    test('no visible row exceeds the width when every word fits', () => {
      const layout = wrapLines(metrics, 'the quick brown fox jumps over the lazy dog', {
        maxWidth: 70,
        wholeWords: true,
      });
      expect(layout.sections.length).toBeGreaterThan(1);
      for (let row = 0; row < layout.sections.length; row++) {
        expect(rowVisibleWidth(layout, row)).toBeLessThanOrEqual(70);
      }
    });

    test('the first character of a row is always placed', () => {
      const layout = wrapLines(metrics, 'ab', { maxWidth: 5 });
      expect(layout.lines).toEqual(['a', 'b']);
    });
  });

  describe('character limit per row', () => {
    test('maxChars breaks rows by code point count', () => {
      const layout = wrapLines(metrics, 'abcde', { maxChars: 2 });
      expect(layout.lines).toEqual(['ab', 'cd', 'e']);
    });
  });

  test('measures through the metrics contract', () => {
    const counting = new FixedAdvanceMetrics();
    wrapLines(counting, 'abc');
    expect(counting.measureCalls).toBe(3);
  });
});
