/**
 * Code point string helpers.
 *
 * Every offset in the engine counts Unicode code points, not UTF-16 units,
 * so a surrogate pair is one caret step and one layout cell.
 */

/** Split text into code points. */
export function toCodePoints(text: string): string[] {
  return Array.from(text);
}

/** Number of code points in text. */
export function codePointLength(text: string): number {
  let count = 0;
  for (const _ of text) count++;
  return count;
}

/** Code points in [start, end), clamped to the text. */
export function sliceCodePoints(text: string, start: number, end?: number): string {
  return toCodePoints(text).slice(start, end).join('');
}

/** Insert `insert` before code point `offset` (clamped). */
export function insertAt(text: string, offset: number, insert: string): string {
  const cps = toCodePoints(text);
  const at = Math.max(0, Math.min(offset, cps.length));
  return cps.slice(0, at).join('') + insert + cps.slice(at).join('');
}

/** Remove code points in [start, end). */
export function removeRange(text: string, start: number, end: number): string {
  const cps = toCodePoints(text);
  const from = Math.max(0, Math.min(start, cps.length));
  const to = Math.max(from, Math.min(end, cps.length));
  return cps.slice(0, from).join('') + cps.slice(to).join('');
}
