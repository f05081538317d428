/**
 * Flat index model
 *
 * Document content is addressed by zero-based positions, one per UTF-16 code
 * unit. Position 0 of a body holds the implicit section marker: it can be
 * neither deleted nor inserted into.
 */

export const SECTION_MARKER_INDEX = 0;
export const FIRST_CONTENT_INDEX = 1;

export interface TextRange {
  startIndex: number;
  endIndex: number;
}

/**
 * Length of text in index units. JS strings are UTF-16, which is what the
 * service counts.
 */
export function textLength(text: string): number {
  return text.length;
}

export function makeRange(startIndex: number, endIndex: number): TextRange {
  return { startIndex, endIndex };
}

export function isDegenerate(range: TextRange): boolean {
  return range.endIndex <= range.startIndex;
}

export function touchesSectionMarker(range: TextRange): boolean {
  return range.startIndex <= SECTION_MARKER_INDEX;
}

/**
 * Move a range by delta positions, as happens to content after an insertion
 * (positive delta) or a deletion (negative delta) that precedes it.
 */
export function shiftRange(range: TextRange, delta: number): TextRange {
  return { startIndex: range.startIndex + delta, endIndex: range.endIndex + delta };
}

/**
 * Insertions at the section marker land at the first content position
 */
export function toInsertionIndex(index: number): number {
  return index <= SECTION_MARKER_INDEX ? FIRST_CONTENT_INDEX : index;
}

/**
 * Range covered by text inserted at index
 */
export function insertedRange(index: number, text: string): TextRange {
  return { startIndex: index, endIndex: index + textLength(text) };
}

/**
 * Keep a range addressable: off the section marker and at least one unit wide
 */
export function normalizeStyleRange(range: TextRange): TextRange {
  const startIndex = Math.max(range.startIndex, FIRST_CONTENT_INDEX);
  const endIndex = range.endIndex <= startIndex ? startIndex + 1 : range.endIndex;
  return { startIndex, endIndex };
}
