/**
 * Edit compiler
 * Turns edit intents into ordered request batches. The service applies a
 * batch in order against the index space left by the previous request and
 * never renumbers pending requests, so every shift is accounted for here.
 */
import { docs_v1 } from 'googleapis';
import { DocsValidationError } from './errors.js';
import {
  FIRST_CONTENT_INDEX,
  insertedRange,
  isDegenerate,
  makeRange,
  normalizeStyleRange,
  shiftRange,
  textLength,
  toInsertionIndex,
  touchesSectionMarker,
  type TextRange
} from './ranges.js';
import {
  createBulletListRequest,
  createDeleteRangeRequest,
  createFindReplaceRequest,
  createFormatTextRequest,
  createInsertPageBreakRequest,
  createInsertTableRequest,
  createInsertTextRequest
} from './requests.js';
import type { EditOperation, ListType, SegmentTarget, TextStyleInput } from './types.js';

export const DEFAULT_LIST_ITEM_TEXT = 'List item';

export interface CompiledBatch {
  requests: EditOperation[];
  operations: string[];
}

export interface TextEditIntent {
  startIndex: number;
  endIndex?: number;
  text?: string;
  style?: TextStyleInput;
  target?: SegmentTarget;
}

export interface CompiledTextEdit extends CompiledBatch {
  /** Final range of the inserted text, when text was written */
  textRange?: TextRange;
  /** Range the style was applied to, when formatting was requested */
  formatRange?: TextRange;
}

export type StructuralElementIntent =
  | { elementType: 'table'; rows: number; columns: number }
  | { elementType: 'list'; listType: ListType; text?: string }
  | { elementType: 'page_break' };

export function hasStyle(style: TextStyleInput | undefined): style is TextStyleInput {
  if (!style) return false;
  return style.bold !== undefined
    || style.italic !== undefined
    || style.underline !== undefined
    || style.fontSize !== undefined
    || style.fontFamily !== undefined;
}

function describeStyle(style: TextStyleInput): string {
  const details: string[] = [];
  if (style.bold !== undefined) details.push(`bold=${style.bold}`);
  if (style.italic !== undefined) details.push(`italic=${style.italic}`);
  if (style.underline !== undefined) details.push(`underline=${style.underline}`);
  if (style.fontSize !== undefined) details.push(`fontSize=${style.fontSize}`);
  if (style.fontFamily !== undefined) details.push(`fontFamily=${style.fontFamily}`);
  return details.join(', ');
}

/**
 * Replace [startIndex, endIndex) with text.
 *
 * Position 0 cannot be deleted, so a replacement starting there inserts at
 * the first content position and then deletes the original content, shifted
 * past the inserted text. Elsewhere the range is deleted first and the text
 * inserted at the start that the deletion left unchanged.
 */
function compileReplace(
  startIndex: number,
  endIndex: number,
  text: string,
  target: SegmentTarget
): { requests: EditOperation[]; textRange: TextRange } {
  const deletable = makeRange(Math.max(startIndex, FIRST_CONTENT_INDEX), endIndex);

  if (text.length === 0) {
    if (isDegenerate(deletable)) {
      throw new DocsValidationError(`Range ${startIndex}-${endIndex} holds only the section marker and cannot be deleted`);
    }
    return {
      requests: [createDeleteRangeRequest(deletable.startIndex, deletable.endIndex, target)],
      textRange: makeRange(deletable.startIndex, deletable.startIndex)
    };
  }

  if (touchesSectionMarker(makeRange(startIndex, endIndex))) {
    const requests: EditOperation[] = [createInsertTextRequest(FIRST_CONTENT_INDEX, text, target)];
    const shifted = shiftRange(deletable, textLength(text));
    if (!isDegenerate(shifted)) {
      requests.push(createDeleteRangeRequest(shifted.startIndex, shifted.endIndex, target));
    }
    return { requests, textRange: insertedRange(FIRST_CONTENT_INDEX, text) };
  }

  return {
    requests: [
      createDeleteRangeRequest(startIndex, endIndex, target),
      createInsertTextRequest(startIndex, text, target)
    ],
    textRange: insertedRange(startIndex, text)
  };
}

function validateTextEdit(intent: TextEditIntent, formatting: boolean): void {
  const { startIndex, endIndex, text } = intent;

  if (!Number.isInteger(startIndex) || startIndex < 0) {
    throw new DocsValidationError(`'startIndex' must be a non-negative integer, got ${startIndex}`);
  }
  if (text === undefined && !formatting) {
    throw new DocsValidationError(
      "Must provide either 'text' to insert/replace, or formatting parameters (bold, italic, underline, fontSize, fontFamily)."
    );
  }
  if (endIndex !== undefined && endIndex < startIndex) {
    throw new DocsValidationError(`'endIndex' (${endIndex}) must not be less than 'startIndex' (${startIndex})`);
  }
  if (formatting && text === undefined) {
    if (endIndex === undefined) {
      throw new DocsValidationError("'endIndex' is required when applying formatting.");
    }
    if (endIndex === startIndex) {
      throw new DocsValidationError(`'startIndex' (${startIndex}) must be less than 'endIndex' (${endIndex}) when applying formatting`);
    }
  }
}

/**
 * Compile an insert-or-replace text edit with optional formatting.
 *
 * A non-degenerate range means replace, anything else means insert. When
 * text is written in the same call, the style goes onto the text's final
 * range rather than the range the caller passed.
 */
export function compileTextEdit(intent: TextEditIntent): CompiledTextEdit {
  const { startIndex, endIndex, text, style } = intent;
  const target = intent.target ?? {};
  const formatting = hasStyle(style);

  validateTextEdit(intent, formatting);

  const requests: EditOperation[] = [];
  const operations: string[] = [];
  let textRange: TextRange | undefined;

  if (text !== undefined) {
    if (endIndex !== undefined && endIndex > startIndex) {
      const replaced = compileReplace(startIndex, endIndex, text, target);
      requests.push(...replaced.requests);
      textRange = replaced.textRange;
      operations.push(`Replaced text from index ${startIndex} to ${endIndex}`);
    } else {
      const index = toInsertionIndex(startIndex);
      requests.push(createInsertTextRequest(index, text, target));
      textRange = insertedRange(index, text);
      operations.push(`Inserted text at index ${index}`);
    }
  }

  let formatRange: TextRange | undefined;
  if (formatting && style) {
    formatRange = normalizeStyleRange(textRange ?? makeRange(startIndex, endIndex ?? startIndex));
    requests.push(createFormatTextRequest(formatRange.startIndex, formatRange.endIndex, style, target));
    operations.push(`Applied formatting (${describeStyle(style)}) to range ${formatRange.startIndex}-${formatRange.endIndex}`);
  }

  return { requests, operations, textRange, formatRange };
}

/**
 * Insert a list item. The bullet range must cover the trailing newline or
 * the preset does not take effect.
 */
export function compileListInsertion(
  index: number,
  listType: ListType,
  text: string = DEFAULT_LIST_ITEM_TEXT,
  target: SegmentTarget = {}
): CompiledBatch {
  const itemText = text || DEFAULT_LIST_ITEM_TEXT;
  const insertAt = toInsertionIndex(index);
  const bulletEnd = insertAt + textLength(itemText) + 1;

  return {
    requests: [
      createInsertTextRequest(insertAt, `${itemText}\n`, target),
      createBulletListRequest(insertAt, bulletEnd, listType, target)
    ],
    operations: [`Inserted ${listType.toLowerCase()} list item at index ${insertAt}`]
  };
}

export function compileFindReplace(find: string, replace: string, matchCase = false): CompiledBatch {
  return {
    requests: [createFindReplaceRequest(find, replace, matchCase)],
    operations: [`Replaced all occurrences of '${find}' with '${replace}'`]
  };
}

/**
 * Occurrence count the service reports for a replaceAllText reply
 */
export function readOccurrencesChanged(
  response: docs_v1.Schema$BatchUpdateDocumentResponse,
  replyIndex = 0
): number {
  return response.replies?.[replyIndex]?.replaceAllText?.occurrencesChanged ?? 0;
}

/**
 * Insert an empty table, a list item, or a page break
 */
export function compileStructuralInsertion(
  index: number,
  intent: StructuralElementIntent,
  target: SegmentTarget = {}
): CompiledBatch {
  const insertAt = toInsertionIndex(index);

  switch (intent.elementType) {
    case 'table':
      return {
        requests: [createInsertTableRequest(insertAt, intent.rows, intent.columns, target)],
        operations: [`Inserted table (${intent.rows}x${intent.columns}) at index ${insertAt}`]
      };
    case 'list':
      return compileListInsertion(insertAt, intent.listType, intent.text, target);
    case 'page_break':
      return {
        requests: [createInsertPageBreakRequest(insertAt, target)],
        operations: [`Inserted page break at index ${insertAt}`]
      };
  }
}
