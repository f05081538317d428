/**
 * Docs batchUpdate request builders
 * Pure constructors, one per primitive edit. Each checks only what it can
 * know without the document; index-0 and end-of-segment rules belong to the
 * compiler and managers.
 */
import { DocsValidationError } from './errors.js';
import type {
  BulletPreset,
  CreateBulletsOperation,
  CreateFooterOperation,
  CreateHeaderOperation,
  DeleteRangeOperation,
  FindReplaceOperation,
  FormatTextOperation,
  InsertImageOperation,
  InsertPageBreakOperation,
  InsertTableOperation,
  InsertTextOperation,
  ListType,
  Location,
  Range,
  SectionType,
  SegmentTarget,
  TextStyleInput
} from './types.js';

const BULLET_PRESETS: Record<ListType, BulletPreset> = {
  UNORDERED: 'BULLET_DISC_CIRCLE_SQUARE',
  ORDERED: 'NUMBERED_DECIMAL_ALPHA_ROMAN'
};

function requireIndex(index: number, name = 'index'): void {
  if (!Number.isInteger(index) || index < 0) {
    throw new DocsValidationError(`${name} must be a non-negative integer, got ${index}`);
  }
}

function location(index: number, target: SegmentTarget): Location {
  requireIndex(index);
  return { index, ...target };
}

function range(startIndex: number, endIndex: number, target: SegmentTarget): Range {
  requireIndex(startIndex, 'startIndex');
  requireIndex(endIndex, 'endIndex');
  if (endIndex <= startIndex) {
    throw new DocsValidationError(`endIndex (${endIndex}) must be greater than startIndex (${startIndex})`);
  }
  return { startIndex, endIndex, ...target };
}

export function createInsertTextRequest(index: number, text: string, target: SegmentTarget = {}): InsertTextOperation {
  if (text.length === 0) {
    throw new DocsValidationError('Text to insert must not be empty');
  }
  return { insertText: { location: location(index, target), text } };
}

export function createDeleteRangeRequest(startIndex: number, endIndex: number, target: SegmentTarget = {}): DeleteRangeOperation {
  return { deleteContentRange: { range: range(startIndex, endIndex, target) } };
}

/**
 * Build an updateTextStyle request. Only the style fields that are set are
 * listed in the field mask, so unset fields keep their current value.
 */
export function createFormatTextRequest(
  startIndex: number,
  endIndex: number,
  style: TextStyleInput,
  target: SegmentTarget = {}
): FormatTextOperation {
  const fields: string[] = [];
  const textStyle: {
    bold?: boolean;
    italic?: boolean;
    underline?: boolean;
    fontSize?: { magnitude: number; unit: 'PT' };
    weightedFontFamily?: { fontFamily: string };
  } = {};

  if (style.bold !== undefined) {
    textStyle.bold = style.bold;
    fields.push('bold');
  }
  if (style.italic !== undefined) {
    textStyle.italic = style.italic;
    fields.push('italic');
  }
  if (style.underline !== undefined) {
    textStyle.underline = style.underline;
    fields.push('underline');
  }
  if (style.fontSize !== undefined) {
    if (style.fontSize <= 0) {
      throw new DocsValidationError(`fontSize must be positive, got ${style.fontSize}`);
    }
    textStyle.fontSize = { magnitude: style.fontSize, unit: 'PT' };
    fields.push('fontSize');
  }
  if (style.fontFamily !== undefined) {
    if (style.fontFamily.trim().length === 0) {
      throw new DocsValidationError('fontFamily must not be empty');
    }
    textStyle.weightedFontFamily = { fontFamily: style.fontFamily };
    fields.push('weightedFontFamily');
  }

  if (fields.length === 0) {
    throw new DocsValidationError('At least one text style field is required');
  }

  return {
    updateTextStyle: {
      range: range(startIndex, endIndex, target),
      textStyle,
      fields: fields.join(',')
    }
  };
}

export function createFindReplaceRequest(find: string, replace: string, matchCase = false): FindReplaceOperation {
  if (find.length === 0) {
    throw new DocsValidationError('Text to find must not be empty');
  }
  return {
    replaceAllText: {
      containsText: { text: find, matchCase },
      replaceText: replace
    }
  };
}

export function createInsertTableRequest(index: number, rows: number, columns: number, target: SegmentTarget = {}): InsertTableOperation {
  if (!Number.isInteger(rows) || rows < 1 || !Number.isInteger(columns) || columns < 1) {
    throw new DocsValidationError(`Table needs at least one row and one column, got ${rows}x${columns}`);
  }
  return { insertTable: { location: location(index, target), rows, columns } };
}

/**
 * Build an insertInlineImage request. Width and height are in points; when
 * neither is given the service sizes the image.
 */
export function createInsertImageRequest(
  index: number,
  uri: string,
  width?: number,
  height?: number,
  target: SegmentTarget = {}
): InsertImageOperation {
  if (uri.length === 0) {
    throw new DocsValidationError('Image URI must not be empty');
  }
  if ((width !== undefined && width <= 0) || (height !== undefined && height <= 0)) {
    throw new DocsValidationError('Image width and height must be positive');
  }

  const request: InsertImageOperation = {
    insertInlineImage: {
      location: location(index, target),
      uri,
      ...(width !== undefined || height !== undefined
        ? {
            objectSize: {
              ...(width !== undefined && { width: { magnitude: width, unit: 'PT' as const } }),
              ...(height !== undefined && { height: { magnitude: height, unit: 'PT' as const } })
            }
          }
        : {})
    }
  };
  return request;
}

export function createInsertPageBreakRequest(index: number, target: SegmentTarget = {}): InsertPageBreakOperation {
  return { insertPageBreak: { location: location(index, target) } };
}

export function createBulletListRequest(
  startIndex: number,
  endIndex: number,
  listType: ListType,
  target: SegmentTarget = {}
): CreateBulletsOperation {
  const bulletPreset = BULLET_PRESETS[listType];
  if (!bulletPreset) {
    throw new DocsValidationError(`Unknown list type '${String(listType)}'. Use 'UNORDERED' or 'ORDERED'.`);
  }
  return { createParagraphBullets: { range: range(startIndex, endIndex, target), bulletPreset } };
}

export function createSectionRequest(sectionType: SectionType): CreateHeaderOperation | CreateFooterOperation {
  return sectionType === 'header'
    ? { createHeader: { type: 'DEFAULT' } }
    : { createFooter: { type: 'DEFAULT' } };
}
