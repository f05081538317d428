/**
 * Parameter checks shared by the Docs tools. Each throws
 * DocsValidationError before any request is built.
 */
import { DocsValidationError } from '../errors.js';
import type { HeaderFooterVariant, SectionType } from '../types.js';

const DOCUMENT_ID_PATTERN = /^[a-zA-Z0-9_-]{10,}$/;

export const MAX_TABLE_ROWS = 1000;
export const MAX_TABLE_COLUMNS = 20;

export function validateDocumentId(documentId: string): void {
  if (!documentId || !documentId.trim()) {
    throw new DocsValidationError('Document ID cannot be empty');
  }
  if (!DOCUMENT_ID_PATTERN.test(documentId)) {
    throw new DocsValidationError(`Invalid document ID format: '${documentId}'`);
  }
}

export function validateIndex(index: number, name = 'Index'): void {
  if (!Number.isInteger(index)) {
    throw new DocsValidationError(`${name} must be an integer, got ${index}`);
  }
  if (index < 0) {
    throw new DocsValidationError(`${name} ${index} is negative. Use a non-negative index.`);
  }
}

/**
 * Table data must be a non-empty rectangle of strings within the service's
 * table limits.
 */
export function validateTableData(tableData: string[][]): void {
  if (tableData.length === 0) {
    throw new DocsValidationError('Table data cannot be empty. Provide at least one row.');
  }

  const columns = tableData[0].length;
  if (columns === 0) {
    throw new DocsValidationError('Table rows cannot be empty. Provide at least one column.');
  }

  tableData.forEach((row, rowIndex) => {
    if (row.length !== columns) {
      throw new DocsValidationError(
        `Row ${rowIndex} has ${row.length} columns, expected ${columns}. All rows must have the same number of columns.`
      );
    }
  });

  if (tableData.length > MAX_TABLE_ROWS) {
    throw new DocsValidationError(`Too many rows (${tableData.length}). Maximum is ${MAX_TABLE_ROWS}.`);
  }
  if (columns > MAX_TABLE_COLUMNS) {
    throw new DocsValidationError(`Too many columns (${columns}). Maximum is ${MAX_TABLE_COLUMNS}.`);
  }
}

export function validateHeaderFooterParams(sectionType: SectionType, variant: HeaderFooterVariant): void {
  if (sectionType !== 'header' && sectionType !== 'footer') {
    throw new DocsValidationError(`section_type must be 'header' or 'footer', got '${String(sectionType)}'`);
  }
  if (variant !== 'DEFAULT' && variant !== 'FIRST_PAGE_ONLY' && variant !== 'EVEN_PAGE') {
    throw new DocsValidationError(`header_footer_type must be DEFAULT, FIRST_PAGE_ONLY or EVEN_PAGE, got '${String(variant)}'`);
  }
}

export function validateTextContent(text: string, maxLength = 1_000_000): void {
  if (!text) {
    throw new DocsValidationError('Text content cannot be empty');
  }
  if (text.length > maxLength) {
    throw new DocsValidationError(`Text too long (${text.length} characters). Maximum is ${maxLength}.`);
  }
}
