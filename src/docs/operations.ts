/**
 * Docs tool operations
 * One function per tool payload. Each validates, compiles, submits and
 * returns a JSON-ready result; errors propagate to the handler layer.
 */
import { docs_v1 } from 'googleapis';
import { GOOGLE_DOC_MIME_TYPE, type DriveFileLookup, type DriveFileMetadata } from '../drive/client.js';
import {
  compileFindReplace,
  compileStructuralInsertion,
  compileTextEdit,
  readOccurrencesChanged,
  type StructuralElementIntent
} from './compiler.js';
import { DocsValidationError, wrapServiceError } from './errors.js';
import { resolveImageSource } from './images.js';
import { BatchOperationManager } from './managers/batch-manager.js';
import { HeaderFooterManager } from './managers/header-footer-manager.js';
import { TableOperationManager } from './managers/table-manager.js';
import { validateDocumentId, validateIndex } from './managers/validation.js';
import {
  analyzeDocumentComplexity,
  extractTableAsData,
  findTables,
  parseDocument,
  parseDocumentStructure
} from './parsers.js';
import { toInsertionIndex } from './ranges.js';
import { createInsertImageRequest } from './requests.js';
import type {
  EditTextPayload,
  FindReplacePayload,
  HeadersFootersPayload,
  ImagePayload,
  InsertElementsPayload,
  ManageOperationsPayload,
  ModifyContentPayload,
  TablePayload,
  TextElementsPayload
} from './schemas.js';
import type { DocumentService } from './service.js';
import type {
  ComplexityReport,
  DetailedStructureReport,
  DocsBatchResult,
  DocsContent,
  DocsEditResult,
  DocsFile,
  DocsGetResult,
  DocsReplaceResult,
  DocsSectionResult,
  DocsStructureResult,
  DocsTableDebugResult,
  DocsTableResult,
  ElementSummary,
  TableDebugInfo
} from './types.js';

export interface DocsToolContext {
  service: DocumentService;
  drive: DriveFileLookup;
}

const TEXT_PREVIEW_LENGTH = 100;
const TABLE_PREVIEW_ROWS = 3;

export function documentUrl(documentId: string): string {
  return `https://docs.google.com/document/d/${documentId}/edit`;
}

async function readDocument(
  service: DocumentService,
  documentId: string,
  includeTabsContent = false
): Promise<docs_v1.Schema$Document> {
  try {
    return await service.getDocument(documentId, { includeTabsContent });
  } catch (error) {
    throw wrapServiceError('Read document', error);
  }
}

// ============================================
// docs_get_content
// ============================================

/**
 * Metadata header placed before the text of every file read
 */
export function formatFileHeader(file: DocsFile): string {
  return `File: "${file.name}" (ID: ${file.id}, Type: ${file.mimeType})\nLink: ${file.webViewLink}\n\n--- CONTENT ---\n`;
}

/**
 * Text of a downloaded Drive file, or a placeholder when it is not UTF-8
 */
export function decodeFileText(bytes: Buffer, mimeType: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return `[Binary or unsupported text encoding for mimeType '${mimeType}' - ${bytes.length} bytes]`;
  }
}

async function readFileMetadata(drive: DriveFileLookup, documentId: string): Promise<DocsFile> {
  let metadata: DriveFileMetadata;
  try {
    metadata = await drive.getFileMetadata(documentId);
  } catch (error) {
    throw wrapServiceError('Read file metadata', error);
  }
  return {
    id: metadata.id,
    name: metadata.name || 'Unknown File',
    mimeType: metadata.mimeType || '',
    webViewLink: metadata.webViewLink || '#'
  };
}

export async function getDocumentContent(ctx: DocsToolContext, documentId: string): Promise<DocsGetResult> {
  validateDocumentId(documentId);
  const file = await readFileMetadata(ctx.drive, documentId);
  console.log(`[Docs] File '${file.name}' (${documentId}) has mimeType '${file.mimeType}'`);

  let content: DocsContent;
  if (file.mimeType === GOOGLE_DOC_MIME_TYPE) {
    content = parseDocument(await readDocument(ctx.service, documentId, true));
  } else {
    let bytes: Buffer;
    try {
      bytes = await ctx.drive.downloadFile(documentId);
    } catch (error) {
      throw wrapServiceError('Download file', error);
    }
    content = { text: decodeFileText(bytes, file.mimeType), tabs: 0 };
  }

  return {
    file,
    content: { text: formatFileHeader(file) + content.text, tabs: content.tabs }
  };
}

// ============================================
// docs_modify_content
// ============================================

export async function editText(ctx: DocsToolContext, documentId: string, payload: EditTextPayload): Promise<DocsEditResult> {
  const { startIndex, endIndex, text, bold, italic, underline, fontSize, fontFamily } = payload;
  const compiled = compileTextEdit({
    startIndex,
    endIndex,
    text,
    style: { bold, italic, underline, fontSize, fontFamily }
  });

  try {
    await ctx.service.batchUpdate(documentId, compiled.requests);
  } catch (error) {
    throw wrapServiceError('Edit text', error);
  }

  console.log(`[Docs] ${compiled.operations.join('; ')} in doc ${documentId}`);

  return {
    documentId,
    operations: compiled.operations,
    requestCount: compiled.requests.length,
    documentUrl: documentUrl(documentId)
  };
}

export async function findReplace(ctx: DocsToolContext, documentId: string, payload: FindReplacePayload): Promise<DocsReplaceResult> {
  const compiled = compileFindReplace(payload.findText, payload.replaceText, payload.matchCase);

  let response: docs_v1.Schema$BatchUpdateDocumentResponse;
  try {
    response = await ctx.service.batchUpdate(documentId, compiled.requests);
  } catch (error) {
    throw wrapServiceError('Find and replace', error);
  }

  return {
    documentId,
    find: payload.findText,
    replace: payload.replaceText,
    occurrencesReplaced: readOccurrencesChanged(response),
    documentUrl: documentUrl(documentId)
  };
}

export async function updateHeaderFooter(
  ctx: DocsToolContext,
  documentId: string,
  payload: HeadersFootersPayload
): Promise<DocsSectionResult> {
  const manager = new HeaderFooterManager(ctx.service);
  const result = await manager.upsertHeaderFooter(documentId, payload.sectionType, payload.content, payload.headerFooterType);
  return { ...result, documentId, documentUrl: documentUrl(documentId) };
}

export async function modifyContent(
  ctx: DocsToolContext,
  documentId: string,
  payload: ModifyContentPayload
): Promise<DocsEditResult | DocsReplaceResult | DocsSectionResult> {
  validateDocumentId(documentId);

  switch (payload.operation) {
    case 'edit_text':
      return editText(ctx, documentId, payload);
    case 'find_replace':
      return findReplace(ctx, documentId, payload);
    case 'headers_footers':
      return updateHeaderFooter(ctx, documentId, payload);
  }
}

// ============================================
// docs_insert_elements
// ============================================

function toStructuralIntent(payload: TextElementsPayload): StructuralElementIntent {
  switch (payload.elementType) {
    case 'table':
      if (payload.rows === undefined || payload.columns === undefined) {
        throw new DocsValidationError("'rows' and 'columns' parameters are required for table insertion.");
      }
      return { elementType: 'table', rows: payload.rows, columns: payload.columns };
    case 'list':
      if (payload.listType === undefined) {
        throw new DocsValidationError("'listType' parameter is required for list insertion ('UNORDERED' or 'ORDERED').");
      }
      return { elementType: 'list', listType: payload.listType, text: payload.text };
    case 'page_break':
      return { elementType: 'page_break' };
  }
}

export async function insertTextElement(
  ctx: DocsToolContext,
  documentId: string,
  payload: TextElementsPayload
): Promise<DocsEditResult> {
  const compiled = compileStructuralInsertion(payload.index, toStructuralIntent(payload));

  try {
    await ctx.service.batchUpdate(documentId, compiled.requests);
  } catch (error) {
    throw wrapServiceError(`Insert ${payload.elementType}`, error);
  }

  return {
    documentId,
    operations: compiled.operations,
    requestCount: compiled.requests.length,
    documentUrl: documentUrl(documentId)
  };
}

export async function insertImage(ctx: DocsToolContext, documentId: string, payload: ImagePayload): Promise<DocsEditResult> {
  const image = await resolveImageSource(ctx.drive, payload.imageSource);
  const index = toInsertionIndex(payload.index);
  const requests = [createInsertImageRequest(index, image.uri, payload.width, payload.height)];

  try {
    await ctx.service.batchUpdate(documentId, requests);
  } catch (error) {
    throw wrapServiceError('Insert image', error);
  }

  const sizeInfo = payload.width !== undefined || payload.height !== undefined
    ? ` (size: ${payload.width ?? 'auto'}x${payload.height ?? 'auto'} points)`
    : '';

  return {
    documentId,
    operations: [`Inserted ${image.description}${sizeInfo} at index ${index}`],
    requestCount: requests.length,
    documentUrl: documentUrl(documentId)
  };
}

export async function insertTable(ctx: DocsToolContext, documentId: string, payload: TablePayload): Promise<DocsTableResult> {
  const manager = new TableOperationManager(ctx.service);
  const result = await manager.createAndPopulateTable(documentId, payload.tableData, payload.index, payload.boldHeaders);
  return { ...result, documentId, documentUrl: documentUrl(documentId) };
}

export async function insertElements(
  ctx: DocsToolContext,
  documentId: string,
  payload: InsertElementsPayload
): Promise<DocsEditResult | DocsTableResult> {
  validateDocumentId(documentId);
  validateIndex(payload.index);

  switch (payload.operation) {
    case 'text_elements':
      return insertTextElement(ctx, documentId, payload);
    case 'image':
      return insertImage(ctx, documentId, payload);
    case 'table':
      return insertTable(ctx, documentId, payload);
  }
}

// ============================================
// docs_manage_operations
// ============================================

export function buildDetailedReport(doc: docs_v1.Schema$Document): DetailedStructureReport {
  const structure = parseDocumentStructure(doc);

  const elements = structure.body.map((element): ElementSummary => {
    const summary: ElementSummary = {
      type: element.type,
      startIndex: element.startIndex,
      endIndex: element.endIndex
    };
    if (element.type === 'table') {
      summary.rows = element.rows;
      summary.columns = element.columns;
      summary.cellCount = element.cells.reduce((count, row) => count + row.length, 0);
    } else if (element.type === 'paragraph') {
      summary.textPreview = element.text.slice(0, TEXT_PREVIEW_LENGTH);
    }
    return summary;
  });

  const report: DetailedStructureReport = {
    title: structure.title,
    totalLength: structure.totalLength,
    statistics: {
      elements: structure.body.length,
      tables: structure.tables.length,
      paragraphs: structure.body.filter((element) => element.type === 'paragraph').length,
      hasHeaders: Object.keys(structure.headers).length > 0,
      hasFooters: Object.keys(structure.footers).length > 0
    },
    elements
  };

  if (structure.tables.length > 0) {
    report.tables = structure.tables.map((table, index) => ({
      index,
      position: { start: table.startIndex, end: table.endIndex },
      dimensions: { rows: table.rows, columns: table.columns },
      preview: extractTableAsData(table).slice(0, TABLE_PREVIEW_ROWS)
    }));
  }

  return report;
}

export function buildComplexityReport(doc: docs_v1.Schema$Document): ComplexityReport {
  const report: ComplexityReport = analyzeDocumentComplexity(doc);
  const tables = findTables(doc);
  if (tables.length > 0) {
    report.tableDetails = tables.map((table, index) => ({
      index,
      rows: table.rows,
      columns: table.columns,
      startIndex: table.startIndex,
      endIndex: table.endIndex
    }));
  }
  return report;
}

export function buildTableDebugInfo(doc: docs_v1.Schema$Document, tableIndex: number): TableDebugInfo {
  const tables = findTables(doc);
  const table = tables[tableIndex];
  if (!table) {
    throw new DocsValidationError(`Table index ${tableIndex} not found. Document has ${tables.length} table(s).`);
  }

  return {
    tableIndex,
    dimensions: `${table.rows}x${table.columns}`,
    tableRange: `[${table.startIndex}-${table.endIndex}]`,
    cells: table.cells.map((row) =>
      row.map((cell) => ({
        position: `(${cell.row},${cell.column})`,
        range: `[${cell.startIndex}-${cell.endIndex}]`,
        insertionIndex: cell.insertionIndex,
        currentContent: JSON.stringify(cell.content),
        contentElementsCount: cell.contentElements
      }))
    )
  };
}

export async function manageOperations(
  ctx: DocsToolContext,
  documentId: string,
  payload: ManageOperationsPayload
): Promise<DocsBatchResult | DocsStructureResult | DocsTableDebugResult> {
  validateDocumentId(documentId);

  switch (payload.operation) {
    case 'batch_update': {
      const manager = new BatchOperationManager(ctx.service);
      const result = await manager.executeBatchOperations(documentId, payload.operations);
      return { ...result, documentId, documentUrl: documentUrl(documentId) };
    }
    case 'inspect_structure': {
      const doc = await readDocument(ctx.service, documentId);
      const structure = payload.detailed ? buildDetailedReport(doc) : buildComplexityReport(doc);
      return { documentId, structure, documentUrl: documentUrl(documentId) };
    }
    case 'debug_table': {
      const doc = await readDocument(ctx.service, documentId);
      return { documentId, table: buildTableDebugInfo(doc, payload.tableIndex), documentUrl: documentUrl(documentId) };
    }
  }
}
