/**
 * Docs API type definitions
 * Defines parsed document structure, edit operations, and tool results
 */

// ============================================
// Parsed Structure Types
// ============================================

export type ElementType = 'paragraph' | 'table' | 'sectionBreak' | 'tableOfContents';

interface ElementRange {
  startIndex: number;
  endIndex: number;
}

export interface ParagraphElement extends ElementRange {
  type: 'paragraph';
  text: string;
  namedStyleType?: string;
  bulleted: boolean;
}

/**
 * A cell of a parsed table. insertionIndex is where new text must be
 * inserted to land inside the cell.
 */
export interface TableCellInfo extends ElementRange {
  row: number;
  column: number;
  insertionIndex: number;
  content: string;
  contentElements: number;
}

export interface TableElement extends ElementRange {
  type: 'table';
  rows: number;
  columns: number;
  cells: TableCellInfo[][];
}

export interface SectionBreakElement extends ElementRange {
  type: 'sectionBreak';
}

export interface TableOfContentsElement extends ElementRange {
  type: 'tableOfContents';
}

export type DocumentElement =
  | ParagraphElement
  | TableElement
  | SectionBreakElement
  | TableOfContentsElement;

/**
 * Header or footer segment with its own index space
 */
export interface SegmentStructure {
  id: string;
  elements: DocumentElement[];
  text: string;
}

export interface DocumentStructure {
  title: string;
  totalLength: number;
  body: DocumentElement[];
  tables: TableElement[];
  headers: Record<string, SegmentStructure>;
  footers: Record<string, SegmentStructure>;
}

export type ComplexityLevel = 'simple' | 'moderate' | 'complex';

export interface DocumentComplexity {
  totalElements: number;
  tables: number;
  paragraphs: number;
  sectionBreaks: number;
  totalLength: number;
  hasHeaders: boolean;
  hasFooters: boolean;
  hasLists: boolean;
  complexity: ComplexityLevel;
}

/**
 * Docs content (extracted text from body and all tabs)
 */
export interface DocsContent {
  text: string;
  tabs: number;
}

// ============================================
// Edit Operation Types
// ============================================

/**
 * Addresses a header/footer segment or a tab. Omitted fields mean the
 * main body of the first tab.
 */
export interface SegmentTarget {
  segmentId?: string;
  tabId?: string;
}

export interface Location extends SegmentTarget {
  readonly index: number;
}

export interface Range extends SegmentTarget {
  readonly startIndex: number;
  readonly endIndex: number;
}

export interface TextStyleInput {
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  fontSize?: number;
  fontFamily?: string;
}

export type ListType = 'UNORDERED' | 'ORDERED';

export type BulletPreset = 'BULLET_DISC_CIRCLE_SQUARE' | 'NUMBERED_DECIMAL_ALPHA_ROMAN';

export interface InsertTextOperation {
  readonly insertText: { readonly location: Location; readonly text: string };
}

export interface DeleteRangeOperation {
  readonly deleteContentRange: { readonly range: Range };
}

export interface FormatTextOperation {
  readonly updateTextStyle: {
    readonly range: Range;
    readonly textStyle: {
      readonly bold?: boolean;
      readonly italic?: boolean;
      readonly underline?: boolean;
      readonly fontSize?: { readonly magnitude: number; readonly unit: 'PT' };
      readonly weightedFontFamily?: { readonly fontFamily: string };
    };
    readonly fields: string;
  };
}

export interface FindReplaceOperation {
  readonly replaceAllText: {
    readonly containsText: { readonly text: string; readonly matchCase: boolean };
    readonly replaceText: string;
  };
}

export interface InsertTableOperation {
  readonly insertTable: { readonly location: Location; readonly rows: number; readonly columns: number };
}

export interface InsertImageOperation {
  readonly insertInlineImage: {
    readonly location: Location;
    readonly uri: string;
    readonly objectSize?: {
      readonly width?: { readonly magnitude: number; readonly unit: 'PT' };
      readonly height?: { readonly magnitude: number; readonly unit: 'PT' };
    };
  };
}

export interface InsertPageBreakOperation {
  readonly insertPageBreak: { readonly location: Location };
}

export interface CreateBulletsOperation {
  readonly createParagraphBullets: { readonly range: Range; readonly bulletPreset: BulletPreset };
}

export type EditOperation =
  | InsertTextOperation
  | DeleteRangeOperation
  | FormatTextOperation
  | FindReplaceOperation
  | InsertTableOperation
  | InsertImageOperation
  | InsertPageBreakOperation
  | CreateBulletsOperation;

export type SectionType = 'header' | 'footer';

export type HeaderFooterVariant = 'DEFAULT' | 'FIRST_PAGE_ONLY' | 'EVEN_PAGE';

export interface CreateHeaderOperation {
  readonly createHeader: { readonly type: 'DEFAULT' };
}

export interface CreateFooterOperation {
  readonly createFooter: { readonly type: 'DEFAULT' };
}

/**
 * Anything the compiler and managers submit in one batch
 */
export type DocsRequest = EditOperation | CreateHeaderOperation | CreateFooterOperation;

// ============================================
// Manager Result Types
// ============================================

export interface TableOperationMetadata {
  rows: number;
  columns: number;
  index: number;
  retried: boolean;
  populatedCells: number;
}

export interface TableOperationResult {
  success: true;
  message: string;
  metadata: TableOperationMetadata;
}

export interface HeaderFooterResult {
  success: true;
  message: string;
  sectionId: string;
  created: boolean;
}

export interface BatchReplySummary {
  index: number;
  kind: string;
  objectId?: string;
  occurrencesChanged?: number;
}

export interface BatchOperationResult {
  success: true;
  message: string;
  repliesCount: number;
  replies: BatchReplySummary[];
}

// ============================================
// Tool Result Types
// ============================================

/**
 * Drive metadata of the file read by docs_get_content
 */
export interface DocsFile {
  id: string;
  name: string;
  mimeType: string;
  webViewLink: string;
}

/**
 * Result from docs_get_content operation. Text starts with a metadata header;
 * tabs is 0 for files that are not Google Docs.
 */
export interface DocsGetResult {
  file: DocsFile;
  content: DocsContent;
}

/**
 * Result from docs_modify_content / docs_insert_elements operations
 */
export interface DocsEditResult {
  documentId: string;
  operations: string[];
  requestCount: number;
  documentUrl: string;
}

/**
 * Result from find_replace
 */
export interface DocsReplaceResult {
  documentId: string;
  find: string;
  replace: string;
  occurrencesReplaced: number;
  documentUrl: string;
}

/**
 * Docs API error result
 */
export interface DocsErrorResult {
  error: string;
  code: number;
  message: string;
}

// ============================================
// Structure Report Types
// ============================================

export interface ElementSummary {
  type: ElementType;
  startIndex: number;
  endIndex: number;
  rows?: number;
  columns?: number;
  cellCount?: number;
  textPreview?: string;
}

export interface TablePreview {
  index: number;
  position: { start: number; end: number };
  dimensions: { rows: number; columns: number };
  preview: string[][];
}

/**
 * Full structure report (inspect_structure with detailed)
 */
export interface DetailedStructureReport {
  title: string;
  totalLength: number;
  statistics: {
    elements: number;
    tables: number;
    paragraphs: number;
    hasHeaders: boolean;
    hasFooters: boolean;
  };
  elements: ElementSummary[];
  tables?: TablePreview[];
}

export interface TableSummary {
  index: number;
  rows: number;
  columns: number;
  startIndex: number;
  endIndex: number;
}

/**
 * Complexity summary (inspect_structure without detailed)
 */
export interface ComplexityReport extends DocumentComplexity {
  tableDetails?: TableSummary[];
}

export interface TableDebugCell {
  position: string;
  range: string;
  insertionIndex: number;
  currentContent: string;
  contentElementsCount: number;
}

export interface TableDebugInfo {
  tableIndex: number;
  dimensions: string;
  tableRange: string;
  cells: TableDebugCell[][];
}

// ============================================
// Manager Tool Result Types
// ============================================

interface DocumentLink {
  documentId: string;
  documentUrl: string;
}

export interface DocsSectionResult extends HeaderFooterResult, DocumentLink {}

export interface DocsTableResult extends TableOperationResult, DocumentLink {}

export interface DocsBatchResult extends BatchOperationResult, DocumentLink {}

export interface DocsStructureResult extends DocumentLink {
  structure: DetailedStructureReport | ComplexityReport;
}

export interface DocsTableDebugResult extends DocumentLink {
  table: TableDebugInfo;
}
