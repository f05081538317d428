/**
 * Docs API parsers
 * Recover addressable structure and text from Google Docs documents
 *
 * Nested content (tables inside table cells) is walked with an explicit work
 * stack that carries the nesting depth. Branches deeper than
 * MAX_NESTING_DEPTH are dropped rather than failing the parse.
 */
import { docs_v1 } from 'googleapis';
import type {
  ComplexityLevel,
  DocsContent,
  DocumentComplexity,
  DocumentElement,
  DocumentStructure,
  ParagraphElement,
  SegmentStructure,
  TableCellInfo,
  TableElement
} from './types.js';

type StructuralElement = docs_v1.Schema$StructuralElement;

export const MAX_NESTING_DEPTH = 5;

const TAB_INDENT = '    ';

interface ContentFrame {
  element: StructuralElement;
  depth: number;
}

/**
 * Concatenate the text runs of a paragraph in element order
 */
export function paragraphText(paragraph: docs_v1.Schema$Paragraph): string {
  let text = '';
  for (const element of paragraph.elements ?? []) {
    if (element.textRun?.content) {
      text += element.textRun.content;
    }
  }
  return text;
}

/**
 * Push content onto the stack so that popping yields document order
 */
function pushContent(stack: ContentFrame[], content: StructuralElement[], depth: number): void {
  for (let i = content.length - 1; i >= 0; i--) {
    stack.push({ element: content[i], depth });
  }
}

function cellContents(table: docs_v1.Schema$Table): StructuralElement[] {
  const content: StructuralElement[] = [];
  for (const row of table.tableRows ?? []) {
    for (const cell of row.tableCells ?? []) {
      content.push(...(cell.content ?? []));
    }
  }
  return content;
}

/**
 * Walk content in document order and collect text pieces.
 *
 * @param startDepth - nesting depth of the content itself; a table found at
 *   depth d contributes its cells at d + 1
 * @param skipBlank - drop paragraphs that are only whitespace
 */
function collectText(content: StructuralElement[], startDepth: number, skipBlank: boolean): string[] {
  const pieces: string[] = [];
  const stack: ContentFrame[] = [];
  pushContent(stack, content, startDepth);

  let frame = stack.pop();
  while (frame) {
    const { element, depth } = frame;
    if (element.paragraph) {
      const text = paragraphText(element.paragraph);
      if (!skipBlank || text.trim()) {
        pieces.push(text);
      }
    } else if (element.table && depth < MAX_NESTING_DEPTH) {
      pushContent(stack, cellContents(element.table), depth + 1);
    }
    frame = stack.pop();
  }

  return pieces;
}

/**
 * Recursive text of a content list (a body or a cell), depth-bounded
 */
export function extractContentText(content: StructuralElement[], startDepth = 0): string {
  return collectText(content, startDepth, false).join('');
}

function parseCell(cell: docs_v1.Schema$TableCell, row: number, column: number, depth: number): TableCellInfo {
  const content = cell.content ?? [];
  const startIndex = cell.startIndex ?? 0;
  const endIndex = cell.endIndex ?? startIndex;
  const firstParagraph = content.find((element) => element.paragraph);

  return {
    row,
    column,
    startIndex,
    endIndex,
    insertionIndex: firstParagraph?.startIndex ?? startIndex + 1,
    content: extractContentText(content, depth + 1),
    contentElements: content.length
  };
}

function parseTable(element: StructuralElement, table: docs_v1.Schema$Table, depth: number): TableElement {
  const tableRows = table.tableRows ?? [];
  const cells: TableCellInfo[][] = tableRows.map((row, rowIndex) =>
    (row.tableCells ?? []).map((cell, columnIndex) => parseCell(cell, rowIndex, columnIndex, depth))
  );

  return {
    type: 'table',
    startIndex: element.startIndex ?? 0,
    endIndex: element.endIndex ?? 0,
    rows: table.rows ?? tableRows.length,
    columns: table.columns ?? (cells[0]?.length ?? 0),
    cells
  };
}

function parseParagraph(element: StructuralElement, paragraph: docs_v1.Schema$Paragraph): ParagraphElement {
  return {
    type: 'paragraph',
    startIndex: element.startIndex ?? 0,
    endIndex: element.endIndex ?? 0,
    text: paragraphText(paragraph),
    namedStyleType: paragraph.paragraphStyle?.namedStyleType ?? undefined,
    bulleted: Boolean(paragraph.bullet)
  };
}

/**
 * Parse one structural element, or null for kinds that carry no content
 */
export function parseElement(element: StructuralElement, depth = 0): DocumentElement | null {
  const startIndex = element.startIndex ?? 0;
  const endIndex = element.endIndex ?? 0;

  if (element.paragraph) return parseParagraph(element, element.paragraph);
  if (element.table) return parseTable(element, element.table, depth);
  if (element.sectionBreak) return { type: 'sectionBreak', startIndex, endIndex };
  if (element.tableOfContents) return { type: 'tableOfContents', startIndex, endIndex };
  return null;
}

function parseContent(content: StructuralElement[]): DocumentElement[] {
  const elements: DocumentElement[] = [];
  for (const element of content) {
    const parsed = parseElement(element);
    if (parsed) elements.push(parsed);
  }
  return elements;
}

function parseSegments(
  segments: { [key: string]: docs_v1.Schema$Header | docs_v1.Schema$Footer } | undefined | null
): Record<string, SegmentStructure> {
  const parsed: Record<string, SegmentStructure> = {};
  for (const [id, segment] of Object.entries(segments ?? {})) {
    const content = segment.content ?? [];
    parsed[id] = {
      id,
      elements: parseContent(content),
      text: extractContentText(content)
    };
  }
  return parsed;
}

/**
 * Body content of a document. Documents fetched with includeTabsContent have
 * no top-level body; their first tab holds it instead.
 */
export function resolveBodyContent(doc: docs_v1.Schema$Document): StructuralElement[] {
  return doc.body?.content
    ?? doc.tabs?.[0]?.documentTab?.body?.content
    ?? [];
}

/**
 * Parse a document into typed elements with index ranges
 */
export function parseDocumentStructure(doc: docs_v1.Schema$Document): DocumentStructure {
  const body = parseContent(resolveBodyContent(doc));
  const tables = body.filter((element): element is TableElement => element.type === 'table');
  const last = body[body.length - 1];

  return {
    title: doc.title || '',
    totalLength: last?.endIndex ?? 0,
    body,
    tables,
    headers: parseSegments(doc.headers),
    footers: parseSegments(doc.footers)
  };
}

export function findTables(doc: docs_v1.Schema$Document): TableElement[] {
  return parseDocumentStructure(doc).tables;
}

/**
 * Table cell text as rows of strings, without the newline every cell ends with
 */
export function extractTableAsData(table: TableElement): string[][] {
  return table.cells.map((row) => row.map((cell) => cell.content.replace(/\n+$/, '')));
}

function complexityOf(totalElements: number, tables: number): ComplexityLevel {
  if (tables === 0 && totalElements < 50) return 'simple';
  if (tables <= 3 && totalElements < 200) return 'moderate';
  return 'complex';
}

/**
 * Element counts without the per-element breakdown
 */
export function analyzeDocumentComplexity(doc: docs_v1.Schema$Document): DocumentComplexity {
  const content = resolveBodyContent(doc);
  let tables = 0;
  let paragraphs = 0;
  let sectionBreaks = 0;

  for (const element of content) {
    if (element.paragraph) paragraphs++;
    else if (element.table) tables++;
    else if (element.sectionBreak) sectionBreaks++;
  }

  return {
    totalElements: content.length,
    tables,
    paragraphs,
    sectionBreaks,
    totalLength: content[content.length - 1]?.endIndex ?? 0,
    hasHeaders: Object.keys(doc.headers ?? {}).length > 0,
    hasFooters: Object.keys(doc.footers ?? {}).length > 0,
    hasLists: Object.keys(doc.lists ?? {}).length > 0,
    complexity: complexityOf(content.length, tables)
  };
}

/**
 * Tab header line; the title is indented by nesting depth
 */
export function formatTabHeader(title: string, level: number): string {
  return `\n--- TAB: ${TAB_INDENT.repeat(level)}${title} ---\n`;
}

function tabTitle(tab: docs_v1.Schema$Tab): string {
  if (tab.tabProperties?.title) return tab.tabProperties.title;
  // documentTab.title is sent by the service but missing from the generated types
  const documentTab: object = tab.documentTab ?? {};
  if ('title' in documentTab && typeof documentTab.title === 'string' && documentTab.title) {
    return documentTab.title;
  }
  return 'Untitled Tab';
}

/**
 * Text of a tab and its descendants, depth-first
 */
function extractTabTree(root: docs_v1.Schema$Tab): string {
  const blocks: string[] = [];
  const stack: Array<{ tab: docs_v1.Schema$Tab; level: number }> = [{ tab: root, level: 0 }];

  let frame = stack.pop();
  while (frame) {
    const { tab, level } = frame;
    if (tab.documentTab) {
      const content = tab.documentTab.body?.content ?? [];
      blocks.push(formatTabHeader(tabTitle(tab), level) + collectText(content, 0, true).join(''));
    }
    const children = tab.childTabs ?? [];
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ tab: children[i], level: level + 1 });
    }
    frame = stack.pop();
  }

  return blocks.join('');
}

/**
 * Extract text from the main body and then from every tab
 */
export function extractDocumentText(doc: docs_v1.Schema$Document): string {
  const blocks: string[] = [];

  const main = collectText(doc.body?.content ?? [], 0, true).join('');
  if (main.trim()) {
    blocks.push(main);
  }

  for (const tab of doc.tabs ?? []) {
    const text = extractTabTree(tab);
    if (text.trim()) {
      blocks.push(text);
    }
  }

  return blocks.join('');
}

function countTabs(tabs: docs_v1.Schema$Tab[]): number {
  let count = 0;
  const stack = [...tabs];
  let tab = stack.pop();
  while (tab) {
    count++;
    stack.push(...(tab.childTabs ?? []));
    tab = stack.pop();
  }
  return count;
}

/**
 * Parse document into DocsContent structure
 */
export function parseDocument(doc: docs_v1.Schema$Document): DocsContent {
  return {
    text: extractDocumentText(doc),
    tabs: countTabs(doc.tabs ?? [])
  };
}
