/**
 * Tool input schemas
 * Payloads of the Docs tools, discriminated on `operation`.
 */
import { z } from 'zod';

const index = z.number().int().nonnegative();

export const documentIdSchema = z.string().describe('Document ID (from URL or Drive)');

export const editTextPayloadSchema = z.object({
  operation: z.literal('edit_text'),
  startIndex: index.describe('Start position. 0 is redirected to 1 for inserts'),
  endIndex: index.optional().describe('End position (exclusive). Replaces [startIndex, endIndex) when greater than startIndex'),
  text: z.string().optional(),
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
  underline: z.boolean().optional(),
  fontSize: z.number().positive().optional().describe('Font size in points'),
  fontFamily: z.string().min(1).optional()
});

export const findReplacePayloadSchema = z.object({
  operation: z.literal('find_replace'),
  findText: z.string().min(1),
  replaceText: z.string(),
  matchCase: z.boolean().default(false)
});

export const headersFootersPayloadSchema = z.object({
  operation: z.literal('headers_footers'),
  sectionType: z.enum(['header', 'footer']),
  content: z.string(),
  headerFooterType: z.enum(['DEFAULT', 'FIRST_PAGE_ONLY', 'EVEN_PAGE']).default('DEFAULT')
});

export const modifyContentPayloadSchema = z.discriminatedUnion('operation', [
  editTextPayloadSchema,
  findReplacePayloadSchema,
  headersFootersPayloadSchema
]);

export const textElementsPayloadSchema = z.object({
  operation: z.literal('text_elements'),
  index,
  elementType: z.enum(['table', 'list', 'page_break']),
  rows: z.number().int().positive().optional(),
  columns: z.number().int().positive().optional(),
  listType: z.enum(['UNORDERED', 'ORDERED']).optional(),
  text: z.string().optional().describe("List item text, defaults to 'List item'")
});

export const imagePayloadSchema = z.object({
  operation: z.literal('image'),
  index,
  imageSource: z.string().describe('Public image URL or Drive file ID'),
  width: z.number().positive().optional().describe('Width in points'),
  height: z.number().positive().optional().describe('Height in points')
});

export const tablePayloadSchema = z.object({
  operation: z.literal('table'),
  index,
  tableData: z.array(z.array(z.string())).describe('Rows of cell text; every row must have the same length'),
  boldHeaders: z.boolean().default(true)
});

export const insertElementsPayloadSchema = z.discriminatedUnion('operation', [
  textElementsPayloadSchema,
  imagePayloadSchema,
  tablePayloadSchema
]);

export const batchUpdatePayloadSchema = z.object({
  operation: z.literal('batch_update'),
  operations: z.array(z.object({ type: z.string() }).passthrough())
    .describe('Primitive operations applied in order without index correction')
});

export const inspectStructurePayloadSchema = z.object({
  operation: z.literal('inspect_structure'),
  detailed: z.boolean().default(false)
});

export const debugTablePayloadSchema = z.object({
  operation: z.literal('debug_table'),
  tableIndex: index.default(0).describe('Which table to debug, 0 for the first')
});

export const manageOperationsPayloadSchema = z.discriminatedUnion('operation', [
  batchUpdatePayloadSchema,
  inspectStructurePayloadSchema,
  debugTablePayloadSchema
]);

export type EditTextPayload = z.infer<typeof editTextPayloadSchema>;
export type FindReplacePayload = z.infer<typeof findReplacePayloadSchema>;
export type HeadersFootersPayload = z.infer<typeof headersFootersPayloadSchema>;
export type ModifyContentPayload = z.infer<typeof modifyContentPayloadSchema>;
export type TextElementsPayload = z.infer<typeof textElementsPayloadSchema>;
export type ImagePayload = z.infer<typeof imagePayloadSchema>;
export type TablePayload = z.infer<typeof tablePayloadSchema>;
export type InsertElementsPayload = z.infer<typeof insertElementsPayloadSchema>;
export type ManageOperationsPayload = z.infer<typeof manageOperationsPayloadSchema>;
