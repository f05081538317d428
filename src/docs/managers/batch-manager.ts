/**
 * Batch operations
 * Caller-supplied primitive operations are validated, built as-is and
 * submitted together. No index correction is applied: the caller owns the
 * order and the positions.
 */
import { docs_v1 } from 'googleapis';
import { z } from 'zod';
import { DocsValidationError, wrapServiceError } from '../errors.js';
import {
  createBulletListRequest,
  createDeleteRangeRequest,
  createFindReplaceRequest,
  createFormatTextRequest,
  createInsertImageRequest,
  createInsertPageBreakRequest,
  createInsertTableRequest,
  createInsertTextRequest
} from '../requests.js';
import type { DocumentService } from '../service.js';
import type { BatchOperationResult, BatchReplySummary, EditOperation } from '../types.js';

const index = z.number().int().nonnegative();

export const batchOperationSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('insert_text'), index, text: z.string().min(1) }),
  z.object({ type: z.literal('delete_text'), startIndex: index, endIndex: index }),
  z.object({ type: z.literal('replace_text'), startIndex: index, endIndex: index, text: z.string().min(1) }),
  z.object({
    type: z.literal('format_text'),
    startIndex: index,
    endIndex: index,
    bold: z.boolean().optional(),
    italic: z.boolean().optional(),
    underline: z.boolean().optional(),
    fontSize: z.number().positive().optional(),
    fontFamily: z.string().min(1).optional()
  }),
  z.object({
    type: z.literal('find_replace'),
    findText: z.string().min(1),
    replaceText: z.string(),
    matchCase: z.boolean().default(false)
  }),
  z.object({ type: z.literal('insert_table'), index, rows: z.number().int().positive(), columns: z.number().int().positive() }),
  z.object({
    type: z.literal('insert_image'),
    index,
    imageUri: z.string().url(),
    width: z.number().positive().optional(),
    height: z.number().positive().optional()
  }),
  z.object({ type: z.literal('insert_page_break'), index }),
  z.object({
    type: z.literal('create_bullets'),
    startIndex: index,
    endIndex: index,
    listType: z.enum(['UNORDERED', 'ORDERED']).default('UNORDERED')
  })
]);

export type BatchOperation = z.infer<typeof batchOperationSchema>;

/**
 * Requests for one batch operation. replace_text becomes a delete followed by
 * an insert at the same start.
 */
export function buildBatchOperationRequests(operation: BatchOperation): EditOperation[] {
  switch (operation.type) {
    case 'insert_text':
      return [createInsertTextRequest(operation.index, operation.text)];
    case 'delete_text':
      return [createDeleteRangeRequest(operation.startIndex, operation.endIndex)];
    case 'replace_text':
      return [
        createDeleteRangeRequest(operation.startIndex, operation.endIndex),
        createInsertTextRequest(operation.startIndex, operation.text)
      ];
    case 'format_text': {
      const { startIndex, endIndex, bold, italic, underline, fontSize, fontFamily } = operation;
      return [createFormatTextRequest(startIndex, endIndex, { bold, italic, underline, fontSize, fontFamily })];
    }
    case 'find_replace':
      return [createFindReplaceRequest(operation.findText, operation.replaceText, operation.matchCase)];
    case 'insert_table':
      return [createInsertTableRequest(operation.index, operation.rows, operation.columns)];
    case 'insert_image':
      return [createInsertImageRequest(operation.index, operation.imageUri, operation.width, operation.height)];
    case 'insert_page_break':
      return [createInsertPageBreakRequest(operation.index)];
    case 'create_bullets':
      return [createBulletListRequest(operation.startIndex, operation.endIndex, operation.listType)];
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate raw operations, reporting the position of the first bad entry
 */
export function parseBatchOperations(operations: unknown[]): BatchOperation[] {
  if (operations.length === 0) {
    throw new DocsValidationError('No operations provided');
  }
  return operations.map((raw, position) => {
    const parsed = batchOperationSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DocsValidationError(`Invalid operation at position ${position}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  });
}

/**
 * Per-reply metadata: the reply kind, the id of any created object and the
 * occurrence count of a replaceAllText
 */
export function summarizeReplies(replies: docs_v1.Schema$Response[]): BatchReplySummary[] {
  return replies.map((reply, position) => {
    const summary: BatchReplySummary = { index: position, kind: Object.keys(reply)[0] ?? 'empty' };

    const objectId = reply.insertInlineImage?.objectId
      ?? reply.createHeader?.headerId
      ?? reply.createFooter?.footerId
      ?? reply.createNamedRange?.namedRangeId;
    if (objectId) summary.objectId = objectId;

    const occurrences = reply.replaceAllText?.occurrencesChanged;
    if (occurrences !== undefined && occurrences !== null) summary.occurrencesChanged = occurrences;

    return summary;
  });
}

export class BatchOperationManager {
  constructor(private readonly service: DocumentService) {}

  async executeBatchOperations(documentId: string, operations: unknown[]): Promise<BatchOperationResult> {
    const parsed = parseBatchOperations(operations);
    const requests = parsed.flatMap(buildBatchOperationRequests);

    let response: docs_v1.Schema$BatchUpdateDocumentResponse;
    try {
      response = await this.service.batchUpdate(documentId, requests);
    } catch (error) {
      throw wrapServiceError('Batch update', error);
    }

    const replies = summarizeReplies(response.replies ?? []);
    console.log(`[BatchManager] Executed ${parsed.length} operations (${requests.length} requests) on doc ${documentId}`);

    return {
      success: true,
      message: `Successfully executed ${parsed.length} operations`,
      repliesCount: replies.length,
      replies
    };
  }
}
