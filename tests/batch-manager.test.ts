import { describe, expect, it } from 'vitest';
import { DocsValidationError } from '../src/docs/errors.js';
import {
  BatchOperationManager,
  buildBatchOperationRequests,
  parseBatchOperations,
  summarizeReplies
} from '../src/docs/managers/batch-manager.js';
import { apiError, FakeDocumentService } from './helpers/fake-document-service.js';

const DOC_ID = 'doc-test-0001';

describe('parseBatchOperations', () => {
  it('applies defaults', () => {
    expect(parseBatchOperations([
      { type: 'find_replace', findText: 'a', replaceText: 'b' },
      { type: 'create_bullets', startIndex: 1, endIndex: 5 }
    ])).toEqual([
      { type: 'find_replace', findText: 'a', replaceText: 'b', matchCase: false },
      { type: 'create_bullets', startIndex: 1, endIndex: 5, listType: 'UNORDERED' }
    ]);
  });

  it('reports the position of an invalid entry', () => {
    expect(() => parseBatchOperations([
      { type: 'insert_text', index: 1, text: 'ok' },
      { type: 'delete_text', startIndex: 4 }
    ])).toThrow('Invalid operation at position 1: endIndex: Required');
  });

  it('rejects unknown operation types', () => {
    expect(() => parseBatchOperations([{ type: 'explode' }])).toThrow(
      'Invalid operation at position 0: type: Invalid discriminator value'
    );
  });

  it('rejects an empty list', () => {
    expect(() => parseBatchOperations([])).toThrow('No operations provided');
  });
});

describe('buildBatchOperationRequests', () => {
  it('submits indices as given', () => {
    expect(buildBatchOperationRequests({ type: 'insert_text', index: 0, text: 'raw' })).toEqual([
      { insertText: { location: { index: 0 }, text: 'raw' } }
    ]);
  });

  it('splits replace_text into delete and insert', () => {
    expect(buildBatchOperationRequests({ type: 'replace_text', startIndex: 5, endIndex: 8, text: 'new' })).toEqual([
      { deleteContentRange: { range: { startIndex: 5, endIndex: 8 } } },
      { insertText: { location: { index: 5 }, text: 'new' } }
    ]);
  });

  it('builds format_text from the given style fields', () => {
    expect(buildBatchOperationRequests({ type: 'format_text', startIndex: 2, endIndex: 6, underline: true })).toEqual([
      { updateTextStyle: { range: { startIndex: 2, endIndex: 6 }, textStyle: { underline: true }, fields: 'underline' } }
    ]);
  });

  it('rejects format_text with no style', () => {
    expect(() => buildBatchOperationRequests({ type: 'format_text', startIndex: 2, endIndex: 6 })).toThrow(
      'At least one text style field is required'
    );
  });

  it('rejects an empty delete range', () => {
    expect(() => buildBatchOperationRequests({ type: 'delete_text', startIndex: 4, endIndex: 4 })).toThrow(DocsValidationError);
  });
});

describe('summarizeReplies', () => {
  it('reports kind, created ids and occurrence counts', () => {
    expect(summarizeReplies([
      {},
      { replaceAllText: { occurrencesChanged: 2 } },
      { insertInlineImage: { objectId: 'img.1' } },
      { createHeader: { headerId: 'kix.h9' } }
    ])).toEqual([
      { index: 0, kind: 'empty' },
      { index: 1, kind: 'replaceAllText', occurrencesChanged: 2 },
      { index: 2, kind: 'insertInlineImage', objectId: 'img.1' },
      { index: 3, kind: 'createHeader', objectId: 'kix.h9' }
    ]);
  });
});

describe('BatchOperationManager', () => {
  it('submits every operation in one batch', async () => {
    const service = new FakeDocumentService().replyWith({
      replies: [{}, {}, {}, { replaceAllText: { occurrencesChanged: 2 } }, { insertInlineImage: { objectId: 'img.1' } }]
    });

    const result = await new BatchOperationManager(service).executeBatchOperations(DOC_ID, [
      { type: 'insert_text', index: 1, text: 'Hi' },
      { type: 'replace_text', startIndex: 5, endIndex: 8, text: 'new' },
      { type: 'find_replace', findText: 'a', replaceText: 'b' },
      { type: 'insert_image', index: 3, imageUri: 'https://example.com/x.png', width: 100 }
    ]);

    expect(service.batches).toHaveLength(1);
    expect(service.batches[0]).toHaveLength(5);
    expect(service.batches[0][4]).toEqual({
      insertInlineImage: {
        location: { index: 3 },
        uri: 'https://example.com/x.png',
        objectSize: { width: { magnitude: 100, unit: 'PT' } }
      }
    });
    expect(result.success).toBe(true);
    expect(result.message).toBe('Successfully executed 4 operations');
    expect(result.repliesCount).toBe(5);
    expect(result.replies[3]).toEqual({ index: 3, kind: 'replaceAllText', occurrencesChanged: 2 });
  });

  it('submits nothing when an entry is invalid', async () => {
    const service = new FakeDocumentService();

    await expect(new BatchOperationManager(service).executeBatchOperations(DOC_ID, [
      { type: 'insert_text', index: 1, text: 'ok' },
      { type: 'insert_table', index: 1, rows: 0, columns: 2 }
    ])).rejects.toBeInstanceOf(DocsValidationError);
    expect(service.batches).toHaveLength(0);
  });

  it('wraps service failures', async () => {
    const service = new FakeDocumentService().failWith(apiError(400, 'Invalid requests[0].insertText: Index 900 is out of bounds'));

    await expect(new BatchOperationManager(service).executeBatchOperations(DOC_ID, [
      { type: 'insert_text', index: 900, text: 'late' }
    ])).rejects.toThrow('Batch update failed: Invalid requests[0].insertText: Index 900 is out of bounds');
  });
});
