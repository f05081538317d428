import { describe, expect, it } from 'vitest';
import { DocsServiceError, DocsValidationError } from '../src/docs/errors.js';
import {
  buildTablePopulationRequests,
  cellInsertionIndex,
  computeCellSlots,
  TableOperationManager
} from '../src/docs/managers/table-manager.js';
import { DocumentModel } from './helpers/document-model.js';
import { apiError, boundaryError, FakeDocumentService } from './helpers/fake-document-service.js';

const DOC_ID = 'doc-test-0001';
const DATA = [['Name', 'Age'], ['Ann', '31']];

describe('cell geometry', () => {
  it('places the first cell three positions after the table start', () => {
    expect(cellInsertionIndex(1, 2, 0, 0)).toBe(5);
  });

  it('advances by 2 * columns + 1 per row and 2 per column', () => {
    expect(cellInsertionIndex(1, 2, 1, 0)).toBe(10);
    expect(cellInsertionIndex(1, 2, 0, 1)).toBe(7);
    expect(cellInsertionIndex(1, 2, 1, 1)).toBe(12);
    expect(cellInsertionIndex(50, 3, 2, 2)).toBe(72);
  });

  it('lists slots in document order', () => {
    expect(computeCellSlots(1, 2, 2).map((slot) => slot.insertionIndex)).toEqual([5, 7, 10, 12]);
  });
});

describe('buildTablePopulationRequests', () => {
  it('writes cells from the highest index down', () => {
    const requests = buildTablePopulationRequests(1, DATA, false);

    expect(requests).toEqual([
      { insertText: { location: { index: 12 }, text: '31' } },
      { insertText: { location: { index: 10 }, text: 'Ann' } },
      { insertText: { location: { index: 7 }, text: 'Age' } },
      { insertText: { location: { index: 5 }, text: 'Name' } }
    ]);
  });

  it('bolds header cells at their final positions', () => {
    const requests = buildTablePopulationRequests(1, DATA, true);

    expect(requests.slice(4)).toEqual([
      { updateTextStyle: { range: { startIndex: 5, endIndex: 9 }, textStyle: { bold: true }, fields: 'bold' } },
      { updateTextStyle: { range: { startIndex: 11, endIndex: 14 }, textStyle: { bold: true }, fields: 'bold' } }
    ]);
  });

  it('lands every value in its cell and bolds exactly the header text', () => {
    // Empty 2x2 table inserted at 1: a newline, the table marker, then per row a
    // marker and per cell a marker and an empty paragraph
    const model = new DocumentModel('\n\u0003\u0001\u0002\n\u0002\n\u0001\u0002\n\u0002\n\n');
    const requests = buildTablePopulationRequests(1, DATA, true);

    model.apply(requests);

    expect(model.text).toBe('\n\u0003\u0001\u0002Name\n\u0002Age\n\u0001\u0002Ann\n\u000231\n\n');
    expect(model.styles.map((style) => model.slice(style.startIndex, style.endIndex))).toEqual(['Name', 'Age']);
  });

  it('skips empty cells', () => {
    const requests = buildTablePopulationRequests(1, [['A', ''], ['', 'B']], true);

    expect(requests).toEqual([
      { insertText: { location: { index: 12 }, text: 'B' } },
      { insertText: { location: { index: 5 }, text: 'A' } },
      { updateTextStyle: { range: { startIndex: 5, endIndex: 6 }, textStyle: { bold: true }, fields: 'bold' } }
    ]);
  });
});

describe('TableOperationManager', () => {
  it('creates and populates a table in two batches', async () => {
    const service = new FakeDocumentService();
    const manager = new TableOperationManager(service);

    const result = await manager.createAndPopulateTable(DOC_ID, DATA, 50);

    expect(service.batches).toHaveLength(2);
    expect(service.batches[0]).toEqual([{ insertTable: { location: { index: 50 }, rows: 2, columns: 2 } }]);
    expect(service.batches[1][3]).toEqual({ insertText: { location: { index: 54 }, text: 'Name' } });
    expect(result).toEqual({
      success: true,
      message: 'Created 2x2 table at index 50 and populated 4 cells with bold headers',
      metadata: { rows: 2, columns: 2, index: 50, retried: false, populatedCells: 4 }
    });
  });

  it('redirects index 0 to 1', async () => {
    const service = new FakeDocumentService();

    await new TableOperationManager(service).createAndPopulateTable(DOC_ID, [['x']], 0, false);

    expect(service.batches[0]).toEqual([{ insertTable: { location: { index: 1 }, rows: 1, columns: 1 } }]);
    expect(service.batches[1]).toEqual([{ insertText: { location: { index: 5 }, text: 'x' } }]);
  });

  it('retries once at index - 1 when the index is at the end of the body', async () => {
    const service = new FakeDocumentService().failWith(boundaryError(50, 50));

    const result = await new TableOperationManager(service).createAndPopulateTable(DOC_ID, DATA, 50);

    expect(service.batches.map((batch) => batch[0])).toEqual([
      { insertTable: { location: { index: 50 }, rows: 2, columns: 2 } },
      { insertTable: { location: { index: 49 }, rows: 2, columns: 2 } },
      { insertText: { location: { index: 60 }, text: '31' } }
    ]);
    expect(result.metadata).toEqual({ rows: 2, columns: 2, index: 49, retried: true, populatedCells: 4 });
  });

  it('rethrows the original error when the retry also hits the boundary', async () => {
    const first = boundaryError(50, 50);
    const service = new FakeDocumentService().failWith(first).failWith(boundaryError(49, 49));

    await expect(new TableOperationManager(service).createAndPopulateTable(DOC_ID, DATA, 50)).rejects.toBe(first);
    expect(service.batches).toHaveLength(2);
  });

  it('does not retry below the first content position', async () => {
    const first = boundaryError(1, 1);
    const service = new FakeDocumentService().failWith(first);

    await expect(new TableOperationManager(service).createAndPopulateTable(DOC_ID, DATA, 1)).rejects.toBe(first);
    expect(service.batches).toHaveLength(1);
  });

  it('wraps other creation failures without retrying', async () => {
    const service = new FakeDocumentService().failWith(apiError(403, 'The caller does not have permission'));

    const attempt = new TableOperationManager(service).createAndPopulateTable(DOC_ID, DATA, 10);

    await expect(attempt).rejects.toBeInstanceOf(DocsServiceError);
    await expect(attempt).rejects.toMatchObject({
      message: 'Create table failed: The caller does not have permission',
      code: 403
    });
    expect(service.batches).toHaveLength(1);
  });

  it('wraps a retry that fails for another reason', async () => {
    const service = new FakeDocumentService()
      .failWith(boundaryError(10, 10))
      .failWith(apiError(500, 'Internal error'));

    await expect(new TableOperationManager(service).createAndPopulateTable(DOC_ID, DATA, 10)).rejects.toMatchObject({
      message: 'Create table failed: Internal error',
      code: 500
    });
  });

  it('wraps population failures', async () => {
    const service = new FakeDocumentService()
      .replyWith({ replies: [{}] })
      .failWith(apiError(400, 'Invalid requests[2].insertText: Index 7 is not in a paragraph'));

    await expect(new TableOperationManager(service).createAndPopulateTable(DOC_ID, DATA, 10)).rejects.toThrow(
      'Populate table failed: Invalid requests[2].insertText: Index 7 is not in a paragraph'
    );
  });

  it('validates table data before any request', async () => {
    const service = new FakeDocumentService();

    await expect(
      new TableOperationManager(service).createAndPopulateTable(DOC_ID, [['a', 'b'], ['c']], 5)
    ).rejects.toBeInstanceOf(DocsValidationError);
    expect(service.batches).toHaveLength(0);
  });
});
