/**
 * Table creation and population
 *
 * A table is created empty in one batch and filled in a second one. Cell
 * positions come from the geometry of the table just created rather than a
 * fresh read of the document, and cells are written from the highest index
 * down so no write moves a cell that is still waiting to be written.
 */
import { isBoundaryError, wrapServiceError } from '../errors.js';
import { FIRST_CONTENT_INDEX, textLength, toInsertionIndex } from '../ranges.js';
import { createFormatTextRequest, createInsertTableRequest, createInsertTextRequest } from '../requests.js';
import type { DocumentService } from '../service.js';
import type { EditOperation, TableOperationResult } from '../types.js';
import { recordBoundaryRetry } from '../../metrics/cloudwatch.js';
import { validateIndex, validateTableData } from './validation.js';

export interface CellSlot {
  row: number;
  column: number;
  insertionIndex: number;
}

/**
 * Insertion index of cell (row, column) in an empty table created by an
 * insertTable request at tableIndex.
 *
 * The service puts a newline before the table, so the table starts at
 * tableIndex + 1. Each row opens with one marker and each cell holds a marker
 * plus an empty paragraph, which makes a row 2 * columns + 1 positions long.
 */
export function cellInsertionIndex(tableIndex: number, columns: number, row: number, column: number): number {
  return tableIndex + 4 + row * (2 * columns + 1) + 2 * column;
}

/**
 * Every cell slot of an empty rows x columns table, in document order
 */
export function computeCellSlots(tableIndex: number, rows: number, columns: number): CellSlot[] {
  const slots: CellSlot[] = [];
  for (let row = 0; row < rows; row++) {
    for (let column = 0; column < columns; column++) {
      slots.push({ row, column, insertionIndex: cellInsertionIndex(tableIndex, columns, row, column) });
    }
  }
  return slots;
}

/**
 * Requests that fill an empty table with tableData, then optionally bold the
 * header row at the positions its text ends up in.
 */
export function buildTablePopulationRequests(
  tableIndex: number,
  tableData: string[][],
  boldHeaders: boolean
): EditOperation[] {
  const columns = tableData[0]?.length ?? 0;
  const slots = computeCellSlots(tableIndex, tableData.length, columns)
    .filter((slot) => tableData[slot.row][slot.column].length > 0)
    .sort((a, b) => b.insertionIndex - a.insertionIndex);

  const requests: EditOperation[] = slots.map((slot) =>
    createInsertTextRequest(slot.insertionIndex, tableData[slot.row][slot.column])
  );

  if (boldHeaders && tableData.length > 0) {
    // Only header cells to the left have been written in front of a header cell
    let shift = 0;
    tableData[0].forEach((text, column) => {
      if (text.length > 0) {
        const start = cellInsertionIndex(tableIndex, columns, 0, column) + shift;
        requests.push(createFormatTextRequest(start, start + textLength(text), { bold: true }));
      }
      shift += textLength(text);
    });
  }

  return requests;
}

export class TableOperationManager {
  constructor(private readonly service: DocumentService) {}

  /**
   * Create a table at index and fill it with tableData.
   *
   * If the service rejects the index as not before the end of the body, the
   * creation is retried exactly once at index - 1. A second boundary
   * rejection rethrows the first one.
   */
  async createAndPopulateTable(
    documentId: string,
    tableData: string[][],
    index: number,
    boldHeaders = true
  ): Promise<TableOperationResult> {
    validateTableData(tableData);
    validateIndex(index);

    const rows = tableData.length;
    const columns = tableData[0].length;
    const created = await this.createEmptyTable(documentId, toInsertionIndex(index), rows, columns);

    const requests = buildTablePopulationRequests(created.index, tableData, boldHeaders);
    const populatedCells = tableData.flat().filter((text) => text.length > 0).length;

    if (requests.length > 0) {
      try {
        await this.service.batchUpdate(documentId, requests);
      } catch (error) {
        throw wrapServiceError('Populate table', error);
      }
    }

    console.log(`[TableManager] Created ${rows}x${columns} table at index ${created.index} in doc ${documentId}, populated ${populatedCells} cells`);

    return {
      success: true,
      message: `Created ${rows}x${columns} table at index ${created.index} and populated ${populatedCells} cells${boldHeaders ? ' with bold headers' : ''}`,
      metadata: {
        rows,
        columns,
        index: created.index,
        retried: created.retried,
        populatedCells
      }
    };
  }

  private async createEmptyTable(
    documentId: string,
    index: number,
    rows: number,
    columns: number
  ): Promise<{ index: number; retried: boolean }> {
    try {
      await this.service.batchUpdate(documentId, [createInsertTableRequest(index, rows, columns)]);
      return { index, retried: false };
    } catch (error) {
      if (!isBoundaryError(error)) {
        throw wrapServiceError('Create table', error);
      }
      if (index - 1 < FIRST_CONTENT_INDEX) {
        throw error;
      }

      console.log(`[TableManager] Index ${index} is at document boundary, retrying with index ${index - 1}`);
      recordBoundaryRetry();

      try {
        await this.service.batchUpdate(documentId, [createInsertTableRequest(index - 1, rows, columns)]);
        return { index: index - 1, retried: true };
      } catch (retryError) {
        if (isBoundaryError(retryError)) {
          throw error;
        }
        throw wrapServiceError('Create table', retryError);
      }
    }
  }
}
