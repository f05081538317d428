import { docs_v1 } from 'googleapis';

type StructuralElement = docs_v1.Schema$StructuralElement;

export function paragraph(text: string, startIndex: number): StructuralElement {
  return {
    startIndex,
    endIndex: startIndex + text.length,
    paragraph: {
      elements: [{ startIndex, endIndex: startIndex + text.length, textRun: { content: text } }]
    }
  };
}

export function cell(content: StructuralElement[], startIndex: number, endIndex: number): docs_v1.Schema$TableCell {
  return { startIndex, endIndex, content };
}

/**
 * A table whose cells each hold one paragraph, laid out the way the service
 * numbers a freshly populated table
 */
export function simpleTable(rows: string[][], startIndex: number): StructuralElement {
  let position = startIndex + 1;
  const tableRows: docs_v1.Schema$TableRow[] = rows.map((row) => {
    const rowStart = position;
    position += 1;
    const tableCells = row.map((text) => {
      const cellStart = position;
      const paragraphText = `${text}\n`;
      const content = [paragraph(paragraphText, cellStart + 1)];
      position = cellStart + 1 + paragraphText.length;
      return cell(content, cellStart, position);
    });
    return { startIndex: rowStart, endIndex: position, tableCells };
  });

  return {
    startIndex,
    endIndex: position + 1,
    table: { rows: rows.length, columns: rows[0]?.length ?? 0, tableRows }
  };
}

/**
 * depth tables nested one inside another's single cell. The cell of the
 * table at level k holds the paragraph `L<k>` followed by the next table.
 */
export function nestedTables(depth: number, level = 1): StructuralElement {
  const content: StructuralElement[] = [paragraph(`L${level}\n`, 0)];
  if (level < depth) {
    content.push(nestedTables(depth, level + 1));
  }
  return {
    startIndex: 0,
    endIndex: 1,
    table: { rows: 1, columns: 1, tableRows: [{ tableCells: [cell(content, 0, 1)] }] }
  };
}

export function documentWithBody(content: StructuralElement[], extra: docs_v1.Schema$Document = {}): docs_v1.Schema$Document {
  return { documentId: 'doc-test-0001', title: 'Test Document', body: { content }, ...extra };
}
