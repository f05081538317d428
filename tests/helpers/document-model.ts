import type { DocsRequest } from '../../src/docs/types.js';

export const SECTION_MARKER = '\u0000';

export interface AppliedStyle {
  startIndex: number;
  endIndex: number;
  fields: string;
}

/**
 * Flat text model of a document body for replaying batches. Position 0 holds
 * the section marker; requests are applied strictly in order, the way the
 * service applies them.
 */
export class DocumentModel {
  readonly styles: AppliedStyle[] = [];
  readonly bullets: AppliedStyle[] = [];
  private content: string;

  constructor(text: string) {
    this.content = SECTION_MARKER + text;
  }

  get text(): string {
    return this.content.slice(1);
  }

  slice(startIndex: number, endIndex: number): string {
    return this.content.slice(startIndex, endIndex);
  }

  apply(requests: readonly DocsRequest[]): this {
    for (const request of requests) {
      if ('insertText' in request) {
        const { location, text } = request.insertText;
        this.assertInsertable(location.index);
        this.content = this.content.slice(0, location.index) + text + this.content.slice(location.index);
      } else if ('deleteContentRange' in request) {
        const { startIndex, endIndex } = request.deleteContentRange.range;
        if (startIndex < 1) throw new Error('Cannot delete the section marker');
        if (endIndex > this.content.length) throw new Error(`Delete end ${endIndex} past end ${this.content.length}`);
        this.content = this.content.slice(0, startIndex) + this.content.slice(endIndex);
      } else if ('updateTextStyle' in request) {
        const { range, fields } = request.updateTextStyle;
        this.styles.push({ startIndex: range.startIndex, endIndex: range.endIndex, fields });
      } else if ('createParagraphBullets' in request) {
        const { range, bulletPreset } = request.createParagraphBullets;
        this.bullets.push({ startIndex: range.startIndex, endIndex: range.endIndex, fields: bulletPreset });
      } else {
        throw new Error(`Unsupported request: ${Object.keys(request).join(',')}`);
      }
    }
    return this;
  }

  private assertInsertable(index: number): void {
    if (index < 1) throw new Error('Cannot insert at the section marker');
    if (index > this.content.length) throw new Error(`Insert index ${index} past end ${this.content.length}`);
  }
}
