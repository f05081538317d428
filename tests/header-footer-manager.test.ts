import { describe, expect, it } from 'vitest';
import { DocsServiceError, DocsValidationError } from '../src/docs/errors.js';
import {
  buildSectionWriteRequests,
  HeaderFooterManager,
  locateSection
} from '../src/docs/managers/header-footer-manager.js';
import { paragraph } from './helpers/documents.js';
import { apiError, FakeDocumentService } from './helpers/fake-document-service.js';

const DOC_ID = 'doc-test-0001';

const withHeader = {
  documentId: DOC_ID,
  documentStyle: { defaultHeaderId: 'kix.h1', firstPageFooterId: 'kix.f1' },
  headers: { 'kix.h1': { headerId: 'kix.h1', content: [paragraph('Old header\n', 1)] } },
  footers: { 'kix.f1': { footerId: 'kix.f1', content: [paragraph('\n', 1)] } }
};

describe('locateSection', () => {
  it('finds the section of the requested variant', () => {
    expect(locateSection(withHeader, 'header', 'DEFAULT')).toBe('kix.h1');
    expect(locateSection(withHeader, 'footer', 'FIRST_PAGE_ONLY')).toBe('kix.f1');
  });

  it('returns undefined for a missing variant', () => {
    expect(locateSection(withHeader, 'header', 'EVEN_PAGE')).toBeUndefined();
    expect(locateSection(withHeader, 'footer', 'DEFAULT')).toBeUndefined();
    expect(locateSection({}, 'header', 'DEFAULT')).toBeUndefined();
  });

  it('ignores an id with no matching segment', () => {
    expect(locateSection({ documentStyle: { defaultHeaderId: 'kix.gone' }, headers: {} }, 'header', 'DEFAULT')).toBeUndefined();
  });
});

describe('buildSectionWriteRequests', () => {
  it('clears everything but the final newline, then inserts at index 1', () => {
    expect(buildSectionWriteRequests('kix.h1', [paragraph('Old header\n', 1)], 'New')).toEqual([
      { deleteContentRange: { range: { startIndex: 1, endIndex: 11, segmentId: 'kix.h1' } } },
      { insertText: { location: { index: 1, segmentId: 'kix.h1' }, text: 'New' } }
    ]);
  });

  it('only inserts into an empty section', () => {
    expect(buildSectionWriteRequests('kix.f1', [paragraph('\n', 1)], 'Page')).toEqual([
      { insertText: { location: { index: 1, segmentId: 'kix.f1' }, text: 'Page' } }
    ]);
    expect(buildSectionWriteRequests('kix.new', [], 'Page')).toEqual([
      { insertText: { location: { index: 1, segmentId: 'kix.new' }, text: 'Page' } }
    ]);
  });

  it('never writes at position 0 of a section', () => {
    expect(buildSectionWriteRequests('kix.h2', [paragraph('Title\n', 0)], 'New')).toEqual([
      { deleteContentRange: { range: { startIndex: 1, endIndex: 5, segmentId: 'kix.h2' } } },
      { insertText: { location: { index: 1, segmentId: 'kix.h2' }, text: 'New' } }
    ]);
  });
});

describe('HeaderFooterManager', () => {
  it('replaces the text of an existing header', async () => {
    const service = new FakeDocumentService(withHeader);

    const result = await new HeaderFooterManager(service).upsertHeaderFooter(DOC_ID, 'header', 'Quarterly report');

    expect(service.batches).toEqual([[
      { deleteContentRange: { range: { startIndex: 1, endIndex: 11, segmentId: 'kix.h1' } } },
      { insertText: { location: { index: 1, segmentId: 'kix.h1' }, text: 'Quarterly report' } }
    ]]);
    expect(result).toEqual({
      success: true,
      message: 'Updated DEFAULT header with 16 characters',
      sectionId: 'kix.h1',
      created: false
    });
  });

  it('creates a missing default footer and writes into it', async () => {
    const service = new FakeDocumentService(withHeader).replyWith({ replies: [{ createFooter: { footerId: 'kix.f2' } }] });

    const result = await new HeaderFooterManager(service).upsertHeaderFooter(DOC_ID, 'footer', 'Confidential');

    expect(service.batches).toEqual([
      [{ createFooter: { type: 'DEFAULT' } }],
      [{ insertText: { location: { index: 1, segmentId: 'kix.f2' }, text: 'Confidential' } }]
    ]);
    expect(result.created).toBe(true);
    expect(result.sectionId).toBe('kix.f2');
  });

  it('writes into an existing first-page footer', async () => {
    const service = new FakeDocumentService(withHeader);

    const result = await new HeaderFooterManager(service).upsertHeaderFooter(DOC_ID, 'footer', 'Cover', 'FIRST_PAGE_ONLY');

    expect(result.sectionId).toBe('kix.f1');
    expect(service.batches).toHaveLength(1);
  });

  it('refuses to create a non-default variant', async () => {
    const service = new FakeDocumentService(withHeader);

    await expect(
      new HeaderFooterManager(service).upsertHeaderFooter(DOC_ID, 'header', 'Even', 'EVEN_PAGE')
    ).rejects.toBeInstanceOf(DocsValidationError);
    expect(service.batches).toHaveLength(0);
  });

  it('fails when the service returns no id for a created section', async () => {
    const service = new FakeDocumentService({}).replyWith({ replies: [{}] });

    const attempt = new HeaderFooterManager(service).upsertHeaderFooter(DOC_ID, 'header', 'Title');

    await expect(attempt).rejects.toBeInstanceOf(DocsServiceError);
    await expect(attempt).rejects.toThrow('Create header failed: service returned no header id');
  });

  it('wraps write failures', async () => {
    const service = new FakeDocumentService(withHeader).failWith(apiError(500, 'Backend error'));

    await expect(
      new HeaderFooterManager(service).upsertHeaderFooter(DOC_ID, 'header', 'Title')
    ).rejects.toThrow('Write header failed: Backend error');
  });

  it('rejects empty content', async () => {
    const service = new FakeDocumentService(withHeader);

    await expect(new HeaderFooterManager(service).upsertHeaderFooter(DOC_ID, 'header', '')).rejects.toThrow(
      'Text content cannot be empty'
    );
    expect(service.reads).toHaveLength(0);
  });
});
