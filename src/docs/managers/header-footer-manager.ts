/**
 * Header and footer upsert
 * Locates the section of the requested variant, creates it when missing,
 * then replaces its text. Sections have their own index space and are
 * addressed by segmentId.
 */
import { docs_v1 } from 'googleapis';
import { DocsServiceError, DocsValidationError, wrapServiceError } from '../errors.js';
import { toInsertionIndex } from '../ranges.js';
import { createDeleteRangeRequest, createInsertTextRequest, createSectionRequest } from '../requests.js';
import type { DocumentService } from '../service.js';
import type { EditOperation, HeaderFooterResult, HeaderFooterVariant, SectionType } from '../types.js';
import { validateHeaderFooterParams, validateTextContent } from './validation.js';

type SectionIdReader = (style: docs_v1.Schema$DocumentStyle) => string | null | undefined;

const SECTION_ID_READERS: Record<SectionType, Record<HeaderFooterVariant, SectionIdReader>> = {
  header: {
    DEFAULT: (style) => style.defaultHeaderId,
    FIRST_PAGE_ONLY: (style) => style.firstPageHeaderId,
    EVEN_PAGE: (style) => style.evenPageHeaderId
  },
  footer: {
    DEFAULT: (style) => style.defaultFooterId,
    FIRST_PAGE_ONLY: (style) => style.firstPageFooterId,
    EVEN_PAGE: (style) => style.evenPageFooterId
  }
};

/**
 * Id of the existing section of the requested variant, if any
 */
export function locateSection(
  doc: docs_v1.Schema$Document,
  sectionType: SectionType,
  variant: HeaderFooterVariant
): string | undefined {
  const style = doc.documentStyle;
  if (!style) return undefined;
  const sectionId = SECTION_ID_READERS[sectionType][variant](style);
  if (!sectionId) return undefined;

  const segments = sectionType === 'header' ? doc.headers : doc.footers;
  return segments && sectionId in segments ? sectionId : undefined;
}

function sectionContent(
  doc: docs_v1.Schema$Document,
  sectionType: SectionType,
  sectionId: string
): docs_v1.Schema$StructuralElement[] {
  const segments = sectionType === 'header' ? doc.headers : doc.footers;
  return segments?.[sectionId]?.content ?? [];
}

/**
 * Requests that replace a section's text with content. Writing targets index
 * 1 of the section's own index space, which sits past the segment start the
 * same way the body does. Everything from there up to the final newline is
 * deleted, then the new content is inserted.
 */
export function buildSectionWriteRequests(
  segmentId: string,
  existing: docs_v1.Schema$StructuralElement[],
  content: string
): EditOperation[] {
  const writeIndex = toInsertionIndex(existing[0]?.startIndex ?? 0);
  const endIndex = existing[existing.length - 1]?.endIndex ?? writeIndex + 1;
  const requests: EditOperation[] = [];

  if (endIndex - 1 > writeIndex) {
    requests.push(createDeleteRangeRequest(writeIndex, endIndex - 1, { segmentId }));
  }
  requests.push(createInsertTextRequest(writeIndex, content, { segmentId }));
  return requests;
}

function createdSectionId(
  response: docs_v1.Schema$BatchUpdateDocumentResponse,
  sectionType: SectionType
): string | undefined {
  const reply = response.replies?.[0];
  const sectionId = sectionType === 'header' ? reply?.createHeader?.headerId : reply?.createFooter?.footerId;
  return sectionId ?? undefined;
}

export class HeaderFooterManager {
  constructor(private readonly service: DocumentService) {}

  /**
   * Write content into the header or footer of the given variant, creating
   * the section first when the document has none. Running it twice with the
   * same content leaves the document as running it once.
   */
  async upsertHeaderFooter(
    documentId: string,
    sectionType: SectionType,
    content: string,
    variant: HeaderFooterVariant = 'DEFAULT'
  ): Promise<HeaderFooterResult> {
    validateHeaderFooterParams(sectionType, variant);
    validateTextContent(content);

    let doc: docs_v1.Schema$Document;
    try {
      doc = await this.service.getDocument(documentId);
    } catch (error) {
      throw wrapServiceError(`Read document for ${sectionType}`, error);
    }

    let sectionId = locateSection(doc, sectionType, variant);
    let existing: docs_v1.Schema$StructuralElement[] = [];
    let created = false;

    if (sectionId) {
      existing = sectionContent(doc, sectionType, sectionId);
    } else {
      if (variant !== 'DEFAULT') {
        throw new DocsValidationError(
          `Document has no ${variant} ${sectionType}. Only DEFAULT sections can be created; enable the ${variant} ${sectionType} in the document's page setup first.`
        );
      }
      sectionId = await this.createSection(documentId, sectionType);
      created = true;
    }

    try {
      await this.service.batchUpdate(documentId, buildSectionWriteRequests(sectionId, existing, content));
    } catch (error) {
      throw wrapServiceError(`Write ${sectionType}`, error);
    }

    console.log(`[HeaderFooter] ${created ? 'Created' : 'Updated'} ${variant} ${sectionType} ${sectionId} in doc ${documentId}`);

    return {
      success: true,
      message: `${created ? 'Created' : 'Updated'} ${variant} ${sectionType} with ${content.length} characters`,
      sectionId,
      created
    };
  }

  private async createSection(documentId: string, sectionType: SectionType): Promise<string> {
    const operation = `Create ${sectionType}`;
    let response: docs_v1.Schema$BatchUpdateDocumentResponse;
    try {
      response = await this.service.batchUpdate(documentId, [createSectionRequest(sectionType)]);
    } catch (error) {
      throw wrapServiceError(operation, error);
    }

    const sectionId = createdSectionId(response, sectionType);
    if (!sectionId) {
      throw new DocsServiceError(operation, `service returned no ${sectionType} id`, 502);
    }
    return sectionId;
  }
}
