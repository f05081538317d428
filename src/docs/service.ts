/**
 * Document service handle
 * The compiler and managers talk to the remote document only through this
 * interface: read the current tree, submit one batch, get its replies.
 * Authentication and transport retries stay with whoever builds the handle.
 */
import { docs_v1 } from 'googleapis';
import { recordBatch } from '../metrics/cloudwatch.js';
import type { DocsRequest } from './types.js';

export interface GetDocumentOptions {
  includeTabsContent?: boolean;
}

export interface DocumentService {
  getDocument(documentId: string, options?: GetDocumentOptions): Promise<docs_v1.Schema$Document>;
  batchUpdate(documentId: string, requests: readonly DocsRequest[]): Promise<docs_v1.Schema$BatchUpdateDocumentResponse>;
}

// Google API limits batch size
const MAX_BATCH_UPDATE_REQUESTS = 50;

/**
 * DocumentService backed by the googleapis Docs client
 */
export function createDocumentService(docs: docs_v1.Docs): DocumentService {
  return {
    async getDocument(documentId, options = {}) {
      const response = await docs.documents.get({
        documentId,
        includeTabsContent: options.includeTabsContent ?? false
      });
      return response.data;
    },

    async batchUpdate(documentId, requests) {
      if (requests.length === 0) {
        return { documentId, replies: [] };
      }
      if (requests.length > MAX_BATCH_UPDATE_REQUESTS) {
        console.warn(`[Docs] Batch update with ${requests.length} requests exceeds typical limits for doc ${documentId}`);
      }

      recordBatch(requests.length);
      const response = await docs.documents.batchUpdate({
        documentId,
        requestBody: { requests: [...requests] }
      });
      return response.data;
    }
  };
}
