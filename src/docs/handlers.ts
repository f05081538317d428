/**
 * Docs MCP tool handlers
 * Implements docs_get_content, docs_modify_content, docs_insert_elements and
 * docs_manage_operations
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AuthInfo } from '@modelcontextprotocol/sdk/server/auth/types.js';
import type { UserContext } from '../auth/middleware.js';
import { createDriveClient, createDriveFileLookup } from '../drive/client.js';
import { recordServiceError } from '../metrics/cloudwatch.js';
import { createDocsService } from './client.js';
import { DocsValidationError, getErrorCode, getErrorMessage } from './errors.js';
import {
  getDocumentContent,
  insertElements,
  manageOperations,
  modifyContent,
  type DocsToolContext
} from './operations.js';
import {
  documentIdSchema,
  insertElementsPayloadSchema,
  manageOperationsPayloadSchema,
  modifyContentPayloadSchema
} from './schemas.js';
import type { DocsErrorResult } from './types.js';

type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: true;
};

export type DocsContextFactory = (userContext: UserContext) => DocsToolContext;

export const createDocsToolContext: DocsContextFactory = (userContext) => ({
  service: createDocsService(userContext),
  drive: createDriveFileLookup(createDriveClient(userContext))
});

/**
 * Extract user context from the auth info the transport attached to the request
 */
export function getUserContext(extra: { authInfo?: AuthInfo }): UserContext | null {
  const token = extra.authInfo?.token;
  if (!token) return null;
  return { accessToken: token };
}

function errorResponse(result: DocsErrorResult): ToolResponse {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(result, null, 2)
    }],
    isError: true
  };
}

function jsonResponse(result: object): ToolResponse {
  return {
    content: [{
      type: 'text',
      text: JSON.stringify(result, null, 2)
    }]
  };
}

/**
 * Handle Docs API errors and return appropriate MCP response
 */
export function handleDocsError(error: unknown): ToolResponse {
  const message = getErrorMessage(error) || 'Unknown Docs API error';

  if (error instanceof DocsValidationError) {
    return errorResponse({ error: 'invalid_request', code: 400, message });
  }

  const code = getErrorCode(error);
  recordServiceError();
  console.error(`[Docs] API error (${code}): ${message}`);

  // Token expiration - the caller must obtain a fresh token upstream
  if (code === 401) {
    return errorResponse({
      error: 'token_expired',
      code: 401,
      message: 'Access token expired. Please re-authenticate and retry with a fresh token.'
    });
  }

  if (code === 403) {
    if (message.includes('rate') || message.includes('quota') || message.includes('limit')) {
      return errorResponse({
        error: 'rate_limited',
        code: 403,
        message: 'Docs API rate limit exceeded. Please wait and try again.'
      });
    }

    return errorResponse({
      error: 'insufficient_scope',
      code: 403,
      message: 'Docs access not authorized. Please re-authenticate to grant Docs permissions.'
    });
  }

  if (code === 404) {
    return errorResponse({
      error: 'document_not_found',
      code: 404,
      message: 'Document not found or you do not have permission to access it.'
    });
  }

  return errorResponse({ error: 'docs_api_error', code, message });
}

const missingUserContext: ToolResponse = {
  content: [{ type: 'text', text: 'Error: No user context. Please authenticate.' }],
  isError: true
};

/**
 * Register Docs tools with MCP server
 */
export function registerDocsHandlers(
  server: McpServer,
  createContext: DocsContextFactory = createDocsToolContext
): void {
  // docs_get_content - Read text content from a Google Doc or a Drive file
  server.registerTool('docs_get_content', {
    description: 'Read text content from a Google Doc including content from all document tabs. '
      + 'Other Drive files are downloaded and read as UTF-8 text. The text starts with a file metadata header.',
    inputSchema: {
      documentId: documentIdSchema
    }
  }, async ({ documentId }, extra) => {
    const userContext = getUserContext(extra);
    if (!userContext) return missingUserContext;

    try {
      return jsonResponse(await getDocumentContent(createContext(userContext), documentId));
    } catch (error) {
      return handleDocsError(error);
    }
  });

  // docs_modify_content - Edit text, find/replace, or write headers and footers
  server.registerTool('docs_modify_content', {
    description: 'Modify document content: insert or replace text with optional formatting (edit_text), '
      + 'replace all occurrences of a string (find_replace), or write a header or footer (headers_footers). '
      + 'Index 0 is the section marker and cannot be edited; inserts there land at index 1.',
    inputSchema: {
      documentId: documentIdSchema,
      payload: modifyContentPayloadSchema
    }
  }, async ({ documentId, payload }, extra) => {
    const userContext = getUserContext(extra);
    if (!userContext) return missingUserContext;

    try {
      return jsonResponse(await modifyContent(createContext(userContext), documentId, payload));
    } catch (error) {
      return handleDocsError(error);
    }
  });

  // docs_insert_elements - Insert tables, lists, page breaks and images
  server.registerTool('docs_insert_elements', {
    description: 'Insert elements into a Google Doc: an empty table, a list item or a page break (text_elements), '
      + 'an image from a public URL or Drive file (image), or a table filled with data (table)',
    inputSchema: {
      documentId: documentIdSchema,
      payload: insertElementsPayloadSchema
    }
  }, async ({ documentId, payload }, extra) => {
    const userContext = getUserContext(extra);
    if (!userContext) return missingUserContext;

    try {
      return jsonResponse(await insertElements(createContext(userContext), documentId, payload));
    } catch (error) {
      return handleDocsError(error);
    }
  });

  // docs_manage_operations - Raw batches and structure inspection
  server.registerTool('docs_manage_operations', {
    description: 'Submit a batch of primitive operations as-is (batch_update), report document structure '
      + '(inspect_structure), or list the cell ranges and insertion indices of a table (debug_table)',
    inputSchema: {
      documentId: documentIdSchema,
      payload: manageOperationsPayloadSchema
    }
  }, async ({ documentId, payload }, extra) => {
    const userContext = getUserContext(extra);
    if (!userContext) return missingUserContext;

    try {
      return jsonResponse(await manageOperations(createContext(userContext), documentId, payload));
    } catch (error) {
      return handleDocsError(error);
    }
  });

  console.log('[MCP] Docs handlers registered: docs_get_content, docs_modify_content, docs_insert_elements, docs_manage_operations');
}
