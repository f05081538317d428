/**
 * Docs API client factory
 * Creates per-user authenticated Docs clients
 */
import { google, docs_v1 } from 'googleapis';
import type { UserContext } from '../auth/middleware.js';
import { googleConfig } from '../config/server.js';
import { createDocumentService, type DocumentService } from './service.js';

/**
 * Create Docs API client with user's access token
 */
export function createDocsClient(userContext: UserContext): docs_v1.Docs {
  const oauth2Client = new google.auth.OAuth2(
    googleConfig.clientId,
    googleConfig.clientSecret
  );

  oauth2Client.setCredentials({
    access_token: userContext.accessToken
  });

  return google.docs({ version: 'v1', auth: oauth2Client });
}

export function createDocsService(userContext: UserContext): DocumentService {
  return createDocumentService(createDocsClient(userContext));
}
