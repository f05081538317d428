/**
 * Drive API client factory
 * Creates per-user authenticated Drive clients
 */
import { google, drive_v3 } from 'googleapis';
import type { UserContext } from '../auth/middleware.js';
import { googleConfig } from '../config/server.js';

export const GOOGLE_DOC_MIME_TYPE = 'application/vnd.google-apps.document';

export interface DriveFileMetadata {
  id: string;
  name?: string;
  mimeType?: string;
  webViewLink?: string;
}

/**
 * Drive access used by the Docs tools: metadata checks before a file is
 * referenced from a document, and raw downloads of files that are not
 * Google Docs
 */
export interface DriveFileLookup {
  getFileMetadata(fileId: string): Promise<DriveFileMetadata>;
  downloadFile(fileId: string): Promise<Buffer>;
}

/**
 * Create Drive API client with user's access token
 */
export function createDriveClient(userContext: UserContext): drive_v3.Drive {
  const oauth2Client = new google.auth.OAuth2(
    googleConfig.clientId,
    googleConfig.clientSecret
  );

  oauth2Client.setCredentials({
    access_token: userContext.accessToken
  });

  return google.drive({ version: 'v3', auth: oauth2Client });
}

export function createDriveFileLookup(drive: drive_v3.Drive): DriveFileLookup {
  return {
    async getFileMetadata(fileId) {
      const response = await drive.files.get({
        fileId,
        fields: 'id, name, mimeType, webViewLink',
        supportsAllDrives: true
      });
      return {
        id: response.data.id ?? fileId,
        name: response.data.name ?? undefined,
        mimeType: response.data.mimeType ?? undefined,
        webViewLink: response.data.webViewLink ?? undefined
      };
    },

    async downloadFile(fileId) {
      const response = await drive.files.get({
        fileId,
        alt: 'media',
        supportsAllDrives: true
      }, {
        responseType: 'stream'
      });

      // Collect stream chunks to Buffer
      const chunks: Buffer[] = [];
      for await (const chunk of response.data) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
      return Buffer.concat(chunks);
    }
  };
}
