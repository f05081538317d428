/**
 * Image sources for insertInlineImage. A source is either a public http(s)
 * URL, used as-is, or a Drive file id that must name an image.
 */
import type { DriveFileLookup, DriveFileMetadata } from '../drive/client.js';
import { DocsValidationError, wrapServiceError } from './errors.js';

export interface ResolvedImage {
  uri: string;
  description: string;
}

export function isImageUrl(source: string): boolean {
  return source.startsWith('http://') || source.startsWith('https://');
}

export function driveImageUri(fileId: string): string {
  return `https://drive.google.com/uc?id=${fileId}`;
}

export async function resolveImageSource(drive: DriveFileLookup, source: string): Promise<ResolvedImage> {
  const trimmed = source.trim();
  if (!trimmed) {
    throw new DocsValidationError("'imageSource' is required for image operation");
  }
  if (isImageUrl(trimmed)) {
    return { uri: trimmed, description: 'URL image' };
  }

  let metadata: DriveFileMetadata;
  try {
    metadata = await drive.getFileMetadata(trimmed);
  } catch (error) {
    throw wrapServiceError(`Access Drive file ${trimmed}`, error);
  }

  const mimeType = metadata.mimeType ?? 'unknown';
  if (!mimeType.startsWith('image/')) {
    throw new DocsValidationError(`File ${trimmed} is not an image (MIME type: ${mimeType})`);
  }

  return {
    uri: driveImageUri(trimmed),
    description: `Drive file ${metadata.name ?? trimmed}`
  };
}
