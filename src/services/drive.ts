/**
 * Google Drive listing helpers
 * Query construction, page retrieval and text formatting for file listings
 */

import type { drive_v3 } from 'googleapis';
import type { Result } from '../types/index.js';
import { toError } from './errors.js';
import { debug } from '../utils/logger.js';

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

/** Metadata requested for every listed file */
export const FILE_FIELDS = 'nextPageToken, files(id, name, mimeType, modifiedTime, size, parents)';

/**
 * One page of a listing
 */
export interface FilePage {
  files: drive_v3.Schema$File[];
  nextPageToken?: string;
}

/**
 * Clamps a page size to the API ceiling; no lower bound is applied
 */
export function clampPageSize(pageSize: number): number {
  return Math.min(pageSize, MAX_PAGE_SIZE);
}

/**
 * Query for the direct children of a folder (root when omitted)
 *
 * @param folderId - Parent folder ID
 * @param mimeType - Optional exact MIME type filter
 */
export function buildFolderQuery(folderId?: string, mimeType?: string): string {
  const parts = [folderId ? `'${folderId}' in parents` : "'root' in parents"];

  if (mimeType) {
    parts.push(`mimeType='${mimeType}'`);
  }

  parts.push('trashed=false');
  return parts.join(' and ');
}

/**
 * Wraps a raw Drive query so trashed files are excluded
 */
export function buildSearchQuery(query: string): string {
  return `(${query}) and trashed=false`;
}

/**
 * Fetches one page of files matching a query
 *
 * @param drive - Drive v3 handle
 * @param q - Drive query string
 * @param pageSize - Page size, already clamped
 * @param pageToken - Continuation token from a previous page
 */
export async function listFilePage(
  drive: drive_v3.Drive,
  q: string,
  pageSize: number,
  pageToken?: string
): Promise<Result<FilePage, Error>> {
  try {
    const response = await drive.files.list({
      q,
      pageSize,
      pageToken,
      fields: FILE_FIELDS,
    });

    const files = response.data.files || [];
    debug('Listed files', { module: 'drive', phase: 'list', q, fileCount: files.length });

    return {
      ok: true,
      value: {
        files,
        nextPageToken: response.data.nextPageToken || undefined,
      },
    };
  } catch (error) {
    return {
      ok: false,
      error: toError(error),
    };
  }
}

/**
 * Formats a page as text: count, optional continuation token, one block per file
 */
export function formatFilePage(page: FilePage): string[] {
  const lines = [`Found ${page.files.length} files`];

  if (page.nextPageToken) {
    lines.push(`Next page token: ${page.nextPageToken}`);
  }
  lines.push('');

  for (const file of page.files) {
    const size = file.size ? ` (${file.size} bytes)` : '';
    lines.push(`- ${file.name} (ID: ${file.id})`);
    lines.push(`  Type: ${file.mimeType || 'Unknown'}${size}`);
    lines.push(`  Modified: ${file.modifiedTime || 'Unknown'}`);
    lines.push('');
  }

  return lines;
}
