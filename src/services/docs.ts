/**
 * Google Docs API wrapper
 * Document retrieval and batch edits
 */

import type { docs_v1 } from 'googleapis';
import type { EditOperation, Result } from '../types/index.js';
import { toError } from './errors.js';
import { debug } from '../utils/logger.js';

/**
 * Fetches a document
 *
 * Tab content is only returned by the API when asked for, and then the
 * top-level body is left empty; request it only when a tab is targeted.
 *
 * @param docs - Docs v1 handle
 * @param documentId - Document ID
 * @param includeTabsContent - Populate `tabs` instead of `body`
 */
export async function getDocument(
  docs: docs_v1.Docs,
  documentId: string,
  includeTabsContent: boolean
): Promise<Result<docs_v1.Schema$Document, Error>> {
  try {
    const response = await docs.documents.get(
      includeTabsContent ? { documentId, includeTabsContent } : { documentId }
    );
    debug('Fetched document', { module: 'docs', phase: 'get', documentId, includeTabsContent });
    return { ok: true, value: response.data };
  } catch (error) {
    return {
      ok: false,
      error: toError(error),
    };
  }
}

/**
 * Converts edit operations to API requests, preserving order
 *
 * @param operations - Edits to convert
 * @param tabId - Tab the offsets refer to, if any
 */
export function toRequests(operations: EditOperation[], tabId?: string): docs_v1.Schema$Request[] {
  const tab = tabId ? { tabId } : {};

  return operations.map((operation): docs_v1.Schema$Request => {
    switch (operation.kind) {
      case 'insert':
        return {
          insertText: {
            location: { index: operation.index, ...tab },
            text: operation.text,
          },
        };
      case 'delete':
        return {
          deleteContentRange: {
            range: { startIndex: operation.startIndex, endIndex: operation.endIndex, ...tab },
          },
        };
    }
  });
}

/**
 * Applies edits to a document in one atomic batch update
 */
export async function applyEdits(
  docs: docs_v1.Docs,
  documentId: string,
  operations: EditOperation[],
  tabId?: string
): Promise<Result<docs_v1.Schema$BatchUpdateDocumentResponse, Error>> {
  try {
    const response = await docs.documents.batchUpdate({
      documentId,
      requestBody: { requests: toRequests(operations, tabId) },
    });
    debug('Applied edits', { module: 'docs', phase: 'batch-update', documentId, operationCount: operations.length });
    return { ok: true, value: response.data };
  } catch (error) {
    return {
      ok: false,
      error: toError(error),
    };
  }
}
