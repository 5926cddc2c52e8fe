/**
 * Type definitions for the Docs & Drive MCP server
 */

/**
 * Result type for operations that can succeed or fail
 * Replaces exceptions with explicit error handling
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Log levels for the logging system
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * How the server obtains its Google identity
 * - oauth: browser consent once, then a refreshable token file
 * - service_account: key file read at every start, nothing persisted
 */
export type AuthMode = 'oauth' | 'service_account';

/**
 * Node of a document content tree
 *
 * Mirrors the structural elements of a Google Docs body. Elements of any
 * other kind (table of contents, etc.) are kept as `other` and carry no text.
 */
export type ContentNode =
  | { kind: 'paragraph'; runs: string[] }
  | { kind: 'table'; rows: ContentNode[][][] }
  | { kind: 'sectionBreak' }
  | { kind: 'other' };

/**
 * Single mutation sent in a document batch update
 * Ranges are half-open: [startIndex, endIndex)
 */
export type EditOperation =
  | { kind: 'insert'; index: number; text: string }
  | { kind: 'delete'; startIndex: number; endIndex: number };

/**
 * Tab lookup failure, with the ids that do exist
 */
export interface TabNotFound {
  tabId: string;
  availableTabIds: string[];
}
