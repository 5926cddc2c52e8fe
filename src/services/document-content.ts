/**
 * Google Docs content tree helpers
 * Converts API structural elements to ContentNode and flattens them to text
 */

import type { docs_v1 } from 'googleapis';
import type { ContentNode, Result, TabNotFound } from '../types/index.js';

/** Listed in place of a tab that carries no id */
const UNNAMED_TAB = 'main';

/** Insertion point of an empty body (index 0 is reserved by the API) */
const EMPTY_BODY_END_INDEX = 1;

/**
 * Converts API structural elements into content nodes
 * First match wins: paragraph, then table, then section break.
 */
export function toContentNodes(
  elements: docs_v1.Schema$StructuralElement[] | null | undefined
): ContentNode[] {
  return (elements ?? []).map(toContentNode);
}

function toContentNode(element: docs_v1.Schema$StructuralElement): ContentNode {
  if (element.paragraph) {
    const runs = (element.paragraph.elements ?? []).flatMap((part) =>
      part.textRun ? [part.textRun.content ?? ''] : []
    );
    return { kind: 'paragraph', runs };
  }

  if (element.table) {
    const rows = (element.table.tableRows ?? []).map((row) =>
      (row.tableCells ?? []).map((cell) => toContentNodes(cell.content))
    );
    return { kind: 'table', rows };
  }

  if (element.sectionBreak) {
    return { kind: 'sectionBreak' };
  }

  return { kind: 'other' };
}

/**
 * Flattens a content tree to plain text, depth-first in document order
 *
 * Paragraphs contribute their text runs, tables their cells row by row,
 * section breaks a single newline, anything else nothing.
 */
export function flattenContent(nodes: ContentNode[]): string {
  return nodes.map(flattenNode).join('');
}

function flattenNode(node: ContentNode): string {
  switch (node.kind) {
    case 'paragraph':
      return node.runs.join('');
    case 'table':
      return node.rows.map((cells) => cells.map(flattenContent).join('')).join('');
    case 'sectionBreak':
      return '\n';
    case 'other':
      return '';
  }
}

/**
 * Plain text of a document body
 */
export function extractText(body: docs_v1.Schema$Body | null | undefined): string {
  return flattenContent(toContentNodes(body?.content));
}

/**
 * End offset of the last top-level element of a body
 * Falls back to 1 for an empty body or an element without endIndex.
 */
export function endOfBody(body: docs_v1.Schema$Body | null | undefined): number {
  const content = body?.content ?? [];
  const last = content[content.length - 1];
  return last?.endIndex ?? EMPTY_BODY_END_INDEX;
}

/**
 * All tabs of a document, nested child tabs following their parent
 */
export function listTabs(document: docs_v1.Schema$Document): docs_v1.Schema$Tab[] {
  const walk = (tabs: docs_v1.Schema$Tab[] | null | undefined): docs_v1.Schema$Tab[] =>
    (tabs ?? []).flatMap((tab) => [tab, ...walk(tab.childTabs)]);
  return walk(document.tabs);
}

/**
 * Finds a tab by id
 */
export function findTab(
  document: docs_v1.Schema$Document,
  tabId: string
): Result<docs_v1.Schema$Tab, TabNotFound> {
  const tabs = listTabs(document);
  const match = tabs.find((tab) => tab.tabProperties?.tabId === tabId);

  if (!match) {
    return {
      ok: false,
      error: {
        tabId,
        availableTabIds: tabs.map((tab) => tab.tabProperties?.tabId ?? UNNAMED_TAB),
      },
    };
  }

  return { ok: true, value: match };
}

/**
 * Body of the given tab, or of the document when no tab is given
 */
export function selectBody(
  document: docs_v1.Schema$Document,
  tabId?: string
): Result<docs_v1.Schema$Body | undefined, TabNotFound> {
  if (!tabId) {
    return { ok: true, value: document.body ?? undefined };
  }

  const tab = findTab(document, tabId);
  if (!tab.ok) {
    return tab;
  }

  return { ok: true, value: tab.value.documentTab?.body ?? undefined };
}
