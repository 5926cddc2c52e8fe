import { z } from 'zod';
import { getDocument } from '../services/docs.js';
import { extractText, selectBody } from '../services/document-content.js';
import { toErrorMessage } from '../services/errors.js';
import { ReadDocumentInput, ToolContext, ToolResponse, ToolSchema, textResponse } from './types.js';

export const DEFAULT_READ_LENGTH = 5000;
export const MAX_READ_LENGTH = 10000;

const DELIMITER = '='.repeat(50);

export const schema: ToolSchema = {
  name: 'read_document',
  description: 'Read content from a Google Docs document with pagination and tab selection',
  inputSchema: {
    type: 'object',
    properties: {
      document_id: {
        type: 'string',
        description: 'Google Docs document ID',
      },
      tab_id: {
        type: 'string',
        description: 'Tab ID to read from (default: main document)',
      },
      start_index: {
        type: 'integer',
        description: 'Starting character index for pagination (default 0)',
      },
      length: {
        type: 'integer',
        description: `Number of characters to read (default ${DEFAULT_READ_LENGTH}, max ${MAX_READ_LENGTH})`,
      },
    },
    required: ['document_id'],
  },
};

export const input: z.ZodType<ReadDocumentInput, z.ZodTypeDef, unknown> = z.object({
  document_id: z.string().min(1),
  tab_id: z.string().optional(),
  start_index: z.number().int().min(0).default(0),
  length: z.number().int().min(1).default(DEFAULT_READ_LENGTH),
});

function readFailure(error: unknown): ToolResponse {
  return textResponse(`Error reading document: ${toErrorMessage(error)}`, true);
}

/**
 * Reads one window of a document's plain text
 * Never throws: API failures come back as error text.
 */
export async function readDocument(context: ToolContext, args: ReadDocumentInput): Promise<ToolResponse> {
  const length = Math.min(args.length, MAX_READ_LENGTH);

  try {
    const docs = await context.google.getDocsService();
    const document = await getDocument(docs, args.document_id, Boolean(args.tab_id));
    if (!document.ok) {
      return readFailure(document.error);
    }

    const body = selectBody(document.value, args.tab_id);
    if (!body.ok) {
      return textResponse(
        `Tab '${body.error.tabId}' not found. Available tabs: ${body.error.availableTabIds.join(', ')}`
      );
    }

    const text = extractText(body.value);
    const total = text.length;

    if (args.start_index >= total) {
      return textResponse(`Start index ${args.start_index} is beyond document length (${total} characters)`);
    }

    const endIndex = Math.min(args.start_index + length, total);
    const lines = [`Document: ${document.value.title || 'Untitled'}`];
    if (args.tab_id) {
      lines.push(`Tab: ${args.tab_id}`);
    }
    lines.push(`Content (${args.start_index}-${endIndex} of ${total} characters):`);
    lines.push(DELIMITER);
    lines.push(text.slice(args.start_index, endIndex));

    if (endIndex < total) {
      lines.push(DELIMITER);
      lines.push(`More content available. Use start_index=${endIndex} to continue.`);
    }

    return textResponse(lines.join('\n'));
  } catch (error) {
    return readFailure(error);
  }
}
