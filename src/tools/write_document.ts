import { z } from 'zod';
import { applyEdits, getDocument } from '../services/docs.js';
import { endOfBody, selectBody } from '../services/document-content.js';
import { toErrorMessage } from '../services/errors.js';
import type { EditOperation } from '../types/index.js';
import { info } from '../utils/logger.js';
import { ToolContext, ToolResponse, ToolSchema, WriteDocumentInput, textResponse } from './types.js';

export const schema: ToolSchema = {
  name: 'write_document',
  description:
    'Write content to a Google Docs document: insert at an index (default: end of document or tab) or replace a range',
  inputSchema: {
    type: 'object',
    properties: {
      document_id: {
        type: 'string',
        description: 'Google Docs document ID',
      },
      content: {
        type: 'string',
        description: 'Text to write',
      },
      tab_id: {
        type: 'string',
        description: 'Tab ID to write to (default: main document)',
      },
      insert_index: {
        type: 'integer',
        description: 'Index where to insert content (default: end of document)',
      },
      replace_start: {
        type: 'integer',
        description: 'Start index of the range to replace (requires replace_end)',
      },
      replace_end: {
        type: 'integer',
        description: 'End index (exclusive) of the range to replace (requires replace_start)',
      },
    },
    required: ['document_id', 'content'],
  },
};

export const input: z.ZodType<WriteDocumentInput, z.ZodTypeDef, unknown> = z.object({
  document_id: z.string().min(1),
  content: z.string(),
  tab_id: z.string().optional(),
  insert_index: z.number().int().min(0).optional(),
  replace_start: z.number().int().min(0).optional(),
  replace_end: z.number().int().min(0).optional(),
});

/**
 * Edits to apply, with the sentence describing them
 */
interface EditPlan {
  operations: EditOperation[];
  description: string;
}

/**
 * Delete then insert at the same start: the insert offset refers to the text
 * after the range is gone.
 */
export function planReplace(content: string, start: number, end: number): EditPlan {
  return {
    operations: [
      { kind: 'delete', startIndex: start, endIndex: end },
      { kind: 'insert', index: start, text: content },
    ],
    description: `Replaced content from index ${start} to ${end}`,
  };
}

export function planInsert(content: string, index: number): EditPlan {
  return {
    operations: [{ kind: 'insert', index, text: content }],
    description: `Inserted content at index ${index}`,
  };
}

function writeFailure(error: unknown): ToolResponse {
  return textResponse(`Error writing to document: ${toErrorMessage(error)}`, true);
}

/**
 * Inserts or replaces text in a document
 * Never throws: API failures come back as error text.
 */
export async function writeDocument(context: ToolContext, args: WriteDocumentInput): Promise<ToolResponse> {
  try {
    const docs = await context.google.getDocsService();
    const document = await getDocument(docs, args.document_id, Boolean(args.tab_id));
    if (!document.ok) {
      return writeFailure(document.error);
    }

    let plan: EditPlan;
    if (args.replace_start !== undefined && args.replace_end !== undefined) {
      plan = planReplace(args.content, args.replace_start, args.replace_end);
    } else {
      let index = args.insert_index;
      if (index === undefined) {
        const body = selectBody(document.value, args.tab_id);
        if (!body.ok) {
          return textResponse(`Tab '${body.error.tabId}' not found`);
        }
        index = endOfBody(body.value);
      }
      plan = planInsert(args.content, index);
    }

    const result = await applyEdits(docs, args.document_id, plan.operations, args.tab_id);
    if (!result.ok) {
      return writeFailure(result.error);
    }

    const title = document.value.title || 'Untitled';
    info('Document updated', {
      module: 'write-document',
      documentId: args.document_id,
      tabId: args.tab_id,
      operation: plan.operations.map((operation) => operation.kind).join('+'),
      characters: args.content.length,
    });

    return textResponse(
      `Successfully wrote to document '${title}'. ${plan.description}. ${args.content.length} characters written.`
    );
  } catch (error) {
    return writeFailure(error);
  }
}
