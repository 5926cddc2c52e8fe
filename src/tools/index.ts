import { schema as listFilesSchema, input as listFilesInput, listFiles } from './list_files.js';
import { schema as searchFilesSchema, input as searchFilesInput, searchFiles } from './search_files.js';
import { schema as readDocumentSchema, input as readDocumentInput, readDocument } from './read_document.js';
import { schema as writeDocumentSchema, input as writeDocumentInput, writeDocument } from './write_document.js';
import { RegisteredTool, Tool, textResponse } from './types.js';

/**
 * Erases a tool's argument type behind validation
 * Invalid arguments yield an error response naming each offending field.
 */
export function registerTool<T>(tool: Tool<T>): RegisteredTool {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    run: async (context, args) => {
      const parsed = tool.input.safeParse(args ?? {});
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
          .join('; ');
        return textResponse(`Invalid arguments for ${tool.name}: ${issues}`, true);
      }
      return tool.handler(context, parsed.data);
    },
  };
}

export const tools: RegisteredTool[] = [
  registerTool({
    ...listFilesSchema,
    input: listFilesInput,
    handler: listFiles,
  }),
  registerTool({
    ...searchFilesSchema,
    input: searchFilesInput,
    handler: searchFiles,
  }),
  registerTool({
    ...readDocumentSchema,
    input: readDocumentInput,
    handler: readDocument,
  }),
  registerTool({
    ...writeDocumentSchema,
    input: writeDocumentInput,
    handler: writeDocument,
  }),
];
