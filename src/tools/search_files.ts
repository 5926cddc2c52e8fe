import { z } from 'zod';
import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  buildSearchQuery,
  clampPageSize,
  formatFilePage,
  listFilePage,
} from '../services/drive.js';
import { SearchFilesInput, ToolContext, ToolResponse, ToolSchema, textResponse } from './types.js';

export const schema: ToolSchema = {
  name: 'search_files',
  description: 'Search for files in Google Drive with pagination',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: `Drive search query (e.g. 'name contains "report"')`,
      },
      page_size: {
        type: 'integer',
        description: `Number of files per page (default ${DEFAULT_PAGE_SIZE}, max ${MAX_PAGE_SIZE})`,
      },
      page_token: {
        type: 'string',
        description: 'Token for the next page of results (from a previous response)',
      },
    },
    required: ['query'],
  },
};

export const input: z.ZodType<SearchFilesInput, z.ZodTypeDef, unknown> = z.object({
  query: z.string(),
  page_size: z.number().int().default(DEFAULT_PAGE_SIZE),
  page_token: z.string().optional(),
});

export async function searchFiles(context: ToolContext, args: SearchFilesInput): Promise<ToolResponse> {
  const drive = await context.google.getDriveService();

  const result = await listFilePage(
    drive,
    buildSearchQuery(args.query),
    clampPageSize(args.page_size),
    args.page_token
  );
  if (!result.ok) {
    throw result.error;
  }

  const lines = [`Search results for: ${args.query}`, ...formatFilePage(result.value)];
  return textResponse(lines.join('\n'));
}
