import { z } from 'zod';
import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  buildFolderQuery,
  clampPageSize,
  formatFilePage,
  listFilePage,
} from '../services/drive.js';
import { ListFilesInput, ToolContext, ToolResponse, ToolSchema, textResponse } from './types.js';

export const schema: ToolSchema = {
  name: 'list_files',
  description: 'List files in Google Drive with optional folder filtering and pagination',
  inputSchema: {
    type: 'object',
    properties: {
      folder_id: {
        type: 'string',
        description: 'Folder ID to list files from (default: root)',
      },
      page_size: {
        type: 'integer',
        description: `Number of files per page (default ${DEFAULT_PAGE_SIZE}, max ${MAX_PAGE_SIZE})`,
      },
      page_token: {
        type: 'string',
        description: 'Token for the next page of results (from a previous response)',
      },
      mime_type: {
        type: 'string',
        description: "Filter by MIME type (e.g. 'application/vnd.google-apps.document')",
      },
    },
    required: [],
  },
};

export const input: z.ZodType<ListFilesInput, z.ZodTypeDef, unknown> = z.object({
  folder_id: z.string().optional(),
  page_size: z.number().int().default(DEFAULT_PAGE_SIZE),
  page_token: z.string().optional(),
  mime_type: z.string().optional(),
});

/**
 * Lists the direct children of a folder
 * Drive errors are not caught here; they reach the dispatcher.
 */
export async function listFiles(context: ToolContext, args: ListFilesInput): Promise<ToolResponse> {
  const drive = await context.google.getDriveService();
  const query = buildFolderQuery(args.folder_id, args.mime_type);

  const result = await listFilePage(drive, query, clampPageSize(args.page_size), args.page_token);
  if (!result.ok) {
    throw result.error;
  }

  return textResponse(formatFilePage(result.value).join('\n'));
}
