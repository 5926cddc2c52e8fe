/**
 * Tool system types for MCP server
 */

import type { z } from 'zod';
import type { GoogleServiceProvider } from '../services/google-auth.js';

/**
 * Everything a tool handler may reach, built once at startup
 */
export interface ToolContext {
  google: GoogleServiceProvider;
}

/**
 * JSON Schema advertised to MCP clients
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required: string[];
}

export interface ToolSchema {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface Tool<T> extends ToolSchema {
  /** Validates raw arguments and applies defaults */
  input: z.ZodType<T, z.ZodTypeDef, unknown>;
  handler: (context: ToolContext, args: T) => Promise<ToolResponse>;
}

/**
 * Tool with its argument type erased, ready for dispatch
 */
export interface RegisteredTool extends ToolSchema {
  run: (context: ToolContext, args: unknown) => Promise<ToolResponse>;
}

export interface ToolResponse {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError: boolean;
}

// Input types for each tool
export interface ListFilesInput {
  folder_id?: string;
  page_size: number;
  page_token?: string;
  mime_type?: string;
}

export interface SearchFilesInput {
  query: string;
  page_size: number;
  page_token?: string;
}

export interface ReadDocumentInput {
  document_id: string;
  tab_id?: string;
  start_index: number;
  length: number;
}

export interface WriteDocumentInput {
  document_id: string;
  content: string;
  tab_id?: string;
  insert_index?: number;
  replace_start?: number;
  replace_end?: number;
}

/**
 * Plain-text tool response
 */
export function textResponse(text: string, isError: boolean = false): ToolResponse {
  return {
    content: [{ type: 'text', text }],
    isError,
  };
}
