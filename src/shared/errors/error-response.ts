/**
 * Error Response Utilities
 *
 * Utilities for creating structured error responses for MCP tools
 */

import { SteelError, extractErrorMessage } from './steel.error.js';

/**
 * MCP Tool Response type
 */
export interface McpToolResponse {
  [x: string]: unknown;
  content: { type: 'text'; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

/**
 * Create a structured error response for MCP tools
 *
 * @param error - Error to convert to structured response
 * @param includeStack - Whether to include stack trace (default: process.env.NODE_ENV !== 'production')
 * @returns Structured MCP tool response with isError flag
 */
export function createErrorResponse(
  error: unknown,
  includeStack: boolean = process.env.NODE_ENV !== 'production',
): McpToolResponse {
  const structured: Record<string, unknown> = SteelError.isSteelError(error)
    ? error.toJSON()
    : {
        name: error instanceof Error ? error.name : 'Error',
        message: extractErrorMessage(error),
        code: 'UNKNOWN_ERROR',
        stack: error instanceof Error ? error.stack : undefined,
      };

  if (!includeStack) {
    delete structured.stack;
  }

  const textParts: string[] = [`Error: ${String(structured.message)}`, `Code: ${String(structured.code)}`];

  const context = structured.context;
  if (context && typeof context === 'object' && Object.keys(context).length > 0) {
    textParts.push(`Details: ${JSON.stringify(context, null, 2)}`);
  }

  if (includeStack && typeof structured.stack === 'string') {
    textParts.push(`\nStack trace:\n${structured.stack}`);
  }

  return {
    content: [
      {
        type: 'text',
        text: textParts.join('\n'),
      },
    ],
    structuredContent: structured,
    isError: true,
  };
}

/**
 * Create a success response. Strings are passed through as text; anything else
 * is serialized and attached as structured content.
 */
export function createSuccessResponse(output: unknown): McpToolResponse {
  if (typeof output === 'string') {
    return {
      content: [{ type: 'text', text: output }],
      isError: false,
    };
  }

  const response: McpToolResponse = {
    content: [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    isError: false,
  };
  if (output && typeof output === 'object' && !Array.isArray(output)) {
    response.structuredContent = Object.fromEntries(Object.entries(output));
  }
  return response;
}

