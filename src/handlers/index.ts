/**
 * Tool handler registry and dispatch.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { toMcpError } from '../errors';
import type { ToolResult } from '../types';
import { handleGenerateDiagram } from './generate-diagram';
import { handleLayoutDiagram } from './layout-diagram';
import { handleValidateDiagram } from './validate-diagram';
import { handleListStyles } from './list-styles';
import type { ToolArgs } from './helpers';

export { handleGenerateDiagram, renderDiagram, defaultOutputPath } from './generate-diagram';
export { handleLayoutDiagram } from './layout-diagram';
export { handleValidateDiagram } from './validate-diagram';
export { handleListStyles } from './list-styles';
export type { ToolArgs } from './helpers';

type Handler = (args: ToolArgs) => Promise<ToolResult>;

const HANDLERS: ReadonlyMap<string, Handler> = new Map<string, Handler>([
  ['generate_diagram', (args) => handleGenerateDiagram(args)],
  ['layout_diagram', handleLayoutDiagram],
  ['validate_diagram', handleValidateDiagram],
  ['list_diagram_styles', () => handleListStyles()],
]);

/**
 * Route a tool call to its handler.  Every failure surfaces as an
 * `McpError`.
 */
export async function dispatchToolCall(name: string, args: ToolArgs = {}): Promise<ToolResult> {
  const handler = HANDLERS.get(name);
  if (!handler) throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  try {
    return await handler(args);
  } catch (err) {
    throw toMcpError(err, name);
  }
}
