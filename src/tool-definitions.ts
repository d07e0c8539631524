/**
 * MCP tool definitions, in the order they are listed to clients.
 */

import type { ToolDefinition } from './types';
import { TOOL_DEFINITION as GENERATE_DIAGRAM } from './handlers/generate-diagram-schema';
import { TOOL_DEFINITION as LAYOUT_DIAGRAM } from './handlers/layout-diagram-schema';
import { TOOL_DEFINITION as VALIDATE_DIAGRAM } from './handlers/validate-diagram-schema';
import { TOOL_DEFINITION as LIST_STYLES } from './handlers/list-styles-schema';

export const TOOL_DEFINITIONS: readonly ToolDefinition[] = [
  GENERATE_DIAGRAM,
  LAYOUT_DIAGRAM,
  VALIDATE_DIAGRAM,
  LIST_STYLES,
];
