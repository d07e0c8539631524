/**
 * JSON Schema for the list_diagram_styles tool.
 */

import type { ToolDefinition } from '../types';

export const TOOL_DEFINITION: ToolDefinition = {
  name: 'list_diagram_styles',
  description: 'List the available style presets (name and description) for draw.io output.',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};
