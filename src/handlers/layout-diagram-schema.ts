/**
 * JSON Schema for the layout_diagram tool.
 */

import type { ToolDefinition } from '../types';
import { DIAGRAM_INPUT_SCHEMA, LAYOUT_OVERRIDES_SCHEMA } from './diagram-input-schema';

export const TOOL_DEFINITION: ToolDefinition = {
  name: 'layout_diagram',
  description:
    'Compute the layout of a diagram without rendering it. Returns absolute and group-local positions for every node, ' +
    'group boxes, routed connections (anchor sides, waypoints, container) and the canvas size, plus route diagnostics ' +
    '(connections passing through unrelated nodes, crossing connections).',
  inputSchema: {
    type: 'object',
    properties: {
      diagram: DIAGRAM_INPUT_SCHEMA,
      layout: LAYOUT_OVERRIDES_SCHEMA,
    },
    required: ['diagram'],
  },
};
