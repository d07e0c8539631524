/**
 * JSON Schema for the validate_diagram tool.
 */

import type { ToolDefinition } from '../types';

export const TOOL_DEFINITION: ToolDefinition = {
  name: 'validate_diagram',
  description:
    'Check a diagram description without laying it out. Reports every schema problem at once ' +
    '(missing or duplicate ids, unknown groups, shapes, markers or connection endpoints, self-loops).',
  inputSchema: {
    type: 'object',
    properties: {
      diagram: {
        type: 'object',
        description: 'The diagram description to check (same shape as for generate_diagram).',
      },
    },
    required: ['diagram'],
  },
};
