/**
 * JSON Schema for the generate_diagram tool.
 */

import { OUTPUT_FORMATS, type ToolDefinition } from '../types';
import { DIAGRAM_INPUT_SCHEMA, LAYOUT_OVERRIDES_SCHEMA } from './diagram-input-schema';

export const TOOL_DEFINITION: ToolDefinition = {
  name: 'generate_diagram',
  description:
    'Lay out a swimlane/flowchart diagram and render it as draw.io XML, Mermaid or ASCII. ' +
    'Groups become swimlanes of equal length; connections are routed by case (adjacent, skip-over, forward and backward across lanes). ' +
    'Pass outputPath (or save: true) to write the result to a file instead of returning it inline.',
  inputSchema: {
    type: 'object',
    properties: {
      diagram: DIAGRAM_INPUT_SCHEMA,
      format: {
        type: 'string',
        enum: [...OUTPUT_FORMATS],
        description: 'Output format (default: drawio).',
      },
      style: {
        type: 'string',
        description:
          "Style preset for draw.io output; overrides diagram.style. Default 'classic'. See list_diagram_styles.",
      },
      outputPath: {
        type: 'string',
        description:
          'Write the rendered diagram to this path (parent directories are created). Relative paths resolve against the server working directory.',
      },
      save: {
        type: 'boolean',
        description:
          'When true and no outputPath is given, write to <DIAGRAM_OUTPUT_DIR>/<title>.<ext> (default directory: diagrams).',
      },
      layout: LAYOUT_OVERRIDES_SCHEMA,
    },
    required: ['diagram'],
  },
};
