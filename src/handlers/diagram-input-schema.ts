/**
 * JSON Schema fragments shared by the diagram tools.
 */

import {
  EVENT_OUTLINES,
  EVENT_SYMBOLS,
  FLOW_DIRECTIONS,
  GATEWAY_TYPES,
  LINE_STYLES,
  SHAPE_CATEGORIES,
  TASK_MARKERS,
} from '../model/types';

export const DIAGRAM_INPUT_SCHEMA = {
  type: 'object',
  description:
    'Diagram description: optional swimlane groups, nodes (optionally assigned to a group) and directed connections between nodes.',
  properties: {
    title: { type: 'string', description: "Diagram title (default: 'Diagram')." },
    style: { type: 'string', description: 'Style preset name, e.g. classic or dark-modern.' },
    direction: {
      type: 'string',
      enum: [...FLOW_DIRECTIONS],
      description:
        'TD: groups side by side, members stacked top-down. LR: groups stacked, members left-to-right. Default TD.',
    },
    groups: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          label: { type: 'string' },
          color: { type: 'string', description: 'Palette colour name (default blue).' },
        },
        required: ['id'],
      },
    },
    nodes: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          id: { type: 'string' },
          label: { type: 'string' },
          group: { type: 'string', description: 'Id of the owning group.' },
          shape: { type: 'string', enum: [...SHAPE_CATEGORIES] },
          color: {
            type: 'string',
            description: "Palette colour name; defaults to the group's colour, else white.",
          },
          marker: { type: 'string', enum: [...TASK_MARKERS], description: 'task shapes only' },
          symbol: { type: 'string', enum: [...EVENT_SYMBOLS], description: 'event shapes only' },
          outline: { type: 'string', enum: [...EVENT_OUTLINES], description: 'event shapes only' },
          gateway_type: {
            type: 'string',
            enum: [...GATEWAY_TYPES],
            description: 'gateway shapes only',
          },
        },
        required: ['id'],
      },
    },
    connections: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          from: { type: 'string' },
          to: { type: 'string' },
          label: { type: 'string' },
          style: { type: 'string', enum: [...LINE_STYLES] },
        },
        required: ['from', 'to'],
      },
    },
  },
  required: ['nodes'],
} as const;

export const LAYOUT_OVERRIDES_SCHEMA = {
  type: 'object',
  description:
    'Optional numeric layout overrides, e.g. { "nodeGap": 30, "groupGap": 80 }. Keys: nodeGap, bottomLabelPadding, groupGap, backwardClearance, canvasWidth, canvasHeight, canvasMargin, canvasPadding, flowCrossOffset, groupCrossSize, groupMinPrimarySize, groupHeaderSize, skipRouteInset, gridSize.',
  additionalProperties: { type: 'number' },
} as const;
