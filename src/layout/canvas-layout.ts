/**
 * Canvas Layout: places groups and the free (ungrouped) stack on the
 * canvas, converts group-local positions to absolute ones and sizes the
 * canvas to its content.
 */

import { DEFAULT_NODE_HEIGHT, DEFAULT_NODE_WIDTH } from '../constants';
import type { DiagramNode, Graph } from '../model/types';
import { requireGroup, ungroupedNodes } from '../model/graph';
import type { LayoutConfig } from './types';
import { crossSize, pointAt, primarySize } from './axes';
import { trailingGap } from './group-layout';

/**
 * Place groups along the cross axis (TD: left→right, LR: top→bottom) and
 * stack ungrouped nodes after them.
 */
export function layoutCanvas(graph: Graph, config: LayoutConfig): void {
  const dir = graph.direction;

  let crossCursor = config.canvasMargin;
  for (const group of graph.groups) {
    group.position = pointAt(config.canvasMargin, crossCursor, dir);
    crossCursor += crossSize(group, dir) + config.groupGap;
  }

  for (const node of graph.nodes) {
    if (node.groupId === null) continue;
    const origin = requireGroup(graph, node.groupId).position;
    node.position = { x: origin.x + node.local.x, y: origin.y + node.local.y };
  }

  const free = ungroupedNodes(graph);
  if (free.length > 0) {
    const hasGroups = graph.groups.length > 0;
    layoutFreeStack(
      free,
      graph,
      config,
      hasGroups ? config.canvasMargin + config.groupHeaderSize + config.nodeGap : config.canvasMargin,
      hasGroups ? crossCursor : config.flowCrossOffset
    );
  }

  graph.canvas = { width: config.canvasWidth, height: config.canvasHeight };
  expandCanvasToFit(graph, config);
}

/**
 * Stack ungrouped nodes along the primary axis, each centred on the cross
 * axis relative to the widest node of the stack.  The column is never
 * narrower than a default node.
 */
function layoutFreeStack(
  nodes: DiagramNode[],
  graph: Graph,
  config: LayoutConfig,
  primaryStart: number,
  crossStart: number
): void {
  const dir = graph.direction;
  const column = crossSize({ width: DEFAULT_NODE_WIDTH, height: DEFAULT_NODE_HEIGHT }, dir);
  const widest = nodes.reduce((m, n) => Math.max(m, crossSize(n, dir)), column);

  let cursor = primaryStart;
  for (const node of nodes) {
    const offset = Math.floor((widest - crossSize(node, dir)) / 2);
    node.position = pointAt(cursor, crossStart + offset, dir);
    node.local = { ...node.position };
    cursor += primarySize(node, dir) + trailingGap(node, config.groupGap, config);
  }
}

/**
 * Grow the canvas so every group, node and routed point fits with
 * `canvasPadding` to spare.  Never shrinks.
 */
export function expandCanvasToFit(graph: Graph, config: LayoutConfig): void {
  let maxX = 0;
  let maxY = 0;

  for (const g of graph.groups) {
    maxX = Math.max(maxX, g.position.x + g.width);
    maxY = Math.max(maxY, g.position.y + g.height);
  }
  for (const n of graph.nodes) {
    maxX = Math.max(maxX, n.position.x + n.width);
    maxY = Math.max(maxY, n.position.y + n.height);
  }
  for (const e of graph.edges) {
    for (const p of e.route?.points ?? []) {
      maxX = Math.max(maxX, p.x);
      maxY = Math.max(maxY, p.y);
    }
  }

  graph.canvas = {
    width: Math.max(graph.canvas.width, maxX + config.canvasPadding),
    height: Math.max(graph.canvas.height, maxY + config.canvasPadding),
  };
}
