/**
 * Edge Router: case-based connector routing.
 *
 * Routing is split into a pure classifier (`classifyEdge`) returning a
 * tagged variant, and one independent builder per case:
 *
 * | case             | anchors (TD)      | anchors (LR)      | waypoints          |
 * |------------------|-------------------|-------------------|--------------------|
 * | `intra`          | bottom → top      | right → left      | none               |
 * | `intra-skip`     | right → right     | bottom → bottom   | 2, on a side lane  |
 * | `forward-cross`  | right → left      | bottom → top      | none               |
 * | `backward-cross` | bottom → bottom   | right → right     | 2, past all groups |
 *
 * A "context" is the group a node belongs to, or `null` for the free stack
 * of ungrouped nodes.  Contexts are ordered the way they sit on the
 * canvas: groups in input order, the free stack last.
 */

import type { Point, Rect, Side } from '../geometry';
import { anchorPoint, centreOf } from '../geometry';
import { LayoutInvariantViolation, UnknownNodeReferenceError } from '../errors';
import type { DiagramEdge, DiagramNode, EdgeRoute, FlowDirection, Graph } from '../model/types';
import { requireGroup, requireNode } from '../model/graph';
import type { LayoutConfig } from './types';
import { crossOf, crossSize, pointAt, primaryOf, primarySize } from './axes';

// ── Routing index ──────────────────────────────────────────────────────────

/** Lookups computed once per layout and shared by every edge. */
export interface RoutingIndex {
  /** Node id → context (group id, or `null` for the free stack). */
  contextOf: Map<string, string | null>;
  /** Context → canvas order. */
  contextOrder: Map<string | null, number>;
  /** Node id → position within its context's stack. */
  stackIndex: Map<string, number>;
  /** Context → member ids in stacking order. */
  members: Map<string | null, string[]>;
}

export function buildRoutingIndex(graph: Graph): RoutingIndex {
  const contextOf = new Map<string, string | null>();
  const contextOrder = new Map<string | null, number>();
  const stackIndex = new Map<string, number>();
  const members = new Map<string | null, string[]>();

  graph.groups.forEach((group, i) => {
    contextOrder.set(group.id, i);
    members.set(group.id, [...group.memberIds]);
    group.memberIds.forEach((id, j) => {
      contextOf.set(id, group.id);
      stackIndex.set(id, j);
    });
  });

  const free = graph.nodes.filter((n) => n.groupId === null).map((n) => n.id);
  if (free.length > 0) {
    contextOrder.set(null, graph.groups.length);
    members.set(null, free);
    free.forEach((id, j) => {
      contextOf.set(id, null);
      stackIndex.set(id, j);
    });
  }

  return { contextOf, contextOrder, stackIndex, members };
}

// ── Classification ─────────────────────────────────────────────────────────

export type EdgeCase =
  | { kind: 'self-loop'; node: string }
  | { kind: 'intra'; context: string | null; reversed: boolean }
  | { kind: 'intra-skip'; context: string | null }
  | { kind: 'forward-cross' }
  | { kind: 'backward-cross' };

function lookupContext(
  index: RoutingIndex,
  nodeId: string,
  field: string
): { context: string | null; order: number; position: number } {
  const context = index.contextOf.get(nodeId);
  const position = index.stackIndex.get(nodeId);
  if (context === undefined || position === undefined) {
    throw new UnknownNodeReferenceError(nodeId, field);
  }
  const order = index.contextOrder.get(context);
  if (order === undefined) throw new UnknownNodeReferenceError(String(context), field);
  return { context, order, position };
}

/**
 * Decide which routing case applies to an edge.  Pure: reads the index
 * only.
 *
 * @throws UnknownNodeReferenceError when an endpoint has no context.
 */
export function classifyEdge(edge: DiagramEdge, index: RoutingIndex): EdgeCase {
  if (edge.source === edge.target) return { kind: 'self-loop', node: edge.source };

  const src = lookupContext(index, edge.source, `${edge.id}.source`);
  const tgt = lookupContext(index, edge.target, `${edge.id}.target`);

  if (src.context === tgt.context) {
    const distance = Math.abs(src.position - tgt.position);
    if (distance === 1) {
      return { kind: 'intra', context: src.context, reversed: tgt.position < src.position };
    }
    return { kind: 'intra-skip', context: src.context };
  }

  return tgt.order > src.order ? { kind: 'forward-cross' } : { kind: 'backward-cross' };
}

// ── Route builders ─────────────────────────────────────────────────────────

function rectOf(node: DiagramNode): Rect {
  return { x: node.position.x, y: node.position.y, width: node.width, height: node.height };
}

function makeRoute(
  kind: EdgeRoute['kind'],
  source: DiagramNode,
  target: DiagramNode,
  sourceSide: Side,
  targetSide: Side,
  waypoints: Point[],
  container: string | null
): EdgeRoute {
  return {
    kind,
    sourceSide,
    targetSide,
    waypoints,
    container,
    points: [anchorPoint(rectOf(source), sourceSide), ...waypoints, anchorPoint(rectOf(target), targetSide)],
  };
}

/** Sides facing along the flow: [trailing, leading]. */
function flowSides(dir: FlowDirection): [Side, Side] {
  return dir === 'TD' ? ['bottom', 'top'] : ['right', 'left'];
}

/** Sides facing along the cross axis: [near, far]. */
function crossSides(dir: FlowDirection): [Side, Side] {
  return dir === 'TD' ? ['left', 'right'] : ['top', 'bottom'];
}

/** Adjacent siblings: straight connector inside the group. */
export function buildIntraRoute(
  graph: Graph,
  source: DiagramNode,
  target: DiagramNode,
  context: string | null,
  reversed: boolean
): EdgeRoute {
  const [trailing, leading] = flowSides(graph.direction);
  return reversed
    ? makeRoute('intra', source, target, leading, trailing, [], context)
    : makeRoute('intra', source, target, trailing, leading, [], context);
}

/**
 * Non-adjacent siblings: leave and re-enter on the far cross side and run
 * along a lane clear of every member of the stack.
 */
export function buildSkipRoute(
  graph: Graph,
  config: LayoutConfig,
  source: DiagramNode,
  target: DiagramNode,
  context: string | null,
  stack: readonly string[]
): EdgeRoute {
  const dir = graph.direction;
  const farSide = crossSides(dir)[1];

  const farEdges = stack.map((id) => {
    const n = requireNode(graph, id);
    return crossOf(n.position, dir) + crossSize(n, dir);
  });
  const maxFar = Math.max(...farEdges);

  let lane: number;
  if (context === null) {
    lane = maxFar + config.nodeGap;
  } else {
    const group = requireGroup(graph, context);
    const groupStart = crossOf(group.position, dir);
    const groupCross = crossSize(group, dir);
    const localLane = Math.max(
      groupCross - config.skipRouteInset,
      Math.ceil((maxFar - groupStart + groupCross) / 2)
    );
    lane = groupStart + localLane;
  }

  const srcC = primaryOf(centreOf(rectOf(source)), dir);
  const tgtC = primaryOf(centreOf(rectOf(target)), dir);
  const waypoints = [pointAt(srcC, lane, dir), pointAt(tgtC, lane, dir)];
  return makeRoute('intra-skip', source, target, farSide, farSide, waypoints, context);
}

/** Target context later on the canvas: from the far cross side to the near one. */
export function buildForwardRoute(graph: Graph, source: DiagramNode, target: DiagramNode): EdgeRoute {
  const [near, far] = crossSides(graph.direction);
  return makeRoute('forward-cross', source, target, far, near, [], null);
}

/**
 * Target context earlier on the canvas: drop past the end of every group
 * and free node, traverse, and come back up into the target.
 */
export function buildBackwardRoute(
  graph: Graph,
  config: LayoutConfig,
  source: DiagramNode,
  target: DiagramNode
): EdgeRoute {
  const dir = graph.direction;
  const trailing = flowSides(dir)[0];
  const line = backwardClearanceLine(graph, config);

  const srcC = crossOf(centreOf(rectOf(source)), dir);
  const tgtC = crossOf(centreOf(rectOf(target)), dir);
  const waypoints = [pointAt(line, srcC, dir), pointAt(line, tgtC, dir)];
  return makeRoute('backward-cross', source, target, trailing, trailing, waypoints, null);
}

/** Primary coordinate of the backward-edge routing line. */
export function backwardClearanceLine(graph: Graph, config: LayoutConfig): number {
  const dir = graph.direction;
  let end = 0;
  for (const g of graph.groups) end = Math.max(end, primaryOf(g.position, dir) + primarySize(g, dir));
  for (const n of graph.nodes) end = Math.max(end, primaryOf(n.position, dir) + primarySize(n, dir));
  return end + config.backwardClearance;
}

// ── Dispatch ───────────────────────────────────────────────────────────────

/** Classify and route a single edge. */
export function routeEdge(
  graph: Graph,
  config: LayoutConfig,
  index: RoutingIndex,
  edge: DiagramEdge
): EdgeRoute {
  const source = requireNode(graph, edge.source);
  const target = requireNode(graph, edge.target);
  const routing = classifyEdge(edge, index);

  switch (routing.kind) {
    case 'self-loop':
      throw new LayoutInvariantViolation(
        `Edge ${edge.id} loops on ${routing.node}; self-loops should have been rejected`
      );
    case 'intra':
      return buildIntraRoute(graph, source, target, routing.context, routing.reversed);
    case 'intra-skip': {
      const stack = index.members.get(routing.context);
      if (!stack || stack.length === 0) {
        throw new UnknownNodeReferenceError(String(routing.context), `${edge.id}.context`);
      }
      return buildSkipRoute(graph, config, source, target, routing.context, stack);
    }
    case 'forward-cross':
      return buildForwardRoute(graph, source, target);
    case 'backward-cross':
      return buildBackwardRoute(graph, config, source, target);
  }
}

/** Route every edge of the graph in input order. */
export function routeEdges(graph: Graph, config: LayoutConfig): RoutingIndex {
  const index = buildRoutingIndex(graph);
  for (const edge of graph.edges) {
    edge.route = routeEdge(graph, config, index, edge);
  }
  return index;
}
