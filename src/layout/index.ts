/**
 * Swimlane layout engine.
 *
 * Deterministic, rule-based layout in strictly ordered passes:
 * 1. Size nodes from the shape table
 * 2. Stack members inside their groups (raw extents)
 * 3. Equalize group primary extents
 * 4. Place groups and the free stack on the canvas
 * 5. Route edges by case
 * 6. Grow the canvas to contain every route
 *
 * The engine does no I/O and keeps no module state: every call builds its
 * own graph.
 */

import type { Point } from '../geometry';
import type {
  AnchorSide,
  CanvasSize,
  DiagramInput,
  FlowDirection,
  Graph,
  LineStyle,
  RoutingCaseKind,
  ShapeAttributes,
  ShapeCategory,
} from '../model/types';
import { buildGraph } from '../model/graph';
import { sizeNodes } from './node-sizer';
import { equalizeGroupExtents, layoutGroups } from './group-layout';
import { expandCanvasToFit, layoutCanvas } from './canvas-layout';
import { routeEdges } from './edge-routing';
import { resolveLayoutConfig } from './layout-config';
import { createLayoutLogger, type LayoutLogger } from './layout-logger';
import { PipelineRunner } from './pipeline-runner';
import type { LayoutContext, LayoutOptions, PipelineStep } from './types';

export type { LayoutConfig, LayoutContext, LayoutOptions, PipelineStep } from './types';
export { PipelineRunner } from './pipeline-runner';
export { resolveLayoutConfig } from './layout-config';

// ── Pipeline ───────────────────────────────────────────────────────────────

export const MAIN_PIPELINE_STEPS: readonly PipelineStep[] = [
  { name: 'sizeNodes', run: (ctx) => sizeNodes(ctx.graph) },
  {
    name: 'layoutGroups',
    run: (ctx) => layoutGroups(ctx.graph, ctx.config),
    skip: (ctx) => ctx.graph.groups.length === 0,
  },
  {
    name: 'equalizeGroups',
    run: (ctx) => equalizeGroupExtents(ctx.graph),
    skip: (ctx) => ctx.graph.groups.length < 2,
  },
  { name: 'layoutCanvas', run: (ctx) => layoutCanvas(ctx.graph, ctx.config) },
  {
    name: 'routeEdges',
    run: (ctx) => {
      ctx.routingIndex = routeEdges(ctx.graph, ctx.config);
      ctx.log.note('routeEdges', `${ctx.graph.edges.length} edge(s) routed`);
    },
    skip: (ctx) => ctx.graph.edges.length === 0,
  },
  {
    name: 'fitCanvasToRoutes',
    run: (ctx) => expandCanvasToFit(ctx.graph, ctx.config),
    skip: (ctx) => ctx.graph.edges.length === 0,
  },
];

/**
 * Run every layout pass over an already-built graph, mutating it in place.
 */
export function layoutGraph(graph: Graph, options: LayoutOptions = {}, log?: LayoutLogger): LayoutContext {
  const ctx: LayoutContext = {
    graph,
    config: resolveLayoutConfig(options.config),
    log: log ?? createLayoutLogger('layout'),
  };
  ctx.log.note(
    'start',
    `${graph.direction}, ${graph.nodes.length} node(s), ${graph.groups.length} group(s), ${graph.edges.length} edge(s)`
  );
  new PipelineRunner(MAIN_PIPELINE_STEPS, ctx.log).run(ctx);
  ctx.log.finish();
  return ctx;
}

/** Build a graph from input and lay it out. */
export function layoutDiagram(input: DiagramInput, options: LayoutOptions = {}): Graph {
  const graph = buildGraph(input);
  layoutGraph(graph, options);
  return graph;
}

// ── Positioned output ──────────────────────────────────────────────────────

export interface PositionedNode {
  id: string;
  label: string;
  shape: ShapeCategory;
  group: string | null;
  color?: string;
  attributes: ShapeAttributes;
  bottomLabel: boolean;
  x: number;
  y: number;
  width: number;
  height: number;
  /** Position relative to the owning group (equals `x`/`y` when ungrouped). */
  local: Point;
}

export interface PositionedGroup {
  id: string;
  label: string;
  color: string;
  members: string[];
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PositionedEdge {
  id: string;
  source: string;
  target: string;
  label?: string;
  lineStyle: LineStyle;
  kind: RoutingCaseKind;
  sourceSide: AnchorSide;
  targetSide: AnchorSide;
  container: string | null;
  waypoints: Point[];
  points: Point[];
}

export interface PositionedDiagram {
  title: string;
  direction: FlowDirection;
  canvas: CanvasSize;
  groups: PositionedGroup[];
  nodes: PositionedNode[];
  edges: PositionedEdge[];
}

/** Plain JSON view of a laid-out graph. */
export function toPositionedDiagram(graph: Graph): PositionedDiagram {
  return {
    title: graph.title,
    direction: graph.direction,
    canvas: { ...graph.canvas },
    groups: graph.groups.map((g) => ({
      id: g.id,
      label: g.label,
      color: g.color,
      members: [...g.memberIds],
      x: g.position.x,
      y: g.position.y,
      width: g.width,
      height: g.height,
    })),
    nodes: graph.nodes.map((n) => ({
      id: n.id,
      label: n.label,
      shape: n.shape,
      group: n.groupId,
      ...(n.color !== undefined ? { color: n.color } : {}),
      attributes: { ...n.attributes },
      bottomLabel: n.bottomLabel,
      x: n.position.x,
      y: n.position.y,
      width: n.width,
      height: n.height,
      local: { ...n.local },
    })),
    edges: graph.edges.flatMap((e) => {
      const r = e.route;
      if (!r) return [];
      return [
        {
          id: e.id,
          source: e.source,
          target: e.target,
          ...(e.label !== undefined ? { label: e.label } : {}),
          lineStyle: e.lineStyle,
          kind: r.kind,
          sourceSide: r.sourceSide,
          targetSide: r.targetSide,
          container: r.container,
          waypoints: r.waypoints.map((p) => ({ ...p })),
          points: r.points.map((p) => ({ ...p })),
        },
      ];
    }),
  };
}
