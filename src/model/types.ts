/**
 * Shared types for the diagram graph model.
 *
 * Input descriptors (`DiagramInput` and friends) mirror the JSON accepted by
 * the tools.  The `Diagram*` entities are the in-memory graph that the layout
 * passes mutate in place.
 */

import type { Point, Side } from '../geometry';

// ── Enumerations ───────────────────────────────────────────────────────────

export const SHAPE_CATEGORIES = [
  'rectangle',
  'diamond',
  'ellipse',
  'cylinder',
  'cloud',
  'document',
  'hexagon',
  'actor',
  'callout',
  'process',
  'parallelogram',
  'task',
  'event',
  'gateway',
] as const;

export type ShapeCategory = (typeof SHAPE_CATEGORIES)[number];

export const TASK_MARKERS = ['script', 'send', 'manual', 'service', 'user', 'abstract'] as const;
export type TaskMarker = (typeof TASK_MARKERS)[number];

export const EVENT_SYMBOLS = [
  'message',
  'timer',
  'error',
  'conditional',
  'terminate',
  'general',
] as const;
export type EventSymbol = (typeof EVENT_SYMBOLS)[number];

export const EVENT_OUTLINES = ['standard', 'boundInt', 'end', 'throwing'] as const;
export type EventOutline = (typeof EVENT_OUTLINES)[number];

export const GATEWAY_TYPES = ['exclusive', 'parallel', 'inclusive'] as const;
export type GatewayType = (typeof GATEWAY_TYPES)[number];

export const FLOW_DIRECTIONS = ['TD', 'LR'] as const;
/** `TD`: top-down (groups side by side), `LR`: left-right (groups stacked). */
export type FlowDirection = (typeof FLOW_DIRECTIONS)[number];

export const LINE_STYLES = ['solid', 'dashed'] as const;
export type LineStyle = (typeof LINE_STYLES)[number];

/** Narrow an unknown value to one of the literal members of `values`. */
export function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  const members: readonly string[] = values;
  return typeof value === 'string' && members.includes(value);
}

/** Side of a shape's bounding box where a connector attaches. */
export type AnchorSide = Side;

// ── Input descriptors ──────────────────────────────────────────────────────

export interface GroupDescriptor {
  id: string;
  label?: string;
  color?: string;
}

export interface NodeDescriptor {
  id: string;
  label?: string;
  group?: string;
  shape?: ShapeCategory;
  /** Palette colour; inherits the group's colour when omitted. */
  color?: string;
  /** Task marker (shape `task` only). */
  marker?: TaskMarker;
  /** Event symbol (shape `event` only). */
  symbol?: EventSymbol;
  /** Event outline (shape `event` only). */
  outline?: EventOutline;
  /** Gateway type (shape `gateway` only). */
  gateway_type?: GatewayType;
}

export interface ConnectionDescriptor {
  from: string;
  to: string;
  label?: string;
  style?: LineStyle;
}

export interface DiagramInput {
  title?: string;
  /** Style preset name, e.g. `classic` or `dark-modern`. */
  style?: string;
  direction?: FlowDirection;
  groups?: GroupDescriptor[];
  nodes: NodeDescriptor[];
  connections?: ConnectionDescriptor[];
}

// ── Graph entities ─────────────────────────────────────────────────────────

export interface ShapeAttributes {
  marker?: TaskMarker;
  symbol?: EventSymbol;
  outline?: EventOutline;
  gatewayType?: GatewayType;
}

export interface DiagramNode {
  id: string;
  label: string;
  shape: ShapeCategory;
  /** Owning group id, or `null` for nodes in the free (ungrouped) stack. */
  groupId: string | null;
  color?: string;
  attributes: ShapeAttributes;
  width: number;
  height: number;
  /** Caption renders below the body rather than inside it. */
  bottomLabel: boolean;
  /**
   * Position relative to the owning group's origin.  For ungrouped nodes
   * the container is the canvas, so `local` equals `position`.
   */
  local: Point;
  /** Absolute canvas position (top-left corner). */
  position: Point;
}

export interface DiagramGroup {
  id: string;
  label: string;
  color: string;
  /** Member node ids in stacking (input) order. */
  memberIds: string[];
  width: number;
  height: number;
  /** Absolute canvas position (top-left corner). */
  position: Point;
}

/** The four routable cases plus the unsupported self-loop. */
export type RoutingCaseKind = 'intra' | 'intra-skip' | 'forward-cross' | 'backward-cross';

export interface EdgeRoute {
  kind: RoutingCaseKind;
  sourceSide: AnchorSide;
  targetSide: AnchorSide;
  /** Explicit intermediate points, absolute canvas coordinates. */
  waypoints: Point[];
  /** Group the edge is scoped to, or `null` for the canvas. */
  container: string | null;
  /** Full absolute polyline: source anchor → waypoints → target anchor. */
  points: Point[];
}

export interface DiagramEdge {
  id: string;
  source: string;
  target: string;
  label?: string;
  lineStyle: LineStyle;
  route: EdgeRoute | null;
}

export interface CanvasSize {
  width: number;
  height: number;
}

export interface Graph {
  title: string;
  direction: FlowDirection;
  /** Dense node arena in input order. */
  nodes: DiagramNode[];
  /** Dense group arena in input (canvas) order. */
  groups: DiagramGroup[];
  edges: DiagramEdge[];
  /** Node id → index into `nodes`. */
  nodeIndex: Map<string, number>;
  /** Group id → index into `groups`; doubles as the group stacking order. */
  groupIndex: Map<string, number>;
  canvas: CanvasSize;
}
