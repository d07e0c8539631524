/**
 * Post-routing diagnostics.
 *
 * - Obstructions: routes with explicit waypoints whose segments pass
 *   through a node other than their own endpoints.
 * - Crossings: pairs of edges whose orthogonal polylines cross.
 *
 * Read-only: reports problems, never moves anything.
 */

import { orthogonalize, segmentIntersectsRect, segmentsIntersect, type Point } from '../geometry';
import type { DiagramEdge, Graph } from '../model/types';

export interface RouteObstruction {
  edgeId: string;
  nodeId: string;
}

export interface CrossingEdgesResult {
  count: number;
  pairs: Array<[string, string]>;
}

export interface RouteDiagnostics {
  obstructions: RouteObstruction[];
  crossings: CrossingEdgesResult;
}

/** Orthogonal polyline of a routed edge, or `null` when it has no route. */
export function edgePolyline(edge: DiagramEdge): Point[] | null {
  const route = edge.route;
  if (!route) return null;
  return orthogonalize(route.points, route.sourceSide, route.targetSide);
}

/** Find explicit-waypoint routes that cut through unrelated nodes. */
export function detectObstructions(graph: Graph): RouteObstruction[] {
  const out: RouteObstruction[] = [];

  for (const edge of graph.edges) {
    const route = edge.route;
    if (!route || route.waypoints.length === 0) continue;
    const pts = route.points;

    for (const node of graph.nodes) {
      if (node.id === edge.source || node.id === edge.target) continue;
      const rect = { x: node.position.x, y: node.position.y, width: node.width, height: node.height };
      for (let i = 0; i < pts.length - 1; i++) {
        if (segmentIntersectsRect(pts[i], pts[i + 1], rect)) {
          out.push({ edgeId: edge.id, nodeId: node.id });
          break;
        }
      }
    }
  }

  return out;
}

/** Count pairs of edges whose polylines properly cross. */
export function detectCrossingEdges(graph: Graph): CrossingEdgesResult {
  const lines = graph.edges
    .map((e) => ({ id: e.id, pts: edgePolyline(e) }))
    .filter((l): l is { id: string; pts: Point[] } => l.pts !== null && l.pts.length >= 2);

  const pairs: Array<[string, string]> = [];
  for (let i = 0; i < lines.length; i++) {
    for (let j = i + 1; j < lines.length; j++) {
      if (polylinesCross(lines[i].pts, lines[j].pts)) pairs.push([lines[i].id, lines[j].id]);
    }
  }
  return { count: pairs.length, pairs };
}

function polylinesCross(a: Point[], b: Point[]): boolean {
  for (let i = 0; i < a.length - 1; i++) {
    for (let j = 0; j < b.length - 1; j++) {
      if (segmentsIntersect(a[i], a[i + 1], b[j], b[j + 1])) return true;
    }
  }
  return false;
}

export function diagnoseRoutes(graph: Graph): RouteDiagnostics {
  return { obstructions: detectObstructions(graph), crossings: detectCrossingEdges(graph) };
}
