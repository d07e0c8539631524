import { describe, test, expect } from 'vitest';
import {
  backwardClearanceLine,
  buildRoutingIndex,
  classifyEdge,
  routeEdge,
} from '../../src/layout/edge-routing';
import { resolveLayoutConfig } from '../../src/layout/layout-config';
import { LayoutInvariantViolation, UnknownNodeReferenceError } from '../../src/errors';
import type { DiagramEdge, EdgeRoute, Graph } from '../../src/model/types';
import { flowchart, lane, laidOut, swimlanes } from '../scenarios/builders';

function routeOf(graph: Graph, from: string, to: string): EdgeRoute {
  const edge = graph.edges.find((e) => e.source === from && e.target === to);
  if (!edge?.route) throw new Error(`No route for ${from}->${to}`);
  return edge.route;
}

function looseEdge(source: string, target: string): DiagramEdge {
  return { id: 'x', source, target, lineStyle: 'solid', route: null };
}

describe('classifyEdge', () => {
  const graph = laidOut(swimlanes([lane('G1', 'A', 'B', 'C'), lane('G2', 'D')], [], { free: ['F'] }));
  const index = buildRoutingIndex(graph);

  test('adjacent siblings are intra', () => {
    expect(classifyEdge(looseEdge('A', 'B'), index)).toEqual({
      kind: 'intra',
      context: 'G1',
      reversed: false,
    });
    expect(classifyEdge(looseEdge('C', 'B'), index)).toEqual({
      kind: 'intra',
      context: 'G1',
      reversed: true,
    });
  });

  test('non-adjacent siblings are intra-skip', () => {
    expect(classifyEdge(looseEdge('C', 'A'), index)).toEqual({ kind: 'intra-skip', context: 'G1' });
  });

  test('later context is forward, earlier is backward', () => {
    expect(classifyEdge(looseEdge('A', 'D'), index).kind).toBe('forward-cross');
    expect(classifyEdge(looseEdge('D', 'F'), index).kind).toBe('forward-cross');
    expect(classifyEdge(looseEdge('F', 'A'), index).kind).toBe('backward-cross');
  });

  test('self-loops are reported as their own case', () => {
    expect(classifyEdge(looseEdge('A', 'A'), index)).toEqual({ kind: 'self-loop', node: 'A' });
  });

  test('unknown endpoints are rejected', () => {
    expect(() => classifyEdge(looseEdge('ghost', 'A'), index)).toThrow(UnknownNodeReferenceError);
    expect(() => classifyEdge(looseEdge('ghost', 'A'), index)).toThrow(
      'x.source references unknown id: ghost'
    );
  });
});

describe('routeEdges (TD)', () => {
  // G1 (40,40) 280×250: A (80,90), B (80,150), C (80,210).  G2 (380,40): D (420,90).
  const graph = laidOut(
    swimlanes(
      [lane('G1', 'A', 'B', 'C'), lane('G2', 'D')],
      ['A->B', 'B->A', 'A->C', 'A->D', 'D->A']
    )
  );

  test('intra: bottom to top inside the group', () => {
    expect(routeOf(graph, 'A', 'B')).toEqual({
      kind: 'intra',
      sourceSide: 'bottom',
      targetSide: 'top',
      waypoints: [],
      container: 'G1',
      points: [
        { x: 180, y: 130 },
        { x: 180, y: 150 },
      ],
    });
  });

  test('reversed intra: top to bottom', () => {
    const route = routeOf(graph, 'B', 'A');
    expect([route.sourceSide, route.targetSide]).toEqual(['top', 'bottom']);
    expect(route.points).toEqual([
      { x: 180, y: 150 },
      { x: 180, y: 130 },
    ]);
  });

  test('intra-skip: right side lane inside the group', () => {
    expect(routeOf(graph, 'A', 'C')).toEqual({
      kind: 'intra-skip',
      sourceSide: 'right',
      targetSide: 'right',
      waypoints: [
        { x: 305, y: 110 },
        { x: 305, y: 230 },
      ],
      container: 'G1',
      points: [
        { x: 280, y: 110 },
        { x: 305, y: 110 },
        { x: 305, y: 230 },
        { x: 280, y: 230 },
      ],
    });
  });

  test('forward-cross: right to left, canvas scoped', () => {
    expect(routeOf(graph, 'A', 'D')).toEqual({
      kind: 'forward-cross',
      sourceSide: 'right',
      targetSide: 'left',
      waypoints: [],
      container: null,
      points: [
        { x: 280, y: 110 },
        { x: 420, y: 110 },
      ],
    });
  });

  test('backward-cross: below every group and back up', () => {
    expect(backwardClearanceLine(graph, resolveLayoutConfig())).toBe(330);
    expect(routeOf(graph, 'D', 'A')).toEqual({
      kind: 'backward-cross',
      sourceSide: 'bottom',
      targetSide: 'bottom',
      waypoints: [
        { x: 520, y: 330 },
        { x: 180, y: 330 },
      ],
      container: null,
      points: [
        { x: 520, y: 130 },
        { x: 520, y: 330 },
        { x: 180, y: 330 },
        { x: 180, y: 130 },
      ],
    });
  });
});

describe('routeEdges (LR)', () => {
  // G1 (40,40) 510×280: A (90,160), B (310,160).  G2 (40,380): C (90,500).
  const graph = laidOut(
    swimlanes([lane('G1', 'A', 'B'), lane('G2', 'C')], ['A->B', 'A->C', 'C->A'], {
      direction: 'LR',
    })
  );

  test('intra: right to left', () => {
    expect(routeOf(graph, 'A', 'B').points).toEqual([
      { x: 290, y: 180 },
      { x: 310, y: 180 },
    ]);
  });

  test('forward-cross: bottom to top', () => {
    const route = routeOf(graph, 'A', 'C');
    expect([route.sourceSide, route.targetSide]).toEqual(['bottom', 'top']);
    expect(route.points).toEqual([
      { x: 190, y: 200 },
      { x: 190, y: 500 },
    ]);
  });

  test('backward-cross: right of every group', () => {
    const route = routeOf(graph, 'C', 'A');
    expect([route.sourceSide, route.targetSide]).toEqual(['right', 'right']);
    expect(route.waypoints).toEqual([
      { x: 590, y: 520 },
      { x: 590, y: 180 },
    ]);
  });
});

describe('routeEdges (free stack)', () => {
  // A (100,40), B (100,140), C (100,240)
  const graph = laidOut(flowchart(['A', 'B', 'C'], ['A->B', 'A->C']));

  test('intra edges are scoped to the canvas', () => {
    const route = routeOf(graph, 'A', 'B');
    expect(route.container).toBeNull();
    expect(route.points).toEqual([
      { x: 200, y: 80 },
      { x: 200, y: 140 },
    ]);
  });

  test('skip lane sits one node gap past the widest node', () => {
    expect(routeOf(graph, 'A', 'C').points).toEqual([
      { x: 300, y: 60 },
      { x: 320, y: 60 },
      { x: 320, y: 260 },
      { x: 300, y: 260 },
    ]);
  });
});

describe('routeEdge', () => {
  test('refuses to route a self-loop', () => {
    const graph = laidOut(flowchart(['A']));
    const index = buildRoutingIndex(graph);
    expect(() => routeEdge(graph, resolveLayoutConfig(), index, looseEdge('A', 'A'))).toThrow(
      LayoutInvariantViolation
    );
  });
});
