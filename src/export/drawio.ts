/**
 * draw.io (mxGraph) XML exporter.
 *
 * Emits `mxfile → diagram → mxGraphModel → root` with the two mandatory
 * root cells (`0` and its child layer `1`).  Nodes are parented to their
 * swimlane and use group-local geometry; edges are parented to their route
 * container and carry container-local waypoints plus explicit exit/entry
 * constraints for every case the native router cannot be trusted with.
 *
 * Output is deterministic: cell ids derive from arena indices.
 */

import type { Point, Side } from '../geometry';
import { DEFAULT_LAYOUT_CONFIG, DEFAULT_NODE_COLOR } from '../constants';
import type { DiagramEdge, DiagramGroup, DiagramNode, Graph } from '../model/types';
import { requireGroup } from '../model/graph';
import type { LayoutConfig } from '../layout/types';
import { escapeXml } from './escape';
import { paletteColor, type StylePreset } from './styles';

export interface DrawioExportOptions {
  /** Layout config used for the run; supplies header size and grid. */
  config?: LayoutConfig;
}

// ── Cell ids ───────────────────────────────────────────────────────────────

export const ROOT_CELL_ID = '0';
export const LAYER_CELL_ID = '1';
export const BACKGROUND_CELL_ID = 'background';

export function groupCellId(index: number): string {
  return `group-${index}`;
}

export function nodeCellId(index: number): string {
  return `node-${index}`;
}

export function edgeCellId(index: number): string {
  return `edge-${index}`;
}

// ── Style strings ──────────────────────────────────────────────────────────

function colorOf(node: DiagramNode, graph: Graph): string {
  if (node.color !== undefined) return node.color;
  if (node.groupId !== null) return requireGroup(graph, node.groupId).color;
  return DEFAULT_NODE_COLOR;
}

/** draw.io style string for a node's shape glyph. */
export function buildNodeStyle(node: DiagramNode, color: string, style: StylePreset): string {
  const c = paletteColor(style, color);
  const d = style.defaults;
  const colors = `fillColor=${c.fill};strokeColor=${c.stroke};fontColor=${c.font};`;

  switch (node.shape) {
    case 'task':
      return (
        'shape=mxgraph.bpmn.task;rectStyle=rounded;size=10;' +
        `taskMarker=${node.attributes.marker ?? 'abstract'};html=1;whiteSpace=wrap;${colors}`
      );
    case 'event':
      return (
        'shape=mxgraph.bpmn.event;html=1;verticalLabelPosition=bottom;verticalAlign=top;' +
        'align=center;perimeter=ellipsePerimeter;outlineConnect=0;aspect=fixed;' +
        `outline=${node.attributes.outline ?? 'standard'};symbol=${node.attributes.symbol ?? 'general'};` +
        colors
      );
    case 'gateway':
      return (
        'shape=mxgraph.bpmn.gateway2;html=1;verticalLabelPosition=bottom;verticalAlign=top;' +
        'align=center;perimeter=rhombusPerimeter;outlineConnect=0;outline=none;symbol=none;' +
        `gwType=${node.attributes.gatewayType ?? 'exclusive'};${colors}`
      );
    default:
      break;
  }

  let base = `whiteSpace=wrap;html=1;${colors}fontSize=${d.nodeFontSize};strokeWidth=${d.nodeStrokeWidth};`;
  if (d.nodeFontStyle) base += `fontStyle=${d.nodeFontStyle};`;
  if (d.nodeShadow) base += 'shadow=1;';

  switch (node.shape) {
    case 'diamond':
      return `rhombus;${base}`;
    case 'ellipse':
      return `ellipse;${base}`;
    case 'cylinder':
      return `shape=cylinder3;boundedLbl=1;backgroundOutline=1;size=15;${base}`;
    case 'cloud':
      return `shape=cloud;${base}`;
    case 'document':
      return `shape=document;${base}`;
    case 'hexagon':
      return `shape=hexagon;perimeter=hexagonPerimeter2;size=0.25;${base}`;
    case 'actor':
      return `shape=umlActor;verticalLabelPosition=bottom;verticalAlign=top;${base}`;
    case 'callout':
      return `shape=callout;perimeter=calloutPerimeter;size=30;position=0.5;${base}`;
    case 'process':
      return `shape=process;size=0.1;${base}`;
    case 'parallelogram':
      return `shape=parallelogram;perimeter=parallelogramPerimeter;size=0.15;${base}`;
    default: {
      const arc = d.arcSize && d.rounded ? `arcSize=${d.arcSize};` : '';
      return `rounded=${d.rounded ? 1 : 0};${arc}${base}`;
    }
  }
}

/** draw.io style string for a swimlane. */
export function buildGroupStyle(
  group: DiagramGroup,
  graph: Graph,
  style: StylePreset,
  config: LayoutConfig
): string {
  const c = paletteColor(style, group.color);
  const d = style.defaults;
  return (
    `swimlane;horizontal=${graph.direction === 'TD' ? 1 : 0};startSize=${config.groupHeaderSize};` +
    `fillColor=${c.fill};strokeColor=${c.stroke};fontColor=${c.font};strokeWidth=${d.nodeStrokeWidth};` +
    `rounded=1;fontStyle=1;fontSize=${d.groupFontSize};${d.nodeShadow ? 'shadow=1;' : ''}`
  );
}

/** Relative attachment point of each side, as draw.io constraint fractions. */
const SIDE_CONSTRAINTS: Readonly<Record<Side, { x: number; y: number }>> = {
  top: { x: 0.5, y: 0 },
  bottom: { x: 0.5, y: 1 },
  left: { x: 0, y: 0.5 },
  right: { x: 1, y: 0.5 },
};

/** draw.io style string for a connector, including anchor constraints. */
export function buildEdgeStyle(edge: DiagramEdge, style: StylePreset): string {
  const d = style.defaults;
  let s =
    'edgeStyle=orthogonalEdgeStyle;rounded=1;orthogonalLoop=1;jettySize=auto;html=1;' +
    `strokeWidth=${d.edgeWidth};strokeColor=${d.edgeColor};`;
  if (d.edgeLabelColor) s += `fontColor=${d.edgeLabelColor};`;
  if (d.edgeLabelBg) s += `labelBackgroundColor=${d.edgeLabelBg};`;
  if (edge.lineStyle === 'dashed') s += 'dashed=1;dashPattern=8 8;';

  const route = edge.route;
  if (route && route.kind !== 'intra') {
    const exit = SIDE_CONSTRAINTS[route.sourceSide];
    const entry = SIDE_CONSTRAINTS[route.targetSide];
    s +=
      `exitX=${exit.x};exitY=${exit.y};exitDx=0;exitDy=0;` +
      `entryX=${entry.x};entryY=${entry.y};entryDx=0;entryDy=0;`;
  }
  return s;
}

// ── Cells ──────────────────────────────────────────────────────────────────

function vertexCell(
  id: string,
  value: string,
  styleStr: string,
  parent: string,
  x: number,
  y: number,
  width: number,
  height: number
): string {
  return (
    `<mxCell id="${id}" value="${escapeXml(value)}" style="${styleStr}" parent="${parent}" vertex="1">\n` +
    `  <mxGeometry x="${x}" y="${y}" width="${width}" height="${height}" as="geometry" />\n` +
    '</mxCell>'
  );
}

function edgeCell(
  id: string,
  edge: DiagramEdge,
  styleStr: string,
  parent: string,
  source: string,
  target: string,
  waypoints: Point[]
): string {
  const value = edge.label ? `value="${escapeXml(edge.label)}" ` : '';
  const open =
    `<mxCell id="${id}" ${value}style="${styleStr}" parent="${parent}" ` +
    `source="${source}" target="${target}" edge="1">\n`;
  if (waypoints.length === 0) {
    return `${open}  <mxGeometry relative="1" as="geometry" />\n</mxCell>`;
  }
  const pts = waypoints.map((p) => `      <mxPoint x="${p.x}" y="${p.y}" />`).join('\n');
  return (
    open +
    '  <mxGeometry relative="1" as="geometry">\n' +
    `    <Array as="points">\n${pts}\n    </Array>\n` +
    '  </mxGeometry>\n' +
    '</mxCell>'
  );
}

// ── Export ─────────────────────────────────────────────────────────────────

/**
 * Serialize a laid-out graph to a draw.io document.
 *
 * Expects every edge to be routed; unrouted edges are emitted without
 * waypoints or constraints.
 */
export function exportDrawio(
  graph: Graph,
  style: StylePreset,
  options: DrawioExportOptions = {}
): string {
  const config = options.config ?? DEFAULT_LAYOUT_CONFIG;
  const { width, height } = graph.canvas;
  const background = style.canvas.background;
  const darkCanvas = background.toLowerCase() !== '#ffffff';

  const cells: string[] = [
    `<mxCell id="${ROOT_CELL_ID}" />`,
    `<mxCell id="${LAYER_CELL_ID}" parent="${ROOT_CELL_ID}" />`,
  ];

  // Dark canvases also get a full-size background rect.
  if (darkCanvas) {
    cells.push(
      vertexCell(
        BACKGROUND_CELL_ID,
        '',
        `rounded=0;whiteSpace=wrap;html=1;fillColor=${background};strokeColor=none;opacity=100;`,
        LAYER_CELL_ID,
        0,
        0,
        width,
        height
      )
    );
  }

  const groupCells = new Map<string, string>();
  graph.groups.forEach((g, i) => {
    const id = groupCellId(i);
    groupCells.set(g.id, id);
    const groupStyle = buildGroupStyle(g, graph, style, config);
    const { x, y } = g.position;
    cells.push(vertexCell(id, g.label, groupStyle, LAYER_CELL_ID, x, y, g.width, g.height));
  });

  graph.nodes.forEach((n, i) => {
    const parent = n.groupId === null ? LAYER_CELL_ID : (groupCells.get(n.groupId) ?? LAYER_CELL_ID);
    const nodeStyle = buildNodeStyle(n, colorOf(n, graph), style);
    const { x, y } = n.local;
    cells.push(vertexCell(nodeCellId(i), n.label, nodeStyle, parent, x, y, n.width, n.height));
  });

  graph.edges.forEach((e, i) => {
    const src = graph.nodeIndex.get(e.source);
    const tgt = graph.nodeIndex.get(e.target);
    if (src === undefined || tgt === undefined) return;

    const container = e.route?.container ?? null;
    const parent = container === null ? LAYER_CELL_ID : (groupCells.get(container) ?? LAYER_CELL_ID);
    const origin = container === null ? { x: 0, y: 0 } : requireGroup(graph, container).position;
    const waypoints = (e.route?.waypoints ?? []).map((p) => ({
      x: p.x - origin.x,
      y: p.y - origin.y,
    }));

    const edgeStyle = buildEdgeStyle(e, style);
    cells.push(
      edgeCell(edgeCellId(i), e, edgeStyle, parent, nodeCellId(src), nodeCellId(tgt), waypoints)
    );
  });

  const title = escapeXml(graph.title);
  const bgAttr = darkCanvas ? ` background="${background}"` : '';
  const shadow = style.canvas.shadow ? 1 : 0;
  const body = cells.join('\n').replace(/\n/g, '\n        ');

  return (
    '<mxfile host="swimlane-diagram-mcp" agent="swimlane-diagram-mcp" version="1.0.0">\n' +
    `  <diagram name="${title}" id="diagram-0">\n` +
    `    <mxGraphModel dx="1306" dy="898" grid="1" gridSize="${config.gridSize}" guides="1" ` +
    'tooltips="1" connect="1" arrows="1" fold="1" page="1" pageScale="1" ' +
    `pageWidth="${width}" pageHeight="${height}" math="0" shadow="${shadow}"${bgAttr}>\n` +
    '      <root>\n' +
    `        ${body}\n` +
    '      </root>\n' +
    '    </mxGraphModel>\n' +
    '  </diagram>\n' +
    '</mxfile>\n'
  );
}
