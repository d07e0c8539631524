/**
 * ASCII renderer: rasterizes the positioned diagram onto a character grid.
 *
 * Draw order: group frames, edges (orthogonal polylines with arrowheads
 * and labels), then nodes, whose opaque boxes cover any line underneath.
 * The result is cropped to its content.
 */

import { orthogonalize, type Point, type Rect } from '../geometry';
import type { DiagramNode, Graph } from '../model/types';
import { flattenLabel } from './escape';

export interface AsciiExportOptions {
  /** Diagram units per character cell on both axes (default 10). */
  scale?: number;
}

const DEFAULT_SCALE = 10;

// ── Character grid ─────────────────────────────────────────────────────────

export class CharGrid {
  private readonly cells: string[][];

  constructor(
    readonly width: number,
    readonly height: number
  ) {
    this.cells = Array.from({ length: height }, () => new Array<string>(width).fill(' '));
  }

  get(col: number, row: number): string {
    return this.cells[row]?.[col] ?? ' ';
  }

  set(col: number, row: number, ch: string): void {
    if (row < 0 || row >= this.height || col < 0 || col >= this.width) return;
    this.cells[row][col] = ch;
  }

  /** Write `text` left-to-right starting at (col, row), clipped to the grid. */
  write(col: number, row: number, text: string): void {
    for (let i = 0; i < text.length; i++) this.set(col + i, row, text[i]);
  }

  /** Rows with trailing spaces removed, cropped to the non-blank area. */
  toLines(): string[] {
    const lines = this.cells.map((r) => r.join('').trimEnd());
    const first = lines.findIndex((l) => l.length > 0);
    if (first === -1) return [];
    let last = lines.length - 1;
    while (lines[last].length === 0) last--;
    const body = lines.slice(first, last + 1);
    const indent = Math.min(
      ...body.filter((l) => l.length > 0).map((l) => l.length - l.trimStart().length)
    );
    return body.map((l) => l.slice(indent));
  }
}

// ── Drawing helpers ────────────────────────────────────────────────────────

interface CellRect {
  c0: number;
  r0: number;
  c1: number;
  r1: number;
}

function toCells(rect: Rect, scale: number): CellRect {
  return {
    c0: Math.round(rect.x / scale),
    r0: Math.round(rect.y / scale),
    c1: Math.round((rect.x + rect.width) / scale),
    r1: Math.round((rect.y + rect.height) / scale),
  };
}

function drawFrame(grid: CharGrid, r: CellRect, fill: boolean): void {
  for (let row = r.r0; row <= r.r1; row++) {
    for (let col = r.c0; col <= r.c1; col++) {
      const onRow = row === r.r0 || row === r.r1;
      const onCol = col === r.c0 || col === r.c1;
      if (onRow && onCol) grid.set(col, row, '+');
      else if (onRow) grid.set(col, row, '-');
      else if (onCol) grid.set(col, row, '|');
      else if (fill) grid.set(col, row, ' ');
    }
  }
}

/** Write `text` centred between columns c0 and c1 (inclusive), truncated to fit. */
function writeCentred(grid: CharGrid, c0: number, c1: number, row: number, text: string): void {
  const room = c1 - c0 + 1;
  if (room <= 0) return;
  const shown = text.length > room ? text.slice(0, room) : text;
  grid.write(c0 + Math.floor((room - shown.length) / 2), row, shown);
}

function drawLineCell(grid: CharGrid, col: number, row: number, ch: '-' | '|'): void {
  const existing = grid.get(col, row);
  const crossing = (existing === '-' && ch === '|') || (existing === '|' && ch === '-');
  grid.set(col, row, crossing || existing === '+' ? '+' : ch);
}

function arrowHead(from: Point, to: Point): { ch: string; dc: number; dr: number } {
  if (to.x > from.x) return { ch: '>', dc: -1, dr: 0 };
  if (to.x < from.x) return { ch: '<', dc: 1, dr: 0 };
  if (to.y > from.y) return { ch: 'v', dc: 0, dr: -1 };
  return { ch: '^', dc: 0, dr: 1 };
}

function drawPolyline(grid: CharGrid, pts: Point[], label: string | undefined): void {
  for (let i = 0; i < pts.length - 1; i++) {
    const a = pts[i];
    const b = pts[i + 1];
    if (a.y === b.y) {
      for (let c = Math.min(a.x, b.x); c <= Math.max(a.x, b.x); c++) drawLineCell(grid, c, a.y, '-');
    } else {
      for (let r = Math.min(a.y, b.y); r <= Math.max(a.y, b.y); r++) drawLineCell(grid, a.x, r, '|');
    }
  }
  for (let i = 1; i < pts.length - 1; i++) grid.set(pts[i].x, pts[i].y, '+');

  if (label) {
    // Label beside the middle segment.
    const m = Math.floor((pts.length - 2) / 2);
    const a = pts[m];
    const b = pts[m + 1];
    const midC = Math.floor((a.x + b.x) / 2);
    const midR = Math.floor((a.y + b.y) / 2);
    if (a.x === b.x) grid.write(midC + 2, midR, label);
    else grid.write(midC - Math.floor(label.length / 2), midR - 1, label);
  }

  const end = pts[pts.length - 1];
  const head = arrowHead(pts[pts.length - 2], end);
  grid.set(end.x + head.dc, end.y + head.dr, head.ch);
}

function drawNode(grid: CharGrid, node: DiagramNode, scale: number): void {
  const r = toCells({ x: node.position.x, y: node.position.y, width: node.width, height: node.height }, scale);
  drawFrame(grid, r, true);
  const label = flattenLabel(node.label);
  if (node.bottomLabel) {
    writeCentred(grid, r.c0 - label.length, r.c1 + label.length, r.r1 + 1, label);
  } else {
    writeCentred(grid, r.c0 + 1, r.c1 - 1, Math.floor((r.r0 + r.r1) / 2), label);
  }
}

// ── Export ─────────────────────────────────────────────────────────────────

/** Render a laid-out graph as plain text. */
export function exportAscii(graph: Graph, options: AsciiExportOptions = {}): string {
  const scale = options.scale ?? DEFAULT_SCALE;
  const toCell = (p: Point): Point => ({ x: Math.round(p.x / scale), y: Math.round(p.y / scale) });

  // One spare row for captions under the lowest node.
  const grid = new CharGrid(
    Math.ceil(graph.canvas.width / scale) + 1,
    Math.ceil(graph.canvas.height / scale) + 2
  );

  for (const group of graph.groups) {
    const r = toCells({ ...group.position, width: group.width, height: group.height }, scale);
    drawFrame(grid, r, false);
    grid.write(r.c0 + 2, r.r0 + 1, flattenLabel(group.label).slice(0, Math.max(0, r.c1 - r.c0 - 3)));
  }

  for (const edge of graph.edges) {
    const route = edge.route;
    if (!route) continue;
    const ortho = orthogonalize(route.points, route.sourceSide, route.targetSide);
    const cells = orthogonalize(ortho.map(toCell), route.sourceSide, route.targetSide);
    if (cells.length < 2) continue;
    drawPolyline(grid, cells, edge.label ? flattenLabel(edge.label) : undefined);
  }

  for (const node of graph.nodes) drawNode(grid, node, scale);

  return `${grid.toLines().join('\n')}\n`;
}
