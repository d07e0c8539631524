/**
 * Shared geometry utilities: rectangles, anchors, bounding boxes,
 * segment/rectangle intersection and orthogonal polylines.
 *
 * Pure functions, just math.
 */

// ── Types ──────────────────────────────────────────────────────────────────

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type Side = 'top' | 'bottom' | 'left' | 'right';

// ── Rect helpers ───────────────────────────────────────────────────────────

export function centreOf(rect: Rect): Point {
  return { x: Math.round(rect.x + rect.width / 2), y: Math.round(rect.y + rect.height / 2) };
}

/** Midpoint of the given side of a rectangle. */
export function anchorPoint(rect: Rect, side: Side): Point {
  const c = centreOf(rect);
  switch (side) {
    case 'top':
      return { x: c.x, y: rect.y };
    case 'bottom':
      return { x: c.x, y: rect.y + rect.height };
    case 'left':
      return { x: rect.x, y: c.y };
    case 'right':
      return { x: rect.x + rect.width, y: c.y };
  }
}

/** Smallest axis-aligned rectangle containing every point. */
export function boundingBox(points: ReadonlyArray<Point>): Rect {
  if (points.length === 0) return { x: 0, y: 0, width: 0, height: 0 };
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const p of points) {
    minX = Math.min(minX, p.x);
    minY = Math.min(minY, p.y);
    maxX = Math.max(maxX, p.x);
    maxY = Math.max(maxY, p.y);
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY };
}

// ── Bounding-box overlap ───────────────────────────────────────────────────

/** Check if two axis-aligned rectangles overlap (touching edges do not count). */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x < b.x + b.width && a.x + a.width > b.x && a.y < b.y + b.height && a.y + a.height > b.y;
}

// ── Line segment ↔ rectangle intersection ──────────────────────────────────

/**
 * Cohen-Sutherland outcodes for a point relative to a rectangle.
 */
function outcode(px: number, py: number, rect: Rect): number {
  let code = 0;
  if (px < rect.x) {
    code |= 1; // LEFT
  } else if (px > rect.x + rect.width) {
    code |= 2; // RIGHT
  }
  if (py < rect.y) {
    code |= 4; // TOP
  } else if (py > rect.y + rect.height) {
    code |= 8; // BOTTOM
  }
  return code;
}

/**
 * Test whether line segment (p1→p2) intersects an axis-aligned rectangle.
 * Uses the Cohen-Sutherland algorithm.  Segments lying on the border count
 * as intersecting.
 */
export function segmentIntersectsRect(p1: Point, p2: Point, rect: Rect): boolean {
  let x0 = p1.x,
    y0 = p1.y,
    x1 = p2.x,
    y1 = p2.y;
  let code0 = outcode(x0, y0, rect);
  let code1 = outcode(x1, y1, rect);

  for (;;) {
    if ((code0 | code1) === 0) return true; // both inside
    if ((code0 & code1) !== 0) return false; // both outside same side

    const codeOut = code0 !== 0 ? code0 : code1;
    let x = 0,
      y = 0;
    const xMin = rect.x,
      xMax = rect.x + rect.width;
    const yMin = rect.y,
      yMax = rect.y + rect.height;

    if (codeOut & 8) {
      // BOTTOM
      x = x0 + ((x1 - x0) * (yMax - y0)) / (y1 - y0);
      y = yMax;
    } else if (codeOut & 4) {
      // TOP
      x = x0 + ((x1 - x0) * (yMin - y0)) / (y1 - y0);
      y = yMin;
    } else if (codeOut & 2) {
      // RIGHT
      y = y0 + ((y1 - y0) * (xMax - x0)) / (x1 - x0);
      x = xMax;
    } else if (codeOut & 1) {
      // LEFT
      y = y0 + ((y1 - y0) * (xMin - x0)) / (x1 - x0);
      x = xMin;
    }

    if (codeOut === code0) {
      x0 = x;
      y0 = y;
      code0 = outcode(x0, y0, rect);
    } else {
      x1 = x;
      y1 = y;
      code1 = outcode(x1, y1, rect);
    }
  }
}

/** Signed area of the triangle (o, a, b); sign gives the turn direction. */
function cross(o: Point, a: Point, b: Point): number {
  return (a.x - o.x) * (b.y - o.y) - (a.y - o.y) * (b.x - o.x);
}

/**
 * True when segments a1→a2 and b1→b2 properly cross each other.
 * Collinear overlaps and shared endpoints do not count.
 */
export function segmentsIntersect(a1: Point, a2: Point, b1: Point, b2: Point): boolean {
  const d1 = cross(b1, b2, a1);
  const d2 = cross(b1, b2, a2);
  const d3 = cross(a1, a2, b1);
  const d4 = cross(a1, a2, b2);
  return d1 * d2 < 0 && d3 * d4 < 0;
}

// ── Polylines ──────────────────────────────────────────────────────────────

/**
 * Remove consecutive duplicate points (within `tolerance` on both axes).
 */
export function deduplicatePoints(points: ReadonlyArray<Point>, tolerance = 0): Point[] {
  const out: Point[] = [];
  for (const p of points) {
    const prev = out[out.length - 1];
    if (!prev || Math.abs(prev.x - p.x) > tolerance || Math.abs(prev.y - p.y) > tolerance) {
      out.push({ x: p.x, y: p.y });
    }
  }
  return out;
}

function isHorizontalSide(side: Side): boolean {
  return side === 'left' || side === 'right';
}

/**
 * Turn a polyline into a strictly orthogonal one by inserting elbows into
 * every diagonal segment.
 *
 * A diagonal segment whose start and end both run along the same axis gets
 * a Z-shape through the midpoint:
 *
 * ```
 *  src ──→ midX
 *            │
 *          midX ──→ tgt
 * ```
 *
 * Otherwise a single L-elbow is inserted.  The first segment leaves along
 * the axis of `exitSide`, the last one arrives along the axis of
 * `entrySide`.
 */
export function orthogonalize(
  points: ReadonlyArray<Point>,
  exitSide: Side,
  entrySide: Side
): Point[] {
  if (points.length < 2) return deduplicatePoints(points);

  const out: Point[] = [{ x: points[0].x, y: points[0].y }];
  let startHorizontal = isHorizontalSide(exitSide);

  for (let i = 1; i < points.length; i++) {
    const a = out[out.length - 1];
    const b = points[i];
    const last = i === points.length - 1;

    if (a.x !== b.x && a.y !== b.y) {
      const endHorizontal = last ? isHorizontalSide(entrySide) : startHorizontal;
      if (startHorizontal && endHorizontal) {
        const midX = Math.round((a.x + b.x) / 2);
        out.push({ x: midX, y: a.y }, { x: midX, y: b.y });
      } else if (!startHorizontal && !endHorizontal) {
        const midY = Math.round((a.y + b.y) / 2);
        out.push({ x: a.x, y: midY }, { x: b.x, y: midY });
      } else if (startHorizontal) {
        out.push({ x: b.x, y: a.y });
      } else {
        out.push({ x: a.x, y: b.y });
      }
      startHorizontal = !endHorizontal;
    } else {
      // Straight leg: the next one turns onto the other axis.
      startHorizontal = a.x === b.x;
    }
    out.push({ x: b.x, y: b.y });
  }

  return deduplicatePoints(out);
}
