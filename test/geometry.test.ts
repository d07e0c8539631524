import { describe, test, expect } from 'vitest';
import {
  anchorPoint,
  boundingBox,
  centreOf,
  deduplicatePoints,
  orthogonalize,
  rectsOverlap,
  segmentIntersectsRect,
  segmentsIntersect,
} from '../src/geometry';

describe('geometry', () => {
  describe('rectsOverlap', () => {
    test('detects overlapping rectangles', () => {
      const a = { x: 0, y: 0, width: 100, height: 80 };
      const b = { x: 50, y: 40, width: 100, height: 80 };
      expect(rectsOverlap(a, b)).toBe(true);
    });

    test('detects non-overlapping rectangles (side by side)', () => {
      const a = { x: 0, y: 0, width: 100, height: 80 };
      const b = { x: 200, y: 0, width: 100, height: 80 };
      expect(rectsOverlap(a, b)).toBe(false);
    });

    test('detects non-overlapping rectangles (above/below)', () => {
      const a = { x: 0, y: 0, width: 100, height: 80 };
      const b = { x: 0, y: 100, width: 100, height: 80 };
      expect(rectsOverlap(a, b)).toBe(false);
    });

    test('touching rectangles do not overlap', () => {
      const a = { x: 0, y: 0, width: 100, height: 80 };
      const b = { x: 100, y: 0, width: 100, height: 80 };
      expect(rectsOverlap(a, b)).toBe(false);
    });

    test('detects contained rectangle', () => {
      const a = { x: 0, y: 0, width: 100, height: 80 };
      const b = { x: 10, y: 10, width: 20, height: 20 };
      expect(rectsOverlap(a, b)).toBe(true);
    });
  });

  describe('anchorPoint', () => {
    const rect = { x: 10, y: 20, width: 100, height: 40 };

    test('returns the midpoint of each side', () => {
      expect(anchorPoint(rect, 'top')).toEqual({ x: 60, y: 20 });
      expect(anchorPoint(rect, 'bottom')).toEqual({ x: 60, y: 60 });
      expect(anchorPoint(rect, 'left')).toEqual({ x: 10, y: 40 });
      expect(anchorPoint(rect, 'right')).toEqual({ x: 110, y: 40 });
    });

    test('rounds odd centres', () => {
      expect(centreOf({ x: 10, y: 0, width: 51, height: 51 })).toEqual({ x: 36, y: 26 });
    });
  });

  describe('boundingBox', () => {
    test('empty input yields a zero rect', () => {
      expect(boundingBox([])).toEqual({ x: 0, y: 0, width: 0, height: 0 });
    });

    test('covers every point', () => {
      expect(
        boundingBox([
          { x: 5, y: 10 },
          { x: -5, y: 20 },
          { x: 15, y: 0 },
        ])
      ).toEqual({ x: -5, y: 0, width: 20, height: 20 });
    });
  });

  describe('segmentIntersectsRect', () => {
    const rect = { x: 0, y: 0, width: 100, height: 100 };

    test('segment crossing the rect', () => {
      expect(segmentIntersectsRect({ x: -10, y: 50 }, { x: 110, y: 50 }, rect)).toBe(true);
    });

    test('segment entirely inside', () => {
      expect(segmentIntersectsRect({ x: 50, y: 50 }, { x: 60, y: 60 }, rect)).toBe(true);
    });

    test('segment beside the rect', () => {
      expect(segmentIntersectsRect({ x: -10, y: -10 }, { x: -10, y: 110 }, rect)).toBe(false);
    });

    test('diagonal passing outside a corner', () => {
      expect(segmentIntersectsRect({ x: -50, y: 0 }, { x: 0, y: -50 }, rect)).toBe(false);
    });

    test('segment running along the border counts', () => {
      expect(segmentIntersectsRect({ x: 0, y: -10 }, { x: 0, y: 110 }, rect)).toBe(true);
    });
  });

  describe('segmentsIntersect', () => {
    test('proper crossing', () => {
      expect(segmentsIntersect({ x: 0, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 }, { x: 10, y: 0 })).toBe(
        true
      );
    });

    test('shared endpoint is not a crossing', () => {
      expect(segmentsIntersect({ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 })).toBe(
        false
      );
    });

    test('parallel segments never cross', () => {
      expect(segmentsIntersect({ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 0, y: 5 }, { x: 10, y: 5 })).toBe(
        false
      );
    });

    test('T-junction is not a crossing', () => {
      expect(segmentsIntersect({ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 5, y: 0 }, { x: 5, y: 10 })).toBe(
        false
      );
    });
  });

  describe('deduplicatePoints', () => {
    test('drops consecutive duplicates only', () => {
      expect(
        deduplicatePoints([
          { x: 0, y: 0 },
          { x: 0, y: 0 },
          { x: 1, y: 1 },
          { x: 1, y: 1 },
          { x: 0, y: 0 },
        ])
      ).toEqual([
        { x: 0, y: 0 },
        { x: 1, y: 1 },
        { x: 0, y: 0 },
      ]);
    });

    test('honours the tolerance', () => {
      expect(
        deduplicatePoints(
          [
            { x: 0, y: 0 },
            { x: 1, y: 1 },
          ],
          1
        )
      ).toEqual([{ x: 0, y: 0 }]);
    });
  });

  describe('orthogonalize', () => {
    test('horizontal exit and entry produce a Z through the middle column', () => {
      expect(orthogonalize([{ x: 0, y: 0 }, { x: 100, y: 50 }], 'right', 'left')).toEqual([
        { x: 0, y: 0 },
        { x: 50, y: 0 },
        { x: 50, y: 50 },
        { x: 100, y: 50 },
      ]);
    });

    test('vertical exit and entry produce a Z through the middle row', () => {
      expect(orthogonalize([{ x: 0, y: 0 }, { x: 100, y: 50 }], 'bottom', 'top')).toEqual([
        { x: 0, y: 0 },
        { x: 0, y: 25 },
        { x: 100, y: 25 },
        { x: 100, y: 50 },
      ]);
    });

    test('mixed axes produce a single elbow', () => {
      expect(orthogonalize([{ x: 0, y: 0 }, { x: 100, y: 50 }], 'right', 'top')).toEqual([
        { x: 0, y: 0 },
        { x: 100, y: 0 },
        { x: 100, y: 50 },
      ]);
    });

    test('already orthogonal polylines are unchanged', () => {
      const pts = [
        { x: 180, y: 240 },
        { x: 180, y: 300 },
        { x: 500, y: 300 },
        { x: 500, y: 240 },
      ];
      expect(orthogonalize(pts, 'bottom', 'bottom')).toEqual(pts);
    });

    test('straight segment stays a single segment', () => {
      expect(orthogonalize([{ x: 10, y: 0 }, { x: 10, y: 90 }], 'bottom', 'top')).toEqual([
        { x: 10, y: 0 },
        { x: 10, y: 90 },
      ]);
    });
  });
});
