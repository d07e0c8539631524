/**
 * Centralised magic numbers, shape-size table and default layout
 * configuration.
 *
 * Keeps layout-related values in one place so changes propagate
 * consistently across the sizing, stacking, placement and routing passes.
 */

import type { LayoutConfig } from './layout/types';
import type { ShapeCategory } from './model/types';

/** Default node size (px) for shapes without an entry in {@link SHAPE_DIMENSIONS}. */
export const DEFAULT_NODE_WIDTH = 200;
export const DEFAULT_NODE_HEIGHT = 40;

/**
 * Per-shape dimension overrides for shapes that look wrong at the default
 * 200×40 box.
 */
export const SHAPE_DIMENSIONS: Readonly<
  Partial<Record<ShapeCategory, { width: number; height: number }>>
> = {
  actor: { width: 40, height: 60 },
  cloud: { width: 200, height: 80 },
  document: { width: 200, height: 60 },
  hexagon: { width: 120, height: 60 },
  task: { width: 120, height: 80 },
  event: { width: 50, height: 50 },
  gateway: { width: 50, height: 50 },
};

/** Shapes whose caption renders below the body and need trailing clearance. */
export const BOTTOM_LABEL_SHAPES: ReadonlySet<ShapeCategory> = new Set<ShapeCategory>([
  'event',
  'gateway',
  'actor',
]);

/**
 * Default layout configuration.
 *
 * Every value is a tunable convention; callers override any subset through
 * `resolveLayoutConfig()`.
 */
export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = Object.freeze({
  nodeGap: 20,
  bottomLabelPadding: 25,
  groupGap: 60,
  backwardClearance: 40,
  canvasWidth: 1200,
  canvasHeight: 800,
  canvasMargin: 40,
  canvasPadding: 100,
  flowCrossOffset: 100,
  groupCrossSize: 280,
  groupMinPrimarySize: 200,
  groupHeaderSize: 30,
  skipRouteInset: 15,
  gridSize: 10,
});

/** Default palette colour for groups without an explicit colour. */
export const DEFAULT_GROUP_COLOR = 'blue';

/** Default palette colour for ungrouped nodes without an explicit colour. */
export const DEFAULT_NODE_COLOR = 'white';

/** Default diagram title. */
export const DEFAULT_TITLE = 'Diagram';
