/**
 * Shared types for the layout engine.
 */

import type { Graph } from '../model/types';
import type { LayoutLogger } from './layout-logger';
import type { RoutingIndex } from './edge-routing';

/**
 * Tunable layout constants.  All values are in diagram units (px).
 *
 * "Primary" is the stacking axis inside a group (vertical for `TD`,
 * horizontal for `LR`); "cross" is the orthogonal axis along which members
 * are centred and along which groups are placed on the canvas.
 */
export interface LayoutConfig {
  /** Gap between consecutive members of a group. */
  nodeGap: number;
  /** Extra trailing gap after a bottom-label node (event, gateway, actor). */
  bottomLabelPadding: number;
  /** Gap between groups, and between nodes of the free (ungrouped) stack. */
  groupGap: number;
  /** Distance of the backward-edge routing line beyond every group. */
  backwardClearance: number;
  /** Minimum canvas width. */
  canvasWidth: number;
  /** Minimum canvas height. */
  canvasHeight: number;
  /** Offset of the first group from the canvas origin on both axes. */
  canvasMargin: number;
  /** Space kept between the content's far edge and the canvas border. */
  canvasPadding: number;
  /** Cross-axis origin of the free stack when the diagram has no groups. */
  flowCrossOffset: number;
  /** Default (minimum) cross-axis extent of a group. */
  groupCrossSize: number;
  /** Minimum primary-axis extent of a group with at least one member. */
  groupMinPrimarySize: number;
  /** Size of the group's title band along the primary axis. */
  groupHeaderSize: number;
  /** Inset of the skip-edge side lane from the group's far cross border. */
  skipRouteInset: number;
  /** Grid size advertised to the target editor. */
  gridSize: number;
}

/** Optional parameters for a layout run. */
export interface LayoutOptions {
  /** Overrides merged over `DEFAULT_LAYOUT_CONFIG`. */
  config?: Partial<LayoutConfig>;
}

/**
 * Shared context threaded through the layout pipeline steps.
 */
export interface LayoutContext {
  graph: Graph;
  config: LayoutConfig;
  /** Logger for the current pipeline invocation. */
  log: LayoutLogger;
  /** Output slot populated by the `routeEdges` step. */
  routingIndex?: RoutingIndex;
}

/**
 * A single step in the layout pipeline.
 */
export interface PipelineStep {
  /** Human-readable step name for logging. */
  name: string;
  /** Execute the step.  Steps are synchronous: the engine has no I/O. */
  run: (ctx: LayoutContext) => void;
  /** Return true to skip this step for the given context. */
  skip?: (ctx: LayoutContext) => boolean;
}
