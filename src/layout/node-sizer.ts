/**
 * Node Sizer: assigns every node its width, height and bottom-label flag
 * from the fixed shape table.
 */

import {
  BOTTOM_LABEL_SHAPES,
  DEFAULT_NODE_HEIGHT,
  DEFAULT_NODE_WIDTH,
  SHAPE_DIMENSIONS,
} from '../constants';
import type { Graph, ShapeCategory } from '../model/types';

export interface ShapeSize {
  width: number;
  height: number;
  bottomLabel: boolean;
}

/** Size and label placement for a shape category. Pure table lookup. */
export function sizeFor(shape: ShapeCategory): ShapeSize {
  const dims = SHAPE_DIMENSIONS[shape];
  return {
    width: dims?.width ?? DEFAULT_NODE_WIDTH,
    height: dims?.height ?? DEFAULT_NODE_HEIGHT,
    bottomLabel: BOTTOM_LABEL_SHAPES.has(shape),
  };
}

/** Apply {@link sizeFor} to every node of the graph. */
export function sizeNodes(graph: Graph): void {
  for (const node of graph.nodes) {
    const size = sizeFor(node.shape);
    node.width = size.width;
    node.height = size.height;
    node.bottomLabel = size.bottomLabel;
  }
}
