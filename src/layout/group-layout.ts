/**
 * Group Layout: stacks each group's members along the primary axis,
 * centres them on the cross axis and sizes the group box.
 *
 * Stacking and equalization are separate passes: `layoutGroups` computes
 * every group's raw extent, `equalizeGroupExtents` then stretches all of
 * them to the largest one so the swimlanes line up.
 */

import { LayoutInvariantViolation } from '../errors';
import type { DiagramNode, Graph } from '../model/types';
import { groupMembers } from '../model/graph';
import type { LayoutConfig } from './types';
import { crossSize, pointAt, primarySize, sizeOf } from './axes';

/** Trailing gap after a node: the base gap plus the caption allowance. */
export function trailingGap(node: DiagramNode, gap: number, config: LayoutConfig): number {
  return gap + (node.bottomLabel ? config.bottomLabelPadding : 0);
}

/**
 * Stack members and size every group (raw extents, before equalization).
 *
 * Members get group-local positions; absolute positions are assigned by
 * the canvas pass once the group origins are known.
 */
export function layoutGroups(graph: Graph, config: LayoutConfig): void {
  const dir = graph.direction;

  for (const group of graph.groups) {
    const members = groupMembers(graph, group);

    const widest = members.reduce((m, n) => Math.max(m, crossSize(n, dir)), 0);
    const groupCross = Math.max(config.groupCrossSize, widest + 2 * config.nodeGap);

    let cursor = config.groupHeaderSize + config.nodeGap;
    for (const node of members) {
      const offset = Math.floor((groupCross - crossSize(node, dir)) / 2);
      node.local = pointAt(cursor, offset, dir);
      cursor += primarySize(node, dir) + trailingGap(node, config.nodeGap, config);
    }

    // Empty groups keep a header-only box.
    const groupPrimary =
      members.length === 0
        ? config.groupHeaderSize + config.nodeGap
        : Math.max(config.groupMinPrimarySize, cursor + config.nodeGap);

    if (groupPrimary <= 0 || groupCross <= 0) {
      throw new LayoutInvariantViolation(
        `Group '${group.id}' has a non-positive extent (${groupPrimary}×${groupCross})`
      );
    }

    const size = sizeOf(groupPrimary, groupCross, dir);
    group.width = size.width;
    group.height = size.height;
  }
}

/**
 * Set every group's primary extent to the maximum across all groups.
 * Idempotent: a second run changes nothing.
 */
export function equalizeGroupExtents(graph: Graph): void {
  const dir = graph.direction;
  const max = graph.groups.reduce((m, g) => Math.max(m, primarySize(g, dir)), 0);
  for (const group of graph.groups) {
    const size = sizeOf(max, crossSize(group, dir), dir);
    group.width = size.width;
    group.height = size.height;
  }
}
