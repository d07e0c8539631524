/**
 * Graph model: builds the in-memory diagram graph from validated input.
 *
 * Nodes and groups live in dense arrays (input order preserved) with
 * id→index maps built once, so later passes never scan linearly for an id.
 * Referential integrity is enforced eagerly; the first structural problem
 * aborts construction and no partial graph is returned.
 */

import {
  DuplicateGroupError,
  DuplicateNodeError,
  InvalidShapeAttributeError,
  SelfLoopError,
  UnknownNodeReferenceError,
} from '../errors';
import { DEFAULT_GROUP_COLOR, DEFAULT_TITLE } from '../constants';
import {
  EVENT_OUTLINES,
  EVENT_SYMBOLS,
  GATEWAY_TYPES,
  isOneOf,
  SHAPE_CATEGORIES,
  TASK_MARKERS,
  type DiagramEdge,
  type DiagramGroup,
  type DiagramInput,
  type DiagramNode,
  type Graph,
  type NodeDescriptor,
  type ShapeAttributes,
  type ShapeCategory,
} from './types';

/**
 * Check the shape category and its shape-specific attributes.
 *
 * Attributes belong to exactly one shape: `marker` to `task`,
 * `symbol`/`outline` to `event`, `gateway_type` to `gateway`.
 */
function resolveShape(desc: NodeDescriptor): { shape: ShapeCategory; attributes: ShapeAttributes } {
  const shape = desc.shape ?? 'rectangle';
  if (!isOneOf(SHAPE_CATEGORIES, shape)) {
    throw new InvalidShapeAttributeError(
      desc.id,
      'shape',
      `Node '${desc.id}' has unknown shape: '${String(shape)}'`
    );
  }

  const checks: Array<{
    key: 'marker' | 'symbol' | 'outline' | 'gateway_type';
    owner: ShapeCategory;
    allowed: readonly string[];
    what: string;
  }> = [
    { key: 'marker', owner: 'task', allowed: TASK_MARKERS, what: 'task marker' },
    { key: 'symbol', owner: 'event', allowed: EVENT_SYMBOLS, what: 'event symbol' },
    { key: 'outline', owner: 'event', allowed: EVENT_OUTLINES, what: 'event outline' },
    { key: 'gateway_type', owner: 'gateway', allowed: GATEWAY_TYPES, what: 'gateway type' },
  ];

  for (const { key, owner, allowed, what } of checks) {
    const value = desc[key];
    if (value === undefined) continue;
    if (shape !== owner) {
      throw new InvalidShapeAttributeError(
        desc.id,
        key,
        `Node '${desc.id}' sets '${key}' but only '${owner}' shapes accept it (shape is '${shape}')`
      );
    }
    if (!allowed.includes(value)) {
      throw new InvalidShapeAttributeError(
        desc.id,
        key,
        `Node '${desc.id}' has unknown ${what}: '${String(value)}'`
      );
    }
  }

  const attributes: ShapeAttributes = {};
  if (desc.marker !== undefined) attributes.marker = desc.marker;
  if (desc.symbol !== undefined) attributes.symbol = desc.symbol;
  if (desc.outline !== undefined) attributes.outline = desc.outline;
  if (desc.gateway_type !== undefined) attributes.gatewayType = desc.gateway_type;
  return { shape, attributes };
}

/**
 * Build a Graph from node, group and connection descriptors.
 *
 * @throws DuplicateNodeError / DuplicateGroupError on a repeated id.
 * @throws UnknownNodeReferenceError when a node names a missing group or a
 *         connection names a missing node.
 * @throws InvalidShapeAttributeError on an unknown shape or a shape attribute
 *         that does not fit the node's shape.
 * @throws SelfLoopError on a connection from a node to itself.
 */
export function buildGraph(input: DiagramInput): Graph {
  const groups: DiagramGroup[] = [];
  const groupIndex = new Map<string, number>();

  for (const desc of input.groups ?? []) {
    if (groupIndex.has(desc.id)) throw new DuplicateGroupError(desc.id);
    groupIndex.set(desc.id, groups.length);
    groups.push({
      id: desc.id,
      label: desc.label ?? desc.id,
      color: desc.color ?? DEFAULT_GROUP_COLOR,
      memberIds: [],
      width: 0,
      height: 0,
      position: { x: 0, y: 0 },
    });
  }

  const nodes: DiagramNode[] = [];
  const nodeIndex = new Map<string, number>();

  input.nodes.forEach((desc, i) => {
    if (nodeIndex.has(desc.id)) throw new DuplicateNodeError(desc.id);

    let groupId: string | null = null;
    if (desc.group !== undefined) {
      const gi = groupIndex.get(desc.group);
      if (gi === undefined) throw new UnknownNodeReferenceError(desc.group, `nodes[${i}].group`);
      groups[gi].memberIds.push(desc.id);
      groupId = desc.group;
    }

    const { shape, attributes } = resolveShape(desc);
    nodeIndex.set(desc.id, nodes.length);
    nodes.push({
      id: desc.id,
      label: desc.label ?? desc.id,
      shape,
      groupId,
      ...(desc.color !== undefined ? { color: desc.color } : {}),
      attributes,
      width: 0,
      height: 0,
      bottomLabel: false,
      local: { x: 0, y: 0 },
      position: { x: 0, y: 0 },
    });
  });

  const edges: DiagramEdge[] = (input.connections ?? []).map((conn, i) => {
    if (!nodeIndex.has(conn.from)) {
      throw new UnknownNodeReferenceError(conn.from, `connections[${i}].from`);
    }
    if (!nodeIndex.has(conn.to)) {
      throw new UnknownNodeReferenceError(conn.to, `connections[${i}].to`);
    }
    if (conn.from === conn.to) throw new SelfLoopError(conn.from, `connections[${i}]`);

    return {
      id: `e${i}`,
      source: conn.from,
      target: conn.to,
      ...(conn.label ? { label: conn.label } : {}),
      lineStyle: conn.style ?? 'solid',
      route: null,
    };
  });

  return {
    title: input.title ?? DEFAULT_TITLE,
    direction: input.direction ?? 'TD',
    nodes,
    groups,
    edges,
    nodeIndex,
    groupIndex,
    canvas: { width: 0, height: 0 },
  };
}

// ── Lookups ────────────────────────────────────────────────────────────────

/** Look up a node by id, throwing when it does not exist. */
export function requireNode(graph: Graph, id: string): DiagramNode {
  const idx = graph.nodeIndex.get(id);
  if (idx === undefined) throw new UnknownNodeReferenceError(id, 'node');
  return graph.nodes[idx];
}

/** Look up a group by id, throwing when it does not exist. */
export function requireGroup(graph: Graph, id: string): DiagramGroup {
  const idx = graph.groupIndex.get(id);
  if (idx === undefined) throw new UnknownNodeReferenceError(id, 'group');
  return graph.groups[idx];
}

/** Member nodes of a group in stacking order. */
export function groupMembers(graph: Graph, group: DiagramGroup): DiagramNode[] {
  return group.memberIds.map((id) => requireNode(graph, id));
}

/** Nodes that belong to no group, in input order. */
export function ungroupedNodes(graph: Graph): DiagramNode[] {
  return graph.nodes.filter((n) => n.groupId === null);
}
