/**
 * Schema validation for raw diagram input (parsed JSON of unknown shape).
 *
 * Unlike `buildGraph`, which stops at the first structural problem, this
 * walks the whole document and reports every issue it finds, so callers
 * can fix their input in one round trip.
 */

import { InputValidationError } from '../errors';
import {
  EVENT_OUTLINES,
  EVENT_SYMBOLS,
  FLOW_DIRECTIONS,
  GATEWAY_TYPES,
  isOneOf,
  LINE_STYLES,
  SHAPE_CATEGORIES,
  TASK_MARKERS,
  type ConnectionDescriptor,
  type DiagramInput,
  type GroupDescriptor,
  type NodeDescriptor,
} from '../model/types';

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface ReadResult {
  input: DiagramInput;
  issues: string[];
}

/** Read an optional string field; records an issue when it has another type. */
function optionalString(
  obj: JsonObject,
  key: string,
  where: string,
  issues: string[]
): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    issues.push(`${where} '${key}' must be a string`);
    return undefined;
  }
  return value;
}

function readId(obj: JsonObject, where: string, issues: string[]): string | undefined {
  const id = obj.id;
  if (id === undefined) {
    issues.push(`${where} missing 'id'`);
    return undefined;
  }
  if (typeof id !== 'string' || id.length === 0) {
    issues.push(`${where} 'id' must be a non-empty string`);
    return undefined;
  }
  return id;
}

function readArray(raw: JsonObject, key: string, issues: string[]): unknown[] {
  const value = raw[key];
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    issues.push(`'${key}' must be an array`);
    return [];
  }
  return value;
}

function readGroups(raw: JsonObject, issues: string[]): GroupDescriptor[] {
  const seen = new Set<string>();
  const groups: GroupDescriptor[] = [];

  readArray(raw, 'groups', issues).forEach((item, i) => {
    if (!isRecord(item)) {
      issues.push(`Group ${i} must be an object`);
      return;
    }
    const id = readId(item, `Group ${i}`, issues);
    if (id === undefined) return;
    if (seen.has(id)) {
      issues.push(`Duplicate group id: ${id}`);
      return;
    }
    seen.add(id);

    const group: GroupDescriptor = { id };
    const label = optionalString(item, 'label', `Group '${id}'`, issues);
    const color = optionalString(item, 'color', `Group '${id}'`, issues);
    if (label !== undefined) group.label = label;
    if (color !== undefined) group.color = color;
    groups.push(group);
  });

  return groups;
}

function readShapeFields(item: JsonObject, node: NodeDescriptor, issues: string[]): void {
  const id = node.id;
  const shape = item.shape;
  if (shape !== undefined) {
    if (!isOneOf(SHAPE_CATEGORIES, shape)) {
      issues.push(`Node '${id}' has unknown shape: '${String(shape)}'`);
      return;
    }
    node.shape = shape;
  }
  const effective = node.shape ?? 'rectangle';

  const misplaced = (key: string, owner: string): void => {
    issues.push(`Node '${id}' sets '${key}' but only '${owner}' shapes accept it`);
  };

  if (item.marker !== undefined) {
    if (effective !== 'task') misplaced('marker', 'task');
    else if (!isOneOf(TASK_MARKERS, item.marker)) {
      issues.push(`Node '${id}' has unknown task marker: '${String(item.marker)}'`);
    } else node.marker = item.marker;
  }
  if (item.symbol !== undefined) {
    if (effective !== 'event') misplaced('symbol', 'event');
    else if (!isOneOf(EVENT_SYMBOLS, item.symbol)) {
      issues.push(`Node '${id}' has unknown event symbol: '${String(item.symbol)}'`);
    } else node.symbol = item.symbol;
  }
  if (item.outline !== undefined) {
    if (effective !== 'event') misplaced('outline', 'event');
    else if (!isOneOf(EVENT_OUTLINES, item.outline)) {
      issues.push(`Node '${id}' has unknown event outline: '${String(item.outline)}'`);
    } else node.outline = item.outline;
  }
  if (item.gateway_type !== undefined) {
    if (effective !== 'gateway') misplaced('gateway_type', 'gateway');
    else if (!isOneOf(GATEWAY_TYPES, item.gateway_type)) {
      issues.push(`Node '${id}' has unknown gateway type: '${String(item.gateway_type)}'`);
    } else node.gateway_type = item.gateway_type;
  }
}

function readNodes(raw: JsonObject, groupIds: Set<string>, issues: string[]): NodeDescriptor[] {
  const seen = new Set<string>();
  const nodes: NodeDescriptor[] = [];

  readArray(raw, 'nodes', issues).forEach((item, i) => {
    if (!isRecord(item)) {
      issues.push(`Node ${i} must be an object`);
      return;
    }
    const id = readId(item, `Node ${i}`, issues);
    if (id === undefined) return;
    if (seen.has(id)) {
      issues.push(`Duplicate node id: ${id}`);
      return;
    }
    seen.add(id);

    const node: NodeDescriptor = { id };
    const where = `Node '${id}'`;
    const label = optionalString(item, 'label', where, issues);
    const color = optionalString(item, 'color', where, issues);
    const group = optionalString(item, 'group', where, issues);
    if (label !== undefined) node.label = label;
    if (color !== undefined) node.color = color;
    if (group !== undefined) {
      if (groupIds.has(group)) node.group = group;
      else issues.push(`${where} references unknown group: '${group}'`);
    }
    readShapeFields(item, node, issues);
    nodes.push(node);
  });

  return nodes;
}

function readEndpoint(
  item: JsonObject,
  key: 'from' | 'to',
  i: number,
  nodeIds: Set<string>,
  issues: string[]
): string | undefined {
  const value = item[key];
  if (value === undefined) {
    issues.push(`Connection ${i} missing '${key}'`);
    return undefined;
  }
  if (typeof value !== 'string' || !nodeIds.has(value)) {
    issues.push(`Connection ${i} '${key}' references unknown id: ${String(value)}`);
    return undefined;
  }
  return value;
}

function readConnections(
  raw: JsonObject,
  nodeIds: Set<string>,
  issues: string[]
): ConnectionDescriptor[] {
  const connections: ConnectionDescriptor[] = [];

  readArray(raw, 'connections', issues).forEach((item, i) => {
    if (!isRecord(item)) {
      issues.push(`Connection ${i} must be an object`);
      return;
    }
    const from = readEndpoint(item, 'from', i, nodeIds, issues);
    const to = readEndpoint(item, 'to', i, nodeIds, issues);
    const label = optionalString(item, 'label', `Connection ${i}`, issues);

    let style: ConnectionDescriptor['style'];
    if (item.style !== undefined) {
      if (isOneOf(LINE_STYLES, item.style)) style = item.style;
      else issues.push(`Connection ${i} has unknown style: '${String(item.style)}'`);
    }

    if (from === undefined || to === undefined) return;
    if (from === to) {
      issues.push(`Connection ${i} connects '${from}' to itself`);
      return;
    }

    const conn: ConnectionDescriptor = { from, to };
    if (label !== undefined) conn.label = label;
    if (style !== undefined) conn.style = style;
    connections.push(conn);
  });

  return connections;
}

function readDiagramInput(raw: unknown): ReadResult {
  const issues: string[] = [];
  if (!isRecord(raw)) {
    return { input: { nodes: [] }, issues: ['Input must be a JSON object'] };
  }
  if (raw.nodes === undefined && raw.groups === undefined) {
    issues.push("Input must have 'nodes' or 'groups'");
  }

  const input: DiagramInput = { nodes: [] };
  const title = optionalString(raw, 'title', 'Input', issues);
  const style = optionalString(raw, 'style', 'Input', issues);
  if (title !== undefined) input.title = title;
  if (style !== undefined) input.style = style;

  if (raw.direction !== undefined) {
    if (isOneOf(FLOW_DIRECTIONS, raw.direction)) input.direction = raw.direction;
    else issues.push(`'direction' must be one of: ${FLOW_DIRECTIONS.join(', ')}`);
  }

  const groups = readGroups(raw, issues);
  const nodes = readNodes(raw, new Set(groups.map((g) => g.id)), issues);
  const connections = readConnections(raw, new Set(nodes.map((n) => n.id)), issues);

  input.groups = groups;
  input.nodes = nodes;
  input.connections = connections;
  return { input, issues };
}

/** Every schema issue in `raw`; empty when the input is valid. */
export function validateDiagramInput(raw: unknown): string[] {
  return readDiagramInput(raw).issues;
}

/**
 * Narrow raw JSON to a typed {@link DiagramInput}.
 *
 * @throws InputValidationError listing every issue found.
 */
export function parseDiagramInput(raw: unknown): DiagramInput {
  const { input, issues } = readDiagramInput(raw);
  if (issues.length > 0) throw new InputValidationError(issues);
  return input;
}
