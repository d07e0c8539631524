/**
 * Mermaid flowchart exporter.
 *
 * Mermaid does its own layout, so only structure is emitted: one
 * `subgraph` per group in canvas order, ungrouped nodes at top level, then
 * every connection.  Ids are sanitized to `[A-Za-z0-9_]` and kept unique.
 */

import type { DiagramNode, Graph, ShapeCategory } from '../model/types';
import { escapeMermaid } from './escape';

/** Opening and closing brackets per shape. */
const SHAPE_BRACKETS: Readonly<Record<ShapeCategory, [string, string]>> = {
  rectangle: ['[', ']'],
  diamond: ['{', '}'],
  ellipse: ['([', '])'],
  cylinder: ['[(', ')]'],
  cloud: ['((', '))'],
  document: ['>', ']'],
  hexagon: ['{{', '}}'],
  actor: ['((', '))'],
  callout: ['(', ')'],
  process: ['[[', ']]'],
  parallelogram: ['[/', '/]'],
  task: ['(', ')'],
  event: ['((', '))'],
  gateway: ['{', '}'],
};

/** Words Mermaid treats as keywords when used as bare ids. */
const RESERVED_IDS: ReadonlySet<string> = new Set(['end', 'graph', 'subgraph', 'flowchart', 'style', 'class']);

type IdSpace = 'group' | 'node';

/**
 * Allocates unique Mermaid-safe identifiers for arbitrary ids.  Group and
 * node ids are separate namespaces in the model but share one in Mermaid.
 */
class IdAllocator {
  private readonly assigned = new Map<string, string>();
  private readonly used = new Set<string>();

  get(space: IdSpace, id: string): string {
    const key = `${space}:${id}`;
    const existing = this.assigned.get(key);
    if (existing !== undefined) return existing;

    let base = id.replace(/[^A-Za-z0-9_]/g, '_') || '_';
    if (RESERVED_IDS.has(base.toLowerCase())) base = `${base}_`;
    let candidate = base;
    for (let n = 2; this.used.has(candidate); n++) candidate = `${base}_${n}`;

    this.assigned.set(key, candidate);
    this.used.add(candidate);
    return candidate;
  }
}

function nodeLine(node: DiagramNode, ids: IdAllocator): string {
  const [open, close] = SHAPE_BRACKETS[node.shape];
  return `${ids.get('node', node.id)}${open}"${escapeMermaid(node.label)}"${close}`;
}

/** Serialize a graph as a Mermaid `flowchart`. */
export function exportMermaid(graph: Graph): string {
  const ids = new IdAllocator();
  const lines: string[] = [`flowchart ${graph.direction}`];

  for (const group of graph.groups) {
    lines.push(`    subgraph ${ids.get('group', group.id)}["${escapeMermaid(group.label)}"]`);
    for (const memberId of group.memberIds) {
      const idx = graph.nodeIndex.get(memberId);
      if (idx !== undefined) lines.push(`        ${nodeLine(graph.nodes[idx], ids)}`);
    }
    lines.push('    end');
  }

  for (const node of graph.nodes) {
    if (node.groupId === null) lines.push(`    ${nodeLine(node, ids)}`);
  }

  for (const edge of graph.edges) {
    const arrow = edge.lineStyle === 'dashed' ? '-.->' : '-->';
    const label = edge.label ? `|"${escapeMermaid(edge.label)}"|` : '';
    lines.push(`    ${ids.get('node', edge.source)} ${arrow}${label} ${ids.get('node', edge.target)}`);
  }

  return `${lines.join('\n')}\n`;
}
