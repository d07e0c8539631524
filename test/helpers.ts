/**
 * Shared helpers for handler tests.
 */

import type { DiagramInput } from '../src/model/types';
import type { ToolResult } from '../src/types';

/** Parse the JSON payload of a result's content block. */
export function parseResult(result: ToolResult, index = 0): Record<string, unknown> {
  const block = result.content[index];
  if (!block) throw new Error(`Result has no content block ${index}`);
  const parsed: unknown = JSON.parse(block.text);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Result payload is not a JSON object');
  }
  return { ...parsed };
}

/** Two lanes, one handoff: the smallest interesting swimlane diagram. */
export function twoLaneDiagram(): DiagramInput {
  return {
    title: 'Order Flow',
    direction: 'TD',
    groups: [
      { id: 'sales', label: 'Sales', color: 'green' },
      { id: 'ops', label: 'Operations' },
    ],
    nodes: [
      { id: 'take', label: 'Take order', group: 'sales' },
      { id: 'check', label: 'Check stock', group: 'sales', shape: 'diamond' },
      { id: 'ship', label: 'Ship', group: 'ops' },
    ],
    connections: [
      { from: 'take', to: 'check' },
      { from: 'check', to: 'ship', label: 'in stock' },
    ],
  };
}
