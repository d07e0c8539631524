/**
 * Handler for the validate_diagram tool.
 *
 * Schema problems are reported in the result (`valid: false`), not thrown:
 * the caller asked for a verdict.
 */

import { validateDiagramInput } from '../input/validate-input';
import type { ToolResult } from '../types';
import { jsonResult, validateArgs, type ToolArgs } from './helpers';

export { TOOL_DEFINITION } from './validate-diagram-schema';

function countOf(raw: unknown, key: string): number {
  if (typeof raw !== 'object' || raw === null) return 0;
  const value: unknown = Reflect.get(raw, key);
  return Array.isArray(value) ? value.length : 0;
}

export async function handleValidateDiagram(args: ToolArgs): Promise<ToolResult> {
  validateArgs(args, ['diagram']);
  const issues = validateDiagramInput(args.diagram);

  return jsonResult({
    valid: issues.length === 0,
    issues,
    nodes: countOf(args.diagram, 'nodes'),
    groups: countOf(args.diagram, 'groups'),
    connections: countOf(args.diagram, 'connections'),
  });
}
