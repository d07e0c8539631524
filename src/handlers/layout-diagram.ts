/**
 * Handler for the layout_diagram tool.
 *
 * Returns the positioned diagram as JSON together with route diagnostics,
 * for clients that render the geometry themselves.
 */

import { layoutDiagram, toPositionedDiagram } from '../layout';
import { diagnoseRoutes } from '../layout/route-diagnostics';
import type { ToolResult } from '../types';
import { jsonResult, layoutConfigArg, requireDiagramInput, type ToolArgs } from './helpers';

export { TOOL_DEFINITION } from './layout-diagram-schema';

export async function handleLayoutDiagram(args: ToolArgs): Promise<ToolResult> {
  const input = requireDiagramInput(args);
  const config = layoutConfigArg(args);
  const graph = layoutDiagram(input, { config });
  const diagnostics = diagnoseRoutes(graph);

  const warnings = diagnostics.obstructions.map(
    (o) => `Connection ${o.edgeId} passes through node '${o.nodeId}'`
  );

  return jsonResult({
    success: true,
    diagram: toPositionedDiagram(graph),
    diagnostics,
    ...(warnings.length > 0 ? { warnings } : {}),
  });
}
