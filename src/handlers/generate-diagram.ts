/**
 * Handler for the generate_diagram tool.
 *
 * Validates the input, runs the layout pipeline and renders the result in
 * the requested format.  The markup is returned inline (first content
 * block) with a JSON summary as the second block, or written to a file
 * when `outputPath` / `save` is given.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { getOutputDir, getStylesDir } from '../config';
import { ExportFailedError, InputValidationError } from '../errors';
import { isOneOf, type DiagramInput, type Graph } from '../model/types';
import { layoutDiagram } from '../layout';
import type { LayoutConfig } from '../layout/types';
import { exportAscii } from '../export/ascii';
import { exportDrawio } from '../export/drawio';
import { exportMermaid } from '../export/mermaid';
import { DEFAULT_STYLE_NAME, resolveStyle, type StylePreset } from '../export/styles';
import { FORMAT_EXTENSIONS, OUTPUT_FORMATS, type OutputFormat, type ToolResult } from '../types';
import {
  jsonResult,
  layoutConfigArg,
  optionalStringArg,
  requireDiagramInput,
  type ToolArgs,
} from './helpers';

export { TOOL_DEFINITION } from './generate-diagram-schema';

export interface GenerateDiagramOptions {
  /** Style preset directory (default: `getStylesDir()`). */
  stylesDir?: string;
  /** Directory used by `save: true` (default: `getOutputDir()`). */
  outputDir?: string;
}

function parseFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null) return 'drawio';
  if (!isOneOf(OUTPUT_FORMATS, value)) {
    throw new InputValidationError([`'format' must be one of: ${OUTPUT_FORMATS.join(', ')}`]);
  }
  return value;
}

/** Render a laid-out graph in the given format. */
export function renderDiagram(
  graph: Graph,
  format: OutputFormat,
  style: StylePreset,
  config: LayoutConfig
): string {
  switch (format) {
    case 'drawio':
      return exportDrawio(graph, style, { config });
    case 'mermaid':
      return exportMermaid(graph);
    case 'ascii':
      return exportAscii(graph);
  }
}

/** `<dir>/<slug of title>.<ext>`, mirroring how the title reads. */
export function defaultOutputPath(input: DiagramInput, format: OutputFormat, dir: string): string {
  const slug =
    (input.title ?? 'diagram')
      .toLowerCase()
      .replace(/\s+/g, '_')
      .replace(/[^a-z0-9_-]/g, '') || 'diagram';
  return path.join(dir, `${slug}${FORMAT_EXTENSIONS[format]}`);
}

async function writeOutput(file: string, text: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, text, 'utf-8');
  } catch (err) {
    throw new ExportFailedError(`Failed to write ${file}: ${String(err)}`, { cause: err });
  }
}

export async function handleGenerateDiagram(
  args: ToolArgs,
  options: GenerateDiagramOptions = {}
): Promise<ToolResult> {
  const input = requireDiagramInput(args);
  const format = parseFormat(args.format);
  const config = layoutConfigArg(args);
  const styleName = optionalStringArg(args, 'style') ?? input.style;
  const style = resolveStyle(styleName, options.stylesDir ?? getStylesDir());

  const graph = layoutDiagram(input, { config });
  const output = renderDiagram(graph, format, style, config);

  const summary = {
    format,
    style: styleName ?? DEFAULT_STYLE_NAME,
    title: graph.title,
    nodes: graph.nodes.length,
    groups: graph.groups.length,
    connections: graph.edges.length,
    canvas: graph.canvas,
  };

  let file = optionalStringArg(args, 'outputPath');
  if (file === undefined && args.save === true) {
    file = defaultOutputPath(input, format, options.outputDir ?? getOutputDir());
  }

  if (file !== undefined) {
    await writeOutput(file, output);
    console.error(`[generate_diagram] wrote ${file} (${format}, style: ${summary.style})`);
    return jsonResult({ success: true, output: file, ...summary });
  }

  return {
    content: [
      { type: 'text', text: output },
      { type: 'text', text: JSON.stringify({ success: true, ...summary }, null, 2) },
    ],
  };
}
