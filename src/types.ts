/**
 * Shared types for the MCP tool surface.
 */

export interface TextContent {
  type: 'text';
  text: string;
}

/** Result returned by every tool handler. */
export interface ToolResult {
  content: TextContent[];
  isError?: boolean;
  [key: string]: unknown;
}

/** Output formats of `generate_diagram`. */
export const OUTPUT_FORMATS = ['drawio', 'mermaid', 'ascii'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** File extension written for each output format. */
export const FORMAT_EXTENSIONS: Readonly<Record<OutputFormat, string>> = {
  drawio: '.drawio',
  mermaid: '.mmd',
  ascii: '.txt',
};

/** Tool metadata advertised through `tools/list`. */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
  };
}
