/**
 * Shared helpers used by individual tool handler modules.
 */

import { InputValidationError, MissingRequiredError } from '../errors';
import type { DiagramInput } from '../model/types';
import { parseDiagramInput } from '../input/validate-input';
import { resolveLayoutConfig } from '../layout/layout-config';
import type { LayoutConfig } from '../layout/types';
import type { ToolResult } from '../types';

/** Tool arguments as they arrive from the MCP client. */
export type ToolArgs = Record<string, unknown>;

/** Wrap a JSON-serializable payload as a single text content block. */
export function jsonResult(data: Record<string, unknown>): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Check that every name in `required` is present (not `undefined` or
 * `null`) in `args`.
 *
 * @throws MissingRequiredError naming every missing argument.
 */
export function validateArgs(args: ToolArgs, required: readonly string[]): void {
  const missing = required.filter((key) => args[key] === undefined || args[key] === null);
  if (missing.length > 0) throw new MissingRequiredError(missing);
}

/** Read an optional string argument. */
export function optionalStringArg(args: ToolArgs, key: string): string | undefined {
  const value = args[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new InputValidationError([`'${key}' must be a string`]);
  return value;
}

/** Parse the required `diagram` argument into a typed input. */
export function requireDiagramInput(args: ToolArgs): DiagramInput {
  validateArgs(args, ['diagram']);
  return parseDiagramInput(args.diagram);
}

/** Parse the optional `layout` argument (numeric overrides) into a full config. */
export function layoutConfigArg(args: ToolArgs): LayoutConfig {
  const raw = args.layout;
  if (raw === undefined || raw === null) return resolveLayoutConfig();
  if (!isRecord(raw)) throw new InputValidationError(["'layout' must be an object"]);
  return resolveLayoutConfig(raw);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
