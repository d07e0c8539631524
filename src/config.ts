/**
 * Process-level configuration read from the environment.
 *
 * - `DIAGRAM_STYLES_DIR`   directory of style preset JSON files
 *                          (default: `styles/` at the package root)
 * - `DIAGRAM_OUTPUT_DIR`   directory for written diagrams when no explicit
 *                          output path is given (default: `diagrams`)
 * - `DIAGRAM_LAYOUT_DEBUG` enable layout step logging on stderr (`1`/`true`)
 */

import { fileURLToPath } from 'node:url';

const DEFAULT_STYLES_DIR = fileURLToPath(new URL('../styles/', import.meta.url));

export function getStylesDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.DIAGRAM_STYLES_DIR || DEFAULT_STYLES_DIR;
}

export function getOutputDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.DIAGRAM_OUTPUT_DIR || 'diagrams';
}

export function isLayoutDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.DIAGRAM_LAYOUT_DEBUG?.toLowerCase();
  return value === '1' || value === 'true';
}
