/**
 * Handler for the list_diagram_styles tool.
 */

import { getStylesDir } from '../config';
import { DEFAULT_STYLE_NAME, describeStyles } from '../export/styles';
import type { ToolResult } from '../types';
import { jsonResult } from './helpers';

export { TOOL_DEFINITION } from './list-styles-schema';

export async function handleListStyles(stylesDir: string = getStylesDir()): Promise<ToolResult> {
  const styles = describeStyles(stylesDir);
  return jsonResult({
    styles,
    count: styles.length,
    default: DEFAULT_STYLE_NAME,
  });
}
