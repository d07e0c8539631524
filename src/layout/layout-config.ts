/**
 * Merge caller overrides over the default layout configuration.
 */

import { DEFAULT_LAYOUT_CONFIG } from '../constants';
import { InputValidationError } from '../errors';
import type { LayoutConfig } from './types';

const LAYOUT_CONFIG_KEYS = Object.keys(DEFAULT_LAYOUT_CONFIG);

/** Keys that must stay strictly positive; the rest only non-negative. */
const POSITIVE_KEYS: ReadonlySet<string> = new Set([
  'backwardClearance',
  'canvasWidth',
  'canvasHeight',
  'groupCrossSize',
  'gridSize',
]);

function isConfigKey(key: string): key is keyof LayoutConfig {
  return LAYOUT_CONFIG_KEYS.includes(key);
}

/**
 * Return a complete config with `overrides` applied.
 *
 * @throws InputValidationError listing every unknown key and every value
 *         that is not a finite number in range, and a header plus gap
 *         that would leave an empty group with no extent.
 */
export function resolveLayoutConfig(
  overrides: Partial<LayoutConfig> | Readonly<Record<string, unknown>> = {}
): LayoutConfig {
  const config: LayoutConfig = { ...DEFAULT_LAYOUT_CONFIG };
  const issues: string[] = [];

  for (const [key, value] of Object.entries(overrides)) {
    if (!isConfigKey(key)) {
      issues.push(`layout.${key}: unknown layout option`);
      continue;
    }
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      issues.push(`layout.${key}: must be a finite number`);
      continue;
    }
    if (POSITIVE_KEYS.has(key) ? value <= 0 : value < 0) {
      issues.push(`layout.${key}: must be ${POSITIVE_KEYS.has(key) ? 'positive' : 'non-negative'}`);
      continue;
    }
    config[key] = value;
  }

  if (issues.length === 0 && config.groupHeaderSize + config.nodeGap <= 0) {
    issues.push('layout.groupHeaderSize: groupHeaderSize + nodeGap must be positive');
  }

  if (issues.length > 0) throw new InputValidationError(issues);
  return config;
}
