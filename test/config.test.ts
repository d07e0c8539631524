import { describe, test, expect } from 'vitest';
import * as path from 'node:path';
import { getOutputDir, getStylesDir, isLayoutDebugEnabled } from '../src/config';

describe('config', () => {
  test('styles directory defaults to the bundled presets', () => {
    expect(path.basename(getStylesDir({}))).toBe('styles');
  });

  test('environment overrides the directories', () => {
    expect(getStylesDir({ DIAGRAM_STYLES_DIR: '/tmp/presets' })).toBe('/tmp/presets');
    expect(getOutputDir({ DIAGRAM_OUTPUT_DIR: 'out' })).toBe('out');
    expect(getOutputDir({})).toBe('diagrams');
  });

  test.each([
    ['1', true],
    ['true', true],
    ['TRUE', true],
    ['0', false],
    ['yes', false],
    [undefined, false],
  ])('DIAGRAM_LAYOUT_DEBUG=%s → %s', (value, expected) => {
    expect(isLayoutDebugEnabled({ DIAGRAM_LAYOUT_DEBUG: value })).toBe(expected);
  });
});
