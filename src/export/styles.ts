/**
 * Style presets: palette and rendering defaults for the exporters.
 *
 * Presets are JSON files in the styles directory (see `getStylesDir()`).
 * A loaded preset is frozen and passed explicitly into the exporters;
 * nothing here keeps an "active" style.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { getStylesDir } from '../config';
import { ExportFailedError, StyleNotFoundError } from '../errors';

// ── Types ──────────────────────────────────────────────────────────────────

export interface PaletteEntry {
  fill: string;
  stroke: string;
  font: string;
}

export interface StyleDefaults {
  nodeFontSize: number;
  groupFontSize: number;
  /** draw.io `fontStyle` bit mask; 0 for plain. */
  nodeFontStyle: number;
  nodeStrokeWidth: number;
  nodeShadow: boolean;
  /** Corner radius for rounded rectangles; 0 keeps draw.io's default. */
  arcSize: number;
  edgeColor: string;
  edgeWidth: number;
  edgeLabelColor?: string;
  edgeLabelBg?: string;
  rounded: boolean;
}

export interface StylePreset {
  name: string;
  description: string;
  canvas: { background: string; shadow: boolean };
  palette: Readonly<Record<string, Readonly<PaletteEntry>>>;
  defaults: Readonly<StyleDefaults>;
}

export interface StyleSummary {
  name: string;
  description: string;
}

export const DEFAULT_STYLE_NAME = 'classic';

const FALLBACK_PALETTE: Record<string, PaletteEntry> = {
  blue: { fill: '#dae8fc', stroke: '#6c8ebf', font: '#333333' },
  green: { fill: '#d5e8d4', stroke: '#82b366', font: '#333333' },
  orange: { fill: '#ffe6cc', stroke: '#d79b00', font: '#333333' },
  red: { fill: '#f8cecc', stroke: '#b85450', font: '#333333' },
  purple: { fill: '#e1d5e7', stroke: '#9673a6', font: '#333333' },
  gray: { fill: '#f5f5f5', stroke: '#666666', font: '#333333' },
  white: { fill: '#ffffff', stroke: '#666666', font: '#333333' },
};

const FALLBACK_DEFAULTS: StyleDefaults = {
  nodeFontSize: 12,
  groupFontSize: 14,
  nodeFontStyle: 0,
  nodeStrokeWidth: 1,
  nodeShadow: false,
  arcSize: 0,
  edgeColor: '#666666',
  edgeWidth: 2,
  rounded: true,
};

/** Used when no preset file can be found at all. */
export const FALLBACK_STYLE: Readonly<StylePreset> = deepFreeze({
  name: 'Classic',
  description: 'Built-in light palette',
  canvas: { background: '#ffffff', shadow: false },
  palette: FALLBACK_PALETTE,
  defaults: FALLBACK_DEFAULTS,
});

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (typeof value === 'object' && value !== null) deepFreeze(value);
  }
  return Object.freeze(obj);
}

// ── Parsing ────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function str(obj: Record<string, unknown>, key: string, fallback: string): string {
  const v = obj[key];
  return typeof v === 'string' ? v : fallback;
}

function num(obj: Record<string, unknown>, key: string, fallback: number): number {
  const v = obj[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : fallback;
}

function bool(obj: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const v = obj[key];
  return typeof v === 'boolean' ? v : fallback;
}

/**
 * Turn parsed preset JSON into a frozen {@link StylePreset}.  Missing
 * defaults fall back to the built-in values; a missing or malformed
 * palette is an error.
 */
export function parseStylePreset(raw: unknown, source: string): StylePreset {
  if (!isRecord(raw)) throw new ExportFailedError(`Style preset ${source} is not a JSON object`);

  const rawPalette = raw.palette;
  if (!isRecord(rawPalette)) {
    throw new ExportFailedError(`Style preset ${source} has no 'palette' object`);
  }
  const palette: Record<string, PaletteEntry> = {};
  for (const [name, entry] of Object.entries(rawPalette)) {
    if (!isRecord(entry) || typeof entry.fill !== 'string' || typeof entry.stroke !== 'string') {
      throw new ExportFailedError(`Style preset ${source}: palette colour '${name}' needs fill and stroke`);
    }
    palette[name.toLowerCase()] = {
      fill: entry.fill,
      stroke: entry.stroke,
      font: str(entry, 'font', '#333333'),
    };
  }

  const canvas = isRecord(raw.canvas) ? raw.canvas : {};
  const d = isRecord(raw.defaults) ? raw.defaults : {};
  const defaults: StyleDefaults = {
    nodeFontSize: num(d, 'nodeFontSize', FALLBACK_DEFAULTS.nodeFontSize),
    groupFontSize: num(d, 'groupFontSize', FALLBACK_DEFAULTS.groupFontSize),
    nodeFontStyle: num(d, 'nodeFontStyle', FALLBACK_DEFAULTS.nodeFontStyle),
    nodeStrokeWidth: num(d, 'nodeStrokeWidth', FALLBACK_DEFAULTS.nodeStrokeWidth),
    nodeShadow: bool(d, 'nodeShadow', FALLBACK_DEFAULTS.nodeShadow),
    arcSize: num(d, 'arcSize', FALLBACK_DEFAULTS.arcSize),
    edgeColor: str(d, 'edgeColor', FALLBACK_DEFAULTS.edgeColor),
    edgeWidth: num(d, 'edgeWidth', FALLBACK_DEFAULTS.edgeWidth),
    rounded: bool(d, 'rounded', FALLBACK_DEFAULTS.rounded),
  };
  if (typeof d.edgeLabelColor === 'string') defaults.edgeLabelColor = d.edgeLabelColor;
  if (typeof d.edgeLabelBg === 'string') defaults.edgeLabelBg = d.edgeLabelBg;

  return deepFreeze({
    name: str(raw, 'name', source),
    description: str(raw, 'description', ''),
    canvas: {
      background: str(canvas, 'background', '#ffffff'),
      shadow: bool(canvas, 'shadow', false),
    },
    palette,
    defaults,
  });
}

// ── Loading ────────────────────────────────────────────────────────────────

/** Names of the available presets (file stems), sorted. */
export function listStyles(dir: string = getStylesDir()): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.json'))
    .map((f) => path.basename(f, '.json'))
    .sort();
}

/**
 * Load a preset by name.
 *
 * @throws StyleNotFoundError when no `<name>.json` exists in `dir`.
 * @throws ExportFailedError when the file is not a valid preset.
 */
export function loadStyle(name: string, dir: string = getStylesDir()): StylePreset {
  const available = listStyles(dir);
  if (!available.includes(name)) throw new StyleNotFoundError(name, available);

  const file = path.join(dir, `${name}.json`);
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new ExportFailedError(`Failed to read style preset ${file}: ${String(err)}`, { cause: err });
  }
  return parseStylePreset(raw, name);
}

/**
 * Resolve the preset for a render: the named one when given, else the
 * `classic` preset, else the built-in fallback.
 */
export function resolveStyle(name: string | undefined, dir: string = getStylesDir()): StylePreset {
  if (name !== undefined) return loadStyle(name, dir);
  return listStyles(dir).includes(DEFAULT_STYLE_NAME) ? loadStyle(DEFAULT_STYLE_NAME, dir) : FALLBACK_STYLE;
}

/** Name and description of every preset. */
export function describeStyles(dir: string = getStylesDir()): StyleSummary[] {
  return listStyles(dir).map((name) => {
    const style = loadStyle(name, dir);
    return { name, description: style.description };
  });
}

/**
 * Palette entry for a colour name (case-insensitive), falling back to
 * `blue` for unknown names.
 */
export function paletteColor(style: StylePreset, color: string): Readonly<PaletteEntry> {
  return style.palette[color.toLowerCase()] ?? style.palette.blue ?? FALLBACK_PALETTE.blue;
}
