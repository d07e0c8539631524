/**
 * Axis helpers for the two flow directions.
 *
 * `TD`: primary = y (height), cross = x (width).
 * `LR`: primary = x (width),  cross = y (height).
 */

import type { Point } from '../geometry';
import type { FlowDirection } from '../model/types';

interface Sized {
  width: number;
  height: number;
}

export function primarySize(item: Sized, dir: FlowDirection): number {
  return dir === 'TD' ? item.height : item.width;
}

export function crossSize(item: Sized, dir: FlowDirection): number {
  return dir === 'TD' ? item.width : item.height;
}

export function primaryOf(p: Point, dir: FlowDirection): number {
  return dir === 'TD' ? p.y : p.x;
}

export function crossOf(p: Point, dir: FlowDirection): number {
  return dir === 'TD' ? p.x : p.y;
}

/** Build a point from (primary, cross) coordinates. */
export function pointAt(primary: number, cross: number, dir: FlowDirection): Point {
  return dir === 'TD' ? { x: cross, y: primary } : { x: primary, y: cross };
}

/** Build a size from (primary, cross) extents. */
export function sizeOf(primary: number, cross: number, dir: FlowDirection): Sized {
  return dir === 'TD' ? { width: cross, height: primary } : { width: primary, height: cross };
}
