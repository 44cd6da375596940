/**
 * Geometry operations - pure functions over points and inclusive bounds.
 */

import type { Bounds, Point } from "./types";

/**
 * Euclidean distance between two points
 */
export function euclideanDistance(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Center of inclusive bounds. Computed as `origin / 2 + end / 2`, so an
 * even-sized span yields a half-integer.
 */
export function boundsCenter(b: Bounds): Point {
  return {
    x: b.originX / 2 + b.endX / 2,
    y: b.originY / 2 + b.endY / 2,
  };
}

/**
 * Check if a tile lies inside inclusive bounds
 */
export function boundsContainsPoint(b: Bounds, x: number, y: number): boolean {
  return x >= b.originX && x <= b.endX && y >= b.originY && y <= b.endY;
}

/**
 * Check if `outer` contains `inner` (equal bounds count as contained)
 */
export function boundsContains(outer: Bounds, inner: Bounds): boolean {
  return (
    outer.originX <= inner.originX &&
    outer.originY <= inner.originY &&
    outer.endX >= inner.endX &&
    outer.endY >= inner.endY
  );
}

/**
 * Check if the tile ranges of two bounds intersect on both axes.
 */
export function boundsTouch(a: Bounds, b: Bounds): boolean {
  return (
    !(a.originX >= b.endX + 1 || b.originX >= a.endX + 1) &&
    !(a.originY >= b.endY + 1 || b.originY >= a.endY + 1)
  );
}

/**
 * Tile count along x and y
 */
export function boundsSize(b: Bounds): { readonly sizeX: number; readonly sizeY: number } {
  return { sizeX: b.endX - b.originX + 1, sizeY: b.endY - b.originY + 1 };
}

/**
 * Check if two bounds are identical
 */
export function boundsEqual(a: Bounds, b: Bounds): boolean {
  return (
    a.originX === b.originX &&
    a.originY === b.originY &&
    a.endX === b.endX &&
    a.endY === b.endY
  );
}
