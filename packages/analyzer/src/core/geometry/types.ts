/**
 * Core geometry types for level analysis.
 * All types are immutable value objects.
 */

/**
 * 2D point. Tile points are integers; room centers may be half-integers.
 */
export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Axis-aligned rectangle given by inclusive tile corners.
 */
export interface Bounds {
  readonly originX: number;
  readonly originY: number;
  readonly endX: number;
  readonly endY: number;
}

/**
 * King-move neighbor offsets
 */
export const DIRECTIONS_8 = [
  { x: -1, y: -1 }, // NW
  { x: 0, y: -1 }, // N
  { x: 1, y: -1 }, // NE
  { x: -1, y: 0 }, // W
  { x: 1, y: 0 }, // E
  { x: -1, y: 1 }, // SW
  { x: 0, y: 1 }, // S
  { x: 1, y: 1 }, // SE
] as const;
