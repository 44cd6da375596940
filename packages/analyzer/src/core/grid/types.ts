/**
 * Tile grid types for level analysis.
 */

import type { Point } from "../geometry/types";

/**
 * Reserved tile symbols. Every other character is a placed resource.
 */
export const TileSymbol = {
  WALL: "w",
  FLOOR: "r",
} as const;

/**
 * Read-only grid interface.
 *
 * Use this type when a function only needs to read from a grid, such as the
 * visibility and tile-graph builders.
 */
export interface ReadonlyTileGrid {
  /** Extent along x: the number of rows of the map text */
  readonly width: number;
  /** Extent along y: the length of each row */
  readonly height: number;

  isInBounds(x: number, y: number): boolean;
  get(x: number, y: number): string;
  isWall(x: number, y: number): boolean;
  isFloor(x: number, y: number): boolean;
  forEach(callback: (x: number, y: number, symbol: string) => void): void;
  findNonWall(): Point[];
  countSymbol(symbol: string): number;
  toRows(): string[];
  toText(): string;
}

/**
 * Mutable grid interface. Placement writes resource symbols through `set`.
 */
export interface MutableTileGrid extends ReadonlyTileGrid {
  set(x: number, y: number, symbol: string): void;
}
