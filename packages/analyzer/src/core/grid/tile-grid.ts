/**
 * Character tile grid loaded from map text.
 *
 * Row `x` of the map text is the grid's x coordinate and the character index
 * inside the row is y, the same axes the genome uses.
 */

import { ParseError, TileRowsSchema } from "@arena/contracts";
import type { Point } from "../geometry/types";
import { type MutableTileGrid, TileSymbol } from "./types";

const DEV_MODE = process.env.NODE_ENV !== "production";

export class TileGrid implements MutableTileGrid {
  readonly width: number;
  readonly height: number;
  private readonly cells: string[][];

  private constructor(cells: string[][]) {
    this.cells = cells;
    this.width = cells.length;
    this.height = cells[0]?.length ?? 0;
  }

  /**
   * Build a grid from equal-length rows.
   */
  static fromRows(rows: readonly string[]): TileGrid {
    const parsed = TileRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new ParseError(
        "GRID_INVALID",
        parsed.error.issues[0]?.message ?? "Invalid map rows",
        { issues: parsed.error.issues.map((issue) => issue.message) },
      );
    }
    return new TileGrid(parsed.data.map((row) => Array.from(row)));
  }

  /**
   * Build a grid from map text, one row per line. Rows are trimmed and
   * blank lines at the end of the text are dropped.
   */
  static fromText(text: string): TileGrid {
    const rows = text.split(/\r?\n/).map((line) => line.trim());
    while (rows.length > 0 && rows[rows.length - 1] === "") {
      rows.pop();
    }
    return TileGrid.fromRows(rows);
  }

  /**
   * Grid of the given size filled with walls
   */
  static walls(width: number, height: number): TileGrid {
    if (width <= 0 || height <= 0) {
      throw new ParseError(
        "GRID_INVALID",
        `Invalid grid dimensions: ${width}x${height}`,
      );
    }
    return TileGrid.fromRows(
      Array.from({ length: width }, () => TileSymbol.WALL.repeat(height)),
    );
  }

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && x < this.width && y >= 0 && y < this.height;
  }

  /**
   * Get the symbol at a tile (WALL for out of bounds)
   */
  get(x: number, y: number): string {
    if (!this.isInBounds(x, y)) return TileSymbol.WALL;
    return this.cells[x]?.[y] ?? TileSymbol.WALL;
  }

  isWall(x: number, y: number): boolean {
    return this.get(x, y) === TileSymbol.WALL;
  }

  isFloor(x: number, y: number): boolean {
    return this.get(x, y) === TileSymbol.FLOOR;
  }

  set(x: number, y: number, symbol: string): void {
    const row = this.isInBounds(x, y) ? this.cells[x] : undefined;
    if (row === undefined) {
      if (DEV_MODE) {
        console.warn(
          `TileGrid.set: out of bounds (${x}, ${y}) for grid ${this.width}x${this.height}`,
        );
      }
      return;
    }
    row[y] = symbol;
  }

  /**
   * Fill inclusive bounds with a symbol, clipped to the grid
   */
  fillBounds(
    originX: number,
    originY: number,
    endX: number,
    endY: number,
    symbol: string,
  ): void {
    for (let x = Math.max(0, originX); x <= Math.min(this.width - 1, endX); x++) {
      for (let y = Math.max(0, originY); y <= Math.min(this.height - 1, endY); y++) {
        this.set(x, y, symbol);
      }
    }
  }

  forEach(callback: (x: number, y: number, symbol: string) => void): void {
    for (let x = 0; x < this.width; x++) {
      for (let y = 0; y < this.height; y++) {
        callback(x, y, this.get(x, y));
      }
    }
  }

  /**
   * All non-wall tiles in x-major order
   */
  findNonWall(): Point[] {
    const points: Point[] = [];
    this.forEach((x, y, symbol) => {
      if (symbol !== TileSymbol.WALL) points.push({ x, y });
    });
    return points;
  }

  countSymbol(symbol: string): number {
    let count = 0;
    this.forEach((_x, _y, value) => {
      if (value === symbol) count++;
    });
    return count;
  }

  /**
   * Reset every resource tile to floor, leaving walls untouched.
   * Returns the number of cleared tiles.
   */
  clearResources(): number {
    let cleared = 0;
    this.forEach((x, y, symbol) => {
      if (symbol !== TileSymbol.WALL && symbol !== TileSymbol.FLOOR) {
        this.set(x, y, TileSymbol.FLOOR);
        cleared++;
      }
    });
    return cleared;
  }

  clone(): TileGrid {
    return new TileGrid(this.cells.map((row) => [...row]));
  }

  toRows(): string[] {
    return this.cells.map((row) => row.join(""));
  }

  /**
   * Rows joined by line breaks, without a trailing break.
   */
  toText(): string {
    return this.toRows().join("\n");
  }
}
