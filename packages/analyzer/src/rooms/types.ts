import type { Bounds } from "../core/geometry/types";

/**
 * Room or corridor rectangle with inclusive corners.
 */
export interface Room extends Bounds {
  readonly isCorridor: boolean;
}

/** Minor dimension of every corridor, in tiles */
export const CORRIDOR_WIDTH = 3;

export function createRoom(
  originX: number,
  originY: number,
  endX: number,
  endY: number,
  isCorridor = false,
): Room {
  return { originX, originY, endX, endY, isCorridor };
}
