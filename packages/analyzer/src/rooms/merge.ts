/**
 * Room merging.
 *
 * Rebuilds rectangles that the genome split into several aligned pieces.
 * Matching is order dependent: the first candidate in list order wins.
 */

import { GeometryError } from "@arena/contracts";
import type { Room } from "./types";

interface MutableRoom {
  originX: number;
  originY: number;
  endX: number;
  endY: number;
  readonly isCorridor: boolean;
}

function isHorizontalNeighbor(room: MutableRoom, other: MutableRoom): boolean {
  return (
    other.originX > room.originX &&
    other.originX <= room.endX + 1 &&
    other.originY === room.originY &&
    other.endY === room.endY
  );
}

function isVerticalNeighbor(room: MutableRoom, other: MutableRoom): boolean {
  return (
    other.originY > room.originY &&
    other.originY <= room.endY + 1 &&
    other.originX === room.originX &&
    other.endX === room.endX
  );
}

/**
 * Index of the room that `room` absorbs, or -1. A corridor found first
 * blocks the match on that axis.
 */
function findMergeCandidate(
  rooms: readonly MutableRoom[],
  room: MutableRoom,
): number {
  const horizontal = rooms.findIndex((other) => isHorizontalNeighbor(room, other));
  if (horizontal !== -1 && !rooms[horizontal]?.isCorridor) {
    return horizontal;
  }
  const vertical = rooms.findIndex((other) => isVerticalNeighbor(room, other));
  if (vertical !== -1 && !rooms[vertical]?.isCorridor) {
    return vertical;
  }
  return -1;
}

/**
 * One scan over the list. The scan index keeps advancing after a removal,
 * so when the absorbed room sat before the current one, the room right
 * after it is skipped until the next pass.
 *
 * @returns number of merges performed
 */
function mergePass(rooms: MutableRoom[]): number {
  let merged = 0;

  for (let index = 0; index < rooms.length; index++) {
    const room = rooms[index];
    if (!room || room.isCorridor) continue;

    const candidateIndex = findMergeCandidate(rooms, room);
    const candidate = rooms[candidateIndex];
    if (candidateIndex === -1 || !candidate) continue;

    room.endX = candidate.endX;
    room.endY = candidate.endY;
    rooms.splice(candidateIndex, 1);
    merged++;
  }

  return merged;
}

/**
 * Merge aligned non-corridor rooms until a pass performs no merge.
 * Returns a new list; input rooms are not modified.
 *
 * @throws GeometryError if the merge does not settle within the pass cap
 */
export function mergeRooms(rooms: readonly Room[]): Room[] {
  const working: MutableRoom[] = rooms.map((room) => ({ ...room }));
  const maxPasses = rooms.length + 1;

  for (let pass = 0; pass < maxPasses; pass++) {
    if (mergePass(working) === 0) {
      return working.map((room) => ({ ...room }));
    }
  }

  throw new GeometryError(
    "MERGE_DID_NOT_CONVERGE",
    `Room merge did not settle after ${maxPasses} passes`,
    { roomCount: rooms.length, remaining: working.length },
  );
}
