import { GeometryError } from "@arena/contracts";
import { mergeRooms } from "./merge";
import { pruneContainedRooms } from "./prune";
import type { Room } from "./types";

/**
 * Check that every room has integer corners with `origin <= end`.
 *
 * @throws GeometryError naming the first offending room
 */
export function assertValidRooms(rooms: readonly Room[]): void {
  rooms.forEach((room, index) => {
    const corners = [room.originX, room.originY, room.endX, room.endY];
    if (!corners.every(Number.isInteger)) {
      throw new GeometryError(
        "ROOM_INVALID",
        `Room ${index} has non-integer corners`,
        { index, room },
      );
    }
    if (room.endX < room.originX || room.endY < room.originY) {
      throw new GeometryError(
        "ROOM_INVALID",
        `Room ${index} has no area: (${room.originX},${room.originY})-(${room.endX},${room.endY})`,
        { index, room },
      );
    }
  });
}

/**
 * Reduce parsed rooms to the minimal room set: merge pass, then
 * containment pass.
 */
export function reduceRooms(rooms: readonly Room[]): Room[] {
  assertValidRooms(rooms);
  return pruneContainedRooms(mergeRooms(rooms));
}
