import { boundsContains } from "../core/geometry/operations";
import type { Room } from "./types";

/**
 * Drop every room contained in another room of the list.
 *
 * Containment is inclusive, so two rooms with identical bounds contain each
 * other and are both dropped.
 */
export function pruneContainedRooms(rooms: readonly Room[]): Room[] {
  return rooms.filter(
    (inner, innerIndex) =>
      !rooms.some(
        (outer, outerIndex) =>
          outerIndex !== innerIndex && boundsContains(outer, inner),
      ),
  );
}
