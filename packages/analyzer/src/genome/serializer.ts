import { GeometryError } from "@arena/contracts";
import { CORRIDOR_WIDTH, type Room } from "../rooms/types";

function encodeRoom(room: Room, index: number): string {
  const sizeX = room.endX - room.originX + 1;
  const sizeY = room.endY - room.originY + 1;

  if (!room.isCorridor && sizeX === sizeY && sizeX > 0) {
    return `<${room.originX},${room.originY},${sizeX}>`;
  }
  if (room.isCorridor && sizeY === CORRIDOR_WIDTH && sizeX > 0) {
    return `<${room.originX},${room.originY},${sizeX}>`;
  }
  if (room.isCorridor && sizeX === CORRIDOR_WIDTH && sizeY > 0) {
    return `<${room.originX},${room.originY},-${sizeY}>`;
  }

  throw new GeometryError(
    "ROOM_NOT_ENCODABLE",
    `Room ${index} (${sizeX}x${sizeY}${room.isCorridor ? ", corridor" : ""}) has no genome encoding`,
    { index, room },
  );
}

/**
 * Encode rooms as a genome line. Rooms must be squares; corridors must be
 * three tiles wide on one axis. A corridor that is 3x3 is written along x.
 */
export function serializeGenome(rooms: readonly Room[]): string {
  const plain = rooms
    .map((room, index) => ({ room, index }))
    .filter(({ room }) => !room.isCorridor);
  const corridors = rooms
    .map((room, index) => ({ room, index }))
    .filter(({ room }) => room.isCorridor);

  const head = plain.map(({ room, index }) => encodeRoom(room, index)).join("");
  if (corridors.length === 0) return head;

  return `${head}|${corridors.map(({ room, index }) => encodeRoom(room, index)).join("")}`;
}
