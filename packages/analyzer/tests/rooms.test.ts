/**
 * Room reducer unit tests
 */

import { GeometryError } from "@arena/contracts";
import { describe, expect, it } from "vitest";
import { parseGenome } from "../src/genome";
import {
  createRoom,
  mergeRooms,
  pruneContainedRooms,
  reduceRooms,
} from "../src/rooms";

describe("mergeRooms", () => {
  it("rebuilds a square split into four quarters", () => {
    const rooms = parseGenome("<0,0,2><2,0,2><0,2,2><2,2,2>");

    expect(mergeRooms(rooms)).toEqual([createRoom(0, 0, 3, 3)]);
  });

  it("merges overlapping aligned rooms", () => {
    expect(mergeRooms([createRoom(0, 0, 4, 2), createRoom(3, 0, 6, 2)])).toEqual([
      createRoom(0, 0, 6, 2),
    ]);
  });

  it("falls back to the vertical axis when the first horizontal match is a corridor", () => {
    const room = createRoom(0, 0, 2, 2);
    const corridor = createRoom(3, 0, 5, 2, true);
    const sideRoom = createRoom(3, 0, 4, 2);
    const below = createRoom(0, 3, 2, 5);

    expect(mergeRooms([room, corridor, sideRoom, below])).toEqual([
      createRoom(0, 0, 2, 5),
      corridor,
      sideRoom,
    ]);
  });

  it("skips the next room after absorbing an earlier one", () => {
    const rooms = [
      createRoom(2, 3, 3, 4),
      createRoom(2, 2, 3, 3),
      createRoom(2, 4, 4, 6),
      createRoom(0, 4, 0, 4),
      createRoom(1, 2, 3, 4),
      createRoom(2, 2, 4, 4),
    ];

    expect(mergeRooms(rooms)).toEqual([
      createRoom(2, 4, 4, 6),
      createRoom(0, 4, 0, 4),
      createRoom(1, 2, 4, 4),
    ]);
  });

  it("never extends corridors", () => {
    const corridors = [createRoom(0, 0, 5, 2, true), createRoom(6, 0, 9, 2, true)];

    expect(mergeRooms(corridors)).toEqual(corridors);
  });

  it("does not modify its input", () => {
    const rooms = [createRoom(0, 0, 1, 1), createRoom(2, 0, 3, 1)];
    mergeRooms(rooms);

    expect(rooms[0]).toEqual(createRoom(0, 0, 1, 1));
    expect(rooms).toHaveLength(2);
  });
});

describe("pruneContainedRooms", () => {
  it("drops rooms inside another room", () => {
    const outer = createRoom(0, 0, 9, 9);

    expect(pruneContainedRooms([outer, createRoom(2, 2, 5, 5)])).toEqual([outer]);
  });

  it("drops both copies of identical rooms", () => {
    expect(
      pruneContainedRooms([createRoom(1, 1, 3, 3), createRoom(1, 1, 3, 3, true)]),
    ).toEqual([]);
  });
});

describe("reduceRooms", () => {
  it("is idempotent", () => {
    const rooms = parseGenome(
      "<0,0,4><4,0,4><0,4,4><8,8,3><9,9,1>|<4,4,5><12,0,-6>",
    );
    const once = reduceRooms(rooms);

    expect(reduceRooms(once)).toEqual(once);
  });

  it("rejects inverted rooms", () => {
    expect(() => reduceRooms([createRoom(0, 0, 3, 3), createRoom(5, 5, 4, 6)])).toThrow(
      GeometryError,
    );
    try {
      reduceRooms([createRoom(5, 5, 4, 6)]);
    } catch (error) {
      expect(error).toBeInstanceOf(GeometryError);
      if (error instanceof GeometryError) {
        expect(error.code).toBe("ROOM_INVALID");
        expect(error.details?.index).toBe(0);
      }
    }
  });

  it("rejects zero-length corridors", () => {
    expect(() => reduceRooms(parseGenome("|<0,0,0>"))).toThrow(GeometryError);
  });
});
