/**
 * Genome parser and serializer unit tests
 */

import { GeometryError, ParseError } from "@arena/contracts";
import { describe, expect, it } from "vitest";
import { parseGenome, serializeGenome } from "../src/genome";
import { createRoom } from "../src/rooms";

function parseFailure(genome: string): ParseError {
  try {
    parseGenome(genome);
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error(`Expected "${genome}" to fail`);
}

describe("parseGenome", () => {
  it("decodes rooms then corridors", () => {
    expect(parseGenome("<0,0,5><5,0,5>|<2,5,6><10,0,-4>")).toEqual([
      createRoom(0, 0, 4, 4),
      createRoom(5, 0, 9, 4),
      createRoom(2, 5, 7, 7, true),
      createRoom(10, 0, 12, 3, true),
    ]);
  });

  it("accepts genomes without corridors or rooms", () => {
    expect(parseGenome("<3,4,2>")).toEqual([createRoom(3, 4, 4, 5)]);
    expect(parseGenome("|<1,1,4>")).toEqual([createRoom(1, 1, 4, 3, true)]);
    expect(parseGenome("")).toEqual([]);
    expect(parseGenome("|")).toEqual([]);
  });

  it("ignores a trailing line break", () => {
    expect(parseGenome("<0,0,2>\n")).toEqual([createRoom(0, 0, 1, 1)]);
  });

  it("reports where a digit was expected", () => {
    const error = parseFailure("<0,a,5>");

    expect(error.code).toBe("GENOME_PARSE_FAILED");
    expect(error.message).toBe('Expected a digit at position 3, found "a"');
    expect(error.details).toEqual({ position: 3, expected: "a digit", found: "a" });
  });

  it("rejects negative room sizes", () => {
    expect(parseFailure("<0,0,-5>").details).toEqual({
      position: 5,
      expected: "a digit",
      found: "-",
    });
  });

  it("rejects unterminated tokens", () => {
    expect(parseFailure("<1,2,3").message).toBe(
      'Expected ">" at position 6, found end of input',
    );
  });

  it("rejects trailing text", () => {
    expect(parseFailure("<0,0,5>x").details).toEqual({
      position: 7,
      expected: '"<" or end of genome',
      found: "x",
    });
  });
});

describe("serializeGenome", () => {
  it("round-trips canonical genomes", () => {
    const genome = "<0,0,5><5,0,5>|<2,5,6><10,0,-4>";

    expect(serializeGenome(parseGenome(genome))).toBe(genome);
  });

  it("round-trips interleaved rooms and corridors as a set", () => {
    const rooms = [
      createRoom(5, 1, 10, 3, true),
      createRoom(0, 0, 4, 4),
      createRoom(2, 5, 4, 8, true),
      createRoom(11, 0, 13, 2),
    ];
    const parsed = parseGenome(serializeGenome(rooms));

    expect(parsed).toHaveLength(rooms.length);
    expect(parsed).toEqual(expect.arrayContaining(rooms));
  });

  it("writes square corridors along x", () => {
    expect(serializeGenome(parseGenome("|<1,1,-3>"))).toBe("|<1,1,3>");
  });

  it("rejects rectangles that are neither squares nor corridors", () => {
    expect(() => serializeGenome([createRoom(0, 0, 2, 3)])).toThrow(GeometryError);
  });
});
