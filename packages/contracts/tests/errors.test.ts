import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  GeometryError,
  LevelError,
  ParseError,
  Result,
} from "../src";

describe("LevelError", () => {
  it("tags each subclass with its kind", () => {
    const parse = new ParseError("GENOME_PARSE_FAILED", "bad token", { position: 3 });
    const config = new ConfigurationError("NO_CANDIDATE_ROOM", "no room");
    const geometry = new GeometryError("ROOM_INVALID", "inverted room");

    expect(parse.kind).toBe("parse");
    expect(config.kind).toBe("configuration");
    expect(geometry.kind).toBe("geometry");
    expect(parse.name).toBe("ParseError");
    expect(parse).toBeInstanceOf(LevelError);
    expect(parse).toBeInstanceOf(Error);
  });

  it("serializes details only when present", () => {
    expect(new ParseError("GRID_INVALID", "ragged").toJSON()).toEqual({
      name: "ParseError",
      kind: "parse",
      code: "GRID_INVALID",
      message: "ragged",
    });
    expect(
      new ConfigurationError("NO_CANDIDATE_TILE", "full", { kind: "ammo" }).toJSON(),
    ).toEqual({
      name: "ConfigurationError",
      kind: "configuration",
      code: "NO_CANDIDATE_TILE",
      message: "full",
      details: { kind: "ammo" },
    });
  });

  it("recognizes level errors", () => {
    expect(LevelError.isLevelError(new GeometryError("ROOM_INVALID", "x"))).toBe(true);
    expect(LevelError.isLevelError(new Error("x"))).toBe(false);
  });
});

describe("Result", () => {
  it("captures level errors thrown by the callback", () => {
    const res = Result.fromThrowable(() => {
      throw new ParseError("GENOME_PARSE_FAILED", "bad");
    }, LevelError.isLevelError);

    expect(res.isErr()).toBe(true);
    expect(res.error.code).toBe("GENOME_PARSE_FAILED");
  });

  it("rethrows errors the guard does not accept", () => {
    expect(() =>
      Result.fromThrowable(() => {
        throw new TypeError("boom");
      }, LevelError.isLevelError),
    ).toThrow(TypeError);
  });

  it("maps and matches values", () => {
    const res = Result.ok<number, LevelError>(2).map((n) => n * 3);
    expect(res.getOrThrow()).toBe(6);
    expect(res.match((n) => `ok:${n}`, (e) => e.code)).toBe("ok:6");
    expect(Result.err<number, string>("nope").getOrElse(7)).toBe(7);
  });
});
