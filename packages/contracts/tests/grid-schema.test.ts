import { describe, expect, it } from "vitest";
import { TileRowsSchema } from "../src";

describe("TileRowsSchema", () => {
  it("accepts rectangular rows", () => {
    expect(TileRowsSchema.safeParse(["wwww", "wrrw", "wwww"]).success).toBe(true);
  });

  it("rejects an empty map", () => {
    expect(TileRowsSchema.safeParse([]).success).toBe(false);
  });

  it("reports the ragged row", () => {
    const res = TileRowsSchema.safeParse(["www", "wr", "www"]);
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.issues).toHaveLength(1);
      expect(res.error.issues[0]?.path).toEqual([1]);
      expect(res.error.issues[0]?.message).toBe("Row 1 has length 2, expected 3");
    }
  });
});
