import { describe, expect, it } from "vitest";
import { DEFAULT_RESOURCE_PLAN, ResourcePlanSchema, ResourceSpecSchema } from "../src";

describe("ResourcePlanSchema", () => {
  it("accepts the default plan", () => {
    const res = ResourcePlanSchema.safeParse(DEFAULT_RESOURCE_PLAN);
    expect(res.success).toBe(true);
  });

  it("rejects a symbol shared by two kinds", () => {
    const res = ResourcePlanSchema.safeParse({
      spawn: { symbol: "s", count: 1 },
      medkit: { symbol: "s", count: 1 },
      ammo: { symbol: "a", count: 1 },
    });
    expect(res.success).toBe(false);
    if (!res.success) {
      expect(res.error.issues[0]?.path).toEqual(["medkit", "symbol"]);
    }
  });

  it("rejects a missing kind", () => {
    const res = ResourcePlanSchema.safeParse({
      spawn: { symbol: "s", count: 1 },
      medkit: { symbol: "h", count: 1 },
    });
    expect(res.success).toBe(false);
  });
});

describe("ResourceSpecSchema", () => {
  it("accepts a zero count", () => {
    expect(ResourceSpecSchema.safeParse({ symbol: "x", count: 0 }).success).toBe(true);
  });

  it("rejects reserved symbols", () => {
    expect(ResourceSpecSchema.safeParse({ symbol: "w", count: 1 }).success).toBe(false);
    expect(ResourceSpecSchema.safeParse({ symbol: "r", count: 1 }).success).toBe(false);
  });

  it("rejects multi-character and whitespace symbols", () => {
    expect(ResourceSpecSchema.safeParse({ symbol: "hp", count: 1 }).success).toBe(false);
    expect(ResourceSpecSchema.safeParse({ symbol: " ", count: 1 }).success).toBe(false);
  });

  it("rejects negative and fractional counts", () => {
    expect(ResourceSpecSchema.safeParse({ symbol: "s", count: -1 }).success).toBe(false);
    expect(ResourceSpecSchema.safeParse({ symbol: "s", count: 1.5 }).success).toBe(false);
  });
});
