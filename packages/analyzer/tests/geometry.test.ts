/**
 * Geometry operations unit tests
 */

import { describe, expect, it } from "vitest";
import {
  boundsCenter,
  boundsContains,
  boundsContainsPoint,
  boundsEqual,
  boundsSize,
  boundsTouch,
  euclideanDistance,
} from "../src/core/geometry";

const box = (originX: number, originY: number, endX: number, endY: number) => ({
  originX,
  originY,
  endX,
  endY,
});

describe("boundsCenter", () => {
  it("averages the inclusive corners", () => {
    expect(boundsCenter(box(0, 0, 4, 4))).toEqual({ x: 2, y: 2 });
    expect(boundsCenter(box(0, 2, 3, 5))).toEqual({ x: 1.5, y: 3.5 });
  });
});

describe("boundsTouch", () => {
  it("links rectangles that share a boundary tile", () => {
    expect(boundsTouch(box(0, 0, 4, 4), box(4, 0, 8, 4))).toBe(true);
  });

  it("does not link rectangles that only sit side by side", () => {
    expect(boundsTouch(box(0, 0, 4, 4), box(5, 0, 9, 4))).toBe(false);
  });

  it("requires overlap on both axes", () => {
    expect(boundsTouch(box(0, 0, 4, 4), box(2, 6, 3, 8))).toBe(false);
    expect(boundsTouch(box(0, 0, 4, 4), box(2, 3, 3, 8))).toBe(true);
  });

  it("is symmetric", () => {
    const a = box(1, 1, 3, 6);
    const b = box(3, 6, 9, 9);
    expect(boundsTouch(a, b)).toBe(boundsTouch(b, a));
  });
});

describe("containment", () => {
  it("treats equal bounds as contained", () => {
    expect(boundsContains(box(0, 0, 9, 9), box(0, 0, 9, 9))).toBe(true);
    expect(boundsContains(box(0, 0, 9, 9), box(2, 2, 5, 5))).toBe(true);
    expect(boundsContains(box(2, 2, 5, 5), box(0, 0, 9, 9))).toBe(false);
  });

  it("includes the edges when testing tiles", () => {
    expect(boundsContainsPoint(box(2, 2, 5, 5), 5, 2)).toBe(true);
    expect(boundsContainsPoint(box(2, 2, 5, 5), 6, 2)).toBe(false);
  });
});

describe("misc", () => {
  it("measures sizes and distances", () => {
    expect(boundsSize(box(2, 3, 4, 9))).toEqual({ sizeX: 3, sizeY: 7 });
    expect(euclideanDistance({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5);
    expect(boundsEqual(box(1, 2, 3, 4), box(1, 2, 3, 4))).toBe(true);
    expect(boundsEqual(box(1, 2, 3, 4), box(1, 2, 3, 5))).toBe(false);
  });
});
