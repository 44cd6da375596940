import { describe, expect, it } from "vitest";
import { MinHeap } from "../src/core/data-structures";

describe("MinHeap", () => {
  it("pops in priority order", () => {
    const heap = new MinHeap<string>();
    heap.push("c", 3);
    heap.push("a", 1);
    heap.push("d", 4);
    heap.push("b", 2);

    expect(heap.size).toBe(4);
    expect(heap.peek()).toBe("a");
    expect([heap.pop(), heap.pop(), heap.pop(), heap.pop()]).toEqual([
      "a",
      "b",
      "c",
      "d",
    ]);
    expect(heap.isEmpty).toBe(true);
    expect(heap.pop()).toBeUndefined();
  });

  it("keeps insertion order among equal priorities", () => {
    const heap = new MinHeap<number>();
    for (let i = 0; i < 6; i++) {
      heap.push(i, 1);
    }
    heap.push(-1, 0);

    const popped: (number | undefined)[] = [];
    while (!heap.isEmpty) {
      popped.push(heap.pop());
    }
    expect(popped).toEqual([-1, 0, 1, 2, 3, 4, 5]);
  });
});
