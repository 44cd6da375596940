/**
 * Binary min-heap keyed by a numeric priority.
 *
 * Entries with equal priority pop in insertion order, which keeps
 * shortest-path expansion deterministic.
 */

interface HeapEntry<T> {
  readonly value: T;
  readonly priority: number;
  readonly order: number;
}

export class MinHeap<T> {
  private readonly entries: HeapEntry<T>[] = [];
  private inserted = 0;

  get size(): number {
    return this.entries.length;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  peek(): T | undefined {
    return this.entries[0]?.value;
  }

  push(value: T, priority: number): void {
    this.entries.push({ value, priority, order: this.inserted++ });
    this.siftUp(this.entries.length - 1);
  }

  pop(): T | undefined {
    const top = this.entries[0];
    const last = this.entries.pop();
    if (top === undefined || last === undefined) return undefined;

    if (this.entries.length > 0) {
      this.entries[0] = last;
      this.siftDown(0);
    }
    return top.value;
  }

  private less(a: HeapEntry<T>, b: HeapEntry<T>): boolean {
    return a.priority < b.priority || (a.priority === b.priority && a.order < b.order);
  }

  private siftUp(start: number): void {
    const entry = this.entries[start];
    if (entry === undefined) return;

    let index = start;
    while (index > 0) {
      const parentIndex = (index - 1) >> 1;
      const parent = this.entries[parentIndex];
      if (parent === undefined || !this.less(entry, parent)) break;
      this.entries[index] = parent;
      index = parentIndex;
    }
    this.entries[index] = entry;
  }

  private siftDown(start: number): void {
    const entry = this.entries[start];
    if (entry === undefined) return;

    let index = start;
    const length = this.entries.length;
    while (true) {
      const left = index * 2 + 1;
      if (left >= length) break;

      let childIndex = left;
      let child = this.entries[left];
      const right = this.entries[left + 1];
      if (child === undefined) break;
      if (right !== undefined && this.less(right, child)) {
        childIndex = left + 1;
        child = right;
      }
      if (!this.less(child, entry)) break;

      this.entries[index] = child;
      index = childIndex;
    }
    this.entries[index] = entry;
  }
}
