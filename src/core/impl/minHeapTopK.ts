import type { Comparator, TopKSelector } from "../selection.js";

/** Items tagged with their arrival index so equal items stay in iteration order. */
interface Arrival<T> {
  item: T;
  seq: number;
}

class ArrayHeap<T> {
  private readonly data: T[] = [];

  constructor(private readonly less: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.less(a[i]!, a[p]!)) break;
      this.swap(i, p);
      i = p;
    }
  }

  pop(): T | undefined {
    const a = this.data;
    const top = a[0];
    const last = a.pop();
    if (a.length && last !== undefined) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private swap(i: number, j: number): void {
    const a = this.data;
    [a[i]!, a[j]!] = [a[j]!, a[i]!];
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let smallest = i;

      if (l < n && this.less(a[l]!, a[smallest]!)) smallest = l;
      if (r < n && this.less(a[r]!, a[smallest]!)) smallest = r;
      if (smallest === i) return;

      this.swap(i, smallest);
      i = smallest;
    }
  }
}

/**
 * Keeps a fixed-size min-heap of the best K items.
 *
 * The heap top is the *worst of the best*; a new item replaces it only when strictly
 * better, and ties fall back to arrival order, so the first-seen of equal items wins.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: Comparator<T>): T[] {
    if (k <= 0) return [];

    const order = (a: Arrival<T>, b: Arrival<T>): number => comparator(a.item, b.item) || a.seq - b.seq;
    // less(a,b) means a is WORSE than b (for min-heap of worst items)
    const heap = new ArrayHeap<Arrival<T>>((a, b) => order(a, b) > 0);

    let seq = 0;
    for (const item of items) {
      const next = { item, seq: seq++ };
      if (heap.size() < k) {
        heap.push(next);
        continue;
      }
      const worst = heap.peek();
      if (worst && order(next, worst) < 0) {
        heap.pop();
        heap.push(next);
      }
    }

    return heap.toArray().sort(order).map((a) => a.item);
  }
}
