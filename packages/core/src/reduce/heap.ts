/**
 * Fixed-capacity binary heap used for top-k selection. A min-heap keeps the
 * `k` largest items seen so far (its root is the weakest of them); a max-heap
 * keeps the `k` smallest.
 */
export class BinaryHeap<T> {
  private heap: T[] = [];

  constructor(
    private readonly k: number,
    private readonly compare: (a: T, b: T) => number,
    private readonly isMinHeap: boolean = true
  ) {}

  get size(): number {
    return this.heap.length;
  }

  insert(item: T): void {
    if (this.k <= 0) return;

    if (this.heap.length < this.k) {
      this.heap.push(item);
      this.bubbleUp(this.heap.length - 1);
    } else if (this.shouldReplace(item)) {
      this.heap[0] = item;
      this.bubbleDown(0);
    }
  }

  private shouldReplace(item: T): boolean {
    const order = this.compare(item, this.heap[0]);
    return this.isMinHeap
      ? order > 0 // Min heap: replace if new item is larger
      : order < 0; // Max heap: replace if new item is smaller
  }

  private bubbleUp(index: number): void {
    const parent = Math.floor((index - 1) / 2);
    if (parent >= 0 && this.outranks(index, parent)) {
      this.swap(index, parent);
      this.bubbleUp(parent);
    }
  }

  private bubbleDown(index: number): void {
    const left = 2 * index + 1;
    const right = 2 * index + 2;
    let target = index;

    if (left < this.heap.length && this.outranks(left, target)) {
      target = left;
    }
    if (right < this.heap.length && this.outranks(right, target)) {
      target = right;
    }

    if (target !== index) {
      this.swap(index, target);
      this.bubbleDown(target);
    }
  }

  /** Whether the item at `i` belongs closer to the root than the item at `j`. */
  private outranks(i: number, j: number): boolean {
    const order = this.compare(this.heap[i], this.heap[j]);
    return this.isMinHeap ? order < 0 : order > 0;
  }

  private swap(i: number, j: number): void {
    const temp = this.heap[i];
    this.heap[i] = this.heap[j];
    this.heap[j] = temp;
  }

  /**
   * Retained items, best first: descending for a min-heap, ascending for a
   * max-heap. The heap itself is left intact.
   */
  extract(): T[] {
    return this.heap
      .slice()
      .sort((a, b) => (this.isMinHeap ? this.compare(b, a) : this.compare(a, b)));
  }
}
