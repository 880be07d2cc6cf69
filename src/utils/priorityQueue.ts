/**
 * Returns a negative number when `a` must leave the queue before `b`, a
 * positive number when `b` must leave first, and zero when either order is
 * acceptable.
 */
export type Comparator<T> = (a: T, b: T) => number;

/**
 * Binary heap ordered by an arbitrary comparator. The A* frontier and the
 * planner's task queue both sit on top of it.
 */
export class PriorityQueue<T> {
  private readonly data: T[] = [];

  constructor(private readonly compare: Comparator<T>) {}

  get size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  push(entry: T): void {
    this.data.push(entry);
    this.bubbleUp(this.data.length - 1);
  }

  peek(): T | undefined {
    return this.data[0];
  }

  pop(): T | undefined {
    const top = this.data[0];
    const last = this.data.pop();
    if (this.data.length > 0 && last !== undefined) {
      this.data[0] = last;
      this.bubbleDown(0);
    }
    return top;
  }

  /** Removes and returns the first entry, in heap order, matching {@link predicate}. */
  remove(predicate: (entry: T) => boolean): T | undefined {
    const index = this.data.findIndex(predicate);
    if (index < 0) {
      return undefined;
    }
    const removed = this.data[index];
    const last = this.data.pop();
    if (index < this.data.length && last !== undefined) {
      this.data[index] = last;
      this.bubbleUp(index);
      this.bubbleDown(index);
    }
    return removed;
  }

  /** Entries in heap order; callers must not rely on the sequence. */
  values(): readonly T[] {
    return this.data.slice();
  }

  clear(): void {
    this.data.length = 0;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parent = Math.floor((index - 1) / 2);
      if (this.compare(this.data[parent], this.data[index]) <= 0) {
        break;
      }
      this.swap(parent, index);
      index = parent;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.data.length;
    while (true) {
      let first = index;
      const left = 2 * index + 1;
      const right = 2 * index + 2;
      if (left < length && this.compare(this.data[left], this.data[first]) < 0) {
        first = left;
      }
      if (right < length && this.compare(this.data[right], this.data[first]) < 0) {
        first = right;
      }
      if (first === index) {
        break;
      }
      this.swap(first, index);
      index = first;
    }
  }

  private swap(i: number, j: number): void {
    const held = this.data[i];
    this.data[i] = this.data[j];
    this.data[j] = held;
  }
}
