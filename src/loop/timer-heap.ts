/**
 * Timer Min-Heap
 *
 * Binary min-heap of scheduled timers keyed by absolute expiry. Entries
 * with equal expiry come out in insertion order.
 */

export interface HeapEntry {
  expiresAt: number;
}

interface Slot<T extends HeapEntry> {
  entry: T;
  sequence: number;
}

export class TimerHeap<T extends HeapEntry> {
  private slots: Slot<T>[] = [];
  private sequence = 0;

  get size(): number {
    return this.slots.length;
  }

  push(entry: T): void {
    this.slots.push({ entry, sequence: this.sequence++ });
    this.siftUp(this.slots.length - 1);
  }

  peek(): T | undefined {
    return this.slots[0]?.entry;
  }

  pop(): T | undefined {
    const top = this.slots[0];
    if (!top) {
      return undefined;
    }
    const last = this.slots.pop();
    if (last && this.slots.length > 0) {
      this.slots[0] = last;
      this.siftDown(0);
    }
    return top.entry;
  }

  /**
   * Remove a specific entry.
   *
   * @returns true if the entry was scheduled
   */
  remove(entry: T): boolean {
    const index = this.slots.findIndex((slot) => slot.entry === entry);
    if (index === -1) {
      return false;
    }
    const last = this.slots.pop();
    if (last && index < this.slots.length) {
      this.slots[index] = last;
      this.siftDown(index);
      this.siftUp(index);
    }
    return true;
  }

  has(entry: T): boolean {
    return this.slots.some((slot) => slot.entry === entry);
  }

  clear(): void {
    this.slots = [];
  }

  private less(a: number, b: number): boolean {
    const left = this.slots[a];
    const right = this.slots[b];
    if (left.entry.expiresAt !== right.entry.expiresAt) {
      return left.entry.expiresAt < right.entry.expiresAt;
    }
    return left.sequence < right.sequence;
  }

  private swap(a: number, b: number): void {
    const tmp = this.slots[a];
    this.slots[a] = this.slots[b];
    this.slots[b] = tmp;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.less(child, parent)) {
        break;
      }
      this.swap(child, parent);
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    const length = this.slots.length;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (left < length && this.less(left, smallest)) {
        smallest = left;
      }
      if (right < length && this.less(right, smallest)) {
        smallest = right;
      }
      if (smallest === parent) {
        break;
      }
      this.swap(parent, smallest);
      parent = smallest;
    }
  }
}
