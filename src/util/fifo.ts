/**
 * @file FIFO queue with O(1) amortised push-back and pop-front
 *
 * Array.prototype.shift is O(n); this keeps a read cursor into the backing
 * array and compacts once the consumed prefix outgrows the live part.
 */

/**
 * First-in first-out queue.
 */
// eslint-disable-next-line no-restricted-syntax -- Queue data structure requires class for encapsulating state and operations
export class Fifo<T> {
  private a: T[] = [];
  private head = 0;

  constructor(items?: Iterable<T>) {
    if (items) {
      for (const x of items) {
        this.a.push(x);
      }
    }
  }

  get length() {
    return this.a.length - this.head;
  }

  push(x: T) {
    this.a.push(x);
  }

  shift(): T | undefined {
    if (this.head >= this.a.length) {
      return undefined;
    }
    const x = this.a[this.head];
    this.head++;
    if (this.head >= 1024 && this.head * 2 >= this.a.length) {
      this.a = this.a.slice(this.head);
      this.head = 0;
    }
    return x;
  }

  peek(): T | undefined {
    return this.head < this.a.length ? this.a[this.head] : undefined;
  }

  toArray(): T[] {
    return this.a.slice(this.head);
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = this.head; i < this.a.length; i++) {
      yield this.a[i];
    }
  }
}
