/**
 * @file Double-ended, exact-size iteration over a half-open index range
 *
 * Every iterator in this library is a cursor `[front, back)` over slot
 * indices plus a projection from index to item. `next()` advances `front`,
 * `nextBack()` retracts `back`; once they meet, every call reports
 * exhaustion. Projections are only ever invoked with indices inside the
 * original range.
 */

function checkSkip(n: number): void {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`skip count must be a non-negative integer, got ${n}`);
  }
}

export abstract class CursorIterator<Item> implements IterableIterator<Item> {
  protected front: number;
  protected back: number;

  protected constructor(front: number, back: number) {
    this.front = front;
    this.back = back;
  }

  /** Item for a slot index inside the cursor's range. */
  protected abstract item(index: number): Item;

  /** Fresh iterator over the same remaining range. */
  abstract clone(): CursorIterator<Item>;

  /** Number of items left. */
  get len(): number {
    return this.back - this.front;
  }

  /** Lower and upper bound of the remaining items; always exact. */
  sizeHint(): [number, number] {
    return [this.len, this.len];
  }

  next(): IteratorResult<Item, undefined> {
    if (this.front >= this.back) {
      return { done: true, value: undefined };
    }
    const index = this.front;
    this.front += 1;
    return { done: false, value: this.item(index) };
  }

  /** Takes the item at the back end, or `undefined` when exhausted. */
  nextBack(): Item | undefined {
    if (this.front >= this.back) {
      return undefined;
    }
    this.back -= 1;
    return this.item(this.back);
  }

  /** Skips `n` items from the front and returns the next one. */
  nth(n: number): Item | undefined {
    checkSkip(n);
    if (n >= this.len) {
      this.front = this.back;
      return undefined;
    }
    this.front += n;
    const index = this.front;
    this.front += 1;
    return this.item(index);
  }

  /** Skips `n` items from the back and returns the next one from the back. */
  nthBack(n: number): Item | undefined {
    checkSkip(n);
    if (n >= this.len) {
      this.back = this.front;
      return undefined;
    }
    this.back -= n + 1;
    return this.item(this.back);
  }

  /** Consumes the iterator, returning how many items were left. */
  count(): number {
    const n = this.len;
    this.front = this.back;
    return n;
  }

  /** Consumes the iterator, returning its final item. */
  last(): Item | undefined {
    if (this.front >= this.back) {
      return undefined;
    }
    const index = this.back - 1;
    this.front = this.back;
    return this.item(index);
  }

  /** Drains the remaining items into an array. */
  collect(): Item[] {
    const out: Item[] = [];
    while (this.front < this.back) {
      out.push(this.item(this.front));
      this.front += 1;
    }
    return out;
  }

  [Symbol.iterator](): this {
    return this;
  }
}
