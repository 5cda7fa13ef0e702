/**
 * @file Iterator over every value of a linearizable type
 */
import type { Linearizer } from "../types";
import { CursorIterator } from "./cursor";

/** Yields the values of `T` in ascending index order. */
export class Variants<T> extends CursorIterator<T> {
  private readonly linearizer: Linearizer<T>;

  constructor(linearizer: Linearizer<T>, front = 0, back = linearizer.LENGTH) {
    super(front, back);
    this.linearizer = linearizer;
  }

  protected override item(index: number): T {
    return this.linearizer.delinearizeUnchecked(index);
  }

  override clone(): Variants<T> {
    return new Variants(this.linearizer, this.front, this.back);
  }
}
