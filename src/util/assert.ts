/**
 * @file Debug-only precondition checks and the uninhabited trap
 */
import { getConfig } from "../config";
import { IndexOutOfRangeError, UnreachableError } from "../errors";

/** Whether an index is an integer in `[0, length)`. */
export function inRange(index: number, length: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < length;
}

/** Checks `index < length` when debug assertions are enabled; no-op otherwise. */
export function debugAssertIndex(index: number, length: number): void {
  if (!getConfig().debugAssertions) {
    return;
  }
  if (!inRange(index, length)) {
    throw new IndexOutOfRangeError(index, length);
  }
}

/** Trap for code paths an uninhabited type makes impossible. */
export function unreachable(typeName: string): never {
  throw new UnreachableError(typeName);
}
