/**
 * @file Slot-occupancy mask for partially built maps
 *
 * One byte per slot. Builders and decoders mark each slot as it is written
 * and scan for the first gap before handing out a total map.
 */

export type BitMask = Uint8Array;

/**
 *
 */
export function createBitMask(n: number): BitMask {
  return new Uint8Array(n);
}
/**
 *
 */
export function maskSet(mask: BitMask, idx: number): void {
  if (idx < 0) {
    return;
  }
  if (idx >= mask.length) {
    return;
  }
  mask[idx] = 1;
}
/**
 *
 */
export function maskHas(mask: BitMask, idx: number): boolean {
  if (idx < 0) {
    return false;
  }
  if (idx >= mask.length) {
    return false;
  }
  return mask[idx] === 1;
}
/** Index of the first unset slot, or -1 when every slot is set. */
export function maskFirstUnset(mask: BitMask): number {
  return mask.indexOf(0);
}
