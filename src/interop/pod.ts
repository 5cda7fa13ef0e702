/**
 * @file Byte views of typed-array-backed copy maps
 *
 * Views share memory with the map; nothing is copied except by
 * `fromBytesCopy`. Typed arrays use the platform's byte order.
 */
import { PodCastError } from "../errors";
import { StaticCopyMap } from "../map/static_map";
import { checkStorageLength, type NumericArrayConstructor } from "../map/storage";
import type { Linearizer } from "../types";

/** The map's slots as raw bytes. Throws `PodCastError` unless the map is backed by a typed array. */
export function asBytes<K>(map: StaticCopyMap<K, number>): Uint8Array {
  const storage = map.asStorage();
  if (!ArrayBuffer.isView(storage)) {
    throw new PodCastError("map is not backed by a typed array");
  }
  return new Uint8Array(storage.buffer, storage.byteOffset, storage.byteLength);
}

/**
 * Reinterprets `bytes` as LENGTH elements of `ctor`'s type.
 *
 * Throws `PodCastError` when the byte length is not a whole number of
 * elements or the view is misaligned, and `LengthMismatchError` when the
 * element count differs from LENGTH.
 */
export function fromBytes<K>(
  linearizer: Linearizer<K>,
  ctor: NumericArrayConstructor,
  bytes: Uint8Array,
): StaticCopyMap<K, number> {
  const size = ctor.BYTES_PER_ELEMENT;
  if (bytes.byteLength % size !== 0) {
    throw new PodCastError(`${bytes.byteLength} bytes is not a whole number of ${ctor.name} elements`);
  }
  if (bytes.byteOffset % size !== 0) {
    throw new PodCastError(`byte offset ${bytes.byteOffset} is not aligned to ${size} for ${ctor.name}`);
  }
  const count = bytes.byteLength / size;
  checkStorageLength(linearizer.LENGTH, count);
  return StaticCopyMap.fromStorage<K, number>(linearizer, new ctor(bytes.buffer, bytes.byteOffset, count));
}

/** Like `fromBytes`, copying first so any offset is accepted. */
export function fromBytesCopy<K>(
  linearizer: Linearizer<K>,
  ctor: NumericArrayConstructor,
  bytes: Uint8Array,
): StaticCopyMap<K, number> {
  return fromBytes(linearizer, ctor, bytes.slice());
}
