/**
 * @file Core type definitions for linearizable types
 *
 * A linearizer is the runtime description of a type `T` together with a
 * bijection between `T` and the integer range `[0, LENGTH)`. Every primitive
 * and composite in this library produces one, and every map is generic over
 * one.
 */

/**
 * Bijection between the values of `T` and `[0, LENGTH)`.
 *
 * `delinearizeUnchecked(linearize(v))` must be indistinguishable from `v`, and
 * `linearize` must hit every index below `LENGTH` exactly once. A `LENGTH` of
 * 0 denotes an uninhabited type whose functions are never called.
 */
export type Linearizer<T> = {
  /** Human-readable type name used in messages. */
  readonly name: string;
  /** Cardinality. A non-negative safe integer. */
  readonly LENGTH: number;
  /** Maps a value to its index. Always returns a value below `LENGTH`. */
  linearize(value: T): number;
  /**
   * Inverse of {@link Linearizer.linearize}.
   *
   * The caller guarantees `index < LENGTH`; anything else is a logic error
   * and the result is unspecified.
   */
  delinearizeUnchecked(index: number): T;
  /** Canonical JSON text of a value, injective over the type. */
  describe(value: T): string;
};

/** Value type of a linearizer. */
export type Infer<L> = L extends Linearizer<infer T> ? T : never;

/** Field shape of a record: field name to field linearizer. */
export type FieldShape = Record<string, Linearizer<unknown>>;

/** Value type of a record with the given field shape. */
export type RecordOf<F extends FieldShape> = { [K in keyof F]: Infer<F[K]> };

/** Value type of a tuple with the given element linearizers. */
export type TupleOf<E extends readonly Linearizer<unknown>[]> = { -readonly [I in keyof E]: Infer<E[I]> };

/** Flattens intersections for readable hover types. */
export type Simplify<T> = { [K in keyof T]: T[K] } & {};

/** Discriminated union produced by `union(tag, variants)`. */
export type UnionOf<Tag extends string, V extends Record<string, FieldShape>> = {
  [K in keyof V & string]: Simplify<{ [P in Tag]: K } & RecordOf<V[K]>>;
}[keyof V & string];

/** Primitive values usable as enumeration cases and literals. */
export type JsonPrimitive = string | number | boolean | null;

/** Values that duplicate by plain assignment; see StaticCopyMap. */
export type CopyValue = string | number | bigint | boolean | symbol | null | undefined;
