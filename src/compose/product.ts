/**
 * @file Product composition: records and tuples
 *
 * A product's index is the mixed-radix number whose digits are the field
 * indices, first field most significant. For fields of lengths `[2, 3]` the
 * layout is `index = i0 * 3 + i1`.
 */
import { InvalidShapeError } from "../errors";
import { isLinearizer } from "../linearize/ext";
import { uninhabited } from "../primitives/never";
import type { FieldShape, Linearizer, RecordOf, TupleOf } from "../types";
import { log } from "../util/log";
import { mixedRadix } from "./radix";
import { assemble, readField, splitShape } from "./shape";

/** Positional encoder shared by records, tuples and union payloads. */
export type Product = {
  readonly LENGTH: number;
  encode(parts: readonly unknown[]): number;
  decode(index: number): unknown[];
  describe(parts: readonly unknown[]): string[];
};

/**
 *
 */
export function createProduct(lins: readonly Linearizer<unknown>[], typeName: string): Product {
  const lengths = lins.map((l) => l.LENGTH);
  const { LENGTH, strides } = mixedRadix(lengths, typeName);
  return {
    LENGTH,
    encode(parts) {
      let index = 0;
      for (let i = 0; i < lins.length; i++) {
        index += lins[i].linearize(parts[i]) * strides[i];
      }
      return index;
    },
    decode(index) {
      const parts = new Array<unknown>(lins.length);
      for (let i = 0; i < lins.length; i++) {
        parts[i] = lins[i].delinearizeUnchecked(Math.floor(index / strides[i]) % lengths[i]);
      }
      return parts;
    },
    describe(parts) {
      return lins.map((l, i) => l.describe(parts[i]));
    },
  };
}

/**
 * Linearizer for objects with the given fields, in declaration order.
 *
 * @example
 * const Cell = record({ alive: bool, age: u8 });
 * Cell.LENGTH; // 512
 */
export function record<F extends FieldShape>(fields: F, name = "record"): Linearizer<RecordOf<F>> {
  const { names, lins } = splitShape(fields, name);
  const product = createProduct(lins, name);
  log.debug(`record ${name}: ${names.length} fields, LENGTH ${product.LENGTH}`);
  if (product.LENGTH === 0) {
    return uninhabited(name);
  }
  const partsOf = (value: RecordOf<F>) => names.map((k) => readField(value, k));
  return {
    name,
    LENGTH: product.LENGTH,
    linearize: (value) => product.encode(partsOf(value)),
    delinearizeUnchecked(index) {
      const parts = product.decode(index);
      const out: Record<string, unknown> = {};
      names.forEach((k, i) => {
        out[k] = parts[i];
      });
      return assemble<RecordOf<F>>(out);
    },
    describe(value) {
      const texts = product.describe(partsOf(value));
      return `{${names.map((k, i) => `${JSON.stringify(k)}:${texts[i]}`).join(",")}}`;
    },
  };
}

/** Linearizer for fixed-length arrays, first element most significant. */
export function tuple<const E extends readonly Linearizer<unknown>[]>(...elements: E): Linearizer<TupleOf<E>> {
  const name = `[${elements.map((e) => e.name).join(", ")}]`;
  elements.forEach((e, i) => {
    if (!isLinearizer(e)) {
      throw new InvalidShapeError(`element ${i} of tuple is not a linearizer`);
    }
  });
  const product = createProduct(elements, name);
  log.debug(`tuple ${name}: LENGTH ${product.LENGTH}`);
  if (product.LENGTH === 0) {
    return uninhabited(name);
  }
  const partsOf = (value: TupleOf<E>) => elements.map((_, i) => readField(value, String(i)));
  return {
    name,
    LENGTH: product.LENGTH,
    linearize: (value) => product.encode(partsOf(value)),
    delinearizeUnchecked: (index) => assemble<TupleOf<E>>(product.decode(index)),
    describe: (value) => `[${product.describe(partsOf(value)).join(",")}]`,
  };
}
