/**
 * @file Sum composition: tagged unions
 *
 * Each variant owns the contiguous block `[base, base + |payload|)`, with
 * blocks laid out in declaration order. A variant whose payload is
 * uninhabited gets an empty block and can neither be linearized nor
 * produced by enumeration.
 */
import { InvalidShapeError, InvalidValueError } from "../errors";
import { uninhabited } from "../primitives/never";
import type { FieldShape, Linearizer, UnionOf } from "../types";
import { isPlainRecord } from "../util/is-object";
import { log } from "../util/log";
import { createProduct, type Product } from "./product";
import { rangePartition, upperBound } from "./radix";
import { assemble, checkNames, readField, splitShape } from "./shape";

type Variant = {
  readonly name: string;
  readonly base: number;
  readonly fields: string[];
  readonly product: Product;
};

/**
 * Linearizer for discriminated objects `{ [tag]: variant, ...payload }`.
 *
 * @example
 * const Shape = union("kind", { empty: {}, flag: { value: bool } });
 * Shape.LENGTH; // 3
 * Shape.delinearizeUnchecked(2); // { kind: "flag", value: true }
 */
export function union<const Tag extends string, V extends Record<string, FieldShape>>(
  tag: Tag,
  variants: V,
  name = "union",
): Linearizer<UnionOf<Tag, V>> {
  if (!isPlainRecord(variants)) {
    throw new InvalidShapeError(`variants of ${name} must be an object of field shapes`);
  }
  const variantNames = checkNames(Object.keys(variants), name, "variant");
  const parts = variantNames.map((v) => {
    const qualified = `${name}.${v}`;
    const shape = splitShape(variants[v], qualified);
    if (shape.names.includes(tag)) {
      throw new InvalidShapeError(`variant ${v} of ${name} has a field named like the tag ${JSON.stringify(tag)}`);
    }
    return { name: v, fields: shape.names, product: createProduct(shape.lins, qualified) };
  });
  const { LENGTH, bases } = rangePartition(
    parts.map((p) => p.product.LENGTH),
    name,
  );
  log.debug(`union ${name}: ${parts.length} variants, bases [${bases.join(", ")}], LENGTH ${LENGTH}`);
  if (LENGTH === 0) {
    return uninhabited(name);
  }

  const all: Variant[] = parts.map((p, i) => ({ ...p, base: bases[i] }));
  const inhabited = all.filter((v) => v.product.LENGTH > 0);
  const starts = inhabited.map((v) => v.base);
  const byTag = new Map<unknown, Variant>(inhabited.map((v) => [v.name, v]));

  const variantOf = (value: UnionOf<Tag, V>): Variant => {
    const t = readField(value, tag);
    const found = byTag.get(t);
    if (!found) {
      throw new InvalidValueError(name, `variant ${JSON.stringify(t)}`);
    }
    return found;
  };
  const partsOf = (variant: Variant, value: UnionOf<Tag, V>) => variant.fields.map((f) => readField(value, f));

  return {
    name,
    LENGTH,
    linearize(value) {
      const variant = variantOf(value);
      return variant.base + variant.product.encode(partsOf(variant, value));
    },
    delinearizeUnchecked(index) {
      const variant = inhabited[upperBound(starts, index) - 1];
      const payload = variant.product.decode(index - variant.base);
      const out: Record<string, unknown> = { [tag]: variant.name };
      variant.fields.forEach((f, i) => {
        out[f] = payload[i];
      });
      return assemble<UnionOf<Tag, V>>(out);
    },
    describe(value) {
      const variant = variantOf(value);
      const texts = variant.product.describe(partsOf(variant, value));
      const head = `${JSON.stringify(tag)}:${JSON.stringify(variant.name)}`;
      return `{${[head, ...variant.fields.map((f, i) => `${JSON.stringify(f)}:${texts[i]}`)].join(",")}}`;
    },
  };
}
