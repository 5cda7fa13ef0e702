/**
 * @file Composition façade
 */
export { record, tuple, createProduct } from "./product";
export type { Product } from "./product";
export { union } from "./sum";
export { optional } from "./optional";
export { mixedRadix, rangePartition } from "./radix";
