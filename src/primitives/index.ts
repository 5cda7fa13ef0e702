/**
 * @file Primitive linearizers façade
 */
export { bool } from "./bool";
export { unsigned, signed, u8, u16, u32, i8, i16, i32 } from "./integers";
export type { IntegerWidth } from "./integers";
export { unit, literal } from "./unit";
export { never, uninhabited } from "./never";
export { enumOf, enumFromCodes, ordering } from "./enums";
