export { type BitwiseOperator, BitwiseTransformer } from "./bitwise"
export { BitSwitchTransformer } from "./bit-switch"
export { ConcatTransformer, concatBuffers } from "./concat"
export { CopyTransformer } from "./copy"
export { NegateTransformer } from "./negate"
export { type ResizeMode, ResizeTransformer } from "./resize"
export { ReverseTransformer } from "./reverse"
export { type ShiftDirection, ShiftTransformer } from "./shift"
export { ShuffleTransformer } from "./shuffle"
export { type ByteComparator, SortTransformer } from "./sort"
