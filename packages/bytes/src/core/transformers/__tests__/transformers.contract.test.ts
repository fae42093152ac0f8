import { describeTransformerContract } from "../../../ports/__tests__/transformer.contract"
import { BitSwitchTransformer } from "../bit-switch"
import { BitwiseTransformer } from "../bitwise"
import { ConcatTransformer } from "../concat"
import { CopyTransformer } from "../copy"
import { NegateTransformer } from "../negate"
import { ResizeTransformer } from "../resize"
import { ReverseTransformer } from "../reverse"
import { ShiftTransformer } from "../shift"
import { ShuffleTransformer } from "../shuffle"
import { SortTransformer } from "../sort"

const sample = () => new Uint8Array([0x4a, 0x94, 0xfd, 0xff, 0x1e, 0xaf, 0xed, 0x00])
const operand = new Uint8Array([0x0f, 0xf0, 0xaa, 0x55, 0x00, 0xff, 0x01, 0x80])

// fixed sequence, so both modes shuffle the same way
const fixedRandom = () => {
  let n = 0
  return { next: () => [0.1, 0.7, 0.3, 0.9, 0.5][n++ % 5] }
}

describeTransformerContract({ name: "and", make: () => new BitwiseTransformer(operand, "and"), sample })
describeTransformerContract({ name: "or", make: () => new BitwiseTransformer(operand, "or"), sample })
describeTransformerContract({ name: "xor", make: () => new BitwiseTransformer(operand, "xor"), sample })
describeTransformerContract({ name: "not", make: () => new NegateTransformer(), sample })
describeTransformerContract({
  name: "shift-left",
  make: () => new ShiftTransformer(11, "left"),
  sample,
})
describeTransformerContract({
  name: "shift-right (little-endian)",
  make: () => new ShiftTransformer(5, "right", "little-endian"),
  sample,
})
describeTransformerContract({ name: "reverse", make: () => new ReverseTransformer(), sample })
describeTransformerContract({
  name: "switch-bit",
  make: () => new BitSwitchTransformer(9),
  sample,
})
describeTransformerContract({ name: "sort", make: () => new SortTransformer(), sample })
describeTransformerContract({
  name: "sort (comparator)",
  make: () => new SortTransformer((a, b) => b - a),
  sample,
})
describeTransformerContract({
  name: "shuffle",
  make: () => new ShuffleTransformer(fixedRandom()),
  sample,
})
describeTransformerContract({ name: "copy", make: () => new CopyTransformer(2, 3), sample })
describeTransformerContract({ name: "resize", make: () => new ResizeTransformer(8), sample })
describeTransformerContract({
  name: "concat",
  make: () => new ConcatTransformer(new Uint8Array([1, 2])),
  sample,
})
