import { randomInt } from "node:crypto"
import type { RandomSource } from "../../ports/random-source"

// randomInt needs max - min < 2^48
const RESOLUTION = 2 ** 48 - 1

/** `Math.random`, the default for `shuffle()`. Not suitable for secrets. */
export const systemRandom: RandomSource = {
  next: () => Math.random(),
}

/** CSPRNG-backed source with 48 bits of resolution, for shuffles that must not be predictable. */
export const secureRandom: RandomSource = {
  next: () => randomInt(RESOLUTION) / RESOLUTION,
}
