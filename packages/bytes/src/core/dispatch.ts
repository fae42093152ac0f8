import type { Logger } from "@bytewise/logger"
import type { BytesTransformer } from "../ports/transformer"
import type { Variant } from "../ports/variant"
import { TransformContractError } from "./errors"
import { allowsInPlace } from "./variant-policy"

/**
 * Run `transformer` over `buffer` in the mode `variant` allows.
 *
 * Variants that forbid in-place work hand the transformer a copy, so nothing
 * it does can reach `buffer`.
 *
 * @returns `buffer` itself when the transform ran in place, otherwise a new
 *   array; the input is then left untouched.
 * @throws TransformContractError when the transformer returns the wrong
 *   object for the mode it was asked to run in
 */
export function dispatchTransform(
  buffer: Uint8Array,
  variant: Variant,
  transformer: BytesTransformer,
  logger: Logger,
): Uint8Array {
  const inPlace = allowsInPlace(variant) && transformer.supportsInPlace()
  const input = allowsInPlace(variant) ? buffer : buffer.slice()

  logger.trace("transform", {
    operation: "transform",
    transformer: transformer.name,
    variant,
    inPlace,
    copied: input !== buffer,
    length: buffer.length,
  })

  const result = transformer.apply(input, inPlace)

  if ((result === input) !== inPlace) {
    throw new TransformContractError(transformer.name, inPlace)
  }

  return result
}
