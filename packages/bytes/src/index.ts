export type { RandomSource } from "./ports/random-source"
export type { BytesTransformer } from "./ports/transformer"
export { type Variant, variants } from "./ports/variant"

export { secureRandom, systemRandom } from "./adapters/random/system-random"

export { Bytes, type BytesInit, type ByteSource } from "./core/bytes"
export { dispatchTransform } from "./core/dispatch"
export {
  AccessViolationError,
  BoundsViolationError,
  LengthMismatchError,
  TransformContractError,
} from "./core/errors"
export {
  BytesFactory,
  type CreateBytesFactoryFromEnvOptions,
  type CreateBytesFactoryOptions,
  createBytesFactory,
  createBytesFactoryFromEnv,
} from "./core/factory"
export { type BytesDefaults, type BytesRuntime, defaultBytesRuntime } from "./core/runtime"
export { BYTES_ENV_PREFIX, type BytesSettings, bytesSettingsSchema } from "./core/settings"
export * from "./core/transformers"
export {
  allowsInPlace,
  allowsWrites,
  type BufferAccess,
  bufferAccess,
  transitionCopies,
} from "./core/variant-policy"
