import type { ByteOrder, Decoder } from "@bytewise/codec"
import { EnvSource, loadConfig } from "@bytewise/config"
import { type Logger, NullLogger, PinoLogger, type PinoLoggerDeps } from "@bytewise/logger"
import { Bytes, type ByteSource } from "./bytes"
import type { BytesRuntime } from "./runtime"
import { BYTES_ENV_PREFIX, type BytesSettings, bytesSettingsSchema } from "./settings"

/**
 * The static `Bytes` factories, bound to a runtime: every sequence it builds
 * logs through the runtime's logger and uses its default byte order and hex
 * case. Parsed sequences stay big-endian.
 */
export class BytesFactory {
  constructor(readonly runtime: BytesRuntime) {}

  allocate(length: number, fill?: number): Bytes {
    return this.adopt(Bytes.allocate(length, fill), this.runtime.defaults.byteOrder)
  }

  empty(): Bytes {
    return this.adopt(Bytes.empty(), this.runtime.defaults.byteOrder)
  }

  wrap(buffer: Uint8Array, byteOrder: ByteOrder = this.runtime.defaults.byteOrder): Bytes {
    return this.adopt(Bytes.wrap(buffer), byteOrder)
  }

  from(source: ByteSource, byteOrder?: ByteOrder): Bytes {
    const fallback = source instanceof Bytes ? source.byteOrder : this.runtime.defaults.byteOrder
    return this.adopt(Bytes.from(source), byteOrder ?? fallback)
  }

  concat(...parts: ByteSource[]): Bytes {
    return this.adopt(Bytes.concat(...parts), this.runtime.defaults.byteOrder)
  }

  fromUtf8(text: string): Bytes {
    return this.adopt(Bytes.fromUtf8(text))
  }

  fromBigInt(value: bigint): Bytes {
    return this.adopt(Bytes.fromBigInt(value))
  }

  fromShort(value: number): Bytes {
    return this.adopt(Bytes.fromShort(value, this.runtime.defaults.byteOrder))
  }

  fromInt(value: number): Bytes {
    return this.adopt(Bytes.fromInt(value, this.runtime.defaults.byteOrder))
  }

  fromLong(value: bigint): Bytes {
    return this.adopt(Bytes.fromLong(value, this.runtime.defaults.byteOrder))
  }

  fromFloat(value: number): Bytes {
    return this.adopt(Bytes.fromFloat(value, this.runtime.defaults.byteOrder))
  }

  fromDouble(value: number): Bytes {
    return this.adopt(Bytes.fromDouble(value, this.runtime.defaults.byteOrder))
  }

  random(length: number): Bytes {
    return this.adopt(Bytes.random(length), this.runtime.defaults.byteOrder)
  }

  parse(text: string, decoder: Decoder): Bytes {
    return this.adopt(Bytes.parse(text, decoder))
  }

  parseHex(text: string): Bytes {
    return this.adopt(Bytes.parseHex(text))
  }

  parseBase32(text: string): Bytes {
    return this.adopt(Bytes.parseBase32(text))
  }

  parseBase64(text: string): Bytes {
    return this.adopt(Bytes.parseBase64(text))
  }

  parseRadix(text: string, radix: number): Bytes {
    return this.adopt(Bytes.parseRadix(text, radix))
  }

  parseBinary(text: string): Bytes {
    return this.adopt(Bytes.parseBinary(text))
  }

  parseOctal(text: string): Bytes {
    return this.adopt(Bytes.parseOctal(text))
  }

  parseDec(text: string): Bytes {
    return this.adopt(Bytes.parseDec(text))
  }

  parseBase36(text: string): Bytes {
    return this.adopt(Bytes.parseBase36(text))
  }

  // fresh sequences are `shared`, so array() is the live buffer
  private adopt(bytes: Bytes, byteOrder: ByteOrder = bytes.byteOrder): Bytes {
    return new Bytes(bytes.array(), { byteOrder, runtime: this.runtime })
  }
}

export type CreateBytesFactoryOptions = {
  settings?: Partial<BytesSettings>
  logger?: Logger
}

export function createBytesFactory(options: CreateBytesFactoryOptions = {}): BytesFactory {
  const { settings = {}, logger = new NullLogger() } = options
  const byteOrder = settings.BYTE_ORDER ?? "big-endian"

  const runtime: BytesRuntime = Object.freeze({
    logger: logger.child({ module: "bytes", byteOrder }),
    defaults: Object.freeze({
      byteOrder,
      hexUpperCase: settings.HEX_UPPERCASE ?? false,
    }),
  })

  runtime.logger.debug("bytes factory ready", { operation: "createBytesFactory" })

  return new BytesFactory(runtime)
}

export type CreateBytesFactoryFromEnvOptions = {
  env?: Record<string, string | undefined>
  /** Where the pino logger writes; stdout when omitted. */
  destination?: PinoLoggerDeps["destination"]
}

/**
 * Reads `BYTES_*` settings from `env` (default `process.env`) and builds a
 * factory logging through pino at `BYTES_LOG_LEVEL`.
 *
 * @throws BaseError `config_invalid` when a setting does not validate
 */
export function createBytesFactoryFromEnv(
  options: CreateBytesFactoryFromEnvOptions = {},
): BytesFactory {
  const config = loadConfig({
    schema: bytesSettingsSchema,
    sources: [new EnvSource({ prefix: BYTES_ENV_PREFIX, env: options.env ?? process.env })],
  })
  const settings = config.value

  const logger = new PinoLogger(
    { ...(options.destination && { destination: options.destination }) },
    { level: settings.LOG_LEVEL, prettify: settings.LOG_PRETTY },
    { service: "bytewise" },
  )

  const unknown = config.unknownKeys()
  if (unknown.length > 0) {
    logger.warn("unknown bytes settings", { keys: unknown.map((key) => BYTES_ENV_PREFIX + key) })
  }

  return createBytesFactory({ settings, logger })
}
