import { randomBytes, randomFillSync, timingSafeEqual } from "node:crypto"
import {
  type Base64Options,
  type ByteOrder,
  type Decoder,
  type Encoder,
  encodings,
  HexEncoding,
  orderedBytes,
  RadixEncoding,
} from "@bytewise/codec"
import { systemRandom } from "../adapters/random/system-random"
import type { RandomSource } from "../ports/random-source"
import type { BytesTransformer } from "../ports/transformer"
import type { Variant } from "../ports/variant"
import { dispatchTransform } from "./dispatch"
import { AccessViolationError, BoundsViolationError, LengthMismatchError } from "./errors"
import {
  decodeLong,
  decodeNumber,
  encodeLong,
  encodeNumber,
  type NumberKind,
  numberWidths,
  shannonEntropy,
} from "./numeric"
import { type BytesRuntime, defaultBytesRuntime } from "./runtime"
import {
  type BitwiseOperator,
  BitSwitchTransformer,
  BitwiseTransformer,
  type ByteComparator,
  ConcatTransformer,
  CopyTransformer,
  concatBuffers,
  NegateTransformer,
  type ResizeMode,
  ResizeTransformer,
  ReverseTransformer,
  ShiftTransformer,
  ShuffleTransformer,
  SortTransformer,
} from "./transformers"
import { allowsWrites, bufferAccess, transitionCopies } from "./variant-policy"

/**
 * Anything a byte sequence can be built from or compared against. Numbers
 * outside `0..255` wrap modulo 256.
 */
export type ByteSource = Bytes | Uint8Array | readonly number[]

export type BytesInit = {
  byteOrder?: ByteOrder
  variant?: Variant
  runtime?: BytesRuntime
}

const PREVIEW_BYTES = 4

const hex = { lower: new HexEncoding(), upper: new HexEncoding({ upperCase: true }) }
const base32 = encodings.base32()
const base64 = encodings.base64()
const base64Url = encodings.base64Url()
const binary = encodings.binary()
const octal = encodings.octal()
const decimal = encodings.decimal()
const base36 = encodings.base36()
const utf8Encoder = new TextEncoder()
const utf8Decoder = new TextDecoder()

/**
 * A byte buffer tagged with a byte order and an ownership variant.
 *
 * @remarks
 * The variant decides what happens to the buffer:
 *
 * | variant     | `array()`   | `transform`             | direct writes |
 * |-------------|-------------|-------------------------|---------------|
 * | `shared`    | live buffer | in place when possible  | no            |
 * | `mutable`   | live buffer | in place when possible  | yes           |
 * | `immutable` | copy        | always copies           | no            |
 * | `read-only` | refused     | always copies           | no            |
 *
 * Every operation returns a sequence of the same variant, byte order and
 * runtime as its receiver. Sequences that share a buffer see each other's
 * in-place changes.
 *
 * @example
 * ```ts
 * const key = Bytes.parseHex("0a0b0c").toMutable()
 * key.xor([0xff, 0xff, 0xff]).encodeHex() // "f5f4f3"
 * key.encodeHex()                          // "f5f4f3", it ran in place
 * ```
 */
export class Bytes implements Iterable<number> {
  readonly byteOrder: ByteOrder
  readonly variant: Variant
  readonly runtime: BytesRuntime

  private readonly buffer: Uint8Array

  /**
   * Wraps `buffer` without copying it. Prefer the static factories, or a
   * `BytesFactory` to pick up configured defaults.
   */
  constructor(buffer: Uint8Array, init: BytesInit = {}) {
    this.buffer = buffer
    this.byteOrder = init.byteOrder ?? "big-endian"
    this.variant = init.variant ?? "shared"
    this.runtime = init.runtime ?? defaultBytesRuntime
  }

  // ---------------------------------------------------------------------------
  // Factories
  // ---------------------------------------------------------------------------

  static allocate(length: number, fill = 0): Bytes {
    if (!Number.isInteger(length) || length < 0) {
      throw new BoundsViolationError(length, Number.POSITIVE_INFINITY, "length")
    }
    return new Bytes(new Uint8Array(length).fill(fill))
  }

  static empty(): Bytes {
    return new Bytes(new Uint8Array(0))
  }

  /** Shares `buffer`: later writes to it are visible through the sequence. */
  static wrap(buffer: Uint8Array, byteOrder: ByteOrder = "big-endian"): Bytes {
    return new Bytes(buffer, { byteOrder })
  }

  /**
   * Copies `source`. A `Bytes` source keeps its byte order unless one is
   * given; its variant is not carried over.
   */
  static from(source: ByteSource, byteOrder?: ByteOrder): Bytes {
    const fallback = source instanceof Bytes ? source.byteOrder : "big-endian"
    return new Bytes(Bytes.view(source).slice(), { byteOrder: byteOrder ?? fallback })
  }

  static concat(...parts: ByteSource[]): Bytes {
    return new Bytes(concatBuffers(parts.map((part) => Bytes.view(part))))
  }

  static fromUtf8(text: string): Bytes {
    return new Bytes(utf8Encoder.encode(text))
  }

  /**
   * Minimal big-endian magnitude of a non-negative integer; `0n` is one zero
   * byte.
   */
  static fromBigInt(value: bigint): Bytes {
    if (value < 0n) {
      throw new BoundsViolationError(Number(value), Number.POSITIVE_INFINITY, "value")
    }
    return new Bytes(hex.lower.decode(value.toString(16)))
  }

  /** 2-byte signed integer laid out in `byteOrder`. */
  static fromShort(value: number, byteOrder: ByteOrder = "big-endian"): Bytes {
    return new Bytes(encodeNumber("short", value, byteOrder), { byteOrder })
  }

  /** 4-byte signed integer laid out in `byteOrder`. */
  static fromInt(value: number, byteOrder: ByteOrder = "big-endian"): Bytes {
    return new Bytes(encodeNumber("int", value, byteOrder), { byteOrder })
  }

  /** 8-byte signed integer laid out in `byteOrder`. */
  static fromLong(value: bigint, byteOrder: ByteOrder = "big-endian"): Bytes {
    return new Bytes(encodeLong(value, byteOrder), { byteOrder })
  }

  static fromFloat(value: number, byteOrder: ByteOrder = "big-endian"): Bytes {
    return new Bytes(encodeNumber("float", value, byteOrder), { byteOrder })
  }

  static fromDouble(value: number, byteOrder: ByteOrder = "big-endian"): Bytes {
    return new Bytes(encodeNumber("double", value, byteOrder), { byteOrder })
  }

  /** `length` bytes from the platform CSPRNG. */
  static random(length: number): Bytes {
    if (!Number.isInteger(length) || length < 0) {
      throw new BoundsViolationError(length, Number.POSITIVE_INFINITY, "length")
    }
    return new Bytes(new Uint8Array(randomBytes(length)))
  }

  static parse(text: string, decoder: Decoder): Bytes {
    return new Bytes(decoder.decode(text))
  }

  static parseHex(text: string): Bytes {
    return Bytes.parse(text, hex.lower)
  }

  static parseBase32(text: string): Bytes {
    return Bytes.parse(text, base32)
  }

  /** Reads standard and url-safe base64, padded or not. */
  static parseBase64(text: string): Bytes {
    return Bytes.parse(text, base64)
  }

  static parseRadix(text: string, radix: number): Bytes {
    return Bytes.parse(text, new RadixEncoding(radix))
  }

  static parseBinary(text: string): Bytes {
    return Bytes.parse(text, binary)
  }

  static parseOctal(text: string): Bytes {
    return Bytes.parse(text, octal)
  }

  static parseDec(text: string): Bytes {
    return Bytes.parse(text, decimal)
  }

  static parseBase36(text: string): Bytes {
    return Bytes.parse(text, base36)
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  get length(): number {
    return this.buffer.length
  }

  get lengthBit(): number {
    return this.buffer.length * 8
  }

  isEmpty(): boolean {
    return this.buffer.length === 0
  }

  isMutable(): boolean {
    return allowsWrites(this.variant)
  }

  isReadOnly(): boolean {
    return this.variant === "read-only"
  }

  /**
   * The underlying buffer for `shared` and `mutable` sequences, a copy for
   * `immutable` ones.
   *
   * @throws AccessViolationError on a `read-only` sequence
   */
  array(): Uint8Array {
    switch (bufferAccess(this.variant)) {
      case "live":
        return this.buffer
      case "copy":
        return this.buffer.slice()
      case "denied":
        throw new AccessViolationError(this.variant, "array")
    }
  }

  byteAt(index: number): number {
    this.checkIndex(index, this.buffer.length)
    return this.buffer[index]
  }

  /** Bit 0 is the least significant bit of the last byte. */
  bitAt(position: number): boolean {
    this.checkIndex(position, this.lengthBit, "bit position")
    const byte = this.buffer[this.buffer.length - 1 - Math.floor(position / 8)]
    return ((byte >>> position % 8) & 1) === 1
  }

  /**
   * First index of a byte or of a byte run at or after `from`, or -1. A
   * negative `from` counts as 0.
   */
  indexOf(target: number | ByteSource, from = 0): number {
    const start = Math.max(0, from)
    if (typeof target === "number") return this.buffer.indexOf(target, start)

    const needle = Bytes.view(target)
    for (let i = start; i + needle.length <= this.buffer.length; i++) {
      if (this.matchesAt(needle, i)) return i
    }
    return -1
  }

  lastIndexOf(byte: number): number {
    return this.buffer.lastIndexOf(byte)
  }

  contains(byte: number): boolean {
    return this.buffer.includes(byte)
  }

  startsWith(prefix: ByteSource): boolean {
    const needle = Bytes.view(prefix)
    return needle.length <= this.buffer.length && this.matchesAt(needle, 0)
  }

  endsWith(suffix: ByteSource): boolean {
    const needle = Bytes.view(suffix)
    const at = this.buffer.length - needle.length
    return at >= 0 && this.matchesAt(needle, at)
  }

  count(byte: number): number {
    let n = 0
    for (const b of this.buffer) if (b === byte) n++
    return n
  }

  /** Unsigned value; the last byte is most significant for little-endian. */
  toBigInt(): bigint {
    let value = 0n
    for (const byte of orderedBytes(this.buffer, this.byteOrder)) {
      value = (value << 8n) | BigInt(byte)
    }
    return value
  }

  // Fixed-width numbers are read in this sequence's byte order. The whole
  // sequence conversions need an exact length.

  toShort(): number {
    return this.toNumber("short")
  }

  toInt(): number {
    return this.toNumber("int")
  }

  toLong(): bigint {
    this.checkWidth(numberWidths.long)
    return decodeLong(this.buffer, 0, this.byteOrder)
  }

  toFloat(): number {
    return this.toNumber("float")
  }

  toDouble(): number {
    return this.toNumber("double")
  }

  /** The 2-byte signed integer starting at byte `index`. */
  shortAt(index: number): number {
    this.checkIndex(index, this.fits(numberWidths.short))
    return decodeNumber("short", this.buffer, index, this.byteOrder)
  }

  intAt(index: number): number {
    this.checkIndex(index, this.fits(numberWidths.int))
    return decodeNumber("int", this.buffer, index, this.byteOrder)
  }

  longAt(index: number): bigint {
    this.checkIndex(index, this.fits(numberWidths.long))
    return decodeLong(this.buffer, index, this.byteOrder)
  }

  /**
   * Shannon entropy of the byte values in bits per byte: 0 for a single
   * repeated value, 8 when all 256 values occur equally often.
   */
  entropy(): number {
    return shannonEntropy(this.buffer)
  }

  /** `"3 bytes (0x0a0b0c)"`; more than 8 bytes show the first and last 4. */
  toString(): string {
    const n = this.buffer.length
    const noun = n === 1 ? "byte" : "bytes"
    const encoder = this.hexEncoder()

    let preview = ""
    if (n > PREVIEW_BYTES * 2) {
      const head = encoder.encode(this.buffer.subarray(0, PREVIEW_BYTES))
      const tail = encoder.encode(this.buffer.subarray(n - PREVIEW_BYTES))
      preview = `(0x${head}...${tail})`
    } else if (n > 0) {
      preview = `(0x${encoder.encode(this.buffer)})`
    }

    return preview === "" ? `${n} ${noun}` : `${n} ${noun} ${preview}`
  }

  [Symbol.iterator](): Iterator<number> {
    return this.buffer[Symbol.iterator]()
  }

  /** Same content and same byte order. */
  equals(other: Bytes): boolean {
    return this.byteOrder === other.byteOrder && this.equalsContent(other)
  }

  equalsContent(other: ByteSource): boolean {
    const that = Bytes.view(other)
    return that.length === this.buffer.length && this.matchesAt(that, 0)
  }

  /**
   * Content comparison whose duration does not depend on where the first
   * difference is. Only the length may leak.
   */
  equalsConstantTime(other: ByteSource): boolean {
    const that = Bytes.view(other)
    return that.length === this.buffer.length && timingSafeEqual(this.buffer, that)
  }

  /** Unsigned lexicographic order: -1, 0 or 1. A prefix sorts first. */
  compareTo(other: ByteSource): number {
    const that = Bytes.view(other)
    const n = Math.min(this.buffer.length, that.length)

    for (let i = 0; i < n; i++) {
      if (this.buffer[i] !== that[i]) return this.buffer[i] < that[i] ? -1 : 1
    }
    return Math.sign(this.buffer.length - that.length)
  }

  // ---------------------------------------------------------------------------
  // Encoding
  // ---------------------------------------------------------------------------

  /**
   * Encodes with a caller-supplied encoder. `immutable` and `read-only`
   * sequences hand it a copy of their buffer.
   */
  encode(encoder: Encoder): string {
    const live = bufferAccess(this.variant) === "live"
    return this.encodeWith(encoder, live ? this.buffer : this.buffer.slice())
  }

  encodeHex(upperCase: boolean = this.runtime.defaults.hexUpperCase): string {
    return this.encodeWith(upperCase ? hex.upper : hex.lower)
  }

  encodeBase32(): string {
    return this.encodeWith(base32)
  }

  encodeBase64(options?: Base64Options): string {
    return this.encodeWith(options === undefined ? base64 : encodings.base64(options))
  }

  encodeBase64Url(): string {
    return this.encodeWith(base64Url)
  }

  encodeRadix(radix: number): string {
    return this.encodeWith(new RadixEncoding(radix))
  }

  encodeBinary(): string {
    return this.encodeWith(binary)
  }

  encodeOctal(): string {
    return this.encodeWith(octal)
  }

  encodeDec(): string {
    return this.encodeWith(decimal)
  }

  encodeBase36(): string {
    return this.encodeWith(base36)
  }

  /** Decodes the stored bytes as UTF-8; byte order plays no part. */
  encodeUtf8(): string {
    return utf8Decoder.decode(this.buffer)
  }

  // ---------------------------------------------------------------------------
  // Transforms
  // ---------------------------------------------------------------------------

  /**
   * Runs `transformer` in place when the variant and the transformer allow
   * it, otherwise over a copy.
   *
   * @returns a new sequence of the same variant, byte order and runtime; after
   *   an in-place run it shares this sequence's buffer
   */
  transform(transformer: BytesTransformer): Bytes {
    const result = dispatchTransform(this.buffer, this.variant, transformer, this.runtime.logger)
    return this.derive(result, this.variant)
  }

  and(operand: ByteSource): Bytes {
    return this.bitwise(operand, "and")
  }

  or(operand: ByteSource): Bytes {
    return this.bitwise(operand, "or")
  }

  xor(operand: ByteSource): Bytes {
    return this.bitwise(operand, "xor")
  }

  not(): Bytes {
    return this.transform(new NegateTransformer())
  }

  leftShift(count: number): Bytes {
    return this.transform(new ShiftTransformer(count, "left", this.byteOrder))
  }

  rightShift(count: number): Bytes {
    return this.transform(new ShiftTransformer(count, "right", this.byteOrder))
  }

  /** Sets or clears bit `position`, or toggles it when `value` is omitted. */
  switchBit(position: number, value?: boolean): Bytes {
    return this.transform(new BitSwitchTransformer(position, value))
  }

  copy(offset = 0, length: number = this.buffer.length - offset): Bytes {
    return this.transform(new CopyTransformer(offset, length))
  }

  reverse(): Bytes {
    return this.transform(new ReverseTransformer())
  }

  resize(size: number, mode?: ResizeMode): Bytes {
    return this.transform(new ResizeTransformer(size, mode))
  }

  append(...parts: ByteSource[]): Bytes {
    return this.transform(new ConcatTransformer(...parts.map((part) => Bytes.view(part))))
  }

  sort(comparator?: ByteComparator): Bytes {
    return this.transform(new SortTransformer(comparator))
  }

  shuffle(random: RandomSource = systemRandom): Bytes {
    return this.transform(new ShuffleTransformer(random))
  }

  // ---------------------------------------------------------------------------
  // Direct writes, `mutable` only
  // ---------------------------------------------------------------------------

  setByteAt(index: number, value: number): this {
    this.assertWritable("setByteAt")
    this.checkIndex(index, this.buffer.length)
    this.buffer[index] = value
    return this
  }

  /** Copies `source` into this buffer starting at `offset`. */
  overwrite(source: ByteSource, offset = 0): this {
    this.assertWritable("overwrite")
    const data = Bytes.view(source)
    const end = offset + data.length

    if (!Number.isInteger(offset) || offset < 0 || end > this.buffer.length) {
      throw new BoundsViolationError(offset < 0 ? offset : end, this.buffer.length + 1, "end")
    }
    this.buffer.set(data, offset)
    return this
  }

  fill(value: number): this {
    this.assertWritable("fill")
    this.buffer.fill(value)
    return this
  }

  wipe(): this {
    this.assertWritable("wipe")
    this.buffer.fill(0)
    return this
  }

  /** Overwrites the buffer with CSPRNG output. */
  secureWipe(): this {
    this.assertWritable("secureWipe")
    randomFillSync(this.buffer)
    return this
  }

  // ---------------------------------------------------------------------------
  // Variant and byte order transitions, always a new instance
  // ---------------------------------------------------------------------------

  toMutable(): Bytes {
    return this.convert("mutable")
  }

  toImmutable(): Bytes {
    return this.convert("immutable")
  }

  toReadOnly(): Bytes {
    return this.convert("read-only")
  }

  /** Same variant, same buffer. */
  duplicate(): Bytes {
    return this.derive(this.buffer, this.variant)
  }

  /** Same variant and buffer, read in `byteOrder`. */
  withByteOrder(byteOrder: ByteOrder): Bytes {
    return new Bytes(this.buffer, { byteOrder, variant: this.variant, runtime: this.runtime })
  }

  // ---------------------------------------------------------------------------

  private static view(source: ByteSource): Uint8Array {
    if (source instanceof Bytes) return source.buffer
    if (source instanceof Uint8Array) return source
    return Uint8Array.from(source)
  }

  /** Built-in encoders only read their input, so they get the live buffer. */
  private encodeWith(encoder: Encoder, input: Uint8Array = this.buffer): string {
    this.runtime.logger.trace("encode", {
      operation: "encode",
      encoding: encoder.name,
      byteOrder: this.byteOrder,
      length: input.length,
    })
    return encoder.encode(input, this.byteOrder)
  }

  private bitwise(operand: ByteSource, operator: BitwiseOperator): Bytes {
    return this.transform(new BitwiseTransformer(Bytes.view(operand), operator))
  }

  private convert(variant: Variant): Bytes {
    const buffer = transitionCopies(this.variant, variant) ? this.buffer.slice() : this.buffer
    return this.derive(buffer, variant)
  }

  private derive(buffer: Uint8Array, variant: Variant): Bytes {
    return new Bytes(buffer, { byteOrder: this.byteOrder, variant, runtime: this.runtime })
  }

  private matchesAt(needle: Uint8Array, at: number): boolean {
    for (let i = 0; i < needle.length; i++) {
      if (this.buffer[at + i] !== needle[i]) return false
    }
    return true
  }

  private toNumber(kind: NumberKind): number {
    this.checkWidth(numberWidths[kind])
    return decodeNumber(kind, this.buffer, 0, this.byteOrder)
  }

  private checkWidth(width: number): void {
    if (this.buffer.length !== width) {
      throw new LengthMismatchError(width, this.buffer.length)
    }
  }

  /** Exclusive bound on start indexes where `width` bytes still fit. */
  private fits(width: number): number {
    return Math.max(0, this.buffer.length - width + 1)
  }

  private checkIndex(index: number, bound: number, what = "index"): void {
    if (!Number.isInteger(index) || index < 0 || index >= bound) {
      throw new BoundsViolationError(index, bound, what)
    }
  }

  private assertWritable(operation: string): void {
    if (!allowsWrites(this.variant)) {
      throw new AccessViolationError(this.variant, operation)
    }
  }

  private hexEncoder(): HexEncoding {
    return this.runtime.defaults.hexUpperCase ? hex.upper : hex.lower
  }
}
