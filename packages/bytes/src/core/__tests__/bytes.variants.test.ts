import type { Encoder } from "@bytewise/codec"
import type { BytesTransformer } from "../../ports/transformer"
import { Bytes } from "../bytes"
import { AccessViolationError, BoundsViolationError } from "../errors"

const buffer = () => new Uint8Array([1, 2, 3, 4])
const frozen = (variant: "immutable" | "read-only") => {
  const source = Bytes.from([1, 2, 3])
  return variant === "immutable" ? source.toImmutable() : source.toReadOnly()
}

describe("Bytes variants", () => {
  describe("array()", () => {
    it("hands out the live buffer of shared and mutable sequences", () => {
      const raw = buffer()

      expect(Bytes.wrap(raw).array()).toBe(raw)
      expect(Bytes.wrap(raw).toMutable().array()).toBe(raw)
    })

    it("hands out a copy of an immutable sequence", () => {
      const immutable = Bytes.from(buffer()).toImmutable()
      const copy = immutable.array()

      copy[0] = 9

      expect(copy).not.toBe(immutable.array())
      expect(immutable.byteAt(0)).toBe(1)
    })

    it("refuses on a read-only sequence", () => {
      const readOnly = Bytes.from(buffer()).toReadOnly()

      expect(() => readOnly.array()).toThrow(AccessViolationError)
      expect(() => readOnly.array()).toThrow("array is not allowed on a read-only byte sequence")
    })

    it("still allows reads on a read-only sequence", () => {
      const readOnly = Bytes.from(buffer()).toReadOnly()

      expect(readOnly.byteAt(1)).toBe(2)
      expect(readOnly.encodeHex()).toBe("01020304")
      expect(readOnly.equalsContent([1, 2, 3, 4])).toBe(true)
      expect(readOnly.isReadOnly()).toBe(true)
    })
  })

  describe("transform", () => {
    it("runs in place on a shared sequence", () => {
      const raw = buffer()
      const result = Bytes.wrap(raw).not()

      expect(result.array()).toBe(raw)
      expect(Array.from(raw)).toEqual([0xfe, 0xfd, 0xfc, 0xfb])
    })

    it("runs in place on a mutable sequence", () => {
      const mutable = Bytes.from(buffer()).toMutable()
      const result = mutable.xor([0xff, 0xff, 0xff, 0xff])

      expect(result).not.toBe(mutable)
      expect(result.array()).toBe(mutable.array())
      expect(mutable.encodeHex()).toBe("fefdfcfb")
    })

    it("never mutates an immutable source", () => {
      const immutable = Bytes.from(buffer()).toImmutable()
      const result = immutable.not()

      expect(immutable.encodeHex()).toBe("01020304")
      expect(result.encodeHex()).toBe("fefdfcfb")
      expect(result.variant).toBe("immutable")
    })

    it("copies from a read-only source and stays read-only", () => {
      const readOnly = Bytes.from(buffer()).toReadOnly()
      const result = readOnly.reverse()

      expect(readOnly.encodeHex()).toBe("01020304")
      expect(result.encodeHex()).toBe("04030201")
      expect(result.variant).toBe("read-only")
    })

    it.each(["immutable", "read-only"] as const)(
      "keeps a %s source out of reach of a caller's transformer",
      (variant) => {
        const source = frozen(variant)
        const before = source.toString()
        const meddling: BytesTransformer = {
          name: "meddling",
          apply: (input) => {
            input[0] = 9
            return input.slice()
          },
          supportsInPlace: () => false,
        }

        const result = source.transform(meddling)

        expect(source.toString()).toBe(before)
        expect(source.toString()).toBe("3 bytes (0x010203)")
        expect(result.toString()).toBe("3 bytes (0x090203)")
      },
    )

    it("lets sequences that share a buffer see each other's changes", () => {
      const raw = buffer()
      const a = Bytes.wrap(raw)
      const b = Bytes.wrap(raw)

      a.reverse()

      expect(b.encodeHex()).toBe("04030201")
    })

    it("keeps byte order and runtime", () => {
      const source = Bytes.from(buffer(), "little-endian").toImmutable()
      const result = source.resize(2)

      expect(result.byteOrder).toBe("little-endian")
      expect(result.runtime).toBe(source.runtime)
    })
  })

  describe("transitions", () => {
    it("always builds a new instance", () => {
      const shared = Bytes.from(buffer())
      const mutable = shared.toMutable()

      expect(mutable).not.toBe(shared)
      expect(mutable.toMutable()).not.toBe(mutable)
      expect(shared.duplicate()).not.toBe(shared)
    })

    it("shares the buffer from shared to mutable and back", () => {
      const shared = Bytes.from(buffer())
      const mutable = shared.toMutable()

      mutable.setByteAt(0, 9)

      expect(shared.byteAt(0)).toBe(9)
      expect(mutable.toMutable().array()).toBe(mutable.array())
    })

    it("shares a shared buffer with frozen variants", () => {
      const raw = buffer()
      const readOnly = Bytes.wrap(raw).toReadOnly()

      raw[0] = 7

      expect(readOnly.byteAt(0)).toBe(7)
    })

    it("copies a mutable buffer into frozen variants", () => {
      const mutable = Bytes.from(buffer()).toMutable()
      const immutable = mutable.toImmutable()
      const readOnly = mutable.toReadOnly()

      mutable.fill(0)

      expect(immutable.encodeHex()).toBe("01020304")
      expect(readOnly.encodeHex()).toBe("01020304")
    })

    it("copies out of frozen variants", () => {
      const immutable = Bytes.from(buffer()).toImmutable()
      const mutable = immutable.toMutable()

      mutable.fill(0)

      expect(immutable.encodeHex()).toBe("01020304")
      expect(Bytes.from(buffer()).toReadOnly().toMutable().isMutable()).toBe(true)
    })

    it("duplicates with the same variant and buffer", () => {
      const mutable = Bytes.from(buffer()).toMutable()
      const duplicate = mutable.duplicate()

      expect(duplicate.variant).toBe("mutable")
      expect(duplicate.array()).toBe(mutable.array())
    })

    it("switches byte order without touching the bytes", () => {
      const bytes = Bytes.from([0x01, 0x02])
      const little = bytes.withByteOrder("little-endian")

      expect(little.byteOrder).toBe("little-endian")
      expect(little.array()).toBe(bytes.array())
      expect(little.encodeHex()).toBe("0201")
    })
  })

  describe("direct writes", () => {
    it.each(["shared", "immutable", "read-only"] as const)("are refused on %s", (variant) => {
      const base = Bytes.from(buffer())
      const bytes =
        variant === "shared" ? base : variant === "immutable" ? base.toImmutable() : base.toReadOnly()

      expect(() => bytes.setByteAt(0, 1)).toThrow(AccessViolationError)
      expect(() => bytes.overwrite([1])).toThrow(AccessViolationError)
      expect(() => bytes.fill(1)).toThrow(AccessViolationError)
      expect(() => bytes.wipe()).toThrow(AccessViolationError)
      expect(() => bytes.secureWipe()).toThrow(AccessViolationError)
      expect(bytes.isMutable()).toBe(false)
    })

    it("name the variant and operation", () => {
      try {
        Bytes.from(buffer()).setByteAt(0, 1)
        expect.unreachable()
      } catch (err) {
        expect(err).toMatchObject({
          code: "access_violation",
          context: { variant: "shared", operation: "setByteAt" },
        })
      }
    })

    it("set single bytes", () => {
      const mutable = Bytes.from(buffer()).toMutable()

      expect(mutable.setByteAt(3, 0xff)).toBe(mutable)
      expect(mutable.encodeHex()).toBe("010203ff")
      expect(() => mutable.setByteAt(4, 0)).toThrow(BoundsViolationError)
    })

    it("overwrite a range", () => {
      const mutable = Bytes.from(buffer()).toMutable()

      mutable.overwrite([9, 9], 1)

      expect(mutable.encodeHex()).toBe("01090904")
      expect(() => mutable.overwrite([9, 9], 3)).toThrow(BoundsViolationError)
      expect(() => mutable.overwrite([9], -1)).toThrow(BoundsViolationError)
    })

    it("fill and wipe", () => {
      const mutable = Bytes.from(buffer()).toMutable()

      expect(mutable.fill(7).encodeHex()).toBe("07070707")
      expect(mutable.wipe().encodeHex()).toBe("00000000")
    })

    it("wipe with random bytes", () => {
      const mutable = Bytes.allocate(32).toMutable()

      mutable.secureWipe()

      expect(mutable.equalsContent(new Uint8Array(32))).toBe(false)
    })
  })

  describe("encode", () => {
    it.each(["immutable", "read-only"] as const)(
      "keeps a %s buffer out of reach of a caller's encoder",
      (variant) => {
        const source = frozen(variant)
        let seen: Uint8Array | undefined
        const meddling: Encoder = {
          name: "meddling",
          encode: (input) => {
            seen = input
            input[0] = 7
            return ""
          },
        }

        source.encode(meddling)

        expect(source.encodeHex()).toBe("010203")
        expect(seen).toEqual(new Uint8Array([7, 2, 3]))
      },
    )

    it("hands a mutable buffer to a caller's encoder", () => {
      const raw = new Uint8Array([1, 2, 3])
      const encode = vi.fn((_input: Uint8Array) => "")

      Bytes.wrap(raw).toMutable().encode({ name: "spy", encode })

      expect(encode.mock.calls[0][0]).toBe(raw)
    })
  })
})
