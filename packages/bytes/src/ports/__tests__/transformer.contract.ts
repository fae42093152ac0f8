import type { BytesTransformer } from "../transformer"

export type TransformerHarness = {
  name: string
  make: () => BytesTransformer
  /** Input the transformer accepts. */
  sample: () => Uint8Array
}

export function describeTransformerContract(h: TransformerHarness) {
  describe(`${h.name} (BytesTransformer contract)`, () => {
    let transformer: BytesTransformer

    beforeEach(() => {
      transformer = h.make()
    })

    it("has a name", () => {
      expect(transformer.name.length).toBeGreaterThan(0)
    })

    it("copying returns a new buffer and leaves the input untouched", () => {
      const input = h.sample()
      const before = input.slice()

      const result = transformer.apply(input, false)

      expect(result).not.toBe(input)
      expect(input).toEqual(before)
    })

    it("in place returns the input buffer when supported", () => {
      if (!transformer.supportsInPlace()) return

      const input = h.sample()

      expect(transformer.apply(input, true)).toBe(input)
    })

    it("gives the same content in both modes", () => {
      const copied = h.make().apply(h.sample(), false)

      if (transformer.supportsInPlace()) {
        expect(transformer.apply(h.sample(), true)).toEqual(copied)
      } else {
        expect(transformer.apply(h.sample(), false)).toEqual(copied)
      }
    })
  })
}
