import { BaseError } from "../base-error"

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2024-01-15T10:30:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  describe("construction", () => {
    it("creates error with required fields", () => {
      const err = new BaseError("symbol not in alphabet", { code: "invalid_symbol" })

      expect(err.message).toBe("symbol not in alphabet")
      expect(err.code).toBe("invalid_symbol")
    })

    it("sets name to constructor name", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.name).toBe("BaseError")
    })

    it("uses the subclass name", () => {
      class OddError extends BaseError<"odd"> {
        constructor() {
          super("odd", { code: "odd" })
        }
      }

      expect(new OddError().name).toBe("OddError")
    })

    it("defaults context to an empty frozen object", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.context).toEqual({})
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("defaults isOperational to true", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.isOperational).toBe(true)
    })

    it("sets timestamp to current time", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.timestamp).toEqual(new Date("2024-01-15T10:30:00.000Z"))
    })

    it("freezes a copy of the given context", () => {
      const context = { index: 3 }
      const err = new BaseError("test", { code: "test", context })

      context.index = 4

      expect(err.context).toEqual({ index: 3 })
      expect(Object.isFrozen(err.context)).toBe(true)
    })

    it("accepts optional cause", () => {
      const cause = new Error("root cause")
      const err = new BaseError("wrapped", { code: "test", cause })

      expect(err.cause).toBe(cause)
    })

    it("accepts optional isOperational", () => {
      const err = new BaseError("invariant", { code: "bug", isOperational: false })

      expect(err.isOperational).toBe(false)
    })

    it("has a stack trace", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err.stack).toContain("BaseError")
    })
  })

  describe("type safety", () => {
    it("preserves generic code type", () => {
      type CodecCode = "invalid_symbol" | "invalid_radix"
      const err = new BaseError<CodecCode>("bad radix", { code: "invalid_radix" })

      const code: CodecCode = err.code
      expect(code).toBe("invalid_radix")
    })
  })

  describe("inheritance", () => {
    it("is instanceof Error and BaseError", () => {
      const err = new BaseError("test", { code: "test" })

      expect(err).toBeInstanceOf(Error)
      expect(err).toBeInstanceOf(BaseError)
    })
  })

  describe("toJSON", () => {
    it("returns the serialized error", () => {
      const err = new BaseError("index out of range", {
        code: "bounds_violation",
        context: { index: 9, bound: 8 },
      })

      expect(JSON.parse(JSON.stringify(err))).toEqual({
        name: "BaseError",
        code: "bounds_violation",
        message: "index out of range",
        context: { index: 9, bound: 8 },
        isOperational: true,
        timestamp: "2024-01-15T10:30:00.000Z",
      })
    })
  })
})
