import { BaseError } from "../../base-error"
import { createError } from "../create-error"

describe("createError", () => {
  it("creates BaseError with code and message", () => {
    const err = createError("config_invalid", "Configuration validation failed")

    expect(err).toBeInstanceOf(BaseError)
    expect(err.code).toBe("config_invalid")
    expect(err.message).toBe("Configuration validation failed")
  })

  it("accepts optional context and cause", () => {
    const cause = new Error("Original failure")
    const err = createError("wrapped", "Wrapper", { context: { key: "LOG_LEVEL" }, cause })

    expect(err.context).toEqual({ key: "LOG_LEVEL" })
    expect(err.cause).toBe(cause)
  })

  it("accepts optional isOperational", () => {
    const err = createError("invariant", "Bug", { isOperational: false })

    expect(err.isOperational).toBe(false)
  })
})
