export const byteOrders = ["big-endian", "little-endian"] as const

/**
 * How multi-byte values are read out of a buffer.
 *
 * The stored bytes never change with the byte order; only the direction in
 * which encoders walk them does.
 */
export type ByteOrder = (typeof byteOrders)[number]
