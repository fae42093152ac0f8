import { byteOrders } from "@bytewise/codec"
import { logLevelNames } from "@bytewise/logger"
import { z } from "zod"

/**
 * Environment settings, read with the `BYTES_` prefix stripped
 * (`BYTES_BYTE_ORDER` → `BYTE_ORDER`).
 */
export const bytesSettingsSchema = z.object({
  BYTE_ORDER: z.enum(byteOrders).default("big-endian"),
  HEX_UPPERCASE: z.stringbool().default(false),
  LOG_LEVEL: z.enum(logLevelNames).default("warn"),
  LOG_PRETTY: z.stringbool().default(false),
})

export type BytesSettings = z.infer<typeof bytesSettingsSchema>

export const BYTES_ENV_PREFIX = "BYTES_"
