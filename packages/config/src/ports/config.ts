/**
 * Configuration container providing type-safe access to validated configuration values.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = loadConfig({
 *   schema: z.object({
 *     BYTE_ORDER: z.enum(["big-endian", "little-endian"]).default("big-endian"),
 *   }),
 *   sources: [new EnvSource({ prefix: "BYTES_" })],
 * })
 *
 * config.get("BYTE_ORDER")     // "big-endian"
 * config.explain("BYTE_ORDER") // "env:BYTES_" or "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Explains which source provided the final value for a key.
   *
   * @returns The source name, or "default" when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Returns the names of all sources that contributed at least one value,
   * in the order they were applied.
   */
  sourcesUsed(): string[]

  /**
   * Returns keys present in sources but not defined in the schema.
   *
   * Useful for detecting typos such as `BYTES_HEX_UPPER`.
   */
  unknownKeys(): string[]
}
