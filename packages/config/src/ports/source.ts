/**
 * A source of configuration values.
 *
 * A ConfigSource is responsible only for *loading* raw configuration.
 * It does not perform validation, coercion, or merging.
 *
 * Sources are evaluated in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "env:BYTES_", "object:overrides"
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * Loading is synchronous: settings are read once while a factory is built,
   * never while bytes are being encoded or transformed.
   *
   * - Returning undefined for a key means "value not provided"
   * - Zod handles coercion and validation downstream
   */
  load(): Record<string, unknown>
}
