/**
 * A source of raw configuration values.
 *
 * Sources only *load*; validation, coercion and merging happen in `loadConfig`.
 * Sources are applied in order and later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name used for provenance.
   * Example: "env", "dotenv:.env", "object:overrides"
   */
  readonly name: string

  /**
   * Load configuration values.
   *
   * Returning undefined for a key means "value not provided".
   */
  load(): Promise<Record<string, unknown>>
}
