/**
 * Validated, immutable configuration.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ MAX_MESSAGE_BYTES: z.coerce.number().default(1024) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("MAX_MESSAGE_BYTES") // 1024
 * config.explain("MAX_MESSAGE_BYTES") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that provided the final value for a key,
   * or "default" when the schema's default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, in application order. */
  sourcesUsed(): string[]

  /** Keys present in sources but not defined in the schema (typos, stale entries). */
  unknownKeys(): string[]
}
