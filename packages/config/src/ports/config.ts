/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({ PORT: z.coerce.number().default(6379) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource({ prefix: "RESPIRE_" })],
 * })
 *
 * config.get("PORT")     // 6379
 * config.explain("PORT") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`
   * (e.g. "env", "dotenv:.env"), or "default" for schema defaults.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, in application order. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   * Useful for spotting typos such as `RESPIRE_PROT`.
   */
  unknownKeys(): string[]
}
