/**
 * A source of raw configuration values, keyed by the unprefixed variable name
 * (`USERNAME`, `CACHE_ROOT`, ...).
 *
 * Sources only load. Validation and coercion happen in the env schema, and
 * sources are applied in order, later ones overriding earlier ones.
 */
export interface ConfigSource {
  /** Used for provenance, e.g. "env", "dotenv:.env", "object:overrides". */
  readonly name: string

  load(): Promise<Record<string, string | undefined>>
}
