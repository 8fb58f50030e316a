/**
 * A source of raw configuration values.
 *
 * Sources only load. Validation and coercion happen in the schema, and later
 * sources override earlier ones.
 */
export interface ConfigSource {
  /** Shown in error messages, e.g. `"env"` or `"dotenv:.env"`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
