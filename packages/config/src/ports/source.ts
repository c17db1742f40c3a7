import type { ConfigValue, SourceValue } from "./value"

export type SourceKind =
  | "defaults"
  | "ini"
  | "json"
  | "plist"
  | "yaml"
  | "env"
  | "dotenv"
  | "commandline"

export type SourceCapabilities = Readonly<{
  /** Subsections may nest below depth one. */
  supportsNesting: boolean

  /** Some values come back natively typed rather than as text. */
  carriesTypes: boolean

  /** `write()` has somewhere to persist to. */
  writable: boolean
}>

/**
 * One ranked backend of configuration data.
 *
 * A source exposes a tree of leaves and subsections. A name is either a leaf or a subsection
 * within one source, never both. Everything except `load()` and `write()` is synchronous and
 * works on the in-memory tree.
 */
export interface ConfigSource {
  /**
   * Human-readable name for provenance.
   * Example: "env", "ini:app.ini", "yaml:config/app.yaml"
   */
  readonly name: string

  readonly kind: SourceKind

  readonly capabilities: SourceCapabilities

  /** `true` while there are writes not yet persisted. */
  readonly dirty: boolean

  /** (Re)reads the backing store. In-memory sources build their tree eagerly. */
  load(): Promise<void>

  /** Leaf keys directly at this level, in source order. */
  keys(): string[]

  /** Direct child subsection names. */
  subsections(): string[]

  has(key: string): boolean

  /** Whether the backend itself carries the type of the value at `key`. */
  typed(key: string): boolean

  /**
   * Returns the most specific representation the backend has for `key`: a native value when it
   * carries types, text otherwise, or a type hint for a declared but unset key.
   *
   * @throws KeyNotFoundError when the key is absent
   */
  get(key: string): SourceValue

  /** A view over the named subsection. Always succeeds, even when nothing is stored there yet. */
  subsection(name: string): ConfigSource

  /** Stores `value`. Untyped backends keep its text encoding. */
  set(key: string, value: ConfigValue): void

  /** Persists the whole backing store if dirty. A no-op otherwise. */
  write(): Promise<void>
}
