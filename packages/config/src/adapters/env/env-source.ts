import { toRaw } from "../../core/coercion/coercion"
import type { SourceCapabilities } from "../../ports/source"
import type { ConfigValue, SourceValue } from "../../ports/value"
import { TreeSource, type TreeSourceOptions } from "../tree/tree-source"
import { namespaceTree } from "./namespace"

export type EnvSourceOptions = TreeSourceOptions & {
  /**
   * Only variables starting with this are read, with the prefix removed.
   *
   * @example "MYAPP_"
   */
  prefix?: string | undefined

  /** @default process.env */
  env?: Record<string, string | undefined> | undefined

  /**
   * Separates subsection names inside a variable name.
   *
   * @default "_"
   */
  separator?: string | undefined
}

/**
 * The process environment as a source. Every value is text and nothing is persisted; `set`
 * changes the in-memory view only.
 */
export class EnvSource extends TreeSource {
  readonly kind = "env"
  readonly capabilities: SourceCapabilities = {
    supportsNesting: true,
    carriesTypes: false,
    writable: false,
  }
  private readonly prefix: string | undefined
  private readonly env: Record<string, string | undefined>
  private readonly separator: string

  constructor(options: EnvSourceOptions = {}) {
    super("env", options)
    this.prefix = options.prefix
    this.env = options.env ?? process.env
    this.separator = options.separator ?? "_"
    this.tree = this.read()
  }

  async load(): Promise<void> {
    this.replaceTree(this.read())
  }

  private read() {
    return namespaceTree(this.env, { prefix: this.prefix, separator: this.separator }, this.logger)
  }

  protected async persist(): Promise<void> {}

  protected encode(value: ConfigValue): SourceValue {
    return toRaw(value)
  }

  protected isTyped(_value: SourceValue): boolean {
    return false
  }
}
