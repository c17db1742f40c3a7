import { parse } from "dotenv"
import { isConfigValue, toRaw } from "../../core/coercion/coercion"
import type { SourceCapabilities } from "../../ports/source"
import type { ConfigValue, SourceValue } from "../../ports/value"
import { namespaceTree } from "../env/namespace"
import { FileTreeSource, type FileSourceOptions } from "../file/file-tree-source"
import type { SourceTree } from "../tree/tree"

export type DotenvSourceOptions = FileSourceOptions & {
  /**
   * Only variables starting with this are read, with the prefix removed. Written variables get
   * it back.
   *
   * @example "MYAPP_"
   */
  prefix?: string | undefined

  /** @default "_" */
  separator?: string | undefined
}

const SEGMENT = /^[a-z0-9_.-]+$/

const quote = (value: string) => {
  if (/^[^\s#'"`\\]*$/.test(value)) return value
  if (!value.includes("'")) return `'${value}'`
  if (!value.includes('"')) return `"${value}"`

  return `\`${value}\``
}

/**
 * A `.env` file read with the same naming rules as {@link EnvSource}. Unlike the process
 * environment it can be written back, one `PREFIX_SECTION_KEY=value` line per leaf.
 */
export class DotenvSource extends FileTreeSource {
  readonly kind = "dotenv"
  readonly capabilities: SourceCapabilities = {
    supportsNesting: true,
    carriesTypes: false,
    writable: true,
  }
  private readonly prefix: string
  private readonly separator: string

  constructor(options: DotenvSourceOptions = {}) {
    super("dotenv", options)
    this.prefix = options.prefix ?? ""
    this.separator = options.separator ?? "_"
  }

  protected parse(content: string): SourceTree {
    return namespaceTree(
      parse(content),
      { prefix: this.prefix, separator: this.separator },
      this.logger,
    )
  }

  protected serialize(tree: SourceTree): string {
    const lines: string[] = []

    const visit = (node: SourceTree, path: string[]) => {
      for (const [name, entry] of node) {
        if (entry instanceof Map) {
          visit(entry, [...path, name])
          continue
        }
        const variable = this.prefix + [...path, name].join(this.separator).toUpperCase()
        const text = typeof entry === "string" ? entry : isConfigValue(entry) ? toRaw(entry) : ""
        lines.push(`${variable}=${quote(text)}`)
      }
    }
    visit(tree, [])

    return lines.length === 0 ? "" : `${lines.join("\n")}\n`
  }

  /** Only names that lower-case and split back to the same path can be written. */
  protected refuseWrite(path: readonly string[], key: string): string | undefined {
    const segment = [...path, key].find(
      (name) => !SEGMENT.test(name) || name.includes(this.separator),
    )
    if (segment === undefined) return undefined

    return `"${segment}" does not read back from a variable name split on "${this.separator}"`
  }

  protected encode(value: ConfigValue): SourceValue {
    return toRaw(value)
  }

  protected isTyped(_value: SourceValue): boolean {
    return false
  }
}
