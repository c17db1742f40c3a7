import { isConfigValue, toRaw } from "../../core/coercion/coercion"
import type { SourceCapabilities } from "../../ports/source"
import type { ConfigValue, SourceValue } from "../../ports/value"
import { FileTreeSource, type FileSourceOptions } from "../file/file-tree-source"
import type { SourceEntry, SourceTree } from "../tree/tree"

export type IniSourceOptions = FileSourceOptions & {
  /**
   * Section holding the keys that belong to no subsection.
   *
   * Naming it `DEFAULT` makes every section also expose the root keys.
   *
   * @default "__root__"
   */
  rootSection?: string | undefined
}

const SECTION = /^\[(.+)\]\s*$/
const COMMENT = /^[#;]/

const leafText = (value: SourceValue): string => {
  if (typeof value === "string") return value
  return isConfigValue(value) ? toRaw(value) : ""
}

/**
 * Reads `[section]` headers and `key = value` (or `key: value`) lines. Names and values are kept
 * verbatim apart from surrounding whitespace: `#` and `;` start a comment only at the beginning
 * of a line. Indented lines continue the previous value.
 */
function parseIni(content: string): Array<[string | undefined, Map<string, string>]> {
  const sections = new Map<string | undefined, Map<string, string>>([[undefined, new Map()]])
  let current = sections.get(undefined) ?? new Map<string, string>()
  let lastKey: string | undefined

  for (const [index, line] of content.split(/\r?\n/).entries()) {
    const trimmed = line.trim()

    if (trimmed === "") continue
    if (COMMENT.test(trimmed)) continue
    if (/^\s/.test(line) && lastKey !== undefined) {
      current.set(lastKey, `${current.get(lastKey) ?? ""}\n${trimmed}`)
      continue
    }

    const header = SECTION.exec(trimmed)
    if (header?.[1] !== undefined) {
      const name = header[1]
      current = sections.get(name) ?? new Map<string, string>()
      sections.set(name, current)
      lastKey = undefined
      continue
    }

    const at = [trimmed.indexOf("="), trimmed.indexOf(":")]
      .filter((position) => position > 0)
      .reduce((first, position) => Math.min(first, position), Number.POSITIVE_INFINITY)
    if (!Number.isFinite(at)) {
      throw new Error(
        `line ${index + 1}: expected "key = value" or "[section]", got ${JSON.stringify(trimmed)}`,
      )
    }
    lastKey = trimmed.slice(0, at).trim()
    current.set(lastKey, trimmed.slice(at + 1).trim())
  }

  return [...sections.entries()]
}

/** Writes sections in order, one `key = value` line per leaf, continuation lines indented. */
function stringifyIni(sections: Array<[string, Map<string, string>]>): string {
  return sections
    .map(([name, leaves]) => {
      const lines = [...leaves].map(
        ([key, value]) => `${key} = ${value.split("\n").join("\n\t")}\n`,
      )

      return `[${name}]\n${lines.join("")}`
    })
    .join("\n")
}

/**
 * An INI file: one root section plus named sections, one level deep. Every value is text;
 * writes store the text encoding of the value and rewrite the whole file, root section first.
 */
export class IniSource extends FileTreeSource {
  readonly kind = "ini"
  readonly capabilities: SourceCapabilities = {
    supportsNesting: false,
    carriesTypes: false,
    writable: true,
  }
  private readonly rootSection: string

  constructor(options: IniSourceOptions = {}) {
    super("ini", options)
    this.rootSection = options.rootSection ?? "__root__"
  }

  protected parse(content: string): SourceTree {
    const tree: SourceTree = new Map()
    const sections: Array<[string, SourceTree]> = []

    for (const [name, leaves] of parseIni(content)) {
      if (name === undefined || name === this.rootSection) {
        for (const [key, value] of leaves) tree.set(key, value)
      } else {
        sections.push([name, new Map<string, SourceEntry>(leaves)])
      }
    }
    for (const [name, section] of sections) tree.set(name, section)

    return tree
  }

  protected serialize(tree: SourceTree): string {
    const root = new Map<string, string>()
    const sections: Array<[string, Map<string, string>]> = []

    for (const [name, entry] of tree) {
      if (!(entry instanceof Map)) {
        root.set(name, leafText(entry))
        continue
      }
      const leaves = new Map<string, string>()
      for (const [key, leaf] of entry) {
        if (!(leaf instanceof Map)) leaves.set(key, leafText(leaf))
      }
      sections.push([name, leaves])
    }

    return stringifyIni(root.size === 0 ? sections : [[this.rootSection, root], ...sections])
  }

  protected encode(value: ConfigValue): SourceValue {
    return toRaw(value)
  }

  protected isTyped(_value: SourceValue): boolean {
    return false
  }

  private get sharesRoot(): boolean {
    return this.rootSection === "DEFAULT"
  }

  protected leavesAt(path: readonly string[]): Array<[string, SourceValue]> {
    const own = super.leavesAt(path)
    if (!this.sharesRoot || path.length !== 1 || !this.nodeAt(path)) return own
    const seen = new Set(own.map(([name]) => name))

    return [...own, ...super.leavesAt([]).filter(([name]) => !seen.has(name))]
  }

  protected leafAt(path: readonly string[], key: string): SourceValue | undefined {
    const own = super.leafAt(path, key)
    if (own !== undefined || !this.sharesRoot || path.length !== 1 || !this.nodeAt(path)) {
      return own
    }

    return super.leafAt([], key)
  }
}
