import { build, parse, type PlistObject, type PlistValue } from "plist"
import { isConfigValue, toRaw } from "../../core/coercion/coercion"
import { CalendarDate } from "../../core/value/calendar-date"
import type { SourceCapabilities } from "../../ports/source"
import type { ConfigValue, SourceValue } from "../../ports/value"
import { FileTreeSource, type FileSourceOptions } from "../file/file-tree-source"
import { documentTree, type SourceEntry, type SourceTree } from "../tree/tree"

export type PlistSourceOptions = FileSourceOptions

const byName = ([a]: [string, SourceEntry], [b]: [string, SourceEntry]) =>
  a < b ? -1 : a > b ? 1 : 0

function plistLeaf(value: SourceValue): PlistValue {
  if (!isConfigValue(value)) return String(value)
  if (value === null || value instanceof CalendarDate) return toRaw(value)

  return value
}

function plistDict(tree: SourceTree): PlistObject {
  return Object.fromEntries(
    [...tree]
      .sort(byName)
      .map(([name, entry]) => [name, entry instanceof Map ? plistDict(entry) : plistLeaf(entry)]),
  )
}

/**
 * An XML property list of arbitrary depth. Integers, reals, booleans, arrays and `<date>`
 * datetimes come back typed. A property list has no date-only type and no null, so dates are
 * stored as `YYYY-MM-DD` text and null as an empty string. `<date>` holds whole seconds; a
 * datetime with milliseconds is stored as text instead.
 *
 * Writes rewrite the document with keys sorted.
 */
export class PlistSource extends FileTreeSource {
  readonly kind = "plist"
  readonly capabilities: SourceCapabilities = {
    supportsNesting: true,
    carriesTypes: true,
    writable: true,
  }

  constructor(options: PlistSourceOptions = {}) {
    super("plist", options)
  }

  protected parse(content: string): SourceTree {
    return documentTree(parse(content))
  }

  protected serialize(tree: SourceTree): string {
    return build(plistDict(tree))
  }

  protected encode(value: ConfigValue): SourceValue {
    if (value === null || value instanceof CalendarDate) return toRaw(value)
    if (value instanceof Date && value.getUTCMilliseconds() !== 0) return toRaw(value)

    return value
  }

  protected isTyped(value: SourceValue): boolean {
    return typeof value !== "string"
  }
}
