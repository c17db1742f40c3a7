import { toRaw } from "../../core/coercion/coercion"
import { CalendarDate } from "../../core/value/calendar-date"
import type { SourceCapabilities } from "../../ports/source"
import type { ConfigValue, SourceValue } from "../../ports/value"
import { FileTreeSource, type FileSourceOptions } from "../file/file-tree-source"
import { documentTree, type SourceTree, toPlain } from "../tree/tree"

export type JsonSourceOptions = FileSourceOptions

/**
 * A JSON document of arbitrary depth. Numbers, booleans, lists and null come back typed;
 * JSON has no dates, so dates are stored as their `YYYY-MM-DD` (or datetime) text.
 *
 * Writes rewrite the document with keys sorted and four-space indentation.
 */
export class JsonSource extends FileTreeSource {
  readonly kind = "json"
  readonly capabilities: SourceCapabilities = {
    supportsNesting: true,
    carriesTypes: true,
    writable: true,
  }

  constructor(options: JsonSourceOptions = {}) {
    super("json", options)
  }

  protected parse(content: string): SourceTree {
    return documentTree(JSON.parse(content))
  }

  protected serialize(tree: SourceTree): string {
    return JSON.stringify(toPlain(tree, { sort: true }), null, 4)
  }

  protected encode(value: ConfigValue): SourceValue {
    return value instanceof CalendarDate || value instanceof Date ? toRaw(value) : value
  }

  protected isTyped(value: SourceValue): boolean {
    return typeof value !== "string"
  }
}
