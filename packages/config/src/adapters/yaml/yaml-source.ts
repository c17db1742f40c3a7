import { parse, type ScalarTag, stringify } from "yaml"
import { dateConvert, datetimeConvert, toRaw } from "../../core/coercion/coercion"
import { CalendarDate } from "../../core/value/calendar-date"
import type { SourceCapabilities } from "../../ports/source"
import type { SourceValue } from "../../ports/value"
import { FileTreeSource, type FileSourceOptions } from "../file/file-tree-source"
import { documentTree, type SourceTree, toPlain } from "../tree/tree"

const TIMESTAMP = "tag:yaml.org,2002:timestamp"

const dateTag: ScalarTag = {
  tag: TIMESTAMP,
  default: true,
  test: /^\d{4}-\d{2}-\d{2}$/,
  identify: (value) => value instanceof CalendarDate,
  resolve: (source) => dateConvert(source),
  stringify: ({ value }) => String(value),
}

const datetimeTag: ScalarTag = {
  tag: TIMESTAMP,
  default: true,
  test: /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}:\d{2}(\.\d+)?Z?$/,
  identify: (value) => value instanceof Date,
  resolve: (source) => datetimeConvert(source),
  stringify: ({ value }) => (value instanceof Date ? toRaw(value) : String(value)),
}

const customTags = [dateTag, datetimeTag]

export type YamlSourceOptions = FileSourceOptions

/**
 * A YAML document of arbitrary depth, typed throughout: plain `YYYY-MM-DD` scalars read as
 * dates and `YYYY-MM-DD HH:MM:SS` scalars as datetimes.
 *
 * Writes rewrite the document with keys sorted and sequences left unindented under their key.
 */
export class YamlSource extends FileTreeSource {
  readonly kind = "yaml"
  readonly capabilities: SourceCapabilities = {
    supportsNesting: true,
    carriesTypes: true,
    writable: true,
  }

  constructor(options: YamlSourceOptions = {}) {
    super("yaml", options)
  }

  protected parse(content: string): SourceTree {
    const document: unknown = parse(content, { customTags })

    return documentTree(document)
  }

  protected serialize(tree: SourceTree): string {
    return stringify(toPlain(tree), {
      customTags,
      sortMapEntries: true,
      indentSeq: false,
      aliasDuplicateObjects: false,
    })
  }

  protected isTyped(value: SourceValue): boolean {
    return typeof value !== "string"
  }
}
