import { z } from "zod"
import type { SourceValue } from "../../ports/value"
import { CalendarDate } from "../../core/value/calendar-date"
import { TypeHint } from "../../core/value/type-hint"

export type SourceEntry = SourceValue | SourceTree

/** In-memory shape of a source: leaves and nested subsections, in insertion order. */
export type SourceTree = Map<string, SourceEntry>

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}

function normalizeLeaf(value: unknown): SourceValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "boolean" ||
    value instanceof TypeHint ||
    value instanceof CalendarDate ||
    value instanceof Date
  ) {
    return value
  }
  if (typeof value === "number") return Number.isFinite(value) ? value : String(value)
  if (Array.isArray(value)) return value.map((item) => (typeof item === "string" ? item : String(item)))

  return String(value)
}

/**
 * Copies a parsed document into a {@link SourceTree}. Plain objects become subsections, array
 * items become strings, and anything that is not a configuration value becomes its text.
 */
export function normalizeTree(raw: Record<string, unknown>): SourceTree {
  const tree: SourceTree = new Map()

  for (const [name, value] of Object.entries(raw)) {
    tree.set(name, isPlainObject(value) ? normalizeTree(value) : normalizeLeaf(value))
  }

  return tree
}

const documentSchema = z.record(z.string(), z.unknown())

/**
 * Builds a tree from a parsed structured document. An empty document is an empty tree.
 *
 * @throws Error when the document root is not a mapping
 */
export function documentTree(raw: unknown): SourceTree {
  if (raw === null || raw === undefined) return new Map()
  const result = documentSchema.safeParse(raw)

  if (!result.success) {
    throw new Error(`document root must be a mapping\n${z.prettifyError(result.error)}`, {
      cause: result.error,
    })
  }

  return normalizeTree(result.data)
}

export function walk(tree: SourceTree, path: readonly string[]): SourceTree | undefined {
  let node: SourceTree = tree

  for (const name of path) {
    const next = node.get(name)
    if (!(next instanceof Map)) return undefined
    node = next
  }

  return node
}

/** Like {@link walk}, creating missing subsections. `undefined` when a leaf is in the way. */
export function ensure(tree: SourceTree, path: readonly string[]): SourceTree | undefined {
  let node: SourceTree = tree

  for (const name of path) {
    const next = node.get(name)

    if (next === undefined) {
      const created: SourceTree = new Map()
      node.set(name, created)
      node = created
    } else if (next instanceof Map) {
      node = next
    } else {
      return undefined
    }
  }

  return node
}

/**
 * Places a leaf, creating subsections on the way.
 *
 * @returns false when the path crosses a leaf or `key` already names a subsection
 */
export function placeEntry(
  tree: SourceTree,
  path: readonly string[],
  key: string,
  value: SourceValue,
): boolean {
  const node = ensure(tree, path)
  if (!node || node.get(key) instanceof Map) return false
  node.set(key, value)

  return true
}

export type ToPlainOptions = {
  /** Order keys alphabetically at every level. */
  sort?: boolean | undefined
  encode?: ((value: SourceValue) => unknown) | undefined
}

/** Converts a tree back to nested plain objects for a serializer. */
export function toPlain(tree: SourceTree, options: ToPlainOptions = {}): Record<string, unknown> {
  const entries = [...tree.entries()]
  if (options.sort) entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))

  return Object.fromEntries(
    entries.map(([name, entry]) => [
      name,
      entry instanceof Map
        ? toPlain(entry, options)
        : options.encode
          ? options.encode(entry)
          : entry,
    ]),
  )
}
