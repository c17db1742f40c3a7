import type { Logger } from "@layerconf/logger"
import { placeEntry, type SourceTree } from "../tree/tree"

export type NamespaceOptions = {
  /** Only names starting with this (case-insensitively) are kept, without it. */
  prefix?: string | undefined

  /** Splits a name into subsection path and key. */
  separator: string
}

/**
 * Turns flat variable names into a tree: `MYAPP_WORKER_FORCE` under prefix `MYAPP_` becomes
 * key `force` in subsection `worker`. Segments are lower-cased and empty ones dropped.
 */
export function namespaceTree(
  vars: Record<string, string | undefined>,
  { prefix, separator }: NamespaceOptions,
  logger: Logger,
): SourceTree {
  const tree: SourceTree = new Map()
  const wanted = prefix?.toUpperCase() ?? ""

  for (const [name, value] of Object.entries(vars)) {
    if (value === undefined || !name.toUpperCase().startsWith(wanted)) continue

    const segments = name
      .slice(wanted.length)
      .toLowerCase()
      .split(separator)
      .filter((segment) => segment !== "")
    const key = segments.pop()
    if (key === undefined) continue

    if (!placeEntry(tree, segments, key, value)) {
      logger.warn("name collides with an existing key or subsection, skipped", {
        key: name,
        path: segments.join("."),
      })
    }
  }

  return tree
}
