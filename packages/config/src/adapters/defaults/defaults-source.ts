import type { SourceCapabilities } from "../../ports/source"
import type { SourceValue } from "../../ports/value"
import { normalizeTree } from "../tree/tree"
import { TreeSource, type TreeSourceOptions } from "../tree/tree-source"

/**
 * In-memory defaults, usually the lowest-ranked source.
 *
 * Values keep their native types. A leaf may be a {@link TypeHint} (see `Type`) to declare a
 * key's kind without a value. Nested plain objects are subsections. Writes change the map but
 * never mark it dirty: there is nothing to persist.
 *
 * @example
 * ```typescript
 * new DefaultsSource({
 *   home: "appdata",
 *   processes: Type.integer,
 *   worker: { force: false },
 * })
 * ```
 */
export class DefaultsSource extends TreeSource {
  readonly kind = "defaults"
  readonly capabilities: SourceCapabilities = {
    supportsNesting: true,
    carriesTypes: true,
    writable: false,
  }

  constructor(values: Record<string, unknown>, options: TreeSourceOptions = {}) {
    super("defaults", options)
    this.tree = normalizeTree(values)
  }

  async load(): Promise<void> {}

  protected async persist(): Promise<void> {}

  protected isTyped(_value: SourceValue): boolean {
    return true
  }
}
