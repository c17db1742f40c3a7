import { createNullLogger, type Logger } from "@layerconf/logger"
import { KeyNotFoundError, WriteTargetError } from "../../core/errors"
import type {
  ConfigSource,
  SourceCapabilities,
  SourceKind,
} from "../../ports/source"
import type { ConfigValue, SourceValue } from "../../ports/value"
import { type SourceTree, ensure, walk } from "./tree"

export type TreeSourceOptions = {
  logger?: Logger | undefined
}

/**
 * Base for sources backed by one in-memory {@link SourceTree}.
 *
 * Subsection views returned by `subsection()` are {@link TreeSection}s: a path into this tree
 * that shares its storage, dirty flag and persistence.
 */
export abstract class TreeSource implements ConfigSource {
  abstract readonly kind: SourceKind
  abstract readonly capabilities: SourceCapabilities

  protected tree: SourceTree = new Map()
  protected readonly logger: Logger
  private changed = false

  constructor(
    readonly name: string,
    options: TreeSourceOptions = {},
  ) {
    this.logger = (options.logger ?? createNullLogger()).child({ source: name })
  }

  get dirty(): boolean {
    return this.changed
  }

  abstract load(): Promise<void>

  /** Writes the whole tree to the backing store. */
  protected abstract persist(): Promise<void>

  /** Whether a stored value is natively typed. */
  protected abstract isTyped(value: SourceValue): boolean

  /** How a value given to `set` is stored. */
  protected encode(value: ConfigValue): SourceValue {
    return value
  }

  /** Why `key` at `path` cannot be stored here, if it cannot. */
  protected refuseWrite(_path: readonly string[], _key: string): string | undefined {
    return undefined
  }

  async write(): Promise<void> {
    if (!this.changed) return
    await this.persist()
    this.changed = false
  }

  /** Swaps in a freshly read tree. Pending writes are dropped with the old one. */
  protected replaceTree(tree: SourceTree): void {
    this.tree = tree
    this.changed = false
  }

  /** Subsection at `path`, honouring the source's nesting depth. */
  protected nodeAt(path: readonly string[]): SourceTree | undefined {
    if (!this.capabilities.supportsNesting && path.length > 1) return undefined

    return walk(this.tree, path)
  }

  protected leavesAt(path: readonly string[]): Array<[string, SourceValue]> {
    const leaves: Array<[string, SourceValue]> = []

    for (const [name, entry] of this.nodeAt(path) ?? []) {
      if (!(entry instanceof Map)) leaves.push([name, entry])
    }

    return leaves
  }

  protected leafAt(path: readonly string[], key: string): SourceValue | undefined {
    const entry = this.nodeAt(path)?.get(key)

    return entry instanceof Map ? undefined : entry
  }

  keysAt(path: readonly string[]): string[] {
    return this.leavesAt(path).map(([name]) => name)
  }

  subsectionsAt(path: readonly string[]): string[] {
    if (!this.capabilities.supportsNesting && path.length > 0) return []
    const names: string[] = []

    for (const [name, entry] of this.nodeAt(path) ?? []) {
      if (entry instanceof Map) names.push(name)
    }

    return names
  }

  hasAt(path: readonly string[], key: string): boolean {
    return this.leafAt(path, key) !== undefined
  }

  getAt(path: readonly string[], key: string): SourceValue {
    const value = this.leafAt(path, key)
    if (value === undefined) throw new KeyNotFoundError(key, path)

    return value
  }

  typedAt(path: readonly string[], key: string): boolean {
    const value = this.leafAt(path, key)

    return value !== undefined && this.isTyped(value)
  }

  setAt(path: readonly string[], key: string, value: ConfigValue): void {
    const refusal = this.refuseWrite(path, key)
    if (refusal !== undefined) {
      throw new WriteTargetError({ key, path, target: this.name, reason: refusal })
    }
    if (!this.capabilities.supportsNesting && path.length > 1) {
      throw new WriteTargetError({
        key,
        path,
        target: this.name,
        reason: `${this.name} holds one level of sections only`,
      })
    }
    const node = ensure(this.tree, path)

    if (!node || node.get(key) instanceof Map) {
      throw new WriteTargetError({
        key,
        path,
        target: this.name,
        reason: `${this.name} has a subsection in the way`,
      })
    }
    node.set(key, this.encode(value))
    if (this.capabilities.writable) this.changed = true
  }

  keys(): string[] {
    return this.keysAt([])
  }

  subsections(): string[] {
    return this.subsectionsAt([])
  }

  has(key: string): boolean {
    return this.hasAt([], key)
  }

  typed(key: string): boolean {
    return this.typedAt([], key)
  }

  get(key: string): SourceValue {
    return this.getAt([], key)
  }

  set(key: string, value: ConfigValue): void {
    this.setAt([], key, value)
  }

  subsection(name: string): ConfigSource {
    return new TreeSection(this, [name])
  }
}

/** A subsection of a {@link TreeSource}. Reads and writes go straight to the owner's tree. */
export class TreeSection implements ConfigSource {
  constructor(
    private readonly owner: TreeSource,
    readonly path: readonly string[],
  ) {}

  get name(): string {
    return this.owner.name
  }

  get kind(): SourceKind {
    return this.owner.kind
  }

  get capabilities(): SourceCapabilities {
    return this.owner.capabilities
  }

  get dirty(): boolean {
    return this.owner.dirty
  }

  load(): Promise<void> {
    return this.owner.load()
  }

  keys(): string[] {
    return this.owner.keysAt(this.path)
  }

  subsections(): string[] {
    return this.owner.subsectionsAt(this.path)
  }

  has(key: string): boolean {
    return this.owner.hasAt(this.path, key)
  }

  typed(key: string): boolean {
    return this.owner.typedAt(this.path, key)
  }

  get(key: string): SourceValue {
    return this.owner.getAt(this.path, key)
  }

  set(key: string, value: ConfigValue): void {
    this.owner.setAt(this.path, key, value)
  }

  subsection(name: string): ConfigSource {
    return new TreeSection(this.owner, [...this.path, name])
  }

  write(): Promise<void> {
    return this.owner.write()
  }
}
