import { createNullLogger, type Logger } from "@layerconf/logger"
import type { ConfigSource } from "../../ports/source"
import type {
  ConfigValue,
  ScalarKind,
  TypedValue,
  ValueKind,
  ValueOf,
} from "../../ports/value"
import { isConfigValue, kindOf, toTyped, toTypedValue } from "../coercion/coercion"
import { CoercionError, KeyNotFoundError, WriteTargetError } from "../errors"
import { CalendarDate } from "../value/calendar-date"
import { TypeHint } from "../value/type-hint"

export type ResolverOptions = {
  /** Subsections inherit keys they do not set from their ancestors. */
  cascade?: boolean | undefined
  logger?: Logger | undefined
}

/** A value found for a key, and where. */
export type SourceHit = {
  /** The ranked source, as passed to the resolver. */
  source: ConfigSource
  /** The source navigated to the subsection the value was found in. */
  view: ConfigSource
  value: ConfigValue
  path: readonly string[]
}

export type ResolvedEntry = TypedValue | { readonly kind: "subsection"; readonly node: ResolverNode }

type HintFound = { kind: ScalarKind; lenient: boolean }

type SourceView = { source: ConfigSource; view: ConfigSource }

export type ConfigObject = { [key: string]: ConfigValue | ConfigObject }

const holdsKind: { [K in ValueKind]: (value: ConfigValue) => value is ValueOf<K> } = {
  string: (value): value is string => typeof value === "string",
  integer: (value): value is number => typeof value === "number" && Number.isInteger(value),
  float: (value): value is number => typeof value === "number",
  boolean: (value): value is boolean => typeof value === "boolean",
  list: (value): value is string[] => Array.isArray(value),
  date: (value): value is CalendarDate => value instanceof CalendarDate,
  datetime: (value): value is Date => value instanceof Date,
  null: (value): value is null => value === null,
}

const scalarKind = (kind: ValueKind): ScalarKind | undefined => (kind === "null" ? undefined : kind)

/**
 * Owns the ranked source list (lowest priority first) shared by every node of one
 * configuration tree.
 */
export class Resolver {
  readonly root: ResolverNode
  readonly cascade: boolean
  readonly logger: Logger

  constructor(
    readonly sources: readonly ConfigSource[],
    options: ResolverOptions = {},
  ) {
    this.cascade = options.cascade ?? false
    this.logger = options.logger ?? createNullLogger()
    this.root = new ResolverNode(this, [])
  }

  /** Sources from highest to lowest priority. */
  ranked(): ConfigSource[] {
    return [...this.sources].reverse()
  }

  /** Finds a source by name or kind, highest priority first. */
  sourceNamed(target: string): ConfigSource | undefined {
    return this.ranked().find((source) => source.name === target || source.kind === target)
  }
}

/**
 * The merged view of every source at one subsection path. Nodes hold no data of their own and
 * are cheap to create.
 */
export class ResolverNode {
  constructor(
    private readonly resolver: Resolver,
    readonly path: readonly string[],
  ) {}

  get parent(): ResolverNode | undefined {
    return this.path.length === 0
      ? undefined
      : new ResolverNode(this.resolver, this.path.slice(0, -1))
  }

  child(name: string): ResolverNode {
    return new ResolverNode(this.resolver, [...this.path, name])
  }

  /** Every source navigated to this path, highest priority first. */
  views(): SourceView[] {
    return this.resolver.ranked().map((source) => ({
      source,
      view: this.path.reduce<ConfigSource>((node, name) => node.subsection(name), source),
    }))
  }

  /** This node, then its ancestors up to the root when cascading. */
  lineage(): ResolverNode[] {
    const nodes: ResolverNode[] = [this]
    if (!this.resolver.cascade) return nodes

    for (let node = this.parent; node; node = node.parent) nodes.push(node)

    return nodes
  }

  /** Highest-ranked value for `key`. Type hints are not values. */
  find(key: string): SourceHit | undefined {
    for (const node of this.lineage()) {
      for (const { source, view } of node.views()) {
        if (!view.has(key)) continue
        const value = view.get(key)

        if (!(value instanceof TypeHint)) return { source, view, value, path: node.path }
      }
    }

    return undefined
  }

  /**
   * Kind to coerce untyped text for `key` to. An explicit {@link TypeHint} is strict; a typed
   * literal implies its kind, loosely for booleans. `null` implies nothing.
   */
  typeHint(key: string): HintFound | undefined {
    for (const node of this.lineage()) {
      for (const { view } of node.views()) {
        if (!view.has(key)) continue
        const value = view.get(key)

        if (value instanceof TypeHint) return { kind: value.kind, lenient: false }
        if (value === null || !view.typed(key)) continue
        const kind = kindOf(value)

        if (kind !== "null") return { kind, lenient: kind === "boolean" }
      }
    }

    return undefined
  }

  /**
   * Value and kind of `key`.
   *
   * @throws KeyNotFoundError when no source has a value for it
   * @throws CoercionError when untyped text does not parse as the hinted kind
   */
  resolve(key: string): TypedValue {
    const hit = this.find(key)
    if (!hit) throw new KeyNotFoundError(key, this.path)

    if (typeof hit.value !== "string" || hit.view.typed(key)) return toTypedValue(hit.value)
    const hint = this.typeHint(key)
    if (!hint) return { kind: "string", value: hit.value }

    return toTyped(hit.value, hint.kind, { lenient: hint.lenient, key })
  }

  lookup(key: string): ConfigValue {
    return this.resolve(key).value
  }

  /**
   * Typed accessor. Untyped text is coerced to `kind`.
   *
   * @throws CoercionError when the value resolves to another kind
   */
  get<K extends ValueKind>(key: string, kind: K): ValueOf<K> {
    let typed = this.resolve(key)
    const target = scalarKind(kind)

    if (typed.kind === "string" && target !== undefined && target !== "string") {
      typed = toTyped(typed.value, target, { key })
    }
    const holds = holdsKind[kind]
    if (typed.kind === kind && holds(typed.value)) return typed.value

    throw new CoercionError({
      raw: typed.value,
      kind,
      key,
      detail: `resolved as ${typed.kind}`,
    })
  }

  hasValue(key: string): boolean {
    return this.find(key) !== undefined
  }

  /** Some source defines `key` here (or above, when cascading), if only by a type hint. */
  isKnown(key: string): boolean {
    return this.lineage().some((node) => node.views().some(({ view }) => view.has(key)))
  }

  /** Resolvable leaf keys, first seen first: local sources by rank, then ancestors. */
  keys(): string[] {
    const seen = new Set<string>()
    const keys: string[] = []

    for (const node of this.lineage()) {
      for (const { view } of node.views()) {
        for (const key of view.keys()) {
          if (seen.has(key)) continue
          seen.add(key)
          if (this.hasValue(key)) keys.push(key)
        }
      }
    }

    return keys
  }

  subsections(): string[] {
    const names = new Set<string>()

    for (const { view } of this.views()) {
      for (const name of view.subsections()) names.add(name)
    }

    return [...names]
  }

  /**
   * A value when one resolves, else a declared subsection.
   *
   * @throws KeyNotFoundError when `name` is neither
   */
  entry(name: string): ResolvedEntry {
    if (this.hasValue(name)) return this.resolve(name)
    if (this.subsections().includes(name)) return { kind: "subsection", node: this.child(name) }

    throw new KeyNotFoundError(name, this.path)
  }

  /**
   * Stores `value` in exactly one source.
   *
   * With `target` (a source name or kind) the value goes there, created if needed. Otherwise
   * some source must already know the key; the highest-ranked writable source that can hold
   * this path receives it, falling back to a source that already has it.
   *
   * @throws WriteTargetError when no target can be chosen
   */
  set(key: string, value: ConfigValue, target?: string): void {
    if (!isConfigValue(value)) {
      throw new CoercionError({ raw: value, kind: "configuration value", key })
    }
    const chosen = target === undefined ? this.writeTarget(key) : this.namedTarget(key, target)

    this.resolver.logger.debug("write target chosen", {
      source: chosen.name,
      path: this.path.join("."),
      key,
      op: "set",
    })
    chosen.set(key, value)
  }

  private namedTarget(key: string, target: string): ConfigSource {
    const source = this.resolver.sourceNamed(target)
    if (!source) throw new WriteTargetError({ key, path: this.path, target })

    return this.path.reduce<ConfigSource>((node, name) => node.subsection(name), source)
  }

  private writeTarget(key: string): ConfigSource {
    if (!this.isKnown(key)) throw new WriteTargetError({ key, path: this.path })

    const candidates = this.views()
      .map(({ view }) => view)
      .filter((view) => view.capabilities.supportsNesting || this.path.length <= 1)
    const chosen =
      candidates.find((view) => view.capabilities.writable) ??
      candidates.find((view) => view.has(key)) ??
      candidates[0]

    if (!chosen) {
      throw new WriteTargetError({
        key,
        path: this.path,
        reason: "no source can hold a subsection this deep",
      })
    }

    return chosen
  }

  /**
   * Name of the source supplying the value of `key`.
   *
   * @throws KeyNotFoundError when no source has a value for it
   */
  explain(key: string): string {
    const hit = this.find(key)
    if (!hit) throw new KeyNotFoundError(key, this.path)

    return hit.source.name
  }

  /** Resolved values and subsections below this node as plain objects. */
  toObject(): ConfigObject {
    const keys = this.keys()
    const entries: Array<[string, ConfigValue | ConfigObject]> = keys.map((key) => [
      key,
      this.lookup(key),
    ])

    for (const name of this.subsections()) {
      if (!keys.includes(name)) entries.push([name, this.child(name).toObject()])
    }

    return Object.fromEntries(entries)
  }

  /** Persists every dirty source. A file is always written whole. */
  async write(): Promise<void> {
    for (const source of this.resolver.sources) {
      await source.write()
    }
  }
}
