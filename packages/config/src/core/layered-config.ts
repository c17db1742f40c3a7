import type { ConfigSource } from "../ports/source"
import type { ConfigValue, TypedValue } from "../ports/value"
import { isConfigValue } from "./coercion/coercion"
import { CoercionError, NotLayeredConfigError } from "./errors"
import {
  type ConfigObject,
  Resolver,
  type ResolverNode,
  type ResolverOptions,
} from "./resolver/resolver"

/**
 * Attribute-style view over one node of a layered configuration. `T` declares the expected
 * shape: leaves are configuration values, nested objects are subsections.
 *
 * Reading a key no source sets throws KeyNotFoundError. Iterating yields resolvable leaf keys.
 *
 * @example
 * ```typescript
 * type AppConfig = { home: string; processes: number; worker: { force: boolean } }
 *
 * const cfg = createLayeredConfig<AppConfig>([
 *   new DefaultsSource({ home: "appdata", processes: Type.integer }),
 *   new EnvSource({ prefix: "MYAPP_" }),
 * ])
 *
 * cfg.processes       // 8, coerced from MYAPP_PROCESSES=8
 * cfg.worker.force    // resolved in subsection "worker"
 * LayeredConfig.explain(cfg, "processes") // "env"
 * ```
 */
export type LayeredConfig<T extends object = Record<string, ConfigValue>> = {
  [K in keyof T]: T[K] extends ConfigValue | undefined
    ? T[K]
    : T[K] extends object
      ? LayeredConfig<T[K]>
      : never
} & Iterable<string>

const nodes = new WeakMap<object, ResolverNode>()

function nodeOf(cfg: object): ResolverNode {
  const node = nodes.get(cfg)
  if (!node) throw new NotLayeredConfigError()

  return node
}

function view<T extends object>(node: ResolverNode): LayeredConfig<T> {
  const target: object = Object.create(null)
  const proxy = new Proxy(target, {
    get(_target, prop) {
      if (prop === Symbol.iterator) return () => node.keys()[Symbol.iterator]()
      if (typeof prop === "symbol") return undefined

      // reserved while unset, so views can be awaited and serialized
      if (prop === "then" && !node.hasValue(prop)) return undefined
      if (prop === "toJSON" && !node.hasValue(prop)) return () => node.toObject()

      const entry = node.entry(prop)

      return entry.kind === "subsection" ? view(entry.node) : entry.value
    },

    set(_target, prop, value: unknown) {
      if (typeof prop === "symbol") return false
      if (!isConfigValue(value)) {
        throw new CoercionError({ raw: value, kind: "configuration value", key: prop })
      }
      node.set(prop, value)

      return true
    },

    has(_target, prop) {
      return typeof prop === "string" && (node.hasValue(prop) || node.subsections().includes(prop))
    },

    ownKeys() {
      return node.keys()
    },

    getOwnPropertyDescriptor(_target, prop) {
      if (typeof prop === "symbol" || !node.hasValue(prop)) return undefined

      return { value: node.lookup(prop), writable: true, enumerable: true, configurable: true }
    },

    defineProperty() {
      return false
    },

    deleteProperty() {
      return false
    },
  })

  nodes.set(proxy, node)

  // the proxy answers for T's keys through the traps above
  return proxy as LayeredConfig<T>
}

export function createLayeredConfig<T extends object = Record<string, ConfigValue>>(
  sources: readonly ConfigSource[],
  options: ResolverOptions = {},
): LayeredConfig<T> {
  return view<T>(new Resolver(sources, options).root)
}

function get(cfg: object, key: string): ConfigValue | undefined
function get<F>(cfg: object, key: string, fallback: F): ConfigValue | F
function get(cfg: object, key: string, fallback?: unknown): unknown {
  const node = nodeOf(cfg)

  return node.hasValue(key) ? node.lookup(key) : fallback
}

/**
 * Operations on a {@link LayeredConfig} view that would otherwise clash with configuration
 * keys.
 */
export const LayeredConfig = {
  /**
   * Explicit-default read: `fallback` (or `undefined`) when no source sets `key`. Coercion
   * failures still throw.
   */
  get,

  /** Sets `key`, in the source named (or of the kind) `source` when given. */
  set(cfg: object, key: string, value: ConfigValue, source?: string): void {
    nodeOf(cfg).set(key, value, source)
  },

  /** Persists every dirty source, whichever subsection `cfg` views. */
  write(cfg: object): Promise<void> {
    return nodeOf(cfg).write()
  },

  resolve(cfg: object, key: string): TypedValue {
    return nodeOf(cfg).resolve(key)
  },

  /** Name of the source supplying `key`. */
  explain(cfg: object, key: string): string {
    return nodeOf(cfg).explain(key)
  },

  /** View over subsection `name`, whether or not any source declares it yet. */
  section<U extends object = Record<string, ConfigValue>>(
    cfg: object,
    name: string,
  ): LayeredConfig<U> {
    return view<U>(nodeOf(cfg).child(name))
  },

  keys(cfg: object): string[] {
    return nodeOf(cfg).keys()
  },

  subsections(cfg: object): string[] {
    return nodeOf(cfg).subsections()
  },

  toObject(cfg: object): ConfigObject {
    return nodeOf(cfg).toObject()
  },

  node: nodeOf,
} as const
