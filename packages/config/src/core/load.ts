import type { Logger } from "@layerconf/logger"
import type { ConfigSource } from "../ports/source"
import type { ConfigValue } from "../ports/value"
import { createLayeredConfig, type LayeredConfig } from "./layered-config"

export type LoadLayeredConfigOptions = {
  /** Ranked sources, lowest priority first. */
  sources: readonly ConfigSource[]
  cascade?: boolean | undefined
  logger?: Logger | undefined
}

/**
 * Loads every source, in rank order, and returns the root view.
 *
 * @example
 * ```typescript
 * const cfg = await loadLayeredConfig<AppConfig>({
 *   sources: [
 *     new DefaultsSource({ home: "appdata", processes: Type.integer }),
 *     new IniSource({ file: "app.ini" }),
 *     new EnvSource({ prefix: "MYAPP_" }),
 *     new CommandlineSource(),
 *   ],
 *   cascade: true,
 * })
 * ```
 */
export async function loadLayeredConfig<T extends object = Record<string, ConfigValue>>({
  sources,
  cascade,
  logger,
}: LoadLayeredConfigOptions): Promise<LayeredConfig<T>> {
  for (const source of sources) {
    await source.load()
  }
  logger?.debug("configuration sources loaded", {
    op: "load",
    sources: sources.map((source) => source.name),
  })

  return createLayeredConfig<T>(sources, { cascade, logger })
}
